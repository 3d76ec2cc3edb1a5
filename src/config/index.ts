/**
 * Configuration Index
 *
 * - env.ts: environment variable parsing helpers
 * - bot-config.ts: the bot's settings and their defaults
 *
 * Usage:
 *   import { loadBotConfig } from './config';
 *   const config = loadBotConfig({ DRY_RUN: "false" });
 */

export {
  createEnvReader,
  envNum,
  envBool,
  envStr,
  envEnum,
  envList,
  type EnvSource,
} from "./env";

export { loadBotConfig, validateBotConfig, type BotConfig } from "./bot-config";
