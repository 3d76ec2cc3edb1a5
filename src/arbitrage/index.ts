export type {
  Venue,
  VenueQuote,
  MarketPair,
  SpreadOpportunity,
  ExecutionResult,
  QuoteProvider,
  OpportunityExecutor,
} from "./types";

export { findSpreadOpportunities } from "./strategy/cross-venue.strategy";

export { ArbitrageDetector, type DetectorConfig } from "./detector";

export {
  PaperArbitrageExecutor,
  spreadConfidence,
  type PaperExecutorConfig,
} from "./executor/paper-executor";
