/**
 * Risk Module
 *
 * - PositionSizer: fixed-fraction, volatility-adjusted, Kelly and
 *   conservative sizing under a hard ceiling
 * - StopLossManager: take-profit, trailing, fixed and time stops
 * - PortfolioRisk: exposure, correlation, breakers, VaR and beta
 * - RiskManager: pre-trade gate and in-trade exit checks
 */

// =============================================================================
// Position Sizer
// =============================================================================

export {
  PositionSizer,
  getPositionSizer,
  resetPositionSizer,
} from './position-sizer';
export type { PositionSizerDeps } from './position-sizer';

// =============================================================================
// Stop-Loss Manager
// =============================================================================

export {
  StopLossManager,
  getStopLossManager,
  resetStopLossManager,
} from './stop-loss-manager';
export type { StopLossManagerDeps } from './stop-loss-manager';

// =============================================================================
// Portfolio Risk
// =============================================================================

export { PortfolioRisk, approve, deny } from './portfolio-risk';
export type { PortfolioRiskDeps } from './portfolio-risk';

export {
  mean,
  tail,
  covariance,
  variance,
  pearsonCorrelation,
  olsSlope,
  historicalQuantile,
} from './statistics';

// =============================================================================
// Risk Manager
// =============================================================================

export {
  RiskManager,
  getRiskManager,
  resetRiskManager,
} from './risk-manager';
export type { RiskManagerDeps, ExitEvaluation } from './risk-manager';

// =============================================================================
// Types
// =============================================================================

export type {
  StopLossInput,
  TradeProposal,
  BreakerStatus,
  DrawdownBreakerStatus,
  PairCorrelation,
  RiskManagerConfig,
  RiskSummary,
} from './types';
