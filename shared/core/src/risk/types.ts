/**
 * Risk Component Types
 *
 * Inputs and results specific to the risk components. The snapshot and
 * decision value types shared with callers live in @riskengine/types.
 */

import type {
  Estimate,
  PositionSide,
  RiskLimits,
  SizingRequest,
} from '@riskengine/types';
import type { ILogger } from '../logging';

// =============================================================================
// StopLossManager
// =============================================================================

/**
 * Everything needed to evaluate one open position at one price.
 */
export interface StopLossInput {
  entryPrice: number;
  currentPrice: number;
  side: PositionSide;
  entryTime: number;
  now: number;
  /**
   * Mark returned by the previous evaluation.
   * Defaults to entryPrice for the first evaluation after entry.
   */
  highWaterMark?: number;
}

// =============================================================================
// PortfolioRisk
// =============================================================================

/**
 * A trade the execution client wants to open.
 */
export interface TradeProposal {
  symbol: string;
  side: PositionSide;
  quantity: number;
  price: number;
}

export interface BreakerStatus {
  tripped: boolean;
  /** Signed value the limit is compared against (daily P&L ratio, or drawdown) */
  value: number;
  limit: number;
}

export interface DrawdownBreakerStatus extends BreakerStatus {
  /** True when the caller passed a latched halt that has not been reset */
  latched: boolean;
}

/**
 * Correlation of the candidate with one held symbol.
 */
export interface PairCorrelation {
  symbol: string;
  correlation: Estimate;
}

// =============================================================================
// RiskManager
// =============================================================================

export interface RiskManagerConfig {
  /** Limits used when a call does not pass its own. Defaults to getRiskLimits() */
  limits?: RiskLimits;
  /** Used when calculatePositionSize gets no request. Defaults to FIXED_FRACTION */
  defaultSizing?: SizingRequest;
  logger?: ILogger;
}

/**
 * Point-in-time risk status for dashboards and logs.
 */
export interface RiskSummary {
  equity: number;
  dailyPnl: number;
  /** Daily P&L as a fraction of start-of-day equity */
  dailyPnlPct: number;
  /** Peak-to-current decline as a fraction of peak equity */
  drawdown: number;
  /** Gross exposure as a fraction of equity */
  exposure: number;
  valueAtRisk: Estimate;
  beta: Estimate;
  limits: {
    dailyLossLimit: number;
    maxDrawdownLimit: number;
    maxPortfolioExposure: number;
  };
  /** Both circuit breakers are clear */
  canTrade: boolean;
}
