/**
 * Risk Engine Value Types
 *
 * Snapshots flow into the engine and decisions flow out. Every value here is
 * built fresh per call (or per polling tick) by the caller; the engine never
 * keeps a reference to one after returning.
 *
 * Conventions:
 * - Prices and money are plain numbers in the account currency
 * - Fractions are decimals (0.02 = 2%)
 * - Timestamps are Unix epoch milliseconds, durations are milliseconds
 */

export type PositionSide = 'LONG' | 'SHORT';

/**
 * Account state at a point in time.
 *
 * The breaker inputs (start-of-day equity, peak equity, today's P&L and the
 * drawdown latch) are owned by the caller and passed forward between calls.
 */
export interface AccountSnapshot {
  /** Total account equity */
  equity: number;

  /** Cash balance */
  cash: number;

  /** When the snapshot was taken */
  timestamp: number;

  /** Equity at the start of the current trading day */
  startOfDayEquity: number;

  /** Highest equity observed since the last drawdown reset */
  peakEquity: number;

  /** Realized P&L for the current trading day */
  realizedPnlToday: number;

  /** Unrealized P&L for the current trading day */
  unrealizedPnlToday: number;

  /**
   * When the drawdown breaker latched, or null if it has not.
   * Only a manual reset clears this.
   */
  drawdownHaltedAt?: number | null;
}

/**
 * One open position. The engine returns updated copies, never mutates.
 */
export interface PositionState {
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  quantity: number;
  entryTime: number;

  /**
   * Most favourable price seen since entry: the highest for longs, the lowest
   * for shorts. Drives the trailing stop.
   */
  highWaterMark: number;

  /** Last mark price; valuation falls back to entryPrice when absent */
  currentPrice?: number;
}

/**
 * Holdings plus the return history used for correlation, VaR and beta.
 */
export interface PortfolioSnapshot {
  positions: ReadonlyArray<PositionState>;

  /** Per-symbol period returns, oldest first */
  returns: Readonly<Record<string, ReadonlyArray<number>>>;

  /** Benchmark period returns, oldest first */
  benchmarkReturns: ReadonlyArray<number>;

  /**
   * Explicit portfolio return series, oldest first.
   * When absent, the series is derived from holdings and per-symbol returns.
   */
  portfolioReturns?: ReadonlyArray<number>;
}

/**
 * Risk limits. Immutable for the lifetime of a decision.
 */
export interface RiskLimits {
  /** Max notional of a single trade as a fraction of equity (hard sizing ceiling) */
  readonly maxPositionSize: number;

  /** Max gross exposure as a fraction of equity */
  readonly maxPortfolioExposure: number;

  /** Max weight of one symbol (existing + proposed) as a fraction of equity */
  readonly maxPositionWeight: number;

  /** Max pairwise return correlation with any held symbol */
  readonly maxCorrelation: number;

  /** Daily loss (realized + unrealized) that blocks new opens */
  readonly dailyLossLimit: number;

  /** Peak-to-current decline that halts trading until reset */
  readonly maxDrawdownLimit: number;

  readonly stopLossPct: number;
  readonly trailingStopPct: number;
  readonly takeProfitPct: number;

  /** Time stop for non-profitable positions */
  readonly maxHoldingDurationMs: number;

  /** VaR confidence level, e.g. 0.95 */
  readonly varConfidence: number;

  /** Fractional Kelly multiplier, in (0, 1] */
  readonly kellyMultiplier: number;

  /** Upper bound on the Kelly fraction after the multiplier */
  readonly kellyCap: number;

  /** Periods used for pairwise correlation */
  readonly correlationLookback: number;

  /** Periods used for portfolio beta */
  readonly betaLookback: number;

  /** Periods used for historical VaR */
  readonly varLookback: number;

  /** Relative volatility (ATR / price) at which volatility sizing equals fixed-fraction sizing */
  readonly volatilityTarget: number;
}

// =============================================================================
// Sizing
// =============================================================================

export type SizingMode = 'FIXED_FRACTION' | 'VOLATILITY_ADJUSTED' | 'KELLY' | 'CONSERVATIVE';

/** Historical trade statistics for Kelly sizing */
export interface KellyInputs {
  /** Fraction of winning trades, in [0, 1] */
  winRate: number;
  /** Average winning trade, > 0 */
  avgWin: number;
  /** Average losing trade as a positive number, > 0 */
  avgLoss: number;
}

export type SizingRequest =
  | { mode: 'FIXED_FRACTION' }
  | {
      mode: 'VOLATILITY_ADJUSTED';
      /** Volatility in price units, e.g. ATR */
      volatility: number;
      /** Overrides limits.volatilityTarget */
      targetVolatility?: number;
    }
  | ({ mode: 'KELLY' } & KellyInputs)
  | {
      mode: 'CONSERVATIVE';
      volatility?: number;
      targetVolatility?: number;
      kelly?: KellyInputs;
    };

/**
 * Breakdown of a sizing calculation.
 */
export interface PositionSize {
  symbol: string;
  mode: SizingMode;

  /** Recommended quantity (integer, >= 0) */
  quantity: number;

  /** Fraction of equity the mode asked for, before the hard ceiling */
  requestedFraction: number;

  /** floor(equity * maxPositionSize / price) */
  ceilingQuantity: number;

  /** True when the hard ceiling reduced the mode's quantity */
  capped: boolean;

  /** Raw Kelly fraction, when Kelly was evaluated */
  kellyFraction?: number;

  /** Kelly fraction after multiplier and cap, when Kelly was evaluated */
  adjustedKelly?: number;

  /** Why the quantity is zero, if it is */
  reason?: string;
}

// =============================================================================
// Decisions
// =============================================================================

export type RiskReasonCode =
  | 'APPROVED'
  | 'DRAWDOWN_HALT'
  | 'DAILY_LOSS_LIMIT'
  | 'EXPOSURE_LIMIT'
  | 'POSITION_SIZE_LIMIT'
  | 'POSITION_WEIGHT_LIMIT'
  | 'CORRELATION_LIMIT'
  | 'CORRELATION_UNDETERMINED';

/**
 * Outcome of a pre-trade check. A denial is a normal result, not an error.
 */
export interface RiskDecision {
  allowed: boolean;
  reason: RiskReasonCode;
  /** Human-readable; names the limit and the observed value */
  message: string;
  details?: {
    limit: number;
    actual: number;
    symbol?: string;
  };
}

export type ExitReason = 'TAKE_PROFIT' | 'TRAILING_STOP' | 'STOP_LOSS' | 'TIME_STOP';

export interface ExitDecision {
  exit: boolean;
  reason: ExitReason | null;
  message: string;
  /** Signed return in the position's favour */
  unrealizedReturn: number;
  /** Updated mark; the caller must pass it into the next evaluation */
  highWaterMark: number;
  /** Price at which the trailing stop fires, null when disabled */
  trailingStopPrice: number | null;
}

/**
 * A statistic that could not be computed from the data supplied.
 */
export interface Undetermined {
  kind: 'undetermined';
  reason: string;
  required: number;
  available: number;
}

export interface Determined {
  kind: 'determined';
  value: number;
}

export type Estimate = Determined | Undetermined;
