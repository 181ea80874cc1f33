/**
 * Portfolio Risk
 *
 * Aggregate checks and statistics over a portfolio snapshot:
 * - Gross exposure and single-position weight
 * - Pairwise return correlation of a candidate with each holding
 * - Daily-loss and drawdown circuit breakers
 * - Historical-simulation VaR and OLS beta
 *
 * Every method is a pure function of its arguments. Breaker state (peak
 * equity, today's P&L, the drawdown latch) is carried on the AccountSnapshot
 * and threaded by the caller.
 */

import { InvalidInputError } from '@riskengine/types';
import type {
  AccountSnapshot,
  Estimate,
  PortfolioSnapshot,
  PositionState,
  RiskDecision,
  RiskLimits,
  RiskReasonCode,
} from '@riskengine/types';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { historicalQuantile, olsSlope, pearsonCorrelation, tail } from './statistics';
import type {
  BreakerStatus,
  DrawdownBreakerStatus,
  PairCorrelation,
  TradeProposal,
} from './types';

const COMPONENT = 'portfolio-risk';

export interface PortfolioRiskDeps {
  logger?: ILogger;
}

// =============================================================================
// Decision Builders
// =============================================================================

function formatPct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function approve(message = 'All risk checks passed'): RiskDecision {
  return { allowed: true, reason: 'APPROVED', message };
}

export function deny(
  reason: RiskReasonCode,
  message: string,
  limit: number,
  actual: number,
  symbol?: string
): RiskDecision {
  const details: NonNullable<RiskDecision['details']> = { limit, actual };
  if (symbol !== undefined) {
    details.symbol = symbol;
  }
  return { allowed: false, reason, message, details };
}

function determined(value: number): Estimate {
  return { kind: 'determined', value };
}

function undetermined(reason: string, required: number, available: number): Estimate {
  return { kind: 'undetermined', reason, required, available };
}

// =============================================================================
// PortfolioRisk Implementation
// =============================================================================

export class PortfolioRisk {
  private readonly logger: ILogger;

  constructor(deps: PortfolioRiskDeps = {}) {
    this.logger = deps.logger ?? getLogger(COMPONENT);
  }

  // ---------------------------------------------------------------------------
  // Exposure
  // ---------------------------------------------------------------------------

  /**
   * Mark price of a position; entry price until the first mark arrives.
   */
  markPrice(position: PositionState): number {
    return position.currentPrice ?? position.entryPrice;
  }

  /**
   * Absolute notional of a position at its mark.
   */
  notional(position: PositionState): number {
    this.validatePosition(position);
    return Math.abs(position.quantity * this.markPrice(position));
  }

  /**
   * Gross exposure: sum of |quantity * mark| over holdings, divided by equity.
   */
  calculateExposure(portfolio: PortfolioSnapshot, equity: number): number {
    this.requirePositiveEquity(equity);
    return this.grossNotional(portfolio) / equity;
  }

  /**
   * Blocks when exposure after the trade would exceed maxPortfolioExposure.
   * Existing positions are never force-reduced.
   */
  checkExposure(
    trade: TradeProposal,
    account: AccountSnapshot,
    portfolio: PortfolioSnapshot,
    limits: RiskLimits
  ): RiskDecision {
    this.validateTrade(trade);
    this.requirePositiveEquity(account.equity);

    const current = this.grossNotional(portfolio);
    const proposed = Math.abs(trade.quantity * trade.price);
    const projected = (current + proposed) / account.equity;

    if (projected > limits.maxPortfolioExposure) {
      return deny(
        'EXPOSURE_LIMIT',
        `Portfolio exposure limit exceeded: projected ${formatPct(projected)} > ` +
          `${formatPct(limits.maxPortfolioExposure)}`,
        limits.maxPortfolioExposure,
        projected,
        trade.symbol
      );
    }
    return approve(`Projected exposure ${formatPct(projected)} within limit`);
  }

  /**
   * Single-position checks:
   * 1. The trade's own notional against maxPositionSize
   * 2. The symbol's weight after the trade against maxPositionWeight
   */
  checkPositionWeight(
    trade: TradeProposal,
    account: AccountSnapshot,
    portfolio: PortfolioSnapshot,
    limits: RiskLimits
  ): RiskDecision {
    this.validateTrade(trade);
    this.requirePositiveEquity(account.equity);

    const proposed = Math.abs(trade.quantity * trade.price);
    const tradeWeight = proposed / account.equity;
    if (tradeWeight > limits.maxPositionSize) {
      return deny(
        'POSITION_SIZE_LIMIT',
        `Position size limit exceeded: ${trade.symbol} trade is ${formatPct(tradeWeight)} of equity > ` +
          `${formatPct(limits.maxPositionSize)}`,
        limits.maxPositionSize,
        tradeWeight,
        trade.symbol
      );
    }

    let existing = 0;
    for (const position of portfolio.positions) {
      if (position.symbol === trade.symbol) {
        existing += this.notional(position);
      }
    }
    const projectedWeight = (existing + proposed) / account.equity;
    if (projectedWeight > limits.maxPositionWeight) {
      return deny(
        'POSITION_WEIGHT_LIMIT',
        `Position weight limit exceeded: ${trade.symbol} would be ${formatPct(projectedWeight)} of equity > ` +
          `${formatPct(limits.maxPositionWeight)}`,
        limits.maxPositionWeight,
        projectedWeight,
        trade.symbol
      );
    }

    return approve(`Position weight ${formatPct(projectedWeight)} within limit`);
  }

  // ---------------------------------------------------------------------------
  // Correlation
  // ---------------------------------------------------------------------------

  /**
   * Correlation of `symbol` with each distinct held symbol, in holding order.
   * The candidate itself is excluded.
   */
  correlations(symbol: string, portfolio: PortfolioSnapshot, limits: RiskLimits): PairCorrelation[] {
    const lookback = limits.correlationLookback;
    const candidate = this.seriesFor(portfolio, symbol);
    const result: PairCorrelation[] = [];

    for (const held of this.heldSymbols(portfolio)) {
      if (held === symbol) continue;

      const other = this.seriesFor(portfolio, held);
      const available = Math.min(candidate.length, other.length);
      if (available < lookback) {
        result.push({
          symbol: held,
          correlation: undetermined(
            `Need ${lookback} returns for ${symbol}/${held}, have ${available}`,
            lookback,
            available
          ),
        });
        continue;
      }

      const r = pearsonCorrelation(tail(candidate, lookback), tail(other, lookback));
      result.push({
        symbol: held,
        correlation: r === null
          ? undetermined(`Zero return variance for ${symbol}/${held}`, lookback, available)
          : determined(r),
      });
    }

    return result;
  }

  /**
   * Blocks when any held symbol's |correlation| exceeds maxCorrelation, or when a
   * pair's correlation cannot be determined.
   */
  checkCorrelation(symbol: string, portfolio: PortfolioSnapshot, limits: RiskLimits): RiskDecision {
    for (const pair of this.correlations(symbol, portfolio, limits)) {
      const estimate = pair.correlation;
      if (estimate.kind === 'undetermined') {
        return deny(
          'CORRELATION_UNDETERMINED',
          `Correlation undetermined: ${estimate.reason}`,
          estimate.required,
          estimate.available,
          pair.symbol
        );
      }
      if (Math.abs(estimate.value) > limits.maxCorrelation) {
        return deny(
          'CORRELATION_LIMIT',
          `Correlation limit exceeded: ${symbol}/${pair.symbol} |correlation| ` +
            `${Math.abs(estimate.value).toFixed(4)} > ${limits.maxCorrelation}`,
          limits.maxCorrelation,
          estimate.value,
          pair.symbol
        );
      }
    }
    return approve('Correlation within limit');
  }

  // ---------------------------------------------------------------------------
  // Circuit Breakers
  // ---------------------------------------------------------------------------

  /**
   * Daily P&L (realized + unrealized) over start-of-day equity.
   * Trips at or below -dailyLossLimit.
   */
  evaluateDailyLoss(account: AccountSnapshot, limits: RiskLimits): BreakerStatus {
    this.validateAccount(account);
    if (!Number.isFinite(account.startOfDayEquity) || account.startOfDayEquity <= 0) {
      throw new InvalidInputError(
        `startOfDayEquity must be a positive finite number, got ${account.startOfDayEquity}`,
        COMPONENT,
        'startOfDayEquity'
      );
    }

    const value = (account.realizedPnlToday + account.unrealizedPnlToday) / account.startOfDayEquity;
    return {
      tripped: value <= -limits.dailyLossLimit,
      value,
      limit: limits.dailyLossLimit,
    };
  }

  /**
   * Peak-to-current drawdown. Trips at or above maxDrawdownLimit, or when the
   * account carries a latched halt.
   */
  evaluateDrawdown(account: AccountSnapshot, limits: RiskLimits): DrawdownBreakerStatus {
    const value = this.drawdown(account);
    const latched = account.drawdownHaltedAt !== undefined && account.drawdownHaltedAt !== null;
    return {
      tripped: latched || value >= limits.maxDrawdownLimit,
      value,
      limit: limits.maxDrawdownLimit,
      latched,
    };
  }

  /**
   * Copy of `account` with the peak raised to current equity when higher and
   * the halt latched (at `account.timestamp`) once the drawdown limit is hit.
   * Callers store the result and pass it into the next check.
   */
  updateDrawdownState(account: AccountSnapshot, limits: RiskLimits): AccountSnapshot {
    const peakEquity = Math.max(account.peakEquity, account.equity);
    const status = this.evaluateDrawdown(account, limits);

    if (status.tripped && !status.latched) {
      this.logger.warn('Drawdown halt latched', {
        drawdown: status.value,
        limit: status.limit,
        equity: account.equity,
        peakEquity,
      });
      return { ...account, peakEquity, drawdownHaltedAt: account.timestamp };
    }
    return { ...account, peakEquity };
  }

  /**
   * Manual reset: clears the latch and re-bases the peak to current equity.
   */
  resetDrawdownHalt(account: AccountSnapshot): AccountSnapshot {
    this.logger.info('Drawdown halt reset', {
      equity: account.equity,
      previousPeak: account.peakEquity,
      haltedAt: account.drawdownHaltedAt ?? null,
    });
    return { ...account, peakEquity: account.equity, drawdownHaltedAt: null };
  }

  drawdown(account: AccountSnapshot): number {
    this.validateAccount(account);
    const peak = Math.max(account.peakEquity, account.equity);
    if (peak <= 0) return 0;
    return (peak - account.equity) / peak;
  }

  // ---------------------------------------------------------------------------
  // VaR & Beta
  // ---------------------------------------------------------------------------

  /**
   * Portfolio return series, oldest first.
   *
   * Uses `portfolio.portfolioReturns` when supplied. Otherwise each period is
   * sum(sign * notional / equity * r) over holdings, across the tail that every
   * held symbol's series covers.
   */
  portfolioReturnSeries(portfolio: PortfolioSnapshot, equity: number): number[] {
    if (portfolio.portfolioReturns !== undefined) {
      this.validateSeries(portfolio.portfolioReturns, 'portfolioReturns');
      return [...portfolio.portfolioReturns];
    }
    if (portfolio.positions.length === 0) return [];
    this.requirePositiveEquity(equity);

    const legs = portfolio.positions.map((position) => ({
      weight: (position.side === 'LONG' ? 1 : -1) * this.notional(position) / equity,
      series: this.seriesFor(portfolio, position.symbol),
    }));
    const length = Math.min(...legs.map((leg) => leg.series.length));

    const combined: number[] = new Array<number>(length).fill(0);
    for (const leg of legs) {
      const aligned = tail(leg.series, length);
      for (let t = 0; t < length; t++) {
        combined[t] += leg.weight * aligned[t];
      }
    }
    return combined;
  }

  /**
   * Historical-simulation VaR in account currency over the last varLookback
   * portfolio returns. An empty portfolio has no risk.
   */
  calculateVaR(portfolio: PortfolioSnapshot, equity: number, limits: RiskLimits): Estimate {
    if (portfolio.portfolioReturns === undefined && portfolio.positions.length === 0) {
      return determined(0);
    }

    const series = this.portfolioReturnSeries(portfolio, equity);
    const required = limits.varLookback;
    if (series.length < required) {
      return undetermined(
        `Need ${required} portfolio returns for VaR, have ${series.length}`,
        required,
        series.length
      );
    }

    const quantile = historicalQuantile(tail(series, required), 1 - limits.varConfidence);
    const value = Math.max(0, -quantile) * equity;

    this.logger.debug('VaR calculated', {
      confidence: limits.varConfidence,
      observations: required,
      quantile,
      value,
    });
    return determined(value);
  }

  /**
   * OLS slope of portfolio returns on benchmark returns over the last
   * betaLookback aligned periods.
   */
  calculateBeta(portfolio: PortfolioSnapshot, equity: number, limits: RiskLimits): Estimate {
    this.validateSeries(portfolio.benchmarkReturns, 'benchmarkReturns');

    const series = this.portfolioReturnSeries(portfolio, equity);
    const required = limits.betaLookback;
    const available = Math.min(series.length, portfolio.benchmarkReturns.length);
    if (available < required) {
      return undetermined(
        `Need ${required} aligned portfolio and benchmark returns for beta, have ${available}`,
        required,
        available
      );
    }

    const beta = olsSlope(tail(series, required), tail(portfolio.benchmarkReturns, required));
    if (beta === null) {
      return undetermined('Benchmark returns have zero variance', required, available);
    }
    return determined(beta);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private grossNotional(portfolio: PortfolioSnapshot): number {
    let total = 0;
    for (const position of portfolio.positions) {
      total += this.notional(position);
    }
    return total;
  }

  private heldSymbols(portfolio: PortfolioSnapshot): string[] {
    return [...new Set(portfolio.positions.map((position) => position.symbol))];
  }

  private seriesFor(portfolio: PortfolioSnapshot, symbol: string): ReadonlyArray<number> {
    const series = portfolio.returns[symbol] ?? [];
    this.validateSeries(series, `returns.${symbol}`);
    return series;
  }

  private validateSeries(series: ReadonlyArray<number>, field: string): void {
    const index = series.findIndex((value) => !Number.isFinite(value));
    if (index !== -1) {
      throw new InvalidInputError(
        `${field}[${index}] is not a finite number: ${series[index]}`,
        COMPONENT,
        field
      );
    }
  }

  private validateAccount(account: AccountSnapshot): void {
    const fields = ['equity', 'peakEquity', 'realizedPnlToday', 'unrealizedPnlToday'] as const;
    for (const field of fields) {
      if (!Number.isFinite(account[field])) {
        throw new InvalidInputError(`${field} must be a finite number, got ${account[field]}`, COMPONENT, field);
      }
    }
  }

  private validatePosition(position: PositionState): void {
    if (!Number.isFinite(position.quantity)) {
      throw new InvalidInputError(
        `${position.symbol} quantity must be a finite number, got ${position.quantity}`,
        COMPONENT,
        'quantity'
      );
    }
    const mark = this.markPrice(position);
    if (!Number.isFinite(mark) || mark <= 0) {
      throw new InvalidInputError(
        `${position.symbol} price must be a positive finite number, got ${mark}`,
        COMPONENT,
        'price'
      );
    }
  }

  private validateTrade(trade: TradeProposal): void {
    if (!Number.isFinite(trade.price) || trade.price <= 0) {
      throw new InvalidInputError(`price must be a positive finite number, got ${trade.price}`, COMPONENT, 'price');
    }
    if (!Number.isFinite(trade.quantity) || trade.quantity < 0) {
      throw new InvalidInputError(
        `quantity must be a non-negative finite number, got ${trade.quantity}`,
        COMPONENT,
        'quantity'
      );
    }
  }

  private requirePositiveEquity(equity: number): void {
    if (!Number.isFinite(equity) || equity <= 0) {
      throw new InvalidInputError(`equity must be a positive finite number, got ${equity}`, COMPONENT, 'equity');
    }
  }
}
