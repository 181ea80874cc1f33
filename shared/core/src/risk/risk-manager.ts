/**
 * Risk Manager
 *
 * Composes PositionSizer, StopLossManager and PortfolioRisk into the two
 * questions an execution client asks:
 * - canOpenPosition: may this trade open?
 * - shouldExitPosition: must this position close?
 *
 * Pre-trade checks run in order and the first failure short-circuits:
 *   1. Drawdown halt
 *   2. Daily loss limit
 *   3. Portfolio exposure
 *   4. Single-position size and weight
 *   5. Correlation with holdings
 *
 * The manager never touches storage and holds no mutable state; only the
 * limits are bound at construction, and every call may override them.
 */

import { getRiskLimits } from '@riskengine/config';
import type {
  AccountSnapshot,
  ExitDecision,
  PortfolioSnapshot,
  PositionSize,
  PositionState,
  RiskDecision,
  RiskLimits,
  SizingRequest,
} from '@riskengine/types';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { approve, deny, PortfolioRisk } from './portfolio-risk';
import { PositionSizer } from './position-sizer';
import { StopLossManager } from './stop-loss-manager';
import type { RiskManagerConfig, RiskSummary, TradeProposal } from './types';

const COMPONENT = 'risk-manager';

function formatPct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Constructor dependencies. Components default to fresh instances sharing
 * the manager's logger.
 */
export interface RiskManagerDeps extends RiskManagerConfig {
  positionSizer?: PositionSizer;
  stopLossManager?: StopLossManager;
  portfolioRisk?: PortfolioRisk;
}

export interface ExitEvaluation {
  decision: ExitDecision;
  /** Copy of the position marked at the evaluated price, with the updated high-water mark */
  position: PositionState;
}

// =============================================================================
// RiskManager Implementation
// =============================================================================

export class RiskManager {
  private readonly limits: RiskLimits;
  private readonly defaultSizing: SizingRequest;
  private readonly logger: ILogger;
  private readonly positionSizer: PositionSizer;
  private readonly stopLossManager: StopLossManager;
  private readonly portfolioRisk: PortfolioRisk;

  constructor(deps: RiskManagerDeps = {}) {
    this.limits = deps.limits ?? getRiskLimits();
    this.defaultSizing = deps.defaultSizing ?? { mode: 'FIXED_FRACTION' };
    this.logger = deps.logger ?? getLogger(COMPONENT);
    this.positionSizer = deps.positionSizer ?? new PositionSizer({ logger: this.logger });
    this.stopLossManager = deps.stopLossManager ?? new StopLossManager({ logger: this.logger });
    this.portfolioRisk = deps.portfolioRisk ?? new PortfolioRisk({ logger: this.logger });

    this.logger.info('RiskManager initialized', {
      defaultSizingMode: this.defaultSizing.mode,
      maxPositionSize: this.limits.maxPositionSize,
      maxPortfolioExposure: this.limits.maxPortfolioExposure,
      dailyLossLimit: this.limits.dailyLossLimit,
      maxDrawdownLimit: this.limits.maxDrawdownLimit,
    });
  }

  getLimits(): RiskLimits {
    return this.limits;
  }

  // ---------------------------------------------------------------------------
  // Sizing
  // ---------------------------------------------------------------------------

  calculatePositionSize(
    symbol: string,
    price: number,
    account: AccountSnapshot,
    request: SizingRequest = this.defaultSizing,
    limits: RiskLimits = this.limits
  ): PositionSize {
    return this.positionSizer.calculateSize(symbol, price, account.equity, limits, request);
  }

  // ---------------------------------------------------------------------------
  // Pre-Trade Gate
  // ---------------------------------------------------------------------------

  canOpenPosition(
    trade: TradeProposal,
    account: AccountSnapshot,
    portfolio: PortfolioSnapshot,
    limits: RiskLimits = this.limits
  ): RiskDecision {
    const decision = this.runChecks(trade, account, portfolio, limits);

    if (decision.allowed) {
      this.logger.debug('Trade approved', {
        symbol: trade.symbol,
        side: trade.side,
        quantity: trade.quantity,
        price: trade.price,
      });
    } else {
      this.logger.warn('Trade rejected', {
        symbol: trade.symbol,
        reason: decision.reason,
        message: decision.message,
      });
    }
    return decision;
  }

  private runChecks(
    trade: TradeProposal,
    account: AccountSnapshot,
    portfolio: PortfolioSnapshot,
    limits: RiskLimits
  ): RiskDecision {
    const drawdown = this.portfolioRisk.evaluateDrawdown(account, limits);
    if (drawdown.tripped) {
      const message = drawdown.latched
        ? `Drawdown halt active since ${account.drawdownHaltedAt}; manual reset required`
        : `Drawdown limit breached: drawdown ${formatPct(drawdown.value)} >= ${formatPct(drawdown.limit)}`;
      return deny('DRAWDOWN_HALT', message, drawdown.limit, drawdown.value, trade.symbol);
    }

    const dailyLoss = this.portfolioRisk.evaluateDailyLoss(account, limits);
    if (dailyLoss.tripped) {
      return deny(
        'DAILY_LOSS_LIMIT',
        `Daily loss limit breached: daily P&L ${formatPct(dailyLoss.value)} <= -${formatPct(dailyLoss.limit)}`,
        dailyLoss.limit,
        dailyLoss.value,
        trade.symbol
      );
    }

    const exposure = this.portfolioRisk.checkExposure(trade, account, portfolio, limits);
    if (!exposure.allowed) return exposure;

    const weight = this.portfolioRisk.checkPositionWeight(trade, account, portfolio, limits);
    if (!weight.allowed) return weight;

    const correlation = this.portfolioRisk.checkCorrelation(trade.symbol, portfolio, limits);
    if (!correlation.allowed) return correlation;

    return approve();
  }

  // ---------------------------------------------------------------------------
  // In-Trade Monitoring
  // ---------------------------------------------------------------------------

  shouldExitPosition(
    position: PositionState,
    currentPrice: number,
    now: number,
    limits: RiskLimits = this.limits
  ): ExitEvaluation {
    const decision = this.stopLossManager.evaluate(
      {
        entryPrice: position.entryPrice,
        currentPrice,
        side: position.side,
        entryTime: position.entryTime,
        now,
        highWaterMark: position.highWaterMark,
      },
      limits
    );

    return {
      decision,
      position: { ...position, currentPrice, highWaterMark: decision.highWaterMark },
    };
  }

  // ---------------------------------------------------------------------------
  // Breaker State
  // ---------------------------------------------------------------------------

  updateDrawdownState(account: AccountSnapshot, limits: RiskLimits = this.limits): AccountSnapshot {
    return this.portfolioRisk.updateDrawdownState(account, limits);
  }

  resetDrawdownHalt(account: AccountSnapshot): AccountSnapshot {
    return this.portfolioRisk.resetDrawdownHalt(account);
  }

  // ---------------------------------------------------------------------------
  // Summary
  // ---------------------------------------------------------------------------

  getRiskSummary(
    account: AccountSnapshot,
    portfolio: PortfolioSnapshot,
    limits: RiskLimits = this.limits
  ): RiskSummary {
    const dailyLoss = this.portfolioRisk.evaluateDailyLoss(account, limits);
    const drawdown = this.portfolioRisk.evaluateDrawdown(account, limits);

    return {
      equity: account.equity,
      dailyPnl: account.realizedPnlToday + account.unrealizedPnlToday,
      dailyPnlPct: dailyLoss.value,
      drawdown: drawdown.value,
      exposure: this.portfolioRisk.calculateExposure(portfolio, account.equity),
      valueAtRisk: this.portfolioRisk.calculateVaR(portfolio, account.equity, limits),
      beta: this.portfolioRisk.calculateBeta(portfolio, account.equity, limits),
      limits: {
        dailyLossLimit: limits.dailyLossLimit,
        maxDrawdownLimit: limits.maxDrawdownLimit,
        maxPortfolioExposure: limits.maxPortfolioExposure,
      },
      canTrade: !dailyLoss.tripped && !drawdown.tripped,
    };
  }
}

// =============================================================================
// Singleton Factory
// =============================================================================

let managerInstance: RiskManager | null = null;

/**
 * Get the process-wide RiskManager, bound to the limits loaded from the
 * environment. Call resetRiskManager() after a configuration reload.
 */
export function getRiskManager(): RiskManager {
  if (!managerInstance) {
    managerInstance = new RiskManager();
  }
  return managerInstance;
}

export function resetRiskManager(): void {
  managerInstance = null;
}
