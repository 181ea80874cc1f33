/**
 * Stop-Loss Manager
 *
 * Decides whether an open position must be closed at the current price.
 *
 * Triggers are checked in a fixed order and the first one wins:
 *   1. TAKE_PROFIT   - return >= takeProfitPct
 *   2. TRAILING_STOP - retrace from the high-water mark >= trailingStopPct
 *   3. STOP_LOSS     - return <= -stopLossPct
 *   4. TIME_STOP     - held >= maxHoldingDurationMs and return <= 0
 *
 * A threshold of 0 disables its trigger. Shorts mirror the sign conventions:
 * their mark is the lowest price seen and their return is (entry - price) / entry.
 *
 * The manager keeps no per-position state. The high-water mark comes in with
 * each call and the updated mark goes back out in the decision.
 */

import { InvalidInputError } from '@riskengine/types';
import type {
  ExitDecision,
  ExitReason,
  PositionSide,
  PositionState,
  RiskLimits,
} from '@riskengine/types';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import type { StopLossInput } from './types';

const COMPONENT = 'stop-loss-manager';

export interface StopLossManagerDeps {
  logger?: ILogger;
}

function formatPct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

// =============================================================================
// StopLossManager Implementation
// =============================================================================

export class StopLossManager {
  private readonly logger: ILogger;

  constructor(deps: StopLossManagerDeps = {}) {
    this.logger = deps.logger ?? getLogger(COMPONENT);
  }

  // ---------------------------------------------------------------------------
  // Public API: Exit Evaluation
  // ---------------------------------------------------------------------------

  /**
   * Evaluate every exit trigger for one position at one price.
   *
   * @throws InvalidInputError for non-positive prices or `now` before `entryTime`
   */
  evaluate(input: StopLossInput, limits: RiskLimits): ExitDecision {
    this.validateInput(input);

    const { entryPrice, currentPrice, side, entryTime, now } = input;
    const highWaterMark = this.nextHighWaterMark(input.highWaterMark ?? entryPrice, currentPrice, side);
    const unrealizedReturn = this.unrealizedReturn(entryPrice, currentPrice, side);
    const trailingStopPrice = this.trailingStopPrice(highWaterMark, side, limits);

    const decide = (reason: ExitReason | null, message: string): ExitDecision => ({
      exit: reason !== null,
      reason,
      message,
      unrealizedReturn,
      highWaterMark,
      trailingStopPrice,
    });

    if (limits.takeProfitPct > 0 && unrealizedReturn >= limits.takeProfitPct) {
      return this.logExit(
        decide(
          'TAKE_PROFIT',
          `Take profit: return ${formatPct(unrealizedReturn)} reached target ${formatPct(limits.takeProfitPct)}`
        ),
        input
      );
    }

    if (limits.trailingStopPct > 0) {
      const retrace = this.retraceFromMark(highWaterMark, currentPrice, side);
      if (retrace >= limits.trailingStopPct) {
        return this.logExit(
          decide(
            'TRAILING_STOP',
            `Trailing stop: price ${currentPrice} retraced ${formatPct(retrace)} from mark ${highWaterMark} ` +
              `(limit ${formatPct(limits.trailingStopPct)})`
          ),
          input
        );
      }
    }

    if (limits.stopLossPct > 0 && unrealizedReturn <= -limits.stopLossPct) {
      return this.logExit(
        decide(
          'STOP_LOSS',
          `Stop loss: return ${formatPct(unrealizedReturn)} breached -${formatPct(limits.stopLossPct)}`
        ),
        input
      );
    }

    const heldMs = now - entryTime;
    if (limits.maxHoldingDurationMs > 0 && heldMs >= limits.maxHoldingDurationMs && unrealizedReturn <= 0) {
      return this.logExit(
        decide(
          'TIME_STOP',
          `Time stop: held ${heldMs}ms (limit ${limits.maxHoldingDurationMs}ms) ` +
            `with return ${formatPct(unrealizedReturn)}`
        ),
        input
      );
    }

    return decide(null, `Hold: return ${formatPct(unrealizedReturn)}`);
  }

  // ---------------------------------------------------------------------------
  // Public API: Position State
  // ---------------------------------------------------------------------------

  /**
   * Fresh position state for a just-filled order.
   */
  registerEntry(
    symbol: string,
    side: PositionSide,
    entryPrice: number,
    quantity: number,
    entryTime: number
  ): PositionState {
    this.requirePositivePrice(entryPrice, 'entryPrice');
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new InvalidInputError(
        `quantity must be a non-negative finite number, got ${quantity}`,
        COMPONENT,
        'quantity'
      );
    }

    this.logger.info('Position registered', { symbol, side, entryPrice, quantity });

    return {
      symbol,
      side,
      entryPrice,
      quantity,
      entryTime,
      highWaterMark: entryPrice,
      currentPrice: entryPrice,
    };
  }

  /**
   * Copy of `position` marked at `price`, with the monotone high-water mark.
   */
  updateHighWaterMark(position: PositionState, price: number): PositionState {
    this.requirePositivePrice(price, 'currentPrice');
    return {
      ...position,
      currentPrice: price,
      highWaterMark: this.nextHighWaterMark(position.highWaterMark, price, position.side),
    };
  }

  /**
   * Price at which the trailing stop fires for a given mark, or null when the
   * trailing stop is disabled.
   */
  trailingStopPrice(highWaterMark: number, side: PositionSide, limits: RiskLimits): number | null {
    if (limits.trailingStopPct <= 0) return null;
    return side === 'LONG'
      ? highWaterMark * (1 - limits.trailingStopPct)
      : highWaterMark * (1 + limits.trailingStopPct);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private nextHighWaterMark(previous: number, price: number, side: PositionSide): number {
    return side === 'LONG' ? Math.max(previous, price) : Math.min(previous, price);
  }

  private unrealizedReturn(entryPrice: number, currentPrice: number, side: PositionSide): number {
    return side === 'LONG'
      ? (currentPrice - entryPrice) / entryPrice
      : (entryPrice - currentPrice) / entryPrice;
  }

  private retraceFromMark(highWaterMark: number, currentPrice: number, side: PositionSide): number {
    return side === 'LONG'
      ? (highWaterMark - currentPrice) / highWaterMark
      : (currentPrice - highWaterMark) / highWaterMark;
  }

  private logExit(decision: ExitDecision, input: StopLossInput): ExitDecision {
    this.logger.info('Exit triggered', {
      reason: decision.reason,
      side: input.side,
      entryPrice: input.entryPrice,
      currentPrice: input.currentPrice,
      highWaterMark: decision.highWaterMark,
      unrealizedReturn: decision.unrealizedReturn,
    });
    return decision;
  }

  private validateInput(input: StopLossInput): void {
    this.requirePositivePrice(input.entryPrice, 'entryPrice');
    this.requirePositivePrice(input.currentPrice, 'currentPrice');
    if (input.highWaterMark !== undefined) {
      this.requirePositivePrice(input.highWaterMark, 'highWaterMark');
    }
    if (!Number.isFinite(input.entryTime) || !Number.isFinite(input.now)) {
      throw new InvalidInputError('entryTime and now must be finite timestamps', COMPONENT, 'now');
    }
    if (input.now < input.entryTime) {
      throw new InvalidInputError(
        `now (${input.now}) is before entryTime (${input.entryTime})`,
        COMPONENT,
        'now'
      );
    }
  }

  private requirePositivePrice(value: number, field: string): void {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidInputError(`${field} must be a positive finite number, got ${value}`, COMPONENT, field);
    }
  }
}

// =============================================================================
// Singleton Factory
// =============================================================================

let managerInstance: StopLossManager | null = null;

export function getStopLossManager(): StopLossManager {
  if (!managerInstance) {
    managerInstance = new StopLossManager();
  }
  return managerInstance;
}

export function resetStopLossManager(): void {
  managerInstance = null;
}
