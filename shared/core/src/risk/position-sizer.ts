/**
 * Position Sizer
 *
 * Turns trade parameters and account equity into an integer quantity.
 *
 * Modes:
 * - FIXED_FRACTION: floor(equity * maxPositionSize / price)
 * - VOLATILITY_ADJUSTED: fixed fraction scaled by min(1, target / (ATR / price))
 * - KELLY: f* = p - q / b with b = avgWin / avgLoss, then fractional Kelly
 *   (kellyMultiplier) capped at kellyCap
 * - CONSERVATIVE: the smallest of every mode whose inputs are supplied
 *
 * Every mode is clamped to the hard ceiling floor(equity * maxPositionSize / price).
 */

import { InvalidInputError } from '@riskengine/types';
import type {
  KellyInputs,
  PositionSize,
  RiskLimits,
  SizingMode,
  SizingRequest,
} from '@riskengine/types';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';

const COMPONENT = 'position-sizer';

/**
 * Raw Kelly fractions at or below this are treated as no edge.
 * 0.55 - 0.45 / (150 / 100) lands a few ulps either side of 0.25, and a
 * break-even setup such as 0.5 - 0.5 / 1 can come out as 1e-17.
 */
const KELLY_EDGE_EPSILON = 1e-12;

export interface PositionSizerDeps {
  logger?: ILogger;
}

/**
 * One mode's answer before the hard ceiling.
 */
interface Candidate {
  mode: SizingMode;
  fraction: number;
  quantity: number;
  kellyFraction?: number;
  adjustedKelly?: number;
  reason?: string;
}

// =============================================================================
// PositionSizer Implementation
// =============================================================================

/**
 * Stateless: limits arrive with every call, so one instance can serve any
 * number of accounts.
 */
export class PositionSizer {
  private readonly logger: ILogger;

  constructor(deps: PositionSizerDeps = {}) {
    this.logger = deps.logger ?? getLogger(COMPONENT);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Recommended quantity only.
   */
  size(
    symbol: string,
    price: number,
    equity: number,
    limits: RiskLimits,
    request: SizingRequest = { mode: 'FIXED_FRACTION' }
  ): number {
    return this.calculateSize(symbol, price, equity, limits, request).quantity;
  }

  /**
   * Full sizing breakdown.
   *
   * @throws InvalidInputError for a non-positive price, negative equity or
   *   out-of-range mode parameters
   */
  calculateSize(
    symbol: string,
    price: number,
    equity: number,
    limits: RiskLimits,
    request: SizingRequest = { mode: 'FIXED_FRACTION' }
  ): PositionSize {
    this.validateAccount(price, equity);

    const ceilingQuantity = this.quantityFor(equity, limits.maxPositionSize, price);
    const candidate = this.evaluateMode(price, equity, limits, request);

    const capped = candidate.quantity > ceilingQuantity;
    const quantity = capped ? ceilingQuantity : candidate.quantity;

    const result: PositionSize = {
      symbol,
      mode: request.mode,
      quantity,
      requestedFraction: candidate.fraction,
      ceilingQuantity,
      capped,
    };
    if (candidate.kellyFraction !== undefined) {
      result.kellyFraction = candidate.kellyFraction;
    }
    if (candidate.adjustedKelly !== undefined) {
      result.adjustedKelly = candidate.adjustedKelly;
    }
    if (quantity === 0) {
      result.reason = candidate.reason ?? 'Position size rounds down to zero shares';
    }

    this.logger.debug('Position size calculated', {
      symbol,
      mode: request.mode,
      price,
      equity,
      requestedFraction: candidate.fraction,
      quantity,
      ceilingQuantity,
      capped,
    });

    return result;
  }

  // ---------------------------------------------------------------------------
  // Mode Dispatch
  // ---------------------------------------------------------------------------

  private evaluateMode(
    price: number,
    equity: number,
    limits: RiskLimits,
    request: SizingRequest
  ): Candidate {
    switch (request.mode) {
      case 'FIXED_FRACTION':
        return this.fixedFraction(price, equity, limits);

      case 'VOLATILITY_ADJUSTED':
        return this.volatilityAdjusted(price, equity, limits, request.volatility, request.targetVolatility);

      case 'KELLY':
        return this.kelly(price, equity, limits, request);

      case 'CONSERVATIVE': {
        const candidates: Candidate[] = [this.fixedFraction(price, equity, limits)];
        if (request.volatility !== undefined) {
          candidates.push(
            this.volatilityAdjusted(price, equity, limits, request.volatility, request.targetVolatility)
          );
        }
        if (request.kelly !== undefined) {
          candidates.push(this.kelly(price, equity, limits, request.kelly));
        }
        return this.smallest(candidates);
      }
    }
  }

  private fixedFraction(price: number, equity: number, limits: RiskLimits): Candidate {
    return {
      mode: 'FIXED_FRACTION',
      fraction: limits.maxPositionSize,
      quantity: this.quantityFor(equity, limits.maxPositionSize, price),
    };
  }

  private volatilityAdjusted(
    price: number,
    equity: number,
    limits: RiskLimits,
    volatility: number,
    targetVolatility: number | undefined
  ): Candidate {
    if (!Number.isFinite(volatility) || volatility < 0) {
      throw new InvalidInputError(
        `volatility must be a non-negative finite number, got ${volatility}`,
        COMPONENT,
        'volatility'
      );
    }

    const target = targetVolatility ?? limits.volatilityTarget;
    if (!Number.isFinite(target) || target <= 0) {
      throw new InvalidInputError(
        `targetVolatility must be a positive finite number, got ${target}`,
        COMPONENT,
        'targetVolatility'
      );
    }

    // No measurable volatility: nothing to scale by
    if (volatility === 0) {
      this.logger.debug('Zero volatility, falling back to fixed fraction', { price });
      return { ...this.fixedFraction(price, equity, limits), mode: 'VOLATILITY_ADJUSTED' };
    }

    const relativeVolatility = volatility / price;
    const scale = Math.min(1, target / relativeVolatility);
    const fraction = limits.maxPositionSize * scale;

    return {
      mode: 'VOLATILITY_ADJUSTED',
      fraction,
      quantity: this.quantityFor(equity, fraction, price),
    };
  }

  private kelly(price: number, equity: number, limits: RiskLimits, inputs: KellyInputs): Candidate {
    this.validateKellyInputs(inputs);

    // f* = p - q / b
    const odds = inputs.avgWin / inputs.avgLoss;
    const kellyFraction = inputs.winRate - (1 - inputs.winRate) / odds;

    if (kellyFraction <= KELLY_EDGE_EPSILON) {
      this.logger.debug('No Kelly edge, sizing to zero', {
        winRate: inputs.winRate,
        odds,
        kellyFraction,
      });
      return {
        mode: 'KELLY',
        fraction: 0,
        quantity: 0,
        kellyFraction,
        adjustedKelly: 0,
        reason: `No edge: Kelly fraction ${kellyFraction.toFixed(4)} <= 0`,
      };
    }

    const adjustedKelly = Math.min(kellyFraction * limits.kellyMultiplier, limits.kellyCap);

    return {
      mode: 'KELLY',
      fraction: adjustedKelly,
      quantity: this.quantityFor(equity, adjustedKelly, price),
      kellyFraction,
      adjustedKelly,
    };
  }

  /**
   * Smallest quantity wins; Kelly details are kept whenever Kelly was evaluated.
   */
  private smallest(candidates: Candidate[]): Candidate {
    let best = candidates[0];
    for (const candidate of candidates) {
      if (candidate.quantity < best.quantity) {
        best = candidate;
      }
    }

    const kellyCandidate = candidates.find((c) => c.mode === 'KELLY');
    if (kellyCandidate && best !== kellyCandidate) {
      return {
        ...best,
        kellyFraction: kellyCandidate.kellyFraction,
        adjustedKelly: kellyCandidate.adjustedKelly,
      };
    }
    return best;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private quantityFor(equity: number, fraction: number, price: number): number {
    if (equity <= 0 || fraction <= 0) return 0;
    return Math.floor((equity * fraction) / price);
  }

  private validateAccount(price: number, equity: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidInputError(`price must be a positive finite number, got ${price}`, COMPONENT, 'price');
    }
    if (!Number.isFinite(equity) || equity < 0) {
      throw new InvalidInputError(`equity must be a non-negative finite number, got ${equity}`, COMPONENT, 'equity');
    }
  }

  private validateKellyInputs(inputs: KellyInputs): void {
    if (!Number.isFinite(inputs.winRate) || inputs.winRate < 0 || inputs.winRate > 1) {
      throw new InvalidInputError(`winRate must be in [0, 1], got ${inputs.winRate}`, COMPONENT, 'winRate');
    }
    if (!Number.isFinite(inputs.avgWin) || inputs.avgWin <= 0) {
      throw new InvalidInputError(`avgWin must be positive, got ${inputs.avgWin}`, COMPONENT, 'avgWin');
    }
    if (!Number.isFinite(inputs.avgLoss) || inputs.avgLoss <= 0) {
      throw new InvalidInputError(`avgLoss must be positive, got ${inputs.avgLoss}`, COMPONENT, 'avgLoss');
    }
  }
}

// =============================================================================
// Singleton Factory
// =============================================================================

let sizerInstance: PositionSizer | null = null;

/**
 * Get the shared PositionSizer instance.
 */
export function getPositionSizer(): PositionSizer {
  if (!sizerInstance) {
    sizerInstance = new PositionSizer();
  }
  return sizerInstance;
}

export function resetPositionSizer(): void {
  sizerInstance = null;
}
