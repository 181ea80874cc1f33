// Shared types for the trade risk engine

export * from './risk';

// =============================================================================
// Error Classes
// =============================================================================
//
// Taxonomy:
// - InvalidInputError: malformed input; fails fast, retrying with the same input is pointless
// - RiskConfigError: limits failed validation at load time
// - Insufficient data is NOT an error: it is the `Undetermined` estimate
// - A breached limit is NOT an error: it is a RiskDecision with allowed=false
// =============================================================================

/**
 * Base error class for risk engine errors.
 *
 * @example
 * ```typescript
 * throw new RiskEngineError(
 *   'Return series contains NaN',
 *   'INVALID_INPUT',
 *   'portfolio-risk'
 * );
 * ```
 */
export class RiskEngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public component: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'RiskEngineError';
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Input violates a component contract (non-positive price, negative quantity,
 * non-finite return...). Never retryable.
 */
export class InvalidInputError extends RiskEngineError {
  constructor(message: string, component: string, public field: string) {
    super(message, 'INVALID_INPUT', component, false);
    this.name = 'InvalidInputError';
  }
}

/**
 * Risk limits failed validation.
 */
export class RiskConfigError extends RiskEngineError {
  constructor(public readonly issues: string[]) {
    super(`Risk configuration validation failed:\n${issues.join('\n')}`, 'INVALID_CONFIG', 'config', false);
    this.name = 'RiskConfigError';
  }
}
