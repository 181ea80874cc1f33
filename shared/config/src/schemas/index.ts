/**
 * Zod Schema Validation for Risk Limits
 *
 * Runtime validation for the limits object. Limits are validated once when
 * they are loaded or built; the decision components trust them afterwards.
 */

import { z } from 'zod';
import { RiskConfigError } from '@riskengine/types';
import type { RiskLimits } from '@riskengine/types';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Fraction as decimal (0-1).
 */
export const FractionSchema = z
  .number()
  .finite()
  .min(0, 'Fraction cannot be negative')
  .max(1, 'Fraction cannot exceed 1 (100%)');

/**
 * Fraction that must be strictly positive (0-1].
 */
export const PositiveFractionSchema = FractionSchema.refine(
  (value) => value > 0,
  'Fraction must be greater than 0'
);

/**
 * Positive integer.
 */
export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

// =============================================================================
// Risk Limits
// =============================================================================

/**
 * Risk limits schema.
 * @see shared/types/src/risk.ts - RiskLimits interface
 */
export const RiskLimitsSchema = z
  .object({
    maxPositionSize: FractionSchema.describe('Max single-trade notional as fraction of equity'),
    maxPortfolioExposure: z
      .number()
      .finite()
      .min(0, 'Exposure cannot be negative')
      .describe('Max gross exposure as fraction of equity (may exceed 1 with leverage)'),
    maxPositionWeight: FractionSchema.describe('Max weight of one symbol'),
    maxCorrelation: z.number().min(0, 'Correlation limit cannot be negative').max(1).describe('Max pairwise |correlation|'),
    dailyLossLimit: PositiveFractionSchema.describe('Daily loss that blocks opens'),
    maxDrawdownLimit: PositiveFractionSchema.describe('Drawdown that halts trading'),
    stopLossPct: FractionSchema,
    trailingStopPct: FractionSchema,
    takeProfitPct: z.number().finite().min(0, 'Take-profit cannot be negative'),
    maxHoldingDurationMs: z.number().int().min(0, 'Holding duration cannot be negative'),
    varConfidence: z
      .number()
      .gt(0, 'VaR confidence must be greater than 0')
      .lt(1, 'VaR confidence must be less than 1'),
    kellyMultiplier: PositiveFractionSchema.describe('Fractional Kelly multiplier, (0, 1]'),
    kellyCap: FractionSchema.describe('Cap on the adjusted Kelly fraction'),
    correlationLookback: PositiveIntSchema.min(2, 'Correlation needs at least 2 observations'),
    betaLookback: PositiveIntSchema.min(2, 'Beta needs at least 2 observations'),
    varLookback: PositiveIntSchema,
    volatilityTarget: z.number().finite().positive('Volatility target must be positive'),
  })
  .strict()
  .superRefine((limits, ctx) => {
    if (limits.maxPositionSize > limits.maxPortfolioExposure) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxPositionSize'],
        message: `maxPositionSize (${limits.maxPositionSize}) cannot exceed maxPortfolioExposure (${limits.maxPortfolioExposure})`,
      });
    }
    if (limits.maxPositionWeight > limits.maxPortfolioExposure) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxPositionWeight'],
        message: `maxPositionWeight (${limits.maxPositionWeight}) cannot exceed maxPortfolioExposure (${limits.maxPortfolioExposure})`,
      });
    }
  });

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validation result with detailed errors.
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Validate data and return detailed results without throwing.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate risk limits and throw RiskConfigError listing every issue.
 * Use at load time, not per decision.
 */
export function validateRiskLimits(data: unknown): RiskLimits {
  const result = validateWithDetails(RiskLimitsSchema, data);

  if (result.success && result.data) {
    return result.data;
  }

  throw new RiskConfigError(
    (result.errors ?? []).map((e) => `${e.path || '(root)'}: ${e.message}`)
  );
}

export { z } from 'zod';
