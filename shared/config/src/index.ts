/**
 * Risk Engine Configuration
 *
 * Limits, environment loading and schema validation.
 */

export {
  DEFAULT_RISK_LIMITS,
  RISK_ENV_KEYS,
  loadRiskLimits,
  createRiskLimits,
  getRiskLimits,
  resetRiskLimits,
} from './risk-config';

export {
  FractionSchema,
  PositiveFractionSchema,
  PositiveIntSchema,
  RiskLimitsSchema,
  validateWithDetails,
  validateRiskLimits,
} from './schemas';
export type { ValidationResult } from './schemas';

export { safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';
