/**
 * Risk Limits Configuration
 *
 * Centralizes the limits used by every risk component:
 * - PositionSizer (sizing ceiling, Kelly multiplier/cap, volatility target)
 * - StopLossManager (stop-loss, trailing stop, take-profit, time stop)
 * - PortfolioRisk (exposure, weight, correlation, breakers, VaR/beta windows)
 *
 * Limits are loaded once at process start and treated as immutable. A reload
 * means calling resetRiskLimits() and rebuilding whatever holds the old object.
 * All thresholds are expressed as decimals (e.g., 0.05 = 5%).
 */

import type { RiskLimits } from '@riskengine/types';
import { validateRiskLimits } from './schemas';
import { safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';

const HOUR_MS = 60 * 60 * 1000;
// One year; longer holding windows are treated as misconfiguration
const MAX_HOLDING_HOURS = 24 * 365;

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_RISK_LIMITS: RiskLimits = Object.freeze({
  maxPositionSize: 0.02,
  maxPortfolioExposure: 0.5,
  maxPositionWeight: 0.1,
  maxCorrelation: 0.7,
  dailyLossLimit: 0.05,
  maxDrawdownLimit: 0.15,
  stopLossPct: 0.02,
  trailingStopPct: 0.03,
  takeProfitPct: 0.05,
  maxHoldingDurationMs: 24 * HOUR_MS,
  varConfidence: 0.95,
  kellyMultiplier: 0.5, // Half Kelly
  kellyCap: 0.2,
  correlationLookback: 30,
  betaLookback: 90,
  varLookback: 60,
  volatilityTarget: 0.02,
});

/**
 * Environment variables recognized by loadRiskLimits().
 */
export const RISK_ENV_KEYS = {
  maxPositionSize: 'MAX_POSITION_SIZE',
  maxPortfolioExposure: 'MAX_PORTFOLIO_EXPOSURE',
  maxPositionWeight: 'MAX_POSITION_WEIGHT',
  maxCorrelation: 'MAX_CORRELATION',
  dailyLossLimit: 'DAILY_LOSS_LIMIT',
  maxDrawdownLimit: 'MAX_DRAWDOWN_LIMIT',
  stopLossPct: 'STOP_LOSS_PERCENTAGE',
  trailingStopPct: 'TRAILING_STOP_PERCENTAGE',
  takeProfitPct: 'TAKE_PROFIT_PERCENTAGE',
  maxHoldingHours: 'MAX_HOLDING_HOURS',
  varConfidence: 'VAR_CONFIDENCE',
  kellyMultiplier: 'KELLY_FRACTION',
  kellyCap: 'KELLY_CAP',
  correlationLookback: 'CORRELATION_LOOKBACK',
  betaLookback: 'BETA_LOOKBACK',
  varLookback: 'VAR_LOOKBACK',
  volatilityTarget: 'VOLATILITY_TARGET',
} as const;

// =============================================================================
// LOADING
// =============================================================================

/**
 * Read limits from environment variables, falling back to defaults for
 * anything missing or malformed, then validate the result.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws RiskConfigError when the assembled limits are inconsistent
 */
export function loadRiskLimits(env: NodeJS.ProcessEnv = process.env): RiskLimits {
  const d = DEFAULT_RISK_LIMITS;
  const k = RISK_ENV_KEYS;
  const float = (key: string, fallback: number, min: number, max: number): number =>
    safeParseFloatBounded(env[key], fallback, min, max, key);
  const int = (key: string, fallback: number, min: number): number =>
    safeParseIntBounded(env[key], fallback, min, key);

  const limits: RiskLimits = {
    maxPositionSize: float(k.maxPositionSize, d.maxPositionSize, 0, 1),
    maxPortfolioExposure: float(k.maxPortfolioExposure, d.maxPortfolioExposure, 0, 10),
    maxPositionWeight: float(k.maxPositionWeight, d.maxPositionWeight, 0, 1),
    maxCorrelation: float(k.maxCorrelation, d.maxCorrelation, 0, 1),
    dailyLossLimit: float(k.dailyLossLimit, d.dailyLossLimit, 0.0001, 1),
    maxDrawdownLimit: float(k.maxDrawdownLimit, d.maxDrawdownLimit, 0.0001, 1),
    stopLossPct: float(k.stopLossPct, d.stopLossPct, 0, 1),
    trailingStopPct: float(k.trailingStopPct, d.trailingStopPct, 0, 1),
    takeProfitPct: float(k.takeProfitPct, d.takeProfitPct, 0, 100),
    maxHoldingDurationMs: Math.round(
      float(k.maxHoldingHours, d.maxHoldingDurationMs / HOUR_MS, 0, MAX_HOLDING_HOURS) * HOUR_MS
    ),
    varConfidence: float(k.varConfidence, d.varConfidence, 0.5, 0.9999),
    kellyMultiplier: float(k.kellyMultiplier, d.kellyMultiplier, 0.01, 1),
    kellyCap: float(k.kellyCap, d.kellyCap, 0, 1),
    correlationLookback: int(k.correlationLookback, d.correlationLookback, 2),
    betaLookback: int(k.betaLookback, d.betaLookback, 2),
    varLookback: int(k.varLookback, d.varLookback, 1),
    volatilityTarget: float(k.volatilityTarget, d.volatilityTarget, 0.0001, 10),
  };

  return Object.freeze(validateRiskLimits(limits));
}

/**
 * Build validated, frozen limits from defaults plus overrides.
 *
 * @throws RiskConfigError when the result is invalid
 */
export function createRiskLimits(overrides: Partial<RiskLimits> = {}): RiskLimits {
  return Object.freeze(validateRiskLimits({ ...DEFAULT_RISK_LIMITS, ...overrides }));
}

// =============================================================================
// Singleton
// =============================================================================

let cachedLimits: RiskLimits | null = null;

/**
 * Get the process-wide limits, loading them from the environment on first use.
 */
export function getRiskLimits(): RiskLimits {
  if (!cachedLimits) {
    cachedLimits = loadRiskLimits();
  }
  return cachedLimits;
}

/**
 * Drop the cached limits. The next getRiskLimits() call reloads them.
 */
export function resetRiskLimits(): void {
  cachedLimits = null;
}
