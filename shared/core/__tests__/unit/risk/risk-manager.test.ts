/**
 * RiskManager Tests
 *
 * Check ordering and short-circuiting of the pre-trade gate, exit evaluation
 * with state threading, the risk summary and the singleton.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createRiskLimits, resetRiskLimits } from '@riskengine/config';
import { InvalidInputError } from '@riskengine/types';
import type { AccountSnapshot, PortfolioSnapshot, PositionState } from '@riskengine/types';

import { RiskManager, getRiskManager, resetRiskManager } from '../../../src/risk/risk-manager';
import { RecordingLogger } from '../../../src/logging';
import type { TradeProposal } from '../../../src/risk/types';

const NOW = 1_700_000_000_000;
const HOUR_MS = 60 * 60 * 1000;

function account(overrides: Partial<AccountSnapshot> = {}): AccountSnapshot {
  return {
    equity: 100000,
    cash: 100000,
    timestamp: NOW,
    startOfDayEquity: 100000,
    peakEquity: 100000,
    realizedPnlToday: 0,
    unrealizedPnlToday: 0,
    drawdownHaltedAt: null,
    ...overrides,
  };
}

const EMPTY: PortfolioSnapshot = { positions: [], returns: {}, benchmarkReturns: [] };

function trade(symbol: string, quantity = 11, price = 175): TradeProposal {
  return { symbol, side: 'LONG', quantity, price };
}

describe('RiskManager', () => {
  let logger: RecordingLogger;
  let manager: RiskManager;
  const limits = createRiskLimits({ correlationLookback: 5, betaLookback: 5, varLookback: 5 });

  beforeEach(() => {
    logger = new RecordingLogger();
    manager = new RiskManager({ limits, logger });
  });

  // ===========================================================================
  // Sizing
  // ===========================================================================

  describe('calculatePositionSize', () => {
    it('should use fixed fraction by default', () => {
      expect(manager.calculatePositionSize('AAPL', 175, account()).quantity).toBe(11);
    });

    it('should use the configured default request', () => {
      const kellyManager = new RiskManager({
        limits: createRiskLimits({ maxPositionSize: 0.25 }),
        defaultSizing: { mode: 'KELLY', winRate: 0.55, avgWin: 150, avgLoss: 100 },
        logger,
      });

      expect(kellyManager.calculatePositionSize('AAPL', 175, account()).quantity).toBe(71);
    });

    it('should accept a per-call request', () => {
      const result = manager.calculatePositionSize('MSFT', 100, account(), {
        mode: 'VOLATILITY_ADJUSTED',
        volatility: 4,
      });
      expect(result.quantity).toBe(10);
    });
  });

  // ===========================================================================
  // Pre-Trade Gate
  // ===========================================================================

  describe('canOpenPosition', () => {
    it('should approve a sized trade into an empty portfolio', () => {
      expect(manager.canOpenPosition(trade('AAPL'), account(), EMPTY)).toEqual({
        allowed: true,
        reason: 'APPROVED',
        message: 'All risk checks passed',
      });
    });

    it('should block every symbol at a -6% daily loss', () => {
      const losing = account({ equity: 94000, realizedPnlToday: -4000, unrealizedPnlToday: -2000 });

      for (const symbol of ['AAPL', 'MSFT', 'GOOG', 'TSLA']) {
        const decision = manager.canOpenPosition(trade(symbol, 1, 10), losing, EMPTY);

        expect(decision.allowed).toBe(false);
        expect(decision.reason).toBe('DAILY_LOSS_LIMIT');
        expect(decision.message).toBe('Daily loss limit breached: daily P&L -6.00% <= -5.00%');
      }
    });

    it('should check drawdown before daily loss', () => {
      const halted = account({
        realizedPnlToday: -6000,
        drawdownHaltedAt: NOW - HOUR_MS,
      });

      const decision = manager.canOpenPosition(trade('AAPL'), halted, EMPTY);

      expect(decision.reason).toBe('DRAWDOWN_HALT');
      expect(decision.message).toBe(`Drawdown halt active since ${NOW - HOUR_MS}; manual reset required`);
    });

    it('should halt on a drawdown beyond the limit without a latch', () => {
      const decision = manager.canOpenPosition(trade('AAPL'), account({ equity: 80000, peakEquity: 100000 }), EMPTY);

      expect(decision.reason).toBe('DRAWDOWN_HALT');
      expect(decision.message).toBe('Drawdown limit breached: drawdown 20.00% >= 15.00%');
    });

    it('should check exposure before position size', () => {
      const portfolio: PortfolioSnapshot = {
        positions: [
          { symbol: 'SPY', side: 'LONG', entryPrice: 490, quantity: 100, entryTime: NOW, highWaterMark: 490 },
        ],
        returns: {},
        benchmarkReturns: [],
      };

      // 49000 held + 3500 proposed is over 50% and the trade alone is over 2%
      const decision = manager.canOpenPosition(trade('AAPL', 20, 175), account(), portfolio);
      expect(decision.reason).toBe('EXPOSURE_LIMIT');
    });

    it('should block an oversized trade before checking correlation', () => {
      const decision = manager.canOpenPosition(trade('AAPL', 12, 175), account(), EMPTY);
      expect(decision.reason).toBe('POSITION_SIZE_LIMIT');
    });

    it('should block on undetermined correlation with holdings', () => {
      const portfolio: PortfolioSnapshot = {
        positions: [
          { symbol: 'MSFT', side: 'LONG', entryPrice: 400, quantity: 10, entryTime: NOW, highWaterMark: 400 },
        ],
        returns: { MSFT: [0.01, -0.01, 0.02, 0.0, 0.01] },
        benchmarkReturns: [],
      };

      const decision = manager.canOpenPosition(trade('AAPL'), account(), portfolio);
      expect(decision.reason).toBe('CORRELATION_UNDETERMINED');
    });

    it('should log rejections at warn', () => {
      manager.canOpenPosition(trade('AAPL', 12, 175), account(), EMPTY);
      expect(logger.hasLogWithMeta('warn', { symbol: 'AAPL', reason: 'POSITION_SIZE_LIMIT' })).toBe(true);
    });

    it('should honour per-call limits', () => {
      const strict = createRiskLimits({ dailyLossLimit: 0.01 });
      const decision = manager.canOpenPosition(trade('AAPL'), account({ realizedPnlToday: -2000 }), EMPTY, strict);
      expect(decision.reason).toBe('DAILY_LOSS_LIMIT');
    });

    it('should fail fast instead of approving on non-finite account or position fields', () => {
      expect(() => manager.canOpenPosition(trade('AAPL'), account({ realizedPnlToday: Number.NaN }), EMPTY)).toThrow(
        InvalidInputError
      );
      expect(() =>
        manager.canOpenPosition(trade('AAPL'), account({ peakEquity: Number.NaN, equity: 50000 }), EMPTY)
      ).toThrow(InvalidInputError);

      const portfolio: PortfolioSnapshot = {
        positions: [
          { symbol: 'SPY', side: 'LONG', entryPrice: 490, quantity: Number.NaN, entryTime: NOW, highWaterMark: 490 },
        ],
        returns: {},
        benchmarkReturns: [],
      };
      expect(() => manager.canOpenPosition(trade('AAPL'), account(), portfolio)).toThrow(
        'SPY quantity must be a finite number, got NaN'
      );
    });

    it('should block a hedge whose correlation magnitude exceeds the limit', () => {
      const spy = [0.01, -0.02, 0.015, 0.005, -0.01];
      const portfolio: PortfolioSnapshot = {
        positions: [
          { symbol: 'SPY', side: 'LONG', entryPrice: 490, quantity: 10, entryTime: NOW, highWaterMark: 490 },
        ],
        returns: { SPY: spy, SH: spy.map((r) => -r) },
        benchmarkReturns: [],
      };

      expect(manager.canOpenPosition(trade('SH', 10, 40), account(), portfolio).reason).toBe('CORRELATION_LIMIT');
    });

    it('should give the same decision for the same inputs', () => {
      const losing = account({ realizedPnlToday: -6000 });
      expect(manager.canOpenPosition(trade('AAPL'), losing, EMPTY)).toEqual(
        manager.canOpenPosition(trade('AAPL'), losing, EMPTY)
      );
    });
  });

  // ===========================================================================
  // In-Trade Monitoring
  // ===========================================================================

  describe('shouldExitPosition', () => {
    const entry: PositionState = {
      symbol: 'AAPL',
      side: 'LONG',
      entryPrice: 175,
      quantity: 11,
      entryTime: NOW,
      highWaterMark: 175,
    };

    it('should hold at 172 and stop out at 170', () => {
      const hold = manager.shouldExitPosition(entry, 172, NOW + HOUR_MS);
      expect(hold.decision.exit).toBe(false);

      const stop = manager.shouldExitPosition(hold.position, 170, NOW + 2 * HOUR_MS);
      expect(stop.decision.exit).toBe(true);
      expect(stop.decision.reason).toBe('STOP_LOSS');
    });

    it('should return an updated copy and leave the input untouched', () => {
      const result = manager.shouldExitPosition(entry, 180, NOW + HOUR_MS);

      expect(result.position).toEqual({ ...entry, currentPrice: 180, highWaterMark: 180 });
      expect(entry.highWaterMark).toBe(175);
      expect(entry.currentPrice).toBeUndefined();
    });

    it('should fire the trailing stop from the threaded mark', () => {
      // Up to 183, then back to 177: 3.3% off the mark while still up on entry
      const up = manager.shouldExitPosition(entry, 183, NOW + HOUR_MS);
      expect(up.decision.exit).toBe(false);

      const down = manager.shouldExitPosition(up.position, 177, NOW + 2 * HOUR_MS);
      expect(down.decision.reason).toBe('TRAILING_STOP');
    });
  });

  // ===========================================================================
  // Breaker State & Summary
  // ===========================================================================

  describe('breaker state', () => {
    it('should latch and reset a drawdown halt', () => {
      const latched = manager.updateDrawdownState(account({ equity: 84000 }), limits);
      expect(latched.drawdownHaltedAt).toBe(NOW);

      const recovered = { ...latched, equity: 99000 };
      expect(manager.canOpenPosition(trade('AAPL', 1, 10), recovered, EMPTY).reason).toBe('DRAWDOWN_HALT');

      const reset = manager.resetDrawdownHalt(recovered);
      expect(manager.canOpenPosition(trade('AAPL', 1, 10), reset, EMPTY).allowed).toBe(true);
    });
  });

  describe('getRiskSummary', () => {
    it('should report P&L, drawdown, exposure, VaR, beta and limits', () => {
      const portfolio: PortfolioSnapshot = {
        positions: [
          { symbol: 'AAPL', side: 'LONG', entryPrice: 175, quantity: 100, entryTime: NOW, highWaterMark: 180, currentPrice: 180 },
        ],
        returns: { AAPL: [0.01, -0.02, 0.03, 0.0, -0.01] },
        benchmarkReturns: [0.01, -0.02, 0.03, 0.0, -0.01],
      };

      const summary = manager.getRiskSummary(
        account({ equity: 97000, peakEquity: 100000, realizedPnlToday: -1000, unrealizedPnlToday: -2000 }),
        portfolio
      );

      expect(summary.equity).toBe(97000);
      expect(summary.dailyPnl).toBe(-3000);
      expect(summary.dailyPnlPct).toBeCloseTo(-0.03, 10);
      expect(summary.drawdown).toBeCloseTo(0.03, 10);
      expect(summary.exposure).toBeCloseTo(18000 / 97000, 10);
      expect(summary.limits).toEqual({ dailyLossLimit: 0.05, maxDrawdownLimit: 0.15, maxPortfolioExposure: 0.5 });
      expect(summary.canTrade).toBe(true);

      // Single long holding: beta is its weight, VaR is weight * worst return * equity
      const weight = 18000 / 97000;
      expect(summary.beta.kind === 'determined' && summary.beta.value).toBeCloseTo(weight, 10);
      expect(summary.valueAtRisk.kind === 'determined' && summary.valueAtRisk.value).toBeCloseTo(
        weight * 0.02 * 97000,
        6
      );
    });

    it('should report canTrade false when a breaker is tripped', () => {
      const summary = manager.getRiskSummary(account({ realizedPnlToday: -6000 }), EMPTY);

      expect(summary.canTrade).toBe(false);
      expect(summary.valueAtRisk).toEqual({ kind: 'determined', value: 0 });
      expect(summary.beta.kind).toBe('undetermined');
    });
  });

  // ===========================================================================
  // Singleton
  // ===========================================================================

  describe('singleton', () => {
    beforeEach(() => {
      resetRiskLimits();
      resetRiskManager();
    });

    afterEach(() => {
      resetRiskManager();
      resetRiskLimits();
    });

    it('should return the same instance until reset', () => {
      const first = getRiskManager();
      expect(getRiskManager()).toBe(first);

      resetRiskManager();
      expect(getRiskManager()).not.toBe(first);
    });

    it('should bind the limits loaded from the environment', () => {
      const original = process.env.MAX_POSITION_SIZE;
      process.env.MAX_POSITION_SIZE = '0.04';
      try {
        expect(getRiskManager().getLimits().maxPositionSize).toBe(0.04);
      } finally {
        if (original === undefined) {
          delete process.env.MAX_POSITION_SIZE;
        } else {
          process.env.MAX_POSITION_SIZE = original;
        }
      }
    });
  });
});
