import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadEngineConfig, parseEngineConfig, parseSymbolConfig } from '@/lib/engine/config';
import { ConfigError } from '@/lib/errors';

function configIssues(fn: () => unknown): string[] {
  try {
    fn();
    return [];
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
}

describe('engine configuration', () => {
  it('fills strategy defaults', () => {
    const config = parseSymbolConfig({ symbol: 'BTCUSDT' });

    expect(config).toMatchObject({
      executionMode: 'B',
      freshAllocationPct: 0.4,
      freshLeverage: 20,
      breakerAllocationPct: 0.3,
      breakerLeverage: 10,
      penetrationRatio: 0.2,
      mitigationSource: 'body',
      zoneSource: 'wick',
      originCandle: 'last_opposite',
    });
  });

  it('requires the invalidation threshold to exceed the entry penetration', () => {
    const issues = configIssues(() =>
      parseSymbolConfig({ symbol: 'BTCUSDT', penetrationRatio: 0.5, modeBInvalidationPenetration: 0.4 }),
    );

    expect(issues).toEqual(['modeBInvalidationPenetration: modeBInvalidationPenetration must exceed penetrationRatio']);
  });

  it('rejects an unknown execution mode', () => {
    expect(() => parseSymbolConfig({ symbol: 'BTCUSDT', executionMode: 'C' })).toThrow(ConfigError);
  });

  it('rejects duplicate symbols', () => {
    const issues = configIssues(() =>
      parseEngineConfig({ symbols: [{ symbol: 'BTCUSDT' }, { symbol: 'BTCUSDT' }] }),
    );

    expect(issues).toEqual(['symbols: duplicate symbol BTCUSDT']);
  });

  it('needs at least one symbol', () => {
    expect(() => parseEngineConfig({ symbols: [] })).toThrow(ConfigError);
  });

  it('loads the bundled example config', () => {
    const config = loadEngineConfig(path.join(process.cwd(), 'config', 'engine.json'));

    expect(config.symbols.map((s) => [s.symbol, s.executionMode])).toEqual([
      ['BTCUSDT', 'B'],
      ['ETHUSDT', 'A'],
    ]);
    expect(config.paper).toBe(true);
  });

  it('wraps unreadable files in ConfigError', () => {
    expect(() => loadEngineConfig(path.join(process.cwd(), 'config', 'missing.json'))).toThrow(ConfigError);
  });
});
