import { createGameConfig, defaultGameConfig, validateGameConfig } from './config';
import { createInitialGameState } from './engine';
import { ConfigError } from './errors';

describe('createGameConfig', () => {
  test('defaults pass validation', () => {
    expect(validateGameConfig(defaultGameConfig)).toBe(defaultGameConfig);
    expect(createGameConfig()).toEqual(defaultGameConfig);
  });

  test('overrides merge onto defaults without touching them', () => {
    const config = createGameConfig({ pearlBase: 40, arena: { width: 800, height: 600 } });
    expect(config.pearlBase).toBe(40);
    expect(config.enemyBase).toBe(75);
    expect(config.arena).toEqual({ width: 800, height: 600 });
    expect(defaultGameConfig.pearlBase).toBe(25);
    expect(defaultGameConfig.arena).toEqual({ width: 1000, height: 700 });
  });

  test.each([
    ['pearlBase', { pearlBase: 0 }],
    ['enemyBase', { enemyBase: -5 }],
    ['playerSpeed', { playerSpeed: Number.NaN }],
    ['powerUpDurationSeconds', { powerUpDurationSeconds: 0 }],
    ['pearlStep', { pearlStep: -1 }],
  ] as const)('rejects a bad %s', (key, overrides) => {
    const attempt = () => createGameConfig(overrides);
    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow(`Invalid game config "${key}"`);
  });

  test('rejects a threshold table that does not increase', () => {
    expect(() => createGameConfig({ levelThresholds: [50, 40] })).toThrow(
      'Invalid game config "levelThresholds": level 2 (40) does not exceed level 1 (50)',
    );
  });

  test('rejects a threshold table whose increments shrink', () => {
    expect(() => createGameConfig({ levelThresholds: [50, 100, 120] })).toThrow(
      'Invalid game config "levelThresholds": increment into level 3 (20) does not exceed the previous one (50)',
    );
  });

  test('rejects a threshold table with equal increments', () => {
    expect(() => createGameConfig({ levelThresholds: [50, 100, 150] })).toThrow(
      'Invalid game config "levelThresholds": increment into level 3 (50) does not exceed the previous one (50)',
    );
  });

  test('rejects a tail step that does not exceed the last table increment', () => {
    expect(() => createGameConfig({ levelThresholds: [10, 20, 40], thresholdTailStep: 10 })).toThrow(
      'Invalid game config "thresholdTailStep": must exceed the last table increment (20)',
    );
    expect(() => createGameConfig({ levelThresholds: [10, 20, 40], thresholdTailStep: 20 })).toThrow(
      'Invalid game config "thresholdTailStep": must exceed the last table increment (20)',
    );
  });

  test('rejects a tail that would stop growing', () => {
    expect(() => createGameConfig({ thresholdTailGrowth: 0 })).toThrow(
      'Invalid game config "thresholdTailGrowth": must be a positive integer',
    );
    expect(() => createGameConfig({ thresholdTailGrowth: -100 })).toThrow(ConfigError);
    expect(() => createGameConfig({ thresholdTailGrowth: 2.5 })).toThrow(ConfigError);
  });

  test('rejects an empty threshold table and a degenerate arena', () => {
    expect(() => createGameConfig({ levelThresholds: [] })).toThrow(ConfigError);
    expect(() => createGameConfig({ arena: { width: 0, height: 700 } })).toThrow('Invalid game config "arena"');
  });

  test('error carries the offending key', () => {
    try {
      createGameConfig({ speedBoostMultiplier: 0.5 });
      throw new Error('expected a ConfigError');
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      expect(err.key).toBe('speedBoostMultiplier');
    }
  });

  test('game creation fails fast on an invalid config', () => {
    expect(() => createInitialGameState({ ...defaultGameConfig, enemyBase: 0 }, 1)).toThrow(ConfigError);
  });
});
