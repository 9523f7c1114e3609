import { ConfigError } from './errors';
import type { GameConfig } from './types';

// Score needed to leave levels 1..30. Past the table the increment keeps growing.
const LEVEL_THRESHOLDS = [
  50, 120, 280, 450, 700, 1000, 1400, 1900, 2500, 3200,
  4000, 4900, 5900, 7000, 8200, 9500, 11000, 12600, 14400, 16300,
  18400, 20700, 23200, 25900, 28800, 31900, 35200, 38700, 42400, 46300,
] as const;

export const defaultGameConfig: GameConfig = {
  arena: { width: 1000, height: 700 },
  referenceFps: 60,
  maxStepMs: 50,
  pearlBase: 25,
  pearlStep: 2,
  enemyBase: 75,
  enemyStep: 5,
  levelThresholds: LEVEL_THRESHOLDS,
  thresholdTailStep: 5000,
  thresholdTailGrowth: 100,
  milestoneLevels: [10, 20, 30, 40, 50],
  playerSpeed: 5,
  playerSize: 30,
  playerMaxHealth: 3,
  enemySize: 25,
  sharkSize: 35,
  jellyfishSpeed: 0.05,
  jellyfishAmplitude: 10,
  jellyfishSway: 40,
  crabSpeed: 2,
  crabPatrolHalfWidth: 120,
  sharkSpeed: 3,
  pearlSize: 15,
  pearlMinSpacing: 40,
  enemySpawnClearance: 120,
  powerUpSize: 20,
  powerUpDurationSeconds: 5,
  powerUpSpawnPerSecond: 0.2,
  maxActivePowerUps: 3,
  speedBoostMultiplier: 1.5,
  invulnerabilitySeconds: 2,
  bulletSize: 8,
  bulletSpeed: 8,
  shootCooldownSeconds: 0.25,
};

const POSITIVE_KEYS = [
  'referenceFps',
  'maxStepMs',
  'pearlBase',
  'enemyBase',
  'playerSpeed',
  'playerSize',
  'playerMaxHealth',
  'enemySize',
  'sharkSize',
  'jellyfishSpeed',
  'crabSpeed',
  'sharkSpeed',
  'pearlSize',
  'powerUpSize',
  'powerUpDurationSeconds',
  'bulletSize',
  'bulletSpeed',
] as const satisfies ReadonlyArray<keyof GameConfig>;

const NON_NEGATIVE_KEYS = [
  'pearlStep',
  'enemyStep',
  'jellyfishAmplitude',
  'jellyfishSway',
  'crabPatrolHalfWidth',
  'pearlMinSpacing',
  'enemySpawnClearance',
  'powerUpSpawnPerSecond',
  'maxActivePowerUps',
  'invulnerabilitySeconds',
  'shootCooldownSeconds',
] as const satisfies ReadonlyArray<keyof GameConfig>;

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const validateThresholds = (config: GameConfig) => {
  const table = config.levelThresholds;
  if (table.length === 0) throw new ConfigError('levelThresholds', 'needs at least one entry');
  if (!table.every((t) => Number.isSafeInteger(t) && t > 0)) {
    throw new ConfigError('levelThresholds', 'entries must be positive integers');
  }
  let lastStep = 0;
  for (let i = 1; i < table.length; i += 1) {
    const step = table[i] - table[i - 1];
    if (step <= 0) {
      throw new ConfigError('levelThresholds', `level ${i + 1} (${table[i]}) does not exceed level ${i} (${table[i - 1]})`);
    }
    if (step <= lastStep) {
      throw new ConfigError('levelThresholds', `increment into level ${i + 1} (${step}) does not exceed the previous one (${lastStep})`);
    }
    lastStep = step;
  }
  if (!Number.isSafeInteger(config.thresholdTailStep) || config.thresholdTailStep <= 0) {
    throw new ConfigError('thresholdTailStep', 'must be a positive integer');
  }
  if (config.thresholdTailStep <= lastStep) {
    throw new ConfigError('thresholdTailStep', `must exceed the last table increment (${lastStep})`);
  }
  if (!Number.isSafeInteger(config.thresholdTailGrowth) || config.thresholdTailGrowth <= 0) {
    throw new ConfigError('thresholdTailGrowth', 'must be a positive integer');
  }
};

export const validateGameConfig = (config: GameConfig): GameConfig => {
  for (const key of POSITIVE_KEYS) {
    const v = config[key];
    if (!isFiniteNumber(v) || v <= 0) throw new ConfigError(key, `expected a positive number, got ${String(v)}`);
  }
  for (const key of NON_NEGATIVE_KEYS) {
    const v = config[key];
    if (!isFiniteNumber(v) || v < 0) throw new ConfigError(key, `expected a non-negative number, got ${String(v)}`);
  }
  if (!isFiniteNumber(config.speedBoostMultiplier) || config.speedBoostMultiplier < 1) {
    throw new ConfigError('speedBoostMultiplier', 'must be at least 1');
  }
  const { width, height } = config.arena;
  if (!isFiniteNumber(width) || !isFiniteNumber(height) || width <= 0 || height <= 0) {
    throw new ConfigError('arena', `expected positive dimensions, got ${width}x${height}`);
  }
  if (!config.milestoneLevels.every((l) => Number.isInteger(l) && l >= 1)) {
    throw new ConfigError('milestoneLevels', 'entries must be integers >= 1');
  }
  validateThresholds(config);
  return config;
};

export const createGameConfig = (overrides: Partial<GameConfig> = {}): GameConfig => validateGameConfig({
  ...defaultGameConfig,
  ...overrides,
  arena: { ...defaultGameConfig.arena, ...(overrides.arena ?? {}) },
});
