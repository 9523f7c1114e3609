import type { GameConfig } from './types';

export class ConfigError extends Error {
  readonly key: keyof GameConfig;

  constructor(key: keyof GameConfig, message: string) {
    super(`Invalid game config "${key}": ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

export class LevelRangeError extends RangeError {
  readonly level: number;

  constructor(level: number, message = 'level must be an integer >= 1') {
    super(`Level ${level} is out of range: ${message}`);
    this.name = 'LevelRangeError';
    this.level = level;
  }
}
