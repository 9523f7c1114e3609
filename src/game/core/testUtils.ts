import { createGameConfig } from './config';
import { createInitialGameState, idleInput } from './engine';
import type { Crab, GameConfig, GameState, InputState, Jellyfish, Pearl, PowerUp, PowerUpKind, Shark, Vec2 } from './types';

// No random power-ups, so a test only sees the entities it placed.
export const quietConfig = (overrides: Partial<GameConfig> = {}) =>
  createGameConfig({ powerUpSpawnPerSecond: 0, ...overrides });

// Thresholds nobody reaches in a test; only clearing enemies advances.
export const unreachableScoreConfig = (overrides: Partial<GameConfig> = {}) =>
  quietConfig({ levelThresholds: [100000, 200000], thresholdTailStep: 150000, ...overrides });

export const PLAYER_START: Vec2 = { x: 500, y: 350 };

export const crab = (id: number, pos: Vec2, overrides: Partial<Crab> = {}): Crab => ({
  id,
  variant: 'crab',
  pos: { ...pos },
  size: 25,
  points: 80,
  spawnLevel: 1,
  removed: false,
  minX: pos.x,
  maxX: pos.x,
  direction: 1,
  speed: 120,
  ...overrides,
});

export const jellyfish = (id: number, base: Vec2, overrides: Partial<Jellyfish> = {}): Jellyfish => ({
  id,
  variant: 'jellyfish',
  pos: { x: base.x + 40, y: base.y },
  size: 25,
  points: 80,
  spawnLevel: 1,
  removed: false,
  base: { ...base },
  phase: 0,
  angularSpeed: 3,
  amplitude: { x: 40, y: 10 },
  ...overrides,
});

export const shark = (id: number, pos: Vec2, overrides: Partial<Shark> = {}): Shark => ({
  id,
  variant: 'shark',
  pos: { ...pos },
  size: 35,
  points: 80,
  spawnLevel: 1,
  removed: false,
  vel: { x: 0, y: 0 },
  maxSpeed: 180,
  ...overrides,
});

export const pearl = (id: number, pos: Vec2, points = 27): Pearl => ({
  id,
  pos: { ...pos },
  size: 15,
  points,
  spawnLevel: 1,
  removed: false,
});

export const powerUp = (id: number, pos: Vec2, kind: PowerUpKind, duration = 5): PowerUp => ({
  id,
  pos: { ...pos },
  size: 20,
  kind,
  duration,
  removed: false,
});

// A crab pinned in the far corner keeps the level from counting as cleared.
export const parkedCrab = (id = 900) => crab(id, { x: 900, y: 620 });

export const blankState = (config: GameConfig = quietConfig(), seed = 1): GameState => ({
  ...createInitialGameState(config, seed),
  enemies: [parkedCrab()],
  pearls: [],
  powerUps: [],
  nextEntityId: 1000,
});

export const input = (partial: Partial<InputState> = {}): InputState => ({ ...idleInput, ...partial });
