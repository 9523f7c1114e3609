import { TAU, type Rng } from './math';
import { jellyfishPosition } from './movement';
import { enemyValue, pearlValue } from './scoring';
import type {
  Bullet,
  Crab,
  Enemy,
  EnemyVariant,
  Facing,
  GameConfig,
  GameState,
  Jellyfish,
  Pearl,
  PlayerState,
  PowerUp,
  PowerUpKind,
  Shark,
  Vec2,
} from './types';

// Config speeds are per frame at `referenceFps`; entities carry per-second values.
const perSecond = (perFrame: number, config: GameConfig) => perFrame * config.referenceFps;

export const takeEntityId = (state: GameState) => {
  const id = state.nextEntityId;
  state.nextEntityId += 1;
  return id;
};

export const createPlayer = (config: GameConfig): PlayerState => ({
  pos: { x: config.arena.width / 2, y: config.arena.height / 2 },
  size: config.playerSize,
  baseSpeed: perSecond(config.playerSpeed, config),
  health: config.playerMaxHealth,
  maxHealth: config.playerMaxHealth,
  direction: 1,
  powerUps: { speedBoost: 0, shield: 0 },
  invulnerableSeconds: 0,
  shootCooldownSeconds: 0,
  alive: true,
});

export const effectiveSpeed = (player: PlayerState, config: GameConfig) =>
  player.powerUps.speedBoost > 0 ? player.baseSpeed * config.speedBoostMultiplier : player.baseSpeed;

const createJellyfish = (id: number, pos: Vec2, level: number, config: GameConfig, rng: Rng): Jellyfish => {
  const phase = rng.between(0, TAU);
  const amplitude = { x: config.jellyfishSway, y: config.jellyfishAmplitude };
  return {
    id,
    variant: 'jellyfish',
    pos: jellyfishPosition(pos, phase, amplitude),
    size: config.enemySize,
    points: enemyValue(level, config),
    spawnLevel: level,
    removed: false,
    base: { ...pos },
    phase,
    angularSpeed: perSecond(config.jellyfishSpeed, config),
    amplitude,
  };
};

const createCrab = (id: number, pos: Vec2, level: number, config: GameConfig, rng: Rng): Crab => {
  const size = config.enemySize;
  const minX = Math.max(size, pos.x - config.crabPatrolHalfWidth);
  const maxX = Math.min(config.arena.width - size, pos.x + config.crabPatrolHalfWidth);
  return {
    id,
    variant: 'crab',
    pos: { ...pos },
    size,
    points: enemyValue(level, config),
    spawnLevel: level,
    removed: false,
    minX: Math.min(minX, maxX),
    maxX,
    direction: rng.pick<Facing>([1, -1]),
    speed: perSecond(config.crabSpeed, config),
  };
};

const createShark = (id: number, pos: Vec2, level: number, config: GameConfig): Shark => ({
  id,
  variant: 'shark',
  pos: { ...pos },
  size: config.sharkSize,
  points: enemyValue(level, config),
  spawnLevel: level,
  removed: false,
  vel: { x: 0, y: 0 },
  maxSpeed: perSecond(config.sharkSpeed, config),
});

export const createEnemy = (
  variant: EnemyVariant,
  id: number,
  pos: Vec2,
  level: number,
  config: GameConfig,
  rng: Rng,
): Enemy => {
  switch (variant) {
    case 'jellyfish': return createJellyfish(id, pos, level, config, rng);
    case 'crab': return createCrab(id, pos, level, config, rng);
    case 'shark': return createShark(id, pos, level, config);
  }
};

export const createPearl = (id: number, pos: Vec2, level: number, config: GameConfig): Pearl => ({
  id,
  pos: { ...pos },
  size: config.pearlSize,
  points: pearlValue(level, config),
  spawnLevel: level,
  removed: false,
});

export const createPowerUp = (id: number, pos: Vec2, kind: PowerUpKind, config: GameConfig): PowerUp => ({
  id,
  pos: { ...pos },
  size: config.powerUpSize,
  kind,
  duration: config.powerUpDurationSeconds,
  removed: false,
});

export const createBullet = (id: number, player: PlayerState, config: GameConfig): Bullet => ({
  id,
  pos: { x: player.pos.x + player.size * player.direction, y: player.pos.y },
  size: config.bulletSize,
  vx: perSecond(config.bulletSpeed, config) * player.direction,
  removed: false,
});
