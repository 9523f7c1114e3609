import { defaultGameConfig, validateGameConfig } from './config';
import { pruneRemoved, resolveCollisions } from './collision';
import { createBullet, createPlayer, effectiveSpeed, takeEntityId } from './entities';
import { updateLevelProgress } from './level';
import { add, clamp, createRng, normalize, scale } from './math';
import { advanceEnemy, keepInArena } from './movement';
import { levelThreshold, zoneForLevel } from './scoring';
import { maybeSpawnPowerUp, populateLevel } from './spawning';
import type { GameConfig, GameEvent, GameState, InputState, PowerUpKind, TickResult } from './types';

const POWER_UP_KINDS: PowerUpKind[] = ['speedBoost', 'shield'];

export const idleInput: InputState = { movement: { x: 0, y: 0 }, fire: false, pausePressed: false };

export const createInitialGameState = (
  config: GameConfig = defaultGameConfig,
  seed: number = Math.floor(Math.random() * 1e9),
): GameState => {
  validateGameConfig(config);
  const state: GameState = {
    rngState: seed,
    elapsedMs: 0,
    mode: 'playing',
    config,
    level: 1,
    score: 0,
    player: createPlayer(config),
    enemies: [],
    pearls: [],
    powerUps: [],
    bullets: [],
    nextEntityId: 1,
    stats: { timeSeconds: 0, pearlsCollected: 0, enemiesDefeated: 0, hitsTaken: 0 },
  };
  const rng = createRng(state.rngState);
  populateLevel(state, rng);
  state.rngState = rng.state();
  return state;
};

export const startNewRun = (state: GameState): GameState => createInitialGameState(state.config, state.rngState);

const cloneState = (prev: GameState): GameState => ({
  ...prev,
  ...structuredClone({
    player: prev.player,
    enemies: prev.enemies,
    pearls: prev.pearls,
    powerUps: prev.powerUps,
    bullets: prev.bullets,
    stats: prev.stats,
  }),
});

export const snapshot = (state: GameState, events: GameEvent[]): TickResult => ({
  state,
  score: state.score,
  level: state.level,
  zone: zoneForLevel(state.level),
  threshold: levelThreshold(state.level, state.config),
  mode: state.mode,
  player: state.player,
  enemies: state.enemies,
  pearls: state.pearls,
  powerUps: state.powerUps,
  bullets: state.bullets,
  events,
});

const updateTimers = (state: GameState, dt: number): GameEvent[] => {
  const events: GameEvent[] = [];
  const { player } = state;
  player.invulnerableSeconds = Math.max(0, player.invulnerableSeconds - dt);
  player.shootCooldownSeconds = Math.max(0, player.shootCooldownSeconds - dt);
  for (const kind of POWER_UP_KINDS) {
    if (player.powerUps[kind] <= 0) continue;
    player.powerUps[kind] = Math.max(0, player.powerUps[kind] - dt);
    if (player.powerUps[kind] === 0) events.push({ type: 'power-up-expired', kind });
  }
  return events;
};

const movePlayer = (state: GameState, input: InputState, dt: number): GameEvent[] => {
  const { player, config } = state;
  const moveDir = normalize(input.movement);
  player.pos = add(player.pos, scale(moveDir, effectiveSpeed(player, config) * dt));
  player.pos.x = clamp(player.pos.x, player.size, config.arena.width - player.size);
  player.pos.y = clamp(player.pos.y, player.size, config.arena.height - player.size);
  if (moveDir.x !== 0) player.direction = moveDir.x < 0 ? -1 : 1;

  if (!input.fire || player.shootCooldownSeconds > 0) return [];
  const bullet = createBullet(takeEntityId(state), player, config);
  state.bullets.push(bullet);
  player.shootCooldownSeconds = config.shootCooldownSeconds;
  return [{ type: 'bullet-fired', entityId: bullet.id }];
};

const moveBullets = (state: GameState, dt: number) => {
  for (const bullet of state.bullets) {
    bullet.pos.x += bullet.vx * dt;
    if (bullet.pos.x < 0 || bullet.pos.x > state.config.arena.width) bullet.removed = true;
  }
};

/**
 * Advances the run by `dtMs` (clamped to `config.maxStepMs`). `prev` is never
 * mutated; the returned state and entity lists are fresh copies, so a renderer
 * holding the previous result keeps a consistent picture.
 */
export const tickGame = (prev: GameState, input: InputState, dtMs: number): TickResult => {
  if (!Number.isFinite(dtMs)) throw new RangeError(`tickGame expects a finite dtMs, got ${dtMs}`);
  const state = cloneState(prev);
  const events: GameEvent[] = [];

  if (input.pausePressed && state.mode === 'playing') state.mode = 'paused';
  else if (input.pausePressed && state.mode === 'paused') state.mode = 'playing';

  if (state.mode !== 'playing') return snapshot(state, events);

  const stepMs = clamp(dtMs, 0, state.config.maxStepMs);
  if (stepMs === 0) return snapshot(state, events);
  const dt = stepMs / 1000;
  state.elapsedMs += stepMs;
  state.stats.timeSeconds += dt;
  const rng = createRng(state.rngState);

  events.push(...updateTimers(state, dt));
  events.push(...movePlayer(state, input, dt));
  state.enemies = state.enemies.map((e) => keepInArena(advanceEnemy(e, dt, state.player.pos), state.config.arena));
  moveBullets(state, dt);

  events.push(...resolveCollisions(state));
  pruneRemoved(state);

  if (state.mode === 'playing') events.push(...maybeSpawnPowerUp(state, rng, dt));
  events.push(...updateLevelProgress(state, rng));

  state.rngState = rng.state();
  return snapshot(state, events);
};
