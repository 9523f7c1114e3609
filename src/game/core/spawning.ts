import { createEnemy, createPearl, createPowerUp, takeEntityId } from './entities';
import { dist, type Rng } from './math';
import type { Enemy, EnemyVariant, GameEvent, GameState, Pearl, PowerUpKind, Vec2 } from './types';

const ENEMY_EDGE_MARGIN = 100;
const ITEM_EDGE_MARGIN = 50;
const SAFE_SPAWN_ATTEMPTS = 10;
const POWER_UP_KINDS: PowerUpKind[] = ['speedBoost', 'shield'];

export const enemyCountForLevel = (level: number) => {
  if (level <= 3) return 3;
  if (level <= 10) return 5;
  if (level <= 20) return 7;
  return 8;
};

export const pearlCountForLevel = (level: number) => {
  if (level <= 5) return 8;
  if (level <= 15) return 12;
  return 15;
};

export type VariantMix = { variants: EnemyVariant[]; weights: number[] };

export const variantMixForLevel = (level: number): VariantMix => {
  if (level <= 3) return { variants: ['jellyfish'], weights: [1] };
  if (level < 8) return { variants: ['jellyfish', 'crab'], weights: [1, 1] };
  if (level === 8) return { variants: ['jellyfish', 'crab'], weights: [3, 4] };
  if (level < 15) return { variants: ['jellyfish', 'crab', 'shark'], weights: [2, 3, 2] };
  return { variants: ['jellyfish', 'crab', 'shark'], weights: [1, 2, 4] };
};

const randomPoint = (state: GameState, rng: Rng, margin: number): Vec2 => {
  const { width, height } = state.config.arena;
  const mx = Math.min(margin, Math.floor(width / 2));
  const my = Math.min(margin, Math.floor(height / 2));
  return { x: rng.int(mx, Math.floor(width - mx)), y: rng.int(my, Math.floor(height - my)) };
};

// Falls back to the last candidate when no clear spot turns up.
const pointAwayFromPlayer = (state: GameState, rng: Rng): Vec2 => {
  let candidate = randomPoint(state, rng, ENEMY_EDGE_MARGIN);
  for (let i = 1; i < SAFE_SPAWN_ATTEMPTS; i += 1) {
    if (dist(candidate, state.player.pos) >= state.config.enemySpawnClearance) return candidate;
    candidate = randomPoint(state, rng, ENEMY_EDGE_MARGIN);
  }
  return candidate;
};

export const spawnEnemies = (state: GameState, rng: Rng): Enemy[] => {
  const { variants, weights } = variantMixForLevel(state.level);
  return Array.from({ length: enemyCountForLevel(state.level) }, () => {
    const pos = pointAwayFromPlayer(state, rng);
    const variant = rng.weighted(variants, weights);
    return createEnemy(variant, takeEntityId(state), pos, state.level, state.config, rng);
  });
};

export const spawnPearls = (state: GameState, rng: Rng): Pearl[] => {
  const count = pearlCountForLevel(state.level);
  const pearls: Pearl[] = [];
  for (let attempt = 0; pearls.length < count && attempt < count * 3; attempt += 1) {
    const pos = randomPoint(state, rng, ITEM_EDGE_MARGIN);
    if (pearls.some((p) => dist(p.pos, pos) < state.config.pearlMinSpacing)) continue;
    pearls.push(createPearl(takeEntityId(state), pos, state.level, state.config));
  }
  return pearls;
};

/** Replaces every level-scoped collection; leftovers from the previous level are dropped. */
export const populateLevel = (state: GameState, rng: Rng) => {
  state.enemies = spawnEnemies(state, rng);
  state.pearls = spawnPearls(state, rng);
  state.powerUps = [];
  state.bullets = [];
};

export const maybeSpawnPowerUp = (state: GameState, rng: Rng, dt: number): GameEvent[] => {
  const { config } = state;
  if (state.powerUps.length >= config.maxActivePowerUps) return [];
  if (rng.next() >= config.powerUpSpawnPerSecond * dt) return [];
  const kind = rng.pick(POWER_UP_KINDS);
  const powerUp = createPowerUp(takeEntityId(state), randomPoint(state, rng, ITEM_EDGE_MARGIN), kind, config);
  state.powerUps.push(powerUp);
  return [{ type: 'power-up-spawned', entityId: powerUp.id, kind }];
};
