import type { Enemy, GameEvent, GameState, Vec2 } from './types';

type Box = { pos: Vec2; size: number };

/**
 * Axis-aligned boxes centred on each entity with side `size`. Edges that only
 * touch do not count, and swapping the arguments never changes the answer.
 */
export const overlaps = (a: Box, b: Box) => {
  const reach = (a.size + b.size) / 2;
  return Math.abs(a.pos.x - b.pos.x) < reach && Math.abs(a.pos.y - b.pos.y) < reach;
};

const defeatEnemy = (state: GameState, enemy: Enemy, cause: 'bullet' | 'shield', events: GameEvent[]) => {
  if (enemy.removed) return;
  enemy.removed = true;
  state.score += enemy.points;
  state.stats.enemiesDefeated += 1;
  events.push(
    { type: 'enemy-defeated', entityId: enemy.id, variant: enemy.variant, points: enemy.points, cause, pos: { ...enemy.pos } },
    { type: 'score', amount: enemy.points },
  );
};

const hitPlayer = (state: GameState, events: GameEvent[]) => {
  const { player } = state;
  player.health -= 1;
  player.invulnerableSeconds = state.config.invulnerabilitySeconds;
  state.stats.hitsTaken += 1;
  events.push({ type: 'player-hit', healthRemaining: player.health });
  if (player.health <= 0) {
    player.alive = false;
    state.mode = 'gameOver';
    events.push({ type: 'game-over', finalScore: state.score, level: state.level });
  }
};

const resolveBulletHits = (state: GameState, events: GameEvent[]) => {
  for (const bullet of state.bullets) {
    if (bullet.removed) continue;
    const target = state.enemies.find((e) => !e.removed && overlaps(bullet, e));
    if (!target) continue;
    bullet.removed = true;
    defeatEnemy(state, target, 'bullet', events);
  }
};

// Shield defeats everything it touches; without it, one hit per tick at most.
const resolveEnemyContacts = (state: GameState, events: GameEvent[]) => {
  const { player } = state;
  for (const enemy of state.enemies) {
    if (enemy.removed || !overlaps(player, enemy)) continue;
    if (player.powerUps.shield > 0) {
      defeatEnemy(state, enemy, 'shield', events);
      continue;
    }
    if (player.invulnerableSeconds > 0) continue;
    hitPlayer(state, events);
    break;
  }
};

const resolvePickups = (state: GameState, events: GameEvent[]) => {
  const { player } = state;
  for (const pearl of state.pearls) {
    if (pearl.removed || !overlaps(player, pearl)) continue;
    pearl.removed = true;
    state.score += pearl.points;
    state.stats.pearlsCollected += 1;
    events.push(
      { type: 'pearl-collected', entityId: pearl.id, points: pearl.points, pos: { ...pearl.pos } },
      { type: 'score', amount: pearl.points },
    );
  }
  for (const powerUp of state.powerUps) {
    if (powerUp.removed || !overlaps(player, powerUp)) continue;
    powerUp.removed = true;
    player.powerUps[powerUp.kind] = powerUp.duration;
    events.push({ type: 'power-up-collected', entityId: powerUp.id, kind: powerUp.kind, duration: powerUp.duration });
  }
};

export const resolveCollisions = (state: GameState): GameEvent[] => {
  const events: GameEvent[] = [];
  if (!state.player.alive) return events;
  resolveBulletHits(state, events);
  resolveEnemyContacts(state, events);
  if (!state.player.alive) return events;
  resolvePickups(state, events);
  return events;
};

export const pruneRemoved = (state: GameState) => {
  state.enemies = state.enemies.filter((e) => !e.removed);
  state.pearls = state.pearls.filter((p) => !p.removed);
  state.powerUps = state.powerUps.filter((p) => !p.removed);
  state.bullets = state.bullets.filter((b) => !b.removed);
};
