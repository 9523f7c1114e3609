import { add, clamp, dist, len, normalize, scale, sub, wrapAngle } from './math';
import type { Crab, Enemy, EnemyByVariant, EnemyVariant, Jellyfish, Shark, Vec2 } from './types';

export type Behavior<E extends Enemy> = (enemy: E, dt: number, target: Vec2) => E;

export const jellyfishPosition = (base: Vec2, phase: number, amplitude: Vec2): Vec2 => ({
  x: base.x + amplitude.x * Math.cos(phase),
  y: base.y + amplitude.y * Math.sin(phase),
});

export const advanceJellyfish: Behavior<Jellyfish> = (enemy, dt) => {
  const phase = wrapAngle(enemy.phase + enemy.angularSpeed * dt);
  return { ...enemy, phase, pos: jellyfishPosition(enemy.base, phase, enemy.amplitude) };
};

export const advanceCrab: Behavior<Crab> = (enemy, dt) => {
  let x = enemy.pos.x + enemy.direction * enemy.speed * dt;
  let direction = enemy.direction;
  if (x > enemy.maxX) {
    x = enemy.maxX - (x - enemy.maxX);
    direction = -1;
  } else if (x < enemy.minX) {
    x = enemy.minX + (enemy.minX - x);
    direction = 1;
  }
  // A step longer than the whole patrol would mirror past the far bound.
  x = clamp(x, enemy.minX, enemy.maxX);
  return { ...enemy, direction, pos: { x, y: enemy.pos.y } };
};

/** Greedy pursuit: re-aims at where the player is now every tick, never past it. */
export const advanceShark: Behavior<Shark> = (enemy, dt, target) => {
  const distance = dist(enemy.pos, target);
  if (distance === 0) return { ...enemy, vel: { x: 0, y: 0 } };

  const vel = scale(normalize(sub(target, enemy.pos)), enemy.maxSpeed);
  const step = scale(vel, dt);
  const pos = len(step) >= distance ? { ...target } : add(enemy.pos, step);
  return { ...enemy, vel, pos };
};

export const enemyBehaviors: { [V in EnemyVariant]: Behavior<EnemyByVariant[V]> } = {
  jellyfish: advanceJellyfish,
  crab: advanceCrab,
  shark: advanceShark,
};

const advanceAs = <V extends EnemyVariant>(variant: V, enemy: EnemyByVariant[V], dt: number, target: Vec2) =>
  enemyBehaviors[variant](enemy, dt, target);

export const advanceEnemy = (enemy: Enemy, dt: number, target: Vec2): Enemy => {
  if (enemy.removed) return enemy;
  return advanceAs(enemy.variant, enemy, dt, target);
};

export const keepInArena = (enemy: Enemy, arena: { width: number; height: number }): Enemy => {
  const x = clamp(enemy.pos.x, enemy.size, arena.width - enemy.size);
  const y = clamp(enemy.pos.y, enemy.size, arena.height - enemy.size);
  if (x === enemy.pos.x && y === enemy.pos.y) return enemy;
  return { ...enemy, pos: { x, y } };
};
