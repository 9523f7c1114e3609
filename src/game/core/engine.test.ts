import { createInitialGameState, startNewRun, tickGame } from './engine';
import { defaultGameConfig } from './config';
import type { GameEvent, GameState, TickResult } from './types';
import {
  PLAYER_START,
  blankState,
  crab,
  input,
  parkedCrab,
  powerUp,
  quietConfig,
  unreachableScoreConfig,
} from './testUtils';

const idle = input();

const tickMany = (state: GameState, count: number, dtMs = 50) => {
  const events: GameEvent[] = [];
  let result: TickResult = tickGame(state, idle, dtMs);
  events.push(...result.events);
  for (let i = 1; i < count; i += 1) {
    result = tickGame(result.state, idle, dtMs);
    events.push(...result.events);
  }
  return { result, events };
};

describe('createInitialGameState', () => {
  test('starts level 1 with a level-1 population', () => {
    const state = createInitialGameState(quietConfig(), 42);
    expect(state.level).toBe(1);
    expect(state.score).toBe(0);
    expect(state.mode).toBe('playing');
    expect(state.enemies).toHaveLength(3);
    expect(state.enemies.every((e) => e.variant === 'jellyfish' && e.points === 80 && e.spawnLevel === 1)).toBe(true);
    expect(state.pearls.length).toBeGreaterThan(0);
    expect(state.pearls.length).toBeLessThanOrEqual(8);
    expect(state.pearls.every((p) => p.points === 27)).toBe(true);
    expect(state.player.pos).toEqual(PLAYER_START);
    expect(state.player.health).toBe(3);
  });

  test('the same seed builds the same game', () => {
    expect(createInitialGameState(defaultGameConfig, 9)).toEqual(createInitialGameState(defaultGameConfig, 9));
  });
});

describe('tickGame basics', () => {
  test('zero elapsed time changes nothing', () => {
    const start = createInitialGameState(defaultGameConfig, 11);
    let result = tickGame(start, idle, 0);
    for (let i = 0; i < 5; i += 1) {
      expect(result.events).toEqual([]);
      expect(result.score).toBe(0);
      expect(result.level).toBe(1);
      expect(result.enemies).toHaveLength(start.enemies.length);
      expect(result.pearls).toHaveLength(start.pearls.length);
      expect(result.powerUps).toHaveLength(start.powerUps.length);
      result = tickGame(result.state, idle, 0);
    }
    expect(result.state).toEqual(start);
  });

  test('never mutates the previous state', () => {
    const start = blankState();
    const before = structuredClone(start);
    tickGame(start, input({ movement: { x: 1, y: 1 }, fire: true }), 50);
    expect(start).toEqual(before);
  });

  test('snapshot reports level, zone and threshold', () => {
    const result = tickGame(blankState(), idle, 16);
    expect(result.level).toBe(1);
    expect(result.zone).toBe('standard');
    expect(result.threshold).toBe(50);
    expect(result.mode).toBe('playing');
  });

  test('clamps long frames and rejects non-finite ones', () => {
    expect(tickGame(blankState(), idle, 1000).state.elapsedMs).toBe(50);
    expect(tickGame(blankState(), idle, -20).state.elapsedMs).toBe(0);
    expect(() => tickGame(blankState(), idle, Number.NaN)).toThrow(RangeError);
  });

  test('pause freezes the run until pressed again', () => {
    const paused = tickGame(blankState(), input({ pausePressed: true }), 50);
    expect(paused.mode).toBe('paused');
    const still = tickGame(paused.state, input({ movement: { x: 1, y: 0 } }), 50);
    expect(still.state.elapsedMs).toBe(0);
    expect(still.player.pos).toEqual(PLAYER_START);
    const resumed = tickGame(still.state, input({ pausePressed: true }), 50);
    expect(resumed.mode).toBe('playing');
    expect(resumed.state.elapsedMs).toBe(50);
  });

  test('replays identically from the same seed and inputs', () => {
    const run = () => {
      let state = createInitialGameState(defaultGameConfig, 2024);
      for (let i = 0; i < 300; i += 1) {
        const movement = { x: i % 40 < 20 ? 1 : -1, y: i % 30 < 15 ? 1 : -1 };
        state = tickGame(state, input({ movement, fire: i % 10 === 0 }), 16).state;
      }
      return state;
    };
    expect(run()).toEqual(run());
  });
});

describe('player', () => {
  test('moves at base speed and faces its heading', () => {
    const result = tickGame(blankState(), input({ movement: { x: -1, y: 0 } }), 50);
    expect(result.player.pos.x).toBeCloseTo(485, 9);
    expect(result.player.pos.y).toBe(350);
    expect(result.player.direction).toBe(-1);
  });

  test('diagonal input is normalised', () => {
    const result = tickGame(blankState(), input({ movement: { x: 1, y: 1 } }), 50);
    expect(result.player.pos.x).toBeCloseTo(500 + 15 / Math.SQRT2, 9);
    expect(result.player.pos.y).toBeCloseTo(350 + 15 / Math.SQRT2, 9);
  });

  test('speed boost wears off back to exactly the base speed', () => {
    const start = blankState();
    start.player.powerUps.speedBoost = 0.06;
    const right = input({ movement: { x: 1, y: 0 } });
    const boosted = tickGame(start, right, 50);
    expect(boosted.player.pos.x).toBeCloseTo(522.5, 9);
    const after = tickGame(boosted.state, right, 50);
    expect(after.events).toContainEqual({ type: 'power-up-expired', kind: 'speedBoost' });
    expect(after.player.powerUps.speedBoost).toBe(0);
    expect(after.player.pos.x).toBeCloseTo(537.5, 9);
    expect(after.player.baseSpeed).toBe(300);
  });

  test('fires a bubble ahead of the fish, then waits for the cooldown', () => {
    const first = tickGame(blankState(), input({ fire: true }), 50);
    expect(first.events).toContainEqual({ type: 'bullet-fired', entityId: 1000 });
    expect(first.bullets).toHaveLength(1);
    expect(first.bullets[0].pos.x).toBeCloseTo(554, 9);
    const second = tickGame(first.state, input({ fire: true }), 50);
    expect(second.bullets).toHaveLength(1);
    expect(second.events.some((e) => e.type === 'bullet-fired')).toBe(false);
  });

  test('a bubble defeats the enemy it reaches', () => {
    const start = blankState(unreachableScoreConfig());
    start.enemies = [parkedCrab(), crab(1, { x: 600, y: 350 })];
    const fired = tickGame(start, input({ fire: true }), 50);
    const { result, events } = tickMany(fired.state, 2);
    expect(events).toContainEqual({
      type: 'enemy-defeated',
      entityId: 1,
      variant: 'crab',
      points: 80,
      cause: 'bullet',
      pos: { x: 600, y: 350 },
    });
    expect(result.score).toBe(80);
    expect(result.enemies.map((e) => e.id)).toEqual([900]);
    expect(result.bullets).toEqual([]);
  });

  test('the run ends at zero health and stays over', () => {
    const start = blankState();
    start.player.health = 1;
    start.enemies = [parkedCrab(), crab(1, PLAYER_START)];
    const over = tickGame(start, idle, 50);
    expect(over.mode).toBe('gameOver');
    expect(over.events).toContainEqual({ type: 'game-over', finalScore: 0, level: 1 });
    const after = tickGame(over.state, input({ movement: { x: 1, y: 0 }, fire: true }), 50);
    expect(after.events).toEqual([]);
    expect(after.state.elapsedMs).toBe(over.state.elapsedMs);
    expect(after.player.pos).toEqual(over.player.pos);
  });

  test('startNewRun resets the run', () => {
    const start = { ...blankState(), score: 400, level: 4 };
    const fresh = startNewRun(start);
    expect(fresh.level).toBe(1);
    expect(fresh.score).toBe(0);
    expect(fresh.enemies).toHaveLength(3);
  });
});

describe('shield', () => {
  test('defeats enemies while active and stops protecting once it expires', () => {
    const start = blankState(unreachableScoreConfig());
    start.powerUps = [powerUp(1, PLAYER_START, 'shield')];

    const collected = tickGame(start, idle, 50);
    expect(collected.events).toEqual([{ type: 'power-up-collected', entityId: 1, kind: 'shield', duration: 5 }]);
    expect(collected.player.powerUps.shield).toBe(5);

    const withEnemy = { ...collected.state, enemies: [...collected.state.enemies, crab(2, PLAYER_START)] };
    const bumped = tickGame(withEnemy, idle, 50);
    expect(bumped.events).toContainEqual(expect.objectContaining({ type: 'enemy-defeated', entityId: 2, cause: 'shield' }));
    expect(bumped.events.some((e) => e.type === 'player-hit')).toBe(false);
    expect(bumped.score).toBe(80);
    expect(bumped.player.health).toBe(3);

    const { result: expired, events } = tickMany(bumped.state, 110);
    expect(events).toContainEqual({ type: 'power-up-expired', kind: 'shield' });
    expect(expired.player.powerUps.shield).toBe(0);

    const unprotected = { ...expired.state, enemies: [...expired.state.enemies, crab(3, PLAYER_START)] };
    const hit = tickGame(unprotected, idle, 50);
    expect(hit.events).toEqual([{ type: 'player-hit', healthRemaining: 2 }]);
    expect(hit.enemies.map((e) => e.id)).toContain(3);
  });
});

describe('power-up spawning', () => {
  test('spawns up to the on-screen cap', () => {
    const start = blankState(quietConfig({ powerUpSpawnPerSecond: 1000, maxActivePowerUps: 2 }));
    let result = tickGame(start, idle, 50);
    expect(result.events.filter((e) => e.type === 'power-up-spawned')).toHaveLength(1);
    expect(result.powerUps).toHaveLength(1);
    for (let i = 0; i < 20; i += 1) {
      result = tickGame(result.state, idle, 50);
      expect(result.powerUps.length).toBeLessThanOrEqual(2);
    }
  });
});

describe('level progression', () => {
  test('reaching the threshold advances and repopulates without resetting the score', () => {
    const start = { ...createInitialGameState(quietConfig(), 7), score: 50 };
    const result = tickGame(start, idle, 16);
    expect(result.level).toBe(2);
    expect(result.score).toBeGreaterThanOrEqual(50);
    expect(result.events).toContainEqual({ type: 'level-advanced', level: 2, reason: 'score', zone: 'standard' });
    expect(result.enemies).toHaveLength(3);
    expect(result.enemies.every((e) => e.spawnLevel === 2 && e.points === 85)).toBe(true);
    expect(result.pearls.length).toBeGreaterThan(0);
    expect(result.pearls.every((p) => p.spawnLevel === 2 && p.points === 29)).toBe(true);
    expect(result.threshold).toBe(120);
  });

  test('defeating every enemy advances even below the threshold', () => {
    const start = blankState(unreachableScoreConfig());
    start.player.powerUps.shield = 5;
    start.enemies = [crab(1, PLAYER_START), crab(2, { x: 495, y: 350 }), crab(3, { x: 505, y: 350 })];
    const result = tickGame(start, idle, 50);
    expect(result.events.filter((e) => e.type === 'enemy-defeated')).toHaveLength(3);
    expect(result.events).toContainEqual({ type: 'level-advanced', level: 2, reason: 'enemies-cleared', zone: 'standard' });
    expect(result.level).toBe(2);
    expect(result.score).toBe(240);
    expect(result.enemies).toHaveLength(3);
  });

  test('advances at most one level per tick', () => {
    const start = { ...createInitialGameState(quietConfig(), 3), score: 100000 };
    const result = tickGame(start, idle, 16);
    expect(result.level).toBe(2);
    expect(result.events.filter((e) => e.type === 'level-advanced')).toHaveLength(1);
  });

  test('completing a milestone level announces it', () => {
    const start = { ...createInitialGameState(quietConfig(), 5), level: 10, score: 3200 };
    const result = tickGame(start, idle, 16);
    expect(result.level).toBe(11);
    expect(result.zone).toBe('advanced');
    expect(result.events).toContainEqual({ type: 'milestone', level: 10, message: 'Congratulations! You reached level 10!' });
    expect(result.enemies).toHaveLength(7);
  });

  test('leftovers from the previous level are discarded', () => {
    const start = blankState();
    start.score = 60;
    start.powerUps = [powerUp(1, { x: 100, y: 100 }, 'speedBoost')];
    const result = tickGame(start, idle, 16);
    expect(result.level).toBe(2);
    expect(result.powerUps).toEqual([]);
    expect(result.enemies.some((e) => e.id === 900)).toBe(false);
  });
});
