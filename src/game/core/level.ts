import type { Rng } from './math';
import { isMilestoneLevel, levelThreshold, milestoneMessage, zoneForLevel } from './scoring';
import { populateLevel } from './spawning';
import type { AdvanceReason, GameEvent, GameState } from './types';

export const advanceReason = (state: GameState): AdvanceReason | null => {
  if (state.score >= levelThreshold(state.level, state.config)) return 'score';
  if (state.enemies.every((e) => e.removed)) return 'enemies-cleared';
  return null;
};

export const advanceLevel = (state: GameState, rng: Rng, reason: AdvanceReason): GameEvent[] => {
  const completed = state.level;
  state.level += 1;
  populateLevel(state, rng);
  const events: GameEvent[] = [{ type: 'level-advanced', level: state.level, reason, zone: zoneForLevel(state.level) }];
  if (isMilestoneLevel(completed, state.config)) {
    events.push({ type: 'milestone', level: completed, message: milestoneMessage(completed) });
  }
  return events;
};

/** Runs once per tick, after collisions. Advances at most one level. */
export const updateLevelProgress = (state: GameState, rng: Rng): GameEvent[] => {
  if (state.mode !== 'playing') return [];
  const reason = advanceReason(state);
  return reason ? advanceLevel(state, rng, reason) : [];
};
