import { defaultGameConfig } from './config';
import { LevelRangeError } from './errors';
import type { GameConfig, ZoneTag } from './types';

export const assertLevel = (level: number) => {
  if (!Number.isInteger(level) || level < 1) throw new LevelRangeError(level);
};

export const pearlValue = (level: number, config: GameConfig = defaultGameConfig) => {
  assertLevel(level);
  return config.pearlBase + config.pearlStep * level;
};

export const enemyValue = (level: number, config: GameConfig = defaultGameConfig) => {
  assertLevel(level);
  return config.enemyBase + config.enemyStep * level;
};

/**
 * Score required to leave `level`. Levels covered by the configured table read
 * it directly; later levels add `thresholdTailStep` for the first extra level
 * and `thresholdTailGrowth` more for each one after that.
 */
export const levelThreshold = (level: number, config: GameConfig = defaultGameConfig) => {
  assertLevel(level);
  const table = config.levelThresholds;
  if (level <= table.length) return table[level - 1];
  const k = level - table.length;
  const value = table[table.length - 1]
    + k * config.thresholdTailStep
    + (config.thresholdTailGrowth * k * (k - 1)) / 2;
  if (!Number.isSafeInteger(value)) throw new LevelRangeError(level, 'threshold exceeds the safe integer range');
  return value;
};

export const zoneForLevel = (level: number): ZoneTag => {
  assertLevel(level);
  if (level >= 30) return 'master';
  if (level >= 20) return 'expert';
  if (level >= 10) return 'advanced';
  return 'standard';
};

const MILESTONE_MESSAGES: Partial<Record<number, string>> = {
  10: 'Congratulations! You reached level 10!',
  20: 'Incredible! Level 20 conquered!',
  30: 'REEF MASTER! Level 30 complete!',
  40: 'SEA LEGEND! Level 40 reached!',
  50: 'OCEAN EMPEROR! Level 50 mastered!',
};

export const isMilestoneLevel = (level: number, config: GameConfig = defaultGameConfig) => {
  assertLevel(level);
  return config.milestoneLevels.includes(level);
};

export const milestoneMessage = (level: number) => {
  assertLevel(level);
  return MILESTONE_MESSAGES[level] ?? `Level ${level} complete!`;
};

export const performanceMessage = (score: number) => {
  if (score < 100) return 'Keep practicing!';
  if (score < 200) return 'Good job!';
  return 'Excellent score!';
};

export type ProgressStatus = {
  tone: 'advancing' | 'pending';
  text: string;
};

const zoneSuffix: Record<ZoneTag, string> = {
  standard: '',
  advanced: ' - Advanced zone!',
  expert: ' - EXPERT ZONE!',
  master: ' - MASTER ZONE!',
};

// HUD line: how far the player is from either way out of the current level.
export const progressStatus = (
  score: number,
  level: number,
  enemiesRemaining: number,
  config: GameConfig = defaultGameConfig,
): ProgressStatus => {
  const target = levelThreshold(level, config);
  const needed = target - score;
  if (needed <= 0) return { tone: 'advancing', text: `Score reached! (${score}/${target}) - advancing...` };
  if (enemiesRemaining === 0) return { tone: 'advancing', text: 'All enemies defeated! Advancing...' };

  const enemiesPart = enemiesRemaining === 1 ? 'defeat the last enemy' : `defeat all ${enemiesRemaining} enemies`;
  let text = `${needed} points to go (${score}/${target}) or ${enemiesPart}`;
  text += zoneSuffix[zoneForLevel(level)];
  if (level <= 10) text += ` | Next level: +${levelThreshold(level + 1, config) - target}`;
  return { tone: 'pending', text };
};
