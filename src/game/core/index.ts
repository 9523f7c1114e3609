export * from './types';
export { createGameConfig, defaultGameConfig, validateGameConfig } from './config';
export { ConfigError, LevelRangeError } from './errors';
export { createInitialGameState, idleInput, startNewRun, tickGame } from './engine';
export { overlaps } from './collision';
export { advanceEnemy, enemyBehaviors } from './movement';
export {
  enemyValue,
  isMilestoneLevel,
  levelThreshold,
  milestoneMessage,
  pearlValue,
  performanceMessage,
  progressStatus,
  zoneForLevel,
} from './scoring';
export type { ProgressStatus } from './scoring';
