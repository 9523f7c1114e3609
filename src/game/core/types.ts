export type Vec2 = { x: number; y: number };

export type EnemyVariant = 'jellyfish' | 'crab' | 'shark';
export type PowerUpKind = 'speedBoost' | 'shield';
export type ZoneTag = 'standard' | 'advanced' | 'expert' | 'master';
export type Facing = 1 | -1;

type EntityBase = {
  id: number;
  pos: Vec2;
  size: number;
  removed: boolean;
};

type ScoredEntity = EntityBase & {
  points: number;
  spawnLevel: number;
};

export type Jellyfish = ScoredEntity & {
  variant: 'jellyfish';
  base: Vec2;
  phase: number;
  angularSpeed: number;
  amplitude: Vec2;
};

export type Crab = ScoredEntity & {
  variant: 'crab';
  minX: number;
  maxX: number;
  direction: Facing;
  speed: number;
};

export type Shark = ScoredEntity & {
  variant: 'shark';
  vel: Vec2;
  maxSpeed: number;
};

export type EnemyByVariant = {
  jellyfish: Jellyfish;
  crab: Crab;
  shark: Shark;
};

export type Enemy = EnemyByVariant[EnemyVariant];

export type Pearl = ScoredEntity;

export type PowerUp = EntityBase & {
  kind: PowerUpKind;
  duration: number;
};

export type Bullet = EntityBase & {
  vx: number;
};

export type PlayerState = {
  pos: Vec2;
  size: number;
  baseSpeed: number;
  health: number;
  maxHealth: number;
  direction: Facing;
  powerUps: Record<PowerUpKind, number>;
  invulnerableSeconds: number;
  shootCooldownSeconds: number;
  alive: boolean;
};

export type GameModeState = 'playing' | 'paused' | 'gameOver';

export type RunStats = {
  timeSeconds: number;
  pearlsCollected: number;
  enemiesDefeated: number;
  hitsTaken: number;
};

export type GameConfig = {
  arena: { width: number; height: number };
  referenceFps: number;
  maxStepMs: number;
  pearlBase: number;
  pearlStep: number;
  enemyBase: number;
  enemyStep: number;
  levelThresholds: readonly number[];
  thresholdTailStep: number;
  thresholdTailGrowth: number;
  milestoneLevels: readonly number[];
  playerSpeed: number;
  playerSize: number;
  playerMaxHealth: number;
  enemySize: number;
  sharkSize: number;
  jellyfishSpeed: number;
  jellyfishAmplitude: number;
  jellyfishSway: number;
  crabSpeed: number;
  crabPatrolHalfWidth: number;
  sharkSpeed: number;
  pearlSize: number;
  pearlMinSpacing: number;
  enemySpawnClearance: number;
  powerUpSize: number;
  powerUpDurationSeconds: number;
  powerUpSpawnPerSecond: number;
  maxActivePowerUps: number;
  speedBoostMultiplier: number;
  invulnerabilitySeconds: number;
  bulletSize: number;
  bulletSpeed: number;
  shootCooldownSeconds: number;
};

export type GameState = {
  rngState: number;
  elapsedMs: number;
  mode: GameModeState;
  config: GameConfig;
  level: number;
  score: number;
  player: PlayerState;
  enemies: Enemy[];
  pearls: Pearl[];
  powerUps: PowerUp[];
  bullets: Bullet[];
  nextEntityId: number;
  stats: RunStats;
};

export type InputState = {
  movement: Vec2;
  fire: boolean;
  pausePressed: boolean;
};

export type AdvanceReason = 'score' | 'enemies-cleared';

export type GameEvent =
  | { type: 'score'; amount: number }
  | { type: 'pearl-collected'; entityId: number; points: number; pos: Vec2 }
  | { type: 'enemy-defeated'; entityId: number; variant: EnemyVariant; points: number; cause: 'bullet' | 'shield'; pos: Vec2 }
  | { type: 'player-hit'; healthRemaining: number }
  | { type: 'power-up-collected'; entityId: number; kind: PowerUpKind; duration: number }
  | { type: 'power-up-expired'; kind: PowerUpKind }
  | { type: 'power-up-spawned'; entityId: number; kind: PowerUpKind }
  | { type: 'bullet-fired'; entityId: number }
  | { type: 'level-advanced'; level: number; reason: AdvanceReason; zone: ZoneTag }
  | { type: 'milestone'; level: number; message: string }
  | { type: 'game-over'; finalScore: number; level: number };

export type TickResult = {
  state: GameState;
  score: number;
  level: number;
  zone: ZoneTag;
  threshold: number;
  mode: GameModeState;
  player: PlayerState;
  enemies: Enemy[];
  pearls: Pearl[];
  powerUps: PowerUp[];
  bullets: Bullet[];
  events: GameEvent[];
};
