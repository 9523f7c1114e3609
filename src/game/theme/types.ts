import type { EnemyVariant, PowerUpKind } from '../core/types';

export type ThemeKey = 'reef';

export type ThemeConfig = {
  key: ThemeKey;
  name: string;
  background: string;
  playerColor: number;
  shieldedPlayerColor: number;
  pearlColor: number;
  bulletColor: number;
  enemyColors: Record<EnemyVariant, number>;
  powerUpColors: Record<PowerUpKind, number>;
  hudFont: string;
};
