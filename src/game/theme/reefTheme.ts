import type { ThemeConfig } from './types';

export const reefTheme: ThemeConfig = {
  key: 'reef',
  name: 'Lost Reef',
  background: '#0064c8',
  playerColor: 0xffa500,
  shieldedPlayerColor: 0x6496ff,
  pearlColor: 0xff7f50,
  bulletColor: 0xc7f5ff,
  enemyColors: {
    jellyfish: 0x800080,
    crab: 0xff0000,
    shark: 0x464646,
  },
  powerUpColors: {
    speedBoost: 0xffff00,
    shield: 0x6496ff,
  },
  hudFont: 'Trebuchet MS, Verdana, sans-serif',
};
