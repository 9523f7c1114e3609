export { reefTheme } from './reefTheme';
export type { ThemeConfig, ThemeKey } from './types';
