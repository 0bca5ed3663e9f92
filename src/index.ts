/**
 * terminal-fireworks
 *
 * Fireworks, a star field and a shimmering title for xterm.js and CLI.
 *
 * Library usage (xterm.js):
 *   import { runFireworksShow } from 'terminal-fireworks';
 *   const controller = runFireworksShow(terminal, { theme: 'amber' });
 *
 * CLI usage:
 *   npx terminal-fireworks
 */

export * from './scenes';

export {
  themes,
  getShowTheme,
  getThemeModes,
  isValidThemeMode,
  FIREWORK_PALETTE,
  type ThemeMode,
  type ShowTheme,
} from './themes';
