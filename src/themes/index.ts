/**
 * Show color themes
 *
 * Each theme colors the title overlay; the firework palette is shared.
 */

import type { Rgb } from '../scenes/shared/color';

/**
 * Available theme identifiers
 */
export type ThemeMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'hotpink'
  | 'ice'
  | 'tron'
  | 'kawaii'
  | 'oled';

/**
 * Overlay colors for a theme
 */
export interface ShowTheme {
  /** Display name */
  name: string;
  /** Title text at rest */
  title: Rgb;
  /** Peak of the shimmer sweeping across the title */
  highlight: Rgb;
  /** Subtitle line */
  subtitle: Rgb;
  /** Underline segments alternate between these two */
  underline: readonly [Rgb, Rgb];
  /** FPS / particle counter */
  footer: Rgb;
}

/**
 * All theme definitions
 */
export const themes: Record<ThemeMode, ShowTheme> = {
  cyan: {
    name: 'Cyberpunk',
    title: [0, 217, 255],
    highlight: [255, 255, 255],
    subtitle: [120, 140, 160],
    underline: [[0, 217, 255], [255, 0, 110]],
    footer: [90, 110, 130],
  },
  amber: {
    name: 'Amber',
    title: [255, 176, 0],
    highlight: [255, 240, 200],
    subtitle: [150, 120, 70],
    underline: [[255, 176, 0], [255, 100, 0]],
    footer: [130, 100, 60],
  },
  green: {
    name: 'Phosphor',
    title: [51, 255, 102],
    highlight: [220, 255, 220],
    subtitle: [90, 150, 100],
    underline: [[51, 255, 102], [0, 170, 60]],
    footer: [70, 120, 80],
  },
  hotpink: {
    name: 'Hot Pink',
    title: [255, 20, 147],
    highlight: [255, 220, 240],
    subtitle: [160, 100, 130],
    underline: [[255, 20, 147], [180, 90, 255]],
    footer: [130, 90, 110],
  },
  ice: {
    name: 'Ice',
    title: [160, 230, 255],
    highlight: [255, 255, 255],
    subtitle: [110, 140, 160],
    underline: [[160, 230, 255], [80, 140, 255]],
    footer: [90, 115, 135],
  },
  tron: {
    name: 'Tron',
    title: [111, 195, 223],
    highlight: [230, 255, 255],
    subtitle: [90, 120, 140],
    underline: [[111, 195, 223], [223, 116, 12]],
    footer: [80, 105, 120],
  },
  kawaii: {
    name: 'Kawaii',
    title: [255, 150, 200],
    highlight: [255, 255, 255],
    subtitle: [170, 130, 160],
    underline: [[255, 150, 200], [150, 220, 255]],
    footer: [140, 110, 135],
  },
  oled: {
    name: 'OLED',
    title: [230, 230, 230],
    highlight: [255, 255, 255],
    subtitle: [120, 120, 120],
    underline: [[230, 230, 230], [90, 90, 90]],
    footer: [100, 100, 100],
  },
};

/**
 * Vibrant base colors for firework bursts
 */
export const FIREWORK_PALETTE: readonly Rgb[] = [
  [255, 80, 80],
  [255, 170, 40],
  [255, 230, 70],
  [90, 255, 120],
  [70, 200, 255],
  [120, 110, 255],
  [255, 90, 220],
];

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get theme colors by mode
 */
export function getShowTheme(mode: ThemeMode): ShowTheme {
  return themes[mode];
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeMode {
  return VALID_THEME_MODES.has(value);
}
