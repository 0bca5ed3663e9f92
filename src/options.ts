/**
 * Command-line options for the fireworks CLI
 */

import { type ThemeMode, getThemeModes, isValidThemeMode } from './themes';
import { DEFAULT_SUBTITLE, DEFAULT_TITLE } from './scenes/fireworks';
import { DEFAULT_FPS } from './scenes/fireworks/loop';

export interface CliOptions {
  theme: ThemeMode;
  title: string;
  subtitle: string;
  seed: number | undefined;
  fps: number;
  plain: boolean;
  pickTheme: boolean;
  listThemes: boolean;
  help: boolean;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const DEFAULT_CLI_OPTIONS: CliOptions = {
  theme: 'cyan',
  title: DEFAULT_TITLE,
  subtitle: DEFAULT_SUBTITLE,
  seed: undefined,
  fps: DEFAULT_FPS,
  plain: false,
  pickTheme: false,
  listThemes: false,
  help: false,
};

const MIN_FPS = 1;
const MAX_FPS = 240;
/** Seeds are 32-bit; anything wider would alias a smaller seed */
const MAX_SEED = 0xffffffff;

/**
 * Parse argv (without node and script path). Unknown flags and bad values
 * come back as an error message rather than throwing.
 */
export function parseCliArgs(args: readonly string[]): ParseResult {
  const options: CliOptions = { ...DEFAULT_CLI_OPTIONS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const value = (): string | null => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) return null;
      i++;
      return next;
    };

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--list-themes':
        options.listThemes = true;
        break;
      case '--pick-theme':
        options.pickTheme = true;
        break;
      case '--plain':
        options.plain = true;
        break;
      case '--theme': {
        const theme = value();
        if (theme === null) return { ok: false, error: '--theme needs a value' };
        if (!isValidThemeMode(theme)) {
          return { ok: false, error: `Unknown theme: ${theme} (available: ${getThemeModes().join(', ')})` };
        }
        options.theme = theme;
        break;
      }
      case '--title': {
        const title = value();
        if (title === null) return { ok: false, error: '--title needs a value' };
        options.title = title;
        break;
      }
      case '--subtitle': {
        const subtitle = value();
        if (subtitle === null) return { ok: false, error: '--subtitle needs a value' };
        options.subtitle = subtitle;
        break;
      }
      case '--seed': {
        const raw = value();
        const seed = raw === null ? NaN : Number(raw);
        if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
          return { ok: false, error: `--seed needs an integer between 0 and ${MAX_SEED}` };
        }
        options.seed = seed;
        break;
      }
      case '--fps': {
        const raw = value();
        const fps = raw === null ? NaN : Number(raw);
        if (!Number.isFinite(fps) || fps < MIN_FPS || fps > MAX_FPS) {
          return { ok: false, error: `--fps needs a number between ${MIN_FPS} and ${MAX_FPS}` };
        }
        options.fps = fps;
        break;
      }
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, options };
}
