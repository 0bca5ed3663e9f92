/**
 * CLI entry point for terminal-fireworks
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout
 * to an xterm.js-compatible Terminal interface, so the show runs
 * directly in any terminal emulator.
 */

import type { IEvent } from '@xterm/xterm';
import { runFireworksShow } from './scenes/fireworks';
import type { RawModeControl, ShowTerminal } from './scenes/utils';
import { type ThemeMode, getShowTheme, getThemeModes, isValidThemeMode } from './themes';
import { parseCliArgs } from './options';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends ShowTerminal {
  dispose: () => void;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches home + redraw into a single atomic paint.
// Supported by Warp, iTerm2, kitty, foot, WezTerm, etc.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

function createNodeTerminal(): NodeTerminal {
  const dataListeners: ((data: string) => void)[] = [];

  const onStdinData = (data: string) => {
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  };

  process.stdin.setEncoding('utf8');
  process.stdin.on('data', onStdinData);
  process.stdin.resume();

  const onData: IEvent<string> = (listener) => {
    const callback = (data: string) => listener(data);
    dataListeners.push(callback);
    return {
      dispose: () => {
        const idx = dataListeners.indexOf(callback);
        if (idx !== -1) dataListeners.splice(idx, 1);
      },
    };
  };

  return {
    write: (data: string | Uint8Array) => {
      const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
      process.stdout.write(SYNC_START + text + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onData,
    dispose: () => {
      process.stdin.off('data', onStdinData);
      process.stdin.pause();
    },
  };
}

const rawMode: RawModeControl = {
  enter: () => {
    if (process.stdin.isTTY) process.stdin.setRawMode(true);
  },
  restore: () => {
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
  },
};

// ---------------------------------------------------------------------------
// Theme picker
// ---------------------------------------------------------------------------

/**
 * Interactive theme selection. Returns null when the user cancels.
 */
async function pickTheme(initial: ThemeMode): Promise<ThemeMode | null> {
  // Dynamic import so @clack/prompts isn't loaded for the plain show path
  const p = await import('@clack/prompts');

  p.intro('terminal-fireworks');
  const choice = await p.select({
    message: 'Pick a theme',
    initialValue: initial,
    options: getThemeModes().map(mode => ({
      value: mode,
      label: getShowTheme(mode).name,
      hint: mode,
    })),
  });

  if (p.isCancel(choice) || typeof choice !== 'string' || !isValidThemeMode(choice)) {
    p.cancel('No show today.');
    return null;
  }
  p.outro(`Theme: ${getShowTheme(choice).name}`);
  return choice;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  terminal-fireworks: fireworks in your terminal

  Usage:
    fireworks                    Start the show
    fireworks --theme <theme>    Set color theme
    fireworks --pick-theme       Choose a theme interactively
    fireworks --seed <n>         Replay the same show every time
    fireworks --fps <n>          Target frame rate (default 60)
    fireworks --title <text>     Title text
    fireworks --subtitle <text>  Subtitle text
    fireworks --plain            No colors
    fireworks --list-themes      List all themes
    fireworks --help             Show this help

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    SPACE                Launch a rocket
    Q / Ctrl-C           Quit

  Examples:
    fireworks --theme amber
    fireworks --seed 42 --title "HAPPY NEW YEAR"
`);
}

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error('Run with --help for usage.');
    return 1;
  }
  const { options } = parsed;

  if (options.help) {
    printHelp();
    return 0;
  }

  if (options.listThemes) {
    for (const mode of getThemeModes()) {
      console.log(`  ${mode.padEnd(12)} ${getShowTheme(mode).name}`);
    }
    return 0;
  }

  let theme = options.theme;
  if (options.pickTheme) {
    const picked = await pickTheme(theme);
    if (picked === null) return 0;
    theme = picked;
  }

  const terminal = createNodeTerminal();
  const show = runFireworksShow(terminal, {
    theme,
    title: options.title,
    subtitle: options.subtitle,
    seed: options.seed,
    fps: options.fps,
    plain: options.plain,
    rawMode,
  });

  const onSignal = () => show.stop('signal');
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await show.finished;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    terminal.dispose();
  }

  console.log('Bye 👋');
  return 0;
}

main().then(
  code => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
