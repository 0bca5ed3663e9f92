/**
 * Fireworks Show
 *
 * Rockets, bursts, a star field flying past, and a shimmering title.
 * SPACE launches a rocket, Q quits. Runs in any xterm.js-compatible terminal.
 */

import { createRandom } from '../shared/random';
import { getShowTheme, type ThemeMode } from '../../themes';
import {
  type RawModeControl,
  type ShowTerminal,
  createQueuedKeySource,
  createSizeSource,
  createTerminalGuard,
} from '../utils';
import { type AnimationLoop, type Clock, type StopReason, DEFAULT_FPS, createAnimationLoop } from './loop';

export interface FireworksOptions {
  theme?: ThemeMode;
  title?: string;
  subtitle?: string;
  /** Fixed seed replays the same show */
  seed?: number;
  fps?: number;
  /** No color output */
  plain?: boolean;
  /** Raw-mode switch for hosts that have one (Node TTYs) */
  rawMode?: RawModeControl;
  clock?: Clock;
}

export interface FireworksController {
  stop: (reason?: StopReason) => void;
  readonly isRunning: boolean;
  /** Settles once the terminal has been restored */
  finished: Promise<void>;
  loop: AnimationLoop;
}

export const DEFAULT_TITLE = '✦ FIREWORKS ✦';
export const DEFAULT_SUBTITLE = 'space: launch a rocket · q: quit';

export function runFireworksShow(terminal: ShowTerminal, options: FireworksOptions = {}): FireworksController {
  const keys = createQueuedKeySource();
  const dataListener = terminal.onData(data => keys.push(data));

  const loop = createAnimationLoop(
    {
      output: terminal,
      keys,
      size: createSizeSource(terminal),
      guard: createTerminalGuard(terminal, options.rawMode),
      clock: options.clock,
    },
    {
      title: options.title ?? DEFAULT_TITLE,
      subtitle: options.subtitle ?? DEFAULT_SUBTITLE,
      theme: getShowTheme(options.theme ?? 'cyan'),
      random: createRandom(options.seed),
      fps: options.fps ?? DEFAULT_FPS,
      plain: options.plain,
      fixedStep: options.seed !== undefined,
    },
  );

  const finished = loop.run().finally(() => dataListener.dispose());

  return {
    stop: (reason?: StopReason) => loop.requestStop(reason),
    get isRunning() {
      return loop.state === 'running';
    },
    finished,
    loop,
  };
}
