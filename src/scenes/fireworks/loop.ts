/**
 * Animation Loop
 *
 * Owns the frame clock. Each frame: poll one key, follow terminal resizes,
 * auto-fire rockets, compose the scene, write the diff, then sleep off the
 * rest of the frame budget. States run running -> stopping -> stopped.
 */

import { FrameBuffer, toAnsi } from '../shared/frameBuffer';
import { type Random, chance, uniform } from '../shared/random';
import type { ShowTheme } from '../../themes';
import {
  CLEAR_SCREEN,
  CURSOR_HOME,
  type KeySource,
  type OutputTerminal,
  type SizeSource,
  type TerminalGuard,
  type TerminalSize,
  sleep,
} from '../utils';
import { type FrameReport, type Scene, type SceneText, composeFrame, createScene, reseedStars } from './scene';
import { spawnRocket } from './particles';

// ============================================================================
// TYPES
// ============================================================================

export type LoopState = 'running' | 'stopping' | 'stopped';

export type StopReason = 'quit-key' | 'signal' | 'stopped';

export interface Clock {
  /** Milliseconds, monotonic */
  now: () => number;
  /** Resolves after ms, or as soon as signal aborts */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface AnimationLoopDeps {
  output: OutputTerminal;
  keys: KeySource;
  size: SizeSource;
  guard: TerminalGuard;
  clock?: Clock;
}

export interface AnimationLoopOptions extends SceneText {
  theme: ShowTheme;
  random: Random;
  fps?: number;
  plain?: boolean;
  /**
   * Advance the simulation by 1/fps per frame instead of by wall-clock time,
   * so a seeded show replays identically at any real frame rate.
   */
  fixedStep?: boolean;
}

export interface AnimationLoop {
  readonly state: LoopState;
  readonly stopReason: StopReason | null;
  readonly frame: number;
  readonly fps: number;
  readonly buffer: FrameBuffer;
  readonly scene: Scene;
  /** Acquire the terminal, run frames until stopped, release the terminal */
  run: () => Promise<void>;
  /** One frame without the trailing sleep. Null when the frame was skipped. */
  tick: () => FrameReport | null;
  handleKey: (key: string) => void;
  requestStop: (reason?: StopReason) => void;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_FPS = 60;

const QUIT_KEYS = new Set(['q', '\x03']);
const LAUNCH_KEY = ' ';

const AUTO_FIRE_CHANCE = 0.55;
const AUTO_FIRE_DELAY = [0.6, 1.6] as const;
const FIRST_AUTO_FIRE = 0.5;

const FPS_SMOOTHING = 0.1;

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};

// ============================================================================
// LOOP
// ============================================================================

export function createAnimationLoop(deps: AnimationLoopDeps, options: AnimationLoopOptions): AnimationLoop {
  const { output, keys, size, guard } = deps;
  const clock = deps.clock ?? systemClock;
  const { random } = options;
  const targetFps = options.fps ?? DEFAULT_FPS;
  const framePeriod = 1000 / targetFps;

  let state: LoopState = 'running';
  let stopReason: StopReason | null = null;
  let started = false;

  let lastSize: TerminalSize = size.size();
  const buffer = new FrameBuffer(lastSize.cols, lastSize.rows);
  const scene = createScene(
    buffer.width,
    buffer.height,
    { title: options.title, subtitle: options.subtitle },
    options.theme,
    random,
  );

  const startedAt = clock.now();
  let frame = 0;
  let fps = targetFps;
  let lastFrameAt: number | null = null;
  let pendingLaunches = 0;
  let pendingClear = false;
  let nextAutoFire = FIRST_AUTO_FIRE;
  let wakeSleeper: (() => void) | null = null;

  function requestStop(reason: StopReason = 'stopped'): void {
    if (state !== 'running') return;
    state = 'stopping';
    stopReason = reason;
    wakeSleeper?.();
  }

  function handleKey(key: string): void {
    if (QUIT_KEYS.has(key.toLowerCase())) {
      requestStop('quit-key');
      return;
    }
    if (key === LAUNCH_KEY) pendingLaunches++;
  }

  function pollKey(): string | null {
    try {
      return keys.poll();
    } catch {
      // An unavailable input source means no key this frame
      return null;
    }
  }

  function followResize(): void {
    const current = size.size();
    if (current.cols === lastSize.cols && current.rows === lastSize.rows) return;
    lastSize = current;
    buffer.resize(current.cols, current.rows);
    reseedStars(scene, buffer.width, buffer.height);
    pendingClear = true;
  }

  function launchRockets(elapsed: number): void {
    for (; pendingLaunches > 0; pendingLaunches--) {
      spawnRocket(scene.particles, buffer.width, buffer.height, random);
    }
    if (elapsed >= nextAutoFire) {
      if (chance(random, AUTO_FIRE_CHANCE)) {
        spawnRocket(scene.particles, buffer.width, buffer.height, random);
      }
      nextAutoFire = elapsed + uniform(random, AUTO_FIRE_DELAY[0], AUTO_FIRE_DELAY[1]);
    }
  }

  function measureFps(now: number): void {
    if (lastFrameAt !== null && now > lastFrameAt) {
      const instant = 1000 / (now - lastFrameAt);
      fps = fps + (instant - fps) * FPS_SMOOTHING;
    }
    lastFrameAt = now;
  }

  function tick(): FrameReport | null {
    if (state !== 'running') return null;

    const key = pollKey();
    if (key !== null) handleKey(key);
    if (state !== 'running') return null;

    const now = clock.now();
    measureFps(now);
    const elapsed = options.fixedStep ? frame / targetFps : (now - startedAt) / 1000;

    followResize();
    launchRockets(elapsed);

    const report = composeFrame(buffer, scene, { time: elapsed, frame, fps });
    const prefix = pendingClear ? CLEAR_SCREEN + CURSOR_HOME : CURSOR_HOME;
    pendingClear = false;
    output.write(prefix + toAnsi(buffer.render(), { plain: options.plain }));
    frame++;
    return report;
  }

  /**
   * Sleep that ends early when a stop is requested.
   */
  function pause(ms: number): Promise<void> {
    const abort = new AbortController();
    return new Promise<void>((resolve, reject) => {
      wakeSleeper = () => {
        abort.abort();
        resolve();
      };
      clock.sleep(ms, abort.signal).then(resolve, reject);
    }).finally(() => {
      wakeSleeper = null;
    });
  }

  async function run(): Promise<void> {
    if (started) throw new Error('Animation loop can only run once');
    started = true;

    try {
      guard.acquire();
      while (state === 'running') {
        const frameStart = clock.now();
        tick();
        if (state !== 'running') break;
        const spent = clock.now() - frameStart;
        await pause(Math.max(0, framePeriod - spent));
      }
    } finally {
      state = 'stopped';
      guard.release();
    }
  }

  return {
    get state() { return state; },
    get stopReason() { return stopReason; },
    get frame() { return frame; },
    get fps() { return fps; },
    buffer,
    scene,
    run,
    tick,
    handleKey,
    requestStop,
  };
}
