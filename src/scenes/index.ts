/**
 * terminal-fireworks scenes
 *
 * Usage:
 * 1. Run the show: runFireworksShow(terminal, { theme: 'amber' })
 * 2. Stop it: controller.stop(), then await controller.finished
 */

// Shared building blocks
export {
  DEFAULT_COLOR,
  WHITE,
  rgb,
  fromRgb,
  clampChannel,
  colorsEqual,
  scaleColor,
  fadeColor,
  pastel,
  mixColor,
  jitterColor,
} from './shared/color';

export type { Color, DefaultColor, RgbColor, Rgb } from './shared/color';

export {
  createRandom,
  mulberry32,
  uniform,
  randomInt,
  pick,
  chance,
} from './shared/random';

export type { Random } from './shared/random';

export {
  FrameBuffer,
  MIN_BUFFER_WIDTH,
  MIN_BUFFER_HEIGHT,
  toAnsi,
  sgrColor,
  countEscapes,
} from './shared/frameBuffer';

export type { Cell, DrawInstruction, AnsiOptions } from './shared/frameBuffer';

// Terminal glue
export {
  createTerminalGuard,
  createQueuedKeySource,
  createSizeSource,
  DEFAULT_TERMINAL_SIZE,
} from './utils';

export type {
  ShowTerminal,
  OutputTerminal,
  RawModeControl,
  TerminalGuard,
  KeySource,
  QueuedKeySource,
  SizeSource,
  TerminalSize,
} from './utils';

// Fireworks show
export {
  runFireworksShow,
  DEFAULT_TITLE,
  DEFAULT_SUBTITLE,
} from './fireworks';

export type { FireworksOptions, FireworksController } from './fireworks';

export { createAnimationLoop, systemClock, DEFAULT_FPS } from './fireworks/loop';

export type {
  AnimationLoop,
  AnimationLoopDeps,
  AnimationLoopOptions,
  Clock,
  LoopState,
  StopReason,
} from './fireworks/loop';

export { createScene, composeFrame, starSpeedAt } from './fireworks/scene';

export type { Scene, SceneText, FrameInfo, FrameReport } from './fireworks/scene';

export {
  createStars,
  stepStars,
  projectStar,
  starBrightness,
  starGlyph,
  starCountFor,
  NEAR_PLANE,
} from './fireworks/starField';

export type { Star } from './fireworks/starField';

export {
  spawnRocket,
  explode,
  stepParticles,
  particleColor,
  SPARKLE_CHARS,
  GLITTER_CHAR,
  ROCKET_CHAR,
} from './fireworks/particles';

export type { Particle, ParticleKind, Explosion, StepResult } from './fireworks/particles';
