/**
 * Fireworks Scene
 *
 * Per-frame composition: background tint, breathing star field, particles
 * with cheap motion blur, title overlay, and a stats footer.
 */

import {
  type RgbColor,
  fromRgb,
  mixColor,
  rgb,
  scaleColor,
} from '../shared/color';
import type { FrameBuffer } from '../shared/frameBuffer';
import { type Random, chance } from '../shared/random';
import type { ShowTheme } from '../../themes';
import {
  type Star,
  createStars,
  projectStar,
  starBrightness,
  starColor,
  starCountFor,
  starGlyph,
  stepStars,
} from './starField';
import { type Explosion, type Particle, particleColor, stepParticles } from './particles';

// ============================================================================
// TYPES
// ============================================================================

export interface SceneText {
  title: string;
  subtitle: string;
}

export interface Scene extends SceneText {
  random: Random;
  theme: ShowTheme;
  stars: Star[];
  particles: Particle[];
}

export interface FrameInfo {
  /** Seconds since the show started */
  time: number;
  frame: number;
  fps: number;
}

export interface FrameReport {
  explosions: Explosion[];
  particleCount: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const BACKGROUND_DENSITY = 0.005;
const BACKGROUND_CHAR = '.';

const TRAIL_CHANCE = 0.25;
const TRAIL_CHAR = '·';

const SHIMMER_PERIOD = 120;
const SHIMMER_BAND = 4;

const UNDERLINE_CHAR = '─';

// ============================================================================
// SETUP
// ============================================================================

export function createScene(width: number, height: number, text: SceneText, theme: ShowTheme, random: Random): Scene {
  return {
    ...text,
    random,
    theme,
    stars: createStars(starCountFor(width, height), width, height, random),
    particles: [],
  };
}

/**
 * Replace the star field after a resize.
 */
export function reseedStars(scene: Scene, width: number, height: number): void {
  scene.stars = createStars(starCountFor(width, height), width, height, scene.random);
}

/**
 * Star speed breathes between 0.012 and 0.022 instead of scrolling flat.
 */
export function starSpeedAt(time: number): number {
  return 0.012 + 0.010 * (0.5 + 0.5 * Math.sin(time * 0.8));
}

// ============================================================================
// LAYERS
// ============================================================================

/**
 * Sparse bluish dots in the top quarter, shaded by two drifting waves.
 */
export function drawBackground(buffer: FrameBuffer, time: number, random: Random): void {
  const rows = Math.floor(buffer.height / 4);
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < buffer.width; x++) {
      if (!chance(random, BACKGROUND_DENSITY)) continue;
      const shade = 0.5
        + 0.25 * Math.sin(x * 0.15 + time * 0.7)
        + 0.25 * Math.sin(y * 0.35 - time * 1.1 + 1.3);
      buffer.put(x, y, BACKGROUND_CHAR, rgb(20 + 25 * shade, 30 + 35 * shade, 70 + 70 * shade));
    }
  }
}

export function drawStars(buffer: FrameBuffer, stars: readonly Star[]): void {
  const cx = buffer.width / 2;
  const cy = buffer.height / 2;
  for (const star of stars) {
    const { x, y } = projectStar(star, cx, cy);
    const brightness = starBrightness(star);
    buffer.put(x, y, starGlyph(brightness), starColor(brightness));
  }
}

/**
 * Each particle at its rounded position, plus a random half-intensity dot
 * on either side. The trail is decoration only and never touches state.
 */
export function drawParticles(buffer: FrameBuffer, particles: readonly Particle[], random: Random): void {
  for (const p of particles) {
    const x = Math.round(p.x);
    const y = Math.round(p.y);
    const color = particleColor(p);
    const trail = scaleColor(color, 0.5);

    if (chance(random, TRAIL_CHANCE)) buffer.put(x - 1, y, TRAIL_CHAR, trail);
    if (chance(random, TRAIL_CHANCE)) buffer.put(x + 1, y, TRAIL_CHAR, trail);
    buffer.put(x, y, p.char, color);
  }
}

/**
 * Centered title with a highlight sweeping left to right every
 * SHIMMER_PERIOD frames, an underline with a traveling two-color wave, and
 * the subtitle.
 */
export function drawOverlay(buffer: FrameBuffer, scene: Scene, frame: number): void {
  const { theme } = scene;
  const title = Array.from(scene.title);
  const subtitle = Array.from(scene.subtitle);

  const titleY = Math.max(1, Math.floor(buffer.height / 2) - 2);
  const titleX = Math.floor((buffer.width - title.length) / 2);

  const base = fromRgb(theme.title);
  const highlight = fromRgb(theme.highlight);
  const progress = (((frame % SHIMMER_PERIOD) + SHIMMER_PERIOD) % SHIMMER_PERIOD) / SHIMMER_PERIOD;
  const sweep = -SHIMMER_BAND + progress * (title.length + SHIMMER_BAND * 2);

  title.forEach((char, i) => {
    const glow = Math.max(0, 1 - Math.abs(i - sweep) / SHIMMER_BAND);
    buffer.put(titleX + i, titleY, char, mixColor(base, highlight, glow));
  });

  const [lineA, lineB] = theme.underline.map(fromRgb);
  const lineX = titleX - 2;
  for (let i = 0; i < title.length + 4; i++) {
    const wave = Math.sin(i * 0.6 - frame * 0.2);
    buffer.put(lineX + i, titleY + 1, UNDERLINE_CHAR, wave > 0 ? lineA : lineB);
  }

  const subtitleX = Math.floor((buffer.width - subtitle.length) / 2);
  buffer.putText(subtitleX, titleY + 2, scene.subtitle, fromRgb(theme.subtitle));
}

export function formatFooter(fps: number, particleCount: number): string {
  return `FPS ${Math.round(fps)}  ·  ${particleCount} particles`;
}

export function drawFooter(buffer: FrameBuffer, fps: number, particleCount: number, color: RgbColor): void {
  buffer.putText(0, buffer.height - 1, formatFooter(fps, particleCount), color);
}

// ============================================================================
// FRAME
// ============================================================================

/**
 * Build one frame into `buffer`. Stars and particles advance by one step.
 */
export function composeFrame(buffer: FrameBuffer, scene: Scene, info: FrameInfo): FrameReport {
  buffer.clear();

  drawBackground(buffer, info.time, scene.random);

  stepStars(scene.stars, starSpeedAt(info.time), buffer.width, buffer.height, scene.random);
  drawStars(buffer, scene.stars);

  const { particles, explosions } = stepParticles(scene.particles, scene.random);
  scene.particles = particles;
  drawParticles(buffer, particles, scene.random);

  drawOverlay(buffer, scene, info.frame);
  drawFooter(buffer, info.fps, particles.length, fromRgb(scene.theme.footer));

  return { explosions, particleCount: particles.length };
}
