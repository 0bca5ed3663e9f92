/**
 * Star Field
 *
 * Points in viewport-centered space flying toward the viewer. Depth shrinks
 * every step; a star that reaches the near plane is respawned in place, so
 * the field never runs dry.
 */

import { type RgbColor, rgb } from '../shared/color';
import { type Random, uniform } from '../shared/random';

export interface Star {
  x: number;
  y: number;
  /** Depth in (NEAR_PLANE, 1] */
  z: number;
  vx: number;
  vy: number;
}

export const NEAR_PLANE = 0.02;
const SPAWN_MIN_DEPTH = 0.2;
const DRIFT_X = 0.05;
const DRIFT_Y = 0.03;

// Terminal cells are roughly twice as tall as wide
const PROJECT_SCALE_X = 0.10;
const PROJECT_SCALE_Y = 0.06;

const MIN_STARS = 80;
const CELLS_PER_STAR = 35;

/**
 * How many stars a width x height viewport gets.
 */
export function starCountFor(width: number, height: number): number {
  return Math.max(MIN_STARS, Math.floor((width * height) / CELLS_PER_STAR));
}

/**
 * Give a star a fresh position, depth and drift.
 */
export function resetStar(star: Star, width: number, height: number, random: Random): void {
  star.x = uniform(random, -width, width);
  star.y = uniform(random, -height, height);
  star.z = uniform(random, SPAWN_MIN_DEPTH, 1.0);
  star.vx = uniform(random, -DRIFT_X, DRIFT_X);
  star.vy = uniform(random, -DRIFT_Y, DRIFT_Y);
}

export function createStars(count: number, width: number, height: number, random: Random): Star[] {
  const stars: Star[] = [];
  for (let i = 0; i < count; i++) {
    const star: Star = { x: 0, y: 0, z: 1, vx: 0, vy: 0 };
    resetStar(star, width, height, random);
    stars.push(star);
  }
  return stars;
}

/**
 * Advance every star: move closer by `speed`, drift, and recycle the ones
 * that crossed the near plane.
 */
export function stepStars(stars: Star[], speed: number, width: number, height: number, random: Random): void {
  for (const star of stars) {
    star.z = Math.min(1, star.z - speed);
    star.x += star.vx;
    star.y += star.vy;
    if (!(star.z > NEAR_PLANE)) {
      resetStar(star, width, height, random);
    }
  }
}

/**
 * Perspective divide onto integer screen coordinates.
 */
export function projectStar(star: Star, centerX: number, centerY: number): { x: number; y: number } {
  return {
    x: Math.round(centerX + (star.x / star.z) * PROJECT_SCALE_X),
    y: Math.round(centerY + (star.y / star.z) * PROJECT_SCALE_Y),
  };
}

/** 60 far away, 255 at the near plane */
export function starBrightness(star: Star): number {
  return Math.max(60, Math.min(255, 60 + (1 - star.z) * 195));
}

export function starGlyph(brightness: number): string {
  if (brightness > 210) return '✦';
  if (brightness > 170) return '*';
  if (brightness > 120) return '•';
  return '·';
}

/** Cool white, a touch of blue on the dim end */
export function starColor(brightness: number): RgbColor {
  return rgb(brightness, brightness, brightness + 25);
}
