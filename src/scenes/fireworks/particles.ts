/**
 * Firework Particles
 *
 * Rockets rise, slow down under gravity and drag, and burst on their last
 * live tick into two cohorts: a fast saturated burst and a slow pastel
 * glitter. Colors fade quadratically to black as life runs out.
 */

import {
  type RgbColor,
  fadeColor,
  fromRgb,
  jitterColor,
  pastel,
  rgb,
} from '../shared/color';
import { type Random, pick, randomInt, uniform } from '../shared/random';
import { FIREWORK_PALETTE } from '../../themes';

// ============================================================================
// TYPES
// ============================================================================

export type ParticleKind = 'rocket' | 'fragment';

export interface Particle {
  kind: ParticleKind;
  x: number;
  y: number;
  vx: number;
  vy: number;
  /** Remaining ticks; the particle is gone the step this reaches 0 */
  life: number;
  maxLife: number;
  /** Base color before fading */
  color: RgbColor;
  char: string;
  gravity: number;
  drag: number;
}

export interface Explosion {
  x: number;
  y: number;
  color: RgbColor;
  burst: number;
  glitter: number;
}

export interface StepResult {
  particles: Particle[];
  explosions: Explosion[];
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const ROCKET_CHAR = '|';
export const ROCKET_COLOR = rgb(210, 210, 210);

/** Glyphs for the burst cohort */
export const SPARKLE_CHARS = ['✦', '✧', '*', '+', '•'] as const;
export const GLITTER_CHAR = '·';

const ROCKET = {
  life: [18, 28],
  gravity: 0.09,
  drag: 0.995,
} as const;

const BURST = {
  count: [70, 130],
  speed: [0.4, 2.6],
  life: [18, 40],
  gravity: 0.10,
  drag: 0.990,
} as const;

const GLITTER = {
  count: [40, 70],
  speed: [0.15, 1.2],
  life: [35, 65],
  gravity: 0.06,
  drag: 0.993,
} as const;

const COLOR_JITTER = 25;

// ============================================================================
// SPAWNING
// ============================================================================

/**
 * Launch one rocket from the lower part of a width x height viewport.
 */
export function spawnRocket(particles: Particle[], width: number, height: number, random: Random): Particle {
  const life = randomInt(random, ROCKET.life[0], ROCKET.life[1]);
  const rocket: Particle = {
    kind: 'rocket',
    x: uniform(random, 0.2 * width, 0.8 * width),
    y: uniform(random, 0.65 * height, 0.90 * height),
    vx: uniform(random, -0.25, 0.25),
    vy: uniform(random, -2.6, -2.0),
    life,
    maxLife: life,
    color: ROCKET_COLOR,
    char: ROCKET_CHAR,
    gravity: ROCKET.gravity,
    drag: ROCKET.drag,
  };
  particles.push(rocket);
  return rocket;
}

function spawnCohort(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  profile: { speed: readonly [number, number]; life: readonly [number, number]; gravity: number; drag: number },
  color: RgbColor,
  glyph: () => string,
  random: Random,
): void {
  for (let i = 0; i < count; i++) {
    const angle = uniform(random, 0, Math.PI * 2);
    const speed = uniform(random, profile.speed[0], profile.speed[1]);
    const life = randomInt(random, profile.life[0], profile.life[1]);
    particles.push({
      kind: 'fragment',
      x,
      y,
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed,
      life,
      maxLife: life,
      color,
      char: glyph(),
      gravity: profile.gravity,
      drag: profile.drag,
    });
  }
}

/**
 * Burst at (x, y): one saturated cohort plus one pastel glitter cohort
 * sharing a palette color.
 */
export function explode(particles: Particle[], x: number, y: number, random: Random): Explosion {
  const base = fromRgb(pick(random, FIREWORK_PALETTE));
  const color = jitterColor(base, () => randomInt(random, -COLOR_JITTER, COLOR_JITTER));
  const glitterColor = pastel(color);

  const burst = randomInt(random, BURST.count[0], BURST.count[1]);
  spawnCohort(particles, x, y, burst, BURST, color, () => pick(random, SPARKLE_CHARS), random);

  const glitter = randomInt(random, GLITTER.count[0], GLITTER.count[1]);
  spawnCohort(particles, x, y, glitter, GLITTER, glitterColor, () => GLITTER_CHAR, random);

  return { x, y, color, burst, glitter };
}

// ============================================================================
// SIMULATION
// ============================================================================

/**
 * Rockets burst on the last tick they are alive.
 */
function isLastLiveTick(particle: Particle): boolean {
  return particle.life === 1;
}

/**
 * Advance every particle by one tick and return the next live set.
 * Fragments born this tick are appended after the survivors and first move
 * on the following step.
 */
export function stepParticles(particles: readonly Particle[], random: Random): StepResult {
  const next: Particle[] = [];
  const spawned: Particle[] = [];
  const explosions: Explosion[] = [];

  for (const p of particles) {
    p.vx *= p.drag;
    p.vy = p.vy * p.drag + p.gravity;
    p.x += p.vx;
    p.y += p.vy;
    p.life -= 1;

    if (p.kind === 'rocket' && isLastLiveTick(p)) {
      explosions.push(explode(spawned, p.x, p.y, random));
    }
    if (p.life > 0) next.push(p);
  }

  for (const p of spawned) next.push(p);
  return { particles: next, explosions };
}

/**
 * The color a particle is drawn with this frame.
 */
export function particleColor(particle: Particle): RgbColor {
  return fadeColor(particle.color, particle.life, particle.maxLife);
}
