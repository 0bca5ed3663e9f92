import { describe, it, expect } from 'vitest';
import {
  NEAR_PLANE,
  createStars,
  projectStar,
  resetStar,
  starBrightness,
  starCountFor,
  starGlyph,
  stepStars,
  type Star,
} from './starField';
import { mulberry32 } from '../shared/random';

describe('createStars', () => {
  it('spreads stars over the documented ranges', () => {
    const stars = createStars(200, 80, 24, mulberry32(1));
    expect(stars).toHaveLength(200);
    for (const star of stars) {
      expect(Math.abs(star.x)).toBeLessThanOrEqual(80);
      expect(Math.abs(star.y)).toBeLessThanOrEqual(24);
      expect(star.z).toBeGreaterThanOrEqual(0.2);
      expect(star.z).toBeLessThanOrEqual(1);
      expect(Math.abs(star.vx)).toBeLessThanOrEqual(0.05);
      expect(Math.abs(star.vy)).toBeLessThanOrEqual(0.03);
    }
  });
});

describe('stepStars', () => {
  it('moves a star closer and drifts it', () => {
    const star: Star = { x: 1, y: 1, z: 0.5, vx: 0.01, vy: -0.02 };
    stepStars([star], 0.1, 80, 24, mulberry32(1));
    expect(star.z).toBeCloseTo(0.4);
    expect(star.x).toBeCloseTo(1.01);
    expect(star.y).toBeCloseTo(0.98);
  });

  it('respawns a star that reaches the near plane', () => {
    const star: Star = { x: 5, y: 5, z: 0.04, vx: 0, vy: 0 };
    stepStars([star], 0.02, 80, 24, mulberry32(3));
    expect(star.z).toBeGreaterThanOrEqual(0.2);
  });

  it('keeps every depth inside (near plane, 1] over many steps', () => {
    const random = mulberry32(11);
    const stars = createStars(150, 60, 20, random);
    for (let step = 0; step < 500; step++) {
      stepStars(stars, 0.012 + (step % 7) * 0.01, 60, 20, random);
      for (const star of stars) {
        expect(star.z).toBeGreaterThan(NEAR_PLANE);
        expect(star.z).toBeLessThanOrEqual(1);
      }
    }
  });

  it('never pushes a star beyond depth 1', () => {
    const star: Star = { x: 0, y: 0, z: 0.95, vx: 0, vy: 0 };
    stepStars([star], -0.5, 80, 24, mulberry32(1));
    expect(star.z).toBe(1);
  });
});

describe('resetStar', () => {
  it('reuses the same star object', () => {
    const star: Star = { x: 0, y: 0, z: 0.01, vx: 0, vy: 0 };
    const stars = [star];
    resetStar(star, 10, 10, () => 0.5);
    expect(stars[0]).toBe(star);
    expect(star.x).toBeCloseTo(0);
    expect(star.y).toBeCloseTo(0);
    expect(star.z).toBeCloseTo(0.6);
    expect(star.vx).toBeCloseTo(0);
    expect(star.vy).toBeCloseTo(0);
  });
});

describe('projectStar', () => {
  it('divides by depth with separate horizontal and vertical scales', () => {
    const star: Star = { x: 10, y: 5, z: 0.5, vx: 0, vy: 0 };
    // x: 40 + 20 * 0.10 = 42, y: 12 + 10 * 0.06 = 12.6
    expect(projectStar(star, 40, 12)).toEqual({ x: 42, y: 13 });
  });
});

describe('starBrightness', () => {
  it('is dim far away and bright up close', () => {
    expect(starBrightness({ x: 0, y: 0, z: 1, vx: 0, vy: 0 })).toBe(60);
    expect(starBrightness({ x: 0, y: 0, z: 0.02, vx: 0, vy: 0 })).toBeCloseTo(251.1);
  });
});

describe('starGlyph', () => {
  it('uses four brightness tiers', () => {
    expect(starGlyph(211)).toBe('✦');
    expect(starGlyph(210)).toBe('*');
    expect(starGlyph(171)).toBe('*');
    expect(starGlyph(170)).toBe('•');
    expect(starGlyph(121)).toBe('•');
    expect(starGlyph(120)).toBe('·');
    expect(starGlyph(60)).toBe('·');
  });
});

describe('starCountFor', () => {
  it('never drops below 80 stars', () => {
    expect(starCountFor(80, 24)).toBe(80);
  });

  it('scales with area', () => {
    expect(starCountFor(200, 60)).toBe(342);
  });
});
