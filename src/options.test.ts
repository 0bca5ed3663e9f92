import { describe, it, expect } from 'vitest';
import { DEFAULT_CLI_OPTIONS, parseCliArgs } from './options';

describe('parseCliArgs', () => {
  it('returns defaults with no arguments', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, options: DEFAULT_CLI_OPTIONS });
    expect(DEFAULT_CLI_OPTIONS.fps).toBe(60);
    expect(DEFAULT_CLI_OPTIONS.theme).toBe('cyan');
  });

  it('reads every value flag', () => {
    const result = parseCliArgs([
      '--theme', 'amber',
      '--seed', '42',
      '--fps', '30',
      '--title', 'HAPPY NEW YEAR',
      '--subtitle', 'enjoy',
      '--plain',
    ]);
    expect(result).toEqual({
      ok: true,
      options: {
        ...DEFAULT_CLI_OPTIONS,
        theme: 'amber',
        seed: 42,
        fps: 30,
        title: 'HAPPY NEW YEAR',
        subtitle: 'enjoy',
        plain: true,
      },
    });
  });

  it('reads the mode flags', () => {
    const result = parseCliArgs(['-h', '--list-themes', '--pick-theme']);
    expect(result.ok && result.options.help).toBe(true);
    expect(result.ok && result.options.listThemes).toBe(true);
    expect(result.ok && result.options.pickTheme).toBe(true);
  });

  it('accepts seeds across the 32-bit range', () => {
    const low = parseCliArgs(['--seed', '0']);
    const high = parseCliArgs(['--seed', '4294967295']);
    expect(low.ok && low.options.seed).toBe(0);
    expect(high.ok && high.options.seed).toBe(4294967295);
  });

  it('rejects seeds outside the 32-bit range', () => {
    const error = '--seed needs an integer between 0 and 4294967295';
    expect(parseCliArgs(['--seed', '4294967338'])).toEqual({ ok: false, error });
    expect(parseCliArgs(['--seed', '-7'])).toEqual({ ok: false, error });
  });

  it('rejects an unknown theme', () => {
    expect(parseCliArgs(['--theme', 'plaid'])).toEqual({
      ok: false,
      error: 'Unknown theme: plaid (available: cyan, amber, green, hotpink, ice, tron, kawaii, oled)',
    });
  });

  it('rejects a flag missing its value', () => {
    expect(parseCliArgs(['--theme'])).toEqual({ ok: false, error: '--theme needs a value' });
    expect(parseCliArgs(['--title', '--plain'])).toEqual({ ok: false, error: '--title needs a value' });
  });

  it('rejects bad numbers', () => {
    const seedError = '--seed needs an integer between 0 and 4294967295';
    expect(parseCliArgs(['--seed', '1.5'])).toEqual({ ok: false, error: seedError });
    expect(parseCliArgs(['--seed'])).toEqual({ ok: false, error: seedError });
    expect(parseCliArgs(['--fps', '0'])).toEqual({ ok: false, error: '--fps needs a number between 1 and 240' });
    expect(parseCliArgs(['--fps', 'fast'])).toEqual({ ok: false, error: '--fps needs a number between 1 and 240' });
  });

  it('rejects unknown options', () => {
    expect(parseCliArgs(['--loud'])).toEqual({ ok: false, error: 'Unknown option: --loud' });
  });
});
