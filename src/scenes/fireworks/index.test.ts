import { describe, it, expect, vi } from 'vitest';
import { runFireworksShow } from './index';
import { ALT_SCREEN_OFF, ALT_SCREEN_ON } from '../utils';

function fakeTerminal() {
  const writes: string[] = [];
  let listener: ((data: string) => void) | null = null;
  const dispose = vi.fn(() => {
    listener = null;
  });

  return {
    writes,
    dispose,
    type: (data: string) => listener?.(data),
    terminal: {
      cols: 40,
      rows: 20,
      write: (data: string | Uint8Array) => {
        writes.push(typeof data === 'string' ? data : '');
      },
      onData: (callback: (data: string) => void) => {
        listener = callback;
        return { dispose };
      },
    },
  };
}

describe('runFireworksShow', () => {
  it('takes over the screen and hands it back on stop', async () => {
    const { terminal, writes, dispose } = fakeTerminal();
    const show = runFireworksShow(terminal, {
      seed: 1,
      clock: { now: () => 0, sleep: () => new Promise<void>(() => {}) },
    });

    expect(show.isRunning).toBe(true);
    expect(writes[0].startsWith(ALT_SCREEN_ON)).toBe(true);

    show.stop();
    await show.finished;

    expect(show.isRunning).toBe(false);
    expect(show.loop.stopReason).toBe('stopped');
    expect(writes[writes.length - 1].endsWith(ALT_SCREEN_OFF)).toBe(true);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('quits on q typed into the terminal', async () => {
    const { terminal, type } = fakeTerminal();
    const show = runFireworksShow(terminal, {
      seed: 1,
      clock: { now: () => 0, sleep: () => new Promise<void>(resolve => setTimeout(resolve, 0)) },
    });

    type('q');
    await show.finished;
    expect(show.loop.stopReason).toBe('quit-key');
    expect(show.loop.frame).toBe(1);
  });

  it('replays the same show for the same seed', () => {
    const frames = [1, 2].map(() => {
      const { terminal, type } = fakeTerminal();
      const show = runFireworksShow(terminal, {
        seed: 99,
        clock: { now: () => 0, sleep: () => new Promise<void>(() => {}) },
      });
      type(' ');
      for (let i = 0; i < 30; i++) show.loop.tick();
      show.stop();
      return show.loop.buffer.render();
    });
    expect(frames[0]).toEqual(frames[1]);
  });

  it('replays a seeded show at any real frame rate', () => {
    const shows = [16.7, 17.3].map(step => {
      let t = 0;
      const { terminal, type } = fakeTerminal();
      const show = runFireworksShow(terminal, {
        seed: 42,
        clock: { now: () => (t += step), sleep: () => new Promise<void>(() => {}) },
      });
      type(' ');
      for (let i = 0; i < 240; i++) show.loop.tick();
      show.stop();
      return show.loop;
    });
    const [a, b] = shows;

    expect(a.frame).toBe(241);
    expect(a.scene.particles).toEqual(b.scene.particles);
    expect(a.scene.stars).toEqual(b.scene.stars);

    // everything above the FPS footer matches cell for cell
    const cells = (loop: typeof a) =>
      Array.from({ length: loop.buffer.height - 1 }, (_, y) =>
        Array.from({ length: loop.buffer.width }, (_, x) => loop.buffer.get(x, y)),
      );
    expect(cells(a)).toEqual(cells(b));
  });

  it('draws the title and subtitle it was given', () => {
    const { terminal } = fakeTerminal();
    const show = runFireworksShow(terminal, {
      title: 'HELLO',
      subtitle: 'world',
      plain: true,
      clock: { now: () => 0, sleep: () => new Promise<void>(() => {}) },
    });
    show.stop();
    const textAt = (x: number, y: number, length: number) =>
      Array.from({ length }, (_, i) => show.loop.buffer.get(x + i, y)?.char ?? '').join('');
    // 40x20 terminal: title row 8, subtitle row 10, both centered at x 17
    expect(textAt(17, 8, 5)).toBe('HELLO');
    expect(textAt(17, 10, 5)).toBe('world');
  });
});
