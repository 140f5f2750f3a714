import type { Sample, Stats } from '@pingscope/shared';
import { describe, expect, it } from 'vitest';
import { Channel } from '../runtime/channel.js';
import { Distributor } from '../runtime/distributor.js';
import { MetricsEngine } from '../runtime/engine.js';
import { type InputKey, HeatmapModel, actionForKey } from './model.js';

const NOW = new Date('2026-01-01T00:00:00Z');
const grid = { cols: 2, rows: 2 };

function sample(sequence: number): Sample {
  return { timestamp: NOW, sequence, rttMs: 10 + sequence, timeout: false };
}

function key(overrides: Partial<InputKey> = {}): InputKey {
  return { upArrow: false, downArrow: false, pageUp: false, pageDown: false, escape: false, ...overrides };
}

describe('actionForKey', () => {
  it.each([
    ['q', { type: 'quit' }],
    ['?', { type: 'toggleHelp' }],
    ['h', { type: 'toggleHelp' }],
    ['c', { type: 'clear' }],
    ['k', { type: 'scroll', action: 'up' }],
    ['j', { type: 'scroll', action: 'down' }],
    ['g', { type: 'scroll', action: 'oldest' }],
    ['G', { type: 'scroll', action: 'newest' }],
  ])('binds %s', (input, expected) => {
    expect(actionForKey(input, key())).toEqual(expected);
  });

  it('binds the special keys', () => {
    expect(actionForKey('', key({ upArrow: true }))).toEqual({ type: 'scroll', action: 'up' });
    expect(actionForKey('', key({ downArrow: true }))).toEqual({ type: 'scroll', action: 'down' });
    expect(actionForKey('', key({ pageUp: true }))).toEqual({ type: 'scroll', action: 'pageUp' });
    expect(actionForKey('', key({ pageDown: true }))).toEqual({ type: 'scroll', action: 'pageDown' });
    expect(actionForKey('', key({ escape: true }))).toEqual({ type: 'closeHelp' });
  });

  it('ignores unbound keys', () => {
    expect(actionForKey('x', key())).toBeUndefined();
  });
});

describe('HeatmapModel', () => {
  it('keeps only the configured history', () => {
    const model = new HeatmapModel(5);
    for (let i = 1; i <= 7; i++) model.pushSample(sample(i));
    expect(model.history.length).toBe(5);
    expect(model.history.get(0)?.sequence).toBe(3);
  });

  it('shows the newest page and scrolls back', () => {
    const model = new HeatmapModel(100);
    for (let i = 1; i <= 10; i++) model.pushSample(sample(i));

    expect(model.visibleSamples(grid).map((s) => s.sequence)).toEqual([7, 8, 9, 10]);
    model.apply({ type: 'scroll', action: 'oldest' }, grid);
    expect(model.visibleSamples(grid).map((s) => s.sequence)).toEqual([1, 2, 3, 4]);
    expect(model.canScrollUp(grid)).toBe(false);
    expect(model.canScrollDown()).toBe(true);
  });

  it('toggles and closes help', () => {
    const model = new HeatmapModel(10, true);
    model.apply({ type: 'toggleHelp' }, grid);
    expect(model.showHelp).toBe(false);
    model.apply({ type: 'toggleHelp' }, grid);
    model.apply({ type: 'closeHelp' }, grid);
    expect(model.showHelp).toBe(false);
  });

  it('reports quit', () => {
    expect(new HeatmapModel(10).apply({ type: 'quit' }, grid)).toBe(true);
  });

  it('clears the history and scroll position', () => {
    const model = new HeatmapModel(100);
    for (let i = 1; i <= 10; i++) model.pushSample(sample(i));
    model.apply({ type: 'scroll', action: 'up' }, grid);

    model.apply({ type: 'clear' }, grid);
    expect(model.history.length).toBe(0);
    expect(model.scroll).toBe(0);
    expect(model.status).toBe('Cleared');

    model.apply({ type: 'scroll', action: 'down' }, grid);
    expect(model.status).toBe('');
  });

  it('leaves engine totals intact when clearing history', () => {
    const engine = new MetricsEngine({ now: () => NOW });
    const distributor = new Distributor(new Channel<Sample>(1), engine, {
      samples: new Channel<Sample>(10),
      stats: new Channel<Stats>(10),
    });
    const model = new HeatmapModel(100);

    for (let i = 1; i <= 3; i++) {
      const s = sample(i);
      model.setStats(distributor.dispatch(s));
      model.pushSample(s);
    }
    model.apply({ type: 'clear' }, grid);

    expect(model.history.length).toBe(0);
    expect(engine.stats().totalSamples).toBe(3);
    expect(model.stats?.totalSamples).toBe(3);
  });

  it('pulls the scroll offset back after the grid grows', () => {
    const model = new HeatmapModel(100);
    for (let i = 1; i <= 10; i++) model.pushSample(sample(i));
    model.apply({ type: 'scroll', action: 'oldest' }, grid);

    const wide = { cols: 5, rows: 2 };
    expect(model.visibleSamples(wide).map((s) => s.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(model.scroll).toBe(6);

    model.fit(wide);
    expect(model.scroll).toBe(0);
    expect(model.canScrollDown()).toBe(false);
  });
});
