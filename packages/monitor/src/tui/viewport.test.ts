import { describe, expect, it } from 'vitest';
import { applyScroll, gridDimensions, maxScroll, visibleRange } from './viewport.js';

const grid = { cols: 2, rows: 2 };

describe('gridDimensions', () => {
  it('reserves room for the chrome', () => {
    expect(gridDimensions(80, 24)).toEqual({ cols: 76, rows: 17 });
  });

  it('never drops below one cell', () => {
    expect(gridDimensions(3, 5)).toEqual({ cols: 1, rows: 1 });
  });
});

describe('visibleRange', () => {
  it('is empty without samples', () => {
    expect(visibleRange(0, grid, 0)).toBeUndefined();
  });

  it('shows the newest page by default', () => {
    expect(visibleRange(10, grid, 0)).toEqual({ start: 6, end: 9 });
  });

  it('moves back by the scroll offset', () => {
    expect(visibleRange(10, grid, 3)).toEqual({ start: 3, end: 6 });
    expect(visibleRange(10, grid, 6)).toEqual({ start: 0, end: 3 });
  });

  it('shows everything when it fits', () => {
    expect(maxScroll(3, grid)).toBe(0);
    expect(visibleRange(3, grid, 0)).toEqual({ start: 0, end: 2 });
  });
});

describe('applyScroll', () => {
  it('steps by rows and pages within bounds', () => {
    expect(applyScroll('up', 0, 10, grid)).toBe(2);
    expect(applyScroll('up', 5, 10, grid)).toBe(6);
    expect(applyScroll('down', 1, 10, grid)).toBe(0);
    expect(applyScroll('pageUp', 0, 10, grid)).toBe(4);
    expect(applyScroll('pageDown', 6, 10, grid)).toBe(2);
  });

  it('jumps to either end', () => {
    expect(applyScroll('oldest', 0, 10, grid)).toBe(6);
    expect(applyScroll('newest', 6, 10, grid)).toBe(0);
  });

  it('stays put when everything fits', () => {
    expect(applyScroll('up', 0, 3, grid)).toBe(0);
  });
});
