import { describe, expect, it } from 'vitest';
import {
  computeGridLayout,
  DEFAULT_TERMINAL_SIZE,
  getPageCapacity,
  normalizeTerminalSize,
} from '../../src/tui/layout.js';

describe('computeGridLayout', () => {
  it('fits as many columns as the width allows', () => {
    expect(
      computeGridLayout({ size: { width: 80, height: 24 }, maxItemWidth: 10, itemCount: 100 })
    ).toEqual({ columns: 5, columnWidth: 14, visibleRows: 19 });
  });

  it('never uses more columns than items', () => {
    const layout = computeGridLayout({ size: { width: 80, height: 24 }, maxItemWidth: 10, itemCount: 3 });
    expect(layout.columns).toBe(3);
  });

  it('keeps one column for an empty list', () => {
    const layout = computeGridLayout({ size: { width: 80, height: 24 }, maxItemWidth: 0, itemCount: 0 });
    expect(layout.columns).toBe(1);
    expect(layout.columnWidth).toBe(4);
  });

  it('keeps one column when a single item is wider than the terminal', () => {
    const layout = computeGridLayout({ size: { width: 10, height: 24 }, maxItemWidth: 20, itemCount: 5 });
    expect(layout.columns).toBe(1);
    expect(layout.columnWidth).toBe(24);
  });

  it('keeps at least one visible row on tiny terminals', () => {
    const layout = computeGridLayout({ size: { width: 80, height: 3 }, maxItemWidth: 4, itemCount: 10 });
    expect(layout.visibleRows).toBe(1);
  });
});

describe('normalizeTerminalSize', () => {
  it('falls back to 80x24 when the size is unknown', () => {
    expect(normalizeTerminalSize(null)).toEqual(DEFAULT_TERMINAL_SIZE);
    expect(normalizeTerminalSize(undefined)).toEqual({ width: 80, height: 24 });
  });

  it('replaces unusable dimensions one by one', () => {
    expect(normalizeTerminalSize({ width: 0, height: 40 })).toEqual({ width: 80, height: 40 });
    expect(normalizeTerminalSize({ width: 120, height: Number.NaN })).toEqual({ width: 120, height: 24 });
    expect(normalizeTerminalSize({ width: -5 })).toEqual({ width: 80, height: 24 });
  });

  it('floors fractional sizes', () => {
    expect(normalizeTerminalSize({ width: 100.7, height: 30.2 })).toEqual({ width: 100, height: 30 });
  });
});

describe('getPageCapacity', () => {
  it('is columns times visible rows', () => {
    expect(getPageCapacity({ columns: 4, columnWidth: 10, visibleRows: 6 })).toBe(24);
  });
});
