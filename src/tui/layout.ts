export interface TerminalSize {
  width: number;
  height: number;
}

export interface GridLayout {
  columns: number;
  columnWidth: number;
  visibleRows: number;
}

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { width: 80, height: 24 };

// "[x] " in front of every item.
export const CELL_PADDING = 4;
// Two header lines, the footer, and one spare line on either side of the grid.
export const RESERVED_ROWS = 5;
const HORIZONTAL_MARGIN = 2;

function isUsableDimension(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

export function normalizeTerminalSize(size: Partial<TerminalSize> | null | undefined): TerminalSize {
  const width = size?.width;
  const height = size?.height;
  return {
    width: isUsableDimension(width) ? Math.floor(width) : DEFAULT_TERMINAL_SIZE.width,
    height: isUsableDimension(height) ? Math.floor(height) : DEFAULT_TERMINAL_SIZE.height,
  };
}

export function computeGridLayout(params: {
  size: TerminalSize;
  maxItemWidth: number;
  itemCount: number;
}): GridLayout {
  const columnWidth = Math.max(0, params.maxItemWidth) + CELL_PADDING;
  const usableWidth = Math.max(0, params.size.width - HORIZONTAL_MARGIN);
  const fit = Math.max(1, Math.floor(usableWidth / columnWidth));
  const columns = Math.min(fit, Math.max(1, params.itemCount));
  const visibleRows = Math.max(1, params.size.height - RESERVED_ROWS);
  return { columns, columnWidth, visibleRows };
}

export function getPageCapacity(layout: GridLayout): number {
  return Math.max(1, layout.columns) * Math.max(1, layout.visibleRows);
}
