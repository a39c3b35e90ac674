import type { GridShape, Viewport } from "./types";

/**
 * Grid shape for a chamber count: up to 3 in one row, up to 6 in 3x2,
 * otherwise 4 columns and as many rows as needed.
 */
export function gridShape(count: number): GridShape {
  const n = Math.max(0, Math.floor(count));
  if (n === 0) return { cols: 0, rows: 0 };
  if (n <= 3) return { cols: n, rows: 1 };
  if (n <= 6) return { cols: 3, rows: 2 };
  return { cols: 4, rows: Math.ceil(n / 4) };
}

/**
 * Prefer a previously saved shape when it is usable for `count` chambers,
 * otherwise derive it from the count.
 */
export function resolveGridShape(count: number, saved?: Partial<GridShape> | null): GridShape {
  const cols = saved?.cols;
  const rows = saved?.rows;
  if (
    typeof cols === "number" &&
    typeof rows === "number" &&
    Number.isInteger(cols) &&
    Number.isInteger(rows) &&
    cols > 0 &&
    rows > 0 &&
    cols * rows >= count
  ) {
    return { cols, rows };
  }
  return gridShape(count);
}

/** Row-major viewports for `count` chambers over a `w` x `h` canvas. */
export function layoutViewports(count: number, w: number, h: number, shape: GridShape = gridShape(count)): Viewport[] {
  if (count <= 0 || shape.cols <= 0 || shape.rows <= 0) return [];
  const cellW = w / shape.cols;
  const cellH = h / shape.rows;
  const viewports: Viewport[] = [];
  for (let i = 0; i < count; i++) {
    const col = i % shape.cols;
    const row = Math.floor(i / shape.cols);
    viewports.push({ x: col * cellW, y: row * cellH, w: cellW, h: cellH, index: i, col, row });
  }
  return viewports;
}
