export interface GridPoint {
  readonly x: number;
  readonly y: number;
}

export type GridPointKey = `${number},${number}`;

export function gridPointKey(point: GridPoint): GridPointKey {
  return `${point.x},${point.y}`;
}

export function gridPointsEqual(a: GridPoint | null, b: GridPoint | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.x === b.x && a.y === b.y;
}

export function offsetGridPoint(origin: GridPoint, dx: number, dy: number): GridPoint {
  return { x: origin.x + dx, y: origin.y + dy };
}

export function formatGridPoint(point: GridPoint | null): string {
  return point === null ? '(none)' : `(${point.x}, ${point.y})`;
}

/**
 * Collapses duplicate cells and orders the rest row-major (`y`, then `x`), so
 * two lists built from the same cells are equal element by element.
 */
export function toGridPointList(points: Iterable<GridPoint>): readonly GridPoint[] {
  const byKey = new Map<GridPointKey, GridPoint>();
  for (const point of points) {
    const key = gridPointKey(point);
    if (!byKey.has(key)) {
      byKey.set(key, { x: point.x, y: point.y });
    }
  }
  return [...byKey.values()].sort((a, b) => (a.y === b.y ? a.x - b.x : a.y - b.y));
}

export function gridPointListsEqual(a: readonly GridPoint[], b: readonly GridPoint[]): boolean {
  if (a === b) {
    return true;
  }
  if (a.length !== b.length) {
    return false;
  }
  return a.every((point, index) => {
    const other = b[index];
    return other !== undefined && point.x === other.x && point.y === other.y;
  });
}
