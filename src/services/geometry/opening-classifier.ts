import { Orientation, Rect, Rectangle, WallOpeningOverlap } from '../../types/floor-plan.types';

export const getOrientation = (rect: Rectangle): Orientation =>
  rect.width > rect.height ? 'horizontal' : 'vertical';

/**
 * Bounding-box overlap in pixel space. Touching edges count as overlapping.
 */
export const rectsOverlap = (a: Rect, b: Rect): boolean =>
  !(b.x2 < a.x1 || b.x1 > a.x2 || b.y2 < a.y1 || b.y1 > a.y2);

/**
 * Openings that overlap a wall. Informational only: walls are never cut.
 */
export const findWallOpenings = (
  wall: Rectangle,
  wallIndex: number,
  doors: readonly Rectangle[],
  windows: readonly Rectangle[]
): WallOpeningOverlap => {
  const overlapping = (openings: readonly Rectangle[]) =>
    openings.flatMap((opening, i) => (rectsOverlap(wall, opening) ? [i] : []));

  return {
    wallIndex,
    doors: overlapping(doors),
    windows: overlapping(windows)
  };
};
