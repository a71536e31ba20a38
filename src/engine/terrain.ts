// engine/terrain.ts — Static circular obstacles

import type { Position } from '../types/index.js';
import { distance } from '../types/index.js';

export interface TerrainObstacle {
  id: string;
  center: Position;
  radius: number;
}

/** First obstacle overlapped by a circle at `position`, if any. */
export function findTerrainOverlap(
  position: Position,
  radius: number,
  obstacles: readonly TerrainObstacle[],
): TerrainObstacle | undefined {
  return obstacles.find((o) => distance(position, o.center) < o.radius + radius);
}
