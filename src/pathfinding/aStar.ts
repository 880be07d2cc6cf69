import { PriorityQueue } from "../utils/priorityQueue.js";
import { positionKey, samePosition, type Position } from "../world/types.js";

/** Neighbour offsets, visited in this order: (0,1), (0,-1), (1,0), (-1,0). */
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
];

export type ObstacleSet = Iterable<Position>;

interface FrontierEntry {
  position: Position;
  /** g + h. */
  estimate: number;
  /** Insertion counter breaking ties between equal estimates. */
  sequence: number;
}

function compareFrontier(a: FrontierEntry, b: FrontierEntry): number {
  return a.estimate - b.estimate || a.sequence - b.sequence;
}

function inBounds(position: Position, width: number, height: number): boolean {
  return (
    Number.isInteger(position.x) &&
    Number.isInteger(position.y) &&
    position.x >= 0 &&
    position.y >= 0 &&
    position.x < width &&
    position.y < height
  );
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** 4-connected neighbours of {@link position} that lie inside the grid. */
export function neighbours(position: Position, width: number, height: number): Position[] {
  const result: Position[] = [];
  for (const [dx, dy] of DIRECTIONS) {
    const candidate = { x: position.x + dx, y: position.y + dy };
    if (inBounds(candidate, width, height)) {
      result.push(candidate);
    }
  }
  return result;
}

/**
 * A* search over a `width`×`height` grid with unit step costs.
 *
 * Returns the full path including both endpoints, `[start]` when the endpoints
 * coincide, and an empty array when either endpoint is blocked, lies outside
 * the grid, or cannot be reached. Identical inputs always yield the identical
 * path.
 */
export function findPath(
  start: Position,
  goal: Position,
  width: number,
  height: number,
  obstacles: ObstacleSet = [],
): Position[] {
  if (!inBounds(start, width, height) || !inBounds(goal, width, height)) {
    return [];
  }
  const blocked = new Set<string>();
  for (const obstacle of obstacles) {
    blocked.add(positionKey(obstacle));
  }
  if (blocked.has(positionKey(start)) || blocked.has(positionKey(goal))) {
    return [];
  }
  if (samePosition(start, goal)) {
    return [{ x: start.x, y: start.y }];
  }

  const frontier = new PriorityQueue<FrontierEntry>(compareFrontier);
  const costs = new Map<string, number>([[positionKey(start), 0]]);
  const cameFrom = new Map<string, Position>();
  const closed = new Set<string>();
  let sequence = 0;
  frontier.push({ position: start, estimate: manhattan(start, goal), sequence });

  while (!frontier.isEmpty()) {
    const current = frontier.pop();
    if (!current) {
      break;
    }
    const currentKey = positionKey(current.position);
    if (closed.has(currentKey)) {
      continue;
    }
    if (samePosition(current.position, goal)) {
      return reconstruct(cameFrom, current.position);
    }
    closed.add(currentKey);
    const currentCost = costs.get(currentKey) ?? 0;

    for (const next of neighbours(current.position, width, height)) {
      const nextKey = positionKey(next);
      if (blocked.has(nextKey) || closed.has(nextKey)) {
        continue;
      }
      const tentative = currentCost + 1;
      const known = costs.get(nextKey);
      if (known === undefined || tentative < known) {
        costs.set(nextKey, tentative);
        cameFrom.set(nextKey, current.position);
        sequence += 1;
        frontier.push({ position: next, estimate: tentative + manhattan(next, goal), sequence });
      }
    }
  }
  return [];
}

/** Whether any route connects {@link start} to {@link goal}. */
export function isPathClear(
  start: Position,
  goal: Position,
  width: number,
  height: number,
  obstacles: ObstacleSet = [],
): boolean {
  return findPath(start, goal, width, height, obstacles).length > 0;
}

function reconstruct(cameFrom: ReadonlyMap<string, Position>, goal: Position): Position[] {
  const path: Position[] = [{ x: goal.x, y: goal.y }];
  let cursor = cameFrom.get(positionKey(goal));
  while (cursor) {
    path.push({ x: cursor.x, y: cursor.y });
    cursor = cameFrom.get(positionKey(cursor));
  }
  return path.reverse();
}
