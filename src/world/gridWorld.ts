import { type CellAttributes, type CellState, type Position } from "./types.js";

/**
 * Raised when a write targets a coordinate outside the grid. Reaching this
 * error is a caller bug, never a runtime branch of the tick loop.
 */
export class GridBoundsError extends Error {
  public readonly code = "E-FARM-BOUNDS";
  public readonly details: { position: Position; width: number; height: number };

  constructor(position: Position, width: number, height: number) {
    super(`cell (${position.x}, ${position.y}) is outside the ${width}x${height} grid`);
    this.name = "GridBoundsError";
    this.details = { position: { x: position.x, y: position.y }, width, height };
  }
}

/**
 * Read/write contract the planner and the workers rely on. {@link GridWorld}
 * is the authoritative implementation; tests may substitute their own.
 */
export interface WorldAccessor {
  readonly width: number;
  readonly height: number;
  getCellState(position: Position): CellState;
  setCellState(position: Position, state: CellState): void;
  getCellAttributes(position: Position): CellAttributes;
  updateCellAttributes(position: Position, patch: Partial<CellAttributes>): void;
  countCellsByState(state: CellState): number;
  recordHarvest(amount?: number): void;
}

/** Growth dynamics applied by {@link GridWorld.advanceGrowth}. */
const WATER_DECAY_PER_TICK = 0.05;
const GROWTH_PER_TICK = 2;
const DRY_THRESHOLD = 0.3;
const HEALTHY_WATER_THRESHOLD = 0.5;
const HEALTHY_GROWTH_THRESHOLD = 50;
const MATURE_GROWTH = 100;

function neutralAttributes(): CellAttributes {
  return { waterLevel: 0, growthProgress: 0, diseaseProbability: 0, lastWatered: 0 };
}

interface CellRecord {
  state: CellState;
  attributes: CellAttributes;
}

/**
 * Authoritative per-cell storage. Every in-bounds coordinate owns exactly one
 * cell from construction onwards; reads outside the grid return neutral values
 * while writes outside the grid throw {@link GridBoundsError}.
 */
export class GridWorld implements WorldAccessor {
  private readonly cells: CellRecord[];
  private harvested = 0;

  constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`grid dimensions must be positive integers, received ${width}x${height}`);
    }
    this.cells = [];
    for (let index = 0; index < width * height; index += 1) {
      this.cells.push({ state: "initial", attributes: neutralAttributes() });
    }
  }

  isInBounds(position: Position): boolean {
    return (
      Number.isInteger(position.x) &&
      Number.isInteger(position.y) &&
      position.x >= 0 &&
      position.y >= 0 &&
      position.x < this.width &&
      position.y < this.height
    );
  }

  /** Coordinates in x-major order: (0,0), (0,1), … (1,0), … */
  *positions(): IterableIterator<Position> {
    for (let x = 0; x < this.width; x += 1) {
      for (let y = 0; y < this.height; y += 1) {
        yield { x, y };
      }
    }
  }

  getCellState(position: Position): CellState {
    return this.lookup(position)?.state ?? "initial";
  }

  setCellState(position: Position, state: CellState): void {
    this.require(position).state = state;
  }

  /** Returns a copy; mutate through {@link updateCellAttributes}. */
  getCellAttributes(position: Position): CellAttributes {
    const cell = this.lookup(position);
    return cell ? { ...cell.attributes } : neutralAttributes();
  }

  /** Merges {@link patch} into the stored attributes. */
  updateCellAttributes(position: Position, patch: Partial<CellAttributes>): void {
    const cell = this.require(position);
    cell.attributes = { ...cell.attributes, ...patch };
  }

  countCellsByState(state: CellState): number {
    let count = 0;
    for (const cell of this.cells) {
      if (cell.state === state) {
        count += 1;
      }
    }
    return count;
  }

  /** Cell counts for every state, zero-filled. */
  countAllStates(): Record<CellState, number> {
    const counts: Record<CellState, number> = {
      initial: 0,
      ploughed: 0,
      sown: 0,
      growing: 0,
      need_water: 0,
      healthy: 0,
      diseased: 0,
      ready_to_harvest: 0,
    };
    for (const cell of this.cells) {
      counts[cell.state] += 1;
    }
    return counts;
  }

  get harvestedCount(): number {
    return this.harvested;
  }

  recordHarvest(amount = 1): void {
    this.harvested += amount;
  }

  /**
   * Applies one tick of crop dynamics. Growing and healthy cells dry out and
   * grow while watered; the resulting levels drive the automatic transitions
   * towards `need_water`, `healthy` and `ready_to_harvest`.
   */
  advanceGrowth(): void {
    for (const cell of this.cells) {
      if (cell.state !== "growing" && cell.state !== "healthy") {
        continue;
      }
      const attributes = cell.attributes;
      const waterLevel = Math.max(0, attributes.waterLevel - WATER_DECAY_PER_TICK);
      attributes.waterLevel = waterLevel;
      if (waterLevel > DRY_THRESHOLD) {
        attributes.growthProgress = Math.min(MATURE_GROWTH, attributes.growthProgress + GROWTH_PER_TICK);
      }

      if (waterLevel < DRY_THRESHOLD) {
        cell.state = "need_water";
      } else if (cell.state === "growing") {
        if (attributes.growthProgress > HEALTHY_GROWTH_THRESHOLD && waterLevel > HEALTHY_WATER_THRESHOLD) {
          cell.state = "healthy";
        }
      } else if (attributes.growthProgress >= MATURE_GROWTH) {
        cell.state = "ready_to_harvest";
      }
    }
  }

  private lookup(position: Position): CellRecord | undefined {
    if (!this.isInBounds(position)) {
      return undefined;
    }
    return this.cells[position.x * this.height + position.y];
  }

  private require(position: Position): CellRecord {
    const cell = this.lookup(position);
    if (!cell) {
      throw new GridBoundsError(position, this.width, this.height);
    }
    return cell;
  }
}
