/** Integer grid coordinate. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** Agricultural life-cycle of a single cell. */
export type CellState =
  | "initial"
  | "ploughed"
  | "sown"
  | "growing"
  | "need_water"
  | "healthy"
  | "diseased"
  | "ready_to_harvest";

export const CELL_STATES: readonly CellState[] = [
  "initial",
  "ploughed",
  "sown",
  "growing",
  "need_water",
  "healthy",
  "diseased",
  "ready_to_harvest",
];

/** Numeric attributes attached to every cell. */
export interface CellAttributes {
  /** In `[0, 1]`. */
  waterLevel: number;
  /** In `[0, 100]`. */
  growthProgress: number;
  /** In `[0, 1]`. */
  diseaseProbability: number;
  /** Tick of the last irrigation, 0 when never watered. */
  lastWatered: number;
}

export type TaskType = "plough" | "sow" | "water" | "harvest" | "monitor";

export type TaskStatus = "pending" | "assigned" | "completed" | "failed";

/** One unit of assignable work targeting a cell. Owned by the planner. */
export interface Task {
  readonly taskId: string;
  readonly taskType: TaskType;
  readonly targetCell: Position;
  readonly priority: number;
  status: TaskStatus;
  assignedTo: string | null;
  readonly createdAt: number;
  completedAt: number | null;
}

export type WorkerType = "ploughing" | "sowing" | "watering" | "harvesting" | "monitoring";

export type WorkerStatus = "idle" | "moving" | "working" | "completed";

/** Worker type able to carry out each task type. */
export const WORKER_FOR_TASK: Readonly<Record<TaskType, WorkerType>> = {
  plough: "ploughing",
  sow: "sowing",
  water: "watering",
  harvest: "harvesting",
  monitor: "monitoring",
};

export function positionKey(position: Position): string {
  return `${position.x},${position.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}
