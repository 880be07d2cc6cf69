import type { TaskOffer } from "../coord/messages.js";
import type { PlannerStats } from "../agents/masterPlanner.js";
import { calculateYieldPrediction, getStressIndicators, type StressIndicators, type YieldPrediction } from "../world/analytics.js";
import type { GridWorld } from "../world/gridWorld.js";
import type { CellState, Position, WorkerStatus, WorkerType } from "../world/types.js";
import type { WeatherState } from "../world/weather.js";

export interface AgentSnapshot {
  id: string;
  agentType: WorkerType;
  status: WorkerStatus;
  position: Position;
  currentTask: string | null;
  tasksCompleted: number;
  tasksFailed: number;
}

/** Read-only picture of the farm after a tick. Nothing in the loop depends on it. */
export interface FarmSnapshot {
  tick: number;
  counts: Record<CellState, number>;
  harvested: number;
  activeTasks: number;
  queuedTasks: number;
  planner: PlannerStats;
  agents: AgentSnapshot[];
  weather: WeatherState;
  yield: YieldPrediction;
  stress: StressIndicators;
}

/** One row of the per-tick metrics history. */
export interface MetricsRecord {
  tick: number;
  ploughed: number;
  sown: number;
  growing: number;
  healthy: number;
  diseased: number;
  harvested: number;
  temperature: number;
  humidity: number;
  estimatedYield: number;
  waterStressPercentage: number;
}

export function collectMetrics(world: GridWorld, weather: Readonly<WeatherState>, tick: number): MetricsRecord {
  const counts = world.countAllStates();
  return {
    tick,
    ploughed: counts.ploughed,
    sown: counts.sown,
    growing: counts.growing,
    healthy: counts.healthy,
    diseased: counts.diseased,
    harvested: world.harvestedCount,
    temperature: weather.temperature,
    humidity: weather.humidity,
    estimatedYield: calculateYieldPrediction(world, tick).estimatedYield,
    waterStressPercentage: getStressIndicators(world, weather).waterStressPercentage,
  };
}

/** Ring of the most recent metrics rows; the oldest row is evicted first. */
export class MetricsHistory {
  private readonly rows: MetricsRecord[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`history limit must be a positive integer, received ${limit}`);
    }
  }

  get size(): number {
    return this.rows.length;
  }

  record(row: MetricsRecord): void {
    this.rows.push(row);
    if (this.rows.length > this.limit) {
      this.rows.splice(0, this.rows.length - this.limit);
    }
  }

  entries(): MetricsRecord[] {
    return this.rows.map((row) => ({ ...row }));
  }

  latest(): MetricsRecord | undefined {
    const last = this.rows[this.rows.length - 1];
    return last ? { ...last } : undefined;
  }
}

export function describeTask(task: TaskOffer | null): string | null {
  return task ? task.taskId : null;
}
