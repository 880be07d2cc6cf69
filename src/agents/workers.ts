import { TOPIC_ALERT_DISEASE, type TaskOffer } from "../coord/messages.js";
import type { RandomSource } from "../sim/random.js";
import type { Position, WorkerType } from "../world/types.js";
import {
  WorkerAgent,
  type CompletionDetails,
  type WorkerContext,
  type WorkerOptions,
} from "./worker.js";

const WATER_PER_IRRIGATION = 0.3;
const MAX_WATER = 1;
const HEALTHY_GROWTH = 50;
const HEALTHY_WATER = 0.5;
const RECOVERY_WATER = 0.6;
const DISEASE_RELIEF = 0.2;
const SOWN_WATER_LEVEL = 0.5;

/** Turns an `initial` cell into `ploughed`. */
export class PloughingWorker extends WorkerAgent {
  constructor(id: string, position: Position, context: WorkerContext, options?: WorkerOptions) {
    super(id, "ploughing", position, context, options);
  }

  protected execute(task: TaskOffer): CompletionDetails | null {
    const { world } = this.context;
    if (world.getCellState(task.targetCell) !== "initial") {
      return null;
    }
    world.setCellState(task.targetCell, "ploughed");
    return { action: "ploughed" };
  }
}

/** Sows a ploughed cell and resets its crop attributes. */
export class SowingWorker extends WorkerAgent {
  constructor(id: string, position: Position, context: WorkerContext, options?: WorkerOptions) {
    super(id, "sowing", position, context, options);
  }

  protected execute(task: TaskOffer): CompletionDetails | null {
    const { world } = this.context;
    if (world.getCellState(task.targetCell) !== "ploughed") {
      return null;
    }
    world.setCellState(task.targetCell, "sown");
    world.updateCellAttributes(task.targetCell, {
      growthProgress: 0,
      waterLevel: SOWN_WATER_LEVEL,
      diseaseProbability: 0,
    });
    return { action: "sown" };
  }
}

/**
 * Irrigates sown, dry and diseased cells. While rain is forecast the worker
 * reports `watering_delayed` instead of touching the cell, whatever its state.
 */
export class WateringWorker extends WorkerAgent {
  constructor(id: string, position: Position, context: WorkerContext, options?: WorkerOptions) {
    super(id, "watering", position, context, options);
  }

  protected execute(task: TaskOffer): CompletionDetails | null {
    const { world, weather } = this.context;
    if (weather.current().rainForecast24h) {
      return { action: "watering_delayed", reason: "rain_forecast" };
    }

    const cell = task.targetCell;
    const state = world.getCellState(cell);
    const attributes = world.getCellAttributes(cell);
    const waterLevel = Math.min(MAX_WATER, attributes.waterLevel + WATER_PER_IRRIGATION);
    const tick = this.context.now();

    switch (state) {
      case "sown":
        world.setCellState(cell, "growing");
        world.updateCellAttributes(cell, { waterLevel, lastWatered: tick });
        return { action: "watered" };
      case "need_water":
        world.setCellState(
          cell,
          attributes.growthProgress > HEALTHY_GROWTH && waterLevel > HEALTHY_WATER ? "healthy" : "growing",
        );
        world.updateCellAttributes(cell, { waterLevel, lastWatered: tick });
        return { action: "watered" };
      case "diseased":
        world.updateCellAttributes(cell, {
          waterLevel,
          lastWatered: tick,
          diseaseProbability: Math.max(0, attributes.diseaseProbability - DISEASE_RELIEF),
        });
        if (waterLevel > RECOVERY_WATER) {
          world.setCellState(cell, "growing");
        }
        return { action: "watered" };
      default:
        return null;
    }
  }
}

/** Harvests mature cells back to `initial` and bumps the harvest counter. */
export class HarvestingWorker extends WorkerAgent {
  constructor(id: string, position: Position, context: WorkerContext, options?: WorkerOptions) {
    super(id, "harvesting", position, context, options);
  }

  protected execute(task: TaskOffer): CompletionDetails | null {
    const { world } = this.context;
    if (world.getCellState(task.targetCell) !== "ready_to_harvest") {
      return null;
    }
    world.setCellState(task.targetCell, "initial");
    world.updateCellAttributes(task.targetCell, {
      waterLevel: 0,
      growthProgress: 0,
      diseaseProbability: 0,
      lastWatered: 0,
    });
    world.recordHarvest(1);
    return { action: "harvested", yield: 1 };
  }
}

export interface MonitoringOptions extends WorkerOptions {
  /** Ticks between two scans. Defaults to 15. */
  readonly scanInterval?: number;
  /** Probability above which a scanned cell turns diseased. Defaults to 0.85. */
  readonly diseaseThreshold?: number;
  readonly random: RandomSource;
}

const SCANNED_STATES = new Set(["growing", "healthy", "sown"]);
const BASE_DISEASE_RISK = 0.02;
const DRYNESS_RISK = 0.15;
const GROWTH_RISK = 0.1;
const RANDOM_RISK = 0.1;

/**
 * Drone that never takes task offers. It scans the whole field on a fixed
 * interval, stores each crop's disease probability and raises
 * `alert.disease` when a cell crosses the threshold.
 */
export class MonitoringWorker extends WorkerAgent {
  private readonly scanInterval: number;
  private readonly diseaseThreshold: number;
  private readonly random: RandomSource;
  private lastScanTick = 0;
  private scans = 0;

  constructor(id: string, position: Position, context: WorkerContext, options: MonitoringOptions) {
    super(id, "monitoring", position, context, options);
    this.scanInterval = options.scanInterval ?? 15;
    this.diseaseThreshold = options.diseaseThreshold ?? 0.85;
    this.random = options.random;
  }

  get scanCount(): number {
    return this.scans;
  }

  protected override onIdle(): void {
    const tick = this.context.now();
    if (tick - this.lastScanTick >= this.scanInterval) {
      this.scanField();
      this.lastScanTick = tick;
    }
  }

  /** Scans every cell once, in x-major order. Returns the cells flagged diseased. */
  scanField(): Position[] {
    const { world } = this.context;
    const flagged: Position[] = [];
    for (let x = 0; x < world.width; x += 1) {
      for (let y = 0; y < world.height; y += 1) {
        const cell = { x, y };
        if (this.scanCell(cell)) {
          flagged.push(cell);
        }
      }
    }
    this.scans += 1;
    this.logger.debug("monitor_scan_completed", { workerId: this.id, tick: this.context.now(), flagged: flagged.length });
    return flagged;
  }

  protected execute(): CompletionDetails | null {
    return null;
  }

  private scanCell(cell: Position): boolean {
    const { world } = this.context;
    if (!SCANNED_STATES.has(world.getCellState(cell))) {
      return false;
    }
    const { waterLevel, growthProgress } = world.getCellAttributes(cell);
    const diseaseProbability =
      BASE_DISEASE_RISK +
      (1 - waterLevel) * DRYNESS_RISK +
      (growthProgress / 100) * GROWTH_RISK +
      this.random() * RANDOM_RISK;
    world.updateCellAttributes(cell, { diseaseProbability });
    if (diseaseProbability <= this.diseaseThreshold) {
      return false;
    }
    world.setCellState(cell, "diseased");
    this.context.channel.publish(TOPIC_ALERT_DISEASE, {
      topic: TOPIC_ALERT_DISEASE,
      senderId: this.id,
      timestamp: this.context.now(),
      payload: { cellPosition: cell, diseaseProbability, waterLevel },
    });
    return true;
  }
}

export type TaskWorkerType = Exclude<WorkerType, "monitoring">;

/** Constructors of the task-taking workers, keyed by worker type. */
export const WORKER_CONSTRUCTORS: Readonly<
  Record<TaskWorkerType, new (id: string, position: Position, context: WorkerContext, options?: WorkerOptions) => WorkerAgent>
> = {
  ploughing: PloughingWorker,
  sowing: SowingWorker,
  watering: WateringWorker,
  harvesting: HarvestingWorker,
};
