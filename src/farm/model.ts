import { MasterPlanner } from "../agents/masterPlanner.js";
import { WorkerAgent, type WorkerContext } from "../agents/worker.js";
import { MonitoringWorker, WORKER_CONSTRUCTORS } from "../agents/workers.js";
import type { EnvSource } from "../config/env.js";
import { loadSimulationConfig, type SimulationConfig, type SimulationConfigOverrides } from "../config/simulation.js";
import { MessageChannel } from "../coord/channel.js";
import { StructuredLogger } from "../logger.js";
import { createSeededRandom, type RandomSource } from "../sim/random.js";
import { calculateYieldPrediction, getStressIndicators } from "../world/analytics.js";
import { GridWorld } from "../world/gridWorld.js";
import { positionKey, type Position, type WorkerType } from "../world/types.js";
import { WeatherStation, type WeatherState } from "../world/weather.js";
import {
  collectMetrics,
  describeTask,
  MetricsHistory,
  type FarmSnapshot,
  type MetricsRecord,
} from "./telemetry.js";

export interface FarmModelOptions {
  /** Explicit configuration, layered over the environment and the defaults. */
  readonly config?: SimulationConfigOverrides;
  /** Environment read for `FARM_*` variables. Defaults to `process.env`. */
  readonly env?: EnvSource;
  /** Replaces the logger built from the configuration. */
  readonly logger?: StructuredLogger;
  /** Replaces the seeded generator built from `config.seed`. */
  readonly random?: RandomSource;
  /** Initial weather, e.g. a forced rain forecast. */
  readonly weather?: Partial<WeatherState>;
  /** Spawns one worker of each type at its home cell. Defaults to true. */
  readonly defaultRoster?: boolean;
}

export const DEFAULT_ROSTER_ORDER: readonly WorkerType[] = ["ploughing", "sowing", "watering", "harvesting", "monitoring"];

function clampInto(value: number, size: number): number {
  return Math.max(0, Math.min(size - 1, value));
}

/** Home cell of the default worker of each type. */
export function defaultHomePosition(type: WorkerType, width: number, height: number): Position {
  const spots: Record<WorkerType, Position> = {
    ploughing: { x: 2, y: 2 },
    sowing: { x: width - 3, y: 2 },
    watering: { x: 2, y: height - 3 },
    harvesting: { x: width - 3, y: height - 3 },
    monitoring: { x: Math.floor(width / 2), y: 2 },
  };
  const spot = spots[type];
  return { x: clampInto(spot.x, width), y: clampInto(spot.y, height) };
}

/**
 * Owns the world, the weather, the channel, the planner and the workers, and
 * advances them one tick at a time. Callers decide the cadence; the model
 * never schedules itself.
 */
export class FarmModel {
  readonly config: SimulationConfig;
  readonly world: GridWorld;
  readonly weather: WeatherStation;
  readonly channel: MessageChannel;
  readonly planner: MasterPlanner;
  readonly logger: StructuredLogger;

  private readonly random: RandomSource;
  private readonly workerList: WorkerAgent[] = [];
  private readonly perTypeCount = new Map<WorkerType, number>();
  private readonly blocked = new Map<string, Position>();
  private readonly metrics: MetricsHistory;
  private currentTick = 0;

  constructor(options: FarmModelOptions = {}) {
    this.config = loadSimulationConfig(options.config, options.env);
    this.logger =
      options.logger ??
      new StructuredLogger({
        minLevel: this.config.logging.level,
        stdout: this.config.logging.stdout,
        logFile: this.config.logging.file,
      });
    this.random = options.random ?? createSeededRandom(this.config.seed);
    this.world = new GridWorld(this.config.width, this.config.height);
    this.weather = new WeatherStation(options.weather);
    this.channel = new MessageChannel({ logger: this.logger });
    this.planner = new MasterPlanner({
      world: this.world,
      weather: this.weather,
      channel: this.channel,
      now: () => this.currentTick,
      logger: this.logger,
      maxTasksPerType: this.config.planner.maxTasksPerType,
      assignBurst: this.config.planner.assignBurst,
    });
    this.metrics = new MetricsHistory(this.config.historyLimit);

    if (options.defaultRoster ?? true) {
      for (const type of DEFAULT_ROSTER_ORDER) {
        this.addWorker(type, defaultHomePosition(type, this.world.width, this.world.height));
      }
    }
    this.logger.info("farm_initialised", {
      width: this.world.width,
      height: this.world.height,
      seed: this.config.seed,
      workers: this.workerList.map((worker) => worker.id),
    });
  }

  get tick(): number {
    return this.currentTick;
  }

  get workers(): readonly WorkerAgent[] {
    return this.workerList.slice();
  }

  /** Creates a worker of {@link type}, registers it with the planner and returns it. */
  addWorker(type: WorkerType, position: Position): WorkerAgent {
    if (!this.world.isInBounds(position)) {
      throw new RangeError(`worker position (${position.x}, ${position.y}) is outside the grid`);
    }
    const ordinal = (this.perTypeCount.get(type) ?? 0) + 1;
    this.perTypeCount.set(type, ordinal);
    const id = `${type}-${ordinal}`;
    const context: WorkerContext = {
      world: this.world,
      weather: this.weather,
      channel: this.channel,
      now: () => this.currentTick,
      logger: this.logger,
      obstacles: () => this.blocked.values(),
    };
    const moveBurst = this.config.worker.moveBurst;
    const worker =
      type === "monitoring"
        ? new MonitoringWorker(id, position, context, {
            moveBurst,
            scanInterval: this.config.monitor.scanInterval,
            diseaseThreshold: this.config.monitor.diseaseThreshold,
            random: this.random,
          })
        : new WORKER_CONSTRUCTORS[type](id, position, context, { moveBurst });
    this.workerList.push(worker);
    this.planner.registerWorker(worker);
    return worker;
  }

  /** Marks a cell as impassable for the pathfinder. */
  addObstacle(position: Position): void {
    this.blocked.set(positionKey(position), { x: position.x, y: position.y });
  }

  removeObstacle(position: Position): void {
    this.blocked.delete(positionKey(position));
  }

  /**
   * Advances one tick: weather (every `weatherUpdateInterval` ticks), crop
   * growth, planning, delivery of the planner's messages, every worker in
   * registration order, then delivery of the workers' messages.
   */
  step(): void {
    this.currentTick += 1;
    if (this.currentTick % this.config.weatherUpdateInterval === 0) {
      this.weather.update(this.random);
    }
    this.world.advanceGrowth();
    this.planner.step();
    const plannerMessages = this.channel.flush();
    for (const worker of this.workerList) {
      worker.step();
    }
    const workerMessages = this.channel.flush();

    const row = collectMetrics(this.world, this.weather.current(), this.currentTick);
    this.metrics.record(row);
    if (this.logger.isLevelEnabled("debug")) {
      this.logger.debug("tick_completed", {
        tick: this.currentTick,
        delivered: plannerMessages + workerMessages,
        harvested: row.harvested,
      });
    }
  }

  /** Runs {@link ticks} steps and returns the final snapshot. */
  run(ticks: number): FarmSnapshot {
    for (let index = 0; index < ticks; index += 1) {
      this.step();
    }
    return this.snapshot();
  }

  snapshot(): FarmSnapshot {
    const weather = this.weather.current();
    const planner = this.planner.stats;
    return {
      tick: this.currentTick,
      counts: this.world.countAllStates(),
      harvested: this.world.harvestedCount,
      activeTasks: planner.active,
      queuedTasks: planner.queued,
      planner,
      agents: this.workerList.map((worker) => ({
        id: worker.id,
        agentType: worker.agentType,
        status: worker.status,
        position: worker.position,
        currentTask: describeTask(worker.currentTask),
        tasksCompleted: worker.tasksCompleted,
        tasksFailed: worker.tasksFailed,
      })),
      weather: { ...weather },
      yield: calculateYieldPrediction(this.world, this.currentTick),
      stress: getStressIndicators(this.world, weather),
    };
  }

  history(): MetricsRecord[] {
    return this.metrics.entries();
  }
}
