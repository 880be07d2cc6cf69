import { z } from "zod";

import type { LogLevel } from "../logger.js";
import {
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalNumber,
  readOptionalString,
  type EnvSource,
} from "./env.js";

/**
 * Error raised when the merged simulation configuration fails validation. The
 * zod issues are kept in {@link details} so callers can print every problem at
 * once.
 */
export class ConfigurationError extends Error {
  public readonly code = "E-FARM-CONFIG";
  public readonly details: { issues: Array<{ path: string; message: string }> };

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`invalid simulation configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`);
    this.name = "ConfigurationError";
    this.details = { issues };
  }
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const positiveInt = z.number().int().min(1);

export const SimulationConfigSchema = z
  .object({
    width: positiveInt.max(500),
    height: positiveInt.max(500),
    /** Seed of the Park–Miller generator; must stay inside the 31-bit state. */
    seed: z.number().int().min(1).max(2147483646),
    planner: z
      .object({
        /** New tasks created per task type during one scoring pass. */
        maxTasksPerType: positiveInt,
        /** Tasks popped from the queue per tick. */
        assignBurst: positiveInt,
      })
      .strict(),
    worker: z
      .object({
        /** Path steps a moving worker consumes per tick. */
        moveBurst: positiveInt,
      })
      .strict(),
    monitor: z
      .object({
        scanInterval: positiveInt,
        diseaseThreshold: z.number().min(0).max(1),
      })
      .strict(),
    weatherUpdateInterval: positiveInt,
    historyLimit: positiveInt,
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]),
        stdout: z.boolean(),
        file: z.string().min(1).nullable(),
      })
      .strict(),
  })
  .strict();

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  width: 20,
  height: 20,
  seed: 42,
  planner: { maxTasksPerType: 10, assignBurst: 20 },
  worker: { moveBurst: 3 },
  monitor: { scanInterval: 15, diseaseThreshold: 0.85 },
  weatherUpdateInterval: 5,
  historyLimit: 1_000,
  logging: { level: "info", stdout: true, file: null },
};

/** Partial configuration accepted by {@link loadSimulationConfig}. */
export interface SimulationConfigOverrides {
  width?: number;
  height?: number;
  seed?: number;
  planner?: Partial<SimulationConfig["planner"]>;
  worker?: Partial<SimulationConfig["worker"]>;
  monitor?: Partial<SimulationConfig["monitor"]>;
  weatherUpdateInterval?: number;
  historyLimit?: number;
  logging?: Partial<SimulationConfig["logging"]>;
}

/**
 * Collects the `FARM_*` environment variables. Unset or malformed variables
 * are left undefined so they fall through to the defaults.
 */
export function readEnvironmentOverrides(env: EnvSource = process.env): SimulationConfigOverrides {
  return {
    width: readOptionalInt("FARM_GRID_WIDTH", env),
    height: readOptionalInt("FARM_GRID_HEIGHT", env),
    seed: readOptionalInt("FARM_SEED", env),
    planner: {
      maxTasksPerType: readOptionalInt("FARM_MAX_TASKS_PER_TYPE", env),
      assignBurst: readOptionalInt("FARM_ASSIGN_BURST", env),
    },
    worker: { moveBurst: readOptionalInt("FARM_MOVE_BURST", env) },
    monitor: {
      scanInterval: readOptionalInt("FARM_SCAN_INTERVAL", env),
      diseaseThreshold: readOptionalNumber("FARM_DISEASE_THRESHOLD", env),
    },
    weatherUpdateInterval: readOptionalInt("FARM_WEATHER_INTERVAL", env),
    historyLimit: readOptionalInt("FARM_HISTORY_LIMIT", env),
    logging: {
      level: readOptionalEnum("FARM_LOG_LEVEL", LOG_LEVELS, env),
      stdout: readOptionalBool("FARM_LOG_STDOUT", env),
      file: readOptionalString("FARM_LOG_FILE", env),
    },
  };
}

/**
 * Resolves the simulation configuration as defaults ← environment ← explicit
 * overrides, then validates the result.
 *
 * @throws ConfigurationError when any field is out of range.
 */
export function loadSimulationConfig(
  overrides: SimulationConfigOverrides = {},
  env: EnvSource = process.env,
): SimulationConfig {
  const fromEnv = readEnvironmentOverrides(env);
  const defaults = DEFAULT_SIMULATION_CONFIG;
  const candidate = {
    width: overrides.width ?? fromEnv.width ?? defaults.width,
    height: overrides.height ?? fromEnv.height ?? defaults.height,
    seed: overrides.seed ?? fromEnv.seed ?? defaults.seed,
    planner: {
      maxTasksPerType:
        overrides.planner?.maxTasksPerType ?? fromEnv.planner?.maxTasksPerType ?? defaults.planner.maxTasksPerType,
      assignBurst: overrides.planner?.assignBurst ?? fromEnv.planner?.assignBurst ?? defaults.planner.assignBurst,
    },
    worker: {
      moveBurst: overrides.worker?.moveBurst ?? fromEnv.worker?.moveBurst ?? defaults.worker.moveBurst,
    },
    monitor: {
      scanInterval: overrides.monitor?.scanInterval ?? fromEnv.monitor?.scanInterval ?? defaults.monitor.scanInterval,
      diseaseThreshold:
        overrides.monitor?.diseaseThreshold ?? fromEnv.monitor?.diseaseThreshold ?? defaults.monitor.diseaseThreshold,
    },
    weatherUpdateInterval:
      overrides.weatherUpdateInterval ?? fromEnv.weatherUpdateInterval ?? defaults.weatherUpdateInterval,
    historyLimit: overrides.historyLimit ?? fromEnv.historyLimit ?? defaults.historyLimit,
    logging: {
      level: overrides.logging?.level ?? fromEnv.logging?.level ?? defaults.logging.level,
      stdout: overrides.logging?.stdout ?? fromEnv.logging?.stdout ?? defaults.logging.stdout,
      // `null` is an explicit "no file" override and must not fall through.
      file:
        overrides.logging?.file !== undefined
          ? overrides.logging.file
          : fromEnv.logging?.file ?? defaults.logging.file,
    },
  };

  const parsed = SimulationConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}
