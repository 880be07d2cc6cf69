export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export {
  ConfigurationError,
  DEFAULT_SIMULATION_CONFIG,
  loadSimulationConfig,
  readEnvironmentOverrides,
  SimulationConfigSchema,
  type SimulationConfig,
  type SimulationConfigOverrides,
} from "./config/simulation.js";
export { createSeededRandom, deriveSeed, type RandomSource } from "./sim/random.js";
export * from "./world/types.js";
export { GridBoundsError, GridWorld, type WorldAccessor } from "./world/gridWorld.js";
export {
  HEAT_STRESS_TEMPERATURE,
  INITIAL_WEATHER,
  isHeatStressed,
  WeatherStation,
  type WeatherReader,
  type WeatherState,
} from "./world/weather.js";
export {
  calculateYieldPrediction,
  getStressIndicators,
  type StressIndicators,
  type YieldPrediction,
} from "./world/analytics.js";
export * from "./coord/messages.js";
export { MessageChannel, type ChannelHandler, type MessageChannelOptions } from "./coord/channel.js";
export { findPath, isPathClear, manhattan, neighbours } from "./pathfinding/aStar.js";
export { PriorityQueue, type Comparator } from "./utils/priorityQueue.js";
export {
  WorkerAgent,
  type CompletionDetails,
  type WorkerContext,
  type WorkerHandle,
  type WorkerOptions,
} from "./agents/worker.js";
export {
  HarvestingWorker,
  MonitoringWorker,
  PloughingWorker,
  SowingWorker,
  WateringWorker,
  type MonitoringOptions,
} from "./agents/workers.js";
export {
  MasterPlanner,
  scoreCell,
  type CellKnowledge,
  type MasterPlannerOptions,
  type PlannerStats,
  type TaskProposal,
} from "./agents/masterPlanner.js";
export { Resource, type ResourceRequirements, type ResourceType } from "./planner/resources.js";
export {
  ConstraintScheduler,
  ScheduleSpecificationError,
  SchedulableTaskSchema,
  type AgentRoster,
  type ScheduleMetrics,
  type SchedulableTaskInput,
  type SchedulingEngine,
  type TaskAssignment,
} from "./planner/constraintScheduler.js";
export { FarmModel, defaultHomePosition, type FarmModelOptions } from "./farm/model.js";
export { MetricsHistory, type AgentSnapshot, type FarmSnapshot, type MetricsRecord } from "./farm/telemetry.js";
