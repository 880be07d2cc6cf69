import { z } from "zod";

import { StructuredLogger } from "../logger.js";
import { WORKER_FOR_TASK, type Position, type TaskType, type WorkerType } from "../world/types.js";
import {
  DEFAULT_RESOURCE_CAPACITY,
  RESOURCE_TYPES,
  Resource,
  type ResourceRequirements,
  type ResourceType,
} from "./resources.js";

/**
 * Error raised when a batch handed to the scheduler fails validation. The
 * zod issues are exposed through {@link details}.
 */
export class ScheduleSpecificationError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code = "E-SCHED-SPEC", details?: unknown) {
    super(message);
    this.name = "ScheduleSpecificationError";
    this.code = code;
    this.details = details;
  }
}

const amount = z.number().nonnegative().finite();

/** Schema validating one task of a batch. */
export const SchedulableTaskSchema = z
  .object({
    taskId: z.string().trim().min(1).max(200),
    taskType: z.enum(["plough", "sow", "water", "harvest", "monitor"]),
    targetCell: z.object({ x: z.number().int().nonnegative(), y: z.number().int().nonnegative() }).strict(),
    priority: z.number().int().default(50),
    /** Consecutive time slots the task occupies. */
    duration: z.number().int().min(1).default(1),
    resources: z
      .object({ water: amount.optional(), fuel: amount.optional(), tools: amount.optional() })
      .strict()
      .default({}),
  })
  .strict();

export type SchedulableTaskInput = z.input<typeof SchedulableTaskSchema>;
export type SchedulableTask = z.output<typeof SchedulableTaskSchema>;

/** Agent identifiers available per worker type, in preference order. */
export type AgentRoster = Partial<Record<WorkerType, readonly string[]>>;

export interface TaskAssignment {
  readonly taskId: string;
  readonly taskType: TaskType;
  readonly agentId: string;
  readonly agentType: WorkerType;
  readonly timeSlot: number;
  readonly duration: number;
  readonly targetCell: Position;
  readonly resourceRequirements: ResourceRequirements;
  readonly priority: number;
}

export type AssignmentRequest = TaskAssignment;

export interface ScheduleMetrics {
  totalTasks: number;
  /** Latest `timeSlot + duration` over every assignment. */
  makespan: number;
  /** Consumed share of each pool. Empty when nothing is scheduled. */
  resourceUtilization: Partial<Record<ResourceType, number>>;
  /** Distinct reserved slots over the horizon, per agent. */
  agentUtilization: Record<string, number>;
}

/** Pluggable batch scheduler contract. */
export interface SchedulingEngine {
  scheduleTasks(tasks: readonly SchedulableTaskInput[], roster: AgentRoster): TaskAssignment[];
  assignTask(request: AssignmentRequest): boolean;
  getScheduleMetrics(): ScheduleMetrics;
  reset(): void;
}

export interface ConstraintSchedulerOptions {
  /** Number of time slots available, `[0, horizon)`. Defaults to 100. */
  readonly horizon?: number;
  /** Overrides of the default pool capacities. */
  readonly capacities?: Partial<Record<ResourceType, number>>;
  readonly logger?: StructuredLogger;
}

/**
 * Offline first-fit scheduler. Tasks are taken by descending priority (stable
 * on submission order); each lands on the first agent of its type, in roster
 * order, and the first slot where the agent is free and every pool still holds
 * enough. There is no backtracking. Pools are only refilled by
 * {@link replenish} or {@link reset}.
 */
export class ConstraintScheduler implements SchedulingEngine {
  readonly horizon: number;
  private readonly logger: StructuredLogger;
  private readonly resources = new Map<ResourceType, Resource>();
  private assignments: TaskAssignment[] = [];
  private reservations = new Map<string, Set<number>>();

  constructor(options: ConstraintSchedulerOptions = {}) {
    this.horizon = options.horizon ?? 100;
    if (!Number.isInteger(this.horizon) || this.horizon < 1) {
      throw new RangeError(`horizon must be a positive integer, received ${this.horizon}`);
    }
    this.logger = options.logger ?? new StructuredLogger({ stdout: false });
    for (const type of RESOURCE_TYPES) {
      this.resources.set(type, new Resource(type, options.capacities?.[type] ?? DEFAULT_RESOURCE_CAPACITY[type]));
    }
  }

  /** Adds a pool or replaces an existing one, filled to {@link capacity}. */
  addResource(type: ResourceType, capacity: number): void {
    this.resources.set(type, new Resource(type, capacity));
  }

  getResource(type: ResourceType): Resource | undefined {
    return this.resources.get(type);
  }

  /** Refills a pool, never above its capacity. Returns false for an unknown pool. */
  replenish(type: ResourceType, amountToAdd: number): boolean {
    const resource = this.resources.get(type);
    if (!resource) {
      return false;
    }
    resource.replenish(amountToAdd);
    return true;
  }

  /** True when the agent holds no reservation in `[timeSlot, timeSlot + duration)`. */
  isAgentAvailable(agentId: string, timeSlot: number, duration: number): boolean {
    const reserved = this.reservations.get(agentId);
    if (!reserved) {
      return true;
    }
    for (let slot = timeSlot; slot < timeSlot + duration; slot += 1) {
      if (reserved.has(slot)) {
        return false;
      }
    }
    return true;
  }

  /** True when every pool named in {@link requirements} exists and holds enough. */
  checkResourceAvailability(requirements: ResourceRequirements): boolean {
    for (const type of RESOURCE_TYPES) {
      const needed = requirements[type];
      if (needed === undefined) {
        continue;
      }
      const resource = this.resources.get(type);
      if (!resource || !resource.canConsume(needed)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Reserves the agent's slots and debits every pool together, or does
   * nothing and returns false.
   */
  assignTask(request: AssignmentRequest): boolean {
    const { agentId, timeSlot, duration } = request;
    if (
      !Number.isInteger(timeSlot) ||
      !Number.isInteger(duration) ||
      timeSlot < 0 ||
      duration < 1 ||
      timeSlot + duration > this.horizon
    ) {
      return false;
    }
    if (!this.isAgentAvailable(agentId, timeSlot, duration)) {
      return false;
    }
    if (!this.checkResourceAvailability(request.resourceRequirements)) {
      return false;
    }

    let reserved = this.reservations.get(agentId);
    if (!reserved) {
      reserved = new Set();
      this.reservations.set(agentId, reserved);
    }
    for (let slot = timeSlot; slot < timeSlot + duration; slot += 1) {
      reserved.add(slot);
    }
    for (const type of RESOURCE_TYPES) {
      const needed = request.resourceRequirements[type];
      if (needed !== undefined) {
        this.resources.get(type)?.consume(needed);
      }
    }
    this.assignments.push({
      ...request,
      targetCell: { x: request.targetCell.x, y: request.targetCell.y },
      resourceRequirements: { ...request.resourceRequirements },
    });
    return true;
  }

  /**
   * Validates and schedules {@link tasks}, returning the assignments made by
   * this call. Tasks that fit nowhere are skipped.
   *
   * @throws ScheduleSpecificationError when a task fails validation.
   */
  scheduleTasks(tasks: readonly SchedulableTaskInput[], roster: AgentRoster): TaskAssignment[] {
    const parsed = z.array(SchedulableTaskSchema).safeParse(tasks);
    if (!parsed.success) {
      throw new ScheduleSpecificationError("invalid task batch", "E-SCHED-SPEC", { issues: parsed.error.issues });
    }

    const ordered = parsed.data.slice().sort((a, b) => b.priority - a.priority);
    const made: TaskAssignment[] = [];
    for (const task of ordered) {
      const assignment = this.placeTask(task, roster);
      if (assignment) {
        made.push(assignment);
      } else {
        this.logger.debug("schedule_task_unplaced", { taskId: task.taskId, taskType: task.taskType });
      }
    }
    this.logger.info("schedule_batch_completed", { requested: tasks.length, scheduled: made.length });
    return made;
  }

  getAssignments(): TaskAssignment[] {
    return this.assignments.slice();
  }

  getScheduleMetrics(): ScheduleMetrics {
    if (this.assignments.length === 0) {
      return { totalTasks: 0, makespan: 0, resourceUtilization: {}, agentUtilization: {} };
    }
    const makespan = Math.max(...this.assignments.map((assignment) => assignment.timeSlot + assignment.duration));
    const resourceUtilization: Partial<Record<ResourceType, number>> = {};
    for (const [type, resource] of this.resources) {
      resourceUtilization[type] = resource.utilization;
    }
    const agentUtilization: Record<string, number> = {};
    for (const [agentId, slots] of this.reservations) {
      agentUtilization[agentId] = slots.size / this.horizon;
    }
    return { totalTasks: this.assignments.length, makespan, resourceUtilization, agentUtilization };
  }

  /** Drops every assignment and reservation and refills every pool to capacity. */
  reset(): void {
    this.assignments = [];
    this.reservations = new Map();
    for (const resource of this.resources.values()) {
      resource.replenish(resource.maxCapacity);
    }
  }

  private placeTask(task: SchedulableTask, roster: AgentRoster): TaskAssignment | undefined {
    const agentType = WORKER_FOR_TASK[task.taskType];
    const agents = roster[agentType] ?? [];
    for (const agentId of agents) {
      for (let slot = 0; slot + task.duration <= this.horizon; slot += 1) {
        const request: AssignmentRequest = {
          taskId: task.taskId,
          taskType: task.taskType,
          agentId,
          agentType,
          timeSlot: slot,
          duration: task.duration,
          targetCell: task.targetCell,
          resourceRequirements: task.resources,
          priority: task.priority,
        };
        if (this.assignTask(request)) {
          return this.assignments[this.assignments.length - 1];
        }
      }
    }
    return undefined;
  }
}
