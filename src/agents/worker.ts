import { MessageChannel } from "../coord/channel.js";
import {
  TOPIC_ALERT_OBSTACLE,
  TOPIC_STATUS_UPDATE,
  TOPIC_TASK_ASSIGNED,
  TOPIC_TASK_COMPLETED,
  TOPIC_TASK_FAILED,
  type CompletionPayload,
  type FailureReason,
  type MessageByTopic,
  type TaskOffer,
} from "../coord/messages.js";
import { StructuredLogger } from "../logger.js";
import { findPath } from "../pathfinding/aStar.js";
import type { WorldAccessor } from "../world/gridWorld.js";
import { samePosition, type Position, type WorkerStatus, type WorkerType } from "../world/types.js";
import type { WeatherReader } from "../world/weather.js";

/** Shared collaborators every worker reads or writes through. */
export interface WorkerContext {
  readonly world: WorldAccessor;
  readonly weather: WeatherReader;
  readonly channel: MessageChannel;
  /** Current tick. */
  readonly now: () => number;
  readonly logger?: StructuredLogger;
  /** Cells the pathfinder must route around. Empty by default. */
  readonly obstacles?: () => Iterable<Position>;
}

export interface WorkerOptions {
  /** Path steps consumed per tick while moving. Defaults to 3. */
  readonly moveBurst?: number;
}

/** Read-only view of a worker, used by the planner and the telemetry layer. */
export interface WorkerHandle {
  readonly id: string;
  readonly agentType: WorkerType;
  readonly status: WorkerStatus;
  readonly position: Position;
  readonly currentTask: TaskOffer | null;
}

/** What a task effect reports back when its precondition held. */
export type CompletionDetails = Omit<CompletionPayload, "taskId" | "cellPosition">;

export const DEFAULT_MOVE_BURST = 3;

type TaskOutcome = { kind: "completed"; action: CompletionPayload["action"] } | { kind: "failed"; reason: FailureReason };

/**
 * Base worker implementing the `idle → moving → working → completed → idle`
 * lifecycle. Each call to {@link step} handles exactly one state. Subclasses
 * only provide {@link execute}, the effect applied once the worker stands on
 * the target cell.
 *
 * A worker holds at most one task; {@link currentTask} is `null` exactly when
 * the worker is idle.
 */
export abstract class WorkerAgent implements WorkerHandle {
  private state: WorkerStatus = "idle";
  private location: Position;
  private task: TaskOffer | null = null;
  private target: Position | null = null;
  private path: Position[] = [];
  private outcome: TaskOutcome | null = null;
  private completedCount = 0;
  private failedCount = 0;
  private readonly disposeSubscription: () => void;

  protected readonly context: WorkerContext;
  protected readonly logger: StructuredLogger;
  protected readonly moveBurst: number;

  constructor(
    public readonly id: string,
    public readonly agentType: WorkerType,
    position: Position,
    context: WorkerContext,
    options: WorkerOptions = {},
  ) {
    this.location = { x: position.x, y: position.y };
    this.context = context;
    this.logger = context.logger ?? new StructuredLogger({ stdout: false });
    this.moveBurst = options.moveBurst ?? DEFAULT_MOVE_BURST;
    if (!Number.isInteger(this.moveBurst) || this.moveBurst < 1) {
      throw new RangeError(`moveBurst must be a positive integer, received ${this.moveBurst}`);
    }
    this.disposeSubscription = context.channel.subscribe(TOPIC_TASK_ASSIGNED, (message) => this.receiveTask(message));
  }

  get status(): WorkerStatus {
    return this.state;
  }

  get position(): Position {
    return { x: this.location.x, y: this.location.y };
  }

  get currentTask(): TaskOffer | null {
    return this.task;
  }

  /** Remaining waypoints, excluding the current position. */
  get remainingPath(): readonly Position[] {
    return this.path.slice();
  }

  get tasksCompleted(): number {
    return this.completedCount;
  }

  get tasksFailed(): number {
    return this.failedCount;
  }

  /** Stops listening for assignments. */
  detach(): void {
    this.disposeSubscription();
  }

  /** Advances the lifecycle by one state. */
  step(): void {
    switch (this.state) {
      case "idle":
        this.onIdle();
        return;
      case "moving":
        this.advanceAlongPath();
        return;
      case "working":
        this.performTask();
        return;
      case "completed":
        this.finishTask();
        return;
    }
  }

  /**
   * Handles an assignment. Offers addressed to another worker or another
   * worker type are ignored; offers reaching a busy worker are refused with a
   * `worker_busy` failure.
   */
  receiveTask(message: MessageByTopic["task.assigned"]): void {
    const { task, workerId, workerType } = message.payload;
    if (workerType !== this.agentType || workerId !== this.id) {
      return;
    }
    if (this.state !== "idle" || this.task !== null) {
      this.publishFailure(task.taskId, task.targetCell, "worker_busy");
      return;
    }

    const path = findPath(
      this.location,
      task.targetCell,
      this.context.world.width,
      this.context.world.height,
      this.context.obstacles?.() ?? [],
    );
    if (path.length === 0) {
      this.logger.warn("worker_no_path", { workerId: this.id, taskId: task.taskId, target: task.targetCell });
      this.context.channel.publish(TOPIC_ALERT_OBSTACLE, {
        topic: TOPIC_ALERT_OBSTACLE,
        senderId: this.id,
        timestamp: this.context.now(),
        payload: { cellPosition: task.targetCell, reportedBy: this.id },
      });
      this.publishFailure(task.taskId, task.targetCell, "no_path");
      return;
    }

    const first = path[0];
    if (first && samePosition(first, this.location)) {
      path.shift();
    }
    this.task = task;
    this.target = task.targetCell;
    this.path = path;
    this.state = "moving";
    this.logger.debug("worker_task_accepted", { workerId: this.id, taskId: task.taskId, steps: path.length });
  }

  /** Effect applied on arrival. Returns `null` when the cell no longer accepts it. */
  protected abstract execute(task: TaskOffer): CompletionDetails | null;

  /** Hook invoked on ticks spent idle. */
  protected onIdle(): void {}

  private advanceAlongPath(): void {
    const target = this.target;
    let steps = 0;
    while (steps < this.moveBurst && this.path.length > 0) {
      const next = this.path.shift();
      if (!next) {
        break;
      }
      this.location = { x: next.x, y: next.y };
      steps += 1;
      if (target && samePosition(this.location, target)) {
        break;
      }
    }
    if (this.path.length === 0 || (target !== null && samePosition(this.location, target))) {
      this.state = "working";
    }
  }

  private performTask(): void {
    const task = this.task;
    if (task) {
      const details = this.execute(task);
      if (details) {
        this.completedCount += 1;
        this.outcome = { kind: "completed", action: details.action };
        this.context.channel.publish(TOPIC_TASK_COMPLETED, {
          topic: TOPIC_TASK_COMPLETED,
          senderId: this.id,
          timestamp: this.context.now(),
          payload: { taskId: task.taskId, cellPosition: task.targetCell, ...details },
        });
      } else {
        this.outcome = { kind: "failed", reason: "precondition_failed" };
        this.publishFailure(task.taskId, task.targetCell, "precondition_failed");
      }
    }
    this.state = "completed";
  }

  private finishTask(): void {
    const task = this.task;
    if (task) {
      const outcome = this.outcome;
      const note =
        outcome?.kind === "failed"
          ? `${this.agentType} worker abandoned task (${outcome.reason})`
          : `${this.agentType} worker completed task`;
      this.context.channel.publish(TOPIC_STATUS_UPDATE, {
        topic: TOPIC_STATUS_UPDATE,
        senderId: this.id,
        timestamp: this.context.now(),
        payload: {
          taskId: task.taskId,
          cellPosition: task.targetCell,
          report: {
            agentId: this.id,
            agentType: this.agentType,
            position: this.position,
            status: this.state,
            currentTask: task.taskId,
            note,
          },
        },
      });
    }
    this.task = null;
    this.target = null;
    this.path = [];
    this.outcome = null;
    this.state = "idle";
  }

  private publishFailure(taskId: string, cellPosition: Position, reason: FailureReason): void {
    if (reason !== "worker_busy") {
      this.failedCount += 1;
    }
    this.context.channel.publish(TOPIC_TASK_FAILED, {
      topic: TOPIC_TASK_FAILED,
      senderId: this.id,
      timestamp: this.context.now(),
      payload: { taskId, cellPosition, reason },
    });
  }
}
