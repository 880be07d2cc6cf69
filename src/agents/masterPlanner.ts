import { MessageChannel } from "../coord/channel.js";
import { TOPIC_TASK_ASSIGNED, type MessageByTopic, type TaskOffer } from "../coord/messages.js";
import { StructuredLogger } from "../logger.js";
import { PriorityQueue } from "../utils/priorityQueue.js";
import type { WorldAccessor } from "../world/gridWorld.js";
import {
  positionKey,
  WORKER_FOR_TASK,
  type CellAttributes,
  type CellState,
  type Position,
  type Task,
  type TaskType,
  type WorkerType,
} from "../world/types.js";
import { isHeatStressed, type WeatherReader, type WeatherState } from "../world/weather.js";
import type { WorkerHandle } from "./worker.js";

/** Planner's cached belief about one cell, rebuilt from the world every tick. */
export interface CellKnowledge {
  readonly position: Position;
  state: CellState;
  attributes: CellAttributes;
  lastUpdated: number;
  /** Identifiers of the tasks queued or in flight for this cell. */
  pendingTasks: string[];
}

export interface TaskProposal {
  readonly taskType: TaskType;
  readonly priority: number;
}

export interface MasterPlannerOptions {
  readonly world: WorldAccessor;
  readonly weather: WeatherReader;
  readonly channel: MessageChannel;
  readonly now: () => number;
  readonly logger?: StructuredLogger;
  /** New tasks per task type per scoring pass. Defaults to 10. */
  readonly maxTasksPerType?: number;
  /** Tasks offered to workers per tick. Defaults to 20. */
  readonly assignBurst?: number;
  readonly id?: string;
}

export interface PlannerStats {
  created: number;
  assigned: number;
  completed: number;
  failed: number;
  queued: number;
  active: number;
}

export const DISEASE_ALERT_PRIORITY = 95;

interface QueueEntry {
  readonly task: Task;
  /** Insertion order; equal priorities leave the queue first-in first-out. */
  readonly sequence: number;
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return b.task.priority - a.task.priority || a.sequence - b.sequence;
}

/**
 * Scores one cell. Diseased cells come first, then dry cells (more urgent
 * under heat stress, skipped when rain is coming and it is not hot), then
 * harvests, freshly sown cells, sowing and finally ploughing. Growing and
 * healthy cells need nothing.
 */
export function scoreCell(state: CellState, weather: Readonly<WeatherState>): TaskProposal | null {
  const rain = weather.rainForecast24h;
  const hot = isHeatStressed(weather);
  switch (state) {
    case "diseased":
      return { taskType: "water", priority: 100 };
    case "need_water":
      if (rain && !hot) {
        return null;
      }
      return { taskType: "water", priority: hot ? 95 : 90 };
    case "ready_to_harvest":
      return { taskType: "harvest", priority: 80 };
    case "sown":
      return { taskType: "water", priority: rain ? 50 : 70 };
    case "ploughed":
      return { taskType: "sow", priority: 60 };
    case "initial":
      return { taskType: "plough", priority: 50 };
    case "growing":
    case "healthy":
      return null;
  }
}

/**
 * Central coordinator. Each {@link step} refreshes the knowledge base from
 * the world, scores cells without pending work, and offers the most urgent
 * queued tasks to idle workers of the matching type through the channel.
 * Completion, failure and alert messages close out or spawn tasks.
 */
export class MasterPlanner {
  readonly id: string;
  private readonly world: WorldAccessor;
  private readonly weather: WeatherReader;
  private readonly channel: MessageChannel;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly maxTasksPerType: number;
  private readonly assignBurst: number;

  private readonly knowledge = new Map<string, CellKnowledge>();
  private readonly queue = new PriorityQueue<QueueEntry>(compareEntries);
  private readonly active = new Map<string, Task>();
  private readonly workers: WorkerHandle[] = [];
  private readonly disposers: Array<() => void> = [];
  private taskCounter = 0;
  private sequence = 0;
  private readonly counters = { created: 0, assigned: 0, completed: 0, failed: 0 };

  constructor(options: MasterPlannerOptions) {
    this.id = options.id ?? "master";
    this.world = options.world;
    this.weather = options.weather;
    this.channel = options.channel;
    this.now = options.now;
    this.logger = options.logger ?? new StructuredLogger({ stdout: false });
    this.maxTasksPerType = options.maxTasksPerType ?? 10;
    this.assignBurst = options.assignBurst ?? 20;

    for (let x = 0; x < this.world.width; x += 1) {
      for (let y = 0; y < this.world.height; y += 1) {
        const position = { x, y };
        this.knowledge.set(positionKey(position), {
          position,
          state: this.world.getCellState(position),
          attributes: this.world.getCellAttributes(position),
          lastUpdated: this.now(),
          pendingTasks: [],
        });
      }
    }

    this.disposers.push(
      this.channel.subscribe("task.completed", (message) => this.handleCompletion(message)),
      this.channel.subscribe("task.failed", (message) => this.handleFailure(message)),
      this.channel.subscribe("alert.disease", (message) => this.handleDiseaseAlert(message)),
      this.channel.subscribe("alert.obstacle", (message) => this.handleObstacleAlert(message)),
      this.channel.subscribe("status.update", (message) => this.handleStatusUpdate(message)),
    );
  }

  /** Makes {@link worker} eligible for offers of its type. Registration order decides ties. */
  registerWorker(worker: WorkerHandle): void {
    if (this.workers.some((candidate) => candidate.id === worker.id)) {
      return;
    }
    this.workers.push(worker);
  }

  registeredWorkers(type?: WorkerType): readonly WorkerHandle[] {
    return type ? this.workers.filter((worker) => worker.agentType === type) : this.workers.slice();
  }

  /** Stops listening to the channel. */
  detach(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
  }

  step(): void {
    this.refreshKnowledge();
    this.planTasks();
    this.assignPendingTasks();
  }

  refreshKnowledge(): void {
    const tick = this.now();
    for (const entry of this.knowledge.values()) {
      entry.state = this.world.getCellState(entry.position);
      entry.attributes = this.world.getCellAttributes(entry.position);
      entry.lastUpdated = tick;
    }
  }

  /**
   * Scores every cell without pending work, reading only the knowledge base.
   * A type is skipped once its tasks in flight plus those created in this
   * pass reach `maxTasksPerType`; tasks still queued from earlier passes are
   * not counted.
   */
  planTasks(): Task[] {
    const weather = this.weather.current();
    const perType = new Map<TaskType, number>();
    for (const task of this.active.values()) {
      perType.set(task.taskType, (perType.get(task.taskType) ?? 0) + 1);
    }

    const created: Task[] = [];
    for (const entry of this.knowledge.values()) {
      if (entry.pendingTasks.length > 0) {
        continue;
      }
      const proposal = scoreCell(entry.state, weather);
      if (!proposal) {
        continue;
      }
      const count = perType.get(proposal.taskType) ?? 0;
      if (count >= this.maxTasksPerType) {
        continue;
      }
      created.push(this.createTask(proposal.taskType, entry.position, proposal.priority));
      perType.set(proposal.taskType, count + 1);
    }
    return created;
  }

  /** Queues a new task and records it against its cell. */
  createTask(taskType: TaskType, targetCell: Position, priority: number): Task {
    this.taskCounter += 1;
    const task: Task = {
      taskId: `task-${this.taskCounter}`,
      taskType,
      targetCell: { x: targetCell.x, y: targetCell.y },
      priority,
      status: "pending",
      assignedTo: null,
      createdAt: this.now(),
      completedAt: null,
    };
    this.sequence += 1;
    this.queue.push({ task, sequence: this.sequence });
    this.knowledge.get(positionKey(targetCell))?.pendingTasks.push(task.taskId);
    this.counters.created += 1;
    return task;
  }

  /**
   * Offers up to `assignBurst` tasks, most urgent first, each to an idle
   * worker of the matching type, one offer per worker per call. Tasks whose
   * type has no idle worker left are skipped without using up the burst and
   * go back into the queue with their original insertion order.
   */
  assignPendingTasks(): number {
    const idle = this.workers.filter((worker) => worker.status === "idle");
    const deferred: QueueEntry[] = [];
    let assigned = 0;

    while (assigned < this.assignBurst && idle.length > 0) {
      const entry = this.queue.pop();
      if (!entry) {
        break;
      }
      const workerType = WORKER_FOR_TASK[entry.task.taskType];
      const index = idle.findIndex((candidate) => candidate.agentType === workerType);
      if (index < 0) {
        deferred.push(entry);
        continue;
      }
      const [worker] = idle.splice(index, 1);
      this.offer(entry.task, worker);
      assigned += 1;
    }

    for (const entry of deferred) {
      this.queue.push(entry);
    }
    return assigned;
  }

  getKnowledge(position: Position): CellKnowledge | undefined {
    const entry = this.knowledge.get(positionKey(position));
    if (!entry) {
      return undefined;
    }
    return {
      position: entry.position,
      state: entry.state,
      attributes: { ...entry.attributes },
      lastUpdated: entry.lastUpdated,
      pendingTasks: entry.pendingTasks.slice(),
    };
  }

  /** Tasks offered to a worker and not yet closed out. */
  activeTasks(): Task[] {
    return Array.from(this.active.values(), (task) => ({ ...task }));
  }

  /** Queued tasks, most urgent first. */
  queuedTasks(): Task[] {
    return [...this.queue.values()]
      .sort(compareEntries)
      .map((entry) => ({ ...entry.task }));
  }

  get stats(): PlannerStats {
    return { ...this.counters, queued: this.queue.size, active: this.active.size };
  }

  private offer(task: Task, worker: WorkerHandle): void {
    task.status = "assigned";
    task.assignedTo = worker.id;
    this.active.set(task.taskId, task);
    this.counters.assigned += 1;

    const offer: TaskOffer = {
      taskId: task.taskId,
      taskType: task.taskType,
      targetCell: task.targetCell,
      priority: task.priority,
      createdAt: task.createdAt,
    };
    this.channel.publish(TOPIC_TASK_ASSIGNED, {
      topic: TOPIC_TASK_ASSIGNED,
      senderId: this.id,
      timestamp: this.now(),
      payload: { task: offer, workerId: worker.id, workerType: worker.agentType },
    });
    this.logger.debug("task_assigned", { taskId: task.taskId, workerId: worker.id, priority: task.priority });
  }

  private close(taskId: string, status: "completed" | "failed"): Task | undefined {
    const task = this.active.get(taskId);
    if (!task) {
      return undefined;
    }
    task.status = status;
    task.completedAt = this.now();
    this.active.delete(taskId);
    const entry = this.knowledge.get(positionKey(task.targetCell));
    if (entry) {
      entry.pendingTasks = entry.pendingTasks.filter((pending) => pending !== taskId);
    }
    return task;
  }

  private handleCompletion(message: MessageByTopic["task.completed"]): void {
    const task = this.close(message.payload.taskId, "completed");
    if (task) {
      this.counters.completed += 1;
      this.logger.debug("task_completed", { taskId: task.taskId, action: message.payload.action });
    }
  }

  private handleFailure(message: MessageByTopic["task.failed"]): void {
    const task = this.close(message.payload.taskId, "failed");
    if (task) {
      this.counters.failed += 1;
      this.logger.info("task_dropped", {
        taskId: task.taskId,
        reason: message.payload.reason,
        workerId: message.senderId,
        cell: task.targetCell,
      });
    }
  }

  private handleDiseaseAlert(message: MessageByTopic["alert.disease"]): void {
    const cell = message.payload.cellPosition;
    const entry = this.knowledge.get(positionKey(cell));
    if (!entry) {
      return;
    }
    const pendingWater = entry.pendingTasks
      .map((taskId) => this.findTask(taskId))
      .find((task) => task?.taskType === "water");
    if (pendingWater) {
      this.escalate(pendingWater.taskId);
      return;
    }
    const task = this.createTask("water", cell, DISEASE_ALERT_PRIORITY);
    this.logger.info("disease_alert_received", {
      cell,
      diseaseProbability: message.payload.diseaseProbability,
      taskId: task.taskId,
    });
  }

  /** Raises a queued task to the disease alert priority. Tasks in flight are left alone. */
  private escalate(taskId: string): void {
    const entry = this.queue.remove(
      (candidate) => candidate.task.taskId === taskId && candidate.task.priority < DISEASE_ALERT_PRIORITY,
    );
    if (!entry) {
      return;
    }
    this.queue.push({ task: { ...entry.task, priority: DISEASE_ALERT_PRIORITY }, sequence: entry.sequence });
    this.logger.info("disease_alert_escalated", {
      taskId,
      from: entry.task.priority,
      to: DISEASE_ALERT_PRIORITY,
    });
  }

  private handleObstacleAlert(message: MessageByTopic["alert.obstacle"]): void {
    this.logger.warn("obstacle_reported", { cell: message.payload.cellPosition, workerId: message.payload.reportedBy });
  }

  private handleStatusUpdate(message: MessageByTopic["status.update"]): void {
    if (this.logger.isLevelEnabled("debug")) {
      this.logger.debug("worker_status", { workerId: message.payload.report.agentId, note: message.payload.report.note });
    }
  }

  private findTask(taskId: string): Task | undefined {
    const active = this.active.get(taskId);
    if (active) {
      return active;
    }
    return this.queue.values().find((entry) => entry.task.taskId === taskId)?.task;
  }
}
