import type { Position, TaskType, WorkerStatus, WorkerType } from "../world/types.js";

export const TOPIC_TASK_ASSIGNED = "task.assigned";
export const TOPIC_TASK_COMPLETED = "task.completed";
export const TOPIC_TASK_FAILED = "task.failed";
export const TOPIC_STATUS_UPDATE = "status.update";
export const TOPIC_ALERT_DISEASE = "alert.disease";
export const TOPIC_ALERT_OBSTACLE = "alert.obstacle";

/** Immutable view of a task handed to a worker with an assignment. */
export interface TaskOffer {
  readonly taskId: string;
  readonly taskType: TaskType;
  readonly targetCell: Position;
  readonly priority: number;
  readonly createdAt: number;
}

export interface AssignmentPayload {
  readonly task: TaskOffer;
  /** Worker the planner selected for the task. */
  readonly workerId: string;
  readonly workerType: WorkerType;
}

export type CompletionAction = "ploughed" | "sown" | "watered" | "watering_delayed" | "harvested";

export interface CompletionPayload {
  readonly taskId: string;
  readonly cellPosition: Position;
  readonly action: CompletionAction;
  /** Present on `watering_delayed`. */
  readonly reason?: "rain_forecast";
  /** Present on `harvested`. */
  readonly yield?: number;
}

/**
 * - `no_path`: the pathfinder could not reach the target.
 * - `precondition_failed`: the cell no longer accepts the task effect.
 * - `worker_busy`: the offer reached a worker that already holds a task.
 */
export type FailureReason = "no_path" | "precondition_failed" | "worker_busy";

export interface FailurePayload {
  readonly taskId: string;
  readonly cellPosition: Position;
  readonly reason: FailureReason;
}

export interface StatusReport {
  readonly agentId: string;
  readonly agentType: WorkerType;
  readonly position: Position;
  readonly status: WorkerStatus;
  readonly currentTask: string | null;
  readonly note: string;
}

export interface StatusReportPayload {
  readonly report: StatusReport;
  readonly taskId: string;
  readonly cellPosition: Position;
}

export interface DiseaseAlertPayload {
  readonly cellPosition: Position;
  readonly diseaseProbability: number;
  readonly waterLevel: number;
}

export interface ObstacleAlertPayload {
  readonly cellPosition: Position;
  readonly reportedBy: string;
}

/** Fields shared by every message travelling through the channel. */
export interface ChannelEnvelope<Topic extends string, Payload> {
  readonly topic: Topic;
  readonly senderId: string;
  /** Tick at which the message was published. */
  readonly timestamp: number;
  readonly payload: Payload;
}

/** Topic → message mapping; the single source of truth for dispatch typing. */
export interface MessageByTopic {
  [TOPIC_TASK_ASSIGNED]: ChannelEnvelope<typeof TOPIC_TASK_ASSIGNED, AssignmentPayload>;
  [TOPIC_TASK_COMPLETED]: ChannelEnvelope<typeof TOPIC_TASK_COMPLETED, CompletionPayload>;
  [TOPIC_TASK_FAILED]: ChannelEnvelope<typeof TOPIC_TASK_FAILED, FailurePayload>;
  [TOPIC_STATUS_UPDATE]: ChannelEnvelope<typeof TOPIC_STATUS_UPDATE, StatusReportPayload>;
  [TOPIC_ALERT_DISEASE]: ChannelEnvelope<typeof TOPIC_ALERT_DISEASE, DiseaseAlertPayload>;
  [TOPIC_ALERT_OBSTACLE]: ChannelEnvelope<typeof TOPIC_ALERT_OBSTACLE, ObstacleAlertPayload>;
}

export type ChannelTopic = keyof MessageByTopic;

export type ChannelMessage = MessageByTopic[ChannelTopic];

export const CHANNEL_TOPICS: readonly ChannelTopic[] = [
  TOPIC_TASK_ASSIGNED,
  TOPIC_TASK_COMPLETED,
  TOPIC_TASK_FAILED,
  TOPIC_STATUS_UPDATE,
  TOPIC_ALERT_DISEASE,
  TOPIC_ALERT_OBSTACLE,
];
