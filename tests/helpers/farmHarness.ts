import type { WorkerContext } from "../../src/agents/worker.js";
import { MessageChannel } from "../../src/coord/channel.js";
import {
  CHANNEL_TOPICS,
  TOPIC_TASK_ASSIGNED,
  type ChannelMessage,
  type TaskOffer,
} from "../../src/coord/messages.js";
import { GridWorld } from "../../src/world/gridWorld.js";
import type { Position, TaskType, WorkerType } from "../../src/world/types.js";
import { WeatherStation, type WeatherState } from "../../src/world/weather.js";
import { RecordingLogger } from "./recordingLogger.js";

/** Tick counter standing in for the farm model's clock. */
export class ManualTicks {
  private current = 0;

  now(): number {
    return this.current;
  }

  advance(ticks = 1): void {
    this.current += ticks;
  }
}

export interface Harness {
  world: GridWorld;
  weather: WeatherStation;
  channel: MessageChannel;
  ticks: ManualTicks;
  logger: RecordingLogger;
  obstacles: Position[];
  /** Every message delivered so far, in delivery order. */
  delivered: ChannelMessage[];
  context: WorkerContext;
}

/** Wires an isolated world, weather station and channel for agent tests. */
export function createHarness(width: number, height: number, weather: Partial<WeatherState> = {}): Harness {
  const world = new GridWorld(width, height);
  const station = new WeatherStation(weather);
  const logger = new RecordingLogger();
  const channel = new MessageChannel({ logger });
  const ticks = new ManualTicks();
  const obstacles: Position[] = [];
  const delivered: ChannelMessage[] = [];
  for (const topic of CHANNEL_TOPICS) {
    channel.subscribe(topic, (message) => delivered.push(message));
  }
  return {
    world,
    weather: station,
    channel,
    ticks,
    logger,
    obstacles,
    delivered,
    context: {
      world,
      weather: station,
      channel,
      now: () => ticks.now(),
      logger,
      obstacles: () => obstacles,
    },
  };
}

/** Publishes an assignment as the planner would. */
export function offerTask(
  harness: Harness,
  workerId: string,
  workerType: WorkerType,
  taskType: TaskType,
  targetCell: Position,
  taskId = "task-1",
): TaskOffer {
  const task: TaskOffer = { taskId, taskType, targetCell, priority: 50, createdAt: harness.ticks.now() };
  harness.channel.publish(TOPIC_TASK_ASSIGNED, {
    topic: TOPIC_TASK_ASSIGNED,
    senderId: "master",
    timestamp: harness.ticks.now(),
    payload: { task, workerId, workerType },
  });
  return task;
}

export function topicsOf(messages: readonly ChannelMessage[]): string[] {
  return messages.map((message) => message.topic);
}
