import { describe, it } from "mocha";
import { expect } from "chai";

import { MasterPlanner, scoreCell, type MasterPlannerOptions } from "../src/agents/masterPlanner.js";
import {
  TOPIC_ALERT_DISEASE,
  TOPIC_TASK_COMPLETED,
  TOPIC_TASK_FAILED,
  type TaskOffer,
} from "../src/coord/messages.js";
import type { CellState, Position, WorkerStatus, WorkerType } from "../src/world/types.js";
import { INITIAL_WEATHER } from "../src/world/weather.js";
import { createHarness, topicsOf, type Harness } from "./helpers/farmHarness.js";

interface FakeWorker {
  id: string;
  agentType: WorkerType;
  status: WorkerStatus;
  position: Position;
  currentTask: TaskOffer | null;
}

function fakeWorker(id: string, agentType: WorkerType, status: WorkerStatus = "idle"): FakeWorker {
  return { id, agentType, status, position: { x: 0, y: 0 }, currentTask: null };
}

function createPlanner(harness: Harness, options: Partial<MasterPlannerOptions> = {}): MasterPlanner {
  return new MasterPlanner({
    world: harness.world,
    weather: harness.weather,
    channel: harness.channel,
    now: () => harness.ticks.now(),
    logger: harness.logger,
    ...options,
  });
}

function publishDiseaseAlert(harness: Harness, cellPosition: Position): void {
  harness.channel.publish(TOPIC_ALERT_DISEASE, {
    topic: TOPIC_ALERT_DISEASE,
    senderId: "monitoring-1",
    timestamp: harness.ticks.now(),
    payload: { cellPosition, diseaseProbability: 0.9, waterLevel: 0.2 },
  });
}

describe("agents master planner", () => {
  describe("cell scoring", () => {
    const mild = { ...INITIAL_WEATHER, temperature: 25, rainForecast24h: false };
    const rainy = { ...mild, rainForecast24h: true };
    const hotRain = { ...rainy, temperature: 34 };
    const hot = { ...mild, temperature: 34 };

    const table: Array<[CellState, typeof mild, ReturnType<typeof scoreCell>]> = [
      ["diseased", mild, { taskType: "water", priority: 100 }],
      ["need_water", mild, { taskType: "water", priority: 90 }],
      ["need_water", hot, { taskType: "water", priority: 95 }],
      ["need_water", rainy, null],
      ["need_water", hotRain, { taskType: "water", priority: 95 }],
      ["ready_to_harvest", mild, { taskType: "harvest", priority: 80 }],
      ["sown", mild, { taskType: "water", priority: 70 }],
      ["sown", rainy, { taskType: "water", priority: 50 }],
      ["ploughed", mild, { taskType: "sow", priority: 60 }],
      ["initial", mild, { taskType: "plough", priority: 50 }],
      ["growing", mild, null],
      ["healthy", hot, null],
    ];

    for (const [state, weather, expected] of table) {
      it(`scores ${state} at ${weather.temperature}°C${weather.rainForecast24h ? " with rain" : ""}`, () => {
        expect(scoreCell(state, weather)).to.deep.equal(expected);
      });
    }
  });

  it("skips cells with pending work and caps new tasks per type", () => {
    const harness = createHarness(3, 3);
    const planner = createPlanner(harness, { maxTasksPerType: 4 });

    const first = planner.planTasks();
    expect(first.map((task) => task.taskId)).to.deep.equal(["task-1", "task-2", "task-3", "task-4"]);
    expect(first.map((task) => task.targetCell)).to.deep.equal([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 0, y: 2 },
      { x: 1, y: 0 },
    ]);
    expect(first.every((task) => task.taskType === "plough" && task.priority === 50)).to.equal(true);

    const second = planner.planTasks();
    expect(second.map((task) => task.targetCell)).to.deep.equal([
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
    ]);
    expect(planner.stats.queued).to.equal(8);
    expect(planner.getKnowledge({ x: 0, y: 0 })?.pendingTasks).to.deep.equal(["task-1"]);
  });

  it("counts tasks in flight against the per-type cap", () => {
    const harness = createHarness(3, 3);
    const planner = createPlanner(harness, { maxTasksPerType: 2 });
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.registerWorker(fakeWorker("ploughing-2", "ploughing"));

    planner.step();
    expect(planner.stats.active).to.equal(2);
    expect(planner.planTasks()).to.deep.equal([]);
  });

  it("leaves dry cells alone while rain is forecast and it is mild", () => {
    const harness = createHarness(1, 1, { rainForecast24h: true, temperature: 25 });
    harness.world.setCellState({ x: 0, y: 0 }, "need_water");
    const planner = createPlanner(harness);

    expect(planner.planTasks()).to.deep.equal([]);

    harness.weather.set({ temperature: 34 });
    const created = planner.planTasks();
    expect(created.map((task) => [task.taskType, task.priority])).to.deep.equal([["water", 95]]);
  });

  it("offers the most urgent task to an idle worker of the matching type", () => {
    const harness = createHarness(3, 1);
    harness.world.setCellState({ x: 1, y: 0 }, "ready_to_harvest");
    harness.world.setCellState({ x: 2, y: 0 }, "diseased");
    const planner = createPlanner(harness);
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));

    planner.planTasks();
    expect(planner.queuedTasks().map((task) => task.taskId)).to.deep.equal(["task-3", "task-2", "task-1"]);

    expect(planner.assignPendingTasks()).to.equal(1);
    harness.channel.flush();

    expect(topicsOf(harness.delivered)).to.deep.equal(["task.assigned"]);
    expect(harness.delivered[0].payload).to.deep.equal({
      task: { taskId: "task-1", taskType: "plough", targetCell: { x: 0, y: 0 }, priority: 50, createdAt: 0 },
      workerId: "ploughing-1",
      workerType: "ploughing",
    });
    expect(planner.queuedTasks().map((task) => task.taskId)).to.deep.equal(["task-3", "task-2"]);
    expect(planner.activeTasks().map((task) => [task.taskId, task.status, task.assignedTo])).to.deep.equal([
      ["task-1", "assigned", "ploughing-1"],
    ]);
    expect(planner.stats).to.deep.equal({ created: 3, assigned: 1, completed: 0, failed: 0, queued: 2, active: 1 });
  });

  it("offers at most one task per worker per pass and skips busy workers", () => {
    const harness = createHarness(3, 3);
    const planner = createPlanner(harness);
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.registerWorker(fakeWorker("ploughing-2", "ploughing", "moving"));
    planner.registerWorker(fakeWorker("ploughing-3", "ploughing"));

    planner.planTasks();
    expect(planner.assignPendingTasks()).to.equal(2);
    harness.channel.flush();

    const recipients = harness.delivered.map((message) =>
      message.topic === "task.assigned" ? message.payload.workerId : message.topic,
    );
    expect(recipients).to.deep.equal(["ploughing-1", "ploughing-3"]);
    expect(planner.stats.queued).to.equal(7);
  });

  it("offers no more than the assignment burst per pass", () => {
    const harness = createHarness(3, 1);
    const planner = createPlanner(harness, { assignBurst: 1 });
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.registerWorker(fakeWorker("ploughing-2", "ploughing"));

    planner.planTasks();

    expect(planner.assignPendingTasks()).to.equal(1);
    expect(planner.stats.queued).to.equal(2);
  });

  it("keeps feeding idle workers while a busier type fills the front of the queue", () => {
    const harness = createHarness(26, 1);
    for (let x = 0; x < 25; x += 1) {
      harness.world.setCellState({ x, y: 0 }, "need_water");
    }
    harness.world.setCellState({ x: 25, y: 0 }, "growing");
    const planner = createPlanner(harness, { maxTasksPerType: 30 });
    planner.registerWorker(fakeWorker("watering-1", "watering", "working"));
    planner.registerWorker(fakeWorker("harvesting-1", "harvesting"));

    for (let pass = 0; pass < 3; pass += 1) {
      planner.step();
    }
    expect(planner.stats.queued).to.equal(25);

    harness.world.setCellState({ x: 25, y: 0 }, "ready_to_harvest");
    planner.step();

    expect(planner.activeTasks().map((task) => [task.taskId, task.taskType, task.assignedTo])).to.deep.equal([
      ["task-26", "harvest", "harvesting-1"],
    ]);
    expect(planner.stats.queued).to.equal(25);
    expect(planner.queuedTasks().every((task) => task.taskType === "water")).to.equal(true);
  });

  it("does not spend the burst on tasks nobody can take", () => {
    const harness = createHarness(3, 1);
    harness.world.setCellState({ x: 0, y: 0 }, "diseased");
    harness.world.setCellState({ x: 1, y: 0 }, "ploughed");
    const planner = createPlanner(harness, { assignBurst: 1 });
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));

    planner.planTasks();

    expect(planner.assignPendingTasks()).to.equal(1);
    expect(planner.activeTasks().map((task) => task.taskId)).to.deep.equal(["task-3"]);
    expect(planner.queuedTasks().map((task) => task.taskId)).to.deep.equal(["task-1", "task-2"]);
  });

  it("closes out completed tasks and frees their cell", () => {
    const harness = createHarness(1, 1);
    const planner = createPlanner(harness);
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.step();
    harness.channel.flush();

    harness.channel.publish(TOPIC_TASK_COMPLETED, {
      topic: TOPIC_TASK_COMPLETED,
      senderId: "ploughing-1",
      timestamp: 1,
      payload: { taskId: "task-1", cellPosition: { x: 0, y: 0 }, action: "ploughed" },
    });
    harness.channel.flush();

    expect(planner.activeTasks()).to.deep.equal([]);
    expect(planner.getKnowledge({ x: 0, y: 0 })?.pendingTasks).to.deep.equal([]);
    expect(planner.stats.completed).to.equal(1);
  });

  it("drops failed tasks so the cell is rescored", () => {
    const harness = createHarness(1, 1);
    const planner = createPlanner(harness);
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.step();
    harness.channel.flush();

    harness.channel.publish(TOPIC_TASK_FAILED, {
      topic: TOPIC_TASK_FAILED,
      senderId: "ploughing-1",
      timestamp: 1,
      payload: { taskId: "task-1", cellPosition: { x: 0, y: 0 }, reason: "no_path" },
    });
    harness.channel.flush();

    expect(planner.stats.failed).to.equal(1);
    expect(harness.logger.find("task_dropped")).to.deep.equal([
      {
        level: "info",
        message: "task_dropped",
        payload: { taskId: "task-1", reason: "no_path", workerId: "ploughing-1", cell: { x: 0, y: 0 } },
      },
    ]);
    expect(planner.planTasks().map((task) => task.taskId)).to.deep.equal(["task-2"]);
  });

  it("ignores outcomes for unknown tasks", () => {
    const harness = createHarness(1, 1);
    const planner = createPlanner(harness);

    harness.channel.publish(TOPIC_TASK_COMPLETED, {
      topic: TOPIC_TASK_COMPLETED,
      senderId: "ploughing-9",
      timestamp: 1,
      payload: { taskId: "task-42", cellPosition: { x: 0, y: 0 }, action: "ploughed" },
    });
    harness.channel.flush();

    expect(planner.stats).to.deep.equal({ created: 0, assigned: 0, completed: 0, failed: 0, queued: 0, active: 0 });
  });

  it("turns a disease alert into one urgent watering task beyond the cap and escalates queued ones", () => {
    const harness = createHarness(2, 1);
    harness.world.setCellState({ x: 0, y: 0 }, "sown");
    harness.world.setCellState({ x: 1, y: 0 }, "growing");
    const planner = createPlanner(harness, { maxTasksPerType: 1 });
    planner.planTasks();

    publishDiseaseAlert(harness, { x: 1, y: 0 });
    publishDiseaseAlert(harness, { x: 1, y: 0 });
    publishDiseaseAlert(harness, { x: 0, y: 0 });
    publishDiseaseAlert(harness, { x: 7, y: 7 });
    harness.channel.flush();

    expect(planner.queuedTasks().map((task) => [task.taskId, task.taskType, task.priority])).to.deep.equal([
      ["task-1", "water", 95],
      ["task-2", "water", 95],
    ]);
    expect(harness.logger.find("disease_alert_received")).to.have.length(1);
    expect(harness.logger.find("disease_alert_escalated")).to.deep.equal([
      { level: "info", message: "disease_alert_escalated", payload: { taskId: "task-1", from: 70, to: 95 } },
    ]);
    expect(planner.stats.created).to.equal(2);
  });

  it("refreshes its knowledge from the world on demand", () => {
    const harness = createHarness(2, 2);
    const planner = createPlanner(harness);
    harness.world.setCellState({ x: 1, y: 1 }, "ploughed");
    harness.ticks.advance(3);

    expect(planner.getKnowledge({ x: 1, y: 1 })?.state).to.equal("initial");
    planner.refreshKnowledge();
    const knowledge = planner.getKnowledge({ x: 1, y: 1 });
    expect(knowledge?.state).to.equal("ploughed");
    expect(knowledge?.lastUpdated).to.equal(3);
    expect(planner.getKnowledge({ x: 5, y: 5 })).to.equal(undefined);
  });

  it("registers each worker once", () => {
    const harness = createHarness(1, 1);
    const planner = createPlanner(harness);
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.registerWorker(fakeWorker("ploughing-1", "ploughing"));
    planner.registerWorker(fakeWorker("sowing-1", "sowing"));

    expect(planner.registeredWorkers().map((worker) => worker.id)).to.deep.equal(["ploughing-1", "sowing-1"]);
    expect(planner.registeredWorkers("sowing").map((worker) => worker.id)).to.deep.equal(["sowing-1"]);
  });

  it("stops reacting to the channel once detached", () => {
    const harness = createHarness(1, 1);
    const planner = createPlanner(harness);
    planner.detach();

    publishDiseaseAlert(harness, { x: 0, y: 0 });
    harness.channel.flush();

    expect(planner.stats.created).to.equal(0);
  });
});
