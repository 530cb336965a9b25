import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Task } from "./task/Task";
import { TaskState } from "./task/TaskState";
import type { Condition } from "./conditions/Condition";
import { conditionFailed, conditionSatisfied } from "./conditions/Condition";
import { MutuallyExclusive } from "./conditions/MutuallyExclusive";
import { ExclusivityController } from "./exclusivity/ExclusivityController";
import { ManualScheduler, delay, finishedErrors } from "./testUtils";

/**
 * Body that logs its start and end around a short pause
 */
function timedBody(log: string[], ms = 5) {
  return async (task: Task): Promise<void> => {
    log.push(`start:${task.name}`);
    await delay(ms);
    log.push(`end:${task.name}`);
  };
}

describe("Task coordination scenarios", () => {
  it("should finish a task whose condition always fails without running it", async () => {
    const error = new Error("E");
    let ran = false;
    let finishCalls = 0;
    const task = new Task(
      {
        execute: () => {
          ran = true;
        },
        finished: () => {
          finishCalls++;
        },
      },
      {
        name: "guarded",
        conditions: [
          {
            name: "never",
            isMutuallyExclusive: false,
            evaluate: async () => conditionFailed(error),
          },
        ],
      }
    );
    const states: TaskState[] = [];
    task.on("stateChange", (state: TaskState) => states.push(state));
    const errors = finishedErrors(task);

    new ManualScheduler().add(task);

    assert.deepEqual(await errors, [error]);
    assert.equal(ran, false);
    assert.equal(finishCalls, 1);
    assert.equal(task.isFinished, true);
    assert.deepEqual(
      states,
      [...states].sort((a, b) => a - b)
    );
    assert.deepEqual(states, [
      TaskState.PENDING,
      TaskState.EVALUATING_CONDITIONS,
      TaskState.READY,
      TaskState.FINISHING,
      TaskState.FINISHED,
    ]);
  });

  it("should run tasks sharing an exclusivity category one after another", async () => {
    const exclusivity = new ExclusivityController();
    const log: string[] = [];
    const tasks = ["a", "b", "c"].map(
      (name) =>
        new Task(timedBody(log), {
          name,
          exclusivity,
          conditions: [new MutuallyExclusive("db")],
        })
    );
    const done = Promise.all(tasks.map((task) => finishedErrors(task)));

    const scheduler = new ManualScheduler();
    for (const task of tasks) {
      scheduler.add(task);
    }
    await done;

    assert.deepEqual(log, ["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
    assert.deepEqual(exclusivity.categories(), []);
  });

  it("should let tasks of different categories overlap", async () => {
    const exclusivity = new ExclusivityController();
    const log: string[] = [];
    const x = new Task(timedBody(log), {
      name: "x",
      exclusivity,
      conditions: [new MutuallyExclusive("x")],
    });
    const y = new Task(timedBody(log), {
      name: "y",
      exclusivity,
      conditions: [new MutuallyExclusive("y")],
    });
    const done = Promise.all([finishedErrors(x), finishedErrors(y)]);

    const scheduler = new ManualScheduler();
    scheduler.add(x);
    scheduler.add(y);
    await done;

    assert.deepEqual(log.slice(0, 2), ["start:x", "start:y"]);
  });

  it("should admit and run children a task produces", async () => {
    const child = new Task(async () => {}, { name: "child" });
    const childDone = finishedErrors(child);
    const parent = new Task(
      (task) => {
        task.produceChild(child);
      },
      { name: "parent" }
    );

    const scheduler = new ManualScheduler();
    scheduler.add(parent);
    await childDone;

    assert.deepEqual(scheduler.executionOrder, ["parent", "child"]);
    assert.equal(parent.isFinished, true);
  });

  it("should run a condition's dependency before the task", async () => {
    const prerequisite = new Task(async () => {}, { name: "prerequisite" });
    const condition: Condition = {
      name: "prerequisite-done",
      isMutuallyExclusive: false,
      dependencyForTask: () => prerequisite,
      evaluate: async () =>
        prerequisite.isFinished
          ? conditionSatisfied()
          : conditionFailed(new Error("prerequisite not finished")),
    };
    const main = new Task(async () => {}, { name: "main", conditions: [condition] });
    const errors = finishedErrors(main);

    const scheduler = new ManualScheduler();
    scheduler.add(main);

    assert.deepEqual(await errors, []);
    assert.deepEqual(scheduler.executionOrder, ["prerequisite", "main"]);
  });

  it("should drain a cancelled task while its dependency is still running", async () => {
    let release: () => void = () => {};
    const first = new Task(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
      { name: "first" }
    );
    let secondRan = false;
    const second = new Task(
      () => {
        secondRan = true;
      },
      { name: "second", dependencies: [first] }
    );
    const secondErrors = finishedErrors(second);
    const firstDone = finishedErrors(first);

    const scheduler = new ManualScheduler();
    scheduler.add(first);
    scheduler.add(second);
    await delay(5);
    assert.equal(first.isExecuting, true);

    second.cancel();
    const errors = await secondErrors;

    assert.equal(secondRan, false);
    assert.equal(errors.length, 1);
    assert.equal(errors[0].message, "Conditions failed: task was cancelled");
    assert.equal(first.isExecuting, true);

    release();
    assert.deepEqual(await firstDone, []);
    assert.deepEqual(scheduler.executionOrder, ["first", "second"]);
  });
});
