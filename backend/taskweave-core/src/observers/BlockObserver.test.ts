import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BlockObserver } from "./BlockObserver";
import { Task } from "../task/Task";

describe("BlockObserver", () => {
  it("should forward each event to its callback", () => {
    const task = new Task(() => {}, { name: "parent" });
    const child = new Task(() => {}, { name: "child" });
    const error = new Error("failed");
    const calls: string[] = [];

    const observer = new BlockObserver({
      onStart: (t) => calls.push(`start:${t.name}`),
      onProduce: (t, c) => calls.push(`produce:${t.name}->${c.name}`),
      onFinish: (t, errors) => calls.push(`finish:${t.name}:${errors.length}`),
    });

    observer.taskDidStart(task);
    observer.taskDidProduce(task, child);
    observer.taskDidFinish(task, [error]);

    assert.deepEqual(calls, ["start:parent", "produce:parent->child", "finish:parent:1"]);
  });

  it("should ignore events without a callback", () => {
    const task = new Task(() => {});
    const finished: number[] = [];
    const observer = new BlockObserver({ onFinish: (_, errors) => finished.push(errors.length) });

    observer.taskDidStart(task);
    observer.taskDidProduce(task, new Task(() => {}));
    observer.taskDidFinish(task, []);

    assert.deepEqual(finished, [0]);
  });

  it("should accept no callbacks at all", () => {
    const task = new Task(() => {});
    const observer = new BlockObserver();

    assert.doesNotThrow(() => {
      observer.taskDidStart(task);
      observer.taskDidFinish(task, []);
    });
  });
});
