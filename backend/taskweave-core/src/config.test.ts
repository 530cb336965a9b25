import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { CoordinatorConfigError, defaultCoordinatorConfig, loadCoordinatorConfig } from "./config";

describe("loadCoordinatorConfig", () => {
  it("should default to no timeout and no lifecycle logging", () => {
    assert.deepEqual(loadCoordinatorConfig({}), defaultCoordinatorConfig);
  });

  it("should read the condition timeout", () => {
    const config = loadCoordinatorConfig({ TASKWEAVE_CONDITION_TIMEOUT_MS: "2500" });
    assert.equal(config.conditionTimeoutMs, 2500);
  });

  it("should accept 1 and true for lifecycle logging", () => {
    assert.equal(loadCoordinatorConfig({ TASKWEAVE_LOG_LIFECYCLE: "1" }).logLifecycle, true);
    assert.equal(loadCoordinatorConfig({ TASKWEAVE_LOG_LIFECYCLE: "true" }).logLifecycle, true);
    assert.equal(loadCoordinatorConfig({ TASKWEAVE_LOG_LIFECYCLE: "0" }).logLifecycle, false);
  });

  it("should ignore unrelated variables", () => {
    const config = loadCoordinatorConfig({ PATH: "/usr/bin", HOME: "/home/test" });
    assert.equal(config.logLifecycle, false);
  });

  it("should reject a non-positive timeout", () => {
    assert.throws(
      () => loadCoordinatorConfig({ TASKWEAVE_CONDITION_TIMEOUT_MS: "-5" }),
      (error: unknown) => {
        assert.ok(error instanceof CoordinatorConfigError);
        assert.equal(error.issues.length, 1);
        assert.deepEqual(error.issues[0].path, ["TASKWEAVE_CONDITION_TIMEOUT_MS"]);
        return true;
      }
    );
  });

  it("should reject an unknown lifecycle flag", () => {
    assert.throws(
      () => loadCoordinatorConfig({ TASKWEAVE_LOG_LIFECYCLE: "yes" }),
      CoordinatorConfigError
    );
  });

  it("should list the offending variable in the message", () => {
    assert.throws(
      () => loadCoordinatorConfig({ TASKWEAVE_CONDITION_TIMEOUT_MS: "soon" }),
      /Invalid coordinator configuration:\n {2}- TASKWEAVE_CONDITION_TIMEOUT_MS: /
    );
  });
});
