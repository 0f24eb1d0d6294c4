import { isValidationError } from "arbor-shared";
import { configureEngine, getEngineConfig, resetEngineConfig, resolveEngineConfig } from "./config";

describe("engine config", () => {
  afterEach(() => {
    resetEngineConfig();
  });

  it("should fill in defaults", () => {
    expect(resolveEngineConfig()).toEqual({
      reconciliationEnabled: true,
      transitionsEnabled: true,
      applyStateUpdatesEarly: false,
      alwaysResolveNestedTreeInMeasure: false,
      lifecycleLogCapacity: 16,
    });
  });

  it("should name the offending field", () => {
    let caught: unknown;
    try {
      resolveEngineConfig({ lifecycleLogCapacity: 1 });
    } catch (error) {
      caught = error;
    }

    expect(isValidationError(caught)).toBe(true);
    if (isValidationError(caught)) {
      expect(caught.field).toBe("lifecycleLogCapacity");
      expect(caught.code).toBe("VALIDATION_CONSTRAINT");
    }
  });

  it("should layer overrides over configured defaults", () => {
    configureEngine({ reconciliationEnabled: false });

    expect(getEngineConfig().reconciliationEnabled).toBe(false);
    expect(resolveEngineConfig({ applyStateUpdatesEarly: true })).toMatchObject({
      reconciliationEnabled: false,
      applyStateUpdatesEarly: true,
    });

    resetEngineConfig();

    expect(resolveEngineConfig().reconciliationEnabled).toBe(true);
  });
});
