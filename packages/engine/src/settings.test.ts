import { describe, expect, it } from "vitest";
import { isKeytrailError } from "./errors.js";
import { createSettings, settingsFromEnv, withSettings } from "./settings.js";

describe("settings", () => {
  it("fills defaults and freezes the snapshot", () => {
    const settings = createSettings();

    expect(settings.strokeMode).toBe("closest");
    expect(settings.strokeMaxWorseSteps).toBe(5);
    expect(settings.strokeSampleDistance).toBe(8);
    expect(settings.parallelThreshold).toBe(50);
    expect(settings.tangentTimeDelta).toBe(0.01);
    expect(settings.pathColor).toEqual({ r: 0, g: 0.6, b: 1, a: 1 });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("applies overrides on top of a snapshot", () => {
    const base = createSettings({ framesBack: 3 });
    const next = withSettings(base, { strokeMode: "spread" });

    expect(next.framesBack).toBe(3);
    expect(next.strokeMode).toBe("spread");
    expect(base.strokeMode).toBe("closest");
  });

  it("rejects invalid values with a keytrail error", () => {
    let caught: unknown;
    try {
      createSettings({ drawTimeInterval: 0 });
    } catch (error) {
      caught = error;
    }

    expect(isKeytrailError(caught)).toBe(true);
    expect(isKeytrailError(caught) ? caught.code : null).toBe("invalid-settings");
    expect(caught instanceof Error ? caught.message : "").toContain("drawTimeInterval");
  });

  it("reads overrides from the environment", () => {
    const settings = settingsFromEnv({
      KEYTRAIL_FRAMES_BACK: "12",
      KEYTRAIL_STROKE_MODE: "spread",
      KEYTRAIL_DRAW_MODE: "camera",
      KEYTRAIL_USE_PIVOTS: "0",
    });

    expect(settings.framesBack).toBe(12);
    expect(settings.framesFront).toBe(20);
    expect(settings.strokeMode).toBe("spread");
    expect(settings.drawMode).toBe("camera");
    expect(settings.usePivots).toBe(false);
  });

  it("rejects malformed environment values", () => {
    expect(() => settingsFromEnv({ KEYTRAIL_STROKE_MODE: "sideways" })).toThrow(/strokeMode/);
  });
});
