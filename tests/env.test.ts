import { describe, expect, it } from "vitest";
import { parseEnv } from "../lib/env";

describe("parseEnv", () => {
  it("fills defaults for an empty environment", () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: "development",
      SIM_WIDTH: 1920,
      SIM_HEIGHT: 1080,
      SIM_FRAMES: 600,
      LOG_LEVEL: "info",
    });
  });

  it("coerces numeric settings", () => {
    const env = parseEnv({ SIM_WIDTH: "800", SIM_HEIGHT: "450", SIM_SEED: "0", SIM_FRAMES: "10", SIM_STATE_FILE: " state.json " });
    expect(env.SIM_WIDTH).toBe(800);
    expect(env.SIM_HEIGHT).toBe(450);
    expect(env.SIM_SEED).toBe(0);
    expect(env.SIM_FRAMES).toBe(10);
    expect(env.SIM_STATE_FILE).toBe("state.json");
  });

  it("rejects invalid values", () => {
    expect(() => parseEnv({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => parseEnv({ SIM_WIDTH: "-5" })).toThrow();
    expect(() => parseEnv({ SIM_FRAMES: "lots" })).toThrow();
  });
});
