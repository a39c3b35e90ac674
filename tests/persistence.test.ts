import { describe, expect, it } from "vitest";
import { initSimulation, makeSimulation, stepSimulation } from "../src/game/engine";
import { loadState, saveState } from "../src/game/persistence";
import type { MakeSimulationOptions, Simulation } from "../src/game/types";
import { silentLogger, spyLogger } from "./helpers";

function running(options: MakeSimulationOptions = {}, frames = 120): Simulation {
  const sim = makeSimulation({ seed: 42, logger: silentLogger, ...options });
  initSimulation(sim, 1920, 1080);
  for (let i = 0; i < frames; i++) stepSimulation(sim, 1 / 60);
  return sim;
}

function viaJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

describe("saveState / loadState", () => {
  it("restoring a snapshot into the same manager changes nothing", () => {
    const sim = running();
    const snapshot = saveState(sim);
    loadState(sim, snapshot);
    expect(viaJson(saveState(sim))).toEqual(viaJson(snapshot));
  });

  it("rebuilds an empty manager from JSON", () => {
    const sim = running();
    const json = viaJson(saveState(sim));

    const fresh = makeSimulation({ seed: 1, logger: silentLogger });
    loadState(fresh, json);
    expect(viaJson(saveState(fresh))).toEqual(json);
    expect(fresh.chambers.map((c) => c.kind)).toEqual(sim.chambers.map((c) => c.kind));
  });

  it("matches blobs to chambers by kind when the order disagrees", () => {
    const sim = running({ catalog: ["pegs", "bumper"] });
    const snapshot = saveState(sim);
    const swapped = { ...snapshot, chamberStates: [...snapshot.chamberStates].reverse() };

    const fresh = makeSimulation({ seed: 2, logger: silentLogger });
    loadState(fresh, viaJson(swapped));
    expect(viaJson(saveState(fresh).chamberStates)).toEqual(viaJson(snapshot.chamberStates));
  });

  it("generates a chamber that has no saved blob", () => {
    const fresh = makeSimulation({ seed: 3, logger: silentLogger });
    loadState(fresh, { w: 480, h: 270, chamberOrder: ["pegs"], chamberStates: [] });
    expect(fresh.chambers).toHaveLength(1);
    expect([fresh.cols, fresh.rows]).toEqual([1, 1]);
    const [pegs] = fresh.chambers;
    expect(pegs.kind === "pegs" && pegs.pegs.length > 0).toBe(true);
  });

  it("skips unknown identifiers in the saved order", () => {
    const logger = spyLogger();
    const fresh = makeSimulation({ seed: 3, logger });
    loadState(fresh, { w: 480, h: 270, chamberOrder: ["volcano", "pegs"] });
    expect(fresh.chambers.map((c) => c.kind)).toEqual(["pegs"]);
    expect(fresh.chamberOrder).toEqual(["volcano", "pegs"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("ignores input that is not an object", () => {
    const logger = spyLogger();
    const sim = makeSimulation({ seed: 3, logger });
    sim.t = 5;
    loadState(sim, 42);
    expect(sim.t).toBe(5);
    expect(logger.warn).toHaveBeenCalledWith("ignoring saved state: not an object");
  });
});

describe("ball restore", () => {
  it("fills defaults and drops entries without a position", () => {
    const sim = makeSimulation({ seed: 3, logger: silentLogger });
    sim.spawnTimer = 0.3;
    loadState(sim, {
      balls: [{ x: 5, y: 6 }, { x: "bad", y: 1 }, { id: 9, x: 1, y: 2, vx: 3, radius: -4 }],
      spawnTimer: "soon",
    });
    expect(sim.balls).toEqual([
      { id: 10, x: 5, y: 6, vx: 0, vy: 0, radius: 20, color: [220, 80, 80], active: true },
      { id: 9, x: 1, y: 2, vx: 3, vy: 0, radius: 20, color: [220, 80, 80], active: true },
    ]);
    expect(sim.nextBallId).toBe(11);
    expect(sim.spawnTimer).toBe(0);
  });

  it("reassigns repeated ids above every id in use", () => {
    const sim = makeSimulation({ seed: 3, logger: silentLogger });
    loadState(sim, {
      balls: [
        { id: 2, x: 0, y: 0 },
        { id: 2, x: 1, y: 1 },
        { id: 5, x: 2, y: 2 },
      ],
    });
    expect(sim.balls.map((b) => b.id)).toEqual([2, 6, 5]);
    expect(sim.nextBallId).toBe(7);
  });

  it("keeps at most maxBalls entries", () => {
    const sim = makeSimulation({ seed: 3, maxBalls: 2, logger: silentLogger });
    loadState(sim, {
      balls: [
        { x: 0, y: 0 },
        { x: 1, y: 1 },
        { x: 2, y: 2 },
      ],
    });
    expect(sim.balls.map((b) => b.x)).toEqual([0, 1]);
  });

  it("keeps the current scalars when fields are missing", () => {
    const sim = makeSimulation({ seed: 3, logger: silentLogger });
    sim.t = 7;
    sim.nextBallId = 12;
    loadState(sim, { w: -1, t: "late" });
    expect(sim.t).toBe(7);
    expect(sim.w).toBe(1920);
    expect(sim.nextBallId).toBe(12);
  });
});
