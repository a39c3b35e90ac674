import { describe, expect, it } from "vitest";
import { createChamberByName } from "../src/game/chambers";
import {
  BALL_RADIUS,
  GRAVITY,
  collideBalls,
  displayColor,
  initSimulation,
  loadChambers,
  makeSimulation,
  snapshotForText,
  spawnRandomBall,
  stepSimulation,
} from "../src/game/engine";
import type { Ball, MakeSimulationOptions, Simulation } from "../src/game/types";
import { silentLogger, spyLogger } from "./helpers";

const DT = 1 / 60;

function simWith(options: MakeSimulationOptions, w: number, h: number): Simulation {
  const sim = makeSimulation({ seed: 42, logger: silentLogger, ...options });
  initSimulation(sim, w, h);
  return sim;
}

function addBall(sim: Simulation, overrides: Partial<Ball>): Ball {
  const ball: Ball = {
    id: sim.nextBallId++,
    x: 0,
    y: 0,
    vx: 0,
    vy: 0,
    radius: BALL_RADIUS,
    color: [220, 80, 80],
    active: true,
    ...overrides,
  };
  sim.balls.push(ball);
  return ball;
}

describe("makeSimulation", () => {
  it("starts empty until initialised", () => {
    const sim = makeSimulation({ seed: 1, logger: silentLogger });
    expect(sim.chambers).toEqual([]);
    expect(sim.balls).toEqual([]);
    expect(sim.nextBallId).toBe(1);
    expect(sim.maxBalls).toBe(50);
  });
});

describe("initSimulation", () => {
  it("loads the whole catalog into a 4x4 grid and spawns the initial burst", () => {
    const sim = simWith({}, 1920, 1080);
    expect(sim.chambers).toHaveLength(16);
    expect(new Set(sim.chambers.map((c) => c.kind)).size).toBe(16);
    expect([sim.cols, sim.rows]).toEqual([4, 4]);
    expect(sim.balls).toHaveLength(3);
    sim.chambers.forEach((chamber, i) => {
      expect(chamber.viewport.index).toBe(i);
      expect(chamber.w).toBe(480);
      expect(chamber.scale).toBe(1);
    });
  });

  it("omits chambers that fail to construct and lays out the rest", () => {
    const logger = spyLogger();
    const sim = makeSimulation({
      seed: 7,
      logger,
      catalog: ["pegs", "magnet", "bumper"],
      createChamber: (name) => {
        if (name === "magnet") throw new Error("boom");
        return createChamberByName(name);
      },
    });
    initSimulation(sim, 960, 270);

    expect(sim.chambers.map((c) => c.kind).sort()).toEqual(["bumper", "pegs"]);
    expect(sim.chamberOrder).toHaveLength(3);
    expect([sim.cols, sim.rows]).toEqual([2, 1]);
    expect(sim.chambers.map((c) => c.viewport.x)).toEqual([0, 480]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('skipping chamber "magnet": construction failed', expect.any(Error));
    expect(logger.info).toHaveBeenCalledWith("2 of 3 chambers loaded");
  });

  it("logs unknown identifiers without a cause", () => {
    const logger = spyLogger();
    const sim = makeSimulation({ seed: 7, logger });
    loadChambers(sim, ["pegs", "volcano"]);
    expect(sim.chambers.map((c) => c.kind)).toEqual(["pegs"]);
    expect(sim.chamberOrder).toEqual(["pegs", "volcano"]);
    expect(logger.warn).toHaveBeenCalledWith('skipping chamber "volcano": unknown chamber identifier', "");
  });
});

describe("spawnRandomBall", () => {
  it("spawns only near the top of top-row chambers", () => {
    const sim = simWith({ maxBalls: 50, initialBurst: 0 }, 1920, 1080);
    for (let i = 0; i < 40; i++) {
      const ball = spawnRandomBall(sim);
      expect(ball).not.toBeNull();
      if (!ball) continue;
      expect(ball.y).toBeGreaterThanOrEqual(30);
      expect(ball.y).toBeLessThanOrEqual(80);
      expect(ball.x).toBeGreaterThanOrEqual(30);
      expect(ball.x).toBeLessThanOrEqual(1920 - 30);
      expect(ball.radius).toBe(BALL_RADIUS);
      expect(Math.abs(ball.vx)).toBeLessThanOrEqual(100);
      expect(ball.vy).toBeGreaterThanOrEqual(0);
      expect(ball.vy).toBeLessThanOrEqual(50);
    }
  });

  it("returns null at the cap or without chambers", () => {
    const capped = simWith({ maxBalls: 2, initialBurst: 0, catalog: ["pegs"] }, 480, 270);
    expect(spawnRandomBall(capped)).not.toBeNull();
    expect(spawnRandomBall(capped)).not.toBeNull();
    expect(spawnRandomBall(capped)).toBeNull();

    const empty = simWith({ catalog: [] }, 480, 270);
    expect(empty.balls).toEqual([]);
    expect(spawnRandomBall(empty)).toBeNull();
  });
});

describe("stepSimulation", () => {
  it("integrates free fall with semi-implicit Euler", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const ball = addBall(sim, { x: 500, y: 100, vx: 10 });
    const n = 30;
    for (let i = 0; i < n; i++) stepSimulation(sim, DT);

    expect(ball.vy).toBeCloseTo(n * GRAVITY * DT, 9);
    expect(ball.y).toBeCloseTo(100 + (GRAVITY * DT * DT * n * (n + 1)) / 2, 9);
    expect(ball.x).toBeCloseTo(505, 9);
    expect(sim.t).toBeCloseTo(0.5, 9);
  });

  it("clamps to the right wall and reverses with damping", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const ball = addBall(sim, { x: 995, y: 500, vx: 100 });
    stepSimulation(sim, DT);
    expect(ball.x).toBe(990);
    expect(ball.vx).toBe(-80);
  });

  it("bounces off the top wall", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const ball = addBall(sim, { x: 500, y: 5, vy: -300 });
    stepSimulation(sim, DT);
    expect(ball.y).toBe(10);
    expect(ball.vy).toBeCloseTo((300 - GRAVITY * DT) * 0.8, 9);
  });

  it("despawns a ball below the canvas and spawns a replacement", () => {
    const sim = simWith({ catalog: ["funnel"], initialBurst: 0 }, 480, 270);
    const lost = addBall(sim, { x: 240, y: 300 });
    stepSimulation(sim, DT);
    expect(sim.balls).toHaveLength(1);
    expect(sim.balls[0].id).toBe(lost.id + 1);
    expect(sim.balls[0].active).toBe(true);
  });

  it("treats a non-finite or negative dt as zero", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const ball = addBall(sim, { x: 500, y: 500, vx: 10 });
    stepSimulation(sim, Number.NaN);
    stepSimulation(sim, -1);
    expect(sim.t).toBe(0);
    expect(ball.x).toBe(500);
    expect(ball.vy).toBe(0);
  });

  it("lets every overlapped chamber act on a ball straddling a border", () => {
    const sim = simWith({ catalog: ["wind_tunnel", "wind_tunnel"], initialBurst: 0 }, 960, 270);
    const ball = addBall(sim, { x: 480, y: 100 });
    stepSimulation(sim, DT);
    expect(ball.vx).toBeCloseTo(2000 * DT, 9);
  });

  it("keeps the population bounded with unique, increasing ids", () => {
    const sim = simWith({ maxBalls: 5, spawnInterval: 0.05 }, 1920, 1080);
    const seen = new Set<number>();
    let highest = 0;
    for (let frame = 0; frame < 600; frame++) {
      stepSimulation(sim, DT);
      expect(sim.balls.length).toBeLessThanOrEqual(5);
      const ids = sim.balls.map((b) => b.id);
      expect(new Set(ids).size).toBe(ids.length);
      for (const id of ids) {
        if (!seen.has(id)) {
          expect(id).toBeGreaterThan(highest);
          highest = id;
          seen.add(id);
        }
      }
      expect(sim.nextBallId).toBeGreaterThan(highest);
    }
  });

  it("keeps a pong annotation only while its ball lives", () => {
    const sim = simWith({ catalog: ["pong"], initialBurst: 0 }, 480, 270);
    const ball = addBall(sim, { x: 240, y: 135 });
    stepSimulation(sim, DT);
    expect(sim.annotations.get(ball.id)).toEqual({ owner: 0, colorOverride: [255, 255, 255] });
    expect(displayColor(sim, ball)).toEqual([255, 255, 255]);
    expect(ball.vy).toBeCloseTo(0, 9);

    ball.y = 400;
    ball.vy = 0;
    stepSimulation(sim, DT);
    expect(sim.balls.some((b) => b.id === ball.id)).toBe(false);
    expect(sim.annotations.has(ball.id)).toBe(false);
  });
});

describe("collideBalls", () => {
  it("exchanges normal velocity on a head-on contact", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const a = addBall(sim, { x: 100, y: 100, vx: 50 });
    const b = addBall(sim, { x: 118, y: 100, vx: -50 });
    collideBalls(sim);
    expect([a.x, b.x]).toEqual([99, 119]);
    expect([a.vx, b.vx]).toEqual([-50, 50]);
    expect([a.y, b.y]).toEqual([100, 100]);
  });

  it("separates coincident balls vertically", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const a = addBall(sim, { x: 100, y: 100 });
    const b = addBall(sim, { x: 100, y: 100 });
    collideBalls(sim);
    expect([a.y, b.y]).toEqual([110, 90]);
  });

  it("leaves separating pairs with their velocity", () => {
    const sim = simWith({ catalog: [] }, 1000, 1000);
    const a = addBall(sim, { x: 100, y: 100, vx: -50 });
    const b = addBall(sim, { x: 118, y: 100, vx: 50 });
    collideBalls(sim);
    expect([a.vx, b.vx]).toEqual([-50, 50]);
    expect(b.x - a.x).toBe(20);
  });
});

describe("snapshotForText", () => {
  it("summarises the grid and the balls", () => {
    const sim = simWith({ catalog: ["pegs"], initialBurst: 0 }, 480, 270);
    addBall(sim, { x: 100.04, y: 50, vx: 3.26 });
    const text = snapshotForText(sim);
    expect(text.canvas).toEqual({ w: 480, h: 270, cols: 1, rows: 1 });
    expect(text.chambers).toEqual([{ index: 0, kind: "pegs", x: 0, y: 0, w: 480, h: 270, t: 0 }]);
    expect(text.balls).toEqual([{ id: 1, x: 100, y: 50, vx: 3.3, vy: 0, chambers: [0], possessedBy: null }]);
  });
});
