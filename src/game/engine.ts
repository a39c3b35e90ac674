// Chamber-grid ball simulation: global integration, per-chamber policies, ball-ball contact.
import { createLogger } from "../../lib/logger";
import { CHAMBER_KINDS, ChamberLoadError, createChamberByName, fitChamber, initChamber, updateChamber } from "./chambers";
import { FALLBACK_NORMAL } from "./geometry";
import { resolveGridShape, layoutViewports } from "./layout";
import { freshSeed, makeRng, pick, randInt, shuffle } from "./random";
import type {
  Ball,
  Chamber,
  ChamberFrame,
  GridShape,
  LocalBall,
  MakeSimulationOptions,
  Rgb,
  Simulation,
  Viewport,
} from "./types";

export const GRAVITY = 400;
export const BOUNDARY_DAMPING = 0.8;
export const BALL_RADIUS = 10;

export const BALL_PALETTE: readonly Rgb[] = [
  [220, 80, 80],
  [80, 180, 220],
  [80, 220, 120],
  [220, 180, 80],
  [180, 80, 220],
];

/**
 * Construct an empty, unconfigured simulation.
 * Pure construction: no chambers are loaded and no balls exist until `initSimulation`.
 */
export function makeSimulation({
  seed,
  rng,
  logger = createLogger("sim"),
  spawnInterval = 0.5,
  maxBalls = 50,
  initialBurst = 3,
  catalog = CHAMBER_KINDS,
  createChamber = createChamberByName,
}: MakeSimulationOptions = {}): Simulation {
  return {
    w: 1920,
    h: 1080,
    t: 0,
    balls: [],
    chambers: [],
    chamberOrder: [],
    catalog,
    nextBallId: 1,
    spawnTimer: 0,
    spawnInterval,
    maxBalls: Math.max(0, Math.floor(maxBalls)),
    initialBurst: Math.max(0, Math.floor(initialBurst)),
    cols: 0,
    rows: 0,
    rng: rng ?? makeRng(seed ?? freshSeed()),
    annotations: new Map(),
    createChamber,
    logger,
  };
}

/**
 * First-time setup for a `w` x `h` canvas: load and shuffle the catalog,
 * lay out the survivors, generate each chamber, then spawn the initial burst.
 */
export function initSimulation(sim: Simulation, w: number, h: number): void {
  sim.w = w;
  sim.h = h;
  sim.t = 0;
  sim.spawnTimer = 0;
  sim.balls = [];
  sim.annotations.clear();

  loadChambers(sim);
  layoutChambers(sim);
  for (const chamber of sim.chambers) initChamber(chamber, chamber.viewport, sim.rng);

  for (let i = 0; i < sim.initialBurst; i++) spawnRandomBall(sim);
}

/**
 * Instantiate chambers by identifier. Without `order` the catalog is shuffled
 * once; with it (restore) the order is used verbatim. Identifiers that fail to
 * construct are logged and skipped but stay in `chamberOrder`.
 */
export function loadChambers(sim: Simulation, order?: readonly string[]): void {
  const names = order ? [...order] : shuffle(sim.rng, [...sim.catalog]);
  sim.chamberOrder = names;
  sim.chambers = [];

  for (const name of names) {
    try {
      sim.chambers.push(sim.createChamber(name));
      sim.logger.debug(`loaded chamber ${name}`);
    } catch (err) {
      const error = err instanceof ChamberLoadError ? err : new ChamberLoadError(name, "construction failed", { cause: err });
      sim.logger.warn(`skipping ${error.message}`, error.cause ?? "");
    }
  }
  sim.logger.info(`${sim.chambers.length} of ${names.length} chambers loaded`);
}

/**
 * Assign a viewport to every chamber (row-major) without generating geometry.
 * A saved grid shape is kept when it still fits the chamber count.
 */
export function layoutChambers(sim: Simulation, saved?: Partial<GridShape> | null): void {
  const shape = resolveGridShape(sim.chambers.length, saved);
  sim.cols = shape.cols;
  sim.rows = shape.rows;
  const viewports = layoutViewports(sim.chambers.length, sim.w, sim.h, shape);
  sim.chambers.forEach((chamber, i) => fitChamber(chamber, viewports[i]));
}

/**
 * Spawn one ball near the top of a random top-row chamber. Returns null when
 * the population is at its cap or no top-row chamber exists.
 */
export function spawnRandomBall(sim: Simulation): Ball | null {
  if (sim.balls.length >= sim.maxBalls) return null;
  const top = pick(
    sim.rng,
    sim.chambers.filter((c) => c.viewport.row === 0)
  );
  if (!top) return null;

  const vp = top.viewport;
  const ball: Ball = {
    id: sim.nextBallId++,
    x: vp.x + randInt(sim.rng, 30, Math.floor(vp.w - 30)),
    y: vp.y + randInt(sim.rng, 30, 80),
    vx: randInt(sim.rng, -100, 100),
    vy: randInt(sim.rng, 0, 50),
    radius: BALL_RADIUS,
    color: pick(sim.rng, BALL_PALETTE) ?? BALL_PALETTE[0],
    active: true,
  };
  sim.balls.push(ball);
  return ball;
}

/** Strict bounding-box test of a ball's circle against a viewport. */
export function ballOverlapsViewport(ball: Ball, vp: Viewport): boolean {
  const r = ball.radius;
  return ball.x + r > vp.x && ball.x - r < vp.x + vp.w && ball.y + r > vp.y && ball.y - r < vp.y + vp.h;
}

/** Indices of the chambers whose viewport a ball currently touches. */
export function overlappingChambers(sim: Simulation, ball: Ball): number[] {
  const out: number[] = [];
  sim.chambers.forEach((chamber, i) => {
    if (ballOverlapsViewport(ball, chamber.viewport)) out.push(i);
  });
  return out;
}

/** Per-update handle a chamber uses to mark balls through the manager. */
export function makeChamberFrame(sim: Simulation, index: number): ChamberFrame {
  return {
    index,
    rng: sim.rng,
    gravity: GRAVITY,
    annotate(ballId, annotation) {
      sim.annotations.set(ballId, { owner: index, ...annotation });
    },
    clearAnnotations() {
      for (const [id, annotation] of sim.annotations) {
        if (annotation.owner === index) sim.annotations.delete(id);
      }
    },
  };
}

/** Advance the simulation by `dt` seconds. */
export function stepSimulation(sim: Simulation, dt: number): void {
  const h = Number.isFinite(dt) && dt > 0 ? dt : 0;

  sim.t += h;
  sim.spawnTimer += h;
  if (sim.spawnTimer >= sim.spawnInterval && sim.balls.length < sim.maxBalls) {
    sim.spawnTimer = 0;
    spawnRandomBall(sim);
  }

  integrate(sim, h);
  sim.chambers.forEach((chamber, i) => routeChamber(sim, chamber, i, h));
  collideBalls(sim);
  applyBounds(sim);
  cleanup(sim);
}

/** Semi-implicit Euler, once per active ball. */
function integrate(sim: Simulation, dt: number): void {
  for (const ball of sim.balls) {
    if (!ball.active) continue;
    ball.vy += GRAVITY * dt;
    ball.x += ball.vx * dt;
    ball.y += ball.vy * dt;
  }
}

/**
 * Hand a chamber local copies of the balls touching its viewport and write
 * the results back. Later chambers see what earlier ones wrote this frame.
 */
function routeChamber(sim: Simulation, chamber: Chamber, index: number, dt: number): void {
  const vp = chamber.viewport;
  const originals: Ball[] = [];
  const locals: LocalBall[] = [];
  for (const ball of sim.balls) {
    if (!ball.active || !ballOverlapsViewport(ball, vp)) continue;
    originals.push(ball);
    locals.push({
      id: ball.id,
      x: ball.x - vp.x,
      y: ball.y - vp.y,
      vx: ball.vx,
      vy: ball.vy,
      radius: ball.radius,
      color: ball.color,
      active: ball.active,
    });
  }

  updateChamber(chamber, dt, locals, makeChamberFrame(sim, index));

  locals.forEach((local, i) => {
    const ball = originals[i];
    ball.x = local.x + vp.x;
    ball.y = local.y + vp.y;
    ball.vx = local.vx;
    ball.vy = local.vy;
    ball.active = local.active;
  });
}

/**
 * Pairwise equal-mass contact: split the overlap evenly, then exchange the
 * normal velocity component when the pair is closing.
 */
export function collideBalls(sim: Simulation): void {
  const balls = sim.balls;
  for (let i = 0; i < balls.length; i++) {
    const a = balls[i];
    if (!a.active) continue;
    for (let j = i + 1; j < balls.length; j++) {
      const b = balls[j];
      if (!b.active) continue;

      const dx = b.x - a.x;
      const dy = b.y - a.y;
      const d2 = dx * dx + dy * dy;
      const minDist = a.radius + b.radius;
      if (d2 >= minDist * minDist) continue;

      const dist = Math.sqrt(d2);
      // Coincident centers: separate vertically.
      const nx = dist > 0 ? dx / dist : FALLBACK_NORMAL.nx;
      const ny = dist > 0 ? dy / dist : FALLBACK_NORMAL.ny;

      const half = (minDist - dist) / 2;
      a.x -= nx * half;
      a.y -= ny * half;
      b.x += nx * half;
      b.y += ny * half;

      const dvn = (a.vx - b.vx) * nx + (a.vy - b.vy) * ny;
      if (dvn > 0) {
        a.vx -= dvn * nx;
        a.vy -= dvn * ny;
        b.vx += dvn * nx;
        b.vy += dvn * ny;
      }
    }
  }
}

/** Side and top walls bounce with damping; leaving through the bottom despawns. */
function applyBounds(sim: Simulation): void {
  for (const ball of sim.balls) {
    if (!ball.active) continue;
    const r = ball.radius;
    if (ball.x - r < 0) {
      ball.x = r;
      ball.vx = Math.abs(ball.vx) * BOUNDARY_DAMPING;
    }
    if (ball.x + r > sim.w) {
      ball.x = sim.w - r;
      ball.vx = -Math.abs(ball.vx) * BOUNDARY_DAMPING;
    }
    if (ball.y - r < 0) {
      ball.y = r;
      ball.vy = Math.abs(ball.vy) * BOUNDARY_DAMPING;
    }
    if (ball.y - r > sim.h) ball.active = false;
  }
}

function cleanup(sim: Simulation): void {
  const before = sim.balls.length;
  sim.balls = sim.balls.filter((ball) => ball.active);
  const removed = before - sim.balls.length;

  if (sim.annotations.size) {
    const alive = new Set(sim.balls.map((b) => b.id));
    for (const id of sim.annotations.keys()) {
      if (!alive.has(id)) sim.annotations.delete(id);
    }
  }

  for (let i = 0; i < removed; i++) {
    if (sim.balls.length >= sim.maxBalls) break;
    spawnRandomBall(sim);
  }
}

/** Color a ball is drawn with this frame. */
export function displayColor(sim: Simulation, ball: Ball): Rgb {
  return sim.annotations.get(ball.id)?.colorOverride ?? ball.color;
}

export type TextSnapshot = {
  note: string;
  t: number;
  canvas: { w: number; h: number; cols: number; rows: number };
  nextBallId: number;
  chambers: { index: number; kind: Chamber["kind"]; x: number; y: number; w: number; h: number; t: number }[];
  balls: { id: number; x: number; y: number; vx: number; vy: number; chambers: number[]; possessedBy: number | null }[];
};

/** Compact, rounded view of the simulation for logs and automation. */
export function snapshotForText(sim: Simulation): TextSnapshot {
  return {
    note: "coords: origin at top-left. x -> right, y -> down. units are canvas pixels.",
    t: Number(sim.t.toFixed(3)),
    canvas: { w: sim.w, h: sim.h, cols: sim.cols, rows: sim.rows },
    nextBallId: sim.nextBallId,
    chambers: sim.chambers.map((c, index) => ({
      index,
      kind: c.kind,
      x: Number(c.viewport.x.toFixed(1)),
      y: Number(c.viewport.y.toFixed(1)),
      w: Number(c.viewport.w.toFixed(1)),
      h: Number(c.viewport.h.toFixed(1)),
      t: Number(c.t.toFixed(3)),
    })),
    balls: sim.balls.map((b) => ({
      id: b.id,
      x: Number(b.x.toFixed(1)),
      y: Number(b.y.toFixed(1)),
      vx: Number(b.vx.toFixed(1)),
      vy: Number(b.vy.toFixed(1)),
      chambers: overlappingChambers(sim, b),
      possessedBy: sim.annotations.get(b.id)?.owner ?? null,
    })),
  };
}
