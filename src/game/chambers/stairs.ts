import { z } from "zod";
import { landsOnPlatform } from "../geometry";
import { pick, randInt } from "../random";
import type { DrawingSurface, LocalBall, Rng, StairsChamber, Step, StepMotion } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, sizeChamber } from "./common";

const MOTIONS: readonly StepMotion[] = ["static", "horizontal", "vertical", "phase"];
const NUDGE = 60;
const MIN_VX = 30;

const stepSchema = rectSchema.extend({
  xOrig: num,
  yOrig: num,
  booster: z.boolean(),
  motion: z.enum(["static", "horizontal", "vertical", "phase"]),
  offset: num,
  range: num,
  speed: num,
});

export interface StairsState {
  steps: Step[];
  dir: 1 | -1;
  t: number;
}

export function createStairs(): StairsChamber {
  return { kind: "stairs", ...blankCommon(), steps: [], dir: 1 };
}

/** A descending staircase running left-to-right or right-to-left. */
export function initStairs(chamber: StairsChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.dir = rng() < 0.5 ? 1 : -1;
  chamber.steps = [];

  const count = randInt(rng, 6, 9);
  const stepW = (w * 0.9) / count;
  const stepH = (h * 0.7) / count;
  for (let i = 0; i < count; i++) {
    const x = chamber.dir === 1 ? i * stepW : w - (i + 1) * stepW;
    const y = h * 0.15 + i * stepH;
    chamber.steps.push({
      x,
      y,
      w: stepW + 5 * chamber.scale,
      h: Math.max(4, 12 * chamber.scale),
      xOrig: x,
      yOrig: y,
      booster: rng() < 0.2,
      motion: pick(rng, MOTIONS) ?? "static",
      offset: rng() * Math.PI * 2,
      range: randInt(rng, 10, 30) * chamber.scale,
      speed: 1 + rng() * 2,
    });
  }
}

function moveStep(step: Step, t: number, scale: number): void {
  switch (step.motion) {
    case "horizontal":
      step.x = step.xOrig + Math.sin(t * step.speed + step.offset) * step.range;
      break;
    case "vertical":
      step.y = step.yOrig + Math.cos(t * step.speed + step.offset) * step.range;
      break;
    case "phase":
      step.x = step.xOrig + Math.sin(t * step.speed) * 5 * scale;
      break;
    case "static":
      break;
  }
}

export function updateStairs(chamber: StairsChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const step of chamber.steps) moveStep(step, chamber.t, chamber.scale);

  const floor = MIN_VX * chamber.scale;
  for (const ball of balls) {
    for (const step of chamber.steps) {
      const half = ball.radius * 0.5;
      if (ball.x + half < step.x || ball.x - half > step.x + step.w) continue;
      if (!landsOnPlatform(ball, step.y, step.h, dt)) continue;

      ball.y = step.y - ball.radius;
      ball.vy = -ball.vy * (step.booster ? 1.8 : 0.8);
      ball.vx += chamber.dir * NUDGE * chamber.scale * dt;
      if (Math.abs(ball.vx) < floor) ball.vx = chamber.dir * floor;
    }
  }
}

export function drawStairs(chamber: StairsChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  for (const step of chamber.steps) {
    const color = step.booster ? ([255, 50, 150] as const) : ([50, 150, 255] as const);
    const x = ox + step.x;
    const y = oy + step.y;
    surface.fillRect(x - 2, y - 2, step.w + 4, step.h + 4, color, 40);
    surface.fillRect(x, y, step.w, step.h, [20, 20, 30]);
    surface.fillRect(x, y, step.w, 3, color);
    if (step.booster) {
      const pulse = Math.sin(chamber.t * 10) * 0.5 + 0.5;
      surface.strokeRect(x, y, step.w, step.h, [255, 255, 255], 50 + 100 * pulse, 1);
    }
  }
}

export function saveStairs(chamber: StairsChamber): StairsState {
  return { steps: chamber.steps.map((s) => ({ ...s })), dir: chamber.dir, t: chamber.t };
}

export function loadStairs(chamber: StairsChamber, raw: unknown): void {
  chamber.steps = readField(raw, "steps", z.array(stepSchema)) ?? chamber.steps;
  chamber.dir = readField(raw, "dir", z.union([z.literal(1), z.literal(-1)])) ?? chamber.dir;
  loadClock(chamber, raw);
}
