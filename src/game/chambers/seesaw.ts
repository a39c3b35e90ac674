import { z } from "zod";
import { CONTACT_SLOP, closestPointOnSegment, reflectVelocity } from "../geometry";
import type { DrawingSurface, LocalBall, Plank, SeesawChamber } from "../types";
import { blankCommon, loadClock, num, readField, sizeChamber } from "./common";

const REFLECT = 1.5;
const MAX_TILT = 0.4;
const SPRING = 2;
const DAMPING = 0.98;
const TORQUE = 0.0005;

const plankSchema = z.object({ cx: num, cy: num, length: num, angle: num, angularVel: num });

export interface SeesawState {
  planks: Plank[];
  t: number;
}

export function createSeesaw(): SeesawChamber {
  return { kind: "seesaw", ...blankCommon(), planks: [] };
}

export function initSeesaw(chamber: SeesawChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  chamber.planks = [{ cx: w * 0.5, cy: h * 0.4, length: w * 0.7, angle: 0, angularVel: 0 }];
}

export function plankEnds(plank: Plank): { x1: number; y1: number; x2: number; y2: number } {
  const hx = Math.cos(plank.angle) * plank.length * 0.5;
  const hy = Math.sin(plank.angle) * plank.length * 0.5;
  return { x1: plank.cx - hx, y1: plank.cy - hy, x2: plank.cx + hx, y2: plank.cy + hy };
}

/** Spring the plank back toward level, then clamp it to the tilt limit. */
function swing(plank: Plank, dt: number): void {
  plank.angularVel -= plank.angle * SPRING * dt;
  plank.angularVel *= DAMPING;
  plank.angle += plank.angularVel * dt;
  if (plank.angle > MAX_TILT) {
    plank.angle = MAX_TILT;
    plank.angularVel = 0;
  } else if (plank.angle < -MAX_TILT) {
    plank.angle = -MAX_TILT;
    plank.angularVel = 0;
  }
}

export function updateSeesaw(chamber: SeesawChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const plank of chamber.planks) swing(plank, dt);

  const thick = 8 * chamber.scale;
  for (const ball of balls) {
    for (const plank of chamber.planks) {
      const { x1, y1, x2, y2 } = plankEnds(plank);
      const c = closestPointOnSegment(ball.x, ball.y, x1, y1, x2, y2);
      const dist = Math.hypot(ball.x - c.x, ball.y - c.y);
      const minDist = ball.radius + thick;
      if (dist >= minDist) continue;

      // Plank normal, flipped to the side the ball is on.
      let nx = -Math.sin(plank.angle);
      let ny = Math.cos(plank.angle);
      if ((ball.x - c.x) * nx + (ball.y - c.y) * ny < 0) {
        nx = -nx;
        ny = -ny;
      }
      const push = minDist - dist + CONTACT_SLOP;
      ball.x += nx * push;
      ball.y += ny * push;
      reflectVelocity(ball, { nx, ny }, REFLECT);
      plank.angularVel += (c.t - 0.5) * plank.length * TORQUE;
    }
  }
}

export function drawSeesaw(chamber: SeesawChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  for (const plank of chamber.planks) {
    const { x1, y1, x2, y2 } = plankEnds(plank);
    surface.line(ox + x1, oy + y1, ox + x2, oy + y2, [150, 100, 50], 255, Math.max(4, Math.floor(12 * chamber.scale)));
    surface.fillCircle(ox + plank.cx, oy + plank.cy, 10 * chamber.scale, [100, 80, 40]);
  }
}

export function saveSeesaw(chamber: SeesawChamber): SeesawState {
  return { planks: chamber.planks.map((p) => ({ ...p })), t: chamber.t };
}

export function loadSeesaw(chamber: SeesawChamber, raw: unknown): void {
  chamber.planks = readField(raw, "planks", z.array(plankSchema)) ?? chamber.planks;
  loadClock(chamber, raw);
}
