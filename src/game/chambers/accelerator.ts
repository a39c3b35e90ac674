import { z } from "zod";
import { circleOverlapsRect, rectsOverlap } from "../geometry";
import { randInt } from "../random";
import type { AcceleratorChamber, Booster, DrawingSurface, LocalBall, Rng } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, sizeChamber } from "./common";

const ATTEMPTS = 10;
const GAP = 10;
const GAIN = 5;

const boosterSchema = rectSchema.extend({ dirX: num, dirY: num, force: num });

export interface AcceleratorState {
  boosters: Booster[];
  t: number;
}

export function createAccelerator(): AcceleratorChamber {
  return { kind: "accelerator", ...blankCommon(), boosters: [] };
}

/** Non-overlapping boost zones, each pushing along its own random direction. */
export function initAccelerator(chamber: AcceleratorChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.boosters = [];

  const target = randInt(rng, 3, 5);
  for (let i = 0; i < target; i++) {
    for (let attempt = 0; attempt < ATTEMPTS; attempt++) {
      const bw = randInt(rng, 40, Math.floor(w * 0.3));
      const bh = randInt(rng, 40, Math.floor(h * 0.3));
      const rect = {
        x: randInt(rng, Math.floor(w * 0.1), Math.floor(w * 0.9 - bw)),
        y: randInt(rng, Math.floor(h * 0.1), Math.floor(h * 0.9 - bh)),
        w: bw,
        h: bh,
      };
      if (chamber.boosters.some((other) => rectsOverlap(rect, other, GAP))) continue;

      const angle = rng() * Math.PI * 2;
      chamber.boosters.push({ ...rect, dirX: Math.cos(angle), dirY: Math.sin(angle), force: randInt(rng, 600, 1200) });
      break;
    }
  }
}

export function updateAccelerator(chamber: AcceleratorChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const ball of balls) {
    for (const booster of chamber.boosters) {
      if (!circleOverlapsRect(ball.x, ball.y, ball.radius, booster)) continue;
      const accel = booster.force * GAIN * chamber.scale * dt;
      ball.vx += booster.dirX * accel;
      ball.vy += booster.dirY * accel;
    }
  }
}

export function drawAccelerator(chamber: AcceleratorChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const width = Math.max(2, Math.floor(4 * chamber.scale));
  const head = 15 * chamber.scale;
  const alpha = 100 + Math.sin(chamber.t * 10) * 50;

  for (const b of chamber.boosters) {
    surface.fillRect(ox + b.x, oy + b.y, b.w, b.h, [50, 255, 50], alpha);

    const cx = ox + b.x + b.w * 0.5;
    const cy = oy + b.y + b.h * 0.5;
    const len = Math.min(b.w, b.h) * 0.4;
    const mag = Math.hypot(b.dirX, b.dirY) || 1;
    const nx = b.dirX / mag;
    const ny = b.dirY / mag;
    const tipX = cx + nx * len;
    const tipY = cy + ny * len;

    surface.line(cx - nx * len, cy - ny * len, tipX, tipY, [255, 255, 255], 255, width);
    surface.line(tipX, tipY, tipX - nx * head + ny * head * 0.5, tipY - ny * head - nx * head * 0.5, [255, 255, 255], 255, width);
    surface.line(tipX, tipY, tipX - nx * head - ny * head * 0.5, tipY - ny * head + nx * head * 0.5, [255, 255, 255], 255, width);
  }
}

export function saveAccelerator(chamber: AcceleratorChamber): AcceleratorState {
  return { boosters: chamber.boosters.map((b) => ({ ...b })), t: chamber.t };
}

export function loadAccelerator(chamber: AcceleratorChamber, raw: unknown): void {
  chamber.boosters = readField(raw, "boosters", z.array(boosterSchema)) ?? chamber.boosters;
  loadClock(chamber, raw);
}
