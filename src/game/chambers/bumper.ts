import { z } from "zod";
import { resolveCircleContact } from "../geometry";
import { randInt } from "../random";
import type { Bumper, BumperChamber, DrawingSurface, LocalBall, Rng } from "../types";
import { blankCommon, circleSchema, loadClock, num, readField, sizeChamber } from "./common";

// Restitution 2.0 on top of the mirror term.
const REFLECT = 3;
const FLASH = 0.2;
const ATTEMPTS = 100;

const bumperSchema = circleSchema.extend({ hitTimer: num });

export interface BumperState {
  bumpers: Bumper[];
  t: number;
}

export function createBumper(): BumperChamber {
  return { kind: "bumper", ...blankCommon(), bumpers: [] };
}

export function initBumper(chamber: BumperChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.bumpers = [];
  const { scale } = chamber;
  const target = randInt(rng, 2, 4);
  const gap = 20 * scale;

  for (let attempt = 0; chamber.bumpers.length < target && attempt < ATTEMPTS; attempt++) {
    const radius = randInt(rng, 20, 35) * scale;
    const x = randInt(rng, radius + gap, w - radius - gap);
    const y = randInt(rng, h * 0.15, h * 0.85);
    if (chamber.bumpers.some((b) => Math.hypot(x - b.x, y - b.y) < radius + b.radius + gap)) continue;
    chamber.bumpers.push({ x, y, radius, hitTimer: 0 });
  }
}

export function updateBumper(chamber: BumperChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const bumper of chamber.bumpers) bumper.hitTimer = Math.max(0, bumper.hitTimer - dt);

  for (const ball of balls) {
    for (const bumper of chamber.bumpers) {
      if (resolveCircleContact(ball, bumper.x, bumper.y, bumper.radius, REFLECT)) bumper.hitTimer = FLASH;
    }
  }
}

export function drawBumper(chamber: BumperChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const rim = Math.max(1, 3 * chamber.scale);
  for (const b of chamber.bumpers) {
    const cx = ox + b.x;
    const cy = oy + b.y;
    surface.fillCircle(cx, cy, b.radius, b.hitTimer > 0 ? [255, 255, 100] : [200, 50, 50]);
    surface.strokeCircle(cx, cy, b.radius, [255, 255, 255], 255, rim);
    surface.strokeCircle(cx, cy, b.radius * 0.6, [255, 255, 255], 150, 2);
    surface.strokeCircle(cx, cy, b.radius * 0.3, [255, 255, 255], 150, 2);
  }
}

export function saveBumper(chamber: BumperChamber): BumperState {
  return { bumpers: chamber.bumpers.map((b) => ({ ...b })), t: chamber.t };
}

export function loadBumper(chamber: BumperChamber, raw: unknown): void {
  chamber.bumpers = readField(raw, "bumpers", z.array(bumperSchema)) ?? chamber.bumpers;
  loadClock(chamber, raw);
}
