import { z } from "zod";
import { resolveCircleContact } from "../geometry";
import { randInt, randRange } from "../random";
import type { ChamberFrame, Circle, DrawingSurface, LocalBall, PegsChamber, Rng } from "../types";
import { blankCommon, circleSchema, loadClock, readField, sizeChamber } from "./common";

const MIN_PEGS = 15;
const MAX_PEGS = 25;
const PLACEMENT_ATTEMPTS = 1000;
const REFLECT = 1.5;
const JITTER = 30;

export interface PegsState {
  pegs: Circle[];
  t: number;
}

export function createPegs(): PegsChamber {
  return { kind: "pegs", ...blankCommon(), pegs: [] };
}

/**
 * Scatter pegs with a minimum spacing. Gives up after a fixed number of
 * attempts, so a crowded cell may end up with fewer pegs than targeted.
 */
export function initPegs(chamber: PegsChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.pegs = [];

  const target = randInt(rng, MIN_PEGS, MAX_PEGS);
  const radius = Math.min(w, h) * 0.025;
  const margin = Math.min(w, h) * 0.08;
  const minSep = radius * 4;

  for (let attempt = 0; chamber.pegs.length < target && attempt < PLACEMENT_ATTEMPTS; attempt++) {
    const x = randRange(rng, margin, w - margin);
    const y = randRange(rng, h * 0.15, h * 0.85);
    if (chamber.pegs.some((p) => Math.hypot(x - p.x, y - p.y) < minSep)) continue;
    chamber.pegs.push({ x, y, radius });
  }
}

export function updatePegs(chamber: PegsChamber, dt: number, balls: LocalBall[], frame: ChamberFrame): void {
  chamber.t += dt;
  for (const ball of balls) {
    for (const peg of chamber.pegs) {
      if (!resolveCircleContact(ball, peg.x, peg.y, peg.radius, REFLECT)) continue;
      ball.vx += (frame.rng() - 0.5) * JITTER * chamber.scale;
    }
  }
}

export function drawPegs(chamber: PegsChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const strokeWidth = Math.max(1, Math.floor(2 * chamber.scale));
  chamber.pegs.forEach((peg, i) => {
    const pulse = Math.sin(chamber.t * 3 + i * 0.5) * 0.2 + 0.8;
    const r = Math.floor(100 * pulse);
    const g = Math.floor(80 * pulse);
    const b = Math.floor(140 * pulse);
    surface.fillCircle(ox + peg.x, oy + peg.y, peg.radius, [r, g, b]);
    surface.strokeCircle(ox + peg.x, oy + peg.y, peg.radius, [r + 40, g + 30, b + 30], 200, strokeWidth);
  });
}

export function savePegs(chamber: PegsChamber): PegsState {
  return { pegs: chamber.pegs.map((p) => ({ ...p })), t: chamber.t };
}

export function loadPegs(chamber: PegsChamber, raw: unknown): void {
  chamber.pegs = readField(raw, "pegs", z.array(circleSchema)) ?? chamber.pegs;
  loadClock(chamber, raw);
}
