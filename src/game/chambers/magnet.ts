import { z } from "zod";
import { CONTACT_SLOP, reflectVelocity } from "../geometry";
import type { DrawingSurface, LocalBall, MagnetChamber, MagnetPole, Rng } from "../types";
import { blankCommon, circleSchema, loadClock, num, readField, sizeChamber } from "./common";

const BASE_STRENGTH = 9_000_000;
const REFLECT = 1.5;

const poleSchema = circleSchema.extend({ strength: num, polarity: z.enum(["pull", "push"]) });

export interface MagnetState {
  poles: MagnetPole[];
  t: number;
}

export function createMagnet(): MagnetChamber {
  return { kind: "magnet", ...blankCommon(), poles: [] };
}

/**
 * One central pole. Strength goes with scale cubed so the pull felt at an
 * equivalent spot grows linearly with the cell, like the other forces.
 */
export function initMagnet(chamber: MagnetChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  const { scale } = chamber;
  chamber.poles = [
    {
      x: w * 0.5,
      y: h * 0.5,
      radius: Math.max(1, 40 * scale),
      strength: BASE_STRENGTH * scale ** 3,
      polarity: rng() < 0.5 ? "pull" : "push",
    },
  ];
}

export function updateMagnet(chamber: MagnetChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const ball of balls) {
    for (const pole of chamber.poles) {
      const dx = pole.x - ball.x;
      const dy = pole.y - ball.y;
      // Inverse-square falloff, flattened inside the core.
      const dist = Math.max(Math.hypot(dx, dy), pole.radius);
      const nx = dx / dist;
      const ny = dy / dist;
      const f = (pole.polarity === "push" ? -pole.strength : pole.strength) / (dist * dist);
      ball.vx += nx * f * dt;
      ball.vy += ny * f * dt;

      const real = Math.hypot(dx, dy);
      const minDist = pole.radius + ball.radius;
      if (real >= minDist) continue;
      // Outward normal from the core; a ball sitting exactly on the center goes up.
      const out = real > 0 ? { nx: -dx / real, ny: -dy / real } : { nx: 0, ny: -1 };
      const push = minDist - real + CONTACT_SLOP;
      ball.x += out.nx * push;
      ball.y += out.ny * push;
      reflectVelocity(ball, out, REFLECT);
    }
  }
}

export function drawMagnet(chamber: MagnetChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const { scale } = chamber;
  const span = 200 * scale;
  for (const pole of chamber.poles) {
    const cx = ox + pole.x;
    const cy = oy + pole.y;
    const pull = pole.polarity === "pull";
    for (let i = 1; i <= 5; i++) {
      const offset = (chamber.t * 5 * scale + (i * span) / 5) % span;
      const alpha = Math.max(0, 255 - (offset / scale) * 1.5);
      surface.strokeCircle(cx, cy, pole.radius + offset, pull ? [100, 100, 255] : [255, 100, 100], alpha, 1);
    }
    surface.fillCircle(cx, cy, pole.radius, pull ? [50, 50, 200] : [200, 50, 50]);
  }
}

export function saveMagnet(chamber: MagnetChamber): MagnetState {
  return { poles: chamber.poles.map((p) => ({ ...p })), t: chamber.t };
}

export function loadMagnet(chamber: MagnetChamber, raw: unknown): void {
  chamber.poles = readField(raw, "poles", z.array(poleSchema)) ?? chamber.poles;
  loadClock(chamber, raw);
}
