import { z } from "zod";
import { CONTACT_SLOP, reflectVelocity, unitNormal } from "../geometry";
import type { Coil, DrawingSurface, LocalBall, TeslaCoilChamber } from "../types";
import { blankCommon, circleSchema, loadClock, num, readField, sizeChamber } from "./common";

const CHARGE_RATE = 0.8;
const KICK = 400;
const REFLECT = 1.5;
const ZAP_LIFE = 0.15;

const coilSchema = circleSchema.extend({ range: num, charge: num });

// Zaps are visual only and are not persisted.
export interface TeslaCoilState {
  coils: Coil[];
  t: number;
}

export function createTeslaCoil(): TeslaCoilChamber {
  return { kind: "tesla_coil", ...blankCommon(), coils: [], zaps: [] };
}

export function initTeslaCoil(chamber: TeslaCoilChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  chamber.zaps = [];
  const radius = Math.min(w, h) * 0.06;
  const range = Math.min(w, h) * 0.25;
  chamber.coils = [
    { x: w * 0.3, y: h * 0.5, radius, range, charge: 0 },
    { x: w * 0.7, y: h * 0.5, radius, range, charge: 0.5 },
  ];
}

/**
 * A fully charged coil discharges into the first ball found inside its
 * range ring; the core itself is solid.
 */
export function updateTeslaCoil(chamber: TeslaCoilChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const coil of chamber.coils) coil.charge = Math.min(1, coil.charge + dt * CHARGE_RATE);

  chamber.zaps = chamber.zaps.filter((zap) => {
    zap.life -= dt;
    return zap.life > 0;
  });

  for (const ball of balls) {
    for (const coil of chamber.coils) {
      const dx = ball.x - coil.x;
      const dy = ball.y - coil.y;
      const dist = Math.hypot(dx, dy);
      const { nx, ny } = unitNormal(dx, dy);

      if (dist > 0 && dist < coil.range && dist > coil.radius && coil.charge >= 1) {
        coil.charge = 0;
        chamber.zaps.push({ x1: coil.x, y1: coil.y, x2: ball.x, y2: ball.y, life: ZAP_LIFE });
        ball.vx += nx * KICK * chamber.scale;
        ball.vy += ny * KICK * chamber.scale;
      }

      const minDist = coil.radius + ball.radius;
      if (dist < minDist) {
        const push = minDist - dist + CONTACT_SLOP;
        ball.x += nx * push;
        ball.y += ny * push;
        reflectVelocity(ball, { nx, ny }, REFLECT);
      }
    }
  }
}

export function drawTeslaCoil(chamber: TeslaCoilChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const { scale } = chamber;
  const width = Math.max(2, Math.floor(3 * scale));
  const dot = Math.max(2, Math.floor(4 * scale));

  for (const zap of chamber.zaps) {
    const alpha = Math.floor((zap.life / ZAP_LIFE) * 255);
    surface.line(ox + zap.x1, oy + zap.y1, ox + zap.x2, oy + zap.y2, [200, 200, 255], alpha, width);
  }

  for (const coil of chamber.coils) {
    const cx = ox + coil.x;
    const cy = oy + coil.y;
    surface.fillCircle(cx, cy, coil.range, [100, 100, 255], Math.floor(coil.charge * 100));
    surface.fillCircle(cx, cy, coil.radius, [50, 50, 80]);
    surface.strokeCircle(cx, cy, coil.radius, [150, 150, 255], 255, width);

    const arc = coil.charge * Math.PI * 2;
    for (let i = 0; i < 4; i++) {
      const a = ((chamber.t * 2) % (Math.PI * 2)) + (i * Math.PI) / 2;
      if (a >= arc) continue;
      const rr = coil.radius + 5 * scale;
      surface.fillCircle(cx + Math.cos(a) * rr, cy + Math.sin(a) * rr, dot, [255, 255, 100]);
    }
  }
}

export function saveTeslaCoil(chamber: TeslaCoilChamber): TeslaCoilState {
  return { coils: chamber.coils.map((c) => ({ ...c })), t: chamber.t };
}

export function loadTeslaCoil(chamber: TeslaCoilChamber, raw: unknown): void {
  const coils = readField(raw, "coils", z.array(coilSchema));
  if (coils) chamber.coils = coils.map((c) => ({ ...c, charge: Math.min(1, Math.max(0, c.charge)) }));
  chamber.zaps = [];
  loadClock(chamber, raw);
}
