import { z } from "zod";
import { pointInRect } from "../geometry";
import { randInt } from "../random";
import type { AntigravityChamber, AntigravityZone, DrawingSurface, LocalBall, Rng } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, rgb, sizeChamber } from "./common";

const LIFT = -600;
const FAST_FALL = 100;
const DRIFT = 20;
const WALL = 10;

const zoneSchema = rectSchema.extend({ force: num, color: rgb });

export interface AntigravityState {
  zones: AntigravityZone[];
  t: number;
}

export function createAntigravity(): AntigravityChamber {
  return { kind: "antigravity", ...blankCommon(), zones: [] };
}

/** Zones stacked top to bottom, one per band of the cell. */
export function initAntigravity(chamber: AntigravityChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.zones = [];
  const count = randInt(rng, 2, 3);
  for (let i = 0; i < count; i++) {
    const zw = randInt(rng, Math.floor(w * 0.3), Math.floor(w * 0.6));
    const zh = randInt(rng, Math.floor(h * 0.2), Math.floor(h * 0.4));
    chamber.zones.push({
      x: randInt(rng, Math.floor(w * 0.1), Math.floor(w * 0.9 - zw)),
      y: h * ((i + 0.5) / count) - zh * 0.5,
      w: zw,
      h: zh,
      force: LIFT * chamber.scale,
      color: [150, 200, 255],
    });
  }
}

export function updateAntigravity(chamber: AntigravityChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  const { scale } = chamber;
  const wall = WALL * scale;

  for (const ball of balls) {
    for (const zone of chamber.zones) {
      if (!pointInRect(ball.x, ball.y, zone)) continue;
      ball.vy += zone.force * dt;
      if (ball.vy > FAST_FALL * scale) ball.vy *= 0.9;
      ball.vx += Math.sin(chamber.t * 2 + zone.x) * DRIFT * scale * dt;
    }

    if (ball.x < wall) {
      ball.x = wall;
      ball.vx = Math.abs(ball.vx) * 0.5;
    } else if (ball.x > chamber.w - wall) {
      ball.x = chamber.w - wall;
      ball.vx = -Math.abs(ball.vx) * 0.5;
    }
  }
}

export function drawAntigravity(chamber: AntigravityChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const pulse = 0.8 + 0.2 * Math.sin(chamber.t * 3);
  const accent = 10 * chamber.scale;
  for (const zone of chamber.zones) {
    const x = ox + zone.x;
    const y = oy + zone.y;
    surface.fillRect(x, y, zone.w, zone.h, zone.color, Math.floor(20 * pulse));
    surface.strokeRect(x, y, zone.w, zone.h, zone.color, 150, 2);
    surface.fillRect(x, y, accent, 2, [255, 255, 255], 200);
    surface.fillRect(x, y, 2, accent, [255, 255, 255], 200);
  }
}

export function saveAntigravity(chamber: AntigravityChamber): AntigravityState {
  return { zones: chamber.zones.map((zone) => ({ ...zone })), t: chamber.t };
}

export function loadAntigravity(chamber: AntigravityChamber, raw: unknown): void {
  chamber.zones = readField(raw, "zones", z.array(zoneSchema)) ?? chamber.zones;
  loadClock(chamber, raw);
}
