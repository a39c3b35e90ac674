import { z } from "zod";
import { closestPointOnSegment, unitNormal } from "../geometry";
import type { Blade, DrawingSurface, LocalBall, MixerChamber } from "../types";
import { blankCommon, loadClock, num, readField, sizeChamber } from "./common";

const KICK = 50;
const SPIN = 100;

const bladeSchema = z.object({ cx: num, cy: num, len: num.positive(), speed: num });

export interface MixerState {
  blades: Blade[];
  t: number;
}

export function createMixer(): MixerChamber {
  return { kind: "mixer", ...blankCommon(), blades: [] };
}

/** Two counter-rotating blades at fixed positions. */
export function initMixer(chamber: MixerChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  const len = 60 * chamber.scale;
  chamber.blades = [
    { cx: w * 0.3, cy: h * 0.5, len, speed: 3 },
    { cx: w * 0.7, cy: h * 0.5, len, speed: -2.5 },
  ];
}

export function updateMixer(chamber: MixerChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  const thick = 8 * chamber.scale;

  for (const ball of balls) {
    for (const blade of chamber.blades) {
      const angle = chamber.t * blade.speed;
      const s = Math.sin(angle);
      const c = Math.cos(angle);
      const hit = closestPointOnSegment(
        ball.x,
        ball.y,
        blade.cx - c * blade.len,
        blade.cy - s * blade.len,
        blade.cx + c * blade.len,
        blade.cy + s * blade.len
      );
      const dx = ball.x - hit.x;
      const dy = ball.y - hit.y;
      const dist = Math.hypot(dx, dy);
      const minDist = ball.radius + thick;
      if (dist >= minDist) continue;

      const n = unitNormal(dx, dy);
      ball.x += n.nx * (minDist - dist);
      ball.y += n.ny * (minDist - dist);

      const spin = blade.speed * SPIN * chamber.scale * 0.5;
      ball.vx += n.nx * KICK * chamber.scale - s * spin;
      ball.vy += n.ny * KICK * chamber.scale + c * spin;
    }
  }
}

export function drawMixer(chamber: MixerChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const width = Math.max(4, Math.floor(16 * chamber.scale));
  for (const blade of chamber.blades) {
    const angle = chamber.t * blade.speed;
    const dx = Math.cos(angle) * blade.len;
    const dy = Math.sin(angle) * blade.len;
    surface.line(ox + blade.cx - dx, oy + blade.cy - dy, ox + blade.cx + dx, oy + blade.cy + dy, [200, 100, 100], 255, width);
    surface.fillCircle(ox + blade.cx, oy + blade.cy, 10 * chamber.scale, [150, 150, 150]);
  }
}

export function saveMixer(chamber: MixerChamber): MixerState {
  return { blades: chamber.blades.map((b) => ({ ...b })), t: chamber.t };
}

export function loadMixer(chamber: MixerChamber, raw: unknown): void {
  chamber.blades = readField(raw, "blades", z.array(bladeSchema)) ?? chamber.blades;
  loadClock(chamber, raw);
}
