import { z } from "zod";
import { pointInRect } from "../geometry";
import type { DrawingSurface, LocalBall, WindBand, WindTunnelChamber } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, sizeChamber } from "./common";

const bandSchema = rectSchema.extend({
  dir: z.union([z.literal(1), z.literal(-1)]),
  force: num,
});

export interface WindTunnelState {
  bands: WindBand[];
  t: number;
}

export function createWindTunnel(): WindTunnelChamber {
  return { kind: "wind_tunnel", ...blankCommon(), bands: [] };
}

/** Two full-width bands blowing in opposite directions. */
export function initWindTunnel(chamber: WindTunnelChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  const force = 1000 * chamber.scale;
  chamber.bands = [
    { x: 0, y: h * 0.2, w, h: h * 0.3, dir: 1, force },
    { x: 0, y: h * 0.6, w, h: h * 0.3, dir: -1, force },
  ];
}

export function updateWindTunnel(chamber: WindTunnelChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  for (const ball of balls) {
    for (const band of chamber.bands) {
      if (pointInRect(ball.x, ball.y, band)) ball.vx += band.dir * band.force * dt;
    }
  }
}

export function drawWindTunnel(chamber: WindTunnelChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const { scale } = chamber;
  const spacing = Math.max(20, Math.floor(40 * scale));
  const lineWidth = Math.max(1, Math.floor(2 * scale));
  const lineLength = Math.floor(30 * scale);
  const gap = Math.max(5, Math.floor(10 * scale));

  for (const band of chamber.bands) {
    const color = band.dir > 0 ? ([100, 150, 200] as const) : ([200, 150, 100] as const);
    surface.fillRect(ox + band.x, oy + band.y, band.w, band.h, color, 30);

    const offset = (((chamber.t * band.dir * 100 * scale) % spacing) + spacing) % spacing;
    const midY = oy + band.y + band.h * 0.5;
    for (let i = 0; i <= Math.floor(band.w / spacing); i++) {
      const lx = band.x + i * spacing + offset;
      if (lx < band.x || lx > band.x + band.w) continue;
      const len = lineLength * band.dir;
      for (const dy of [-gap, 0, gap]) {
        surface.line(ox + lx, midY + dy, ox + lx + len, midY + dy, color, 150, lineWidth);
      }
    }
  }
}

export function saveWindTunnel(chamber: WindTunnelChamber): WindTunnelState {
  return { bands: chamber.bands.map((b) => ({ ...b })), t: chamber.t };
}

export function loadWindTunnel(chamber: WindTunnelChamber, raw: unknown): void {
  chamber.bands = readField(raw, "bands", z.array(bandSchema)) ?? chamber.bands;
  loadClock(chamber, raw);
}
