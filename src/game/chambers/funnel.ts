import { z } from "zod";
import { resolveSegmentContact } from "../geometry";
import type { DrawingSurface, FunnelChamber, LocalBall, Segment } from "../types";
import { blankCommon, loadClock, num, readField, sizeChamber } from "./common";

const REFLECT = 1.8;
const WALL_COLOR = [90, 70, 110] as const;

const segmentSchema = z.object({ x1: num, y1: num, x2: num, y2: num });

export interface FunnelState {
  walls: Segment[];
  t: number;
}

export function createFunnel(): FunnelChamber {
  return { kind: "funnel", ...blankCommon(), walls: [] };
}

/** Two converging upper walls over two shorter lower walls. */
export function initFunnel(chamber: FunnelChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  chamber.walls = [
    { x1: w * 0.05, y1: h * 0.15, x2: w * 0.35, y2: h * 0.55 },
    { x1: w * 0.95, y1: h * 0.15, x2: w * 0.65, y2: h * 0.55 },
    { x1: w * 0.25, y1: h * 0.6, x2: w * 0.4, y2: h * 0.75 },
    { x1: w * 0.75, y1: h * 0.6, x2: w * 0.6, y2: h * 0.75 },
  ];
}

export function wallThickness(chamber: FunnelChamber): number {
  return Math.max(2, Math.floor(4 * chamber.scale));
}

export function updateFunnel(chamber: FunnelChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  const thick = wallThickness(chamber);
  for (const ball of balls) {
    for (const wall of chamber.walls) {
      resolveSegmentContact(ball, wall.x1, wall.y1, wall.x2, wall.y2, thick, REFLECT);
    }
  }
}

export function drawFunnel(chamber: FunnelChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const lineWidth = Math.max(4, Math.floor(8 * chamber.scale));
  for (const wall of chamber.walls) {
    surface.line(ox + wall.x1, oy + wall.y1, ox + wall.x2, oy + wall.y2, WALL_COLOR, 255, lineWidth);
  }
}

export function saveFunnel(chamber: FunnelChamber): FunnelState {
  return { walls: chamber.walls.map((w) => ({ ...w })), t: chamber.t };
}

export function loadFunnel(chamber: FunnelChamber, raw: unknown): void {
  chamber.walls = readField(raw, "walls", z.array(segmentSchema)) ?? chamber.walls;
  loadClock(chamber, raw);
}
