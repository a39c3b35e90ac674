import { z } from "zod";
import { closestPointOnSegment, reflectVelocity, type Normal } from "../geometry";
import { randRange } from "../random";
import type { DrawingSurface, LocalBall, Point, Rng, SplitterChamber, Wedge } from "../types";
import { blankCommon, loadClock, pointSchema, readField, sizeChamber } from "./common";

const REFLECT = 1.5;
const WEDGE_COLOR = [100, 200, 150] as const;

const wedgeSchema = z.object({ top: pointSchema, left: pointSchema, right: pointSchema });

export interface SplitterState {
  wedge: Wedge | null;
  t: number;
}

interface WedgeWall extends Normal {
  a: Point;
  b: Point;
}

export function createSplitter(): SplitterChamber {
  return { kind: "splitter", ...blankCommon(), wedge: null };
}

/** Randomized apex position and spread; both feet sit at 60% height. */
export function initSplitter(chamber: SplitterChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  const topX = w * randRange(rng, 0.5, 0.6);
  const topY = h * randRange(rng, 0.15, 0.25);
  const spread = w * randRange(rng, 0.2, 0.3);
  chamber.wedge = {
    top: { x: topX, y: topY },
    left: { x: topX - spread, y: h * 0.6 },
    right: { x: topX + spread, y: h * 0.6 },
  };
}

/** Both wedge walls with outward (upper-left, upper-right) unit normals. */
export function wedgeWalls(wedge: Wedge): WedgeWall[] {
  const walls: WedgeWall[] = [];
  for (const [foot, side] of [
    [wedge.left, -1],
    [wedge.right, 1],
  ] as const) {
    const dx = foot.x - wedge.top.x;
    const dy = foot.y - wedge.top.y;
    const len = Math.hypot(dx, dy);
    if (!(len > 0)) continue;
    const nx = side < 0 ? -dy / len : dy / len;
    const ny = side < 0 ? dx / len : -dx / len;
    walls.push({ a: wedge.top, b: foot, nx, ny });
  }
  return walls;
}

export function updateSplitter(chamber: SplitterChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  if (!chamber.wedge) return;
  const walls = wedgeWalls(chamber.wedge);
  const thick = Math.max(2, Math.floor(5 * chamber.scale));

  for (const ball of balls) {
    for (const wall of walls) {
      const minDist = ball.radius + thick;
      const c = closestPointOnSegment(ball.x, ball.y, wall.a.x, wall.a.y, wall.b.x, wall.b.y);
      const d2 = (ball.x - c.x) ** 2 + (ball.y - c.y) ** 2;
      if (d2 >= minDist * minDist) continue;

      // Penetration is measured against the wall's infinite line along its fixed normal.
      const signed = (ball.x - wall.a.x) * wall.nx + (ball.y - wall.a.y) * wall.ny;
      if (signed >= minDist) continue;
      const pen = minDist - signed;
      ball.x += wall.nx * pen;
      ball.y += wall.ny * pen;
      reflectVelocity(ball, wall, REFLECT);
    }
  }
}

export function drawSplitter(chamber: SplitterChamber, surface: DrawingSurface): void {
  if (!chamber.wedge) return;
  const { x: ox, y: oy } = chamber.viewport;
  const { top, left, right } = chamber.wedge;
  const lineWidth = Math.max(5, Math.floor(10 * chamber.scale));
  surface.line(ox + top.x, oy + top.y, ox + left.x, oy + left.y, WEDGE_COLOR, 255, lineWidth);
  surface.line(ox + top.x, oy + top.y, ox + right.x, oy + right.y, WEDGE_COLOR, 255, lineWidth);
}

export function saveSplitter(chamber: SplitterChamber): SplitterState {
  const wedge = chamber.wedge
    ? { top: { ...chamber.wedge.top }, left: { ...chamber.wedge.left }, right: { ...chamber.wedge.right } }
    : null;
  return { wedge, t: chamber.t };
}

export function loadSplitter(chamber: SplitterChamber, raw: unknown): void {
  chamber.wedge = readField(raw, "wedge", wedgeSchema) ?? chamber.wedge;
  loadClock(chamber, raw);
}
