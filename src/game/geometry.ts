import type { LocalBall, Rect } from "./types";

export const REF_W = 480;
export const REF_H = 270;

// Extra separation added on every push-out so a resolved contact is not re-detected.
export const CONTACT_SLOP = 0.01;

// Used whenever a contact normal has zero length.
export const FALLBACK_NORMAL = Object.freeze({ nx: 0, ny: -1 });

export interface Normal {
  nx: number;
  ny: number;
}

export interface ClosestPoint {
  x: number;
  y: number;
  t: number;
}

/** clamp helper. */
export function clamp(v: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, v));
}

/** Scale of a chamber relative to the 480x270 reference cell. */
export function chamberScale(w: number, h: number): number {
  return Math.min(w / REF_W, h / REF_H);
}

/** Unit vector along (dx, dy), or straight up when the vector is degenerate. */
export function unitNormal(dx: number, dy: number): Normal {
  const len = Math.hypot(dx, dy);
  if (!(len > 0) || !Number.isFinite(len)) return { ...FALLBACK_NORMAL };
  return { nx: dx / len, ny: dy / len };
}

/** Closest point on segment (x1,y1)-(x2,y2) to (px,py), with its parameter t in [0,1]. */
export function closestPointOnSegment(
  px: number,
  py: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number
): ClosestPoint {
  const dx = x2 - x1;
  const dy = y2 - y1;
  const len2 = dx * dx + dy * dy;
  if (len2 === 0) return { x: x1, y: y1, t: 0 };
  const t = clamp(((px - x1) * dx + (py - y1) * dy) / len2, 0, 1);
  return { x: x1 + dx * t, y: y1 + dy * t, t };
}

/**
 * Remove `k` times the normal velocity component (k = 2 is a mirror bounce,
 * k > 2 adds energy). Only applied when the ball moves into the surface.
 */
export function reflectVelocity(ball: LocalBall, n: Normal, k: number): boolean {
  const vn = ball.vx * n.nx + ball.vy * n.ny;
  if (vn >= 0) return false;
  ball.vx -= k * vn * n.nx;
  ball.vy -= k * vn * n.ny;
  return true;
}

/**
 * Resolve a ball against a solid circle: push out along the center line and
 * reflect. Returns true when the ball was touching.
 */
export function resolveCircleContact(ball: LocalBall, cx: number, cy: number, r: number, k: number): boolean {
  const dx = ball.x - cx;
  const dy = ball.y - cy;
  const minDist = ball.radius + r;
  const d2 = dx * dx + dy * dy;
  if (d2 >= minDist * minDist) return false;
  const d = Math.sqrt(d2);
  const n = unitNormal(dx, dy);
  const push = minDist - d + CONTACT_SLOP;
  ball.x += n.nx * push;
  ball.y += n.ny * push;
  reflectVelocity(ball, n, k);
  return true;
}

/**
 * Resolve a ball against a segment thickened by `thickness`. Returns the
 * contact normal, or null when there was no contact.
 */
export function resolveSegmentContact(
  ball: LocalBall,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  thickness: number,
  k: number
): Normal | null {
  const c = closestPointOnSegment(ball.x, ball.y, x1, y1, x2, y2);
  const dx = ball.x - c.x;
  const dy = ball.y - c.y;
  const dist = Math.hypot(dx, dy);
  const minDist = ball.radius + thickness;
  if (dist >= minDist) return null;
  const n = unitNormal(dx, dy);
  const push = minDist - dist + CONTACT_SLOP;
  ball.x += n.nx * push;
  ball.y += n.ny * push;
  reflectVelocity(ball, n, k);
  return n;
}

/** Strict circle-vs-rectangle bounding-box overlap. */
export function circleOverlapsRect(x: number, y: number, r: number, rect: Rect): boolean {
  return x + r > rect.x && x - r < rect.x + rect.w && y + r > rect.y && y - r < rect.y + rect.h;
}

/** Inclusive point-in-rectangle test. */
export function pointInRect(x: number, y: number, rect: Rect): boolean {
  return x >= rect.x && x <= rect.x + rect.w && y >= rect.y && y <= rect.y + rect.h;
}

export function rectsOverlap(a: Rect, b: Rect, gap = 0): boolean {
  return a.x < b.x + b.w + gap && a.x + a.w + gap > b.x && a.y < b.y + b.h + gap && a.y + a.h + gap > b.y;
}

/**
 * One-way platform test shared by stairs, trampoline and conveyor: the ball
 * is falling, its bottom reached the platform top this frame, and it was not
 * already below the platform on the previous frame.
 */
export function landsOnPlatform(ball: LocalBall, top: number, thickness: number, dt: number): boolean {
  if (!(ball.vy > 0)) return false;
  const prevY = ball.y - ball.vy * dt;
  return ball.y + ball.radius >= top && prevY + ball.radius <= top + thickness;
}
