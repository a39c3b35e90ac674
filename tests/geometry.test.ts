import { describe, expect, it } from "vitest";
import {
  CONTACT_SLOP,
  circleOverlapsRect,
  closestPointOnSegment,
  landsOnPlatform,
  pointInRect,
  rectsOverlap,
  reflectVelocity,
  resolveCircleContact,
  resolveSegmentContact,
  unitNormal,
} from "../src/game/geometry";
import { localBall } from "./helpers";

describe("reflectVelocity", () => {
  it("mirrors an approaching ball with k = 2", () => {
    const ball = localBall({ vx: 30, vy: 100 });
    expect(reflectVelocity(ball, { nx: 0, ny: -1 }, 2)).toBe(true);
    expect(ball.vx).toBe(30);
    expect(ball.vy).toBe(-100);
  });

  it("leaves a separating ball alone", () => {
    const ball = localBall({ vy: -100 });
    expect(reflectVelocity(ball, { nx: 0, ny: -1 }, 2)).toBe(false);
    expect(ball.vy).toBe(-100);
  });
});

describe("resolveCircleContact", () => {
  it("pushes the ball clear and reflects with the given factor", () => {
    const ball = localBall({ x: 0, y: -15, vy: 100 });
    expect(resolveCircleContact(ball, 0, 0, 10, 1.5)).toBe(true);
    expect(ball.y).toBeCloseTo(-20 - CONTACT_SLOP, 10);
    expect(ball.vy).toBeCloseTo(-50, 10);
    expect(Math.hypot(ball.x, ball.y)).toBeGreaterThanOrEqual(20);
  });

  it("sends a ball sitting on the center straight up", () => {
    const ball = localBall({ x: 5, y: 5 });
    resolveCircleContact(ball, 5, 5, 10, 1.5);
    expect(ball.x).toBe(5);
    expect(ball.y).toBeCloseTo(5 - 20 - CONTACT_SLOP, 10);
  });

  it("ignores a ball out of reach", () => {
    const ball = localBall({ x: 0, y: -25 });
    expect(resolveCircleContact(ball, 0, 0, 10, 1.5)).toBe(false);
    expect(ball.y).toBe(-25);
  });
});

describe("resolveSegmentContact", () => {
  it("returns the contact normal and separates", () => {
    const ball = localBall({ x: 50, y: 95, vy: 40 });
    const n = resolveSegmentContact(ball, 0, 100, 100, 100, 4, 2);
    expect(n).toEqual({ nx: 0, ny: -1 });
    expect(ball.y).toBeCloseTo(100 - 14 - CONTACT_SLOP, 10);
    expect(ball.vy).toBe(-40);
  });

  it("returns null without contact", () => {
    expect(resolveSegmentContact(localBall({ x: 50, y: 50 }), 0, 100, 100, 100, 4, 2)).toBeNull();
  });
});

describe("primitives", () => {
  it("clamps the closest point to the segment ends", () => {
    expect(closestPointOnSegment(-10, 5, 0, 0, 10, 0)).toEqual({ x: 0, y: 0, t: 0 });
    expect(closestPointOnSegment(4, 5, 0, 0, 10, 0)).toEqual({ x: 4, y: 0, t: 0.4 });
  });

  it("falls back to straight up for a degenerate normal", () => {
    expect(unitNormal(0, 0)).toEqual({ nx: 0, ny: -1 });
    expect(unitNormal(3, 4)).toEqual({ nx: 0.6, ny: 0.8 });
  });

  it("treats rectangle edges as in for points and out for circles", () => {
    const rect = { x: 0, y: 0, w: 10, h: 10 };
    expect(pointInRect(10, 10, rect)).toBe(true);
    expect(circleOverlapsRect(15, 5, 5, rect)).toBe(false);
    expect(circleOverlapsRect(14, 5, 5, rect)).toBe(true);
    expect(rectsOverlap(rect, { x: 15, y: 0, w: 5, h: 5 })).toBe(false);
    expect(rectsOverlap(rect, { x: 15, y: 0, w: 5, h: 5 }, 10)).toBe(true);
  });
});

describe("landsOnPlatform", () => {
  it("accepts a falling ball that reached the top this frame", () => {
    expect(landsOnPlatform(localBall({ y: 92, vy: 120 }), 100, 10, 0.1)).toBe(true);
  });

  it("rejects rising balls and balls already below the platform", () => {
    expect(landsOnPlatform(localBall({ y: 92, vy: -120 }), 100, 10, 0.1)).toBe(false);
    expect(landsOnPlatform(localBall({ y: 150, vy: 50 }), 100, 10, 0.1)).toBe(false);
  });
});
