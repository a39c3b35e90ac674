import { landsOnPlatform } from "../geometry";
import type { DrawingSurface, LocalBall, Rect, TrampolineChamber } from "../types";
import { blankCommon, loadClock, readField, rectSchema, sizeChamber } from "./common";

const BOUNCE = 1.5;
const MAX_LAUNCH = 800;
const MIN_LAUNCH = 200;
const KICK_LAUNCH = 350;

export interface TrampolineState {
  pad: Rect | null;
  t: number;
}

export function createTrampoline(): TrampolineChamber {
  return { kind: "trampoline", ...blankCommon(), pad: null };
}

export function initTrampoline(chamber: TrampolineChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  chamber.pad = { x: w * 0.2, y: h * 0.7, w: w * 0.6, h: Math.max(10, Math.floor(h * 0.035)) };
}

/**
 * Falling balls landing on the pad are launched upward at 1.5x their
 * speed, capped from above and lifted to a minimum launch from below.
 */
export function updateTrampoline(chamber: TrampolineChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  const pad = chamber.pad;
  if (!pad) return;

  const maxUp = MAX_LAUNCH * chamber.scale;
  for (const ball of balls) {
    if (ball.x + ball.radius <= pad.x || ball.x - ball.radius >= pad.x + pad.w) continue;
    if (!landsOnPlatform(ball, pad.y, pad.h, dt)) continue;

    ball.y = pad.y - ball.radius;
    ball.vy = Math.max(-ball.vy * BOUNCE, -maxUp);
    if (ball.vy > -MIN_LAUNCH * chamber.scale) ball.vy = -KICK_LAUNCH * chamber.scale;
  }
}

export function drawTrampoline(chamber: TrampolineChamber, surface: DrawingSurface): void {
  const pad = chamber.pad;
  if (!pad) return;
  const { x: ox, y: oy } = chamber.viewport;
  const inset = 10 * chamber.scale;
  const legWidth = Math.max(2, Math.floor(4 * chamber.scale));
  const bottom = oy + chamber.h;

  surface.line(ox + pad.x + inset, oy + pad.y + inset, ox + pad.x + inset, bottom, [100, 100, 100], 255, legWidth);
  surface.line(ox + pad.x + pad.w - inset, oy + pad.y + inset, ox + pad.x + pad.w - inset, bottom, [100, 100, 100], 255, legWidth);
  surface.fillRect(ox + pad.x, oy + pad.y, pad.w, pad.h, [50, 50, 200]);
  surface.strokeRect(ox + pad.x, oy + pad.y, pad.w, pad.h, [100, 100, 255], 255, 2);
}

export function saveTrampoline(chamber: TrampolineChamber): TrampolineState {
  return { pad: chamber.pad ? { ...chamber.pad } : null, t: chamber.t };
}

export function loadTrampoline(chamber: TrampolineChamber, raw: unknown): void {
  chamber.pad = readField(raw, "pad", rectSchema) ?? chamber.pad;
  loadClock(chamber, raw);
}
