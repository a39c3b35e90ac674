import { z } from "zod";
import { landsOnPlatform } from "../geometry";
import type { Belt, ConveyorChamber, DrawingSurface, LocalBall } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, sizeChamber } from "./common";

const BELT_SPEED = 100;
const GRIP = 5;

const beltSchema = rectSchema.extend({ speed: num });

export interface ConveyorState {
  belts: Belt[];
  t: number;
}

export function createConveyor(): ConveyorChamber {
  return { kind: "conveyor", ...blankCommon(), belts: [] };
}

export function initConveyor(chamber: ConveyorChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  const beltH = Math.max(8, Math.floor(h * 0.03));
  const speed = BELT_SPEED * chamber.scale;
  chamber.belts = [
    { x: w * 0.1, y: h * 0.3, w: w * 0.4, h: beltH, speed },
    { x: w * 0.5, y: h * 0.6, w: w * 0.4, h: beltH, speed: -speed },
  ];
}

/** Landing balls stop falling and are blended toward the belt speed. */
export function updateConveyor(chamber: ConveyorChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;
  const k = Math.min(1, GRIP * dt);
  for (const ball of balls) {
    for (const belt of chamber.belts) {
      if (ball.x + ball.radius <= belt.x || ball.x - ball.radius >= belt.x + belt.w) continue;
      if (!landsOnPlatform(ball, belt.y, belt.h, dt)) continue;
      ball.y = belt.y - ball.radius;
      ball.vy = 0;
      ball.vx = ball.vx * (1 - k) + belt.speed * k;
    }
  }
}

export function drawConveyor(chamber: ConveyorChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const spacing = Math.max(10, Math.floor(20 * chamber.scale));
  const width = Math.max(1, Math.floor(2 * chamber.scale));

  for (const belt of chamber.belts) {
    const bx = ox + belt.x;
    const by = oy + belt.y;
    surface.fillRect(bx, by, belt.w, belt.h, [60, 60, 60]);

    const offset = (((chamber.t * belt.speed) % spacing) + spacing) % spacing;
    for (let i = 0; i <= belt.w; i += spacing) {
      const x = (i + offset) % belt.w;
      surface.line(bx + x, by, bx + x, by + belt.h, [40, 40, 40], 255, width);
    }

    const wheel = belt.h / 2 + 2;
    surface.fillCircle(bx, by + belt.h / 2, wheel, [30, 30, 30]);
    surface.fillCircle(bx + belt.w, by + belt.h / 2, wheel, [30, 30, 30]);
  }
}

export function saveConveyor(chamber: ConveyorChamber): ConveyorState {
  return { belts: chamber.belts.map((b) => ({ ...b })), t: chamber.t };
}

export function loadConveyor(chamber: ConveyorChamber, raw: unknown): void {
  chamber.belts = readField(raw, "belts", z.array(beltSchema)) ?? chamber.belts;
  loadClock(chamber, raw);
}
