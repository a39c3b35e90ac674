import { z } from "zod";
import { randInt } from "../random";
import type { DrawingSurface, LocalBall, Portal, Rgb, Rng, TeleporterChamber } from "../types";
import { blankCommon, circleSchema, loadClock, num, readField, rgb, sizeChamber } from "./common";

export const PORTAL_COOLDOWN = 0.2;
const PAIR_ATTEMPTS = 100;
const EXIT_GAP = 2;

const PAIR_COLORS: readonly (readonly [Rgb, Rgb])[] = [
  [
    [50, 150, 255],
    [50, 255, 200],
  ],
  [
    [255, 150, 50],
    [255, 200, 50],
  ],
  [
    [200, 50, 200],
    [150, 50, 255],
  ],
];

const portalSchema = circleSchema.extend({ color: rgb, target: z.number().int().nonnegative() });
const cooldownSchema = z.array(z.tuple([z.number().int(), num]));

export interface TeleporterState {
  portals: Portal[];
  cooldowns: [number, number][];
  t: number;
}

export function createTeleporter(): TeleporterChamber {
  return { kind: "teleporter", ...blankCommon(), portals: [], cooldowns: new Map() };
}

/**
 * Place linked portal pairs. A pair that cannot be placed within the attempt
 * budget is dropped whole, so every portal always has a partner.
 */
export function initTeleporter(chamber: TeleporterChamber, w: number, h: number, rng: Rng): void {
  sizeChamber(chamber, w, h);
  chamber.portals = [];
  chamber.cooldowns = new Map();

  const radius = 22 * chamber.scale;
  const minSep = radius * 4;
  const margin = radius + 15 * chamber.scale;
  const pairs = randInt(rng, 2, 3);

  for (let p = 0; p < pairs; p++) {
    const colors: readonly [Rgb, Rgb] = PAIR_COLORS[p] ?? [
      [255, 255, 255],
      [200, 200, 200],
    ];
    const pair: { x: number; y: number }[] = [];
    for (let attempt = 0; pair.length < 2 && attempt < PAIR_ATTEMPTS; attempt++) {
      const x = randInt(rng, margin, w - margin);
      const y = randInt(rng, h * 0.1, h * 0.9);
      const crowded = [...chamber.portals, ...pair].some((o) => Math.hypot(x - o.x, y - o.y) < minSep);
      if (!crowded) pair.push({ x, y });
    }
    if (pair.length < 2) continue;

    const first = chamber.portals.length;
    chamber.portals.push(
      { ...pair[0], radius, color: colors[0], target: first + 1 },
      { ...pair[1], radius, color: colors[1], target: first }
    );
  }
}

/** Move a ball just past the rim of `target` along its direction of travel. */
function exitThrough(ball: LocalBall, target: Portal): void {
  const offset = target.radius + ball.radius + EXIT_GAP;
  const speed = Math.hypot(ball.vx, ball.vy);
  if (speed > 0.1) {
    ball.x = target.x + (ball.vx / speed) * offset;
    ball.y = target.y + (ball.vy / speed) * offset;
  } else {
    ball.x = target.x;
    ball.y = target.y + offset;
  }
}

export function updateTeleporter(chamber: TeleporterChamber, dt: number, balls: LocalBall[]): void {
  chamber.t += dt;

  for (const [id, remaining] of chamber.cooldowns) {
    if (remaining - dt <= 0) chamber.cooldowns.delete(id);
    else chamber.cooldowns.set(id, remaining - dt);
  }

  for (const ball of balls) {
    if (chamber.cooldowns.has(ball.id)) continue;
    for (const portal of chamber.portals) {
      if (Math.hypot(ball.x - portal.x, ball.y - portal.y) >= portal.radius) continue;
      const target = chamber.portals[portal.target];
      if (!target) continue;
      exitThrough(ball, target);
      chamber.cooldowns.set(ball.id, PORTAL_COOLDOWN);
      break;
    }
  }
}

export function drawTeleporter(chamber: TeleporterChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const { scale } = chamber;
  const rot = chamber.t * 4;
  for (const portal of chamber.portals) {
    const cx = ox + portal.x;
    const cy = oy + portal.y;
    surface.fillCircle(cx, cy, portal.radius * 1.2, portal.color, 40);
    surface.fillCircle(cx, cy, portal.radius, [10, 10, 20]);
    surface.strokeCircle(cx, cy, portal.radius, portal.color, 255, Math.max(1, 3 * scale));
    surface.strokeCircle(cx, cy, portal.radius + 2 * scale, [255, 255, 255], 100, 1);
    for (let j = 1; j <= 2; j++) {
      const a = rot + j * Math.PI;
      const orbit = portal.radius + 3 * scale;
      surface.fillCircle(cx + Math.cos(a) * orbit, cy + Math.sin(a) * orbit, 4 * scale, [255, 255, 255], 180);
    }
  }
}

export function saveTeleporter(chamber: TeleporterChamber): TeleporterState {
  return {
    portals: chamber.portals.map((p) => ({ ...p })),
    cooldowns: [...chamber.cooldowns.entries()],
    t: chamber.t,
  };
}

export function loadTeleporter(chamber: TeleporterChamber, raw: unknown): void {
  const portals = readField(raw, "portals", z.array(portalSchema));
  // Every link must name a portal in this list.
  if (portals && portals.every((p) => p.target < portals.length)) chamber.portals = portals;
  const cooldowns = readField(raw, "cooldowns", cooldownSchema);
  if (cooldowns) chamber.cooldowns = new Map(cooldowns.filter(([, remaining]) => remaining > 0));
  loadClock(chamber, raw);
}
