import { z } from "zod";
import { fitChamber, initChamber, loadChamber, saveChamber } from "./chambers";
import { isRecord, num, readField, rgb, viewportSchema } from "./chambers/common";
import { layoutChambers, loadChambers } from "./engine";
import type { Ball, Chamber, ChamberStateBlob, Simulation, SimulationSnapshot } from "./types";

const DEFAULT_RESTORE_RADIUS = 20;
const DEFAULT_RESTORE_COLOR = [220, 80, 80] as const;

const positive = num.positive();
const gridCount = z.number().int().positive();

const ballSchema = z.object({
  id: z.number().int().positive().optional().catch(undefined),
  x: num,
  y: num,
  vx: num.optional().catch(undefined),
  vy: num.optional().catch(undefined),
  radius: positive.optional().catch(undefined),
  color: rgb.optional().catch(undefined),
  active: z.boolean().optional().catch(undefined),
});

const blobSchema = z.object({
  kind: z.string(),
  viewport: viewportSchema.optional().catch(undefined),
  state: z.unknown(),
});

type SavedBlob = z.infer<typeof blobSchema>;

/** Plain-data snapshot of the whole simulation, ready for JSON. */
export function saveState(sim: Simulation): SimulationSnapshot {
  return {
    t: sim.t,
    w: sim.w,
    h: sim.h,
    balls: sim.balls.map((b) => ({
      id: b.id,
      x: b.x,
      y: b.y,
      vx: b.vx,
      vy: b.vy,
      radius: b.radius,
      color: [b.color[0], b.color[1], b.color[2]],
      active: b.active,
    })),
    nextBallId: sim.nextBallId,
    spawnTimer: sim.spawnTimer,
    chamberOrder: [...sim.chamberOrder],
    cols: sim.cols,
    rows: sim.rows,
    chamberStates: sim.chambers.map(
      (c): ChamberStateBlob => ({ kind: c.kind, viewport: { ...c.viewport }, state: saveChamber(c) })
    ),
  };
}

/**
 * Restore a snapshot produced by `saveState`, tolerating partial or foreign
 * input: each field is validated on its own and keeps its current value when
 * missing or invalid. Chambers are rebuilt from the saved order only when
 * none exist yet, and their geometry comes from the saved blobs.
 */
export function loadState(sim: Simulation, raw: unknown): void {
  if (!isRecord(raw)) {
    sim.logger.warn("ignoring saved state: not an object");
    return;
  }

  sim.t = readField(raw, "t", num) ?? sim.t;
  sim.w = readField(raw, "w", positive) ?? sim.w;
  sim.h = readField(raw, "h", positive) ?? sim.h;
  sim.nextBallId = readField(raw, "nextBallId", z.number().int().positive()) ?? sim.nextBallId;
  sim.spawnTimer = readField(raw, "spawnTimer", num) ?? 0;

  const shape = { cols: readField(raw, "cols", gridCount), rows: readField(raw, "rows", gridCount) };
  const blobs = readBlobs(raw);

  if (sim.chambers.length === 0) {
    const order = readField(raw, "chamberOrder", z.array(z.string()));
    if (order) {
      loadChambers(sim, order);
      layoutChambers(sim, shape);
      restoreChambers(sim, blobs, true);
    }
  } else {
    if (shape.cols !== undefined && shape.rows !== undefined && shape.cols * shape.rows >= sim.chambers.length) {
      sim.cols = shape.cols;
      sim.rows = shape.rows;
    }
    restoreChambers(sim, blobs, false);
  }

  const balls = readField(raw, "balls", z.array(z.unknown()));
  if (balls) restoreBalls(sim, balls);
  sim.annotations.clear();
}

function readBlobs(raw: Record<string, unknown>): (SavedBlob | null)[] {
  const entries = readField(raw, "chamberStates", z.array(z.unknown())) ?? [];
  return entries.map((entry) => {
    const parsed = blobSchema.safeParse(entry);
    return parsed.success ? parsed.data : null;
  });
}

/** The saved blob for chamber `index`: same slot when the kind agrees, else the first unused one of that kind. */
function matchBlob(chamber: Chamber, index: number, blobs: (SavedBlob | null)[], used: Set<number>): SavedBlob | null {
  const sameSlot = blobs[index];
  if (sameSlot && sameSlot.kind === chamber.kind && !used.has(index)) {
    used.add(index);
    return sameSlot;
  }
  const other = blobs.findIndex((b, i) => b !== null && b.kind === chamber.kind && !used.has(i));
  if (other < 0) return null;
  used.add(other);
  return blobs[other];
}

function restoreChambers(sim: Simulation, blobs: (SavedBlob | null)[], fresh: boolean): void {
  const used = new Set<number>();
  sim.chambers.forEach((chamber, i) => {
    const blob = matchBlob(chamber, i, blobs, used);
    if (!blob) {
      // A freshly built chamber with nothing saved for it still needs geometry.
      if (fresh) initChamber(chamber, chamber.viewport, sim.rng);
      return;
    }
    fitChamber(chamber, blob.viewport ?? chamber.viewport);
    loadChamber(chamber, blob.state);
  });
}

/**
 * Replace the population from saved entries. Entries without a finite
 * position are dropped; missing or repeated ids get fresh ones.
 */
function restoreBalls(sim: Simulation, entries: unknown[]): void {
  const balls: Ball[] = [];
  const seen = new Set<number>();
  const needsId: Ball[] = [];

  for (const entry of entries) {
    if (balls.length >= sim.maxBalls) break;
    const parsed = ballSchema.safeParse(entry);
    if (!parsed.success) continue;
    const s = parsed.data;
    const ball: Ball = {
      id: 0,
      x: s.x,
      y: s.y,
      vx: s.vx ?? 0,
      vy: s.vy ?? 0,
      radius: s.radius ?? DEFAULT_RESTORE_RADIUS,
      color: s.color ?? DEFAULT_RESTORE_COLOR,
      active: s.active ?? true,
    };
    if (s.id !== undefined && !seen.has(s.id)) {
      ball.id = s.id;
      seen.add(s.id);
    } else {
      needsId.push(ball);
    }
    balls.push(ball);
  }

  let next = Math.max(sim.nextBallId, ...[...seen].map((id) => id + 1));
  for (const ball of needsId) ball.id = next++;
  sim.nextBallId = next;
  sim.balls = balls;
}
