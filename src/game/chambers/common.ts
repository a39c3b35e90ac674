import { z } from "zod";
import { chamberScale } from "../geometry";
import type { ChamberCommon, Viewport } from "../types";

export const num = z.number().finite();
export const rgb = z.tuple([num, num, num]);
export const pointSchema = z.object({ x: num, y: num });
export const rectSchema = z.object({ x: num, y: num, w: num, h: num });
export const circleSchema = z.object({ x: num, y: num, radius: num.positive() });

export const viewportSchema = rectSchema.extend({
  index: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
  row: z.number().int().nonnegative(),
});

export function blankViewport(): Viewport {
  return { x: 0, y: 0, w: 0, h: 0, index: 0, col: 0, row: 0 };
}

export function blankCommon(): ChamberCommon {
  return { viewport: blankViewport(), w: 0, h: 0, scale: 1, t: 0 };
}

/** Set a chamber's size and derived scale, resetting its clock. */
export function sizeChamber(chamber: ChamberCommon, w: number, h: number): void {
  chamber.w = w;
  chamber.h = h;
  chamber.scale = chamberScale(w, h);
  chamber.t = 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one field of a saved blob. Returns undefined when the blob is not an
 * object or the field fails validation, so each field falls back on its own.
 */
export function readField<S extends z.ZodTypeAny>(raw: unknown, key: string, schema: S): z.infer<S> | undefined {
  if (!isRecord(raw)) return undefined;
  const parsed = schema.safeParse(raw[key]);
  return parsed.success ? parsed.data : undefined;
}

/** Restore the chamber clock from a blob, keeping the current value otherwise. */
export function loadClock(chamber: ChamberCommon, raw: unknown): void {
  chamber.t = readField(raw, "t", num) ?? chamber.t;
}
