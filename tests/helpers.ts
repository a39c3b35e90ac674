import { vi, type Mock } from "vitest";
import { silentLogger, type Logger } from "../lib/logger";
import { GRAVITY } from "../src/game/engine";
import { makeRng } from "../src/game/random";
import type { BallAnnotation, ChamberFrame, DrawingSurface, LocalBall, Viewport } from "../src/game/types";

export function localBall(overrides: Partial<LocalBall> = {}): LocalBall {
  return { id: 1, x: 0, y: 0, vx: 0, vy: 0, radius: 10, color: [200, 200, 200], active: true, ...overrides };
}

export function viewport(w = 480, h = 270, overrides: Partial<Viewport> = {}): Viewport {
  return { x: 0, y: 0, w, h, index: 0, col: 0, row: 0, ...overrides };
}

export type RecordedFrame = ChamberFrame & {
  marks: Map<number, Omit<BallAnnotation, "owner">>;
  cleared: number;
};

/** Chamber frame that records annotations instead of writing to a manager. */
export function testFrame(seed = 1): RecordedFrame {
  const marks = new Map<number, Omit<BallAnnotation, "owner">>();
  const frame: RecordedFrame = {
    index: 0,
    rng: makeRng(seed),
    gravity: GRAVITY,
    marks,
    cleared: 0,
    annotate: (ballId, annotation) => {
      marks.set(ballId, annotation);
    },
    clearAnnotations: () => {
      marks.clear();
      frame.cleared += 1;
    },
  };
  return frame;
}

export function recordingSurface(): DrawingSurface & { calls: string[] } {
  const calls: string[] = [];
  const record =
    (name: string) =>
    (..._args: unknown[]): void => {
      calls.push(name);
    };
  return {
    calls,
    clear: record("clear"),
    fillRect: record("fillRect"),
    strokeRect: record("strokeRect"),
    fillCircle: record("fillCircle"),
    strokeCircle: record("strokeCircle"),
    line: record("line"),
    pushClip: record("pushClip"),
    popClip: record("popClip"),
  };
}

export function spyLogger(): Logger & Record<keyof Logger, Mock> {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export { silentLogger };
