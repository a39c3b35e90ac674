import { drawChamber } from "./chambers";
import { displayColor } from "./engine";
import type { DrawingSurface, Rgb, Simulation } from "./types";

const BACKGROUND: Rgb = [20, 20, 30];
const CELL_BORDER: Rgb = [60, 60, 80];

/**
 * The subset of a Canvas 2D context the surface needs. Any browser
 * `CanvasRenderingContext2D` or node-canvas context satisfies it.
 */
export interface Canvas2DLike {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  globalAlpha: number;
  canvas?: { width: number; height: number };
  save(): void;
  restore(): void;
  beginPath(): void;
  rect(x: number, y: number, w: number, h: number): void;
  clip(): void;
  arc(x: number, y: number, r: number, start: number, end: number): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  fill(): void;
  stroke(): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
}

/** css color helper. */
export function cssColor([r, g, b]: Rgb): string {
  return `rgb(${Math.round(r)}, ${Math.round(g)}, ${Math.round(b)})`;
}

function alphaOf(alpha: number | undefined): number {
  if (alpha === undefined || !Number.isFinite(alpha)) return 1;
  return Math.max(0, Math.min(255, alpha)) / 255;
}

/** Adapt a Canvas 2D context to the drawing surface chambers draw on. */
export function makeCanvasSurface(ctx: Canvas2DLike): DrawingSurface {
  function paint(color: Rgb, alpha: number | undefined, width: number | undefined, draw: () => void): void {
    ctx.globalAlpha = alphaOf(alpha);
    ctx.fillStyle = cssColor(color);
    ctx.strokeStyle = cssColor(color);
    if (width !== undefined) ctx.lineWidth = width;
    draw();
    ctx.globalAlpha = 1;
  }

  function circlePath(cx: number, cy: number, r: number): void {
    ctx.beginPath();
    ctx.arc(cx, cy, Math.max(0, r), 0, Math.PI * 2);
  }

  return {
    clear(color) {
      const w = ctx.canvas?.width ?? 0;
      const h = ctx.canvas?.height ?? 0;
      paint(color, 255, undefined, () => ctx.fillRect(0, 0, w, h));
    },
    fillRect(x, y, w, h, color, alpha) {
      paint(color, alpha, undefined, () => ctx.fillRect(x, y, w, h));
    },
    strokeRect(x, y, w, h, color, alpha, width = 1) {
      paint(color, alpha, width, () => ctx.strokeRect(x, y, w, h));
    },
    fillCircle(cx, cy, r, color, alpha) {
      paint(color, alpha, undefined, () => {
        circlePath(cx, cy, r);
        ctx.fill();
      });
    },
    strokeCircle(cx, cy, r, color, alpha, width = 1) {
      paint(color, alpha, width, () => {
        circlePath(cx, cy, r);
        ctx.stroke();
      });
    },
    line(x1, y1, x2, y2, color, alpha, width = 1) {
      paint(color, alpha, width, () => {
        ctx.beginPath();
        ctx.moveTo(x1, y1);
        ctx.lineTo(x2, y2);
        ctx.stroke();
      });
    },
    pushClip(x, y, w, h) {
      ctx.save();
      ctx.beginPath();
      ctx.rect(x, y, w, h);
      ctx.clip();
    },
    popClip() {
      ctx.restore();
    },
  };
}

/**
 * Draw one frame: chamber cells (each clipped to its viewport), then every
 * active ball in global coordinates on top.
 */
export function drawSimulation(sim: Simulation, surface: DrawingSurface): void {
  surface.clear(BACKGROUND);

  sim.chambers.forEach((chamber, i) => {
    const vp = chamber.viewport;
    const shade = 25 + (i % 3) * 5;
    surface.fillRect(vp.x + 2, vp.y + 2, vp.w - 4, vp.h - 4, [shade, shade, shade + 8]);
    surface.strokeRect(vp.x + 2, vp.y + 2, vp.w - 4, vp.h - 4, CELL_BORDER, 255, 2);

    surface.pushClip(vp.x, vp.y, vp.w, vp.h);
    drawChamber(chamber, surface);
    surface.popClip();
  });

  for (const ball of sim.balls) {
    if (!ball.active) continue;
    surface.fillCircle(ball.x + 3, ball.y + 3, ball.radius, [20, 20, 20], 80);
    surface.fillCircle(ball.x, ball.y, ball.radius, displayColor(sim, ball));
    surface.strokeCircle(ball.x, ball.y, ball.radius, [255, 255, 255], 80, 2);
  }
}
