import { describe, expect, it } from "vitest";
import { initSimulation, makeSimulation } from "../src/game/engine";
import { cssColor, drawSimulation, makeCanvasSurface, type Canvas2DLike } from "../src/game/render";
import { recordingSurface, silentLogger } from "./helpers";

class FakeContext implements Canvas2DLike {
  fillStyle: string | object = "";
  strokeStyle: string | object = "";
  lineWidth = 1;
  globalAlpha = 1;
  canvas = { width: 300, height: 150 };
  readonly log: string[] = [];

  save(): void {
    this.log.push("save");
  }
  restore(): void {
    this.log.push("restore");
  }
  beginPath(): void {
    this.log.push("beginPath");
  }
  rect(x: number, y: number, w: number, h: number): void {
    this.log.push(`rect ${x} ${y} ${w} ${h}`);
  }
  clip(): void {
    this.log.push("clip");
  }
  arc(x: number, y: number, r: number): void {
    this.log.push(`arc ${x} ${y} ${r}`);
  }
  moveTo(x: number, y: number): void {
    this.log.push(`moveTo ${x} ${y}`);
  }
  lineTo(x: number, y: number): void {
    this.log.push(`lineTo ${x} ${y}`);
  }
  fill(): void {
    this.log.push(`fill ${String(this.fillStyle)} ${this.globalAlpha.toFixed(2)}`);
  }
  stroke(): void {
    this.log.push(`stroke ${String(this.strokeStyle)} ${this.lineWidth}`);
  }
  fillRect(x: number, y: number, w: number, h: number): void {
    this.log.push(`fillRect ${x} ${y} ${w} ${h} ${String(this.fillStyle)}`);
  }
  strokeRect(x: number, y: number, w: number, h: number): void {
    this.log.push(`strokeRect ${x} ${y} ${w} ${h}`);
  }
}

describe("makeCanvasSurface", () => {
  it("fills circles with the color and alpha, then resets alpha", () => {
    const ctx = new FakeContext();
    makeCanvasSurface(ctx).fillCircle(10, 20, 5, [1, 2, 3], 128);
    expect(ctx.log).toEqual(["beginPath", "arc 10 20 5", "fill rgb(1, 2, 3) 0.50"]);
    expect(ctx.globalAlpha).toBe(1);
  });

  it("clears the whole canvas", () => {
    const ctx = new FakeContext();
    makeCanvasSurface(ctx).clear([20, 20, 30]);
    expect(ctx.log).toEqual(["fillRect 0 0 300 150 rgb(20, 20, 30)"]);
  });

  it("strokes lines at the requested width", () => {
    const ctx = new FakeContext();
    makeCanvasSurface(ctx).line(0, 0, 5, 5, [255, 0, 0], 255, 3);
    expect(ctx.log).toEqual(["beginPath", "moveTo 0 0", "lineTo 5 5", "stroke rgb(255, 0, 0) 3"]);
  });

  it("clips with save and restore", () => {
    const ctx = new FakeContext();
    const surface = makeCanvasSurface(ctx);
    surface.pushClip(1, 2, 3, 4);
    surface.popClip();
    expect(ctx.log).toEqual(["save", "beginPath", "rect 1 2 3 4", "clip", "restore"]);
  });

  it("rounds color channels", () => {
    expect(cssColor([1.4, 2.6, 3])).toBe("rgb(1, 3, 3)");
  });
});

describe("drawSimulation", () => {
  it("clears, draws each chamber clipped, then the balls on top", () => {
    const sim = makeSimulation({ seed: 8, logger: silentLogger, catalog: ["pegs", "bumper"], initialBurst: 2 });
    initSimulation(sim, 960, 270);
    const surface = recordingSurface();
    drawSimulation(sim, surface);

    expect(surface.calls[0]).toBe("clear");
    expect(surface.calls.filter((c) => c === "pushClip")).toHaveLength(2);
    expect(surface.calls.filter((c) => c === "popClip")).toHaveLength(2);
    expect(surface.calls.slice(-6)).toEqual([
      "fillCircle",
      "fillCircle",
      "strokeCircle",
      "fillCircle",
      "fillCircle",
      "strokeCircle",
    ]);
  });
});
