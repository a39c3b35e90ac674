import { chamberScale } from "../geometry";
import type { Chamber, ChamberFrame, ChamberKind, DrawingSurface, LocalBall, Rng, Viewport } from "../types";
import { createAccelerator, drawAccelerator, initAccelerator, loadAccelerator, saveAccelerator, updateAccelerator } from "./accelerator";
import { createAntigravity, drawAntigravity, initAntigravity, loadAntigravity, saveAntigravity, updateAntigravity } from "./antigravity";
import { createBumper, drawBumper, initBumper, loadBumper, saveBumper, updateBumper } from "./bumper";
import { createConveyor, drawConveyor, initConveyor, loadConveyor, saveConveyor, updateConveyor } from "./conveyor";
import { createFunnel, drawFunnel, initFunnel, loadFunnel, saveFunnel, updateFunnel } from "./funnel";
import { createMagnet, drawMagnet, initMagnet, loadMagnet, saveMagnet, updateMagnet } from "./magnet";
import { createMixer, drawMixer, initMixer, loadMixer, saveMixer, updateMixer } from "./mixer";
import { createPegs, drawPegs, initPegs, loadPegs, savePegs, updatePegs } from "./pegs";
import { createPong, drawPong, initPong, loadPong, savePong, updatePong } from "./pong";
import { createSeesaw, drawSeesaw, initSeesaw, loadSeesaw, saveSeesaw, updateSeesaw } from "./seesaw";
import { createSplitter, drawSplitter, initSplitter, loadSplitter, saveSplitter, updateSplitter } from "./splitter";
import { createStairs, drawStairs, initStairs, loadStairs, saveStairs, updateStairs } from "./stairs";
import { createTeleporter, drawTeleporter, initTeleporter, loadTeleporter, saveTeleporter, updateTeleporter } from "./teleporter";
import { createTeslaCoil, drawTeslaCoil, initTeslaCoil, loadTeslaCoil, saveTeslaCoil, updateTeslaCoil } from "./tesla-coil";
import { createTrampoline, drawTrampoline, initTrampoline, loadTrampoline, saveTrampoline, updateTrampoline } from "./trampoline";
import { createWindTunnel, drawWindTunnel, initWindTunnel, loadWindTunnel, saveWindTunnel, updateWindTunnel } from "./wind-tunnel";

/** Default catalog, in load order before shuffling. */
export const CHAMBER_KINDS = [
  "antigravity",
  "tesla_coil",
  "wind_tunnel",
  "seesaw",
  "pegs",
  "funnel",
  "stairs",
  "trampoline",
  "mixer",
  "accelerator",
  "splitter",
  "conveyor",
  "teleporter",
  "magnet",
  "bumper",
  "pong",
] as const satisfies readonly ChamberKind[];

const KIND_SET: ReadonlySet<string> = new Set(CHAMBER_KINDS);

export function isChamberKind(name: string): name is ChamberKind {
  return KIND_SET.has(name);
}

/** A chamber that could not be constructed or initialised. */
export class ChamberLoadError extends Error {
  readonly chamber: string;

  constructor(chamber: string, message: string, options?: { cause?: unknown }) {
    super(`chamber "${chamber}": ${message}`, options);
    this.name = "ChamberLoadError";
    this.chamber = chamber;
  }
}

export function createChamber(kind: ChamberKind): Chamber {
  switch (kind) {
    case "pegs":
      return createPegs();
    case "funnel":
      return createFunnel();
    case "splitter":
      return createSplitter();
    case "seesaw":
      return createSeesaw();
    case "mixer":
      return createMixer();
    case "wind_tunnel":
      return createWindTunnel();
    case "tesla_coil":
      return createTeslaCoil();
    case "stairs":
      return createStairs();
    case "trampoline":
      return createTrampoline();
    case "accelerator":
      return createAccelerator();
    case "conveyor":
      return createConveyor();
    case "teleporter":
      return createTeleporter();
    case "magnet":
      return createMagnet();
    case "bumper":
      return createBumper();
    case "pong":
      return createPong();
    case "antigravity":
      return createAntigravity();
  }
}

/** Default chamber factory: resolves a catalog identifier or throws ChamberLoadError. */
export function createChamberByName(name: string): Chamber {
  if (!isChamberKind(name)) throw new ChamberLoadError(name, "unknown chamber identifier");
  return createChamber(name);
}

/** Attach a chamber to its viewport and regenerate its geometry. */
export function initChamber(chamber: Chamber, viewport: Viewport, rng: Rng): void {
  chamber.viewport = { ...viewport };
  const { w, h } = viewport;
  switch (chamber.kind) {
    case "pegs":
      return initPegs(chamber, w, h, rng);
    case "funnel":
      return initFunnel(chamber, w, h);
    case "splitter":
      return initSplitter(chamber, w, h, rng);
    case "seesaw":
      return initSeesaw(chamber, w, h);
    case "mixer":
      return initMixer(chamber, w, h);
    case "wind_tunnel":
      return initWindTunnel(chamber, w, h);
    case "tesla_coil":
      return initTeslaCoil(chamber, w, h);
    case "stairs":
      return initStairs(chamber, w, h, rng);
    case "trampoline":
      return initTrampoline(chamber, w, h);
    case "accelerator":
      return initAccelerator(chamber, w, h, rng);
    case "conveyor":
      return initConveyor(chamber, w, h);
    case "teleporter":
      return initTeleporter(chamber, w, h, rng);
    case "magnet":
      return initMagnet(chamber, w, h, rng);
    case "bumper":
      return initBumper(chamber, w, h, rng);
    case "pong":
      return initPong(chamber, w, h);
    case "antigravity":
      return initAntigravity(chamber, w, h, rng);
  }
}

/**
 * Attach a chamber to its viewport without generating geometry, for
 * chambers about to be filled from a saved blob. The clock is left alone.
 */
export function fitChamber(chamber: Chamber, viewport: Viewport): void {
  chamber.viewport = { ...viewport };
  chamber.w = viewport.w;
  chamber.h = viewport.h;
  chamber.scale = chamberScale(viewport.w, viewport.h);
}

export function updateChamber(chamber: Chamber, dt: number, balls: LocalBall[], frame: ChamberFrame): void {
  switch (chamber.kind) {
    case "pegs":
      return updatePegs(chamber, dt, balls, frame);
    case "funnel":
      return updateFunnel(chamber, dt, balls);
    case "splitter":
      return updateSplitter(chamber, dt, balls);
    case "seesaw":
      return updateSeesaw(chamber, dt, balls);
    case "mixer":
      return updateMixer(chamber, dt, balls);
    case "wind_tunnel":
      return updateWindTunnel(chamber, dt, balls);
    case "tesla_coil":
      return updateTeslaCoil(chamber, dt, balls);
    case "stairs":
      return updateStairs(chamber, dt, balls);
    case "trampoline":
      return updateTrampoline(chamber, dt, balls);
    case "accelerator":
      return updateAccelerator(chamber, dt, balls);
    case "conveyor":
      return updateConveyor(chamber, dt, balls);
    case "teleporter":
      return updateTeleporter(chamber, dt, balls);
    case "magnet":
      return updateMagnet(chamber, dt, balls);
    case "bumper":
      return updateBumper(chamber, dt, balls);
    case "pong":
      return updatePong(chamber, dt, balls, frame);
    case "antigravity":
      return updateAntigravity(chamber, dt, balls);
  }
}

export function drawChamber(chamber: Chamber, surface: DrawingSurface): void {
  switch (chamber.kind) {
    case "pegs":
      return drawPegs(chamber, surface);
    case "funnel":
      return drawFunnel(chamber, surface);
    case "splitter":
      return drawSplitter(chamber, surface);
    case "seesaw":
      return drawSeesaw(chamber, surface);
    case "mixer":
      return drawMixer(chamber, surface);
    case "wind_tunnel":
      return drawWindTunnel(chamber, surface);
    case "tesla_coil":
      return drawTeslaCoil(chamber, surface);
    case "stairs":
      return drawStairs(chamber, surface);
    case "trampoline":
      return drawTrampoline(chamber, surface);
    case "accelerator":
      return drawAccelerator(chamber, surface);
    case "conveyor":
      return drawConveyor(chamber, surface);
    case "teleporter":
      return drawTeleporter(chamber, surface);
    case "magnet":
      return drawMagnet(chamber, surface);
    case "bumper":
      return drawBumper(chamber, surface);
    case "pong":
      return drawPong(chamber, surface);
    case "antigravity":
      return drawAntigravity(chamber, surface);
  }
}

/** Plain-data state of a chamber, safe to JSON-encode. */
export function saveChamber(chamber: Chamber): unknown {
  switch (chamber.kind) {
    case "pegs":
      return savePegs(chamber);
    case "funnel":
      return saveFunnel(chamber);
    case "splitter":
      return saveSplitter(chamber);
    case "seesaw":
      return saveSeesaw(chamber);
    case "mixer":
      return saveMixer(chamber);
    case "wind_tunnel":
      return saveWindTunnel(chamber);
    case "tesla_coil":
      return saveTeslaCoil(chamber);
    case "stairs":
      return saveStairs(chamber);
    case "trampoline":
      return saveTrampoline(chamber);
    case "accelerator":
      return saveAccelerator(chamber);
    case "conveyor":
      return saveConveyor(chamber);
    case "teleporter":
      return saveTeleporter(chamber);
    case "magnet":
      return saveMagnet(chamber);
    case "bumper":
      return saveBumper(chamber);
    case "pong":
      return savePong(chamber);
    case "antigravity":
      return saveAntigravity(chamber);
  }
}

/** Apply a saved blob field by field; anything missing or invalid keeps its current value. */
export function loadChamber(chamber: Chamber, raw: unknown): void {
  switch (chamber.kind) {
    case "pegs":
      return loadPegs(chamber, raw);
    case "funnel":
      return loadFunnel(chamber, raw);
    case "splitter":
      return loadSplitter(chamber, raw);
    case "seesaw":
      return loadSeesaw(chamber, raw);
    case "mixer":
      return loadMixer(chamber, raw);
    case "wind_tunnel":
      return loadWindTunnel(chamber, raw);
    case "tesla_coil":
      return loadTeslaCoil(chamber, raw);
    case "stairs":
      return loadStairs(chamber, raw);
    case "trampoline":
      return loadTrampoline(chamber, raw);
    case "accelerator":
      return loadAccelerator(chamber, raw);
    case "conveyor":
      return loadConveyor(chamber, raw);
    case "teleporter":
      return loadTeleporter(chamber, raw);
    case "magnet":
      return loadMagnet(chamber, raw);
    case "bumper":
      return loadBumper(chamber, raw);
    case "pong":
      return loadPong(chamber, raw);
    case "antigravity":
      return loadAntigravity(chamber, raw);
  }
}
