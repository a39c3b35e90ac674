export * from "./game/types";
export {
  BALL_PALETTE,
  BOUNDARY_DAMPING,
  GRAVITY,
  ballOverlapsViewport,
  collideBalls,
  displayColor,
  initSimulation,
  layoutChambers,
  loadChambers,
  makeSimulation,
  overlappingChambers,
  snapshotForText,
  spawnRandomBall,
  stepSimulation,
  type TextSnapshot,
} from "./game/engine";
export { chamberScale, REF_H, REF_W } from "./game/geometry";
export { gridShape, layoutViewports, resolveGridShape } from "./game/layout";
export { freshSeed, makeRng } from "./game/random";
export { loadState, saveState } from "./game/persistence";
export { drawSimulation, makeCanvasSurface, type Canvas2DLike } from "./game/render";
export { createLoopController, type LoopController } from "./game/loop-controller";
export { createSessionController, type SessionController } from "./game/session-controller";
export { CHAMBER_KINDS, ChamberLoadError, createChamberByName, isChamberKind } from "./game/chambers";
export { runHeadless, type RunOptions } from "./runner";
export { createLogger, silentLogger, type Logger, type LogLevel } from "../lib/logger";
