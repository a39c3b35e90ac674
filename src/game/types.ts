import type { Logger } from "../../lib/logger";

export type Rng = () => number;

export type Rgb = readonly [number, number, number];

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** A moving circular body in global canvas coordinates. */
export interface Ball {
  id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
  color: Rgb;
  active: boolean;
}

/**
 * Chamber-local working copy of a ball. Lives for a single chamber update;
 * the manager copies position, velocity and `active` back afterwards.
 */
export interface LocalBall {
  readonly id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  readonly radius: number;
  readonly color: Rgb;
  active: boolean;
}

export interface Viewport extends Rect {
  index: number;
  col: number;
  row: number;
}

export interface GridShape {
  cols: number;
  rows: number;
}

/** Transient, chamber-owned marks on a ball, keyed by ball id in the manager. */
export interface BallAnnotation {
  owner: number;
  colorOverride: Rgb | null;
}

/** What a chamber may touch besides its local balls during one update. */
export interface ChamberFrame {
  index: number;
  rng: Rng;
  gravity: number;
  annotate: (ballId: number, annotation: Omit<BallAnnotation, "owner">) => void;
  clearAnnotations: () => void;
}

/**
 * Drawing capability handed to chambers. Physics never reads from it.
 * Alpha is 0..255; stroke width is in canvas pixels.
 */
export interface DrawingSurface {
  clear: (color: Rgb) => void;
  fillRect: (x: number, y: number, w: number, h: number, color: Rgb, alpha?: number) => void;
  strokeRect: (x: number, y: number, w: number, h: number, color: Rgb, alpha?: number, width?: number) => void;
  fillCircle: (cx: number, cy: number, r: number, color: Rgb, alpha?: number) => void;
  strokeCircle: (cx: number, cy: number, r: number, color: Rgb, alpha?: number, width?: number) => void;
  line: (x1: number, y1: number, x2: number, y2: number, color: Rgb, alpha?: number, width?: number) => void;
  pushClip: (x: number, y: number, w: number, h: number) => void;
  popClip: () => void;
}

// ---------------------------------------------------------------------------
// Chamber geometry payloads.

export interface Circle {
  x: number;
  y: number;
  radius: number;
}

export interface Segment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Wedge {
  top: Point;
  left: Point;
  right: Point;
}

export interface Plank {
  cx: number;
  cy: number;
  length: number;
  angle: number;
  angularVel: number;
}

export interface Blade {
  cx: number;
  cy: number;
  len: number;
  speed: number;
}

export interface WindBand extends Rect {
  dir: 1 | -1;
  force: number;
}

export interface Coil extends Circle {
  range: number;
  charge: number;
}

export interface Zap {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  life: number;
}

export type StepMotion = "static" | "horizontal" | "vertical" | "phase";

export interface Step extends Rect {
  xOrig: number;
  yOrig: number;
  booster: boolean;
  motion: StepMotion;
  offset: number;
  range: number;
  speed: number;
}

export interface Booster extends Rect {
  dirX: number;
  dirY: number;
  force: number;
}

export interface Belt extends Rect {
  speed: number;
}

export interface Portal extends Circle {
  color: Rgb;
  target: number;
}

export type MagnetPolarity = "pull" | "push";

export interface MagnetPole extends Circle {
  strength: number;
  polarity: MagnetPolarity;
}

export interface Bumper extends Circle {
  hitTimer: number;
}

export type PaddleSide = "left" | "right";

export interface Paddle extends Rect {
  targetY: number;
  speed: number;
  reactionTimer: number;
  side: PaddleSide;
  color: Rgb;
}

export interface AntigravityZone extends Rect {
  force: number;
  color: Rgb;
}

// ---------------------------------------------------------------------------
// Chamber variants (closed set, discriminated by `kind`).

export interface ChamberCommon {
  viewport: Viewport;
  w: number;
  h: number;
  scale: number;
  t: number;
}

export interface PegsChamber extends ChamberCommon {
  kind: "pegs";
  pegs: Circle[];
}

export interface FunnelChamber extends ChamberCommon {
  kind: "funnel";
  walls: Segment[];
}

export interface SplitterChamber extends ChamberCommon {
  kind: "splitter";
  wedge: Wedge | null;
}

export interface SeesawChamber extends ChamberCommon {
  kind: "seesaw";
  planks: Plank[];
}

export interface MixerChamber extends ChamberCommon {
  kind: "mixer";
  blades: Blade[];
}

export interface WindTunnelChamber extends ChamberCommon {
  kind: "wind_tunnel";
  bands: WindBand[];
}

export interface TeslaCoilChamber extends ChamberCommon {
  kind: "tesla_coil";
  coils: Coil[];
  zaps: Zap[];
}

export interface StairsChamber extends ChamberCommon {
  kind: "stairs";
  steps: Step[];
  dir: 1 | -1;
}

export interface TrampolineChamber extends ChamberCommon {
  kind: "trampoline";
  pad: Rect | null;
}

export interface AcceleratorChamber extends ChamberCommon {
  kind: "accelerator";
  boosters: Booster[];
}

export interface ConveyorChamber extends ChamberCommon {
  kind: "conveyor";
  belts: Belt[];
}

export interface TeleporterChamber extends ChamberCommon {
  kind: "teleporter";
  portals: Portal[];
  cooldowns: Map<number, number>;
}

export interface MagnetChamber extends ChamberCommon {
  kind: "magnet";
  poles: MagnetPole[];
}

export interface BumperChamber extends ChamberCommon {
  kind: "bumper";
  bumpers: Bumper[];
}

export interface PongChamber extends ChamberCommon {
  kind: "pong";
  paddles: Paddle[];
  trackedBallId: number | null;
  scoreLeft: number;
  scoreRight: number;
}

export interface AntigravityChamber extends ChamberCommon {
  kind: "antigravity";
  zones: AntigravityZone[];
}

export type Chamber =
  | PegsChamber
  | FunnelChamber
  | SplitterChamber
  | SeesawChamber
  | MixerChamber
  | WindTunnelChamber
  | TeslaCoilChamber
  | StairsChamber
  | TrampolineChamber
  | AcceleratorChamber
  | ConveyorChamber
  | TeleporterChamber
  | MagnetChamber
  | BumperChamber
  | PongChamber
  | AntigravityChamber;

export type ChamberKind = Chamber["kind"];

// ---------------------------------------------------------------------------
// Simulation manager.

export type ChamberFactory = (name: string) => Chamber;

export interface Simulation {
  w: number;
  h: number;
  t: number;
  balls: Ball[];
  chambers: Chamber[];
  // Identifiers in load order, including any that failed to construct.
  chamberOrder: string[];
  catalog: readonly string[];
  nextBallId: number;
  spawnTimer: number;
  spawnInterval: number;
  maxBalls: number;
  initialBurst: number;
  cols: number;
  rows: number;
  rng: Rng;
  annotations: Map<number, BallAnnotation>;
  createChamber: ChamberFactory;
  logger: Logger;
}

export interface MakeSimulationOptions {
  seed?: number;
  rng?: Rng;
  logger?: Logger;
  spawnInterval?: number;
  maxBalls?: number;
  initialBurst?: number;
  catalog?: readonly string[];
  createChamber?: ChamberFactory;
}

// ---------------------------------------------------------------------------
// Serialized state.

export interface BallSnapshot {
  id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
  color: Rgb;
  active: boolean;
}

export interface ChamberStateBlob {
  kind: ChamberKind;
  viewport: Viewport;
  state: unknown;
}

export interface SimulationSnapshot {
  t: number;
  w: number;
  h: number;
  balls: BallSnapshot[];
  nextBallId: number;
  spawnTimer: number;
  chamberOrder: string[];
  cols: number;
  rows: number;
  chamberStates: ChamberStateBlob[];
}
