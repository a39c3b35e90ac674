import { z } from "zod";
import { CONTACT_SLOP, clamp } from "../geometry";
import type { ChamberFrame, DrawingSurface, LocalBall, Paddle, PongChamber, Rgb, Rng } from "../types";
import { blankCommon, loadClock, num, readField, rectSchema, rgb, sizeChamber } from "./common";

const PADDLE_W = 15;
const PADDLE_MARGIN = 20;
const PADDLE_SPEED = 300;
const AIM_ERROR = 50;
const MIN_RALLY = 300;
const SPIN = 400;
const MAX_SPEED = 1000;
const WALL_DAMP = 0.9;
const GOAL_LINE = 5;
const GAME_BALL_COLOR: Rgb = [255, 255, 255];

const paddleSchema = rectSchema.extend({
  targetY: num,
  speed: num,
  reactionTimer: num,
  side: z.enum(["left", "right"]),
  color: rgb,
});

export interface PongState {
  paddles: Paddle[];
  trackedBallId: number | null;
  scoreLeft: number;
  scoreRight: number;
  t: number;
}

export function createPong(): PongChamber {
  return { kind: "pong", ...blankCommon(), paddles: [], trackedBallId: null, scoreLeft: 0, scoreRight: 0 };
}

export function initPong(chamber: PongChamber, w: number, h: number): void {
  sizeChamber(chamber, w, h);
  const { scale } = chamber;
  const pw = PADDLE_W * scale;
  const ph = h * 0.25;
  const margin = PADDLE_MARGIN * scale;
  const y = h * 0.5 - ph * 0.5;
  const paddle = (x: number, side: Paddle["side"], color: Rgb): Paddle => ({
    x,
    y,
    w: pw,
    h: ph,
    targetY: y,
    speed: PADDLE_SPEED * scale,
    reactionTimer: 0,
    side,
    color,
  });
  chamber.paddles = [paddle(margin, "left", [100, 200, 255]), paddle(w - margin - pw, "right", [255, 150, 100])];
  chamber.trackedBallId = null;
  chamber.scoreLeft = 0;
  chamber.scoreRight = 0;
}

/** Keep the tracked ball while it is here, otherwise lock onto the one nearest the center. */
function findGameBall(chamber: PongChamber, balls: LocalBall[]): LocalBall | null {
  const tracked = balls.find((b) => b.id === chamber.trackedBallId);
  if (tracked) return tracked;

  let best: LocalBall | null = null;
  let bestD2 = Infinity;
  for (const ball of balls) {
    const d2 = (ball.x - chamber.w * 0.5) ** 2 + (ball.y - chamber.h * 0.5) ** 2;
    if (d2 < bestD2) {
      bestD2 = d2;
      best = ball;
    }
  }
  if (best) chamber.trackedBallId = best.id;
  return best;
}

function aimPaddle(chamber: PongChamber, paddle: Paddle, ball: LocalBall | null, rng: Rng): void {
  const home = chamber.h * 0.5 - paddle.h * 0.5;
  if (!ball) {
    paddle.targetY = home;
    return;
  }
  let eta = 0;
  if (paddle.side === "left" && ball.vx < 0) eta = (ball.x - paddle.x - paddle.w) / -ball.vx;
  else if (paddle.side === "right" && ball.vx > 0) eta = (paddle.x - ball.x) / ball.vx;

  if (eta < 0) {
    paddle.targetY = home;
    return;
  }
  const miss = (rng() * 2 - 1) * AIM_ERROR * chamber.scale;
  const predicted = ball.y + ball.vy * eta + miss;
  paddle.targetY = clamp(predicted - paddle.h * 0.5, 0, chamber.h - paddle.h);
}

function movePaddle(chamber: PongChamber, paddle: Paddle, ball: LocalBall | null, dt: number, rng: Rng): void {
  paddle.reactionTimer -= dt;
  if (paddle.reactionTimer <= 0) {
    paddle.reactionTimer = 0.1 + rng() * 0.15;
    aimPaddle(chamber, paddle, ball, rng);
  }
  const diff = paddle.targetY - paddle.y;
  const step = paddle.speed * dt;
  if (Math.abs(diff) < step) paddle.y = paddle.targetY;
  else paddle.y += Math.sign(diff) * step;
  paddle.y = clamp(paddle.y, 0, chamber.h - paddle.h);
}

/**
 * Swept test of the paddle face for fast balls approaching it, then a plain
 * circle-vs-box overlap for slow ones. Pushes the ball clear on a hit.
 */
export function hitsPaddle(ball: LocalBall, paddle: Paddle, dt: number): boolean {
  const prevX = ball.x - ball.vx * dt;
  const prevY = ball.y - ball.vy * dt;
  const r = ball.radius;

  const approaching = paddle.side === "left" ? ball.vx < 0 : ball.vx > 0;
  if (approaching) {
    const faceX = paddle.side === "left" ? paddle.x + paddle.w : paddle.x;
    const crossed =
      paddle.side === "left" ? prevX >= faceX - r && ball.x <= faceX + r : prevX <= faceX + r && ball.x >= faceX - r;
    if (crossed) {
      const s = ball.x === prevX ? 1 : clamp((faceX - prevX) / (ball.x - prevX), 0, 1);
      const yAtCross = prevY + (ball.y - prevY) * s;
      if (yAtCross >= paddle.y - r && yAtCross <= paddle.y + paddle.h + r) {
        ball.x = paddle.side === "left" ? faceX + r + 1 : faceX - r - 1;
        return true;
      }
    }
  }

  const cx = clamp(ball.x, paddle.x, paddle.x + paddle.w);
  const cy = clamp(ball.y, paddle.y, paddle.y + paddle.h);
  const dx = ball.x - cx;
  const dy = ball.y - cy;
  const dist = Math.hypot(dx, dy);
  if (dist >= r) return false;
  if (dist > 0) {
    const push = r - dist + CONTACT_SLOP;
    ball.x += (dx / dist) * push;
    ball.y += (dy / dist) * push;
  }
  return true;
}

/** Send the ball back across the court, angled by where it met the paddle. */
function returnBall(chamber: PongChamber, ball: LocalBall, paddle: Paddle): void {
  const { scale } = chamber;
  const hitPos = clamp((ball.y - (paddle.y + paddle.h * 0.5)) / (paddle.h * 0.5), -1, 1);
  const away = paddle.side === "left" ? 1 : -1;
  ball.vx = away * Math.max(Math.abs(ball.vx) * 1.05, MIN_RALLY * scale);
  ball.vy = hitPos * SPIN * scale;

  const cap = MAX_SPEED * scale;
  const speed = Math.hypot(ball.vx, ball.vy);
  if (speed > cap) {
    ball.vx *= cap / speed;
    ball.vy *= cap / speed;
  }
}

function serve(chamber: PongChamber, ball: LocalBall, dir: 1 | -1, rng: Rng): void {
  const { scale } = chamber;
  ball.x = chamber.w * 0.5;
  ball.y = chamber.h * 0.5;
  ball.vx = dir * (300 + rng() * 100) * scale;
  ball.vy = (rng() * 200 - 100) * scale;
}

/** Keep the game ball in the court and score it when it reaches a back wall. */
function playWalls(chamber: PongChamber, ball: LocalBall, rng: Rng): void {
  const r = ball.radius;
  if (ball.y <= r) {
    ball.y = r;
    ball.vy = Math.abs(ball.vy) * WALL_DAMP;
  } else if (ball.y >= chamber.h - r) {
    ball.y = chamber.h - r;
    ball.vy = -Math.abs(ball.vy) * WALL_DAMP;
  }

  const goal = GOAL_LINE * chamber.scale;
  if (ball.x - r <= goal) {
    chamber.scoreRight += 1;
    serve(chamber, ball, 1, rng);
  } else if (ball.x + r >= chamber.w - goal) {
    chamber.scoreLeft += 1;
    serve(chamber, ball, -1, rng);
  }
}

export function updatePong(chamber: PongChamber, dt: number, balls: LocalBall[], frame: ChamberFrame): void {
  chamber.t += dt;
  frame.clearAnnotations();

  const gameBall = findGameBall(chamber, balls);
  if (gameBall) {
    // Undo this frame's gravity so the rally stays flat.
    gameBall.vy -= frame.gravity * dt;
    gameBall.y -= frame.gravity * dt * dt;
    frame.annotate(gameBall.id, { colorOverride: GAME_BALL_COLOR });
  }

  for (const paddle of chamber.paddles) movePaddle(chamber, paddle, gameBall, dt, frame.rng);

  for (const ball of balls) {
    for (const paddle of chamber.paddles) {
      if (hitsPaddle(ball, paddle, dt)) returnBall(chamber, ball, paddle);
    }
    if (ball === gameBall) playWalls(chamber, ball, frame.rng);
  }
}

export function drawPong(chamber: PongChamber, surface: DrawingSurface): void {
  const { x: ox, y: oy } = chamber.viewport;
  const { scale } = chamber;
  const dash = 20 * scale;
  const gap = 15 * scale;
  for (let y = 0; y <= chamber.h; y += dash + gap) {
    surface.fillRect(ox + chamber.w * 0.5 - 2, oy + y, 4, dash, [80, 80, 100], 150);
  }

  // Score pips along the top of each half.
  const pip = 6 * scale;
  for (const [count, cx, color] of [
    [chamber.scoreLeft, chamber.w * 0.25, [100, 200, 255]],
    [chamber.scoreRight, chamber.w * 0.75, [255, 150, 100]],
  ] as const) {
    const shown = Math.min(count, 10);
    for (let i = 0; i < shown; i++) {
      surface.fillCircle(ox + cx + (i - (shown - 1) / 2) * pip * 2.5, oy + 20 * scale, pip, color, 200);
    }
  }

  for (const p of chamber.paddles) {
    surface.fillRect(ox + p.x - 3, oy + p.y - 3, p.w + 6, p.h + 6, p.color, 30);
    surface.fillRect(ox + p.x, oy + p.y, p.w, p.h, p.color);
    surface.fillRect(ox + p.x + 2, oy + p.y + 2, p.w - 4, 4, [255, 255, 255], 100);
    surface.strokeRect(ox + p.x, oy + p.y, p.w, p.h, [255, 255, 255], 150, 2);
  }
}

export function savePong(chamber: PongChamber): PongState {
  return {
    paddles: chamber.paddles.map((p) => ({ ...p })),
    trackedBallId: chamber.trackedBallId,
    scoreLeft: chamber.scoreLeft,
    scoreRight: chamber.scoreRight,
    t: chamber.t,
  };
}

export function loadPong(chamber: PongChamber, raw: unknown): void {
  chamber.paddles = readField(raw, "paddles", z.array(paddleSchema)) ?? chamber.paddles;
  chamber.trackedBallId = readField(raw, "trackedBallId", z.number().int().nullable()) ?? null;
  chamber.scoreLeft = readField(raw, "scoreLeft", z.number().int().nonnegative()) ?? 0;
  chamber.scoreRight = readField(raw, "scoreRight", z.number().int().nonnegative()) ?? 0;
  loadClock(chamber, raw);
}
