export type FrameBudgetPolicy = {
  maxSpeedMultiplier: number;
  maxCatchUpSteps: number;
  maxElapsedMs: number;
};

export type LoopController = {
  tickFixed: (ms: number) => number;
  start: (intervalMs?: number) => void;
  stop: () => void;
  isRunning: () => boolean;
  setPaused: (paused: boolean) => void;
  setSpeedMultiplier: (next: number) => number;
};

export const FIXED_STEP_SEC = 1 / 60;
const FIXED_STEP_MS = 1000 / 60;

const frameBudgetPolicies: FrameBudgetPolicy[] = [
  { maxSpeedMultiplier: 1.01, maxCatchUpSteps: 2, maxElapsedMs: 40 },
  { maxSpeedMultiplier: 1.5, maxCatchUpSteps: 3, maxElapsedMs: 56 },
  { maxSpeedMultiplier: 2.1, maxCatchUpSteps: 4, maxElapsedMs: 72 },
  { maxSpeedMultiplier: Number.POSITIVE_INFINITY, maxCatchUpSteps: 5, maxElapsedMs: 88 },
];

function clampSpeed(value: number): number {
  return Number.isFinite(value) ? Math.max(0.5, Math.min(3, value)) : 1;
}

/**
 * Create a frame/update loop controller.
 *
 * Splits elapsed wall-clock time into fixed 60 Hz simulation steps, bounded by
 * a catch-up budget that grows with the speed multiplier, and drives the loop
 * from a timer so it runs headless as well as behind a canvas.
 */
export function createLoopController<State>(opts: {
  getState: () => State;
  stepFn: (state: State, dt: number) => void;
  draw?: (state: State) => void;
  onAfterFrame?: () => void;
  initialSpeedMultiplier?: number;
  now?: () => number;
}): LoopController {
  const { getState, stepFn, draw = () => {}, onAfterFrame = () => {}, now = () => performance.now() } = opts;

  let speedMultiplier = clampSpeed(opts.initialSpeedMultiplier ?? 1);
  let paused = false;
  let timer: ReturnType<typeof setInterval> | null = null;
  let last = 0;

  function getFrameBudgetPolicy(): FrameBudgetPolicy {
    for (const policy of frameBudgetPolicies) {
      if (speedMultiplier <= policy.maxSpeedMultiplier) return policy;
    }
    return frameBudgetPolicies[frameBudgetPolicies.length - 1];
  }

  /**
   * Advance by `ms` of wall-clock time using fixed steps; returns the number
   * of steps taken. At least one step runs per tick.
   */
  function tickFixed(ms: number): number {
    const safeMs = Number.isFinite(ms) ? Math.max(0, ms) : 0;
    const scaledMs = safeMs * speedMultiplier;
    const frameBudget = getFrameBudgetPolicy();
    const maxStepBudgetMs = FIXED_STEP_MS * frameBudget.maxCatchUpSteps;
    const budgetMs = Math.min(maxStepBudgetMs, frameBudget.maxElapsedMs, scaledMs);
    const steps = Math.max(1, Math.round(budgetMs / FIXED_STEP_MS));
    const state = getState();
    for (let i = 0; i < steps; i++) stepFn(state, FIXED_STEP_SEC);
    draw(state);
    onAfterFrame();
    return steps;
  }

  function frame(): void {
    const at = now();
    const elapsedMs = Math.max(0, at - last);
    last = at;
    if (paused) draw(getState());
    else tickFixed(elapsedMs);
  }

  function start(intervalMs = FIXED_STEP_MS): void {
    if (timer) return;
    last = now();
    timer = setInterval(frame, intervalMs);
  }

  function stop(): void {
    if (!timer) return;
    clearInterval(timer);
    timer = null;
  }

  function setSpeedMultiplier(next: number): number {
    speedMultiplier = clampSpeed(next);
    return speedMultiplier;
  }

  return {
    tickFixed,
    start,
    stop,
    isRunning: () => timer !== null,
    setPaused: (next) => {
      paused = next;
    },
    setSpeedMultiplier,
  };
}
