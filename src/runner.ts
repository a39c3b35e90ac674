import { readFile, writeFile } from "node:fs/promises";
import type { Env } from "../lib/env";
import type { Logger } from "../lib/logger";
import { makeSimulation, snapshotForText, stepSimulation, type TextSnapshot } from "./game/engine";
import { createLoopController, FIXED_STEP_SEC } from "./game/loop-controller";
import { createSessionController } from "./game/session-controller";

export type RunOptions = Pick<Env, "SIM_WIDTH" | "SIM_HEIGHT" | "SIM_SEED" | "SIM_FRAMES" | "SIM_STATE_FILE">;

/** Saved state text, or null when there is none or it cannot be read. */
export async function readSnapshot(path: string, logger: Logger): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.info(`no saved state at ${path}, starting fresh`);
      return null;
    }
    logger.warn(`could not read saved state at ${path}, starting fresh`, err);
    return null;
  }
}

/**
 * Headless run: resume from the state file when one exists, advance a fixed
 * number of 60 Hz frames, then write the state back. Returns the final text
 * snapshot.
 */
export async function runHeadless(options: RunOptions, logger: Logger): Promise<TextSnapshot> {
  const session = createSessionController({
    makeSim: () => makeSimulation({ seed: options.SIM_SEED, logger }),
    width: options.SIM_WIDTH,
    height: options.SIM_HEIGHT,
    logger,
  });

  const saved = options.SIM_STATE_FILE ? await readSnapshot(options.SIM_STATE_FILE, logger) : null;
  const resumed = saved !== null && session.importSnapshot(saved) && session.current().chambers.length > 0;
  if (!resumed) session.start();

  const loop = createLoopController({
    getState: session.current,
    stepFn: stepSimulation,
  });
  for (let frame = 0; frame < options.SIM_FRAMES; frame++) loop.tickFixed(FIXED_STEP_SEC * 1000);

  const text = snapshotForText(session.current());
  logger.info(`t=${text.t}s chambers=${text.chambers.length} balls=${text.balls.length} nextBallId=${text.nextBallId}`);

  if (options.SIM_STATE_FILE) {
    await writeFile(options.SIM_STATE_FILE, session.exportSnapshot(), "utf8");
    logger.info(`state written to ${options.SIM_STATE_FILE}`);
  }
  return text;
}
