import { env } from "../lib/env";
import { createLogger } from "../lib/logger";
import { runHeadless } from "./runner";

const logger = createLogger("chamber-sim", env.LOG_LEVEL);

runHeadless(env, logger).catch((err: unknown) => {
  logger.error("run failed", err);
  process.exitCode = 1;
});
