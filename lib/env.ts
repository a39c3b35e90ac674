import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  SIM_WIDTH: z.coerce.number().int().positive().default(1920),
  SIM_HEIGHT: z.coerce.number().int().positive().default(1080),
  SIM_SEED: z.coerce.number().int().nonnegative().optional(),
  SIM_FRAMES: z.coerce.number().int().positive().default(600),
  SIM_STATE_FILE: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return EnvSchema.parse({
    NODE_ENV: source.NODE_ENV,
    SIM_WIDTH: source.SIM_WIDTH,
    SIM_HEIGHT: source.SIM_HEIGHT,
    SIM_SEED: source.SIM_SEED,
    SIM_FRAMES: source.SIM_FRAMES,
    SIM_STATE_FILE: source.SIM_STATE_FILE,
    LOG_LEVEL: source.LOG_LEVEL,
  });
}

export const env = parseEnv(process.env);
