import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { SCENARIO_MODES } from "../types/domain.js";

loadEnv();

const booleanFlag = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["true", "false", "1", "0", "yes", "no"])
  )
  .default("false")
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  ADB_PATH: z.string().min(1).default("adb"),
  ADB_SERIAL: z.string().optional(),
  ADB_SPEAK_COMMAND: z.string().optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().min(100).max(5000).default(300),
  COOLDOWN_MS: z.coerce.number().int().nonnegative().default(5000),
  SAMPLE_TIMEOUT_MS: z.coerce.number().int().positive().max(999).default(800),
  STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  MAX_SPEAK_WAIT_MS: z.coerce.number().int().nonnegative().default(10_000),
  RING_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(0),
  SCENARIO: z.enum(SCENARIO_MODES).default("busy"),
  AUTO_SCENARIO: booleanFlag,
  DATA_DIR: z.string().min(1).default("data"),
  PORT: z.coerce.number().int().positive().default(3080),
});

export type AgentEnv = z.infer<typeof EnvSchema>;

type EnvKey = keyof AgentEnv;

export function loadAgentEnv(overrides: Partial<Record<EnvKey, string>> = {}): AgentEnv {
  const pick = (key: EnvKey): string | undefined => {
    const value = overrides[key] ?? process.env[key];
    return value === "" ? undefined : value;
  };

  const parsed = EnvSchema.safeParse({
    ADB_PATH: pick("ADB_PATH"),
    ADB_SERIAL: pick("ADB_SERIAL"),
    ADB_SPEAK_COMMAND: pick("ADB_SPEAK_COMMAND"),
    POLL_INTERVAL_MS: pick("POLL_INTERVAL_MS"),
    COOLDOWN_MS: pick("COOLDOWN_MS"),
    SAMPLE_TIMEOUT_MS: pick("SAMPLE_TIMEOUT_MS"),
    STEP_TIMEOUT_MS: pick("STEP_TIMEOUT_MS"),
    SETTLE_DELAY_MS: pick("SETTLE_DELAY_MS"),
    MAX_SPEAK_WAIT_MS: pick("MAX_SPEAK_WAIT_MS"),
    RING_DELAY_MS: pick("RING_DELAY_MS"),
    SCENARIO: pick("SCENARIO"),
    AUTO_SCENARIO: pick("AUTO_SCENARIO"),
    DATA_DIR: pick("DATA_DIR"),
    PORT: pick("PORT"),
  });

  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${errors.join("\n")}`);
  }

  return parsed.data;
}
