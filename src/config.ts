import path from "path";
import * as dotenv from "dotenv";
import { z } from "zod";
import {
  DEFAULT_COMPILE_FLAGS,
  DEFAULT_COMPILE_TIMEOUT_MS,
  DEFAULT_COMPILER,
  DEFAULT_DATA_FILE,
  DEFAULT_EDITOR,
  DEFAULT_RUN_TIMEOUT_MS,
  DEFAULT_WORKSPACE_DIR,
  SAMPLES_CACHE_FILENAME,
} from "./constants";
import { ConfigurationError } from "./errors";

dotenv.config();

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value === "" ? undefined : value));

const envSchema = z.object({
  TRAINER_DATA_FILE: optionalText,
  TRAINER_WORKSPACE_DIR: optionalText,
  TRAINER_SAMPLES_FILE: optionalText,
  TRAINER_COMPILER: optionalText,
  TRAINER_COMPILE_FLAGS: optionalText,
  TRAINER_COMPILE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TRAINER_RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  EDITOR: optionalText,
});

export interface TrainerConfig {
  dataFile: string;
  workspaceDir: string;
  samplesFile: string;
  compiler: string;
  compileFlags: string[];
  compileTimeoutMs: number;
  runTimeoutMs: number;
  editor: string;
}

/**
 * Build the trainer configuration from environment variables, falling back
 * to the defaults in constants.ts
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): TrainerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(issues);
  }

  const values = parsed.data;
  const workspaceDir = path.resolve(
    values.TRAINER_WORKSPACE_DIR ?? DEFAULT_WORKSPACE_DIR
  );

  return {
    dataFile: path.resolve(values.TRAINER_DATA_FILE ?? DEFAULT_DATA_FILE),
    workspaceDir,
    samplesFile: path.resolve(
      values.TRAINER_SAMPLES_FILE ??
        path.join(workspaceDir, SAMPLES_CACHE_FILENAME)
    ),
    compiler: values.TRAINER_COMPILER ?? DEFAULT_COMPILER,
    compileFlags: values.TRAINER_COMPILE_FLAGS
      ? values.TRAINER_COMPILE_FLAGS.split(/\s+/)
      : [...DEFAULT_COMPILE_FLAGS],
    compileTimeoutMs:
      values.TRAINER_COMPILE_TIMEOUT_MS ?? DEFAULT_COMPILE_TIMEOUT_MS,
    runTimeoutMs: values.TRAINER_RUN_TIMEOUT_MS ?? DEFAULT_RUN_TIMEOUT_MS,
    editor: values.EDITOR ?? DEFAULT_EDITOR,
  };
}
