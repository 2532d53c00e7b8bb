// core/config/app.config.ts
import * as path from 'path';
import { z } from 'zod';

// pino's levels
export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  LEDGER_INPUT_DIR: z.string().min(1).default('input'),
  LEDGER_OUTPUT_DIR: z.string().min(1).default('.'),
  LEDGER_RULES_FILE: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema.default('info')
});

export interface AppConfig {
  inputDir: string;
  outputDir: string;
  rulesFile: string;
  logLevel: LogLevel;
}

/**
 * Resolves run configuration from the environment. An explicit input directory
 * (the CLI argument) wins over LEDGER_INPUT_DIR; the rule table defaults to
 * mappings.json inside the input directory.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  inputDirOverride?: string
): AppConfig {
  const parsed = EnvSchema.parse(env);
  const inputDir = inputDirOverride || parsed.LEDGER_INPUT_DIR;

  return {
    inputDir,
    outputDir: parsed.LEDGER_OUTPUT_DIR,
    rulesFile: parsed.LEDGER_RULES_FILE ?? path.join(inputDir, 'mappings.json'),
    logLevel: parsed.LOG_LEVEL
  };
}
