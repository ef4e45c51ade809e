// src/config/env.ts
// Process settings. The CLI loads .env through dotenv before anything reads these.
import { z } from "zod";
import type { BackendMode } from "../types/resources.js";
import { ConfigurationError } from "../errors/index.js";

export interface Settings {
  pipelinePath: string;
  backend: BackendMode;
  stackName: string;
  runId: string;
  artifactsDir: string;
}

const envSchema = z.object({
  PIPELINE_CONFIG: z.string().min(1).default("pipeline.yaml"),
  PIPELINE_BACKEND: z.enum(["mock", "pulumi"]).default("mock"),
  PIPELINE_STACK: z.string().min(1).default("mock-stack"),
  RUN_ID: z.string().min(1).optional(),
  PIPELINE_ARTIFACTS_DIR: z.string().min(1).default("runs"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "warning", "error", "critical"]).optional()
});

export function defaultRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const nonEmpty = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.safeParse(nonEmpty);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment settings: ${issues.join("; ")}`, { details: { issues } });
  }
  const e = parsed.data;
  return {
    pipelinePath: e.PIPELINE_CONFIG,
    backend: e.PIPELINE_BACKEND,
    stackName: e.PIPELINE_STACK,
    runId: e.RUN_ID ?? defaultRunId(),
    artifactsDir: e.PIPELINE_ARTIFACTS_DIR
  };
}
