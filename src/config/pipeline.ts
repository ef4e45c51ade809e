// src/config/pipeline.ts
// Pipeline file: one top-level pipeline name holding `core` plus one key per
// extension. List-valued extensions are re-keyed by each item's `name`.
import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ConfigMap, PipelineDefinition } from "../types/contracts.js";
import { DEFAULT_EXECUTION_DEFAULTS } from "../types/contracts.js";
import { ConfigurationError, errorMessage } from "../errors/index.js";

const d = DEFAULT_EXECUTION_DEFAULTS;

const executionDefaultsSchema = z.object({
  timeout_seconds: z.number().positive().default(d.timeout_seconds),
  max_attempts: z.number().int().positive().default(d.max_attempts),
  delay_seconds: z.number().nonnegative().default(d.delay_seconds),
  exponential_backoff: z.boolean().default(d.exponential_backoff),
  retry_on_exceptions: z.array(z.string()).default([...d.retry_on_exceptions]),
  retry: z.record(z.unknown()).nullish().transform(v => v ?? undefined)
});

const coreSchema = z.object({
  execution_defaults: z.preprocess(v => v ?? {}, executionDefaultsSchema),
  extension_dir: z.string().min(1).optional()
});

export interface LoadedPipeline {
  name: string;
  pipeline: PipelineDefinition;
}

function isRecord(v: unknown): v is ConfigMap {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toExtensionConfig(extension: string, value: unknown): ConfigMap {
  if (Array.isArray(value)) {
    const byName: ConfigMap = {};
    for (const item of value) {
      if (isRecord(item) && typeof item.name === "string") byName[item.name] = item;
    }
    return byName;
  }
  if (isRecord(value)) return value;
  if (value === null || value === undefined) return {};
  throw new ConfigurationError(`Extension ${extension} must be a list of items or a mapping`, {
    details: { extension, got: typeof value }
  });
}

/** `baseDir` anchors a relative core.extension_dir; usually the pipeline file's directory. */
export function parsePipeline(text: string, baseDir: string = process.cwd()): LoadedPipeline {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (e) {
    throw new ConfigurationError(`Invalid pipeline YAML: ${errorMessage(e)}`, { cause: e });
  }
  if (!isRecord(doc)) throw new ConfigurationError("Invalid pipeline file: expected a YAML mapping");

  const names = Object.keys(doc);
  const name = names[0];
  if (name === undefined) throw new ConfigurationError("Invalid pipeline file: no pipeline defined");
  if (names.length > 1) throw new ConfigurationError(`Only one pipeline per file is supported, found: ${names.join(", ")}`);

  const body = doc[name];
  if (!isRecord(body)) throw new ConfigurationError(`Pipeline ${name} must be a mapping`);

  const core = coreSchema.safeParse(body.core ?? {});
  if (!core.success) {
    const issues = core.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid core configuration for pipeline ${name}`, { details: { issues } });
  }

  const extensions: Record<string, ConfigMap> = {};
  for (const [key, value] of Object.entries(body)) {
    if (key === "core") continue;
    extensions[key] = toExtensionConfig(key, value);
  }

  const dir = core.data.extension_dir;
  return {
    name,
    pipeline: {
      core: {
        execution_defaults: core.data.execution_defaults,
        extension_dir: dir === undefined ? undefined : isAbsolute(dir) ? dir : resolve(baseDir, dir)
      },
      extensions
    }
  };
}

export function loadPipelineFile(path: string): LoadedPipeline {
  const file = resolve(path);
  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (e) {
    throw new ConfigurationError(`Pipeline configuration file not found: ${file}`, { cause: e });
  }
  return parsePipeline(text, dirname(file));
}
