export type ConfigMap = Record<string, unknown>;

export interface ExecutionDefaults {
  timeout_seconds: number;
  max_attempts: number;
  delay_seconds: number;
  exponential_backoff: boolean;
  retry_on_exceptions: string[];
  retry?: ConfigMap;
}

export interface CoreConfig {
  execution_defaults: ExecutionDefaults;
  extension_dir?: string;
}

/** One pipeline: core settings plus raw configuration per extension name. */
export interface PipelineDefinition {
  core: CoreConfig;
  extensions: Record<string, ConfigMap>;
}

export const EXECUTION_STATES = ["registered", "starting", "success", "failed", "cleaned", "cleanup_failed"] as const;

export type ExecutionState = typeof EXECUTION_STATES[number];

export const DEFAULT_EXECUTION_DEFAULTS: ExecutionDefaults = {
  timeout_seconds: 300,
  max_attempts: 3,
  delay_seconds: 5,
  exponential_backoff: true,
  retry_on_exceptions: ["ConnectionError", "TimeoutError"]
};
