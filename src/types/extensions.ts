import type { ConfigMap, ExecutionDefaults } from "./contracts.js";
import type { ProvisioningBackend } from "./resources.js";
import type { Logger } from "../log/logger.js";

export type MaybePromise<T> = T | Promise<T>;

export const REQUIRED_CAPABILITIES = ["validateConfig", "execute", "cleanup"] as const;

export type Capability = typeof REQUIRED_CAPABILITIES[number];

export interface ExtensionInitOptions {
  logger?: Logger;
  defaults?: ExecutionDefaults;
}

/** The lifecycle every extension implements. */
export interface PipelineExtension {
  validateConfig(config: ConfigMap): MaybePromise<void>;
  execute(config: ConfigMap): MaybePromise<void>;
  cleanup(): MaybePromise<void>;
  getOutputData?(): MaybePromise<ConfigMap>;
  initialize?(name: string, parentStackName: string, backend: ProvisioningBackend, opts?: ExtensionInitOptions): MaybePromise<void>;
}

export type ExtensionConstructor = new () => PipelineExtension;

export type ExtensionSource = "search-path" | "directory";

export interface ExtensionDescriptor {
  name: string;
  modulePath: string;
  packageDir: string;
  source: ExtensionSource;
}
