// src/orchestrator/run.ts
// Registers loaded extensions, runs them one at a time in registration order,
// and tears them down in reverse. Every lifecycle call is awaited before the
// next one starts.

import type { ConfigMap, PipelineDefinition } from "../types/contracts.js";
import type { ExtensionConstructor, PipelineExtension } from "../types/extensions.js";
import type { ProvisioningBackend } from "../types/resources.js";
import {
  ErrorHandler,
  ExtensionExecutionError,
  ExtensionLoadError,
  ExtensionValidationError,
  PipelineError,
  StateError,
  attempt,
  errorMessage
} from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";
import { PipelineState } from "../state/index.js";
import type { SecretLoader } from "../state/secrets.js";
import { withExtension } from "../extensions/context.js";

export interface OrchestratorOptions {
  parentStackName: string;
  backend: ProvisioningBackend;
  pipeline: PipelineDefinition;
  state?: PipelineState;
  /** Root logger; the orchestrator and each extension get child scopes of it. */
  logger?: Logger;
  /** Used only when `state` is not given. */
  secretLoader?: SecretLoader;
}

const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export class PipelineOrchestrator {
  /** Live registry, in registration order. */
  readonly extensions = new Map<string, PipelineExtension>();
  readonly state: PipelineState;
  private readonly parentStackName: string;
  private readonly backend: ProvisioningBackend;
  private readonly pipeline: PipelineDefinition;
  private readonly root: Logger;
  private readonly logger: Logger;
  private readonly errors: ErrorHandler;

  constructor(opts: OrchestratorOptions) {
    this.parentStackName = opts.parentStackName;
    this.backend = opts.backend;
    this.pipeline = opts.pipeline;
    this.root = opts.logger ?? createLogger("pipeline");
    this.logger = this.root.child("orchestrator");
    this.errors = new ErrorHandler(this.logger);
    this.state = opts.state ?? new PipelineState({ logger: this.root.child("state"), secretLoader: opts.secretLoader });
  }

  async registerExtensions(loaded: Map<string, ExtensionConstructor>): Promise<void> {
    for (const [name, Ctor] of loaded) {
      const result = await attempt(
        async () => {
          const extension = new Ctor();
          if (typeof extension.initialize !== "function") {
            throw new ExtensionValidationError(`Extension ${name} cannot be initialized`, name, {
              details: { missing_methods: ["initialize"] }
            });
          }
          await extension.initialize(name, this.parentStackName, this.backend, {
            logger: this.root.child(`extensions.${name}`),
            defaults: this.pipeline.core.execution_defaults
          });
          return extension;
        },
        // Only critical errors may stop registration of the extensions after this one.
        e => e instanceof PipelineError && (e.info.severity === "critical" || e.info.category === "extension")
          ? e
          : new ExtensionLoadError(`Failed to initialize extension ${name}: ${errorMessage(e)}`, name, { cause: e }),
        true
      );

      if (!result.ok) {
        this.state.setExtensionState(name, "failed");
        this.errors.handle(result.error, `extension.${name}.initialize`);
        continue;
      }
      this.extensions.set(name, result.value);
      this.state.setExtensionState(name, "registered");
      this.logger.info(`Registered extension: ${name}`);
    }
  }

  /** The extension's configuration with every reference resolved; undefined when unconfigured. */
  getExtensionConfig(name: string): ConfigMap | undefined {
    const raw = this.pipeline.extensions[name];
    if (raw === undefined) return undefined;
    return this.state.resolveReferences(raw);
  }

  async execute(): Promise<void> {
    const secrets = this.pipeline.extensions.secrets;
    if (secrets !== undefined) {
      const loaded = await attempt(() => this.state.loadSecrets(secrets), e => new PipelineError(errorMessage(e), "configuration", "pipeline.secrets", { cause: e }));
      if (!loaded.ok) this.errors.handle(loaded.error, "pipeline.secrets");
    }

    let idx = 0;
    for (const [name, extension] of this.extensions) {
      idx++;
      if (this.pipeline.extensions[name] === undefined) {
        this.logger.warn(`No configuration found for extension: ${name}, skipping`);
        continue;
      }
      const current = this.state.peekExtensionState(name);
      if (current !== undefined && current !== "registered") {
        this.logger.warn(`Extension ${name} is already ${current}, skipping`);
        continue;
      }

      const started = Date.now();
      this.logger.info(`▶ extension ${idx}/${this.extensions.size} ${name}`);
      const result = await attempt(
        () => this.runExtension(name, extension),
        e => new ExtensionExecutionError(`Extension ${name} failed: ${errorMessage(e)}`, name, {
          details: { error: errorMessage(e) },
          cause: e
        })
      );

      if (result.ok) {
        if (result.value) {
          this.state.setExtensionState(name, "success");
          this.logger.info(`✓ done ${name} (${fmtMs(Date.now() - started)})`);
        }
        continue;
      }
      if (this.state.peekExtensionState(name) === "starting") this.state.setExtensionState(name, "failed");
      this.errors.handle(result.error, `extension.${name}`);
    }
  }

  /** False when the extension was skipped for an empty configuration. */
  private async runExtension(name: string, extension: PipelineExtension): Promise<boolean> {
    this.state.setExtensionState(name, "starting");
    const config = this.getExtensionConfig(name) ?? {};
    if (Object.keys(config).length === 0) {
      this.logger.debug(`Empty configuration for extension: ${name}, skipping`);
      return false;
    }

    await withExtension(extension, this.logger, async ext => {
      const valid = await attempt(
        () => ext.validateConfig(config),
        e => new ExtensionValidationError(`Configuration validation failed for ${name}`, name, {
          details: { error: errorMessage(e) },
          cause: e
        }),
        true
      );
      if (!valid.ok) throw valid.error;

      await ext.execute(config);

      if (ext.getOutputData) this.state.storeExtensionData(name, await ext.getOutputData());
    });
    return true;
  }

  /**
   * Cleans up every registered extension, newest first. Failures are logged
   * and collected; one StateError naming them all is thrown at the end.
   */
  async cleanup(): Promise<void> {
    const failed: string[] = [];
    for (const [name, extension] of [...this.extensions].reverse()) {
      const context = `extension.${name}.cleanup`;
      const result = await attempt(
        () => extension.cleanup(),
        e => new PipelineError(`Cleanup failed for ${name}: ${errorMessage(e)}`, "extension", context, { cause: e }),
        true
      );
      if (result.ok) {
        this.state.setExtensionState(name, "cleaned");
        this.logger.debug(`Cleaned up extension: ${name}`);
        continue;
      }
      this.state.setExtensionState(name, "cleanup_failed");
      failed.push(name);
      this.errors.handle(result.error, context);
    }

    if (failed.length) {
      throw new StateError("Cleanup failed for some extensions", {
        details: { failed_extensions: failed, error_count: failed.length }
      });
    }
  }
}
