export * from './errors/index.js';
export type { ConfigMap, CoreConfig, ExecutionDefaults, ExecutionState, PipelineDefinition } from './types/contracts.js';
export { DEFAULT_EXECUTION_DEFAULTS, EXECUTION_STATES } from './types/contracts.js';
export type { ExtensionConstructor, ExtensionDescriptor, ExtensionInitOptions, PipelineExtension } from './types/extensions.js';
export type { BackendMode, ProvisioningBackend, ResourceHandle, ResourceOptions, ResourceTreeNode } from './types/resources.js';
export { createLogger, createMemoryLogger, type Logger, type LogRecord } from './log/logger.js';
export { readSettings, type Settings } from './config/env.js';
export { loadPipelineFile, parsePipeline, type LoadedPipeline } from './config/pipeline.js';
export { MockBackend, MockResource } from './resources/mock.js';
export { ExtensionLoader, type ExtensionStatus, type LoaderOptions, type ModuleImporter } from './loader/index.js';
export { PipelineOrchestrator, type OrchestratorOptions } from './orchestrator/run.js';
export { PipelineState } from './state/index.js';
export { FileSecretLoader, type SecretLoader, type SecretVaultEntry } from './state/secrets.js';
export { ExtensionHandler } from './extensions/base.js';
export { withExtension } from './extensions/context.js';
export { runPipelineFile, type RunOptions, type RunSummary } from './runner.js';
export { runCommand, type CommandOptions, type CommandResult } from './tools/cli/exec.js';
export { downloadResource, fetchResource } from './tools/http/request.js';
