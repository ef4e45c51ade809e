// src/runner.ts
// One pipeline run: settings -> pipeline file -> backend -> loader ->
// orchestrator -> execute -> cleanup -> artifacts (mock mode).
import { dirname, resolve } from 'node:path';
import type { ConfigMap, ExecutionState } from './types/contracts.js';
import type { ProvisioningBackend, ResourceTreeNode } from './types/resources.js';
import { readSettings, type Settings } from './config/env.js';
import { loadPipelineFile } from './config/pipeline.js';
import { MockBackend } from './resources/mock.js';
import { ExtensionLoader, type ModuleImporter } from './loader/index.js';
import { PipelineOrchestrator } from './orchestrator/run.js';
import { FileSecretLoader, type SecretLoader } from './state/secrets.js';
import { writeJson } from './state/fsStore.js';
import { errorMessage } from './errors/index.js';
import { createLogger, type Logger } from './log/logger.js';

export interface RunOptions {
  settings?: Settings;
  logger?: Logger;
  /** Seeded `<namespace>:<key>` config for the mock backend. */
  config?: Record<string, string>;
  searchPaths?: string[];
  importModule?: ModuleImporter;
  secretLoader?: SecretLoader;
  /** Write resource-tree.json / outputs.json in mock mode (default true). */
  writeArtifacts?: boolean;
}

export interface RunSummary {
  pipeline: string;
  runId: string;
  backend: ProvisioningBackend;
  /** Mock mode only. */
  tree: ResourceTreeNode | undefined;
  outputs: Record<string, ConfigMap>;
  states: Record<string, ExecutionState>;
  artifacts: string[];
}

async function createBackend(settings: Settings, logger: Logger, config?: Record<string, string>): Promise<ProvisioningBackend> {
  if (settings.backend === 'mock') {
    return new MockBackend({ stackName: settings.stackName, config, logger });
  }
  // Loaded lazily so mock runs never touch the Pulumi runtime.
  const { PulumiBackend } = await import('./resources/pulumi.js');
  return new PulumiBackend(logger);
}

export async function runPipelineFile(pipelinePath: string, opts: RunOptions = {}): Promise<RunSummary> {
  const settings = opts.settings ?? readSettings();
  const root = opts.logger ?? createLogger('pipeline');
  const log = root.child('runner');

  const file = resolve(pipelinePath);
  const { name, pipeline } = loadPipelineFile(file);
  log.info(`Pipeline ${name} loaded from ${file} with ${Object.keys(pipeline.extensions).length} extensions`);

  const backend = await createBackend(settings, root.child('backend'), opts.config);

  const loader = new ExtensionLoader(pipeline, {
    searchPaths: opts.searchPaths,
    importModule: opts.importModule,
    logger: root.child('loader')
  });
  loader.discover();
  const loaded = await loader.loadAll();

  const orchestrator = new PipelineOrchestrator({
    parentStackName: backend.stackName,
    backend,
    pipeline,
    logger: root,
    secretLoader: opts.secretLoader ?? new FileSecretLoader(dirname(file))
  });
  let executed = false;
  try {
    await orchestrator.registerExtensions(loaded);
    await orchestrator.execute();
    executed = true;
  } finally {
    try {
      await orchestrator.cleanup();
    } catch (e) {
      // An execution error is already on its way out; report this one beside it.
      if (executed) throw e;
      log.error(`Cleanup also failed: ${errorMessage(e)}`, { error: e });
    }
  }

  const tree = backend.getResourceTree();
  const outputs = orchestrator.state.getAllExtensionData();
  const artifacts: string[] = [];
  if (backend.mode === 'mock' && tree) {
    log.debug(`Resource tree:\n${JSON.stringify(tree, null, 2)}`);
    if (opts.writeArtifacts ?? true) {
      artifacts.push(writeJson(settings.runId, 'resource-tree.json', tree, settings.artifactsDir));
      artifacts.push(writeJson(settings.runId, 'outputs.json', outputs, settings.artifactsDir));
    }
  }

  return {
    pipeline: name,
    runId: settings.runId,
    backend,
    tree,
    outputs,
    states: orchestrator.state.getExecutionStates(),
    artifacts
  };
}
