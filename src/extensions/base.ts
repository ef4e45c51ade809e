import type { ConfigMap, ExecutionDefaults } from "../types/contracts.js";
import { DEFAULT_EXECUTION_DEFAULTS } from "../types/contracts.js";
import type { ExtensionInitOptions, MaybePromise, PipelineExtension } from "../types/extensions.js";
import type { ProvisioningBackend, ResourceHandle } from "../types/resources.js";
import { StateError } from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";
import { EXTENSION_TYPE_PREFIX } from "../resources/mock.js";

interface Bound {
  name: string;
  parentStackName: string;
  stackName: string;
  backend: ProvisioningBackend;
  stackResource: ResourceHandle;
}

/**
 * Base class for extensions.
 *
 * Subclasses implement validateConfig and execute, and may override cleanup.
 * Everything an extension provisions goes through createResource and
 * exportOutput, so the same extension code runs against the mock tree and
 * the real backend.
 */
export abstract class ExtensionHandler implements PipelineExtension {
  /** Scratch state; cleared on cleanup. */
  readonly state: ConfigMap = {};
  /** Every exported value, appended per output key. */
  readonly outputs: Record<string, unknown[]> = {};
  protected logger: Logger = createLogger("extensions.uninitialized");
  protected defaults: ExecutionDefaults = DEFAULT_EXECUTION_DEFAULTS;
  private bound: Bound | undefined;
  private finalized = false;

  initialize(name: string, parentStackName: string, backend: ProvisioningBackend, opts: ExtensionInitOptions = {}): void {
    this.logger = opts.logger ?? createLogger(`extensions.${name}`);
    this.defaults = opts.defaults ?? DEFAULT_EXECUTION_DEFAULTS;

    const stackName = `${parentStackName}.${name}`;
    const extensionType = `${EXTENSION_TYPE_PREFIX}${name}`;
    const stackResource = backend.createResource(
      extensionType,
      stackName,
      { name, parent_stack: parentStackName, type: extensionType },
      { parent: backend.root, protect: true }
    );
    this.bound = { name, parentStackName, stackName, backend, stackResource };
    this.logger.info(`Initialized extension ${name} in stack ${parentStackName}`);
  }

  get name(): string | undefined { return this.bound?.name; }
  /** `<parentStack>.<name>`; prefixes every resource this extension creates. */
  get stackName(): string | undefined { return this.bound?.stackName; }
  get stackResource(): ResourceHandle | undefined { return this.bound?.stackResource; }

  protected requireBound(): Bound {
    if (!this.bound) throw new StateError("Extension not properly initialized");
    return this.bound;
  }

  createResource(resourceType: string, name: string, props: ConfigMap = {}, parent?: ResourceHandle, dependsOn?: ResourceHandle[]): ResourceHandle {
    const b = this.requireBound();
    const resourceName = `${b.stackName}.${name}`;
    const effectiveParent = parent ?? b.stackResource;

    const resource = b.backend.createResource(
      resourceType,
      resourceName,
      {
        type: resourceType,
        stack: b.stackName,
        extension: b.name,
        parent_resource: parent ? parent.name : null,
        ...props
      },
      {
        parent: effectiveParent,
        dependsOn,
        protect: resourceType.startsWith(EXTENSION_TYPE_PREFIX)
      }
    );
    this.logger.debug(`Created resource: type=${resourceType} name=${resourceName} parent=${effectiveParent.name}`);
    return resource;
  }

  exportOutput(name: string, value: unknown): void {
    const b = this.requireBound();
    (this.outputs[name] ??= []).push(value);
    b.backend.exportValue(`${b.name}_${name}`, value);
  }

  abstract validateConfig(config: ConfigMap): MaybePromise<void>;

  abstract execute(config: ConfigMap): MaybePromise<void>;

  getOutputData(): MaybePromise<ConfigMap> {
    return this.outputs;
  }

  /** Exports the final state and clears scratch state; safe to call twice. */
  cleanup(): MaybePromise<void> {
    if (!this.bound || this.finalized) return;
    this.finalized = true;
    this.bound.backend.exportValue(
      `${this.bound.name}_final_state`,
      { state: { ...this.state }, outputs: this.outputs }
    );
    for (const key of Object.keys(this.state)) delete this.state[key];
  }
}
