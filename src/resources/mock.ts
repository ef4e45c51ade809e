import type { ConfigMap } from "../types/contracts.js";
import type { ProvisioningBackend, ResourceHandle, ResourceOptions, ResourceTreeNode } from "../types/resources.js";
import { ResourceError } from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";

export const STACK_TYPE = "pulumi:stack:Stack";
export const EXTENSION_TYPE_PREFIX = "pipeline:extension:";

export function isProtectedType(resourceType: string): boolean {
  return resourceType === STACK_TYPE || resourceType.startsWith(EXTENSION_TYPE_PREFIX);
}

/**
 * In-memory resource node. A node registers itself with its parent when it is
 * constructed; parents never go looking for children.
 */
export class MockResource implements ResourceHandle {
  readonly urn: string;
  readonly parent: MockResource | undefined;
  readonly dependsOn: readonly ResourceHandle[];
  readonly protect: boolean;
  private readonly children: MockResource[] = [];
  private readonly outputs = new Map<string, unknown>();

  constructor(
    readonly resourceType: string,
    readonly name: string,
    readonly properties: ConfigMap = {},
    opts: { parent?: MockResource; dependsOn?: ResourceHandle[]; protect?: boolean } = {}
  ) {
    this.urn = `urn:mock:${resourceType}::${name}`;
    this.parent = opts.parent;
    this.dependsOn = opts.dependsOn ?? [];
    this.protect = opts.protect ?? false;
    if (this.parent) this.parent.addChild(this);
  }

  private addChild(child: MockResource): void {
    if (!this.children.includes(child)) this.children.push(child);
  }

  isStack(): boolean {
    return this.resourceType === STACK_TYPE;
  }

  getChildren(): readonly MockResource[] {
    return this.children;
  }

  export(name: string, value: unknown): void {
    if (!this.isStack()) {
      throw new ResourceError("Failed to export output: export target is not a stack", {
        details: { target: this.name, type: this.resourceType }
      });
    }
    this.outputs.set(name, value);
  }

  getOutput(name: string): unknown {
    return this.outputs.get(name);
  }

  getOutputs(): Record<string, unknown> {
    return Object.fromEntries(this.outputs);
  }

  toString(): string {
    return `MockResource(${this.resourceType}:${this.name})`;
  }
}

export interface MockBackendOptions {
  stackName?: string;
  /** Seeded configuration, keyed `<namespace>:<key>`. */
  config?: Record<string, string>;
  logger?: Logger;
}

/** Dry-run backend: keeps the whole run as a tree under one mock stack. */
export class MockBackend implements ProvisioningBackend {
  readonly mode = "mock" as const;
  readonly stackName: string;
  readonly root: MockResource;
  private readonly resources = new Map<string, MockResource>();
  private readonly config: Record<string, string>;
  private readonly logger: Logger;

  constructor(opts: MockBackendOptions = {}) {
    this.stackName = opts.stackName ?? "mock-stack";
    this.config = opts.config ?? {};
    this.logger = opts.logger ?? createLogger("pipeline.backend");
    this.root = new MockResource(STACK_TYPE, this.stackName, { mock: true, name: this.stackName }, { protect: true });
    this.resources.set(this.root.urn, this.root);
    this.logger.info(`Initialized in mock mode: stack=${this.stackName}`);
  }

  createResource(resourceType: string, name: string, properties: ConfigMap = {}, opts: ResourceOptions = {}): MockResource {
    if (this.getResource(name)) {
      throw new ResourceError(`Duplicate resource name: ${name}`, { details: { type: resourceType } });
    }
    const parent = opts.parent ? this.requireOwned(opts.parent) : this.root;
    const resource = new MockResource(resourceType, name, properties, {
      parent,
      dependsOn: opts.dependsOn,
      protect: opts.protect ?? isProtectedType(resourceType)
    });
    this.resources.set(resource.urn, resource);
    this.logger.debug(`Created mock resource: type=${resourceType} name=${name} parent=${parent.name}`);
    return resource;
  }

  exportValue(name: string, value: unknown): void {
    this.root.export(name, value);
  }

  getOutput(name: string): unknown {
    return this.root.getOutput(name);
  }

  exportedValues(): Record<string, unknown> {
    return this.root.getOutputs();
  }

  getConfigValue(namespace: string, key: string): string | undefined {
    return this.config[`${namespace}:${key}`];
  }

  getResource(name: string): MockResource | undefined {
    for (const r of this.resources.values()) {
      if (r.name === name) return r;
    }
    return undefined;
  }

  getResourceTree(): ResourceTreeNode {
    const build = (r: MockResource): ResourceTreeNode => ({
      type: r.resourceType,
      name: r.name,
      properties: r.properties,
      urn: r.urn,
      children: r.getChildren().map(build)
    });
    return build(this.root);
  }

  // Parents must be nodes of this tree, so the hierarchy stays a single forest.
  private requireOwned(handle: ResourceHandle): MockResource {
    const found = this.resources.get(handle.urn);
    if (!found) {
      throw new ResourceError(`Parent resource is not part of this run: ${handle.name}`, { details: { urn: handle.urn } });
    }
    return found;
  }
}
