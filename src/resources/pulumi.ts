import * as pulumi from "@pulumi/pulumi";
import type { ConfigMap } from "../types/contracts.js";
import type { ProvisioningBackend, ResourceHandle, ResourceOptions } from "../types/resources.js";
import { ResourceError } from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";
import { isProtectedType } from "./mock.js";

class PipelineComponent extends pulumi.ComponentResource {
  constructor(resourceType: string, name: string, properties: ConfigMap, opts: pulumi.ComponentResourceOptions) {
    super(resourceType, name, {}, opts);
    this.registerOutputs(properties);
  }
}

interface PulumiHandle extends ResourceHandle {
  readonly resource: PipelineComponent;
}

/**
 * Pass-through to the Pulumi engine. Must run inside a Pulumi program;
 * stack outputs are whatever `exportedValues()` returns from the program entry.
 */
export class PulumiBackend implements ProvisioningBackend {
  readonly mode = "pulumi" as const;
  readonly stackName: string;
  readonly root = undefined;
  private readonly handles = new Map<string, PulumiHandle>();
  private readonly exported: Record<string, unknown> = {};
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.stackName = pulumi.getStack();
    this.logger = logger ?? createLogger("pipeline.backend");
    this.logger.info(`Initialized in real mode: stack=${this.stackName}`);
  }

  createResource(resourceType: string, name: string, properties: ConfigMap = {}, opts: ResourceOptions = {}): ResourceHandle {
    const urn = `urn:pulumi:${this.stackName}::${resourceType}::${name}`;
    if (this.handles.has(urn)) {
      throw new ResourceError(`Duplicate resource name: ${name}`, { details: { type: resourceType } });
    }
    const resource = new PipelineComponent(resourceType, name, properties, {
      parent: opts.parent ? this.lookup(opts.parent) : undefined,
      dependsOn: (opts.dependsOn ?? []).map(h => this.lookup(h)),
      protect: opts.protect ?? isProtectedType(resourceType)
    });
    const handle: PulumiHandle = { resourceType, name, urn, resource };
    this.handles.set(urn, handle);
    this.logger.info(`Created Pulumi resource: type=${resourceType} name=${name}`);
    return handle;
  }

  exportValue(name: string, value: unknown): void {
    this.exported[name] = value;
  }

  exportedValues(): Record<string, unknown> {
    return { ...this.exported };
  }

  getConfigValue(namespace: string, key: string): string | undefined {
    return new pulumi.Config(namespace).get(key);
  }

  getResourceTree(): undefined {
    return undefined;
  }

  private lookup(handle: ResourceHandle): PipelineComponent {
    const found = this.handles.get(handle.urn);
    if (!found) throw new ResourceError(`Unknown resource: ${handle.name}`, { details: { urn: handle.urn } });
    return found.resource;
  }
}
