import type { ConfigMap } from "./contracts.js";

export type BackendMode = "mock" | "pulumi";

/** What extensions hold on to after creating a resource; backend-agnostic. */
export interface ResourceHandle {
  readonly resourceType: string;
  readonly name: string;
  readonly urn: string;
}

export interface ResourceOptions {
  parent?: ResourceHandle;
  dependsOn?: ResourceHandle[];
  protect?: boolean;
}

export interface ResourceTreeNode {
  type: string;
  name: string;
  properties: ConfigMap;
  urn: string;
  children: ResourceTreeNode[];
}

export interface ProvisioningBackend {
  readonly mode: BackendMode;
  readonly stackName: string;
  /** The run root; undefined when the engine owns the root stack. */
  readonly root: ResourceHandle | undefined;
  createResource(resourceType: string, name: string, properties?: ConfigMap, opts?: ResourceOptions): ResourceHandle;
  /** Exports on the run root (the stack). */
  exportValue(name: string, value: unknown): void;
  getConfigValue(namespace: string, key: string): string | undefined;
  getResourceTree(): ResourceTreeNode | undefined;
  /** Everything exported so far, keyed by export name. */
  exportedValues(): Record<string, unknown>;
}
