import type { ConfigMap, ExecutionState } from "../types/contracts.js";
import { StateError } from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";
import { looksLikeReference, parseReference, type GroupRef, type SecretRef } from "./references.js";
import { FileSecretLoader, parseVaultEntries, type SecretLoader, type SecretVault } from "./secrets.js";

const STATE_RANK: Record<ExecutionState, number> = {
  registered: 0,
  starting: 1,
  success: 2,
  failed: 2,
  cleaned: 3,
  cleanup_failed: 3
};

export interface PipelineStateOptions {
  logger?: Logger;
  secretLoader?: SecretLoader;
}

function isPlainObject(v: unknown): v is ConfigMap {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function lookupPath(data: ConfigMap, key: string): unknown {
  if (Object.hasOwn(data, key)) return data[key];
  let cur: unknown = data;
  for (const part of key.split(".")) {
    if (!isPlainObject(cur) || !Object.hasOwn(cur, part)) return undefined;
    cur = cur[part];
  }
  return cur;
}

/**
 * Run-wide state shared by every extension: execution states, the data each
 * extension produced, and loaded secret vaults.
 */
export class PipelineState {
  private readonly executionState = new Map<string, ExecutionState>();
  private readonly extensionData = new Map<string, ConfigMap>();
  private readonly secrets = new Map<string, SecretVault>();
  private readonly logger: Logger;
  private readonly secretLoader: SecretLoader;

  constructor(opts: PipelineStateOptions = {}) {
    this.logger = opts.logger ?? createLogger("pipeline.state");
    this.secretLoader = opts.secretLoader ?? new FileSecretLoader();
  }

  // --- execution states ---

  setExtensionState(name: string, state: ExecutionState): void {
    const current = this.executionState.get(name);
    if (current !== undefined && STATE_RANK[state] <= STATE_RANK[current]) {
      throw new StateError(`Invalid state transition for ${name}: ${current} -> ${state}`, {
        details: { extension: name, from: current, to: state }
      });
    }
    this.executionState.set(name, state);
    this.logger.debug(`Extension ${name} state changed to: ${state}`);
  }

  getExtensionState(name: string): ExecutionState | undefined {
    const state = this.executionState.get(name);
    if (state === undefined) this.logger.warn(`No state found for extension: ${name}`);
    return state;
  }

  /** Like getExtensionState, without the warning for unknown names. */
  peekExtensionState(name: string): ExecutionState | undefined {
    return this.executionState.get(name);
  }

  getExecutionStates(): Record<string, ExecutionState> {
    return Object.fromEntries(this.executionState);
  }

  // --- extension data ---

  storeExtensionData(name: string, data: ConfigMap): void {
    if (this.extensionData.has(name)) {
      throw new StateError(`Data already stored for extension: ${name}`, { details: { extension: name } });
    }
    // Snapshot: later exports on the extension must not reach stored data.
    this.extensionData.set(name, structuredClone(data));
    this.logger.debug(`Stored data for extension: ${name}`);
  }

  getExtensionData(name: string): ConfigMap | undefined {
    const data = this.extensionData.get(name);
    if (data === undefined) this.logger.warn(`No data found for extension: ${name}`);
    return data;
  }

  getAllExtensionData(): Record<string, ConfigMap> {
    return structuredClone(Object.fromEntries(this.extensionData));
  }

  // --- secrets ---

  async loadSecrets(config: unknown): Promise<void> {
    this.logger.info("Loading secrets from configuration");
    for (const entry of parseVaultEntries(config)) {
      this.secrets.set(entry.name, await this.secretLoader.load(entry));
      this.logger.debug(`Loaded secret vault: ${entry.name}`);
    }
  }

  setSecretVault(name: string, vault: SecretVault): void {
    this.secrets.set(name, vault);
  }

  // --- reference resolution ---

  /**
   * Rewrites every `_secret:` / `_group:` token in a config tree. One pass
   * only: a resolved value is never resolved again. Missing references
   * become null with a warning.
   */
  resolveReferences(config: ConfigMap): ConfigMap;
  resolveReferences(config: unknown): unknown;
  resolveReferences(config: unknown): unknown {
    if (Array.isArray(config)) return config.map(item => this.resolveReferences(item));
    if (isPlainObject(config)) {
      const resolved: ConfigMap = {};
      for (const [key, value] of Object.entries(config)) resolved[key] = this.resolveReferences(value);
      return resolved;
    }
    if (typeof config === "string" && looksLikeReference(config)) return this.resolveToken(config);
    return config;
  }

  private resolveToken(token: string): unknown {
    const ref = parseReference(token);
    if (!ref) return token;
    return ref.kind === "secret" ? this.resolveSecret(ref, token) : this.resolveGroup(ref, token);
  }

  private resolveSecret(ref: SecretRef, token: string): unknown {
    const vault = this.secrets.get(ref.vault);
    const secret = vault ? lookupPath(vault, ref.key) : undefined;
    if (secret === undefined || secret === null) {
      this.logger.warn(`Could not resolve secret reference: ${token}`);
      return null;
    }
    return secret;
  }

  private resolveGroup(ref: GroupRef, token: string): unknown {
    const data = this.extensionData.get(ref.extension) ?? {};
    const groupKey = `${ref.run}.${ref.group}`;
    const group = Object.hasOwn(data, groupKey) ? data[groupKey] : undefined;
    if (group === undefined || group === null || (isPlainObject(group) && Object.keys(group).length === 0)) {
      this.logger.warn(`Could not resolve group reference: ${token}`);
      return null;
    }
    if (ref.node === undefined) return group;
    const node = isPlainObject(group) && Object.hasOwn(group, ref.node) ? group[ref.node] : undefined;
    if (node === undefined || node === null) {
      this.logger.warn(`Node ${ref.node} not found in group: ${token}`);
      return null;
    }
    return node;
  }
}
