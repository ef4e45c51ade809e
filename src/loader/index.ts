import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { PipelineDefinition } from "../types/contracts.js";
import type { ExtensionConstructor, ExtensionDescriptor } from "../types/extensions.js";
import { REQUIRED_CAPABILITIES } from "../types/extensions.js";
import {
  ExtensionLoadError,
  ExtensionNotFoundError,
  ExtensionValidationError,
  PipelineError,
  errorMessage
} from "../errors/index.js";
import { createLogger, type Logger } from "../log/logger.js";
import { EXTENSION_CLASS_SUFFIX, defaultSearchPaths, extensionClassName, scanDirectory } from "./discover.js";

export type ModuleImporter = (url: string) => Promise<Record<string, unknown>>;

export interface LoaderOptions {
  /** Package search path; defaults to the node_modules chain plus NODE_PATH. */
  searchPaths?: string[];
  /** Overrides pipeline.core.extension_dir. */
  extensionDir?: string;
  importModule?: ModuleImporter;
  logger?: Logger;
}

export interface ExtensionStatus {
  required: string[];
  installed: string[];
  loaded: string[];
  missing: string[];
  extra: string[];
}

/** TypeScript entries go through tsx; compiled ones use the native loader. */
export const tsxImporter: ModuleImporter = async (url) => {
  let mod: unknown;
  if (/\.[cm]?ts$/.test(new URL(url).pathname)) {
    const { tsImport } = await import("tsx/esm/api");
    mod = await tsImport(url, { parentURL: import.meta.url });
  } else {
    mod = await import(url);
  }
  if (typeof mod !== "object" || mod === null) return {};
  return { ...mod };
};

function isConstructor(value: unknown): value is ExtensionConstructor {
  return typeof value === "function" && typeof value.prototype === "object" && value.prototype !== null;
}

/** Names of required lifecycle methods the class does not provide. */
export function missingCapabilities(value: unknown): string[] {
  if (!isConstructor(value)) return [...REQUIRED_CAPABILITIES];
  const proto: unknown = value.prototype;
  return REQUIRED_CAPABILITIES.filter(m => typeof proto !== "object" || proto === null || typeof Reflect.get(proto, m) !== "function");
}

export class ExtensionLoader {
  readonly installed = new Map<string, ExtensionDescriptor>();
  readonly loaded = new Map<string, ExtensionConstructor>();
  private readonly required: string[];
  private readonly extensionDir: string | undefined;
  private readonly searchPaths: string[];
  private readonly importModule: ModuleImporter;
  private readonly logger: Logger;

  constructor(pipeline: PipelineDefinition, opts: LoaderOptions = {}) {
    this.required = Object.keys(pipeline.extensions);
    const dir = opts.extensionDir ?? pipeline.core.extension_dir;
    this.extensionDir = dir ? resolve(dir) : undefined;
    this.searchPaths = opts.searchPaths ?? defaultSearchPaths();
    this.importModule = opts.importModule ?? tsxImporter;
    this.logger = opts.logger ?? createLogger("pipeline.loader");
  }

  status(): ExtensionStatus {
    const installed = [...this.installed.keys()];
    return {
      required: [...this.required],
      installed,
      loaded: [...this.loaded.keys()],
      missing: this.required.filter(n => !this.installed.has(n)),
      extra: installed.filter(n => !this.required.includes(n))
    };
  }

  /**
   * Search path first, extension directory second: a directory extension
   * replaces a search-path one of the same name.
   */
  discover(): Map<string, ExtensionDescriptor> {
    this.logger.info("Starting extension discovery");
    this.logger.info(`Extensions required by pipeline: ${this.required.join(", ") || "(none)"}`);
    this.installed.clear();

    for (const path of this.searchPaths) {
      for (const d of scanDirectory(path, "search-path", this.logger)) {
        this.installed.set(d.name, d);
        this.logger.info(`Found search-path extension: ${d.name} -> ${d.modulePath}`);
      }
    }

    if (!this.extensionDir) {
      this.logger.info("No extension directory specified");
    } else {
      for (const d of scanDirectory(this.extensionDir, "directory", this.logger)) {
        const shadowed = this.installed.get(d.name);
        if (shadowed) this.logger.debug(`Directory extension ${d.name} shadows ${shadowed.modulePath}`);
        this.installed.set(d.name, d);
        this.logger.info(`Found directory extension: ${d.name} -> ${d.modulePath}`);
      }
    }

    const status = this.status();
    if (status.missing.length) this.logger.warn(`Required extensions not installed: ${status.missing.join(", ")}`);
    if (status.extra.length) this.logger.info(`Extra extensions installed but not required: ${status.extra.join(", ")}`);
    this.logger.info(`Discovery complete. Found ${this.installed.size} installed extensions`);
    return this.installed;
  }

  async load(name: string): Promise<ExtensionConstructor> {
    const descriptor = this.installed.get(name);
    if (!descriptor) throw new ExtensionNotFoundError(name);

    const className = extensionClassName(name);
    this.logger.info(`Loading extension module: ${descriptor.modulePath}`);

    let mod: Record<string, unknown>;
    try {
      mod = await this.importModule(pathToFileURL(descriptor.modulePath).href);
    } catch (e) {
      this.logger.error(`Import error: ${errorMessage(e)}`);
      throw new ExtensionLoadError(`Failed to import ${descriptor.modulePath}`, name, { details: { error: errorMessage(e) }, cause: e });
    }

    if (!(className in mod)) {
      const available = Object.keys(mod).filter(k => k.endsWith(EXTENSION_CLASS_SUFFIX));
      throw new ExtensionLoadError(`Could not find ${className} in ${descriptor.modulePath}`, name, {
        details: { available_classes: available }
      });
    }

    const candidate = mod[className];
    const missing = missingCapabilities(candidate);
    if (missing.length || !isConstructor(candidate)) {
      throw new ExtensionValidationError(`Extension ${name} missing required methods`, name, {
        details: { missing_methods: missing }
      });
    }

    this.loaded.set(name, candidate);
    this.logger.info(`Successfully loaded extension: ${name}`);
    return candidate;
  }

  /** Loads required ∩ installed, in pipeline order; failures are logged and skipped. */
  async loadAll(): Promise<Map<string, ExtensionConstructor>> {
    this.logger.info("Loading required extensions");
    const result = new Map<string, ExtensionConstructor>();
    for (const name of this.required) {
      if (!this.installed.has(name)) {
        this.logger.warn(`Skipping required extension that is not installed: ${name}`);
        continue;
      }
      try {
        result.set(name, await this.load(name));
      } catch (e) {
        if (!(e instanceof PipelineError)) throw e;
        this.logger.error(`Failed to load extension ${name}: ${e.message}`, { details: e.info.details });
      }
    }
    this.logger.info(`Extension loading complete. Status: ${JSON.stringify(this.status())}`);
    return result;
  }
}
