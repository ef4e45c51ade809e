import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { delimiter, dirname, join, resolve } from "node:path";
import type { ExtensionDescriptor, ExtensionSource } from "../types/extensions.js";
import { errorMessage } from "../errors/index.js";
import type { Logger } from "../log/logger.js";

export const EXTENSION_PACKAGE_PREFIX = "pipeline-extension-";
export const EXTENSION_CLASS_SUFFIX = "Extension";

const ENTRY_CANDIDATES = ["index.ts", "index.js", "index.mjs"];

/** `shell` -> ShellExtension, `my-tool` -> MyToolExtension */
export function extensionClassName(name: string): string {
  const words = name.split(/[^A-Za-z0-9]+/).filter(Boolean);
  return words.map(w => w[0].toUpperCase() + w.slice(1).toLowerCase()).join("") + EXTENSION_CLASS_SUFFIX;
}

/** Every node_modules directory from `cwd` up to the root, then NODE_PATH entries. */
export function defaultSearchPaths(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const out: string[] = [];
  let dir = resolve(cwd);
  for (;;) {
    out.push(join(dir, "node_modules"));
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  for (const p of (env.NODE_PATH ?? "").split(delimiter)) {
    if (p) out.push(resolve(p));
  }
  return out;
}

function isDir(path: string): boolean {
  try { return statSync(path).isDirectory(); } catch { return false; }
}

function readMain(packageDir: string, logger?: Logger): string | undefined {
  const pkgPath = join(packageDir, "package.json");
  if (!existsSync(pkgPath)) return undefined;
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "main" in pkg && typeof pkg.main === "string") return pkg.main;
  } catch (e) {
    logger?.warn(`Ignoring unreadable ${pkgPath}: ${errorMessage(e)}`);
  }
  return undefined;
}

/** Entry module of an extension package; the directory itself when none is found. */
export function resolveEntry(packageDir: string, logger?: Logger): string {
  const main = readMain(packageDir, logger);
  if (main && existsSync(join(packageDir, main))) return join(packageDir, main);
  for (const candidate of ENTRY_CANDIDATES) {
    const p = join(packageDir, candidate);
    if (existsSync(p)) return p;
  }
  return packageDir;
}

export function scanDirectory(dir: string, source: ExtensionSource, logger?: Logger): ExtensionDescriptor[] {
  if (!isDir(dir)) return [];
  const found: ExtensionDescriptor[] = [];
  for (const entry of readdirSync(dir).sort()) {
    if (!entry.startsWith(EXTENSION_PACKAGE_PREFIX)) continue;
    const packageDir = join(dir, entry);
    if (!isDir(packageDir)) continue;
    const name = entry.slice(EXTENSION_PACKAGE_PREFIX.length);
    if (!name) continue;
    found.push({ name, packageDir, modulePath: resolveEntry(packageDir, logger), source });
  }
  return found;
}
