import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { ConfigurationError, ResourceError } from "../../errors/index.js";

/** Credentials for remote locations (scripts, secret vaults). */
export interface AuthConfig {
  token?: string;
  username?: string;
  password?: string;
  ssh_key?: string;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: Record<string, string>;
  body: string;
}

export function isHttpLocation(location: string): boolean {
  return location.startsWith("http://") || location.startsWith("https://");
}

export function isGitLocation(location: string): boolean {
  return location.startsWith("git@") || location.endsWith(".git");
}

export function authHeaders(auth?: AuthConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!auth) return headers;
  if (auth.token) headers["authorization"] = `Bearer ${auth.token}`;
  else if (auth.username !== undefined && auth.password !== undefined) {
    headers["authorization"] = `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString("base64")}`;
  }
  return { ...headers, ...(auth.headers ?? {}) };
}

export async function httpRequest(url: string, opts: { method?: string; headers?: Record<string, string>; body?: string } = {}): Promise<HttpResponse> {
  const method = (opts.method || "GET").toUpperCase();
  const res = await fetch(url, { method, headers: opts.headers ?? {}, body: opts.body });
  const text = await res.text();
  const hdrs: Record<string, string> = {};
  res.headers.forEach((v, k) => { hdrs[k] = v; });
  return { ok: res.ok, status: res.status, headers: hdrs, body: text };
}

/** Reads a local file (relative to baseDir) or fetches an http(s) URL as text. */
export async function fetchResource(location: string, opts: { baseDir?: string; auth?: AuthConfig } = {}): Promise<string> {
  if (isHttpLocation(location)) {
    const res = await httpRequest(location, { headers: authHeaders(opts.auth) });
    if (!res.ok) throw new ResourceError(`Failed to fetch ${location}: HTTP ${res.status}`, { details: { status: res.status } });
    return res.body;
  }
  if (isGitLocation(location)) {
    throw new ConfigurationError(`Git locations are not supported: ${location}`);
  }
  const path = isAbsolute(location) ? location : resolve(opts.baseDir ?? process.cwd(), location);
  try {
    return await readFile(path, "utf-8");
  } catch (e) {
    throw new ResourceError(`Failed to read ${path}`, { cause: e });
  }
}

/**
 * Makes a resource available on disk. Remote files are written to `target`;
 * local paths are returned resolved, without copying.
 */
export async function downloadResource(location: string, target: string, opts: { baseDir?: string; auth?: AuthConfig } = {}): Promise<string> {
  if (!isHttpLocation(location)) {
    if (isGitLocation(location)) throw new ConfigurationError(`Git locations are not supported: ${location}`);
    return isAbsolute(location) ? location : resolve(opts.baseDir ?? process.cwd(), location);
  }
  const body = await fetchResource(location, opts);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, body, "utf-8");
  return target;
}
