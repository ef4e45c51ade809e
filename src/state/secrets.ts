import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ConfigMap } from "../types/contracts.js";
import { ConfigurationError, errorMessage } from "../errors/index.js";
import { fetchResource } from "../tools/http/request.js";

export type SecretVault = ConfigMap;

const authSchema = z.object({
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  ssh_key: z.string().optional(),
  headers: z.record(z.string()).optional()
});

export const secretVaultEntrySchema = z.object({
  name: z.string().min(1),
  location: z.string().min(1).optional(),
  values: z.record(z.unknown()).optional(),
  auth: authSchema.optional()
}).refine(e => e.location !== undefined || e.values !== undefined, {
  message: "a secret vault needs either location or values"
});

export type SecretVaultEntry = z.infer<typeof secretVaultEntrySchema>;

/** Supplies vault contents. Hosts plug in their own secret storage here. */
export interface SecretLoader {
  load(entry: SecretVaultEntry): Promise<SecretVault>;
}

function isRecord(v: unknown): v is ConfigMap {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Accepts the secrets extension config in either shape: a list of vault
 * entries, or the name-keyed map the pipeline loader produces.
 */
export function parseVaultEntries(config: unknown): SecretVaultEntry[] {
  const items: unknown[] = Array.isArray(config)
    ? config
    : isRecord(config)
      ? Object.entries(config).map(([name, v]) => (isRecord(v) && v.name === undefined ? { ...v, name } : v))
      : [];
  return items.map((item, i) => {
    const parsed = secretVaultEntrySchema.safeParse(item);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid secret vault entry #${i}`, { details: { issues: parsed.error.issues.map(x => x.message) } });
    }
    return parsed.data;
  });
}

/** Default loader: inline values, or a YAML / JSON file (local path or http). */
export class FileSecretLoader implements SecretLoader {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async load(entry: SecretVaultEntry): Promise<SecretVault> {
    const vault: SecretVault = {};
    if (entry.location) {
      const text = await fetchResource(entry.location, { baseDir: this.baseDir, auth: entry.auth });
      let data: unknown;
      try {
        data = extname(entry.location) === ".json" ? JSON.parse(text) : parseYaml(text);
      } catch (e) {
        throw new ConfigurationError(`Could not parse secret vault ${entry.name}: ${errorMessage(e)}`, { cause: e });
      }
      if (isRecord(data)) Object.assign(vault, data);
      else if (data !== null && data !== undefined) {
        throw new ConfigurationError(`Secret vault ${entry.name} must contain a mapping`);
      }
    }
    if (entry.values) Object.assign(vault, entry.values);
    return vault;
  }
}
