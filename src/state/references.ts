export type SecretRef = {
  kind: "secret";
  vault: string;
  key: string;
};

export type GroupRef = {
  kind: "group";
  extension: string;
  run: string;
  group: string;
  node?: string;
};

export type Reference = SecretRef | GroupRef;

export const SECRET_PREFIX = "_secret:";
export const GROUP_PREFIX = "_group:";

const SECRET_REF = /^_secret:([^:]+):([^:]+)$/;
const GROUP_REF = /^_group:([^:]+):([^:]+):([^:]+)(?::([^:]+))?$/;

export function looksLikeReference(value: string): boolean {
  return value.startsWith(SECRET_PREFIX) || value.startsWith(GROUP_PREFIX);
}

/** Parses a reference token; malformed or plain strings give undefined. */
export function parseReference(value: string): Reference | undefined {
  const s = SECRET_REF.exec(value);
  if (s) return { kind: "secret", vault: s[1], key: s[2] };
  const g = GROUP_REF.exec(value);
  if (g) {
    const ref: GroupRef = { kind: "group", extension: g[1], run: g[2], group: g[3] };
    if (g[4] !== undefined) ref.node = g[4];
    return ref;
  }
  return undefined;
}
