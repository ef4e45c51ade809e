// src/tools/cli/exec.ts (host or container execution)
import { exec as cpExec } from "node:child_process";
import { promisify } from "node:util";
const exec = promisify(cpExec);

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Shell name or path: bash, sh, zsh, /bin/bash ... */
  shell?: string;
  /** When set, the command runs in `docker run --rm <image>`. */
  image?: string;
}

export interface CommandResult {
  ok: boolean;
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | string; // string for spawn errors (ENOENT etc.)
}

function isWin(): boolean { return process.platform === "win32"; }

function prop(e: unknown, key: string): unknown {
  return typeof e === "object" && e !== null ? Reflect.get(e, key) : undefined;
}

/** Single-quotes a value for a POSIX shell. */
export function quote(s: string): string {
  return `'${s.replace(/'/g, `'\\''`)}'`;
}

function resolveShell(shell: string | undefined): string | undefined {
  if (isWin()) return undefined;
  if (!shell || shell === "auto") return "/bin/sh";
  return shell.includes("/") ? shell : `/bin/${shell}`;
}

export function containerCommand(command: string, image: string, shell = "sh"): string {
  return `docker run --rm ${quote(image)} ${shell} -c ${quote(command)}`;
}

export async function runCommand(command: string, opts: CommandOptions = {}): Promise<CommandResult> {
  const cmd = command.trim();
  if (!cmd) return { ok: false, command, stdout: "", stderr: "command is required", exitCode: "EINVAL" };

  const cwd = opts.cwd ?? process.cwd();
  const timeout = Math.max(1, opts.timeoutMs ?? 15_000);

  const shellCmd = opts.image ? containerCommand(cmd, opts.image, opts.shell && !opts.shell.includes("/") ? opts.shell : "sh") : cmd;
  const shell = opts.image ? resolveShell("sh") : resolveShell(opts.shell);

  try {
    const { stdout, stderr } = await exec(shellCmd, { cwd, timeout, shell });
    return { ok: true, command, stdout, stderr, exitCode: 0 };
  } catch (e: unknown) {
    const code = prop(e, "code");
    const stdout = prop(e, "stdout");
    const stderr = prop(e, "stderr");
    return {
      ok: false,
      command,
      stdout: typeof stdout === "string" ? stdout : "",
      stderr: typeof stderr === "string" && stderr ? stderr : (e instanceof Error ? e.message : String(e)),
      exitCode: typeof code === "number" || typeof code === "string" ? code : "ERR"
    };
  }
}
