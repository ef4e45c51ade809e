import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ConfigMap } from "../../src/types/contracts.js";
import { ExtensionHandler } from "../../src/extensions/base.js";
import { ConfigurationError, ExtensionExecutionError } from "../../src/errors/index.js";
import { quote, runCommand } from "../../src/tools/cli/exec.js";
import { downloadResource } from "../../src/tools/http/request.js";
import { DEFAULT_BASE_IMAGE, shellRunSchema, type ShellRun } from "./models.js";

export * from "./models.js";

const RUN_KEYS = ["commands", "scripts"];

function isRecord(v: unknown): v is ConfigMap {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Runs shell commands and downloaded scripts, one `shell:command:<run>`
 * resource per command. Output goes to `<run>_output`; a failing command
 * exports `<run>_error` and stops the extension.
 */
export class ShellExtension extends ExtensionHandler {
  runs: ShellRun[] = [];

  /** Top-level `commands`/`scripts` means one run named after the extension; otherwise a map of named runs. */
  parseRuns(config: ConfigMap): ShellRun[] {
    const entries: Array<[string, unknown]> = RUN_KEYS.some(k => k in config)
      ? [[this.name ?? "shell", config]]
      : Object.entries(config);

    return entries.map(([name, item]) => {
      if (!isRecord(item)) throw new ConfigurationError(`Shell run ${name} must be a mapping`);
      const parsed = shellRunSchema.safeParse({ ...item, name: item.name ?? name });
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => i.message);
        throw new ConfigurationError(`Invalid shell run ${name}: ${issues.join("; ")}`, { details: { run: name, issues } });
      }
      return parsed.data;
    });
  }

  validateConfig(config: ConfigMap): void {
    this.logger.info(`Validating shell configuration: ${Object.keys(config).join(", ")}`);
    this.runs = this.parseRuns(config);
  }

  async execute(config: ConfigMap): Promise<void> {
    this.runs = this.parseRuns(config);
    if (!this.runs.length) throw new ConfigurationError("No valid shell configurations found");

    for (const run of this.runs) {
      let index = 0;
      for (const command of run.commands) await this.executeCommand(run, command, index++);

      if (run.scripts.length) {
        const dir = await mkdtemp(join(tmpdir(), "pipeline-shell-"));
        try {
          for (const script of run.scripts) {
            const path = await downloadResource(script.location, join(dir, script.file), { auth: script.auth });
            await this.executeCommand(run, `${script.type} ${quote(path)}`, index++);
          }
        } finally {
          await rm(dir, { recursive: true, force: true });
        }
      }
      this.state[run.name] = { commands: index };
    }
  }

  private async executeCommand(run: ShellRun, command: string, index: number): Promise<void> {
    this.createResource(`shell:command:${run.name}`, `command.${run.name}.${index}`, {
      command,
      shell_type: run.type,
      isolation: run.isolation ?? null,
      config_name: run.name
    });

    const container = run.isolation?.type === "container";
    this.logger.info(`Running ${container ? "in container" : "on host"}: ${command}`);
    const result = await runCommand(command, {
      shell: run.type,
      image: container ? run.isolation?.base_image ?? DEFAULT_BASE_IMAGE : undefined,
      timeoutMs: this.defaults.timeout_seconds * 1000
    });

    if (result.ok) {
      this.exportOutput(`${run.name}_output`, { command, output: result.stdout.trim(), exit_code: 0 });
      return;
    }
    this.exportOutput(`${run.name}_error`, { command, error: result.stderr, exit_code: result.exitCode });
    throw new ExtensionExecutionError(`Command failed in ${run.name}: ${command}`, this.name ?? "shell", {
      details: { exit_code: result.exitCode }
    });
  }
}
