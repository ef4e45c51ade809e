import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export function saveArtifact(runId: string, fileName: string, content: string, baseDir = "runs") {
  const dir = join(baseDir, runId);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, "utf-8");
  return path;
}

export function writeJson(runId: string, fileName: string, obj: unknown, baseDir?: string) {
  return saveArtifact(runId, fileName, JSON.stringify(obj, null, 2), baseDir);
}
