// src/program.ts
// Entry for `pulumi up` (see Pulumi.yaml). The returned map becomes the stack outputs.
import 'dotenv/config';
import { readSettings } from './config/env.js';
import { runPipelineFile } from './runner.js';

export default async function program(): Promise<Record<string, unknown>> {
  const settings = { ...readSettings(), backend: 'pulumi' as const };
  const summary = await runPipelineFile(settings.pipelinePath, { settings, writeArtifacts: false });
  return summary.backend.exportedValues();
}
