#!/usr/bin/env node
import 'dotenv/config';
import { resolve } from 'node:path';
import { readSettings } from './config/env.js';
import { runPipelineFile } from './runner.js';

function arg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.startsWith(name + '=')) return val.slice(name.length + 1);
  return process.argv[ix + 1] ?? fallback;
}

async function main() {
  const settings = readSettings();
  const pipelinePath = resolve(process.cwd(), arg('--pipeline') ?? settings.pipelinePath);
  const runId = arg('--run-id');

  const summary = await runPipelineFile(pipelinePath, { settings: runId ? { ...settings, runId } : settings });

  if (summary.backend.mode === 'mock') {
    console.log('\nPipeline Output:');
    console.log(JSON.stringify(summary.outputs, null, 2));
    for (const path of summary.artifacts) console.log(`[artifact] ${path}`);
  }
}

main().catch(err => {
  console.error('[fatal]', err);
  process.exit(1);
});
