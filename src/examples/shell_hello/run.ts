import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { readSettings } from '../../config/env.js';
import { runPipelineFile } from '../../runner.js';

async function main() {
  const pipelinePath = fileURLToPath(new URL('./pipeline.yaml', import.meta.url));
  const summary = await runPipelineFile(pipelinePath, { settings: { ...readSettings(), backend: 'mock' } });
  console.log(JSON.stringify({ states: summary.states, outputs: summary.outputs }, null, 2));
}

main().catch(e => { console.error(e); process.exit(1); });
