#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runPathPipeline } from './pipeline.js';

interface CLIArgs {
  script: string;
  out: string;
  step?: string;
  diagnostics: boolean;
  derivative: boolean;
  debug: boolean;
}

async function main() {
  const argv: CLIArgs = await yargs(hideBin(process.argv))
    .scriptName('campath')
    .usage('$0 --script <path.yaml> --out <dir>')
    .option('script', { type: 'string', demandOption: true, describe: 'YAML path script (start + moves)' })
    .option('out', { type: 'string', demandOption: true, describe: 'Output directory' })
    .option('step', { type: 'string', describe: 'Resampling step for timed paths, e.g. 6h or 1d' })
    .option('diagnostics', { type: 'boolean', default: false, describe: 'Also write original vs resampled series' })
    .option('derivative', { type: 'boolean', default: false, describe: 'Diagnostics as rates of change' })
    .option('debug', { type: 'boolean', default: false })
    .strict()
    .parse();

  console.log('Computing camera path...');
  const result = runPathPipeline({
    scriptPath: argv.script,
    outDir: argv.out,
    step: argv.step,
    diagnostics: argv.diagnostics,
    derivative: argv.derivative,
    debug: argv.debug,
  });
  console.log('Artifacts written:', result);
}

main().catch((err) => {
  console.error('[campath]', err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
