import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { runPathPipeline, type PathDocument } from '../src/pipeline.js';

// Compute the bundled example paths and print a short summary of each
async function main() {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const pathsDir = path.join(__dirname, '..', 'paths');
  const outRoot = path.resolve('campath_out', 'preview_' + Date.now());

  for (const file of fs.readdirSync(pathsDir).filter((f) => f.endsWith('.yaml'))) {
    const outDir = path.join(outRoot, path.basename(file, '.yaml'));
    const result = runPathPipeline({ scriptPath: path.join(pathsDir, file), outDir, diagnostics: true });
    const doc: PathDocument = JSON.parse(fs.readFileSync(result.pathFile, 'utf8'));
    const peak = doc.frames.reduce((max, f) => Math.max(max, f.speed), 0);
    console.log(`[preview] ${doc.name}: ${result.frameCount} frames, peak speed ${peak.toFixed(3)} ${doc.speedUnit}`);
  }
  console.log('[preview] artifacts in', outRoot);
}

main().catch((e) => {
  console.error('[preview] error', e);
  process.exit(1);
});
