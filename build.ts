import * as esbuild from 'esbuild';
import * as fs from 'node:fs';
import * as path from 'node:path';

const ENTRY = path.join('src', 'index.ts');
const OUT_FILE = path.join('dist', 'bundle', 'unix-ts.mjs');

if (!fs.existsSync(ENTRY)) {
  console.log(`No entry point at ${ENTRY}. Skipping bundle.`);
  process.exit(0);
}

console.log(`Bundling ${ENTRY} → ${OUT_FILE}`);

await esbuild.build({
  entryPoints: [ENTRY],
  bundle: true,
  platform: 'node',
  format: 'esm',
  outfile: OUT_FILE,
  external: ['js-yaml', 'temporal-polyfill'],
  target: 'node20',
  sourcemap: true,
  minify: false,
  logLevel: 'info',
});

console.log('Bundle complete.');
