// ──────────────────────────────────────────
// Script: process every pending Bronze file once,
// or a single file with --file/--out
// ──────────────────────────────────────────
// Usage: tsx scripts/run-batch.ts [--file=path.csv --out=path.parquet] [--load]

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { closeDb } from '../src/db/connection';
import { loadConfig } from '../src/shared/config';
import { createServices } from '../src/container';

function argValue(name: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : null;
}

async function runBatch() {
  const config = loadConfig(process.env);
  const { coordinator, warehouse } = createServices(config);

  const file = argValue('file');
  let summary;
  if (file) {
    const source = path.resolve(file);
    const out = argValue('out') ?? path.join(config.paths.silverRoot, `${path.parse(source).name}_Silver.parquet`);
    summary = await coordinator.runSingle(source, path.resolve(out));
  } else {
    summary = await coordinator.run();
  }

  for (const outcome of summary.files) {
    const name = path.basename(outcome.file);
    if (outcome.status === 'archived') {
      console.log(`  ✓ ${name} → ${path.basename(outcome.outputPath)} (${outcome.stats.outputRows} rows)`);
    } else {
      console.log(`  ✗ ${name}: ${outcome.failure.kind}: ${outcome.failure.message}`);
    }
  }

  if (process.argv.includes('--load')) {
    if (!warehouse) {
      console.warn('[Batch] --load needs DATABASE_URL; skipping warehouse load');
    } else {
      await warehouse.factLoader.run();
    }
  }

  await closeDb();
  process.exit(summary.skipped > 0 ? 2 : 0);
}

runBatch().catch((err) => {
  console.error('[Batch] Error:', err);
  process.exit(1);
});
