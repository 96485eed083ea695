// ──────────────────────────────────────────
// Modeling: ordered derivation stages
// ──────────────────────────────────────────

import type { Table, ValidationStats } from '../../shared/types';
import { validateAndDedupe } from './validation';
import { MetricsTransformer } from './transformers/metrics.transformer';
import { ClassificationTransformer } from './transformers/classification.transformer';
import { WindowTransformer } from './transformers/window.transformer';

export interface TableStage {
  name: string;
  run(table: Table): Table;
}

const metricsTransformer = new MetricsTransformer();
const classificationTransformer = new ClassificationTransformer();
const windowTransformer = new WindowTransformer();

/**
 * Runs after validation. Each stage sees only the table produced by the one
 * before it; window metrics need every derived column in place.
 */
export const DERIVATION_STAGES: readonly TableStage[] = [
  { name: 'metrics', run: (t) => metricsTransformer.transform(t) },
  { name: 'classification', run: (t) => classificationTransformer.transform(t) },
  { name: 'window', run: (t) => windowTransformer.transform(t) },
];

export function deriveFacts(raw: Table): { table: Table; stats: ValidationStats } {
  const { table: valid, stats } = validateAndDedupe(raw);
  const table = DERIVATION_STAGES.reduce((current, stage) => stage.run(current), valid);
  return { table, stats };
}
