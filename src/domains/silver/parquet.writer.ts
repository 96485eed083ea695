// ──────────────────────────────────────────
// Silver: Parquet artifact writer
// ──────────────────────────────────────────

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { FactSink } from '../../shared/contracts';
import { WriteError, errorMessage } from '../../shared/errors';
import type { Cell, ColumnType, Table } from '../../shared/types';

type SchemaDefinition = ConstructorParameters<typeof ParquetSchema>[0];
type FieldDefinition = SchemaDefinition[string];

const FIELD_TYPES: Record<ColumnType, FieldDefinition> = {
  int: { type: 'INT64', optional: true, compression: 'GZIP' },
  float: { type: 'DOUBLE', optional: true, compression: 'GZIP' },
  bool: { type: 'BOOLEAN', optional: true, compression: 'GZIP' },
  string: { type: 'UTF8', optional: true, compression: 'GZIP' },
};

export function schemaFor(table: Table): InstanceType<typeof ParquetSchema> {
  const definition: SchemaDefinition = {};
  for (const column of table.columns) {
    definition[column.name] = { ...FIELD_TYPES[column.type] };
  }
  return new ParquetSchema(definition);
}

/**
 * Writes `table` to `destination`. Rows go to a hidden temp file in the same
 * directory which is renamed into place once closed, so readers never observe
 * a partial artifact.
 */
export async function writeParquetTable(table: Table, destination: string): Promise<void> {
  const dir = path.dirname(destination);
  const tmpPath = path.join(dir, `.${path.basename(destination)}.${uuidv4()}.tmp`);

  let dirReady = false;
  try {
    await fs.mkdir(dir, { recursive: true });
    dirReady = true;
    const writer = await ParquetWriter.openFile(schemaFor(table), tmpPath);
    try {
      for (const row of table.rows) {
        const record: Record<string, Exclude<Cell, null>> = {};
        for (const column of table.columns) {
          const value = row[column.name];
          if (value !== null && value !== undefined) record[column.name] = value;
        }
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }
    await fs.rename(tmpPath, destination);
  } catch (err) {
    if (dirReady) await fs.rm(tmpPath, { force: true });
    throw new WriteError(`Cannot write ${destination}: ${errorMessage(err)}`, { cause: err });
  }
}

export class ParquetFactWriter implements FactSink {
  async write(table: Table, destination: string): Promise<void> {
    await writeParquetTable(table, destination);
  }
}
