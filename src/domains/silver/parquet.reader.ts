// ──────────────────────────────────────────
// Silver: Parquet artifact reader
// ──────────────────────────────────────────

import { ParquetReader } from '@dsnp/parquetjs';
import type { Cell, ColumnDef, ColumnType, Row, Table } from '../../shared/types';

function columnTypeOf(primitiveType: string | undefined): ColumnType {
  switch (primitiveType) {
    case 'BOOLEAN':
      return 'bool';
    case 'INT32':
    case 'INT64':
      return 'int';
    case 'FLOAT':
    case 'DOUBLE':
      return 'float';
    default:
      return 'string';
  }
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Reads a flat Parquet file into a table; absent optional values become null. */
export async function readParquetTable(filePath: string): Promise<Table> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const columns: ColumnDef[] = Object.entries(reader.schema.fields).map(([name, field]) => ({
      name,
      type: columnTypeOf(field.primitiveType),
    }));

    const rows: Row[] = [];
    const cursor = reader.getCursor();
    let record: unknown;
    while ((record = await cursor.next())) {
      if (!isRecord(record)) continue;
      const row: Record<string, Cell> = {};
      for (const column of columns) {
        row[column.name] = toCell(record[column.name]);
      }
      rows.push(row);
    }
    return { columns, rows };
  } finally {
    await reader.close();
  }
}
