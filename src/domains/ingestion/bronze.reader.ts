// ──────────────────────────────────────────
// Ingestion: Bronze CSV reader
// ──────────────────────────────────────────

import fs from 'fs/promises';
import iconv from 'iconv-lite';
import { parse } from 'csv-parse/sync';
import { IngestError, errorMessage } from '../../shared/errors';
import type { Cell, ColumnDef, ColumnType, Row, Table } from '../../shared/types';

const INT_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const BOOL_PATTERN = /^(true|false)$/i;

export const DEFAULT_ENCODING = 'windows-1252';

/**
 * Reads a delimited Bronze file into a typed table. The first line is the header.
 * No schema checks happen here; downstream stages own correctness.
 */
export async function readBronzeTable(filePath: string, encoding: string = DEFAULT_ENCODING): Promise<Table> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    throw new IngestError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseBronzeBuffer(buffer, encoding);
}

export function parseBronzeBuffer(buffer: Buffer, encoding: string = DEFAULT_ENCODING): Table {
  if (!iconv.encodingExists(encoding)) {
    throw new IngestError(`Unsupported encoding: ${encoding}`);
  }
  const text = iconv.decode(buffer, encoding);
  // Single-byte code pages decode undefined bytes to U+FFFD
  const badIndex = text.indexOf('�');
  if (badIndex >= 0) {
    throw new IngestError(`Byte at offset ${badIndex} is not valid ${encoding}`);
  }

  let records: string[][];
  try {
    records = parse(text, { skip_empty_lines: true });
  } catch (err) {
    throw new IngestError(`Malformed delimited text: ${errorMessage(err)}`, { cause: err });
  }

  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new IngestError('Source has no header line');
  }
  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) throw new IngestError(`Duplicate column in header: ${name}`);
    seen.add(name);
  }

  const columns: ColumnDef[] = header.map((name, i) => ({
    name,
    type: inferColumnType(body.map((r) => r[i])),
  }));

  const rows: Row[] = body.map((record) => {
    const row: Record<string, Cell> = {};
    columns.forEach((col, i) => {
      row[col.name] = toCell(record[i], col.type);
    });
    return row;
  });

  return { columns, rows };
}

export function inferColumnType(values: readonly (string | undefined)[]): ColumnType {
  const present = values.filter((v): v is string => v !== undefined && v !== '');
  if (present.length === 0) return 'string';
  if (present.every((v) => INT_PATTERN.test(v))) {
    return present.every((v) => Number.isSafeInteger(Number(v))) ? 'int' : 'string';
  }
  if (present.every((v) => FLOAT_PATTERN.test(v))) return 'float';
  if (present.every((v) => BOOL_PATTERN.test(v))) return 'bool';
  return 'string';
}

function toCell(raw: string | undefined, type: ColumnType): Cell {
  if (raw === undefined || raw === '') return null;
  switch (type) {
    case 'int':
    case 'float':
      return Number(raw);
    case 'bool':
      return raw.toLowerCase() === 'true';
    case 'string':
      return raw;
  }
}
