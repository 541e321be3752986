/**
 * Table Store Module
 *
 * Persists tables as CSV files. Files are written UTF-8 with a byte-order
 * mark so spreadsheet tools keep the Hebrew text intact.
 *
 * Appending is a whole-file rewrite: existing rows are read, the new rows
 * concatenated, and the file written again in canonical column order
 * followed by any columns the caller did not anticipate.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { StoreError, toError } from '../errors/index.js';
import type { Logger } from '../core/logger.js';

export type CellValue = string | number | null;
export type TableRow = Record<string, CellValue | undefined>;

const BOM = '\uFEFF';

export interface TableStore {
  /** Reads a table, or null when the file does not exist */
  load(filePath: string): Promise<TableRow[] | null>;
  /** Replaces a table */
  save(rows: readonly TableRow[], filePath: string, columns?: readonly string[]): Promise<void>;
  /** Adds rows to a table, creating it if needed */
  append(rows: readonly TableRow[], filePath: string, columns?: readonly string[]): Promise<void>;
  /** File size in bytes, or null when the file does not exist */
  sizeOf(filePath: string): Promise<number | null>;
}

function isBlankCell(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
    || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Resolves the written column order
 *
 * Canonical columns come first (those present in the rows), then the rest in
 * first-seen order. Columns that are blank in every row are dropped.
 */
export function orderColumns(rows: readonly TableRow[], columns: readonly string[] = []): string[] {
  const seen: string[] = [];
  const known = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!known.has(key)) {
        known.add(key);
        seen.push(key);
      }
    }
  }

  const populated = new Set(seen.filter(col => rows.some(row => !isBlankCell(row[col]))));
  const canonical = columns.filter(col => populated.has(col));
  const canonicalSet = new Set(canonical);
  const extra = seen.filter(col => populated.has(col) && !canonicalSet.has(col));
  return [...canonical, ...extra];
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
  return value;
}

/**
 * Serializes rows to CSV text (with BOM)
 */
export function serializeTable(rows: readonly TableRow[], columns?: readonly string[]): string {
  const fields = orderColumns(rows, columns);
  const data = rows.map(row => fields.map(field => formatCell(row[field])));
  return BOM + Papa.unparse({ fields, data }, { newline: '\n' }) + '\n';
}

/**
 * Parses CSV text into rows of strings
 *
 * @throws StoreError when the text has no header row
 */
export function parseTable(text: string, filePath: string): TableRow[] {
  const body = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  if (body.trim() === '') return [];

  const result = Papa.parse<Record<string, string>>(body, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true
  });
  if (!result.meta.fields || result.meta.fields.length === 0) {
    throw new StoreError(`No header row in ${filePath}`, 'load', filePath);
  }
  return result.data;
}

/**
 * Store logic shared by every backing medium; subclasses move the text
 */
export abstract class TextTableStore implements TableStore {
  constructor(protected readonly logger: Logger) {}

  protected abstract readText(filePath: string): Promise<string | null>;
  protected abstract writeText(filePath: string, text: string): Promise<void>;
  abstract sizeOf(filePath: string): Promise<number | null>;

  async load(filePath: string): Promise<TableRow[] | null> {
    const text = await this.readText(filePath);
    return text === null ? null : parseTable(text, filePath);
  }

  async save(rows: readonly TableRow[], filePath: string, columns?: readonly string[]): Promise<void> {
    await this.writeText(filePath, serializeTable(rows, columns));
  }

  /**
   * Adds rows to a table, creating it when absent
   *
   * @throws StoreError when an existing table cannot be read; it is left untouched
   */
  async append(rows: readonly TableRow[], filePath: string, columns?: readonly string[]): Promise<void> {
    const existing = await this.load(filePath);
    if (existing === null) this.logger.info({ filePath }, 'Creating new table');
    await this.save([...(existing ?? []), ...rows], filePath, columns);
  }
}

/**
 * CSV files on the local filesystem
 */
export class CsvTableStore extends TextTableStore {
  protected async readText(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      const error = toError(err);
      throw new StoreError(`Failed to read ${filePath}: ${error.message}`, 'load', filePath, error);
    }
  }

  protected async writeText(filePath: string, text: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, text, 'utf8');
    } catch (err) {
      const error = toError(err);
      this.logger.error({ err, filePath }, 'Failed to write table');
      throw new StoreError(`Failed to write ${filePath}: ${error.message}`, 'save', filePath, error);
    }
  }

  async sizeOf(filePath: string): Promise<number | null> {
    try {
      const stat = await fs.stat(filePath);
      return stat.size;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StoreError(`Failed to stat ${filePath}`, 'stat', filePath, toError(err));
    }
  }
}
