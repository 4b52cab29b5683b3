import { readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import {
  VILLAGE_FIELDS,
  villageColumns,
  villageCsvRowSchema,
  villageToCsvRow,
  type Village,
} from '@shared/schema';
import { errorMessage, type Logger } from './logger';
import { mergeAll } from './services/duplicate-detector';
import { withLeadScore } from './services/lead-scorer';

export interface SaveOptions {
  /** Merge with the rows already in the file (default). `false` rewrites from scratch. */
  append?: boolean;
}

export interface IVillageStorage {
  load(): Promise<Village[]>;
  save(villages: readonly Village[], options?: SaveOptions): Promise<Village[]>;
}

/**
 * The existing output file cannot be read as a village table.
 */
export class CsvReadError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Cannot read ${filePath}: ${errorMessage(cause)}`);
    this.name = 'CsvReadError';
  }
}

const HEADERS = VILLAGE_FIELDS.map(field => villageColumns[field]);
const rowsSchema = z.array(villageCsvRowSchema);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function serializeVillages(villages: readonly Village[]): string {
  return stringify(villages.map(villageToCsvRow), {
    header: true,
    bom: true,
    columns: HEADERS,
  });
}

/**
 * Parses the persisted table. The header must carry at least the village name column.
 */
export function parseVillages(content: string): Village[] {
  const rows: unknown = parse(content, {
    bom: true,
    columns: (header: string[]) => {
      const columns = header.map(column => column.trim());
      if (!columns.includes(villageColumns.name)) {
        throw new Error(`missing column "${villageColumns.name}"`);
      }
      return columns;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return rowsSchema.parse(rows);
}

function byId(a: Village, b: Village): number {
  return (a.id ?? Number.MAX_SAFE_INTEGER) - (b.id ?? Number.MAX_SAFE_INTEGER);
}

/**
 * CSV-backed village table. The file only grows: every save merges the new batch
 * into the persisted rows and rewrites the whole file.
 */
export class VillageCsvStorage implements IVillageStorage {
  constructor(private readonly filePath: string, private readonly logger: Logger) {}

  async load(): Promise<Village[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new CsvReadError(this.filePath, error);
    }

    try {
      return parseVillages(content);
    } catch (error) {
      throw new CsvReadError(this.filePath, error);
    }
  }

  async save(villages: readonly Village[], options: SaveOptions = {}): Promise<Village[]> {
    const append = options.append ?? true;

    let existing: Village[] = [];
    if (append) {
      try {
        existing = await this.load();
      } catch (error) {
        const sidecar = await this.writeSidecar(villages);
        this.logger.error(`❌ ${errorMessage(error)}. File left untouched, new batch written to ${sidecar}`);
        throw error;
      }
    }

    const { kept, incoming } = this.assignIds(existing, villages);
    const merged = mergeAll([...kept, ...incoming])
      .map(withLeadScore)
      .sort(byId);

    await this.writeAtomic(this.filePath, serializeVillages(merged));

    this.logger.info(
      `💾 Saved ${merged.length} villages to ${this.filePath} ` +
      `(${existing.length} existing, ${villages.length} new before merge)`
    );
    return merged;
  }

  /**
   * Persisted ids stay. New records keep theirs only when it is unused and above
   * every id seen so far, otherwise they get the next one. Rows that lost their id get one too.
   */
  private assignIds(existing: readonly Village[], villages: readonly Village[]): { kept: Village[]; incoming: Village[] } {
    const used = new Set<number>();
    let maxId = 0;
    for (const village of existing) {
      if (village.id === null) continue;
      used.add(village.id);
      maxId = Math.max(maxId, village.id);
    }

    const kept = existing.map(village => {
      if (village.id !== null) return village;
      maxId++;
      used.add(maxId);
      return { ...village, id: maxId };
    });

    const incoming = villages.map(village => {
      let id = village.id;
      if (id === null || used.has(id) || id <= maxId) {
        id = maxId + 1;
      }
      used.add(id);
      maxId = id;
      return { ...village, id };
    });

    return { kept, incoming };
  }

  private async writeSidecar(villages: readonly Village[]): Promise<string> {
    const { dir, name } = path.parse(this.filePath);
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const sidecar = path.join(dir, `${name}.unsaved-${stamp}.csv`);
    await writeFile(sidecar, serializeVillages(villages.map(withLeadScore)), 'utf8');
    return sidecar;
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    const tmp = `${filePath}.tmp`;
    await writeFile(tmp, content, 'utf8');
    await rename(tmp, filePath);
  }
}
