/**
 * Where normalized tables come from. The parsers that turn device output into
 * tables live outside this repository; they drop one JSON file per section
 * into the spool directory: <spoolDir>/<host>/<section>.json, each holding
 * an array of rows of strings.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, basename, extname } from 'node:path';
import { z } from 'zod';
import type { HostTables } from './types.js';

export interface TableSource {
  fetchTables(host: string): Promise<HostTables>;
}

const tableSchema = z.array(z.array(z.string()));

export class SpoolTableSource implements TableSource {
  constructor(private readonly spoolDir: string) {}

  async fetchTables(host: string): Promise<HostTables> {
    const dir = join(this.spoolDir, host);

    let files: string[];
    try {
      files = await readdir(dir);
    } catch (err) {
      console.warn(`[Spool] No data for ${host} in ${dir}:`, err instanceof Error ? err.message : err);
      return {};
    }

    const tables: HostTables = {};
    for (const file of files.filter((f) => extname(f) === '.json')) {
      const section = basename(file, '.json');
      try {
        const raw: unknown = JSON.parse(await readFile(join(dir, file), 'utf-8'));
        tables[section] = tableSchema.parse(raw);
      } catch (err) {
        console.warn(`[Spool] Skipping unreadable section ${host}/${section}:`, err instanceof Error ? err.message : err);
      }
    }
    return tables;
  }
}
