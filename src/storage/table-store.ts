/**
 * Keyed table persistence — one JSON document per table.
 *
 * JsonFileTableStore keeps data/<table>.json with atomic writes
 * (tmp + rename). InMemoryTableStore backs tests and dry runs.
 */

import fs from "fs";
import path from "path";

export interface TableStore {
  /** Parsed JSON content of the table, or null if it does not exist */
  read(table: string): unknown;
  write(table: string, content: unknown): void;
}

const TABLE_NAME = /^[a-z][a-z0-9_-]*$/;

function assertTableName(table: string): void {
  if (!TABLE_NAME.test(table)) {
    throw new Error(`Invalid table name: ${table}`);
  }
}

export class JsonFileTableStore implements TableStore {
  constructor(readonly dir: string) {}

  pathFor(table: string): string {
    assertTableName(table);
    return path.join(this.dir, `${table}.json`);
  }

  read(table: string): unknown {
    const file = this.pathFor(table);
    if (!fs.existsSync(file)) return null;
    // Parse errors propagate: a corrupt table is not the same as a missing one
    return JSON.parse(fs.readFileSync(file, "utf-8"));
  }

  write(table: string, content: unknown): void {
    const file = this.pathFor(table);
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
    const tmpFile = file + ".tmp";
    fs.writeFileSync(tmpFile, JSON.stringify(content, null, 2), "utf-8");
    fs.renameSync(tmpFile, file);
  }
}

export class InMemoryTableStore implements TableStore {
  private readonly tables = new Map<string, string>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [table, content] of Object.entries(initial)) this.write(table, content);
  }

  read(table: string): unknown {
    assertTableName(table);
    const raw = this.tables.get(table);
    return raw === undefined ? null : JSON.parse(raw);
  }

  write(table: string, content: unknown): void {
    assertTableName(table);
    // Stored serialized so callers never share references with the store
    this.tables.set(table, JSON.stringify(content));
  }

  has(table: string): boolean {
    return this.tables.has(table);
  }
}
