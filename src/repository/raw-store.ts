/**
 * Raw Store implementations and the connector resolving locators to them
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { isRawTableName } from '../config/source-schemas.js';
import { IRawStore, IRawStoreConnector } from '../interfaces/stores.js';
import {
  RawStoreAccessError,
  RawStoreLocator,
  RawTable,
  RawTableName,
  StructuralError
} from '../types/index.js';

const rawValueSchema = z.union([z.string(), z.number(), z.null()]);

export const rawTableFileSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(rawValueSchema))
});

/**
 * Tables held in process memory
 */
export class InMemoryRawStore implements IRawStore {
  private tables: Map<RawTableName, RawTable> = new Map();

  constructor(tables: readonly RawTable[] = [], public readonly uri: string = 'memory://local') {
    for (const table of tables) {
      this.tables.set(table.name, table);
    }
  }

  async listTables(): Promise<RawTableName[]> {
    return Array.from(this.tables.keys());
  }

  async readTable(name: RawTableName): Promise<RawTable | undefined> {
    return this.tables.get(name);
  }
}

/**
 * One `<table>.json` file per table in a directory
 */
export class FileRawStore implements IRawStore {
  constructor(
    private readonly directory: string,
    public readonly uri: string = `file://${directory}`
  ) {}

  async listTables(): Promise<RawTableName[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      throw new RawStoreAccessError(this.uri, `Cannot list ${this.directory}: ${messageOf(error)}`);
    }

    return entries
      .filter(entry => entry.endsWith('.json'))
      .map(entry => entry.slice(0, -'.json'.length))
      .filter(isRawTableName)
      .sort();
  }

  async readTable(name: RawTableName): Promise<RawTable | undefined> {
    const path = join(this.directory, `${name}.json`);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new RawStoreAccessError(this.uri, `Cannot read ${path}: ${messageOf(error)}`);
    }

    let content: unknown;
    try {
      content = JSON.parse(text);
    } catch (error) {
      throw new StructuralError(name, `${path} is not valid JSON: ${messageOf(error)}`);
    }

    const parsed = rawTableFileSchema.safeParse(content);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new StructuralError(name, `${path} has an invalid table layout: ${problems.join('; ')}`);
    }

    return { name, columns: parsed.data.columns, rows: parsed.data.rows };
  }
}

// ==================== Connector ====================

interface RegisteredDataset {
  tables: RawTable[];
  secret?: string;
}

export interface RegisterDatasetOptions {
  /** Connections must present this value as credentials.secret */
  secret?: string;
}

const LOCATOR_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(.+)$/i;

/**
 * Resolves `memory://<dataset>` and `file://<directory>` locators
 */
export class RawStoreConnector implements IRawStoreConnector {
  private datasets: Map<string, RegisteredDataset> = new Map();

  registerDataset(name: string, tables: readonly RawTable[], options: RegisterDatasetOptions = {}): void {
    this.datasets.set(name, { tables: [...tables], secret: options.secret });
  }

  unregisterDataset(name: string): boolean {
    return this.datasets.delete(name);
  }

  async connect(locator: RawStoreLocator): Promise<IRawStore> {
    const match = LOCATOR_PATTERN.exec(locator.uri);
    if (!match) {
      throw new RawStoreAccessError(locator.uri, `Malformed raw store locator: ${locator.uri}`);
    }

    const scheme = match[1].toLowerCase();
    const target = match[2];

    switch (scheme) {
      case 'memory':
        return this.connectMemory(locator, target);
      case 'file':
        return this.connectFile(locator, target);
      default:
        throw new RawStoreAccessError(locator.uri, `Unsupported raw store scheme: ${scheme}`);
    }
  }

  private connectMemory(locator: RawStoreLocator, name: string): IRawStore {
    const dataset = this.datasets.get(name);
    if (!dataset) {
      throw new RawStoreAccessError(locator.uri, `Unknown dataset: ${name}`);
    }
    if (dataset.secret !== undefined && locator.credentials?.secret !== dataset.secret) {
      throw new RawStoreAccessError(locator.uri, `Access to dataset ${name} denied`);
    }
    return new InMemoryRawStore(dataset.tables, locator.uri);
  }

  private async connectFile(locator: RawStoreLocator, directory: string): Promise<IRawStore> {
    const store = new FileRawStore(directory, locator.uri);
    await store.listTables();
    return store;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
