/**
 * Raw Store interfaces
 */

import { RawStoreLocator, RawTable, RawTableName } from '../types/index.js';

/**
 * Read-only access to the extracted source tables
 */
export interface IRawStore {
  readonly uri: string;
  listTables(): Promise<RawTableName[]>;
  /** Resolves undefined when the table is not present */
  readTable(name: RawTableName): Promise<RawTable | undefined>;
}

/**
 * Opens a Raw Store from a locator
 */
export interface IRawStoreConnector {
  connect(locator: RawStoreLocator): Promise<IRawStore>;
}
