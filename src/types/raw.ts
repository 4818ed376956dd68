/**
 * Raw Store types: tables loaded verbatim from the source extracts
 */

import { RawTableName } from './common.js';

/**
 * A single extracted value, untouched
 */
export type RawValue = string | number | null;

export type RawRow = Readonly<Record<string, RawValue>>;

/**
 * Table-like structure materialized by the Raw Store
 */
export interface RawTable {
  name: RawTableName;
  columns: readonly string[];
  rows: readonly RawRow[];
}

/**
 * Credentials handed through to the Raw Store connector
 */
export interface RawStoreCredentials {
  username?: string;
  secret?: string;
}

/**
 * Pointer to a Raw Store location
 * Supported schemes: memory://<dataset>, file://<directory>
 */
export interface RawStoreLocator {
  uri: string;
  credentials?: RawStoreCredentials;
}
