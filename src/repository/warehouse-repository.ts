/**
 * Warehouse Repository
 * Holds the published star schema, the run lock and the staging area a run
 * rebuilds into before its output is swapped in.
 */

import {
  DimCustomer,
  DimProduct,
  DimensionName,
  FactSalesLine,
  KeyAssignmentTable,
  PipelineError,
  ErrorKind,
  PublishReport,
  RunLockError,
  WarehouseSnapshot,
  WarehouseTableName
} from '../types/index.js';

/**
 * Rows of each published table
 */
export interface WarehouseRows {
  dim_customer: DimCustomer[];
  dim_product: DimProduct[];
  fact_sales_line: FactSalesLine[];
}

/**
 * Interface for the Warehouse Repository
 */
export interface IWarehouseRepository {
  // Run lock
  acquireRunLock(runId: string): void;
  releaseRunLock(runId: string): void;
  getLockHolder(): string | null;

  // Staging
  beginStaging(runId: string): void;
  stageTable<K extends WarehouseTableName>(runId: string, table: K, rows: WarehouseRows[K]): void;
  stageKeyAssignments(runId: string, dimension: DimensionName, assignments: KeyAssignmentTable): void;
  commitStaging(runId: string): PublishReport;
  discardStaging(runId: string): void;
  hasStaging(runId: string): boolean;

  // Published state
  getSnapshot(): WarehouseSnapshot;
  getKeyAssignments(dimension: DimensionName): KeyAssignmentTable;
}

interface StagingArea {
  runId: string;
  tables: Partial<WarehouseRows>;
  keyAssignments: Partial<Record<DimensionName, KeyAssignmentTable>>;
}

const TABLE_ORDER: WarehouseTableName[] = ['dim_customer', 'dim_product', 'fact_sales_line'];

function freezeRows<T extends object>(rows: readonly T[]): readonly T[] {
  return Object.freeze(
    rows.map(row => {
      const copy = { ...row };
      Object.freeze(copy);
      return copy;
    })
  );
}

function emptySnapshot(): WarehouseSnapshot {
  return Object.freeze({
    version: 0,
    runId: null,
    publishedAt: null,
    dimCustomer: Object.freeze([]),
    dimProduct: Object.freeze([]),
    factSalesLine: Object.freeze([]),
    keyAssignments: {
      dim_customer: new Map(),
      dim_product: new Map()
    }
  });
}

/**
 * In-memory implementation of the Warehouse Repository
 */
export class InMemoryWarehouseRepository implements IWarehouseRepository {
  private snapshot: WarehouseSnapshot = emptySnapshot();
  private lockHolder: string | null = null;
  private staging: StagingArea | null = null;

  // Run lock
  acquireRunLock(runId: string): void {
    if (this.lockHolder !== null) {
      throw new RunLockError(runId, this.lockHolder);
    }
    this.lockHolder = runId;
  }

  releaseRunLock(runId: string): void {
    if (this.lockHolder !== runId) {
      return;
    }
    if (this.staging?.runId === runId) {
      this.staging = null;
    }
    this.lockHolder = null;
  }

  getLockHolder(): string | null {
    return this.lockHolder;
  }

  // Staging
  beginStaging(runId: string): void {
    this.assertLockHeld(runId);
    this.staging = { runId, tables: {}, keyAssignments: {} };
  }

  stageTable<K extends WarehouseTableName>(runId: string, table: K, rows: WarehouseRows[K]): void {
    this.stagingFor(runId).tables[table] = rows;
  }

  stageKeyAssignments(runId: string, dimension: DimensionName, assignments: KeyAssignmentTable): void {
    this.stagingFor(runId).keyAssignments[dimension] = new Map(assignments);
  }

  /**
   * Publish staged tables as a new snapshot; unstaged tables carry over.
   * Published rows are frozen copies of what was staged.
   */
  commitStaging(runId: string): PublishReport {
    const staging = this.stagingFor(runId);
    const tables = TABLE_ORDER.filter(table => staging.tables[table] !== undefined);
    const previous = this.snapshot;
    this.staging = null;

    if (tables.length === 0) {
      return { committed: false, tables: [], version: previous.version };
    }

    this.snapshot = Object.freeze({
      version: previous.version + 1,
      runId,
      publishedAt: new Date(),
      dimCustomer: staging.tables.dim_customer ? freezeRows(staging.tables.dim_customer) : previous.dimCustomer,
      dimProduct: staging.tables.dim_product ? freezeRows(staging.tables.dim_product) : previous.dimProduct,
      factSalesLine: staging.tables.fact_sales_line
        ? freezeRows(staging.tables.fact_sales_line)
        : previous.factSalesLine,
      keyAssignments: {
        dim_customer: staging.keyAssignments.dim_customer ?? previous.keyAssignments.dim_customer,
        dim_product: staging.keyAssignments.dim_product ?? previous.keyAssignments.dim_product
      }
    });

    return { committed: true, tables, version: this.snapshot.version };
  }

  discardStaging(runId: string): void {
    if (this.staging?.runId === runId) {
      this.staging = null;
    }
  }

  hasStaging(runId: string): boolean {
    return this.staging?.runId === runId;
  }

  // Published state
  getSnapshot(): WarehouseSnapshot {
    return Object.freeze({
      ...this.snapshot,
      keyAssignments: {
        dim_customer: this.getKeyAssignments('dim_customer'),
        dim_product: this.getKeyAssignments('dim_product')
      }
    });
  }

  getKeyAssignments(dimension: DimensionName): KeyAssignmentTable {
    return new Map(this.snapshot.keyAssignments[dimension]);
  }

  private assertLockHeld(runId: string): void {
    if (this.lockHolder !== runId) {
      throw new RunLockError(runId, this.lockHolder ?? 'nobody');
    }
  }

  private stagingFor(runId: string): StagingArea {
    this.assertLockHeld(runId);
    const staging = this.staging;
    if (staging === null || staging.runId !== runId) {
      throw new PipelineError(`Run ${runId} has no open staging area`, ErrorKind.STRUCTURAL);
    }
    return staging;
  }
}
