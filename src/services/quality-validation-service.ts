/**
 * Quality Validation Engine
 *
 * Checks run against each stage's output. Checks only record issues; the
 * stage boundary turns fatal issues into a stage failure.
 */

import { PipelineConfig } from '../config/pipeline-config.js';
import {
  CanonicalCustomer,
  CleansedCustomer,
  CleansedProduct,
  CleansedSalesLine,
  DimCustomer,
  DimProduct,
  FactSalesLine,
  IssueKind,
  ProductVersion,
  ReconciledSalesLine,
  Severity,
  SourceRecord,
  UNRESOLVED
} from '../types/index.js';
import { IssueRecorder } from './quality-issue-log.js';

interface CheckTarget<T> {
  businessKeyOf?: (record: T) => string | null;
  rowOffsetOf?: (record: T) => number | undefined;
}

interface MeasureRow {
  orderNumber: string | null;
  lineNumber: number;
  amount: number | null;
  quantity: number | null;
  price: number | null;
  reconciliationStatus: ReconciledSalesLine['reconciliationStatus'];
}

const sourceRowOffset = (record: SourceRecord): number => record.rowOffset;

export class QualityValidationService {
  constructor(private readonly config: Pick<PipelineConfig, 'measureTolerance'>) {}

  // ==================== Generic Checks ====================

  checkNotNull<T extends object, K extends keyof T & string>(
    records: readonly T[],
    fields: readonly K[],
    issues: IssueRecorder,
    target: CheckTarget<T> = {},
    severity: Severity = 'warning'
  ): number {
    let violations = 0;
    for (const record of records) {
      for (const field of fields) {
        if (record[field] === null || record[field] === undefined) {
          violations++;
          this.report(issues, severity, 'not_null', 'completeness', `${field} is null`, record, target, field);
        }
      }
    }
    return violations;
  }

  checkUnwantedSpaces<T extends object, K extends keyof T & string>(
    records: readonly T[],
    fields: readonly K[],
    issues: IssueRecorder,
    target: CheckTarget<T> = {}
  ): number {
    let violations = 0;
    for (const record of records) {
      for (const field of fields) {
        const value = record[field];
        if (typeof value === 'string' && value !== value.trim()) {
          violations++;
          this.report(issues, 'warning', 'unwanted_spaces', 'format', `${field} has surrounding spaces`, record, target, field);
        }
      }
    }
    return violations;
  }

  /**
   * Fatal for every key shared by more than one record
   */
  checkUniqueness<T, K extends string | number>(
    records: readonly T[],
    keyOf: (record: T) => K | null,
    label: string,
    issues: IssueRecorder
  ): number {
    const counts = new Map<K, number>();
    for (const record of records) {
      const key = keyOf(record);
      if (key !== null) {
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }

    let collisions = 0;
    for (const [key, count] of counts) {
      if (count > 1) {
        collisions++;
        issues.fatal('key_uniqueness', 'uniqueness', `${label} ${key} occurs ${count} times`, {
          businessKey: String(key),
          field: label
        });
      }
    }
    return collisions;
  }

  checkMeasureConsistency(rows: readonly MeasureRow[], issues: IssueRecorder): number {
    let violations = 0;
    for (const row of rows) {
      if (row.reconciliationStatus === 'unrecoverable') {
        continue;
      }

      const { amount, quantity, price } = row;
      if (
        amount === null ||
        quantity === null ||
        price === null ||
        Math.abs(amount - quantity * Math.abs(price)) > this.config.measureTolerance
      ) {
        violations++;
        issues.warning(
          'measure_consistency',
          'consistency',
          `Line ${row.lineNumber} of order ${row.orderNumber}: amount ${amount} != ${quantity} * ${price}`,
          { businessKey: row.orderNumber, field: 'amount' }
        );
      }
    }
    return violations;
  }

  // ==================== After Cleansing ====================

  validateCleansedCustomers(customers: readonly CleansedCustomer[], issues: IssueRecorder): void {
    const target: CheckTarget<CleansedCustomer> = {
      businessKeyOf: customer => (customer.customerId === null ? null : String(customer.customerId)),
      rowOffsetOf: sourceRowOffset
    };
    this.checkNotNull(customers, ['customerId'], issues, target);
    this.checkUnwantedSpaces(customers, ['customerNumber', 'firstName', 'lastName'], issues, target);
  }

  validateCleansedProducts(products: readonly CleansedProduct[], issues: IssueRecorder): void {
    const target: CheckTarget<CleansedProduct> = {
      businessKeyOf: product => product.productKey,
      rowOffsetOf: sourceRowOffset
    };
    this.checkNotNull(products, ['productId', 'productKey'], issues, target);
    this.checkUnwantedSpaces(products, ['productKey', 'productName'], issues, target);
  }

  validateCleansedSales(lines: readonly CleansedSalesLine[], issues: IssueRecorder): void {
    const target: CheckTarget<CleansedSalesLine> = {
      businessKeyOf: line => line.orderNumber,
      rowOffsetOf: sourceRowOffset
    };
    this.checkNotNull(lines, ['orderNumber', 'productNumber', 'customerId'], issues, target);
    this.checkUnwantedSpaces(lines, ['orderNumber', 'productNumber'], issues, target);
  }

  // ==================== After Deduplication ====================

  validateCanonicalCustomers(customers: readonly CanonicalCustomer[], issues: IssueRecorder): void {
    this.checkUniqueness(customers, customer => customer.businessKey, 'customerId', issues);
  }

  validateCanonicalProducts(products: readonly CleansedProduct[], issues: IssueRecorder): void {
    this.checkUniqueness(products, product => product.productId, 'productId', issues);
  }

  // ==================== After Business Rules ====================

  /**
   * At most one open version per product number
   */
  validateProductVersions(versions: readonly ProductVersion[], issues: IssueRecorder): void {
    this.checkUniqueness(
      versions,
      version => (version.endDate === null ? version.productNumber : null),
      'open version of product',
      issues
    );
  }

  validateReconciledSales(lines: readonly ReconciledSalesLine[], issues: IssueRecorder): void {
    this.checkMeasureConsistency(lines, issues);
  }

  // ==================== After Assembly ====================

  validateCustomerDimension(rows: readonly DimCustomer[], issues: IssueRecorder): void {
    this.checkUniqueness(rows, row => row.customerKey, 'customerKey', issues);
    this.checkUniqueness(rows, row => row.customerId, 'customerId', issues);
  }

  validateProductDimension(rows: readonly DimProduct[], issues: IssueRecorder): void {
    this.checkUniqueness(rows, row => row.productKey, 'productKey', issues);
    this.checkUniqueness(rows, row => row.productNumber, 'productNumber', issues);
  }

  validateSalesFacts(
    facts: readonly FactSalesLine[],
    expectedLineCount: number,
    customerKeys: ReadonlySet<number>,
    productKeys: ReadonlySet<number>,
    issues: IssueRecorder
  ): void {
    if (facts.length !== expectedLineCount) {
      issues.fatal(
        'fact_grain',
        'structural',
        `Fact count ${facts.length} differs from sales line count ${expectedLineCount}`
      );
    }

    for (const fact of facts) {
      const details = { businessKey: fact.orderNumber };

      if (fact.customerKey !== UNRESOLVED && !customerKeys.has(fact.customerKey)) {
        issues.fatal(
          'referential_integrity',
          'referential',
          `Line ${fact.lineNumber} of order ${fact.orderNumber} references missing customer key ${fact.customerKey}`,
          { ...details, field: 'customerKey' }
        );
      }
      if (fact.productKey !== UNRESOLVED && !productKeys.has(fact.productKey)) {
        issues.fatal(
          'referential_integrity',
          'referential',
          `Line ${fact.lineNumber} of order ${fact.orderNumber} references missing product key ${fact.productKey}`,
          { ...details, field: 'productKey' }
        );
      }

      if (fact.orderDate !== null) {
        if (fact.shipDate !== null && fact.orderDate > fact.shipDate) {
          issues.warning('date_order', 'consistency', `Order ${fact.orderNumber} ships before it was ordered`, {
            ...details,
            field: 'shipDate'
          });
        }
        if (fact.dueDate !== null && fact.orderDate > fact.dueDate) {
          issues.warning('date_order', 'consistency', `Order ${fact.orderNumber} is due before it was ordered`, {
            ...details,
            field: 'dueDate'
          });
        }
      }
    }

    this.checkMeasureConsistency(facts, issues);
  }

  private report<T>(
    issues: IssueRecorder,
    severity: Severity,
    rule: string,
    kind: IssueKind,
    message: string,
    record: T,
    target: CheckTarget<T>,
    field: string
  ): void {
    const details = {
      businessKey: target.businessKeyOf ? target.businessKeyOf(record) : null,
      field,
      rowOffset: target.rowOffsetOf ? target.rowOffsetOf(record) : undefined
    };

    if (severity === 'fatal') {
      issues.fatal(rule, kind, message, details);
    } else if (severity === 'warning') {
      issues.warning(rule, kind, message, details);
    } else {
      issues.info(rule, kind, message, details);
    }
  }
}
