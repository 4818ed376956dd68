/**
 * Business Rule Engine
 *
 * Derives attributes the sources do not carry directly: product category
 * and number from the product key, validity windows across product versions,
 * and consistent sales measures.
 */

import { PipelineConfig } from '../config/pipeline-config.js';
import {
  CanonicalProduct,
  CleansedProduct,
  CleansedSalesLine,
  ProductVersion,
  ReconciledSalesLine,
  ReconciliationStatus,
  StructuralError
} from '../types/index.js';
import { addDays, compareNullableDates } from '../utils/dates.js';
import { IssueRecorder } from './quality-issue-log.js';

export interface ParsedProductKey {
  categoryCode: string;
  subcategoryCode: string;
  categoryId: string;
  productNumber: string;
}

const KEY_SEGMENT = /^[A-Za-z0-9]{2}$/;

/**
 * Positional extraction: `CC-SS-<product number>`
 */
export function parseProductKey(key: string): ParsedProductKey | null {
  if (key.length < 7 || key[2] !== '-' || key[5] !== '-') {
    return null;
  }

  const categoryCode = key.slice(0, 2);
  const subcategoryCode = key.slice(3, 5);
  if (!KEY_SEGMENT.test(categoryCode) || !KEY_SEGMENT.test(subcategoryCode)) {
    return null;
  }

  return {
    categoryCode,
    subcategoryCode,
    categoryId: `${categoryCode}_${subcategoryCode}`,
    productNumber: key.slice(6)
  };
}

function isCurrentVersion(version: ProductVersion): version is CanonicalProduct {
  return version.endDate === null;
}

export class BusinessRuleService {
  constructor(private readonly config: Pick<PipelineConfig, 'measureTolerance' | 'minValidDate'>) {}

  /**
   * Fail when records lack a property the rules read
   */
  assertRuleInputs<T extends object>(
    entity: string,
    records: readonly T[],
    properties: readonly string[]
  ): void {
    for (const record of records) {
      const missing = properties.filter(property => !(property in record));
      if (missing.length > 0) {
        throw new StructuralError(
          entity,
          `Rule input for ${entity} lacks ${missing.join(', ')}`,
          missing
        );
      }
    }
  }

  // ==================== Products ====================

  /**
   * Split product keys into category id and product number
   */
  categorizeProducts(products: readonly CleansedProduct[], issues: IssueRecorder): ProductVersion[] {
    this.assertRuleInputs('crm_prd_info', products, ['productId', 'productKey', 'startDate']);
    const versions: ProductVersion[] = [];

    for (const product of products) {
      if (product.productId === null || product.productKey === null) {
        issues.warning(
          'product_excluded',
          'completeness',
          `Product at row ${product.rowOffset} has no id or key and cannot be versioned`,
          { businessKey: product.productKey, rowOffset: product.rowOffset }
        );
        continue;
      }

      const parsed = parseProductKey(product.productKey);
      if (!parsed) {
        issues.warning(
          'unparseable_product_key',
          'format',
          `Product key ${product.productKey} does not follow the CC-SS-number layout`,
          {
            businessKey: product.productKey,
            field: 'productKey',
            rowOffset: product.rowOffset,
            originalValue: product.productKey
          }
        );
      }

      versions.push({
        productId: product.productId,
        productKey: product.productKey,
        productNumber: parsed ? parsed.productNumber : product.productKey,
        categoryId: parsed ? parsed.categoryId : null,
        productName: product.productName,
        cost: product.cost,
        productLine: product.productLine,
        startDate: product.startDate,
        endDate: null,
        recordedEndDate: product.recordedEndDate,
        sourceRowOffset: product.rowOffset
      });
    }

    return versions;
  }

  /**
   * Each version ends the day before its successor starts; the last one stays open
   */
  deriveValidityWindows(versions: readonly ProductVersion[], issues: IssueRecorder): ProductVersion[] {
    const byNumber = new Map<string, ProductVersion[]>();
    for (const version of versions) {
      const group = byNumber.get(version.productNumber);
      if (group) {
        group.push(version);
      } else {
        byNumber.set(version.productNumber, [version]);
      }
    }

    const derived: ProductVersion[] = [];
    for (const [productNumber, group] of byNumber) {
      const ordered = [...group].sort(
        (a, b) =>
          compareNullableDates(a.startDate, b.startDate) ||
          a.productId - b.productId ||
          a.sourceRowOffset - b.sourceRowOffset
      );

      ordered.forEach((version, index) => {
        const next = ordered[index + 1];
        const endDate = next ? this.endBefore(productNumber, version, next, issues) : null;

        if (version.recordedEndDate !== null && version.recordedEndDate !== endDate) {
          issues.info(
            'validity_end_rederived',
            'consistency',
            `End date of product ${productNumber} version ${version.productId} rederived`,
            {
              businessKey: productNumber,
              field: 'endDate',
              rowOffset: version.sourceRowOffset,
              originalValue: version.recordedEndDate,
              correctedValue: endDate
            }
          );
        }

        derived.push({ ...version, endDate });
      });
    }

    return derived;
  }

  currentVersions(versions: readonly ProductVersion[]): CanonicalProduct[] {
    return versions.filter(isCurrentVersion);
  }

  private endBefore(
    productNumber: string,
    version: ProductVersion,
    next: ProductVersion,
    issues: IssueRecorder
  ): string {
    // A successor without a start date closes the version before the valid range
    const endDate = addDays(next.startDate ?? this.config.minValidDate, -1);

    if (next.startDate === null || (version.startDate !== null && endDate < version.startDate)) {
      issues.warning(
        'invalid_validity_window',
        'consistency',
        `Version ${version.productId} of product ${productNumber} ends ${endDate} before it starts`,
        {
          businessKey: productNumber,
          field: 'endDate',
          rowOffset: version.sourceRowOffset,
          originalValue: version.startDate,
          correctedValue: endDate
        }
      );
    }
    return endDate;
  }

  // ==================== Sales ====================

  /**
   * Number lines within each order and reconcile their measures
   */
  reconcileSalesLines(lines: readonly CleansedSalesLine[], issues: IssueRecorder): ReconciledSalesLine[] {
    this.assertRuleInputs('crm_sales_details', lines, ['orderNumber', 'amount', 'quantity', 'price']);
    const counters = new Map<string | null, number>();

    return lines.map(line => {
      const lineNumber = (counters.get(line.orderNumber) ?? 0) + 1;
      counters.set(line.orderNumber, lineNumber);
      return this.reconcileMeasures(line, lineNumber, issues);
    });
  }

  /**
   * Bring amount, quantity and price into agreement where the line allows it
   */
  reconcileMeasures(
    line: CleansedSalesLine,
    lineNumber: number,
    issues: IssueRecorder
  ): ReconciledSalesLine {
    const details = (field: string) => ({
      businessKey: line.orderNumber,
      field,
      rowOffset: line.rowOffset
    });
    const unrecoverable = (note: string): ReconciledSalesLine => {
      issues.warning('measure_unrecoverable', 'consistency', note, details('quantity'));
      return { ...line, lineNumber, reconciliationStatus: 'unrecoverable', reconciliationNote: note };
    };

    const { quantity, amount } = line;
    if (quantity === null || quantity <= 0) {
      return unrecoverable(`Line ${lineNumber} of order ${line.orderNumber} has quantity ${quantity}`);
    }

    const notes: string[] = [];
    let price = line.price;

    if (price === null || price === 0) {
      if (amount === null || amount <= 0) {
        return unrecoverable(
          `Line ${lineNumber} of order ${line.orderNumber} has neither price nor a positive amount`
        );
      }
      price = amount / quantity;
      notes.push('price derived from amount');
      issues.info('price_derived', 'consistency', `Price derived as ${price}`, {
        ...details('price'),
        originalValue: line.price,
        correctedValue: price
      });
    } else if (price < 0) {
      notes.push('price sign corrected');
      issues.info('price_sign_corrected', 'consistency', `Negative price ${price} made positive`, {
        ...details('price'),
        originalValue: price,
        correctedValue: Math.abs(price)
      });
      price = Math.abs(price);
    }

    const expected = quantity * price;
    let reconciledAmount = amount;
    if (
      amount === null ||
      amount <= 0 ||
      Math.abs(amount - expected) > this.config.measureTolerance
    ) {
      reconciledAmount = expected;
      notes.push('amount recomputed');
      issues.info('amount_recomputed', 'consistency', `Amount recomputed as ${expected}`, {
        ...details('amount'),
        originalValue: amount,
        correctedValue: expected
      });
    }

    const status: ReconciliationStatus = notes.length > 0 ? 'corrected' : 'ok';
    return {
      ...line,
      amount: reconciledAmount,
      price,
      lineNumber,
      reconciliationStatus: status,
      reconciliationNote: notes.length > 0 ? notes.join('; ') : null
    };
  }
}
