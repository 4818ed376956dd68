/**
 * Unit tests for BusinessRuleService
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BusinessRuleService, parseProductKey } from '../../../services/business-rule-service.js';
import { IssueRecorder, QualityIssueLog } from '../../../services/quality-issue-log.js';
import {
  CleansedProduct,
  CleansedSalesLine,
  ProductVersion,
  StructuralError
} from '../../../types/index.js';
import { TEST_CONFIG, testRecorder } from '../../fixtures/pipeline-fixtures.js';

function product(overrides: Partial<CleansedProduct>): CleansedProduct {
  return {
    rowOffset: 0,
    productId: 210,
    productKey: 'CO-RF-FR-R92B-58',
    productName: 'HL Road Frame',
    cost: 12,
    productLine: 'Road',
    startDate: '2021-07-01',
    recordedEndDate: null,
    ...overrides
  };
}

function version(overrides: Partial<ProductVersion>): ProductVersion {
  return {
    productId: 210,
    productKey: 'CO-RF-FR-R92B-58',
    productNumber: 'FR-R92B-58',
    categoryId: 'CO_RF',
    productName: 'HL Road Frame',
    cost: 12,
    productLine: 'Road',
    startDate: '2021-07-01',
    endDate: null,
    recordedEndDate: null,
    sourceRowOffset: 0,
    ...overrides
  };
}

function line(overrides: Partial<CleansedSalesLine>): CleansedSalesLine {
  return {
    rowOffset: 0,
    orderNumber: 'SO1001',
    productNumber: 'HL-U509',
    customerId: 101,
    orderDate: '2024-01-05',
    shipDate: '2024-01-12',
    dueDate: '2024-01-17',
    amount: 35,
    quantity: 1,
    price: 35,
    ...overrides
  };
}

describe('parseProductKey', () => {
  it('should split category, subcategory and product number', () => {
    expect(parseProductKey('CO-RF-FR-R92B-58')).toEqual({
      categoryCode: 'CO',
      subcategoryCode: 'RF',
      categoryId: 'CO_RF',
      productNumber: 'FR-R92B-58'
    });
  });

  it('should reject keys that do not follow the layout', () => {
    expect(parseProductKey('FR-R92B-58')).toBeNull();
    expect(parseProductKey('CO-RF-')).toBeNull();
    expect(parseProductKey('CORF-FR-R92')).toBeNull();
  });
});

describe('BusinessRuleService', () => {
  let service: BusinessRuleService;
  let log: QualityIssueLog;
  let issues: IssueRecorder;

  beforeEach(() => {
    service = new BusinessRuleService(TEST_CONFIG);
    ({ log, issues } = testRecorder('product', 'apply_rules', 'crm_prd_info'));
  });

  describe('Product categorization', () => {
    it('should derive category id and product number', () => {
      const [categorized] = service.categorizeProducts([product({ rowOffset: 3 })], issues);

      expect(categorized.categoryId).toBe('CO_RF');
      expect(categorized.productNumber).toBe('FR-R92B-58');
      expect(categorized.sourceRowOffset).toBe(3);
      expect(log.size).toBe(0);
    });

    it('should keep the whole key as product number when unparseable', () => {
      const [categorized] = service.categorizeProducts([product({ productKey: 'LEGACY1' })], issues);

      expect(categorized.categoryId).toBeNull();
      expect(categorized.productNumber).toBe('LEGACY1');
      const [issue] = log.filter({ rule: 'unparseable_product_key' });
      expect(issue.severity).toBe('warning');
    });

    it('should exclude products without a key', () => {
      expect(service.categorizeProducts([product({ productKey: null })], issues)).toEqual([]);
      expect(log.filter({ rule: 'product_excluded' })).toHaveLength(1);
    });

    it('should fail when the records lack a rule input', () => {
      const records = [{ rowOffset: 0, productId: 1 }];

      expect(() => service.assertRuleInputs('crm_prd_info', records, ['productId', 'productKey'])).toThrow(
        StructuralError
      );
    });
  });

  describe('Validity windows', () => {
    it('should end each version the day before the next starts', () => {
      const versions = service.deriveValidityWindows([
        version({ productId: 211, startDate: '2022-07-01', sourceRowOffset: 1 }),
        version({ productId: 210, startDate: '2021-07-01', sourceRowOffset: 0 })
      ], issues);

      expect(versions.map(v => [v.productId, v.startDate, v.endDate])).toEqual([
        [210, '2021-07-01', '2022-06-30'],
        [211, '2022-07-01', null]
      ]);
    });

    it('should keep exactly one open version per product number', () => {
      const versions = service.deriveValidityWindows([
        version({ productId: 1, productNumber: 'A', startDate: '2020-01-01' }),
        version({ productId: 2, productNumber: 'A', startDate: '2021-01-01' }),
        version({ productId: 3, productNumber: 'A', startDate: '2022-01-01' }),
        version({ productId: 4, productNumber: 'B', startDate: '2020-01-01' })
      ], issues);

      expect(service.currentVersions(versions).map(v => v.productId)).toEqual([3, 4]);
    });

    it('should order equal start dates by product id', () => {
      const versions = service.deriveValidityWindows([
        version({ productId: 9, startDate: '2021-07-01' }),
        version({ productId: 5, startDate: '2021-07-01' })
      ], issues);

      expect(versions.map(v => [v.productId, v.endDate])).toEqual([
        [5, '2021-06-30'],
        [9, null]
      ]);
      const [issue] = log.filter({ rule: 'invalid_validity_window' });
      expect(issue.businessKey).toBe('FR-R92B-58');
    });

    it('should report a recorded end date that differs from the derived one', () => {
      service.deriveValidityWindows([
        version({ productId: 210, startDate: '2021-07-01', recordedEndDate: '2021-12-31' }),
        version({ productId: 211, startDate: '2022-07-01' })
      ], issues);

      const [issue] = log.filter({ rule: 'validity_end_rederived' });
      expect(issue.severity).toBe('info');
      expect(issue.originalValue).toBe('2021-12-31');
      expect(issue.correctedValue).toBe('2022-06-30');
    });

    it('should close versions whose successor has no start date', () => {
      const versions = service.deriveValidityWindows([
        version({ productId: 1, startDate: null }),
        version({ productId: 2, startDate: null })
      ], issues);

      expect(versions.map(v => v.endDate)).toEqual(['1899-12-31', null]);
      expect(log.filter({ rule: 'invalid_validity_window' })).toHaveLength(1);
    });
  });

  describe('Measure reconciliation', () => {
    it('should leave consistent lines untouched', () => {
      const reconciled = service.reconcileMeasures(line({}), 1, issues);

      expect(reconciled.reconciliationStatus).toBe('ok');
      expect(reconciled.reconciliationNote).toBeNull();
      expect(reconciled.amount).toBe(35);
      expect(log.size).toBe(0);
    });

    it('should recompute a zero amount from quantity and price', () => {
      const reconciled = service.reconcileMeasures(line({ amount: 0, quantity: 3, price: 10 }), 1, issues);

      expect(reconciled.amount).toBe(30);
      expect(reconciled.price).toBe(10);
      expect(reconciled.reconciliationStatus).toBe('corrected');
      expect(reconciled.reconciliationNote).toBe('amount recomputed');
      const [issue] = log.filter({ rule: 'amount_recomputed' });
      expect(issue.originalValue).toBe(0);
      expect(issue.correctedValue).toBe(30);
    });

    it('should recompute an amount outside the tolerance', () => {
      const reconciled = service.reconcileMeasures(line({ amount: 36, quantity: 1, price: 35 }), 1, issues);

      expect(reconciled.amount).toBe(35);
    });

    it('should accept an amount within the tolerance', () => {
      const reconciled = service.reconcileMeasures(line({ amount: 35.004, quantity: 1, price: 35 }), 1, issues);

      expect(reconciled.amount).toBe(35.004);
      expect(reconciled.reconciliationStatus).toBe('ok');
    });

    it('should derive a missing price from the amount', () => {
      const reconciled = service.reconcileMeasures(line({ amount: 40, quantity: 4, price: null }), 1, issues);

      expect(reconciled.price).toBe(10);
      expect(reconciled.amount).toBe(40);
      expect(reconciled.reconciliationStatus).toBe('corrected');
      expect(log.filter({ rule: 'price_derived' })).toHaveLength(1);
    });

    it('should make negative prices positive', () => {
      const reconciled = service.reconcileMeasures(line({ amount: 20, quantity: 2, price: -10 }), 1, issues);

      expect(reconciled.price).toBe(10);
      expect(reconciled.amount).toBe(20);
      expect(reconciled.reconciliationNote).toBe('price sign corrected');
    });

    it('should flag zero, negative and missing quantities as unrecoverable', () => {
      for (const quantity of [0, -2, null]) {
        const reconciled = service.reconcileMeasures(line({ amount: 30, quantity, price: 10 }), 1, issues);
        expect(reconciled.reconciliationStatus).toBe('unrecoverable');
        expect(reconciled.amount).toBe(30);
      }
      expect(log.filter({ rule: 'measure_unrecoverable' })).toHaveLength(3);
    });

    it('should flag lines with neither price nor amount as unrecoverable', () => {
      const reconciled = service.reconcileMeasures(line({ amount: null, quantity: 2, price: 0 }), 1, issues);

      expect(reconciled.reconciliationStatus).toBe('unrecoverable');
    });

    it('should number lines within each order', () => {
      const reconciled = service.reconcileSalesLines([
        line({ orderNumber: 'SO1' }),
        line({ orderNumber: 'SO2' }),
        line({ orderNumber: 'SO1' })
      ], issues);

      expect(reconciled.map(l => [l.orderNumber, l.lineNumber])).toEqual([
        ['SO1', 1],
        ['SO2', 1],
        ['SO1', 2]
      ]);
    });
  });
});
