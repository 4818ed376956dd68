/**
 * Unit tests for DimensionalAssemblyService
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DimensionalAssemblyService,
  assignSurrogateKeys,
  compareProducts
} from '../../../services/dimensional-assembly-service.js';
import { IssueRecorder, QualityIssueLog } from '../../../services/quality-issue-log.js';
import {
  CanonicalCustomer,
  CanonicalProduct,
  CleansedCustomerDemographics,
  CleansedCustomerLocation,
  CleansedProductCategory,
  ReconciledSalesLine,
  StructuralError,
  UNRESOLVED
} from '../../../types/index.js';
import { testRecorder } from '../../fixtures/pipeline-fixtures.js';

function canonicalCustomer(customerId: number, customerNumber: string | null): CanonicalCustomer {
  return {
    businessKey: String(customerId),
    customerId,
    customerNumber,
    firstName: 'Ana',
    lastName: 'Lopez',
    maritalStatus: 'Married',
    gender: 'Female',
    createdAt: '2023-06-01',
    sourceRowOffset: 0
  };
}

function currentProduct(productNumber: string, startDate: string | null, categoryId: string | null): CanonicalProduct {
  return {
    productId: 1,
    productKey: `XX-YY-${productNumber}`,
    productNumber,
    categoryId,
    productName: productNumber,
    cost: 10,
    productLine: 'Road',
    startDate,
    endDate: null,
    recordedEndDate: null,
    sourceRowOffset: 0
  };
}

function salesLine(overrides: Partial<ReconciledSalesLine>): ReconciledSalesLine {
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
    lineNumber: 1,
    reconciliationStatus: 'ok',
    reconciliationNote: null,
    ...overrides
  };
}

describe('assignSurrogateKeys', () => {
  const options = {
    dimension: 'dim_customer' as const,
    businessKeyOf: (entity: { key: string; rank: number }) => entity.key,
    compare: (a: { rank: number }, b: { rank: number }) => a.rank - b.rank
  };

  it('should assign dense keys in comparison order', () => {
    const { keys } = assignSurrogateKeys(
      [{ key: 'c', rank: 3 }, { key: 'a', rank: 1 }, { key: 'b', rank: 2 }],
      options
    );

    expect([...keys.entries()]).toEqual([['a', 1], ['b', 2], ['c', 3]]);
  });

  it('should break ties by business key', () => {
    const { keys } = assignSurrogateKeys([{ key: 'z', rank: 1 }, { key: 'm', rank: 1 }], options);

    expect(keys.get('m')).toBe(1);
    expect(keys.get('z')).toBe(2);
  });

  it('should reject duplicate business keys', () => {
    expect(() => assignSurrogateKeys([{ key: 'a', rank: 1 }, { key: 'a', rank: 2 }], options)).toThrow(
      StructuralError
    );
  });

  it('should reuse existing assignments and append new keys after the maximum', () => {
    const existing = new Map([['b', 1], ['retired', 5]]);

    const result = assignSurrogateKeys(
      [{ key: 'a', rank: 1 }, { key: 'b', rank: 2 }, { key: 'c', rank: 3 }],
      { ...options, existing }
    );

    expect(result.keys.get('b')).toBe(1);
    expect(result.keys.get('a')).toBe(6);
    expect(result.keys.get('c')).toBe(7);
    expect(result.added).toBe(2);
    expect(result.assignments.get('retired')).toBe(5);
  });
});

describe('compareProducts', () => {
  it('should order by start date then product number', () => {
    const products = [
      currentProduct('B', '2022-01-01', null),
      currentProduct('C', '2021-01-01', null),
      currentProduct('A', '2022-01-01', null)
    ].sort(compareProducts);

    expect(products.map(product => product.productNumber)).toEqual(['C', 'A', 'B']);
  });
});

describe('DimensionalAssemblyService', () => {
  let service: DimensionalAssemblyService;
  let log: QualityIssueLog;
  let issues: IssueRecorder;

  beforeEach(() => {
    service = new DimensionalAssemblyService();
    ({ log, issues } = testRecorder('sales', 'assemble', 'fact_sales_line'));
  });

  describe('buildCustomerDimension', () => {
    it('should key customers by numeric id and join ERP attributes', () => {
      const demographics = new Map<string, CleansedCustomerDemographics>([
        ['AW00000101', { rowOffset: 0, customerNumber: 'AW00000101', birthDate: '1990-04-12', gender: 'Female' }]
      ]);
      const locations = new Map<string, CleansedCustomerLocation>([
        ['AW00000101', { rowOffset: 0, customerNumber: 'AW00000101', country: 'Germany' }]
      ]);

      const output = service.buildCustomerDimension(
        [canonicalCustomer(1000, 'AW00001000'), canonicalCustomer(101, 'AW00000101')],
        demographics,
        locations
      );

      expect(output.rows.map(row => [row.customerKey, row.customerId])).toEqual([
        [1, 101],
        [2, 1000]
      ]);
      expect(output.rows[0].birthDate).toBe('1990-04-12');
      expect(output.rows[0].country).toBe('Germany');
      expect(output.rows[1].birthDate).toBeNull();
      expect(output.rows[1].country).toBeNull();
      expect(output.keysByCustomerId.get(1000)).toBe(2);
    });
  });

  describe('buildProductDimension', () => {
    it('should join categories on category id', () => {
      const categories = new Map<string, CleansedProductCategory>([
        ['AC_HE', { rowOffset: 0, categoryId: 'AC_HE', category: 'Accessories', subcategory: 'Helmets', maintenance: 'Yes' }]
      ]);

      const output = service.buildProductDimension(
        [currentProduct('HL-U509', '2021-07-01', 'AC_HE'), currentProduct('LEGACY1', '2020-01-01', null)],
        categories
      );

      expect(output.rows.map(row => [row.productKey, row.productNumber, row.category])).toEqual([
        [1, 'LEGACY1', null],
        [2, 'HL-U509', 'Accessories']
      ]);
      expect(output.rows[1].subcategory).toBe('Helmets');
      expect(output.keysByProductNumber.get('HL-U509')).toBe(2);
    });
  });

  describe('buildSalesFacts', () => {
    const customerKeys = new Map([[101, 1]]);
    const productKeys = new Map([['HL-U509', 4]]);

    it('should resolve both keys', () => {
      const [fact] = service.buildSalesFacts([salesLine({})], customerKeys, productKeys, issues);

      expect(fact.customerKey).toBe(1);
      expect(fact.productKey).toBe(4);
      expect(fact.lineNumber).toBe(1);
      expect(log.size).toBe(0);
    });

    it('should keep facts whose product is unknown', () => {
      const facts = service.buildSalesFacts(
        [salesLine({ productNumber: 'P9' }), salesLine({ lineNumber: 2 })],
        customerKeys,
        productKeys,
        issues
      );

      expect(facts).toHaveLength(2);
      expect(facts[0].productKey).toBe(UNRESOLVED);
      expect(facts[0].customerKey).toBe(1);

      const [issue] = log.all();
      expect(issue.rule).toBe('unresolved_reference');
      expect(issue.kind).toBe('referential');
      expect(issue.severity).toBe('warning');
      expect(issue.field).toBe('productKey');
    });

    it('should mark a missing customer id as unresolved', () => {
      const [fact] = service.buildSalesFacts([salesLine({ customerId: null })], customerKeys, productKeys, issues);

      expect(fact.customerKey).toBe(UNRESOLVED);
      expect(log.filter({ rule: 'unresolved_reference' })).toHaveLength(1);
    });
  });
});
