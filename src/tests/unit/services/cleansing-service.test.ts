/**
 * Unit tests for CleansingService
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CleansingService } from '../../../services/cleansing-service.js';
import { IssueRecorder, QualityIssueLog } from '../../../services/quality-issue-log.js';
import { StructuralError } from '../../../types/index.js';
import {
  TEST_CONFIG,
  customerRow,
  productRow,
  rawTable,
  salesRow,
  testRecorder
} from '../../fixtures/pipeline-fixtures.js';

describe('CleansingService', () => {
  let service: CleansingService;
  let log: QualityIssueLog;
  let issues: IssueRecorder;

  beforeEach(() => {
    service = new CleansingService(TEST_CONFIG);
    ({ log, issues } = testRecorder('customer', 'cleanse', 'crm_cust_info'));
  });

  describe('Structure', () => {
    it('should fail when a required table is missing', () => {
      expect(() => service.requireTable('crm_cust_info', undefined)).toThrow(StructuralError);
    });

    it('should name every missing column', () => {
      const table = {
        name: 'crm_cust_info' as const,
        columns: ['cst_id', 'cst_key', 'cst_firstname', 'cst_lastname', 'cst_marital_status'],
        rows: []
      };

      try {
        service.cleanseCustomers(table, issues);
        expect.fail('expected a StructuralError');
      } catch (error) {
        expect(error).toBeInstanceOf(StructuralError);
        if (error instanceof StructuralError) {
          expect(error.missing).toEqual(['cst_gndr', 'cst_create_date']);
          expect(error.entity).toBe('crm_cust_info');
        }
      }
    });
  });

  describe('Customers', () => {
    it('should keep one record per raw row with its offset', () => {
      const table = rawTable('crm_cust_info', [customerRow(), customerRow({ cst_id: '102' })]);

      const customers = service.cleanseCustomers(table, issues);

      expect(customers).toHaveLength(2);
      expect(customers.map(customer => customer.rowOffset)).toEqual([0, 1]);
      expect(customers[1].customerId).toBe(102);
    });

    it('should standardize names, codes and dates', () => {
      const table = rawTable('crm_cust_info', [
        customerRow({ cst_firstname: ' Ana', cst_marital_status: 's', cst_gndr: 'm', cst_create_date: '2023-06-01' })
      ]);

      const [customer] = service.cleanseCustomers(table, issues);

      expect(customer).toEqual({
        rowOffset: 0,
        customerId: 101,
        customerNumber: 'AW00000101',
        firstName: 'Ana',
        lastName: 'Lopez',
        maritalStatus: 'Single',
        gender: 'Male',
        createdAt: '2023-06-01'
      });
      const [trim] = log.filter({ rule: 'whitespace_trimmed' });
      expect(trim.entity).toBe('crm_cust_info');
      expect(trim.businessKey).toBe('101');
    });

    it('should null out create dates after the reference date', () => {
      const table = rawTable('crm_cust_info', [customerRow({ cst_create_date: '2030-01-01' })]);

      const [customer] = service.cleanseCustomers(table, issues);

      expect(customer.createdAt).toBeNull();
      expect(log.filter({ rule: 'date_out_of_range' })).toHaveLength(1);
    });
  });

  describe('ERP customers', () => {
    it('should strip the NAS prefix from demographics', () => {
      const table = rawTable('erp_cust_az12', [
        { cid: 'NASAW00000101', bdate: '1990-04-12', gen: 'F' },
        { cid: 'AW00000102', bdate: '1985-01-01', gen: ' Male ' }
      ]);

      const records = service.cleanseCustomerDemographics(table, issues);

      expect(records.map(record => record.customerNumber)).toEqual(['AW00000101', 'AW00000102']);
      expect(records.map(record => record.gender)).toEqual(['Female', 'Male']);

      const normalized = log.filter({ rule: 'customer_number_normalized' });
      expect(normalized).toHaveLength(1);
      expect(normalized[0].entity).toBe('erp_cust_az12');
      expect(normalized[0].originalValue).toBe('NASAW00000101');
      expect(normalized[0].correctedValue).toBe('AW00000101');
    });

    it('should reject future birth dates', () => {
      const table = rawTable('erp_cust_az12', [{ cid: 'AW00000102', bdate: '2099-01-01', gen: 'M' }]);

      const [record] = service.cleanseCustomerDemographics(table, issues);

      expect(record.birthDate).toBeNull();
      const [issue] = log.filter({ rule: 'date_out_of_range' });
      expect(issue.businessKey).toBe('AW00000102');
    });

    it('should remove dashes from location customer numbers and map countries', () => {
      const table = rawTable('erp_loc_a101', [
        { cid: 'AW-00000101', cntry: 'DE' },
        { cid: 'AW-00000102', cntry: 'USA ' },
        { cid: 'AW00000103', cntry: 'Australia' },
        { cid: 'AW00000104', cntry: null }
      ]);

      const records = service.cleanseCustomerLocations(table, issues);

      expect(records.map(record => record.customerNumber)).toEqual([
        'AW00000101',
        'AW00000102',
        'AW00000103',
        'AW00000104'
      ]);
      expect(records.map(record => record.country)).toEqual(['Germany', 'United States', 'Australia', 'n/a']);
      expect(log.filter({ rule: 'customer_number_normalized' })).toHaveLength(2);
      expect(log.filter({ rule: 'unknown_code' })).toHaveLength(0);
    });
  });

  describe('Products', () => {
    it('should default a missing cost to zero', () => {
      const table = rawTable('crm_prd_info', [productRow({ prd_cost: null })]);

      const [product] = service.cleanseProducts(table, issues);

      expect(product.cost).toBe(0);
      const [issue] = log.filter({ rule: 'cost_defaulted' });
      expect(issue.severity).toBe('info');
      expect(issue.businessKey).toBe('AC-HE-HL-U509');
    });

    it('should map product lines and dates', () => {
      const table = rawTable('crm_prd_info', [
        productRow({ prd_line: 'm ', prd_end_dt: '2022-06-30' })
      ]);

      const [product] = service.cleanseProducts(table, issues);

      expect(product.productId).toBe(212);
      expect(product.productLine).toBe('Mountain');
      expect(product.startDate).toBe('2021-07-01');
      expect(product.recordedEndDate).toBe('2022-06-30');
    });

    it('should cleanse categories', () => {
      const table = rawTable('erp_px_cat_g1v2', [
        { id: 'AC_HE', cat: 'Accessories ', subcat: 'Helmets', maintenance: 'Yes' }
      ]);

      expect(service.cleanseProductCategories(table, issues)).toEqual([
        { rowOffset: 0, categoryId: 'AC_HE', category: 'Accessories', subcategory: 'Helmets', maintenance: 'Yes' }
      ]);
    });
  });

  describe('Sales', () => {
    it('should convert compact dates and measures', () => {
      const table = rawTable('crm_sales_details', [salesRow({ sls_sales: 35, sls_quantity: 1, sls_price: 35 })]);

      const [line] = service.cleanseSales(table, issues);

      expect(line).toEqual({
        rowOffset: 0,
        orderNumber: 'SO1001',
        productNumber: 'HL-U509',
        customerId: 101,
        orderDate: '2024-01-05',
        shipDate: '2024-01-12',
        dueDate: '2024-01-17',
        amount: 35,
        quantity: 1,
        price: 35
      });
    });

    it('should null invalid order dates with a warning', () => {
      const table = rawTable('crm_sales_details', [salesRow({ sls_order_dt: '0' })]);

      const [line] = service.cleanseSales(table, issues);

      expect(line.orderDate).toBeNull();
      const [issue] = log.filter({ rule: 'invalid_date' });
      expect(issue.field).toBe('sls_order_dt');
      expect(issue.businessKey).toBe('SO1001');
    });
  });
});
