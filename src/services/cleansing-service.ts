/**
 * Cleansing & Standardization
 *
 * Turns raw source rows into typed records of the same cardinality. Text is
 * trimmed, codes are mapped through the lookup tables, dates and numbers are
 * validated, and ERP customer numbers are aligned with the CRM format.
 */

import {
  COUNTRY_CODES,
  GENDER_CODES,
  MARITAL_STATUS_CODES,
  PRODUCT_LINE_CODES
} from '../config/code-lookups.js';
import { PipelineConfig } from '../config/pipeline-config.js';
import { SOURCE_TABLES } from '../config/source-schemas.js';
import {
  CleansedCustomer,
  CleansedCustomerDemographics,
  CleansedCustomerLocation,
  CleansedProduct,
  CleansedProductCategory,
  CleansedSalesLine,
  RawRow,
  RawTable,
  RawTableName,
  StructuralError
} from '../types/index.js';
import { IssueRecorder } from './quality-issue-log.js';
import { DateRules, RowReader } from './row-reader.js';

const ERP_CUSTOMER_PREFIX = /^NAS/i;

export class CleansingService {
  private readonly dates: DateRules;

  constructor(config: DateRules | PipelineConfig) {
    this.dates = {
      referenceDate: config.referenceDate,
      minValidDate: config.minValidDate,
      maxValidDate: config.maxValidDate
    };
  }

  /**
   * Throws StructuralError when the table is absent or lacks a declared column
   */
  requireTable(name: RawTableName, table: RawTable | undefined): RawTable {
    if (!table) {
      throw new StructuralError(name, `Required table ${name} is missing from the raw store`);
    }
    if (table.name !== name) {
      throw new StructuralError(name, `Expected table ${name} but received ${table.name}`);
    }

    const missing = SOURCE_TABLES[name].columns.filter(column => !table.columns.includes(column));
    if (missing.length > 0) {
      throw new StructuralError(
        name,
        `Table ${name} is missing required columns: ${missing.join(', ')}`,
        missing
      );
    }
    return table;
  }

  cleanseCustomers(table: RawTable, issues: IssueRecorder): CleansedCustomer[] {
    return this.cleanse('crm_cust_info', table, issues, reader => {
      const customerId = reader.integer('cst_id');
      reader.keyedBy(customerId === null ? null : String(customerId));

      return {
        rowOffset: reader.rowOffset,
        customerId,
        customerNumber: reader.text('cst_key'),
        firstName: reader.text('cst_firstname'),
        lastName: reader.text('cst_lastname'),
        maritalStatus: reader.code('cst_marital_status', MARITAL_STATUS_CODES),
        gender: reader.code('cst_gndr', GENDER_CODES),
        createdAt: reader.isoDate('cst_create_date', { notAfterReference: true })
      };
    });
  }

  cleanseCustomerDemographics(
    table: RawTable,
    issues: IssueRecorder
  ): CleansedCustomerDemographics[] {
    return this.cleanse('erp_cust_az12', table, issues, (reader, recorder) => {
      const customerNumber = this.normalizeCustomerNumber(
        reader,
        recorder,
        'cid',
        value => value.replace(ERP_CUSTOMER_PREFIX, '')
      );

      return {
        rowOffset: reader.rowOffset,
        customerNumber,
        birthDate: reader.isoDate('bdate', { notAfterReference: true }),
        gender: reader.code('gen', GENDER_CODES)
      };
    });
  }

  cleanseCustomerLocations(table: RawTable, issues: IssueRecorder): CleansedCustomerLocation[] {
    return this.cleanse('erp_loc_a101', table, issues, (reader, recorder) => ({
      rowOffset: reader.rowOffset,
      customerNumber: this.normalizeCustomerNumber(reader, recorder, 'cid', value =>
        value.replace(/-/g, '')
      ),
      country: reader.code('cntry', COUNTRY_CODES)
    }));
  }

  cleanseProducts(table: RawTable, issues: IssueRecorder): CleansedProduct[] {
    return this.cleanse('crm_prd_info', table, issues, (reader, recorder) => {
      const productId = reader.integer('prd_id');
      const productKey = reader.text('prd_key');
      reader.keyedBy(productKey);

      let cost = reader.decimal('prd_cost');
      if (cost === null) {
        cost = 0;
        recorder.info('cost_defaulted', 'completeness', 'Missing product cost defaulted to 0', {
          businessKey: productKey,
          field: 'prd_cost',
          rowOffset: reader.rowOffset,
          originalValue: reader.raw('prd_cost'),
          correctedValue: 0
        });
      }

      return {
        rowOffset: reader.rowOffset,
        productId,
        productKey,
        productName: reader.text('prd_nm'),
        cost,
        productLine: reader.code('prd_line', PRODUCT_LINE_CODES),
        startDate: reader.isoDate('prd_start_dt'),
        recordedEndDate: reader.isoDate('prd_end_dt')
      };
    });
  }

  cleanseProductCategories(table: RawTable, issues: IssueRecorder): CleansedProductCategory[] {
    return this.cleanse('erp_px_cat_g1v2', table, issues, reader => {
      const categoryId = reader.text('id');
      reader.keyedBy(categoryId);

      return {
        rowOffset: reader.rowOffset,
        categoryId,
        category: reader.text('cat'),
        subcategory: reader.text('subcat'),
        maintenance: reader.text('maintenance')
      };
    });
  }

  cleanseSales(table: RawTable, issues: IssueRecorder): CleansedSalesLine[] {
    return this.cleanse('crm_sales_details', table, issues, reader => {
      const orderNumber = reader.text('sls_ord_num');
      reader.keyedBy(orderNumber);

      return {
        rowOffset: reader.rowOffset,
        orderNumber,
        productNumber: reader.text('sls_prd_key'),
        customerId: reader.integer('sls_cust_id'),
        orderDate: reader.compactDate('sls_order_dt'),
        shipDate: reader.compactDate('sls_ship_dt'),
        dueDate: reader.compactDate('sls_due_dt'),
        amount: reader.decimal('sls_sales'),
        quantity: reader.integer('sls_quantity'),
        price: reader.decimal('sls_price')
      };
    });
  }

  // ==================== Helpers ====================

  private cleanse<T>(
    name: RawTableName,
    table: RawTable,
    issues: IssueRecorder,
    mapRow: (reader: RowReader, recorder: IssueRecorder) => T
  ): T[] {
    this.requireTable(name, table);
    const recorder = issues.forEntity(name);

    return table.rows.map((row: RawRow, rowOffset: number) =>
      mapRow(new RowReader(row, rowOffset, recorder, this.dates), recorder)
    );
  }

  private normalizeCustomerNumber(
    reader: RowReader,
    recorder: IssueRecorder,
    column: string,
    normalize: (value: string) => string
  ): string | null {
    const value = reader.text(column);
    if (value === null) {
      return null;
    }

    const normalized = normalize(value);
    if (normalized !== value) {
      recorder.info(
        'customer_number_normalized',
        'consistency',
        `Customer number ${value} normalized to ${normalized}`,
        {
          businessKey: normalized,
          field: column,
          rowOffset: reader.rowOffset,
          originalValue: value,
          correctedValue: normalized
        }
      );
    }

    reader.keyedBy(normalized === '' ? null : normalized);
    return normalized === '' ? null : normalized;
  }
}
