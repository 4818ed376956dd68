/**
 * Source extract schemas consumed from the Raw Store
 */

import { EntityFamily, RawTableName, SourceSystem } from '../types/index.js';

export interface SourceTableSchema {
  name: RawTableName;
  source: SourceSystem;
  family: EntityFamily;
  /** Required tables abort their family when missing; enrichment tables do not */
  required: boolean;
  columns: readonly string[];
}

export const SOURCE_TABLES: Record<RawTableName, SourceTableSchema> = {
  crm_cust_info: {
    name: 'crm_cust_info',
    source: 'crm',
    family: 'customer',
    required: true,
    columns: [
      'cst_id',
      'cst_key',
      'cst_firstname',
      'cst_lastname',
      'cst_marital_status',
      'cst_gndr',
      'cst_create_date'
    ]
  },
  erp_cust_az12: {
    name: 'erp_cust_az12',
    source: 'erp',
    family: 'customer',
    required: false,
    columns: ['cid', 'bdate', 'gen']
  },
  erp_loc_a101: {
    name: 'erp_loc_a101',
    source: 'erp',
    family: 'customer',
    required: false,
    columns: ['cid', 'cntry']
  },
  crm_prd_info: {
    name: 'crm_prd_info',
    source: 'crm',
    family: 'product',
    required: true,
    columns: ['prd_id', 'prd_key', 'prd_nm', 'prd_cost', 'prd_line', 'prd_start_dt', 'prd_end_dt']
  },
  erp_px_cat_g1v2: {
    name: 'erp_px_cat_g1v2',
    source: 'erp',
    family: 'product',
    required: false,
    columns: ['id', 'cat', 'subcat', 'maintenance']
  },
  crm_sales_details: {
    name: 'crm_sales_details',
    source: 'crm',
    family: 'sales',
    required: true,
    columns: [
      'sls_ord_num',
      'sls_prd_key',
      'sls_cust_id',
      'sls_order_dt',
      'sls_ship_dt',
      'sls_due_dt',
      'sls_sales',
      'sls_quantity',
      'sls_price'
    ]
  }
};

export const RAW_TABLE_NAMES: readonly RawTableName[] = [
  'crm_cust_info',
  'erp_cust_az12',
  'erp_loc_a101',
  'crm_prd_info',
  'erp_px_cat_g1v2',
  'crm_sales_details'
];

export function isRawTableName(name: string): name is RawTableName {
  return RAW_TABLE_NAMES.some(tableName => tableName === name);
}
