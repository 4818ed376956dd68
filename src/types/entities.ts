/**
 * Cleansed and canonical entity types
 */

import { IsoDate } from './common.js';

/**
 * Fields shared by every record produced from a raw row
 */
export interface SourceRecord {
  /** Position of the originating row in its raw table */
  rowOffset: number;
}

export type MaritalStatus = 'Single' | 'Married' | 'n/a';
export type Gender = 'Female' | 'Male' | 'n/a';
export type ProductLine = 'Mountain' | 'Road' | 'Other Sales' | 'Touring' | 'n/a';

// ==================== Cleansed Records ====================

/**
 * crm_cust_info after cleansing
 */
export interface CleansedCustomer extends SourceRecord {
  customerId: number | null;
  customerNumber: string | null;
  firstName: string | null;
  lastName: string | null;
  maritalStatus: MaritalStatus;
  gender: Gender;
  createdAt: IsoDate | null;
}

/**
 * erp_cust_az12 after cleansing
 */
export interface CleansedCustomerDemographics extends SourceRecord {
  customerNumber: string | null;
  birthDate: IsoDate | null;
  gender: Gender;
}

/**
 * erp_loc_a101 after cleansing
 */
export interface CleansedCustomerLocation extends SourceRecord {
  customerNumber: string | null;
  country: string;
}

/**
 * crm_prd_info after cleansing
 */
export interface CleansedProduct extends SourceRecord {
  productId: number | null;
  productKey: string | null;
  productName: string | null;
  cost: number | null;
  productLine: ProductLine;
  startDate: IsoDate | null;
  recordedEndDate: IsoDate | null;
}

/**
 * erp_px_cat_g1v2 after cleansing
 */
export interface CleansedProductCategory extends SourceRecord {
  categoryId: string | null;
  category: string | null;
  subcategory: string | null;
  maintenance: string | null;
}

/**
 * crm_sales_details after cleansing
 */
export interface CleansedSalesLine extends SourceRecord {
  orderNumber: string | null;
  productNumber: string | null;
  customerId: number | null;
  orderDate: IsoDate | null;
  shipDate: IsoDate | null;
  dueDate: IsoDate | null;
  amount: number | null;
  quantity: number | null;
  price: number | null;
}

// ==================== Canonical Entities ====================

/**
 * One reconciled customer per CRM customer id
 */
export interface CanonicalCustomer {
  businessKey: string;
  customerId: number;
  customerNumber: string | null;
  firstName: string | null;
  lastName: string | null;
  maritalStatus: MaritalStatus;
  gender: Gender | null;
  createdAt: IsoDate | null;
  sourceRowOffset: number;
}

/**
 * Product version after categorization and validity derivation
 */
export interface ProductVersion {
  productId: number;
  productKey: string;
  productNumber: string;
  categoryId: string | null;
  productName: string | null;
  cost: number | null;
  productLine: ProductLine;
  startDate: IsoDate | null;
  endDate: IsoDate | null;
  recordedEndDate: IsoDate | null;
  sourceRowOffset: number;
}

/**
 * Current (open-ended) product version, one per product number
 */
export type CanonicalProduct = ProductVersion & { endDate: null };

export type ReconciliationStatus = 'ok' | 'corrected' | 'unrecoverable';

/**
 * Sales line after measure reconciliation
 */
export interface ReconciledSalesLine extends CleansedSalesLine {
  lineNumber: number;
  reconciliationStatus: ReconciliationStatus;
  reconciliationNote: string | null;
}
