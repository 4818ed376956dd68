/**
 * Star schema types published by the pipeline
 */

import { DimensionKeyRef, DimensionName, IsoDate, SurrogateKey } from './common.js';
import { Gender, MaritalStatus, ProductLine, ReconciliationStatus } from './entities.js';

/**
 * Customer dimension row
 */
export interface DimCustomer {
  customerKey: SurrogateKey;
  customerId: number;
  customerNumber: string | null;
  firstName: string | null;
  lastName: string | null;
  country: string | null;
  maritalStatus: MaritalStatus;
  gender: Gender | null;
  birthDate: IsoDate | null;
  createdAt: IsoDate | null;
}

/**
 * Product dimension row (current versions only)
 */
export interface DimProduct {
  productKey: SurrogateKey;
  productId: number;
  productNumber: string;
  productName: string | null;
  categoryId: string | null;
  category: string | null;
  subcategory: string | null;
  maintenance: string | null;
  cost: number | null;
  productLine: ProductLine;
  startDate: IsoDate | null;
}

/**
 * Sales fact row, one per original sales line item
 */
export interface FactSalesLine {
  orderNumber: string | null;
  lineNumber: number;
  productNumber: string | null;
  customerId: number | null;
  productKey: DimensionKeyRef;
  customerKey: DimensionKeyRef;
  orderDate: IsoDate | null;
  shipDate: IsoDate | null;
  dueDate: IsoDate | null;
  amount: number | null;
  quantity: number | null;
  price: number | null;
  reconciliationStatus: ReconciliationStatus;
}

/**
 * Complete published output
 */
export interface StarSchema {
  dimCustomer: readonly DimCustomer[];
  dimProduct: readonly DimProduct[];
  factSalesLine: readonly FactSalesLine[];
}

/**
 * Business key to surrogate key assignment for one dimension
 */
export type KeyAssignmentTable = ReadonlyMap<string, SurrogateKey>;

/**
 * Committed warehouse state, replaced as a whole on every publish
 */
export interface WarehouseSnapshot extends StarSchema {
  version: number;
  runId: string | null;
  publishedAt: Date | null;
  keyAssignments: Record<DimensionName, KeyAssignmentTable>;
}
