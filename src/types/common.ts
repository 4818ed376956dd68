/**
 * Common types and enums used across the sales warehouse pipeline
 */

// Source systems feeding the warehouse
export type SourceSystem = 'crm' | 'erp';

// Entity families processed as independent chains
export type EntityFamily = 'customer' | 'product' | 'sales';

// Pipeline stages, in execution order within a family chain
export type StageName = 'cleanse' | 'deduplicate' | 'apply_rules' | 'assemble';

// Quality issue severity
export type Severity = 'info' | 'warning' | 'fatal';

// Quality issue classification
export type IssueKind =
  | 'structural'
  | 'format'
  | 'consistency'
  | 'referential'
  | 'duplicate'
  | 'completeness'
  | 'uniqueness';

// Stage and family status
export type StageStatus = 'succeeded' | 'failed' | 'skipped' | 'aborted';
export type FamilyStatus = 'succeeded' | 'failed' | 'blocked' | 'aborted';
export type RunStatus = 'succeeded' | 'partial' | 'failed' | 'aborted';

// Raw source tables, named as extracted
export type RawTableName =
  | 'crm_cust_info'
  | 'crm_prd_info'
  | 'crm_sales_details'
  | 'erp_cust_az12'
  | 'erp_loc_a101'
  | 'erp_px_cat_g1v2';

// Published warehouse tables
export type WarehouseTableName = 'dim_customer' | 'dim_product' | 'fact_sales_line';

// Dimensions that own surrogate keys
export type DimensionName = 'dim_customer' | 'dim_product';

/**
 * Calendar date in ISO form (YYYY-MM-DD)
 */
export type IsoDate = string;

/**
 * Pipeline-generated identifier linking facts to dimension rows
 */
export type SurrogateKey = number;

/**
 * Sentinel stored on a fact when a dimension lookup fails
 */
export const UNRESOLVED = 'unresolved' as const;
export type Unresolved = typeof UNRESOLVED;

export type DimensionKeyRef = SurrogateKey | Unresolved;

// Surrogate key assignment strategy
export type SurrogateKeyStrategy = 'recompute' | 'persistent';
