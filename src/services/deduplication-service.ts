/**
 * Deduplication & Conflict Resolution
 *
 * Collapses cleansed records to one per business key and reconciles
 * customer attributes that both source systems provide.
 */

import {
  CanonicalCustomer,
  CleansedCustomer,
  CleansedCustomerDemographics,
  Gender,
  IsoDate,
  SourceRecord,
  SourceSystem
} from '../types/index.js';
import { compareNullableDates } from '../utils/dates.js';
import { IssueRecorder } from './quality-issue-log.js';

export interface SelectLatestOptions<T extends SourceRecord> {
  businessKeyOf: (record: T) => string | null;
  /** Omitted when the source carries no recency attribute; row offset decides */
  recencyOf?: (record: T) => IsoDate | null;
  /** Fields that should be populated on at least one candidate of a key */
  requiredFields?: readonly (keyof T & string)[];
}

export interface SelectLatestResult<T> {
  records: T[];
  duplicatesRemoved: number;
  excluded: number;
}

// ==================== Attribute Preference Rules ====================

/**
 * Which source wins for an attribute both systems provide
 */
export interface AttributeRule<V> {
  attribute: string;
  primary: SourceSystem;
  fallback: SourceSystem | null;
  isAbsent: (value: V | null) => boolean;
}

export interface ResolvedAttribute<V> {
  value: V | null;
  source: SourceSystem | null;
}

const isAbsentGender = (value: Gender | null): boolean => value === null || value === 'n/a';

export const CUSTOMER_ATTRIBUTE_RULES: { gender: AttributeRule<Gender> } = {
  gender: {
    attribute: 'gender',
    primary: 'crm',
    fallback: 'erp',
    isAbsent: isAbsentGender
  }
};

export function resolveAttribute<V>(
  rule: AttributeRule<V>,
  values: Partial<Record<SourceSystem, V | null>>
): ResolvedAttribute<V> {
  const primary = values[rule.primary] ?? null;
  if (!rule.isAbsent(primary)) {
    return { value: primary, source: rule.primary };
  }

  if (rule.fallback !== null) {
    const fallback = values[rule.fallback] ?? null;
    if (!rule.isAbsent(fallback)) {
      return { value: fallback, source: rule.fallback };
    }
  }

  return { value: null, source: null };
}

/**
 * Later first; unknown recency sorts after every known one, then higher row offset first
 */
function compareByRecency<T extends SourceRecord>(
  recencyOf: ((record: T) => IsoDate | null) | undefined
): (a: T, b: T) => number {
  return (a, b) => {
    if (recencyOf) {
      const ra = recencyOf(a);
      const rb = recencyOf(b);
      if (ra !== rb) {
        if (ra === null) return 1;
        if (rb === null) return -1;
        return -compareNullableDates(ra, rb);
      }
    }
    return b.rowOffset - a.rowOffset;
  };
}

export class DeduplicationService {
  /**
   * Keep the most recent record per business key
   */
  selectLatest<T extends SourceRecord>(
    records: readonly T[],
    options: SelectLatestOptions<T>,
    issues: IssueRecorder
  ): SelectLatestResult<T> {
    const groups = new Map<string, T[]>();
    let excluded = 0;

    for (const record of records) {
      const key = options.businessKeyOf(record);
      if (key === null) {
        excluded++;
        issues.warning(
          'missing_business_key',
          'completeness',
          `Record at row ${record.rowOffset} has no business key and was excluded`,
          { rowOffset: record.rowOffset }
        );
        continue;
      }

      const group = groups.get(key);
      if (group) {
        group.push(record);
      } else {
        groups.set(key, [record]);
      }
    }

    const compare = compareByRecency(options.recencyOf);
    const selected: T[] = [];

    for (const [key, group] of groups) {
      const [winner] = [...group].sort(compare);
      selected.push(winner);

      for (const field of options.requiredFields ?? []) {
        if (group.every(record => record[field] === null)) {
          issues.warning(
            'required_value_missing',
            'completeness',
            `No record for key ${key} provides ${field}`,
            { businessKey: key, field, rowOffset: winner.rowOffset }
          );
        }
      }
    }

    return {
      records: selected,
      duplicatesRemoved: records.length - excluded - selected.length,
      excluded
    };
  }

  /**
   * Merge ERP demographics into deduplicated CRM customers
   */
  reconcileCustomers(
    customers: readonly CleansedCustomer[],
    demographicsByNumber: ReadonlyMap<string, CleansedCustomerDemographics>,
    issues: IssueRecorder
  ): CanonicalCustomer[] {
    const canonical: CanonicalCustomer[] = [];

    for (const customer of customers) {
      if (customer.customerId === null) {
        continue;
      }

      const businessKey = String(customer.customerId);
      const demographics = customer.customerNumber === null
        ? undefined
        : demographicsByNumber.get(customer.customerNumber);

      const gender = resolveAttribute(CUSTOMER_ATTRIBUTE_RULES.gender, {
        crm: customer.gender,
        erp: demographics?.gender ?? null
      });

      if (gender.source !== null && gender.source !== CUSTOMER_ATTRIBUTE_RULES.gender.primary) {
        issues.info(
          'secondary_source_applied',
          'consistency',
          `Gender for customer ${businessKey} taken from ${gender.source}`,
          {
            businessKey,
            field: 'gender',
            rowOffset: customer.rowOffset,
            originalValue: customer.gender,
            correctedValue: gender.value
          }
        );
      }

      canonical.push({
        businessKey,
        customerId: customer.customerId,
        customerNumber: customer.customerNumber,
        firstName: customer.firstName,
        lastName: customer.lastName,
        maritalStatus: customer.maritalStatus,
        gender: gender.value,
        createdAt: customer.createdAt,
        sourceRowOffset: customer.rowOffset
      });
    }

    return canonical;
  }
}
