/**
 * Dimensional Assembly
 *
 * Builds the customer and product dimensions with surrogate keys and links
 * every sales line to them.
 */

import {
  CanonicalCustomer,
  CanonicalProduct,
  CleansedCustomerDemographics,
  CleansedCustomerLocation,
  CleansedProductCategory,
  CustomerFamilyOutput,
  DimCustomer,
  DimProduct,
  DimensionKeyRef,
  DimensionName,
  FactSalesLine,
  KeyAssignmentTable,
  ProductFamilyOutput,
  ReconciledSalesLine,
  StructuralError,
  SurrogateKey,
  UNRESOLVED
} from '../types/index.js';
import { compareNullableDates } from '../utils/dates.js';
import { IssueRecorder } from './quality-issue-log.js';

export interface SurrogateKeyOptions<T> {
  dimension: DimensionName;
  businessKeyOf: (entity: T) => string;
  compare?: (a: T, b: T) => number;
  /** Assignments kept from earlier runs; omitted when keys are recomputed */
  existing?: KeyAssignmentTable;
}

export interface SurrogateKeyAssignment {
  /** Keys of the entities handed in */
  keys: Map<string, SurrogateKey>;
  /** Every known assignment, including ones carried over */
  assignments: Map<string, SurrogateKey>;
  added: number;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export const compareCustomers = (a: CanonicalCustomer, b: CanonicalCustomer): number =>
  a.customerId - b.customerId;

export const compareProducts = (a: CanonicalProduct, b: CanonicalProduct): number =>
  compareNullableDates(a.startDate, b.startDate) || compareText(a.productNumber, b.productNumber);

/**
 * Deterministic keys: order by `compare`, ties by business key
 */
export function assignSurrogateKeys<T>(
  entities: readonly T[],
  options: SurrogateKeyOptions<T>
): SurrogateKeyAssignment {
  const seen = new Set<string>();
  for (const entity of entities) {
    const key = options.businessKeyOf(entity);
    if (seen.has(key)) {
      throw new StructuralError(
        options.dimension,
        `Business key ${key} appears more than once in ${options.dimension}`
      );
    }
    seen.add(key);
  }

  const compare = options.compare;
  const ordered = [...entities].sort(
    (a, b) =>
      (compare ? compare(a, b) : 0) ||
      compareText(options.businessKeyOf(a), options.businessKeyOf(b))
  );

  const assignments = new Map<string, SurrogateKey>(options.existing ?? []);
  const keys = new Map<string, SurrogateKey>();
  let next = Math.max(0, ...assignments.values()) + 1;
  let added = 0;

  for (const entity of ordered) {
    const businessKey = options.businessKeyOf(entity);
    let key = assignments.get(businessKey);
    if (key === undefined) {
      key = next++;
      added++;
      assignments.set(businessKey, key);
    }
    keys.set(businessKey, key);
  }

  return { keys, assignments, added };
}

export class DimensionalAssemblyService {
  buildCustomerDimension(
    customers: readonly CanonicalCustomer[],
    demographicsByNumber: ReadonlyMap<string, CleansedCustomerDemographics>,
    locationsByNumber: ReadonlyMap<string, CleansedCustomerLocation>,
    existing?: KeyAssignmentTable
  ): CustomerFamilyOutput {
    const { keys, assignments } = assignSurrogateKeys(customers, {
      dimension: 'dim_customer',
      businessKeyOf: customer => customer.businessKey,
      compare: compareCustomers,
      existing
    });

    const rows: DimCustomer[] = [];
    const keysByCustomerId = new Map<number, SurrogateKey>();

    for (const customer of customers) {
      const customerKey = keys.get(customer.businessKey);
      if (customerKey === undefined) {
        continue;
      }

      const number = customer.customerNumber;
      const demographics = number === null ? undefined : demographicsByNumber.get(number);
      const location = number === null ? undefined : locationsByNumber.get(number);

      keysByCustomerId.set(customer.customerId, customerKey);
      rows.push({
        customerKey,
        customerId: customer.customerId,
        customerNumber: customer.customerNumber,
        firstName: customer.firstName,
        lastName: customer.lastName,
        country: location?.country ?? null,
        maritalStatus: customer.maritalStatus,
        gender: customer.gender,
        birthDate: demographics?.birthDate ?? null,
        createdAt: customer.createdAt
      });
    }

    rows.sort((a, b) => a.customerKey - b.customerKey);
    return { rows, keysByCustomerId, assignments };
  }

  buildProductDimension(
    products: readonly CanonicalProduct[],
    categoriesById: ReadonlyMap<string, CleansedProductCategory>,
    existing?: KeyAssignmentTable
  ): ProductFamilyOutput {
    const { keys, assignments } = assignSurrogateKeys(products, {
      dimension: 'dim_product',
      businessKeyOf: product => product.productNumber,
      compare: compareProducts,
      existing
    });

    const rows: DimProduct[] = [];
    const keysByProductNumber = new Map<string, SurrogateKey>();

    for (const product of products) {
      const productKey = keys.get(product.productNumber);
      if (productKey === undefined) {
        continue;
      }

      const category = product.categoryId === null ? undefined : categoriesById.get(product.categoryId);

      keysByProductNumber.set(product.productNumber, productKey);
      rows.push({
        productKey,
        productId: product.productId,
        productNumber: product.productNumber,
        productName: product.productName,
        categoryId: product.categoryId,
        category: category?.category ?? null,
        subcategory: category?.subcategory ?? null,
        maintenance: category?.maintenance ?? null,
        cost: product.cost,
        productLine: product.productLine,
        startDate: product.startDate
      });
    }

    rows.sort((a, b) => a.productKey - b.productKey);
    return { rows, keysByProductNumber, assignments };
  }

  /**
   * One fact per sales line; failed lookups keep the line with an unresolved key
   */
  buildSalesFacts(
    lines: readonly ReconciledSalesLine[],
    customerKeys: ReadonlyMap<number, SurrogateKey>,
    productKeys: ReadonlyMap<string, SurrogateKey>,
    issues: IssueRecorder
  ): FactSalesLine[] {
    return lines.map(line => {
      const customerKey = this.resolve(
        line.customerId === null ? undefined : customerKeys.get(line.customerId),
        line,
        'customerKey',
        `customer ${line.customerId}`,
        issues
      );
      const productKey = this.resolve(
        line.productNumber === null ? undefined : productKeys.get(line.productNumber),
        line,
        'productKey',
        `product ${line.productNumber}`,
        issues
      );

      return {
        orderNumber: line.orderNumber,
        lineNumber: line.lineNumber,
        productNumber: line.productNumber,
        customerId: line.customerId,
        productKey,
        customerKey,
        orderDate: line.orderDate,
        shipDate: line.shipDate,
        dueDate: line.dueDate,
        amount: line.amount,
        quantity: line.quantity,
        price: line.price,
        reconciliationStatus: line.reconciliationStatus
      };
    });
  }

  private resolve(
    key: SurrogateKey | undefined,
    line: ReconciledSalesLine,
    field: 'customerKey' | 'productKey',
    reference: string,
    issues: IssueRecorder
  ): DimensionKeyRef {
    if (key !== undefined) {
      return key;
    }

    issues.warning(
      'unresolved_reference',
      'referential',
      `Line ${line.lineNumber} of order ${line.orderNumber} references unknown ${reference}`,
      { businessKey: line.orderNumber, field, rowOffset: line.rowOffset }
    );
    return UNRESOLVED;
  }
}
