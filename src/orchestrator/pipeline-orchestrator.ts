/**
 * Pipeline Orchestrator for the sales warehouse
 * Runs the customer, product and sales chains concurrently, gates the sales
 * facts on both dimensions and publishes the run through the warehouse
 * staging area
 */

import { v4 as uuidv4 } from 'uuid';
import { PipelineConfig, loadPipelineConfig } from '../config/pipeline-config.js';
import { IPipelineOrchestrator, RunReportSink } from '../interfaces/orchestrator.js';
import { IRawStore, IRawStoreConnector } from '../interfaces/stores.js';
import { IWarehouseRepository } from '../repository/warehouse-repository.js';
import { BusinessRuleService } from '../services/business-rule-service.js';
import { CleansingService } from '../services/cleansing-service.js';
import { DeduplicationService } from '../services/deduplication-service.js';
import { DimensionalAssemblyService } from '../services/dimensional-assembly-service.js';
import { IssueRecorder, QualityIssueLog } from '../services/quality-issue-log.js';
import { QualityValidationService } from '../services/quality-validation-service.js';
import {
  DimensionKeyRef,
  DimensionName,
  EntityFamily,
  ErrorInfo,
  FactSalesLine,
  FamilyOutcome,
  FamilyOutputs,
  FamilyReport,
  FamilyStatus,
  ISSUE_ERROR_KINDS,
  KeyAssignmentTable,
  PublishReport,
  QualityGateError,
  RawStoreLocator,
  RawTable,
  RawTableName,
  RunAbortedError,
  RunOptions,
  RunReport,
  RunResult,
  RunStatus,
  StageName,
  StageOutcome,
  StageReport,
  StageStatus,
  StructuralError,
  UNRESOLVED,
  logError,
  toErrorInfo
} from '../types/index.js';
import { indexBy } from '../utils/collections.js';

/**
 * Family dependency configuration
 * Defines which families must finish assembly before another can assemble
 */
export const FAMILY_DEPENDENCIES: Record<EntityFamily, EntityFamily[]> = {
  customer: [],
  product: [],
  sales: ['customer', 'product']
};

/**
 * Stages each family chain runs, in order
 */
export const FAMILY_STAGES: Record<EntityFamily, StageName[]> = {
  customer: ['cleanse', 'deduplicate', 'assemble'],
  product: ['cleanse', 'deduplicate', 'apply_rules', 'assemble'],
  sales: ['cleanse', 'apply_rules', 'assemble']
};

export interface PipelineOrchestratorOptions {
  config?: PipelineConfig;
  reportSink?: RunReportSink;
}

interface RunContext {
  runId: string;
  issues: QualityIssueLog;
  signal?: AbortSignal;
}

interface FamilyOutcomes {
  customer: FamilyOutcome<'customer'>;
  product: FamilyOutcome<'product'>;
  sales: FamilyOutcome<'sales'>;
}

type StageFailure = Extract<StageOutcome<unknown>, { ok: false }>;

/**
 * Collects stage reports for one family chain
 */
class FamilyRun<F extends EntityFamily> {
  private readonly stages: StageReport[] = [];
  private readonly started = Date.now();

  constructor(public readonly family: F) {}

  record(report: StageReport): void {
    this.stages.push(report);
  }

  succeed(output: FamilyOutputs[F], outputCount: number): FamilyOutcome<F> {
    return {
      family: this.family,
      status: 'succeeded',
      output,
      report: this.report('succeeded', outputCount)
    };
  }

  stop(failure: StageFailure): FamilyOutcome<F> {
    const status = failure.report.status === 'aborted' ? 'aborted' : 'failed';
    return this.fail(status, failure.error);
  }

  fail(status: 'failed' | 'aborted', error: ErrorInfo): FamilyOutcome<F> {
    const report = this.report(status, 0);
    report.error = error;
    return { family: this.family, status, report };
  }

  block(blockedBy: EntityFamily[]): FamilyOutcome<F> {
    const report = this.report('blocked', 0);
    report.blockedBy = blockedBy;
    return { family: this.family, status: 'blocked', report };
  }

  private report(status: FamilyStatus, outputCount: number): FamilyReport {
    const ran = new Set(this.stages.map(stage => stage.stage));
    const skipped: StageReport[] = FAMILY_STAGES[this.family]
      .filter(stage => !ran.has(stage))
      .map((stage): StageReport => ({
        family: this.family,
        stage,
        status: 'skipped',
        startedAt: new Date(),
        durationMs: 0,
        recordCount: 0,
        issueCount: 0
      }));

    return {
      family: this.family,
      status,
      stages: [...this.stages, ...skipped],
      durationMs: Date.now() - this.started,
      outputCount
    };
  }
}

function runStatusOf(statuses: FamilyStatus[], aborted: boolean): RunStatus {
  if (aborted) return 'aborted';
  if (statuses.every(status => status === 'succeeded')) return 'succeeded';
  if (statuses.every(status => status !== 'succeeded')) return 'failed';
  return 'partial';
}

/**
 * Implementation of the Pipeline Orchestrator
 */
export class PipelineOrchestrator implements IPipelineOrchestrator {
  private readonly config: PipelineConfig;
  private readonly reportSink?: RunReportSink;
  private readonly cleansing: CleansingService;
  private readonly deduplication = new DeduplicationService();
  private readonly rules: BusinessRuleService;
  private readonly assembly = new DimensionalAssemblyService();
  private readonly validation: QualityValidationService;

  constructor(
    private connector: IRawStoreConnector,
    private warehouse: IWarehouseRepository,
    options: PipelineOrchestratorOptions = {}
  ) {
    this.config = options.config ?? loadPipelineConfig();
    this.reportSink = options.reportSink;
    this.cleansing = new CleansingService(this.config);
    this.rules = new BusinessRuleService(this.config);
    this.validation = new QualityValidationService(this.config);
  }

  /**
   * Rebuild the star schema from the Raw Store behind the locator.
   * Throws RunLockError when another run holds the warehouse.
   */
  async runPipeline(
    locator: RawStoreLocator,
    runId: string = uuidv4(),
    options: RunOptions = {}
  ): Promise<RunResult> {
    this.warehouse.acquireRunLock(runId);

    try {
      const startedAt = new Date();
      const ctx: RunContext = { runId, issues: new QualityIssueLog(runId), signal: options.signal };
      this.log('[RUN]', { runId, event: 'started', uri: locator.uri });

      this.warehouse.beginStaging(runId);

      let outcomes: FamilyOutcomes;
      let runError: ErrorInfo | undefined;
      try {
        const store = await this.connector.connect(locator);
        outcomes = await this.runFamilies(ctx, store);
      } catch (error) {
        if (this.config.logToConsole) {
          logError(error, { runId, uri: locator.uri });
        }
        runError = toErrorInfo(error);
        outcomes = {
          customer: new FamilyRun('customer').fail('failed', runError),
          product: new FamilyRun('product').fail('failed', runError),
          sales: new FamilyRun('sales').fail('failed', runError)
        };
      }

      const aborted = ctx.signal?.aborted === true;
      if (aborted && runError === undefined) {
        runError = toErrorInfo(new RunAbortedError(runId, ctx.signal?.reason));
      }

      const publish = this.publish(ctx, outcomes, aborted);
      const families = [outcomes.customer, outcomes.product, outcomes.sales];
      const completedAt = new Date();

      const report: RunReport = {
        runId,
        status: runStatusOf(families.map(outcome => outcome.status), aborted),
        startedAt,
        completedAt,
        durationMs: completedAt.getTime() - startedAt.getTime(),
        families: families.map(outcome => outcome.report),
        publish,
        issueTotals: ctx.issues.totals(),
        issues: ctx.issues.all()
      };
      if (runError) {
        report.error = runError;
      }

      this.log('[RUN]', {
        runId,
        event: 'completed',
        status: report.status,
        durationMs: report.durationMs,
        published: publish.tables,
        version: publish.version,
        issues: report.issueTotals
      });
      await this.emitReport(report);

      return {
        runId,
        success: report.status === 'succeeded',
        families: {
          customer: outcomes.customer.status,
          product: outcomes.product.status,
          sales: outcomes.sales.status
        },
        report
      };
    } finally {
      this.warehouse.releaseRunLock(runId);
    }
  }

  private async runFamilies(ctx: RunContext, store: IRawStore): Promise<FamilyOutcomes> {
    const customer = this.runCustomerChain(ctx, store);
    const product = this.runProductChain(ctx, store);
    const sales = this.runSalesChain(ctx, store, customer, product);

    const [customerOutcome, productOutcome, salesOutcome] = await Promise.all([customer, product, sales]);
    return { customer: customerOutcome, product: productOutcome, sales: salesOutcome };
  }

  // ==================== Family Chains ====================

  private async runCustomerChain(ctx: RunContext, store: IRawStore): Promise<FamilyOutcome<'customer'>> {
    const run = new FamilyRun('customer');

    const cleansed = await this.runStage(ctx, run, 'cleanse', 'crm_cust_info', async issues => ({
      customers: this.cleansing.cleanseCustomers(await this.readRequired(store, 'crm_cust_info'), issues),
      demographics: await this.readEnrichment(store, 'erp_cust_az12', issues, (table, recorder) =>
        this.cleansing.cleanseCustomerDemographics(table, recorder)
      ),
      locations: await this.readEnrichment(store, 'erp_loc_a101', issues, (table, recorder) =>
        this.cleansing.cleanseCustomerLocations(table, recorder)
      )
    }), value => value.customers.length, (value, issues) =>
      this.validation.validateCleansedCustomers(value.customers, issues)
    );
    if (!cleansed.ok) return run.stop(cleansed);

    const canonical = await this.runStage(ctx, run, 'deduplicate', 'crm_cust_info', issues => {
      const customers = this.deduplication.selectLatest(cleansed.value.customers, {
        businessKeyOf: customer => (customer.customerId === null ? null : String(customer.customerId)),
        recencyOf: customer => customer.createdAt,
        requiredFields: ['customerNumber']
      }, issues);
      const demographics = this.deduplication.selectLatest(cleansed.value.demographics, {
        businessKeyOf: record => record.customerNumber
      }, issues.forEntity('erp_cust_az12'));
      const locations = this.deduplication.selectLatest(cleansed.value.locations, {
        businessKeyOf: record => record.customerNumber
      }, issues.forEntity('erp_loc_a101'));

      const demographicsByNumber = indexBy(demographics.records, record => record.customerNumber);
      return {
        customers: this.deduplication.reconcileCustomers(customers.records, demographicsByNumber, issues),
        demographicsByNumber,
        locationsByNumber: indexBy(locations.records, record => record.customerNumber)
      };
    }, value => value.customers.length, (value, issues) =>
      this.validation.validateCanonicalCustomers(value.customers, issues)
    );
    if (!canonical.ok) return run.stop(canonical);

    const dimension = await this.runStage(ctx, run, 'assemble', 'dim_customer', () =>
      this.assembly.buildCustomerDimension(
        canonical.value.customers,
        canonical.value.demographicsByNumber,
        canonical.value.locationsByNumber,
        this.existingKeys('dim_customer')
      ), value => value.rows.length, (value, issues) =>
      this.validation.validateCustomerDimension(value.rows, issues)
    );
    if (!dimension.ok) return run.stop(dimension);

    return run.succeed(dimension.value, dimension.value.rows.length);
  }

  private async runProductChain(ctx: RunContext, store: IRawStore): Promise<FamilyOutcome<'product'>> {
    const run = new FamilyRun('product');

    const cleansed = await this.runStage(ctx, run, 'cleanse', 'crm_prd_info', async issues => ({
      products: this.cleansing.cleanseProducts(await this.readRequired(store, 'crm_prd_info'), issues),
      categories: await this.readEnrichment(store, 'erp_px_cat_g1v2', issues, (table, recorder) =>
        this.cleansing.cleanseProductCategories(table, recorder)
      )
    }), value => value.products.length, (value, issues) =>
      this.validation.validateCleansedProducts(value.products, issues)
    );
    if (!cleansed.ok) return run.stop(cleansed);

    const deduplicated = await this.runStage(ctx, run, 'deduplicate', 'crm_prd_info', issues => {
      const products = this.deduplication.selectLatest(cleansed.value.products, {
        businessKeyOf: product => (product.productId === null ? null : String(product.productId)),
        requiredFields: ['productKey']
      }, issues);
      const categories = this.deduplication.selectLatest(cleansed.value.categories, {
        businessKeyOf: category => category.categoryId
      }, issues.forEntity('erp_px_cat_g1v2'));

      return {
        products: products.records,
        categoriesById: indexBy(categories.records, category => category.categoryId)
      };
    }, value => value.products.length, (value, issues) =>
      this.validation.validateCanonicalProducts(value.products, issues)
    );
    if (!deduplicated.ok) return run.stop(deduplicated);

    const versioned = await this.runStage(ctx, run, 'apply_rules', 'crm_prd_info', issues => {
      const versions = this.rules.deriveValidityWindows(
        this.rules.categorizeProducts(deduplicated.value.products, issues),
        issues
      );
      return { versions, current: this.rules.currentVersions(versions) };
    }, value => value.versions.length, (value, issues) =>
      this.validation.validateProductVersions(value.versions, issues)
    );
    if (!versioned.ok) return run.stop(versioned);

    const dimension = await this.runStage(ctx, run, 'assemble', 'dim_product', () =>
      this.assembly.buildProductDimension(
        versioned.value.current,
        deduplicated.value.categoriesById,
        this.existingKeys('dim_product')
      ), value => value.rows.length, (value, issues) =>
      this.validation.validateProductDimension(value.rows, issues)
    );
    if (!dimension.ok) return run.stop(dimension);

    return run.succeed(dimension.value, dimension.value.rows.length);
  }

  /**
   * Cleanse and rules run immediately; assembly waits for both dimensions
   */
  private async runSalesChain(
    ctx: RunContext,
    store: IRawStore,
    customerChain: Promise<FamilyOutcome<'customer'>>,
    productChain: Promise<FamilyOutcome<'product'>>
  ): Promise<FamilyOutcome<'sales'>> {
    const run = new FamilyRun('sales');

    const cleansed = await this.runStage(ctx, run, 'cleanse', 'crm_sales_details', async issues =>
      this.cleansing.cleanseSales(await this.readRequired(store, 'crm_sales_details'), issues),
      value => value.length, (value, issues) => this.validation.validateCleansedSales(value, issues)
    );
    if (!cleansed.ok) return run.stop(cleansed);

    const reconciled = await this.runStage(ctx, run, 'apply_rules', 'crm_sales_details', issues =>
      this.rules.reconcileSalesLines(cleansed.value, issues),
      value => value.length, (value, issues) => this.validation.validateReconciledSales(value, issues)
    );
    if (!reconciled.ok) return run.stop(reconciled);

    const [customer, product] = await Promise.all([customerChain, productChain]);
    const settled: FamilyOutcome<EntityFamily>[] = [customer, product];
    const blockedBy = FAMILY_DEPENDENCIES.sales.filter(
      dependency => settled.find(outcome => outcome.family === dependency)?.status !== 'succeeded'
    );
    if (blockedBy.length > 0 || customer.status !== 'succeeded' || product.status !== 'succeeded') {
      return run.block(blockedBy);
    }

    const customerKeys = customer.output.keysByCustomerId;
    const productKeys = product.output.keysByProductNumber;

    const facts = await this.runStage(ctx, run, 'assemble', 'fact_sales_line', issues =>
      this.assembly.buildSalesFacts(reconciled.value, customerKeys, productKeys, issues),
      value => value.length, (value, issues) =>
      this.validation.validateSalesFacts(
        value,
        reconciled.value.length,
        new Set(customer.output.rows.map(row => row.customerKey)),
        new Set(product.output.rows.map(row => row.productKey)),
        issues
      )
    );
    if (!facts.ok) return run.stop(facts);

    return run.succeed({ rows: facts.value }, facts.value.length);
  }

  // ==================== Stage Boundary ====================

  /**
   * Runs one stage and its validation; errors and fatal issues become a failed outcome
   */
  private async runStage<F extends EntityFamily, T>(
    ctx: RunContext,
    run: FamilyRun<F>,
    stage: StageName,
    entity: string,
    work: (issues: IssueRecorder) => T | Promise<T>,
    recordCountOf: (value: T) => number,
    validate?: (value: T, issues: IssueRecorder) => void
  ): Promise<StageOutcome<T>> {
    const family = run.family;
    const issues = ctx.issues.recorder({ family, stage, entity });
    const startedAt = new Date();

    const finish = (status: StageStatus, recordCount: number, error?: ErrorInfo): StageReport => {
      const report: StageReport = {
        family,
        stage,
        status,
        startedAt,
        durationMs: Date.now() - startedAt.getTime(),
        recordCount,
        issueCount: issues.recorded().length
      };
      if (error) {
        report.error = error;
      }
      run.record(report);
      this.log('[STAGE]', {
        runId: ctx.runId,
        family,
        stage,
        status,
        durationMs: report.durationMs,
        recordCount,
        issueCount: report.issueCount
      });
      return report;
    };

    if (ctx.signal?.aborted) {
      const error = toErrorInfo(new RunAbortedError(ctx.runId, ctx.signal.reason), { family, stage });
      return { ok: false, error, report: finish('aborted', 0, error) };
    }

    try {
      const value = await work(issues);
      validate?.(value, issues);

      const fatal = issues.recorded().filter(issue => issue.severity === 'fatal');
      if (fatal.length > 0) {
        const [first] = fatal;
        const error = toErrorInfo(
          new QualityGateError(entity, fatal.length, first.message, ISSUE_ERROR_KINDS[first.kind]),
          { family, stage }
        );
        return { ok: false, error, report: finish('failed', recordCountOf(value), error) };
      }

      return { ok: true, value, report: finish('succeeded', recordCountOf(value)) };
    } catch (error) {
      if (error instanceof StructuralError) {
        issues.fatal('structural_error', 'structural', error.message, { entity: error.entity });
      }
      if (this.config.logToConsole) {
        logError(error, { runId: ctx.runId, family, stage });
      }
      const info = toErrorInfo(error, { family, stage });
      return { ok: false, error: info, report: finish('failed', 0, info) };
    }
  }

  // ==================== Raw Store Access ====================

  private async readRequired(store: IRawStore, name: RawTableName): Promise<RawTable> {
    return this.cleansing.requireTable(name, await store.readTable(name));
  }

  /**
   * Missing enrichment tables leave the enrichment empty
   */
  private async readEnrichment<T>(
    store: IRawStore,
    name: RawTableName,
    issues: IssueRecorder,
    cleanse: (table: RawTable, issues: IssueRecorder) => T[]
  ): Promise<T[]> {
    const table = await store.readTable(name);
    if (!table) {
      issues.warning(
        'enrichment_table_missing',
        'completeness',
        `Enrichment table ${name} is missing; its attributes stay empty`,
        { entity: name }
      );
      return [];
    }
    return cleanse(table, issues);
  }

  // ==================== Publication ====================

  private existingKeys(dimension: DimensionName): KeyAssignmentTable | undefined {
    return this.config.surrogateKeyStrategy === 'persistent'
      ? this.warehouse.getKeyAssignments(dimension)
      : undefined;
  }

  /**
   * Stage the output of every succeeded family and swap it in. Without new
   * facts, a rebuilt dimension is only staged when the published facts keep
   * resolving to their own entities through it.
   */
  private publish(ctx: RunContext, outcomes: FamilyOutcomes, aborted: boolean): PublishReport {
    const { runId } = ctx;
    if (aborted) {
      this.warehouse.discardStaging(runId);
      return { committed: false, tables: [], version: this.warehouse.getSnapshot().version };
    }

    const { customer, product, sales } = outcomes;
    const withFacts = sales.status === 'succeeded';
    const published = this.warehouse.getSnapshot().factSalesLine;

    if (customer.status === 'succeeded') {
      const { rows, assignments, keysByCustomerId } = customer.output;
      const staged =
        withFacts ||
        this.keepsFactKeys(ctx, 'customer', 'dim_customer', published, fact => ({
          published: fact.customerKey,
          rebuilt: fact.customerId === null ? undefined : keysByCustomerId.get(fact.customerId)
        }));
      if (staged) {
        this.warehouse.stageTable(runId, 'dim_customer', rows);
        this.warehouse.stageKeyAssignments(runId, 'dim_customer', assignments);
      }
    }
    if (product.status === 'succeeded') {
      const { rows, assignments, keysByProductNumber } = product.output;
      const staged =
        withFacts ||
        this.keepsFactKeys(ctx, 'product', 'dim_product', published, fact => ({
          published: fact.productKey,
          rebuilt: fact.productNumber === null ? undefined : keysByProductNumber.get(fact.productNumber)
        }));
      if (staged) {
        this.warehouse.stageTable(runId, 'dim_product', rows);
        this.warehouse.stageKeyAssignments(runId, 'dim_product', assignments);
      }
    }
    if (withFacts) {
      this.warehouse.stageTable(runId, 'fact_sales_line', sales.output.rows);
    }

    return this.warehouse.commitStaging(runId);
  }

  /**
   * Whether every resolved key on the published facts maps to the same
   * entity under a rebuilt dimension; records a warning when it does not
   */
  private keepsFactKeys(
    ctx: RunContext,
    family: EntityFamily,
    dimension: DimensionName,
    facts: readonly FactSalesLine[],
    keysOf: (fact: FactSalesLine) => { published: DimensionKeyRef; rebuilt: number | undefined }
  ): boolean {
    const moved = facts.filter(fact => {
      const { published, rebuilt } = keysOf(fact);
      return published !== UNRESOLVED && rebuilt !== published;
    });
    if (moved.length === 0) {
      return true;
    }

    ctx.issues
      .recorder({ family, stage: 'assemble', entity: dimension })
      .warning(
        'publication_withheld',
        'referential',
        `${dimension} not published: ${moved.length} published fact line(s) would resolve to other entities`,
        { entity: dimension }
      );
    this.log('[RUN]', { runId: ctx.runId, withheld: dimension, factLines: moved.length });
    return false;
  }

  private async emitReport(report: RunReport): Promise<void> {
    if (!this.reportSink) {
      return;
    }
    try {
      await this.reportSink.publish(report);
    } catch (error) {
      logError(error, { runId: report.runId, operation: 'emitReport' });
    }
  }

  private log(tag: '[RUN]' | '[STAGE]', entry: Record<string, unknown>): void {
    if (this.config.logToConsole) {
      console.log(tag, entry);
    }
  }
}
