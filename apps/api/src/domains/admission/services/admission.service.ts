// ============================================================================
// Admission Service
// Loads configuration for a facility, runs the financial decision pipeline
// (classify -> resolve rate -> revenue -> acuity -> resolve cost model ->
// cost -> projection -> score), persists the immutable evaluation and writes
// an audit entry. The pipeline itself is pure; all I/O happens here.
// ============================================================================

import {
  AdmissionAuditAction,
  DEFAULT_BUSINESS_WEIGHTS,
  DEFAULT_COST_POLICY,
  DEFAULT_SCORING_POLICY,
  TransportMode,
  type AuthorizationStatus,
  type BusinessWeights,
  type CostPolicy,
  type PayerType,
  type ScoringPolicy,
} from '@snfadmit/shared/constants/admission.constants.js';
import type { PdpmTables } from '@snfadmit/shared/schemas/validation/pdpm-tables.validation.js';
import {
  isoDate,
  type ClinicalFeatures,
  type CostModelRecord,
  type FacilityProfile,
  type RateRecord,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import type {
  CaseMixClassification,
  FinancialProjection,
  ScoreResult,
  SelectAdmissionEvaluation,
  StoredAdmissionRequest,
} from '@snfadmit/shared/schemas/db/admission.schema.js';
import {
  ConfigurationIntegrityError,
  NotFoundError,
  ValidationError,
} from '../../../lib/errors.js';
import type { ConfigRepository } from '../repos/config.repo.js';
import type { EvaluationRepository } from '../repos/evaluation.repo.js';
import { classify, deriveAcuityBand } from './case-mix-classifier.service.js';
import { calculateRevenue, assertValidLos } from './reimbursement.service.js';
import { estimateCost } from './cost-estimator.service.js';
import { buildProjection } from './financial-projection.service.js';
import { score } from './margin-scorer.service.js';
import {
  resolveRate,
  resolveCostModel,
  findRateOverlaps,
  findCostModelOverlaps,
  assertNoOverlaps,
  type IntervalOverlap,
} from './rate-resolver.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Pino-compatible subset; Fastify's `app.log` satisfies it. */
export interface AdmissionLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

export interface AdmissionServiceDeps {
  configRepo: ConfigRepository;
  evaluationRepo: EvaluationRepository;
  tables: PdpmTables;
  maxLosDays: number;
  costPolicy?: CostPolicy;
  scoringPolicy?: ScoringPolicy;
  logger?: AdmissionLogger;
  now?: () => Date; // injectable for testing
}

export interface AdmissionRequest {
  facilityId: string;
  payerType: PayerType;
  projectedLos: number;
  authorizationStatus: AuthorizationStatus;
  censusPriority: number;
  /** YYYY-MM-DD; defaults to today (UTC). */
  asOfDate?: string;
  transportRequired: boolean;
  /** Defaults to a wheelchair van. */
  transportMode?: TransportMode;
  businessWeights?: BusinessWeights;
  features: ClinicalFeatures;
}

export interface RecalculationOverrides {
  projectedLos?: number;
  censusPriority?: number;
  authorizationStatus?: AuthorizationStatus;
  businessWeights?: BusinessWeights;
  asOfDate?: string;
}

export interface AdmissionEvaluation {
  evaluationId: string;
  facilityId: string;
  payerType: PayerType;
  asOfDate: string;
  request: StoredAdmissionRequest;
  features: ClinicalFeatures;
  classification: CaseMixClassification;
  projection: FinancialProjection;
  score: ScoreResult;
  rateId: string;
  costModelId: string;
  parentEvaluationId: string | null;
  createdAt: string;
}

export interface ConfigIntegrityReport {
  facilityId: string;
  consistent: boolean;
  rateOverlaps: IntervalOverlap[];
  costModelOverlaps: IntervalOverlap[];
}

/** Everything the pipeline needs for one run, already loaded. */
export interface PipelineInput {
  request: AdmissionRequest & { asOfDate: string };
  facility: FacilityProfile;
  rateRecords: readonly RateRecord[];
  costModels: readonly CostModelRecord[];
}

export interface PipelineOutput {
  classification: CaseMixClassification;
  projection: FinancialProjection;
  score: ScoreResult;
  rateId: string;
  costModelId: string;
}

// ---------------------------------------------------------------------------
// Request validation (before any lookup)
// ---------------------------------------------------------------------------

function todayUtc(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function validateRequest(request: AdmissionRequest, maxLosDays: number): void {
  if (!request.facilityId) {
    throw new ValidationError('facilityId is required');
  }
  if (!request.payerType) {
    throw new ValidationError('payerType is required');
  }
  assertValidLos(request.projectedLos, maxLosDays);
  if (request.asOfDate !== undefined && !isoDate.safeParse(request.asOfDate).success) {
    throw new ValidationError('asOfDate must be an ISO date (YYYY-MM-DD)', {
      asOfDate: request.asOfDate,
    });
  }
  if (
    !Number.isFinite(request.censusPriority) ||
    request.censusPriority < 0 ||
    request.censusPriority > 1
  ) {
    throw new ValidationError('censusPriority must be between 0 and 1', {
      censusPriority: request.censusPriority,
    });
  }
  const weights = request.businessWeights;
  if (weights) {
    for (const [name, value] of Object.entries(weights)) {
      if (value === undefined) continue;
      if (!Number.isFinite(value) || value < 0) {
        throw new ValidationError(`Business weight ${name} must be a non-negative number`, {
          [name]: value,
        });
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Pipeline (pure)
// ---------------------------------------------------------------------------

export function runPipeline(
  input: PipelineInput,
  tables: PdpmTables,
  maxLosDays: number,
  costPolicy: CostPolicy = DEFAULT_COST_POLICY,
  scoringPolicy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): PipelineOutput {
  const { request, facility } = input;

  const classification = classify(request.features, tables);

  const rateRecord = resolveRate(
    input.rateRecords,
    facility.facilityId,
    request.payerType,
    request.asOfDate,
  );
  const revenue = calculateRevenue(
    {
      classification,
      rateRecord,
      los: request.projectedLos,
      wageIndex: facility.wageIndex,
      vbpMultiplier: facility.vbpMultiplier,
    },
    { tables, maxLosDays },
  );

  const acuityBand = deriveAcuityBand(classification, tables);
  const costModel = resolveCostModel(
    input.costModels,
    facility.facilityId,
    acuityBand,
    request.asOfDate,
  );
  const cost = estimateCost(
    {
      classification,
      costModel,
      los: request.projectedLos,
      authStatus: request.authorizationStatus,
      payerType: request.payerType,
      projectedRevenue: revenue.totalRevenue,
      transportRequired: request.transportRequired,
      transportMode: request.transportMode ?? TransportMode.WHEELCHAIR_VAN,
    },
    { ...costPolicy, maxLosDays },
  );

  const projection = buildProjection(revenue, cost);
  const result = score(
    revenue,
    cost,
    request.businessWeights ?? DEFAULT_BUSINESS_WEIGHTS,
    request.censusPriority,
    scoringPolicy,
    request.features.priorReadmission ?? false,
  );

  return {
    classification,
    projection,
    score: result,
    rateId: rateRecord.rateId,
    costModelId: costModel.costModelId,
  };
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toEvaluation(row: SelectAdmissionEvaluation): AdmissionEvaluation {
  return {
    evaluationId: row.evaluationId,
    facilityId: row.facilityId,
    payerType: row.payerType,
    asOfDate: row.asOfDate,
    request: row.request,
    features: row.features,
    classification: row.classification,
    projection: row.projection,
    score: row.score,
    rateId: row.rateId,
    costModelId: row.costModelId,
    parentEvaluationId: row.parentEvaluationId,
    createdAt: row.createdAt.toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Shared run: load, compute, persist, audit
// ---------------------------------------------------------------------------

async function runAndPersist(
  deps: AdmissionServiceDeps,
  request: AdmissionRequest,
  action: AdmissionAuditAction,
  parentEvaluationId: string | null,
): Promise<AdmissionEvaluation> {
  validateRequest(request, deps.maxLosDays);
  const asOfDate = request.asOfDate ?? todayUtc((deps.now ?? (() => new Date()))());

  const facility = await deps.configRepo.findFacility(request.facilityId);
  if (!facility) {
    throw new NotFoundError('Facility');
  }

  let output: PipelineOutput;
  try {
    const [rateRecords, costModels] = await Promise.all([
      deps.configRepo.listRateRecords(request.facilityId, request.payerType),
      deps.configRepo.listCostModels(request.facilityId),
    ]);
    output = runPipeline(
      { request: { ...request, asOfDate }, facility, rateRecords, costModels },
      deps.tables,
      deps.maxLosDays,
      deps.costPolicy,
      deps.scoringPolicy,
    );
  } catch (err) {
    if (err instanceof ConfigurationIntegrityError) {
      deps.logger?.warn(
        {
          facilityId: request.facilityId,
          payerType: request.payerType,
          asOfDate,
          code: err.code,
        },
        'Admission evaluation blocked by configuration',
      );
    }
    throw err;
  }

  const storedRequest: StoredAdmissionRequest = {
    projectedLos: request.projectedLos,
    authorizationStatus: request.authorizationStatus,
    censusPriority: request.censusPriority,
    transportRequired: request.transportRequired,
    transportMode: request.transportMode ?? TransportMode.WHEELCHAIR_VAN,
    businessWeights: { ...(request.businessWeights ?? DEFAULT_BUSINESS_WEIGHTS) },
  };

  const row = await deps.evaluationRepo.insertEvaluation({
    facilityId: request.facilityId,
    payerType: request.payerType,
    asOfDate,
    projectedLos: request.projectedLos,
    recommendation: output.score.recommendation,
    rawScore: output.score.rawScore.toFixed(2),
    rateId: output.rateId,
    costModelId: output.costModelId,
    parentEvaluationId,
    request: storedRequest,
    features: request.features,
    classification: output.classification,
    projection: output.projection,
    score: output.score,
  });

  await deps.evaluationRepo.appendAuditLog({
    action,
    category: 'admission',
    resourceType: 'admission_evaluation',
    resourceId: row.evaluationId,
    detail: {
      facilityId: request.facilityId,
      payerType: request.payerType,
      asOfDate,
      recommendation: output.score.recommendation,
      rawScore: output.score.rawScore,
      parentEvaluationId,
    },
  });

  deps.logger?.info(
    {
      evaluationId: row.evaluationId,
      facilityId: request.facilityId,
      payerType: request.payerType,
      recommendation: output.score.recommendation,
      rawScore: output.score.rawScore,
    },
    action === AdmissionAuditAction.RECALCULATED
      ? 'Admission recalculated'
      : 'Admission evaluated',
  );

  return toEvaluation(row);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export async function evaluateAdmission(
  deps: AdmissionServiceDeps,
  request: AdmissionRequest,
): Promise<AdmissionEvaluation> {
  return runAndPersist(deps, request, AdmissionAuditAction.EVALUATED, null);
}

/**
 * What-if: re-run the whole pipeline from a stored evaluation's features with
 * some scalar inputs overridden. The source evaluation is never modified.
 */
export async function recalculateAdmission(
  deps: AdmissionServiceDeps,
  evaluationId: string,
  overrides: RecalculationOverrides,
): Promise<AdmissionEvaluation> {
  const source = await deps.evaluationRepo.findEvaluationById(evaluationId);
  if (!source) {
    throw new NotFoundError('Admission evaluation');
  }

  const request: AdmissionRequest = {
    facilityId: source.facilityId,
    payerType: source.payerType,
    projectedLos: overrides.projectedLos ?? source.request.projectedLos,
    authorizationStatus:
      overrides.authorizationStatus ?? source.request.authorizationStatus,
    censusPriority: overrides.censusPriority ?? source.request.censusPriority,
    asOfDate: overrides.asOfDate ?? source.asOfDate,
    transportRequired: source.request.transportRequired,
    transportMode: source.request.transportMode,
    businessWeights: overrides.businessWeights ?? source.request.businessWeights,
    features: source.features,
  };

  return runAndPersist(
    deps,
    request,
    AdmissionAuditAction.RECALCULATED,
    source.evaluationId,
  );
}

export async function getEvaluation(
  deps: Pick<AdmissionServiceDeps, 'evaluationRepo'>,
  evaluationId: string,
): Promise<AdmissionEvaluation> {
  const row = await deps.evaluationRepo.findEvaluationById(evaluationId);
  if (!row) {
    throw new NotFoundError('Admission evaluation');
  }
  return toEvaluation(row);
}

/**
 * Overlapping effective intervals among a facility's rate records and cost
 * models. With `strict`, any overlap throws OverlappingIntervalsError instead
 * of being reported.
 */
export async function checkRateIntegrity(
  deps: Pick<AdmissionServiceDeps, 'configRepo' | 'logger'>,
  facilityId: string,
  options: { strict?: boolean } = {},
): Promise<ConfigIntegrityReport> {
  const facility = await deps.configRepo.findFacility(facilityId);
  if (!facility) {
    throw new NotFoundError('Facility');
  }

  const [rateRecords, costModels] = await Promise.all([
    deps.configRepo.listRateRecords(facilityId),
    deps.configRepo.listCostModels(facilityId),
  ]);
  const rateOverlaps = findRateOverlaps(rateRecords);
  const costModelOverlaps = findCostModelOverlaps(costModels);
  const consistent = rateOverlaps.length === 0 && costModelOverlaps.length === 0;

  if (!consistent) {
    deps.logger?.warn(
      {
        facilityId,
        rateOverlaps: rateOverlaps.length,
        costModelOverlaps: costModelOverlaps.length,
      },
      'Overlapping configuration intervals',
    );
  }
  if (options.strict) {
    assertNoOverlaps([...rateOverlaps, ...costModelOverlaps]);
  }

  return { facilityId, consistent, rateOverlaps, costModelOverlaps };
}
