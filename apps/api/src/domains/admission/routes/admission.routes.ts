// ============================================================================
// Admission Routes
// Evaluate a prospective admission, re-run it as a what-if, fetch a stored
// evaluation, and check a facility's configuration for overlapping intervals.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  evaluateAdmissionSchema,
  recalculateAdmissionSchema,
  evaluationIdParamSchema,
  facilityIdParamSchema,
  configIntegrityQuerySchema,
  type EvaluateAdmission,
  type RecalculateAdmission,
  type EvaluationIdParam,
  type FacilityIdParam,
  type ConfigIntegrityQuery,
  type BusinessWeightsBody,
  type ClinicalFeaturesBody,
  type ClinicalFeatures,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import {
  DEFAULT_READMIT_RISK_WEIGHT,
  TransportMode,
  type BusinessWeights,
} from '@snfadmit/shared/constants/admission.constants.js';
import type {
  CaseMixClassification,
  CostBreakdown,
  FinancialProjection,
  RevenueBreakdown,
  ScoreResult,
} from '@snfadmit/shared/schemas/db/admission.schema.js';
import { evaluationRateLimit } from '../../../plugins/rate-limit.plugin.js';
import {
  evaluateAdmission,
  recalculateAdmission,
  getEvaluation,
  checkRateIntegrity,
  type AdmissionEvaluation,
  type AdmissionServiceDeps,
} from '../services/admission.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdmissionRouteDeps {
  /** Service dependencies; the route substitutes the request logger. */
  service: AdmissionServiceDeps;
}

// ---------------------------------------------------------------------------
// Wire mapping: snake_case in, snake_case out
// ---------------------------------------------------------------------------

function toWeights(body: BusinessWeightsBody | undefined): BusinessWeights | undefined {
  if (!body) return undefined;
  return {
    censusWeight: body.census_weight,
    riskWeight: body.risk_weight,
    complexityWeight: body.complexity_weight,
    readmitRiskWeight: body.readmit_risk_weight,
  };
}

function toFeatures(body: ClinicalFeaturesBody): ClinicalFeatures {
  return {
    primaryDiagnosis: body.primary_diagnosis,
    secondaryDiagnoses: body.secondary_diagnoses,
    medications: body.medications,
    independenceScore: body.independence_score,
    cognitiveScore: body.cognitive_score,
    therapyMinutes: body.therapy_minutes,
    comorbidities: body.comorbidities,
    specialCare: body.special_care,
    priorReadmission: body.prior_readmission,
  };
}

function serializeFeatures(f: ClinicalFeatures) {
  return {
    primary_diagnosis: f.primaryDiagnosis,
    secondary_diagnoses: f.secondaryDiagnoses,
    medications: f.medications,
    independence_score: f.independenceScore,
    cognitive_score: f.cognitiveScore,
    therapy_minutes: f.therapyMinutes,
    comorbidities: f.comorbidities,
    special_care: f.specialCare,
    prior_readmission: f.priorReadmission ?? false,
  };
}

function serializeClassification(c: CaseMixClassification) {
  return {
    clinical_category: c.clinicalCategory,
    pt_group: c.ptGroup,
    ot_group: c.otGroup,
    slp_group: c.slpGroup,
    nursing_group: c.nursingGroup,
    nta_score: c.ntaScore,
    nta_band: c.ntaBand,
    nta_conditions: c.ntaConditions,
    clinical_complexity: c.clinicalComplexity,
    comorbidities: c.comorbidities,
    special_care: c.specialCare,
    warnings: c.warnings,
    tables_version: c.tablesVersion,
  };
}

function serializeRevenue(r: RevenueBreakdown) {
  return {
    payer_type: r.payerType,
    method: r.method,
    rate_id: r.rateId,
    los: r.los,
    components: r.components,
    total_revenue: r.totalRevenue,
    per_diem: r.perDiem,
  };
}

function serializeCost(c: CostBreakdown) {
  return {
    acuity_band: c.acuityBand,
    cost_model_id: c.costModelId,
    los: c.los,
    components: c.components,
    direct_cost: c.directCost,
    total_cost_before_risk: c.totalCostBeforeRisk,
    total_cost: c.totalCost,
    per_diem: c.perDiem,
    denial_probability: c.denialProbability,
    clinical_complexity: c.clinicalComplexity,
  };
}

function serializeProjection(p: FinancialProjection) {
  return {
    revenue: serializeRevenue(p.revenue),
    cost: serializeCost(p.cost),
    projected_margin_total: p.projectedMarginTotal,
    projected_margin_per_diem: p.projectedMarginPerDiem,
    margin_pct: p.marginPct,
  };
}

function serializeScore(s: ScoreResult) {
  return {
    raw_score: s.rawScore,
    base_score: s.baseScore,
    margin_per_diem: s.marginPerDiem,
    recommendation: s.recommendation,
    factors: s.factors,
    summary: s.summary,
  };
}

function serializeEvaluation(e: AdmissionEvaluation) {
  return {
    evaluation_id: e.evaluationId,
    parent_evaluation_id: e.parentEvaluationId,
    facility_id: e.facilityId,
    payer_type: e.payerType,
    as_of_date: e.asOfDate,
    rate_id: e.rateId,
    cost_model_id: e.costModelId,
    request: {
      projected_los: e.request.projectedLos,
      authorization_status: e.request.authorizationStatus,
      census_priority: e.request.censusPriority,
      transport_required: e.request.transportRequired,
      transport_mode: e.request.transportMode ?? TransportMode.WHEELCHAIR_VAN,
      business_weights: {
        census_weight: e.request.businessWeights.censusWeight,
        risk_weight: e.request.businessWeights.riskWeight,
        complexity_weight: e.request.businessWeights.complexityWeight,
        readmit_risk_weight:
          e.request.businessWeights.readmitRiskWeight ?? DEFAULT_READMIT_RISK_WEIGHT,
      },
    },
    clinical_features: serializeFeatures(e.features),
    classification: serializeClassification(e.classification),
    projection: serializeProjection(e.projection),
    score: serializeScore(e.score),
    created_at: e.createdAt,
  };
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function admissionRoutes(
  app: FastifyInstance,
  opts: { deps: AdmissionRouteDeps },
) {
  const { service } = opts.deps;

  // =========================================================================
  // POST /api/v1/admissions/evaluate
  // =========================================================================

  app.post('/api/v1/admissions/evaluate', {
    schema: { body: evaluateAdmissionSchema },
    config: { rateLimit: evaluationRateLimit() },
    handler: async (
      request: FastifyRequest<{ Body: EvaluateAdmission }>,
      reply: FastifyReply,
    ) => {
      const body = request.body;

      const evaluation = await evaluateAdmission(
        { ...service, logger: request.log },
        {
          facilityId: body.facility_id,
          payerType: body.payer_type,
          projectedLos: body.projected_los,
          authorizationStatus: body.authorization_status,
          censusPriority: body.census_priority,
          asOfDate: body.as_of_date,
          transportRequired: body.transport_required,
          transportMode: body.transport_mode,
          businessWeights: toWeights(body.business_weights),
          features: toFeatures(body.clinical_features),
        },
      );

      return reply.code(201).send({ data: serializeEvaluation(evaluation) });
    },
  });

  // =========================================================================
  // POST /api/v1/admissions/:id/recalculate
  // What-if: new evaluation linked to the source through parent_evaluation_id
  // =========================================================================

  app.post('/api/v1/admissions/:id/recalculate', {
    schema: { params: evaluationIdParamSchema, body: recalculateAdmissionSchema },
    config: { rateLimit: evaluationRateLimit() },
    handler: async (
      request: FastifyRequest<{ Params: EvaluationIdParam; Body: RecalculateAdmission }>,
      reply: FastifyReply,
    ) => {
      const body = request.body;

      const evaluation = await recalculateAdmission(
        { ...service, logger: request.log },
        request.params.id,
        {
          projectedLos: body.projected_los,
          censusPriority: body.census_priority,
          authorizationStatus: body.authorization_status,
          businessWeights: toWeights(body.business_weights),
          asOfDate: body.as_of_date,
        },
      );

      return reply.code(201).send({ data: serializeEvaluation(evaluation) });
    },
  });

  // =========================================================================
  // GET /api/v1/admissions/:id
  // =========================================================================

  app.get('/api/v1/admissions/:id', {
    schema: { params: evaluationIdParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: EvaluationIdParam }>,
      reply: FastifyReply,
    ) => {
      const evaluation = await getEvaluation(service, request.params.id);
      return reply.code(200).send({ data: serializeEvaluation(evaluation) });
    },
  });

  // =========================================================================
  // GET /api/v1/facilities/:facility_id/config-integrity
  // =========================================================================

  app.get('/api/v1/facilities/:facility_id/config-integrity', {
    schema: { params: facilityIdParamSchema, querystring: configIntegrityQuerySchema },
    handler: async (
      request: FastifyRequest<{ Params: FacilityIdParam; Querystring: ConfigIntegrityQuery }>,
      reply: FastifyReply,
    ) => {
      const report = await checkRateIntegrity(
        { ...service, logger: request.log },
        request.params.facility_id,
        { strict: request.query.strict },
      );

      return reply.code(200).send({
        data: {
          facility_id: report.facilityId,
          consistent: report.consistent,
          overlaps: [
            ...report.rateOverlaps.map((o) => ({ kind: 'rate_record', ...o })),
            ...report.costModelOverlaps.map((o) => ({ kind: 'cost_model', ...o })),
          ].map((o) => ({
            kind: o.kind,
            key: o.key,
            first_id: o.firstId,
            second_id: o.secondId,
            first: { effective_from: o.first.effectiveFrom, effective_to: o.first.effectiveTo },
            second: { effective_from: o.second.effectiveFrom, effective_to: o.second.effectiveTo },
          })),
        },
      });
    },
  });
}
