// ============================================================================
// Admission Evaluation — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  integer,
  decimal,
  timestamp,
  date,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import type {
  ClinicalCategory,
  PtOtGroup,
  SlpGroup,
  NursingGroup,
  NtaBand,
  ComorbidityFlag,
  SpecialCareFlag,
} from '../../constants/pdpm.constants.js';
import type {
  PayerType,
  TransportMode,
  AcuityBand,
  AuthorizationStatus,
  BusinessWeights,
  Recommendation,
  RevenueMethod,
} from '../../constants/admission.constants.js';
import type { ClinicalFeatures } from '../validation/admission.validation.js';

// --- Pipeline Result JSONB Structures ---
// Plain structured data produced by the pipeline components and stored on
// each evaluation. Money is a 2-decimal string; scores and probabilities are
// numbers.

// --- Classification ---

export interface CaseMixClassification {
  clinicalCategory: ClinicalCategory;
  ptGroup: PtOtGroup;
  otGroup: PtOtGroup;
  slpGroup: SlpGroup;
  nursingGroup: NursingGroup;
  ntaScore: number;
  ntaBand: NtaBand;
  /** NTA conditions that contributed points, in table order. */
  ntaConditions: string[];
  clinicalComplexity: number;
  comorbidities: ComorbidityFlag[];
  specialCare: SpecialCareFlag[];
  warnings: string[];
  tablesVersion: string;
}

// --- Revenue ---

export interface BreakdownLine {
  key: string;
  label: string;
  amount: string;
  detail: string;
}

export interface RevenueBreakdown {
  payerType: PayerType;
  method: RevenueMethod;
  rateId: string;
  los: number;
  components: BreakdownLine[];
  totalRevenue: string;
  perDiem: string;
}

// --- Cost ---

export interface CostBreakdown {
  acuityBand: AcuityBand;
  costModelId: string;
  los: number;
  /** Nursing, supplies, pharmacy, transport, overhead, denial-risk expected loss. */
  components: BreakdownLine[];
  directCost: string;
  totalCostBeforeRisk: string;
  totalCost: string;
  perDiem: string;
  denialProbability: number;
  clinicalComplexity: number;
}

// --- Projection & Score ---

export interface FinancialProjection {
  revenue: RevenueBreakdown;
  cost: CostBreakdown;
  projectedMarginTotal: string;
  projectedMarginPerDiem: string;
  /** Margin as a percentage of revenue, 2 decimals; 0 when revenue is 0. */
  marginPct: number;
}

export interface ScoreFactor {
  name: string;
  contribution: number;
  rationale: string;
}

export interface ScoreResult {
  rawScore: number;
  baseScore: number;
  marginPerDiem: number;
  recommendation: Recommendation;
  factors: ScoreFactor[];
  summary: string;
}

// --- Stored Request ---
// The scalar inputs of an evaluation, with defaults resolved. Clinical
// features are stored separately in `features`.

export interface StoredAdmissionRequest {
  projectedLos: number;
  authorizationStatus: AuthorizationStatus;
  censusPriority: number;
  transportRequired: boolean;
  /** Absent on evaluations stored before transport modes were priced. */
  transportMode?: TransportMode;
  businessWeights: BusinessWeights;
}

// --- Facilities Table ---
// One row per skilled nursing facility. Wage index and VBP multiplier are the
// facility-level payment adjustments applied to Medicare FFS components.

export const facilities = pgTable('facilities', {
  facilityId: uuid('facility_id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 200 }).notNull(),
  wageIndex: decimal('wage_index', { precision: 6, scale: 4 })
    .notNull()
    .default('1.0000'),
  vbpMultiplier: decimal('vbp_multiplier', { precision: 6, scale: 4 })
    .notNull()
    .default('1.0000'),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

// --- Rate Records Table ---
// Versioned per (facility, payer). Effective intervals are half-open
// [effective_from, effective_to) and must not overlap for a given key.
// Payer-specific rate fields live in `payload` and are validated with
// rateRecordSchema on read.

export const rateRecords = pgTable(
  'rate_records',
  {
    rateId: uuid('rate_id').primaryKey().defaultRandom(),
    facilityId: uuid('facility_id')
      .notNull()
      .references(() => facilities.facilityId),
    payerType: varchar('payer_type', { length: 30 }).$type<PayerType>().notNull(),
    effectiveFrom: date('effective_from', { mode: 'string' }).notNull(),
    effectiveTo: date('effective_to', { mode: 'string' }),
    payload: jsonb('payload').notNull().$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('rate_records_facility_payer_effective_from_idx').on(
      table.facilityId,
      table.payerType,
      table.effectiveFrom,
    ),
  ],
);

// --- Cost Models Table ---
// Versioned per (facility, acuity band). Date scoping is optional: a null
// effective_from is an open start.

export const costModels = pgTable(
  'cost_models',
  {
    costModelId: uuid('cost_model_id').primaryKey().defaultRandom(),
    facilityId: uuid('facility_id')
      .notNull()
      .references(() => facilities.facilityId),
    acuityBand: varchar('acuity_band', { length: 10 }).$type<AcuityBand>().notNull(),
    effectiveFrom: date('effective_from', { mode: 'string' }),
    effectiveTo: date('effective_to', { mode: 'string' }),
    nursingHoursPerDay: decimal('nursing_hours_per_day', {
      precision: 5,
      scale: 2,
    }).notNull(),
    nursingHourlyRate: decimal('nursing_hourly_rate', {
      precision: 10,
      scale: 2,
    }).notNull(),
    supplyCostPerDay: decimal('supply_cost_per_day', {
      precision: 10,
      scale: 2,
    }).notNull(),
    pharmacyCostPerDay: decimal('pharmacy_cost_per_day', {
      precision: 10,
      scale: 2,
    }).notNull(),
    wheelchairVanTransportCost: decimal('wheelchair_van_transport_cost', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    ambulanceTransportCost: decimal('ambulance_transport_cost', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    overheadPct: decimal('overhead_pct', { precision: 5, scale: 4 }).notNull(),
    ivPharmacySurchargePerDay: decimal('iv_pharmacy_surcharge_per_day', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    woundSupplySurchargePerDay: decimal('wound_supply_surcharge_per_day', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    oxygenSupplySurchargePerDay: decimal('oxygen_supply_surcharge_per_day', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    feedingTubeSupplySurchargePerDay: decimal('feeding_tube_supply_surcharge_per_day', {
      precision: 10,
      scale: 2,
    })
      .notNull()
      .default('0.00'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('cost_models_facility_band_idx').on(
      table.facilityId,
      table.acuityBand,
    ),
  ],
);

// --- Admission Evaluations Table ---
// Immutable record of one pipeline run: the request, the clinical features it
// consumed and every output. What-if recalculations are new rows linked to
// their source through parent_evaluation_id.

export const admissionEvaluations = pgTable(
  'admission_evaluations',
  {
    evaluationId: uuid('evaluation_id').primaryKey().defaultRandom(),
    facilityId: uuid('facility_id')
      .notNull()
      .references(() => facilities.facilityId),
    payerType: varchar('payer_type', { length: 30 }).$type<PayerType>().notNull(),
    asOfDate: date('as_of_date', { mode: 'string' }).notNull(),
    projectedLos: integer('projected_los').notNull(),
    recommendation: varchar('recommendation', { length: 10 })
      .$type<Recommendation>()
      .notNull(),
    rawScore: decimal('raw_score', { precision: 5, scale: 2 }).notNull(),
    rateId: uuid('rate_id').notNull(),
    costModelId: uuid('cost_model_id').notNull(),
    parentEvaluationId: uuid('parent_evaluation_id'),
    request: jsonb('request').notNull().$type<StoredAdmissionRequest>(),
    features: jsonb('features').notNull().$type<ClinicalFeatures>(),
    classification: jsonb('classification')
      .notNull()
      .$type<CaseMixClassification>(),
    projection: jsonb('projection').notNull().$type<FinancialProjection>(),
    score: jsonb('score').notNull().$type<ScoreResult>(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('admission_evaluations_facility_created_at_idx').on(
      table.facilityId,
      table.createdAt,
    ),
    index('admission_evaluations_parent_idx').on(table.parentEvaluationId),
  ],
);

// --- Audit Log Table ---
// Append-only. Detail never carries clinical features.

export const auditLog = pgTable(
  'audit_log',
  {
    logId: uuid('log_id').primaryKey().defaultRandom(),
    action: varchar('action', { length: 50 }).notNull(),
    category: varchar('category', { length: 20 }).notNull(),
    resourceType: varchar('resource_type', { length: 50 }),
    resourceId: uuid('resource_id'),
    detail: jsonb('detail').$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('audit_log_action_created_at_idx').on(table.action, table.createdAt),
    index('audit_log_resource_type_resource_id_created_at_idx').on(
      table.resourceType,
      table.resourceId,
      table.createdAt,
    ),
  ],
);

// --- Inferred Types ---

export type InsertFacility = typeof facilities.$inferInsert;
export type SelectFacility = typeof facilities.$inferSelect;

export type InsertRateRecord = typeof rateRecords.$inferInsert;
export type SelectRateRecord = typeof rateRecords.$inferSelect;

export type InsertCostModel = typeof costModels.$inferInsert;
export type SelectCostModel = typeof costModels.$inferSelect;

export type InsertAdmissionEvaluation = typeof admissionEvaluations.$inferInsert;
export type SelectAdmissionEvaluation = typeof admissionEvaluations.$inferSelect;

export type InsertAuditLog = typeof auditLog.$inferInsert;
export type SelectAuditLog = typeof auditLog.$inferSelect;
