// ============================================================================
// Admission Evaluation — Zod Validation Schemas
// Domain records (camelCase) validated on read from the configuration store,
// and request schemas (snake_case) for the admission API.
// ============================================================================

import { z } from 'zod';
import {
  PayerType,
  PAYER_TYPES,
  AUTHORIZATION_STATUSES,
  ACUITY_BANDS,
  TRANSPORT_MODES,
  TransportMode,
  DEFAULT_READMIT_RISK_WEIGHT,
} from '../../constants/admission.constants.js';
import {
  NURSING_GROUPS,
  NTA_BANDS,
  COMORBIDITY_FLAGS,
  SPECIAL_CARE_FLAGS,
  INDEPENDENCE_SCORE_MIN,
  INDEPENDENCE_SCORE_MAX,
  COGNITIVE_SCORE_MIN,
  COGNITIVE_SCORE_MAX,
} from '../../constants/pdpm.constants.js';

// --- Primitives ---

const MONEY_PATTERN = /^\d+(\.\d{1,2})?$/;

const money = z
  .string()
  .regex(MONEY_PATTERN, 'Must be a non-negative amount with at most 2 decimal places');

/** Calendar date, YYYY-MM-DD; impossible dates such as 2025-02-30 fail. */
export const isoDate = z.string().date();

const multiplier = z.number().finite().positive();

// ============================================================================
// Configuration records
// ============================================================================

// --- PDPM component base rates (per diem, before case-mix index) ---

export const componentRatesSchema = z.object({
  pt: money,
  ot: money,
  slp: money,
  nursing: money,
  nta: money,
  nonCaseMix: money,
});

export type ComponentRates = z.infer<typeof componentRatesSchema>;

// --- Medicare Advantage contract shapes ---

const perDiemTierSchema = z.object({
  fromDay: z.number().int().min(1),
  toDay: z.number().int().min(1).nullable(),
  perDiem: money,
});

export type PerDiemTier = z.infer<typeof perDiemTierSchema>;

const tierListSchema = z
  .array(perDiemTierSchema)
  .min(1)
  .superRefine((tiers, ctx) => {
    tiers.forEach((tier, i) => {
      const expectedFrom = i === 0 ? 1 : (tiers[i - 1]?.toDay ?? 0) + 1;
      if (tier.fromDay !== expectedFrom) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'fromDay'],
          message: `Tier must start on day ${expectedFrom}`,
        });
      }
      if (tier.toDay === null && i !== tiers.length - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'toDay'],
          message: 'Only the last tier may be open-ended',
        });
      }
      if (tier.toDay !== null && tier.toDay < tier.fromDay) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'toDay'],
          message: 'Tier ends before it starts',
        });
      }
    });
  });

export const advantageContractSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('FLAT'), perDiem: money }),
  z.object({ kind: z.literal('TIERED'), tiers: tierListSchema }),
  z.object({
    kind: z.literal('PDPM_MAPPED'),
    componentRates: componentRatesSchema,
    multiplier,
    applyWageIndex: z.boolean(),
  }),
]);

export type AdvantageContract = z.infer<typeof advantageContractSchema>;

// --- Medicaid add-ons ---

export const addOnTriggerSchema = z.union([
  z.enum(SPECIAL_CARE_FLAGS),
  z.enum(COMORBIDITY_FLAGS),
  z.enum(NURSING_GROUPS),
]);

export type AddOnTrigger = z.infer<typeof addOnTriggerSchema>;

const medicaidAddOnSchema = z.object({
  trigger: addOnTriggerSchema,
  perDiem: money,
  label: z.string().min(1).max(100),
});

export type MedicaidAddOn = z.infer<typeof medicaidAddOnSchema>;

// --- Rate records (discriminated on payer type) ---

const rateRecordBase = {
  rateId: z.string().min(1),
  facilityId: z.string().min(1),
  effectiveFrom: isoDate,
  effectiveTo: isoDate.nullable(),
};

export const medicareFfsRateSchema = z.object({
  ...rateRecordBase,
  payerType: z.literal(PayerType.MEDICARE_FFS),
  componentRates: componentRatesSchema,
  laborShare: z.number().min(0).max(1).optional(),
});

export const medicareAdvantageRateSchema = z.object({
  ...rateRecordBase,
  payerType: z.literal(PayerType.MEDICARE_ADVANTAGE),
  contract: advantageContractSchema,
});

export const medicaidRateSchema = z.object({
  ...rateRecordBase,
  payerType: z.literal(PayerType.MEDICAID),
  basePerDiem: money,
  addOns: z.array(medicaidAddOnSchema).default([]),
});

export const managedCareRateSchema = z.object({
  ...rateRecordBase,
  payerType: z.literal(PayerType.MANAGED_CARE),
  matrix: z.record(z.enum(NURSING_GROUPS), z.record(z.enum(NTA_BANDS), money)),
  defaultPerDiem: money.optional(),
});

export const rateRecordSchema = z
  .discriminatedUnion('payerType', [
    medicareFfsRateSchema,
    medicareAdvantageRateSchema,
    medicaidRateSchema,
    managedCareRateSchema,
  ])
  .refine((r) => r.effectiveTo === null || r.effectiveTo > r.effectiveFrom, {
    message: 'effectiveTo must be after effectiveFrom',
    path: ['effectiveTo'],
  });

export type RateRecord = z.infer<typeof rateRecordSchema>;
export type MedicareFfsRate = z.infer<typeof medicareFfsRateSchema>;
export type MedicareAdvantageRate = z.infer<typeof medicareAdvantageRateSchema>;
export type MedicaidRate = z.infer<typeof medicaidRateSchema>;
export type ManagedCareRate = z.infer<typeof managedCareRateSchema>;

// --- Cost model records ---

export const costModelRecordSchema = z
  .object({
    costModelId: z.string().min(1),
    facilityId: z.string().min(1),
    acuityBand: z.enum(ACUITY_BANDS),
    effectiveFrom: isoDate.nullable(),
    effectiveTo: isoDate.nullable(),
    nursingHoursPerDay: z.number().finite().min(0),
    nursingHourlyRate: money,
    supplyCostPerDay: money,
    pharmacyCostPerDay: money,
    transportCosts: z.object({
      WHEELCHAIR_VAN: money,
      AMBULANCE: money,
    }),
    overheadPct: z.number().min(0).max(1),
    ivPharmacySurchargePerDay: money,
    woundSupplySurchargePerDay: money,
    oxygenSupplySurchargePerDay: money,
    feedingTubeSupplySurchargePerDay: money,
  })
  .refine(
    (c) =>
      c.effectiveFrom === null ||
      c.effectiveTo === null ||
      c.effectiveTo > c.effectiveFrom,
    { message: 'effectiveTo must be after effectiveFrom', path: ['effectiveTo'] },
  );

export type CostModelRecord = z.infer<typeof costModelRecordSchema>;

// --- Facility profile ---

export const facilityProfileSchema = z.object({
  facilityId: z.string().min(1),
  name: z.string().min(1),
  wageIndex: multiplier,
  vbpMultiplier: multiplier,
});

export type FacilityProfile = z.infer<typeof facilityProfileSchema>;

// ============================================================================
// Clinical features (structured output of document extraction)
// ============================================================================

const icd10Code = z.string().trim().min(3).max(10);

export const clinicalFeaturesSchema = z.object({
  primaryDiagnosis: icd10Code,
  secondaryDiagnoses: z.array(icd10Code).max(50).default([]),
  medications: z.array(z.string().min(1).max(200)).max(100).default([]),
  independenceScore: z.number().nullable(),
  cognitiveScore: z.number().nullable(),
  therapyMinutes: z.object({
    pt: z.number().min(0),
    ot: z.number().min(0),
    slp: z.number().min(0),
  }),
  comorbidities: z.array(z.enum(COMORBIDITY_FLAGS)).default([]),
  specialCare: z.array(z.enum(SPECIAL_CARE_FLAGS)).default([]),
  priorReadmission: z.boolean().optional(),
});

export type ClinicalFeatures = z.infer<typeof clinicalFeaturesSchema>;

// ============================================================================
// Admission API (snake_case wire format)
// ============================================================================

const clinicalFeaturesBodySchema = z.object({
  primary_diagnosis: icd10Code,
  secondary_diagnoses: z.array(icd10Code).max(50).default([]),
  medications: z.array(z.string().min(1).max(200)).max(100).default([]),
  // Out-of-range scores are clamped by the classifier with a warning
  independence_score: z.number().nullable().default(null),
  cognitive_score: z.number().nullable().default(null),
  therapy_minutes: z
    .object({
      pt: z.number().min(0).default(0),
      ot: z.number().min(0).default(0),
      slp: z.number().min(0).default(0),
    })
    .default({}),
  comorbidities: z.array(z.enum(COMORBIDITY_FLAGS)).default([]),
  special_care: z.array(z.enum(SPECIAL_CARE_FLAGS)).default([]),
  prior_readmission: z.boolean().default(false),
});

export type ClinicalFeaturesBody = z.infer<typeof clinicalFeaturesBodySchema>;

const businessWeightsBodySchema = z.object({
  census_weight: z.number().min(0).max(10),
  risk_weight: z.number().min(0).max(10),
  complexity_weight: z.number().min(0).max(10),
  readmit_risk_weight: z.number().min(0).max(10).default(DEFAULT_READMIT_RISK_WEIGHT),
});

export type BusinessWeightsBody = z.infer<typeof businessWeightsBodySchema>;

// --- Evaluate ---

export const evaluateAdmissionSchema = z.object({
  facility_id: z.string().uuid(),
  payer_type: z.enum(PAYER_TYPES),
  // Range is checked by the service so out-of-range stays report INVALID_LOS
  projected_los: z.number(),
  authorization_status: z.enum(AUTHORIZATION_STATUSES),
  census_priority: z.number().min(0).max(1).default(0),
  as_of_date: isoDate.optional(),
  transport_required: z.boolean().default(false),
  transport_mode: z.enum(TRANSPORT_MODES).default(TransportMode.WHEELCHAIR_VAN),
  business_weights: businessWeightsBodySchema.optional(),
  clinical_features: clinicalFeaturesBodySchema,
});

export type EvaluateAdmission = z.infer<typeof evaluateAdmissionSchema>;

// --- Recalculate (what-if) ---

export const recalculateAdmissionSchema = z
  .object({
    projected_los: z.number().optional(),
    census_priority: z.number().min(0).max(1).optional(),
    authorization_status: z.enum(AUTHORIZATION_STATUSES).optional(),
    business_weights: businessWeightsBodySchema.optional(),
    as_of_date: isoDate.optional(),
  })
  .default({});

export type RecalculateAdmission = z.infer<typeof recalculateAdmissionSchema>;

// --- Params ---

export const evaluationIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type EvaluationIdParam = z.infer<typeof evaluationIdParamSchema>;

export const facilityIdParamSchema = z.object({
  facility_id: z.string().uuid(),
});

export type FacilityIdParam = z.infer<typeof facilityIdParamSchema>;

export const configIntegrityQuerySchema = z.object({
  // "true" turns any overlap into a 422 OVERLAPPING_INTERVALS
  strict: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type ConfigIntegrityQuery = z.infer<typeof configIntegrityQuerySchema>;
