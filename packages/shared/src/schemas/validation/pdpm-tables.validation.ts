// ============================================================================
// PDPM Lookup Tables — Zod Validation Schema
// Shape of the versioned table files under src/data. A table file is parsed
// once at start-up; a malformed file is a configuration error.
// ============================================================================

import { z } from 'zod';
import {
  CLINICAL_CATEGORIES,
  THERAPY_CATEGORIES,
  PT_OT_GROUPS,
  SLP_GROUPS,
  NURSING_GROUPS,
  NTA_BANDS,
  COMORBIDITY_FLAGS,
  SPECIAL_CARE_FLAGS,
  ASSIGNABLE_NURSING_TIERS,
  NursingTier,
} from '../../constants/pdpm.constants.js';

// --- Helpers ---

/**
 * Record keyed by an enumeration that must carry every member.
 * Zod still types enum-keyed records as partial, so lookups stay checked.
 */
function completeRecord<K extends string, V extends z.ZodTypeAny>(
  keys: readonly [K, ...K[]],
  value: V,
) {
  return z.record(z.enum(keys), value).superRefine((record, ctx) => {
    for (const key of keys) {
      if (!(key in record)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Missing entry for ${key}`,
        });
      }
    }
  });
}

interface DaySegment {
  fromDay: number;
  toDay: number | null;
}

/** Day segments must start on day 1, be contiguous, and only the last may be open-ended. */
function checkContiguousDays(segments: DaySegment[], ctx: z.RefinementCtx): void {
  let expectedFrom = 1;
  segments.forEach((segment, i) => {
    if (segment.fromDay !== expectedFrom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'fromDay'],
        message: `Segment must start on day ${expectedFrom}`,
      });
    }
    if (segment.toDay === null) {
      if (i !== segments.length - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'toDay'],
          message: 'Only the last segment may be open-ended',
        });
      }
      return;
    }
    expectedFrom = segment.toDay + 1;
  });
  const last = segments[segments.length - 1];
  if (last && last.toDay !== null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [segments.length - 1, 'toDay'],
      message: 'The last segment must be open-ended',
    });
  }
}

const positiveIndex = z.number().finite().positive();
const points = z.number().int().min(0);
const assignableTier = z.enum(ASSIGNABLE_NURSING_TIERS);
const nursingGroup = z.enum(NURSING_GROUPS);

// --- Function bands ---

const scoreBandSchema = z
  .object({ min: z.number().int().min(0), max: z.number().int().min(0) })
  .refine((b) => b.max >= b.min, { message: 'Band max is below min' });

const nursingBandSchema = z
  .object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
    depressed: nursingGroup,
    notDepressed: nursingGroup,
  })
  .refine((b) => b.max >= b.min, { message: 'Band max is below min' });

export type NursingBand = z.infer<typeof nursingBandSchema>;

// --- VPD schedules ---

const vpdSegmentSchema = z.object({
  fromDay: z.number().int().min(1),
  toDay: z.number().int().min(1).nullable(),
  factor: z.number().finite().min(0),
});

export type VpdSegment = z.infer<typeof vpdSegmentSchema>;

const vpdScheduleSchema = z
  .array(vpdSegmentSchema)
  .min(1)
  .superRefine(checkContiguousDays);

// --- NTA ---

const ntaConditionSchema = z.object({
  condition: z.string().min(1),
  points,
  comorbidities: z.array(z.enum(COMORBIDITY_FLAGS)).default([]),
  specialCare: z.array(z.enum(SPECIAL_CARE_FLAGS)).default([]),
  diagnosisPrefixes: z.array(z.string().min(1)).default([]),
});

export type NtaCondition = z.infer<typeof ntaConditionSchema>;

const ntaBandThresholdsSchema = z
  .array(z.object({ band: z.enum(NTA_BANDS), min: points }))
  .min(1)
  .superRefine((bands, ctx) => {
    if (bands[0]?.min !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [0, 'min'],
        message: 'The first NTA band must start at 0',
      });
    }
    for (let i = 1; i < bands.length; i++) {
      const prev = bands[i - 1];
      const curr = bands[i];
      if (prev && curr && curr.min <= prev.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'min'],
          message: 'NTA band thresholds must be strictly ascending',
        });
      }
    }
  });

// --- Table file ---

export const pdpmTablesSchema = z.object({
  version: z.string().min(1),
  diagnosisCategories: z
    .array(
      z.object({
        prefix: z.string().min(1),
        category: z.enum(CLINICAL_CATEGORIES),
      }),
    )
    .min(1),
  therapyCategories: completeRecord(CLINICAL_CATEGORIES, z.enum(THERAPY_CATEGORIES)),
  functionBands: z.array(scoreBandSchema).length(4),
  ptOtGroups: completeRecord(
    THERAPY_CATEGORIES,
    z.tuple([
      z.enum(PT_OT_GROUPS),
      z.enum(PT_OT_GROUPS),
      z.enum(PT_OT_GROUPS),
      z.enum(PT_OT_GROUPS),
    ]),
  ),
  slp: z.object({
    cognitiveImpairmentBelow: z.number().int().min(0),
    presenceCategories: z.array(z.enum(CLINICAL_CATEGORIES)),
    presenceComorbidities: z.array(z.enum(COMORBIDITY_FLAGS)),
    swallowingComorbidities: z.array(z.enum(COMORBIDITY_FLAGS)),
    // rows: presence count 0..3, columns: swallowing count 0..2
    groups: z.array(z.array(z.enum(SLP_GROUPS)).length(3)).length(4),
  }),
  nursing: z.object({
    extensiveServicesMaxIndependence: z.number().int().min(0),
    extensiveServices: z.object({
      ventilatorAndTracheostomy: nursingGroup,
      ventilatorOrTracheostomy: nursingGroup,
      isolation: nursingGroup,
    }),
    tiers: z.object({
      [NursingTier.SPECIAL_CARE_HIGH]: z.array(nursingBandSchema).min(1),
      [NursingTier.SPECIAL_CARE_LOW]: z.array(nursingBandSchema).min(1),
      [NursingTier.CLINICALLY_COMPLEX]: z.array(nursingBandSchema).min(1),
      [NursingTier.REDUCED_PHYSICAL_FUNCTION]: z.array(nursingBandSchema).min(1),
    }),
    categoryTiers: completeRecord(CLINICAL_CATEGORIES, assignableTier),
    specialCareTiers: z.record(z.enum(SPECIAL_CARE_FLAGS), assignableTier),
    comorbidityTiers: z.record(z.enum(COMORBIDITY_FLAGS), assignableTier),
    depressionComorbidity: z.enum(COMORBIDITY_FLAGS),
  }),
  nta: z.object({
    conditions: z.array(ntaConditionSchema),
    bands: ntaBandThresholdsSchema,
  }),
  caseMixIndexes: z.object({
    pt: completeRecord(PT_OT_GROUPS, positiveIndex),
    ot: completeRecord(PT_OT_GROUPS, positiveIndex),
    slp: completeRecord(SLP_GROUPS, positiveIndex),
    nursing: completeRecord(NURSING_GROUPS, positiveIndex),
    nta: completeRecord(NTA_BANDS, positiveIndex),
  }),
  vpd: z.object({
    ptOt: vpdScheduleSchema,
    nta: vpdScheduleSchema,
  }),
  laborShare: z.number().min(0).max(1),
  complexity: z.object({
    tierPoints: z.object({
      [NursingTier.EXTENSIVE_SERVICES]: points,
      [NursingTier.SPECIAL_CARE_HIGH]: points,
      [NursingTier.SPECIAL_CARE_LOW]: points,
      [NursingTier.CLINICALLY_COMPLEX]: points,
      [NursingTier.REDUCED_PHYSICAL_FUNCTION]: points,
    }),
    specialCarePoints: z.record(z.enum(SPECIAL_CARE_FLAGS), points),
    max: points,
  }),
  acuity: z.object({
    escalatingNtaBands: z.array(z.enum(NTA_BANDS)).default([]),
  }),
});

export type PdpmTables = z.infer<typeof pdpmTablesSchema>;
/** Input shape of a table file, before defaults are applied. */
export type PdpmTablesInput = z.input<typeof pdpmTablesSchema>;
