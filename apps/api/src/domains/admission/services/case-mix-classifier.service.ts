// ============================================================================
// Case-Mix Classifier
// Maps structured clinical features to PDPM case-mix groups, an NTA score and
// a clinical-complexity score. Never throws: unmapped codes and missing or
// out-of-range scores resolve to defaults and are reported in `warnings`.
// ============================================================================

import {
  ClinicalCategory,
  TherapyCategory,
  NursingTier,
  NURSING_TIER_ORDER,
  LOWEST_NURSING_GROUP,
  SLP_NONE,
  COMORBIDITY_FLAGS,
  SPECIAL_CARE_FLAGS,
  SpecialCareFlag,
  INDEPENDENCE_SCORE_MIN,
  INDEPENDENCE_SCORE_MAX,
  COGNITIVE_SCORE_MIN,
  COGNITIVE_SCORE_MAX,
  type ComorbidityFlag,
  type NursingGroup,
  type NtaBand,
  type PtOtGroup,
  type SlpGroup,
} from '@snfadmit/shared/constants/pdpm.constants.js';
import {
  AcuityBand,
  ACUITY_BANDS,
} from '@snfadmit/shared/constants/admission.constants.js';
import type { ClinicalFeatures } from '@snfadmit/shared/schemas/validation/admission.validation.js';
import type { PdpmTables } from '@snfadmit/shared/schemas/validation/pdpm-tables.validation.js';
import type { CaseMixClassification } from '@snfadmit/shared/schemas/db/admission.schema.js';

// ---------------------------------------------------------------------------
// Code & flag normalization
// ---------------------------------------------------------------------------

/** ICD-10 codes compare without dots, upper-case ("i63.9" -> "I639"). */
export function normalizeIcd10(code: string): string {
  return code.trim().toUpperCase().replace(/\./g, '');
}

function normalizeFlags<T extends string>(flags: readonly T[], order: readonly T[]): T[] {
  const present = new Set(flags);
  return order.filter((flag) => present.has(flag));
}

// ---------------------------------------------------------------------------
// Scores
// ---------------------------------------------------------------------------

function resolveScore(
  value: number | null,
  label: string,
  min: number,
  max: number,
  fallback: number,
  fallbackNote: string,
  warnings: string[],
): { score: number; provided: boolean } {
  if (value === null || !Number.isFinite(value)) {
    warnings.push(`${label} missing; ${fallbackNote}`);
    return { score: fallback, provided: false };
  }
  let score = value;
  if (!Number.isInteger(score)) {
    score = Math.round(score);
    warnings.push(`${label} ${value} is not a whole number; rounded to ${score}`);
  }
  if (score < min || score > max) {
    const clamped = Math.min(max, Math.max(min, score));
    warnings.push(`${label} ${score} is outside ${min}-${max}; clamped to ${clamped}`);
    score = clamped;
  }
  return { score, provided: true };
}

// ---------------------------------------------------------------------------
// (a) Clinical category
// ---------------------------------------------------------------------------

/** Longest matching ICD-10 prefix wins; ties keep table order. */
export function mapClinicalCategory(
  primaryDiagnosis: string,
  tables: PdpmTables,
): ClinicalCategory | null {
  const code = normalizeIcd10(primaryDiagnosis);
  let best: { length: number; category: ClinicalCategory } | null = null;
  for (const entry of tables.diagnosisCategories) {
    const prefix = normalizeIcd10(entry.prefix);
    if (code.startsWith(prefix) && (best === null || prefix.length > best.length)) {
      best = { length: prefix.length, category: entry.category };
    }
  }
  return best?.category ?? null;
}

// ---------------------------------------------------------------------------
// (b) PT / OT
// ---------------------------------------------------------------------------

function functionBandIndex(score: number, tables: PdpmTables, warnings: string[]): number {
  const index = tables.functionBands.findIndex((b) => score >= b.min && score <= b.max);
  if (index === -1) {
    warnings.push(`No function band covers independence score ${score}; using the most independent band`);
    return tables.functionBands.length - 1;
  }
  return index;
}

function therapyGroup(
  category: ClinicalCategory,
  bandIndex: number,
  tables: PdpmTables,
  warnings: string[],
): PtOtGroup {
  const therapyCategory =
    tables.therapyCategories[category] ?? TherapyCategory.MEDICAL_MANAGEMENT;
  const groups = tables.ptOtGroups[therapyCategory];
  const group = groups?.[bandIndex];
  if (group === undefined) {
    warnings.push(`No PT/OT group for ${therapyCategory} band ${bandIndex + 1}; using TL`);
    return 'TL';
  }
  return group;
}

// ---------------------------------------------------------------------------
// (c) SLP
// ---------------------------------------------------------------------------

function slpGroup(
  category: ClinicalCategory,
  comorbidities: ReadonlySet<ComorbidityFlag>,
  cognitiveScore: number | null,
  slpMinutes: number,
  tables: PdpmTables,
): SlpGroup {
  const { slp } = tables;

  let presence = 0;
  if (slp.presenceCategories.includes(category)) presence++;
  if (slp.presenceComorbidities.some((flag) => comorbidities.has(flag))) presence++;
  if (cognitiveScore !== null && cognitiveScore < slp.cognitiveImpairmentBelow) presence++;

  const swallowing = new Set(
    slp.swallowingComorbidities.filter((flag) => comorbidities.has(flag)),
  ).size;

  if (presence === 0 && swallowing === 0 && slpMinutes <= 0) return SLP_NONE;

  const row = slp.groups[Math.min(presence, slp.groups.length - 1)];
  return row?.[Math.min(swallowing, row.length - 1)] ?? SLP_NONE;
}

// ---------------------------------------------------------------------------
// (d) Nursing
// ---------------------------------------------------------------------------

export function nursingTierOf(group: NursingGroup): NursingTier {
  if (group.startsWith('ES')) return NursingTier.EXTENSIVE_SERVICES;
  if (group.startsWith('H')) return NursingTier.SPECIAL_CARE_HIGH;
  if (group.startsWith('L')) return NursingTier.SPECIAL_CARE_LOW;
  if (group.startsWith('C')) return NursingTier.CLINICALLY_COMPLEX;
  return NursingTier.REDUCED_PHYSICAL_FUNCTION;
}

function tierRank(tier: NursingTier): number {
  return NURSING_TIER_ORDER.indexOf(tier);
}

function nursingGroup(
  category: ClinicalCategory,
  independence: number,
  comorbidities: ReadonlySet<ComorbidityFlag>,
  specialCare: ReadonlySet<SpecialCareFlag>,
  tables: PdpmTables,
): NursingGroup {
  const { nursing } = tables;

  if (independence <= nursing.extensiveServicesMaxIndependence) {
    const ventilator = specialCare.has(SpecialCareFlag.VENTILATOR);
    const tracheostomy = specialCare.has(SpecialCareFlag.TRACHEOSTOMY);
    if (ventilator && tracheostomy) return nursing.extensiveServices.ventilatorAndTracheostomy;
    if (ventilator || tracheostomy) return nursing.extensiveServices.ventilatorOrTracheostomy;
    if (specialCare.has(SpecialCareFlag.ISOLATION)) return nursing.extensiveServices.isolation;
  }

  let tier: NursingTier = nursing.categoryTiers[category] ?? NursingTier.REDUCED_PHYSICAL_FUNCTION;
  const consider = (candidate: NursingTier | undefined) => {
    if (candidate !== undefined && tierRank(candidate) < tierRank(tier)) tier = candidate;
  };
  for (const flag of specialCare) consider(nursing.specialCareTiers[flag]);
  for (const flag of comorbidities) consider(nursing.comorbidityTiers[flag]);

  const depressed = comorbidities.has(nursing.depressionComorbidity);

  // A score above the tier's bands falls to the next tier down
  for (const candidate of NURSING_TIER_ORDER.slice(tierRank(tier))) {
    if (candidate === NursingTier.EXTENSIVE_SERVICES) continue;
    const band = nursing.tiers[candidate].find(
      (b) => independence >= b.min && independence <= b.max,
    );
    if (band) return depressed ? band.depressed : band.notDepressed;
  }
  return LOWEST_NURSING_GROUP;
}

// ---------------------------------------------------------------------------
// (e) NTA
// ---------------------------------------------------------------------------

export function scoreNta(
  comorbidities: ReadonlySet<ComorbidityFlag>,
  specialCare: ReadonlySet<SpecialCareFlag>,
  secondaryDiagnoses: readonly string[],
  tables: PdpmTables,
): { score: number; conditions: string[] } {
  const codes = secondaryDiagnoses.map(normalizeIcd10);
  const counted = new Set<string>();
  let score = 0;

  for (const condition of tables.nta.conditions) {
    if (counted.has(condition.condition)) continue;
    const matched =
      condition.comorbidities.some((flag) => comorbidities.has(flag)) ||
      condition.specialCare.some((flag) => specialCare.has(flag)) ||
      condition.diagnosisPrefixes.some((prefix) => {
        const p = normalizeIcd10(prefix);
        return codes.some((code) => code.startsWith(p));
      });
    if (matched) {
      counted.add(condition.condition);
      score += condition.points;
    }
  }

  return { score, conditions: [...counted] };
}

export function ntaBandFor(score: number, tables: PdpmTables): NtaBand {
  let band: NtaBand = 'NF';
  for (const threshold of tables.nta.bands) {
    if (score >= threshold.min) band = threshold.band;
  }
  return band;
}

// ---------------------------------------------------------------------------
// (f) Clinical complexity
// ---------------------------------------------------------------------------

function clinicalComplexity(
  group: NursingGroup,
  specialCare: readonly SpecialCareFlag[],
  tables: PdpmTables,
): number {
  const { complexity } = tables;
  let points = complexity.tierPoints[nursingTierOf(group)];
  for (const flag of specialCare) {
    points += complexity.specialCarePoints[flag] ?? 0;
  }
  return Math.min(points, complexity.max);
}

// ---------------------------------------------------------------------------
// classify
// ---------------------------------------------------------------------------

export function classify(
  features: ClinicalFeatures,
  tables: PdpmTables,
): CaseMixClassification {
  const warnings: string[] = [];

  const mapped = mapClinicalCategory(features.primaryDiagnosis, tables);
  const clinicalCategory = mapped ?? ClinicalCategory.UNCLASSIFIED;
  if (mapped === null) {
    warnings.push(
      `Primary diagnosis ${features.primaryDiagnosis} has no clinical category mapping; classified as UNCLASSIFIED`,
    );
  }

  const independence = resolveScore(
    features.independenceScore,
    'Independence score',
    INDEPENDENCE_SCORE_MIN,
    INDEPENDENCE_SCORE_MAX,
    INDEPENDENCE_SCORE_MAX,
    'using the most independent function band',
    warnings,
  ).score;

  const cognitive = resolveScore(
    features.cognitiveScore,
    'Cognitive score',
    COGNITIVE_SCORE_MIN,
    COGNITIVE_SCORE_MAX,
    COGNITIVE_SCORE_MAX,
    'assuming intact cognition',
    warnings,
  );

  const comorbidityList = normalizeFlags(features.comorbidities, COMORBIDITY_FLAGS);
  const specialCareList = normalizeFlags(features.specialCare, SPECIAL_CARE_FLAGS);
  const comorbidities = new Set(comorbidityList);
  const specialCare = new Set(specialCareList);

  const bandIndex = functionBandIndex(independence, tables, warnings);
  const ptGroup = therapyGroup(clinicalCategory, bandIndex, tables, warnings);

  const slp = slpGroup(
    clinicalCategory,
    comorbidities,
    cognitive.provided ? cognitive.score : null,
    features.therapyMinutes.slp,
    tables,
  );

  const nursing = nursingGroup(clinicalCategory, independence, comorbidities, specialCare, tables);
  const nta = scoreNta(comorbidities, specialCare, features.secondaryDiagnoses, tables);

  return {
    clinicalCategory,
    ptGroup,
    otGroup: ptGroup,
    slpGroup: slp,
    nursingGroup: nursing,
    ntaScore: nta.score,
    ntaBand: ntaBandFor(nta.score, tables),
    ntaConditions: nta.conditions,
    clinicalComplexity: clinicalComplexity(nursing, specialCareList, tables),
    comorbidities: comorbidityList,
    specialCare: specialCareList,
    warnings,
    tablesVersion: tables.version,
  };
}

// ---------------------------------------------------------------------------
// Acuity band (cost model selector)
// ---------------------------------------------------------------------------

const TIER_ACUITY: Record<NursingTier, AcuityBand> = {
  [NursingTier.EXTENSIVE_SERVICES]: AcuityBand.COMPLEX,
  [NursingTier.SPECIAL_CARE_HIGH]: AcuityBand.HIGH,
  [NursingTier.SPECIAL_CARE_LOW]: AcuityBand.HIGH,
  [NursingTier.CLINICALLY_COMPLEX]: AcuityBand.MEDIUM,
  [NursingTier.REDUCED_PHYSICAL_FUNCTION]: AcuityBand.LOW,
};

/**
 * Coarse acuity band for cost-model selection. A high NTA band lifts LOW and
 * MEDIUM by one band; HIGH and COMPLEX are never lifted.
 */
export function deriveAcuityBand(
  classification: CaseMixClassification,
  tables: PdpmTables,
): AcuityBand {
  const band = TIER_ACUITY[nursingTierOf(classification.nursingGroup)];
  const escalates =
    (band === AcuityBand.LOW || band === AcuityBand.MEDIUM) &&
    tables.acuity.escalatingNtaBands.includes(classification.ntaBand);
  if (!escalates) return band;
  return ACUITY_BANDS[ACUITY_BANDS.indexOf(band) + 1] ?? band;
}
