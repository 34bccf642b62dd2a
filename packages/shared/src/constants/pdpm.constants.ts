// ============================================================================
// PDPM Case-Mix — Constants
// Enumerations for the Patient-Driven Payment Model case-mix groups and the
// clinical flags the classifier reads. Lookup tables (diagnosis mapping,
// cut points, points, indexes) are versioned data in src/data, not here.
// ============================================================================

// --- PDPM Clinical Categories ---

export const ClinicalCategory = {
  MAJOR_JOINT_REPLACEMENT: 'MAJOR_JOINT_REPLACEMENT',
  ORTHOPEDIC_SURGERY: 'ORTHOPEDIC_SURGERY',
  NON_SURGICAL_ORTHOPEDIC: 'NON_SURGICAL_ORTHOPEDIC',
  ACUTE_INFECTIONS: 'ACUTE_INFECTIONS',
  MEDICAL_MANAGEMENT: 'MEDICAL_MANAGEMENT',
  CANCER: 'CANCER',
  PULMONARY: 'PULMONARY',
  CARDIOVASCULAR: 'CARDIOVASCULAR',
  ACUTE_NEUROLOGIC: 'ACUTE_NEUROLOGIC',
  NON_ORTHOPEDIC_SURGERY: 'NON_ORTHOPEDIC_SURGERY',
  UNCLASSIFIED: 'UNCLASSIFIED',
} as const;

export type ClinicalCategory =
  (typeof ClinicalCategory)[keyof typeof ClinicalCategory];

export const CLINICAL_CATEGORIES = Object.values(ClinicalCategory) as [
  ClinicalCategory,
  ...ClinicalCategory[],
];

// --- PT/OT collapsed therapy categories ---

export const TherapyCategory = {
  MAJOR_JOINT: 'MAJOR_JOINT',
  OTHER_ORTHOPEDIC: 'OTHER_ORTHOPEDIC',
  MEDICAL_MANAGEMENT: 'MEDICAL_MANAGEMENT',
  NON_ORTHO_SURGERY_NEURO: 'NON_ORTHO_SURGERY_NEURO',
} as const;

export type TherapyCategory =
  (typeof TherapyCategory)[keyof typeof TherapyCategory];

export const THERAPY_CATEGORIES = Object.values(TherapyCategory) as [
  TherapyCategory,
  ...TherapyCategory[],
];

// --- PT/OT Case-Mix Groups ---

export const PT_OT_GROUPS = [
  'TA', 'TB', 'TC', 'TD',
  'TE', 'TF', 'TG', 'TH',
  'TI', 'TJ', 'TK', 'TL',
  'TM', 'TN', 'TO', 'TP',
] as const;

export type PtOtGroup = (typeof PT_OT_GROUPS)[number];

// --- SLP Case-Mix Groups ---

export const SLP_GROUPS = [
  'SA', 'SB', 'SC', 'SD', 'SE', 'SF',
  'SG', 'SH', 'SI', 'SJ', 'SK', 'SL',
] as const;

export const SLP_NONE = 'NONE' as const;

export type SlpGroup = (typeof SLP_GROUPS)[number] | typeof SLP_NONE;

// --- Nursing Case-Mix Groups (ordered highest acuity first) ---

export const NURSING_GROUPS = [
  'ES3', 'ES2', 'ES1',
  'HDE2', 'HDE1', 'HBC2', 'HBC1',
  'LDE2', 'LDE1', 'LBC2', 'LBC1',
  'CDE2', 'CDE1', 'CBC2', 'CBC1', 'CA2', 'CA1',
  'PDE2', 'PDE1', 'PBC2', 'PBC1', 'PA2', 'PA1',
] as const;

export type NursingGroup = (typeof NURSING_GROUPS)[number];

/** Lowest-acuity nursing group; the classifier's fallback. */
export const LOWEST_NURSING_GROUP: NursingGroup = 'PA1';

// --- Nursing tiers (ordered highest first) ---

export const NursingTier = {
  EXTENSIVE_SERVICES: 'EXTENSIVE_SERVICES',
  SPECIAL_CARE_HIGH: 'SPECIAL_CARE_HIGH',
  SPECIAL_CARE_LOW: 'SPECIAL_CARE_LOW',
  CLINICALLY_COMPLEX: 'CLINICALLY_COMPLEX',
  REDUCED_PHYSICAL_FUNCTION: 'REDUCED_PHYSICAL_FUNCTION',
} as const;

export type NursingTier = (typeof NursingTier)[keyof typeof NursingTier];

export const NURSING_TIER_ORDER: readonly NursingTier[] = Object.freeze([
  NursingTier.EXTENSIVE_SERVICES,
  NursingTier.SPECIAL_CARE_HIGH,
  NursingTier.SPECIAL_CARE_LOW,
  NursingTier.CLINICALLY_COMPLEX,
  NursingTier.REDUCED_PHYSICAL_FUNCTION,
]);

/** Tiers a clinical category or special-care flag can place a patient in (extensive services is flag-driven only). */
export const ASSIGNABLE_NURSING_TIERS = [
  NursingTier.SPECIAL_CARE_HIGH,
  NursingTier.SPECIAL_CARE_LOW,
  NursingTier.CLINICALLY_COMPLEX,
  NursingTier.REDUCED_PHYSICAL_FUNCTION,
] as const;

// --- NTA score bands (highest first) ---

export const NTA_BANDS = ['NA', 'NB', 'NC', 'ND', 'NE', 'NF'] as const;

export type NtaBand = (typeof NTA_BANDS)[number];

// --- Comorbidity flags (produced by document extraction) ---

export const ComorbidityFlag = {
  DEPRESSION: 'DEPRESSION',
  SWALLOWING_DISORDER: 'SWALLOWING_DISORDER',
  MECHANICALLY_ALTERED_DIET: 'MECHANICALLY_ALTERED_DIET',
  APHASIA: 'APHASIA',
  SLP_RELATED_COMORBIDITY: 'SLP_RELATED_COMORBIDITY',
  DEMENTIA: 'DEMENTIA',
  DIABETES: 'DIABETES',
  CHF: 'CHF',
  COPD: 'COPD',
  HIV_AIDS: 'HIV_AIDS',
  MULTIPLE_SCLEROSIS: 'MULTIPLE_SCLEROSIS',
  PARKINSONS: 'PARKINSONS',
  HEMIPLEGIA: 'HEMIPLEGIA',
  MALNUTRITION: 'MALNUTRITION',
  MORBID_OBESITY: 'MORBID_OBESITY',
  SEPTICEMIA: 'SEPTICEMIA',
  PNEUMONIA: 'PNEUMONIA',
  UTI: 'UTI',
  BIPOLAR: 'BIPOLAR',
  SCHIZOPHRENIA: 'SCHIZOPHRENIA',
  END_STAGE_RENAL: 'END_STAGE_RENAL',
  CANCER_ACTIVE: 'CANCER_ACTIVE',
} as const;

export type ComorbidityFlag =
  (typeof ComorbidityFlag)[keyof typeof ComorbidityFlag];

export const COMORBIDITY_FLAGS = Object.values(ComorbidityFlag) as [
  ComorbidityFlag,
  ...ComorbidityFlag[],
];

// --- Special-care flags ---

export const SpecialCareFlag = {
  IV_MEDICATION: 'IV_MEDICATION',
  IV_ANTIBIOTICS: 'IV_ANTIBIOTICS',
  PARENTERAL_FEEDING: 'PARENTERAL_FEEDING',
  FEEDING_TUBE: 'FEEDING_TUBE',
  WOUND_CARE: 'WOUND_CARE',
  WOUND_VAC: 'WOUND_VAC',
  VENTILATOR: 'VENTILATOR',
  TRACHEOSTOMY: 'TRACHEOSTOMY',
  ISOLATION: 'ISOLATION',
  DIALYSIS: 'DIALYSIS',
  OXYGEN: 'OXYGEN',
  RESPIRATORY_THERAPY: 'RESPIRATORY_THERAPY',
  BARIATRIC: 'BARIATRIC',
} as const;

export type SpecialCareFlag =
  (typeof SpecialCareFlag)[keyof typeof SpecialCareFlag];

export const SPECIAL_CARE_FLAGS = Object.values(SpecialCareFlag) as [
  SpecialCareFlag,
  ...SpecialCareFlag[],
];

/** Flags that count as IV therapy for pharmacy surcharges. */
export const IV_THERAPY_FLAGS: readonly SpecialCareFlag[] = Object.freeze([
  SpecialCareFlag.IV_MEDICATION,
  SpecialCareFlag.IV_ANTIBIOTICS,
  SpecialCareFlag.PARENTERAL_FEEDING,
]);

/** Flags that count as wound care for supply surcharges. */
export const WOUND_CARE_FLAGS: readonly SpecialCareFlag[] = Object.freeze([
  SpecialCareFlag.WOUND_CARE,
  SpecialCareFlag.WOUND_VAC,
]);

// --- Score ranges ---

/** Section GG style independence score: 0 (dependent) to 24 (independent). */
export const INDEPENDENCE_SCORE_MIN = 0;
export const INDEPENDENCE_SCORE_MAX = 24;

/** BIMS cognitive screen: 0 (severe impairment) to 15 (intact). */
export const COGNITIVE_SCORE_MIN = 0;
export const COGNITIVE_SCORE_MAX = 15;

export const DEFAULT_PDPM_TABLES_VERSION = 'fy2025';
