// ============================================================================
// Admission Fixtures
// Facility, rate and cost-model records plus clinical feature sets shared by
// the admission unit tests. All identifiers and amounts are made up.
// ============================================================================

import {
  AcuityBand,
  PayerType,
} from '@snfadmit/shared/constants/admission.constants.js';
import type {
  AdvantageContract,
  ClinicalFeatures,
  CostModelRecord,
  FacilityProfile,
  ManagedCareRate,
  MedicaidRate,
  MedicareAdvantageRate,
  MedicareFfsRate,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import type { CaseMixClassification } from '@snfadmit/shared/schemas/db/admission.schema.js';
import { loadPdpmTables } from '../../src/domains/admission/services/pdpm-tables.service.js';

export const TABLES = loadPdpmTables('fy2025');

export const FACILITY_ID = '00000000-0000-4000-8000-000000000001';
export const OTHER_FACILITY_ID = '00000000-0000-4000-8000-000000000002';
export const AS_OF_DATE = '2025-03-15';

// ---------------------------------------------------------------------------
// Facility
// ---------------------------------------------------------------------------

export function makeFacility(overrides: Partial<FacilityProfile> = {}): FacilityProfile {
  return {
    facilityId: FACILITY_ID,
    name: 'Test Valley Care Center',
    wageIndex: 1.02,
    vbpMultiplier: 1.0,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Rate records (effective FY2025: 2024-10-01 up to 2025-10-01)
// ---------------------------------------------------------------------------

export function makeFfsRate(overrides: Partial<MedicareFfsRate> = {}): MedicareFfsRate {
  return {
    rateId: 'rate-ffs-2025',
    facilityId: FACILITY_ID,
    payerType: PayerType.MEDICARE_FFS,
    effectiveFrom: '2024-10-01',
    effectiveTo: '2025-10-01',
    componentRates: {
      pt: '64.89',
      ot: '64.38',
      slp: '26.43',
      nursing: '105.81',
      nta: '86.72',
      nonCaseMix: '98.13',
    },
    ...overrides,
  };
}

export function makeAdvantageRate(
  contract: AdvantageContract,
  overrides: Partial<MedicareAdvantageRate> = {},
): MedicareAdvantageRate {
  return {
    rateId: 'rate-ma-2025',
    facilityId: FACILITY_ID,
    payerType: PayerType.MEDICARE_ADVANTAGE,
    effectiveFrom: '2024-10-01',
    effectiveTo: '2025-10-01',
    contract,
    ...overrides,
  };
}

export function makeMedicaidRate(overrides: Partial<MedicaidRate> = {}): MedicaidRate {
  return {
    rateId: 'rate-medicaid-2025',
    facilityId: FACILITY_ID,
    payerType: PayerType.MEDICAID,
    effectiveFrom: '2024-07-01',
    effectiveTo: '2025-07-01',
    basePerDiem: '234.00',
    addOns: [],
    ...overrides,
  };
}

export function makeManagedCareRate(
  overrides: Partial<ManagedCareRate> = {},
): ManagedCareRate {
  return {
    rateId: 'rate-mco-2025',
    facilityId: FACILITY_ID,
    payerType: PayerType.MANAGED_CARE,
    effectiveFrom: '2025-01-01',
    effectiveTo: null,
    matrix: {
      PBC1: { NE: '410.00', NF: '395.00' },
      HDE2: { ND: '520.00' },
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Cost models (open-ended, one per acuity band)
// ---------------------------------------------------------------------------

const COST_MODEL_BASE: Record<AcuityBand, Omit<CostModelRecord, 'costModelId' | 'facilityId' | 'acuityBand' | 'effectiveFrom' | 'effectiveTo'>> = {
  LOW: {
    nursingHoursPerDay: 3.5,
    nursingHourlyRate: '45.00',
    supplyCostPerDay: '20.00',
    pharmacyCostPerDay: '30.00',
    transportCosts: { WHEELCHAIR_VAN: '150.00', AMBULANCE: '500.00' },
    overheadPct: 0.22,
    ivPharmacySurchargePerDay: '25.00',
    woundSupplySurchargePerDay: '15.00',
    oxygenSupplySurchargePerDay: '12.00',
    feedingTubeSupplySurchargePerDay: '25.00',
  },
  MEDIUM: {
    nursingHoursPerDay: 4.5,
    nursingHourlyRate: '46.00',
    supplyCostPerDay: '28.00',
    pharmacyCostPerDay: '35.00',
    transportCosts: { WHEELCHAIR_VAN: '150.00', AMBULANCE: '500.00' },
    overheadPct: 0.22,
    ivPharmacySurchargePerDay: '30.00',
    woundSupplySurchargePerDay: '18.00',
    oxygenSupplySurchargePerDay: '15.00',
    feedingTubeSupplySurchargePerDay: '28.00',
  },
  HIGH: {
    nursingHoursPerDay: 6,
    nursingHourlyRate: '48.00',
    supplyCostPerDay: '35.00',
    pharmacyCostPerDay: '40.00',
    transportCosts: { WHEELCHAIR_VAN: '200.00', AMBULANCE: '550.00' },
    overheadPct: 0.22,
    ivPharmacySurchargePerDay: '40.00',
    woundSupplySurchargePerDay: '25.00',
    oxygenSupplySurchargePerDay: '20.00',
    feedingTubeSupplySurchargePerDay: '30.00',
  },
  COMPLEX: {
    nursingHoursPerDay: 8,
    nursingHourlyRate: '52.00',
    supplyCostPerDay: '60.00',
    pharmacyCostPerDay: '75.00',
    transportCosts: { WHEELCHAIR_VAN: '350.00', AMBULANCE: '750.00' },
    overheadPct: 0.25,
    ivPharmacySurchargePerDay: '55.00',
    woundSupplySurchargePerDay: '35.00',
    oxygenSupplySurchargePerDay: '25.00',
    feedingTubeSupplySurchargePerDay: '40.00',
  },
};

export function makeCostModel(
  acuityBand: AcuityBand,
  overrides: Partial<CostModelRecord> = {},
): CostModelRecord {
  return {
    costModelId: `cost-${acuityBand.toLowerCase()}`,
    facilityId: FACILITY_ID,
    acuityBand,
    effectiveFrom: null,
    effectiveTo: null,
    ...COST_MODEL_BASE[acuityBand],
    ...overrides,
  };
}

export function makeCostModels(): CostModelRecord[] {
  return [
    makeCostModel(AcuityBand.LOW),
    makeCostModel(AcuityBand.MEDIUM),
    makeCostModel(AcuityBand.HIGH),
    makeCostModel(AcuityBand.COMPLEX),
  ];
}

// ---------------------------------------------------------------------------
// Clinical features
// ---------------------------------------------------------------------------

/** Elective joint replacement, moderate dependency, diabetic. */
export function jointReplacementFeatures(
  overrides: Partial<ClinicalFeatures> = {},
): ClinicalFeatures {
  return {
    primaryDiagnosis: 'Z47.1',
    secondaryDiagnoses: [],
    medications: ['metformin'],
    independenceScore: 8,
    cognitiveScore: 15,
    therapyMinutes: { pt: 300, ot: 250, slp: 0 },
    comorbidities: ['DIABETES'],
    specialCare: [],
    priorReadmission: false,
    ...overrides,
  };
}

/** Long-stay dementia case, heavily dependent, tube-fed, depressed. */
export function dementiaFeatures(
  overrides: Partial<ClinicalFeatures> = {},
): ClinicalFeatures {
  return {
    primaryDiagnosis: 'F03.90',
    secondaryDiagnoses: [],
    medications: ['sertraline'],
    independenceScore: 3,
    cognitiveScore: 8,
    therapyMinutes: { pt: 0, ot: 0, slp: 0 },
    comorbidities: ['DEMENTIA', 'DEPRESSION'],
    specialCare: ['FEEDING_TUBE'],
    priorReadmission: false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Classification of jointReplacementFeatures() under the fy2025 tables. */
export function makeClassification(
  overrides: Partial<CaseMixClassification> = {},
): CaseMixClassification {
  return {
    clinicalCategory: 'MAJOR_JOINT_REPLACEMENT',
    ptGroup: 'TB',
    otGroup: 'TB',
    slpGroup: 'NONE',
    nursingGroup: 'PBC1',
    ntaScore: 2,
    ntaBand: 'NE',
    ntaConditions: ['DIABETES'],
    clinicalComplexity: 0,
    comorbidities: ['DIABETES'],
    specialCare: [],
    warnings: [],
    tablesVersion: 'fy2025',
    ...overrides,
  };
}
