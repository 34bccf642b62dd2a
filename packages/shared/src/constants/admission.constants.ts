// ============================================================================
// Admission Evaluation — Constants
// ============================================================================

// --- Payer Families ---

export const PayerType = {
  MEDICARE_FFS: 'MEDICARE_FFS',
  MEDICARE_ADVANTAGE: 'MEDICARE_ADVANTAGE',
  MEDICAID: 'MEDICAID',
  MANAGED_CARE: 'MANAGED_CARE',
} as const;

export type PayerType = (typeof PayerType)[keyof typeof PayerType];

export const PAYER_TYPES = Object.values(PayerType) as [
  PayerType,
  ...PayerType[],
];

// --- Prior Authorization Status ---

export const AuthorizationStatus = {
  APPROVED: 'APPROVED',
  PENDING: 'PENDING',
  DENIED: 'DENIED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type AuthorizationStatus =
  (typeof AuthorizationStatus)[keyof typeof AuthorizationStatus];

export const AUTHORIZATION_STATUSES = Object.values(AuthorizationStatus) as [
  AuthorizationStatus,
  ...AuthorizationStatus[],
];

// --- Acuity Bands (cost model selector, ascending) ---

export const AcuityBand = {
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
  COMPLEX: 'COMPLEX',
} as const;

export type AcuityBand = (typeof AcuityBand)[keyof typeof AcuityBand];

export const ACUITY_BANDS = [
  AcuityBand.LOW,
  AcuityBand.MEDIUM,
  AcuityBand.HIGH,
  AcuityBand.COMPLEX,
] as const;

// --- Transport to the facility ---

export const TransportMode = {
  WHEELCHAIR_VAN: 'WHEELCHAIR_VAN',
  AMBULANCE: 'AMBULANCE',
} as const;

export type TransportMode = (typeof TransportMode)[keyof typeof TransportMode];

export const TRANSPORT_MODES = Object.values(TransportMode) as [
  TransportMode,
  ...TransportMode[],
];

// --- Recommendation ---

export const Recommendation = {
  ACCEPT: 'ACCEPT',
  DEFER: 'DEFER',
  DECLINE: 'DECLINE',
} as const;

export type Recommendation =
  (typeof Recommendation)[keyof typeof Recommendation];

// --- Revenue calculation methods ---

export const RevenueMethod = {
  PDPM_COMPONENTS: 'PDPM_COMPONENTS',
  FLAT_PER_DIEM: 'FLAT_PER_DIEM',
  TIERED_PER_DIEM: 'TIERED_PER_DIEM',
  PDPM_MAPPED: 'PDPM_MAPPED',
  BASE_PLUS_ADD_ONS: 'BASE_PLUS_ADD_ONS',
  RATE_MATRIX: 'RATE_MATRIX',
} as const;

export type RevenueMethod = (typeof RevenueMethod)[keyof typeof RevenueMethod];

// --- Margin curve shapes ---

export const ScoreCurveKind = {
  SATURATING: 'SATURATING',
  LINEAR: 'LINEAR',
} as const;

export type ScoreCurveKind =
  (typeof ScoreCurveKind)[keyof typeof ScoreCurveKind];

// --- Error categories ---

export const ErrorCategory = {
  VALIDATION: 'validation',
  CONFIGURATION: 'configuration',
  LOOKUP: 'lookup',
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

// --- Audit Actions ---

export const AdmissionAuditAction = {
  EVALUATED: 'admission.evaluated',
  RECALCULATED: 'admission.recalculated',
} as const;

export type AdmissionAuditAction =
  (typeof AdmissionAuditAction)[keyof typeof AdmissionAuditAction];

// --- Length of stay ---

export const MIN_LOS_DAYS = 1;
export const DEFAULT_MAX_LOS_DAYS = 100;

// --- Business weights ---

export interface BusinessWeights {
  censusWeight: number;
  riskWeight: number;
  complexityWeight: number;
  /** Absent on evaluations stored before the readmission adjustment. */
  readmitRiskWeight?: number;
}

export const DEFAULT_READMIT_RISK_WEIGHT = 1;

export const DEFAULT_BUSINESS_WEIGHTS: Readonly<BusinessWeights> =
  Object.freeze({
    censusWeight: 0.5,
    riskWeight: 1,
    complexityWeight: 0.5,
    readmitRiskWeight: DEFAULT_READMIT_RISK_WEIGHT,
  });

// --- Scoring policy ---

export type ScoreCurve =
  | {
      kind: typeof ScoreCurveKind.SATURATING;
      /** Margin per diem at which the curve reaches 75. */
      halfSaturation: number;
      /** Negative margin per diem at which the curve reaches 0. */
      negativeSpan: number;
    }
  | {
      kind: typeof ScoreCurveKind.LINEAR;
      floorMargin: number;
      ceilingMargin: number;
    };

export interface RecommendationThresholds {
  accept: number;
  defer: number;
}

export interface ScoringPolicy {
  curve: ScoreCurve;
  censusMaxPoints: number;
  riskMaxPoints: number;
  complexityMaxPoints: number;
  /** Complexity value that draws the full complexity penalty. */
  complexityMax: number;
  /** Penalty for a documented prior hospital readmission, before weighting. */
  readmitHistoryPoints: number;
  thresholds: RecommendationThresholds;
}

export const DEFAULT_SCORING_POLICY: Readonly<ScoringPolicy> = Object.freeze({
  curve: Object.freeze({
    kind: ScoreCurveKind.SATURATING,
    halfSaturation: 200,
    negativeSpan: 100,
  }),
  censusMaxPoints: 10,
  riskMaxPoints: 15,
  complexityMaxPoints: 20,
  complexityMax: 20,
  readmitHistoryPoints: 5,
  thresholds: Object.freeze({ accept: 70, defer: 50 }),
});

// --- Cost / denial-risk policy ---

export type DenialBaseTable = Record<
  PayerType,
  Record<AuthorizationStatus, number>
>;

export interface CostPolicy {
  denialBase: DenialBaseTable;
  /** Added to the denial probability per clinical-complexity point. */
  complexitySlope: number;
  maxProbability: number;
}

export const DEFAULT_COST_POLICY: Readonly<CostPolicy> = Object.freeze({
  denialBase: Object.freeze({
    MEDICARE_FFS: Object.freeze({ APPROVED: 0.02, PENDING: 0.15, DENIED: 0.5, UNKNOWN: 0.25 }),
    MEDICARE_ADVANTAGE: Object.freeze({ APPROVED: 0.05, PENDING: 0.2, DENIED: 0.7, UNKNOWN: 0.35 }),
    MEDICAID: Object.freeze({ APPROVED: 0.03, PENDING: 0.1, DENIED: 0.4, UNKNOWN: 0.15 }),
    MANAGED_CARE: Object.freeze({ APPROVED: 0.03, PENDING: 0.12, DENIED: 0.45, UNKNOWN: 0.18 }),
  }),
  complexitySlope: 0.005,
  maxProbability: 0.95,
});
