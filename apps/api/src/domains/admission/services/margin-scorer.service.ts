// ============================================================================
// Margin Scorer
// Normalizes the projected margin per diem to a 0-100 base score, applies the
// business adjustments (census priority, denial risk, clinical complexity,
// prior readmission), and maps the result to Accept / Defer / Decline with an itemized
// explanation whose contributions sum to the score.
//
// Advisory only: garbage numbers produce an extreme but consistent score,
// never an exception. Only an invalid scoring policy throws.
// ============================================================================

import {
  DEFAULT_READMIT_RISK_WEIGHT,
  DEFAULT_SCORING_POLICY,
  Recommendation,
  ScoreCurveKind,
  type BusinessWeights,
  type RecommendationThresholds,
  type ScoreCurve,
  type ScoringPolicy,
} from '@snfadmit/shared/constants/admission.constants.js';
import { ConfigurationIntegrityError } from '../../../lib/errors.js';
import { formatCents, parseCents, roundHalfUp } from '../../../lib/money.js';
import type {
  CostBreakdown,
  RevenueBreakdown,
  ScoreFactor,
  ScoreResult,
} from '@snfadmit/shared/schemas/db/admission.schema.js';

const SCORE_MIN = 0;
const SCORE_MAX = 100;

// ---------------------------------------------------------------------------
// Policy validation
// ---------------------------------------------------------------------------

/** Thresholds must satisfy 0 <= defer <= accept <= 100 so the three bands partition [0, 100]. */
export function validateThresholds(thresholds: RecommendationThresholds): void {
  const { accept, defer } = thresholds;
  const ok =
    Number.isFinite(accept) &&
    Number.isFinite(defer) &&
    SCORE_MIN <= defer &&
    defer <= accept &&
    accept <= SCORE_MAX;
  if (!ok) {
    throw new ConfigurationIntegrityError(
      `Recommendation thresholds must satisfy 0 <= defer <= accept <= 100 (defer ${defer}, accept ${accept})`,
      { thresholds },
      'INVALID_SCORING_POLICY',
    );
  }
}

function validateCurve(curve: ScoreCurve): void {
  const ok =
    curve.kind === ScoreCurveKind.SATURATING
      ? curve.halfSaturation > 0 && curve.negativeSpan > 0
      : Number.isFinite(curve.floorMargin) &&
        Number.isFinite(curve.ceilingMargin) &&
        curve.ceilingMargin > curve.floorMargin;
  if (!ok) {
    throw new ConfigurationIntegrityError(
      `Invalid ${curve.kind} margin curve parameters`,
      { curve },
      'INVALID_SCORING_POLICY',
    );
  }
}

// ---------------------------------------------------------------------------
// Curve & recommendation
// ---------------------------------------------------------------------------

/** Monotonic non-decreasing map from margin per diem to [0, 100]. */
export function normalizeMargin(marginPerDiem: number, curve: ScoreCurve): number {
  if (Number.isNaN(marginPerDiem)) return SCORE_MIN;
  if (marginPerDiem === Infinity) return SCORE_MAX;
  if (marginPerDiem === -Infinity) return SCORE_MIN;

  if (curve.kind === ScoreCurveKind.LINEAR) {
    const position = (marginPerDiem - curve.floorMargin) / (curve.ceilingMargin - curve.floorMargin);
    return clamp(position * SCORE_MAX, SCORE_MIN, SCORE_MAX);
  }

  if (marginPerDiem >= 0) {
    return 50 + (50 * marginPerDiem) / (marginPerDiem + curve.halfSaturation);
  }
  return Math.max(SCORE_MIN, 50 + (50 * marginPerDiem) / curve.negativeSpan);
}

export function recommend(
  score: number,
  thresholds: RecommendationThresholds,
): Recommendation {
  if (score >= thresholds.accept) return Recommendation.ACCEPT;
  if (score >= thresholds.defer) return Recommendation.DEFER;
  return Recommendation.DECLINE;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Non-finite or negative inputs count as 0. */
function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

/** Hundredths back to points, as a penalty. Never yields -0. */
function penalty(hundredths: number): number {
  return hundredths === 0 ? 0 : -hundredths / 100;
}

/** Points expressed in hundredths so factor contributions add up exactly. */
function toHundredths(points: number): number {
  return Math.round(roundHalfUp(points, 2) * 100);
}

function summarize(
  recommendation: Recommendation,
  marginPerDiem: number,
  marginTotalCents: number,
  los: number,
): string {
  const perDiem = Number.isFinite(marginPerDiem) ? marginPerDiem.toFixed(2) : String(marginPerDiem);
  const total = formatCents(Math.abs(marginTotalCents));
  switch (recommendation) {
    case Recommendation.ACCEPT:
      return `Strong margin of ${perDiem}/day; projected net of ${total} over ${los} days.`;
    case Recommendation.DEFER:
      return `Moderate margin of ${perDiem}/day; confirm authorization or negotiate rates before accepting. Projected net of ${total} over ${los} days.`;
    case Recommendation.DECLINE:
      return marginTotalCents < 0
        ? `Negative margin of ${perDiem}/day; projected loss of ${total} over ${los} days.`
        : `Low margin of ${perDiem}/day after risk and complexity adjustments; projected net of ${total} over ${los} days.`;
  }
}

// ---------------------------------------------------------------------------
// score
// ---------------------------------------------------------------------------

export function score(
  revenue: RevenueBreakdown,
  cost: CostBreakdown,
  weights: BusinessWeights,
  censusPriority: number,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  priorReadmission = false,
): ScoreResult {
  validateThresholds(policy.thresholds);
  validateCurve(policy.curve);

  // (a) margin per diem
  const los = revenue.los > 0 ? revenue.los : 1;
  const marginTotalCents = parseCents(revenue.totalRevenue) - parseCents(cost.totalCost);
  const marginPerDiem = marginTotalCents / 100 / los;

  // (b) base score
  const base = toHundredths(normalizeMargin(marginPerDiem, policy.curve));

  // (c) business adjustments
  const priority = Number.isFinite(censusPriority) ? clamp(censusPriority, 0, 1) : 0;
  const census = toHundredths(
    priority * finiteOrZero(weights.censusWeight) * policy.censusMaxPoints,
  );

  const probability = Number.isFinite(cost.denialProbability)
    ? clamp(cost.denialProbability, 0, 1)
    : 0;
  const risk = toHundredths(
    probability * policy.riskMaxPoints * finiteOrZero(weights.riskWeight),
  );

  const complexityShare =
    policy.complexityMax > 0
      ? clamp(finiteOrZero(cost.clinicalComplexity) / policy.complexityMax, 0, 1)
      : 0;
  const complexity = toHundredths(
    complexityShare * policy.complexityMaxPoints * finiteOrZero(weights.complexityWeight),
  );

  const readmitWeight = finiteOrZero(weights.readmitRiskWeight ?? DEFAULT_READMIT_RISK_WEIGHT);
  const readmit = priorReadmission
    ? toHundredths(finiteOrZero(policy.readmitHistoryPoints) * readmitWeight)
    : 0;

  // (d) clamp
  const unclamped = base + census - risk - complexity - readmit;
  const raw = clamp(unclamped, SCORE_MIN * 100, SCORE_MAX * 100);

  const factors: ScoreFactor[] = [
    {
      name: 'margin',
      contribution: base / 100,
      rationale: `Margin of ${roundHalfUp(marginPerDiem).toFixed(2)}/day maps to a base score of ${(base / 100).toFixed(2)}`,
    },
    {
      name: 'census_priority',
      contribution: census / 100,
      rationale: `Census priority ${priority} x weight ${finiteOrZero(weights.censusWeight)}`,
    },
    {
      name: 'denial_risk',
      contribution: penalty(risk),
      rationale: `Denial probability ${roundHalfUp(probability * 100)}% x weight ${finiteOrZero(weights.riskWeight)}`,
    },
    {
      name: 'clinical_complexity',
      contribution: penalty(complexity),
      rationale: `Clinical complexity ${finiteOrZero(cost.clinicalComplexity)} of ${policy.complexityMax} x weight ${finiteOrZero(weights.complexityWeight)}`,
    },
  ];
  if (priorReadmission) {
    factors.push({
      name: 'readmission_risk',
      contribution: penalty(readmit),
      rationale: `Prior readmission history ${finiteOrZero(policy.readmitHistoryPoints)} points x weight ${readmitWeight}`,
    });
  }
  if (raw !== unclamped) {
    factors.push({
      name: 'score_bounds',
      contribution: (raw - unclamped) / 100,
      rationale: `Score clamped to the ${SCORE_MIN}-${SCORE_MAX} range`,
    });
  }

  const rawScore = raw / 100;
  const recommendation = recommend(rawScore, policy.thresholds);

  return {
    rawScore,
    baseScore: base / 100,
    marginPerDiem: Number.isFinite(marginPerDiem) ? roundHalfUp(marginPerDiem) : marginPerDiem,
    recommendation,
    factors,
    summary: summarize(recommendation, marginPerDiem, marginTotalCents, los),
  };
}
