import { describe, it, expect } from 'vitest';
import {
  AcuityBand,
  DEFAULT_BUSINESS_WEIGHTS,
  DEFAULT_SCORING_POLICY,
  Recommendation,
  RevenueMethod,
  ScoreCurveKind,
  type BusinessWeights,
  type ScoringPolicy,
} from '@snfadmit/shared/constants/admission.constants.js';
import type {
  CostBreakdown,
  RevenueBreakdown,
  ScoreResult,
} from '@snfadmit/shared/schemas/db/admission.schema.js';
import { ConfigurationIntegrityError } from '../../../lib/errors.js';
import { normalizeMargin, recommend, score, validateThresholds } from './margin-scorer.service.js';

const UNIT_WEIGHTS: BusinessWeights = { censusWeight: 1, riskWeight: 1, complexityWeight: 1 };

const LINEAR_POLICY: ScoringPolicy = {
  ...DEFAULT_SCORING_POLICY,
  curve: { kind: ScoreCurveKind.LINEAR, floorMargin: -100, ceilingMargin: 300 },
};

function revenue(totalRevenue: string, los: number): RevenueBreakdown {
  return {
    payerType: 'MEDICARE_FFS',
    method: RevenueMethod.PDPM_COMPONENTS,
    rateId: 'rate-test',
    los,
    components: [],
    totalRevenue,
    perDiem: '0.00',
  };
}

function cost(
  totalCost: string,
  los: number,
  denialProbability = 0,
  clinicalComplexity = 0,
): CostBreakdown {
  return {
    acuityBand: AcuityBand.LOW,
    costModelId: 'cost-test',
    los,
    components: [],
    directCost: totalCost,
    totalCostBeforeRisk: totalCost,
    totalCost,
    perDiem: '0.00',
    denialProbability,
    clinicalComplexity,
  };
}

function contributions(result: ScoreResult): Record<string, number> {
  return Object.fromEntries(result.factors.map((f) => [f.name, f.contribution]));
}

function factorSumHundredths(result: ScoreResult): number {
  return result.factors.reduce((total, f) => total + Math.round(f.contribution * 100), 0);
}

// ---------------------------------------------------------------------------
// normalizeMargin
// ---------------------------------------------------------------------------

describe('normalizeMargin', () => {
  const curve = DEFAULT_SCORING_POLICY.curve;

  it('maps zero margin to the midpoint and half saturation to 75', () => {
    expect(normalizeMargin(0, curve)).toBe(50);
    expect(normalizeMargin(200, curve)).toBe(75);
  });

  it('reaches zero at the negative span and stays there', () => {
    expect(normalizeMargin(-50, curve)).toBe(25);
    expect(normalizeMargin(-100, curve)).toBe(0);
    expect(normalizeMargin(-5000, curve)).toBe(0);
  });

  it('approaches but never exceeds 100', () => {
    expect(normalizeMargin(1e9, curve)).toBeLessThanOrEqual(100);
    expect(normalizeMargin(1e9, curve)).toBeGreaterThan(99.99);
  });

  it('is non-decreasing in the margin', () => {
    let previous = -1;
    for (let m = -300; m <= 2000; m += 25) {
      const value = normalizeMargin(m, curve);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });

  it('handles non-finite margins', () => {
    expect(normalizeMargin(Number.NaN, curve)).toBe(0);
    expect(normalizeMargin(Number.POSITIVE_INFINITY, curve)).toBe(100);
    expect(normalizeMargin(Number.NEGATIVE_INFINITY, curve)).toBe(0);
  });

  it('interpolates a linear curve between floor and ceiling', () => {
    expect(normalizeMargin(100, LINEAR_POLICY.curve)).toBe(50);
    expect(normalizeMargin(-200, LINEAR_POLICY.curve)).toBe(0);
    expect(normalizeMargin(500, LINEAR_POLICY.curve)).toBe(100);
  });
});

// ---------------------------------------------------------------------------
// Recommendation thresholds
// ---------------------------------------------------------------------------

describe('recommend', () => {
  const thresholds = { accept: 70, defer: 50 };

  it('partitions the score range at the thresholds', () => {
    expect(recommend(0, thresholds)).toBe(Recommendation.DECLINE);
    expect(recommend(49.99, thresholds)).toBe(Recommendation.DECLINE);
    expect(recommend(50, thresholds)).toBe(Recommendation.DEFER);
    expect(recommend(69.99, thresholds)).toBe(Recommendation.DEFER);
    expect(recommend(70, thresholds)).toBe(Recommendation.ACCEPT);
    expect(recommend(100, thresholds)).toBe(Recommendation.ACCEPT);
  });

  it('has no defer band when the thresholds coincide', () => {
    expect(recommend(60, { accept: 60, defer: 60 })).toBe(Recommendation.ACCEPT);
    expect(recommend(59.99, { accept: 60, defer: 60 })).toBe(Recommendation.DECLINE);
  });
});

describe('validateThresholds', () => {
  it('accepts ordered thresholds inside 0-100', () => {
    expect(() => validateThresholds({ accept: 70, defer: 50 })).not.toThrow();
    expect(() => validateThresholds({ accept: 0, defer: 0 })).not.toThrow();
  });

  it.each([
    { accept: 40, defer: 60 },
    { accept: 101, defer: 50 },
    { accept: 70, defer: -1 },
    { accept: Number.NaN, defer: 50 },
  ])('rejects %o', (thresholds) => {
    expect(() => validateThresholds(thresholds)).toThrow(ConfigurationIntegrityError);
  });
});

// ---------------------------------------------------------------------------
// score
// ---------------------------------------------------------------------------

describe('score', () => {
  it('scores a profitable short stay', () => {
    const result = score(
      revenue('13092.24', 25),
      cost('6590.59', 25, 0.02),
      DEFAULT_BUSINESS_WEIGHTS,
      0.5,
    );

    expect(result.marginPerDiem).toBe(260.07);
    expect(result.baseScore).toBe(78.26);
    expect(result.rawScore).toBe(80.46);
    expect(result.recommendation).toBe(Recommendation.ACCEPT);
    expect(result.factors).toEqual([
      {
        name: 'margin',
        contribution: 78.26,
        rationale: 'Margin of 260.07/day maps to a base score of 78.26',
      },
      { name: 'census_priority', contribution: 2.5, rationale: 'Census priority 0.5 x weight 0.5' },
      { name: 'denial_risk', contribution: -0.3, rationale: 'Denial probability 2% x weight 1' },
      {
        name: 'clinical_complexity',
        contribution: 0,
        rationale: 'Clinical complexity 0 of 20 x weight 0.5',
      },
    ]);
    expect(result.summary).toBe('Strong margin of 260.07/day; projected net of 6501.65 over 25 days.');
  });

  it('applies every business adjustment', () => {
    const result = score(revenue('3000.00', 10), cost('1000.00', 10, 0.1, 10), UNIT_WEIGHTS, 1);

    expect(contributions(result)).toEqual({
      margin: 75,
      census_priority: 10,
      denial_risk: -1.5,
      clinical_complexity: -10,
    });
    expect(result.rawScore).toBe(73.5);
    expect(result.recommendation).toBe(Recommendation.ACCEPT);
  });

  it('clamps a loss-making stay at zero and explains the clamp', () => {
    const result = score(
      revenue('10530.00', 45),
      cost('20507.85', 45, 0.055, 5),
      DEFAULT_BUSINESS_WEIGHTS,
      0,
    );

    expect(result.marginPerDiem).toBe(-221.73);
    expect(contributions(result)).toEqual({
      margin: 0,
      census_priority: 0,
      denial_risk: -0.83,
      clinical_complexity: -2.5,
      score_bounds: 3.33,
    });
    expect(result.rawScore).toBe(0);
    expect(result.recommendation).toBe(Recommendation.DECLINE);
    expect(result.summary).toBe(
      'Negative margin of -221.73/day; projected loss of 9977.85 over 45 days.',
    );
  });

  it('clamps at 100', () => {
    const result = score(revenue('100000.00', 1), cost('0.00', 1), UNIT_WEIGHTS, 1);

    expect(result.rawScore).toBe(100);
    expect(contributions(result).score_bounds).toBe(-9.9);
  });

  it('defers a break-even stay', () => {
    const result = score(revenue('1000.00', 10), cost('1000.00', 10), DEFAULT_BUSINESS_WEIGHTS, 0);

    expect(result.rawScore).toBe(50);
    expect(result.recommendation).toBe(Recommendation.DEFER);
    expect(result.summary).toBe(
      'Moderate margin of 0.00/day; confirm authorization or negotiate rates before accepting. Projected net of 0.00 over 10 days.',
    );
  });

  it('declines a break-even stay with high denial risk', () => {
    const result = score(
      revenue('1000.00', 10),
      cost('1000.00', 10, 0.5),
      DEFAULT_BUSINESS_WEIGHTS,
      0,
    );

    expect(result.rawScore).toBe(42.5);
    expect(result.recommendation).toBe(Recommendation.DECLINE);
    expect(result.summary).toBe(
      'Low margin of 0.00/day after risk and complexity adjustments; projected net of 0.00 over 10 days.',
    );
  });

  it('has factor contributions that sum to the score', () => {
    const cases = [
      score(revenue('13092.24', 25), cost('6590.59', 25, 0.02), DEFAULT_BUSINESS_WEIGHTS, 0.5),
      score(revenue('10530.00', 45), cost('20507.85', 45, 0.055, 5), DEFAULT_BUSINESS_WEIGHTS, 0.3),
      score(revenue('4321.09', 7), cost('3333.33', 7, 0.137, 9), UNIT_WEIGHTS, 0.77),
      score(revenue('100000.00', 1), cost('0.00', 1), UNIT_WEIGHTS, 1),
    ];
    for (const result of cases) {
      expect(factorSumHundredths(result)).toBe(Math.round(result.rawScore * 100));
    }
  });

  it('stays within bounds for out-of-range inputs', () => {
    const result = score(
      revenue('500.00', 5),
      cost('100.00', 5, 7, -4),
      { censusWeight: Number.NaN, riskWeight: -2, complexityWeight: Number.POSITIVE_INFINITY },
      99,
    );

    expect(result.rawScore).toBeGreaterThanOrEqual(0);
    expect(result.rawScore).toBeLessThanOrEqual(100);
    expect(contributions(result)).toEqual({
      margin: 64.29,
      census_priority: 0,
      denial_risk: 0,
      clinical_complexity: 0,
    });
  });

  it('does not decrease when revenue rises', () => {
    let previous = -1;
    for (let total = 0; total <= 20000; total += 1000) {
      const result = score(
        revenue(`${total}.00`, 20),
        cost('8000.00', 20, 0.1, 4),
        DEFAULT_BUSINESS_WEIGHTS,
        0.5,
      );
      expect(result.rawScore).toBeGreaterThanOrEqual(previous);
      previous = result.rawScore;
    }
  });

  it('does not increase when cost rises', () => {
    let previous = 101;
    for (let total = 0; total <= 30000; total += 1500) {
      const result = score(
        revenue('12000.00', 20),
        cost(`${total}.00`, 20, 0.1, 4),
        DEFAULT_BUSINESS_WEIGHTS,
        0.5,
      );
      expect(result.rawScore).toBeLessThanOrEqual(previous);
      previous = result.rawScore;
    }
  });

  it('subtracts the readmission history penalty', () => {
    const result = score(
      revenue('13092.24', 25),
      cost('6590.59', 25, 0.02),
      DEFAULT_BUSINESS_WEIGHTS,
      0.5,
      DEFAULT_SCORING_POLICY,
      true,
    );

    expect(result.rawScore).toBe(75.46);
    expect(result.factors[4]).toEqual({
      name: 'readmission_risk',
      contribution: -5,
      rationale: 'Prior readmission history 5 points x weight 1',
    });
    expect(factorSumHundredths(result)).toBe(7546);
  });

  it('scales the readmission penalty by its weight', () => {
    const args = [revenue('3000.00', 10), cost('1000.00', 10, 0.1, 10)] as const;
    const zero = score(...args, { ...UNIT_WEIGHTS, readmitRiskWeight: 0 }, 1, DEFAULT_SCORING_POLICY, true);
    const double = score(...args, { ...UNIT_WEIGHTS, readmitRiskWeight: 2 }, 1, DEFAULT_SCORING_POLICY, true);

    expect(zero.rawScore).toBe(73.5);
    expect(contributions(zero).readmission_risk).toBe(0);
    expect(double.rawScore).toBe(63.5);
    expect(contributions(double).readmission_risk).toBe(-10);
  });

  it('leaves the score unchanged without readmission history', () => {
    const withFlag = score(revenue('3000.00', 10), cost('1000.00', 10, 0.1, 10), UNIT_WEIGHTS, 1, DEFAULT_SCORING_POLICY, false);

    expect(withFlag.rawScore).toBe(73.5);
    expect(withFlag.factors.map((f) => f.name)).not.toContain('readmission_risk');
  });

  it('clamps a readmission penalty that pushes the score below zero', () => {
    const result = score(
      revenue('1000.00', 10),
      cost('1500.00', 10),
      { ...UNIT_WEIGHTS, readmitRiskWeight: 10 },
      0,
      DEFAULT_SCORING_POLICY,
      true,
    );

    expect(contributions(result)).toEqual({
      margin: 25,
      census_priority: 0,
      denial_risk: 0,
      clinical_complexity: 0,
      readmission_risk: -50,
      score_bounds: 25,
    });
    expect(result.rawScore).toBe(0);
    expect(factorSumHundredths(result)).toBe(0);
  });

  it('uses a linear curve from the policy', () => {
    const result = score(revenue('2000.00', 10), cost('1000.00', 10), DEFAULT_BUSINESS_WEIGHTS, 0, LINEAR_POLICY);

    expect(result.baseScore).toBe(50);
  });

  it('rejects an invalid policy', () => {
    const policy: ScoringPolicy = { ...DEFAULT_SCORING_POLICY, thresholds: { accept: 40, defer: 60 } };

    expect(() =>
      score(revenue('1000.00', 10), cost('500.00', 10), DEFAULT_BUSINESS_WEIGHTS, 0, policy),
    ).toThrow(ConfigurationIntegrityError);
    expect(() =>
      score(revenue('1000.00', 10), cost('500.00', 10), DEFAULT_BUSINESS_WEIGHTS, 0, {
        ...DEFAULT_SCORING_POLICY,
        curve: { kind: ScoreCurveKind.LINEAR, floorMargin: 100, ceilingMargin: 100 },
      }),
    ).toThrow('Invalid LINEAR margin curve parameters');
  });
});
