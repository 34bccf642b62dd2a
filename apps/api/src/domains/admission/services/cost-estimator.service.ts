// ============================================================================
// Cost Estimator
// Projects the cost of a stay from the acuity-banded cost model, plus an
// expected loss for denial risk. The expected loss is added to cost rather
// than subtracted from revenue, so the revenue breakdown stays contractual.
// ============================================================================

import {
  TransportMode,
  type AuthorizationStatus,
  type CostPolicy,
  type PayerType,
} from '@snfadmit/shared/constants/admission.constants.js';
import {
  IV_THERAPY_FLAGS,
  SpecialCareFlag,
  WOUND_CARE_FLAGS,
} from '@snfadmit/shared/constants/pdpm.constants.js';
import type { CostModelRecord } from '@snfadmit/shared/schemas/validation/admission.validation.js';
import {
  dollarsToCents,
  formatCents,
  multiplyCents,
  parseCents,
  parseDecimal,
  roundHalfUp,
  sumCents,
} from '../../../lib/money.js';
import { assertValidLos } from './reimbursement.service.js';
import type {
  BreakdownLine,
  CaseMixClassification,
  CostBreakdown,
} from '@snfadmit/shared/schemas/db/admission.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CostInput {
  classification: CaseMixClassification;
  costModel: CostModelRecord;
  los: number;
  authStatus: AuthorizationStatus;
  payerType: PayerType;
  /** Total projected revenue, the amount at risk of denial. */
  projectedRevenue: string;
  transportRequired: boolean;
  transportMode: TransportMode;
}

export interface CostEstimatePolicy extends CostPolicy {
  maxLosDays: number;
}

// ---------------------------------------------------------------------------
// Denial risk
// ---------------------------------------------------------------------------

/**
 * Probability that reimbursement is denied: the payer/authorization base rate
 * plus a per-point complexity slope, clamped to [0, maxProbability].
 * Rounded to 4 decimals.
 */
export function denialProbability(
  payerType: PayerType,
  authStatus: AuthorizationStatus,
  clinicalComplexity: number,
  policy: CostPolicy,
): number {
  const base = policy.denialBase[payerType][authStatus];
  const raw = base + policy.complexitySlope * Math.max(0, clinicalComplexity);
  const clamped = Math.min(policy.maxProbability, Math.max(0, raw));
  return roundHalfUp(clamped, 4);
}

const TRANSPORT_LABELS: Record<TransportMode, string> = {
  [TransportMode.WHEELCHAIR_VAN]: 'wheelchair van',
  [TransportMode.AMBULANCE]: 'ambulance',
};

// ---------------------------------------------------------------------------
// estimateCost
// ---------------------------------------------------------------------------

export function estimateCost(input: CostInput, policy: CostEstimatePolicy): CostBreakdown {
  const { classification, costModel, los } = input;
  assertValidLos(los, policy.maxLosDays);

  const specialCare = new Set(classification.specialCare);
  const needsIv = IV_THERAPY_FLAGS.some((flag) => specialCare.has(flag));
  const needsWoundCare = WOUND_CARE_FLAGS.some((flag) => specialCare.has(flag));

  // (a) nursing
  const hours = costModel.nursingHoursPerDay;
  const nursingDaily = dollarsToCents(hours * parseDecimal(costModel.nursingHourlyRate));
  const nursing: BreakdownLineCents = {
    key: 'nursing',
    label: 'Nursing labor',
    cents: nursingDaily * los,
    detail: `${hours} h/day x ${costModel.nursingHourlyRate}/h = ${formatCents(nursingDaily)}/day x ${los} days`,
  };

  // (b) supplies, pharmacy, transport
  const supplyDaily = parseCents(costModel.supplyCostPerDay);
  const supplySurcharges: Array<{ label: string; cents: number }> = [];
  if (needsWoundCare) {
    supplySurcharges.push({
      label: 'wound-care',
      cents: parseCents(costModel.woundSupplySurchargePerDay),
    });
  }
  if (specialCare.has(SpecialCareFlag.OXYGEN)) {
    supplySurcharges.push({
      label: 'oxygen',
      cents: parseCents(costModel.oxygenSupplySurchargePerDay),
    });
  }
  if (specialCare.has(SpecialCareFlag.FEEDING_TUBE)) {
    supplySurcharges.push({
      label: 'feeding-tube',
      cents: parseCents(costModel.feedingTubeSupplySurchargePerDay),
    });
  }
  const suppliesDaily = supplyDaily + sumCents(supplySurcharges.map((s) => s.cents));
  const supplies: BreakdownLineCents = {
    key: 'supplies',
    label: 'Medical supplies',
    cents: suppliesDaily * los,
    detail:
      `${formatCents(supplyDaily)}/day` +
      supplySurcharges.map((s) => ` + ${s.label} surcharge ${formatCents(s.cents)}/day`).join('') +
      ` x ${los} days`,
  };

  const pharmacyDaily = parseCents(costModel.pharmacyCostPerDay);
  const ivDaily = needsIv ? parseCents(costModel.ivPharmacySurchargePerDay) : 0;
  const pharmacy: BreakdownLineCents = {
    key: 'pharmacy',
    label: 'Pharmacy',
    cents: (pharmacyDaily + ivDaily) * los,
    detail:
      `${formatCents(pharmacyDaily)}/day` +
      (needsIv ? ` + IV therapy surcharge ${formatCents(ivDaily)}/day` : '') +
      ` x ${los} days`,
  };

  const transportCents = input.transportRequired
    ? parseCents(costModel.transportCosts[input.transportMode])
    : 0;
  const transport: BreakdownLineCents = {
    key: 'transport',
    label: 'Transport',
    cents: transportCents,
    detail: input.transportRequired
      ? `One-time ${TRANSPORT_LABELS[input.transportMode]} transport`
      : 'Not required',
  };

  const directCents = sumCents([nursing.cents, supplies.cents, pharmacy.cents, transport.cents]);

  // (c) overhead on direct costs
  const overhead: BreakdownLineCents = {
    key: 'overhead',
    label: 'Overhead',
    cents: multiplyCents(directCents, costModel.overheadPct),
    detail: `${roundHalfUp(costModel.overheadPct * 100)}% of direct cost ${formatCents(directCents)}`,
  };

  const beforeRiskCents = directCents + overhead.cents;

  // (d) denial-risk expected loss on projected revenue
  const probability = denialProbability(
    input.payerType,
    input.authStatus,
    classification.clinicalComplexity,
    policy,
  );
  const revenueCents = parseCents(input.projectedRevenue);
  const denialRisk: BreakdownLineCents = {
    key: 'denial_risk',
    label: 'Denial-risk expected loss',
    cents: multiplyCents(revenueCents, probability),
    detail: `${roundHalfUp(probability * 100)}% denial probability x revenue ${formatCents(revenueCents)}`,
  };

  const lines = [nursing, supplies, pharmacy, transport, overhead, denialRisk];
  const totalCents = beforeRiskCents + denialRisk.cents;

  return {
    acuityBand: costModel.acuityBand,
    costModelId: costModel.costModelId,
    los,
    components: lines.map(toBreakdownLine),
    directCost: formatCents(directCents),
    totalCostBeforeRisk: formatCents(beforeRiskCents),
    totalCost: formatCents(totalCents),
    perDiem: formatCents(roundHalfUp(totalCents / los, 0)),
    denialProbability: probability,
    clinicalComplexity: classification.clinicalComplexity,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface BreakdownLineCents {
  key: string;
  label: string;
  cents: number;
  detail: string;
}

function toBreakdownLine(line: BreakdownLineCents): BreakdownLine {
  return {
    key: line.key,
    label: line.label,
    amount: formatCents(line.cents),
    detail: line.detail,
  };
}
