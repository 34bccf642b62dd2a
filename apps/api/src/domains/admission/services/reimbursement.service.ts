// ============================================================================
// Reimbursement Calculator
// Projects contractual revenue for a stay from the case-mix classification,
// the resolved rate record and the projected length of stay. One strategy per
// payer family, selected by the record's payerType.
//
// Every line is computed in integer cents as round(dailyRate x factor) x days
// per schedule segment, so itemized lines always sum to the total.
// ============================================================================

import {
  PayerType,
  RevenueMethod,
  MIN_LOS_DAYS,
} from '@snfadmit/shared/constants/admission.constants.js';
import { SLP_NONE } from '@snfadmit/shared/constants/pdpm.constants.js';
import type {
  RateRecord,
  ComponentRates,
  MedicareFfsRate,
  MedicareAdvantageRate,
  MedicaidRate,
  ManagedCareRate,
  PerDiemTier,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import type {
  PdpmTables,
  VpdSegment,
} from '@snfadmit/shared/schemas/validation/pdpm-tables.validation.js';
import {
  ConfigurationIntegrityError,
  InvalidLosError,
  ValidationError,
} from '../../../lib/errors.js';
import {
  dollarsToCents,
  formatCents,
  parseCents,
  parseDecimal,
  roundHalfUp,
  sumCents,
} from '../../../lib/money.js';
import type {
  BreakdownLine,
  CaseMixClassification,
  RevenueBreakdown,
} from '@snfadmit/shared/schemas/db/admission.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RevenueInput {
  classification: CaseMixClassification;
  rateRecord: RateRecord;
  los: number;
  wageIndex: number;
  vbpMultiplier: number;
}

export interface PaymentPolicy {
  tables: PdpmTables;
  maxLosDays: number;
}

interface Line {
  key: string;
  label: string;
  cents: number;
  detail: string;
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

export function assertValidLos(los: number, maxLosDays: number): void {
  if (!Number.isInteger(los) || los < MIN_LOS_DAYS || los > maxLosDays) {
    throw new InvalidLosError(los, maxLosDays);
  }
}

/** Days of a 1-based stay of `los` days that fall inside [fromDay, toDay]. */
export function daysInSegment(
  segment: { fromDay: number; toDay: number | null },
  los: number,
): number {
  const last = Math.min(segment.toDay ?? los, los);
  return Math.max(0, last - segment.fromDay + 1);
}

function dayRange(fromDay: number, toDay: number): string {
  return fromDay === toDay ? `day ${fromDay}` : `days ${fromDay}-${toDay}`;
}

function finish(
  rateRecord: RateRecord,
  method: RevenueMethod,
  los: number,
  lines: Line[],
): RevenueBreakdown {
  const totalCents = sumCents(lines.map((l) => l.cents));
  const components: BreakdownLine[] = lines.map((l) => ({
    key: l.key,
    label: l.label,
    amount: formatCents(l.cents),
    detail: l.detail,
  }));
  return {
    payerType: rateRecord.payerType,
    method,
    rateId: rateRecord.rateId,
    los,
    components,
    totalRevenue: formatCents(totalCents),
    perDiem: formatCents(roundHalfUp(totalCents / los, 0)),
  };
}

// ---------------------------------------------------------------------------
// PDPM component logic (Medicare FFS and PDPM-mapped Advantage contracts)
// ---------------------------------------------------------------------------

interface PdpmComponentOptions {
  rates: ComponentRates;
  /** Contract multiplier applied to every base rate (1 for FFS). */
  rateMultiplier: number;
  /** null when the contract does not wage-adjust. */
  wageIndex: number | null;
  laborShare: number;
  vbpMultiplier: number;
}

const CONSTANT_SCHEDULE: readonly VpdSegment[] = [{ fromDay: 1, toDay: null, factor: 1 }];

function requireIndex(value: number | undefined, component: string, group: string): number {
  if (value === undefined) {
    throw new ConfigurationIntegrityError(
      `No case-mix index for ${component} group ${group}`,
      { component, group },
    );
  }
  return value;
}

function scheduledLine(
  key: string,
  label: string,
  dailyRate: number,
  schedule: readonly VpdSegment[],
  los: number,
  basis: string,
): Line {
  let cents = 0;
  const parts: string[] = [];
  for (const segment of schedule) {
    const days = daysInSegment(segment, los);
    if (days === 0) continue;
    const dailyCents = dollarsToCents(dailyRate * segment.factor);
    cents += dailyCents * days;
    const lastDay = segment.fromDay + days - 1;
    parts.push(`${dayRange(segment.fromDay, lastDay)} at ${formatCents(dailyCents)}/day`);
  }
  return { key, label, cents, detail: `${basis}; ${parts.join(', ')}` };
}

function pdpmComponentLines(
  classification: CaseMixClassification,
  los: number,
  opts: PdpmComponentOptions,
  tables: PdpmTables,
): Line[] {
  const idx = tables.caseMixIndexes;
  const wageFactor =
    opts.wageIndex === null
      ? 1
      : opts.laborShare * opts.wageIndex + (1 - opts.laborShare);

  const slpIndex =
    classification.slpGroup === SLP_NONE
      ? 0
      : requireIndex(idx.slp[classification.slpGroup], 'SLP', classification.slpGroup);

  const components: {
    key: keyof ComponentRates;
    lineKey: string;
    label: string;
    group: string;
    cmi: number;
    schedule: readonly VpdSegment[];
    vbp: boolean;
  }[] = [
    {
      key: 'pt',
      lineKey: 'pt',
      label: 'Physical therapy',
      group: classification.ptGroup,
      cmi: requireIndex(idx.pt[classification.ptGroup], 'PT', classification.ptGroup),
      schedule: tables.vpd.ptOt,
      vbp: false,
    },
    {
      key: 'ot',
      lineKey: 'ot',
      label: 'Occupational therapy',
      group: classification.otGroup,
      cmi: requireIndex(idx.ot[classification.otGroup], 'OT', classification.otGroup),
      schedule: tables.vpd.ptOt,
      vbp: false,
    },
    {
      key: 'slp',
      lineKey: 'slp',
      label: 'Speech-language pathology',
      group: classification.slpGroup,
      cmi: slpIndex,
      schedule: CONSTANT_SCHEDULE,
      vbp: false,
    },
    {
      key: 'nursing',
      lineKey: 'nursing',
      label: 'Nursing',
      group: classification.nursingGroup,
      cmi: requireIndex(idx.nursing[classification.nursingGroup], 'nursing', classification.nursingGroup),
      schedule: CONSTANT_SCHEDULE,
      vbp: true,
    },
    {
      key: 'nta',
      lineKey: 'nta',
      label: 'Non-therapy ancillary',
      group: classification.ntaBand,
      cmi: requireIndex(idx.nta[classification.ntaBand], 'NTA', classification.ntaBand),
      schedule: tables.vpd.nta,
      vbp: false,
    },
    {
      key: 'nonCaseMix',
      lineKey: 'non_case_mix',
      label: 'Non-case-mix',
      group: 'flat',
      cmi: 1,
      schedule: CONSTANT_SCHEDULE,
      vbp: false,
    },
  ];

  return components.map((c) => {
    const base = parseDecimal(opts.rates[c.key]) * opts.rateMultiplier;
    const dailyRate = base * c.cmi * wageFactor * (c.vbp ? opts.vbpMultiplier : 1);
    const basis =
      `${c.group} base ${roundHalfUp(base).toFixed(2)} x CMI ${c.cmi}` +
      (opts.wageIndex === null ? '' : ` x wage ${roundHalfUp(wageFactor, 4)}`) +
      (c.vbp ? ` x VBP ${opts.vbpMultiplier}` : '');
    return scheduledLine(c.lineKey, c.label, dailyRate, c.schedule, los, basis);
  });
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

function medicareFfs(
  input: RevenueInput,
  record: MedicareFfsRate,
  tables: PdpmTables,
): RevenueBreakdown {
  const lines = pdpmComponentLines(
    input.classification,
    input.los,
    {
      rates: record.componentRates,
      rateMultiplier: 1,
      wageIndex: input.wageIndex,
      laborShare: record.laborShare ?? tables.laborShare,
      vbpMultiplier: input.vbpMultiplier,
    },
    tables,
  );
  return finish(record, RevenueMethod.PDPM_COMPONENTS, input.los, lines);
}

function tieredLines(tiers: readonly PerDiemTier[], los: number, rateId: string): Line[] {
  const lines: Line[] = [];
  let covered = 0;
  tiers.forEach((tier, i) => {
    const days = daysInSegment(tier, los);
    if (days === 0) return;
    covered += days;
    const perDiem = parseCents(tier.perDiem);
    const lastDay = tier.fromDay + days - 1;
    lines.push({
      key: `tier_${i + 1}`,
      label: `Tier ${i + 1} (${dayRange(tier.fromDay, lastDay)})`,
      cents: perDiem * days,
      detail: `${formatCents(perDiem)}/day x ${days} days`,
    });
  });
  if (covered < los) {
    throw new ConfigurationIntegrityError(
      `Tiered contract ${rateId} does not cover day ${covered + 1} of a ${los}-day stay`,
      { rateId, los, coveredDays: covered },
      'RATE_TIER_GAP',
    );
  }
  return lines;
}

function medicareAdvantage(
  input: RevenueInput,
  record: MedicareAdvantageRate,
  tables: PdpmTables,
): RevenueBreakdown {
  const { contract } = record;
  switch (contract.kind) {
    case 'FLAT': {
      const perDiem = parseCents(contract.perDiem);
      return finish(record, RevenueMethod.FLAT_PER_DIEM, input.los, [
        {
          key: 'per_diem',
          label: 'Flat per diem',
          cents: perDiem * input.los,
          detail: `${formatCents(perDiem)}/day x ${input.los} days`,
        },
      ]);
    }
    case 'TIERED':
      return finish(
        record,
        RevenueMethod.TIERED_PER_DIEM,
        input.los,
        tieredLines(contract.tiers, input.los, record.rateId),
      );
    case 'PDPM_MAPPED': {
      const lines = pdpmComponentLines(
        input.classification,
        input.los,
        {
          rates: contract.componentRates,
          rateMultiplier: contract.multiplier,
          wageIndex: contract.applyWageIndex ? input.wageIndex : null,
          laborShare: tables.laborShare,
          vbpMultiplier: 1,
        },
        tables,
      );
      return finish(record, RevenueMethod.PDPM_MAPPED, input.los, lines);
    }
  }
}

function medicaid(input: RevenueInput, record: MedicaidRate): RevenueBreakdown {
  const { classification, los } = input;
  const base = parseCents(record.basePerDiem);
  const lines: Line[] = [
    {
      key: 'base',
      label: 'Base per diem',
      cents: base * los,
      detail: `${formatCents(base)}/day x ${los} days`,
    },
  ];

  const active = new Set<string>([
    ...classification.specialCare,
    ...classification.comorbidities,
    classification.nursingGroup,
  ]);
  // Keys carry the add-on's position: one trigger may fund several add-ons
  record.addOns.forEach((addOn, index) => {
    if (!active.has(addOn.trigger)) return;
    const perDiem = parseCents(addOn.perDiem);
    lines.push({
      key: `add_on_${index + 1}_${addOn.trigger.toLowerCase()}`,
      label: addOn.label,
      cents: perDiem * los,
      detail: `${addOn.trigger}: ${formatCents(perDiem)}/day x ${los} days`,
    });
  });
  return finish(record, RevenueMethod.BASE_PLUS_ADD_ONS, los, lines);
}

function managedCare(input: RevenueInput, record: ManagedCareRate): RevenueBreakdown {
  const { nursingGroup, ntaBand } = input.classification;
  const cell = record.matrix[nursingGroup]?.[ntaBand];
  const rate = cell ?? record.defaultPerDiem;
  if (rate === undefined) {
    throw new ConfigurationIntegrityError(
      `Rate matrix ${record.rateId} has no entry for ${nursingGroup}/${ntaBand} and no default per diem`,
      { rateId: record.rateId, nursingGroup, ntaBand },
      'RATE_MATRIX_GAP',
    );
  }
  const perDiem = parseCents(rate);
  return finish(record, RevenueMethod.RATE_MATRIX, input.los, [
    {
      key: 'matrix',
      label: cell === undefined ? 'Default per diem' : `Matrix ${nursingGroup}/${ntaBand}`,
      cents: perDiem * input.los,
      detail: `${formatCents(perDiem)}/day x ${input.los} days`,
    },
  ]);
}

// ---------------------------------------------------------------------------
// calculateRevenue
// ---------------------------------------------------------------------------

export function calculateRevenue(
  input: RevenueInput,
  policy: PaymentPolicy,
): RevenueBreakdown {
  assertValidLos(input.los, policy.maxLosDays);
  if (!(input.wageIndex > 0) || !Number.isFinite(input.wageIndex)) {
    throw new ValidationError(`Wage index must be a positive number; got ${input.wageIndex}`);
  }
  if (!(input.vbpMultiplier > 0) || !Number.isFinite(input.vbpMultiplier)) {
    throw new ValidationError(`VBP multiplier must be a positive number; got ${input.vbpMultiplier}`);
  }

  const record = input.rateRecord;
  switch (record.payerType) {
    case PayerType.MEDICARE_FFS:
      return medicareFfs(input, record, policy.tables);
    case PayerType.MEDICARE_ADVANTAGE:
      return medicareAdvantage(input, record, policy.tables);
    case PayerType.MEDICAID:
      return medicaid(input, record);
    case PayerType.MANAGED_CARE:
      return managedCare(input, record);
  }
}
