// ============================================================================
// Rate Resolver
// Selects the single configuration record whose half-open effective interval
// [effectiveFrom, effectiveTo) contains the as-of date. Selection is by
// containment only; zero or several matches are configuration errors.
// ============================================================================

import type { PayerType, AcuityBand } from '@snfadmit/shared/constants/admission.constants.js';
import {
  isoDate,
  type RateRecord,
  type CostModelRecord,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import {
  ValidationError,
  NoActiveRateError,
  AmbiguousRateError,
  NoActiveCostModelError,
  AmbiguousCostModelError,
  OverlappingIntervalsError,
} from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A null effectiveFrom is an open start; a null effectiveTo is open-ended. */
export interface EffectiveInterval {
  effectiveFrom: string | null;
  effectiveTo: string | null;
}

export interface IntervalOverlap {
  key: string;
  firstId: string;
  secondId: string;
  first: EffectiveInterval;
  second: EffectiveInterval;
}

// ---------------------------------------------------------------------------
// Interval helpers (ISO YYYY-MM-DD strings compare lexically)
// ---------------------------------------------------------------------------

function assertIsoDate(asOfDate: string): void {
  if (!isoDate.safeParse(asOfDate).success) {
    throw new ValidationError(`As-of date must be an ISO date (YYYY-MM-DD); got "${asOfDate}"`);
  }
}

export function intervalContains(interval: EffectiveInterval, date: string): boolean {
  const startsOnOrBefore = interval.effectiveFrom === null || interval.effectiveFrom <= date;
  const endsAfter = interval.effectiveTo === null || date < interval.effectiveTo;
  return startsOnOrBefore && endsAfter;
}

export function intervalsOverlap(a: EffectiveInterval, b: EffectiveInterval): boolean {
  const aStartsBeforeBEnds = a.effectiveFrom === null || b.effectiveTo === null || a.effectiveFrom < b.effectiveTo;
  const bStartsBeforeAEnds = b.effectiveFrom === null || a.effectiveTo === null || b.effectiveFrom < a.effectiveTo;
  return aStartsBeforeBEnds && bStartsBeforeAEnds;
}

/** Records matching the filter whose interval contains the as-of date. */
export function resolveEffective<T extends EffectiveInterval>(
  records: readonly T[],
  asOfDate: string,
  matches: (record: T) => boolean,
): T[] {
  assertIsoDate(asOfDate);
  return records.filter((r) => matches(r) && intervalContains(r, asOfDate));
}

// ---------------------------------------------------------------------------
// Rate records
// ---------------------------------------------------------------------------

export function resolveRate(
  records: readonly RateRecord[],
  facilityId: string,
  payerType: PayerType,
  asOfDate: string,
): RateRecord {
  const active = resolveEffective(
    records,
    asOfDate,
    (r) => r.facilityId === facilityId && r.payerType === payerType,
  );
  const [only, ...rest] = active;
  if (only === undefined) {
    throw new NoActiveRateError(facilityId, payerType, asOfDate);
  }
  if (rest.length > 0) {
    throw new AmbiguousRateError(
      facilityId,
      payerType,
      asOfDate,
      active.map((r) => r.rateId),
    );
  }
  return only;
}

// ---------------------------------------------------------------------------
// Cost models
// ---------------------------------------------------------------------------

export function resolveCostModel(
  records: readonly CostModelRecord[],
  facilityId: string,
  acuityBand: AcuityBand,
  asOfDate: string,
): CostModelRecord {
  const active = resolveEffective(
    records,
    asOfDate,
    (r) => r.facilityId === facilityId && r.acuityBand === acuityBand,
  );
  const [only, ...rest] = active;
  if (only === undefined) {
    throw new NoActiveCostModelError(facilityId, acuityBand, asOfDate);
  }
  if (rest.length > 0) {
    throw new AmbiguousCostModelError(
      facilityId,
      acuityBand,
      asOfDate,
      active.map((r) => r.costModelId),
    );
  }
  return only;
}

// ---------------------------------------------------------------------------
// Integrity checks
// ---------------------------------------------------------------------------

/** Every overlapping pair within each key group, in input order. */
export function findOverlaps<T extends EffectiveInterval>(
  records: readonly T[],
  keyOf: (record: T) => string,
  idOf: (record: T) => string,
): IntervalOverlap[] {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }

  const overlaps: IntervalOverlap[] = [];
  for (const [key, group] of groups) {
    group.forEach((first, i) => {
      for (const second of group.slice(i + 1)) {
        if (intervalsOverlap(first, second)) {
          overlaps.push({
            key,
            firstId: idOf(first),
            secondId: idOf(second),
            first: { effectiveFrom: first.effectiveFrom, effectiveTo: first.effectiveTo },
            second: { effectiveFrom: second.effectiveFrom, effectiveTo: second.effectiveTo },
          });
        }
      }
    });
  }
  return overlaps;
}

export function findRateOverlaps(records: readonly RateRecord[]): IntervalOverlap[] {
  return findOverlaps(
    records,
    (r) => `${r.facilityId}:${r.payerType}`,
    (r) => r.rateId,
  );
}

export function findCostModelOverlaps(records: readonly CostModelRecord[]): IntervalOverlap[] {
  return findOverlaps(
    records,
    (r) => `${r.facilityId}:${r.acuityBand}`,
    (r) => r.costModelId,
  );
}

export function assertNoOverlaps(overlaps: readonly IntervalOverlap[]): void {
  if (overlaps.length > 0) {
    throw new OverlappingIntervalsError([...overlaps]);
  }
}
