import { formatCents, parseCents, roundHalfUp } from '../../../lib/money.js';
import type {
  CostBreakdown,
  FinancialProjection,
  RevenueBreakdown,
} from '@snfadmit/shared/schemas/db/admission.schema.js';

// ---------------------------------------------------------------------------
// Financial Projection: revenue less cost, computed in cents
// ---------------------------------------------------------------------------

export function buildProjection(
  revenue: RevenueBreakdown,
  cost: CostBreakdown,
): FinancialProjection {
  const revenueCents = parseCents(revenue.totalRevenue);
  const marginCents = revenueCents - parseCents(cost.totalCost);
  const los = revenue.los > 0 ? revenue.los : 1;

  return {
    revenue,
    cost,
    projectedMarginTotal: formatCents(marginCents),
    projectedMarginPerDiem: formatCents(roundHalfUp(marginCents / los, 0)),
    marginPct: revenueCents === 0 ? 0 : roundHalfUp((marginCents / revenueCents) * 100),
  };
}
