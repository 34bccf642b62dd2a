import { eq, and, asc } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  facilities,
  rateRecords,
  costModels,
  type SelectRateRecord,
  type SelectCostModel,
} from '@snfadmit/shared/schemas/db/admission.schema.js';
import type {
  AcuityBand,
  PayerType,
} from '@snfadmit/shared/constants/admission.constants.js';
import {
  rateRecordSchema,
  costModelRecordSchema,
  type RateRecord,
  type CostModelRecord,
  type FacilityProfile,
} from '@snfadmit/shared/schemas/validation/admission.validation.js';
import { ConfigurationIntegrityError } from '../../../lib/errors.js';
import { parseDecimal } from '../../../lib/money.js';

// ---------------------------------------------------------------------------
// Configuration Repository
// Read-only access to facilities, versioned rate records and cost models.
// Rows are validated into domain records on read, so a malformed row surfaces
// as a configuration error instead of a wrong number.
// ---------------------------------------------------------------------------

function toRateRecord(row: SelectRateRecord): RateRecord {
  const result = rateRecordSchema.safeParse({
    ...row.payload,
    rateId: row.rateId,
    facilityId: row.facilityId,
    payerType: row.payerType,
    effectiveFrom: row.effectiveFrom,
    effectiveTo: row.effectiveTo,
  });
  if (!result.success) {
    throw new ConfigurationIntegrityError(
      `Rate record ${row.rateId} is malformed`,
      { rateId: row.rateId, issues: result.error.flatten() },
      'INVALID_RATE_RECORD',
    );
  }
  return result.data;
}

function toCostModelRecord(row: SelectCostModel): CostModelRecord {
  const result = costModelRecordSchema.safeParse({
    costModelId: row.costModelId,
    facilityId: row.facilityId,
    acuityBand: row.acuityBand,
    effectiveFrom: row.effectiveFrom,
    effectiveTo: row.effectiveTo,
    nursingHoursPerDay: parseDecimal(row.nursingHoursPerDay),
    nursingHourlyRate: row.nursingHourlyRate,
    supplyCostPerDay: row.supplyCostPerDay,
    pharmacyCostPerDay: row.pharmacyCostPerDay,
    transportCosts: {
      WHEELCHAIR_VAN: row.wheelchairVanTransportCost,
      AMBULANCE: row.ambulanceTransportCost,
    },
    overheadPct: parseDecimal(row.overheadPct),
    ivPharmacySurchargePerDay: row.ivPharmacySurchargePerDay,
    woundSupplySurchargePerDay: row.woundSupplySurchargePerDay,
    oxygenSupplySurchargePerDay: row.oxygenSupplySurchargePerDay,
    feedingTubeSupplySurchargePerDay: row.feedingTubeSupplySurchargePerDay,
  });
  if (!result.success) {
    throw new ConfigurationIntegrityError(
      `Cost model ${row.costModelId} is malformed`,
      { costModelId: row.costModelId, issues: result.error.flatten() },
      'INVALID_COST_MODEL',
    );
  }
  return result.data;
}

export function createConfigRepository(db: NodePgDatabase) {
  return {
    async findFacility(facilityId: string): Promise<FacilityProfile | null> {
      const rows = await db
        .select()
        .from(facilities)
        .where(eq(facilities.facilityId, facilityId));

      const row = rows[0];
      if (!row) return null;
      return {
        facilityId: row.facilityId,
        name: row.name,
        wageIndex: parseDecimal(row.wageIndex),
        vbpMultiplier: parseDecimal(row.vbpMultiplier),
      };
    },

    /**
     * All rate records of a facility, optionally for one payer, in
     * effective-from order. Selection by date is the resolver's job.
     */
    async listRateRecords(
      facilityId: string,
      payerType?: PayerType,
    ): Promise<RateRecord[]> {
      const conditions = [eq(rateRecords.facilityId, facilityId)];
      if (payerType) {
        conditions.push(eq(rateRecords.payerType, payerType));
      }

      const rows = await db
        .select()
        .from(rateRecords)
        .where(and(...conditions))
        .orderBy(asc(rateRecords.effectiveFrom));

      return rows.map(toRateRecord);
    },

    async listCostModels(
      facilityId: string,
      acuityBand?: AcuityBand,
    ): Promise<CostModelRecord[]> {
      const conditions = [eq(costModels.facilityId, facilityId)];
      if (acuityBand) {
        conditions.push(eq(costModels.acuityBand, acuityBand));
      }

      const rows = await db
        .select()
        .from(costModels)
        .where(and(...conditions))
        .orderBy(asc(costModels.effectiveFrom));

      return rows.map(toCostModelRecord);
    },
  };
}

export type ConfigRepository = ReturnType<typeof createConfigRepository>;
