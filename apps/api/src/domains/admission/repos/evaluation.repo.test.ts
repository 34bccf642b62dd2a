import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  admissionEvaluations,
  auditLog,
  type InsertAdmissionEvaluation,
} from '@snfadmit/shared/schemas/db/admission.schema.js';
import { createEvaluationRepository } from './evaluation.repo.js';

// ---------------------------------------------------------------------------
// In-memory stores
// ---------------------------------------------------------------------------

let evaluationsStore: Record<string, any>[];
let auditStore: Record<string, any>[];
let insertReturnsNothing: boolean;

const FACILITY_ID = crypto.randomUUID();

function makeEvaluationData(
  overrides: Partial<InsertAdmissionEvaluation> = {},
): InsertAdmissionEvaluation {
  return {
    facilityId: FACILITY_ID,
    payerType: 'MEDICAID',
    asOfDate: '2025-03-15',
    projectedLos: 45,
    recommendation: 'DECLINE',
    rawScore: '0.00',
    rateId: crypto.randomUUID(),
    costModelId: crypto.randomUUID(),
    parentEvaluationId: null,
    request: {
      projectedLos: 45,
      authorizationStatus: 'APPROVED',
      censusPriority: 0,
      transportRequired: false,
      businessWeights: { censusWeight: 0.5, riskWeight: 1, complexityWeight: 0.5 },
    },
    features: {
      primaryDiagnosis: 'F03.90',
      secondaryDiagnoses: [],
      medications: [],
      independenceScore: 3,
      cognitiveScore: 8,
      therapyMinutes: { pt: 0, ot: 0, slp: 0 },
      comorbidities: ['DEMENTIA'],
      specialCare: [],
    },
    classification: {
      clinicalCategory: 'MEDICAL_MANAGEMENT',
      ptGroup: 'TI',
      otGroup: 'TI',
      slpGroup: 'SD',
      nursingGroup: 'HDE2',
      ntaScore: 0,
      ntaBand: 'NF',
      ntaConditions: [],
      clinicalComplexity: 0,
      comorbidities: ['DEMENTIA'],
      specialCare: [],
      warnings: [],
      tablesVersion: 'fy2025',
    },
    projection: {
      revenue: {
        payerType: 'MEDICAID',
        method: 'BASE_PLUS_ADD_ONS',
        rateId: 'rate-medicaid',
        los: 45,
        components: [],
        totalRevenue: '10530.00',
        perDiem: '234.00',
      },
      cost: {
        acuityBand: 'HIGH',
        costModelId: 'cost-high',
        los: 45,
        components: [],
        directCost: '16335.00',
        totalCostBeforeRisk: '19928.70',
        totalCost: '20244.60',
        perDiem: '449.88',
        denialProbability: 0.03,
        clinicalComplexity: 0,
      },
      projectedMarginTotal: '-9714.60',
      projectedMarginPerDiem: '-215.88',
      marginPct: -92.26,
    },
    score: {
      rawScore: 0,
      baseScore: 0,
      marginPerDiem: -215.88,
      recommendation: 'DECLINE',
      factors: [],
      summary: 'Negative margin of -215.88/day; projected loss of 9714.60 over 45 days.',
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Mock Drizzle DB
// ---------------------------------------------------------------------------

function makeMockDb(): any {
  function storeFor(table: unknown): Record<string, any>[] {
    if (table === admissionEvaluations) return evaluationsStore;
    if (table === auditLog) return auditStore;
    throw new Error('Unexpected table');
  }

  function chainable(ctx: {
    op: 'select' | 'insert';
    table?: unknown;
    values?: any[];
    whereClauses: Array<(row: any) => boolean>;
    shouldReturn?: boolean;
  }) {
    const chain: any = {
      values(v: any) {
        ctx.values = Array.isArray(v) ? v : [v];
        return chain;
      },
      from(table: unknown) {
        ctx.table = table;
        return chain;
      },
      where(clause: any) {
        if (clause && typeof clause === 'object' && clause.__predicate) {
          ctx.whereClauses.push(clause.__predicate);
        }
        return chain;
      },
      returning() {
        ctx.shouldReturn = true;
        return chain;
      },
      then(resolve: any, reject?: any) {
        try {
          resolve(executeOp(ctx));
        } catch (e) {
          if (reject) reject(e);
          else throw e;
        }
      },
    };
    return chain;
  }

  function executeOp(ctx: any): any[] {
    const store = storeFor(ctx.table);
    if (ctx.op === 'select') {
      return store
        .filter((row) => ctx.whereClauses.every((pred: (row: any) => boolean) => pred(row)))
        .map((row) => ({ ...row }));
    }
    const inserted: any[] = [];
    for (const entry of ctx.values ?? []) {
      const idKey = ctx.table === auditLog ? 'logId' : 'evaluationId';
      const newRow = {
        [idKey]: crypto.randomUUID(),
        createdAt: new Date(),
        ...entry,
      };
      store.push(newRow);
      inserted.push({ ...newRow });
    }
    if (insertReturnsNothing) return [];
    return ctx.shouldReturn ? inserted : [];
  }

  return {
    select() {
      return chainable({ op: 'select', whereClauses: [] });
    },
    insert(table: unknown) {
      return chainable({ op: 'insert', table, whereClauses: [] });
    },
  };
}

// ---------------------------------------------------------------------------
// Override drizzle-orm operators for in-memory predicates
// ---------------------------------------------------------------------------

vi.mock('drizzle-orm', async () => {
  const actual =
    await vi.importActual<typeof import('drizzle-orm')>('drizzle-orm');
  return {
    ...actual,
    eq(col: any, val: any) {
      const key = col?.name === 'evaluation_id' ? 'evaluationId' : String(col?.name);
      return { __predicate: (row: any) => row[key] === val };
    },
  };
});

// ============================================================================
// Tests
// ============================================================================

describe('EvaluationRepository', () => {
  let repo: ReturnType<typeof createEvaluationRepository>;

  beforeEach(() => {
    evaluationsStore = [];
    auditStore = [];
    insertReturnsNothing = false;
    repo = createEvaluationRepository(makeMockDb());
  });

  describe('insertEvaluation', () => {
    it('stores the evaluation and returns the row with its id', async () => {
      const data = makeEvaluationData();

      const row = await repo.insertEvaluation(data);

      expect(row.evaluationId).toEqual(expect.any(String));
      expect(row.createdAt).toBeInstanceOf(Date);
      expect(row.projection).toEqual(data.projection);
      expect(evaluationsStore).toHaveLength(1);
    });

    it('fails when the insert returns no row', async () => {
      insertReturnsNothing = true;

      await expect(repo.insertEvaluation(makeEvaluationData())).rejects.toThrow(
        'Insert into admission_evaluations returned no row',
      );
    });
  });

  describe('findEvaluationById', () => {
    it('finds a stored evaluation', async () => {
      const stored = await repo.insertEvaluation(makeEvaluationData());
      await repo.insertEvaluation(makeEvaluationData({ parentEvaluationId: stored.evaluationId }));

      const found = await repo.findEvaluationById(stored.evaluationId);

      expect(found?.evaluationId).toBe(stored.evaluationId);
      expect(found?.parentEvaluationId).toBeNull();
    });

    it('returns null for an unknown id', async () => {
      expect(await repo.findEvaluationById(crypto.randomUUID())).toBeNull();
    });
  });

  describe('appendAuditLog', () => {
    it('appends an entry', async () => {
      const resourceId = crypto.randomUUID();

      await repo.appendAuditLog({
        action: 'admission.evaluated',
        category: 'admission',
        resourceType: 'admission_evaluation',
        resourceId,
        detail: { recommendation: 'DECLINE' },
      });

      expect(auditStore).toHaveLength(1);
      expect(auditStore[0]).toMatchObject({
        action: 'admission.evaluated',
        resourceId,
        detail: { recommendation: 'DECLINE' },
      });
    });
  });
});
