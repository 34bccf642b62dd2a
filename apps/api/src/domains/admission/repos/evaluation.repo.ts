import { eq } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  admissionEvaluations,
  auditLog,
  type InsertAdmissionEvaluation,
  type SelectAdmissionEvaluation,
  type InsertAuditLog,
} from '@snfadmit/shared/schemas/db/admission.schema.js';

// ---------------------------------------------------------------------------
// Evaluation Repository
// Evaluations are immutable: there is no update or delete. A what-if
// recalculation is a new row pointing at its source.
// ---------------------------------------------------------------------------

export function createEvaluationRepository(db: NodePgDatabase) {
  return {
    async insertEvaluation(
      data: InsertAdmissionEvaluation,
    ): Promise<SelectAdmissionEvaluation> {
      const rows = await db
        .insert(admissionEvaluations)
        .values(data)
        .returning();

      const row = rows[0];
      if (!row) {
        throw new Error('Insert into admission_evaluations returned no row');
      }
      return row;
    },

    async findEvaluationById(
      evaluationId: string,
    ): Promise<SelectAdmissionEvaluation | null> {
      const rows = await db
        .select()
        .from(admissionEvaluations)
        .where(eq(admissionEvaluations.evaluationId, evaluationId));

      return rows[0] ?? null;
    },

    /** Append-only. Callers must keep clinical features out of `detail`. */
    async appendAuditLog(entry: InsertAuditLog): Promise<void> {
      await db.insert(auditLog).values(entry);
    },
  };
}

export type EvaluationRepository = ReturnType<typeof createEvaluationRepository>;
