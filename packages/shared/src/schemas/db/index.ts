// Barrel export for Drizzle DB schemas
export {
  facilities,
  rateRecords,
  costModels,
  admissionEvaluations,
  auditLog,
} from './admission.schema.js';
export type {
  InsertFacility,
  SelectFacility,
  InsertRateRecord,
  SelectRateRecord,
  InsertCostModel,
  SelectCostModel,
  InsertAdmissionEvaluation,
  SelectAdmissionEvaluation,
  InsertAuditLog,
  SelectAuditLog,
} from './admission.schema.js';
