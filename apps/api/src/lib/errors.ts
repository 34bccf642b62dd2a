import {
  ErrorCategory,
  MIN_LOS_DAYS,
} from '@snfadmit/shared/constants/admission.constants.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown,
    public category: ErrorCategory = ErrorCategory.VALIDATION,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Validation: the caller must fix their input
// ---------------------------------------------------------------------------

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class InvalidLosError extends AppError {
  constructor(los: number, maxLos: number) {
    super(
      400,
      'INVALID_LOS',
      `Projected length of stay must be a whole number of days from ${MIN_LOS_DAYS} to ${maxLos} (got ${los})`,
      { los, min: MIN_LOS_DAYS, max: maxLos },
    );
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfterSeconds: number) {
    super(429, 'RATE_LIMITED', `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`, {
      retryAfterSeconds,
    });
  }
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`, undefined, ErrorCategory.LOOKUP);
  }
}

// ---------------------------------------------------------------------------
// Configuration integrity: the administrative data must be fixed
// ---------------------------------------------------------------------------

export class ConfigurationIntegrityError extends AppError {
  constructor(message: string, details?: unknown, code = 'CONFIGURATION_ERROR') {
    super(422, code, message, details, ErrorCategory.CONFIGURATION);
  }
}

export class NoActiveRateError extends ConfigurationIntegrityError {
  constructor(facilityId: string, payerType: string, asOfDate: string) {
    super(
      `No active ${payerType} rate record for facility ${facilityId} on ${asOfDate}`,
      { facilityId, payerType, asOfDate },
      'NO_ACTIVE_RATE',
    );
  }
}

export class AmbiguousRateError extends ConfigurationIntegrityError {
  constructor(
    facilityId: string,
    payerType: string,
    asOfDate: string,
    rateIds: string[],
  ) {
    super(
      `${rateIds.length} ${payerType} rate records for facility ${facilityId} are active on ${asOfDate}`,
      { facilityId, payerType, asOfDate, rateIds },
      'AMBIGUOUS_RATE',
    );
  }
}

export class NoActiveCostModelError extends ConfigurationIntegrityError {
  constructor(facilityId: string, acuityBand: string, asOfDate: string) {
    super(
      `No active ${acuityBand} cost model for facility ${facilityId} on ${asOfDate}`,
      { facilityId, acuityBand, asOfDate },
      'NO_ACTIVE_COST_MODEL',
    );
  }
}

export class AmbiguousCostModelError extends ConfigurationIntegrityError {
  constructor(
    facilityId: string,
    acuityBand: string,
    asOfDate: string,
    costModelIds: string[],
  ) {
    super(
      `${costModelIds.length} ${acuityBand} cost models for facility ${facilityId} are active on ${asOfDate}`,
      { facilityId, acuityBand, asOfDate, costModelIds },
      'AMBIGUOUS_COST_MODEL',
    );
  }
}

export class OverlappingIntervalsError extends ConfigurationIntegrityError {
  constructor(overlaps: unknown[]) {
    super(
      `${overlaps.length} overlapping effective interval(s) found`,
      { overlaps },
      'OVERLAPPING_INTERVALS',
    );
  }
}
