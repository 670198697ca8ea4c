import type { InvariantRule } from '../services/invariantValidator';

/**
 * Typed failures returned by the pipeline services.
 *
 * Every class carries a literal `kind` so callers can switch on it without
 * instanceof chains. DncViolationError is its own kind on purpose: it is never
 * retried, converted or downgraded by anything in the call chain.
 */

export class DncViolationError extends Error {
  readonly kind = 'DncViolation' as const;
  readonly prospectId: string;
  readonly action: string;

  constructor(prospectId: string, action: string) {
    super(`DNC violation: prospect ${prospectId} is Do-Not-Contact; ${action} is not allowed`);
    this.name = 'DncViolationError';
    this.prospectId = prospectId;
    this.action = action;
  }
}

export class InvalidTransitionError extends Error {
  readonly kind = 'InvalidTransition' as const;
  readonly machine: 'population' | 'stage';
  readonly prospectId: string;
  readonly fromState: string;
  readonly toState: string;

  constructor(
    machine: 'population' | 'stage',
    prospectId: string,
    fromState: string,
    toState: string,
    detail?: string
  ) {
    super(detail ?? `Invalid ${machine} transition for prospect ${prospectId}: ${fromState} -> ${toState}`);
    this.name = 'InvalidTransitionError';
    this.machine = machine;
    this.prospectId = prospectId;
    this.fromState = fromState;
    this.toState = toState;
  }
}

export class ValidationError extends Error {
  readonly kind = 'ValidationError' as const;
  readonly rule: InvariantRule | 'input';

  constructor(message: string, rule: InvariantRule | 'input' = 'input') {
    super(message);
    this.name = 'ValidationError';
    this.rule = rule;
  }
}

export class StorageBusyError extends Error {
  readonly kind = 'StorageBusy' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageBusyError';
  }
}

export class NotFoundError extends Error {
  readonly kind = 'NotFound' as const;
  readonly entity: 'prospect' | 'company';
  readonly entityId: string;

  constructor(entity: 'prospect' | 'company', entityId: string) {
    super(`${entity} ${entityId} not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class ConfigurationError extends Error {
  readonly kind = 'ConfigurationError' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class IntakeRecordError extends Error {
  readonly kind = 'IntakeRecordError' as const;
  readonly recordIndex: number;

  constructor(recordIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Import record ${recordIndex} failed: ${reason}`, { cause });
    this.name = 'IntakeRecordError';
    this.recordIndex = recordIndex;
  }
}

export type TransitionError =
  | DncViolationError
  | InvalidTransitionError
  | ValidationError
  | StorageBusyError
  | NotFoundError;

export type CadenceError = DncViolationError | ValidationError | StorageBusyError | NotFoundError;

export type IntakeFailure = TransitionError | IntakeRecordError;
