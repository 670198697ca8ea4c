import type { Prospect } from '../models/Prospect';
import { DncViolationError, ValidationError } from '../types/errors';
import { err, ok, type Result } from '../types/result';

export type InvariantRule =
  | 'orphan_engaged'
  | 'parked_without_month'
  | 'stage_outside_engaged'
  | 'dnc_with_schedule'
  | 'negative_attempt_count';

export interface InvariantViolation {
  rule: InvariantRule;
  message: string;
}

export type ProspectCandidate = Pick<
  Prospect,
  'id' | 'population' | 'engagementStage' | 'followUpDate' | 'parkedMonth' | 'attemptCount'
>;

const PARKED_MONTH_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export const isValidParkedMonth = (value: string | null | undefined): boolean =>
  typeof value === 'string' && PARKED_MONTH_PATTERN.test(value);

const label = (candidate: ProspectCandidate) => candidate.id || 'new prospect';

/**
 * Every structural rule the candidate breaks, in a fixed order. Pure: callers
 * run it on the state they are about to write.
 */
export const checkProspectInvariants = (candidate: ProspectCandidate): InvariantViolation[] => {
  const violations: InvariantViolation[] = [];
  const who = label(candidate);

  if (candidate.population === 'engaged' && candidate.followUpDate === null) {
    violations.push({
      rule: 'orphan_engaged',
      message: `orphan engaged: prospect ${who} is engaged without a follow-up date`,
    });
  }

  if (candidate.population === 'parked' && !isValidParkedMonth(candidate.parkedMonth)) {
    violations.push({
      rule: 'parked_without_month',
      message:
        candidate.parkedMonth === null
          ? `parked without month: prospect ${who} is parked without a parked month`
          : `parked without month: prospect ${who} has malformed parked month "${candidate.parkedMonth}" (expected YYYY-MM)`,
    });
  }

  if (candidate.population !== 'engaged' && candidate.engagementStage !== null) {
    violations.push({
      rule: 'stage_outside_engaged',
      message: `stage outside engaged: prospect ${who} is ${candidate.population} with stage ${candidate.engagementStage}`,
    });
  }

  if (candidate.population === 'dead_dnc' && (candidate.followUpDate !== null || candidate.parkedMonth !== null)) {
    violations.push({
      rule: 'dnc_with_schedule',
      message: `dnc with schedule: prospect ${who} is Do-Not-Contact but still carries scheduling data`,
    });
  }

  if (!Number.isInteger(candidate.attemptCount) || candidate.attemptCount < 0) {
    violations.push({
      rule: 'negative_attempt_count',
      message: `negative attempt count: prospect ${who} has attempt count ${candidate.attemptCount}`,
    });
  }

  return violations;
};

export const validateProspectState = <T extends ProspectCandidate>(candidate: T): Result<T, ValidationError> => {
  const [first] = checkProspectInvariants(candidate);
  return first ? err(new ValidationError(first.message, first.rule)) : ok(candidate);
};

export const assertNotDnc = (prospect: Pick<Prospect, 'id' | 'population'>, action: string) =>
  prospect.population === 'dead_dnc' ? new DncViolationError(prospect.id, action) : null;

export interface CompletenessInput {
  firstName: string | null | undefined;
  lastName: string | null | undefined;
  hasEmail: boolean;
  hasPhone: boolean;
}

export interface CompletenessAssessment {
  complete: boolean;
  hasName: boolean;
  hasContact: boolean;
}

// Complete: some name plus at least one way to reach the person.
export const assessCompleteness = (input: CompletenessInput): CompletenessAssessment => {
  const hasName = Boolean(input.firstName?.trim() || input.lastName?.trim());
  const hasContact = input.hasEmail || input.hasPhone;
  return { complete: hasName && hasContact, hasName, hasContact };
};
