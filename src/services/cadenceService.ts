import { endOfDay, format, startOfDay } from 'date-fns';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { ActivityActor, ActivityOutcome, ActivityType } from '../models/Activity';
import type { Prospect } from '../models/Prospect';
import type { EntityStore } from '../repositories/pipeline/entityStore';
import { NotFoundError, ValidationError, type CadenceError, type TransitionError } from '../types/errors';
import { err, ok, systemClock, type BatchResult, type Clock, type Result } from '../types/result';
import { createLogger, type Logger } from '../utils/logger';
import { runAtomically } from './atomic';
import { UNSCHEDULED_POPULATIONS, calculateNextContact, getCadenceMode, getInterval } from './cadenceSchedule';
import { assertNotDnc, validateProspectState } from './invariantValidator';
import type { PopulationService } from './populationService';

export interface AttemptInput {
  activityType: ActivityType;
  outcome?: ActivityOutcome | null;
  notes?: string | null;
  at?: Date;
  createdBy?: ActivityActor;
}

const sameInstant = (left: Date | null, right: Date | null) =>
  left === null || right === null ? left === right : left.getTime() === right.getTime();

export class CadenceService {
  private readonly logger: Logger;

  constructor(
    private readonly store: EntityStore,
    private readonly config: PipelineConfig,
    private readonly populations: PopulationService,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = createLogger('cadence', config.logLevel);
  }

  getInterval(attemptNumber: number) {
    return getInterval(this.config.cadenceIntervals, attemptNumber);
  }

  calculateNextContact(attemptCount: number, lastAttemptDate: Date | null, now: Date = this.clock()) {
    return calculateNextContact(this.config.cadenceIntervals, attemptCount, lastAttemptDate, now);
  }

  /**
   * The only way a prospect-paced date changes outside a transition. Writes one
   * `reminder` activity carrying the new date.
   */
  setFollowUp(
    prospectId: string,
    when: Date | null | undefined,
    reason: string,
    createdBy: ActivityActor = 'user'
  ): Promise<Result<Prospect, CadenceError>> {
    if (!(when instanceof Date) || Number.isNaN(when.getTime())) {
      return Promise.resolve(err(new ValidationError(`A valid follow-up date is required for prospect ${prospectId}`)));
    }
    const followUpDate = when;

    return runAtomically(this.store, async (tx): Promise<Result<Prospect, CadenceError>> => {
      const prospect = await tx.lockProspect(prospectId);
      if (!prospect) {
        return err(new NotFoundError('prospect', prospectId));
      }

      const dnc = assertNotDnc(prospect, 'setting a follow-up');
      if (dnc) {
        this.logger.error('DNC violation blocked', { prospectId, action: 'setFollowUp' });
        return err(dnc);
      }

      if (getCadenceMode(prospect.population) === 'none') {
        return err(
          new ValidationError(
            `Prospect ${prospectId} is ${prospect.population}; follow-ups are only kept for scheduled populations`
          )
        );
      }

      const validated = validateProspectState({ ...prospect, followUpDate });
      if (!validated.ok) return validated;

      const updated = await tx.updateProspect(validated.value);
      await tx.createActivity({
        prospectId,
        activityType: 'reminder',
        followUpSet: followUpDate,
        notes: reason,
        createdBy,
      });

      this.logger.info('Follow-up set', { prospectId, followUpDate: followUpDate.toISOString() });
      return ok(updated);
    });
  }

  /**
   * Records an outreach attempt. System-paced prospects get their next date
   * from the interval table; prospect-paced dates stay as the salesperson set
   * them, and parked prospects wait for their month.
   */
  logAttempt(prospectId: string, input: AttemptInput): Promise<Result<Prospect, CadenceError>> {
    return runAtomically(this.store, async (tx): Promise<Result<Prospect, CadenceError>> => {
      const prospect = await tx.lockProspect(prospectId);
      if (!prospect) {
        return err(new NotFoundError('prospect', prospectId));
      }

      const dnc = assertNotDnc(prospect, `logging a ${input.activityType}`);
      if (dnc) {
        this.logger.error('DNC violation blocked', { prospectId, action: input.activityType });
        return err(dnc);
      }

      const now = this.clock();
      const at = input.at ?? now;
      const attemptCount = prospect.attemptCount + 1;
      const recompute = getCadenceMode(prospect.population) === 'system' && prospect.population !== 'parked';
      const followUpDate = recompute
        ? calculateNextContact(this.config.cadenceIntervals, attemptCount, at, now)
        : prospect.followUpDate;

      const validated = validateProspectState({ ...prospect, attemptCount, lastContactDate: at, followUpDate });
      if (!validated.ok) return validated;

      const updated = await tx.updateProspect(validated.value);
      const changed = !sameInstant(prospect.followUpDate, updated.followUpDate);
      await tx.createActivity({
        prospectId,
        activityType: input.activityType,
        outcome: input.outcome ?? null,
        followUpSet: changed ? updated.followUpDate : null,
        notes: input.notes ?? null,
        createdBy: input.createdBy ?? 'user',
      });

      this.logger.debug('Attempt logged', { prospectId, attemptCount, rescheduled: changed });
      return ok(updated);
    });
  }

  /** Follow-ups dated before the day of `asOf`, most overdue first. Today's are due, not overdue. */
  getOverdue(asOf: Date = this.clock()): Promise<Prospect[]> {
    return this.store.listFollowUpsBefore(startOfDay(asOf), UNSCHEDULED_POPULATIONS);
  }

  getDueOn(day: Date): Promise<Prospect[]> {
    return this.store.listFollowUpsBetween(startOfDay(day), endOfDay(day), UNSCHEDULED_POPULATIONS);
  }

  async getOrphanedEngaged(): Promise<Prospect[]> {
    const orphans = await this.store.listOrphanedEngaged();
    if (orphans.length > 0) {
      this.logger.error('Engaged prospects without a follow-up date', {
        count: orphans.length,
        prospectIds: orphans.map((prospect) => prospect.id),
      });
    }
    return orphans;
  }

  /**
   * Moves every parked prospect whose month has arrived back to unengaged, one
   * transaction each. Failures are collected alongside the prospect they hit.
   */
  async reactivateDueParked(asOf: Date = this.clock()): Promise<BatchResult<Prospect, Prospect, TransitionError>> {
    const month = format(asOf, 'yyyy-MM');
    const due = await this.store.listParkedDue(month);
    const batch: BatchResult<Prospect, Prospect, TransitionError> = { succeeded: [], failed: [] };

    for (const prospect of due) {
      const result = await this.populations.transition(prospect.id, 'unengaged', {
        reason: `Parked month ${prospect.parkedMonth ?? month} reached`,
        createdBy: 'system',
      });
      if (result.ok) {
        batch.succeeded.push(result.value);
      } else {
        batch.failed.push({ item: prospect, error: result.error });
      }
    }

    if (due.length > 0) {
      this.logger.info('Parked prospects reactivated', {
        month,
        reactivated: batch.succeeded.length,
        failed: batch.failed.length,
      });
    }
    return batch;
  }
}
