import { subMonths } from 'date-fns';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { ActivityActor } from '../models/Activity';
import type { EngagementStage, LostReason, NewProspect, Population, Prospect } from '../models/Prospect';
import type { EntityStore, EntityTransaction } from '../repositories/pipeline/entityStore';
import {
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  type TransitionError,
} from '../types/errors';
import { err, ok, systemClock, type Clock, type Result } from '../types/result';
import { createLogger, type Logger } from '../utils/logger';
import { runAtomically } from './atomic';
import { calculateNextContact } from './cadenceSchedule';
import { assertNotDnc, assessCompleteness, isValidParkedMonth, validateProspectState } from './invariantValidator';

export const POPULATION_TRANSITIONS: Readonly<Record<Population, readonly Population[]>> = {
  broken: ['unengaged', 'dead_dnc'],
  unengaged: ['engaged', 'dead_dnc', 'lost', 'parked', 'partnership'],
  engaged: ['closed_won', 'lost', 'parked', 'dead_dnc'],
  parked: ['unengaged', 'dead_dnc'],
  lost: ['unengaged', 'dead_dnc'],
  closed_won: [],
  partnership: [],
  dead_dnc: [],
};

export const canTransition = (from: Population, to: Population): boolean =>
  POPULATION_TRANSITIONS[from].includes(to);

export const getAvailableTransitions = (from: Population): Population[] => [...POPULATION_TRANSITIONS[from]];

export interface TransitionOptions {
  reason?: string;
  followUpDate?: Date | null;
  stage?: EngagementStage;
  parkedMonth?: string | null;
  lostReason?: LostReason | null;
  createdBy?: ActivityActor;
}

export type AdmissionPopulation = Extract<Population, 'unengaged' | 'broken'>;

export type AdmissionDraft = Pick<NewProspect, 'companyId' | 'firstName' | 'lastName' | 'title' | 'source' | 'notes'> &
  Partial<Pick<NewProspect, 'referredByProspectId'>>;

export interface AdmissionOptions {
  population: AdmissionPopulation;
  notes?: string;
  createdBy?: ActivityActor;
}

export interface ResurrectionQuery {
  asOf?: Date;
  minMonthsDormant?: number;
}

const isValidDate = (value: Date) => !Number.isNaN(value.getTime());

const clearedSchedule = { followUpDate: null, parkedMonth: null, engagementStage: null } as const;

export class PopulationService {
  private readonly logger: Logger;

  constructor(
    private readonly store: EntityStore,
    private readonly config: PipelineConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = createLogger('population', config.logLevel);
  }

  /**
   * Moves a prospect to `target` in its own transaction: lock, DNC check,
   * table check, side effects, invariant check, write, one status_change row.
   */
  transition(
    prospectId: string,
    target: Population,
    options: TransitionOptions = {}
  ): Promise<Result<Prospect, TransitionError>> {
    return runAtomically(this.store, (tx) => this.transitionWithin(tx, prospectId, target, options));
  }

  async transitionWithin(
    tx: EntityTransaction,
    prospectId: string,
    target: Population,
    options: TransitionOptions = {}
  ): Promise<Result<Prospect, TransitionError>> {
    const prospect = await tx.lockProspect(prospectId);
    if (!prospect) {
      return err(new NotFoundError('prospect', prospectId));
    }
    return this.applyTransition(tx, prospect, target, options);
  }

  /** Same as transitionWithin for a prospect the caller has already locked. */
  async applyTransition(
    tx: EntityTransaction,
    prospect: Prospect,
    target: Population,
    options: TransitionOptions = {}
  ): Promise<Result<Prospect, TransitionError>> {
    const dnc = assertNotDnc(prospect, `transition to ${target}`);
    if (dnc) {
      this.logger.error('DNC violation blocked', { prospectId: prospect.id, target });
      return err(dnc);
    }

    if (!canTransition(prospect.population, target)) {
      return err(new InvalidTransitionError('population', prospect.id, prospect.population, target));
    }

    const candidate = this.buildCandidate(prospect, target, options);
    if (!candidate.ok) return candidate;

    const validated = validateProspectState(candidate.value);
    if (!validated.ok) return validated;

    const updated = await tx.updateProspect(validated.value);
    await tx.createActivity({
      prospectId: prospect.id,
      activityType: 'status_change',
      populationBefore: prospect.population,
      populationAfter: updated.population,
      stageBefore: prospect.engagementStage,
      stageAfter: updated.engagementStage,
      followUpSet: updated.followUpDate,
      notes: options.reason?.trim() || `Transition: ${prospect.population} -> ${target}`,
      createdBy: options.createdBy ?? 'user',
    });

    this.logger.info('Population changed', {
      prospectId: prospect.id,
      from: prospect.population,
      to: updated.population,
      followUpDate: updated.followUpDate?.toISOString() ?? null,
    });
    return ok(updated);
  }

  private buildCandidate(
    prospect: Prospect,
    target: Population,
    options: TransitionOptions
  ): Result<Prospect, ValidationError> {
    const now = this.clock();
    const followUpDate = options.followUpDate ?? null;
    if (followUpDate && !isValidDate(followUpDate)) {
      return err(new ValidationError(`Invalid follow-up date for prospect ${prospect.id}`));
    }

    switch (target) {
      case 'engaged':
        // Prospect-paced: the date must come from the caller, never from the old schedule.
        if (!followUpDate) {
          return err(
            new ValidationError(
              `orphan engaged: prospect ${prospect.id} cannot enter engaged without a follow-up date`,
              'orphan_engaged'
            )
          );
        }
        return ok({
          ...prospect,
          population: target,
          engagementStage: options.stage ?? 'pre_demo',
          followUpDate,
          parkedMonth: null,
        });
      case 'parked': {
        const parkedMonth = options.parkedMonth;
        if (!parkedMonth || !isValidParkedMonth(parkedMonth)) {
          return err(
            new ValidationError(
              parkedMonth
                ? `parked without month: prospect ${prospect.id} got malformed parked month "${parkedMonth}" (expected YYYY-MM)`
                : `parked without month: prospect ${prospect.id} cannot be parked without a parked month`,
              'parked_without_month'
            )
          );
        }
        return ok({ ...prospect, population: target, engagementStage: null, followUpDate: null, parkedMonth });
      }
      case 'unengaged':
        return ok({
          ...prospect,
          population: target,
          engagementStage: null,
          followUpDate:
            followUpDate ?? calculateNextContact(this.config.cadenceIntervals, prospect.attemptCount, null, now),
          parkedMonth: null,
        });
      case 'dead_dnc':
        return ok({ ...prospect, ...clearedSchedule, population: target, deadReason: 'dnc', deadDate: now });
      case 'lost':
        return ok({
          ...prospect,
          ...clearedSchedule,
          population: target,
          lostReason: options.lostReason ?? null,
          lostDate: now,
        });
      case 'closed_won':
        return ok({ ...prospect, ...clearedSchedule, population: target, closeDate: now });
      case 'partnership':
        return ok({ ...prospect, ...clearedSchedule, population: target });
      case 'broken':
        return ok({ ...prospect, population: target, engagementStage: null });
    }
  }

  /**
   * Creates a prospect in its starting population and writes its single
   * `import` activity. Runs inside the caller's transaction.
   */
  async admitProspect(
    tx: EntityTransaction,
    draft: AdmissionDraft,
    options: AdmissionOptions
  ): Promise<Result<Prospect, ValidationError>> {
    const now = this.clock();
    const candidate: NewProspect = {
      companyId: draft.companyId,
      firstName: draft.firstName,
      lastName: draft.lastName,
      title: draft.title,
      population: options.population,
      engagementStage: null,
      followUpDate:
        options.population === 'unengaged' ? calculateNextContact(this.config.cadenceIntervals, 0, null, now) : null,
      lastContactDate: null,
      parkedMonth: null,
      attemptCount: 0,
      source: draft.source,
      referredByProspectId: draft.referredByProspectId ?? null,
      deadReason: null,
      deadDate: null,
      lostReason: null,
      lostDate: null,
      closeDate: null,
      notes: draft.notes,
    };

    const validated = validateProspectState({ ...candidate, id: '' });
    if (!validated.ok) return validated;

    const prospect = await tx.createProspect(candidate);
    await tx.createActivity({
      prospectId: prospect.id,
      activityType: 'import',
      populationBefore: null,
      populationAfter: prospect.population,
      followUpSet: prospect.followUpDate,
      notes: options.notes ?? null,
      createdBy: options.createdBy ?? 'system',
    });

    this.logger.debug('Prospect admitted', { prospectId: prospect.id, population: prospect.population });
    return ok(prospect);
  }

  /** Broken prospects that now have a name and a contact method move to unengaged. */
  async promoteIfComplete(
    tx: EntityTransaction,
    prospect: Prospect,
    reason: string,
    createdBy: ActivityActor = 'system'
  ): Promise<Result<Prospect, TransitionError>> {
    if (prospect.population !== 'broken') return ok(prospect);

    const methods = await tx.getContactMethods(prospect.id);
    const { complete } = assessCompleteness({
      firstName: prospect.firstName,
      lastName: prospect.lastName,
      hasEmail: methods.some((method) => method.type === 'email'),
      hasPhone: methods.some((method) => method.type === 'phone'),
    });
    if (!complete) return ok(prospect);

    return this.applyTransition(tx, prospect, 'unengaged', { reason, createdBy });
  }

  /**
   * Lost prospects dormant for at least `minMonthsDormant`, oldest loss first.
   * Read-only: whether to resurrect one is the caller's decision.
   */
  findResurrectionCandidates(query: ResurrectionQuery = {}): Promise<Prospect[]> {
    const cutoff = subMonths(query.asOf ?? this.clock(), query.minMonthsDormant ?? 12);
    return this.store.listLostBefore(cutoff);
  }
}
