import type { PipelineConfig } from '../config/pipelineConfig';
import type { ActivityActor } from '../models/Activity';
import { ENGAGEMENT_STAGES, type EngagementStage, type Prospect } from '../models/Prospect';
import type { EntityStore } from '../repositories/pipeline/entityStore';
import { InvalidTransitionError, NotFoundError, type TransitionError } from '../types/errors';
import { err, ok, type Result } from '../types/result';
import { createLogger, type Logger } from '../utils/logger';
import { runAtomically } from './atomic';
import { assertNotDnc, validateProspectState } from './invariantValidator';

export interface StageTransitionOptions {
  reason?: string;
  createdBy?: ActivityActor;
}

// Strictly one step forward: no skips, no regressions, no self edge.
export const canTransitionStage = (from: EngagementStage, to: EngagementStage): boolean =>
  ENGAGEMENT_STAGES.indexOf(to) === ENGAGEMENT_STAGES.indexOf(from) + 1;

export class EngagementStageService {
  private readonly logger: Logger;

  constructor(
    private readonly store: EntityStore,
    config: PipelineConfig
  ) {
    this.logger = createLogger('stage', config.logLevel);
  }

  transitionStage(
    prospectId: string,
    target: EngagementStage,
    options: StageTransitionOptions = {}
  ): Promise<Result<Prospect, TransitionError>> {
    return runAtomically(this.store, async (tx): Promise<Result<Prospect, TransitionError>> => {
      const prospect = await tx.lockProspect(prospectId);
      if (!prospect) {
        return err(new NotFoundError('prospect', prospectId));
      }

      const dnc = assertNotDnc(prospect, `stage change to ${target}`);
      if (dnc) {
        this.logger.error('DNC violation blocked', { prospectId, target });
        return err(dnc);
      }

      if (prospect.population !== 'engaged') {
        return err(
          new InvalidTransitionError(
            'stage',
            prospectId,
            prospect.engagementStage ?? 'none',
            target,
            `Invalid stage transition for prospect ${prospectId}: population is ${prospect.population}, stage changes require engaged`
          )
        );
      }

      const current = prospect.engagementStage ?? 'pre_demo';
      if (!canTransitionStage(current, target)) {
        return err(new InvalidTransitionError('stage', prospectId, current, target));
      }

      const validated = validateProspectState({ ...prospect, engagementStage: target });
      if (!validated.ok) return validated;

      const updated = await tx.updateProspect(validated.value);
      await tx.createActivity({
        prospectId,
        activityType: 'status_change',
        populationBefore: 'engaged',
        populationAfter: 'engaged',
        stageBefore: current,
        stageAfter: target,
        followUpSet: updated.followUpDate,
        notes: options.reason?.trim() || `Stage: ${current} -> ${target}`,
        createdBy: options.createdBy ?? 'user',
      });

      this.logger.info('Stage advanced', { prospectId, from: current, to: target });
      return ok(updated);
    });
  }
}
