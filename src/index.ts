import type { PipelineConfig } from './config/pipelineConfig';
import type { EntityStore } from './repositories/pipeline/entityStore';
import { CadenceService } from './services/cadenceService';
import { EngagementStageService } from './services/engagementStageService';
import { IntakeService } from './services/intakeService';
import { PopulationService } from './services/populationService';
import { systemClock, type Clock } from './types/result';
import type { RetryOptions } from './utils/retry';

export interface PipelineEngineOptions {
  store: EntityStore;
  config: PipelineConfig;
  clock?: Clock;
  retry?: RetryOptions;
}

export interface PipelineEngine {
  config: PipelineConfig;
  store: EntityStore;
  populations: PopulationService;
  stages: EngagementStageService;
  cadence: CadenceService;
  intake: IntakeService;
}

// One store, one frozen config, one clock shared by every service.
export const createPipelineEngine = ({ store, config, clock = systemClock, retry }: PipelineEngineOptions): PipelineEngine => {
  const populations = new PopulationService(store, config, clock);
  return {
    config,
    store,
    populations,
    stages: new EngagementStageService(store, config),
    cadence: new CadenceService(store, config, populations, clock),
    intake: new IntakeService(store, config, populations, clock, retry),
  };
};

export * from './config/pipelineConfig';
export * from './db/pipelineSchema';
export { createPostgresPool, closePostgresPool, withTransaction } from './db/postgres';
export * from './models/Activity';
export * from './models/Company';
export * from './models/ContactMethod';
export * from './models/ImportSource';
export * from './models/Prospect';
export type { EntityReader, EntityStore, EntityTransaction, EntityWriter } from './repositories/pipeline/entityStore';
export { PostgresEntityStore } from './repositories/pipeline/postgresEntityStore';
export { runAtomically } from './services/atomic';
export * from './services/cadenceSchedule';
export { CadenceService, type AttemptInput } from './services/cadenceService';
export { EngagementStageService, canTransitionStage, type StageTransitionOptions } from './services/engagementStageService';
export {
  IntakeService,
  canImport,
  parseImportRecord,
  previewTotal,
  resolveNeedsReview,
  type AnalyzedRecord,
  type BlockedRecord,
  type CommitOptions,
  type ImportFailure,
  type ImportPreview,
  type ImportRecord,
  type ImportResult,
  type MatchReason,
  type MergeCandidate,
  type RejectedRecord,
  type ReviewDecision,
} from './services/intakeService';
export * from './services/invariantValidator';
export {
  POPULATION_TRANSITIONS,
  PopulationService,
  canTransition,
  getAvailableTransitions,
  type AdmissionDraft,
  type AdmissionOptions,
  type AdmissionPopulation,
  type ResurrectionQuery,
  type TransitionOptions,
} from './services/populationService';
export * from './types/errors';
export * from './types/result';
export { createLogger, type LogLevel, type Logger } from './utils/logger';
export { normalizeCompanyName, normalizeEmail, normalizePersonName, normalizePhone } from './utils/normalize';
export { withStorageRetry, type RetryOptions } from './utils/retry';
export { levenshteinDistance, nameSimilarity } from './utils/similarity';
export { timezoneFromState } from './utils/timezone';
