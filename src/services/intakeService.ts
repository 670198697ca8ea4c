import { z } from 'zod';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { ActivityActor } from '../models/Activity';
import type { Company } from '../models/Company';
import type { ContactMethod, ContactMethodType } from '../models/ContactMethod';
import type { ImportSource } from '../models/ImportSource';
import { prospectFullName, type Population, type Prospect } from '../models/Prospect';
import type { EntityReader, EntityStore, EntityTransaction } from '../repositories/pipeline/entityStore';
import {
  DncViolationError,
  IntakeRecordError,
  NotFoundError,
  ValidationError,
  type IntakeFailure,
  type TransitionError,
} from '../types/errors';
import { err, ok, systemClock, type Clock, type Result } from '../types/result';
import { createLogger, type Logger } from '../utils/logger';
import { normalizeCompanyName, normalizeEmail, normalizePhone } from '../utils/normalize';
import { withStorageRetry, type RetryOptions } from '../utils/retry';
import { nameSimilarity } from '../utils/similarity';
import { timezoneFromState } from '../utils/timezone';
import { runAtomically } from './atomic';
import { assessCompleteness, validateProspectState } from './invariantValidator';
import type { AdmissionPopulation, PopulationService } from './populationService';

// Spreadsheet exports name their columns every which way.
const KEY_ALIASES = new Map<string, string>([
  ['first_name', 'firstName'],
  ['firstname', 'firstName'],
  ['first', 'firstName'],
  ['last_name', 'lastName'],
  ['lastname', 'lastName'],
  ['last', 'lastName'],
  ['company_name', 'companyName'],
  ['company', 'companyName'],
  ['email_address', 'email'],
  ['phone_number', 'phone'],
]);

const canonicalKeys = (raw: unknown): unknown => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    record[KEY_ALIASES.get(key) ?? key] = value;
  }
  return record;
};

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text || undefined;
  });

const nameText = optionalText.transform((value) => value ?? '');

const importRecordSchema = z.preprocess(
  canonicalKeys,
  z.object({
    firstName: nameText,
    lastName: nameText,
    email: optionalText,
    phone: optionalText,
    companyName: z.string({ required_error: 'companyName is required' }).trim().min(1, 'companyName is required'),
    title: optionalText,
    state: optionalText,
    source: optionalText,
    notes: optionalText,
  })
);

export type ImportRecord = z.output<typeof importRecordSchema>;

export type MatchReason = 'email' | 'fuzzy_name' | 'phone';

export type ReviewDecision = 'merge' | 'new' | 'skip';

export interface AnalyzedRecord {
  index: number;
  record: ImportRecord;
  normalizedEmail: string | null;
  normalizedPhone: string | null;
}

export interface MergeCandidate extends AnalyzedRecord {
  existingProspectId: string;
  matchReason: MatchReason;
  matchConfidence: number;
}

export interface BlockedRecord extends AnalyzedRecord {
  dncProspectId: string;
  blockedBy: MatchReason;
}

export interface RejectedRecord {
  index: number;
  raw: unknown;
  error: ValidationError;
}

export interface ImportPreview {
  sourceName: string;
  filename: string | null;
  newRecords: AnalyzedRecord[];
  mergeRecords: MergeCandidate[];
  needsReview: MergeCandidate[];
  blockedDnc: BlockedRecord[];
  incomplete: AnalyzedRecord[];
  rejected: RejectedRecord[];
}

export interface ImportFailure {
  index: number;
  record: ImportRecord | null;
  error: IntakeFailure;
}

export interface ImportResult {
  importedCount: number;
  mergedCount: number;
  brokenCount: number;
  dncBlockedCount: number;
  sourceId: string | null;
  succeeded: string[];
  failed: ImportFailure[];
}

export interface CommitOptions {
  createdBy?: ActivityActor;
}

type Classification =
  | { kind: 'new' | 'incomplete'; entry: AnalyzedRecord }
  | { kind: 'merge' | 'needs_review'; entry: MergeCandidate }
  | { kind: 'blocked_dnc'; entry: BlockedRecord };

type CommitTask =
  | { kind: 'admit'; entry: AnalyzedRecord; population: AdmissionPopulation }
  | { kind: 'merge'; entry: MergeCandidate };

interface RecordOutcome {
  prospectId: string;
  outcome: 'imported' | 'merged';
  population: Population;
}

interface DncMatch {
  prospect: Prospect;
  via: MatchReason;
}

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

export const parseImportRecord = (raw: unknown, index: number): Result<ImportRecord, ValidationError> => {
  const parsed = importRecordSchema.safeParse(raw);
  return parsed.success
    ? ok(parsed.data)
    : err(new ValidationError(`Import record ${index} rejected: ${formatIssues(parsed.error)}`));
};

export const previewTotal = (preview: ImportPreview) =>
  preview.newRecords.length +
  preview.mergeRecords.length +
  preview.needsReview.length +
  preview.blockedDnc.length +
  preview.incomplete.length +
  preview.rejected.length;

/** True when committing would write at least one record. */
export const canImport = (preview: ImportPreview) =>
  preview.newRecords.length + preview.mergeRecords.length + preview.incomplete.length > 0;

const isComplete = (entry: AnalyzedRecord) =>
  assessCompleteness({
    firstName: entry.record.firstName,
    lastName: entry.record.lastName,
    hasEmail: entry.normalizedEmail !== null,
    hasPhone: entry.normalizedPhone !== null,
  }).complete;

const byIndex = <T extends { index: number }>(entries: T[]) => [...entries].sort((a, b) => a.index - b.index);

/**
 * Settles a phone match the funnel refused to merge on its own. Returns a new
 * preview; the original is left untouched.
 */
export const resolveNeedsReview = (
  preview: ImportPreview,
  index: number,
  decision: ReviewDecision
): Result<ImportPreview, ValidationError> => {
  const entry = preview.needsReview.find((candidate) => candidate.index === index);
  if (!entry) {
    return err(new ValidationError(`Import record ${index} is not awaiting review`));
  }

  const next: ImportPreview = {
    ...preview,
    needsReview: preview.needsReview.filter((candidate) => candidate.index !== index),
  };

  if (decision === 'merge') {
    next.mergeRecords = byIndex([...preview.mergeRecords, entry]);
  } else if (decision === 'new') {
    const { existingProspectId: _existing, matchReason: _reason, matchConfidence: _confidence, ...analyzed } = entry;
    if (isComplete(analyzed)) {
      next.newRecords = byIndex([...preview.newRecords, analyzed]);
    } else {
      next.incomplete = byIndex([...preview.incomplete, analyzed]);
    }
  }
  return ok(next);
};

const findDncMatch = async (
  reader: EntityReader,
  normalizedEmail: string | null,
  normalizedPhone: string | null
): Promise<DncMatch | null> => {
  if (normalizedEmail) {
    const byEmail = await reader.findProspectsByEmail(normalizedEmail);
    const blocked = byEmail.find((prospect) => prospect.population === 'dead_dnc');
    if (blocked) return { prospect: blocked, via: 'email' };
  }
  if (normalizedPhone) {
    const byPhone = await reader.findProspectsByPhone(normalizedPhone);
    const blocked = byPhone.find((prospect) => prospect.population === 'dead_dnc');
    if (blocked) return { prospect: blocked, via: 'phone' };
  }
  return null;
};

export class IntakeService {
  private readonly logger: Logger;

  constructor(
    private readonly store: EntityStore,
    private readonly config: PipelineConfig,
    private readonly populations: PopulationService,
    private readonly clock: Clock = systemClock,
    private readonly retryOptions: RetryOptions = {}
  ) {
    this.logger = createLogger('intake', config.logLevel);
  }

  /**
   * Classifies every record against the current store without writing
   * anything. Running it twice on an unchanged store gives the same preview.
   */
  async analyze(records: readonly unknown[], sourceName: string, filename: string | null = null): Promise<ImportPreview> {
    const preview: ImportPreview = {
      sourceName,
      filename,
      newRecords: [],
      mergeRecords: [],
      needsReview: [],
      blockedDnc: [],
      incomplete: [],
      rejected: [],
    };

    for (const [index, raw] of records.entries()) {
      const parsed = parseImportRecord(raw, index);
      if (!parsed.ok) {
        preview.rejected.push({ index, raw, error: parsed.error });
        continue;
      }

      const classification = await this.classify(index, parsed.value);
      switch (classification.kind) {
        case 'blocked_dnc':
          preview.blockedDnc.push(classification.entry);
          break;
        case 'merge':
          preview.mergeRecords.push(classification.entry);
          break;
        case 'needs_review':
          preview.needsReview.push(classification.entry);
          break;
        case 'incomplete':
          preview.incomplete.push(classification.entry);
          break;
        case 'new':
          preview.newRecords.push(classification.entry);
          break;
      }
    }

    this.logger.info('Import analyzed', {
      sourceName,
      total: previewTotal(preview),
      new: preview.newRecords.length,
      merge: preview.mergeRecords.length,
      needsReview: preview.needsReview.length,
      blockedDnc: preview.blockedDnc.length,
      incomplete: preview.incomplete.length,
      rejected: preview.rejected.length,
    });
    return preview;
  }

  private async classify(index: number, record: ImportRecord): Promise<Classification> {
    const entry: AnalyzedRecord = {
      index,
      record,
      normalizedEmail: normalizeEmail(record.email),
      normalizedPhone: normalizePhone(record.phone),
    };

    const dnc = await findDncMatch(this.store, entry.normalizedEmail, entry.normalizedPhone);
    if (dnc) {
      return { kind: 'blocked_dnc', entry: { ...entry, dncProspectId: dnc.prospect.id, blockedBy: dnc.via } };
    }

    if (entry.normalizedEmail) {
      const [byEmail] = await this.store.findProspectsByEmail(entry.normalizedEmail);
      if (byEmail) {
        return {
          kind: 'merge',
          entry: { ...entry, existingProspectId: byEmail.id, matchReason: 'email', matchConfidence: 1 },
        };
      }
    }

    const fuzzy = await this.findFuzzyMatch(record);
    if (fuzzy) {
      if (fuzzy.prospect.population === 'dead_dnc') {
        return { kind: 'blocked_dnc', entry: { ...entry, dncProspectId: fuzzy.prospect.id, blockedBy: 'fuzzy_name' } };
      }
      return {
        kind: 'merge',
        entry: { ...entry, existingProspectId: fuzzy.prospect.id, matchReason: 'fuzzy_name', matchConfidence: fuzzy.score },
      };
    }

    if (entry.normalizedPhone) {
      const [byPhone] = await this.store.findProspectsByPhone(entry.normalizedPhone);
      if (byPhone) {
        // A shared office line is not enough to merge two people.
        return {
          kind: 'needs_review',
          entry: { ...entry, existingProspectId: byPhone.id, matchReason: 'phone', matchConfidence: 1 },
        };
      }
    }

    return { kind: isComplete(entry) ? 'new' : 'incomplete', entry };
  }

  private async findFuzzyMatch(record: ImportRecord): Promise<{ prospect: Prospect; score: number } | null> {
    if (!record.firstName || !record.lastName) return null;

    const company = await this.store.findCompanyByNormalizedName(normalizeCompanyName(record.companyName));
    if (!company) return null;

    const incomingName = prospectFullName(record);
    let best: { prospect: Prospect; score: number } | null = null;
    for (const prospect of await this.store.listProspectsByCompany(company.id)) {
      const score = nameSimilarity(incomingName, prospectFullName(prospect));
      if (!best || score > best.score) {
        best = { prospect, score };
      }
    }
    return best && best.score >= this.config.nameSimilarityThreshold ? best : null;
  }

  /**
   * Writes the preview, one transaction per record. DNC status is looked up
   * again inside every record's transaction; failures are collected and the
   * rest of the batch carries on.
   */
  async commit(preview: ImportPreview, options: CommitOptions = {}): Promise<ImportResult> {
    const createdBy = options.createdBy ?? 'user';
    const result: ImportResult = {
      importedCount: 0,
      mergedCount: 0,
      brokenCount: 0,
      dncBlockedCount: preview.blockedDnc.length,
      sourceId: null,
      succeeded: [],
      failed: preview.rejected.map((rejected) => ({ index: rejected.index, record: null, error: rejected.error })),
    };

    const tasks: CommitTask[] = [
      ...preview.newRecords.map((entry): CommitTask => ({ kind: 'admit', entry, population: 'unengaged' })),
      ...preview.incomplete.map((entry): CommitTask => ({ kind: 'admit', entry, population: 'broken' })),
      ...preview.mergeRecords.map((entry): CommitTask => ({ kind: 'merge', entry })),
    ].sort((a, b) => a.entry.index - b.entry.index);

    for (const task of tasks) {
      const outcome = await this.commitTask(task, preview.sourceName, createdBy);
      if (!outcome.ok) {
        if (outcome.error instanceof DncViolationError) {
          result.dncBlockedCount += 1;
          this.logger.error('DNC violation blocked import record', {
            index: task.entry.index,
            prospectId: outcome.error.prospectId,
          });
        } else {
          this.logger.warn('Import record failed', { index: task.entry.index, error: outcome.error.message });
        }
        result.failed.push({ index: task.entry.index, record: task.entry.record, error: outcome.error });
        continue;
      }

      result.succeeded.push(outcome.value.prospectId);
      if (outcome.value.outcome === 'merged') {
        result.mergedCount += 1;
      } else {
        result.importedCount += 1;
        if (outcome.value.population === 'broken') result.brokenCount += 1;
      }
    }

    result.failed.sort((a, b) => a.index - b.index);
    result.sourceId = await this.recordImportSource(preview, result);

    this.logger.info('Import committed', {
      sourceName: preview.sourceName,
      imported: result.importedCount,
      merged: result.mergedCount,
      broken: result.brokenCount,
      dncBlocked: result.dncBlockedCount,
      failed: result.failed.length,
    });
    return result;
  }

  private async commitTask(
    task: CommitTask,
    sourceName: string,
    createdBy: ActivityActor
  ): Promise<Result<RecordOutcome, IntakeFailure>> {
    try {
      return await runAtomically(this.store, async (tx): Promise<Result<RecordOutcome, TransitionError>> => {
        // Concurrent commits of the same new email must not both find it unused.
        if (task.entry.normalizedEmail) {
          await tx.lockContactValue('email', task.entry.normalizedEmail);
        }
        return task.kind === 'merge'
          ? this.mergeRecord(tx, task.entry, sourceName, createdBy)
          : this.admitRecord(tx, task.entry, task.population, sourceName, createdBy);
      });
    } catch (error) {
      this.logger.error('Unexpected import record error', {
        index: task.entry.index,
        error: error instanceof Error ? error.message : String(error),
      });
      return err(new IntakeRecordError(task.entry.index, error));
    }
  }

  private async admitRecord(
    tx: EntityTransaction,
    entry: AnalyzedRecord,
    population: AdmissionPopulation,
    sourceName: string,
    createdBy: ActivityActor
  ): Promise<Result<RecordOutcome, TransitionError>> {
    const dnc = await findDncMatch(tx, entry.normalizedEmail, entry.normalizedPhone);
    if (dnc) {
      return err(new DncViolationError(dnc.prospect.id, 'import'));
    }

    // An earlier record of the same batch may have created this email already.
    if (entry.normalizedEmail) {
      const [existing] = await tx.findProspectsByEmail(entry.normalizedEmail);
      if (existing) {
        return this.mergeRecord(
          tx,
          { ...entry, existingProspectId: existing.id, matchReason: 'email', matchConfidence: 1 },
          sourceName,
          createdBy
        );
      }
    }

    const company = await this.findOrCreateCompany(tx, entry.record);
    const admitted = await this.populations.admitProspect(
      tx,
      {
        companyId: company.id,
        firstName: entry.record.firstName,
        lastName: entry.record.lastName,
        title: entry.record.title ?? null,
        source: entry.record.source ?? sourceName,
        notes: entry.record.notes ?? null,
      },
      { population, notes: `Imported from ${sourceName}`, createdBy }
    );
    if (!admitted.ok) return admitted;

    await this.addContactMethods(tx, admitted.value.id, entry, entry.record.source ?? sourceName, []);
    return ok({ prospectId: admitted.value.id, outcome: 'imported', population: admitted.value.population });
  }

  private async mergeRecord(
    tx: EntityTransaction,
    entry: MergeCandidate,
    sourceName: string,
    createdBy: ActivityActor
  ): Promise<Result<RecordOutcome, TransitionError>> {
    const dnc = await findDncMatch(tx, entry.normalizedEmail, entry.normalizedPhone);
    if (dnc) {
      return err(new DncViolationError(dnc.prospect.id, 'import merge'));
    }

    const target = await tx.lockProspect(entry.existingProspectId);
    if (!target) {
      return err(new NotFoundError('prospect', entry.existingProspectId));
    }
    if (target.population === 'dead_dnc') {
      return err(new DncViolationError(target.id, 'import merge'));
    }

    // Gaps only: what the salesperson already entered is never replaced.
    const { record } = entry;
    const validated = validateProspectState({
      ...target,
      firstName: target.firstName || record.firstName,
      lastName: target.lastName || record.lastName,
      title: target.title || record.title || null,
      notes: target.notes || record.notes || null,
    });
    if (!validated.ok) return validated;

    const updated = await tx.updateProspect(validated.value);
    const existingMethods = await tx.getContactMethods(updated.id);
    await this.addContactMethods(tx, updated.id, entry, record.source ?? sourceName, existingMethods);

    await tx.createActivity({
      prospectId: updated.id,
      activityType: 'import',
      notes: `Merged from ${sourceName} (match: ${entry.matchReason}, confidence ${entry.matchConfidence.toFixed(2)})`,
      createdBy,
    });

    const promoted = await this.populations.promoteIfComplete(
      tx,
      updated,
      `Completed by import from ${sourceName}`,
      createdBy
    );
    if (!promoted.ok) return promoted;

    return ok({ prospectId: updated.id, outcome: 'merged', population: promoted.value.population });
  }

  private async findOrCreateCompany(tx: EntityTransaction, record: ImportRecord): Promise<Company> {
    const nameNormalized = normalizeCompanyName(record.companyName);
    const existing = await tx.findCompanyByNormalizedName(nameNormalized);
    if (existing) return existing;

    return tx.createCompany({
      name: record.companyName,
      nameNormalized,
      domain: null,
      state: record.state ? record.state.toUpperCase() : null,
      timezone: timezoneFromState(record.state),
    });
  }

  // Email goes first so it becomes primary when the prospect has none yet.
  private async addContactMethods(
    tx: EntityTransaction,
    prospectId: string,
    entry: AnalyzedRecord,
    source: string,
    existing: ContactMethod[]
  ) {
    const incoming: Array<{ type: ContactMethodType; value: string | undefined; normalizedValue: string | null }> = [
      { type: 'email', value: entry.record.email, normalizedValue: entry.normalizedEmail },
      { type: 'phone', value: entry.record.phone, normalizedValue: entry.normalizedPhone },
    ];

    let hasPrimary = existing.some((method) => method.isPrimary);
    for (const method of incoming) {
      const { value, normalizedValue } = method;
      if (!value || !normalizedValue) continue;
      const held = existing.some((current) => current.type === method.type && current.normalizedValue === normalizedValue);
      if (held) continue;

      await tx.createContactMethod({
        prospectId,
        type: method.type,
        value,
        normalizedValue,
        isPrimary: !hasPrimary,
        isVerified: false,
        isSuspect: false,
        confidenceScore: 0,
        source,
      });
      hasPrimary = true;
    }
  }

  private async recordImportSource(preview: ImportPreview, result: ImportResult): Promise<string | null> {
    const created = await withStorageRetry(
      () =>
        runAtomically(this.store, async (tx): Promise<Result<ImportSource, never>> =>
          ok(
            await tx.createImportSource({
              sourceName: preview.sourceName,
              filename: preview.filename,
              totalRecords: previewTotal(preview),
              importedRecords: result.importedCount,
              duplicateRecords: result.mergedCount,
              brokenRecords: result.brokenCount,
              dncBlockedRecords: result.dncBlockedCount,
            })
          )
        ),
      this.retryOptions
    );

    if (!created.ok) {
      this.logger.warn('Import source not recorded', { sourceName: preview.sourceName, error: created.error.message });
      return null;
    }
    return created.value.id;
  }
}
