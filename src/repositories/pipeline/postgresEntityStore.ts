import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import type { PipelineConfig } from '../../config/pipelineConfig';
import { clientRunner, poolRunner, withTransaction, type SqlRunner } from '../../db/postgres';
import { parseActivityActor, parseActivityOutcome, parseActivityType, type Activity, type NewActivity } from '../../models/Activity';
import { TIMEZONES, type Company, type NewCompany } from '../../models/Company';
import {
  parseContactMethodType,
  type ContactMethod,
  type ContactMethodType,
  type NewContactMethod,
} from '../../models/ContactMethod';
import { parseEnumValue } from '../../models/enumCodec';
import type { ImportSource, NewImportSource } from '../../models/ImportSource';
import {
  parseEngagementStage,
  parseLostReason,
  parsePopulation,
  type NewProspect,
  type Population,
  type Prospect,
} from '../../models/Prospect';
import type { EntityReader, EntityStore, EntityTransaction } from './entityStore';

type CompanyRow = {
  id: string;
  name: string;
  name_normalized: string;
  domain: string | null;
  state: string | null;
  timezone: string;
  created_at: Date;
  updated_at: Date;
};

type ProspectRow = {
  id: string;
  company_id: string;
  first_name: string;
  last_name: string;
  title: string | null;
  population: string;
  engagement_stage: string | null;
  follow_up_date: Date | null;
  last_contact_date: Date | null;
  parked_month: string | null;
  attempt_count: number;
  source: string | null;
  referred_by_prospect_id: string | null;
  dead_reason: string | null;
  dead_date: Date | null;
  lost_reason: string | null;
  lost_date: Date | null;
  close_date: Date | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

type ContactMethodRow = {
  id: string;
  prospect_id: string;
  type: string;
  value: string;
  normalized_value: string;
  is_primary: boolean;
  is_verified: boolean;
  is_suspect: boolean;
  confidence_score: number;
  source: string | null;
  created_at: Date;
};

type ActivityRow = {
  id: string;
  prospect_id: string;
  activity_type: string;
  outcome: string | null;
  population_before: string | null;
  population_after: string | null;
  stage_before: string | null;
  stage_after: string | null;
  follow_up_set: Date | null;
  notes: string | null;
  created_by: string;
  created_at: Date;
};

type ImportSourceRow = {
  id: string;
  source_name: string;
  filename: string | null;
  total_records: number;
  imported_records: number;
  duplicate_records: number;
  broken_records: number;
  dnc_blocked_records: number;
  imported_at: Date;
};

const mapCompanyRow = (row: CompanyRow): Company => ({
  id: row.id,
  name: row.name,
  nameNormalized: row.name_normalized,
  domain: row.domain,
  state: row.state,
  timezone: parseEnumValue(TIMEZONES, row.timezone, 'timezone'),
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const mapProspectRow = (row: ProspectRow): Prospect => ({
  id: row.id,
  companyId: row.company_id,
  firstName: row.first_name,
  lastName: row.last_name,
  title: row.title,
  population: parsePopulation(row.population),
  engagementStage: parseEngagementStage(row.engagement_stage),
  followUpDate: row.follow_up_date,
  lastContactDate: row.last_contact_date,
  parkedMonth: row.parked_month,
  attemptCount: row.attempt_count,
  source: row.source,
  referredByProspectId: row.referred_by_prospect_id,
  deadReason: row.dead_reason,
  deadDate: row.dead_date,
  lostReason: parseLostReason(row.lost_reason),
  lostDate: row.lost_date,
  closeDate: row.close_date,
  notes: row.notes,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const mapContactMethodRow = (row: ContactMethodRow): ContactMethod => ({
  id: row.id,
  prospectId: row.prospect_id,
  type: parseContactMethodType(row.type),
  value: row.value,
  normalizedValue: row.normalized_value,
  isPrimary: row.is_primary,
  isVerified: row.is_verified,
  isSuspect: row.is_suspect,
  confidenceScore: row.confidence_score,
  source: row.source,
  createdAt: row.created_at,
});

const mapActivityRow = (row: ActivityRow): Activity => ({
  id: row.id,
  prospectId: row.prospect_id,
  activityType: parseActivityType(row.activity_type),
  outcome: parseActivityOutcome(row.outcome),
  populationBefore: row.population_before === null ? null : parsePopulation(row.population_before),
  populationAfter: row.population_after === null ? null : parsePopulation(row.population_after),
  stageBefore: parseEngagementStage(row.stage_before),
  stageAfter: parseEngagementStage(row.stage_after),
  followUpSet: row.follow_up_set,
  notes: row.notes,
  createdBy: parseActivityActor(row.created_by),
  createdAt: row.created_at,
});

const mapImportSourceRow = (row: ImportSourceRow): ImportSource => ({
  id: row.id,
  sourceName: row.source_name,
  filename: row.filename,
  totalRecords: row.total_records,
  importedRecords: row.imported_records,
  duplicateRecords: row.duplicate_records,
  brokenRecords: row.broken_records,
  dncBlockedRecords: row.dnc_blocked_records,
  importedAt: row.imported_at,
});

const firstRow = <T>(rows: T[], what: string): T => {
  const row = rows[0];
  if (row === undefined) {
    throw new Error(`Expected ${what} row to be returned`);
  }
  return row;
};

class PostgresEntityReader implements EntityReader {
  constructor(protected readonly run: SqlRunner) {}

  async getProspect(id: string) {
    const result = await this.run<ProspectRow>('SELECT * FROM pipeline.prospects WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapProspectRow(row) : null;
  }

  async getCompany(id: string) {
    const result = await this.run<CompanyRow>('SELECT * FROM pipeline.companies WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapCompanyRow(row) : null;
  }

  async findCompanyByNormalizedName(nameNormalized: string) {
    const result = await this.run<CompanyRow>(
      'SELECT * FROM pipeline.companies WHERE name_normalized = $1 ORDER BY created_at ASC LIMIT 1',
      [nameNormalized]
    );
    const row = result.rows[0];
    return row ? mapCompanyRow(row) : null;
  }

  async findProspectsByEmail(normalizedEmail: string) {
    return this.findProspectsByContact('email', normalizedEmail);
  }

  async findProspectsByPhone(normalizedPhone: string) {
    return this.findProspectsByContact('phone', normalizedPhone);
  }

  private async findProspectsByContact(type: 'email' | 'phone', normalizedValue: string) {
    const result = await this.run<ProspectRow>(
      `SELECT DISTINCT p.* FROM pipeline.prospects p
      JOIN pipeline.contact_methods cm ON cm.prospect_id = p.id
      WHERE cm.type = $1 AND cm.normalized_value = $2
      ORDER BY p.created_at ASC, p.id ASC`,
      [type, normalizedValue]
    );
    return result.rows.map(mapProspectRow);
  }

  async listProspectsByCompany(companyId: string) {
    const result = await this.run<ProspectRow>(
      'SELECT * FROM pipeline.prospects WHERE company_id = $1 ORDER BY created_at ASC, id ASC',
      [companyId]
    );
    return result.rows.map(mapProspectRow);
  }

  async getContactMethods(prospectId: string) {
    const result = await this.run<ContactMethodRow>(
      'SELECT * FROM pipeline.contact_methods WHERE prospect_id = $1 ORDER BY created_at ASC, id ASC',
      [prospectId]
    );
    return result.rows.map(mapContactMethodRow);
  }

  async listActivities(prospectId: string) {
    const result = await this.run<ActivityRow>(
      'SELECT * FROM pipeline.activities WHERE prospect_id = $1 ORDER BY created_at ASC, id ASC',
      [prospectId]
    );
    return result.rows.map(mapActivityRow);
  }

  async listFollowUpsBefore(before: Date, excluded: readonly Population[]) {
    const result = await this.run<ProspectRow>(
      `SELECT * FROM pipeline.prospects
      WHERE follow_up_date IS NOT NULL AND follow_up_date < $1 AND NOT (population = ANY($2))
      ORDER BY follow_up_date ASC, id ASC`,
      [before, [...excluded]]
    );
    return result.rows.map(mapProspectRow);
  }

  async listFollowUpsBetween(start: Date, end: Date, excluded: readonly Population[]) {
    const result = await this.run<ProspectRow>(
      `SELECT * FROM pipeline.prospects
      WHERE follow_up_date BETWEEN $1 AND $2 AND NOT (population = ANY($3))
      ORDER BY follow_up_date ASC, id ASC`,
      [start, end, [...excluded]]
    );
    return result.rows.map(mapProspectRow);
  }

  async listOrphanedEngaged() {
    const result = await this.run<ProspectRow>(
      `SELECT * FROM pipeline.prospects
      WHERE population = 'engaged' AND follow_up_date IS NULL
      ORDER BY updated_at ASC, id ASC`
    );
    return result.rows.map(mapProspectRow);
  }

  async listParkedDue(month: string) {
    const result = await this.run<ProspectRow>(
      `SELECT * FROM pipeline.prospects
      WHERE population = 'parked' AND parked_month <= $1
      ORDER BY parked_month ASC, id ASC`,
      [month]
    );
    return result.rows.map(mapProspectRow);
  }

  async listLostBefore(before: Date) {
    const result = await this.run<ProspectRow>(
      `SELECT * FROM pipeline.prospects
      WHERE population = 'lost' AND lost_date IS NOT NULL AND lost_date < $1
      ORDER BY lost_date ASC, id ASC`,
      [before]
    );
    return result.rows.map(mapProspectRow);
  }
}

class PostgresEntityTransaction extends PostgresEntityReader implements EntityTransaction {
  async lockProspect(id: string) {
    const result = await this.run<ProspectRow>('SELECT * FROM pipeline.prospects WHERE id = $1 FOR UPDATE', [id]);
    const row = result.rows[0];
    return row ? mapProspectRow(row) : null;
  }

  async lockContactValue(type: ContactMethodType, normalizedValue: string) {
    await this.run('SELECT pg_advisory_xact_lock(hashtext($1))', [`${type}:${normalizedValue}`]);
  }

  async createCompany(input: NewCompany) {
    const inserted = await this.run<CompanyRow>(
      `INSERT INTO pipeline.companies (id, name, name_normalized, domain, state, timezone)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (name_normalized) DO NOTHING
      RETURNING *`,
      [randomUUID(), input.name, input.nameNormalized, input.domain, input.state, input.timezone]
    );
    const row = inserted.rows[0];
    if (row) return mapCompanyRow(row);

    // A concurrent import created it first; that row has committed by now.
    const existing = await this.run<CompanyRow>('SELECT * FROM pipeline.companies WHERE name_normalized = $1', [
      input.nameNormalized,
    ]);
    return mapCompanyRow(firstRow(existing.rows, 'company'));
  }

  async createProspect(input: NewProspect) {
    const result = await this.run<ProspectRow>(
      `INSERT INTO pipeline.prospects (
        id, company_id, first_name, last_name, title, population, engagement_stage, follow_up_date,
        last_contact_date, parked_month, attempt_count, source, referred_by_prospect_id, dead_reason,
        dead_date, lost_reason, lost_date, close_date, notes
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
      RETURNING *`,
      [
        randomUUID(),
        input.companyId,
        input.firstName,
        input.lastName,
        input.title,
        input.population,
        input.engagementStage,
        input.followUpDate,
        input.lastContactDate,
        input.parkedMonth,
        input.attemptCount,
        input.source,
        input.referredByProspectId,
        input.deadReason,
        input.deadDate,
        input.lostReason,
        input.lostDate,
        input.closeDate,
        input.notes,
      ]
    );
    return mapProspectRow(firstRow(result.rows, 'prospect'));
  }

  async updateProspect(prospect: Prospect) {
    const result = await this.run<ProspectRow>(
      `UPDATE pipeline.prospects SET
        company_id = $2,
        first_name = $3,
        last_name = $4,
        title = $5,
        population = $6,
        engagement_stage = $7,
        follow_up_date = $8,
        last_contact_date = $9,
        parked_month = $10,
        attempt_count = $11,
        source = $12,
        referred_by_prospect_id = $13,
        dead_reason = $14,
        dead_date = $15,
        lost_reason = $16,
        lost_date = $17,
        close_date = $18,
        notes = $19,
        updated_at = NOW()
      WHERE id = $1
      RETURNING *`,
      [
        prospect.id,
        prospect.companyId,
        prospect.firstName,
        prospect.lastName,
        prospect.title,
        prospect.population,
        prospect.engagementStage,
        prospect.followUpDate,
        prospect.lastContactDate,
        prospect.parkedMonth,
        prospect.attemptCount,
        prospect.source,
        prospect.referredByProspectId,
        prospect.deadReason,
        prospect.deadDate,
        prospect.lostReason,
        prospect.lostDate,
        prospect.closeDate,
        prospect.notes,
      ]
    );
    return mapProspectRow(firstRow(result.rows, 'prospect'));
  }

  async createContactMethod(input: NewContactMethod) {
    const result = await this.run<ContactMethodRow>(
      `INSERT INTO pipeline.contact_methods (
        id, prospect_id, type, value, normalized_value, is_primary, is_verified, is_suspect, confidence_score, source
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING *`,
      [
        randomUUID(),
        input.prospectId,
        input.type,
        input.value,
        input.normalizedValue,
        input.isPrimary,
        input.isVerified,
        input.isSuspect,
        input.confidenceScore,
        input.source,
      ]
    );
    return mapContactMethodRow(firstRow(result.rows, 'contact method'));
  }

  async createActivity(input: NewActivity) {
    const result = await this.run<ActivityRow>(
      `INSERT INTO pipeline.activities (
        id, prospect_id, activity_type, outcome, population_before, population_after,
        stage_before, stage_after, follow_up_set, notes, created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      RETURNING *`,
      [
        randomUUID(),
        input.prospectId,
        input.activityType,
        input.outcome ?? null,
        input.populationBefore ?? null,
        input.populationAfter ?? null,
        input.stageBefore ?? null,
        input.stageAfter ?? null,
        input.followUpSet ?? null,
        input.notes ?? null,
        input.createdBy,
      ]
    );
    return mapActivityRow(firstRow(result.rows, 'activity'));
  }

  async createImportSource(input: NewImportSource) {
    const result = await this.run<ImportSourceRow>(
      `INSERT INTO pipeline.import_sources (
        id, source_name, filename, total_records, imported_records, duplicate_records, broken_records, dnc_blocked_records
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING *`,
      [
        randomUUID(),
        input.sourceName,
        input.filename,
        input.totalRecords,
        input.importedRecords,
        input.duplicateRecords,
        input.brokenRecords,
        input.dncBlockedRecords,
      ]
    );
    return mapImportSourceRow(firstRow(result.rows, 'import source'));
  }
}

export class PostgresEntityStore extends PostgresEntityReader implements EntityStore {
  constructor(
    private readonly pool: Pool,
    private readonly config: Pick<PipelineConfig, 'lockTimeoutMs'>
  ) {
    super(poolRunner(pool));
  }

  transaction<T>(work: (tx: EntityTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, this.config.lockTimeoutMs, (client) =>
      work(new PostgresEntityTransaction(clientRunner(client)))
    );
  }
}
