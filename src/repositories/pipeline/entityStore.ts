import type { Activity, NewActivity } from '../../models/Activity';
import type { Company, NewCompany } from '../../models/Company';
import type { ContactMethod, ContactMethodType, NewContactMethod } from '../../models/ContactMethod';
import type { ImportSource, NewImportSource } from '../../models/ImportSource';
import type { NewProspect, Population, Prospect } from '../../models/Prospect';

/**
 * Everything the engine reads from storage. Email and phone lookups take
 * values already normalized with utils/normalize.
 */
export interface EntityReader {
  getProspect(id: string): Promise<Prospect | null>;
  getCompany(id: string): Promise<Company | null>;
  findCompanyByNormalizedName(nameNormalized: string): Promise<Company | null>;
  findProspectsByEmail(normalizedEmail: string): Promise<Prospect[]>;
  findProspectsByPhone(normalizedPhone: string): Promise<Prospect[]>;
  listProspectsByCompany(companyId: string): Promise<Prospect[]>;
  getContactMethods(prospectId: string): Promise<ContactMethod[]>;
  listActivities(prospectId: string): Promise<Activity[]>;
  /** Follow-ups strictly before `before`, earliest first. */
  listFollowUpsBefore(before: Date, excluded: readonly Population[]): Promise<Prospect[]>;
  /** Follow-ups within [start, end], earliest first. */
  listFollowUpsBetween(start: Date, end: Date, excluded: readonly Population[]): Promise<Prospect[]>;
  listOrphanedEngaged(): Promise<Prospect[]>;
  /** Parked prospects whose month is at or before `month` (YYYY-MM). */
  listParkedDue(month: string): Promise<Prospect[]>;
  /** Lost prospects with a lost date before `before`, oldest loss first. */
  listLostBefore(before: Date): Promise<Prospect[]>;
}

export interface EntityWriter {
  /** Reads the prospect and holds its row until the transaction ends. */
  lockProspect(id: string): Promise<Prospect | null>;
  /**
   * Holds an exclusive lock on a normalized contact value until the
   * transaction ends, so two writers cannot both find it unused.
   */
  lockContactValue(type: ContactMethodType, normalizedValue: string): Promise<void>;
  /** Inserts the company, or returns the one already stored under the same normalized name. */
  createCompany(input: NewCompany): Promise<Company>;
  createProspect(input: NewProspect): Promise<Prospect>;
  updateProspect(prospect: Prospect): Promise<Prospect>;
  createContactMethod(input: NewContactMethod): Promise<ContactMethod>;
  createActivity(input: NewActivity): Promise<Activity>;
  createImportSource(input: NewImportSource): Promise<ImportSource>;
}

export interface EntityTransaction extends EntityReader, EntityWriter {}

export interface EntityStore extends EntityReader {
  /**
   * Runs `work` as one atomic unit. A thrown error rolls back every write made
   * through `tx`; a busy store rejects with StorageBusyError.
   */
  transaction<T>(work: (tx: EntityTransaction) => Promise<T>): Promise<T>;
}
