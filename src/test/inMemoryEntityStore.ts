import type { Activity, NewActivity } from '../models/Activity';
import type { Company, NewCompany } from '../models/Company';
import type { ContactMethod, ContactMethodType, NewContactMethod } from '../models/ContactMethod';
import type { ImportSource, NewImportSource } from '../models/ImportSource';
import type { NewProspect, Population, Prospect } from '../models/Prospect';
import type { EntityReader, EntityStore, EntityTransaction } from '../repositories/pipeline/entityStore';
import { StorageBusyError } from '../types/errors';
import { systemClock, type Clock } from '../types/result';

interface StoreState {
  sequence: number;
  companies: Company[];
  prospects: Prospect[];
  contactMethods: ContactMethod[];
  activities: Activity[];
  importSources: ImportSource[];
}

const emptyState = (): StoreState => ({
  sequence: 0,
  companies: [],
  prospects: [],
  contactMethods: [],
  activities: [],
  importSources: [],
});

const byFollowUp = (a: Prospect, b: Prospect) =>
  (a.followUpDate?.getTime() ?? 0) - (b.followUpDate?.getTime() ?? 0) || a.id.localeCompare(b.id);

const copy = <T extends object>(value: T): T => ({ ...value });

class StoreBackend {
  state: StoreState = emptyState();
  busyTransactions = 0;
  contactLocks: string[] = [];
  pendingWriteFailure: { error: Error; skip: number } | null = null;

  constructor(readonly clock: Clock) {}

  now() {
    return this.clock();
  }

  nextId(prefix: string) {
    this.state.sequence += 1;
    return `${prefix}-${this.state.sequence}`;
  }

  checkWrite() {
    const failure = this.pendingWriteFailure;
    if (!failure) return;
    if (failure.skip > 0) {
      failure.skip -= 1;
      return;
    }
    this.pendingWriteFailure = null;
    throw failure.error;
  }
}

class InMemoryReader implements EntityReader {
  constructor(protected readonly backend: StoreBackend) {}

  protected get state() {
    return this.backend.state;
  }

  async getProspect(id: string) {
    const prospect = this.state.prospects.find((candidate) => candidate.id === id);
    return prospect ? copy(prospect) : null;
  }

  async getCompany(id: string) {
    const company = this.state.companies.find((candidate) => candidate.id === id);
    return company ? copy(company) : null;
  }

  async findCompanyByNormalizedName(nameNormalized: string) {
    const company = this.state.companies.find((candidate) => candidate.nameNormalized === nameNormalized);
    return company ? copy(company) : null;
  }

  async findProspectsByEmail(normalizedEmail: string) {
    return this.findByContact('email', normalizedEmail);
  }

  async findProspectsByPhone(normalizedPhone: string) {
    return this.findByContact('phone', normalizedPhone);
  }

  private findByContact(type: ContactMethodType, normalizedValue: string) {
    const ids = new Set(
      this.state.contactMethods
        .filter((method) => method.type === type && method.normalizedValue === normalizedValue)
        .map((method) => method.prospectId)
    );
    return this.state.prospects.filter((prospect) => ids.has(prospect.id)).map(copy);
  }

  async listProspectsByCompany(companyId: string) {
    return this.state.prospects.filter((prospect) => prospect.companyId === companyId).map(copy);
  }

  async getContactMethods(prospectId: string) {
    return this.state.contactMethods.filter((method) => method.prospectId === prospectId).map(copy);
  }

  async listActivities(prospectId: string) {
    return this.state.activities.filter((activity) => activity.prospectId === prospectId).map(copy);
  }

  async listFollowUpsBefore(before: Date, excluded: readonly Population[]) {
    return this.state.prospects
      .filter(
        (prospect) =>
          prospect.followUpDate !== null &&
          prospect.followUpDate.getTime() < before.getTime() &&
          !excluded.includes(prospect.population)
      )
      .sort(byFollowUp)
      .map(copy);
  }

  async listFollowUpsBetween(start: Date, end: Date, excluded: readonly Population[]) {
    return this.state.prospects
      .filter(
        (prospect) =>
          prospect.followUpDate !== null &&
          prospect.followUpDate.getTime() >= start.getTime() &&
          prospect.followUpDate.getTime() <= end.getTime() &&
          !excluded.includes(prospect.population)
      )
      .sort(byFollowUp)
      .map(copy);
  }

  async listOrphanedEngaged() {
    return this.state.prospects
      .filter((prospect) => prospect.population === 'engaged' && prospect.followUpDate === null)
      .map(copy);
  }

  async listParkedDue(month: string) {
    return this.state.prospects
      .filter((prospect) => prospect.population === 'parked' && prospect.parkedMonth !== null && prospect.parkedMonth <= month)
      .map(copy);
  }

  async listLostBefore(before: Date) {
    return this.state.prospects
      .filter(
        (prospect) =>
          prospect.population === 'lost' && prospect.lostDate !== null && prospect.lostDate.getTime() < before.getTime()
      )
      .sort((a, b) => (a.lostDate?.getTime() ?? 0) - (b.lostDate?.getTime() ?? 0))
      .map(copy);
  }
}

class InMemoryTransaction extends InMemoryReader implements EntityTransaction {
  async lockProspect(id: string) {
    return this.getProspect(id);
  }

  // Transactions already run one at a time; the lock is only recorded.
  async lockContactValue(type: ContactMethodType, normalizedValue: string) {
    this.backend.contactLocks.push(`${type}:${normalizedValue}`);
  }

  async createCompany(input: NewCompany) {
    this.backend.checkWrite();
    const existing = this.state.companies.find((company) => company.nameNormalized === input.nameNormalized);
    if (existing) return copy(existing);
    const now = this.backend.now();
    const company: Company = { ...input, id: this.backend.nextId('company'), createdAt: now, updatedAt: now };
    this.state.companies.push(company);
    return copy(company);
  }

  async createProspect(input: NewProspect) {
    this.backend.checkWrite();
    const now = this.backend.now();
    const prospect: Prospect = { ...input, id: this.backend.nextId('prospect'), createdAt: now, updatedAt: now };
    this.state.prospects.push(prospect);
    return copy(prospect);
  }

  async updateProspect(prospect: Prospect) {
    this.backend.checkWrite();
    const index = this.state.prospects.findIndex((candidate) => candidate.id === prospect.id);
    if (index === -1) {
      throw new Error(`Expected prospect row to be returned`);
    }
    const updated: Prospect = { ...prospect, updatedAt: this.backend.now() };
    this.state.prospects[index] = updated;
    return copy(updated);
  }

  async createContactMethod(input: NewContactMethod) {
    this.backend.checkWrite();
    const method: ContactMethod = { ...input, id: this.backend.nextId('contact'), createdAt: this.backend.now() };
    this.state.contactMethods.push(method);
    return copy(method);
  }

  async createActivity(input: NewActivity) {
    this.backend.checkWrite();
    const activity: Activity = {
      id: this.backend.nextId('activity'),
      prospectId: input.prospectId,
      activityType: input.activityType,
      outcome: input.outcome ?? null,
      populationBefore: input.populationBefore ?? null,
      populationAfter: input.populationAfter ?? null,
      stageBefore: input.stageBefore ?? null,
      stageAfter: input.stageAfter ?? null,
      followUpSet: input.followUpSet ?? null,
      notes: input.notes ?? null,
      createdBy: input.createdBy,
      createdAt: this.backend.now(),
    };
    this.state.activities.push(activity);
    return copy(activity);
  }

  async createImportSource(input: NewImportSource) {
    this.backend.checkWrite();
    const source: ImportSource = { ...input, id: this.backend.nextId('import'), importedAt: this.backend.now() };
    this.state.importSources.push(source);
    return copy(source);
  }
}

/**
 * In-process EntityStore for tests. Transactions run one at a time and roll
 * back to a snapshot when `work` throws. `failNextTransactions` and
 * `failNextWrite` stand in for a busy or broken database.
 */
export class InMemoryEntityStore extends InMemoryReader implements EntityStore {
  private queue: Promise<void> = Promise.resolve();

  constructor(clock: Clock = systemClock) {
    super(new StoreBackend(clock));
  }

  transaction<T>(work: (tx: EntityTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runExclusive(work));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runExclusive<T>(work: (tx: EntityTransaction) => Promise<T>): Promise<T> {
    if (this.backend.busyTransactions > 0) {
      this.backend.busyTransactions -= 1;
      throw new StorageBusyError('Entity store busy: lock timeout (simulated)');
    }

    const snapshot = structuredClone(this.backend.state);
    try {
      return await work(new InMemoryTransaction(this.backend));
    } catch (error) {
      this.backend.state = snapshot;
      throw error;
    }
  }

  /** The next `count` transactions reject with StorageBusyError before running. */
  failNextTransactions(count: number) {
    this.backend.busyTransactions = count;
  }

  /** After `skip` successful writes inside transactions, the next one throws `error`. */
  failNextWrite(error: Error, skip = 0) {
    this.backend.pendingWriteFailure = { error, skip };
  }

  insertCompany(input: NewCompany): Company {
    const now = this.backend.now();
    const company: Company = { ...input, id: this.backend.nextId('company'), createdAt: now, updatedAt: now };
    this.backend.state.companies.push(company);
    return copy(company);
  }

  insertProspect(input: NewProspect): Prospect {
    const now = this.backend.now();
    const prospect: Prospect = { ...input, id: this.backend.nextId('prospect'), createdAt: now, updatedAt: now };
    this.backend.state.prospects.push(prospect);
    return copy(prospect);
  }

  insertContactMethod(input: NewContactMethod): ContactMethod {
    const method: ContactMethod = { ...input, id: this.backend.nextId('contact'), createdAt: this.backend.now() };
    this.backend.state.contactMethods.push(method);
    return copy(method);
  }

  get companies() {
    return this.backend.state.companies.map(copy);
  }

  get prospects() {
    return this.backend.state.prospects.map(copy);
  }

  get contactMethods() {
    return this.backend.state.contactMethods.map(copy);
  }

  get activities() {
    return this.backend.state.activities.map(copy);
  }

  /** Every contact value locked by a transaction, in order. */
  get contactLocks() {
    return [...this.backend.contactLocks];
  }

  get importSources() {
    return this.backend.state.importSources.map(copy);
  }
}
