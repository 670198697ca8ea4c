import { definePipelineConfig, type PipelineConfigInput } from '../config/pipelineConfig';
import { createPipelineEngine } from '../index';
import type { ContactMethodType } from '../models/ContactMethod';
import type { NewProspect, Prospect } from '../models/Prospect';
import type { Clock } from '../types/result';
import { normalizeCompanyName, normalizeEmail, normalizePhone } from '../utils/normalize';
import { InMemoryEntityStore } from './inMemoryEntityStore';

// Wednesday 6 March 2024, 10:00 local time.
export const TEST_NOW = new Date(2024, 2, 6, 10, 0, 0);

export const fixedClock =
  (at: Date = TEST_NOW): Clock =>
  () =>
    new Date(at.getTime());

export const testConfig = (overrides: PipelineConfigInput = {}) =>
  definePipelineConfig({ logLevel: 'error', ...overrides });

export const createTestEngine = (configOverrides: PipelineConfigInput = {}, now: Date = TEST_NOW) => {
  const clock = fixedClock(now);
  const store = new InMemoryEntityStore(clock);
  const engine = createPipelineEngine({
    store,
    config: testConfig(configOverrides),
    clock,
    retry: { retries: 2, delayMs: 0 },
  });
  return { store, engine, clock };
};

export interface SeedProspectInput extends Partial<Omit<NewProspect, 'companyId'>> {
  companyName?: string;
  email?: string;
  phone?: string;
}

const addContact = (
  store: InMemoryEntityStore,
  prospectId: string,
  type: ContactMethodType,
  value: string,
  normalizedValue: string | null,
  isPrimary: boolean
) => {
  if (!normalizedValue) return;
  store.insertContactMethod({
    prospectId,
    type,
    value,
    normalizedValue,
    isPrimary,
    isVerified: false,
    isSuspect: false,
    confidenceScore: 0,
    source: 'seed',
  });
};

/** Inserts a prospect (and its company and contact methods) without going through the engine. */
export const seedProspect = (store: InMemoryEntityStore, input: SeedProspectInput = {}): Prospect => {
  const { companyName = 'Acme', email, phone, ...fields } = input;
  const nameNormalized = normalizeCompanyName(companyName);
  const company =
    store.companies.find((candidate) => candidate.nameNormalized === nameNormalized) ??
    store.insertCompany({ name: companyName, nameNormalized, domain: null, state: null, timezone: 'central' });

  const prospect = store.insertProspect({
    companyId: company.id,
    firstName: 'Jane',
    lastName: 'Doe',
    title: null,
    population: 'unengaged',
    engagementStage: null,
    followUpDate: null,
    lastContactDate: null,
    parkedMonth: null,
    attemptCount: 0,
    source: 'seed',
    referredByProspectId: null,
    deadReason: null,
    deadDate: null,
    lostReason: null,
    lostDate: null,
    closeDate: null,
    notes: null,
    ...fields,
  });

  if (email) addContact(store, prospect.id, 'email', email, normalizeEmail(email), true);
  if (phone) addContact(store, prospect.id, 'phone', phone, normalizePhone(phone), !email);
  return prospect;
};
