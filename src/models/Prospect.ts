import { parseEnumValue, parseOptionalEnumValue } from './enumCodec';

export const POPULATIONS = [
  'broken',
  'unengaged',
  'engaged',
  'parked',
  'dead_dnc',
  'lost',
  'partnership',
  'closed_won',
] as const;

export type Population = (typeof POPULATIONS)[number];

// Ordered: a stage may only advance to the next entry.
export const ENGAGEMENT_STAGES = ['pre_demo', 'demo_scheduled', 'post_demo', 'closing'] as const;

export type EngagementStage = (typeof ENGAGEMENT_STAGES)[number];

export const LOST_REASONS = ['lost_to_competitor', 'not_buying', 'timing', 'budget', 'out_of_business'] as const;

export type LostReason = (typeof LOST_REASONS)[number];

export interface Prospect {
  id: string;
  companyId: string;
  firstName: string;
  lastName: string;
  title: string | null;
  population: Population;
  engagementStage: EngagementStage | null;
  followUpDate: Date | null;
  lastContactDate: Date | null;
  parkedMonth: string | null; // YYYY-MM
  attemptCount: number;
  source: string | null;
  referredByProspectId: string | null;
  deadReason: string | null;
  deadDate: Date | null;
  lostReason: LostReason | null;
  lostDate: Date | null;
  closeDate: Date | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewProspect = Omit<Prospect, 'id' | 'createdAt' | 'updatedAt'>;

export const parsePopulation = (raw: string): Population => parseEnumValue(POPULATIONS, raw, 'population');

export const parseEngagementStage = (raw: string | null): EngagementStage | null =>
  parseOptionalEnumValue(ENGAGEMENT_STAGES, raw, 'engagement stage');

export const parseLostReason = (raw: string | null): LostReason | null =>
  parseOptionalEnumValue(LOST_REASONS, raw, 'lost reason');

export const prospectFullName = (prospect: Pick<Prospect, 'firstName' | 'lastName'>) =>
  `${prospect.firstName} ${prospect.lastName}`.trim();
