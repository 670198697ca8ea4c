import { parseEnumValue, parseOptionalEnumValue } from './enumCodec';
import type { EngagementStage, Population } from './Prospect';

export const ACTIVITY_TYPES = [
  'call',
  'voicemail',
  'email_sent',
  'email_received',
  'demo',
  'demo_scheduled',
  'demo_completed',
  'note',
  'status_change',
  'skip',
  'defer',
  'import',
  'enrichment',
  'verification',
  'reminder',
  'task',
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export const ACTIVITY_OUTCOMES = [
  'no_answer',
  'left_vm',
  'spoke_with',
  'interested',
  'not_interested',
  'not_now',
  'demo_set',
  'demo_completed',
  'closed_won',
  'closed_lost',
  'bounced',
  'replied',
  'ooo',
  'referral',
] as const;

export type ActivityOutcome = (typeof ACTIVITY_OUTCOMES)[number];

export type ActivityActor = 'user' | 'system';

/**
 * Immutable audit row. Activities are only ever inserted; the history they
 * form is the record of every population and stage change.
 */
export interface Activity {
  id: string;
  prospectId: string;
  activityType: ActivityType;
  outcome: ActivityOutcome | null;
  populationBefore: Population | null;
  populationAfter: Population | null;
  stageBefore: EngagementStage | null;
  stageAfter: EngagementStage | null;
  followUpSet: Date | null;
  notes: string | null;
  createdBy: ActivityActor;
  createdAt: Date;
}

export type NewActivity = Pick<Activity, 'prospectId' | 'activityType' | 'createdBy'> &
  Partial<
    Pick<
      Activity,
      'outcome' | 'populationBefore' | 'populationAfter' | 'stageBefore' | 'stageAfter' | 'followUpSet' | 'notes'
    >
  >;

export const parseActivityType = (raw: string): ActivityType => parseEnumValue(ACTIVITY_TYPES, raw, 'activity type');

export const parseActivityOutcome = (raw: string | null): ActivityOutcome | null =>
  parseOptionalEnumValue(ACTIVITY_OUTCOMES, raw, 'activity outcome');

export const parseActivityActor = (raw: string): ActivityActor =>
  parseEnumValue(['user', 'system'] as const, raw, 'activity actor');
