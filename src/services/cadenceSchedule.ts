import { addBusinessDays as addBusinessDaysFns, startOfDay } from 'date-fns';
import type { CadenceInterval } from '../config/pipelineConfig';
import type { Population } from '../models/Prospect';

export type CadenceMode = 'system' | 'prospect' | 'none';

const CADENCE_MODES: Record<Population, CadenceMode> = {
  unengaged: 'system',
  broken: 'system',
  parked: 'system',
  engaged: 'prospect',
  dead_dnc: 'none',
  closed_won: 'none',
  partnership: 'none',
  lost: 'none',
};

/** Who owns the schedule: the interval table, the salesperson, or nobody. */
export const getCadenceMode = (population: Population): CadenceMode => CADENCE_MODES[population];

// Populations that never show up in follow-up queues.
export const UNSCHEDULED_POPULATIONS: readonly Population[] = ['dead_dnc', 'closed_won', 'partnership', 'lost'];

export const getInterval = (intervals: readonly CadenceInterval[], attemptNumber: number): CadenceInterval => {
  const first = intervals[0];
  const last = intervals[intervals.length - 1];
  if (!first || !last) {
    throw new Error('Cadence interval table is empty');
  }
  if (attemptNumber < 1) return first;
  return intervals.find((interval) => interval.attempt === attemptNumber) ?? last;
};

/** Weekdays only; Saturday and Sunday are skipped. */
export const addBusinessDays = (date: Date, days: number): Date => addBusinessDaysFns(date, days);

/**
 * Next system-paced contact. After an attempt the wait is that attempt's
 * minimum interval from the attempt day; with no attempt yet it is the first
 * interval from today.
 */
export const calculateNextContact = (
  intervals: readonly CadenceInterval[],
  attemptCount: number,
  lastAttemptDate: Date | null,
  now: Date
): Date => {
  if (lastAttemptDate) {
    return addBusinessDays(startOfDay(lastAttemptDate), getInterval(intervals, attemptCount).minDays);
  }
  return addBusinessDays(startOfDay(now), getInterval(intervals, 1).minDays);
};
