import { z } from 'zod';
import stateTimezones from '../data/stateTimezones.json';
import { TIMEZONES, type Timezone } from '../models/Company';

const DEFAULT_TIMEZONE: Timezone = 'central';

const STATE_TIMEZONES = z.record(z.enum(TIMEZONES)).parse(stateTimezones);

export const timezoneFromState = (state: string | null | undefined): Timezone => {
  if (!state) return DEFAULT_TIMEZONE;
  return STATE_TIMEZONES[state.trim().toUpperCase()] ?? DEFAULT_TIMEZONE;
};
