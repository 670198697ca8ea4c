export const TIMEZONES = ['eastern', 'central', 'mountain', 'pacific', 'alaska', 'hawaii'] as const;

export type Timezone = (typeof TIMEZONES)[number];

export interface Company {
  id: string;
  name: string;
  nameNormalized: string;
  domain: string | null;
  state: string | null;
  timezone: Timezone;
  createdAt: Date;
  updatedAt: Date;
}

export type NewCompany = Omit<Company, 'id' | 'createdAt' | 'updatedAt'>;
