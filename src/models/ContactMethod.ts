import { parseEnumValue } from './enumCodec';

export const CONTACT_METHOD_TYPES = ['email', 'phone'] as const;

export type ContactMethodType = (typeof CONTACT_METHOD_TYPES)[number];

export interface ContactMethod {
  id: string;
  prospectId: string;
  type: ContactMethodType;
  value: string;
  // Lowercased email or digits-only phone; the only value dedup compares.
  normalizedValue: string;
  isPrimary: boolean;
  isVerified: boolean;
  isSuspect: boolean;
  confidenceScore: number;
  source: string | null;
  createdAt: Date;
}

export type NewContactMethod = Omit<ContactMethod, 'id' | 'createdAt'>;

export const parseContactMethodType = (raw: string): ContactMethodType =>
  parseEnumValue(CONTACT_METHOD_TYPES, raw, 'contact method type');
