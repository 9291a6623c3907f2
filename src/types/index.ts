// Core type definitions for the veille report runner

export const VEILLE_TYPES = ['veille_juridique', 'veille_pedagogique_technologique'] as const;

export type VeilleType = (typeof VEILLE_TYPES)[number];

export const DEFAULT_VEILLE_TYPE: VeilleType = 'veille_juridique';

export interface PromptEntry {
  prompt: string;
  model: string;
}

export type PromptCatalog = Record<VeilleType, PromptEntry>;

export interface Recipients {
  to: string[];
  cc: string[];
}

export interface EmailMessage {
  to: string[];
  cc?: string[];
  subject: string;
  html: string;
}

export interface DateRange {
  startDate: Date;
  endDate: Date;
  /** DD/MM/YYYY */
  startDateStr: string;
  /** DD/MM/YYYY */
  endDateStr: string;
}

export function isVeilleType(value: string): value is VeilleType {
  return VEILLE_TYPES.some((type) => type === value);
}
