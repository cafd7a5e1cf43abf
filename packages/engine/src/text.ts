import type { JobPosting, JobTextField } from '@jobfit/core';

const PLACEHOLDER_VALUES = new Set(['n/a', 'none']);
const LEADING_BULLETS_RE = /^[\s•●◦▪\-*]+/;

/** Field value with scraper placeholders ("N/A", "None") treated as empty. */
export function fieldText(value: string | null | undefined): string {
  const text = (value ?? '').trim();
  return PLACEHOLDER_VALUES.has(text.toLowerCase()) ? '' : text;
}

export function stripBullet(line: string): string {
  return line.replace(LEADING_BULLETS_RE, '').trim();
}

export function joinFields(job: JobPosting, fields: readonly JobTextField[]): string {
  return fields
    .map((field) => fieldText(job[field]))
    .filter(Boolean)
    .join(' ');
}

/** Fields scanned for keyword filters. */
export const SEARCHABLE_FIELDS: readonly JobTextField[] = [
  'title',
  'summary',
  'responsibilities',
  'skills',
  'employmentLocationArrangement',
  'workTermDuration',
];

/** Fields scanned for technologies and seniority cues. */
export const DESCRIPTIVE_FIELDS: readonly JobTextField[] = [
  'title',
  'level',
  'summary',
  'responsibilities',
  'skills',
  'additionalInfo',
];

export const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const roundTo = (value: number, decimals: number) => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));
