import { z } from 'zod';
import type { JobPosting } from '@jobfit/core';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

/** Posting as the scraper hands it over: snake_case, with gaps. */
const scrapedJobSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  title: optionalText,
  company: optionalText,
  location: optionalText,
  level: optionalText,
  summary: optionalText,
  responsibilities: optionalText,
  skills: optionalText,
  additional_info: optionalText,
  employment_location_arrangement: optionalText,
  work_term_duration: optionalText,
});

export type ScrapedJob = z.input<typeof scrapedJobSchema>;

/**
 * Maps a scraped posting record onto a JobPosting.
 * Throws a ZodError when the record has no usable id.
 */
export function toJobPosting(raw: unknown): JobPosting {
  const job = scrapedJobSchema.parse(raw);
  const posting: JobPosting = {
    id: job.id,
    title: job.title,
    company: job.company,
    location: job.location,
    level: job.level,
    summary: job.summary,
    responsibilities: job.responsibilities,
    skills: job.skills,
    additionalInfo: job.additional_info,
  };
  if (job.employment_location_arrangement) {
    posting.employmentLocationArrangement = job.employment_location_arrangement;
  }
  if (job.work_term_duration) {
    posting.workTermDuration = job.work_term_duration;
  }
  return posting;
}
