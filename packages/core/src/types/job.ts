export interface JobPosting {
  id: string;
  title: string;
  company: string;
  location: string;
  level: string;
  summary: string;
  responsibilities: string;
  skills: string;
  additionalInfo: string;
  employmentLocationArrangement?: string;
  workTermDuration?: string;
}

/** Text fields that are scanned when building a posting's searchable text. */
export type JobTextField = Exclude<keyof JobPosting, 'id'>;

export interface RequirementSet {
  mustHave: string[];
  niceToHave: string[];
  responsibilities: string[];
  /** Priority-ordered search budget: must-haves, then responsibilities, then nice-to-haves. */
  allRequirements: string[];
}

export type RequirementCategory = 'mustHave' | 'niceToHave';
