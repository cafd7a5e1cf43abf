/** One candidate fact: an experience bullet or a skill phrase. */
export type ResumeUnit = string;

/** Ordered, frozen list of units. Position is the key into the vector index. */
export type ResumeCorpus = readonly ResumeUnit[];

/** Skill category name to the skills listed under it. */
export type SkillsConfig = Record<string, string[]>;

export interface SearchHit {
  unitText: ResumeUnit;
  similarity: number;
  index: number;
}

export interface IndexSnapshot {
  modelName: string;
  dimension: number;
  units: ResumeUnit[];
  vectors: number[][];
}
