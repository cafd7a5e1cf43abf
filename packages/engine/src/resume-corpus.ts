import { err, ok, ResumeNotFoundError } from '@jobfit/core';
import type { DocumentSource, Result, ResumeCorpus, ResumeTextCache, ResumeUnit, SkillsConfig } from '@jobfit/core';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { stripBullet } from './text';

const MIN_BULLET_LENGTH = 20;
const MAX_BULLET_LENGTH = 300;

/** Lines that read like experience bullets: not headers, not fragments. */
export function extractBullets(text: string): string[] {
  return text
    .split('\n')
    .map(stripBullet)
    .filter(
      (line) => line.length >= MIN_BULLET_LENGTH && line.length <= MAX_BULLET_LENGTH && !line.endsWith(':')
    );
}

export function expandSkills(skills: SkillsConfig): ResumeUnit[] {
  return Object.values(skills).flatMap((entries) =>
    entries.map((skill) => skill.trim()).filter(Boolean).map((skill) => `Proficient in ${skill}`)
  );
}

export interface ResumeCorpusBuilderOptions {
  source?: DocumentSource;
  cache?: ResumeTextCache;
  skills?: SkillsConfig;
  logger?: Logger;
}

export class ResumeCorpusBuilder {
  private readonly source?: DocumentSource;
  private readonly cache?: ResumeTextCache;
  private readonly skills: SkillsConfig;
  private readonly logger: Logger;

  constructor(options: ResumeCorpusBuilderOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.skills = options.skills ?? {};
    this.logger = options.logger ?? createLogger('resume');
  }

  /**
   * Bullets come from the text cache when it has content, otherwise from
   * the document source (and are then cached). Skill units are appended
   * fresh every time since they follow the live configuration.
   */
  async build(): Promise<Result<ResumeCorpus, ResumeNotFoundError>> {
    const bullets = await this.loadBullets();
    if (!bullets.ok) return bullets;

    const corpus = Object.freeze([...bullets.value, ...expandSkills(this.skills)]);
    if (corpus.length === 0) {
      this.logger.warn('Resume produced no usable units; every job will score on keywords only');
    } else {
      this.logger.info(`Resume loaded with ${corpus.length} units`);
    }
    return ok(corpus);
  }

  private async loadBullets(): Promise<Result<string[], ResumeNotFoundError>> {
    const cached = this.cache ? await this.cache.read() : null;
    if (cached !== null && cached.trim()) {
      this.logger.debug('Using cached resume text');
      return ok(
        cached
          .split('\n')
          .map((line) => line.trim())
          .filter(Boolean)
      );
    }

    if (!this.source) {
      return err(new ResumeNotFoundError('No resume source configured and no cached resume text'));
    }

    let text: string;
    try {
      text = await this.source.readResumeText();
    } catch (error) {
      if (error instanceof ResumeNotFoundError) return err(error);
      throw error;
    }

    const bullets = extractBullets(text);
    if (this.cache) {
      await this.cache.write(bullets.join('\n'));
    }
    return ok(bullets);
  }
}
