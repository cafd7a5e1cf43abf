import { z } from 'zod';
import type { TechnologyExtractor } from '@jobfit/core';
import catalogData from './data/technology-catalog.json';
import { escapeRegExp } from './text';

const catalogSchema = z.object({
  technologies: z.array(
    z.object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).optional(),
      /** Case-sensitive contextual pattern, for names too short to match on their own. */
      pattern: z.string().optional(),
    })
  ),
});

export type TechnologyCatalog = z.infer<typeof catalogSchema>;

export const DEFAULT_TECHNOLOGY_CATALOG: TechnologyCatalog = catalogSchema.parse(catalogData);

interface CompiledTechnology {
  name: string;
  patterns: RegExp[];
}

function aliasPattern(alias: string): RegExp {
  return new RegExp(`(?<![a-z0-9+#.])${escapeRegExp(alias.toLowerCase())}(?![a-z0-9+#])`, 'i');
}

/**
 * Finds canonical technology names in free text using a catalog of
 * aliases. "cache" does not yield C, "JavaScript" does not yield Java.
 */
export class CatalogTechnologyExtractor implements TechnologyExtractor {
  private readonly technologies: CompiledTechnology[];

  constructor(catalog: TechnologyCatalog = DEFAULT_TECHNOLOGY_CATALOG) {
    this.technologies = catalog.technologies.map((entry) => ({
      name: entry.name,
      patterns: [
        ...(entry.aliases ?? []).map(aliasPattern),
        ...(entry.pattern ? [new RegExp(entry.pattern)] : []),
      ],
    }));
  }

  extractSync(text: string): Set<string> {
    const found = new Set<string>();
    if (!text.trim()) return found;
    for (const technology of this.technologies) {
      if (technology.patterns.some((pattern) => pattern.test(text))) {
        found.add(technology.name);
      }
    }
    return found;
  }

  async extractTechnologies(text: string): Promise<Set<string>> {
    return this.extractSync(text);
  }
}
