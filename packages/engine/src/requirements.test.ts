import { describe, expect, it } from 'vitest';
import { DEFAULT_REQUIREMENT_LEXICON, RequirementExtractor } from './requirements';
import { emptyJob } from './testing/fakes';

const extractor = new RequirementExtractor();

describe('RequirementExtractor', () => {
  it('splits skills into must-haves and nice-to-haves', () => {
    const job = emptyJob('j1', {
      skills: [
        'Required Skills and Qualifications',
        '• Required: Python, AWS, Docker',
        '- Experience building REST APIs with Node',
        '* Preferred: Kubernetes experience is a plus',
        'Knowledge of GraphQL would be an asset',
      ].join('\n'),
    });

    const requirements = extractor.extract(job);

    expect(requirements.mustHave).toEqual([
      'Required: Python, AWS, Docker',
      'Experience building REST APIs with Node',
    ]);
    expect(requirements.niceToHave).toEqual([
      'Preferred: Kubernetes experience is a plus',
      'Knowledge of GraphQL would be an asset',
    ]);
  });

  it('drops short lines, label lines and generic filler', () => {
    const job = emptyJob('j1', {
      skills: [
        'Python, SQL',
        'Technical skills you bring:',
        'Strong communication skills and Python experience',
        'A genuine team player with a positive attitude',
        'Comfortable deploying services to the cloud',
      ].join('\n'),
    });

    expect(extractor.extract(job).mustHave).toEqual(['Comfortable deploying services to the cloud']);
  });

  it('finds technical tokens anywhere in a line', () => {
    expect(extractor.isMeaningful('Excellent organizational skills and reliability')).toBe(false);
    expect(extractor.isMeaningful('Maintain internal dashboards')).toBe(true);
    expect(extractor.isMeaningful('Enjoys redeveloping old habits')).toBe(true);
  });

  it('keeps requirement lines whose only technical token is inside a word', () => {
    const job = emptyJob('j1', { skills: 'Strong knowledge of MySQL and PostgreSQL' });

    expect(extractor.extract(job).mustHave).toEqual(['Strong knowledge of MySQL and PostgreSQL']);
  });

  it('can restrict matching to the start of words', () => {
    const strict = new RequirementExtractor({ ...DEFAULT_REQUIREMENT_LEXICON, wordStartMatching: true });
    const job = emptyJob('j1', { skills: 'Strong knowledge of MySQL and PostgreSQL' });

    expect(strict.extract(job).mustHave).toEqual([]);
    expect(strict.isMeaningful('Enjoys redeveloping old habits')).toBe(false);
    expect(strict.isMeaningful('Maintain internal dashboards')).toBe(true);
  });

  it('recognises section headers but not labelled content', () => {
    expect(extractor.isSectionHeader('Required Skills and Qualifications')).toBe(true);
    expect(extractor.isSectionHeader('Preferred Qualifications:')).toBe(true);
    expect(extractor.isSectionHeader('Skills and Experience You Bring')).toBe(true);
    expect(extractor.isSectionHeader('Skills you bring to the team')).toBe(false);
    expect(extractor.isSectionHeader('Required: Python, AWS, Docker')).toBe(false);
    expect(extractor.isSectionHeader('Nice to have Docker and Kubernetes experience')).toBe(false);
  });

  it('collects responsibilities and intent sentences from the summary', () => {
    const job = emptyJob('j1', {
      responsibilities: [
        'Responsibilities',
        '• Design and maintain backend services',
        '• Attend meetings',
      ].join('\n'),
      summary:
        'We are looking for a developer who will build React dashboards. Great culture! ' +
        'You will develop APIs in Python for our cloud platform? Join us.',
    });

    expect(extractor.extract(job).responsibilities).toEqual([
      'Design and maintain backend services',
      'We are looking for a developer who will build React dashboards',
      'You will develop APIs in Python for our cloud platform',
    ]);
  });

  it('takes at most three summary sentences', () => {
    const sentence = (n: number) => `You will develop cloud service number ${n} for us`;
    const job = emptyJob('j1', { summary: [1, 2, 3, 4].map(sentence).join('. ') });

    expect(extractor.extract(job).responsibilities).toEqual([sentence(1), sentence(2), sentence(3)]);
  });

  it('caps the search budget at 10 must-haves, 5 responsibilities and 3 nice-to-haves', () => {
    const lines = (label: string, count: number) =>
      Array.from({ length: count }, (_, i) => `${label} Python service ${i + 1}`);
    const job = emptyJob('j1', {
      skills: [...lines('Develop', 12), ...lines('Bonus: develop', 4)].join('\n'),
      responsibilities: lines('Deploy and monitor the', 7).join('\n'),
    });

    const requirements = extractor.extract(job);

    expect(requirements.mustHave).toHaveLength(12);
    expect(requirements.niceToHave).toHaveLength(4);
    expect(requirements.responsibilities).toHaveLength(7);
    expect(requirements.allRequirements).toEqual([
      ...requirements.mustHave.slice(0, 10),
      ...requirements.responsibilities.slice(0, 5),
      ...requirements.niceToHave.slice(0, 3),
    ]);
  });

  it('returns empty lists for a posting with only placeholders', () => {
    const job = emptyJob('j1', { summary: 'N/A', responsibilities: 'N/A', skills: 'N/A', additionalInfo: 'N/A' });

    expect(extractor.extract(job)).toEqual({
      mustHave: [],
      niceToHave: [],
      responsibilities: [],
      allRequirements: [],
    });
  });

  it('accepts a custom vocabulary', () => {
    const custom = new RequirementExtractor({
      ...DEFAULT_REQUIREMENT_LEXICON,
      technicalTokens: ['verilog'],
    });

    expect(custom.isMeaningful('Hands-on Verilog experience')).toBe(true);
    expect(custom.isMeaningful('Hands-on Python experience')).toBe(false);
  });
});
