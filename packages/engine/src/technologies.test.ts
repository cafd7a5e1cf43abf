import { describe, expect, it } from 'vitest';
import { CatalogTechnologyExtractor } from './technologies';

const extractor = new CatalogTechnologyExtractor();

describe('CatalogTechnologyExtractor', () => {
  it.each([
    ['I have experience with Python and cache optimization', ['Python']],
    ['Used C++ and C programming', ['C', 'C++']],
    ['React and React Native development', ['React', 'React Native']],
    ['R programming and data analysis', ['R']],
    ['AWS Lambda with Node.js', ['AWS', 'Lambda', 'Node.js']],
    ['Just talking about caching, no C here', []],
    ['PostgreSQL and MySQL databases', ['MySQL', 'PostgreSQL']],
    ['Frontend work in JavaScript, not Java', ['Java', 'JavaScript']],
    ['Modern JS tooling', ['JavaScript']],
  ])('finds canonical names in "%s"', async (text, expected) => {
    const found = await extractor.extractTechnologies(text);
    expect(Array.from(found).sort()).toEqual(expected);
  });

  it('does not read Java inside JavaScript', () => {
    expect(extractor.extractSync('Senior JavaScript engineer')).toEqual(new Set(['JavaScript']));
  });

  it('returns an empty set for blank text', () => {
    expect(extractor.extractSync('   ')).toEqual(new Set());
  });

  it('uses a custom catalog', () => {
    const custom = new CatalogTechnologyExtractor({
      technologies: [{ name: 'Verilog', aliases: ['verilog', 'systemverilog'] }],
    });
    expect(custom.extractSync('RTL design in SystemVerilog')).toEqual(new Set(['Verilog']));
  });
});
