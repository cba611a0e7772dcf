/**
 * Unit tests for the output formatter.
 */

import { describe, it, expect } from 'vitest';
import { extractCategoryProperties } from '../output/extractors.js';
import {
  defaultColumns,
  extractMermaidOnly,
  formatForMarkdownTable,
  formatTimestamp,
  generateEntityDict,
  generateEntityMd,
  generateEntityMdTable,
  generateOutput,
  makeMdAttribute,
  makePreamble,
  outputGenerator,
  pluralise,
  toTitle,
} from '../output/OutputFormatter.js';
import { element } from './fetchStub.js';

const NOW = new Date(2025, 0, 5, 9, 7);

const sales = element('c-1', 'GlossaryCategory', {
  qualifiedName: 'Category::Sales',
  displayName: 'Sales',
  description: 'Sales terms',
});

describe('formatTimestamp', () => {
  it('should pad each part', () => {
    expect(formatTimestamp(NOW)).toBe('2025-01-05 09:07');
  });
});

describe('makePreamble', () => {
  it('should head a form with the search string', () => {
    expect(makePreamble('Glossary', undefined, 'FORM', NOW)).toEqual({
      preamble:
        '\n# Update Glossary Form - created at 2025-01-05 09:07\n' +
        '\t Glossary found from the search string:  `All Elements`\n\n',
      elementsAction: 'Update Glossary',
    });
  });

  it('should give reports no element action', () => {
    expect(makePreamble('Term', 'Sales', 'REPORT', NOW)).toEqual({
      preamble: '# Term Report - created at 2025-01-05 09:07\n\tTerm  found from the search string:  `Sales`\n\n',
      elementsAction: null,
    });
  });

  it('should have no preamble for MD', () => {
    expect(makePreamble('Term', 'Sales', 'MD', NOW)).toEqual({ preamble: '', elementsAction: 'Update Term' });
  });
});

describe('markdown helpers', () => {
  it('should title-case words and keep acronyms', () => {
    expect(toTitle('version identifier')).toBe('Version Identifier');
    expect(toTitle('GUID')).toBe('GUID');
  });

  it('should write an attribute section', () => {
    expect(makeMdAttribute('description', ' text ', 'MD')).toBe('## Description\ntext\n\n');
    expect(makeMdAttribute('description', undefined, 'FORM')).toBe('## Description\n\n\n');
  });

  it('should drop empty attributes from reports', () => {
    expect(makeMdAttribute('description', '', 'REPORT')).toBe('');
  });

  it('should write nothing for other formats', () => {
    expect(makeMdAttribute('description', 'text', 'LIST')).toBe('');
  });

  it('should escape table cells', () => {
    expect(formatForMarkdownTable('a|b\nc')).toBe('a\\|b c');
    expect(formatForMarkdownTable('')).toBe('');
  });

  it('should pluralise entity types', () => {
    expect(pluralise('Glossary')).toBe('Glossaries');
    expect(pluralise('Term')).toBe('Terms');
  });
});

describe('generateEntityMd', () => {
  it('should write one update section per element', () => {
    const md = generateEntityMd([sales], 'Update Category', 'MD', 'Category', extractCategoryProperties);

    expect(md).toBe(
      '# Update Category\n\n' +
        '## Category Name \n\nSales\n\n' +
        '## Qualified Name\nCategory::Sales\n\n' +
        '## Description\nSales terms\n\n' +
        '## GUID\nc-1\n\n'
    );
  });

  it('should head report sections with the name', () => {
    const md = generateEntityMd([sales], null, 'REPORT', 'Category', extractCategoryProperties);

    expect(md.startsWith('# Category Name: Sales\n\n## Qualified Name\n')).toBe(true);
  });

  it('should separate elements', () => {
    const finance = element('c-2', 'GlossaryCategory', { displayName: 'Finance' });
    const md = generateEntityMd([sales, finance], null, 'REPORT', 'Category', extractCategoryProperties);

    expect(md.split('\n---\n\n')).toHaveLength(2);
  });
});

describe('generateEntityMdTable', () => {
  it('should write one row per element', () => {
    const row = element('c-1', 'GlossaryCategory', { displayName: 'Sales', description: 'a|b' });
    const md = generateEntityMdTable([row], 'All', 'Category', extractCategoryProperties, [
      { name: 'Category Name', key: 'display_name' },
      { name: 'Description', key: 'description', format: true },
    ]);

    expect(md).toBe(
      '# Categories Table\n\n' +
        'Categories found from the search string: `All`\n\n' +
        '| Category Name | Description | \n' +
        '|-------------|-------------|\n' +
        '| Sales | a\\|b | \n'
    );
  });
});

describe('generateEntityDict', () => {
  it('should keep the GUID and name with the included keys', () => {
    expect(generateEntityDict([sales], extractCategoryProperties, ['description'])).toEqual([
      { guid: 'c-1', display_name: 'Sales', description: 'Sales terms' },
    ]);
  });

  it('should drop excluded keys', () => {
    expect(generateEntityDict([sales], extractCategoryProperties, undefined, ['description'])).toEqual([
      { guid: 'c-1', display_name: 'Sales', qualified_name: 'Category::Sales' },
    ]);
  });
});

describe('extractMermaidOnly', () => {
  it('should mark elements without a graph', () => {
    expect(extractMermaidOnly([{ mermaidGraph: 'graph TD' }, {}])).toBe('graph TD\n___');
  });
});

describe('generateOutput', () => {
  it('should return elements unchanged for JSON and TABLE', () => {
    const elements = [sales];

    expect(generateOutput(elements, undefined, 'Category', 'JSON', extractCategoryProperties)).toBe(elements);
    expect(generateOutput(elements, undefined, 'Category', 'TABLE', extractCategoryProperties)).toBe(elements);
  });

  it('should use default columns for LIST', () => {
    const md = generateOutput([sales], undefined, 'Category', 'LIST', extractCategoryProperties);

    expect(md).toBe(
      '# Categories Table\n\n' +
        'Categories found from the search string: `All`\n\n' +
        '| Category Name | Qualified Name | Description | \n' +
        '|-------------|-------------|-------------|\n' +
        '| Sales | Category::Sales | Sales terms | \n'
    );
  });

  it('should add the preamble to forms', () => {
    const md = generateOutput([sales], 'Sales', 'Category', 'FORM', extractCategoryProperties, undefined, NOW);

    expect(md).toBe(
      '\n# Update Category Form - created at 2025-01-05 09:07\n' +
        '\t Category found from the search string:  `Sales`\n\n' +
        '# Update Category\n\n' +
        '## Category Name \n\nSales\n\n' +
        '## Qualified Name\nCategory::Sales\n\n' +
        '## Description\nSales terms\n\n' +
        '## GUID\nc-1\n\n'
    );
  });

  it('should bind extractor and columns in a generator', () => {
    const generate = outputGenerator(extractCategoryProperties, [{ name: 'Name', key: 'display_name' }]);

    expect(generate([sales], 'Sales', 'Category', 'DICT')).toEqual([
      { guid: 'c-1', display_name: 'Sales', qualified_name: 'Category::Sales', description: 'Sales terms' },
    ]);
  });
});

describe('defaultColumns', () => {
  it('should name the type in the first column', () => {
    expect(defaultColumns('Term')[0]).toEqual({ name: 'Term Name', key: 'display_name' });
  });
});
