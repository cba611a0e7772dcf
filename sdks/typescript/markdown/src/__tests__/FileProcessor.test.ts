/**
 * Unit tests for FileProcessor.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { InvalidParameterException } from '@egeria-sdk/core';
import { FAILED_BLOCK_MARKER, processMarkdownFile, processedFileName } from '../FileProcessor.js';
import { ROUTES, element, stubPlatform, testClient } from './platformStub.js';

const NOW = new Date(2025, 2, 4, 9, 15);

const GLOSSARY_DOCUMENT = [
  'Intro text',
  '# Create Glossary',
  '## Glossary Name',
  'Sales Terms',
  '## Language',
  'English',
  '## Description',
  'Terms used by sales',
  '___',
  'Closing line',
].join('\n');

const CREATED_GLOSSARY_MD =
  '# Update Glossary\n\n## Glossary Name \n\nSales Terms\n\n' +
  '## Qualified Name\nGlossary::Sales-Terms\n\n## Description\nTerms used by sales\n\n' +
  '## Language\nEnglish\n\n## Usage\n\n\n## GUID\ng-7\n\n';

describe('FileProcessor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'egeria-md-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should name processed files after the time they were processed', () => {
    expect(processedFileName('/inbox/glossary.md', NOW)).toBe('processed-2025-03-04-09-15-glossary.md');
  });

  it('should replace processed blocks and write the result to the outbox', async () => {
    stubPlatform(
      [ROUTES.byPropertyValue, { elements: [] }],
      [ROUTES.glossaryCreate, { guid: 'g-7' }],
      [
        '/glossaries/g-7/retrieve',
        {
          element: element('g-7', 'Glossary', {
            qualifiedName: 'Glossary::Sales-Terms',
            displayName: 'Sales Terms',
            description: 'Terms used by sales',
            language: 'English',
          }),
        },
      ]
    );
    await writeFile(join(dir, 'glossary.md'), GLOSSARY_DOCUMENT, 'utf8');

    const result = await processMarkdownFile(testClient(), {
      inputFile: 'glossary.md',
      directive: 'process',
      inbox: dir,
      outbox: join(dir, 'outbox'),
      now: NOW,
    });

    const expected =
      `Intro text\n${CREATED_GLOSSARY_MD}\nClosing line` +
      '\n\n\n# Provenance:\n \n\n* Derived from processing file glossary.md on 2025-03-04 09:15\n';
    expect(result.updated).toBe(true);
    expect(result.output).toBe(expected);
    expect(result.outputPath).toBe(join(dir, 'outbox', 'processed-2025-03-04-09-15-glossary.md'));
    expect(await readFile(join(dir, 'outbox', 'processed-2025-03-04-09-15-glossary.md'), 'utf8')).toBe(expected);
  });

  it('should create an element once when a document repeats its create command', async () => {
    const requests = stubPlatform(
      [ROUTES.byPropertyValue, { elements: [] }],
      [ROUTES.glossaryCreate, { guid: 'g-7' }],
      [
        '/glossaries/g-7/retrieve',
        {
          element: element('g-7', 'Glossary', {
            qualifiedName: 'Glossary::Sales-Terms',
            displayName: 'Sales Terms',
            description: 'Terms used by sales',
            language: 'English',
          }),
        },
      ]
    );
    const repeated = '# Create Glossary\n## Glossary Name\nSales Terms\n## Language\nEnglish\n___';
    await writeFile(join(dir, 'glossary.md'), `${GLOSSARY_DOCUMENT}\n${repeated}`, 'utf8');

    const result = await processMarkdownFile(testClient(), {
      inputFile: 'glossary.md',
      directive: 'process',
      inbox: dir,
      outbox: join(dir, 'outbox'),
      now: NOW,
    });

    expect(requests.filter((request) => ROUTES.glossaryCreate.test(request.url))).toHaveLength(1);
    expect(result.output).toBe(
      `Intro text\n${CREATED_GLOSSARY_MD}\nClosing line\n` +
        '# Update Glossary\n## Qualified Name\nGlossary::Sales-Terms\n\n## GUID\ng-7\n\n' +
        '## Glossary Name\nSales Terms\n## Language\nEnglish\n___' +
        '\n\n\n# Provenance:\n \n\n* Derived from processing file glossary.md on 2025-03-04 09:15\n'
    );
  });

  it('should keep blocks unchanged when validating', async () => {
    const requests = stubPlatform([ROUTES.byPropertyValue, { elements: [] }]);
    await writeFile(join(dir, 'glossary.md'), GLOSSARY_DOCUMENT, 'utf8');

    const result = await processMarkdownFile(testClient(), {
      inputFile: 'glossary.md',
      directive: 'validate',
      inbox: dir,
      outbox: join(dir, 'outbox'),
      now: NOW,
    });

    expect(result.updated).toBe(false);
    expect(result.outputPath).toBeUndefined();
    expect(result.output.startsWith(`${GLOSSARY_DOCUMENT}\n\n\n# Provenance:`)).toBe(true);
    expect(requests).toHaveLength(1);
  });

  it('should mark a block that could not be processed', async () => {
    stubPlatform([ROUTES.byPropertyValue, { elements: [] }]);
    await writeFile(join(dir, 'glossary.md'), '# Create Glossary\n## Glossary Name\nSales', 'utf8');

    const result = await processMarkdownFile(testClient(), {
      inputFile: join(dir, 'glossary.md'),
      directive: 'process',
      now: NOW,
    });

    expect(result.updated).toBe(false);
    expect(result.output).toBe(
      `# Create Glossary\n## Glossary Name\nSales\n${FAILED_BLOCK_MARKER}` +
        '\n\n\n# Provenance:\n \n\n* Derived from processing file glossary.md on 2025-03-04 09:15\n'
    );
    expect(result.messages[result.messages.length - 1]).toBe(
      "\n==>\tErrors found while processing command: 'Create Glossary'\n\tPlease correct and try again. \n"
    );
  });

  it('should keep unknown commands and carry earlier provenance forward', async () => {
    const requests = stubPlatform();
    await writeFile(
      join(dir, 'notes.md'),
      '# Provenance:\n* Derived from processing file draft.md on 2025-01-02 10:00\n---\n# Frobnicate Widgets\nsomething',
      'utf8'
    );

    const result = await processMarkdownFile(testClient(), {
      inputFile: 'notes.md',
      directive: 'process',
      inbox: dir,
      now: NOW,
    });

    expect(result.output).toBe(
      '# Frobnicate Widgets\nsomething\n\n\n# Provenance:\n \n' +
        '* Derived from processing file draft.md on 2025-01-02 10:00\n' +
        '* Derived from processing file notes.md on 2025-03-04 09:15\n'
    );
    expect(result.messages).toEqual(['\n===> Unknown command: Frobnicate Widgets']);
    expect(requests).toHaveLength(0);
  });

  it('should reject a file that cannot be read', async () => {
    await expect(
      processMarkdownFile(testClient(), { inputFile: 'missing.md', directive: 'process', inbox: dir })
    ).rejects.toBeInstanceOf(InvalidParameterException);
  });
});
