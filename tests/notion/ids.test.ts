import { describe, expect, it } from 'vitest';
import { extractDatabaseId, extractPageId, sameNotionId } from '../../src/notion/ids.js';
import { InvalidInputError } from '../../src/utils/errors.js';

const ID = '0123456789abcdef0123456789abcdef';

describe('extractPageId', () => {
  it('accepts a bare id and lowercases it', () => {
    expect(extractPageId('0123456789ABCDEF0123456789ABCDEF')).toBe(ID);
  });

  it('accepts the dashed uuid form', () => {
    expect(extractPageId('01234567-89ab-cdef-0123-456789abcdef')).toBe(ID);
  });

  it('takes the id from the last path segment of a page url', () => {
    expect(extractPageId(`https://www.notion.so/team/Deploy-Guide-${ID}`)).toBe(ID);
  });

  it('ignores the query string of a database url', () => {
    expect(extractDatabaseId(`https://www.notion.so/team/${ID}?v=fedcba9876543210fedcba9876543210`)).toBe(ID);
  });

  it('accepts urls written without a scheme', () => {
    expect(extractPageId(`notion.so/${ID}`)).toBe(ID);
    expect(extractDatabaseId(`www.notion.so/team/${ID}?v=fedcba9876543210fedcba9876543210`)).toBe(ID);
  });

  it('trims surrounding whitespace', () => {
    expect(extractPageId(`  ${ID}\n`)).toBe(ID);
  });

  it('rejects anything else as invalid input', () => {
    expect(() => extractPageId('not-an-id')).toThrow(InvalidInputError);
    expect(() => extractPageId('not-an-id')).toThrow('Invalid Notion page URL or ID: not-an-id');
    expect(() => extractDatabaseId('https://example.com/nothing-here')).toThrow(
      'Invalid Notion database URL or ID: https://example.com/nothing-here'
    );
  });
});

describe('sameNotionId', () => {
  it('compares ids regardless of dashes and case', () => {
    expect(sameNotionId('01234567-89AB-cdef-0123-456789abcdef', ID)).toBe(true);
    expect(sameNotionId(ID, 'fedcba9876543210fedcba9876543210')).toBe(false);
  });
});
