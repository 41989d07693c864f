import { describe, expect, it } from 'vitest';
import { buildExactQuery, buildLexicalQuery, buildSemanticQuery } from '../src/services/queryBuilders';
import { TARGET, fakeVector } from './helpers/fakes';

describe('buildLexicalQuery', () => {
  it('searches the sparse field with the raw query', () => {
    expect(buildLexicalQuery(TARGET, 'how to worry less?', { limit: 5, includeText: true })).toEqual({
      collection: 'docs',
      annsField: 'sparce_vector',
      data: 'how to worry less?',
      limit: 5,
      outputFields: ['text']
    });
  });

  it('omits the filter key when there is no filter', () => {
    const request = buildLexicalQuery(TARGET, 'q', { limit: 5, includeText: true });
    expect('filter' in request).toBe(false);
  });

  it('passes the filter and limit through unchanged', () => {
    const request = buildLexicalQuery(TARGET, 'q', { limit: 250, filter: 'title == "A"', includeText: false });
    expect(request.limit).toBe(250);
    expect(request.filter).toBe('title == "A"');
    expect(request.outputFields).toEqual([]);
  });
});

describe('buildSemanticQuery', () => {
  it('searches the dense field with the vector', () => {
    const vector = fakeVector();
    expect(buildSemanticQuery(TARGET, vector, { limit: 1, includeText: false })).toEqual({
      collection: 'docs',
      annsField: 'dense_vector',
      data: vector,
      limit: 1,
      outputFields: []
    });
  });
});

describe('buildExactQuery', () => {
  it('wraps the query in a phrase match and appends the filter', () => {
    const request = buildExactQuery(TARGET, 'test phrase', {
      limit: 10,
      filter: 'title == "Chapter1"',
      includeText: true
    });
    expect(request).toEqual({
      collection: 'docs',
      annsField: 'sparce_vector',
      data: 'test phrase',
      limit: 10,
      filter: `PHRASE_MATCH(text, 'test phrase') && title == "Chapter1"`,
      outputFields: ['text']
    });
  });

  it('escapes single quotes in the phrase', () => {
    const request = buildExactQuery(TARGET, "it's here", { limit: 10, includeText: true });
    expect(request.filter).toBe("PHRASE_MATCH(text, 'it\\'s here')");
  });

  it('cannot close the literal with a backslash', () => {
    const request = buildExactQuery(TARGET, "x\\') || true || ('", { limit: 10, includeText: true });
    expect(request.filter).toBe("PHRASE_MATCH(text, 'x\\\\\\') || true || (\\'')");
  });
});
