import { QueryOptions, SearchTarget, StoreSearchRequest } from '../types';
import { conjoin, escapeSingleQuoted } from './filterCompiler';

function outputFields(target: SearchTarget, includeText: boolean): string[] {
  return includeText ? [target.textField] : [];
}

function withFilter(request: StoreSearchRequest, filter: string | undefined): StoreSearchRequest {
  return filter ? { ...request, filter } : request;
}

export function buildLexicalQuery(target: SearchTarget, query: string, options: QueryOptions): StoreSearchRequest {
  return withFilter(
    {
      collection: target.collection,
      annsField: target.lexicalField,
      data: query,
      limit: options.limit,
      outputFields: outputFields(target, options.includeText)
    },
    options.filter
  );
}

export function buildSemanticQuery(
  target: SearchTarget,
  vector: number[],
  options: QueryOptions
): StoreSearchRequest {
  return withFilter(
    {
      collection: target.collection,
      annsField: target.denseField,
      data: vector,
      limit: options.limit,
      outputFields: outputFields(target, options.includeText)
    },
    options.filter
  );
}

export function phraseMatch(textField: string, phrase: string): string {
  return `PHRASE_MATCH(${textField}, '${escapeSingleQuoted(phrase)}')`;
}

/**
 * Lexical search restricted to documents containing the query verbatim.
 * The phrase predicate leads; any request filter is AND-ed after it.
 */
export function buildExactQuery(target: SearchTarget, query: string, options: QueryOptions): StoreSearchRequest {
  const filter = conjoin(phraseMatch(target.textField, query), options.filter);
  return withFilter(buildLexicalQuery(target, query, { ...options, filter: undefined }), filter);
}
