/**
 * SQL Shell Completer
 *
 * Context-aware completion for an Oracle SQL shell:
 * - Metadata catalog filled incrementally from the shell's discovery queries
 * - Column scoping over the tables referenced at the cursor
 * - Prefix and fuzzy matching with deterministic ranking
 *
 * @example
 * ```ts
 * import { createCompleter } from './completer'
 * import { loadVocabulary } from '../oracle-vocabulary'
 *
 * const completer = createCompleter({ vocabulary: loadVocabulary(), suggestType })
 * completer.catalog.setCurrentDatabase('hr')
 * completer.catalog.extendSchemas(['hr'])
 * completer.catalog.extendRelations([['EMPLOYEES']], 'tables', 'hr')
 *
 * completer.getCompletions('SELECT * FROM emp', 17)
 * // [{ text: 'EMPLOYEES', startPosition: -3, type: 'table' }]
 * ```
 */

// Completer
export { createCompleter } from './dispatcher'
export type { CompleterOptions, GetCompletionsOptions, SQLCompleter } from './dispatcher'

// Catalog
export { createCatalog, drainEntries, CatalogError } from './catalog'
export type { CatalogOptions, MetadataCatalog } from './catalog'
export { refreshCatalog } from './refresh'
export type { MetadataSource, RefreshOptions, RefreshReport, RefreshStep } from './refresh'

// Module functions
export { resolveScopedColumns, findRelationColumns } from './scope-resolver'
export { findMatches, createMatcher, fuzzyPattern, escapeRegExp } from './ranker'
export type { MatchScore } from './ranker'
export {
  lastWord,
  wordBeforeCursor,
  escapeName,
  escapedNames,
  unescapeName,
  canonicalName,
} from './identifiers'
export type { WordBoundary } from './identifiers'

// Types
export { WILDCARD_COLUMN } from './types'
export type {
  RelationKind,
  ObjectKind,
  FunctionMetadata,
  RelationMap,
  FunctionMap,
  LookupFailure,
  RelationLookup,
  ExtendResult,
  VocabularyKind,
  Vocabulary,
  TableReference,
  ScopeOptions,
  SuggestionRequest,
  SuggestionType,
  SuggestTypeFn,
  FavoriteQueryStore,
  MatchOptions,
  Completion,
  TypedCompletion,
} from './types'

// Vocabulary and configuration
export { loadVocabulary, parseVocabulary, mergeFunctionCategories, FUNCTION_CATEGORIES } from '../oracle-vocabulary'
export type { FunctionCategory } from '../oracle-vocabulary'
export { loadCompleterConfig, parseCompleterConfig, createCompleterFromConfig } from '../../config'
export type { CompleterConfig } from '../../config'
