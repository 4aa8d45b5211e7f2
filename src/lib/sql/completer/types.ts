/**
 * Completion Engine Types
 *
 * Suggestion requests arrive from an external SQL context classifier, are dispatched
 * against the metadata catalog, and leave as ranked completions:
 * SuggestionRequest[] + word → Dispatcher → {Catalog, ScopeResolver} → Ranker → Completion[]
 */

// ============================================================================
// 1. CATALOG TYPES
// ============================================================================

export type RelationKind = 'tables' | 'views'

export type ObjectKind = RelationKind | 'functions'

/** Placeholder column offered for a relation whose columns are not known yet */
export const WILDCARD_COLUMN = '*'

/** Metadata attached to a user-defined function. Only presence is tracked today. */
export type FunctionMetadata = null

/** schema → relation → column names */
export type RelationMap = Map<string, Map<string, string[]>>

/** schema → function → metadata */
export type FunctionMap = Map<string, Map<string, FunctionMetadata>>

export type LookupFailure = 'schema_not_found' | 'relation_not_found'

export type RelationLookup =
  | { ok: true; columns: readonly string[] }
  | { ok: false; reason: LookupFailure }

/**
 * Outcome of feeding a lazy enumeration into the catalog.
 * Entries drained before a failure are applied; the failure is reported, not thrown.
 */
export interface ExtendResult {
  applied: number
  /** Entries dropped because their schema was not registered */
  skipped: number
  error: Error | null
}

/** Vocabularies that grow during a session through `extendVocabulary` */
export type VocabularyKind = 'show' | 'change' | 'users' | 'keywords' | 'databases' | 'special'

/** Static vocabulary supplied once at construction */
export interface Vocabulary {
  keywords: readonly string[]
  /** Built-in function names, de-duplicated and sorted */
  functions: readonly string[]
}

// ============================================================================
// 2. SCOPE TYPES
// ============================================================================

export interface TableReference {
  schema: string | null
  name: string
  alias: string | null
}

export interface ScopeOptions {
  /** Keep only columns present in at least two referenced relations (JOIN ... USING) */
  uniqueAcrossTables?: boolean
}

// ============================================================================
// 3. SUGGESTION REQUEST TYPES
// ============================================================================

export type SuggestionRequest =
  | { type: 'column'; tables: TableReference[]; dropUnique?: boolean }
  | { type: 'function'; schema: string | null }
  | { type: 'table'; schema: string | null }
  | { type: 'view'; schema: string | null }
  | { type: 'alias'; aliases: string[] }
  | { type: 'database' }
  | { type: 'schema' }
  | { type: 'keyword' }
  | { type: 'show' }
  | { type: 'change' }
  | { type: 'user' }
  | { type: 'special' }
  | { type: 'favoritequery' }
  | { type: 'table_format' }

export type SuggestionType = SuggestionRequest['type']

/** Classifies the cursor context of a statement into suggestion requests */
export type SuggestTypeFn = (text: string, textBeforeCursor: string) => SuggestionRequest[]

export interface FavoriteQueryStore {
  list: () => string[]
}

// ============================================================================
// 4. RANKER TYPES
// ============================================================================

export interface MatchOptions {
  /** Substring must start at offset 0 (prefix mode only) */
  startOnly?: boolean
  /** Subsequence matching ranked by span length, then start */
  fuzzy?: boolean
}

export interface Completion {
  text: string
  /** Negative offset from the cursor where the replacement starts */
  startPosition: number
}

export interface TypedCompletion extends Completion {
  /** Request type that produced the completion, 'any' for context-free matching */
  type: SuggestionType | 'any'
}
