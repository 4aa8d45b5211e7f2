/**
 * Metadata Catalog
 *
 * Per-completer store of the schema objects and session vocabularies discovered by the
 * shell. Objects are keyed schema → name, both upper-cased. Extension operations consume
 * lazy enumerations coming from the connection layer; a failing enumeration contributes the
 * entries drained before the failure and reports the error instead of throwing.
 */

import { createLogger, type Logger } from '../../logger'
import { canonicalName, escapeName, escapedNames } from './identifiers'
import {
  WILDCARD_COLUMN,
  type ExtendResult,
  type FunctionMap,
  type LookupFailure,
  type ObjectKind,
  type RelationKind,
  type RelationLookup,
  type RelationMap,
  type VocabularyKind,
  type Vocabulary,
} from './types'

export class CatalogError extends Error {
  readonly code: LookupFailure

  constructor(code: LookupFailure, message: string) {
    super(message)
    this.name = 'CatalogError'
    this.code = code
  }
}

export interface CatalogOptions {
  /** Output formats understood by the shell's table renderer */
  tableFormats?: readonly string[]
  logger?: Logger
}

export interface MetadataCatalog {
  reset: () => void
  setCurrentDatabase: (name: string) => void
  extendSchemas: (names: Iterable<string>) => ExtendResult
  extendRelations: (entries: Iterable<readonly [string]>, kind: RelationKind, schema: string) => ExtendResult
  extendColumns: (entries: Iterable<readonly [string, string]>, kind: RelationKind, schema: string) => ExtendResult
  extendFunctions: (entries: Iterable<readonly [string, ...unknown[]]>, schema: string) => ExtendResult
  extendVocabulary: (kind: VocabularyKind, items: Iterable<string>) => ExtendResult
  extendSpecialCommands: (items: Iterable<string>) => ExtendResult
  extendDatabaseNames: (items: Iterable<string>) => ExtendResult

  lookupRelation: (kind: RelationKind, schema: string, name: string) => RelationLookup
  /** Object names under `schema`, or under the current database when `schema` is null */
  schemaObjects: (schema: string | null, kind: ObjectKind) => string[]

  getCurrentDatabase: () => string
  getSchemas: () => string[]
  getKeywords: () => readonly string[]
  getFunctions: () => readonly string[]
  getReservedWords: () => ReadonlySet<string>
  getDatabases: () => readonly string[]
  getUsers: () => readonly string[]
  getShowItems: () => readonly string[]
  getChangeItems: () => readonly string[]
  getSpecialCommands: () => readonly string[]
  getTableFormats: () => readonly string[]
  getAllCompletions: () => ReadonlySet<string>
}

interface RelationLookupFailure {
  reason: LookupFailure
}

interface Drained<T> {
  items: T[]
  error: Error | null
}

/**
 * Pull every entry out of a lazy enumeration, stopping at the first failure.
 */
export function drainEntries<T>(entries: Iterable<T>): Drained<T> {
  const items: T[] = []
  try {
    for (const entry of entries) {
      items.push(entry)
    }
    return { items, error: null }
  } catch (err) {
    return { items, error: err instanceof Error ? err : new Error(String(err)) }
  }
}

function deriveReservedWords(keywords: readonly string[]): Set<string> {
  const words = new Set<string>()
  for (const keyword of keywords) {
    for (const word of keyword.split(/\s+/)) {
      if (word) words.add(word)
    }
  }
  return words
}

export function createCatalog(vocabulary: Vocabulary, options: CatalogOptions = {}): MetadataCatalog {
  const logger = options.logger ?? createLogger('catalog')
  const tableFormats = [...(options.tableFormats ?? [])]
  const functions = [...vocabulary.functions]

  // Survive reset: not derived from the connected database
  const keywords = [...vocabulary.keywords]
  const specialCommands: string[] = []
  let reservedWords = deriveReservedWords(keywords)

  let currentDatabase = ''
  let databases: string[] = []
  let users: string[] = []
  let showItems: string[] = []
  let changeItems: string[] = []
  let allCompletions = new Set<string>()
  const metadata: { tables: RelationMap; views: RelationMap; functions: FunctionMap } = {
    tables: new Map(),
    views: new Map(),
    functions: new Map(),
  }

  function reportFailure(what: string, error: Error | null): void {
    if (error) {
      logger.error(`Failed to enumerate ${what}; keeping entries read so far`, error)
    }
  }

  function appendVocabulary(target: string[], items: Iterable<string>, what: string, global: boolean): ExtendResult {
    const { items: drained, error } = drainEntries(items)
    reportFailure(what, error)
    for (const item of drained) {
      target.push(item)
      if (global) allCompletions.add(item)
    }
    return { applied: drained.length, skipped: 0, error }
  }

  function relationColumns(kind: RelationKind, schema: string, name: string): string[] | RelationLookupFailure {
    const relations = metadata[kind].get(canonicalName(schema))
    if (!relations) return { reason: 'schema_not_found' }
    const columns = relations.get(canonicalName(name))
    if (!columns) return { reason: 'relation_not_found' }
    return columns
  }

  const catalog: MetadataCatalog = {
    reset() {
      databases = []
      users = []
      showItems = []
      changeItems = []
      currentDatabase = ''
      metadata.tables = new Map()
      metadata.views = new Map()
      metadata.functions = new Map()
      allCompletions = new Set([...keywords, ...functions])
    },

    setCurrentDatabase(name) {
      currentDatabase = canonicalName(name)
    },

    extendSchemas(names) {
      const { items, error } = drainEntries(names)
      reportFailure('schemas', error)
      for (const name of items) {
        const schema = canonicalName(name)
        logger.debug(`Registering schema ${schema}`)
        if (!metadata.tables.has(schema)) metadata.tables.set(schema, new Map())
        if (!metadata.views.has(schema)) metadata.views.set(schema, new Map())
        if (!metadata.functions.has(schema)) metadata.functions.set(schema, new Map())
        allCompletions.add(name)
      }
      return { applied: items.length, skipped: 0, error }
    },

    extendRelations(entries, kind, schema) {
      const { items, error } = drainEntries(entries)
      reportFailure(kind, error)
      const key = canonicalName(schema)
      const relations = metadata[kind].get(key)
      let applied = 0
      let skipped = 0

      for (const entry of items) {
        const [name] = escapedNames(entry)
        if (relations) {
          relations.set(canonicalName(name), [WILDCARD_COLUMN])
          applied++
        } else {
          logger.error(`${kind} ${name} listed in unrecognized schema ${key}`)
          skipped++
        }
        allCompletions.add(name)
      }
      return { applied, skipped, error }
    },

    extendColumns(entries, kind, schema) {
      const { items, error } = drainEntries(entries)
      reportFailure(`${kind} columns`, error)

      for (const entry of items) {
        const [relation, column] = escapedNames(entry)
        const columns = relationColumns(kind, schema, relation)
        if (!Array.isArray(columns)) {
          throw new CatalogError(
            columns.reason,
            `Cannot add column ${column}: ${kind} ${canonicalName(schema)}.${canonicalName(relation)} is not registered`
          )
        }
        columns.push(column)
        allCompletions.add(column)
      }
      return { applied: items.length, skipped: 0, error }
    },

    extendFunctions(entries, schema) {
      const { items, error } = drainEntries(entries)
      reportFailure('functions', error)
      const key = canonicalName(schema)
      const functionsInSchema = metadata.functions.get(key)
      let applied = 0
      let skipped = 0

      for (const [rawName] of items) {
        const name = escapeName(rawName)
        if (functionsInSchema) {
          functionsInSchema.set(canonicalName(name), null)
          applied++
        } else {
          logger.error(`function ${name} listed in unrecognized schema ${key}`)
          skipped++
        }
        allCompletions.add(name)
      }
      return { applied, skipped, error }
    },

    extendVocabulary(kind, items) {
      switch (kind) {
        case 'show':
          return appendVocabulary(showItems, items, 'show items', true)
        case 'change':
          return appendVocabulary(changeItems, items, 'change items', true)
        case 'users':
          return appendVocabulary(users, items, 'users', true)
        case 'databases':
          return appendVocabulary(databases, items, 'databases', true)
        case 'special':
          // Special commands are only valid at the start of a line
          return appendVocabulary(specialCommands, items, 'special commands', false)
        case 'keywords': {
          const result = appendVocabulary(keywords, items, 'keywords', true)
          reservedWords = deriveReservedWords(keywords)
          return result
        }
      }
    },

    extendSpecialCommands(items) {
      return catalog.extendVocabulary('special', items)
    },

    extendDatabaseNames(items) {
      return catalog.extendVocabulary('databases', items)
    },

    lookupRelation(kind, schema, name) {
      const columns = relationColumns(kind, schema, name)
      return Array.isArray(columns) ? { ok: true, columns } : { ok: false, reason: columns.reason }
    },

    schemaObjects(schema, kind) {
      const key = canonicalName(schema || currentDatabase)
      const objects = metadata[kind].get(key)
      return objects ? Array.from(objects.keys()) : []
    },

    getCurrentDatabase: () => currentDatabase,
    getSchemas: () => Array.from(metadata.tables.keys()),
    getKeywords: () => keywords,
    getFunctions: () => functions,
    getReservedWords: () => reservedWords,
    getDatabases: () => databases,
    getUsers: () => users,
    getShowItems: () => showItems,
    getChangeItems: () => changeItems,
    getSpecialCommands: () => specialCommands,
    getTableFormats: () => tableFormats,
    getAllCompletions: () => allCompletions,
  }

  catalog.reset()
  return catalog
}
