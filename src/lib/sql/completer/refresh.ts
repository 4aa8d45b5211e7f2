/**
 * Metadata Refresh
 *
 * Rebuilds a completer's catalog from the shell's metadata queries. Steps run in
 * dependency order (schemas before relations, relations before their columns). Columns of
 * relations the relation listing did not return (created between the two queries, or from a
 * failed listing) are skipped.
 */

import { createLogger, type Logger } from '../../logger'
import type { MetadataCatalog } from './catalog'
import type { ExtendResult, RelationKind } from './types'

/**
 * Lazy metadata enumerations supplied by the connection layer. Each may throw while
 * being iterated, for example when the connection drops.
 */
export interface MetadataSource {
  currentDatabase: () => string
  schemata: () => Iterable<string>
  tables: (schema: string) => Iterable<readonly [string]>
  views: (schema: string) => Iterable<readonly [string]>
  tableColumns: (schema: string) => Iterable<readonly [string, string]>
  viewColumns: (schema: string) => Iterable<readonly [string, string]>
  functions: (schema: string) => Iterable<readonly [string, ...unknown[]]>
  users?: () => Iterable<string>
  databases?: () => Iterable<string>
  showItems?: () => Iterable<string>
  changeItems?: () => Iterable<string>
}

export type RefreshStep =
  | 'schemata'
  | 'tables'
  | 'views'
  | 'table_columns'
  | 'view_columns'
  | 'functions'
  | 'users'
  | 'databases'
  | 'show'
  | 'change'

export type RefreshReport = Partial<Record<RefreshStep, ExtendResult>>

export interface RefreshOptions {
  logger?: Logger
}

/**
 * Reset the catalog and load everything `source` can enumerate.
 *
 * Relations, columns and functions are loaded for the current database; other schemata
 * are registered so qualified references can be filled in later.
 */
export function refreshCatalog(
  catalog: MetadataCatalog,
  source: MetadataSource,
  options: RefreshOptions = {}
): RefreshReport {
  const logger = options.logger ?? createLogger('refresh')
  const report: RefreshReport = {}

  catalog.reset()
  const database = source.currentDatabase()
  catalog.setCurrentDatabase(database)

  function extendRegisteredColumns(
    entries: () => Iterable<readonly [string, string]>,
    kind: RelationKind
  ): ExtendResult {
    let skipped = 0
    const registered = lazily(function* () {
      for (const entry of entries()) {
        const [relation, column] = entry
        if (catalog.lookupRelation(kind, database, relation).ok) {
          yield entry
        } else {
          logger.warn(`Skipping column ${column}: ${kind} ${relation} was not listed`)
          skipped++
        }
      }
    })
    const result = catalog.extendColumns(registered, kind, database)
    return { ...result, skipped: result.skipped + skipped }
  }

  report.schemata = catalog.extendSchemas(
    lazily(function* () {
      if (database) yield database
      yield* source.schemata()
    })
  )

  report.tables = catalog.extendRelations(lazily(() => source.tables(database)), 'tables', database)
  report.views = catalog.extendRelations(lazily(() => source.views(database)), 'views', database)
  report.table_columns = extendRegisteredColumns(() => source.tableColumns(database), 'tables')
  report.view_columns = extendRegisteredColumns(() => source.viewColumns(database), 'views')
  report.functions = catalog.extendFunctions(lazily(() => source.functions(database)), database)

  const { users, databases, showItems, changeItems } = source
  if (users) report.users = catalog.extendVocabulary('users', lazily(users))
  if (databases) report.databases = catalog.extendVocabulary('databases', lazily(databases))
  if (showItems) report.show = catalog.extendVocabulary('show', lazily(showItems))
  if (changeItems) report.change = catalog.extendVocabulary('change', lazily(changeItems))

  return report
}

// Defer the query until the catalog iterates, so a failing call is contained like a failing row
function* lazily<T>(produce: () => Iterable<T>): Generator<T> {
  yield* produce()
}
