/**
 * Scope Resolver
 *
 * Collects the columns visible through the table references of the current statement.
 */

import type { MetadataCatalog } from './catalog'
import { escapeName, unescapeName } from './identifiers'
import { WILDCARD_COLUMN, type ScopeOptions, type TableReference } from './types'

/**
 * Columns of every referenced relation, in reference order, duplicates kept.
 *
 * Tables and views cannot share a name within a schema, so a reference resolves to the
 * table when one exists and only falls back to the view otherwise. References to unknown
 * relations contribute nothing: they are common while a statement is still being typed.
 *
 * With `uniqueAcrossTables`, only columns occurring in at least two references are kept,
 * once each and in first-seen order.
 */
export function resolveScopedColumns(
  catalog: MetadataCatalog,
  tables: readonly TableReference[],
  options: ScopeOptions = {}
): string[] {
  const columns: string[] = []

  for (const table of tables) {
    const resolved = findRelationColumns(catalog, table)
    if (resolved) columns.push(...resolved)
  }

  return options.uniqueAcrossTables ? sharedColumns(columns) : columns
}

/**
 * Columns of a single reference, or null when neither a table nor a view matches.
 */
export function findRelationColumns(
  catalog: MetadataCatalog,
  table: TableReference
): readonly string[] | null {
  const schema = table.schema || catalog.getCurrentDatabase()
  const candidates = [escapeName(table.name), unescapeName(table.name)]

  for (const name of candidates) {
    const lookup = catalog.lookupRelation('tables', schema, name)
    if (lookup.ok) return lookup.columns
  }

  const view = catalog.lookupRelation('views', schema, table.name)
  return view.ok ? view.columns : null
}

function sharedColumns(columns: string[]): string[] {
  const counts = new Map<string, number>()
  for (const column of columns) {
    counts.set(column, (counts.get(column) ?? 0) + 1)
  }

  const shared: string[] = []
  for (const [column, count] of counts) {
    if (count > 1 && column !== WILDCARD_COLUMN) shared.push(column)
  }
  return shared
}
