/**
 * Suggestion Dispatcher
 *
 * Turns the suggestion requests produced for a cursor position into completions:
 * each request type picks its candidate source and matching mode, results are
 * concatenated in request order without re-ranking across types.
 */

import { createLogger, type Logger } from '../../logger'
import { createCatalog, type MetadataCatalog } from './catalog'
import { wordBeforeCursor } from './identifiers'
import { findMatches } from './ranker'
import { resolveScopedColumns } from './scope-resolver'
import type {
  Completion,
  FavoriteQueryStore,
  MatchOptions,
  SuggestionRequest,
  SuggestTypeFn,
  TypedCompletion,
  Vocabulary,
} from './types'

export interface CompleterOptions {
  vocabulary: Vocabulary
  /** Context-aware completion; when off, every word is prefix-matched against all names */
  smartCompletion?: boolean
  tableFormats?: readonly string[]
  /** Cursor context classifier. Without one, completion is context-free. */
  suggestType?: SuggestTypeFn
  favoriteQueries?: FavoriteQueryStore
  logger?: Logger
}

export interface GetCompletionsOptions {
  /** Overrides the completer's default for this call */
  smartCompletion?: boolean
}

export interface SQLCompleter {
  readonly catalog: MetadataCatalog
  /** Completions for the statement `sql` with the cursor at `cursorPosition` */
  getCompletions: (sql: string, cursorPosition: number, options?: GetCompletionsOptions) => TypedCompletion[]
  /** Completions for already classified requests */
  complete: (requests: readonly SuggestionRequest[], word: string) => TypedCompletion[]
}

const FUZZY: MatchOptions = { startOnly: false, fuzzy: true }
const PREFIX: MatchOptions = { startOnly: true, fuzzy: false }

function tag(completions: Completion[], type: TypedCompletion['type']): TypedCompletion[] {
  return completions.map((c) => ({ ...c, type }))
}

export function createCompleter(options: CompleterOptions): SQLCompleter {
  const logger = options.logger ?? createLogger('completer')
  const catalog = createCatalog(options.vocabulary, {
    tableFormats: options.tableFormats,
    logger,
  })
  const smartByDefault = options.smartCompletion ?? true

  function completeRequest(request: SuggestionRequest, word: string): Completion[] {
    switch (request.type) {
      case 'column': {
        logger.debug('Completion column scope', request.tables)
        // dropUnique serves `t1 JOIN t2 USING (`: only columns shared by the joined relations
        const columns = resolveScopedColumns(catalog, request.tables, {
          uniqueAcrossTables: request.dropUnique ?? false,
        })
        return findMatches(word, columns, FUZZY)
      }

      case 'function': {
        const userFunctions = findMatches(word, catalog.schemaObjects(request.schema, 'functions'), FUZZY)
        // A qualifier probably names a table or alias (`WHERE u.`), so built-ins only apply unqualified
        if (request.schema) return userFunctions
        return [...userFunctions, ...findMatches(word, catalog.getFunctions(), PREFIX)]
      }

      case 'table':
        return findMatches(word, catalog.schemaObjects(request.schema, 'tables'), FUZZY)

      case 'view':
        return findMatches(word, catalog.schemaObjects(request.schema, 'views'), FUZZY)

      case 'alias':
        return findMatches(word, request.aliases, FUZZY)

      case 'database':
      case 'schema':
        return findMatches(word, catalog.getDatabases(), FUZZY)

      case 'keyword':
        return findMatches(word, catalog.getKeywords(), PREFIX)

      case 'show':
        return findMatches(word, catalog.getShowItems(), FUZZY)

      case 'change':
        return findMatches(word, catalog.getChangeItems(), FUZZY)

      case 'user':
        return findMatches(word, catalog.getUsers(), FUZZY)

      case 'special':
        return findMatches(word, catalog.getSpecialCommands(), PREFIX)

      case 'favoritequery':
        return findMatches(word, options.favoriteQueries?.list() ?? [], FUZZY)

      case 'table_format':
        return findMatches(word, catalog.getTableFormats(), PREFIX)

      default: {
        // Requests come from an external classifier and may carry types this engine lacks
        const unknown: never = request
        logger.debug('Ignoring unrecognized suggestion request', unknown)
        return []
      }
    }
  }

  const completer: SQLCompleter = {
    catalog,

    complete(requests, word) {
      const completions: TypedCompletion[] = []
      for (const request of requests) {
        logger.debug(`Suggestion type: ${request.type}`)
        completions.push(...tag(completeRequest(request, word), request.type))
      }
      return completions
    },

    getCompletions(sql, cursorPosition, callOptions = {}) {
      const textBeforeCursor = sql.slice(0, cursorPosition)
      const word = wordBeforeCursor(textBeforeCursor)
      const smart = callOptions.smartCompletion ?? smartByDefault

      if (!smart || !options.suggestType) {
        return tag(findMatches(word, catalog.getAllCompletions(), PREFIX), 'any')
      }

      return completer.complete(options.suggestType(sql, textBeforeCursor), word)
    },
  }

  return completer
}
