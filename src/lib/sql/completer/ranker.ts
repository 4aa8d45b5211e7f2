/**
 * Ranker Module
 *
 * One matching function serves both strict prefix completion (keywords, special commands)
 * and typo-tolerant completion (tables, columns):
 * - Substring mode: the token must appear verbatim, optionally at the start.
 *   Every hit has the same span, so the earliest match position wins.
 * - Fuzzy mode: the token's characters must appear in order. Hits are ranked by the
 *   length of the shortest span starting at the earliest match, then by its start.
 * Ties keep alphabetical order.
 */

import { lastWord } from './identifiers'
import type { Completion, MatchOptions } from './types'

export interface MatchScore {
  /** Length of the matched span */
  length: number
  /** Offset of the match within the candidate */
  start: number
}

interface ScoredMatch extends MatchScore {
  text: string
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build the subsequence pattern for a token: `abc` → `(a.*?b.*?c)`.
 */
export function fuzzyPattern(token: string): RegExp {
  const body = Array.from(token).map(escapeRegExp).join('.*?')
  return new RegExp(`(${body})`)
}

/**
 * Build a scorer for an already lower-cased token. The scorer returns null for candidates
 * that do not match.
 */
export function createMatcher(
  token: string,
  options: MatchOptions = {}
): (candidate: string) => MatchScore | null {
  if (options.fuzzy ?? true) {
    const pattern = fuzzyPattern(token)
    return (candidate) => {
      const match = pattern.exec(candidate.toLowerCase())
      return match ? { length: match[0].length, start: match.index } : null
    }
  }

  if (options.startOnly) {
    return (candidate) => (candidate.toLowerCase().startsWith(token) ? { length: token.length, start: 0 } : null)
  }

  return (candidate) => {
    const start = candidate.toLowerCase().indexOf(token)
    return start >= 0 ? { length: token.length, start } : null
  }
}

/**
 * Find completions in `collection` for the last word of `text`.
 *
 * Each completion replaces the typed token, so its start position is minus the token length.
 *
 * @example
 * findMatches('SELECT fir', ['LAST_NAME', 'FIRST_NAME'])
 * // [{ text: 'FIRST_NAME', startPosition: -3 }]
 */
export function findMatches(
  text: string,
  collection: Iterable<string>,
  options: MatchOptions = {}
): Completion[] {
  const token = lastWord(text, 'most_punctuations').toLowerCase()
  const matcher = createMatcher(token, options)
  const startPosition = token.length === 0 ? 0 : -token.length
  const matches: ScoredMatch[] = []

  for (const candidate of Array.from(collection).sort()) {
    const score = matcher(candidate)
    if (score) matches.push({ ...score, text: candidate })
  }

  // Array.prototype.sort is stable, so equal scores keep the alphabetical pre-sort
  matches.sort((a, b) => a.length - b.length || a.start - b.start)

  return matches.map((m) => ({ text: m.text, startPosition }))
}
