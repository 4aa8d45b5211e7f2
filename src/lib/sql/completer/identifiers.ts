/**
 * Identifier Normalizer
 *
 * Word extraction around the cursor and canonical forms for catalog keys.
 */

export type WordBoundary = 'most_punctuations' | 'all_punctuations'

const WORD_PATTERNS: Record<WordBoundary, RegExp> = {
  // Everything except whitespace, period, parens, colon and comma
  most_punctuations: /([^.():,\s]+)$/,
  all_punctuations: /([^\s]+)$/,
}

/**
 * Trailing word of `text`. Empty when the text is empty or ends in whitespace.
 *
 * @example
 * lastWord('abc def') // 'def'
 * lastWord('SELECT e.fir') // 'fir'
 * lastWord('SELECT e.fir', 'all_punctuations') // 'e.fir'
 */
export function lastWord(text: string, include: WordBoundary = 'most_punctuations'): string {
  if (!text || /\s$/.test(text)) return ''
  const match = WORD_PATTERNS[include].exec(text)
  return match ? match[0] : ''
}

/** Whitespace-delimited WORD ending at the cursor */
export function wordBeforeCursor(textBeforeCursor: string): string {
  return lastWord(textBeforeCursor, 'all_punctuations')
}

// Oracle dictionary names are already stored in their canonical form
export function escapeName(name: string): string {
  return name
}

export function escapedNames<T extends readonly string[]>(names: T): string[] {
  return names.map(escapeName)
}

/** Strip one pair of surrounding double quotes */
export function unescapeName(name: string): string {
  if (name.length >= 2 && name.startsWith('"') && name.endsWith('"')) {
    return name.slice(1, -1)
  }
  return name
}

export function canonicalName(name: string): string {
  return name.toUpperCase()
}
