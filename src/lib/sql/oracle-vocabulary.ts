import { readFileSync, existsSync } from 'fs'
import { parse } from 'smol-toml'
import type { Vocabulary } from './completer/types'

export const FUNCTION_CATEGORIES = [
  'string',
  'numeric',
  'date',
  'conversion',
  'analytic',
  'miscellaneous',
] as const

export type FunctionCategory = (typeof FUNCTION_CATEGORIES)[number]

export const ORACLE_VOCABULARY_PATH = new URL('./oracle-vocabulary.toml', import.meta.url)

function isFunctionCategory(value: string): value is FunctionCategory {
  return FUNCTION_CATEGORIES.some((category) => category === value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Merge function categories into one sorted list without duplicates
 * (ROUND and TRUNC are both numeric and date functions).
 */
export function mergeFunctionCategories(categories: Partial<Record<FunctionCategory, string[]>>): string[] {
  const names = new Set<string>()
  for (const category of FUNCTION_CATEGORIES) {
    for (const name of categories[category] ?? []) {
      names.add(name)
    }
  }
  return Array.from(names).sort()
}

export function parseVocabulary(content: string, origin: string): Vocabulary {
  const parsed = parse(content)

  const keywords: unknown = parsed.keywords ?? []
  if (!isStringArray(keywords)) {
    throw new Error(`${origin}: keywords must be an array of strings`)
  }

  const functions: unknown = parsed.functions ?? {}
  if (!isTable(functions)) {
    throw new Error(`${origin}: [functions] must be a table`)
  }

  const categories: Partial<Record<FunctionCategory, string[]>> = {}
  for (const [category, names] of Object.entries(functions)) {
    if (!isFunctionCategory(category)) {
      throw new Error(`${origin}: unknown function category "${category}". Must be one of: ${FUNCTION_CATEGORIES.join(', ')}`)
    }
    if (!isStringArray(names)) {
      throw new Error(`${origin}: functions.${category} must be an array of strings`)
    }
    categories[category] = names
  }

  return {
    keywords,
    functions: mergeFunctionCategories(categories),
  }
}

export function loadVocabulary(path: string | URL = ORACLE_VOCABULARY_PATH): Vocabulary {
  if (!existsSync(path)) {
    throw new Error(`Vocabulary file not found: ${path}`)
  }
  return parseVocabulary(readFileSync(path, 'utf-8'), String(path))
}
