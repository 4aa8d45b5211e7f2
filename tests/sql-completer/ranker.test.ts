// tests/sql-completer/ranker.test.ts

import { describe, it, expect } from 'vitest'
import { findMatches, createMatcher, fuzzyPattern, escapeRegExp } from '../../src/lib/sql/completer/ranker'
import type { MatchOptions } from '../../src/lib/sql/completer/types'

// ============================================================================
// TEST HELPERS
// ============================================================================

const PREFIX: MatchOptions = { startOnly: true, fuzzy: false }
const SUBSTRING: MatchOptions = { startOnly: false, fuzzy: false }

function texts(text: string, collection: Iterable<string>, options?: MatchOptions): string[] {
  return findMatches(text, collection, options).map((c) => c.text)
}

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface RankTestCase {
  name: string
  strategy: string // Scoring rule being tested, shown on failure
  text: string
  candidates: string[]
  options?: MatchOptions
  expected: string[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const fuzzyTests: RankTestCase[] = [
  {
    name: 'subsequence match across separators',
    strategy: 'FUZZY: f.*?n spans FIRST_N',
    text: 'fn',
    candidates: ['LAST_NAME', 'FIRST_NAME', 'EMPLOYEE_ID'],
    expected: ['FIRST_NAME'],
  },
  {
    name: 'shorter span ranks before earlier start',
    strategy: 'FUZZY: DEPT_ID span 5 at 1 < EMPLOYEE_ID span 10 at 0',
    text: 'ei',
    candidates: ['EMPLOYEE_ID', 'DEPT_ID'],
    expected: ['DEPT_ID', 'EMPLOYEE_ID'],
  },
  {
    name: 'earliest match is scored, not the tightest one',
    strategy: 'FUZZY: CUSTOMER_ORDERS matches o..r..d from offset 4 with span 8',
    text: 'ord',
    candidates: ['ORDER_ITEMS', 'CUSTOMER_ORDERS', 'ORDERS'],
    expected: ['ORDERS', 'ORDER_ITEMS', 'CUSTOMER_ORDERS'],
  },
  {
    name: 'ties keep alphabetical order',
    strategy: 'TIEBREAK: equal (span, start) sorted by text',
    text: 'id',
    candidates: ['ID', 'IDX', 'IDLE'],
    expected: ['ID', 'IDLE', 'IDX'],
  },
  {
    name: 'matching ignores case',
    strategy: 'FUZZY: token and candidates lower-cased',
    text: 'FIR',
    candidates: ['first_name', 'LAST_NAME'],
    expected: ['first_name'],
  },
  {
    name: 'regex metacharacters are literal',
    strategy: 'FUZZY: token characters are escaped',
    text: 'a$',
    candidates: ['AB', 'A$B'],
    expected: ['A$B'],
  },
  {
    name: 'duplicates are kept',
    strategy: 'FUZZY: no de-duplication',
    text: 'emp',
    candidates: ['EMPLOYEE_ID', 'EMPLOYEE_ID'],
    expected: ['EMPLOYEE_ID', 'EMPLOYEE_ID'],
  },
]

const substringTests: RankTestCase[] = [
  {
    name: 'earlier substring position ranks first',
    strategy: 'SUBSTRING: NAME@0 < SURNAME@3 < FIRST_NAME@6',
    text: 'name',
    candidates: ['FIRST_NAME', 'NAME', 'SURNAME'],
    options: SUBSTRING,
    expected: ['NAME', 'SURNAME', 'FIRST_NAME'],
  },
  {
    name: 'start-only drops inner matches',
    strategy: 'PREFIX: only candidates starting with the token',
    text: 'name',
    candidates: ['FIRST_NAME', 'NAME', 'SURNAME'],
    options: PREFIX,
    expected: ['NAME'],
  },
  {
    name: 'substring mode does not match subsequences',
    strategy: 'SUBSTRING: f..n is not contiguous in FIRST_NAME',
    text: 'fn',
    candidates: ['FIRST_NAME'],
    options: SUBSTRING,
    expected: [],
  },
  {
    name: 'prefix ties fall back to alphabetical order',
    strategy: 'PREFIX: SUBSTR and SUM both score (2, 0)',
    text: 'su',
    candidates: ['SUM', 'ABS', 'SUBSTR'],
    options: PREFIX,
    expected: ['SUBSTR', 'SUM'],
  },
]

// ============================================================================
// TESTS
// ============================================================================

describe('findMatches', () => {
  describe('fuzzy mode', () => {
    for (const tc of fuzzyTests) {
      it(tc.name, () => {
        expect(texts(tc.text, tc.candidates, tc.options), tc.strategy).toEqual(tc.expected)
      })
    }
  })

  describe('substring mode', () => {
    for (const tc of substringTests) {
      it(tc.name, () => {
        expect(texts(tc.text, tc.candidates, tc.options), tc.strategy).toEqual(tc.expected)
      })
    }
  })

  it('replaces the typed token', () => {
    expect(findMatches('sel', ['SELECT', 'DELETE', 'SET'], PREFIX)).toEqual([
      { text: 'SELECT', startPosition: -3 },
    ])
  })

  it('only uses the part after a qualifier as the token', () => {
    expect(findMatches('SELECT e.fir', ['FIRST_NAME'])).toEqual([{ text: 'FIRST_NAME', startPosition: -3 }])
  })

  it('offers everything in order when nothing is typed', () => {
    expect(findMatches('SELECT ', ['b', 'a'])).toEqual([
      { text: 'a', startPosition: 0 },
      { text: 'b', startPosition: 0 },
    ])
    expect(findMatches('', ['b', 'a'], PREFIX)).toEqual([
      { text: 'a', startPosition: 0 },
      { text: 'b', startPosition: 0 },
    ])
  })

  it('returns the same order on repeated calls', () => {
    const candidates = ['DEPARTMENT_ID', 'EMPLOYEE_ID', 'DEPARTMENTS', 'ID']
    expect(findMatches('di', candidates)).toEqual(findMatches('di', candidates))
  })

  it('accepts any iterable collection', () => {
    expect(texts('sa', new Set(['SALES', 'HR']))).toEqual(['SALES'])
  })
})

describe('createMatcher', () => {
  it('scores fuzzy matches by span and start', () => {
    expect(createMatcher('ei')('DEPT_ID')).toEqual({ length: 5, start: 1 })
  })

  it('returns null when the token is not a subsequence', () => {
    expect(createMatcher('xz')('EMPLOYEES')).toBeNull()
  })

  it('scores substring matches by token length and offset', () => {
    expect(createMatcher('name', SUBSTRING)('SURNAME')).toEqual({ length: 4, start: 3 })
    expect(createMatcher('name', PREFIX)('SURNAME')).toBeNull()
  })
})

describe('fuzzyPattern', () => {
  it('interleaves escaped characters with lazy wildcards', () => {
    expect(fuzzyPattern('a.b').source).toBe('(a.*?\\..*?b)')
  })

  it('escapes every regex metacharacter', () => {
    expect(escapeRegExp('a+b(c)')).toBe('a\\+b\\(c\\)')
  })
})
