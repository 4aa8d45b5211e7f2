// tests/sql-completer/scope-resolver.test.ts

import { describe, it, expect } from 'vitest'
import { resolveScopedColumns, findRelationColumns } from '../../src/lib/sql/completer/scope-resolver'
import type { TableReference } from '../../src/lib/sql/completer/types'
import { createHrCompleter } from '../test-utils'

// ============================================================================
// TEST HELPERS
// ============================================================================

function ref(name: string, schema: string | null = null, alias: string | null = null): TableReference {
  return { schema, name, alias }
}

const { catalog } = createHrCompleter()

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface ScopeTestCase {
  name: string
  tables: TableReference[]
  uniqueAcrossTables?: boolean
  expected: string[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const scopeTests: ScopeTestCase[] = [
  {
    name: 'table in the current database',
    tables: [ref('EMPLOYEES')],
    expected: ['*', 'EMPLOYEE_ID', 'FIRST_NAME', 'LAST_NAME', 'DEPARTMENT_ID'],
  },
  {
    name: 'lower-case reference',
    tables: [ref('employees', null, 'e')],
    expected: ['*', 'EMPLOYEE_ID', 'FIRST_NAME', 'LAST_NAME', 'DEPARTMENT_ID'],
  },
  {
    name: 'quoted reference',
    tables: [ref('"EMPLOYEES"')],
    expected: ['*', 'EMPLOYEE_ID', 'FIRST_NAME', 'LAST_NAME', 'DEPARTMENT_ID'],
  },
  {
    name: 'view when no table matches',
    tables: [ref('EMP_DETAILS')],
    expected: ['*', 'EMPLOYEE_ID', 'DEPARTMENT_NAME'],
  },
  {
    name: 'explicit schema',
    tables: [ref('ORDERS', 'sales', 'o')],
    expected: ['*', 'ORDER_ID', 'EMPLOYEE_ID'],
  },
  {
    name: 'relation outside the current database needs a schema',
    tables: [ref('ORDERS')],
    expected: [],
  },
  {
    name: 'unknown relation contributes nothing',
    tables: [ref('JOBS'), ref('DEPARTMENTS')],
    expected: ['*', 'DEPARTMENT_ID', 'DEPARTMENT_NAME'],
  },
  {
    name: 'unknown schema contributes nothing',
    tables: [ref('EMPLOYEES', 'payroll')],
    expected: [],
  },
  {
    name: 'references concatenate in order with duplicates',
    tables: [ref('DEPARTMENTS'), ref('EMP_DETAILS')],
    expected: ['*', 'DEPARTMENT_ID', 'DEPARTMENT_NAME', '*', 'EMPLOYEE_ID', 'DEPARTMENT_NAME'],
  },
  {
    name: 'USING keeps the single shared column',
    tables: [ref('EMPLOYEES', null, 'e'), ref('DEPARTMENTS', null, 'd')],
    uniqueAcrossTables: true,
    expected: ['DEPARTMENT_ID'],
  },
  {
    name: 'USING across three relations lists each shared column once',
    tables: [ref('EMPLOYEES'), ref('DEPARTMENTS'), ref('EMP_DETAILS')],
    uniqueAcrossTables: true,
    expected: ['EMPLOYEE_ID', 'DEPARTMENT_ID', 'DEPARTMENT_NAME'],
  },
  {
    name: 'USING over a single relation offers nothing',
    tables: [ref('EMPLOYEES')],
    uniqueAcrossTables: true,
    expected: [],
  },
]

// ============================================================================
// TESTS
// ============================================================================

describe('resolveScopedColumns', () => {
  for (const tc of scopeTests) {
    it(tc.name, () => {
      expect(resolveScopedColumns(catalog, tc.tables, { uniqueAcrossTables: tc.uniqueAcrossTables })).toEqual(
        tc.expected
      )
    })
  }

  it('prefers the table when a view has the same name', () => {
    const { catalog: shadowed } = createHrCompleter()
    shadowed.extendRelations([['EMPLOYEES']], 'views', 'hr')
    shadowed.extendColumns([['EMPLOYEES', 'VIEW_ONLY']], 'views', 'hr')

    expect(resolveScopedColumns(shadowed, [ref('EMPLOYEES')])).not.toContain('VIEW_ONLY')
    expect(resolveScopedColumns(shadowed, [ref('EMPLOYEES')])).toHaveLength(5)
  })
})

describe('findRelationColumns', () => {
  it('returns null for unresolved references', () => {
    expect(findRelationColumns(catalog, ref('JOBS'))).toBeNull()
  })

  it('returns the column list of a resolved reference', () => {
    expect(findRelationColumns(catalog, ref('DEPARTMENTS', 'HR'))).toEqual(['*', 'DEPARTMENT_ID', 'DEPARTMENT_NAME'])
  })
})
