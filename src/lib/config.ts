import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import { dirname, resolve } from 'path'
import { createLogger, isLogLevel, LOG_LEVELS, type LogLevel } from './logger'
import { loadVocabulary } from './sql/oracle-vocabulary'
import { createCompleter, type CompleterOptions, type SQLCompleter } from './sql/completer/dispatcher'

export interface CompleterConfig {
  smartCompletion: boolean
  tableFormats: string[]
  logLevel: LogLevel
  /** Absolute path of a vocabulary file replacing the bundled Oracle one */
  vocabularyPath?: string
}

export const DEFAULT_COMPLETER_CONFIG: CompleterConfig = {
  smartCompletion: true,
  tableFormats: [],
  logLevel: 'warn',
  vocabularyPath: undefined,
}

/**
 * Parse the [completer] section of a TOML config.
 * Relative vocabulary paths resolve against `baseDir`.
 */
export function parseCompleterConfig(content: string, baseDir: string): CompleterConfig {
  const parsed = parse(content)
  const config: CompleterConfig = { ...DEFAULT_COMPLETER_CONFIG, tableFormats: [] }

  const section: unknown = parsed.completer
  if (section === undefined) {
    return config
  }
  if (typeof section !== 'object' || section === null || Array.isArray(section) || section instanceof Date) {
    throw new Error('[completer] must be a table')
  }

  const c: Record<string, unknown> = { ...section }

  if (c.smart_completion !== undefined) {
    if (typeof c.smart_completion !== 'boolean') {
      throw new Error('completer.smart_completion must be a boolean')
    }
    config.smartCompletion = c.smart_completion
  }

  if (c.table_formats !== undefined) {
    const formats = c.table_formats
    if (!Array.isArray(formats) || !formats.every((f): f is string => typeof f === 'string')) {
      throw new Error('completer.table_formats must be an array of strings')
    }
    config.tableFormats = formats
  }

  if (c.log_level !== undefined) {
    if (typeof c.log_level !== 'string' || !isLogLevel(c.log_level)) {
      throw new Error(`completer.log_level must be one of: ${LOG_LEVELS.join(', ')}`)
    }
    config.logLevel = c.log_level
  }

  if (c.vocabulary !== undefined) {
    if (typeof c.vocabulary !== 'string' || c.vocabulary.trim() === '') {
      throw new Error('completer.vocabulary must be a non-empty string')
    }
    config.vocabularyPath = resolve(baseDir, c.vocabulary)
  }

  return config
}

export function loadCompleterConfig(configPath: string): CompleterConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }

  const content = readFileSync(configPath, 'utf-8')
  return parseCompleterConfig(content, dirname(resolve(configPath)))
}

/**
 * Build a completer from loaded configuration. The classifier and favorite queries
 * belong to the host shell and are passed through.
 */
export function createCompleterFromConfig(
  config: CompleterConfig,
  collaborators: Pick<CompleterOptions, 'suggestType' | 'favoriteQueries'> = {}
): SQLCompleter {
  return createCompleter({
    vocabulary: config.vocabularyPath ? loadVocabulary(config.vocabularyPath) : loadVocabulary(),
    smartCompletion: config.smartCompletion,
    tableFormats: config.tableFormats,
    logger: createLogger('completer', config.logLevel),
    ...collaborators,
  })
}
