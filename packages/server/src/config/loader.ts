/**
 * Configuration Loader
 *
 * Reads pagewatch.toml from the project root. A missing file yields the
 * defaults; a malformed one is a startup error.
 */

import { readFile } from 'node:fs/promises'
import path from 'node:path'
import * as TOML from '@iarna/toml'
import type { ZodIssue } from 'zod'
import { PagewatchConfigSchema, type PagewatchConfig } from './schema.js'
import { ConfigurationError } from '../errors/index.js'

export const CONFIG_FILE_NAME = 'pagewatch.toml'

export interface LoadedConfig {
  config: PagewatchConfig
  /** Absolute path of the file read, or null when defaults were used */
  file: string | null
}

export async function loadConfig(root: string): Promise<LoadedConfig> {
  const file = path.join(root, CONFIG_FILE_NAME)

  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: PagewatchConfigSchema.parse({}), file: null }
    }
    throw new ConfigurationError(`Unable to read ${file}`, { file }, { cause: error })
  }

  return { config: parseConfig(content, file), file }
}

export function parseConfig(content: string, source?: string): PagewatchConfig {
  let data: unknown
  try {
    data = TOML.parse(content)
  } catch (error) {
    throw new ConfigurationError(
      `Invalid TOML in ${source ?? CONFIG_FILE_NAME}${formatPosition(error)}`,
      { file: source },
      { cause: error }
    )
  }

  const result = PagewatchConfigSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue)
    throw new ConfigurationError(
      `Invalid configuration in ${source ?? CONFIG_FILE_NAME}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      { file: source, issues }
    )
  }

  return result.data
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : 'root'
  return `${location}: ${issue.message}`
}

function formatPosition(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'line' in error && typeof error.line === 'number') {
    const column = 'col' in error && typeof error.col === 'number' ? error.col : 0
    return ` at line ${error.line + 1}, column ${column + 1}`
  }
  return ''
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}
