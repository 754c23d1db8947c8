/**
 * Requirements file reader.
 *
 * Reads pip-style requirement files: one requirement per line, `#` comments,
 * `-r other.txt` / `--requirement other.txt` includes resolved relative to
 * the including file. Other option lines (index URLs) are not dependencies
 * and are skipped, as are per-requirement options such as `--hash=...`.
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'

import { logger } from '../logger.js'

export interface RequirementLine {
  /** Requirement text without comment */
  text: string
  /** File and 1-based line it came from, for error messages */
  source: string
}

const INCLUDE_PATTERN = /^(?:-r|--requirement)(?:\s+|=)(.+)$/
const TRAILING_OPTIONS_PATTERN = /\s+--[A-Za-z].*$/

/**
 * Split requirement file content into requirement lines.
 * Includes are returned separately so the caller decides how to load them.
 */
export function parseRequirementsContent(
  content: string,
  filePath: string
): { requirements: RequirementLine[]; includes: string[] } {
  const requirements: RequirementLine[] = []
  const includes: string[] = []

  // Join backslash continuations before splitting
  const lines = content.replace(/\\\r?\n/g, ' ').split(/\r?\n/)

  lines.forEach((raw, index) => {
    const text = raw.replace(/(^|\s)#.*$/, '').trim()
    if (!text) return

    const include = text.match(INCLUDE_PATTERN)
    if (include?.[1]) {
      includes.push(resolve(dirname(filePath), include[1].trim()))
      return
    }

    if (text.startsWith('-')) {
      logger.debug('Skipping requirements option line', { file: filePath, line: index + 1 })
      return
    }

    requirements.push({
      text: text.replace(TRAILING_OPTIONS_PATTERN, ''),
      source: `${filePath}:${index + 1}`,
    })
  })

  return { requirements, includes }
}

/**
 * Read a requirements file and everything it includes, depth-first,
 * each file at most once.
 */
export async function readRequirementsFile(
  filePath: string,
  visited: Set<string> = new Set()
): Promise<RequirementLine[]> {
  const absolute = resolve(filePath)
  if (visited.has(absolute)) return []
  visited.add(absolute)

  const content = await readFile(absolute, 'utf-8')
  const { requirements, includes } = parseRequirementsContent(content, absolute)

  const included: RequirementLine[] = []
  for (const include of includes) {
    included.push(...(await readRequirementsFile(include, visited)))
  }

  return [...included, ...requirements]
}
