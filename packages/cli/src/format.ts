/**
 * Terminal formatting of engine results.
 */

import chalk from 'chalk'

import {
  type ApplyResult,
  type Finding,
  type Plan,
  type Severity,
  describeAction,
  failedOutcome,
  pendingActions,
  succeededActions,
} from '@envsync/core'
import type { ApplyProgressEvent } from '@envsync/engine'

function severityIcon(severity: Severity): string {
  switch (severity) {
    case 'error':
      return chalk.red('✗')
    case 'warning':
      return chalk.yellow('!')
    case 'info':
      return chalk.cyan('•')
  }
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`
}

function indent(text: string, prefix = '    '): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n')
}

/**
 * One progress line per action event; noop actions print nothing.
 */
export function formatProgress(event: ApplyProgressEvent): string | undefined {
  if (event.type === 'action-start') {
    if (event.action.kind === 'noop') return undefined
    return chalk.blue(`[${event.index + 1}/${event.total}] ${describeAction(event.action)}...`)
  }

  const { outcome } = event
  if (outcome.action.kind === 'noop') return undefined
  if (outcome.status === 'succeeded') {
    return chalk.green(`  ✓ done (${formatDuration(outcome.durationMs)})`)
  }
  return chalk.red(`  ✗ failed\n${indent(outcome.reason ?? 'unknown error')}`)
}

/**
 * Numbered list of the actions a plan would take.
 */
export function formatPlan(plan: Plan): string[] {
  const pending = pendingActions(plan)
  if (pending.length === 0) return ['Already converged, nothing to do']
  return [
    `Plan (${plural(pending.length, 'action')}):`,
    ...pending.map((action, i) => `  ${i + 1}. ${describeAction(action)}`),
  ]
}

/**
 * Explain an apply that did not converge: what failed and why, what was
 * already done, and what was left.
 */
export function formatApplyFailure(result: ApplyResult): string[] {
  const lines: string[] = []

  const failed = failedOutcome(result)
  if (failed) {
    lines.push(chalk.red(`Failed: ${describeAction(failed.action)}`))
    lines.push(indent(failed.reason ?? 'unknown error', '  '))
  } else if (result.cancelled) {
    lines.push(chalk.yellow('Cancelled'))
  }

  const completed = succeededActions(result)
  if (completed.length > 0) {
    lines.push('Completed:')
    lines.push(...completed.map((action) => chalk.green(`  ✓ ${describeAction(action)}`)))
  }

  const skipped = result.outcomes.filter(
    (outcome) => outcome.status === 'skipped' && outcome.action.kind !== 'noop'
  )
  if (skipped.length > 0) {
    lines.push('Not attempted:')
    lines.push(...skipped.map((outcome) => chalk.gray(`  - ${describeAction(outcome.action)}`)))
  }

  return lines
}

export function formatFinding(finding: Finding): string[] {
  const lines = [`${severityIcon(finding.severity)} ${finding.message}`]
  if (finding.suggestedAction) {
    lines.push(chalk.gray(`  → ${finding.suggestedAction}`))
  }
  return lines
}

export function formatFindingSummary(findings: readonly Finding[]): string {
  const count = (severity: Severity) => findings.filter((f) => f.severity === severity).length
  return `${plural(count('error'), 'error')}, ${plural(count('warning'), 'warning')}`
}
