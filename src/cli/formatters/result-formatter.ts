/**
 * Markdown rendering of deliberation results and job summaries.
 */

import type { DeliberationResult } from '../../modules/deliberation/types.js'
import type { Job } from '../../modules/job-runner/index.js'
import { preview } from '../../utils/helpers.js'
import { formatTable } from '../utils/formatting.js'

function bulletList(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`)
}

/**
 * Render a result as a Markdown report.
 *
 * Verdict, confidence and reasoning are always present; list sections are
 * only emitted when they have entries.
 */
export function renderResultMarkdown(result: DeliberationResult): string {
  const lines: string[] = [
    '## Verdict',
    result.verdict,
    '',
    `**Confidence**: ${result.confidence}`,
    '',
    '## Reasoning',
    result.reasoning,
  ]

  if (result.keyAgreements.length > 0) {
    lines.push('', '## Key Agreements', ...bulletList(result.keyAgreements))
  }

  if (result.concerns.length > 0) {
    lines.push('', '## Concerns', ...bulletList(result.concerns))
  }

  if (result.divergences.length > 0) {
    lines.push('', '## Divergences')
    for (const divergence of result.divergences) {
      lines.push('', `### ${divergence.topic}`, divergence.description)
      for (const position of divergence.positions) {
        lines.push(`- **${position.agent}**: ${position.view} (confidence: ${position.confidence})`)
      }
    }
  }

  if (result.strongestAgreement !== '') {
    lines.push('', '## Strongest Agreement', result.strongestAgreement)
  }

  if (result.openQuestions.length > 0) {
    lines.push('', '## Open Questions', ...bulletList(result.openQuestions))
  }

  lines.push(
    '',
    '---',
    `*Tokens used: ${String(result.tokensUsed)} | Rounds: ${String(result.roundsCompleted)}*`
  )
  return lines.join('\n')
}

/**
 * Render one job: a header block, then the result or the failure.
 */
export function renderJobHuman(job: Job): string {
  const lines: string[] = [
    `Job ${job.id}  Status: ${job.status}`,
    `Thesis: ${job.thesis}`,
  ]
  if (job.context !== null) lines.push(`Context: ${job.context}`)
  lines.push(`Models: ${job.backends.join(', ')}`)
  lines.push(`Created: ${job.createdAt}`)
  if (job.completedAt !== null) lines.push(`Completed: ${job.completedAt}`)
  if (job.status === 'running' && job.currentRound !== null) {
    lines.push(`Round: ${String(job.currentRound)}/3`)
  }

  if (job.result !== null) {
    lines.push('', renderResultMarkdown(job.result))
  } else if (job.error !== null) {
    lines.push('', `Error: ${job.error}`)
  }
  return lines.join('\n')
}

/**
 * Render the job list as an aligned table.
 */
export function renderJobTable(jobs: readonly Job[]): string {
  const headers = ['ID', 'Status', 'Round', 'Tokens', 'Created', 'Thesis']
  const keys = ['id', 'status', 'round', 'tokens', 'created', 'thesis']
  const rows: Record<string, string>[] = jobs.map((job) => ({
    id: job.id,
    status: job.status,
    round: job.currentRound === null ? '-' : String(job.currentRound),
    tokens: String(job.tokensUsed),
    created: job.createdAt,
    thesis: preview(job.thesis, 40),
  }))
  return formatTable(headers, rows, keys)
}
