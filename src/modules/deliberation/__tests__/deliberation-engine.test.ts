/**
 * Unit tests for DeliberationEngineImpl.
 */

import { describe, it, expect, vi } from 'vitest'
import { createDeliberationEngine, ROUND_MESSAGES } from '../deliberation-engine-impl.js'
import type { BackendClient, CompletionRequest, CompletionResult } from '../../backend/types.js'
import type { DeliberationInput } from '../types.js'
import { DeliberationInputError } from '../../../core/errors.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { DeliberationEvents } from '../../../core/event-bus.types.js'

// ---------------------------------------------------------------------------
// Scripted backend
// ---------------------------------------------------------------------------

const BACKENDS = ['a/one', 'b/two', 'c/three'] as const

const ROUND1_TOKENS: Record<string, number> = { 'a/one': 10, 'b/two': 20, 'c/three': 30 }
const ROUND2_TOKENS: Record<string, number> = { 'a/one': 11, 'b/two': 21, 'c/three': 31 }
const SYNTHESIS_TOKENS = 100

const SYNTHESIS_TEXT = [
  'The agents converged on a qualified yes.',
  '',
  '```json',
  JSON.stringify({
    verdict: 'Remote work raises individual productivity but strains collaboration.',
    confidence: 'medium',
    reasoning: 'Individual output improves; team output depends on process.',
    key_agreements: ['Fewer interruptions'],
    concerns: ['Mentoring gaps'],
    divergences: [],
    strongest_agreement: 'Focus time increases',
    open_questions: ['Does it hold at scale?'],
  }),
  '```',
].join('\n')

type RoundKind = 'analysis' | 'cross-reading' | 'synthesis'

function roundOf(prompt: string): RoundKind {
  if (prompt.includes('All round 2 outputs')) return 'synthesis'
  if (prompt.includes('Your round 1 analysis')) return 'cross-reading'
  return 'analysis'
}

interface ScriptedBackend {
  client: BackendClient
  requests: CompletionRequest[]
  log: string[]
}

function scriptedBackend(options: { failing?: string[]; synthesis?: string } = {}): ScriptedBackend {
  const requests: CompletionRequest[] = []
  const log: string[] = []
  const failing = new Set(options.failing ?? [])

  const client: BackendClient = {
    async complete(request: CompletionRequest): Promise<CompletionResult> {
      requests.push(request)
      const kind = roundOf(request.prompt)
      log.push(`${kind}:${request.backend}`)
      if (failing.has(request.backend)) {
        throw new Error(`${request.backend} is down`)
      }
      switch (kind) {
        case 'analysis':
          return { content: `analysis by ${request.backend}`, tokensUsed: ROUND1_TOKENS[request.backend] ?? 0 }
        case 'cross-reading':
          return { content: `cross-reading by ${request.backend}`, tokensUsed: ROUND2_TOKENS[request.backend] ?? 0 }
        case 'synthesis':
          return { content: options.synthesis ?? SYNTHESIS_TEXT, tokensUsed: SYNTHESIS_TOKENS }
      }
    },
  }
  return { client, requests, log }
}

const INPUT: DeliberationInput = {
  thesis: 'Remote work increases productivity',
  context: null,
  backends: BACKENDS,
}

// ---------------------------------------------------------------------------
// End-to-end protocol
// ---------------------------------------------------------------------------

describe('DeliberationEngine: protocol', () => {
  it('issues 3 + 3 + 1 calls and sums their tokens', async () => {
    const backend = scriptedBackend()
    const engine = createDeliberationEngine({ client: backend.client })

    const result = await engine.run(INPUT)

    expect(backend.requests).toHaveLength(7)
    expect(result.roundsCompleted).toBe(3)
    expect(result.tokensUsed).toBe(10 + 20 + 30 + 11 + 21 + 31 + 100)
    expect(result.verdict).toBe('Remote work raises individual productivity but strains collaboration.')
    expect(result.confidence).toBe('medium')
    expect(result.keyAgreements).toEqual(['Fewer interruptions'])
  })

  it('runs the rounds in order with a barrier between them', async () => {
    const backend = scriptedBackend()
    await createDeliberationEngine({ client: backend.client }).run(INPUT)

    const kinds = backend.log.map((entry) => entry.split(':')[0])
    expect(kinds).toEqual([
      'analysis',
      'analysis',
      'analysis',
      'cross-reading',
      'cross-reading',
      'cross-reading',
      'synthesis',
    ])
  })

  it('sends the synthesis to the first backend at the synthesis temperature', async () => {
    const backend = scriptedBackend()
    await createDeliberationEngine({ client: backend.client }).run(INPUT)

    const synthesis = backend.requests[6]
    expect(synthesis?.backend).toBe('a/one')
    expect(synthesis?.temperature).toBe(0.5)
    expect(synthesis?.maxOutputTokens).toBe(4096)
    expect(synthesis?.prompt).toContain('**Agent Alpha:**\n---\ncross-reading by a/one\n---')
    expect(synthesis?.prompt).toContain('**Agent Beta:**\n---\ncross-reading by b/two\n---')
    expect(synthesis?.prompt).toContain('**Agent Gamma:**\n---\ncross-reading by c/three\n---')
    expect(backend.requests.slice(0, 6).every((r) => r.temperature === 0.7)).toBe(true)
  })

  it('applies configured sampling settings', async () => {
    const backend = scriptedBackend()
    const engine = createDeliberationEngine({
      client: backend.client,
      settings: { analysis_temperature: 0.9, synthesis_temperature: 0.1, max_output_tokens: 1000 },
    })
    await engine.run(INPUT)

    expect(backend.requests[0]?.temperature).toBe(0.9)
    expect(backend.requests[6]?.temperature).toBe(0.1)
    expect(backend.requests.every((r) => r.maxOutputTokens === 1000)).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

describe('DeliberationEngine: progress', () => {
  it('reports each round before it starts', async () => {
    const backend = scriptedBackend()
    const onProgress = vi.fn((round: number) => {
      backend.log.push(`progress:${String(round)}`)
    })

    await createDeliberationEngine({ client: backend.client }).run(INPUT, onProgress)

    expect(onProgress.mock.calls).toEqual([
      [1, 'Running independent analysis...'],
      [2, 'Running cross-reading...'],
      [3, 'Synthesizing results...'],
    ])
    expect(backend.log.filter((e) => e.startsWith('progress')).length).toBe(3)
    expect(backend.log[0]).toBe('progress:1')
    expect(backend.log[4]).toBe('progress:2')
    expect(backend.log[8]).toBe('progress:3')
  })

  it('awaits an async progress callback', async () => {
    const backend = scriptedBackend()
    const onProgress = async (round: number): Promise<void> => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      backend.log.push(`progress:${String(round)}`)
    }

    await createDeliberationEngine({ client: backend.client }).run(INPUT, onProgress)

    expect(backend.log[0]).toBe('progress:1')
    expect(backend.log[4]).toBe('progress:2')
  })

  it('exposes the round messages', () => {
    expect(ROUND_MESSAGES).toEqual({
      1: 'Running independent analysis...',
      2: 'Running cross-reading...',
      3: 'Synthesizing results...',
    })
  })
})

// ---------------------------------------------------------------------------
// Degradation
// ---------------------------------------------------------------------------

describe('DeliberationEngine: failing backends', () => {
  it('completes when one backend fails, counting 0 tokens for its calls', async () => {
    const backend = scriptedBackend({ failing: ['b/two'] })
    const result = await createDeliberationEngine({ client: backend.client }).run(INPUT)

    expect(backend.requests).toHaveLength(7)
    expect(result.roundsCompleted).toBe(3)
    expect(result.tokensUsed).toBe(10 + 30 + 11 + 31 + 100)
  })

  it('shows the error placeholder to other agents in round 2', async () => {
    const backend = scriptedBackend({ failing: ['b/two'] })
    await createDeliberationEngine({ client: backend.client }).run(INPUT)

    const alphaCrossReading = backend.requests[3]?.prompt ?? ''
    expect(alphaCrossReading).toContain('**Agent Beta:**\n---\n[Error: b/two is down]\n---')
  })

  it('falls back to the error placeholder when the synthesis backend fails', async () => {
    const backend = scriptedBackend({ failing: ['a/one'] })
    const result = await createDeliberationEngine({ client: backend.client }).run(INPUT)

    expect(result.verdict).toBe('[Error: a/one is down]')
    expect(result.confidence).toBe('medium')
    expect(result.tokensUsed).toBe(20 + 30 + 21 + 31)
    expect(result.roundsCompleted).toBe(3)
  })

  it('uses the first paragraph when the synthesis has no JSON', async () => {
    const prose = `${'p'.repeat(520)}\n\nSecond paragraph.`
    const backend = scriptedBackend({ synthesis: prose })
    const result = await createDeliberationEngine({ client: backend.client }).run(INPUT)

    expect(result.verdict).toBe('p'.repeat(500))
    expect(result.confidence).toBe('medium')
    expect(result.keyAgreements).toEqual([])
    expect(result.concerns).toEqual([])
    expect(result.divergences).toEqual([])
    expect(result.openQuestions).toEqual([])
    expect(result.roundsCompleted).toBe(3)
  })
})

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

describe('DeliberationEngine: input validation', () => {
  it('rejects an empty thesis before any round', async () => {
    const backend = scriptedBackend()
    const onProgress = vi.fn()
    const engine = createDeliberationEngine({ client: backend.client })

    await expect(engine.run({ ...INPUT, thesis: '   ' }, onProgress)).rejects.toThrow(DeliberationInputError)
    expect(backend.requests).toHaveLength(0)
    expect(onProgress).not.toHaveBeenCalled()
  })

  it('passes the thesis to the agents as submitted', async () => {
    const backend = scriptedBackend()
    await createDeliberationEngine({ client: backend.client }).run({ ...INPUT, thesis: '  Remote work wins  ' })

    expect(backend.requests[0]?.prompt).toContain('---\n  Remote work wins  \n---')
    expect(backend.requests[6]?.prompt).toContain('---\n  Remote work wins  \n---')
  })

  it('rejects an empty backend identifier', async () => {
    const backend = scriptedBackend()
    const engine = createDeliberationEngine({ client: backend.client })

    await expect(engine.run({ ...INPUT, backends: ['a/one', '', 'c/three'] })).rejects.toThrow(
      /Invalid deliberation input: backends\.1/
    )
  })
})

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

describe('DeliberationEngine: events', () => {
  it('emits round:complete after each round', async () => {
    const bus = createEventBus()
    const events: DeliberationEvents['round:complete'][] = []
    bus.on('round:complete', (payload) => events.push(payload))
    const backend = scriptedBackend({ failing: ['c/three'] })

    await createDeliberationEngine({ client: backend.client, eventBus: bus }).run(INPUT)

    expect(events).toEqual([
      { round: 1, agents: 3, degraded: 1, tokensUsed: 30 },
      { round: 2, agents: 3, degraded: 1, tokensUsed: 32 },
      { round: 3, agents: 1, degraded: 0, tokensUsed: 100 },
    ])
  })
})
