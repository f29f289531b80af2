/**
 * Unit tests for the round orchestrator and round 1/2 call construction.
 */

import { describe, it, expect } from 'vitest'
import { runRound, buildAnalysisCalls, buildCrossReadingCalls } from '../round-orchestrator.js'
import type { BackendClient, CompletionRequest, CompletionResult } from '../../backend/types.js'
import type { DeliberationInput, Round } from '../types.js'

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

const INPUT: DeliberationInput = {
  thesis: 'Four-day weeks raise output',
  context: null,
  backends: ['a/one', 'b/two', 'c/three'],
}

describe('runRound', () => {
  it('keeps call order regardless of completion order', async () => {
    const latency: Record<string, number> = { 'a/one': 40, 'b/two': 0, 'c/three': 15 }
    const finished: string[] = []
    const client: BackendClient = {
      async complete(request: CompletionRequest): Promise<CompletionResult> {
        await delay(latency[request.backend] ?? 0)
        finished.push(request.backend)
        return { content: `from ${request.backend}`, tokensUsed: 1 }
      },
    }

    const round = await runRound(client, 1, buildAnalysisCalls(INPUT), { temperature: 0.7 })

    expect(finished).toEqual(['b/two', 'c/three', 'a/one'])
    expect(round.round).toBe(1)
    expect(round.outputs.map((o) => o.content)).toEqual(['from a/one', 'from b/two', 'from c/three'])
    expect(round.outputs.map((o) => o.agentId)).toEqual(['agent-0', 'agent-1', 'agent-2'])
  })

  it('issues all calls before any settles', async () => {
    let inFlight = 0
    let peak = 0
    const client: BackendClient = {
      async complete(): Promise<CompletionResult> {
        inFlight++
        peak = Math.max(peak, inFlight)
        await delay(5)
        inFlight--
        return { content: 'ok', tokensUsed: 0 }
      },
    }

    await runRound(client, 1, buildAnalysisCalls(INPUT), { temperature: 0.7 })
    expect(peak).toBe(3)
  })

  it('waits for every call and keeps degraded outputs in place', async () => {
    const client: BackendClient = {
      async complete(request: CompletionRequest): Promise<CompletionResult> {
        if (request.backend === 'b/two') {
          await delay(10)
          throw new Error('upstream down')
        }
        return { content: 'fine', tokensUsed: 5 }
      },
    }

    const round = await runRound(client, 2, buildAnalysisCalls(INPUT), { temperature: 0.7 })
    expect(round.outputs).toHaveLength(3)
    expect(round.outputs.map((o) => o.degraded)).toEqual([false, true, false])
    expect(round.outputs[1]?.content).toBe('[Error: upstream down]')
  })
})

describe('buildAnalysisCalls', () => {
  const today = new Date(2025, 0, 15)

  it('creates one call per backend with a distinct role', () => {
    const calls = buildAnalysisCalls(INPUT, today)
    expect(calls.map((c) => c.backend)).toEqual(['a/one', 'b/two', 'c/three'])
    expect(calls[0]?.prompt).toContain('Your role: **Advocate**.')
    expect(calls[1]?.prompt).toContain('Your role: **Skeptic**.')
    expect(calls[2]?.prompt).toContain('Your role: **Pragmatist**.')
  })

  it('embeds thesis and date', () => {
    const prompt = buildAnalysisCalls(INPUT, today)[0]?.prompt ?? ''
    expect(prompt).toContain('You are analyzing the following thesis:\n---\nFour-day weeks raise output\n---')
    expect(prompt).toContain("Today's date: January 15, 2025")
    expect(prompt).not.toContain('**CONTEXT**')
  })

  it('embeds context when given', () => {
    const prompt = buildAnalysisCalls({ ...INPUT, context: 'Pilot data from 2024' }, today)[1]?.prompt ?? ''
    expect(prompt).toContain('**CONTEXT**\n---\nPilot data from 2024\n---')
  })
})

describe('buildCrossReadingCalls', () => {
  const round1: Round = {
    round: 1,
    outputs: [
      { agentId: 'agent-0', backend: 'a/one', content: 'Alpha analysis', tokensUsed: 1, degraded: false },
      { agentId: 'agent-1', backend: 'b/two', content: 'Beta analysis', tokensUsed: 1, degraded: false },
      { agentId: 'agent-2', backend: 'c/three', content: 'Gamma analysis', tokensUsed: 1, degraded: false },
    ],
  }

  it('shows each agent its own analysis and the others under labels', () => {
    const calls = buildCrossReadingCalls(INPUT, round1)
    const first = calls[0]?.prompt ?? ''
    expect(first).toContain('Your round 1 analysis:\n---\nAlpha analysis\n---')
    expect(first).toContain('**Agent Beta:**\n---\nBeta analysis\n---')
    expect(first).toContain('**Agent Gamma:**\n---\nGamma analysis\n---')
    expect(first).not.toContain('**Agent Alpha:**')

    const second = calls[1]?.prompt ?? ''
    expect(second).toContain('Your round 1 analysis:\n---\nBeta analysis\n---')
    expect(second).toContain('**Agent Alpha:**\n---\nAlpha analysis\n---')
    expect(second).not.toContain('**Agent Beta:**')
  })

  it('never reveals backend names', () => {
    for (const call of buildCrossReadingCalls(INPUT, round1)) {
      for (const backend of INPUT.backends) {
        expect(call.prompt).not.toContain(backend)
      }
    }
  })

  it('routes each call back to its own backend', () => {
    const calls = buildCrossReadingCalls(INPUT, round1)
    expect(calls.map((c) => [c.agentId, c.backend])).toEqual([
      ['agent-0', 'a/one'],
      ['agent-1', 'b/two'],
      ['agent-2', 'c/three'],
    ])
  })
})
