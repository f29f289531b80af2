/**
 * Prompt templates for the three deliberation rounds.
 *
 * Round 1 prompts carry a role framing and no inter-agent data. Rounds 2 and 3
 * refer to other agents only by positional label; backend names never appear.
 */

import { CONFIDENCE_LEVELS } from './types.js'

/** Anonymized labels, assigned by agent index */
export const AGENT_LABELS = ['Agent Alpha', 'Agent Beta', 'Agent Gamma'] as const

export interface AgentRole {
  name: string
  instruction: string
}

export const AGENT_ROLES: readonly AgentRole[] = [
  {
    name: 'Advocate',
    instruction:
      'Build the strongest honest case FOR the thesis. Identify the evidence, mechanisms and conditions under which it holds.',
  },
  {
    name: 'Skeptic',
    instruction:
      'Build the strongest honest case AGAINST the thesis. Look for hidden assumptions, counter-evidence and failure modes.',
  },
  {
    name: 'Pragmatist',
    instruction:
      'Assess what the thesis means in practice. Focus on trade-offs, implementation constraints and what a decision-maker should actually do.',
  },
]

export function agentLabel(index: number): string {
  return AGENT_LABELS[index] ?? `Agent ${String(index + 1)}`
}

/** Labeled content of one agent, as shown to other agents */
export interface LabeledOutput {
  label: string
  content: string
}

const MARKDOWN_INSTRUCTION = `**Format your response using Markdown:**
- Use ## headings to organize sections
- Use **bold** for key points
- Use bullet points for clarity`

function formatDate(date: Date): string {
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' })
}

function block(content: string): string {
  return `---\n${content}\n---`
}

function labeledSection(outputs: readonly LabeledOutput[]): string {
  return outputs.map((o) => `**${o.label}:**\n${block(o.content)}`).join('\n\n')
}

// ---------------------------------------------------------------------------
// Round 1: independent analysis
// ---------------------------------------------------------------------------

export function buildAnalysisPrompt(
  thesis: string,
  roleIndex: number,
  context: string | null = null,
  today: Date = new Date()
): string {
  const role = AGENT_ROLES[roleIndex % AGENT_ROLES.length]
  const parts: string[] = [`You are analyzing the following thesis:\n${block(thesis)}`]

  if (context !== null && context !== '') {
    parts.push(`**CONTEXT**\n${block(context)}`)
  }

  parts.push(`Today's date: ${formatDate(today)}`)

  if (role !== undefined) {
    parts.push(`Your role: **${role.name}**. ${role.instruction}`)
  }

  parts.push(
    [
      'Provide your independent analysis. Consider:',
      '- Strengths and weaknesses of the argument',
      '- Missing considerations',
      '- Potential risks and opportunities',
      '- Evidence that would strengthen or weaken the thesis',
      '- Key assumptions and dependencies',
      '',
      'Be thorough but concise. Focus on your highest-conviction insights.',
    ].join('\n')
  )
  parts.push(MARKDOWN_INSTRUCTION)

  return parts.join('\n\n')
}

// ---------------------------------------------------------------------------
// Round 2: cross-reading
// ---------------------------------------------------------------------------

export function buildCrossReadingPrompt(
  thesis: string,
  ownAnalysis: string,
  others: readonly LabeledOutput[]
): string {
  return [
    `Original thesis:\n${block(thesis)}`,
    `Your round 1 analysis:\n${block(ownAnalysis)}`,
    `Other agents' analyses:\n\n${labeledSection(others)}`,
    [
      'Review the other analyses and identify:',
      '1. **Points of agreement** - Where do all analyses converge?',
      '2. **Points of disagreement** - Where do analyses diverge? Why?',
      '3. **New considerations** - What did others raise that you find compelling?',
      '4. **Rebuttals** - What do you disagree with and why?',
    ].join('\n'),
    MARKDOWN_INSTRUCTION,
  ].join('\n\n')
}

// ---------------------------------------------------------------------------
// Round 3: synthesis
// ---------------------------------------------------------------------------

const CONFIDENCE_CHOICES = CONFIDENCE_LEVELS.map((c) => `"${c}"`).join(' | ')

const SYNTHESIS_SCHEMA = `\`\`\`json
{
  "verdict": "Your clear, actionable verdict on the thesis, 3-4 sentences with its key qualifications.",
  "confidence": ${CONFIDENCE_CHOICES},
  "reasoning": "A substantial paragraph (150-250 words) that synthesizes the key arguments, weighs them and justifies the confidence level.",
  "key_agreements": [
    "A specific point all agents agreed on and why it matters"
  ],
  "concerns": [
    "A risk or limitation of the verdict"
  ],
  "strongest_agreement": "The single point the agents agreed on most strongly",
  "open_questions": [
    "An unresolved issue that matters most"
  ],
  "divergences": [
    {
      "topic": "Specific topic of disagreement",
      "description": "What the disagreement is about and what is at stake (2-3 sentences)",
      "positions": [
        {"agent": "Agent Alpha", "view": "This agent's position with its reasoning", "confidence": "high|medium|low"},
        {"agent": "Agent Beta", "view": "This agent's position with its reasoning", "confidence": "high|medium|low"}
      ]
    }
  ]
}
\`\`\``

export function buildSynthesisPrompt(thesis: string, outputs: readonly LabeledOutput[]): string {
  return [
    `Original thesis:\n${block(thesis)}`,
    `All round 2 outputs (after cross-reading):\n\n${labeledSection(outputs)}`,
    'Synthesize the deliberation into a comprehensive final verdict.',
    'Provide DETAILED, SUBSTANTIVE responses. Do not summarize or abbreviate.',
    `Your response MUST end with a structured JSON block in exactly this format:\n\n${SYNTHESIS_SCHEMA}`,
    'Include every divergence that exists, each with the position of every agent involved.',
    'First, write your synthesis narrative, then end with the JSON block.',
    MARKDOWN_INSTRUCTION,
  ].join('\n\n')
}
