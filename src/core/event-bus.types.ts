/**
 * DeliberationEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "job:started", "round:complete")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { RoundNumber } from '../modules/deliberation/types.js'

/**
 * Complete typed map of all events emitted on the deliberation event bus.
 * Use `keyof DeliberationEvents` to constrain event keys.
 */
export interface DeliberationEvents {
  // -------------------------------------------------------------------------
  // Job lifecycle events
  // -------------------------------------------------------------------------

  /** A job was accepted and stored with status pending */
  'job:submitted': { jobId: string; thesis: string; backends: string[] }

  /** The runner picked the job up and the deliberation engine is starting */
  'job:started': { jobId: string }

  /** The engine is about to start a round */
  'job:progress': { jobId: string; round: RoundNumber; message: string }

  /** The deliberation finished and the result was stored */
  'job:completed': { jobId: string; tokensUsed: number; roundsCompleted: number }

  /** The deliberation raised and the job was recorded as failed */
  'job:failed': { jobId: string; error: string }

  // -------------------------------------------------------------------------
  // Round events
  // -------------------------------------------------------------------------

  /** Every call of a round has settled */
  'round:complete': { round: RoundNumber; agents: number; degraded: number; tokensUsed: number }
}
