/**
 * DeliberationEngine interface definition.
 *
 * A deliberation runs a thesis through three fixed rounds against three
 * backends and reduces the outcome to a structured verdict.
 */

import type { DeliberationInput, DeliberationResult, ProgressCallback } from './types.js'

export interface DeliberationEngine {
  /**
   * Run the independent analysis, cross-reading and synthesis rounds.
   *
   * `onProgress` is awaited once before each round.
   *
   * @throws {DeliberationInputError} before round 1 when the input is invalid.
   */
  run(input: DeliberationInput, onProgress?: ProgressCallback): Promise<DeliberationResult>
}
