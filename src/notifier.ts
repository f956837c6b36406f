/**
 * Notifier
 *
 * Delivers a text message to an agent. The HTTP implementation posts to the
 * agent server's message endpoint; failures come back as values so a fire
 * never throws because delivery did.
 */

import { type Result, Ok, Err } from './result'
import { DeliveryFailureError } from './errors'

export { DeliveryFailureError }

// ============================================================================
// Interface
// ============================================================================

export interface Notifier {
  notify(agentId: string, text: string): Promise<Result<void, DeliveryFailureError>>
}

// ============================================================================
// HTTP Notifier
// ============================================================================

export type HttpNotifierConfig = {
  /** Agent server base URL, without a trailing slash */
  baseUrl: string
  token: string
  timeoutMs: number
  /** Injected for tests */
  fetch?: typeof fetch
}

export function createHttpNotifier(config: HttpNotifierConfig): Notifier {
  const baseUrl = config.baseUrl.replace(/\/+$/, '')
  const doFetch = config.fetch ?? fetch

  return {
    async notify(agentId, text) {
      const url = `${baseUrl}/agents/${encodeURIComponent(agentId)}/messages`
      let response: Response
      try {
        response = await doFetch(url, {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            Authorization: `Bearer ${config.token}`,
          },
          body: JSON.stringify({ message: text }),
          signal: AbortSignal.timeout(config.timeoutMs),
        })
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e)
        return Err(new DeliveryFailureError(`Failed to reach agent server at ${baseUrl}: ${reason}`))
      }

      if (!response.ok) {
        return Err(new DeliveryFailureError(
          `Agent server rejected message for agent '${agentId}': ${response.status} ${response.statusText}`,
          response.status,
        ))
      }
      return Ok(undefined)
    },
  }
}
