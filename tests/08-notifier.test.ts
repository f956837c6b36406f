/**
 * Segment 08: Notifier Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { createHttpNotifier, DeliveryFailureError } from '../src/notifier'

function setup(baseUrl = 'http://agents.test') {
  const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }))
  const notifier = createHttpNotifier({ baseUrl, token: 'test-secret', timeoutMs: 1000, fetch: fetchMock })
  return { fetchMock, notifier }
}

describe('HTTP Notifier', () => {
  it('posts the message to the agent endpoint', async () => {
    const { fetchMock, notifier } = setup()
    const result = await notifier.notify('agent-1', 'Reminder (2024-03-15 10:30:00): Take meds')

    expect(result.ok).toBe(true)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock).toHaveBeenCalledWith(
      'http://agents.test/agents/agent-1/messages',
      expect.objectContaining({
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
        },
        body: '{"message":"Reminder (2024-03-15 10:30:00): Take meds"}',
        signal: expect.any(AbortSignal),
      }),
    )
  })

  it('encodes the agent id into the path', async () => {
    const { fetchMock, notifier } = setup()
    await notifier.notify('team 7/bot', 'hi')
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://agents.test/agents/team%207%2Fbot/messages')
  })

  it('strips trailing slashes from the base URL', async () => {
    const { fetchMock, notifier } = setup('http://agents.test/api//')
    await notifier.notify('agent-1', 'hi')
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://agents.test/api/agents/agent-1/messages')
  })

  it('reports a rejected message with its status', async () => {
    const { fetchMock, notifier } = setup()
    fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500, statusText: 'Internal Server Error' }))

    const result = await notifier.notify('agent-1', 'hi')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DeliveryFailureError)
      expect(result.error.message).toBe("Agent server rejected message for agent 'agent-1': 500 Internal Server Error")
      expect(result.error.status).toBe(500)
    }
  })

  it('reports an unreachable server without throwing', async () => {
    const { fetchMock, notifier } = setup()
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))

    const result = await notifier.notify('agent-1', 'hi')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to reach agent server at http://agents.test: fetch failed')
      expect(result.error.status).toBeNull()
    }
  })
})
