/**
 * Text GET for archon.gg pages: user agent, optional mirror prefix, optional
 * HTTP proxy and a per-request timeout. No retries; a failed request is
 * reported to the caller as-is.
 */

import { fetch, ProxyAgent, type Dispatcher } from 'undici'
import { requestUrl, type NetworkOptions } from './network.js'

export interface HttpTextResponse {
  url: string
  status: number
  statusText: string
  ok: boolean
  body: string
}

/** Signature of the transport used by the fetcher; tests inject their own. */
export type TextRequest = (url: string, timeoutMs: number) => Promise<HttpTextResponse>

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`timed out after ${timeoutMs} ms`)
    this.name = 'RequestTimeoutError'
  }
}

/**
 * Build the request function for one run.
 *
 * The returned function resolves for any HTTP status and rejects on transport
 * failure or timeout. A timeout aborts only its own request. `dispatcher`
 * replaces the proxy agent (tests pass an undici `MockAgent`).
 */
export function createTextRequest(net: NetworkOptions, dispatcher?: Dispatcher): TextRequest {
  const agent = dispatcher ?? (net.httpProxy ? new ProxyAgent(net.httpProxy) : undefined)

  return async (url, timeoutMs) => {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const res = await fetch(requestUrl(url, net), {
        headers: { 'User-Agent': net.userAgent, Accept: 'text/html' },
        signal: controller.signal,
        dispatcher: agent
      })
      const body = await res.text()
      return { url, status: res.status, statusText: res.statusText, ok: res.ok, body }
    } catch (err) {
      if (controller.signal.aborted) throw new RequestTimeoutError(url, timeoutMs)
      throw err
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
