/**
 * Network settings for archon.gg requests, resolved once per run from config
 * and handed to `createTextRequest()`.
 *
 * Never log these values; a proxy URL may carry credentials.
 */

import type { ToolConfig } from '../config/config.js'

export const DEFAULT_USER_AGENT = 'archon-build-sync'

export interface NetworkOptions {
  userAgent: string
  /** Prefix put in front of every request URL, e.g. "https://mirror.example/". */
  mirror?: string
  /** HTTP proxy (CONNECT for HTTPS), normalized to a URL. */
  httpProxy?: string
}

/** "127.0.0.1:10809" -> "http://127.0.0.1:10809" */
export function normalizeHttpProxy(raw: string | undefined): string | undefined {
  const t = raw?.trim()
  if (!t) return undefined
  return /^https?:\/\//i.test(t) ? t : `http://${t}`
}

export function networkOptions(config?: ToolConfig | null): NetworkOptions {
  const net = config?.network
  return {
    userAgent: net?.userAgent || DEFAULT_USER_AGENT,
    mirror: net?.mirror,
    httpProxy: normalizeHttpProxy(net?.httpProxy)
  }
}

/** URL actually requested for `url`: unchanged, or behind the mirror prefix. */
export function requestUrl(url: string, net: Pick<NetworkOptions, 'mirror'>): string {
  return net.mirror ? `${net.mirror}${url}` : url
}
