import type { ApiKey } from './apikey.js'

/**
 * Custom context variables for Hono
 * Set by the plugin auth middleware via c.set()
 */
export type Variables = {
  apiKey: ApiKey
}
