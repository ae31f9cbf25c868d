import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { apiKeyManager, maskApiKey } from '../services/apikey-manager.js'
import { datasourceMetrics } from '../services/metrics.js'
import { errorMessage } from '../datasource/errors.js'
import {
  createApiKeySchema,
  updateApiKeySchema,
  apiKeyParamSchema
} from '../schemas/apikey.js'

import type { ApiKey } from '../types/apikey.js'

const admin = new Hono()

function toMaskedApiKey(apiKey: ApiKey): ApiKey {
  return { ...apiKey, key: maskApiKey(apiKey.key) }
}

// ===== API Key Endpoints =====

// GET /admin/apikeys - List all API keys (masked)
admin.get('/apikeys', (c) => {
  const apiKeys = apiKeyManager.getAllApiKeys().map(toMaskedApiKey)
  return c.json({ apiKeys })
})

// GET /admin/apikeys/:key - Get a specific API key (masked)
admin.get(
  '/apikeys/:key',
  zValidator('param', apiKeyParamSchema),
  (c) => {
    const { key } = c.req.valid('param')
    const apiKey = apiKeyManager.getApiKey(key)

    if (!apiKey) {
      return c.json({ error: 'API key not found' }, 404)
    }

    return c.json({ apiKey: toMaskedApiKey(apiKey) })
  }
)

// POST /admin/apikeys - Create an API key; the full key is only returned here
admin.post(
  '/apikeys',
  zValidator('json', createApiKeySchema),
  async (c) => {
    const body = c.req.valid('json')
    try {
      const apiKey = await apiKeyManager.createApiKey(body)
      return c.json({ apiKey }, 201)
    } catch (error) {
      return c.json({ error: errorMessage(error) }, 409)
    }
  }
)

// PUT /admin/apikeys/:key - Update description or container list
admin.put(
  '/apikeys/:key',
  zValidator('param', apiKeyParamSchema),
  zValidator('json', updateApiKeySchema),
  async (c) => {
    const { key } = c.req.valid('param')
    const updates = c.req.valid('json')

    if (!apiKeyManager.getApiKey(key)) {
      return c.json({ error: 'API key not found' }, 404)
    }

    const apiKey = await apiKeyManager.updateApiKey(key, updates)
    return c.json({ apiKey: toMaskedApiKey(apiKey) })
  }
)

// DELETE /admin/apikeys/:key - Delete an API key
admin.delete(
  '/apikeys/:key',
  zValidator('param', apiKeyParamSchema),
  async (c) => {
    const { key } = c.req.valid('param')
    const deleted = await apiKeyManager.deleteApiKey(key)

    if (!deleted) {
      return c.json({ error: 'API key not found' }, 404)
    }

    return c.json({ message: 'API key deleted successfully' })
  }
)

// ===== Metrics =====

// GET /admin/metrics - Get Prometheus metrics
admin.get('/metrics', async (c) => {
  const metrics = await datasourceMetrics.getMetrics()
  return c.text(metrics, 200, {
    'Content-Type': datasourceMetrics.getContentType()
  })
})

export default admin
