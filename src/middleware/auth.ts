import type { Context, Next } from 'hono'
import { apiKeyManager } from '../services/apikey-manager.js'
import type { ApiKey } from '../types/apikey.js'
import type { Variables } from '../types/context.js'

/**
 * Parse a comma separated key list from an environment variable
 */
export function readKeyList(value: string | undefined): string[] {
  if (!value) {
    return []
  }
  return value
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0)
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 * Returns a 401 response when the header is missing or malformed.
 */
function readBearerToken(c: Context): string | Response {
  const authHeader = c.req.header('Authorization')

  if (!authHeader) {
    return c.json({
      error: 'Unauthorized',
      message: 'Missing Authorization header'
    }, 401)
  }

  const parts = authHeader.split(' ')
  if (parts.length !== 2 || parts[0] !== 'Bearer' || parts[1].length === 0) {
    return c.json({
      error: 'Unauthorized',
      message: 'Invalid Authorization header format. Expected: Bearer <token>'
    }, 401)
  }

  return parts[1]
}

/**
 * Admin API 鉴权中间件
 * 从环境变量 ADMIN_APIKEYS 读取允许的 API 密钥列表(逗号分隔)
 */
export async function adminAuth(c: Context, next: Next) {
  const validApiKeys = readKeyList(process.env.ADMIN_APIKEYS)

  // 未配置 ADMIN_APIKEYS 时不启用鉴权
  if (validApiKeys.length === 0) {
    console.warn('[Auth] ADMIN_APIKEYS not configured, admin endpoints are unprotected!')
    await next()
    return
  }

  const token = readBearerToken(c)
  if (token instanceof Response) {
    return token
  }

  if (!validApiKeys.includes(token)) {
    return c.json({
      error: 'Unauthorized',
      message: 'Invalid API key'
    }, 401)
  }

  await next()
}

/**
 * Plugin API 鉴权中间件
 * 接受 PLUGIN_APIKEYS 中的密钥(不限容器)或注册表中的密钥
 * 验证后的 API Key 存放在 context 中供路由使用
 */
export async function pluginAuth(c: Context<{ Variables: Variables }>, next: Next) {
  const token = readBearerToken(c)
  if (token instanceof Response) {
    return token
  }

  let apiKey: ApiKey | undefined
  if (readKeyList(process.env.PLUGIN_APIKEYS).includes(token)) {
    apiKey = {
      key: token,
      description: 'PLUGIN_APIKEYS',
      containers: [],
      createdAt: new Date(0)
    }
  } else {
    try {
      apiKey = await apiKeyManager.recordUsage(token)
    } catch (error) {
      console.error('[PluginAuth] Error validating API key:', error)
      return c.json({
        error: 'Internal Server Error',
        message: 'Failed to validate API key'
      }, 500)
    }
  }

  if (!apiKey) {
    return c.json({
      error: 'Unauthorized',
      message: 'Invalid API key'
    }, 401)
  }

  c.set('apiKey', apiKey)
  await next()
}
