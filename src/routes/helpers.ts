/**
 * Helpers shared by the datasource routes
 */

import { DatasourceError, ForbiddenError } from '../datasource/errors.js'
import { apiKeyManager } from '../services/apikey-manager.js'

import type { ApiKey } from '../types/apikey.js'
import type { BrowseFilesResponse } from '../types/datasource.js'

export const ERROR_TYPES = {
  CLIENT_ERROR: 'invalid_request_error',
  AUTH_ERROR: 'authentication_error',
  PERMISSION_ERROR: 'permission_error',
  STORAGE_ERROR: 'storage_error',
  INTERNAL_ERROR: 'internal_error',
} as const

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  message: string,
  type: string,
  code: string,
  status: number
): Response {
  return new Response(
    JSON.stringify({
      error: {
        message,
        type,
        code,
      },
    }),
    { status, headers: { 'Content-Type': 'application/json' } }
  )
}

function errorTypeFor(error: DatasourceError): string {
  switch (error.code) {
    case 'invalid_credentials':
      return ERROR_TYPES.AUTH_ERROR
    case 'forbidden':
      return ERROR_TYPES.PERMISSION_ERROR
    case 'storage_error':
    case 'download_failed':
      return ERROR_TYPES.STORAGE_ERROR
    default:
      return ERROR_TYPES.CLIENT_ERROR
  }
}

/**
 * Map any thrown value to an error response
 */
export function toErrorResponse(error: unknown): Response {
  if (error instanceof DatasourceError) {
    return createErrorResponse(error.message, errorTypeFor(error), error.code, error.status)
  }
  console.error('[Datasource] Unhandled error:', error)
  return createErrorResponse('Internal server error', ERROR_TYPES.INTERNAL_ERROR, 'internal_error', 500)
}

/**
 * @throws ForbiddenError when the key may not access the container
 */
export function assertContainerAllowed(apiKey: ApiKey, container: string): void {
  if (container && !apiKeyManager.isContainerAllowed(apiKey, container)) {
    throw new ForbiddenError(`API key is not allowed to access container '${container}'`)
  }
}

/**
 * Apply a key's container restriction to a browse result.
 * Container listings are filtered; listings inside a container are checked.
 */
export function restrictToContainers(apiKey: ApiKey, response: BrowseFilesResponse): BrowseFilesResponse {
  if (apiKey.containers.length === 0) {
    return response
  }

  return {
    result: response.result.map(bucket => {
      if (bucket.bucket === '') {
        return {
          ...bucket,
          files: bucket.files.filter(file => apiKeyManager.isContainerAllowed(apiKey, file.id))
        }
      }
      assertContainerAllowed(apiKey, bucket.bucket)
      return bucket
    })
  }
}
