import { ResourceNotFoundError, StorageError } from '../storage/errors.js'
import { baseName, resolveContentType } from '../storage/content-type.js'
import { getAccountUrl, normalizeSasToken } from '../storage/credentials.js'
import {
  ArchivedBlobError,
  DatasourceError,
  DownloadError,
  InvalidRequestError,
  NotFoundError,
  UpstreamError,
  errorMessage
} from './errors.js'

import type { BlobGateway } from '../storage/blob-gateway.js'
import type { BlobCredentials, SasTokenCredentials } from '../schemas/credentials.js'
import type { BlobMessage, DownloadFileRequest } from '../types/datasource.js'

const MiB = 1024 * 1024

export interface DownloadLimits {
  /** Blobs up to this size are read in one request */
  smallBlobMaxBytes: number
  /** Size of each ranged read for larger blobs */
  chunkBytes: number
  /** Buffered bytes that trigger a partial message */
  flushBytes: number
  /** Longest wait for SAS response headers or the next body chunk */
  sasTimeoutMs: number
}

export const DEFAULT_DOWNLOAD_LIMITS: DownloadLimits = {
  smallBlobMaxBytes: 50 * MiB,
  chunkBytes: 8 * MiB,
  flushBytes: 100 * MiB,
  sasTimeoutMs: 60_000
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface DownloadContext {
  gateway: BlobGateway
  credentials: BlobCredentials
  limits?: Partial<DownloadLimits>
  fetch?: FetchLike
}

/**
 * Split a file id into its container and blob path
 * @throws InvalidRequestError when the id has no container part
 */
export function parseFileId(fileId: string): { container: string; blobPath: string } {
  const slash = fileId.indexOf('/')
  if (slash === -1) {
    throw new InvalidRequestError('Invalid file ID format. Expected: container_name/blob_path')
  }
  return { container: fileId.slice(0, slash), blobPath: fileId.slice(slash + 1) }
}

/**
 * Download a blob as a sequence of messages. Large blobs arrive as several
 * partial messages; concatenating their payloads gives the whole blob.
 */
export async function* downloadFile(
  context: DownloadContext,
  request: DownloadFileRequest
): AsyncGenerator<BlobMessage> {
  const { gateway, credentials } = context
  const limits: DownloadLimits = { ...DEFAULT_DOWNLOAD_LIMITS, ...context.limits }
  const { container, blobPath } = parseFileId(request.id)

  try {
    console.log(`[Download] Starting download for ${request.id}`)
    const properties = await gateway.getBlobProperties(container, blobPath)

    const tier = properties.accessTier ?? ''
    if (tier.toLowerCase() === 'archive') {
      console.error(`[Download] Blob is in archive tier: ${blobPath}`)
      throw new ArchivedBlobError(blobPath)
    }

    const size = properties.size
    if (size === undefined || size < 0) {
      throw new DownloadError(`Invalid blob size: ${size}`)
    }

    const contentType = resolveContentType(blobPath, properties.contentType)
    console.log(`[Download] ${request.id}: size=${size}, type=${contentType}, tier=${tier || 'unknown'}`)

    if (credentials.auth_method === 'sas_token') {
      yield* downloadViaSas(credentials, container, blobPath, limits, context.fetch ?? fetch)
    } else if (size > limits.smallBlobMaxBytes) {
      yield* downloadLargeBlob(gateway, container, blobPath, contentType, size, limits)
    } else {
      yield* downloadSmallBlob(gateway, container, blobPath, contentType, size)
    }

    console.log(`[Download] Completed ${request.id}`)
  } catch (error) {
    if (error instanceof DatasourceError) {
      throw error
    }
    if (error instanceof ResourceNotFoundError) {
      console.error(`[Download] Blob not found: ${blobPath} in container ${container}`)
      throw new NotFoundError(`Blob '${blobPath}' not found in container '${container}'`)
    }
    if (error instanceof StorageError) {
      console.error(`[Download] Storage error for ${request.id}:`, error.message)
      throw new UpstreamError(`Failed to download blob '${blobPath}': ${error.message}`)
    }
    console.error(`[Download] Unexpected error for ${request.id}:`, error)
    throw new DownloadError(`Error downloading file: ${errorMessage(error)}`)
  }
}

async function* downloadSmallBlob(
  gateway: BlobGateway,
  container: string,
  blobPath: string,
  contentType: string,
  expectedSize: number
): AsyncGenerator<BlobMessage> {
  const content = await gateway.downloadRange(container, blobPath)

  if (content.length !== expectedSize) {
    console.warn(`[Download] Size mismatch for ${blobPath}: expected ${expectedSize}, got ${content.length}`)
  }
  if (content.length === 0) {
    throw new DownloadError(`Downloaded content is empty for blob: ${blobPath}`)
  }

  yield {
    type: 'blob',
    blob: content,
    meta: {
      file_name: baseName(blobPath),
      mime_type: contentType,
      size: content.length,
      download_success: true
    }
  }
}

async function* downloadLargeBlob(
  gateway: BlobGateway,
  container: string,
  blobPath: string,
  contentType: string,
  size: number,
  limits: DownloadLimits
): AsyncGenerator<BlobMessage> {
  const fileName = baseName(blobPath)
  let buffered: Buffer[] = []
  let bufferedBytes = 0
  let totalDownloaded = 0

  for (let offset = 0; offset < size; offset += limits.chunkBytes) {
    const count = Math.min(limits.chunkBytes, size - offset)
    const chunk = await gateway.downloadRange(container, blobPath, offset, count)
    buffered.push(chunk)
    bufferedBytes += chunk.length
    totalDownloaded += chunk.length

    if (bufferedBytes > limits.flushBytes) {
      yield {
        type: 'blob',
        blob: Buffer.concat(buffered),
        meta: { file_name: fileName, mime_type: contentType, size: bufferedBytes, is_partial: true }
      }
      buffered = []
      bufferedBytes = 0
    }
  }

  if (totalDownloaded !== size) {
    console.error(`[Download] Incomplete download of ${blobPath}: expected ${size}, got ${totalDownloaded}`)
    throw new DownloadError(`Download incomplete: expected ${size}, got ${totalDownloaded}`)
  }

  if (bufferedBytes > 0) {
    yield {
      type: 'blob',
      blob: Buffer.concat(buffered),
      meta: {
        file_name: fileName,
        mime_type: contentType,
        size: bufferedBytes,
        download_success: true,
        is_partial: false
      }
    }
  }
}

export function buildSasUrl(credentials: SasTokenCredentials, container: string, blobPath: string): string {
  const encodedPath = blobPath.split('/').map(encodeURIComponent).join('/')
  return `${getAccountUrl(credentials.account_name, credentials.endpoint_suffix)}/${encodeURIComponent(container)}/${encodedPath}${normalizeSasToken(credentials.sas_token)}`
}

/**
 * Download over plain HTTP with the SAS token, bypassing the SDK.
 * `sasTimeoutMs` bounds the wait for each response and body read, not the whole transfer.
 */
async function* downloadViaSas(
  credentials: SasTokenCredentials,
  container: string,
  blobPath: string,
  limits: DownloadLimits,
  fetchImpl: FetchLike
): AsyncGenerator<BlobMessage> {
  const controller = new AbortController()
  let idleTimer: ReturnType<typeof setTimeout> | undefined
  const armIdleTimeout = () => {
    idleTimer = setTimeout(() => {
      controller.abort(new Error(`SAS download stalled for ${limits.sasTimeoutMs}ms`))
    }, limits.sasTimeoutMs)
  }

  armIdleTimeout()
  try {
    const response = await fetchImpl(buildSasUrl(credentials, container, blobPath), {
      signal: controller.signal
    })
    clearTimeout(idleTimer)

    if (!response.ok) {
      await response.body?.cancel()
      if (response.status === 404) {
        throw new ResourceNotFoundError(`HTTP 404 ${response.statusText}`)
      }
      throw new StorageError(`HTTP ${response.status} ${response.statusText}`, response.status)
    }

    if (!response.body) {
      return
    }

    const contentType = response.headers.get('Content-Type') || 'application/octet-stream'
    const fileName = baseName(blobPath)
    const contentLength = Number.parseInt(response.headers.get('Content-Length') ?? '', 10)
    // A known small body is sent as one message
    const whole = contentLength > 0 && contentLength <= limits.smallBlobMaxBytes

    let buffered: Buffer[] = []
    let bufferedBytes = 0
    let drained = false
    const reader = response.body.getReader()

    try {
      while (true) {
        armIdleTimeout()
        const { done, value } = await reader.read().catch((error: unknown) => {
          drained = true
          throw error
        })
        // Not counted while the consumer holds a message
        clearTimeout(idleTimer)
        if (done) {
          drained = true
          break
        }
        if (value.length === 0) {
          continue
        }

        buffered.push(Buffer.from(value))
        bufferedBytes += value.length

        if (!whole && bufferedBytes >= limits.flushBytes) {
          yield {
            type: 'blob',
            blob: Buffer.concat(buffered),
            meta: { file_name: fileName, mime_type: contentType, is_partial: true }
          }
          buffered = []
          bufferedBytes = 0
        }
      }
    } finally {
      // Stopped early by the consumer; release the connection
      if (!drained) {
        await reader.cancel()
      }
    }

    if (whole) {
      const data = Buffer.concat(buffered)
      yield {
        type: 'blob',
        blob: data,
        meta: { file_name: fileName, mime_type: contentType, size: data.length }
      }
    } else if (bufferedBytes > 0) {
      yield {
        type: 'blob',
        blob: Buffer.concat(buffered),
        meta: { file_name: fileName, mime_type: contentType, is_partial: false }
      }
    }
  } finally {
    clearTimeout(idleTimer)
  }
}
