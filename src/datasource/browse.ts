import { ResourceNotFoundError, StorageError } from '../storage/errors.js'
import { resolveContentType } from '../storage/content-type.js'
import { DatasourceError, NotFoundError, UpstreamError, errorMessage } from './errors.js'

import type { BlobGateway, BlobSummary, HierarchyItem, Page } from '../storage/blob-gateway.js'
import type {
  BrowseFilesRequest,
  BrowseFilesResponse,
  NextPageParameters,
  OnlineDriveFile
} from '../types/datasource.js'

export const DEFAULT_MAX_KEYS = 100

/**
 * Browse containers, or the virtual directories and blobs one level under a prefix.
 */
export async function browseFiles(gateway: BlobGateway, request: BrowseFilesRequest): Promise<BrowseFilesResponse> {
  let bucket = request.bucket ?? ''
  let prefix = request.prefix ?? ''
  const maxKeys = request.max_keys ?? DEFAULT_MAX_KEYS
  const continuationToken = request.next_page_parameters?.continuation_token

  // Some hosts send the container as the first segment of the prefix
  if (!bucket && prefix) {
    const resolved = await resolveContainerFromPrefix(gateway, prefix)
    if (resolved) {
      bucket = resolved.container
      prefix = resolved.prefix
    }
  }

  try {
    if (!bucket) {
      return await listContainers(gateway, maxKeys, continuationToken)
    }
    return await listBlobsInContainer(gateway, bucket, prefix, maxKeys, continuationToken)
  } catch (error) {
    if (error instanceof DatasourceError) {
      throw error
    }
    if (error instanceof ResourceNotFoundError) {
      throw new NotFoundError(bucket ? `Container '${bucket}' not found` : 'Storage account not accessible')
    }
    if (error instanceof StorageError) {
      throw new UpstreamError(`Azure Blob Storage error: ${error.message}`)
    }
    throw new DatasourceError(`Failed to browse Azure Blob Storage: ${errorMessage(error)}`, 500, 'storage_error')
  }
}

async function resolveContainerFromPrefix(
  gateway: BlobGateway,
  prefix: string
): Promise<{ container: string; prefix: string } | null> {
  const parts = prefix.replace(/^\/+|\/+$/g, '').split('/')
  const candidate = parts[0]
  if (!candidate) {
    return null
  }

  let remaining = parts.slice(1).join('/')
  if (remaining && prefix.endsWith('/')) {
    remaining += '/'
  }

  try {
    if (await gateway.containerExists(candidate)) {
      return { container: candidate, prefix: remaining }
    }
  } catch (error) {
    console.warn(`[Browse] Could not check container '${candidate}' from prefix, browsing as given:`, errorMessage(error))
  }
  return null
}

function nextPage(continuationToken: string | undefined): { is_truncated: boolean; next_page_parameters: NextPageParameters } {
  return continuationToken
    ? { is_truncated: true, next_page_parameters: { continuation_token: continuationToken } }
    : { is_truncated: false, next_page_parameters: {} }
}

async function listContainers(
  gateway: BlobGateway,
  maxKeys: number,
  continuationToken: string | undefined
): Promise<BrowseFilesResponse> {
  const page = await gateway.listContainers({ continuationToken, maxPageSize: maxKeys })

  const files: OnlineDriveFile[] = page.items.map((container): OnlineDriveFile => ({
    id: container.name,
    name: container.name,
    size: 0,
    type: 'folder',
    metadata: {
      container_name: container.name,
      last_modified: container.lastModified ? container.lastModified.toISOString() : '',
      etag: container.etag ?? '',
      public_access: container.publicAccess ?? 'none',
      has_immutability_policy: container.hasImmutabilityPolicy ?? false,
      has_legal_hold: container.hasLegalHold ?? false
    }
  }))

  return {
    result: [{ bucket: '', files, ...nextPage(page.continuationToken) }]
  }
}

function isFolder(item: HierarchyItem): boolean {
  return item.kind === 'prefix' || (item.name.endsWith('/') && (item.size ?? 0) === 0)
}

function toFileEntry(container: string, item: BlobSummary, displayName: string): OnlineDriveFile {
  return {
    id: `${container}/${item.name}`,
    name: displayName,
    size: item.size ?? 0,
    type: 'file',
    metadata: {
      container_name: container,
      blob_path: item.name,
      content_type: resolveContentType(item.name, item.contentType),
      last_modified: item.lastModified ? item.lastModified.toISOString() : '',
      etag: item.etag ?? '',
      blob_tier: item.accessTier ?? 'Unknown',
      creation_time: item.createdOn ? item.createdOn.toISOString() : '',
      server_encrypted: item.serverEncrypted ?? false,
      metadata: item.metadata ?? {}
    }
  }
}

async function listBlobsInContainer(
  gateway: BlobGateway,
  container: string,
  prefix: string,
  maxKeys: number,
  continuationToken: string | undefined
): Promise<BrowseFilesResponse> {
  let page: Page<HierarchyItem>
  try {
    page = await gateway.listBlobsByHierarchy(container, prefix || undefined, {
      continuationToken,
      maxPageSize: maxKeys
    })
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      throw new NotFoundError(`Container '${container}' not found`)
    }
    if (error instanceof StorageError) {
      throw new UpstreamError(`Failed to list blobs in container '${container}': ${error.message}`)
    }
    throw error
  }

  const files: OnlineDriveFile[] = []
  const seenDirs = new Set<string>()

  for (const item of page.items) {
    if (!item.name) {
      continue
    }

    const displayName = prefix && item.name.startsWith(prefix) ? item.name.slice(prefix.length) : item.name

    if (isFolder(item)) {
      // Only the first directory level below the prefix is shown
      const firstDir = displayName.replace(/\/+$/, '').split('/')[0]
      if (firstDir && !seenDirs.has(firstDir)) {
        seenDirs.add(firstDir)
        const dirPath = `${prefix}${firstDir}/`
        files.push({
          id: `${container}/${dirPath}`,
          name: firstDir,
          size: 0,
          type: 'folder',
          metadata: {
            container_name: container,
            blob_path: dirPath,
            is_directory: true
          }
        })
      }
      continue
    }

    // Deeper blobs are reached through their directory entry
    if (displayName.includes('/') || item.kind !== 'blob') {
      continue
    }
    files.push(toFileEntry(container, item, displayName))
  }

  return {
    result: [{ bucket: container, files, ...nextPage(page.continuationToken) }]
  }
}
