import { lookup } from 'mime-types'

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

/**
 * Content type for a blob: the stored one when present,
 * otherwise guessed from the file extension.
 */
export function resolveContentType(blobName: string, storedContentType?: string | null): string {
  if (storedContentType) {
    return storedContentType
  }
  return lookup(blobName) || DEFAULT_CONTENT_TYPE
}

/** Last segment of a blob path */
export function baseName(blobPath: string): string {
  const trimmed = blobPath.endsWith('/') ? blobPath.slice(0, -1) : blobPath
  const index = trimmed.lastIndexOf('/')
  return index === -1 ? trimmed : trimmed.slice(index + 1)
}
