export type DatasourceErrorCode =
  | 'invalid_request'
  | 'invalid_credentials'
  | 'forbidden'
  | 'not_found'
  | 'blob_archived'
  | 'storage_error'
  | 'download_failed'

/**
 * Base class for errors surfaced to the plugin host.
 * `status` is the HTTP status the API answers with.
 */
export class DatasourceError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: DatasourceErrorCode
  ) {
    super(message)
    this.name = 'DatasourceError'
  }
}

export class InvalidRequestError extends DatasourceError {
  constructor(message: string) {
    super(message, 400, 'invalid_request')
  }
}

export class InvalidCredentialsError extends DatasourceError {
  constructor(message: string) {
    super(message, 400, 'invalid_credentials')
  }
}

export class ForbiddenError extends DatasourceError {
  constructor(message: string) {
    super(message, 403, 'forbidden')
  }
}

export class NotFoundError extends DatasourceError {
  constructor(message: string) {
    super(message, 404, 'not_found')
  }
}

export class ArchivedBlobError extends DatasourceError {
  constructor(blobPath: string) {
    super(`Blob '${blobPath}' is in Archive tier and needs to be rehydrated before download`, 409, 'blob_archived')
  }
}

export class UpstreamError extends DatasourceError {
  constructor(message: string) {
    super(message, 502, 'storage_error')
  }
}

export class DownloadError extends DatasourceError {
  constructor(message: string) {
    super(message, 500, 'download_failed')
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
