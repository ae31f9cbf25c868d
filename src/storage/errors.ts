/**
 * Errors raised by the blob gateway. They carry the storage service's own
 * message; the datasource layer turns them into user-facing DatasourceErrors.
 */

export class StorageError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message)
    this.name = 'StorageError'
  }
}

export class ResourceNotFoundError extends StorageError {
  constructor(message: string) {
    super(message, 404)
    this.name = 'ResourceNotFoundError'
  }
}

export class CredentialExpiredError extends StorageError {
  constructor(message = 'Access token has expired, refresh required') {
    super(message, 401)
    this.name = 'CredentialExpiredError'
  }
}
