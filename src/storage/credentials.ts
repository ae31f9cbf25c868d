import { BlobServiceClient, StorageSharedKeyCredential } from '@azure/storage-blob'
import { AUTH_METHODS, blobCredentialsSchema } from '../schemas/credentials.js'
import { InvalidCredentialsError } from '../datasource/errors.js'
import { CredentialExpiredError } from './errors.js'

import type { AccessToken, TokenCredential } from '@azure/core-auth'
import type { BlobCredentials } from '../schemas/credentials.js'

/**
 * Lifetime assumed for a bare OAuth access token, in seconds.
 * The host hands over the token without its expiry.
 */
export const OAUTH_TOKEN_LIFETIME_SECONDS = 3600

/** Tokens are refused this long before they expire */
export const OAUTH_REFRESH_MARGIN_MS = 5 * 60 * 1000

const isAuthMethod = (value: string): boolean =>
  AUTH_METHODS.some(method => method === value)

/**
 * Validate raw credentials from the plugin host.
 * @throws InvalidCredentialsError on an unknown auth method or missing fields
 */
export function parseCredentials(input: unknown): BlobCredentials {
  if (typeof input === 'object' && input !== null && 'auth_method' in input) {
    const method = input.auth_method
    // An absent auth_method falls back to account_key; any other value must name a method
    if (method !== undefined && (typeof method !== 'string' || !isAuthMethod(method))) {
      throw new InvalidCredentialsError(`Unsupported authentication method: ${String(method)}`)
    }
  }

  const parsed = blobCredentialsSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'credentials'}: ${issue.message}`)
      .join('; ')
    throw new InvalidCredentialsError(`Invalid credentials: ${issues}`)
  }
  return parsed.data
}

export function getAccountUrl(accountName: string, endpointSuffix: string): string {
  return `https://${accountName}.blob.${endpointSuffix}`
}

export function normalizeSasToken(sasToken: string): string {
  return sasToken.startsWith('?') ? sasToken : `?${sasToken}`
}

/**
 * Token credential over a bare access token.
 * The token is treated as expired OAUTH_REFRESH_MARGIN_MS before its assumed lifetime ends.
 */
export class StaticTokenCredential implements TokenCredential {
  private readonly expiresOnTimestamp: number

  constructor(
    private readonly token: string,
    expiresInSeconds: number = OAUTH_TOKEN_LIFETIME_SECONDS,
    private readonly now: () => number = Date.now
  ) {
    this.expiresOnTimestamp = now() + expiresInSeconds * 1000
  }

  async getToken(): Promise<AccessToken> {
    if (this.now() >= this.expiresOnTimestamp - OAUTH_REFRESH_MARGIN_MS) {
      throw new CredentialExpiredError()
    }
    return { token: this.token, expiresOnTimestamp: this.expiresOnTimestamp }
  }
}

/**
 * Build a Blob service client for the given credentials
 */
export function createBlobServiceClient(credentials: BlobCredentials): BlobServiceClient {
  switch (credentials.auth_method) {
    case 'account_key':
      return new BlobServiceClient(
        getAccountUrl(credentials.account_name, credentials.endpoint_suffix),
        new StorageSharedKeyCredential(credentials.account_name, credentials.account_key)
      )
    case 'sas_token':
      return new BlobServiceClient(
        getAccountUrl(credentials.account_name, credentials.endpoint_suffix) + normalizeSasToken(credentials.sas_token)
      )
    case 'connection_string':
      return BlobServiceClient.fromConnectionString(credentials.connection_string)
    case 'oauth':
      return new BlobServiceClient(
        getAccountUrl(credentials.account_name, credentials.endpoint_suffix),
        new StaticTokenCredential(credentials.access_token)
      )
  }
}
