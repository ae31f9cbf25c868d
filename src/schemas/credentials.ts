import { z } from 'zod'

export const DEFAULT_ENDPOINT_SUFFIX = 'core.windows.net'

export const AUTH_METHODS = ['account_key', 'sas_token', 'connection_string', 'oauth'] as const

export type AuthMethod = typeof AUTH_METHODS[number]

const endpointSuffixSchema = z.string().min(1).default(DEFAULT_ENDPOINT_SUFFIX)
const accountNameSchema = z.string().min(1, 'account_name is required')

const accountKeyCredentialsSchema = z.object({
  auth_method: z.literal('account_key'),
  account_name: accountNameSchema,
  account_key: z.string().min(1, 'account_key is required'),
  endpoint_suffix: endpointSuffixSchema
})

const sasTokenCredentialsSchema = z.object({
  auth_method: z.literal('sas_token'),
  account_name: accountNameSchema,
  sas_token: z.string().min(1, 'sas_token is required'),
  endpoint_suffix: endpointSuffixSchema
})

const connectionStringCredentialsSchema = z.object({
  auth_method: z.literal('connection_string'),
  connection_string: z.string().min(1, 'connection_string is required')
})

const oauthCredentialsSchema = z.object({
  auth_method: z.literal('oauth'),
  account_name: accountNameSchema,
  access_token: z.string().min(1, 'access_token is required'),
  endpoint_suffix: endpointSuffixSchema
})

// auth_method is optional on the wire and defaults to account_key
function withDefaultAuthMethod(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && !('auth_method' in value)) {
    return { ...value, auth_method: 'account_key' }
  }
  return value
}

export const blobCredentialsSchema = z.preprocess(
  withDefaultAuthMethod,
  z.discriminatedUnion('auth_method', [
    accountKeyCredentialsSchema,
    sasTokenCredentialsSchema,
    connectionStringCredentialsSchema,
    oauthCredentialsSchema
  ])
)

export type BlobCredentials = z.infer<typeof blobCredentialsSchema>
export type SasTokenCredentials = z.infer<typeof sasTokenCredentialsSchema>
