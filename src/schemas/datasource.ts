import { z } from 'zod'

// Credentials are checked separately by parseCredentials so that an unknown
// auth_method gets its own message
const credentialsFieldSchema = z.record(z.unknown())

export const browseFilesRequestSchema = z.object({
  bucket: z.string().nullish(),
  prefix: z.string().nullish(),
  max_keys: z.number().int().positive().max(5000).nullish(),
  next_page_parameters: z.object({
    continuation_token: z.string().optional()
  }).passthrough().nullish()
})

export const browseFilesBodySchema = z.object({
  credentials: credentialsFieldSchema,
  request: browseFilesRequestSchema.default({})
})

export const downloadFileRequestSchema = z.object({
  id: z.string().min(1, 'File id is required'),
  bucket: z.string().nullish()
})

export const downloadFileBodySchema = z.object({
  credentials: credentialsFieldSchema,
  request: downloadFileRequestSchema
})

export const validateCredentialsBodySchema = z.object({
  credentials: credentialsFieldSchema
})

export type BrowseFilesBody = z.infer<typeof browseFilesBodySchema>
export type DownloadFileBody = z.infer<typeof downloadFileBodySchema>
export type ValidateCredentialsBody = z.infer<typeof validateCredentialsBodySchema>
