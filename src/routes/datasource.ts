import { Hono } from 'hono'
import { stream } from 'hono/streaming'
import { zValidator } from '@hono/zod-validator'
import { AzureBlobDatasource } from '../datasource/online-drive.js'
import { parseFileId } from '../datasource/download.js'
import { errorMessage } from '../datasource/errors.js'
import { parseCredentials } from '../storage/credentials.js'
import { datasourceMetrics } from '../services/metrics.js'
import {
  assertContainerAllowed,
  restrictToContainers,
  toErrorResponse
} from './helpers.js'
import {
  browseFilesBodySchema,
  downloadFileBodySchema,
  validateCredentialsBodySchema
} from '../schemas/datasource.js'

import type { BlobCredentials } from '../schemas/credentials.js'
import type { BlobMessage } from '../types/datasource.js'
import type { Variables } from '../types/context.js'

export type DatasourceFactory = (credentials: BlobCredentials) => AzureBlobDatasource

const defaultFactory: DatasourceFactory = (credentials) => new AzureBlobDatasource(credentials)

/** One NDJSON line per download message */
export function encodeBlobMessage(message: BlobMessage): string {
  return JSON.stringify({
    type: message.type,
    meta: message.meta,
    data: message.blob.toString('base64')
  }) + '\n'
}

/**
 * Plugin-facing datasource routes
 * @param createDatasource - builds the datasource for a request's credentials
 */
export function createDatasourceRoutes(createDatasource: DatasourceFactory = defaultFactory) {
  const routes = new Hono<{ Variables: Variables }>()

  // POST /datasource/browse - List containers, directories and files
  routes.post('/browse', zValidator('json', browseFilesBodySchema), async (c) => {
    const { credentials, request } = c.req.valid('json')
    const apiKey = c.get('apiKey')
    const startTime = Date.now()

    try {
      if (request.bucket) {
        assertContainerAllowed(apiKey, request.bucket)
      }
      const datasource = createDatasource(parseCredentials(credentials))
      const response = restrictToContainers(apiKey, await datasource.browseFiles(request))
      datasourceMetrics.recordOperation('browse', 'success', Date.now() - startTime)
      return c.json(response)
    } catch (error) {
      datasourceMetrics.recordOperation('browse', 'failure', Date.now() - startTime)
      return toErrorResponse(error)
    }
  })

  // POST /datasource/download - Stream a file as NDJSON blob messages
  routes.post('/download', zValidator('json', downloadFileBodySchema), async (c) => {
    const { credentials, request } = c.req.valid('json')
    const apiKey = c.get('apiKey')
    const startTime = Date.now()

    let messages: AsyncGenerator<BlobMessage>
    let first: IteratorResult<BlobMessage>
    try {
      assertContainerAllowed(apiKey, parseFileId(request.id).container)
      const datasource = createDatasource(parseCredentials(credentials))
      messages = datasource.downloadFile(request)
      // Pull the first message before streaming so early failures keep their status code
      first = await messages.next()
    } catch (error) {
      datasourceMetrics.recordOperation('download', 'failure', Date.now() - startTime)
      return toErrorResponse(error)
    }

    c.header('Content-Type', 'application/x-ndjson')
    datasourceMetrics.downloadStarted()

    return stream(c, async (writer) => {
      let status: 'success' | 'failure' = 'success'

      // Stop reading from storage once the client goes away
      writer.onAbort(async () => {
        status = 'failure'
        console.warn(`[Download] Client disconnected from ${request.id}`)
        await messages.return(undefined)
      })
      try {
        if (!first.done) {
          datasourceMetrics.recordDownloadedBytes(first.value.blob.length)
          await writer.write(encodeBlobMessage(first.value))
        }
        for await (const message of messages) {
          datasourceMetrics.recordDownloadedBytes(message.blob.length)
          await writer.write(encodeBlobMessage(message))
        }
      } catch (error) {
        status = 'failure'
        console.error(`[Download] Stream failed for ${request.id}:`, error)
        await writer.write(JSON.stringify({ type: 'error', message: errorMessage(error) }) + '\n')
      } finally {
        datasourceMetrics.downloadFinished()
        datasourceMetrics.recordOperation('download', status, Date.now() - startTime)
      }
    })
  })

  // POST /datasource/credentials/validate - Check credentials before the host saves them
  routes.post('/credentials/validate', zValidator('json', validateCredentialsBodySchema), async (c) => {
    const { credentials } = c.req.valid('json')
    const startTime = Date.now()

    try {
      await createDatasource(parseCredentials(credentials)).validateCredentials()
      datasourceMetrics.recordOperation('validate', 'success', Date.now() - startTime)
      return c.json({ valid: true })
    } catch (error) {
      datasourceMetrics.recordOperation('validate', 'failure', Date.now() - startTime)
      return toErrorResponse(error)
    }
  })

  return routes
}

export default createDatasourceRoutes()
