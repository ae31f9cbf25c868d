/**
 * Test helpers: an in-memory blob gateway and credential fixtures
 */

import { ResourceNotFoundError } from '../storage/errors.js'

import type {
  BlobGateway,
  BlobProperties,
  ContainerSummary,
  HierarchyItem,
  Page,
  PageOptions
} from '../storage/blob-gateway.js'
import type { BlobCredentials } from '../schemas/credentials.js'

export interface TestBlob {
  data: Buffer
  contentType?: string
  accessTier?: string
  lastModified?: Date
  etag?: string
  metadata?: Record<string, string>
  /** Reported size when it should differ from data.length */
  reportedSize?: number
}

interface TestContainer {
  summary: ContainerSummary
  blobs: Map<string, TestBlob>
}

function paginate<T>(items: T[], options: PageOptions): Page<T> {
  const start = options.continuationToken ? parseInt(options.continuationToken) : 0
  const size = options.maxPageSize ?? 5000
  const end = start + size
  return {
    items: items.slice(start, end),
    continuationToken: end < items.length ? String(end) : undefined
  }
}

/**
 * BlobGateway over in-memory containers, paging with numeric continuation tokens
 */
export class InMemoryBlobGateway implements BlobGateway {
  private containers: Map<string, TestContainer> = new Map()
  /** Every downloadRange call as [container, path, offset, count] */
  readonly downloads: Array<[string, string, number | undefined, number | undefined]> = []
  /** Set to make every call fail with this error */
  failWith: Error | null = null

  addContainer(name: string, summary: Partial<ContainerSummary> = {}): this {
    this.containers.set(name, { summary: { name, ...summary }, blobs: new Map() })
    return this
  }

  addBlob(container: string, path: string, blob: Omit<Partial<TestBlob>, 'data'> & { data?: Buffer | string } = {}): this {
    if (!this.containers.has(container)) {
      this.addContainer(container)
    }
    const data = typeof blob.data === 'string' ? Buffer.from(blob.data) : blob.data ?? Buffer.alloc(0)
    this.getContainer(container).blobs.set(path, { ...blob, data })
    return this
  }

  async listContainers(options: PageOptions): Promise<Page<ContainerSummary>> {
    this.throwIfFailing()
    const names = Array.from(this.containers.keys()).sort()
    return paginate(names.map(name => this.getContainer(name).summary), options)
  }

  async containerExists(container: string): Promise<boolean> {
    this.throwIfFailing()
    return this.containers.has(container)
  }

  async listBlobsByHierarchy(container: string, prefix: string | undefined, options: PageOptions): Promise<Page<HierarchyItem>> {
    this.throwIfFailing()
    const { blobs } = this.getContainer(container)
    const start = prefix ?? ''
    const items: HierarchyItem[] = []
    const seenPrefixes = new Set<string>()

    for (const name of Array.from(blobs.keys()).sort()) {
      if (!name.startsWith(start)) {
        continue
      }
      const rest = name.slice(start.length)
      const slash = rest.indexOf('/')
      if (slash !== -1) {
        const dir = start + rest.slice(0, slash + 1)
        if (!seenPrefixes.has(dir)) {
          seenPrefixes.add(dir)
          items.push({ kind: 'prefix', name: dir })
        }
        continue
      }

      const blob = blobs.get(name)
      if (!blob) {
        continue
      }
      items.push({
        kind: 'blob',
        name,
        size: blob.reportedSize ?? blob.data.length,
        contentType: blob.contentType,
        lastModified: blob.lastModified,
        etag: blob.etag,
        accessTier: blob.accessTier,
        metadata: blob.metadata
      })
    }

    return paginate(items, options)
  }

  async getBlobProperties(container: string, blobPath: string): Promise<BlobProperties> {
    const blob = this.getBlob(container, blobPath)
    return {
      size: blob.reportedSize ?? blob.data.length,
      contentType: blob.contentType,
      accessTier: blob.accessTier
    }
  }

  async downloadRange(container: string, blobPath: string, offset?: number, count?: number): Promise<Buffer> {
    this.downloads.push([container, blobPath, offset, count])
    const { data } = this.getBlob(container, blobPath)
    const begin = offset ?? 0
    const end = count === undefined ? data.length : begin + count
    return data.subarray(begin, end)
  }

  private getContainer(name: string): TestContainer {
    this.throwIfFailing()
    const container = this.containers.get(name)
    if (!container) {
      throw new ResourceNotFoundError(`The specified container does not exist.`)
    }
    return container
  }

  private getBlob(container: string, blobPath: string): TestBlob {
    const blob = this.getContainer(container).blobs.get(blobPath)
    if (!blob) {
      throw new ResourceNotFoundError('The specified blob does not exist.')
    }
    return blob
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith
    }
  }
}

/**
 * Create test credentials for each auth method
 */
export function createTestCredentials(method: BlobCredentials['auth_method'] = 'account_key'): BlobCredentials {
  switch (method) {
    case 'account_key':
      return {
        auth_method: 'account_key',
        account_name: 'testaccount',
        account_key: 'dGVzdC1zZWNyZXQ=',
        endpoint_suffix: 'core.windows.net'
      }
    case 'sas_token':
      return {
        auth_method: 'sas_token',
        account_name: 'testaccount',
        sas_token: 'sv=2024-01-01&sig=test-signature',
        endpoint_suffix: 'core.windows.net'
      }
    case 'connection_string':
      return {
        auth_method: 'connection_string',
        connection_string: 'DefaultEndpointsProtocol=https;AccountName=testaccount;AccountKey=dGVzdC1zZWNyZXQ=;EndpointSuffix=core.windows.net'
      }
    case 'oauth':
      return {
        auth_method: 'oauth',
        account_name: 'testaccount',
        access_token: 'test-access-token',
        endpoint_suffix: 'core.windows.net'
      }
  }
}

/**
 * Collect every message of a download
 */
export async function collect<T>(messages: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = []
  for await (const message of messages) {
    result.push(message)
  }
  return result
}
