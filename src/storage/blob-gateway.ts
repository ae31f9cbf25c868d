import { RestError } from '@azure/storage-blob'
import { ResourceNotFoundError, StorageError } from './errors.js'

import type { BlobServiceClient } from '@azure/storage-blob'

export interface PageOptions {
  continuationToken?: string
  maxPageSize?: number
}

/** One page of a listing; continuationToken is absent on the last page */
export interface Page<T> {
  items: T[]
  continuationToken?: string
}

export interface ContainerSummary {
  name: string
  lastModified?: Date
  etag?: string
  publicAccess?: string
  hasImmutabilityPolicy?: boolean
  hasLegalHold?: boolean
}

export interface BlobSummary {
  kind: 'blob'
  name: string
  size?: number
  contentType?: string
  lastModified?: Date
  etag?: string
  accessTier?: string
  createdOn?: Date
  serverEncrypted?: boolean
  metadata?: Record<string, string>
}

/** A virtual directory returned by a delimited listing */
export interface BlobPrefixSummary {
  kind: 'prefix'
  name: string
}

export type HierarchyItem = BlobSummary | BlobPrefixSummary

export interface BlobProperties {
  size?: number
  contentType?: string
  accessTier?: string
}

/**
 * The storage operations the datasource needs.
 * Implementations throw ResourceNotFoundError for missing resources and
 * StorageError for any other service failure.
 */
export interface BlobGateway {
  listContainers(options: PageOptions): Promise<Page<ContainerSummary>>
  containerExists(container: string): Promise<boolean>
  listBlobsByHierarchy(container: string, prefix: string | undefined, options: PageOptions): Promise<Page<HierarchyItem>>
  getBlobProperties(container: string, blobPath: string): Promise<BlobProperties>
  /** Download `count` bytes from `offset`, or the whole blob when count is omitted */
  downloadRange(container: string, blobPath: string, offset?: number, count?: number): Promise<Buffer>
}

/**
 * BlobGateway backed by the Azure Storage SDK
 */
export class AzureBlobGateway implements BlobGateway {
  constructor(private readonly client: BlobServiceClient) {}

  async listContainers(options: PageOptions): Promise<Page<ContainerSummary>> {
    return this.call(async () => {
      const pages = this.client.listContainers().byPage(options)
      const page = await pages.next()
      if (page.done) {
        return { items: [] }
      }

      const response = page.value
      return {
        items: (response.containerItems ?? []).map(container => ({
          name: container.name,
          lastModified: container.properties.lastModified,
          etag: container.properties.etag,
          publicAccess: container.properties.publicAccess,
          hasImmutabilityPolicy: container.properties.hasImmutabilityPolicy,
          hasLegalHold: container.properties.hasLegalHold
        })),
        continuationToken: response.continuationToken || undefined
      }
    })
  }

  async containerExists(container: string): Promise<boolean> {
    return this.call(() => this.client.getContainerClient(container).exists())
  }

  async listBlobsByHierarchy(
    container: string,
    prefix: string | undefined,
    options: PageOptions
  ): Promise<Page<HierarchyItem>> {
    return this.call(async () => {
      const pages = this.client
        .getContainerClient(container)
        .listBlobsByHierarchy('/', { prefix })
        .byPage(options)
      const page = await pages.next()
      if (page.done) {
        return { items: [] }
      }

      const { segment, continuationToken } = page.value
      const prefixes: HierarchyItem[] = (segment.blobPrefixes ?? []).map(item => ({
        kind: 'prefix' as const,
        name: item.name
      }))
      const blobs: HierarchyItem[] = segment.blobItems.map(item => ({
        kind: 'blob' as const,
        name: item.name,
        size: item.properties.contentLength,
        contentType: item.properties.contentType,
        lastModified: item.properties.lastModified,
        etag: item.properties.etag,
        accessTier: item.properties.accessTier,
        createdOn: item.properties.createdOn,
        serverEncrypted: item.properties.serverEncrypted,
        metadata: item.metadata
      }))

      // The service returns prefixes and blobs as separate lists; restore name order
      const items = [...prefixes, ...blobs].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      return { items, continuationToken: continuationToken || undefined }
    })
  }

  async getBlobProperties(container: string, blobPath: string): Promise<BlobProperties> {
    return this.call(async () => {
      const properties = await this.client.getContainerClient(container).getBlobClient(blobPath).getProperties()
      return {
        size: properties.contentLength,
        contentType: properties.contentType,
        accessTier: properties.accessTier
      }
    })
  }

  async downloadRange(container: string, blobPath: string, offset?: number, count?: number): Promise<Buffer> {
    return this.call(() =>
      this.client.getContainerClient(container).getBlobClient(blobPath).downloadToBuffer(offset, count)
    )
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    } catch (error) {
      if (error instanceof RestError) {
        if (error.statusCode === 404) {
          throw new ResourceNotFoundError(error.message)
        }
        throw new StorageError(error.message, error.statusCode)
      }
      throw error
    }
  }
}
