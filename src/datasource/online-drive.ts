import { AzureBlobGateway } from '../storage/blob-gateway.js'
import { createBlobServiceClient } from '../storage/credentials.js'
import { browseFiles } from './browse.js'
import { downloadFile } from './download.js'
import { InvalidCredentialsError, errorMessage } from './errors.js'

import type { BlobGateway } from '../storage/blob-gateway.js'
import type { BlobCredentials } from '../schemas/credentials.js'
import type { BrowseFilesRequest, BrowseFilesResponse, BlobMessage, DownloadFileRequest } from '../types/datasource.js'
import type { DownloadLimits, FetchLike } from './download.js'

export type GatewayFactory = (credentials: BlobCredentials) => BlobGateway

export interface OnlineDriveOptions {
  /** Builds the storage gateway; defaults to the Azure SDK */
  gatewayFactory?: GatewayFactory
  /** HTTP client for SAS downloads */
  fetch?: FetchLike
  limits?: Partial<DownloadLimits>
}

export const createAzureGateway: GatewayFactory = (credentials) =>
  new AzureBlobGateway(createBlobServiceClient(credentials))

/**
 * Online-drive datasource over one Azure Blob Storage account.
 * The storage client is built on first use and reused afterwards.
 */
export class AzureBlobDatasource {
  private gateway: BlobGateway | null = null

  constructor(
    private readonly credentials: BlobCredentials,
    private readonly options: OnlineDriveOptions = {}
  ) {}

  getGateway(): BlobGateway {
    if (!this.gateway) {
      const factory = this.options.gatewayFactory ?? createAzureGateway
      try {
        this.gateway = factory(this.credentials)
      } catch (error) {
        throw new InvalidCredentialsError(`Failed to create storage client: ${errorMessage(error)}`)
      }
    }
    return this.gateway
  }

  async browseFiles(request: BrowseFilesRequest): Promise<BrowseFilesResponse> {
    return browseFiles(this.getGateway(), request)
  }

  downloadFile(request: DownloadFileRequest): AsyncGenerator<BlobMessage> {
    return downloadFile(
      {
        gateway: this.getGateway(),
        credentials: this.credentials,
        limits: this.options.limits,
        fetch: this.options.fetch
      },
      request
    )
  }

  /**
   * Check that the credentials can reach the storage account
   * @throws InvalidCredentialsError when the account cannot be listed
   */
  async validateCredentials(): Promise<void> {
    try {
      await this.getGateway().listContainers({ maxPageSize: 1 })
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        throw error
      }
      throw new InvalidCredentialsError(`Failed to connect to Azure Blob Storage: ${errorMessage(error)}`)
    }
  }
}
