import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ApiKeyManager, generateApiKey, maskApiKey } from '../services/apikey-manager.js'
import { DatasourceMetrics } from '../services/metrics.js'
import { MongoDBService } from '../services/mongodb.js'
import { AzureBlobDatasource } from '../datasource/online-drive.js'
import { InvalidCredentialsError } from '../datasource/errors.js'
import { StorageError } from '../storage/errors.js'
import { InMemoryBlobGateway, collect, createTestCredentials } from './helpers.js'

describe('ApiKeyManager', () => {
  let manager: ApiKeyManager

  beforeEach(() => {
    // Never connected, so the manager stays in memory
    manager = new ApiKeyManager(new MongoDBService('mongodb://localhost:27017/unused'))
  })

  it('starts with no keys', () => {
    expect(manager.getAllApiKeys()).toEqual([])
  })

  it('stays in memory when MongoDB is not connected', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    await manager.initializeFromMongoDB()
    expect(log).toHaveBeenCalledWith('MongoDB not connected, using in-memory API key storage')
    log.mockRestore()
  })

  it('creates a key with the given value', async () => {
    const apiKey = await manager.createApiKey({ key: 'test-plugin-key', description: 'sync job', containers: ['docs'] })
    expect(apiKey.key).toBe('test-plugin-key')
    expect(apiKey.containers).toEqual(['docs'])
    expect(apiKey.createdAt).toBeInstanceOf(Date)
    expect(manager.getApiKey('test-plugin-key')).toEqual(apiKey)
  })

  it('generates a key when none is given', async () => {
    const apiKey = await manager.createApiKey({ description: 'generated', containers: [] })
    expect(apiKey.key).toMatch(/^bd-[0-9a-f]{48}$/)
  })

  it('does not allow duplicate keys', async () => {
    await manager.createApiKey({ key: 'test-plugin-key', description: 'a', containers: [] })
    await expect(manager.createApiKey({ key: 'test-plugin-key', description: 'b', containers: [] }))
      .rejects.toThrow('already exists')
  })

  it('updates only the given fields', async () => {
    await manager.createApiKey({ key: 'test-plugin-key', description: 'before', containers: ['docs'] })
    const updated = await manager.updateApiKey('test-plugin-key', { description: 'after' })
    expect(updated.description).toBe('after')
    expect(updated.containers).toEqual(['docs'])
  })

  it('throws when updating a missing key', async () => {
    await expect(manager.updateApiKey('missing-key', { description: 'x' })).rejects.toThrow('not found')
  })

  it('deletes keys', async () => {
    await manager.createApiKey({ key: 'test-plugin-key', description: 'a', containers: [] })
    expect(await manager.deleteApiKey('test-plugin-key')).toBe(true)
    expect(await manager.deleteApiKey('test-plugin-key')).toBe(false)
    expect(manager.getApiKey('test-plugin-key')).toBeUndefined()
  })

  it('records usage of known keys only', async () => {
    await manager.createApiKey({ key: 'test-plugin-key', description: 'a', containers: [] })
    const used = await manager.recordUsage('test-plugin-key')
    expect(used?.lastUsedAt).toBeInstanceOf(Date)
    expect(await manager.recordUsage('unknown-key')).toBeUndefined()
  })

  it('checks container access', async () => {
    const open = await manager.createApiKey({ key: 'open-key', description: 'a', containers: [] })
    const limited = await manager.createApiKey({ key: 'limited-key', description: 'b', containers: ['docs'] })
    expect(manager.isContainerAllowed(open, 'anything')).toBe(true)
    expect(manager.isContainerAllowed(limited, 'docs')).toBe(true)
    expect(manager.isContainerAllowed(limited, 'archive')).toBe(false)
  })
})

describe('API key helpers', () => {
  it('masks all but the first and last four characters', () => {
    expect(maskApiKey('plugin-key-0001')).toBe('plug*******0001')
  })

  it('masks short keys entirely', () => {
    expect(maskApiKey('short')).toBe('*****')
    expect(maskApiKey('12345678')).toBe('********')
  })

  it('generates distinct keys', () => {
    expect(generateApiKey()).not.toBe(generateApiKey())
  })
})

describe('DatasourceMetrics', () => {
  let metrics: DatasourceMetrics

  beforeEach(() => {
    metrics = new DatasourceMetrics()
  })

  it('counts operations by status', async () => {
    metrics.recordOperation('browse', 'success', 120)
    metrics.recordOperation('browse', 'success', 80)
    metrics.recordOperation('download', 'failure', 10)

    const text = await metrics.getMetrics()
    expect(text).toContain('blob_drive_operations_total{operation="browse",status="success"} 2')
    expect(text).toContain('blob_drive_operations_total{operation="download",status="failure"} 1')
    expect(text).toContain('blob_drive_operation_duration_seconds_count{operation="browse"} 2')
  })

  it('tracks downloaded bytes and active downloads', async () => {
    metrics.downloadStarted()
    metrics.downloadStarted()
    metrics.downloadFinished()
    metrics.recordDownloadedBytes(1024)

    const text = await metrics.getMetrics()
    expect(text).toContain('blob_drive_active_downloads 1')
    expect(text).toContain('blob_drive_downloaded_bytes_total 1024')
  })

  it('resets all metrics', async () => {
    metrics.recordDownloadedBytes(10)
    metrics.resetAll()
    expect(await metrics.getMetrics()).toContain('blob_drive_downloaded_bytes_total 0')
  })
})

describe('AzureBlobDatasource', () => {
  let gateway: InMemoryBlobGateway

  beforeEach(() => {
    gateway = new InMemoryBlobGateway().addBlob('docs', 'readme.txt', { data: 'hello' })
  })

  it('builds the gateway once and reuses it', async () => {
    const factory = vi.fn(() => gateway)
    const datasource = new AzureBlobDatasource(createTestCredentials(), { gatewayFactory: factory })

    await datasource.browseFiles({})
    await datasource.browseFiles({ bucket: 'docs' })

    expect(factory).toHaveBeenCalledTimes(1)
    expect(factory).toHaveBeenCalledWith(createTestCredentials())
  })

  it('browses and downloads through the gateway', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const datasource = new AzureBlobDatasource(createTestCredentials(), { gatewayFactory: () => gateway })

    const response = await datasource.browseFiles({ bucket: 'docs' })
    expect(response.result[0].files.map(f => f.id)).toEqual(['docs/readme.txt'])

    const messages = await collect(datasource.downloadFile({ id: 'docs/readme.txt' }))
    expect(messages.map(m => m.blob.toString())).toEqual(['hello'])
    log.mockRestore()
  })

  it('validates credentials by listing containers', async () => {
    const spy = vi.spyOn(gateway, 'listContainers')
    const datasource = new AzureBlobDatasource(createTestCredentials(), { gatewayFactory: () => gateway })

    await expect(datasource.validateCredentials()).resolves.toBeUndefined()
    expect(spy).toHaveBeenCalledWith({ maxPageSize: 1 })
  })

  it('reports credentials the storage account rejects', async () => {
    gateway.failWith = new StorageError('Server failed to authenticate the request.', 403)
    const datasource = new AzureBlobDatasource(createTestCredentials(), { gatewayFactory: () => gateway })

    await expect(datasource.validateCredentials()).rejects.toThrow(
      'Failed to connect to Azure Blob Storage: Server failed to authenticate the request.'
    )
    await expect(datasource.validateCredentials()).rejects.toBeInstanceOf(InvalidCredentialsError)
  })

  it('reports a client that cannot be built', async () => {
    const datasource = new AzureBlobDatasource(createTestCredentials(), {
      gatewayFactory: () => {
        throw new Error('Invalid connection string')
      }
    })

    await expect(datasource.validateCredentials()).rejects.toThrow(
      'Failed to create storage client: Invalid connection string'
    )
  })
})
