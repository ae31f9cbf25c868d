import { randomBytes } from 'crypto'
import { mongoDBService } from './mongodb.js'

import type { MongoDBService } from './mongodb.js'
import type { ApiKey } from '../types/apikey.js'
import type { CreateApiKeyInput, UpdateApiKeyInput } from '../schemas/apikey.js'

export const GENERATED_KEY_PREFIX = 'bd-'

export function generateApiKey(): string {
  return GENERATED_KEY_PREFIX + randomBytes(24).toString('hex')
}

/**
 * Hide all but the first and last four characters of a key
 */
export function maskApiKey(key: string): string {
  if (key.length <= 8) {
    return '*'.repeat(key.length)
  }
  return `${key.slice(0, 4)}${'*'.repeat(key.length - 8)}${key.slice(-4)}`
}

function toApiKey(doc: ApiKey): ApiKey {
  const apiKey: ApiKey = {
    key: doc.key,
    description: doc.description,
    containers: doc.containers ?? [],
    createdAt: doc.createdAt
  }
  if (doc.lastUsedAt) {
    apiKey.lastUsedAt = doc.lastUsedAt
  }
  return apiKey
}

/**
 * API Key Manager
 *
 * Keeps plugin API keys in memory and writes changes through to MongoDB
 * when a connection is available.
 */
export class ApiKeyManager {
  /** Map of key strings to their records */
  private apiKeys: Map<string, ApiKey> = new Map()
  /** Flag indicating if changes are persisted to MongoDB */
  private usesMongoDB: boolean = false

  constructor(private mongo: MongoDBService = mongoDBService) {}

  /**
   * Loads all keys from MongoDB.
   * If MongoDB is not connected, it keeps using in-memory storage.
   */
  async initializeFromMongoDB(): Promise<void> {
    if (!this.mongo.isConnected()) {
      console.log('MongoDB not connected, using in-memory API key storage')
      return
    }

    try {
      const docs = await this.mongo.getApiKeysCollection().find({}, { projection: { _id: 0 } }).toArray()

      this.apiKeys.clear()
      for (const doc of docs) {
        this.apiKeys.set(doc.key, toApiKey(doc))
      }

      this.usesMongoDB = true
      console.log(`Loaded ${docs.length} API keys from MongoDB`)
    } catch (error) {
      console.error('Failed to load API keys from MongoDB:', error)
      this.usesMongoDB = false
    }
  }

  getAllApiKeys(): ApiKey[] {
    return Array.from(this.apiKeys.values())
  }

  getApiKey(key: string): ApiKey | undefined {
    return this.apiKeys.get(key)
  }

  /**
   * Adds a key, generating one when the input has none.
   * @throws Error if the key already exists
   */
  async createApiKey(input: CreateApiKeyInput): Promise<ApiKey> {
    const key = input.key ?? generateApiKey()
    if (this.apiKeys.has(key)) {
      throw new Error('API key already exists')
    }

    const apiKey: ApiKey = {
      key,
      description: input.description,
      containers: input.containers,
      createdAt: new Date()
    }

    if (this.usesMongoDB) {
      await this.mongo.getApiKeysCollection().insertOne({ ...apiKey })
    }
    this.apiKeys.set(key, apiKey)
    return apiKey
  }

  /**
   * @throws Error if the key does not exist
   */
  async updateApiKey(key: string, updates: UpdateApiKeyInput): Promise<ApiKey> {
    const existing = this.apiKeys.get(key)
    if (!existing) {
      throw new Error(`API key ${maskApiKey(key)} not found`)
    }

    const updated: ApiKey = {
      ...existing,
      description: updates.description ?? existing.description,
      containers: updates.containers ?? existing.containers
    }

    if (this.usesMongoDB) {
      await this.mongo.getApiKeysCollection().updateOne(
        { key },
        { $set: { description: updated.description, containers: updated.containers } }
      )
    }
    this.apiKeys.set(key, updated)
    return updated
  }

  async deleteApiKey(key: string): Promise<boolean> {
    if (!this.apiKeys.has(key)) {
      return false
    }
    if (this.usesMongoDB) {
      await this.mongo.getApiKeysCollection().deleteOne({ key })
    }
    return this.apiKeys.delete(key)
  }

  /**
   * Marks a key as used now and returns it, or undefined for unknown keys
   */
  async recordUsage(key: string): Promise<ApiKey | undefined> {
    const apiKey = this.apiKeys.get(key)
    if (!apiKey) {
      return undefined
    }

    apiKey.lastUsedAt = new Date()
    if (this.usesMongoDB) {
      await this.mongo.getApiKeysCollection().updateOne({ key }, { $set: { lastUsedAt: apiKey.lastUsedAt } })
    }
    return apiKey
  }

  /**
   * Whether a key may access a container; keys without a container list may access all
   */
  isContainerAllowed(apiKey: ApiKey, container: string): boolean {
    return apiKey.containers.length === 0 || apiKey.containers.includes(container)
  }

  /** Removes every key from memory (used by tests) */
  clear(): void {
    this.apiKeys.clear()
  }
}

export const apiKeyManager = new ApiKeyManager()
