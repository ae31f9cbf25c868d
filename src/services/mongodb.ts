import { MongoClient, Db, Collection } from 'mongodb'
import type { ApiKey } from '../types/apikey.js'

export class MongoDBService {
  private client: MongoClient | null = null
  private db: Db | null = null

  constructor(private url: string = process.env.MONGODB_URL || 'mongodb://localhost:27017/blob-drive') {}

  async connect(): Promise<void> {
    try {
      this.client = new MongoClient(this.url)
      await this.client.connect()
      this.db = this.client.db()
      console.log('Connected to MongoDB')

      // Keys are looked up on every plugin request
      await this.getApiKeysCollection().createIndex({ key: 1 }, { unique: true })
    } catch (error) {
      console.error('Failed to connect to MongoDB:', error)
      throw error
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close()
      this.client = null
      this.db = null
      console.log('Disconnected from MongoDB')
    }
  }

  getDatabase(): Db {
    if (!this.db) {
      throw new Error('Database not initialized. Call connect() first.')
    }
    return this.db
  }

  getApiKeysCollection(): Collection<ApiKey> {
    return this.getDatabase().collection<ApiKey>('apiKeys')
  }

  isConnected(): boolean {
    return this.client !== null && this.db !== null
  }
}

export const mongoDBService = new MongoDBService()
