#!/usr/bin/env tsx

import { MongoDBService } from '../src/services/mongodb.js'
import { ApiKeyManager } from '../src/services/apikey-manager.js'
import { createApiKeySchema } from '../src/schemas/apikey.js'

/**
 * 创建插件 API Key 并写入 MongoDB
 *
 * 用法:
 *   npx tsx scripts/create-apikey.ts <description> [container1,container2,...]
 *
 * 示例:
 *   npx tsx scripts/create-apikey.ts "knowledge base sync" docs,reports
 *
 * 环境变量:
 *   MONGODB_URL: MongoDB 连接字符串 (默认: mongodb://localhost:27017/blob-drive)
 *   APIKEY: 指定密钥 (可选，若不提供则自动生成)
 */

async function main() {
  const parsed = createApiKeySchema.safeParse({
    key: process.env.APIKEY || undefined,
    description: process.argv[2],
    containers: (process.argv[3] || '').split(',').map(name => name.trim()).filter(name => name.length > 0)
  })

  if (!parsed.success) {
    console.error('Invalid arguments:', parsed.error.issues.map(issue => issue.message).join('; '))
    console.error('Usage: npx tsx scripts/create-apikey.ts <description> [containers]')
    process.exitCode = 1
    return
  }

  const mongo = new MongoDBService()
  await mongo.connect()

  try {
    const manager = new ApiKeyManager(mongo)
    await manager.initializeFromMongoDB()
    const apiKey = await manager.createApiKey(parsed.data)

    console.log('API key created')
    console.log(`  key:         ${apiKey.key}`)
    console.log(`  description: ${apiKey.description}`)
    console.log(`  containers:  ${apiKey.containers.length > 0 ? apiKey.containers.join(', ') : '(all)'}`)
  } finally {
    await mongo.disconnect()
  }
}

main().catch((error) => {
  console.error('Failed to create API key:', error)
  process.exit(1)
})
