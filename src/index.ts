import { serve } from '@hono/node-server'
import { Hono } from 'hono'
import { logger } from 'hono/logger'
import admin from './routes/admin.js'
import datasource from './routes/datasource.js'
import { mongoDBService } from './services/mongodb.js'
import { apiKeyManager } from './services/apikey-manager.js'
import { adminAuth, pluginAuth } from './middleware/auth.js'

const app = new Hono()

// Middleware
app.use('*', logger())

// Health check endpoint
app.get('/health', (c) => {
  return c.json({
    service: 'Blob Drive Gateway',
    status: 'running',
    version: '1.0.0'
  })
})

app.use('/admin/*', adminAuth)
app.use('/datasource/*', pluginAuth)

// Mount routes
app.route('/admin', admin)
app.route('/datasource', datasource)

async function startServer() {
  const port = process.env.PORT ? parseInt(process.env.PORT) : 51820

  if (process.env.MONGODB_URL) {
    try {
      console.log('Connecting to MongoDB...')
      await mongoDBService.connect()
      await apiKeyManager.initializeFromMongoDB()
      console.log('MongoDB integration enabled')
    } catch (error) {
      console.error('Failed to connect to MongoDB, using in-memory API key storage:', error)
    }
  } else {
    console.log('MONGODB_URL not provided, using in-memory API key storage')
  }

  serve({
    fetch: app.fetch,
    port
  }, (info) => {
    console.log(`Blob Drive Gateway is running on http://localhost:${info.port}`)
    console.log(`Admin API: http://localhost:${info.port}/admin`)
    console.log(`Datasource API: http://localhost:${info.port}/datasource/browse`)
  })

  const shutdown = async () => {
    console.log('\nShutting down gracefully...')
    await mongoDBService.disconnect()
    process.exit(0)
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

startServer().catch((error) => {
  console.error('Failed to start server:', error)
  process.exit(1)
})
