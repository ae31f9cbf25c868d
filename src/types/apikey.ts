// Plugin API key, stored in memory and optionally in MongoDB
export interface ApiKey {
  key: string // Opaque secret presented as a Bearer token (unique)
  description: string // Description of the API key
  containers: string[] // Containers this key may access, empty means all
  createdAt: Date // Creation timestamp
  lastUsedAt?: Date // Last time this key was used (optional)
}
