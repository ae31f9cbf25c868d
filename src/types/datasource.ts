// Online drive entities exchanged with the plugin host.
// Field names follow the host's wire format (snake_case).

export type OnlineDriveFileType = 'file' | 'folder'

export interface OnlineDriveFile {
  id: string // "<container>", "<container>/<dir>/" or "<container>/<blob path>"
  name: string // Display name relative to the browsed prefix
  size: number
  type: OnlineDriveFileType
  metadata: Record<string, unknown>
}

export interface OnlineDriveFileBucket {
  bucket: string // Empty when the listing is of containers
  files: OnlineDriveFile[]
  is_truncated: boolean
  next_page_parameters: NextPageParameters
}

export interface NextPageParameters {
  continuation_token?: string
  [key: string]: unknown
}

export interface BrowseFilesRequest {
  bucket?: string | null
  prefix?: string | null
  max_keys?: number | null
  next_page_parameters?: NextPageParameters | null
}

export interface BrowseFilesResponse {
  result: OnlineDriveFileBucket[]
}

export interface DownloadFileRequest {
  id: string // "<container>/<blob path>"
  bucket?: string | null
}

export interface BlobMessageMeta {
  file_name: string
  mime_type: string
  size?: number
  download_success?: boolean
  is_partial?: boolean
}

export interface BlobMessage {
  type: 'blob'
  blob: Buffer
  meta: BlobMessageMeta
}
