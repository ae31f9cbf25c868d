import { Registry, Counter, Histogram, Gauge } from 'prom-client'

export type DatasourceOperation = 'browse' | 'download' | 'validate'
export type OperationStatus = 'success' | 'failure'

export class DatasourceMetrics {
  private registry: Registry

  // Prometheus metrics
  private operationsTotal: Counter
  private operationDuration: Histogram
  private downloadedBytes: Counter
  private activeDownloads: Gauge

  constructor() {
    this.registry = new Registry()

    this.operationsTotal = new Counter({
      name: 'blob_drive_operations_total',
      help: 'Total number of datasource operations',
      labelNames: ['operation', 'status'],
      registers: [this.registry]
    })

    this.operationDuration = new Histogram({
      name: 'blob_drive_operation_duration_seconds',
      help: 'Datasource operation duration in seconds',
      labelNames: ['operation'],
      buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
      registers: [this.registry]
    })

    this.downloadedBytes = new Counter({
      name: 'blob_drive_downloaded_bytes_total',
      help: 'Total bytes sent to the plugin host in download messages',
      registers: [this.registry]
    })

    this.activeDownloads = new Gauge({
      name: 'blob_drive_active_downloads',
      help: 'Number of downloads currently streaming',
      registers: [this.registry]
    })
  }

  recordOperation(operation: DatasourceOperation, status: OperationStatus, durationMs: number): void {
    this.operationsTotal.inc({ operation, status })
    this.operationDuration.observe({ operation }, durationMs / 1000)
  }

  recordDownloadedBytes(bytes: number): void {
    this.downloadedBytes.inc(bytes)
  }

  downloadStarted(): void {
    this.activeDownloads.inc()
  }

  downloadFinished(): void {
    this.activeDownloads.dec()
  }

  // Get Prometheus metrics text
  async getMetrics(): Promise<string> {
    return this.registry.metrics()
  }

  getContentType(): string {
    return this.registry.contentType
  }

  resetAll(): void {
    this.registry.resetMetrics()
  }
}

export const datasourceMetrics = new DatasourceMetrics()
