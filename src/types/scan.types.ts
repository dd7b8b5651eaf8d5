export type ScanStatus = 'pending' | 'completed' | 'failed'

export type ScanTrigger = 'webhook' | 'manual'

export interface ScanRequest {
  scanId: string
  /** null scans every library */
  libraryName: string | null
  itemKey: string | null
  status: ScanStatus
  trigger: ScanTrigger
  mediaTitles: string[]
  message?: string
  timestamp: string
  completedAt: string | null
}

export interface LibraryScanResult {
  library: string
  success: boolean
  message?: string
}
