/**
 * Scan Coordinator Module
 *
 * Re-exports from submodules for scan coordination.
 */

export {
  completedUpdate,
  createScanRequest,
  failedUpdate,
  type NewScanRequest,
  scanTargetKey,
} from './scan-requests.js'
export {
  type InFlightScan,
  requestFlushScan,
  runScan,
  type ScanRunnerDeps,
} from './scan-runner.js'
export {
  resolveConfiguredLibrary,
  resolveScanTarget,
  SECTION_TYPE_BY_MEDIA,
  type ScanTargetConfig,
} from './target-resolver.js'
