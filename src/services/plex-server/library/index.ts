/**
 * Library Module
 *
 * Provides section listing, scanning and status operations against Plex.
 */

export {
  fetchActivities,
  fetchIdentity,
  fetchLibraries,
  PlexApiError,
  refreshItem,
  refreshSection,
} from './library-operations.js'
