/**
 * CLI Constants
 * Centralized limits, names and defaults for tracktap
 */

// =============================================================================
// BATCH LIMITS
// =============================================================================

/** Per-call item limits of the catalog service */
export const BATCH_LIMITS = {
  /** Audio feature ids per lookup */
  AUDIO_FEATURES: 100,
  /** Item references per playlist write */
  PLAYLIST_WRITE: 100,
} as const

// =============================================================================
// RECOMMENDATION SEEDS
// =============================================================================

export const SEED_LIMITS = {
  /** Hard cap across tracks, artists and genres */
  MAX_TOTAL: 5,
  /** Track seeds taken from the analysis */
  MAX_TRACKS: 2,
} as const

// =============================================================================
// CURATION
// =============================================================================

export const CURATION = {
  /** Used when the source playlist's name cannot be fetched */
  FALLBACK_NAME: 'My Curated Playlist',
  NAME_PREFIX: 'Curated',
  /** Tracks requested from the recommendation call */
  RECOMMENDATION_COUNT: 20,
  /** Seed tracks kept by the analyzer */
  SEED_TRACKS: 5,
  /** Genres kept by the analyzer */
  TOP_GENRES: 5,
} as const

// =============================================================================
// LISTENING HISTORY
// =============================================================================

export const HISTORY = {
  /** Tracks shown by `top` and `recent` */
  DEFAULT_LIMIT: 20,
  /** Genres shown by `genres` */
  GENRE_SUGGESTIONS: 10,
  /** Tracks returned by `old-favorites` */
  OLD_FAVORITES: 20,
  /** Top artists sampled for genre suggestions */
  TOP_ARTISTS_SAMPLE: 50,
  /** Upper bound of each history list fetched for old favorites */
  TRACK_SAMPLE: 50,
} as const

// =============================================================================
// LINKS & NAMES
// =============================================================================

export const CATALOG_LINKS = {
  PLAYLIST_URI_PREFIX: 'spotify:playlist:',
  /** Share link prefix for playlists */
  PLAYLIST_WEB_BASE: 'https://open.spotify.com/playlist/',
  /** Short-link hosts whose tokens are never resolved */
  SHORT_LINK_HOSTS: ['spotify.link'],
  TRACK_URI_PREFIX: 'spotify:track:',
} as const

/** Target name used in mutation results for the liked-songs collection */
export const LIKED_SONGS_TARGET = 'Liked Songs'

/** Genre group used when none is named */
export const DEFAULT_GENRE = 'default'

// =============================================================================
// FILES & AUTH
// =============================================================================

export const DEFAULT_FILES = {
  CONFIG: 'config.json',
  QR_IMAGE: 'playlist_qr.png',
  TOKEN_CACHE: '.cache',
} as const

export const OAUTH_SCOPES = [
  'playlist-modify-private',
  'playlist-modify-public',
  'playlist-read-collaborative',
  'playlist-read-private',
  'user-library-modify',
  'user-read-recently-played',
  'user-top-read',
] as const
