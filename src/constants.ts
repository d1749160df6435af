// ── Time durations ──────────────────────────────────────────────────────────

export const ONE_SECOND_MS = 1000
export const ONE_MINUTE_MS = 60000
export const ONE_DAY_MS = 86400000

// ── Sampling ───────────────────────────────────────────────────────────────

export const SAMPLE_INTERVAL_SECONDS = 2
export const SAMPLE_SAFETY_TIMEOUT_MS = 5000

// Log the first sampler failure, then every Nth consecutive one
export const SAMPLE_ERROR_LOG_EVERY = 60

// ── Idle detection ─────────────────────────────────────────────────────────

export const IDLE_THRESHOLD_SECONDS = 600

// Apps that produce no input while in use (video, music, readers)
export const PASSIVE_MEDIA_BUNDLE_IDS = [
  'com.spotify.client',
  'com.apple.Music',
  'com.apple.TV',
  'com.apple.Preview',
  'com.apple.iBooksX',
  'com.readdle.PDFExpert-Mac',
  'com.adobe.Reader',
  'com.adobe.Acrobat.Pro',
]

// Samples of the tracker itself are never recorded
export const IGNORED_APP_NAMES = ['activity-ledger']

// ── Taxonomy ───────────────────────────────────────────────────────────────

export const DEFAULT_COLOR = '#6366f1'

// ── Reports ────────────────────────────────────────────────────────────────

export const TOP_WINDOWS_LIMIT = 20
export const WEEK_DAYS = 7

// Unassigned lists hide entries shorter than this
export const UNASSIGNED_MIN_SECONDS = 0

export const RECENT_DATES_LIMIT = 14
export const RECENT_APPS_MINUTES = 60
export const RECENT_APPS_MIN_SECONDS = 60
export const RECENT_APPS_LIMIT = 7

// ── Suggestions ────────────────────────────────────────────────────────────

export const SUGGESTION_MIN_ACTIVITIES = 2
export const SUGGESTION_MIN_APPS = 1
export const SUGGESTION_MIN_TOKEN_LENGTH = 3
export const SUGGESTION_MAX_TITLE_WORDS = 3

// Sites too general to stand for one project
export const SUGGESTION_SKIP_DOMAINS = [
  'google.com',
  'github.com',
  'stackoverflow.com',
  'apple.com',
  'youtube.com',
  'twitter.com',
  'x.com',
  'reddit.com',
  'localhost',
  '127.0.0.1',
  'chatgpt.com',
  'claude.ai',
]

// Public suffixes made of two labels; the registrable domain takes three
export const TWO_PART_SUFFIXES = ['co.uk', 'org.uk', 'ac.uk', 'com.au', 'co.nz', 'co.jp', 'com.br', 'co.in', 'com.tr']

// Folder names that say nothing on their own and are qualified by their parent
export const GENERIC_FOLDER_NAMES = [
  'src',
  'web',
  'api',
  'app',
  'apps',
  'frontend',
  'backend',
  'client',
  'server',
  'lib',
  'docs',
  'packages',
]

export const TITLE_STOP_TOKENS = ['unknown', 'home', 'untitled', 'new tab', 'inbox', 'settings', 'loading', 'welcome']

export const DESIGN_BUNDLE_IDS = ['com.figma.Desktop', 'com.bohemiancoding.sketch3', 'com.adobe.xd']
