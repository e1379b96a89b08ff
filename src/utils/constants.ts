/**
 * Application Constants
 *
 * Static tuning values and format tables. Anything an operator may change
 * belongs in `@config/app-config` instead; the defaults there refer to these.
 * All constants use UPPER_SNAKE_CASE naming convention.
 */

// ============================================================================
// ENCODER
// ============================================================================

/**
 * Version of the frame encoding. Bump when the codec's output changes so
 * artifacts written by an older encoder are replaced on the next scan.
 */
export const ENCODER_VERSION = 'rgb888-v1';

/** Largest accepted geometry side (pixels) */
export const MAX_GEOMETRY_DIMENSION = 1024;

/** Default set of geometries (Cosmic, Galaxy and Stellar Unicorn panels) */
export const DEFAULT_GEOMETRIES = '32x32,53x11,16x16';

// ============================================================================
// FRAME TIMING
// ============================================================================

/** Default frame duration when the source carries none (≈15 fps) */
export const DEFAULT_FRAME_DURATION_MS = 66;

/** Duration of the single frame of a still image */
export const STILL_FRAME_DURATION_MS = 1000;

/** GIF delays at or below this are treated as unset by browsers */
export const GIF_MIN_DELAY_MS = 10;

/** Replacement for too-short GIF delays */
export const GIF_CLAMPED_DELAY_MS = 100;

/** Frame rate videos are sampled at */
export const DEFAULT_VIDEO_FPS = 15;

/** Seconds of video scanned for black borders; 0 turns detection off */
export const DEFAULT_CROP_DETECT_SECONDS = 5;

/** A detected crop smaller than this share of either side is ignored */
export const MIN_CROP_FRACTION = 0.5;

/** Upper bound on frames kept per source */
export const DEFAULT_MAX_FRAMES = 900;

/**
 * Long side of the intermediate decode size. Sources are pre-scaled to fit
 * before per-geometry fitting so a 4K video never sits in memory at full size.
 */
export const DEFAULT_DECODE_MAX_DIMENSION = 256;

// ============================================================================
// SUPPORTED SOURCE FORMATS
// ============================================================================

/**
 * Extensions decoded with sharp. Multi-page files become `animated`.
 */
export const IMAGE_EXTENSIONS = ['gif', 'png', 'jpg', 'jpeg', 'webp', 'avif', 'tif', 'tiff'];

/**
 * Extensions decoded through ffmpeg.
 */
export const VIDEO_EXTENSIONS = [
  'mp4',
  'mov',
  'webm',
  'mkv',
  'avi',
  'm4v',
  'mpg',
  'mpeg',
  'ogv',
  'flv',
  'wmv',
  'ts',
];

// ============================================================================
// PROCESS TIMEOUTS (ms)
// ============================================================================

/** ffprobe should answer quickly; anything longer is a hung process */
export const FFPROBE_TIMEOUT_MS = 15_000;

/** Upper bound for a single video decode */
export const FFMPEG_DECODE_TIMEOUT_MS = 5 * 60 * 1000;

/** Cap on stderr kept from child processes for error messages */
export const MAX_STDERR_CHARS = 4000;

// ============================================================================
// ARTIFACT CONTAINER
// ============================================================================

/** Magic bytes at the start of every artifact file */
export const ARTIFACT_MAGIC = 'PXFA';

/** Container layout version (independent from ENCODER_VERSION) */
export const ARTIFACT_FORMAT_VERSION = 1;

/** Extension of artifact files under the cache root */
export const ARTIFACT_EXTENSION = '.frames';

/** Marker in temp file names; anything carrying it is reclaimable */
export const TEMP_FILE_MARKER = '.tmp-';

// ============================================================================
// STREAM PROTOCOL
// ============================================================================

/** Longest accepted handshake line (bytes) */
export const MAX_HANDSHAKE_BYTES = 512;

/** Default TCP port of the stream server */
export const DEFAULT_STREAM_PORT = 8766;

/** A pacing loop this far behind its schedule restarts the schedule from now */
export const PACING_RESYNC_MS = 1000;

/** Longest a closing session waits for its queued output to reach the socket */
export const SESSION_DRAIN_TIMEOUT_MS = 2000;

/** Unsent INFO/NOT_READY/ERROR messages tolerated before a client is dropped */
export const OUTBOUND_CONTROL_LIMIT = 64;
