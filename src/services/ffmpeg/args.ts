/**
 * Shared leading arguments: quiet logging, no prompts, no stdin.
 * Returns a pre-allocated array to avoid rebuilding it per call.
 */
const QUIET_ARGS: readonly string[] = Object.freeze(['-hide_banner', '-nostdin', '-loglevel', 'error']);

export const getQuietArgs = (): readonly string[] => QUIET_ARGS;

/**
 * ffprobe arguments that print the first video stream and the container
 * duration as JSON.
 */
export const buildProbeArgs = (inputPath: string): string[] => [
  '-v',
  'error',
  '-select_streams',
  'v:0',
  '-show_entries',
  'stream=width,height,avg_frame_rate,r_frame_rate,nb_frames:format=duration',
  '-of',
  'json',
  inputPath,
];

/**
 * ffmpeg arguments that run `filter` (cropdetect) over the first `seconds` of
 * the first video stream and discard the output. Logs at info level, which
 * is where cropdetect reports.
 */
export const buildCropDetectArgs = (inputPath: string, filter: string, seconds: number): string[] => [
  '-hide_banner',
  '-nostdin',
  '-noautorotate',
  '-i',
  inputPath,
  '-map',
  '0:v:0',
  '-an',
  '-t',
  String(seconds),
  '-vf',
  filter,
  '-f',
  'null',
  '-',
];

/**
 * ffmpeg arguments that decode the first video stream to packed RGB24 on stdout.
 * Autorotation is off so frame sizes match the probed stream size.
 *
 * @example
 * buildRawDecodeArgs('/in.mp4', 'fps=15', 900);
 * // [...quiet, '-noautorotate', '-i', '/in.mp4', '-map', '0:v:0', '-an', '-vf', 'fps=15', '-frames:v', '900',
 * //  '-f', 'rawvideo', '-pix_fmt', 'rgb24', 'pipe:1']
 */
export const buildRawDecodeArgs = (
  inputPath: string,
  videoFilter: string,
  maxFrames: number
): string[] => [
  ...getQuietArgs(),
  '-noautorotate',
  '-i',
  inputPath,
  '-map',
  '0:v:0',
  '-an',
  '-vf',
  videoFilter,
  '-frames:v',
  String(maxFrames),
  '-f',
  'rawvideo',
  '-pix_fmt',
  'rgb24',
  'pipe:1',
];
