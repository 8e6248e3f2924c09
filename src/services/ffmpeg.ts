/**
 * FFmpeg Service Module
 *
 * WHY THIS FILE EXISTS:
 * - Resolves the ffmpeg/ffprobe binaries and hands them to fluent-ffmpeg
 * - Extracts video metadata (duration, frame rate, rotation) using FFprobe
 * - Builds the per-unit filter chains and runs the extract/concat commands
 *
 * DEPENDENCIES:
 * - fluent-ffmpeg: High-level FFmpeg API for Node.js
 * - @ffmpeg-installer/ffmpeg: Pre-built FFmpeg binary (no external install needed)
 * - ffprobe-static: Pre-built FFprobe binary for metadata extraction
 *
 * Paths set in config (or FFMPEG_PATH / FFPROBE_PATH) win over the bundled binaries.
 */

import ffmpeg from 'fluent-ffmpeg';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { Encoder, EncoderStatus, ExtractJob } from '../types/encoder';
import { ConcatMode, ExportResolution } from '../types/export';
import { VideoMetadata } from '../types/media';
import { HighlightReelConfig } from '../utils/config';
import { ProbeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { f } from '../utils/timecode';

const log = createLogger('FFMPEG');

/** Encoder stderr kept per job (the tail; progress lines are noisy) */
export const MAX_STDERR_LINES = 200;

const SPEED_EPSILON = 1e-3;
const ATEMPO_EPSILON = 1e-4;

// ============================================================================
// Binary resolution
// ============================================================================

export type BinaryConfig = Pick<HighlightReelConfig, 'ffmpegPath' | 'ffprobePath'>;

function modulePath(id: string): string | null {
  let mod: unknown;
  try {
    mod = require(id);
  } catch (e) {
    log.debug(`${id} unavailable:`, e instanceof Error ? e.message : e);
    return null;
  }
  if (typeof mod === 'string') return mod;
  if (typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string') {
    return mod.path;
  }
  return null;
}

function pathIfExists(p: string | null): string | null {
  return p && fs.existsSync(p) ? p : null;
}

// Packaged binaries sometimes lose their execute bit
function ensureExecutable(p: string): void {
  if (process.platform === 'win32') return;
  try {
    fs.chmodSync(p, 0o755);
  } catch (chmodError) {
    log.warn('Could not set permissions (may already be set):', chmodError);
  }
}

export function resolveBinaries(config: BinaryConfig): {
  ffmpegPath: string | null;
  ffprobePath: string | null;
} {
  let ffmpegPath = config.ffmpegPath;
  if (!ffmpegPath) {
    ffmpegPath = pathIfExists(modulePath('@ffmpeg-installer/ffmpeg'));
    if (ffmpegPath) ensureExecutable(ffmpegPath);
  }
  let ffprobePath = config.ffprobePath;
  if (!ffprobePath) {
    ffprobePath = pathIfExists(modulePath('ffprobe-static'));
    if (ffprobePath) ensureExecutable(ffprobePath);
  }
  return { ffmpegPath, ffprobePath };
}

let configuredKey: string | null = null;

/** Point fluent-ffmpeg at the resolved binaries; repeated calls with the same config are no-ops */
export function configureBinaries(config: BinaryConfig): void {
  const key = `${config.ffmpegPath ?? ''}|${config.ffprobePath ?? ''}`;
  if (configuredKey === key) return;
  configuredKey = key;

  const { ffmpegPath, ffprobePath } = resolveBinaries(config);
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  } else {
    log.error('Unable to resolve ffmpeg binary path; falling back to ffmpeg on PATH.');
  }
  if (ffprobePath) {
    ffmpeg.setFfprobePath(ffprobePath);
  } else {
    log.error('Unable to resolve ffprobe binary path; falling back to ffprobe on PATH.');
  }
  log.debug('FFmpeg binary path:', ffmpegPath);
  log.debug('FFprobe binary path:', ffprobePath);
}

// ============================================================================
// Probe
// ============================================================================

/** Parses ffprobe rates such as "30000/1001" or "25"; null for "0/0" and junk */
export function parseFrameRate(value: unknown): number | null {
  if (typeof value !== 'string' || !value) return null;
  const [numText, denText] = value.split('/', 2);
  const num = Number(numText);
  const den = denText === undefined ? 1 : Number(denText);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return null;
  const rate = num / den;
  return rate > 0 ? rate : null;
}

/** Snap to the nearest quarter turn in [0, 360) */
export function normalizeRotation(degrees: number): number {
  const snapped = Math.round(degrees / 90) * 90;
  return ((snapped % 360) + 360) % 360;
}

/**
 * Clockwise rotation needed to display the stream upright.
 *
 * The legacy `rotate` tag is already clockwise; display-matrix side data
 * reports the counter-clockwise angle, so it is negated.
 */
export function extractRotation(stream: ffmpeg.FfprobeStream): number {
  const tag = stream.tags?.rotate;
  if (tag !== undefined && Number.isFinite(Number(tag))) {
    return normalizeRotation(Number(tag));
  }
  const sideData: unknown = stream.side_data_list;
  const entries: unknown[] = Array.isArray(sideData) ? sideData : [];
  for (const entry of entries) {
    if (typeof entry === 'object' && entry !== null && 'rotation' in entry) {
      const value = Number(entry.rotation);
      if (Number.isFinite(value)) return normalizeRotation(-value);
    }
  }
  return 0;
}

export function metadataFromProbe(data: ffmpeg.FfprobeData): VideoMetadata {
  const duration = Number(data.format.duration);
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error('Container reports no duration');
  }

  // A file can carry several streams (video, audio, subtitles); use the first video one
  const videoStream = data.streams.find((stream) => stream.codec_type === 'video');
  if (!videoStream) {
    throw new Error('No video stream found in file');
  }

  return {
    duration,
    frameRate: parseFrameRate(videoStream.avg_frame_rate) ?? parseFrameRate(videoStream.r_frame_rate),
    rotation: extractRotation(videoStream),
    width: videoStream.width ?? 0,
    height: videoStream.height ?? 0,
  };
}

/**
 * Extract video metadata using FFprobe
 *
 * @throws ProbeError if the file cannot be read or has no usable video stream
 *
 * @example
 * const metadata = await probeVideo('/path/to/bout.mp4');
 * console.log(`Duration: ${metadata.duration}s, rotation: ${metadata.rotation}`);
 */
export function probeVideo(filePath: string): Promise<VideoMetadata> {
  if (configuredKey === null) configureBinaries({ ffmpegPath: null, ffprobePath: null });

  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: unknown, data: ffmpeg.FfprobeData) => {
      if (err) {
        log.error('Error extracting metadata:', err);
        reject(new ProbeError(filePath, err instanceof Error ? err.message : String(err)));
        return;
      }
      try {
        resolve(metadataFromProbe(data));
      } catch (parseError) {
        log.error('Error parsing metadata:', parseError);
        reject(
          new ProbeError(filePath, parseError instanceof Error ? parseError.message : String(parseError))
        );
      }
    });
  });
}

// ============================================================================
// Filters
// ============================================================================

const RESOLUTION_SIZE: Record<Exclude<ExportResolution, 'source'>, [number, number]> = {
  '1080p': [1920, 1080],
  '720p': [1280, 720],
};

export function rotationFilter(rotation: number): string | null {
  switch (normalizeRotation(rotation)) {
    case 90:
      return 'transpose=1';
    case 180:
      return 'transpose=1,transpose=1';
    case 270:
      return 'transpose=2';
    default:
      return null;
  }
}

/** Letterbox into the target frame; null keeps the source size */
export function scaleFilter(resolution: ExportResolution): string | null {
  if (resolution === 'source') return null;
  const [w, h] = RESOLUTION_SIZE[resolution];
  return `scale=${w}:${h}:force_original_aspect_ratio=decrease,pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2:black`;
}

export function buildVideoFilters(rotation: number, speed: number, resolution: ExportResolution): string[] {
  const filters: string[] = [];
  if (Math.abs(speed - 1) > SPEED_EPSILON) filters.push(`setpts=PTS/${speed.toFixed(6)}`);
  const rot = rotationFilter(rotation);
  if (rot) filters.push(rot);
  const scale = scaleFilter(resolution);
  if (scale) filters.push(scale);
  return filters;
}

/**
 * atempo only takes factors in [0.5, 2.0], so larger and smaller speeds
 * become a product of in-range factors (4.0 -> 2.0 x 2.0, 0.25 -> 0.5 x 0.5).
 */
export function atempoFilters(speed: number): string[] {
  if (!(speed > 0)) return [];
  const factors: number[] = [];
  let remaining = speed;
  while (remaining > 2.0) {
    factors.push(2.0);
    remaining /= 2.0;
  }
  while (remaining < 0.5) {
    factors.push(0.5);
    remaining /= 0.5;
  }
  if (Math.abs(remaining - 1.0) > ATEMPO_EPSILON) factors.push(remaining);
  return factors.map((factor) => `atempo=${factor.toFixed(6)}`);
}

/** Quote a path for a concat demuxer list: `file '<escaped>'` */
export function escapeForConcat(filePath: string): string {
  return filePath.replace(/[\x00-\x1f]/g, '').replace(/'/g, "'\\''");
}

// ============================================================================
// Encoder
// ============================================================================

/** Pulls exit code and signal out of fluent-ffmpeg's error message */
export function parseExit(message: string): { exitCode: number | null; signal: string | null } {
  const code = /exited with code (\d+)/.exec(message);
  const signal = /killed with signal (\w+)/.exec(message);
  return {
    exitCode: code ? Number(code[1]) : null,
    signal: signal ? signal[1] : null,
  };
}

function failure(message: string): EncoderStatus {
  return { ok: false, exitCode: null, signal: null, stderr: message, command: null };
}

/** Runs a prepared command and settles with its status; aborting kills the process */
function runCommand(cmd: ffmpeg.FfmpegCommand, label: string, signal?: AbortSignal): Promise<EncoderStatus> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve({ ...failure('aborted before start'), signal: 'SIGKILL' });
      return;
    }

    const stderr: string[] = [];
    let command: string | null = null;
    let killRequested = false;

    const kill = () => {
      log.debug(`[${label}] killing`);
      cmd.kill('SIGKILL');
    };
    // kill() is a no-op until the process has spawned, so a pending abort is replayed on 'start'
    const onAbort = () => {
      killRequested = true;
      if (command !== null) kill();
    };
    const settle = (status: EncoderStatus) => {
      signal?.removeEventListener('abort', onAbort);
      resolve(status);
    };

    cmd
      .on('start', (commandLine: string) => {
        command = commandLine;
        log.debug(`[${label}][start]`, commandLine);
        if (killRequested) kill();
      })
      .on('stderr', (line: string) => {
        stderr.push(line);
        if (stderr.length > MAX_STDERR_LINES) stderr.shift();
      })
      .on('end', () => {
        settle({ ok: true, exitCode: 0, signal: null, stderr: stderr.join('\n'), command });
      })
      .on('error', (err: Error) => {
        log.debug(`[${label}][error]`, err.message);
        settle({
          ok: false,
          ...parseExit(err.message),
          stderr: stderr.length > 0 ? stderr.join('\n') : err.message,
          command,
        });
      });

    signal?.addEventListener('abort', onAbort, { once: true });
    cmd.run();
  });
}

const H264_OPTIONS = ['-c:v libx264', '-preset veryfast', '-crf 20', '-pix_fmt yuv420p', '-c:a aac'];

// Units from different recordings are joined by stream copy, so they must
// agree on frame timing and audio layout.
const AUDIO_SAMPLE_RATE = 48000;
const AUDIO_CHANNELS = 2;

export function normalizeOptions(frameRate: number): string[] {
  return [`-r ${f(frameRate)}`, '-vsync cfr', `-ar ${AUDIO_SAMPLE_RATE}`, `-ac ${AUDIO_CHANNELS}`];
}

/**
 * Encoder backed by fluent-ffmpeg.
 *
 * Every unit is re-encoded (H.264/AAC at a constant frame rate, 48 kHz
 * stereo) with timestamps reset so the parts line up at concatenation.
 */
export class FfmpegEncoder implements Encoder {
  constructor(config: BinaryConfig) {
    configureBinaries(config);
  }

  extract(job: ExtractJob, signal?: AbortSignal): Promise<EncoderStatus> {
    let cmd: ffmpeg.FfmpegCommand;
    try {
      const outDuration = (job.end - job.start) / job.speed;
      cmd = ffmpeg(job.sourcePath)
        // rotation is applied by our own transpose filter
        .inputOptions(['-noautorotate'])
        .seekInput(f(Math.max(0, job.start)))
        .duration(f(outDuration))
        .outputOptions([
          ...H264_OPTIONS,
          ...normalizeOptions(job.frameRate),
          '-fflags +genpts',
          '-reset_timestamps 1',
          '-avoid_negative_ts 1',
          '-movflags +faststart',
        ])
        .format('mp4')
        .output(job.destPath);

      const vf = buildVideoFilters(job.rotation, job.speed, job.resolution);
      if (vf.length > 0) cmd.videoFilters(vf);
      const af = atempoFilters(job.speed);
      if (af.length > 0) cmd.audioFilters(af);
    } catch (e) {
      return Promise.resolve(failure(e instanceof Error ? e.message : String(e)));
    }
    return runCommand(cmd, path.basename(job.destPath), signal);
  }

  async concat(
    inputs: readonly string[],
    destPath: string,
    mode: ConcatMode,
    signal?: AbortSignal
  ): Promise<EncoderStatus> {
    if (inputs.length === 0) return failure('nothing to concatenate');
    if (mode === 'reencode') return this.concatReencode(inputs, destPath, signal);

    const listPath = path.join(path.dirname(destPath), `concat-${randomUUID()}.txt`);
    const listContent = inputs.map((p) => `file '${escapeForConcat(path.resolve(p))}'`).join('\n');
    await fs.promises.writeFile(listPath, `${listContent}\n`, 'utf8');
    try {
      const cmd = ffmpeg()
        .input(listPath)
        .inputOptions(['-f concat', '-safe 0'])
        .outputOptions(['-c copy', '-movflags +faststart'])
        .format('mp4')
        .output(destPath);
      return await runCommand(cmd, 'concat', signal);
    } finally {
      await fs.promises.unlink(listPath).catch((e: unknown) => {
        log.warn('Could not remove concat list:', listPath, e);
      });
    }
  }

  private concatReencode(inputs: readonly string[], destPath: string, signal?: AbortSignal): Promise<EncoderStatus> {
    const cmd = ffmpeg();
    inputs.forEach((p) => cmd.input(p));

    const filters: string[] = [];
    inputs.forEach((_, i) => {
      filters.push(`[${i}:v]setpts=PTS-STARTPTS[v${i}]`);
      filters.push(`[${i}:a]asetpts=PTS-STARTPTS[a${i}]`);
    });
    const pairs = inputs.map((_, i) => `[v${i}][a${i}]`).join('');
    filters.push(`${pairs}concat=n=${inputs.length}:v=1:a=1[v][a]`);

    cmd
      .complexFilter(filters, ['v', 'a'])
      .outputOptions([...H264_OPTIONS, '-movflags +faststart'])
      .format('mp4')
      .output(destPath);
    return runCommand(cmd, 'concat', signal);
  }
}
