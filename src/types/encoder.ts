/**
 * Encoder capability
 *
 * The executor only talks to this interface; the fluent-ffmpeg implementation
 * lives in services/ffmpeg.ts and tests swap in a fake.
 */

import { ConcatMode, ExportResolution } from './export';

export interface ExtractJob {
  sourcePath: string;
  /** Source start in seconds (inclusive) */
  start: number;
  /** Source end in seconds (exclusive) */
  end: number;
  speed: number;
  /** Effective rotation in degrees (override already applied) */
  rotation: number;
  resolution: ExportResolution;
  /** Constant output frame rate shared by every unit */
  frameRate: number;
  destPath: string;
}

/** What a finished encoder process reports; never thrown */
export interface EncoderStatus {
  ok: boolean;
  exitCode: number | null;
  signal: string | null;
  stderr: string;
  command: string | null;
}

export interface Encoder {
  /** Re-encode [start, end) of a source at `speed` into destPath */
  extract(job: ExtractJob, signal?: AbortSignal): Promise<EncoderStatus>;
  /** Join inputs, in order, into destPath */
  concat(
    inputs: readonly string[],
    destPath: string,
    mode: ConcatMode,
    signal?: AbortSignal
  ): Promise<EncoderStatus>;
}
