/**
 * Timeline Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Defines the project data the timeline compiler reads: videos, segments, notes
 * - Provides type safety for timeline-related operations across the library
 *
 * All time values are in seconds, relative to the start of the owning video.
 */

/**
 * Video
 *
 * A source recording imported into the project. Immutable once imported
 * except for `order`, which sets the cross-video concatenation order.
 */
export interface Video {
  /** Unique identifier for the video */
  id: string;

  /** Absolute path to the source file on disk */
  path: string;

  /** Display order index (lower plays first) */
  order: number;

  /** Probed duration in seconds */
  duration: number;

  /** Probed frame rate, null when the container does not report one */
  frameRate: number | null;

  /** Probed rotation in degrees (0, 90, 180, 270) */
  rotation?: number;

  /** User override for rotation; wins over the probed value when set */
  rotationOverride?: number | null;
}

/**
 * Segment
 *
 * A keep-range inside one video. Segments of the same video never overlap;
 * touching ranges (`a.end === b.start`) are allowed.
 */
export interface Segment {
  /** Unique identifier for the segment */
  id: string;

  /** References Video.id */
  videoId: string;

  /** Source start time in seconds (≥ 0) */
  start: number;

  /** Source end time in seconds (> start, ≤ video duration) */
  end: number;

  /** Display label, also used for the clip file name */
  label: string;

  /** Playback speed factor (> 0, 1 = realtime) */
  speed: number;

  /** Display order within its video */
  order: number;
}

export type NoteKind = 'comment' | 'chapter';

/**
 * Note
 *
 * A timestamped annotation. Notes are independent of segments: the timestamp
 * may or may not fall inside a kept range.
 */
export interface Note {
  id: string;
  videoId: string;
  kind: NoteKind;
  /** Source timestamp in seconds (within [0, video duration]) */
  timestamp: number;
  body: string;
}

/**
 * GapPolicy
 *
 * When enabled, source ranges not covered by a segment stay in the output
 * as filler played at `speed`.
 */
export interface GapPolicy {
  enabled: boolean;
  speed: number;
}

/**
 * Project
 *
 * Read-only snapshot handed to the compiler. `videos` is sorted by `order`.
 */
export interface Project {
  videos: Video[];
  segments: Segment[];
  notes: Note[];
  gapPolicy: GapPolicy;
}
