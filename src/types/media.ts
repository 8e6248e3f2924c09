/**
 * Media Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Defines what the ffprobe wrapper returns for a source file
 * - Used by the importer to turn files into timeline Videos
 */

/**
 * VideoMetadata
 *
 * Result of probing a source recording.
 *
 * @example
 * const metadata: VideoMetadata = {
 *   duration: 182.5,
 *   frameRate: 29.97,
 *   rotation: 90,
 *   width: 1920,
 *   height: 1080,
 * };
 */
export interface VideoMetadata {
  /** Duration in seconds (from the container format) */
  duration: number;

  /** Average frame rate of the first video stream, null if unknown */
  frameRate: number | null;

  /** Rotation normalized to 0, 90, 180 or 270 */
  rotation: number;

  /** Video width in pixels */
  width: number;

  /** Video height in pixels */
  height: number;
}

/** Capability used to bound segment and note timestamps on import */
export type ProbeFn = (filePath: string) => Promise<VideoMetadata>;
