/**
 * Export Request/Response Types
 *
 * WHY THIS FILE EXISTS:
 * - Centralizes command names as constants to prevent typos
 * - Defines the request/response messages exchanged with the UI layer or CLI
 * - Defines the export result, job log records and the warnings surfaced with them
 *
 * NAMING CONVENTION:
 * - Command names use kebab-case (e.g., 'export')
 * - Request/Response interfaces use PascalCase with suffix (e.g., ExportSuccessResponse)
 */

import { AnnotationResult, ValidationWarning } from './annotations';
import { CompilationWarning, OutputPlan } from './plan';
import { Video } from './timeline';

/**
 * COMMANDS - All available command names
 */
export const COMMANDS = {
  /** Compile the project and encode every artifact into the export directory */
  EXPORT: 'export',

  /** Compile the project and map notes without running the encoder */
  PLAN: 'plan',

  /** Probe source files and describe them as project videos */
  PROBE: 'probe',
} as const;

export type Command = typeof COMMANDS[keyof typeof COMMANDS];

export type ExportResolution = 'source' | '720p' | '1080p';

export type ConcatMode = 'copy' | 'reencode';

/** Which Keep unit gets the named clip file when sanitized labels collide */
export type DuplicateLabelPolicy = 'suffix' | 'keep-first' | 'keep-last';

// ============================================================================
// JOB LOG
// ============================================================================

export type JobStatus = 'succeeded' | 'failed' | 'timed-out' | 'cancelled';

/** One entry per Unit, in plan order */
export interface JobRecord {
  unit: number;
  kind: 'keep' | 'gap';
  label: string;
  videoId: string;
  sourceStart: number;
  sourceEnd: number;
  speed: number;
  status: JobStatus;
  exitCode: number | null;
  signal: string | null;
  durationMs: number;
  command: string | null;
  stderr: string;
  /** Absolute path of the encoded file (named clip or work-directory intermediate) */
  output: string;
  /** True when `output` is a named file under clips/ */
  namedClip: boolean;
}

export type ConcatStatus = 'succeeded' | 'failed' | 'skipped';

export interface ConcatRecord {
  stage: 'concat';
  status: ConcatStatus;
  /** Why concatenation did not run */
  reason: string | null;
  exitCode: number | null;
  durationMs: number;
  command: string | null;
  stderr: string;
}

// ============================================================================
// RESULT
// ============================================================================

export interface DuplicateLabelWarning {
  code: 'DUPLICATE_LABEL';
  message: string;
  label: string;
  segmentIds: string[];
}

export type ExportWarning = CompilationWarning | ValidationWarning | DuplicateLabelWarning;

export type ExportStatus = 'succeeded' | 'partial' | 'cancelled' | 'empty';

export interface ExportArtifacts {
  /** Null when assembly did not run or failed */
  highlights: string | null;
  /** Named clip files that exist on disk */
  clips: string[];
  chapters: string;
  comments: string;
  log: string;
  /** Kept on disk only when assembly did not succeed */
  workDir: string | null;
}

export interface ExportResult {
  status: ExportStatus;
  exportDir: string;
  plan: OutputPlan;
  annotations: AnnotationResult;
  jobs: JobRecord[];
  concat: ConcatRecord;
  artifacts: ExportArtifacts;
  warnings: ExportWarning[];
  /** Clip outputs that finished before a cancellation arrived */
  completedBeforeCancellation: string[];
}

export interface ExportCallbacks {
  onStart?: (exportId: string, unitCount: number) => void;
  onJobEnd?: (record: JobRecord, completed: number, total: number) => void;
  onConcatStart?: () => void;
  onEnd?: (result: ExportResult) => void;
  onCancel?: () => void;
}

// ============================================================================
// RESPONSES
// ============================================================================

export interface ExportSuccessResponse {
  success: true;
  result: ExportResult;
}

export interface PlanSuccessResponse {
  success: true;
  plan: OutputPlan;
  annotations: AnnotationResult;
  warnings: ExportWarning[];
}

export interface ProbeSuccessResponse {
  success: true;
  videos: Video[];
  failed: Array<{ path: string; error: string }>;
}

/**
 * Error response structure used by every handler
 */
export interface ErrorResponse {
  success: false;
  /** User-facing error message */
  error: string;
  /** Stable error code (e.g. 'OVERLAP', 'EXPORT_ALREADY_RUNNING') */
  code?: string;
  /** Technical details for logging */
  details?: string;
}

export type HandlerResult<T> = T | ErrorResponse;

/**
 * Type guard to check if a response is an error
 *
 * USAGE:
 * const response = await handleExport(payload);
 * if (isErrorResponse(response)) {
 *   console.error(response.error);
 * } else {
 *   console.log(response.result.status);
 * }
 */
export function isErrorResponse(response: unknown): response is ErrorResponse {
  return (
    typeof response === 'object' &&
    response !== null &&
    'success' in response &&
    response.success === false
  );
}
