/**
 * Error classes
 *
 * Model errors are thrown synchronously by the timeline store at the call that
 * would break an invariant. Warnings are never thrown; they travel as data in
 * the reports returned next to the plan and the export result.
 */

export class HighlightReelError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ModelError extends HighlightReelError {}

export class OverlapError extends ModelError {
  constructor(
    readonly segmentId: string,
    readonly collidingSegmentId: string,
    readonly videoId: string
  ) {
    super(
      'OVERLAP',
      `Segment ${segmentId} overlaps segment ${collidingSegmentId} in video ${videoId}`
    );
  }
}

export class OutOfRangeError extends ModelError {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly bounds: string
  ) {
    super('OUT_OF_RANGE', `${field} ${value} is out of range (expected ${bounds})`);
  }
}

export class UnknownVideoError extends ModelError {
  constructor(readonly videoId: string) {
    super('UNKNOWN_VIDEO', `Video ${videoId} is not part of the project`);
  }
}

export class NotFoundError extends ModelError {
  constructor(
    readonly entity: 'video' | 'segment' | 'note',
    readonly id: string
  ) {
    super('NOT_FOUND', `No ${entity} with id ${id}`);
  }
}

export class DuplicateIdError extends ModelError {
  constructor(
    readonly entity: 'video' | 'segment' | 'note',
    readonly id: string
  ) {
    super('DUPLICATE_ID', `A ${entity} with id ${id} already exists`);
  }
}

export class ExportAlreadyRunningError extends HighlightReelError {
  constructor(readonly exportDir: string) {
    super('EXPORT_ALREADY_RUNNING', `An export into ${exportDir} is already running`);
  }
}

export class ConfigError extends HighlightReelError {
  constructor(message: string, readonly key?: string) {
    super('CONFIG', key ? `Invalid config "${key}": ${message}` : message);
  }
}

export class ProbeError extends HighlightReelError {
  constructor(readonly filePath: string, message: string) {
    super('PROBE', `Failed to probe ${filePath}: ${message}`);
  }
}

export interface RequestIssue {
  path: string;
  message: string;
}

export class InvalidRequestError extends HighlightReelError {
  constructor(message: string, readonly issues: RequestIssue[] = []) {
    super('INVALID_REQUEST', message);
  }
}
