export * from './types/timeline';
export * from './types/plan';
export * from './types/annotations';
export * from './types/encoder';
export * from './types/export';
export * from './types/media';

export { createTimelineStore } from './stores/timelineStore';
export type {
  NoteInput,
  NotePatch,
  ProjectInput,
  SegmentInput,
  SegmentPatch,
  TimelineState,
  TimelineStore,
  VideoInput,
} from './stores/timelineStore';

export { compileTimeline, complementRanges, coveredRanges } from './services/compiler';
export {
  EXCLUDED_REASON,
  formatChapterLines,
  formatCommentLines,
  mapAnnotations,
} from './services/annotations';
export { assignOutputs, exportProject, isExportRunning, sanitizeLabel } from './services/export';
export type { ExportOptions } from './services/export';
export {
  atempoFilters,
  buildVideoFilters,
  configureBinaries,
  FfmpegEncoder,
  probeVideo,
} from './services/ffmpeg';
export { importVideos } from './services/importer';
export type { ImportResult } from './services/importer';

export { handlePlan, handleProbe, handleStartExport } from './handlers/export-handler';

export * from './utils/errors';
export { defaultConfig, loadConfig } from './utils/config';
export type { ChapterConfig, ConfigOverrides, HighlightReelConfig } from './utils/config';
export { createLogger, setDebugLogging } from './utils/logger';
export { parseTimestamp, toTimestamp } from './utils/timecode';
