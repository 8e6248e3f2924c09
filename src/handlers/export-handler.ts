import { compileTimeline } from '../services/compiler';
import { mapAnnotations } from '../services/annotations';
import { assignOutputs, CLIPS_DIRNAME, exportProject, WORK_DIRNAME } from '../services/export';
import { importVideos } from '../services/importer';
import { createTimelineStore } from '../stores/timelineStore';
import { Encoder } from '../types/encoder';
import {
  COMMANDS,
  ExportCallbacks,
  ExportSuccessResponse,
  ExportWarning,
  HandlerResult,
  PlanSuccessResponse,
  ProbeSuccessResponse,
} from '../types/export';
import { ProbeFn } from '../types/media';
import { Project } from '../types/timeline';
import { HighlightReelConfig } from '../utils/config';
import { parseRequest, runHandler } from './handlers';
import { exportRequestSchema, planRequestSchema, probeRequestSchema, ProjectPayload } from './schemas';

export interface ExportContext {
  config: HighlightReelConfig;
  encoder?: Encoder;
  signal?: AbortSignal;
  callbacks?: ExportCallbacks;
}

/** Load the payload through the timeline store so every model rule applies */
export function buildProject(payload: ProjectPayload, config: HighlightReelConfig): Project {
  const store = createTimelineStore({
    videos: payload.videos,
    segments: payload.segments,
    notes: payload.notes,
    gapPolicy: {
      enabled: payload.gapPolicy?.enabled ?? false,
      speed: payload.gapPolicy?.speed ?? config.gapSpeed,
    },
  });
  return store.getState().getSnapshot();
}

export function handleStartExport(
  request: unknown,
  context: ExportContext
): Promise<HandlerResult<ExportSuccessResponse>> {
  return runHandler<ExportSuccessResponse>(COMMANDS.EXPORT, async () => {
    const { project, exportDir } = parseRequest(exportRequestSchema, request);
    const snapshot = buildProject(project, context.config);
    const result = await exportProject(snapshot, {
      exportDir,
      config: context.config,
      encoder: context.encoder,
      signal: context.signal,
      callbacks: context.callbacks,
    });
    return { success: true, result };
  });
}

export function handlePlan(
  request: unknown,
  config: HighlightReelConfig
): Promise<HandlerResult<PlanSuccessResponse>> {
  return runHandler<PlanSuccessResponse>(COMMANDS.PLAN, async () => {
    const { project } = parseRequest(planRequestSchema, request);
    const snapshot = buildProject(project, config);
    const compiled = compileTimeline(snapshot);
    const annotations = mapAnnotations(snapshot, compiled, config.chapters);
    // Only the label collisions matter here, not the paths
    const { warnings: labelWarnings } = assignOutputs(
      compiled.plan.units,
      { clipsDir: CLIPS_DIRNAME, workDir: WORK_DIRNAME },
      config.duplicateLabelPolicy
    );
    const warnings: ExportWarning[] = [
      ...compiled.warnings,
      ...annotations.report.warnings,
      ...labelWarnings,
    ];
    return { success: true, plan: compiled.plan, annotations, warnings };
  });
}

export function handleProbe(request: unknown, probe?: ProbeFn): Promise<HandlerResult<ProbeSuccessResponse>> {
  return runHandler<ProbeSuccessResponse>(COMMANDS.PROBE, async () => {
    const { paths } = parseRequest(probeRequestSchema, request);
    const store = createTimelineStore();
    const { imported, failed } = await importVideos(store, paths, probe);
    return { success: true, videos: imported, failed };
  });
}
