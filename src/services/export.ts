/**
 * Export Executor
 *
 * Compiles the project, encodes every unit of the plan through a bounded
 * worker pool, then joins the results into highlights.mp4.
 *
 * LAYOUT (under exportDir):
 *   highlights.mp4           concatenation of every unit, in plan order
 *   clips/<label>.mp4        one named file per Keep unit
 *   youtube_chapters.txt     HH:MM:SS <label>, first line at 00:00:00
 *   comments_timestamps.txt  HH:MM:SS <body>
 *   logs/export.log          one JSON record per line
 *   .work/                   gap and non-surviving duplicate intermediates
 *   .export.lock             owner pid while an export is running
 *
 * Jobs fail independently: one failed unit never stops the others, but the
 * concatenation only runs once every unit has succeeded.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Encoder, EncoderStatus, ExtractJob } from '../types/encoder';
import {
  ConcatRecord,
  DuplicateLabelPolicy,
  DuplicateLabelWarning,
  ExportCallbacks,
  ExportResult,
  ExportStatus,
  ExportWarning,
  JobRecord,
  JobStatus,
} from '../types/export';
import { KeepUnit, Unit } from '../types/plan';
import { Project, Video } from '../types/timeline';
import { runWithConcurrency } from '../utils/concurrency';
import { HighlightReelConfig } from '../utils/config';
import { ExportAlreadyRunningError } from '../utils/errors';
import { createLogger, isDebugEnabled } from '../utils/logger';
import { f } from '../utils/timecode';
import { formatChapterLines, formatCommentLines, mapAnnotations } from './annotations';
import { compileTimeline } from './compiler';
import { FfmpegEncoder } from './ffmpeg';

const log = createLogger('EXPORT');

export const HIGHLIGHTS_FILENAME = 'highlights.mp4';
export const CHAPTERS_FILENAME = 'youtube_chapters.txt';
export const COMMENTS_FILENAME = 'comments_timestamps.txt';
export const CLIPS_DIRNAME = 'clips';
export const LOGS_DIRNAME = 'logs';
export const LOG_FILENAME = 'export.log';
export const WORK_DIRNAME = '.work';
export const LOCK_FILENAME = '.export.lock';

export interface ExportOptions {
  exportDir: string;
  config: HighlightReelConfig;
  /** Defaults to the fluent-ffmpeg encoder */
  encoder?: Encoder;
  /** Aborting cancels queued jobs and kills running ones */
  signal?: AbortSignal;
  callbacks?: ExportCallbacks;
}

// Fast path for exports started by this process; the lock file covers others
const activeExports = new Set<string>();

export function isExportRunning(exportDir: string): boolean {
  return activeExports.has(path.resolve(exportDir));
}

// ============================================================================
// Clip naming
// ============================================================================

/** File-system-safe stem: runs of anything outside [A-Za-z0-9_.-] become `_` */
export function sanitizeLabel(label: string, fallback: string): string {
  const cleaned = label
    .trim()
    .replace(/[^\w.-]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return cleaned || fallback;
}

export interface UnitOutput {
  path: string;
  namedClip: boolean;
}

const POLICY_OUTCOME: Record<DuplicateLabelPolicy, string> = {
  suffix: 'later clips get a numeric suffix',
  'keep-first': 'only the first is written to clips/',
  'keep-last': 'only the last is written to clips/',
};

/**
 * Decide where each unit of the plan is written. Keep units get a named file
 * under clips/ unless the duplicate-label policy gives that name to another
 * unit; everything else goes to the work directory.
 */
export function assignOutputs(
  units: readonly Unit[],
  dirs: { clipsDir: string; workDir: string },
  policy: DuplicateLabelPolicy
): { outputs: UnitOutput[]; warnings: DuplicateLabelWarning[] } {
  // Keyed case-insensitively: Touch.mp4 and touch.mp4 are one file on
  // macOS and Windows volumes.
  const groups = new Map<string, Array<{ unit: KeepUnit; stem: string }>>();
  let ordinal = 0;
  for (const unit of units) {
    if (unit.kind !== 'keep') continue;
    ordinal += 1;
    const stem = sanitizeLabel(unit.label, `E${ordinal}`);
    const key = stem.toLowerCase();
    const group = groups.get(key);
    if (group) group.push({ unit, stem });
    else groups.set(key, [{ unit, stem }]);
  }

  const warnings: DuplicateLabelWarning[] = [];
  const reserved = new Set(groups.keys());
  const stems = new Map<number, string>();

  for (const group of groups.values()) {
    const first = group[0];
    const last = group[group.length - 1];
    if (group.length > 1) {
      warnings.push({
        code: 'DUPLICATE_LABEL',
        message: `Label "${first.stem}" is used by ${group.length} segments; ${POLICY_OUTCOME[policy]}`,
        label: first.stem,
        segmentIds: group.map((entry) => entry.unit.segmentId),
      });
    }
    if (policy === 'keep-last') {
      stems.set(last.unit.index, last.stem);
      continue;
    }
    stems.set(first.unit.index, first.stem);
    if (policy === 'suffix') {
      let n = 2;
      for (const { unit, stem } of group.slice(1)) {
        while (reserved.has(`${first.stem}_${n}`.toLowerCase())) n += 1;
        const suffixed = `${stem}_${n}`;
        reserved.add(suffixed.toLowerCase());
        stems.set(unit.index, suffixed);
      }
    }
  }

  const outputs = units.map((unit): UnitOutput => {
    const stem = stems.get(unit.index);
    if (stem !== undefined) {
      return { path: path.join(dirs.clipsDir, `${stem}.mp4`), namedClip: true };
    }
    const name = unit.kind === 'gap' ? `gap_${unit.gapNumber}.mp4` : `unit_${unit.index + 1}.mp4`;
    return { path: path.join(dirs.workDir, name), namedClip: false };
  });

  return { outputs, warnings };
}

// ============================================================================
// Jobs
// ============================================================================

function effectiveRotation(video: Video): number {
  return video.rotationOverride ?? video.rotation ?? 0;
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Callbacks belong to the caller; a throwing one must not break the pool */
function notify(name: string, fn: () => void): void {
  try {
    fn();
  } catch (e) {
    log.warn(`Callback ${name} threw:`, describeError(e));
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (e) {
    log.warn('Could not remove', filePath, describeError(e));
  }
}

interface JobContext {
  encoder: Encoder;
  videos: Map<string, Video>;
  config: HighlightReelConfig;
  signal?: AbortSignal;
}

async function runJob(unit: Unit, output: UnitOutput, ctx: JobContext): Promise<JobRecord> {
  const record = (status: JobStatus, durationMs: number, encoder: EncoderStatus | null): JobRecord => ({
    unit: unit.index,
    kind: unit.kind,
    label: unit.kind === 'keep' ? unit.label : `Gap ${unit.gapNumber}`,
    videoId: unit.videoId,
    sourceStart: unit.sourceStart,
    sourceEnd: unit.sourceEnd,
    speed: unit.speed,
    status,
    exitCode: encoder?.exitCode ?? null,
    signal: encoder?.signal ?? null,
    durationMs,
    command: encoder?.command ?? null,
    stderr: encoder?.stderr ?? '',
    output: output.path,
    namedClip: output.namedClip,
  });

  if (ctx.signal?.aborted) return record('cancelled', 0, null);

  const video = ctx.videos.get(unit.videoId);
  if (!video) {
    return record('failed', 0, {
      ok: false,
      exitCode: null,
      signal: null,
      stderr: `Video ${unit.videoId} is not part of the project`,
      command: null,
    });
  }

  const job: ExtractJob = {
    sourcePath: video.path,
    start: unit.sourceStart,
    end: unit.sourceEnd,
    speed: unit.speed,
    rotation: effectiveRotation(video),
    resolution: ctx.config.resolution,
    frameRate: ctx.config.frameRate,
    destPath: output.path,
  };

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, ctx.config.jobTimeoutMs);
  const onCancel = () => controller.abort();
  ctx.signal?.addEventListener('abort', onCancel, { once: true });

  const startedAt = Date.now();
  let status: EncoderStatus;
  try {
    status = await ctx.encoder.extract(job, controller.signal);
  } catch (e) {
    status = { ok: false, exitCode: null, signal: null, stderr: describeError(e), command: null };
  } finally {
    clearTimeout(timer);
    ctx.signal?.removeEventListener('abort', onCancel);
  }
  const durationMs = Date.now() - startedAt;

  if (status.ok) return record('succeeded', durationMs, status);

  await removeIfPresent(output.path);
  if (timedOut) return record('timed-out', durationMs, status);
  if (ctx.signal?.aborted) return record('cancelled', durationMs, status);
  return record('failed', durationMs, status);
}

// ============================================================================
// Export
// ============================================================================

function skippedConcat(reason: string): ConcatRecord {
  return {
    stage: 'concat',
    status: 'skipped',
    reason,
    exitCode: null,
    durationMs: 0,
    command: null,
    stderr: '',
  };
}

async function writeLines(filePath: string, lines: string[]): Promise<void> {
  const body = lines.length > 0 ? `${lines.join('\n')}\n` : '';
  await fs.promises.writeFile(filePath, body, 'utf8');
}

/**
 * Export a project into `options.exportDir`.
 *
 * @throws ExportAlreadyRunningError if another export, in this process or
 *   another, targets the same directory
 *
 * @example
 * const controller = new AbortController();
 * const result = await exportProject(store.getState().getSnapshot(), {
 *   exportDir: '/videos/bout-12/exports',
 *   config: loadConfig(),
 *   signal: controller.signal,
 * });
 * if (result.status === 'partial') console.log(result.jobs.filter((j) => j.status !== 'succeeded'));
 */
export async function exportProject(project: Project, options: ExportOptions): Promise<ExportResult> {
  const exportDir = path.resolve(options.exportDir);
  if (activeExports.has(exportDir)) throw new ExportAlreadyRunningError(exportDir);
  activeExports.add(exportDir);
  try {
    await fs.promises.mkdir(exportDir, { recursive: true });
    const lockPath = await acquireDirLock(exportDir);
    try {
      return await runExport(project, exportDir, options);
    } finally {
      await removeIfPresent(lockPath);
    }
  } finally {
    activeExports.delete(exportDir);
  }
}

// ============================================================================
// Directory lock
// ============================================================================

function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: alive, owned by someone else
    return errnoCode(e) !== 'ESRCH';
  }
}

async function readLockOwner(lockPath: string): Promise<number | null> {
  try {
    const pid = Number((await fs.promises.readFile(lockPath, 'utf8')).trim());
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return null;
    throw e;
  }
}

/**
 * Create `.export.lock` holding this pid. A lock left behind by a process
 * that no longer exists is taken over once.
 *
 * @throws ExportAlreadyRunningError while a live process holds the lock
 */
async function acquireDirLock(exportDir: string, retried = false): Promise<string> {
  const lockPath = path.join(exportDir, LOCK_FILENAME);
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(lockPath, 'wx');
  } catch (e) {
    if (errnoCode(e) !== 'EEXIST') throw e;
    const owner = await readLockOwner(lockPath);
    if (retried || owner === null || isProcessAlive(owner)) {
      throw new ExportAlreadyRunningError(exportDir);
    }
    log.warn(`Removing stale lock of exited process ${owner}:`, lockPath);
    await fs.promises.rm(lockPath, { force: true });
    return acquireDirLock(exportDir, true);
  }
  try {
    await handle.writeFile(`${process.pid}\n`, 'utf8');
  } catch (e) {
    await removeIfPresent(lockPath);
    throw e;
  } finally {
    await handle.close();
  }
  return lockPath;
}

async function runExport(project: Project, exportDir: string, options: ExportOptions): Promise<ExportResult> {
  const { config, signal, callbacks = {} } = options;
  const encoder = options.encoder ?? new FfmpegEncoder(config);
  const exportId = `export-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;

  const compiled = compileTimeline(project);
  const annotations = mapAnnotations(project, compiled, config.chapters);
  const { plan } = compiled;

  const clipsDir = path.join(exportDir, CLIPS_DIRNAME);
  const logsDir = path.join(exportDir, LOGS_DIRNAME);
  const workDir = path.join(exportDir, WORK_DIRNAME);
  const highlightsPath = path.join(exportDir, HIGHLIGHTS_FILENAME);
  const chaptersPath = path.join(exportDir, CHAPTERS_FILENAME);
  const commentsPath = path.join(exportDir, COMMENTS_FILENAME);
  const logPath = path.join(logsDir, LOG_FILENAME);

  await Promise.all([clipsDir, logsDir, workDir].map((dir) => fs.promises.mkdir(dir, { recursive: true })));
  // A stale file from an earlier run must not pass for this run's output
  await removeIfPresent(highlightsPath);

  const { outputs, warnings: labelWarnings } = assignOutputs(
    plan.units,
    { clipsDir, workDir },
    config.duplicateLabelPolicy
  );

  log.info(`[${exportId}] ${plan.units.length} unit(s), ${f(plan.totalDuration)}s of output -> ${exportDir}`);
  if (isDebugEnabled()) {
    for (const unit of plan.units) {
      log.debug(
        `[${exportId}] #${unit.index} ${unit.kind} ${unit.videoId} [${f(unit.sourceStart)}, ${f(unit.sourceEnd)}) x${unit.speed} @${f(unit.outStart)}s -> ${outputs[unit.index].path}`
      );
    }
  }
  notify('onStart', () => callbacks.onStart?.(exportId, plan.units.length));

  const ctx: JobContext = {
    encoder,
    videos: new Map(project.videos.map((v) => [v.id, v])),
    config,
    signal,
  };
  const jobs: JobRecord[] = [];
  await runWithConcurrency(plan.units, config.concurrency, async (unit, i) => {
    const record = await runJob(unit, outputs[i], ctx);
    jobs.push(record);
    if (record.status === 'succeeded') {
      log.debug(`[${exportId}] #${unit.index} done in ${record.durationMs}ms`);
    } else if (record.status !== 'cancelled') {
      log.warn(`[${exportId}] #${unit.index} ${record.label} ${record.status} (exit ${record.exitCode ?? record.signal ?? 'n/a'})`);
    }
    notify('onJobEnd', () => callbacks.onJobEnd?.(record, jobs.length, plan.units.length));
  });
  jobs.sort((a, b) => a.unit - b.unit);

  const unfinished = jobs.filter((j) => j.status !== 'succeeded');
  let concat: ConcatRecord;
  if (plan.units.length === 0) {
    concat = skippedConcat('empty plan');
  } else if (signal?.aborted) {
    concat = skippedConcat('cancelled');
  } else if (unfinished.length > 0) {
    concat = skippedConcat(`${unfinished.length} of ${jobs.length} unit(s) did not encode`);
  } else {
    notify('onConcatStart', () => callbacks.onConcatStart?.());
    const startedAt = Date.now();
    let status: EncoderStatus;
    try {
      status = await encoder.concat(
        jobs.map((j) => j.output),
        highlightsPath,
        config.concatMode,
        signal
      );
    } catch (e) {
      status = { ok: false, exitCode: null, signal: null, stderr: describeError(e), command: null };
    }
    concat = {
      stage: 'concat',
      status: status.ok ? 'succeeded' : 'failed',
      reason: status.ok ? null : signal?.aborted ? 'cancelled' : 'encoder failed',
      exitCode: status.exitCode,
      durationMs: Date.now() - startedAt,
      command: status.command,
      stderr: status.stderr,
    };
    if (!status.ok) {
      log.error(`[${exportId}] Concatenation failed:`, status.stderr.split('\n').slice(-5).join('\n'));
      await removeIfPresent(highlightsPath);
    }
  }

  await writeLines(chaptersPath, formatChapterLines(annotations.chapters));
  await writeLines(commentsPath, formatCommentLines(annotations.comments));

  let keptWorkDir: string | null = workDir;
  try {
    if (concat.status === 'succeeded' || (await fs.promises.readdir(workDir)).length === 0) {
      await fs.promises.rm(workDir, { recursive: true, force: true });
      keptWorkDir = null;
    }
  } catch (e) {
    log.warn(`[${exportId}] Could not clean ${workDir}:`, describeError(e));
  }

  const cancelled = (signal?.aborted ?? false) && concat.status !== 'succeeded';
  const status: ExportStatus = cancelled
    ? 'cancelled'
    : plan.units.length === 0
      ? 'empty'
      : concat.status === 'succeeded'
        ? 'succeeded'
        : 'partial';

  const clips = jobs.filter((j) => j.namedClip && j.status === 'succeeded').map((j) => j.output);
  const warnings: ExportWarning[] = [...compiled.warnings, ...annotations.report.warnings, ...labelWarnings];

  const result: ExportResult = {
    status,
    exportDir,
    plan,
    annotations,
    jobs,
    concat,
    artifacts: {
      highlights: concat.status === 'succeeded' ? highlightsPath : null,
      clips,
      chapters: chaptersPath,
      comments: commentsPath,
      log: logPath,
      workDir: keptWorkDir,
    },
    warnings,
    completedBeforeCancellation: cancelled ? clips : [],
  };

  const logLines = [
    ...jobs.map((j) => JSON.stringify({ stage: 'job', ...j })),
    JSON.stringify(concat),
    JSON.stringify({
      stage: 'summary',
      exportId,
      status,
      units: plan.units.length,
      totalDuration: plan.totalDuration,
      warnings: warnings.map((w) => w.code),
    }),
  ];
  await writeLines(logPath, logLines);

  log.info(
    `[${exportId}] ${status}: ${jobs.length - unfinished.length}/${jobs.length} unit(s) encoded, ${warnings.length} warning(s)`
  );
  if (cancelled) notify('onCancel', () => callbacks.onCancel?.());
  notify('onEnd', () => callbacks.onEnd?.(result));
  return result;
}
