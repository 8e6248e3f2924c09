/**
 * Timeline Compiler
 *
 * Turns a Project snapshot into an ordered Output Plan and the mapping from
 * source time to output time. Pure: no I/O, no shared state, and the same
 * snapshot always compiles to the same plan.
 *
 * ORDERING:
 * - Videos by display order, then by source start time within a video
 * - Keep and Gap units of one video interleave by position
 *
 * RANGES:
 * - Every unit covers the half-open range [sourceStart, sourceEnd)
 * - A timestamp on a unit's end boundary belongs to the next unit, if one abuts it
 */

import {
  CompilationWarning,
  CompileResult,
  GapUnit,
  KeepUnit,
  OutputPlan,
  ToOutputTime,
  Unit,
} from '../types/plan';
import { Project, Segment, Video } from '../types/timeline';

/** Complement ranges shorter than this are float noise, not gaps */
export const MIN_GAP_SECONDS = 1e-6;

export interface SourceRange {
  start: number;
  end: number;
}

interface BoundaryEvent {
  time: number;
  delta: 1 | -1;
}

/**
 * Union of half-open ranges via a sort-and-sweep over +1/-1 boundary events.
 * Touching ranges merge into one.
 */
export function coveredRanges(ranges: readonly SourceRange[]): SourceRange[] {
  const events: BoundaryEvent[] = [];
  for (const r of ranges) {
    if (r.end <= r.start) continue;
    events.push({ time: r.start, delta: 1 }, { time: r.end, delta: -1 });
  }
  // Opening events first at equal times so abutting ranges merge.
  events.sort((a, b) => (a.time === b.time ? b.delta - a.delta : a.time - b.time));

  const union: SourceRange[] = [];
  let depth = 0;
  let openedAt = 0;
  for (const ev of events) {
    if (ev.delta === 1) {
      if (depth === 0) openedAt = ev.time;
      depth += 1;
    } else {
      depth -= 1;
      if (depth === 0) union.push({ start: openedAt, end: ev.time });
    }
  }
  return union;
}

/** Maximal sub-ranges of [0, duration) not covered by `covered` */
export function complementRanges(covered: readonly SourceRange[], duration: number): SourceRange[] {
  const gaps: SourceRange[] = [];
  let cursor = 0;
  for (const r of covered) {
    if (r.start - cursor > MIN_GAP_SECONDS) gaps.push({ start: cursor, end: r.start });
    cursor = Math.max(cursor, r.end);
  }
  if (duration - cursor > MIN_GAP_SECONDS) gaps.push({ start: cursor, end: duration });
  return gaps;
}

const bySourceTime = (a: Segment, b: Segment) => {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return a.end - b.end;
  return a.id.localeCompare(b.id);
};

const byVideoOrder = (a: Video, b: Video) =>
  a.order === b.order ? a.id.localeCompare(b.id) : a.order - b.order;

type PendingUnit =
  | { kind: 'keep'; start: number; end: number; speed: number; segment: Segment }
  | { kind: 'gap'; start: number; end: number; speed: number };

function unitsForVideo(video: Video, segments: Segment[], project: Project): PendingUnit[] {
  const keeps: PendingUnit[] = segments.map((segment) => ({
    kind: 'keep',
    start: segment.start,
    end: segment.end,
    speed: segment.speed,
    segment,
  }));

  if (!project.gapPolicy.enabled) return keeps;

  const gaps: PendingUnit[] = complementRanges(coveredRanges(segments), video.duration).map((r) => ({
    kind: 'gap',
    start: r.start,
    end: r.end,
    speed: project.gapPolicy.speed,
  }));

  return [...keeps, ...gaps].sort((a, b) => a.start - b.start);
}

/**
 * Compile a project snapshot into an Output Plan.
 *
 * @example
 * const { plan, toOutputTime } = compileTimeline(store.getState().getSnapshot());
 * toOutputTime('video-1', 15); // 5 when the only segment is [10, 20) at 1x
 */
export function compileTimeline(project: Project): CompileResult {
  const units: Unit[] = [];
  const unitsByVideo = new Map<string, Unit[]>();
  let cursor = 0;
  let gapNumber = 0;

  for (const video of [...project.videos].sort(byVideoOrder)) {
    const segments = project.segments.filter((s) => s.videoId === video.id).sort(bySourceTime);
    if (!project.gapPolicy.enabled && segments.length === 0) continue;

    const videoUnits: Unit[] = [];
    for (const pending of unitsForVideo(video, segments, project)) {
      const outDuration = (pending.end - pending.start) / pending.speed;
      const base = {
        index: units.length,
        videoId: video.id,
        sourceStart: pending.start,
        sourceEnd: pending.end,
        speed: pending.speed,
        outStart: cursor,
        outDuration,
      };
      let unit: Unit;
      if (pending.kind === 'keep') {
        const keep: KeepUnit = {
          ...base,
          kind: 'keep',
          segmentId: pending.segment.id,
          label: pending.segment.label,
        };
        unit = keep;
      } else {
        gapNumber += 1;
        const gap: GapUnit = { ...base, kind: 'gap', gapNumber };
        unit = gap;
      }
      units.push(Object.freeze(unit));
      videoUnits.push(unit);
      cursor += outDuration;
    }
    unitsByVideo.set(video.id, videoUnits);
  }

  const plan: OutputPlan = Object.freeze({
    units: Object.freeze(units),
    totalDuration: cursor,
  });

  const warnings: CompilationWarning[] = [];
  if (units.length === 0) {
    warnings.push({
      code: 'EMPTY_PLAN',
      message: 'No segments to export and gap filling is off; the output will be empty.',
    });
  }

  const toOutputTime: ToOutputTime = (videoId, sourceTime) => {
    const candidates = unitsByVideo.get(videoId);
    if (!candidates || !Number.isFinite(sourceTime)) return null;
    const unit = candidates.find((u) => u.sourceStart <= sourceTime && sourceTime < u.sourceEnd);
    if (!unit) return null;
    return unit.outStart + (sourceTime - unit.sourceStart) / unit.speed;
  };

  return { plan, toOutputTime, warnings };
}
