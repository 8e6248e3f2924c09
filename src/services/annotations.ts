/**
 * Annotation Mapper
 *
 * Translates note timestamps into output time using the compiler's mapping,
 * drops notes whose source moment is not in the output, and validates the
 * chapter list against the minimum spacing rule.
 *
 * CHAPTER RULES:
 * - Chapters are walked in output order and compared against the last kept chapter
 * - The later chapter of a too-close pair is dropped
 * - The first written chapter is always at 00:00:00, either by moving the
 *   first chapter there (when it sits inside the spacing window) or by
 *   synthesizing a leading chapter
 */

import {
  AnnotationResult,
  ChapterEntry,
  ChapterSpacingViolation,
  ExcludedNote,
  MappedNote,
  ValidationWarning,
} from '../types/annotations';
import { CompileResult } from '../types/plan';
import { Note, Project, Video } from '../types/timeline';
import { ChapterConfig } from '../utils/config';
import { toTimestamp } from '../utils/timecode';

export const EXCLUDED_REASON = 'source region not included in output';

/** Chapters below this count are flagged; players ignore short chapter lists */
export const MIN_CHAPTER_COUNT = 3;

const FALLBACK_LEADING_LABEL = 'Start';

const EPSILON = 1e-9;

const wholeSeconds = (t: number) => Math.floor(t + 1e-6);

function noteOrder(videos: Video[]) {
  const rank = new Map(videos.map((v) => [v.id, v.order]));
  return (a: Note, b: Note) => {
    const byVideo =
      (rank.get(a.videoId) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b.videoId) ?? Number.MAX_SAFE_INTEGER);
    if (byVideo !== 0) return byVideo;
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    return a.id.localeCompare(b.id);
  };
}

/** Collapse a note body onto one line */
export function singleLine(body: string): string {
  return body.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

function leadingLabel(compiled: CompileResult, config: ChapterConfig): string {
  if (config.leadingLabel && config.leadingLabel.trim()) return config.leadingLabel.trim();
  const first = compiled.plan.units[0];
  if (first && first.kind === 'keep' && first.label.trim()) return singleLine(first.label);
  return FALLBACK_LEADING_LABEL;
}

export function mapAnnotations(
  project: Project,
  compiled: CompileResult,
  config: ChapterConfig
): AnnotationResult {
  const warnings: ValidationWarning[] = [];
  const excluded: ExcludedNote[] = [];
  const mapped: MappedNote[] = [];

  for (const note of [...project.notes].sort(noteOrder(project.videos))) {
    const outputTime = compiled.toOutputTime(note.videoId, note.timestamp);
    if (outputTime === null) {
      const entry: ExcludedNote = {
        noteId: note.id,
        videoId: note.videoId,
        kind: note.kind,
        sourceTime: note.timestamp,
        body: note.body,
        reason: EXCLUDED_REASON,
      };
      excluded.push(entry);
      warnings.push({
        code: 'NOTE_EXCLUDED',
        message: `${note.kind === 'chapter' ? 'Chapter' : 'Comment'} "${note.body}" at ${toTimestamp(note.timestamp)} of ${note.videoId}: ${EXCLUDED_REASON}`,
        note: entry,
      });
      continue;
    }
    mapped.push({ noteId: note.id, kind: note.kind, outputTime, body: note.body });
  }
  // Stable: ties keep video/timestamp order.
  mapped.sort((a, b) => a.outputTime - b.outputTime);

  const { minSpacingSeconds } = config;
  const spacingViolations: ChapterSpacingViolation[] = [];
  const kept: MappedNote[] = [];
  for (const chapter of mapped.filter((n) => n.kind === 'chapter')) {
    const last = kept[kept.length - 1];
    if (last) {
      const spacing = chapter.outputTime - last.outputTime;
      if (
        spacing < minSpacingSeconds - EPSILON ||
        wholeSeconds(chapter.outputTime) <= wholeSeconds(last.outputTime)
      ) {
        const violation: ChapterSpacingViolation = {
          code: 'CHAPTER_SPACING_VIOLATION',
          message: `Chapter "${chapter.body}" at ${toTimestamp(chapter.outputTime)} is ${spacing.toFixed(1)}s after "${last.body}"; minimum is ${minSpacingSeconds}s. Dropped.`,
          kept: last,
          dropped: chapter,
          spacing,
        };
        spacingViolations.push(violation);
        warnings.push(violation);
        continue;
      }
    }
    kept.push(chapter);
  }

  const chapters: ChapterEntry[] = kept.map((n) => ({
    outputTime: n.outputTime,
    label: singleLine(n.body) || config.defaultLabel,
    noteId: n.noteId,
  }));

  const firstKept = kept[0];
  const firstEntry = chapters[0];
  if (firstKept && firstEntry && firstEntry.outputTime < Math.max(minSpacingSeconds, 1)) {
    if (firstEntry.outputTime > EPSILON) {
      warnings.push({
        code: 'LEADING_CHAPTER_FORCED',
        message: `First chapter "${firstEntry.label}" moved from ${toTimestamp(firstEntry.outputTime)} to 00:00:00`,
        chapter: firstKept,
      });
    }
    firstEntry.outputTime = 0;
  } else {
    const label = leadingLabel(compiled, config);
    chapters.unshift({ outputTime: 0, label, noteId: null });
    warnings.push({
      code: 'IMPLICIT_LEADING_CHAPTER',
      message: `Added chapter "${label}" at 00:00:00`,
      label,
    });
  }

  if (kept.length > 0) {
    if (chapters.length < MIN_CHAPTER_COUNT) {
      warnings.push({
        code: 'TOO_FEW_CHAPTERS',
        message: `Only ${chapters.length} chapter(s); at least ${MIN_CHAPTER_COUNT} are needed for chapter markers to show`,
        count: chapters.length,
      });
    }
    const last = chapters[chapters.length - 1];
    const total = compiled.plan.totalDuration;
    if (last && last.outputTime > 0 && total - last.outputTime < minSpacingSeconds - EPSILON) {
      warnings.push({
        code: 'LAST_CHAPTER_NEAR_END',
        message: `Last chapter "${last.label}" starts ${(total - last.outputTime).toFixed(1)}s before the end`,
        chapter: last,
        totalDuration: total,
      });
    }
  }

  return {
    mapped,
    chapters,
    comments: mapped.filter((n) => n.kind === 'comment'),
    report: { excluded, spacingViolations, warnings },
  };
}

/** Lines of the chapters file: `HH:MM:SS <label>` */
export function formatChapterLines(chapters: readonly ChapterEntry[]): string[] {
  return chapters.map((c) => `${toTimestamp(c.outputTime)} ${c.label}`);
}

/** Lines of the comments file: `HH:MM:SS <body>` */
export function formatCommentLines(comments: readonly MappedNote[]): string[] {
  return comments.map((c) => `${toTimestamp(c.outputTime)} ${singleLine(c.body)}`);
}
