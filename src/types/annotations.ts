/**
 * Annotation Mapper Types
 *
 * Notes translated into output-time, plus the non-fatal findings produced
 * while validating chapters.
 */

import { NoteKind } from './timeline';

export interface MappedNote {
  noteId: string;
  kind: NoteKind;
  /** Seconds from the start of the highlights file */
  outputTime: number;
  body: string;
}

export interface ExcludedNote {
  noteId: string;
  videoId: string;
  kind: NoteKind;
  sourceTime: number;
  body: string;
  reason: string;
}

/** A chapter line as it will be written to the chapters file */
export interface ChapterEntry {
  /** Written time; 0 for the first entry */
  outputTime: number;
  label: string;
  /** Null for a synthesized leading chapter */
  noteId: string | null;
}

export interface NoteExcludedWarning {
  code: 'NOTE_EXCLUDED';
  message: string;
  note: ExcludedNote;
}

export interface ChapterSpacingViolation {
  code: 'CHAPTER_SPACING_VIOLATION';
  message: string;
  kept: MappedNote;
  dropped: MappedNote;
  /** Seconds between the pair */
  spacing: number;
}

export interface ImplicitLeadingChapterWarning {
  code: 'IMPLICIT_LEADING_CHAPTER';
  message: string;
  label: string;
}

export interface LeadingChapterForcedWarning {
  code: 'LEADING_CHAPTER_FORCED';
  message: string;
  chapter: MappedNote;
}

export interface TooFewChaptersWarning {
  code: 'TOO_FEW_CHAPTERS';
  message: string;
  count: number;
}

export interface LastChapterNearEndWarning {
  code: 'LAST_CHAPTER_NEAR_END';
  message: string;
  chapter: ChapterEntry;
  totalDuration: number;
}

export type ValidationWarning =
  | NoteExcludedWarning
  | ChapterSpacingViolation
  | ImplicitLeadingChapterWarning
  | LeadingChapterForcedWarning
  | TooFewChaptersWarning
  | LastChapterNearEndWarning;

export interface ValidationReport {
  excluded: ExcludedNote[];
  spacingViolations: ChapterSpacingViolation[];
  warnings: ValidationWarning[];
}

export interface AnnotationResult {
  /** Every note that resolved to an output time, ascending */
  mapped: MappedNote[];
  /** Chapters that survive validation, in write order */
  chapters: ChapterEntry[];
  /** Mapped comments, ascending */
  comments: MappedNote[];
  report: ValidationReport;
}
