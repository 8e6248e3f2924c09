/**
 * Output Plan Types
 *
 * The plan is derived from a Project snapshot on every export and never
 * persisted. Source times are relative to the owning video; output times are
 * relative to the start of the concatenated highlights file.
 */

interface UnitBase {
  /** Zero-based position in the plan */
  index: number;
  videoId: string;
  /** Inclusive source start */
  sourceStart: number;
  /** Exclusive source end */
  sourceEnd: number;
  speed: number;
  outStart: number;
  /** (sourceEnd - sourceStart) / speed */
  outDuration: number;
}

export interface KeepUnit extends UnitBase {
  kind: 'keep';
  segmentId: string;
  label: string;
}

export interface GapUnit extends UnitBase {
  kind: 'gap';
  /** One-based counter across all gap units of the plan */
  gapNumber: number;
}

export type Unit = KeepUnit | GapUnit;

export interface OutputPlan {
  units: readonly Unit[];
  /** Sum of every unit's output duration */
  totalDuration: number;
}

/** Returns the output time of a source timestamp, or null when it is not in the output */
export type ToOutputTime = (videoId: string, sourceTime: number) => number | null;

export interface EmptyPlanWarning {
  code: 'EMPTY_PLAN';
  message: string;
}

export type CompilationWarning = EmptyPlanWarning;

export interface CompileResult {
  plan: OutputPlan;
  toOutputTime: ToOutputTime;
  warnings: CompilationWarning[];
}
