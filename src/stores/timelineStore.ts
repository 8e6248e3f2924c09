import { createStore, StoreApi } from 'zustand/vanilla';
import { GapPolicy, Note, NoteKind, Project, Segment, Video } from '../types/timeline';
import {
  DuplicateIdError,
  NotFoundError,
  OutOfRangeError,
  OverlapError,
  UnknownVideoError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('STORE');

const DEFAULT_GAP_POLICY: GapPolicy = { enabled: false, speed: 3.0 };

export interface VideoInput {
  id?: string;
  path: string;
  duration: number;
  frameRate?: number | null;
  rotation?: number;
  rotationOverride?: number | null;
  order?: number;
}

export interface SegmentInput {
  id?: string;
  videoId: string;
  start: number;
  end: number;
  label?: string;
  speed?: number;
  order?: number;
}

export type SegmentPatch = Partial<Pick<Segment, 'start' | 'end' | 'label' | 'speed' | 'order'>>;

export interface NoteInput {
  id?: string;
  videoId: string;
  kind: NoteKind;
  timestamp: number;
  body?: string;
}

export type NotePatch = Partial<Pick<Note, 'kind' | 'timestamp' | 'body'>>;

/** A Project, or a loosely-typed snapshot with ids and defaults left out */
export interface ProjectInput {
  videos: VideoInput[];
  segments: SegmentInput[];
  notes: NoteInput[];
  gapPolicy?: Partial<GapPolicy>;
}

export interface TimelineState {
  videos: Video[];
  segments: Segment[];
  notes: Note[];
  gapPolicy: GapPolicy;

  addVideo: (input: VideoInput) => Video;
  removeVideo: (videoId: string) => void;
  reorderVideos: (videoIds: string[]) => void;
  addSegment: (input: SegmentInput) => Segment;
  updateSegment: (segmentId: string, patch: SegmentPatch) => Segment;
  duplicateSegment: (segmentId: string, overrides?: SegmentPatch) => Segment;
  removeSegment: (segmentId: string) => void;
  addNote: (input: NoteInput) => Note;
  updateNote: (noteId: string, patch: NotePatch) => Note;
  removeNote: (noteId: string) => void;
  setGapPolicy: (patch: Partial<GapPolicy>) => void;
  loadProject: (project: ProjectInput) => void;

  getVideo: (videoId: string) => Video | undefined;
  segmentsForVideo: (videoId: string) => Segment[];
  notesForVideo: (videoId: string) => Note[];
  getSnapshot: () => Project;
}

export type TimelineStore = StoreApi<TimelineState>;

function generateId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

const bySourceTime = (a: Segment, b: Segment) => {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return a.end - b.end;
  return a.id.localeCompare(b.id);
};

const byTimestamp = (a: Note, b: Note) =>
  a.timestamp === b.timestamp ? a.id.localeCompare(b.id) : a.timestamp - b.timestamp;

const byVideoOrder = (a: Video, b: Video) =>
  a.order === b.order ? a.id.localeCompare(b.id) : a.order - b.order;

function assertFinite(field: string, value: number, bounds: string): void {
  if (!Number.isFinite(value)) {
    throw new OutOfRangeError(field, value, bounds);
  }
}

function assertSpeed(field: string, speed: number): void {
  assertFinite(field, speed, '> 0');
  if (speed <= 0) {
    throw new OutOfRangeError(field, speed, '> 0');
  }
}

function assertRotation(field: string, value: number | null | undefined): void {
  if (value === undefined || value === null) return;
  if (![0, 90, 180, 270].includes(value)) {
    throw new OutOfRangeError(field, value, 'one of 0, 90, 180, 270');
  }
}

function validateSegment(candidate: Segment, video: Video, siblings: Segment[]): void {
  const bounds = `[0, ${video.duration}]`;
  assertFinite('start', candidate.start, bounds);
  assertFinite('end', candidate.end, bounds);
  if (candidate.start < 0 || candidate.start > video.duration) {
    throw new OutOfRangeError('start', candidate.start, bounds);
  }
  if (candidate.end > video.duration) {
    throw new OutOfRangeError('end', candidate.end, bounds);
  }
  if (candidate.end <= candidate.start) {
    throw new OutOfRangeError('end', candidate.end, `> start (${candidate.start})`);
  }
  assertSpeed('speed', candidate.speed);

  // Half-open ranges: touching segments do not collide.
  const collision = siblings.find(
    (s) => s.id !== candidate.id && s.start < candidate.end && candidate.start < s.end
  );
  if (collision) {
    throw new OverlapError(candidate.id, collision.id, video.id);
  }
}

function validateNote(candidate: Note, video: Video): void {
  const bounds = `[0, ${video.duration}]`;
  assertFinite('timestamp', candidate.timestamp, bounds);
  if (candidate.timestamp < 0 || candidate.timestamp > video.duration) {
    throw new OutOfRangeError('timestamp', candidate.timestamp, bounds);
  }
}

function validateVideo(video: Video): void {
  assertFinite('duration', video.duration, '> 0');
  if (video.duration <= 0) {
    throw new OutOfRangeError('duration', video.duration, '> 0');
  }
  if (video.frameRate !== null) {
    assertFinite('frameRate', video.frameRate, '> 0');
    if (video.frameRate <= 0) {
      throw new OutOfRangeError('frameRate', video.frameRate, '> 0');
    }
  }
  assertRotation('rotation', video.rotation);
  assertRotation('rotationOverride', video.rotationOverride);
}

/**
 * Create an isolated timeline store.
 *
 * Each export works from a snapshot of one store, so several projects can
 * live in the same process without sharing state.
 */
export function createTimelineStore(initial?: ProjectInput): TimelineStore {
  const store = createStore<TimelineState>()((set, get) => {
    const requireVideo = (videoId: string): Video => {
      const video = get().videos.find((v) => v.id === videoId);
      if (!video) throw new UnknownVideoError(videoId);
      return video;
    };

    const requireSegment = (segmentId: string): Segment => {
      const segment = get().segments.find((s) => s.id === segmentId);
      if (!segment) throw new NotFoundError('segment', segmentId);
      return segment;
    };

    const requireNote = (noteId: string): Note => {
      const note = get().notes.find((n) => n.id === noteId);
      if (!note) throw new NotFoundError('note', noteId);
      return note;
    };

    return {
      videos: [],
      segments: [],
      notes: [],
      gapPolicy: { ...DEFAULT_GAP_POLICY },

      addVideo: (input) => {
        const id = input.id ?? generateId('video');
        if (get().videos.some((v) => v.id === id)) throw new DuplicateIdError('video', id);
        const video: Video = {
          id,
          path: input.path,
          order: input.order ?? get().videos.length,
          duration: input.duration,
          frameRate: input.frameRate ?? null,
          rotation: input.rotation ?? 0,
          rotationOverride: input.rotationOverride ?? null,
        };
        validateVideo(video);
        set((state) => ({ videos: [...state.videos, video].sort(byVideoOrder) }));
        log.debug('Video added', { id, path: video.path, duration: video.duration });
        return video;
      },

      removeVideo: (videoId) => {
        requireVideo(videoId);
        // Segments and notes belong to their video.
        set((state) => ({
          videos: state.videos.filter((v) => v.id !== videoId),
          segments: state.segments.filter((s) => s.videoId !== videoId),
          notes: state.notes.filter((n) => n.videoId !== videoId),
        }));
      },

      reorderVideos: (videoIds) => {
        videoIds.forEach(requireVideo);
        const rank = new Map(videoIds.map((id, idx) => [id, idx]));
        set((state) => {
          const ordered = [...state.videos].sort((a, b) => {
            const ra = rank.get(a.id) ?? videoIds.length + a.order;
            const rb = rank.get(b.id) ?? videoIds.length + b.order;
            return ra - rb;
          });
          return { videos: ordered.map((v, idx) => ({ ...v, order: idx })) };
        });
      },

      addSegment: (input) => {
        const video = requireVideo(input.videoId);
        const id = input.id ?? generateId('segment');
        if (get().segments.some((s) => s.id === id)) throw new DuplicateIdError('segment', id);
        const siblings = get().segmentsForVideo(video.id);
        const segment: Segment = {
          id,
          videoId: video.id,
          start: input.start,
          end: input.end,
          label: input.label?.trim() || `E${get().segments.length + 1}`,
          speed: input.speed ?? 1.0,
          order: input.order ?? siblings.length,
        };
        validateSegment(segment, video, siblings);
        set((state) => ({ segments: [...state.segments, segment] }));
        log.debug('Segment added', { id, videoId: video.id, start: segment.start, end: segment.end });
        return segment;
      },

      updateSegment: (segmentId, patch) => {
        const current = requireSegment(segmentId);
        const video = requireVideo(current.videoId);
        const updated: Segment = {
          ...current,
          ...patch,
          label: patch.label !== undefined ? patch.label.trim() || current.label : current.label,
        };
        validateSegment(updated, video, get().segmentsForVideo(video.id));
        set((state) => ({
          segments: state.segments.map((s) => (s.id === segmentId ? updated : s)),
        }));
        return updated;
      },

      duplicateSegment: (segmentId, overrides = {}) => {
        const source = requireSegment(segmentId);
        const speed = overrides.speed ?? source.speed;
        const suggested =
          Math.abs(speed - 1.0) > 1e-3 ? `${source.label} x${speed}` : `${source.label} copy`;
        return get().addSegment({
          videoId: source.videoId,
          start: overrides.start ?? source.start,
          end: overrides.end ?? source.end,
          label: overrides.label ?? suggested,
          speed,
          order: overrides.order,
        });
      },

      removeSegment: (segmentId) => {
        requireSegment(segmentId);
        set((state) => ({ segments: state.segments.filter((s) => s.id !== segmentId) }));
      },

      addNote: (input) => {
        const video = requireVideo(input.videoId);
        const id = input.id ?? generateId('note');
        if (get().notes.some((n) => n.id === id)) throw new DuplicateIdError('note', id);
        const note: Note = {
          id,
          videoId: video.id,
          kind: input.kind,
          timestamp: input.timestamp,
          body: (input.body ?? '').trim(),
        };
        validateNote(note, video);
        set((state) => ({ notes: [...state.notes, note] }));
        return note;
      },

      updateNote: (noteId, patch) => {
        const current = requireNote(noteId);
        const video = requireVideo(current.videoId);
        const updated: Note = {
          ...current,
          ...patch,
          body: patch.body !== undefined ? patch.body.trim() : current.body,
        };
        validateNote(updated, video);
        set((state) => ({ notes: state.notes.map((n) => (n.id === noteId ? updated : n)) }));
        return updated;
      },

      removeNote: (noteId) => {
        requireNote(noteId);
        set((state) => ({ notes: state.notes.filter((n) => n.id !== noteId) }));
      },

      setGapPolicy: (patch) => {
        const next: GapPolicy = { ...get().gapPolicy, ...patch };
        assertSpeed('gapPolicy.speed', next.speed);
        set({ gapPolicy: next });
      },

      loadProject: (project) => {
        const { videos, segments, notes, gapPolicy } = get();
        set({ videos: [], segments: [], notes: [], gapPolicy: { ...DEFAULT_GAP_POLICY } });
        const actions = get();
        try {
          project.videos.forEach((v) => actions.addVideo(v));
          project.segments.forEach((s) => actions.addSegment(s));
          project.notes.forEach((n) => actions.addNote(n));
          actions.setGapPolicy(project.gapPolicy ?? {});
        } catch (e) {
          log.warn('Rejected project snapshot:', e instanceof Error ? e.message : e);
          set({ videos, segments, notes, gapPolicy });
          throw e;
        }
        log.debug('Project loaded', {
          videos: project.videos.length,
          segments: project.segments.length,
          notes: project.notes.length,
        });
      },

      getVideo: (videoId) => get().videos.find((v) => v.id === videoId),

      segmentsForVideo: (videoId) =>
        get()
          .segments.filter((s) => s.videoId === videoId)
          .sort(bySourceTime),

      notesForVideo: (videoId) =>
        get()
          .notes.filter((n) => n.videoId === videoId)
          .sort(byTimestamp),

      getSnapshot: () => {
        const { videos, segments, notes, gapPolicy } = get();
        return {
          videos: [...videos].sort(byVideoOrder).map((v) => ({ ...v })),
          segments: segments.map((s) => ({ ...s })),
          notes: notes.map((n) => ({ ...n })),
          gapPolicy: { ...gapPolicy },
        };
      },
    };
  });

  if (initial) store.getState().loadProject(initial);
  return store;
}
