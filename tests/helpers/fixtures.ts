import { GapPolicy, Note, Project, Segment, Video } from '../../src/types/timeline';

// ============================================================================
// Test Fixtures
// ============================================================================

export function video(id: string, duration: number, order = 0, extra: Partial<Video> = {}): Video {
  return {
    id,
    path: `/videos/${id}.mp4`,
    order,
    duration,
    frameRate: 30,
    rotation: 0,
    rotationOverride: null,
    ...extra,
  };
}

export function segment(
  id: string,
  videoId: string,
  start: number,
  end: number,
  extra: Partial<Segment> = {}
): Segment {
  return { id, videoId, start, end, label: id, speed: 1, order: 0, ...extra };
}

export function chapter(id: string, videoId: string, timestamp: number, body = id): Note {
  return { id, videoId, kind: 'chapter', timestamp, body };
}

export function comment(id: string, videoId: string, timestamp: number, body = id): Note {
  return { id, videoId, kind: 'comment', timestamp, body };
}

export function project(parts: {
  videos: Video[];
  segments?: Segment[];
  notes?: Note[];
  gapPolicy?: GapPolicy;
}): Project {
  return {
    videos: parts.videos,
    segments: parts.segments ?? [],
    notes: parts.notes ?? [],
    gapPolicy: parts.gapPolicy ?? { enabled: false, speed: 3 },
  };
}
