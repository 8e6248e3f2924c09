/**
 * Unit Tests: timeline store
 *
 * Key behaviors tested:
 * - Segment range and overlap rules (half-open ranges, touching allowed)
 * - Note bounds
 * - Cascading removal and reordering
 * - Loading a snapshot is all-or-nothing
 */

import { createTimelineStore, TimelineStore } from '../../src/stores/timelineStore';
import {
  DuplicateIdError,
  NotFoundError,
  OutOfRangeError,
  OverlapError,
  UnknownVideoError,
} from '../../src/utils/errors';

function storeWithVideo(duration = 100): TimelineStore {
  const store = createTimelineStore();
  store.getState().addVideo({ id: 'v1', path: '/videos/v1.mp4', duration });
  return store;
}

describe('timeline store', () => {
  describe('videos', () => {
    it('assigns order by insertion and defaults optional fields', () => {
      const store = createTimelineStore();
      const a = store.getState().addVideo({ id: 'a', path: '/a.mp4', duration: 10 });
      const b = store.getState().addVideo({ id: 'b', path: '/b.mp4', duration: 20, frameRate: 25 });

      expect(a).toEqual({
        id: 'a',
        path: '/a.mp4',
        order: 0,
        duration: 10,
        frameRate: null,
        rotation: 0,
        rotationOverride: null,
      });
      expect(b.order).toBe(1);
      expect(b.frameRate).toBe(25);
    });

    it('rejects a non-positive duration and an odd rotation', () => {
      const store = createTimelineStore();
      expect(() => store.getState().addVideo({ id: 'a', path: '/a.mp4', duration: 0 })).toThrow(
        OutOfRangeError
      );
      expect(() =>
        store.getState().addVideo({ id: 'b', path: '/b.mp4', duration: 5, rotation: 45 })
      ).toThrow(OutOfRangeError);
    });

    it('rejects duplicate ids', () => {
      const store = storeWithVideo();
      expect(() => store.getState().addVideo({ id: 'v1', path: '/x.mp4', duration: 5 })).toThrow(
        DuplicateIdError
      );
    });

    it('reorders videos and renumbers their order', () => {
      const store = createTimelineStore();
      store.getState().addVideo({ id: 'a', path: '/a.mp4', duration: 10 });
      store.getState().addVideo({ id: 'b', path: '/b.mp4', duration: 10 });
      store.getState().addVideo({ id: 'c', path: '/c.mp4', duration: 10 });

      store.getState().reorderVideos(['c', 'a']);

      expect(store.getState().videos.map((v) => [v.id, v.order])).toEqual([
        ['c', 0],
        ['a', 1],
        ['b', 2],
      ]);
    });

    it('removes segments and notes together with their video', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 0, end: 10 });
      store.getState().addNote({ id: 'n1', videoId: 'v1', kind: 'comment', timestamp: 5 });

      store.getState().removeVideo('v1');

      expect(store.getState().segments).toEqual([]);
      expect(store.getState().notes).toEqual([]);
    });
  });

  describe('segments', () => {
    it('defaults label and speed', () => {
      const store = storeWithVideo();
      const seg = store.getState().addSegment({ videoId: 'v1', start: 1, end: 2 });
      expect(seg.label).toBe('E1');
      expect(seg.speed).toBe(1);
      expect(seg.id).toMatch(/^segment-/);
    });

    it('allows touching segments', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 10, end: 20 });
      expect(() =>
        store.getState().addSegment({ id: 's2', videoId: 'v1', start: 20, end: 30 })
      ).not.toThrow();
    });

    it('rejects an overlapping segment and names the collision', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 10, end: 20 });

      let caught: unknown;
      try {
        store.getState().addSegment({ id: 's2', videoId: 'v1', start: 19.5, end: 25 });
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(OverlapError);
      expect(caught).toMatchObject({ code: 'OVERLAP', segmentId: 's2', collidingSegmentId: 's1' });
      expect(store.getState().segments).toHaveLength(1);
    });

    it('allows overlapping ranges in different videos', () => {
      const store = storeWithVideo();
      store.getState().addVideo({ id: 'v2', path: '/v2.mp4', duration: 100 });
      store.getState().addSegment({ videoId: 'v1', start: 10, end: 20 });
      expect(() => store.getState().addSegment({ videoId: 'v2', start: 10, end: 20 })).not.toThrow();
    });

    it.each([
      { name: 'negative start', start: -1, end: 5 },
      { name: 'end past duration', start: 90, end: 100.5 },
      { name: 'empty range', start: 5, end: 5 },
      { name: 'reversed range', start: 6, end: 5 },
    ])('rejects $name', ({ start, end }) => {
      const store = storeWithVideo();
      expect(() => store.getState().addSegment({ videoId: 'v1', start, end })).toThrow(OutOfRangeError);
    });

    it('rejects a non-positive speed', () => {
      const store = storeWithVideo();
      expect(() => store.getState().addSegment({ videoId: 'v1', start: 0, end: 5, speed: 0 })).toThrow(
        OutOfRangeError
      );
    });

    it('rejects a segment for an unknown video', () => {
      const store = storeWithVideo();
      expect(() => store.getState().addSegment({ videoId: 'nope', start: 0, end: 5 })).toThrow(
        UnknownVideoError
      );
    });

    it('validates updates against the other segments', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 0, end: 10 });
      store.getState().addSegment({ id: 's2', videoId: 'v1', start: 20, end: 30 });

      expect(() => store.getState().updateSegment('s1', { end: 25 })).toThrow(OverlapError);
      // moving within its own range is not a collision with itself
      expect(store.getState().updateSegment('s1', { start: 2, end: 12 })).toMatchObject({ start: 2, end: 12 });
      expect(() => store.getState().updateSegment('missing', { end: 1 })).toThrow(NotFoundError);
    });

    it('keeps the old label when an update blanks it', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 0, end: 10, label: 'Touch' });
      expect(store.getState().updateSegment('s1', { label: '   ' }).label).toBe('Touch');
    });

    it('duplicates a segment at another speed into a free range', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 's1', videoId: 'v1', start: 0, end: 10, label: 'Touch' });

      const copy = store.getState().duplicateSegment('s1', { start: 40, end: 50, speed: 0.5 });

      expect(copy).toMatchObject({ start: 40, end: 50, speed: 0.5, label: 'Touch x0.5' });
      // same range would overlap the source
      expect(() => store.getState().duplicateSegment('s1')).toThrow(OverlapError);
    });

    it('lists a video segments by source time', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 'late', videoId: 'v1', start: 50, end: 60 });
      store.getState().addSegment({ id: 'early', videoId: 'v1', start: 5, end: 6 });
      expect(store.getState().segmentsForVideo('v1').map((s) => s.id)).toEqual(['early', 'late']);
    });
  });

  describe('notes', () => {
    it('accepts timestamps on both bounds and trims the body', () => {
      const store = storeWithVideo(100);
      expect(store.getState().addNote({ videoId: 'v1', kind: 'chapter', timestamp: 0, body: '  Round 1 ' }).body).toBe(
        'Round 1'
      );
      expect(() => store.getState().addNote({ videoId: 'v1', kind: 'comment', timestamp: 100 })).not.toThrow();
    });

    it('rejects timestamps outside the video', () => {
      const store = storeWithVideo(100);
      expect(() => store.getState().addNote({ videoId: 'v1', kind: 'comment', timestamp: 100.1 })).toThrow(
        OutOfRangeError
      );
      expect(() => store.getState().addNote({ videoId: 'v1', kind: 'comment', timestamp: -0.1 })).toThrow(
        OutOfRangeError
      );
    });

    it('updates and removes notes', () => {
      const store = storeWithVideo();
      store.getState().addNote({ id: 'n1', videoId: 'v1', kind: 'comment', timestamp: 5, body: 'a' });
      expect(store.getState().updateNote('n1', { kind: 'chapter', body: ' b ' })).toMatchObject({
        kind: 'chapter',
        body: 'b',
      });
      store.getState().removeNote('n1');
      expect(store.getState().notes).toEqual([]);
      expect(() => store.getState().removeNote('n1')).toThrow(NotFoundError);
    });
  });

  describe('gap policy', () => {
    it('is off by default and rejects a non-positive speed', () => {
      const store = createTimelineStore();
      expect(store.getState().gapPolicy).toEqual({ enabled: false, speed: 3 });
      store.getState().setGapPolicy({ enabled: true });
      expect(store.getState().gapPolicy).toEqual({ enabled: true, speed: 3 });
      expect(() => store.getState().setGapPolicy({ speed: -2 })).toThrow(OutOfRangeError);
      expect(store.getState().gapPolicy.speed).toBe(3);
    });
  });

  describe('snapshots', () => {
    it('loads a project and returns an independent copy', () => {
      const store = createTimelineStore({
        videos: [{ id: 'v1', path: '/v1.mp4', duration: 60 }],
        segments: [{ id: 's1', videoId: 'v1', start: 0, end: 10 }],
        notes: [],
        gapPolicy: { enabled: true, speed: 2 },
      });

      const snapshot = store.getState().getSnapshot();
      snapshot.segments[0].end = 50;

      expect(store.getState().segments[0].end).toBe(10);
      expect(snapshot.gapPolicy).toEqual({ enabled: true, speed: 2 });
    });

    it('restores the previous state when a snapshot is rejected', () => {
      const store = storeWithVideo();
      store.getState().addSegment({ id: 'keep', videoId: 'v1', start: 0, end: 10 });

      expect(() =>
        store.getState().loadProject({
          videos: [{ id: 'other', path: '/o.mp4', duration: 30 }],
          segments: [
            { id: 'a', videoId: 'other', start: 0, end: 20 },
            { id: 'b', videoId: 'other', start: 10, end: 25 },
          ],
          notes: [],
        })
      ).toThrow(OverlapError);

      expect(store.getState().videos.map((v) => v.id)).toEqual(['v1']);
      expect(store.getState().segments.map((s) => s.id)).toEqual(['keep']);
    });
  });
});
