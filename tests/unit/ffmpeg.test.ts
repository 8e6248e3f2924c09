/**
 * Unit Tests: FFmpeg service
 *
 * fluent-ffmpeg is replaced by an in-process fake, so no binary runs.
 */

jest.mock('fluent-ffmpeg', () => jest.requireActual('../helpers/fake-ffmpeg'));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type ffmpegTypes from 'fluent-ffmpeg';
import {
  atempoFilters,
  buildVideoFilters,
  configureBinaries,
  escapeForConcat,
  extractRotation,
  FfmpegEncoder,
  metadataFromProbe,
  parseExit,
  parseFrameRate,
  probeVideo,
} from '../../src/services/ffmpeg';
import { ExtractJob } from '../../src/types/encoder';
import { ProbeError } from '../../src/utils/errors';
import fakeFfmpeg, { fake } from '../helpers/fake-ffmpeg';

const BINARIES = { ffmpegPath: '/opt/ffmpeg/ffmpeg', ffprobePath: '/opt/ffmpeg/ffprobe' };

function stream(extra: Partial<ffmpegTypes.FfprobeStream>): ffmpegTypes.FfprobeStream {
  return { index: 0, ...extra };
}

function job(extra: Partial<ExtractJob> = {}): ExtractJob {
  return {
    sourcePath: '/videos/bout.mp4',
    start: 10,
    end: 20,
    speed: 1,
    rotation: 0,
    resolution: 'source',
    frameRate: 30,
    destPath: '/exports/clips/Touch.mp4',
    ...extra,
  };
}

beforeEach(() => {
  fake.reset();
  fakeFfmpeg.ffprobe.mockReset();
});

describe('configureBinaries', () => {
  it('hands configured paths to fluent-ffmpeg once per configuration', () => {
    configureBinaries(BINARIES);
    configureBinaries(BINARIES);
    new FfmpegEncoder(BINARIES);

    expect(fakeFfmpeg.setFfmpegPath).toHaveBeenCalledTimes(1);
    expect(fakeFfmpeg.setFfmpegPath).toHaveBeenCalledWith('/opt/ffmpeg/ffmpeg');
    expect(fakeFfmpeg.setFfprobePath).toHaveBeenCalledWith('/opt/ffmpeg/ffprobe');
  });
});

describe('filters', () => {
  it('adds nothing for a plain 1x unit at source size', () => {
    expect(buildVideoFilters(0, 1, 'source')).toEqual([]);
    expect(atempoFilters(1)).toEqual([]);
  });

  it('orders speed, rotation and scaling', () => {
    expect(buildVideoFilters(90, 2, '720p')).toEqual([
      'setpts=PTS/2.000000',
      'transpose=1',
      'scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2:black',
    ]);
  });

  it.each([
    { rotation: 180, expected: ['transpose=1,transpose=1'] },
    { rotation: 270, expected: ['transpose=2'] },
    { rotation: -90, expected: ['transpose=2'] },
    { rotation: 450, expected: ['transpose=1'] },
  ])('rotates $rotation degrees', ({ rotation, expected }) => {
    expect(buildVideoFilters(rotation, 1, 'source')).toEqual(expected);
  });

  it.each([
    { speed: 1.5, expected: ['atempo=1.500000'] },
    { speed: 3, expected: ['atempo=2.000000', 'atempo=1.500000'] },
    { speed: 4, expected: ['atempo=2.000000', 'atempo=2.000000'] },
    { speed: 0.25, expected: ['atempo=0.500000', 'atempo=0.500000'] },
    { speed: 0, expected: [] },
  ])('chains atempo for $speed x', ({ speed, expected }) => {
    expect(atempoFilters(speed)).toEqual(expected);
  });
});

describe('probe parsing', () => {
  it('parses frame rates', () => {
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('25')).toBe(25);
    expect(parseFrameRate('0/0')).toBeNull();
    expect(parseFrameRate('n/a')).toBeNull();
    expect(parseFrameRate(undefined)).toBeNull();
  });

  it('reads rotation from the rotate tag or display matrix', () => {
    expect(extractRotation(stream({ tags: { rotate: '90' } }))).toBe(90);
    expect(extractRotation(stream({ tags: { rotate: '-90' } }))).toBe(270);
    expect(extractRotation(stream({ side_data_list: [{ side_data_type: 'Display Matrix', rotation: -90 }] }))).toBe(90);
    expect(extractRotation(stream({ side_data_list: [{ rotation: 180 }] }))).toBe(180);
    expect(extractRotation(stream({}))).toBe(0);
  });

  it('builds metadata from the first video stream', () => {
    const data: ffmpegTypes.FfprobeData = {
      format: { duration: 12.5 },
      streams: [
        stream({ codec_type: 'audio' }),
        stream({
          index: 1,
          codec_type: 'video',
          avg_frame_rate: '0/0',
          r_frame_rate: '25/1',
          width: 1920,
          height: 1080,
          tags: { rotate: '180' },
        }),
      ],
      chapters: [],
    };
    expect(metadataFromProbe(data)).toEqual({
      duration: 12.5,
      frameRate: 25,
      rotation: 180,
      width: 1920,
      height: 1080,
    });
  });

  it('rejects files without a duration or a video stream', () => {
    expect(() =>
      metadataFromProbe({ format: {}, streams: [stream({ codec_type: 'video' })], chapters: [] })
    ).toThrow('Container reports no duration');
    expect(() =>
      metadataFromProbe({ format: { duration: 3 }, streams: [stream({ codec_type: 'audio' })], chapters: [] })
    ).toThrow('No video stream found in file');
  });

  it('wraps ffprobe failures in ProbeError', async () => {
    fakeFfmpeg.ffprobe.mockImplementation((_path, callback) => callback(new Error('moov atom not found'), undefined));

    const attempt = probeVideo('/videos/broken.mp4');
    await expect(attempt).rejects.toBeInstanceOf(ProbeError);
    await expect(attempt).rejects.toThrow('Failed to probe /videos/broken.mp4: moov atom not found');
  });

  it('resolves metadata for a readable file', async () => {
    fakeFfmpeg.ffprobe.mockImplementation((_path, callback) =>
      callback(null, {
        format: { duration: 42 },
        streams: [stream({ codec_type: 'video', avg_frame_rate: '30/1' })],
        chapters: [],
      })
    );
    await expect(probeVideo('/videos/bout.mp4')).resolves.toEqual({
      duration: 42,
      frameRate: 30,
      rotation: 0,
      width: 0,
      height: 0,
    });
  });
});

describe('parseExit', () => {
  it('reads the exit code or the signal', () => {
    expect(parseExit('ffmpeg exited with code 1: Conversion failed!')).toEqual({ exitCode: 1, signal: null });
    expect(parseExit('ffmpeg was killed with signal SIGKILL')).toEqual({ exitCode: null, signal: 'SIGKILL' });
    expect(parseExit('spawn ENOENT')).toEqual({ exitCode: null, signal: null });
  });
});

describe('escapeForConcat', () => {
  it('escapes single quotes and strips control characters', () => {
    expect(escapeForConcat("/exports/it's\n.mp4")).toBe("/exports/it'\\''s.mp4");
  });
});

describe('FfmpegEncoder.extract', () => {
  const encoder = new FfmpegEncoder(BINARIES);

  it('seeks, trims and re-encodes the unit', async () => {
    const status = await encoder.extract(job({ speed: 2, rotation: 90 }));

    expect(status).toEqual({
      ok: true,
      exitCode: 0,
      signal: null,
      stderr: '',
      command: 'ffmpeg /videos/bout.mp4 /exports/clips/Touch.mp4',
    });
    const [cmd] = fake.commands;
    expect(cmd.inputOpts).toEqual(['-noautorotate']);
    expect(cmd.seek).toBe('10');
    expect(cmd.length).toBe('5');
    expect(cmd.outputOpts).toEqual([
      '-c:v libx264',
      '-preset veryfast',
      '-crf 20',
      '-pix_fmt yuv420p',
      '-c:a aac',
      '-r 30',
      '-vsync cfr',
      '-ar 48000',
      '-ac 2',
      '-fflags +genpts',
      '-reset_timestamps 1',
      '-avoid_negative_ts 1',
      '-movflags +faststart',
    ]);
    expect(cmd.fmt).toBe('mp4');
    expect(cmd.target).toBe('/exports/clips/Touch.mp4');
    expect(cmd.vFilters).toEqual(['setpts=PTS/2.000000', 'transpose=1']);
    expect(cmd.aFilters).toEqual(['atempo=2.000000']);
  });

  it('encodes units from different recordings with the same frame timing and audio layout', async () => {
    await encoder.extract(job({ sourcePath: '/videos/phone-30fps.mp4', frameRate: 59.94 }));
    await encoder.extract(job({ sourcePath: '/videos/camera-60fps.mp4', frameRate: 59.94 }));

    const normalized = fake.commands.map((cmd) =>
      cmd.outputOpts.filter((o) => /^-(r|vsync|ar|ac) /.test(o))
    );
    expect(normalized).toEqual([
      ['-r 59.94', '-vsync cfr', '-ar 48000', '-ac 2'],
      ['-r 59.94', '-vsync cfr', '-ar 48000', '-ac 2'],
    ]);
  });

  it('reports the exit code and stderr tail on failure', async () => {
    fake.outcomes.push({
      type: 'error',
      message: 'ffmpeg exited with code 1: Conversion failed!',
      stderr: ['Invalid data found', 'Conversion failed!'],
    });

    const status = await encoder.extract(job());

    expect(status).toEqual({
      ok: false,
      exitCode: 1,
      signal: null,
      stderr: 'Invalid data found\nConversion failed!',
      command: 'ffmpeg /videos/bout.mp4 /exports/clips/Touch.mp4',
    });
  });

  it('kills a running command when aborted before it spawned', async () => {
    fake.outcomes.push({ type: 'hang' });
    const controller = new AbortController();

    const pending = encoder.extract(job(), controller.signal);
    controller.abort();
    const status = await pending;

    expect(fake.commands[0].killedWith).toBe('SIGKILL');
    expect(status.ok).toBe(false);
    expect(status.signal).toBe('SIGKILL');
  });

  it('kills a command that is already running', async () => {
    fake.outcomes.push({ type: 'hang' });
    const controller = new AbortController();
    fake.onRun = () => {
      setImmediate(() => setImmediate(() => controller.abort()));
    };

    const status = await encoder.extract(job(), controller.signal);

    expect(status.signal).toBe('SIGKILL');
    expect(status.command).toBe('ffmpeg /videos/bout.mp4 /exports/clips/Touch.mp4');
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const status = await encoder.extract(job(), controller.signal);

    expect(status).toEqual({
      ok: false,
      exitCode: null,
      signal: 'SIGKILL',
      stderr: 'aborted before start',
      command: null,
    });
    expect(fake.commands[0].ran).toBe(false);
  });
});

describe('FfmpegEncoder.concat', () => {
  const encoder = new FfmpegEncoder(BINARIES);
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'highlight-reel-concat-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('stream-copies through a concat list that is removed afterwards', async () => {
    const inputs = [path.join(dir, 'clips', 'Touch.mp4'), path.join(dir, '.work', "it's.mp4")];
    let listed = '';
    fake.onRun = (cmd) => {
      listed = fs.readFileSync(cmd.inputs[0], 'utf8');
    };

    const status = await encoder.concat(inputs, path.join(dir, 'highlights.mp4'), 'copy');

    expect(status.ok).toBe(true);
    expect(listed).toBe(`file '${inputs[0]}'\nfile '${path.join(dir, '.work', "it'\\''s.mp4")}'\n`);
    const [cmd] = fake.commands;
    expect(cmd.inputOpts).toEqual(['-f concat', '-safe 0']);
    expect(cmd.outputOpts).toEqual(['-c copy', '-movflags +faststart']);
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('removes the concat list when the command fails', async () => {
    fake.outcomes.push({ type: 'error', message: 'ffmpeg exited with code 1: Invalid data' });

    const status = await encoder.concat([path.join(dir, 'a.mp4')], path.join(dir, 'highlights.mp4'), 'copy');

    expect(status.exitCode).toBe(1);
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('joins through the concat filter when re-encoding', async () => {
    const status = await encoder.concat(['/w/a.mp4', '/w/b.mp4'], '/w/highlights.mp4', 'reencode');

    expect(status.ok).toBe(true);
    const [cmd] = fake.commands;
    expect(cmd.inputs).toEqual(['/w/a.mp4', '/w/b.mp4']);
    expect(cmd.complex).toEqual({
      filters: [
        '[0:v]setpts=PTS-STARTPTS[v0]',
        '[0:a]asetpts=PTS-STARTPTS[a0]',
        '[1:v]setpts=PTS-STARTPTS[v1]',
        '[1:a]asetpts=PTS-STARTPTS[a1]',
        '[v0][a0][v1][a1]concat=n=2:v=1:a=1[v][a]',
      ],
      map: ['v', 'a'],
    });
  });

  it('refuses an empty input list', async () => {
    const status = await encoder.concat([], '/w/highlights.mp4', 'copy');
    expect(status).toMatchObject({ ok: false, stderr: 'nothing to concatenate' });
    expect(fake.commands).toHaveLength(0);
  });
});
