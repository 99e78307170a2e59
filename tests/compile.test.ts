import { describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import {
  FfmpegTrackCompiler,
  buildCompileArgs,
  partialPathFor,
  type CompileSettings,
} from '../src/pipeline/compile';
import { CancelledError, CompileError } from '../src/pipeline/errors';
import type { FetchedSegment, TimelineSlot } from '../src/pipeline/types';
import { makeTempDir, seg, slowBinary } from './helpers';

const settings: CompileSettings = { width: 640, height: 360, fps: 25, sampleRate: 48000 };

const VIDEO_CHAIN =
  'scale=640:360:force_original_aspect_ratio=decrease,pad=640:360:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=25,format=yuv420p';
const AUDIO_CHAIN = 'aresample=48000,aformat=sample_fmts=fltp:channel_layouts=stereo,apad';

function content(start: number, end: number, segment: FetchedSegment, sourceOffset = 0): TimelineSlot {
  return { start, end, content: { type: 'segment', segment, sourceOffset } };
}

function filler(start: number, end: number): TimelineSlot {
  return { start, end, content: { type: 'filler' } };
}

function split(args: string[]) {
  const at = args.indexOf('-filter_complex');
  return { head: args.slice(0, 5), inputs: args.slice(5, at), graph: args[at + 1].split(';'), tail: args.slice(at + 2) };
}

describe('buildCompileArgs', () => {
  it('should take audio from video segments when the audio channel is empty', () => {
    const a = seg(0, 10, { name: 'a.mp4', hasAudio: true });
    const b = seg(12.5, 7.5, { name: 'b.mp4' });
    const video = [content(0, 10, a), filler(10, 15), content(15, 20, b, 2.5)];

    const { head, inputs, graph, tail } = split(buildCompileArgs(video, [filler(0, 20)], '/out/x.mp4', settings));

    expect(head).toEqual(['-y', '-hide_banner', '-nostdin', '-loglevel', 'error']);
    expect(inputs).toEqual([
      '-t', '10', '-i', '/cache/a.mp4',
      '-f', 'lavfi', '-t', '5', '-i', 'color=c=black:s=640x360:r=25',
      '-ss', '2.5', '-t', '5', '-i', '/cache/b.mp4',
      '-f', 'lavfi', '-t', '5', '-i', 'anullsrc=r=48000:cl=stereo',
      '-f', 'lavfi', '-t', '5', '-i', 'anullsrc=r=48000:cl=stereo',
    ]);
    expect(graph).toEqual([
      `[0:v]${VIDEO_CHAIN},trim=duration=10,setpts=PTS-STARTPTS[v0]`,
      `[1:v]${VIDEO_CHAIN},trim=duration=5,setpts=PTS-STARTPTS[v1]`,
      `[2:v]${VIDEO_CHAIN},trim=duration=5,setpts=PTS-STARTPTS[v2]`,
      '[v0][v1][v2]concat=n=3:v=1:a=0[vout]',
      `[0:a]${AUDIO_CHAIN},atrim=duration=10,asetpts=PTS-STARTPTS[a0]`,
      `[3:a]${AUDIO_CHAIN},atrim=duration=5,asetpts=PTS-STARTPTS[a1]`,
      `[4:a]${AUDIO_CHAIN},atrim=duration=5,asetpts=PTS-STARTPTS[a2]`,
      '[a0][a1][a2]concat=n=3:v=0:a=1[aout]',
    ]);
    expect(tail).toEqual([
      '-map', '[vout]', '-map', '[aout]',
      '-c:v', 'libx264', '-preset', 'medium', '-r', '25', '-c:a', 'aac',
      '-movflags', '+faststart', '/out/x.mp4',
    ]);
  });

  it('should use the audio channel when it has content', () => {
    const c = seg(0, 4, { name: 'c.m4a', kind: 'audio' });

    const { inputs, graph } = split(
      buildCompileArgs([filler(0, 10)], [content(0, 4, c), filler(4, 10)], '/out/x.mp4', settings)
    );

    expect(inputs).toEqual([
      '-f', 'lavfi', '-t', '10', '-i', 'color=c=black:s=640x360:r=25',
      '-t', '4', '-i', '/cache/c.m4a',
      '-f', 'lavfi', '-t', '6', '-i', 'anullsrc=r=48000:cl=stereo',
    ]);
    expect(graph.slice(2)).toEqual([
      `[1:a]${AUDIO_CHAIN},atrim=duration=4,asetpts=PTS-STARTPTS[a0]`,
      `[2:a]${AUDIO_CHAIN},atrim=duration=6,asetpts=PTS-STARTPTS[a1]`,
      '[a0][a1]concat=n=2:v=0:a=1[aout]',
    ]);
  });

  it('should cut the output only when truncating inside the timeline', () => {
    const video = [filler(0, 10)];
    const audio = [filler(0, 10)];
    const tailOf = (truncateAt?: number) => split(buildCompileArgs(video, audio, '/out/x.mp4', settings, truncateAt)).tail;

    expect(tailOf(2.0000001).slice(-5)).toEqual(['-t', '2', '-movflags', '+faststart', '/out/x.mp4']);
    expect(tailOf(10)).not.toContain('-t');
    expect(tailOf(12)).not.toContain('-t');
    expect(tailOf(undefined)).not.toContain('-t');
  });

  it('should round durations to microseconds', () => {
    const { inputs } = split(buildCompileArgs([filler(0, 10.1234567)], [filler(0, 10.1234567)], '/o.mp4', settings));
    expect(inputs[3]).toBe('10.123457');
  });

  it('should refuse an empty video timeline', () => {
    expect(() => buildCompileArgs([], [], '/out/x.mp4', settings)).toThrow(CompileError);
  });
});

describe('partialPathFor', () => {
  it('should insert the partial marker before the extension', () => {
    expect(partialPathFor('/out/x.mp4')).toBe('/out/x.partial.mp4');
    expect(partialPathFor('/out/x')).toBe('/out/x.partial.mp4');
  });
});

describe('FfmpegTrackCompiler', () => {
  it('should fail with a compile error and leave no output when ffmpeg cannot run', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'session', 'out.mp4');
    const compiler = new FfmpegTrackCompiler({ ffmpegBin: path.join(dir, 'no-such-ffmpeg'), settings });

    try {
      const err = await compiler.compile([filler(0, 5)], [filler(0, 5)], { outputPath }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CompileError);
      expect(err instanceof Error && err.message.startsWith('ffmpeg failed: ')).toBe(true);
      expect(await fs.pathExists(outputPath)).toBe(false);
      expect(await fs.pathExists(partialPathFor(outputPath))).toBe(false);
    } finally {
      await fs.remove(dir);
    }
  });

  it('should stop ffmpeg when cancelled and leave no output', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'session', 'out.mp4');
    try {
      const compiler = new FfmpegTrackCompiler({ ffmpegBin: await slowBinary(dir), settings });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);
      const started = Date.now();

      const err = await compiler
        .compile([filler(0, 5)], [filler(0, 5)], { outputPath, signal: controller.signal })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CancelledError);
      expect(err instanceof Error && err.message).toBe('Compilation cancelled');
      expect(Date.now() - started).toBeLessThan(2000);
      expect(await fs.pathExists(outputPath)).toBe(false);
      expect(await fs.pathExists(partialPathFor(outputPath))).toBe(false);
    } finally {
      await fs.remove(dir);
    }
  });
});
