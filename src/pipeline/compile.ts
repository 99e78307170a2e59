// ffmpeg-backed track compiler: writes `<name>.partial.mp4`, renamed into place on a clean exit

import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { CancelledError, CompileError, describeError } from './errors';
import { EPSILON, slotDuration } from './timeline';
import type { Logger } from './log';
import type { TimelineSlot } from './types';

export interface CompileOptions {
  outputPath: string;
  /** Cut the compiled result to this many seconds when it runs longer. */
  truncateAt?: number;
  signal?: AbortSignal;
}

export interface TrackCompiler {
  compile(
    videoSlots: readonly TimelineSlot[],
    audioSlots: readonly TimelineSlot[],
    opts: CompileOptions
  ): Promise<string>;
}

export interface CompileSettings {
  width: number;
  height: number;
  fps: number;
  sampleRate: number;
}

export const DEFAULT_COMPILE_SETTINGS: CompileSettings = {
  width: ENV.fillerWidth,
  height: ENV.fillerHeight,
  fps: ENV.outputFps,
  sampleRate: ENV.audioSampleRate,
};

function fmt(n: number): string {
  return String(Number(n.toFixed(6)));
}

export function partialPathFor(outputPath: string): string {
  const ext = path.extname(outputPath);
  return `${outputPath.slice(0, outputPath.length - ext.length)}.partial${ext || '.mp4'}`;
}

/**
 * Audio slots to use for the mux. When the audio channel carries no content,
 * the audio embedded in video segments is used in its place.
 */
type AudioSource =
  | { from: 'channel'; slot: TimelineSlot }
  | { from: 'video'; slot: TimelineSlot; videoSlotIndex: number };

function audioSources(videoSlots: readonly TimelineSlot[], audioSlots: readonly TimelineSlot[]): AudioSource[] {
  if (audioSlots.some((s) => s.content.type === 'segment')) {
    return audioSlots.map((slot): AudioSource => ({ from: 'channel', slot }));
  }
  return videoSlots.map((slot, videoSlotIndex): AudioSource => {
    if (slot.content.type === 'segment' && slot.content.segment.hasAudio) {
      return { from: 'video', slot, videoSlotIndex };
    }
    return { from: 'channel', slot: { start: slot.start, end: slot.end, content: { type: 'filler' } } };
  });
}

export function buildCompileArgs(
  videoSlots: readonly TimelineSlot[],
  audioSlots: readonly TimelineSlot[],
  outputPath: string,
  settings: CompileSettings = DEFAULT_COMPILE_SETTINGS,
  truncateAt?: number
): string[] {
  if (!videoSlots.length) {
    throw new CompileError('No video slots to compile');
  }
  const { width, height, fps, sampleRate } = settings;
  const inputs: string[] = [];
  const filters: string[] = [];
  let inputCount = 0;

  function addInput(slot: TimelineSlot, lavfi: string): number {
    const dur = fmt(slotDuration(slot));
    if (slot.content.type === 'segment') {
      if (slot.content.sourceOffset > EPSILON) inputs.push('-ss', fmt(slot.content.sourceOffset));
      inputs.push('-t', dur, '-i', slot.content.segment.localPath);
    } else {
      inputs.push('-f', 'lavfi', '-t', dur, '-i', lavfi);
    }
    return inputCount++;
  }

  const blank = `color=c=black:s=${width}x${height}:r=${fps}`;
  const silence = `anullsrc=r=${sampleRate}:cl=stereo`;

  const videoInputs = videoSlots.map((slot) => addInput(slot, blank));
  videoSlots.forEach((slot, k) => {
    filters.push(
      `[${videoInputs[k]}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${fps},format=yuv420p,` +
        `trim=duration=${fmt(slotDuration(slot))},setpts=PTS-STARTPTS[v${k}]`
    );
  });
  filters.push(`${videoSlots.map((_, k) => `[v${k}]`).join('')}concat=n=${videoSlots.length}:v=1:a=0[vout]`);

  const sources = audioSources(videoSlots, audioSlots);
  sources.forEach((src, k) => {
    const input = src.from === 'video' ? videoInputs[src.videoSlotIndex] : addInput(src.slot, silence);
    filters.push(
      `[${input}:a]aresample=${sampleRate},aformat=sample_fmts=fltp:channel_layouts=stereo,` +
        `apad,atrim=duration=${fmt(slotDuration(src.slot))},asetpts=PTS-STARTPTS[a${k}]`
    );
  });
  filters.push(`${sources.map((_, k) => `[a${k}]`).join('')}concat=n=${sources.length}:v=0:a=1[aout]`);

  const total = videoSlots[videoSlots.length - 1].end;
  const args = [
    '-y',
    '-hide_banner',
    '-nostdin',
    '-loglevel',
    'error',
    ...inputs,
    '-filter_complex',
    filters.join(';'),
    '-map',
    '[vout]',
    '-map',
    '[aout]',
    '-c:v',
    'libx264',
    '-preset',
    'medium',
    '-r',
    String(fps),
    '-c:a',
    'aac',
  ];
  if (truncateAt !== undefined && truncateAt > 0 && truncateAt < total - EPSILON) {
    args.push('-t', fmt(truncateAt));
  }
  args.push('-movflags', '+faststart', outputPath);
  return args;
}

export interface FfmpegCompilerOptions {
  ffmpegBin?: string;
  settings?: CompileSettings;
  logger?: Logger;
}

export class FfmpegTrackCompiler implements TrackCompiler {
  private readonly bin: string;
  private readonly settings: CompileSettings;

  constructor(private readonly opts: FfmpegCompilerOptions = {}) {
    this.bin = opts.ffmpegBin ?? ENV.ffmpegBin;
    this.settings = opts.settings ?? DEFAULT_COMPILE_SETTINGS;
  }

  async compile(
    videoSlots: readonly TimelineSlot[],
    audioSlots: readonly TimelineSlot[],
    opts: CompileOptions
  ): Promise<string> {
    const partial = partialPathFor(opts.outputPath);
    const args = buildCompileArgs(videoSlots, audioSlots, partial, this.settings, opts.truncateAt);
    this.opts.logger?.debug('compile.ffmpeg', { bin: this.bin, inputs: videoSlots.length + audioSlots.length });
    await fs.ensureDir(path.dirname(opts.outputPath));
    try {
      await execa(this.bin, args, { signal: opts.signal });
      await fs.rename(partial, opts.outputPath);
    } catch (e) {
      await fs.remove(partial);
      if (opts.signal?.aborted) throw new CancelledError('Compilation cancelled');
      const stderr = e instanceof Error && 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
      throw new CompileError(
        `ffmpeg failed: ${describeError(e)}${stderr ? `\nstderr: ${stderr.slice(-800)}` : ''}`,
        { cause: e }
      );
    }
    return opts.outputPath;
  }
}
