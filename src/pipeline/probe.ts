import { execa } from 'execa';
import { z } from 'zod';
import { ENV } from './env';
import { CancelledError, ProbeError } from './errors';
import type { ProbeResult } from './types';

export interface MediaProber {
  probe(filePath: string, signal?: AbortSignal): Promise<ProbeResult>;
}

const numeric = z.union([z.string(), z.number()]).optional();

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        duration: numeric,
        disposition: z.object({ attached_pic: z.number().optional() }).optional(),
      })
    )
    .default([]),
  format: z.object({ duration: numeric }).optional(),
});

function seconds(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Classifies `ffprobe -print_format json` output. A real video stream wins
 * over audio; cover art (attached pictures) does not count as video.
 */
export function interpretProbe(stdout: string, filePath: string): ProbeResult {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (e) {
    throw new ProbeError(filePath, 'unparsable ffprobe output', { cause: e });
  }
  const parsed = probeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeError(filePath, 'unexpected ffprobe output');
  }
  const { streams, format } = parsed.data;
  const video = streams.find((s) => s.codec_type === 'video' && !s.disposition?.attached_pic);
  const audio = streams.find((s) => s.codec_type === 'audio');
  const chosen = video ?? audio;
  if (!chosen) {
    throw new ProbeError(filePath, 'no video or audio stream');
  }
  const durationSec = seconds(chosen.duration) ?? seconds(format?.duration);
  if (durationSec === undefined) {
    throw new ProbeError(filePath, 'duration unknown');
  }
  return {
    kind: video ? 'video' : 'audio',
    durationSec,
    hasAudio: Boolean(video && audio),
  };
}

export class FfprobeProber implements MediaProber {
  constructor(private readonly bin: string = ENV.ffprobeBin) {}

  async probe(filePath: string, signal?: AbortSignal): Promise<ProbeResult> {
    let stdout: string;
    try {
      const res = await execa(
        this.bin,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
        { signal }
      );
      stdout = res.stdout;
    } catch (e) {
      if (signal?.aborted) throw new CancelledError();
      throw new ProbeError(filePath, 'ffprobe failed', { cause: e });
    }
    return interpretProbe(stdout, filePath);
  }
}
