import * as dotenv from 'dotenv';
dotenv.config();

function num(value: string | undefined, fallback: number): number {
    const n = Number(value);
    return value !== undefined && value !== '' && Number.isFinite(n) ? n : fallback;
}

export const ENV = {
    outputDir: process.env.OUTPUT_DIR || 'downloads',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    progressIntervalMs: num(process.env.PROGRESS_INTERVAL_MS, 1500),
    // Width of the worker pool used for segment downloads
    fetchConcurrency: num(process.env.FETCH_CONCURRENCY, 4),
    fetchTimeoutMs: num(process.env.FETCH_TIMEOUT_MS, 60_000),
    fetchRetries: num(process.env.FETCH_RETRIES, 2),
    fetchRetryBaseMs: num(process.env.FETCH_RETRY_BASE_MS, 1000),
    // Optional: override ffmpeg/ffprobe binary name/path
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    fillerWidth: num(process.env.FILLER_WIDTH, 1920),
    fillerHeight: num(process.env.FILLER_HEIGHT, 1080),
    outputFps: num(process.env.OUTPUT_FPS, 24),
    audioSampleRate: num(process.env.AUDIO_SAMPLE_RATE, 44100),
    userAgent:
        process.env.USER_AGENT ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
} as const;
