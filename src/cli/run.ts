import { createInterface, type Interface } from 'readline/promises';
import fs from 'fs-extra';
import type { KyInstance } from 'ky';
import { ENV } from '../pipeline/env';
import { createHttpClient, fetchManifest, isRecordingUrl, resolveManifestUrl } from '../pipeline/http';
import { countSegmentEntries } from '../pipeline/manifest';
import { runSession } from '../pipeline/run';
import { FfprobeProber, type MediaProber } from '../pipeline/probe';
import { FfmpegTrackCompiler, type TrackCompiler } from '../pipeline/compile';
import { SessionError, describeError } from '../pipeline/errors';
import type { Logger } from '../pipeline/log';

export interface StitchArgs {
    url: string;
    sessionId?: string;
    outputDir: string;
    maxDuration?: number;
    keepFiles: boolean;
    quiet: boolean;
    debug: boolean;
    concurrency?: number;
}

export interface StitchDeps {
    logger: Logger;
    signal?: AbortSignal;
    http?: KyInstance;
    prober?: MediaProber;
    compiler?: TrackCompiler;
    /** User-facing output; defaults to console.log. */
    print?: (line: string) => void;
}

export function positiveOrUndefined(value: number | string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) && n > 0 ? n : undefined;
}

/** Resolves the manifest, runs one session and reports the outcome. */
export async function stitchRecording(args: StitchArgs, deps: StitchDeps): Promise<boolean> {
    const { logger } = deps;
    const print = args.quiet ? () => {} : deps.print ?? ((line: string) => console.log(line));
    const http = deps.http ?? createHttpClient();

    try {
        logger.info('cli.url', { url: args.url });
        const manifestUrl = resolveManifestUrl(args.url);
        logger.info('manifest.fetch', { url: manifestUrl });
        const raw = await fetchManifest(http, manifestUrl, {
            sessionId: args.sessionId,
            signal: deps.signal,
            logger,
        });
        print(`\nFound ${countSegmentEntries(raw)} segments to download`);

        const report = await runSession(
            raw,
            {
                outputDir: args.outputDir,
                maxDuration: args.maxDuration,
                keepFiles: args.keepFiles,
                debug: args.debug,
                concurrency: args.concurrency,
            },
            {
                logger,
                http,
                prober: deps.prober ?? new FfprobeProber(),
                compiler: deps.compiler ?? new FfmpegTrackCompiler({ logger }),
                signal: deps.signal,
            }
        );

        print(`  Segments: ${report.fetched} usable of ${report.segmentsTotal}`);
        print(`  Total duration: ${report.totalDuration.toFixed(2)} seconds (${(report.totalDuration / 60).toFixed(1)} minutes)`);
        print(`\nCreated: ${report.outputPath}`);
        const { size } = await fs.stat(report.outputPath);
        print(`  File size: ${(size / (1024 * 1024)).toFixed(2)} MB`);
        if (report.deletedFiles) print(`  Deleted ${report.deletedFiles} segment files`);
        return true;
    } catch (e) {
        if (e instanceof SessionError) {
            const { segmentsTotal, lostToFetch, lostToProbe } = e.stats;
            print(`\nFailed during ${e.phase}: ${describeError(e.cause)}`);
            if (lostToFetch || lostToProbe) {
                print(`  Lost ${lostToFetch} segments to download errors and ${lostToProbe} to unreadable media (of ${segmentsTotal})`);
            }
            if (e.reason?.code === 'no_content') {
                print('  The recording may be empty, protected (requires a valid session ID), or in an unsupported format.');
            }
        } else {
            logger.error('cli.failed', { error: describeError(e) });
            print(`\nError: ${describeError(e)}`);
        }
        return false;
    }
}

async function ask(rl: Interface, question: string): Promise<string> {
    return (await rl.question(question)).trim();
}

function yes(answer: string): boolean {
    return ['y', 'yes'].includes(answer.toLowerCase());
}

/** Collects the arguments of one run from the terminal. */
export async function promptForRun(rl: Interface): Promise<StitchArgs> {
    let url = '';
    for (;;) {
        url = await ask(rl, '\nRecording URL: ');
        if (!url) {
            console.log('URL cannot be empty. Please try again.');
        } else if (isRecordingUrl(url)) {
            break;
        } else {
            console.log('Invalid URL. Enter a recording page URL or a manifest URL (http/https).');
        }
    }

    let sessionId: string | undefined;
    if (yes(await ask(rl, '\nIs this a private recording requiring a session ID? (y/N): '))) {
        sessionId = (await ask(rl, '   Session ID (from browser cookies): ')) || undefined;
        if (!sessionId) console.log('   No session ID provided. Will try without it.');
    }

    const outputDir = (await ask(rl, `\nOutput directory (Enter for '${ENV.outputDir}'): `)) || ENV.outputDir;

    const rawMax = await ask(rl, '\nMaximum duration in seconds (Enter for no limit): ');
    const maxDuration = positiveOrUndefined(rawMax);
    if (rawMax && maxDuration === undefined) console.log('   Invalid duration. Using no limit.');

    const keepFiles = yes(await ask(rl, '\nKeep downloaded segment files after processing? (y/N): '));
    const debug = yes(await ask(rl, '\nEnable debug mode? (y/N): '));

    return { url, sessionId, outputDir, maxDuration, keepFiles, debug, quiet: false };
}

/**
 * Prompt loop. The terminal delivers Ctrl+C to readline rather than the
 * process: during a run it cancels the session, at a prompt it exits.
 */
export async function runInteractive(deps: StitchDeps, onInterrupt: () => void): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    let running = false;
    rl.on('SIGINT', () => {
        if (running) {
            onInterrupt();
            return;
        }
        console.log('\nGoodbye!');
        process.exit(130);
    });
    try {
        console.log('\nRecording stitcher (press Ctrl+C at any time to cancel)');
        for (;;) {
            const args = await promptForRun(rl);
            if (args.debug) deps.logger.setLevel('debug');
            running = true;
            const ok = await stitchRecording(args, deps);
            running = false;
            console.log(ok ? '\nCompleted successfully.' : '\nCompleted with errors.');
            if (deps.signal?.aborted) return;
            if (!yes(await ask(rl, '\nProcess another recording? (y/N): '))) return;
        }
    } finally {
        rl.close();
    }
}
