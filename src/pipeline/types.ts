export type Seconds = number;

export type SegmentKind = 'video' | 'audio' | 'unknown';
export type MediaKind = Exclude<SegmentKind, 'unknown'>;
export type Channel = MediaKind;

export interface SegmentRef {
  readonly url: string;
  readonly startOffset: Seconds;
  readonly kind: SegmentKind;
  /** Cache filename, unique within one manifest. */
  readonly filename: string;
  /** Position of the entry in the manifest; the tie-break for equal offsets. */
  readonly index: number;
}

export interface NormalizedManifest {
  name: string;
  totalDuration: Seconds;
  segments: SegmentRef[];
}

export interface ProbeResult {
  kind: MediaKind;
  durationSec: Seconds;
  /** Video files only: whether an audio stream is muxed alongside. */
  hasAudio: boolean;
}

export interface FetchedSegment {
  ref: SegmentRef;
  localPath: string;
  probedDuration: Seconds;
  probedKind: MediaKind;
  hasAudio: boolean;
}

export interface FillerMarker {
  type: 'filler';
}

export interface SegmentContent {
  type: 'segment';
  segment: FetchedSegment;
  /** Seconds into the segment file where playback begins (non-zero when the head was shadowed). */
  sourceOffset: Seconds;
}

export type SlotContent = FillerMarker | SegmentContent;

export interface TimelineSlot {
  start: Seconds;
  end: Seconds;
  content: SlotContent;
}

export interface FetchProgress {
  url: string;
  transferredBytes: number;
  /** Absent when the server sent no content-length. */
  totalBytes?: number;
}

export type SessionPhase =
  | 'Normalizing'
  | 'Fetching'
  | 'Reconstructing'
  | 'Compiling'
  | 'CleaningUp'
  | 'Done'
  | 'Failed';

export interface SessionReport {
  phase: 'Done';
  sessionName: string;
  sessionDir: string;
  outputPath: string;
  totalDuration: Seconds;
  segmentsTotal: number;
  fetched: number;
  lostToFetch: number;
  lostToProbe: number;
  videoSlots: TimelineSlot[];
  audioSlots: TimelineSlot[];
  deletedFiles: number;
}
