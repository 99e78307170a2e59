import { InvalidManifestError } from './errors';
import type { FetchedSegment, Seconds, TimelineSlot } from './types';

/** Offsets closer than this are treated as equal. */
export const EPSILON: Seconds = 1e-6;

export type DiscardReason = 'outOfRange' | 'shadowed';

export interface ReconstructOptions {
  onDiscard?: (segment: FetchedSegment, reason: DiscardReason) => void;
}

/**
 * Stable order on the timeline: start offset, then manifest position. Never
 * depends on the order segments finished downloading.
 */
export function compareSegments(a: FetchedSegment, b: FetchedSegment): number {
  return a.ref.startOffset - b.ref.startOffset || a.ref.index - b.ref.index;
}

/**
 * Lays one channel's segments on a gap-free timeline of exactly `totalDuration`.
 * Gaps become filler; where segments overlap the earlier-placed one wins and
 * the later one loses its overlapping head (or vanishes entirely). Content
 * running past `totalDuration` is cut there.
 */
export function reconstruct(
  segments: readonly FetchedSegment[],
  totalDuration: Seconds,
  opts: ReconstructOptions = {}
): TimelineSlot[] {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw new InvalidManifestError('Total duration must be positive', { totalDuration });
  }

  const sorted = [...segments].sort(compareSegments);
  const slots: TimelineSlot[] = [];
  let cursor = 0;

  for (const s of sorted) {
    const start = s.ref.startOffset;
    if (start >= totalDuration - EPSILON) {
      opts.onDiscard?.(s, 'outOfRange');
      continue;
    }
    const end = Math.min(start + s.probedDuration, totalDuration);

    if (start > cursor + EPSILON) {
      slots.push({ start: cursor, end: start, content: { type: 'filler' } });
      cursor = start;
    }
    // Anything before the cursor is already covered by earlier content
    const effectiveStart = cursor;
    if (end - effectiveStart <= EPSILON) {
      opts.onDiscard?.(s, 'shadowed');
      continue;
    }
    slots.push({
      start: effectiveStart,
      end,
      content: { type: 'segment', segment: s, sourceOffset: Math.max(0, effectiveStart - start) },
    });
    cursor = end;
  }

  if (totalDuration - cursor > EPSILON || slots.length === 0) {
    slots.push({ start: cursor, end: totalDuration, content: { type: 'filler' } });
  } else {
    slots[slots.length - 1].end = totalDuration;
  }
  return slots;
}

export function slotDuration(slot: TimelineSlot): Seconds {
  return slot.end - slot.start;
}

export function contentSlots(slots: readonly TimelineSlot[]): number {
  return slots.filter((s) => s.content.type === 'segment').length;
}
