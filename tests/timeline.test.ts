import { describe, it, expect } from 'vitest';
import { EPSILON, contentSlots, reconstruct, type DiscardReason } from '../src/pipeline/timeline';
import { InvalidManifestError } from '../src/pipeline/errors';
import type { FetchedSegment, TimelineSlot } from '../src/pipeline/types';
import { describeSlots, seg } from './helpers';

function discards() {
  const seen: string[] = [];
  return {
    seen,
    onDiscard: (s: FetchedSegment, reason: DiscardReason) => seen.push(`${s.ref.filename}:${reason}`),
  };
}

function expectGapFree(slots: TimelineSlot[], total: number) {
  expect(slots[0].start).toBe(0);
  expect(slots[slots.length - 1].end).toBe(total);
  for (let i = 1; i < slots.length; i++) {
    expect(slots[i].start).toBe(slots[i - 1].end);
  }
  for (const s of slots) expect(s.end).toBeGreaterThan(s.start);
}

describe('reconstruct', () => {
  it('should fill gaps between and after segments', () => {
    const slots = reconstruct(
      [seg(0, 10, { name: 'a.mp4', index: 0 }), seg(15, 5, { name: 'b.mp4', index: 1 })],
      25
    );
    expect(describeSlots(slots)).toEqual(['[0,10) a.mp4', '[10,15) filler', '[15,20) b.mp4', '[20,25) filler']);
  });

  it('should clamp the head of a segment overlapping an earlier one', () => {
    const slots = reconstruct(
      [seg(0, 10, { name: 'a.mp4', index: 0 }), seg(5, 10, { name: 'b.mp4', index: 1 })],
      15
    );
    expect(describeSlots(slots)).toEqual(['[0,10) a.mp4', '[10,15) b.mp4']);
    const second = slots[1].content;
    expect(second.type === 'segment' && second.sourceOffset).toBe(5);
  });

  it('should produce a single filler slot when there are no segments', () => {
    expect(describeSlots(reconstruct([], 30))).toEqual(['[0,30) filler']);
  });

  it('should open with filler when the first segment starts late', () => {
    const slots = reconstruct([seg(20, 5, { name: 'a.mp4', index: 0 })], 30);
    expect(describeSlots(slots)).toEqual(['[0,20) filler', '[20,25) a.mp4', '[25,30) filler']);
  });

  it('should discard segments starting at or after the total duration', () => {
    const d = discards();
    const slots = reconstruct(
      [
        seg(0, 5, { name: 'a.mp4', index: 0 }),
        seg(30, 5, { name: 'late.mp4', index: 1 }),
        seg(30 - EPSILON / 2, 5, { name: 'edge.mp4', index: 2 }),
      ],
      30,
      d
    );
    expect(describeSlots(slots)).toEqual(['[0,5) a.mp4', '[5,30) filler']);
    expect(d.seen).toEqual(['edge.mp4:outOfRange', 'late.mp4:outOfRange']);
  });

  it('should drop a segment entirely covered by an earlier one', () => {
    const d = discards();
    const slots = reconstruct(
      [seg(0, 20, { name: 'a.mp4', index: 0 }), seg(5, 10, { name: 'b.mp4', index: 1 })],
      30,
      d
    );
    expect(describeSlots(slots)).toEqual(['[0,20) a.mp4', '[20,30) filler']);
    expect(d.seen).toEqual(['b.mp4:shadowed']);
  });

  it('should cut content that runs past the total duration', () => {
    const slots = reconstruct([seg(20, 20, { name: 'a.mp4', index: 0 })], 30);
    expect(describeSlots(slots)).toEqual(['[0,20) filler', '[20,30) a.mp4']);
  });

  it('should place equal offsets in manifest order', () => {
    const d = discards();
    const later = seg(0, 5, { name: 'later.mp4', index: 1 });
    const first = seg(0, 8, { name: 'first.mp4', index: 0 });
    const slots = reconstruct([later, first], 10, d);
    expect(describeSlots(slots)).toEqual(['[0,8) first.mp4', '[8,10) filler']);
    expect(d.seen).toEqual(['later.mp4:shadowed']);
  });

  it('should not depend on input order', () => {
    const a = seg(0, 10, { name: 'a.mp4', index: 0 });
    const b = seg(12, 4, { name: 'b.mp4', index: 1 });
    const c = seg(14, 10, { name: 'c.mp4', index: 2 });
    expect(describeSlots(reconstruct([c, a, b], 30))).toEqual(describeSlots(reconstruct([a, b, c], 30)));
  });

  it('should treat offsets within epsilon as contiguous', () => {
    const slots = reconstruct(
      [seg(0, 10, { name: 'a.mp4', index: 0 }), seg(10 + EPSILON / 2, 5, { name: 'b.mp4', index: 1 })],
      15
    );
    expect(describeSlots(slots)).toEqual(['[0,10) a.mp4', '[10,15) b.mp4']);
    const second = slots[1].content;
    expect(second.type === 'segment' && second.sourceOffset).toBe(0);
  });

  it('should snap a sliver-short tail onto the total duration', () => {
    const slots = reconstruct([seg(0, 10 - EPSILON / 2, { name: 'a.mp4', index: 0 })], 10);
    expect(slots).toHaveLength(1);
    expect(slots[0].end).toBe(10);
  });

  it('should keep every slot contiguous and covering the whole duration', () => {
    const segments = [
      seg(3, 4, { index: 0 }),
      seg(5, 9, { index: 1 }),
      seg(5, 1, { index: 2 }),
      seg(20.5, 2.25, { index: 3 }),
      seg(22, 30, { index: 4 }),
      seg(60, 1, { index: 5 }),
    ];
    const slots = reconstruct(segments, 40);
    expectGapFree(slots, 40);
    expect(slots.reduce((sum, s) => sum + (s.end - s.start), 0)).toBeCloseTo(40, 9);
    expect(contentSlots(slots)).toBe(4);
  });

  it('should reject a non-positive total duration', () => {
    expect(() => reconstruct([], 0)).toThrow(InvalidManifestError);
    expect(() => reconstruct([], -5)).toThrow('Total duration must be positive');
    expect(() => reconstruct([], Number.NaN)).toThrow(InvalidManifestError);
  });
});
