import { describe, it, expect } from 'vitest';
import { AcknowledgementCursor } from '../src/cursor.js';

describe('AcknowledgementCursor', () => {
  it('advances over the contiguous settled prefix only', () => {
    const cursor = new AcknowledgementCursor(['a', 'b', 'c', 'd']);

    expect(cursor.acknowledge('b')).toEqual([]);
    expect(cursor.lastAcknowledged).toBeUndefined();
    expect(cursor.acknowledge('a')).toEqual(['a', 'b']);
    expect(cursor.acknowledge('d')).toEqual([]);
    expect(cursor.lastAcknowledged).toBe('b');
    expect(cursor.acknowledge('c')).toEqual(['c', 'd']);
    expect(cursor.acknowledgedCount).toBe(4);
    expect(cursor.done).toBe(true);
  });

  it('is done immediately for an empty order', () => {
    expect(new AcknowledgementCursor([]).done).toBe(true);
  });
});
