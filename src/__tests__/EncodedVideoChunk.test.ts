/**
 * Tests for EncodedVideoChunk class
 */

import { EncodedVideoChunk } from '../core/EncodedVideoChunk.js';

describe('EncodedVideoChunk', () => {
  it('should keep its attributes and own its bytes', () => {
    const source = new Uint8Array([1, 2, 3, 4]);
    const chunk = new EncodedVideoChunk({ type: 'key', timestamp: 1000, duration: 500, data: source });
    source[0] = 99;

    expect(chunk.type).toBe('key');
    expect(chunk.timestamp).toBe(1000);
    expect(chunk.duration).toBe(500);
    expect(chunk.byteLength).toBe(4);
    const copy = new Uint8Array(4);
    chunk.copyTo(copy);
    expect(Array.from(copy)).toEqual([1, 2, 3, 4]);
  });

  it('should not let a copy change the chunk', () => {
    const chunk = new EncodedVideoChunk({ type: 'key', timestamp: 0, data: new Uint8Array([1, 2]) });
    const first = new Uint8Array(2);
    chunk.copyTo(first);
    first.fill(0);

    const second = new Uint8Array(2);
    chunk.copyTo(second);
    expect(Array.from(second)).toEqual([1, 2]);
  });

  it('should default duration to null', () => {
    const chunk = new EncodedVideoChunk({ type: 'delta', timestamp: 0, data: new ArrayBuffer(2) });
    expect(chunk.duration).toBeNull();
  });

  it('should copy into a larger destination', () => {
    const chunk = new EncodedVideoChunk({ type: 'delta', timestamp: 0, data: new Uint8Array([5, 6]) });
    const dest = new Uint8Array(4);
    chunk.copyTo(dest);
    expect(Array.from(dest)).toEqual([5, 6, 0, 0]);
  });

  it('should refuse a destination that is too small', () => {
    const chunk = new EncodedVideoChunk({ type: 'key', timestamp: 0, data: new Uint8Array(4) });
    expect(() => chunk.copyTo(new Uint8Array(3))).toThrow(TypeError);
  });

  it('should validate its init', () => {
    const data = new Uint8Array(1);
    expect(() => new EncodedVideoChunk({ type: 'key', timestamp: NaN, data })).toThrow(TypeError);
    expect(() => new EncodedVideoChunk({ type: 'key', timestamp: 0, duration: -1, data })).toThrow(TypeError);
  });
});
