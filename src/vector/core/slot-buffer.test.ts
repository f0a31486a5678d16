/**
 * Tests for the slot buffer owner.
 */

import { describe, it, expect, vi } from 'vitest';
import { SlotBuffer } from './slot-buffer.ts';

describe('SlotBuffer', () => {
  describe('empty', () => {
    it('should own no slots', () => {
      const buffer = SlotBuffer.empty<number>();
      expect(buffer.capacity).toBe(0);
      expect(buffer.rawPointer()).toEqual([]);
    });
  });

  describe('allocate', () => {
    it('should default-construct every slot with fill', () => {
      const fill = vi.fn(() => 7);
      const buffer = SlotBuffer.allocate(3, fill);

      expect(buffer.capacity).toBe(3);
      expect(buffer.rawPointer()).toEqual([7, 7, 7]);
      expect(fill).toHaveBeenCalledTimes(3);
    });

    it('should leave slots unset without fill', () => {
      const buffer = SlotBuffer.allocate<string>(4);
      expect(buffer.capacity).toBe(4);
      expect(0 in buffer.rawPointer()).toBe(false);
    });

    it('should call fill once per slot so slots do not share objects', () => {
      const buffer = SlotBuffer.allocate(2, () => ({ hits: 0 }));
      const [first, second] = buffer.rawPointer();
      expect(first).not.toBe(second);
    });
  });

  describe('rawPointer', () => {
    it('should return the owned array itself', () => {
      const buffer = SlotBuffer.allocate(2, () => 0);
      buffer.rawPointer()[1] = 5;
      expect(buffer.rawPointer()[1]).toBe(5);
      expect(buffer.rawPointer()).toBe(buffer.rawPointer());
    });
  });

  describe('swap', () => {
    it('should exchange storage between handles', () => {
      const a = SlotBuffer.allocate(1, () => 'a');
      const b = SlotBuffer.allocate(2, () => 'b');
      const slotsA = a.rawPointer();
      const slotsB = b.rawPointer();

      a.swap(b);

      expect(a.rawPointer()).toBe(slotsB);
      expect(b.rawPointer()).toBe(slotsA);
      expect(a.capacity).toBe(2);
      expect(b.capacity).toBe(1);
    });
  });

  describe('transfer', () => {
    it('should move storage into a new handle and empty the source', () => {
      const source = SlotBuffer.allocate(3, () => 1);
      const slots = source.rawPointer();

      const moved = source.transfer();

      expect(moved.rawPointer()).toBe(slots);
      expect(source.capacity).toBe(0);
    });
  });

  describe('release', () => {
    it('should drop the storage and leave an empty handle', () => {
      const buffer = SlotBuffer.allocate(3, () => 1);
      const slots = buffer.rawPointer();

      buffer.release();

      expect(buffer.capacity).toBe(0);
      expect(buffer.rawPointer()).not.toBe(slots);
    });
  });
});
