/**
 * Use-case tests for SlotVector through the package entry point.
 */

import { describe, it, expect } from 'vitest';
import {
  createVector,
  copyVector,
  moveVector,
  reserve,
  defineTraits,
  numberTraits,
  equals,
  lessThan,
  createVectorEventEmitter,
  type SlotVector,
  type ReallocateEvent,
} from '../index.ts';

interface Task {
  id: number;
  priority: number;
}

const tasks = {
  traits: defineTraits<Task>({
    create: () => ({ id: 0, priority: 0 }),
    compare: (a, b) => a.priority - b.priority || a.id - b.id,
    clone: (task) => ({ ...task }),
  }),
};

/**
 * Insert keeping the vector sorted by traits order.
 */
function insertSorted(queue: SlotVector<Task>, task: Task): void {
  const { compare } = queue.config.traits;
  let position = queue.begin();
  while (!position.equals(queue.end()) && compare(position.get(), task) <= 0) {
    position = position.advance();
  }
  queue.insert(position, task);
}

describe('SlotVector use cases', () => {
  it('should keep a priority queue sorted with insert and erase', () => {
    const queue = createVector(tasks, reserve(4));

    insertSorted(queue, { id: 1, priority: 5 });
    insertSorted(queue, { id: 2, priority: 1 });
    insertSorted(queue, { id: 3, priority: 3 });
    insertSorted(queue, { id: 4, priority: 1 });
    insertSorted(queue, { id: 5, priority: 9 });

    expect(queue.toArray().map((task) => task.id)).toEqual([2, 4, 3, 1, 5]);
    expect(queue.capacity).toBe(8);

    const next = queue.erase(queue.begin());
    expect(next.get().id).toBe(4);
    expect(queue.size).toBe(4);
  });

  it('should use the vector as a stack', () => {
    const stack = createVector(numbers());
    for (const value of [1, 2, 3]) {
      stack.pushBack(value);
    }

    const popped: number[] = [];
    while (!stack.isEmpty()) {
      popped.push(stack.get(stack.size - 1));
      stack.popBack();
    }

    expect(popped).toEqual([3, 2, 1]);
    expect(stack.capacity).toBe(4);
  });

  it('should snapshot with a copy and hand off with a move', () => {
    const working = createVector(tasks, [{ id: 1, priority: 2 }]);
    const snapshot = copyVector(working);

    working.at(0).priority = 7;
    const handedOff = moveVector(working);

    expect(snapshot.at(0).priority).toBe(2);
    expect(handedOff.at(0).priority).toBe(7);
    expect(working.isEmpty()).toBe(true);
    expect(lessThan(snapshot, handedOff)).toBe(true);
    expect(equals(snapshot, handedOff)).toBe(false);
  });

  it('should avoid reallocation during a burst after reserving', () => {
    const emitter = createVectorEventEmitter();
    const events: ReallocateEvent[] = [];
    emitter.addEventListener('reallocate', (event) => {
      events.push(event);
    });

    const samples = createVector({ traits: numberTraits, events: emitter }, reserve(100));
    for (let i = 0; i < 100; i++) {
      samples.pushBack(i);
    }

    expect(events).toHaveLength(1);
    expect(samples.capacity).toBe(100);
    expect(samples.get(99)).toBe(99);
  });
});

function numbers() {
  return { traits: numberTraits };
}
