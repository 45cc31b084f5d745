// A checkpoint log is a persistent singly linked list, newest first.
// Writing never mutates an existing node, so a staged write can be dropped
// by forgetting the new head.

export interface Checkpoint {
  readonly key: number; // cycle end or timestamp, non decreasing from tail to head
  readonly value: bigint;
  readonly previous?: Checkpoint;
}

export default class CheckpointLog {
  static latest(head: Checkpoint | undefined): bigint {
    return head ? head.value : 0n;
  }

  /**
   * Record `value` under `key`. A write under the head's key replaces the head,
   * a later key appends.
   */
  static write(head: Checkpoint | undefined, key: number, value: bigint): Checkpoint {
    if (!head) {
      return { key, value };
    }
    if (key < head.key) {
      throw new Error(`CheckpointLog: write at ${key} is older than last checkpoint ${head.key}`);
    }
    if (key == head.key) {
      return { key, value, previous: head.previous };
    }
    return { key, value, previous: head };
  }

  /** Value of the newest checkpoint strictly older than `key` */
  static valueBefore(head: Checkpoint | undefined, key: number): bigint {
    let cursor = head;
    while (cursor && cursor.key >= key) {
      cursor = cursor.previous;
    }
    return cursor ? cursor.value : 0n;
  }

  /** Value of the newest checkpoint at or before `key` */
  static valueAt(head: Checkpoint | undefined, key: number): bigint {
    let cursor = head;
    while (cursor && cursor.key > key) {
      cursor = cursor.previous;
    }
    return cursor ? cursor.value : 0n;
  }

  static length(head: Checkpoint | undefined): number {
    let count = 0;
    for (let cursor = head; cursor; cursor = cursor.previous) {
      count++;
    }
    return count;
  }
}
