/**
 * Submission Context
 *
 * The single mutable record for one submission run. Values only ever get
 * added: once a key holds a value it is never cleared or replaced. A write
 * that disagrees with the held value is refused and kept as a conflict so
 * callers can report it.
 */

import { CANONICAL_KEYS } from '../parsing/index.js';
import type { CanonicalKey, CanonicalRecord } from '../parsing/index.js';

export interface ContextConflict {
  key: CanonicalKey;
  kept: string;
  rejected: string;
}

export class SubmissionContext {
  private readonly values = new Map<CanonicalKey, string>();
  private readonly conflictLog: ContextConflict[] = [];

  constructor(initial: CanonicalRecord = {}) {
    for (const key of CANONICAL_KEYS) {
      this.setIfAbsent(key, initial[key]);
    }
  }

  get(key: CanonicalKey): string | undefined {
    return this.values.get(key);
  }

  has(key: CanonicalKey): boolean {
    return this.values.has(key);
  }

  /**
   * Store a value unless the key is already set.
   * Empty and undefined values are ignored.
   *
   * @returns true when the value was stored
   */
  setIfAbsent(key: CanonicalKey, value: string | undefined): boolean {
    if (value === undefined || value === '') return false;

    const held = this.values.get(key);
    if (held === undefined) {
      this.values.set(key, value);
      return true;
    }
    if (held !== value) {
      this.conflictLog.push({ key, kept: held, rejected: value });
    }
    return false;
  }

  get conflicts(): readonly ContextConflict[] {
    return this.conflictLog;
  }

  /** Snapshot in canonical key order */
  toRecord(): CanonicalRecord {
    const record: CanonicalRecord = {};
    for (const key of CANONICAL_KEYS) {
      const value = this.values.get(key);
      if (value !== undefined) record[key] = value;
    }
    return record;
  }

  clone(): SubmissionContext {
    return new SubmissionContext(this.toRecord());
  }
}
