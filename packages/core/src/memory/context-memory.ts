import type { z } from 'zod';
import { NotFoundError } from '@agora/shared/src/utils/errors.js';

/**
 * A family of records sharing one schema. Every stored value is validated
 * against the kind's schema when it is read back.
 */
export interface RecordKind<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

export interface RecordKey<T> {
  readonly kind: RecordKind<T>;
  readonly id: string;
  readonly path: string;
}

export interface VersionedRecord<T> {
  readonly path: string;
  readonly id: string;
  readonly value: T;
  readonly version: number;
  readonly updatedAt: string;
}

export interface RecordWrite {
  readonly path: string;
  readonly value: unknown;
  readonly expectedVersion: number;
}

export const TIMELINE_KINDS = [
  'goal-set',
  'hypothesis-added',
  'task-enqueued',
  'task-transition',
  'match-applied',
  'statistics',
  'checkpoint',
  'restored',
  'phase-changed',
  'feedback',
  'control',
] as const;

export type TimelineKind = (typeof TIMELINE_KINDS)[number];

export interface TimelineEntry {
  readonly sequence: number;
  readonly kind: TimelineKind;
  readonly payload: unknown;
  readonly recordedAt: string;
}

export interface CheckpointInfo {
  readonly id: string;
  readonly timelineSequence: number;
  readonly recordCount: number;
  readonly label?: string;
  readonly createdAt: string;
}

/**
 * Versioned record store plus an append-only timeline.
 *
 * Writes are optimistic: `expectedVersion` is the version the caller last
 * observed, `0` meaning the key must not exist. A mismatch rejects with
 * `VersionConflictError` and writes nothing.
 */
export interface ContextMemory {
  get<T>(key: RecordKey<T>): Promise<VersionedRecord<T> | null>;
  put<T>(key: RecordKey<T>, value: T, expectedVersion: number): Promise<number>;
  /** Atomic multi-key compare-and-set. Resolves to the new versions in write order. */
  commit(writes: readonly RecordWrite[]): Promise<readonly number[]>;
  scan<T>(kind: RecordKind<T>): AsyncIterable<VersionedRecord<T>>;
  appendToTimeline(kind: TimelineKind, payload: unknown): Promise<number>;
  readTimeline(fromSequence?: number): AsyncIterable<TimelineEntry>;
  checkpoint(label?: string): Promise<string>;
  restore(snapshotId: string): Promise<void>;
  latestCheckpoint(): Promise<CheckpointInfo | null>;
}

export function defineRecordKind<T>(name: string, schema: z.ZodType<T>): RecordKind<T> {
  if (name.length === 0 || name.includes('/')) {
    throw new Error(`Invalid record kind name: "${name}"`);
  }
  return { name, schema };
}

export function recordKey<T>(kind: RecordKind<T>, id: string): RecordKey<T> {
  return { kind, id, path: `${kind.name}/${id}` };
}

export function recordWrite<T>(key: RecordKey<T>, value: T, expectedVersion: number): RecordWrite {
  return { path: key.path, value, expectedVersion };
}

export function checkpointIdFor(sequence: number): string {
  return `cp-${String(sequence).padStart(12, '0')}`;
}

export async function requireRecord<T>(
  memory: ContextMemory,
  key: RecordKey<T>,
): Promise<VersionedRecord<T>> {
  const record = await memory.get(key);
  if (!record) {
    throw new NotFoundError(`Record not found: ${key.path}`);
  }
  return record;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function scanValues<T>(memory: ContextMemory, kind: RecordKind<T>): Promise<T[]> {
  const records = await collect(memory.scan(kind));
  return records.map((r) => r.value);
}
