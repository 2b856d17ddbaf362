import { NotFoundError, PersistenceError, VersionConflictError } from '@agora/shared/src/utils/errors.js';
import type {
  CheckpointInfo,
  ContextMemory,
  RecordKey,
  RecordKind,
  RecordWrite,
  TimelineEntry,
  TimelineKind,
  VersionedRecord,
} from './context-memory.js';
import { checkpointIdFor } from './context-memory.js';

interface StoredRecord {
  readonly value: unknown;
  readonly version: number;
  readonly updatedAt: string;
  readonly deleted: boolean;
}

interface Snapshot {
  readonly info: CheckpointInfo;
  readonly records: ReadonlyMap<string, StoredRecord>;
}

export interface InMemoryContextMemoryOptions {
  readonly now?: () => Date;
}

function idFromPath(path: string): string {
  return path.slice(path.indexOf('/') + 1);
}

export function createInMemoryContextMemory(
  options: InMemoryContextMemoryOptions = {},
): ContextMemory {
  const now = options.now ?? ((): Date => new Date());
  const records = new Map<string, StoredRecord>();
  const timeline: TimelineEntry[] = [];
  const snapshots = new Map<string, Snapshot>();

  // Tombstones keep their version so a re-created key never reuses one.
  function storedVersion(path: string): number {
    return records.get(path)?.version ?? 0;
  }

  function liveVersion(path: string): number {
    const record = records.get(path);
    return record && !record.deleted ? record.version : 0;
  }

  function decode<T>(kind: RecordKind<T>, path: string, stored: StoredRecord): VersionedRecord<T> {
    const result = kind.schema.safeParse(structuredClone(stored.value));
    if (!result.success) {
      throw new PersistenceError(
        `Stored record ${path} failed validation: ${result.error.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join(', ')}`,
      );
    }
    return {
      path,
      id: idFromPath(path),
      value: result.data,
      version: stored.version,
      updatedAt: stored.updatedAt,
    };
  }

  function append(kind: TimelineKind, payload: unknown): number {
    const sequence = timeline.length + 1;
    timeline.push({
      sequence,
      kind,
      payload: structuredClone(payload),
      recordedAt: now().toISOString(),
    });
    return sequence;
  }

  return {
    get<T>(key: RecordKey<T>): Promise<VersionedRecord<T> | null> {
      const stored = records.get(key.path);
      if (!stored || stored.deleted) {
        return Promise.resolve(null);
      }
      try {
        return Promise.resolve(decode(key.kind, key.path, stored));
      } catch (error) {
        return Promise.reject(error);
      }
    },

    async put<T>(key: RecordKey<T>, value: T, expectedVersion: number): Promise<number> {
      const [version] = await this.commit([{ path: key.path, value, expectedVersion }]);
      return version;
    },

    commit(writes: readonly RecordWrite[]): Promise<readonly number[]> {
      const paths = new Set(writes.map((w) => w.path));
      if (paths.size !== writes.length) {
        return Promise.reject(new PersistenceError('A commit may write each key only once'));
      }

      for (const write of writes) {
        const actual = liveVersion(write.path);
        if (actual !== write.expectedVersion) {
          return Promise.reject(
            new VersionConflictError(write.path, write.expectedVersion, actual),
          );
        }
      }

      const updatedAt = now().toISOString();
      const versions = writes.map((write) => {
        const version = storedVersion(write.path) + 1;
        records.set(write.path, {
          value: structuredClone(write.value),
          version,
          updatedAt,
          deleted: false,
        });
        return version;
      });
      return Promise.resolve(versions);
    },

    async *scan<T>(kind: RecordKind<T>): AsyncIterable<VersionedRecord<T>> {
      const prefix = `${kind.name}/`;
      const matching = [...records.entries()]
        .filter(([path, stored]) => path.startsWith(prefix) && !stored.deleted)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

      for (const [path, stored] of matching) {
        yield decode(kind, path, stored);
      }
    },

    appendToTimeline(kind: TimelineKind, payload: unknown): Promise<number> {
      return Promise.resolve(append(kind, payload));
    },

    async *readTimeline(fromSequence = 1): AsyncIterable<TimelineEntry> {
      const start = Math.max(0, fromSequence - 1);
      const entries = timeline.slice(start);
      for (const entry of entries) {
        yield structuredClone(entry);
      }
    },

    checkpoint(label?: string): Promise<string> {
      const sequence = append('checkpoint', { label });
      const id = checkpointIdFor(sequence);
      const copy = new Map<string, StoredRecord>();
      for (const [path, stored] of records) {
        if (!stored.deleted) {
          copy.set(path, { ...stored, value: structuredClone(stored.value) });
        }
      }
      snapshots.set(id, {
        info: {
          id,
          timelineSequence: sequence,
          recordCount: copy.size,
          label,
          createdAt: now().toISOString(),
        },
        records: copy,
      });
      return Promise.resolve(id);
    },

    restore(snapshotId: string): Promise<void> {
      const snapshot = snapshots.get(snapshotId);
      if (!snapshot) {
        return Promise.reject(new NotFoundError(`Checkpoint not found: ${snapshotId}`));
      }

      const updatedAt = now().toISOString();
      const paths = new Set([...records.keys(), ...snapshot.records.keys()]);
      for (const path of paths) {
        const restored = snapshot.records.get(path);
        const version = storedVersion(path) + 1;
        if (restored) {
          records.set(path, {
            value: structuredClone(restored.value),
            version,
            updatedAt,
            deleted: false,
          });
        } else if (liveVersion(path) > 0) {
          records.set(path, { value: null, version, updatedAt, deleted: true });
        }
      }

      append('restored', { checkpointId: snapshotId });
      return Promise.resolve();
    },

    latestCheckpoint(): Promise<CheckpointInfo | null> {
      let latest: CheckpointInfo | null = null;
      for (const snapshot of snapshots.values()) {
        if (!latest || snapshot.info.timelineSequence > latest.timelineSequence) {
          latest = snapshot.info;
        }
      }
      return Promise.resolve(latest);
    },
  };
}
