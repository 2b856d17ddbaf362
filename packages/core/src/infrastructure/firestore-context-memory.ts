import type { Query, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { FieldPath, Timestamp } from '@google-cloud/firestore';
import { createChildLogger } from '@agora/shared/src/logger.js';
import {
  NotFoundError,
  PersistenceError,
  VersionConflictError,
} from '@agora/shared/src/utils/errors.js';
import type {
  CheckpointInfo,
  ContextMemory,
  RecordKey,
  RecordKind,
  RecordWrite,
  TimelineEntry,
  TimelineKind,
  VersionedRecord,
} from '../memory/context-memory.js';
import { checkpointIdFor } from '../memory/context-memory.js';
import type { FirestoreBase } from './firestore-types.js';
import { getFirestoreClient } from './firestore-types.js';

const log = createChildLogger('memory:firestore');

const SESSIONS_COLLECTION = 'sessions';
const RECORDS_SUBCOLLECTION = 'records';
const TIMELINE_SUBCOLLECTION = 'timeline';
const CHECKPOINTS_SUBCOLLECTION = 'checkpoints';
const META_SUBCOLLECTION = 'meta';
const TIMELINE_HEAD_DOC = 'timeline';

const PAGE_SIZE = 300;
const BATCH_LIMIT = 400;
const CHECKPOINT_LOOKBACK = 5;

interface RecordDocument {
  path: string;
  kind: string;
  value: unknown;
  version: number;
  deleted: boolean;
  updatedAt: Timestamp;
}

interface TimelineDocument {
  sequence: number;
  kind: TimelineKind;
  payload: unknown;
  recordedAt: Timestamp;
}

interface TimelineHeadDocument {
  sequence: number;
}

interface CheckpointDocument {
  timelineSequence: number;
  recordCount: number;
  label?: string;
  complete: boolean;
  createdAt: Timestamp;
}

// Record paths contain '/', which Firestore reserves for document paths.
function docIdFor(path: string): string {
  return encodeURIComponent(path);
}

function sequenceDocId(sequence: number): string {
  return String(sequence).padStart(12, '0');
}

function kindOf(path: string): string {
  return path.slice(0, path.indexOf('/'));
}

// Firestore rejects undefined fields; JSON round-trip drops them.
function toStorable(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  const plain: unknown = JSON.parse(JSON.stringify(value));
  return plain;
}

function checkpointFromDoc(id: string, data: CheckpointDocument): CheckpointInfo {
  return {
    id,
    timelineSequence: data.timelineSequence,
    recordCount: data.recordCount,
    label: data.label,
    createdAt: data.createdAt.toDate().toISOString(),
  };
}

async function* paged(query: Query): AsyncIterable<QueryDocumentSnapshot> {
  let last: QueryDocumentSnapshot | undefined;
  for (;;) {
    const page = await (last ? query.startAfter(last) : query).limit(PAGE_SIZE).get();
    for (const doc of page.docs) {
      yield doc;
    }
    if (page.size < PAGE_SIZE) {
      return;
    }
    last = page.docs[page.docs.length - 1];
  }
}

/**
 * Durable ContextMemory for one session:
 *
 *   sessions/<id>/records/<encoded path>
 *   sessions/<id>/timeline/<000000000042>
 *   sessions/<id>/checkpoints/<cp-...>/records/<encoded path>
 *   sessions/<id>/meta/timeline            (sequence head)
 *
 * Commits and timeline appends run in transactions. Checkpoints are copied in
 * batches while the session keeps running, so a snapshot is fuzzy: it reflects
 * every write committed before the checkpoint entry and possibly some after.
 */
export function createFirestoreContextMemory(base: FirestoreBase, sessionId: string): ContextMemory {
  const db = getFirestoreClient(base);
  const root = base.collection(SESSIONS_COLLECTION).doc(sessionId);
  const recordsRef = root.collection(RECORDS_SUBCOLLECTION);
  const timelineRef = root.collection(TIMELINE_SUBCOLLECTION);
  const checkpointsRef = root.collection(CHECKPOINTS_SUBCOLLECTION);
  const timelineHeadRef = root.collection(META_SUBCOLLECTION).doc(TIMELINE_HEAD_DOC);

  function decode<T>(kind: RecordKind<T>, data: RecordDocument): VersionedRecord<T> {
    const result = kind.schema.safeParse(data.value);
    if (!result.success) {
      throw new PersistenceError(
        `Stored record ${data.path} failed validation: ${result.error.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join(', ')}`,
      );
    }
    return {
      path: data.path,
      id: data.path.slice(data.path.indexOf('/') + 1),
      value: result.data,
      version: data.version,
      updatedAt: data.updatedAt.toDate().toISOString(),
    };
  }

  async function appendEntry(kind: TimelineKind, payload: unknown): Promise<number> {
    try {
      return await db.runTransaction(async (tx) => {
        const head = await tx.get(timelineHeadRef);
        const previous = head.exists ? (head.data() as TimelineHeadDocument).sequence : 0;
        const sequence = previous + 1;
        const entry: TimelineDocument = {
          sequence,
          kind,
          payload: toStorable(payload),
          recordedAt: Timestamp.now(),
        };
        tx.set(timelineHeadRef, { sequence });
        tx.create(timelineRef.doc(sequenceDocId(sequence)), entry);
        return sequence;
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to append ${kind} to timeline of session ${sessionId}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async function loadRecords(query: Query): Promise<Map<string, RecordDocument>> {
    const loaded = new Map<string, RecordDocument>();
    for await (const doc of paged(query.orderBy(FieldPath.documentId()))) {
      const data = doc.data() as RecordDocument;
      loaded.set(data.path, data);
    }
    return loaded;
  }

  return {
    async get<T>(key: RecordKey<T>): Promise<VersionedRecord<T> | null> {
      const doc = await recordsRef.doc(docIdFor(key.path)).get();
      if (!doc.exists) {
        return null;
      }
      const data = doc.data() as RecordDocument;
      return data.deleted ? null : decode(key.kind, data);
    },

    async put<T>(key: RecordKey<T>, value: T, expectedVersion: number): Promise<number> {
      const [version] = await this.commit([{ path: key.path, value, expectedVersion }]);
      return version;
    },

    async commit(writes: readonly RecordWrite[]): Promise<readonly number[]> {
      if (writes.length === 0) {
        return [];
      }
      if (new Set(writes.map((w) => w.path)).size !== writes.length) {
        throw new PersistenceError('A commit may write each key only once');
      }

      const refs = writes.map((w) => recordsRef.doc(docIdFor(w.path)));
      try {
        return await db.runTransaction(async (tx) => {
          const snapshots = await tx.getAll(...refs);
          const versions = writes.map((write, i) => {
            const existing = snapshots[i].exists
              ? (snapshots[i].data() as RecordDocument)
              : undefined;
            const live = existing && !existing.deleted ? existing.version : 0;
            if (live !== write.expectedVersion) {
              throw new VersionConflictError(write.path, write.expectedVersion, live);
            }
            return (existing?.version ?? 0) + 1;
          });

          const updatedAt = Timestamp.now();
          writes.forEach((write, i) => {
            const doc: RecordDocument = {
              path: write.path,
              kind: kindOf(write.path),
              value: toStorable(write.value),
              version: versions[i],
              deleted: false,
              updatedAt,
            };
            tx.set(refs[i], doc);
          });
          return versions;
        });
      } catch (error) {
        if (error instanceof VersionConflictError) {
          throw error;
        }
        throw new PersistenceError(
          `Commit of ${String(writes.length)} records failed in session ${sessionId}`,
          error instanceof Error ? error : undefined,
        );
      }
    },

    async *scan<T>(kind: RecordKind<T>): AsyncIterable<VersionedRecord<T>> {
      const prefix = docIdFor(`${kind.name}/`);
      const query = recordsRef
        .where(FieldPath.documentId(), '>=', prefix)
        .where(FieldPath.documentId(), '<', `${prefix}\uf8ff`)
        .orderBy(FieldPath.documentId());

      for await (const doc of paged(query)) {
        const data = doc.data() as RecordDocument;
        if (!data.deleted) {
          yield decode(kind, data);
        }
      }
    },

    appendToTimeline(kind: TimelineKind, payload: unknown): Promise<number> {
      return appendEntry(kind, payload);
    },

    async *readTimeline(fromSequence = 1): AsyncIterable<TimelineEntry> {
      const query = timelineRef.where('sequence', '>=', fromSequence).orderBy('sequence');
      for await (const doc of paged(query)) {
        const data = doc.data() as TimelineDocument;
        yield {
          sequence: data.sequence,
          kind: data.kind,
          payload: data.payload,
          recordedAt: data.recordedAt.toDate().toISOString(),
        };
      }
    },

    async checkpoint(label?: string): Promise<string> {
      const sequence = await appendEntry('checkpoint', label === undefined ? {} : { label });
      const id = checkpointIdFor(sequence);
      const checkpointRef = checkpointsRef.doc(id);
      const snapshotRecordsRef = checkpointRef.collection(RECORDS_SUBCOLLECTION);

      const pending: CheckpointDocument = {
        timelineSequence: sequence,
        recordCount: 0,
        complete: false,
        createdAt: Timestamp.now(),
        ...(label === undefined ? {} : { label }),
      };

      try {
        await checkpointRef.set(pending);

        let recordCount = 0;
        let batch = db.batch();
        let batchSize = 0;
        for await (const doc of paged(recordsRef.orderBy(FieldPath.documentId()))) {
          const data = doc.data() as RecordDocument;
          if (data.deleted) {
            continue;
          }
          batch.set(snapshotRecordsRef.doc(doc.id), data);
          recordCount++;
          batchSize++;
          if (batchSize >= BATCH_LIMIT) {
            await batch.commit();
            batch = db.batch();
            batchSize = 0;
          }
        }
        if (batchSize > 0) {
          await batch.commit();
        }

        await checkpointRef.update({ recordCount, complete: true });
        log.info({ sessionId, checkpointId: id, recordCount }, 'Checkpoint written');
        return id;
      } catch (error) {
        throw new PersistenceError(
          `Failed to write checkpoint ${id} for session ${sessionId}`,
          error instanceof Error ? error : undefined,
        );
      }
    },

    async restore(snapshotId: string): Promise<void> {
      const checkpointRef = checkpointsRef.doc(snapshotId);
      const checkpointDoc = await checkpointRef.get();
      if (!checkpointDoc.exists || !(checkpointDoc.data() as CheckpointDocument).complete) {
        throw new NotFoundError(`Checkpoint not found: ${snapshotId}`);
      }

      const snapshot = await loadRecords(checkpointRef.collection(RECORDS_SUBCOLLECTION));
      const current = await loadRecords(recordsRef);
      const paths = new Set([...current.keys(), ...snapshot.keys()]);
      const updatedAt = Timestamp.now();

      try {
        let batch = db.batch();
        let batchSize = 0;
        for (const path of paths) {
          const existing = current.get(path);
          const restored = snapshot.get(path);
          const version = (existing?.version ?? 0) + 1;
          let doc: RecordDocument | undefined;
          if (restored) {
            doc = { ...restored, version, deleted: false, updatedAt };
          } else if (existing && !existing.deleted) {
            doc = { ...existing, value: null, version, deleted: true, updatedAt };
          }
          if (!doc) {
            continue;
          }
          batch.set(recordsRef.doc(docIdFor(path)), doc);
          batchSize++;
          if (batchSize >= BATCH_LIMIT) {
            await batch.commit();
            batch = db.batch();
            batchSize = 0;
          }
        }
        if (batchSize > 0) {
          await batch.commit();
        }
      } catch (error) {
        throw new PersistenceError(
          `Failed to restore checkpoint ${snapshotId} for session ${sessionId}`,
          error instanceof Error ? error : undefined,
        );
      }

      await appendEntry('restored', { checkpointId: snapshotId });
      log.info({ sessionId, checkpointId: snapshotId, records: snapshot.size }, 'Checkpoint restored');
    },

    async latestCheckpoint(): Promise<CheckpointInfo | null> {
      const recent = await checkpointsRef
        .orderBy('timelineSequence', 'desc')
        .limit(CHECKPOINT_LOOKBACK)
        .get();

      for (const doc of recent.docs) {
        const data = doc.data() as CheckpointDocument;
        if (data.complete) {
          return checkpointFromDoc(doc.id, data);
        }
      }
      return null;
    },
  };
}
