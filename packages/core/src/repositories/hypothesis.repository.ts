import type {
  Hypothesis,
  HypothesisContent,
  HypothesisProvenance,
  HypothesisStatus,
} from '@agora/shared/src/types/hypothesis.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { NotFoundError, ProvenanceError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { createIfAbsent, updateWithRetry } from '../memory/versioned-update.js';

const log = createChildLogger('repository:hypothesis');

export interface NewHypothesis {
  readonly id: string;
  readonly goalId: string;
  readonly content: HypothesisContent;
  readonly provenance: HypothesisProvenance;
}

export interface AddHypothesisResult {
  readonly hypothesis: Hypothesis;
  readonly created: boolean;
}

export interface HypothesisRepository {
  /** Idempotent by id: re-adding an existing id returns the stored hypothesis. */
  add(input: NewHypothesis): Promise<AddHypothesisResult>;
  getById(id: string): Promise<Hypothesis | null>;
  require(id: string): Promise<Hypothesis>;
  list(status?: HypothesisStatus): Promise<readonly Hypothesis[]>;
  setStatus(id: string, status: Exclude<HypothesisStatus, 'active'>, reason: string): Promise<Hypothesis>;
  /** Every hypothesis reachable through provenance parents, nearest first. */
  ancestors(id: string): Promise<readonly string[]>;
}

export function compareByCreation(a: Hypothesis, b: Hypothesis): number {
  if (a.creationSequence !== b.creationSequence) {
    return a.creationSequence - b.creationSequence;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// rejected is terminal; superseded may still be rejected by a scientist.
function canMoveTo(current: HypothesisStatus, next: HypothesisStatus): boolean {
  if (current === next || current === 'rejected') {
    return false;
  }
  return true;
}

export function createHypothesisRepository(
  memory: ContextMemory,
  now: () => Date = () => new Date(),
): HypothesisRepository {
  async function validateProvenance(input: NewHypothesis): Promise<void> {
    if (input.provenance.kind === 'generated') {
      return;
    }
    const parentIds = input.provenance.parentIds;
    if (parentIds.length === 0) {
      throw new ProvenanceError(`Evolved hypothesis ${input.id} names no parents`);
    }
    if (new Set(parentIds).size !== parentIds.length) {
      throw new ProvenanceError(`Evolved hypothesis ${input.id} repeats a parent`);
    }
    if (parentIds.includes(input.id)) {
      throw new ProvenanceError(`Hypothesis ${input.id} cannot be its own parent`);
    }
    // Parents must already exist, so the provenance graph can never close a cycle.
    for (const parentId of parentIds) {
      const parent = await memory.get(Keys.hypothesis(parentId));
      if (!parent) {
        throw new ProvenanceError(`Parent hypothesis ${parentId} of ${input.id} does not exist`);
      }
    }
  }

  return {
    async add(input: NewHypothesis): Promise<AddHypothesisResult> {
      const existing = await memory.get(Keys.hypothesis(input.id));
      if (existing) {
        return { hypothesis: existing.value, created: false };
      }

      await validateProvenance(input);

      const creationSequence = await memory.appendToTimeline('hypothesis-added', {
        hypothesisId: input.id,
        goalId: input.goalId,
        provenance: input.provenance.kind,
      });
      const hypothesis: Hypothesis = {
        id: input.id,
        goalId: input.goalId,
        content: input.content,
        provenance: input.provenance,
        createdAt: now().toISOString(),
        creationSequence,
        status: 'active',
      };

      const created = await createIfAbsent(memory, Keys.hypothesis(input.id), hypothesis);
      if (!created) {
        const winner = await this.require(input.id);
        return { hypothesis: winner, created: false };
      }

      log.info(
        { hypothesisId: input.id, provenance: input.provenance.kind, creationSequence },
        'Hypothesis added',
      );
      return { hypothesis, created: true };
    },

    async getById(id: string): Promise<Hypothesis | null> {
      const record = await memory.get(Keys.hypothesis(id));
      return record?.value ?? null;
    },

    async require(id: string): Promise<Hypothesis> {
      const hypothesis = await this.getById(id);
      if (!hypothesis) {
        throw new NotFoundError(`Hypothesis not found: ${id}`);
      }
      return hypothesis;
    },

    async list(status?: HypothesisStatus): Promise<readonly Hypothesis[]> {
      const all = await scanValues(memory, Kinds.hypothesis);
      const filtered = status ? all.filter((h) => h.status === status) : all;
      return filtered.sort(compareByCreation);
    },

    async setStatus(
      id: string,
      status: Exclude<HypothesisStatus, 'active'>,
      reason: string,
    ): Promise<Hypothesis> {
      const result = await updateWithRetry(memory, Keys.hypothesis(id), (current) => {
        if (!current) {
          throw new NotFoundError(`Hypothesis not found: ${id}`);
        }
        if (!canMoveTo(current.value.status, status)) {
          return null;
        }
        return { ...current.value, status, statusReason: reason };
      });
      if (!result) {
        throw new NotFoundError(`Hypothesis not found: ${id}`);
      }
      if (result.written) {
        log.info({ hypothesisId: id, status, reason }, 'Hypothesis status changed');
      }
      return result.value;
    },

    async ancestors(id: string): Promise<readonly string[]> {
      const seen = new Set<string>();
      const order: string[] = [];
      let frontier = [id];
      while (frontier.length > 0) {
        const next: string[] = [];
        for (const currentId of frontier) {
          const hypothesis = await this.require(currentId);
          if (hypothesis.provenance.kind !== 'evolved') {
            continue;
          }
          for (const parentId of hypothesis.provenance.parentIds) {
            if (!seen.has(parentId)) {
              seen.add(parentId);
              order.push(parentId);
              next.push(parentId);
            }
          }
        }
        frontier = next;
      }
      return order;
    },
  };
}
