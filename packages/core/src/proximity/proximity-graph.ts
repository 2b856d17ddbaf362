import type { Hypothesis } from '@agora/shared/src/types/hypothesis.types.js';
import type {
  ClusterState,
  ProximityEdge,
  SimilarityScore,
} from '@agora/shared/src/types/proximity.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { clamp, roundTo } from '@agora/shared/src/utils/math.js';
import { scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { createIfAbsent, updateWithRetry } from '../memory/versioned-update.js';
import { compareByCreation, createHypothesisRepository } from '../repositories/hypothesis.repository.js';
import type { CreationOrder } from './clustering.js';
import { buildClusters, edgeId, findCluster, mergeInto } from './clustering.js';
import type { ApplyScoresResult, InsertionPlan, ProximityGraph, ProximityGraphDeps } from './types.js';

const log = createChildLogger('proximity:graph');

const SIMILARITY_DECIMALS = 6;

function emptyState(updatedAt: string): ClusterState {
  return { generation: 0, clusters: [], updatedAt };
}

export function createProximityGraph(deps: ProximityGraphDeps): ProximityGraph {
  const { memory, config } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const hypotheses = createHypothesisRepository(memory, now);

  async function creationOrder(): Promise<Map<string, Hypothesis>> {
    const all = await scanValues(memory, Kinds.hypothesis);
    return new Map(all.map((h) => [h.id, h]));
  }

  function orderOf(byId: ReadonlyMap<string, Hypothesis>): CreationOrder {
    return new Map([...byId.values()].map((h) => [h.id, h.creationSequence]));
  }

  async function currentState(): Promise<ClusterState> {
    const record = await memory.get(Keys.proximityClusters());
    return record?.value ?? emptyState(now().toISOString());
  }

  async function upsertEdge(a: string, b: string, similarity: number): Promise<ProximityEdge> {
    const id = edgeId(a, b);
    const [first, second] = a < b ? [a, b] : [b, a];
    const pruned = similarity < config.similarityThreshold;
    const result = await updateWithRetry(memory, Keys.proximityEdge(id), (current) => {
      if (current && current.value.similarity === similarity && current.value.pruned === pruned) {
        return null;
      }
      return { id, a: first, b: second, similarity, computedAt: now().toISOString(), pruned };
    });
    if (!result) {
      throw new Error(`Edge ${id} could not be written`);
    }
    return result.value;
  }

  return {
    async prepareInsertion(hypothesisId: string): Promise<InsertionPlan> {
      const hypothesis = await hypotheses.require(hypothesisId);
      const byId = await creationOrder();
      const state = await currentState();
      const indexed = new Set(state.clusters.flatMap((c) => c.memberIds));

      const ratings = new Map(
        (await scanValues(memory, Kinds.rating)).map((r) => [r.hypothesisId, r.rating]),
      );
      const eligible = (id: string): boolean => id !== hypothesisId && byId.has(id);

      const topRated = [...indexed]
        .filter(eligible)
        .flatMap((id) => {
          const h = byId.get(id);
          return h && h.status === 'active' ? [h] : [];
        })
        .sort(
          (x, y) =>
            (ratings.get(y.id) ?? 0) - (ratings.get(x.id) ?? 0) || compareByCreation(x, y),
        )
        .slice(0, config.topRatedCandidates)
        .map((h) => h.id);

      const chosen = new Set(topRated);
      for (const cluster of state.clusters) {
        if (chosen.size >= config.maxCandidates) {
          break;
        }
        if (eligible(cluster.representativeId)) {
          chosen.add(cluster.representativeId);
        }
      }

      const candidates = [...chosen]
        .slice(0, config.maxCandidates)
        .flatMap((id) => {
          const h = byId.get(id);
          return h ? [h] : [];
        })
        .sort(compareByCreation);

      log.debug(
        { hypothesisId, candidates: candidates.length, clusters: state.clusters.length },
        'Prepared proximity insertion',
      );
      return { hypothesis, candidates };
    },

    async applyScores(
      hypothesisId: string,
      scores: readonly SimilarityScore[],
    ): Promise<ApplyScoresResult> {
      if (await this.isIndexed(hypothesisId)) {
        return { alreadyIndexed: true, edges: [], superseded: [] };
      }

      const byId = await creationOrder();
      const self = byId.get(hypothesisId);
      if (!self) {
        throw new Error(`Cannot index unknown hypothesis ${hypothesisId}`);
      }

      const edges: ProximityEdge[] = [];
      for (const score of scores) {
        if (score.hypothesisId === hypothesisId || !byId.has(score.hypothesisId)) {
          continue;
        }
        const similarity = roundTo(clamp(score.similarity, 0, 1), SIMILARITY_DECIMALS);
        edges.push(await upsertEdge(hypothesisId, score.hypothesisId, similarity));
      }

      const neighbours = edges
        .filter((e) => !e.pruned)
        .map((e) => (e.a === hypothesisId ? e.b : e.a));
      const order = orderOf(byId);
      const updated = await updateWithRetry(memory, Keys.proximityClusters(), (current) => {
        const state = current?.value ?? emptyState(now().toISOString());
        return {
          generation: state.generation + 1,
          clusters: mergeInto(state.clusters, hypothesisId, neighbours, order),
          updatedAt: now().toISOString(),
        };
      });

      const superseded: string[] = [];
      if (config.dedupThreshold !== undefined) {
        for (const edge of edges) {
          if (edge.similarity < config.dedupThreshold) {
            continue;
          }
          const other = byId.get(edge.a === hypothesisId ? edge.b : edge.a);
          if (!other) {
            continue;
          }
          const [older, newer] = compareByCreation(self, other) < 0 ? [self, other] : [other, self];
          const after = await hypotheses.setStatus(
            newer.id,
            'superseded',
            `near-duplicate of ${older.id} (similarity ${String(edge.similarity)})`,
          );
          if (after.status === 'superseded' && !superseded.includes(newer.id)) {
            superseded.push(newer.id);
          }
        }
      }

      await createIfAbsent(memory, Keys.proximityIndex(hypothesisId), {
        hypothesisId,
        candidatesScored: edges.length,
        indexedAt: now().toISOString(),
      });

      const cluster = findCluster(updated?.value ?? null, hypothesisId);
      log.info(
        {
          hypothesisId,
          edges: edges.length,
          neighbours: neighbours.length,
          clusterId: cluster?.id,
          superseded,
        },
        'Hypothesis inserted into proximity graph',
      );
      return { alreadyIndexed: false, edges, clusterId: cluster?.id, superseded };
    },

    async recompute(threshold = config.similarityThreshold): Promise<ClusterState> {
      const edges = await scanValues(memory, Kinds.proximityEdge);
      const indexed = (await scanValues(memory, Kinds.proximityIndex)).map((e) => e.hypothesisId);
      const order = orderOf(await creationOrder());

      let pruned = 0;
      for (const edge of edges) {
        const shouldPrune = edge.similarity < threshold;
        if (edge.pruned !== shouldPrune) {
          await updateWithRetry(memory, Keys.proximityEdge(edge.id), (current) =>
            current ? { ...current.value, pruned: shouldPrune } : null,
          );
          if (shouldPrune) {
            pruned++;
          }
        }
      }

      const links = edges.filter((e) => e.similarity >= threshold);
      const updated = await updateWithRetry(memory, Keys.proximityClusters(), (current) => {
        const state = current?.value ?? emptyState(now().toISOString());
        const members = new Set([...indexed, ...state.clusters.flatMap((c) => c.memberIds)]);
        return {
          generation: state.generation + 1,
          clusters: buildClusters(members, links, order),
          updatedAt: now().toISOString(),
        };
      });
      if (!updated) {
        throw new Error('Cluster state could not be written');
      }

      log.info(
        { threshold, edges: edges.length, pruned, clusters: updated.value.clusters.length },
        'Proximity graph recomputed',
      );
      return updated.value;
    },

    async clusterOf(hypothesisId: string): Promise<readonly string[]> {
      const cluster = findCluster(await currentState(), hypothesisId);
      return cluster ? cluster.memberIds : [hypothesisId];
    },

    async nearDuplicatesOf(
      hypothesisId: string,
      threshold: number,
    ): Promise<readonly SimilarityScore[]> {
      const edges = await scanValues(memory, Kinds.proximityEdge);
      return edges
        .filter((e) => (e.a === hypothesisId || e.b === hypothesisId) && e.similarity >= threshold)
        .map((e) => ({ hypothesisId: e.a === hypothesisId ? e.b : e.a, similarity: e.similarity }))
        .sort(
          (x, y) =>
            y.similarity - x.similarity ||
            (x.hypothesisId < y.hypothesisId ? -1 : x.hypothesisId > y.hypothesisId ? 1 : 0),
        );
    },

    clusters(): Promise<ClusterState> {
      return currentState();
    },

    async isIndexed(hypothesisId: string): Promise<boolean> {
      return (await memory.get(Keys.proximityIndex(hypothesisId))) !== null;
    },
  };
}
