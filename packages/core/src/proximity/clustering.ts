import type { Cluster, ClusterState } from '@agora/shared/src/types/proximity.types.js';

export function edgeId(a: string, b: string): string {
  return a < b ? `${a}__${b}` : `${b}__${a}`;
}

export function clusterIdFor(representativeId: string): string {
  return `cluster-${representativeId}`;
}

export interface LinkedPair {
  readonly a: string;
  readonly b: string;
}

/** Creation order lookup; unknown ids sort last, then by id. */
export type CreationOrder = ReadonlyMap<string, number>;

function byCreation(order: CreationOrder): (x: string, y: string) => number {
  return (x, y) => {
    const cx = order.get(x) ?? Number.MAX_SAFE_INTEGER;
    const cy = order.get(y) ?? Number.MAX_SAFE_INTEGER;
    if (cx !== cy) {
      return cx - cy;
    }
    return x < y ? -1 : x > y ? 1 : 0;
  };
}

/**
 * Connected components over `links`. Each cluster is represented by its
 * earliest-created member; members and clusters are listed in creation order.
 */
export function buildClusters(
  nodeIds: Iterable<string>,
  links: readonly LinkedPair[],
  order: CreationOrder,
): Cluster[] {
  const parent = new Map<string, string>();
  const find = (id: string): string => {
    let root = id;
    for (let up = parent.get(root); up !== undefined && up !== root; up = parent.get(root)) {
      root = up;
    }
    parent.set(id, root);
    return root;
  };

  for (const id of nodeIds) {
    parent.set(id, id);
  }
  for (const link of links) {
    if (!parent.has(link.a)) {
      parent.set(link.a, link.a);
    }
    if (!parent.has(link.b)) {
      parent.set(link.b, link.b);
    }
    const ra = find(link.a);
    const rb = find(link.b);
    if (ra !== rb) {
      parent.set(rb, ra);
    }
  }

  const groups = new Map<string, string[]>();
  for (const id of parent.keys()) {
    const root = find(id);
    const members = groups.get(root) ?? [];
    members.push(id);
    groups.set(root, members);
  }

  const compare = byCreation(order);
  const clusters = [...groups.values()].map((members) => {
    const sorted = [...members].sort(compare);
    return { id: clusterIdFor(sorted[0]), representativeId: sorted[0], memberIds: sorted };
  });
  return clusters.sort((x, y) => compare(x.representativeId, y.representativeId));
}

/**
 * Adds `hypothesisId` to the state and merges every cluster that holds one of
 * its neighbours into a single cluster with it.
 */
export function mergeInto(
  clusters: readonly Cluster[],
  hypothesisId: string,
  neighbourIds: readonly string[],
  order: CreationOrder,
): Cluster[] {
  const nodes = clusters.flatMap((c) => c.memberIds);
  const links: LinkedPair[] = clusters.flatMap((c) =>
    c.memberIds.slice(1).map((m) => ({ a: c.representativeId, b: m })),
  );
  for (const neighbourId of neighbourIds) {
    links.push({ a: hypothesisId, b: neighbourId });
  }
  return buildClusters([...nodes, hypothesisId], links, order);
}

export function findCluster(state: ClusterState | null, hypothesisId: string): Cluster | undefined {
  return state?.clusters.find((c) => c.memberIds.includes(hypothesisId));
}
