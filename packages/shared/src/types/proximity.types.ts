export interface ProximityEdge {
  readonly id: string;
  readonly a: string;
  readonly b: string;
  readonly similarity: number;
  readonly computedAt: string;
  readonly pruned: boolean;
}

export interface Cluster {
  readonly id: string;
  readonly representativeId: string;
  readonly memberIds: readonly string[];
}

export interface ClusterState {
  readonly generation: number;
  readonly clusters: readonly Cluster[];
  readonly updatedAt: string;
}

export interface ProximityIndexEntry {
  readonly hypothesisId: string;
  readonly candidatesScored: number;
  readonly indexedAt: string;
}

export interface SimilarityScore {
  readonly hypothesisId: string;
  readonly similarity: number;
}
