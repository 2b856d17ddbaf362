export interface GoalConstraints {
  readonly evaluationCriteria: readonly string[];
  readonly preferences: readonly string[];
  readonly domain?: string;
}

export interface ResearchGoal {
  readonly id: string;
  readonly version: number;
  readonly text: string;
  readonly constraints: GoalConstraints;
  readonly supersedesId?: string;
  readonly createdAt: string;
}

export interface GoalPointer {
  readonly currentGoalId: string;
  readonly version: number;
}
