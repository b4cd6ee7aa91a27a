import type { AgentName, AgentResult, ConfidenceContribution } from '@listsmith/core';

export type AgentWeights = Readonly<Partial<Record<AgentName, number>>>;

export const DEFAULT_AGENT_WEIGHT = 1;

export const roundConfidence = (value: number): number => Math.round(value * 1000) / 1000;

export const buildConfidenceBreakdown = (
  results: readonly AgentResult[],
  weights: AgentWeights = {}
): ConfidenceContribution[] => {
  return results.map((result) => ({
    agent: result.agent,
    confidence: result.confidence,
    weight: weights[result.agent] ?? DEFAULT_AGENT_WEIGHT
  }));
};

/** Weighted mean of the contributions, rounded to three decimals. */
export const scoreConfidence = (breakdown: readonly ConfidenceContribution[]): number => {
  const totalWeight = breakdown.reduce((sum, contribution) => sum + contribution.weight, 0);
  if (totalWeight <= 0) {
    return 0;
  }
  const weighted = breakdown.reduce((sum, contribution) => sum + contribution.confidence * contribution.weight, 0);
  return roundConfidence(weighted / totalWeight);
};

export const assertValidWeights = (weights: AgentWeights): void => {
  for (const [agent, weight] of Object.entries(weights)) {
    if (weight !== undefined && (!Number.isFinite(weight) || weight <= 0)) {
      throw new RangeError(`Weight for agent ${agent} must be a positive number, received ${weight}.`);
    }
  }
};
