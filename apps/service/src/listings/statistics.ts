import type { ListingRecord, ListingStatus, ProductCategory } from '@listsmith/core';

import { roundConfidence } from '../orchestrator/confidence.js';

export const CONFIDENCE_BUCKETS = ['0.0-0.2', '0.2-0.4', '0.4-0.6', '0.6-0.8', '0.8-1.0'] as const;

export type ConfidenceBucket = (typeof CONFIDENCE_BUCKETS)[number];

export interface ListingStatistics {
  readonly total: number;
  readonly byStatus: Record<ListingStatus, number>;
  /** Non-archived listings only, as are the confidence figures. */
  readonly byCategory: Partial<Record<ProductCategory, number>>;
  readonly averageConfidence: number;
  readonly confidenceDistribution: Record<ConfidenceBucket, number>;
}

const bucketOf = (confidence: number): ConfidenceBucket => {
  const index = Math.min(CONFIDENCE_BUCKETS.length - 1, Math.max(0, Math.floor(confidence * 5)));
  return CONFIDENCE_BUCKETS[index] ?? '0.0-0.2';
};

export const summarizeListings = (records: readonly ListingRecord[]): ListingStatistics => {
  const byStatus: Record<ListingStatus, number> = { draft: 0, published: 0, archived: 0 };
  const byCategory: Partial<Record<ProductCategory, number>> = {};
  const confidenceDistribution: Record<ConfidenceBucket, number> = {
    '0.0-0.2': 0,
    '0.2-0.4': 0,
    '0.4-0.6': 0,
    '0.6-0.8': 0,
    '0.8-1.0': 0
  };
  let confidenceSum = 0;
  let active = 0;

  for (const record of records) {
    byStatus[record.status] += 1;
    if (record.status === 'archived') {
      continue;
    }
    active += 1;
    byCategory[record.input.category] = (byCategory[record.input.category] ?? 0) + 1;
    confidenceDistribution[bucketOf(record.confidence)] += 1;
    confidenceSum += record.confidence;
  }

  return {
    total: records.length,
    byStatus,
    byCategory,
    averageConfidence: active === 0 ? 0 : roundConfidence(confidenceSum / active),
    confidenceDistribution
  };
};
