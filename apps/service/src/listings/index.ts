export * from './service.js';
export * from './setup.js';
export { summarizeListings, CONFIDENCE_BUCKETS, type ConfidenceBucket, type ListingStatistics } from './statistics.js';
export {
  RecommendationRequestSchema,
  applyRecommendationRules,
  type RecommendationChanges,
  type RecommendationOrigin,
  type RecommendationRequest
} from './recommendations.js';
