/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the schema definitions shared by the matcher.
 */

// ============================================================================
// Recommendations
// ============================================================================

export {
  VideoTitleSchema,
  RecommendationSchema,
  RecommendationListSchema,
  RecommendationDocumentSchema,
  type VideoTitle,
  type Recommendation,
  type RecommendationDocument,
} from './recommendation.js';
