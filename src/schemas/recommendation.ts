/**
 * Recommendation Schemas
 *
 * Zod schemas for the data exchanged between the matching pipeline stages
 * and persisted by the recommendation store.
 *
 * @module schemas/recommendation
 */

import { z } from 'zod';

// ============================================
// Video Title
// ============================================

/**
 * A playlist entry title with its 1-based playlist position.
 */
export const VideoTitleSchema = z.object({
  position: z.number().int().positive(),
  title: z.string(),
});

export type VideoTitle = z.infer<typeof VideoTitleSchema>;

// ============================================
// Recommendation
// ============================================

/**
 * One syllabus topic and the videos the model matched to it.
 * Both fields are required; nothing is defaulted.
 */
export const RecommendationSchema = z.object({
  topic: z.string(),
  videos: z.array(z.string()),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

/**
 * The model's answer: an ordered array of recommendations.
 */
export const RecommendationListSchema = z.array(RecommendationSchema);

// ============================================
// Persisted Document
// ============================================

/**
 * Shape written to the recommendation store for every completed analysis.
 * Field names follow the stored document format.
 */
export const RecommendationDocumentSchema = z.object({
  /** Generated once per analysis; repeated writes of one analysis share it */
  request_id: z.string().min(1),
  user: z.string().min(1),
  playlist_url: z.string().min(1),
  syllabus: z.string().min(1),
  video_titles: z.array(z.string()),
  recommendations: RecommendationListSchema,
  created_at: z.string().datetime(),
});

export type RecommendationDocument = z.infer<typeof RecommendationDocumentSchema>;
