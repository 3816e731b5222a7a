/**
 * Unit Tests for the Recommendation Schemas
 *
 * Tests each schema with valid and invalid data.
 */

import { describe, it, expect } from '@jest/globals';

import {
  VideoTitleSchema,
  RecommendationSchema,
  RecommendationListSchema,
  RecommendationDocumentSchema,
} from './index.js';

describe('VideoTitleSchema', () => {
  it('should accept a positioned title', () => {
    expect(VideoTitleSchema.parse({ position: 1, title: 'Intro to BST' })).toEqual({
      position: 1,
      title: 'Intro to BST',
    });
  });

  it('should reject zero and fractional positions', () => {
    expect(VideoTitleSchema.safeParse({ position: 0, title: 'x' }).success).toBe(false);
    expect(VideoTitleSchema.safeParse({ position: 1.5, title: 'x' }).success).toBe(false);
  });
});

describe('RecommendationSchema', () => {
  it('should accept a topic with an empty video list', () => {
    expect(RecommendationSchema.safeParse({ topic: 'Recursion', videos: [] }).success).toBe(true);
  });

  it('should require both fields', () => {
    expect(RecommendationSchema.safeParse({ topic: 'Recursion' }).success).toBe(false);
    expect(RecommendationSchema.safeParse({ videos: ['a'] }).success).toBe(false);
  });

  it('should reject non-string videos', () => {
    expect(RecommendationSchema.safeParse({ topic: 'Recursion', videos: [3] }).success).toBe(false);
  });

  it('should strip unknown keys', () => {
    expect(
      RecommendationSchema.parse({ topic: 'Recursion', videos: [], score: 'high' })
    ).toEqual({ topic: 'Recursion', videos: [] });
  });
});

describe('RecommendationListSchema', () => {
  it('should reject a bare object', () => {
    expect(RecommendationListSchema.safeParse({ topic: 'Recursion', videos: [] }).success).toBe(false);
  });

  it('should keep order', () => {
    const list = [
      { topic: 'Graph Algorithms', videos: [] },
      { topic: 'Binary Trees', videos: ['Intro to BST'] },
    ];
    expect(RecommendationListSchema.parse(list)).toEqual(list);
  });
});

describe('RecommendationDocumentSchema', () => {
  const valid = {
    request_id: 'test-request-1',
    user: 'alice',
    playlist_url: 'https://www.youtube.com/playlist?list=PLtestPlaylist01',
    syllabus: '1. Binary Trees',
    video_titles: ['Intro to BST'],
    recommendations: [{ topic: 'Binary Trees', videos: ['Intro to BST'] }],
    created_at: '2026-01-15T10:30:00.000Z',
  };

  it('should accept a complete document', () => {
    expect(RecommendationDocumentSchema.safeParse(valid).success).toBe(true);
  });

  it('should require a request id', () => {
    expect(RecommendationDocumentSchema.safeParse({ ...valid, request_id: '' }).success).toBe(false);
  });

  it('should reject an empty syllabus', () => {
    expect(RecommendationDocumentSchema.safeParse({ ...valid, syllabus: '' }).success).toBe(false);
  });

  it('should reject a non-ISO timestamp', () => {
    expect(
      RecommendationDocumentSchema.safeParse({ ...valid, created_at: 'yesterday' }).success
    ).toBe(false);
  });
});
