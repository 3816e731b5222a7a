/**
 * HTTP response mapping tests
 */

import { describe, it, expect } from '@jest/globals';
import { readAnalyzeBody, toHttpResponse } from './responses.js';
import { AnalysisError, type AnalysisErrorKind } from '../orchestrator/errors.js';
import type { AnalysisStage } from '../orchestrator/types.js';

function failure(kind: AnalysisErrorKind, stage: AnalysisStage, detail: string, rawOutput?: string) {
  return { ok: false as const, error: new AnalysisError(kind, stage, detail, { rawOutput }) };
}

describe('toHttpResponse', () => {
  it('should return the recommendations on success', () => {
    const recommendations = [{ topic: 'Binary Trees', videos: ['Intro to BST'] }];
    expect(
      toHttpResponse({ ok: true, result: { videoTitles: [], recommendations, persisted: false } })
    ).toEqual({ status: 200, body: { recommendations } });
  });

  it('should map client errors without details', () => {
    expect(toHttpResponse(failure('InputValidationError', 'input_validated', 'Missing required field(s): syllabus'))).toEqual({
      status: 400,
      body: { error: 'playlist_url and syllabus are required.' },
    });
    expect(toHttpResponse(failure('AuthenticationRequired', 'authenticated', 'x'))).toEqual({
      status: 401,
      body: { error: 'Authentication credentials were not provided.' },
    });
    expect(toHttpResponse(failure('RateLimitExceeded', 'rate_limit_checked', 'x'))).toEqual({
      status: 429,
      body: { error: 'Rate limit exceeded. Please try again later.' },
    });
  });

  it('should map collaborator failures to 500 with details', () => {
    expect(toHttpResponse(failure('PlaylistFetchError', 'playlist_fetched', 'Playlist not found or private: PL1'))).toEqual({
      status: 500,
      body: { error: 'Error extracting playlist.', details: 'Playlist not found or private: PL1' },
    });
    expect(toHttpResponse(failure('ModelInvocationError', 'model_responded', 'quota'))).toEqual({
      status: 500,
      body: { error: 'Model invocation failed.', details: 'quota' },
    });
    expect(toHttpResponse(failure('StorageError', 'persisted', 'disk full'))).toEqual({
      status: 500,
      body: { error: 'Saving recommendations failed.', details: 'disk full' },
    });
  });

  it('should attach the raw output only to parse failures', () => {
    expect(
      toHttpResponse(failure('ModelOutputParseError', 'response_parsed', 'Response is empty', '   '))
    ).toEqual({
      status: 500,
      body: { error: 'Model returned invalid output.', details: 'Response is empty', raw_output: '   ' },
    });
    expect(toHttpResponse(failure('StorageError', 'persisted', 'disk full', 'ignored')).body).not.toHaveProperty(
      'raw_output'
    );
  });

  it('should map cancellation to 499', () => {
    expect(toHttpResponse(failure('AnalysisCancelled', 'model_responded', 'Model call aborted'))).toEqual({
      status: 499,
      body: { error: 'Request cancelled.', details: 'Model call aborted' },
    });
  });
});

describe('readAnalyzeBody', () => {
  it('should read both fields', () => {
    expect(readAnalyzeBody({ playlist_url: 'PLtestPlaylist01', syllabus: '1. Binary Trees' })).toEqual({
      playlistUrl: 'PLtestPlaylist01',
      syllabusText: '1. Binary Trees',
    });
  });

  it('should treat mistyped fields as missing', () => {
    expect(readAnalyzeBody({ playlist_url: 42, syllabus: ['x'] })).toEqual({
      playlistUrl: undefined,
      syllabusText: undefined,
    });
  });

  it('should treat non-object bodies as empty', () => {
    expect(readAnalyzeBody(undefined)).toEqual({});
    expect(readAnalyzeBody(null)).toEqual({});
    expect(readAnalyzeBody('playlist_url=x')).toEqual({});
    expect(readAnalyzeBody([{ playlist_url: 'x' }])).toEqual({});
  });
});
