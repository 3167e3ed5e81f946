/**
 * Unit tests for model response parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  extractJsonFromResponse,
  parseJsonResponse,
  parseSentimentResponse,
  parseCodeAnalysisResponse,
} from '../../src/llm/prompts';

describe('extractJsonFromResponse', () => {
  it('returns a bare object unchanged', () => {
    expect(extractJsonFromResponse('{"polarity": 0}')).toBe('{"polarity": 0}');
  });

  it('unwraps a json code fence', () => {
    const response = 'Here it is:\n```json\n{"polarity": -0.2}\n```';
    expect(extractJsonFromResponse(response)).toBe('{"polarity": -0.2}');
  });

  it('finds an object inside surrounding text', () => {
    expect(extractJsonFromResponse('Sure. {"a": {"b": 1}} Hope that helps.')).toBe('{"a": {"b": 1}}');
  });
});

describe('parseJsonResponse', () => {
  it('parses the extracted object', () => {
    expect(parseJsonResponse('```\n{"ok": true}\n```')).toEqual({ ok: true });
  });

  it('throws when there is no JSON', () => {
    expect(() => parseJsonResponse('no idea')).toThrow('Response is not valid JSON: no idea');
  });
});

describe('parseSentimentResponse', () => {
  it('returns the signal', () => {
    expect(parseSentimentResponse('{"polarity": -0.4, "magnitude": 0.5}')).toEqual({
      polarity: -0.4,
      magnitude: 0.5,
    });
  });

  it('rejects a polarity outside [-1, 1]', () => {
    expect(() => parseSentimentResponse('{"polarity": 2, "magnitude": 0.5}')).toThrow(
      'Invalid sentiment response: Number must be less than or equal to 1'
    );
  });

  it('rejects a missing magnitude', () => {
    expect(() => parseSentimentResponse('{"polarity": 0.1}')).toThrow('Invalid sentiment response');
  });
});

describe('parseCodeAnalysisResponse', () => {
  it('splits each finding into the error and its correction', () => {
    const response = JSON.stringify({
      summary: ' The loop never ends. ',
      findings: [
        {
          errorType: 'logic',
          lineNumber: 6,
          description: 'Loop counter is never incremented',
          severity: 5,
          correction: 'Add i += 1 to the loop body',
        },
        {
          errorType: 'syntax',
          lineNumber: null,
          description: 'Mixed tabs and spaces',
          severity: 1,
          correction: 'Indent with spaces only',
        },
      ],
    });

    expect(parseCodeAnalysisResponse(response)).toEqual({
      summary: 'The loop never ends.',
      findings: [
        {
          error: {
            errorType: 'logic',
            lineNumber: 6,
            description: 'Loop counter is never incremented',
            severity: 5,
          },
          correction: 'Add i += 1 to the loop body',
        },
        {
          error: {
            errorType: 'syntax',
            lineNumber: null,
            description: 'Mixed tabs and spaces',
            severity: 1,
          },
          correction: 'Indent with spaces only',
        },
      ],
    });
  });

  it('accepts an analysis with no findings', () => {
    expect(parseCodeAnalysisResponse('{"summary": "All good.", "findings": []}')).toEqual({
      summary: 'All good.',
      findings: [],
    });
  });

  it('names the path of the first invalid field', () => {
    const response = JSON.stringify({
      summary: 'One problem.',
      findings: [
        { errorType: 'style', lineNumber: 1, description: 'x', severity: 2, correction: 'y' },
      ],
    });

    expect(() => parseCodeAnalysisResponse(response)).toThrow(
      'Invalid code analysis response at findings.0.errorType'
    );
  });

  it('rejects a severity outside 1-5', () => {
    const response = JSON.stringify({
      summary: 'One problem.',
      findings: [
        { errorType: 'logic', lineNumber: 1, description: 'x', severity: 9, correction: 'y' },
      ],
    });

    expect(() => parseCodeAnalysisResponse(response)).toThrow(
      'Invalid code analysis response at findings.0.severity'
    );
  });
});
