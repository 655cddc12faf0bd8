/**
 * PostgreSQL test fixture — mock pool for store unit tests.
 *
 * Records every query and answers with the first registered response whose
 * pattern is a substring of the SQL text (empty result otherwise).
 */
import { vi } from 'vitest';
import type { DbPool } from '../../src/db/client.js';

export interface MockQueryResult {
  rows: unknown[];
  rowCount: number;
}

export type MockPool = DbPool & {
  _queries: Array<{ text: string; values?: unknown[] }>;
  _setResponse: (pattern: string, response: MockQueryResult) => void;
  _setError: (pattern: string, error: Error) => void;
};

export function createMockPool(): MockPool {
  const queries: Array<{ text: string; values?: unknown[] }> = [];
  const responses = new Map<string, MockQueryResult>();
  const errors = new Map<string, Error>();

  const pool = {
    query: vi.fn(async (text: string, values?: unknown[]) => {
      queries.push({ text, values });
      for (const [pattern, error] of errors) {
        if (text.includes(pattern)) throw error;
      }
      for (const [pattern, response] of responses) {
        if (text.includes(pattern)) return response;
      }
      return { rows: [], rowCount: 0 };
    }),
    end: vi.fn(async () => {}),
    on: vi.fn(),
    _queries: queries,
    _setResponse: (pattern: string, response: MockQueryResult) => {
      responses.set(pattern, response);
    },
    _setError: (pattern: string, error: Error) => {
      errors.set(pattern, error);
    },
  } as unknown as MockPool;

  return pool;
}
