/**
 * Agent Request Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  runAgentRequestSchema,
  followUpListQuerySchema,
  followUpIdParamSchema,
  validateSafe,
} from '../agent.schemas';

describe('runAgentRequestSchema', () => {
  it('accepts a prompt without thread id', () => {
    const result = runAgentRequestSchema.safeParse({ prompt: 'List my tasks' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.threadId).toBeUndefined();
    }
  });

  it('trims the prompt', () => {
    const result = runAgentRequestSchema.safeParse({ prompt: '  hello  ', threadId: '3:abc' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.prompt).toBe('hello');
      expect(result.data.threadId).toBe('3:abc');
    }
  });

  it('rejects a whitespace-only prompt', () => {
    expect(runAgentRequestSchema.safeParse({ prompt: '   ' }).success).toBe(false);
  });

  it('rejects prompts longer than 10000 chars', () => {
    expect(runAgentRequestSchema.safeParse({ prompt: 'a'.repeat(10001) }).success).toBe(false);
  });

  it('rejects an empty thread id', () => {
    expect(runAgentRequestSchema.safeParse({ prompt: 'hi', threadId: '' }).success).toBe(false);
  });
});

describe('followUpListQuerySchema', () => {
  it('accepts known statuses', () => {
    expect(followUpListQuerySchema.safeParse({ status: 'pending' }).success).toBe(true);
    expect(followUpListQuerySchema.safeParse({}).success).toBe(true);
  });

  it('rejects unknown statuses', () => {
    expect(followUpListQuerySchema.safeParse({ status: 'archived' }).success).toBe(false);
  });
});

describe('followUpIdParamSchema', () => {
  it('coerces numeric strings', () => {
    const result = followUpIdParamSchema.safeParse({ id: '42' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.id).toBe(42);
    }
  });

  it('rejects non-positive ids', () => {
    expect(followUpIdParamSchema.safeParse({ id: '0' }).success).toBe(false);
    expect(followUpIdParamSchema.safeParse({ id: 'abc' }).success).toBe(false);
  });
});

describe('validateSafe', () => {
  it('returns data on success', () => {
    const result = validateSafe(runAgentRequestSchema, { prompt: 'ok' });
    expect(result).toEqual({ success: true, data: { prompt: 'ok' } });
  });

  it('returns the zod error on failure', () => {
    const result = validateSafe(runAgentRequestSchema, { prompt: 42 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0].path).toEqual(['prompt']);
    }
  });
});
