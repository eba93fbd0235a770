import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { firstIssueMessage } from '../command-execution.js';

describe('firstIssueMessage', () => {
  it('should return the first zod issue message', () => {
    const result = z.object({ a: z.string({ required_error: 'a is missing' }), b: z.string() }).safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(firstIssueMessage(result.error)).toBe('a is missing');
    }
  });

  it('should fall back when there are no issues', () => {
    expect(firstIssueMessage({ issues: [] })).toBe('Invalid arguments');
    expect(firstIssueMessage({ issues: [] }, 'Bad input')).toBe('Bad input');
  });
});
