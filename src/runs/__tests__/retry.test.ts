import { describe, expect, it } from 'vitest';
import { backoffDelay } from '../retry.js';

const policy = { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30000 };

describe('backoffDelay', () => {
  it('doubles the base delay per failed attempt', () => {
    expect(backoffDelay(1, policy)).toBe(500);
    expect(backoffDelay(2, policy)).toBe(1000);
    expect(backoffDelay(3, policy)).toBe(2000);
  });

  it('caps at the maximum delay', () => {
    expect(backoffDelay(7, policy)).toBe(30000);
    expect(backoffDelay(40, policy)).toBe(30000);
  });

  it('treats attempts below one as the first', () => {
    expect(backoffDelay(0, policy)).toBe(500);
    expect(backoffDelay(-3, policy)).toBe(500);
  });
});
