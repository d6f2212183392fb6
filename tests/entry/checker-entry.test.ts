import { describe, it, expect } from 'vitest';

describe('condition checker module', () => {
  it('loads on its own, without the package entry point', async () => {
    const { ConditionChecker } = await import('../../src/application/services/condition-checker.js');

    expect(typeof ConditionChecker).toBe('function');
  });
});
