import { describe, it, expect } from 'vitest';

describe('package entry point', () => {
  it('loads without a reflect polyfill installed by the caller', async () => {
    const entry = await import('../../src/index.js');

    expect(typeof entry.ConditionChecker).toBe('function');
    expect(typeof entry.initializeContainer).toBe('function');
  });

  it('builds a working checker from the container', async () => {
    const { getConditionChecker, ConditionProvider, LambdaCondition, resetContainer } = await import(
      '../../src/index.js'
    );
    const Flags = { Ready: 'Ready' } as const;

    try {
      const checker = await getConditionChecker();
      const provider = new ConditionProvider(Flags);
      provider.register(Flags.Ready, LambdaCondition.of('ready', () => false, 'Not ready yet'));
      checker.registerProvider(Flags, provider);

      expect(await checker.checkWithError(Flags, Flags.Ready)).toEqual({ available: true, message: 'Not ready yet' });
    } finally {
      resetContainer();
    }
  });
});
