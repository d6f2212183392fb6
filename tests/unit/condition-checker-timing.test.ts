import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConditionChecker } from '../../src/application/services/condition-checker.js';
import { ConditionProvider } from '../../src/application/services/condition-provider.js';
import { LambdaCondition } from '../../src/domain/condition.js';
import type { ICondition } from '../../src/domain/condition.js';
import { DEFAULT_CHECKER_CONFIG } from '../../src/config/app-config.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { ctx, TestKinds } from '../helpers/kinds.js';

describe('ConditionChecker timing', () => {
  let loggers: FakeLoggerFactory;
  let checker: ConditionChecker;
  let start: number;

  beforeEach(() => {
    vi.useFakeTimers();
    start = Date.now();
    loggers = new FakeLoggerFactory();
    checker = new ConditionChecker(loggers, { ...DEFAULT_CHECKER_CONFIG, timeoutMs: 50 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function register(condition: ICondition): void {
    const provider = new ConditionProvider(TestKinds);
    provider.register(TestKinds.A, condition);
    checker.registerProvider(TestKinds, provider);
  }

  describe('evaluateConditionWithRetry', () => {
    it('waits between attempts and stops at the first success', async () => {
      const attempts: number[] = [];
      register(
        LambdaCondition.of('flaky', () => {
          attempts.push(Date.now() - start);
          return attempts.length === 3;
        })
      );

      const pending = checker.evaluateConditionWithRetry(TestKinds, TestKinds.A, ctx('1'), 3, 1000);
      await vi.advanceTimersByTimeAsync(2000);

      expect(await pending).toBe(true);
      expect(attempts).toEqual([0, 1000, 2000]);
    });

    it('makes exactly maxRetries attempts with one wait fewer', async () => {
      const attempts: number[] = [];
      register(
        LambdaCondition.of('broken', () => {
          attempts.push(Date.now() - start);
          return false;
        })
      );

      const pending = checker.evaluateConditionWithRetry(TestKinds, TestKinds.A, ctx('1'), 3, 1000);
      await vi.advanceTimersByTimeAsync(2000);

      expect(await pending).toBe(false);
      expect(attempts).toEqual([0, 1000, 2000]);
      expect(vi.getTimerCount()).toBe(0);
      expect(loggers.fake('ConditionChecker').getEntries('debug').filter((e) => e.msg === 'Condition failed, retrying')).toHaveLength(2);
    });

    it('does not wait when the first attempt succeeds', async () => {
      register(LambdaCondition.of('ok', () => true));

      expect(await checker.evaluateConditionWithRetry(TestKinds, TestKinds.A, ctx('1'), 3, 1000)).toBe(true);
      expect(Date.now() - start).toBe(0);
    });
  });

  describe('checkConditionWithTimeout', () => {
    it('resolves false once the timeout elapses', async () => {
      register(LambdaCondition.of('hangs', () => new Promise<boolean>(() => {})));

      const pending = checker
        .checkConditionWithTimeout(TestKinds, TestKinds.A, ctx('1'), 10)
        .then((passed) => ({ passed, at: Date.now() - start }));
      await vi.advanceTimersByTimeAsync(10);

      expect(await pending).toEqual({ passed: false, at: 10 });
      expect(loggers.fake('ConditionChecker').hasEntry('debug', 'Condition check timed out')).toBe(true);
    });

    it('falls back to the configured timeout', async () => {
      register(LambdaCondition.of('hangs', () => new Promise<boolean>(() => {})));

      const pending = checker
        .checkConditionWithTimeout(TestKinds, TestKinds.A, ctx('1'))
        .then((passed) => ({ passed, at: Date.now() - start }));
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toEqual({ passed: false, at: 50 });
    });

    it('returns the verdict of a fast condition and clears its timer', async () => {
      register(LambdaCondition.of('fast', () => true));

      expect(await checker.checkConditionWithTimeout(TestKinds, TestKinds.A, ctx('1'), 1000)).toBe(true);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('lets an abandoned evaluation run to completion in the background', async () => {
      let finished = false;
      register(
        LambdaCondition.of(
          'slow',
          () =>
            new Promise<boolean>((resolve) =>
              setTimeout(() => {
                finished = true;
                resolve(true);
              }, 100)
            )
        )
      );

      const pending = checker.checkConditionWithTimeout(TestKinds, TestKinds.A, ctx('1'), 10);
      await vi.advanceTimersByTimeAsync(10);
      expect(await pending).toBe(false);
      expect(finished).toBe(false);

      await vi.advanceTimersByTimeAsync(90);
      expect(finished).toBe(true);
    });
  });
});
