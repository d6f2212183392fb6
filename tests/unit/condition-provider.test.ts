import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConditionProvider } from '../../src/application/services/condition-provider.js';
import { LambdaCondition } from '../../src/domain/condition.js';
import { ConditionResult } from '../../src/domain/condition-result.js';
import { collect, ctx, NumericKinds, OtherKinds, TestKinds } from '../helpers/kinds.js';

describe('ConditionProvider', () => {
  let provider: ConditionProvider<typeof TestKinds>;

  beforeEach(() => {
    provider = new ConditionProvider(TestKinds);
  });

  describe('registry', () => {
    it('keeps conditions per kind in registration order', () => {
      const first = LambdaCondition.of('first', () => true);
      const second = LambdaCondition.of('second', () => true);
      provider.register(TestKinds.A, first);
      provider.register(TestKinds.A, second);

      expect(provider.get(TestKinds.A)).toBe(first);
      expect(provider.getAll(TestKinds.A)).toEqual([first, second]);
    });

    it('treats an unregistered kind as empty', () => {
      expect(provider.get(TestKinds.B)).toBeUndefined();
      expect(provider.getAll(TestKinds.B)).toEqual([]);
    });

    it('lists kinds in the order they were first registered', () => {
      provider.register(TestKinds.C, LambdaCondition.of('c', () => true));
      provider.register(TestKinds.A, LambdaCondition.of('a', () => true));

      expect(provider.getKinds()).toEqual([TestKinds.C, TestKinds.A]);
    });

    it('finds every kind a condition is registered under', () => {
      const shared = LambdaCondition.of('shared', () => true);
      provider.register(TestKinds.A, shared);
      provider.register(TestKinds.B, LambdaCondition.of('other', () => true));
      provider.register(TestKinds.C, shared);

      expect(provider.getConditionKinds(shared)).toEqual([TestKinds.A, TestKinds.C]);
    });

    it('filters conditions within a kind and across kinds', () => {
      provider.register(TestKinds.A, LambdaCondition.of('keep', () => true));
      provider.register(TestKinds.A, LambdaCondition.of('drop', () => true));
      provider.register(TestKinds.B, LambdaCondition.of('keep', () => true));

      const byName = (condition: { name: string }) => condition.name === 'keep';
      expect(provider.getConditions(TestKinds.A, byName)).toHaveLength(1);
      expect(provider.getConditions(TestKinds.A)).toHaveLength(2);
      expect(provider.where(byName)).toHaveLength(2);
    });

    it('returns snapshots that do not track later registrations', () => {
      provider.register(TestKinds.A, LambdaCondition.of('a', () => true));
      const snapshot = provider.getAllConditions();
      provider.register(TestKinds.A, LambdaCondition.of('a2', () => true));

      expect(snapshot.get(TestKinds.A)).toHaveLength(1);
      expect(provider.getAll(TestKinds.A)).toHaveLength(2);
    });

    it('serves only its own enumeration object', () => {
      expect(provider.servesKinds(TestKinds)).toBe(true);
      expect(provider.servesKinds(OtherKinds)).toBe(false);
    });
  });

  describe('check', () => {
    it('returns the first passing result and stops there', async () => {
      const later = vi.fn(() => true);
      provider.register(TestKinds.A, LambdaCondition.of('one', () => false));
      provider.register(TestKinds.A, LambdaCondition.of('two', () => false));
      provider.register(TestKinds.A, LambdaCondition.of('three', () => ConditionResult.toSuccess('third')));
      provider.register(TestKinds.A, LambdaCondition.of('four', later));

      const result = await provider.check(TestKinds.A, ctx('1'));

      expect(result.passed).toBe(true);
      expect(result.result).toBe('third');
      expect(later).not.toHaveBeenCalled();
    });

    it('fails a kind with no conditions', async () => {
      const result = await provider.check(TestKinds.A);

      expect(result.success).toBe(false);
      expect(result.message).toBe('No A conditions passed');
    });

    it('fails when every condition fails', async () => {
      provider.register(TestKinds.B, LambdaCondition.of('one', () => false, 'first reason'));

      expect((await provider.check(TestKinds.B)).message).toBe('No B conditions passed');
    });

    it('names numeric kinds by their declared name', async () => {
      const numeric = new ConditionProvider(NumericKinds);

      expect((await numeric.check(NumericKinds.Second)).message).toBe('No Second conditions passed');
    });
  });

  describe('anyPass', () => {
    beforeEach(() => {
      provider.register(TestKinds.A, LambdaCondition.of('is-one', (context) => context.id === '1'));
      provider.register(TestKinds.B, LambdaCondition.of('always', () => ConditionResult.toSuccess('b')));
      provider.register(TestKinds.C, LambdaCondition.of('never', () => false));
    });

    it('yields only successful results across every kind', async () => {
      const results = await collect(provider.anyPass(ctx('1')));

      expect(results.map((r) => r.result)).toEqual([true, 'b']);
    });

    it('treats an array as a list of contexts', async () => {
      const results = await collect(provider.anyPass([ctx('1'), ctx('2')]));

      expect(results.map((r) => r.result)).toEqual([true, 'b', 'b']);
    });

    it('restarts on every call', async () => {
      await collect(provider.anyPass(ctx('2')));

      expect(await collect(provider.anyPass(ctx('2')))).toHaveLength(1);
    });
  });
});
