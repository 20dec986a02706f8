/**
 * @fileoverview Atom micro-benchmarks
 */

import { bench, describe } from 'vitest';
import { createAtom } from '../../src/index';
import { fanOutBenchOptions, microBenchOptions } from '../utils/setup';

describe('Atom Creation', () => {
  bench(
    'create atom with primitive value',
    () => {
      createAtom(0);
    },
    microBenchOptions
  );

  bench(
    'create atom with options',
    () => {
      createAtom({ count: 0 }, { equal: (a, b) => a.count === b.count, name: 'bench' });
    },
    microBenchOptions
  );
});

describe('Atom Read and Write', () => {
  const shared = createAtom(0);
  let n = 0;

  bench('get()', () => {
    shared.get();
  }, microBenchOptions);

  bench('set() without listeners', () => {
    shared.set(++n);
  }, microBenchOptions);

  bench('set() suppressed by equality', () => {
    shared.set(shared.get());
  }, microBenchOptions);

  bench('update() without listeners', () => {
    shared.update((v) => v + 1);
  }, microBenchOptions);
});

describe('Atom Notification', () => {
  const one = createAtom(0);
  one.subscribe(() => {});

  const hundred = createAtom(0);
  for (let i = 0; i < 100; i++) hundred.subscribe(() => {});

  let n = 0;

  bench('set() with 1 listener', () => {
    one.set(++n);
  }, microBenchOptions);

  bench('set() with 100 listeners', () => {
    hundred.set(++n);
  }, fanOutBenchOptions);
});

describe('Subscription Lifecycle', () => {
  const shared = createAtom(0);

  bench('subscribe + unsubscribe', () => {
    shared.subscribe(() => {}).unsubscribe();
  }, microBenchOptions);

  bench('subscribe + transfer + unsubscribe', () => {
    shared.subscribe(() => {}).transfer().unsubscribe();
  }, microBenchOptions);
});
