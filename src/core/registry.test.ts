import { describe, it, expect, vi } from 'vitest';

import { createBufferSink } from '../report/sinks.js';
import { failTestIf } from './conditions.js';
import { RuntimeError } from './errors.js';
import { TestRegistry } from './registry.js';
import { createTestCase } from './testCase.js';

function setup() {
  const sink = createBufferSink();
  const registry = new TestRegistry({ sink });
  return { sink, registry };
}

describe('TestRegistry.run', () => {
  it('is a no-op on an empty batch', () => {
    const { sink, registry } = setup();

    expect(registry.run()).toBeUndefined();
    expect(sink.text()).toBe('');
    expect(registry.batchIndex).toBe(0);
  });

  it('reports every test passing', () => {
    const { sink, registry } = setup();
    registry.addTest(() => true, 'first');
    registry.addTest(() => true, 'second');
    registry.addTest(() => true, 'third');

    const result = registry.run();

    expect(result).toEqual({ batchIndex: 0, total: 3, failed: [], passed: true });
    expect(sink.lines().at(-1)).toBe('All tests (3) passed for batch 0.');
  });

  it('lists failing indices in ascending order, whatever the failure', () => {
    const { sink, registry } = setup();
    registry.addTest(() => true, 'ok');
    registry.addTest(() => false, 'returns false');
    registry.addTest(() => {
      failTestIf(true);
      return true;
    }, 'condition');
    registry.addTest(() => true, 'also ok');
    registry.addTest(() => {
      throw new RuntimeError('disk full');
    }, 'domain');
    registry.addTest(() => {
      throw null;
    }, 'unknown');

    const result = registry.run();

    expect(result?.failed).toEqual([
      { index: 1, name: 'returns false' },
      { index: 2, name: 'condition' },
      { index: 4, name: 'domain' },
      { index: 5, name: 'unknown' },
    ]);
    expect(sink.lines().slice(-7)).toEqual([
      '4 out of 6 test(s) failed for batch 0:',
      'Following test(s) failed:',
      '    1 (returns false)',
      '    2 (condition)',
      '    4 (domain)',
      '    5 (unknown)',
      '',
    ]);
  });

  it('runs tests in registration order', () => {
    const { registry } = setup();
    const order: string[] = [];
    for (const name of ['c', 'a', 'b']) {
      registry.addTest(() => {
        order.push(name);
        return true;
      }, name);
    }

    registry.run();

    expect(order).toEqual(['c', 'a', 'b']);
  });

  it('drains the batch and advances the index by one, pass or fail', () => {
    const { sink, registry } = setup();
    registry.addTest(() => false, 'fails');

    registry.run();
    expect(registry.pendingCount).toBe(0);
    expect(registry.batchIndex).toBe(1);

    registry.run();
    expect(registry.batchIndex).toBe(1);

    registry.addTest(() => true, 'passes');
    sink.clear();
    registry.run();
    expect(sink.lines().at(-1)).toBe('All tests (1) passed for batch 1.');
    expect(registry.batchIndex).toBe(2);
  });

  it('runs a test registered twice twice, with independent outcomes', () => {
    const { registry } = setup();
    let calls = 0;
    const test = createTestCase(() => {
      calls++;
      return calls === 1;
    }, 'first call only');
    registry.register(test);
    registry.register(test);

    const result = registry.run();

    expect(calls).toBe(2);
    expect(result?.failed).toEqual([{ index: 1, name: 'first call only' }]);
  });

  it('defers tests registered mid-run to the next batch', () => {
    const { registry } = setup();
    const late = vi.fn(() => true);
    registry.addTest(() => {
      registry.addTest(late, 'late');
      return true;
    }, 'registers another');

    expect(registry.run()?.total).toBe(1);
    expect(late).not.toHaveBeenCalled();
    expect(registry.pendingCount).toBe(1);

    expect(registry.run()?.batchIndex).toBe(1);
    expect(late).toHaveBeenCalledTimes(1);
  });
});

describe('TestRegistry.onBatch', () => {
  it('notifies listeners of every non-empty batch until removed', () => {
    const { registry } = setup();
    const seen: number[] = [];
    const off = registry.onBatch((result) => {
      seen.push(result.batchIndex);
    });

    registry.addTest(() => true, 'one');
    registry.run();
    registry.run();
    registry.addTest(() => false, 'two');
    registry.run();
    off();
    registry.addTest(() => true, 'three');
    registry.run();

    expect(seen).toEqual([0, 1]);
  });
});

describe('TestRegistry.addTest', () => {
  it('names the test after the function', () => {
    const { registry } = setup();
    function parsesHeaders(): boolean {
      return true;
    }

    expect(registry.addTest(parsesHeaders).name).toBe('parsesHeaders');
  });

  it('falls back to the unnamed placeholder', () => {
    const { registry } = setup();
    expect(registry.addTest(() => true, '').name).toBe('<Unnamed test>');
  });

  it('returns a frozen test case', () => {
    const { registry } = setup();
    expect(Object.isFrozen(registry.addTest(() => true, 'frozen'))).toBe(true);
  });
});
