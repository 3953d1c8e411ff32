import { mapWithConcurrency } from '../../src/pool';
import { sleep } from '../../src/retry';

describe('mapWithConcurrency', () => {
  it('should keep input order and never exceed the limit', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, i) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(ms);
      active--;
      return `${i}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 3, async (x: number) => x)).toEqual([]);
  });
});
