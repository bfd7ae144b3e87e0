/**
 * @fileoverview Unit tests for the shared instance table
 */

import { SharedInstanceTable } from '../../../src';

class Widget {}

describe('SharedInstanceTable', () => {
  it('should create once per type and reuse the instance', () => {
    const table = new SharedInstanceTable();
    const create = jest.fn(() => new Widget());

    const first = table.getOrCreate(Widget, create);
    const second = table.getOrCreate(Widget, create);

    expect(second).toBe(first);
    expect(create).toHaveBeenCalledTimes(1);
    expect(table.has(Widget)).toBe(true);
    expect(table.size).toBe(1);
  });

  it('should keep the instance published first when creation races', () => {
    const table = new SharedInstanceTable();
    const winner = new Widget();

    const result = table.getOrCreate(Widget, () => {
      // another caller publishes while this candidate is being built
      table.getOrCreate(Widget, () => winner);
      return new Widget();
    });

    expect(result).toBe(winner);
    expect(table.get(Widget)).toBe(winner);
  });

  it('should publish nothing when creation throws', () => {
    const table = new SharedInstanceTable();

    expect(() =>
      table.getOrCreate(Widget, () => {
        throw new Error('no widget');
      }),
    ).toThrow('no widget');
    expect(table.has(Widget)).toBe(false);
  });
});
