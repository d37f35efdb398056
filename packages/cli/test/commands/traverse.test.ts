import { describe, it, expect } from 'vitest';
import * as traverseCommand from '../../source/commands/traverse.js';

const { options } = traverseCommand;

describe('Traverse Command', () => {
  it('should export description and component', () => {
    expect(traverseCommand.description.length).toBeGreaterThan(0);
    expect(traverseCommand.default.name).toBe('Traverse');
  });

  describe('options schema', () => {
    it('should default to pre-order DFS from the strategy start', () => {
      const result = options.parse({});

      expect(result.order).toBe('preDfs');
      expect(result.start).toBeUndefined();
    });

    it('should accept every traversal order', () => {
      expect(options.parse({ order: 'inverseInDfs', start: 3 })).toEqual({
        order: 'inverseInDfs',
        start: 3,
      });
      expect(options.parse({ order: 'children' }).order).toBe('children');
    });

    it('should reject unknown orders', () => {
      expect(() => options.parse({ order: 'zigzag' })).toThrow();
    });

    it('should reject negative or fractional handles', () => {
      expect(() => options.parse({ start: -1 })).toThrow();
      expect(() => options.parse({ start: 1.5 })).toThrow();
    });
  });
});
