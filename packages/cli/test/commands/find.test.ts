import { describe, it, expect } from 'vitest';
import * as findCommand from '../../source/commands/find.js';

const { options } = findCommand;

describe('Find Command', () => {
  it('should export description and component', () => {
    expect(findCommand.description.length).toBeGreaterThan(0);
    expect(findCommand.default.name).toBe('Find');
  });

  describe('options schema', () => {
    it('should require a path', () => {
      expect(() => options.parse({})).toThrow();
    });

    it('should keep the path verbatim', () => {
      expect(options.parse({ path: 'backend/storage' })).toEqual({ path: 'backend/storage' });
    });
  });
});
