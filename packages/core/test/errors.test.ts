import { describe, expect, it } from 'vitest';
import {
  ChildNotFoundError,
  DuplicateChildError,
  GroveError,
  isGroveError,
  ParentNotFoundError,
  TreeError,
  TreeNotFoundError,
  wrapError,
} from '../src/errors/index.js';

describe('Errors', () => {
  describe('GroveError subclasses', () => {
    it('carry code, module and operation', () => {
      const error = new ParentNotFoundError(7);

      expect(error).toBeInstanceOf(GroveError);
      expect(error).toBeInstanceOf(TreeError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ParentNotFoundError');
      expect(error.code).toBe('PARENT_NOT_FOUND');
      expect(error.module).toBe('tree');
      expect(error.operation).toBe('link');
      expect(error.context).toEqual({ parent: 7 });
      expect(error.message).toBe('Parent node 7 not found');
    });

    it('belong to the module that raised them', () => {
      const error = new TreeNotFoundError('main', 'get');

      expect(error.module).toBe('forest');
      expect(error.code).toBe('TREE_NOT_FOUND');
      expect(error).not.toBeInstanceOf(TreeError);
    });

    it('serialize to a structured object', () => {
      const error = new DuplicateChildError('B', 0, 'link');
      const json = error.toJSON();

      expect(json).toMatchObject({
        name: 'DuplicateChildError',
        code: 'DUPLICATE_CHILD',
        message: 'Node 0 already has a child named "B"',
        module: 'tree',
        operation: 'link',
        context: { childName: 'B', parent: 0 },
      });
      expect(json['timestamp']).toBeInstanceOf(Date);
    });
  });

  describe('withContext', () => {
    it('returns a copy with merged context', () => {
      const error = new ChildNotFoundError(3, 'unlink', 'node is already unlinked');
      const copy = error.withContext({ tree: 'main' });

      expect(copy).not.toBe(error);
      expect(copy).toBeInstanceOf(ChildNotFoundError);
      expect(copy.message).toBe(error.message);
      expect(copy.code).toBe('CHILD_NOT_FOUND');
      expect(copy.context).toEqual({
        target: 3,
        reason: 'node is already unlinked',
        tree: 'main',
      });
      expect(error.context).toEqual({ target: 3, reason: 'node is already unlinked' });
    });
  });

  describe('wrapError', () => {
    it('passes library errors through', () => {
      const error = new ParentNotFoundError(1);

      expect(wrapError(error, 'cli', 'run')).toBe(error);
    });

    it('adds context to library errors', () => {
      const wrapped = wrapError(new ParentNotFoundError(1), 'cli', 'run', { command: 'find' });

      expect(wrapped.context).toEqual({ parent: 1, command: 'find' });
      expect(wrapped.code).toBe('PARENT_NOT_FOUND');
    });

    it('wraps foreign errors with the given module', () => {
      const cause = new TypeError('bad input');
      const wrapped = wrapError(cause, 'cli', 'traverse', { order: 'bfs' });

      expect(wrapped).toBeInstanceOf(GroveError);
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('bad input');
      expect(wrapped.module).toBe('cli');
      expect(wrapped.operation).toBe('traverse');
      expect(wrapped.context).toEqual({ order: 'bfs', cause });
    });

    it('wraps thrown non-errors', () => {
      const wrapped = wrapError('plain failure', 'cli', 'run');

      expect(wrapped.message).toBe('plain failure');
      expect(wrapped.context).toEqual({ cause: undefined });
    });
  });

  describe('isGroveError', () => {
    it('recognises library errors only', () => {
      expect(isGroveError(new TreeNotFoundError('x', 'get'))).toBe(true);
      expect(isGroveError(new Error('x'))).toBe(false);
      expect(isGroveError('x')).toBe(false);
    });
  });
});
