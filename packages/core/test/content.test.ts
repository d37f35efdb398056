import { describe, expect, it } from 'vitest';
import { BaseContent, defineCodec } from '../src/content/NodeContent.js';
import { RawContent, rawCodec } from '../src/content/RawContent.js';
import { WeightedContent, weightedCodec } from '../src/content/WeightedContent.js';
import { ContentParseError } from '../src/errors/tree.js';

describe('Content codecs', () => {
  describe('rawCodec', () => {
    it('keeps the text verbatim', () => {
      const content = rawCodec.parse('  child node 1 ');

      expect(content).toBeInstanceOf(RawContent);
      expect(content.value).toBe('  child node 1 ');
      expect(content.serialize()).toBe('  child node 1 ');
    });

    it('round-trips through serialize', () => {
      for (const text of ['root', 'a:b:c', 'ünïcödé', ' ']) {
        const parsed = rawCodec.parse(text);
        expect(rawCodec.parse(parsed.serialize()).value).toBe(text);
      }
    });
  });

  describe('weightedCodec', () => {
    it('parses "<weight>:<text>"', () => {
      const content = weightedCodec.parse('10:my node 1');

      expect(content).toBeInstanceOf(WeightedContent);
      expect(content.weight).toBe(10);
      expect(content.value).toBe('my node 1');
      expect(content.serialize()).toBe('10:my node 1');
    });

    it('trims whitespace around the weight only', () => {
      const content = weightedCodec.parse(' 7 : spaced');

      expect(content.weight).toBe(7);
      expect(content.value).toBe(' spaced');
      expect(weightedCodec.parse(content.serialize()).value).toBe(' spaced');
    });

    it('accepts an empty text', () => {
      const content = weightedCodec.parse('0:');

      expect(content.weight).toBe(0);
      expect(content.value).toBe('');
    });

    it('rejects input without exactly one separator', () => {
      expect(() => weightedCodec.parse('no separator')).toThrow(ContentParseError);
      expect(() => weightedCodec.parse('1:2:3')).toThrow(
        'Content "1:2:3" rejected by weighted codec: expected exactly one ":" separator'
      );
    });

    it('rejects a non-numeric or negative weight', () => {
      expect(() => weightedCodec.parse('heavy:node')).toThrow(
        'Content "heavy:node" rejected by weighted codec: weight must be an unsigned integer'
      );
      expect(() => weightedCodec.parse('-1:node')).toThrow(ContentParseError);
      expect(() => weightedCodec.parse(':node')).toThrow(ContentParseError);
    });

    it('rejects weights above the 32-bit range', () => {
      expect(() => weightedCodec.parse('4294967296:node')).toThrow(
        'weight must not exceed 4294967295'
      );
      expect(weightedCodec.parse('4294967295:node').weight).toBe(4294967295);
    });
  });

  describe('defineCodec', () => {
    class UpperContent extends BaseContent {
      constructor(readonly value: string) {
        super();
      }
    }

    const upperCodec = defineCodec('upper', (raw) =>
      raw === raw.toUpperCase() ? new UpperContent(raw) : 'text must be upper case'
    );

    it('returns parsed content', () => {
      const content = upperCodec.parse('ROOT');
      expect(content.value).toBe('ROOT');
      expect(content.serialize()).toBe('ROOT');
      expect(String(content)).toBe('ROOT');
    });

    it('turns a returned reason into a ContentParseError', () => {
      try {
        upperCodec.parse('root');
        expect.fail('expected parse to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ContentParseError);
        if (error instanceof ContentParseError) {
          expect(error.code).toBe('CONTENT_PARSE_FAILED');
          expect(error.codec).toBe('upper');
          expect(error.raw).toBe('root');
          expect(error.context).toEqual({
            raw: 'root',
            codec: 'upper',
            reason: 'text must be upper case',
          });
        }
      }
    });
  });
});
