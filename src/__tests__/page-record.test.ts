import { describe, it, expect } from 'vitest';
import {
  createPageRecord,
  parsePageRecord,
  serializePageRecord,
} from '../export/page-record.js';

const FIXED_DATE = new Date('2024-01-01T00:00:00.000Z');

describe('page-record', () => {
  describe('createPageRecord', () => {
    it('fills defaults and freezes the record', () => {
      const record = createPageRecord({
        url: 'http://example.com/',
        content: '# Hi',
        links: ['http://example.com/a'],
        crawledAt: FIXED_DATE,
      });

      expect(record).toEqual({
        url: 'http://example.com/',
        title: '',
        content: '# Hi',
        links: ['http://example.com/a'],
        crawledAt: '2024-01-01T00:00:00.000Z',
        metadata: {},
      });
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.links)).toBe(true);
      expect(Object.isFrozen(record.metadata)).toBe(true);
    });

    it('copies the links it is given', () => {
      const links = ['http://example.com/a'];
      const record = createPageRecord({ url: 'http://example.com/', content: '', links });
      links.push('http://example.com/b');
      expect(record.links).toEqual(['http://example.com/a']);
    });
  });

  describe('serializePageRecord', () => {
    it('omits empty metadata and absent optionals', () => {
      const record = createPageRecord({
        url: 'http://example.com/',
        content: '# Hi',
        links: ['http://example.com/a'],
        crawledAt: FIXED_DATE,
      });

      expect(serializePageRecord(record)).toBe(
        '{"url":"http://example.com/","title":"","content":"# Hi",' +
          '"links":["http://example.com/a"],"crawledAt":"2024-01-01T00:00:00.000Z"}'
      );
    });

    it('writes description and metadata when present', () => {
      const record = createPageRecord({
        url: 'http://example.com/a',
        title: 'A',
        description: 'D',
        content: 'x',
        links: [],
        crawledAt: FIXED_DATE,
        metadata: { depth: '1' },
      });

      expect(serializePageRecord(record)).toBe(
        '{"url":"http://example.com/a","title":"A","content":"x","links":[],' +
          '"crawledAt":"2024-01-01T00:00:00.000Z","description":"D","metadata":{"depth":"1"}}'
      );
    });

    it('pretty-prints on request', () => {
      const record = createPageRecord({
        url: 'http://example.com/',
        content: '',
        links: [],
        crawledAt: FIXED_DATE,
      });
      expect(serializePageRecord(record, true)).toContain('\n  "url": "http://example.com/",\n');
    });
  });

  describe('parsePageRecord', () => {
    it('reads back a serialized record', () => {
      const record = createPageRecord({
        url: 'http://example.com/a',
        title: 'A',
        content: 'x',
        rawHtml: '<p>x</p>',
        links: ['http://example.com/b'],
        crawledAt: FIXED_DATE,
        metadata: { author: 'Test Author', depth: '1' },
      });

      const parsed = parsePageRecord(serializePageRecord(record));

      expect(parsed).toEqual(record);
      expect(Object.isFrozen(parsed)).toBe(true);
    });

    it('defaults missing metadata to an empty map', () => {
      const parsed = parsePageRecord(
        '{"url":"http://example.com/","title":"","content":"","links":[],' +
          '"crawledAt":"2024-01-01T00:00:00.000Z"}'
      );
      expect(parsed.metadata).toEqual({});
    });

    it('throws on malformed JSON', () => {
      expect(() => parsePageRecord('not json')).toThrow(SyntaxError);
    });

    it('throws on a record of the wrong shape', () => {
      expect(() => parsePageRecord('{"url":"http://example.com/"}')).toThrow();
      expect(() =>
        parsePageRecord(
          '{"url":"http://example.com/","title":"","content":"","links":[],"crawledAt":"yesterday"}'
        )
      ).toThrow();
    });
  });
});
