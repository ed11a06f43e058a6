import { describe, it, expect } from 'vitest';
import { normalizeDate } from '../extract/date.js';

const NOW = new Date(Date.UTC(2024, 2, 12, 8, 0, 0));

function iso(raw: string | null, now: Date = NOW): string | null {
  return normalizeDate(raw, now)?.toISOString() ?? null;
}

describe('normalizeDate', () => {
  describe('ISO 8601', () => {
    it('parses a UTC timestamp', () => {
      expect(iso('2024-03-12T14:30:00Z')).toBe('2024-03-12T14:30:00.000Z');
    });

    it('applies an explicit offset', () => {
      expect(iso('2024-03-12T14:30:00+03:00')).toBe('2024-03-12T11:30:00.000Z');
      expect(iso('2024-03-12T14:30-0130')).toBe('2024-03-12T16:00:00.000Z');
    });

    it('treats a bare date as midnight UTC', () => {
      expect(iso('2024-03-12')).toBe('2024-03-12T00:00:00.000Z');
    });
  });

  describe('numeric dates', () => {
    it('parses day.month.year with a time', () => {
      expect(iso('05.03.2024 09:15')).toBe('2024-03-05T09:15:00.000Z');
    });

    it('parses day/month/year', () => {
      expect(iso('05/03/2024')).toBe('2024-03-05T00:00:00.000Z');
    });

    it('accepts a time before the date', () => {
      expect(iso('09:15, 05.03.2024')).toBe('2024-03-05T09:15:00.000Z');
    });
  });

  describe('named months', () => {
    it('parses Russian genitive month names with a time', () => {
      expect(iso('12 марта 2024, 14:30')).toBe('2024-03-12T14:30:00.000Z');
    });

    it('strips the year suffix and the "в" before the time', () => {
      expect(iso('12 марта 2024 года, в 14:30')).toBe('2024-03-12T14:30:00.000Z');
      expect(iso('1 декабря 2023 г.')).toBe('2023-12-01T00:00:00.000Z');
    });

    it('parses English month names and abbreviations', () => {
      expect(iso('3 May 2024')).toBe('2024-05-03T00:00:00.000Z');
      expect(iso('3 Sept. 2024')).toBe('2024-09-03T00:00:00.000Z');
    });

    it('accepts nominative and abbreviated Russian forms', () => {
      expect(iso('1 сентябрь 2024')).toBe('2024-09-01T00:00:00.000Z');
      expect(iso('7 нояб. 2023')).toBe('2023-11-07T00:00:00.000Z');
    });

    it('takes the year from now when the date omits it', () => {
      expect(iso('3 мая, 10:05')).toBe('2024-05-03T10:05:00.000Z');
    });
  });

  describe('relative dates', () => {
    it('anchors today and yesterday to now', () => {
      expect(iso('Сегодня, 14:30')).toBe('2024-03-12T14:30:00.000Z');
      expect(iso('Вчера в 18:00')).toBe('2024-03-11T18:00:00.000Z');
      expect(iso('yesterday')).toBe('2024-03-11T00:00:00.000Z');
    });

    it('crosses a year boundary', () => {
      expect(iso('вчера, 23:59', new Date(Date.UTC(2024, 0, 1, 5)))).toBe(
        '2023-12-31T23:59:00.000Z'
      );
    });
  });

  describe('rejection', () => {
    it.each([
      ['null', null],
      ['an empty string', ''],
      ['whitespace', '   '],
      ['free text', 'some time ago'],
      ['an impossible day', '31.02.2024'],
      ['an impossible month', '2024-13-01'],
      ['an impossible hour', '12.03.2024 25:00'],
      ['an unknown month name', '12 foo 2024'],
      ['a word sharing a month prefix', '12 marzipan 2024'],
      ['a misspelled month', '12 mart 2024'],
      ['a Russian word sharing a month prefix', '12 марафона 2024'],
      ['an object prototype key', 'constructor'],
    ])('returns null for %s', (_label, raw) => {
      expect(normalizeDate(raw, NOW)).toBeNull();
    });
  });
});
