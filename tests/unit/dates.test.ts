/**
 * Date Normalizer Unit Tests
 */

import {
  dateFromUpstream,
  dateToUpstream,
  isCalendarDate,
  parseDate,
  parseDateBound,
} from '../../src/utils/dates.js';
import { InvalidDateFormatError, MalformedUpstreamRecordError } from '../../src/types/errors.js';

describe('Date normalizer', () => {
  describe('dateToUpstream', () => {
    it('should send a calendar date as midnight UTC, all-day', () => {
      expect(dateToUpstream('2025-03-15', 'dueDate')).toEqual({
        timestamp: '2025-03-15T00:00:00+0000',
        isAllDay: true,
      });
    });

    it('should treat a date-time without offset as UTC', () => {
      expect(dateToUpstream('2025-03-15T09:00:00', 'dueDate')).toEqual({
        timestamp: '2025-03-15T09:00:00+0000',
        isAllDay: false,
      });
    });

    it('should accept minutes-only precision', () => {
      expect(dateToUpstream('2025-03-15T14:00', 'startDate').timestamp).toBe(
        '2025-03-15T14:00:00+0000'
      );
    });

    it('should convert offsets to UTC', () => {
      expect(dateToUpstream('2025-03-15T09:30:00+09:00', 'dueDate').timestamp).toBe(
        '2025-03-15T00:30:00+0000'
      );
      expect(dateToUpstream('2025-03-15T22:00:00-0500', 'dueDate').timestamp).toBe(
        '2025-03-16T03:00:00+0000'
      );
      expect(dateToUpstream('2025-03-15T09:00:00.250Z', 'dueDate').timestamp).toBe(
        '2025-03-15T09:00:00+0000'
      );
    });

    it('should reject malformed values naming the field', () => {
      expect(() => dateToUpstream('next tuesday', 'dueDate')).toThrow(InvalidDateFormatError);
      expect(() => dateToUpstream('next tuesday', 'dueDate')).toThrow(
        'Invalid dueDate format: "next tuesday"'
      );
    });

    it('should reject impossible calendar dates', () => {
      expect(() => dateToUpstream('2025-02-30', 'dueDate')).toThrow(InvalidDateFormatError);
      expect(() => dateToUpstream('2025-13-01', 'dueDate')).toThrow(InvalidDateFormatError);
      expect(() => dateToUpstream('2025-03-15T24:00:00', 'dueDate')).toThrow(InvalidDateFormatError);
      expect(() => dateToUpstream('2025-03-15T10:00:00+15:00', 'dueDate')).toThrow(
        InvalidDateFormatError
      );
    });

    it('should accept a leap day', () => {
      expect(dateToUpstream('2024-02-29', 'dueDate').timestamp).toBe('2024-02-29T00:00:00+0000');
    });
  });

  describe('dateFromUpstream', () => {
    it('should read an all-day timestamp as its calendar date', () => {
      expect(dateFromUpstream('2025-03-15T00:00:00+0000', true)).toBe('2025-03-15');
    });

    it('should read a timed timestamp as a UTC date-time', () => {
      expect(dateFromUpstream('2025-03-15T09:00:00.000+0000', false)).toBe('2025-03-15T09:00:00Z');
      expect(dateFromUpstream('2025-03-15T18:00:00+0900', false)).toBe('2025-03-15T09:00:00Z');
    });

    it('should read missing values as null', () => {
      expect(dateFromUpstream(undefined, false)).toBeNull();
      expect(dateFromUpstream(null, true)).toBeNull();
      expect(dateFromUpstream('', false)).toBeNull();
    });

    it('should reject an unrecognized timestamp', () => {
      expect(() => dateFromUpstream('15/03/2025', false)).toThrow(MalformedUpstreamRecordError);
      expect(() => dateFromUpstream(1742029200000, false)).toThrow(MalformedUpstreamRecordError);
    });

    it('should give back what dateToUpstream was given', () => {
      const allDay = dateToUpstream('2025-12-31', 'dueDate');
      expect(dateFromUpstream(allDay.timestamp, allDay.isAllDay)).toBe('2025-12-31');

      const timed = dateToUpstream('2025-12-31T23:15:00Z', 'dueDate');
      expect(dateFromUpstream(timed.timestamp, timed.isAllDay)).toBe('2025-12-31T23:15:00Z');
    });

    it('should give back timed values in canonical UTC form', () => {
      const bare = dateToUpstream('2025-03-15T09:00:00', 'dueDate');
      expect(bare.timestamp).toBe('2025-03-15T09:00:00+0000');
      expect(dateFromUpstream(bare.timestamp, bare.isAllDay)).toBe('2025-03-15T09:00:00Z');

      const offset = dateToUpstream('2025-03-15T18:00:00+09:00', 'dueDate');
      expect(dateFromUpstream(offset.timestamp, offset.isAllDay)).toBe('2025-03-15T09:00:00Z');

      const fractional = dateToUpstream('2025-03-15T09:00:00.250Z', 'dueDate');
      expect(dateFromUpstream(fractional.timestamp, fractional.isAllDay)).toBe(
        '2025-03-15T09:00:00Z'
      );
    });
  });

  describe('parseDate', () => {
    it('should flag calendar dates', () => {
      expect(parseDate('2025-03-15')).toEqual({ epochMs: Date.UTC(2025, 2, 15), dateOnly: true });
      expect(parseDate('2025-03-15T00:00:00Z')).toEqual({
        epochMs: Date.UTC(2025, 2, 15),
        dateOnly: false,
      });
    });

    it('should return null for unrecognized input', () => {
      expect(parseDate('')).toBeNull();
      expect(parseDate('2025-3-15')).toBeNull();
    });
  });

  describe('isCalendarDate', () => {
    it('should distinguish calendar dates from date-times', () => {
      expect(isCalendarDate('2025-03-15')).toBe(true);
      expect(isCalendarDate('2025-03-15T09:00:00Z')).toBe(false);
    });
  });

  describe('parseDateBound', () => {
    it('should start a calendar date at midnight', () => {
      expect(parseDateBound('2025-03-15', 'dateFrom', 'start').toISOString()).toBe(
        '2025-03-15T00:00:00.000Z'
      );
    });

    it('should end a calendar date at its last millisecond', () => {
      expect(parseDateBound('2025-03-15', 'dateTo', 'end').toISOString()).toBe(
        '2025-03-15T23:59:59.999Z'
      );
    });

    it('should use a date-time bound as given', () => {
      expect(parseDateBound('2025-03-15T12:00:00Z', 'dateTo', 'end').toISOString()).toBe(
        '2025-03-15T12:00:00.000Z'
      );
    });

    it('should reject malformed bounds', () => {
      expect(() => parseDateBound('soon', 'dateFrom', 'start')).toThrow(
        'Invalid dateFrom format: "soon"'
      );
    });
  });
});
