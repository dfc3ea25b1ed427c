// src/parsers/eventTextParser.test.ts
import { describe, it, expect } from 'vitest';
import { EventTextParser, pickLocation, splitLines } from './eventTextParser.js';
import { matchBareTime } from './matchers.js';
import { minutesBetween } from '../utils/calendarDateTime.js';
import type { EventDraft, ParseOutcome } from '../types/event.js';

function expectDraft(outcome: ParseOutcome): EventDraft {
  if (outcome.kind !== 'recognized') {
    throw new Error(`Expected a recognized message, got ${outcome.kind}`);
  }
  return outcome.draft;
}

describe('EventTextParser', () => {
  const parser = new EventTextParser();

  describe('multiline messages', () => {
    it('reads title, location and an "h" time marker', () => {
      const text = 'Nobili avv frattasi\nCarlomagno\n13/2/26 h 12';
      const draft = expectDraft(parser.parse(text));

      expect(draft.title).toBe('Nobili avv frattasi');
      expect(draft.location).toBe('Carlomagno');
      expect(draft.description).toBe(text);
      expect(draft.start).toEqual({ year: 2026, month: 2, day: 13, hour: 12, minute: 0 });
      expect(draft.end).toEqual({ year: 2026, month: 2, day: 13, hour: 13, minute: 0 });
    });

    it('does not take the date line for a location', () => {
      const draft = expectDraft(parser.parse('507 ascenzi Maurizio: nota libera\n18/09/2026 12:00'));

      expect(draft.title).toBe('507 ascenzi Maurizio: nota libera');
      expect(draft.location).toBe('');
      expect(draft.start).toEqual({ year: 2026, month: 9, day: 18, hour: 12, minute: 0 });
    });

    it('rejects a location line containing a digit', () => {
      const draft = expectDraft(parser.parse('Riunione\nSalaA 3\n20/05/26 h9'));

      expect(draft.location).toBe('');
      expect(draft.start).toEqual({ year: 2026, month: 5, day: 20, hour: 9, minute: 0 });
    });

    it('reads the "ore" time marker', () => {
      const draft = expectDraft(parser.parse('Dentista\n5/1/26 ore 14.30'));

      expect(draft.start).toEqual({ year: 2026, month: 1, day: 5, hour: 14, minute: 30 });
    });

    it('reads "ore" without minutes', () => {
      const draft = expectDraft(parser.parse('Dentista\n5/1/26 ORE 9'));

      expect(draft.start).toEqual({ year: 2026, month: 1, day: 5, hour: 9, minute: 0 });
    });

    it('accepts an uppercase marker with colon minutes', () => {
      const draft = expectDraft(parser.parse('Cena\n2/2/26 H 20:45'));

      expect(draft.start.hour).toBe(20);
      expect(draft.start.minute).toBe(45);
    });

    it('keeps everything on one line as the title', () => {
      const draft = expectDraft(parser.parse('Ndyae udienza 13/2/26 h 12'));

      expect(draft.title).toBe('Ndyae udienza 13/2/26 h 12');
      expect(draft.location).toBe('');
    });

    it('ignores blank lines and trims the description', () => {
      const draft = expectDraft(parser.parse('  Titolo\n\n  Studio  \n\n 1/3/27 h 8.15  '));

      expect(draft.title).toBe('Titolo');
      expect(draft.location).toBe('Studio');
      expect(draft.description).toBe('Titolo\n\n  Studio  \n\n 1/3/27 h 8.15');
      expect(draft.start).toEqual({ year: 2027, month: 3, day: 1, hour: 8, minute: 15 });
    });

    it('reads a dotted date followed by a dotted time', () => {
      const draft = expectDraft(parser.parse('Visita\n18.09.2026 12.00'));

      expect(draft.start).toEqual({ year: 2026, month: 9, day: 18, hour: 12, minute: 0 });
    });

    it('prefers a marked time over an earlier bare one', () => {
      const draft = expectDraft(parser.parse('Call 10:15\n3/3/26 h 16'));

      expect(draft.start.hour).toBe(16);
      expect(draft.start.minute).toBe(0);
    });

    it('takes the leftmost date', () => {
      const draft = expectDraft(parser.parse('Rinvio\ndal 4/5/26 al 9/5/26 h 10'));

      expect(draft.start.day).toBe(4);
    });
  });

  describe('duration', () => {
    it.each([
      'Nobili avv frattasi\nCarlomagno\n13/2/26 h 12',
      'Dentista\n5/1/26 ore 14.30',
      '507 ascenzi Maurizio: nota libera\n18/09/2026 12:00',
    ])('ends exactly one hour after the start: %s', (text) => {
      const draft = expectDraft(parser.parse(text));
      expect(minutesBetween(draft.start, draft.end)).toBe(60);
    });

    it('rolls over midnight and the year', () => {
      const draft = expectDraft(parser.parse('Festa\n31/12/26 h 23.30'));

      expect(draft.end).toEqual({ year: 2027, month: 1, day: 1, hour: 0, minute: 30 });
    });
  });

  describe('not recognized', () => {
    it.each(['', '   ', ' \n\t \n'])('rejects empty input %j', (text) => {
      expect(parser.parse(text)).toEqual({ kind: 'not_recognized', reason: 'empty' });
    });

    it('rejects text without a date', () => {
      expect(parser.parse('Riunione domani h 10')).toEqual({
        kind: 'not_recognized',
        reason: 'missing_date',
      });
    });

    it('rejects a date mixing separators', () => {
      expect(parser.parse('Visita 13/02.26 h 10')).toEqual({
        kind: 'not_recognized',
        reason: 'missing_date',
      });
    });

    it('rejects a date without a time', () => {
      expect(parser.parse('Riunione\n13/02/2026')).toEqual({
        kind: 'not_recognized',
        reason: 'missing_time',
      });
    });

    it('rejects an out of range hour', () => {
      expect(parser.parse('Turno\n2/2/26 h 24')).toEqual({
        kind: 'not_recognized',
        reason: 'missing_time',
      });
    });
  });

  describe('malformed timestamps', () => {
    it('reports a day that does not exist in the month', () => {
      expect(parser.parse('Riunione\n31/02/2026 h 10')).toEqual({
        kind: 'malformed_timestamp',
        reason: 'invalid_calendar_date',
      });
    });

    it('reports month 13', () => {
      expect(parser.parse('Riunione 10/13/2026 h 10').kind).toBe('malformed_timestamp');
    });

    it('accepts 29 February in a leap year', () => {
      const draft = expectDraft(parser.parse('Bisestile\n29/02/28 h 10'));
      expect(draft.start.day).toBe(29);
    });
  });

  describe('purity', () => {
    it('returns equal drafts for the same input', () => {
      const text = 'Nobili avv frattasi\nCarlomagno\n13/2/26 h 12';
      expect(parser.parse(text)).toEqual(parser.parse(text));
    });

    it('returns frozen drafts', () => {
      const draft = expectDraft(parser.parse('Cena\n2/2/26 h 20'));
      expect(Object.isFrozen(draft)).toBe(true);
      expect(Object.isFrozen(draft.start)).toBe(true);
    });
  });

  describe('custom matchers', () => {
    it('only uses the matchers it was given', () => {
      const bareOnly = new EventTextParser([matchBareTime]);

      expect(bareOnly.parse('Cena\n2/2/26 h 20').kind).toBe('not_recognized');
      expect(expectDraft(bareOnly.parse('Cena\n2/2/26 20:00')).start.hour).toBe(20);
    });
  });
});

describe('splitLines', () => {
  it('drops blank lines and handles CRLF', () => {
    expect(splitLines('a\r\n\r\n b \rc\n')).toEqual(['a', 'b', 'c']);
  });
});

describe('pickLocation', () => {
  it('returns the second line when it is a single word', () => {
    expect(pickLocation(['Titolo', 'Carlomagno'])).toBe('Carlomagno');
  });

  it('returns empty for a missing second line', () => {
    expect(pickLocation(['Titolo'])).toBe('');
  });

  it('returns empty for a line with spaces', () => {
    expect(pickLocation(['Titolo', 'nota libera'])).toBe('');
  });
});
