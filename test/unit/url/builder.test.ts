import { FantasticalErrorCode } from '../../../src/shared/errors.js';
import { buildParseUrl, buildShowUrl, collectParams, parseParam } from '../../../src/url/builder.js';
import { TEST_NOW } from '../../helpers/fake-runtime.js';

describe('buildParseUrl', () => {
  it('encodes only the sentence by default', () => {
    expect(buildParseUrl({ sentence: 'Wake up at 8am' })).toBe('x-fantastical3://parse?s=Wake%20up%20at%208am');
  });

  it('adds note, calendar and add with sorted keys', () => {
    expect(
      buildParseUrl({ sentence: 'Dinner with Sam', note: 'Bring notes', calendar: 'Work', add: true })
    ).toBe('x-fantastical3://parse?add=1&calendarName=Work&n=Bring%20notes&s=Dinner%20with%20Sam');
  });

  it('skips blank note and calendar', () => {
    expect(buildParseUrl({ sentence: 'Lunch', note: ' ', calendar: '', add: false })).toBe(
      'x-fantastical3://parse?s=Lunch'
    );
  });

  it('lets extra params override built-in keys', () => {
    const extra = new Map([
      ['x-source', 'cli'],
      ['s', 'Replaced'],
    ]);
    expect(buildParseUrl({ sentence: 'Lunch', extra })).toBe('x-fantastical3://parse?s=Replaced&x-source=cli');
  });
});

describe('parseParam', () => {
  it('splits at the first equals sign', () => {
    expect(parseParam('title=a=b')).toEqual(['title', 'a=b']);
    expect(parseParam(' key =')).toEqual(['key', '']);
  });

  it('requires an equals sign', () => {
    expect(() => parseParam('novalue')).toThrow('invalid --param "novalue"; want key=value');
  });

  it('requires a key', () => {
    expect(() => parseParam(' =x')).toThrow('invalid --param " =x"; key must not be empty');
  });
});

describe('collectParams', () => {
  it('keeps the last value for a repeated key', () => {
    expect([...collectParams(['a=1', 'b=2', 'a=3'])]).toEqual([
      ['a', '3'],
      ['b', '2'],
    ]);
  });
});

describe('buildShowUrl', () => {
  it('shows a view without a date', () => {
    expect(buildShowUrl('mini', [], TEST_NOW)).toBe('x-fantastical3://show/mini');
  });

  it('lowercases the view and formats the date', () => {
    expect(buildShowUrl('Calendar', ['2026-01-03'], TEST_NOW)).toBe('x-fantastical3://show/calendar/2026-01-03');
    expect(buildShowUrl('week', ['today'], TEST_NOW)).toBe('x-fantastical3://show/week/2026-01-07');
  });

  it('joins the calendar set name', () => {
    expect(buildShowUrl('set', ['My', 'Calendar', 'Set'], TEST_NOW)).toBe(
      'x-fantastical3://show/set?name=My%20Calendar%20Set'
    );
  });

  it('requires a set name', () => {
    expect(() => buildShowUrl('set', [' '], TEST_NOW)).toThrow('missing calendar set name');
  });

  it('rejects malformed view names', () => {
    expect(() => buildShowUrl('../etc', [], TEST_NOW)).toThrow(
      'unknown show target "../etc" (want: mini, calendar, set, or a view name)'
    );
  });

  it('rejects more than one date', () => {
    expect(() => buildShowUrl('mini', ['today', 'tomorrow'], TEST_NOW)).toThrow(
      'too many args for "mini"; expected: fantastical show mini [date]'
    );
  });

  it('reports bad dates as usage errors', () => {
    expect(() => buildShowUrl('day', ['2026-13-01'], TEST_NOW)).toThrow(
      expect.objectContaining({ code: FantasticalErrorCode.USAGE })
    );
  });
});
