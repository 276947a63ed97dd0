import { HelperCalendarSchema, HelperEventSchema, type HelperEvent } from '../../../src/eventkit/types.js';
import { selectEvents, sortCalendars, type SelectOptions } from '../../../src/eventkit/select.js';
import { readFixture } from '../../helpers/fake-runtime.js';

const events: HelperEvent[] = HelperEventSchema.array().parse(JSON.parse(readFixture('events.json')));

const defaults: SelectOptions = { includeAllDay: true, includeDeclined: false, sort: 'start' };

function ids(options: Partial<SelectOptions>): string[] {
  return selectEvents(events, { ...defaults, ...options }).map((event) => event.id);
}

describe('selectEvents', () => {
  it('sorts by start instant and drops declined events', () => {
    expect(ids({})).toEqual(['e2', 'e4', 'e1']);
  });

  it('can exclude all-day events', () => {
    expect(ids({ includeAllDay: false })).toEqual(['e4', 'e1']);
  });

  it('can include declined events', () => {
    expect(ids({ includeDeclined: true })).toEqual(['e2', 'e4', 'e1', 'e3']);
  });

  it('matches the query against title, location and notes', () => {
    expect(ids({ query: 'ROOM' })).toEqual(['e1']);
    expect(ids({ query: ' budget ' })).toEqual(['e4']);
    expect(ids({ query: 'badge', includeDeclined: true })).toEqual(['e3']);
  });

  it.each<[SelectOptions['sort'], string[]]>([
    ['end', ['e4', 'e1', 'e2']],
    ['title', ['e4', 'e2', 'e1']],
    ['calendar', ['e2', 'e4', 'e1']],
  ])('sorts by %s', (sort, expected) => {
    expect(ids({ sort })).toEqual(expected);
  });

  it('applies the limit after sorting', () => {
    expect(ids({ limit: 2 })).toEqual(['e2', 'e4']);
    expect(ids({ limit: 0 })).toEqual(['e2', 'e4', 'e1']);
  });

  it('does not reorder the input', () => {
    selectEvents(events, { ...defaults, sort: 'title' });
    expect(events.map((event) => event.id)).toEqual(['e1', 'e2', 'e3', 'e4']);
  });
});

describe('sortCalendars', () => {
  it('orders by title, ignoring case', () => {
    const calendars = HelperCalendarSchema.array().parse([
      { id: '1', title: 'work', source: 's', type: 'local', allowsModifications: true },
      { id: '2', title: 'Birthdays', source: 's', type: 'birthday', allowsModifications: false },
      { id: '3', title: 'Home', source: 's', type: 'local', allowsModifications: true },
    ]);
    expect(sortCalendars(calendars).map((calendar) => calendar.title)).toEqual(['Birthdays', 'Home', 'work']);
  });
});
