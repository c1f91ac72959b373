import {
  assignDiscount,
  daysBetween,
  isBlackFriday,
  selectByLocation,
  selectByTenure,
  selectEveryone,
  selectForBlackFriday,
} from '../pure/assignmentRules';
import {NOW, customer, generalDiscount} from './fixtures';

describe('daysBetween', () => {
  it('counts calendar days regardless of the time of day', () => {
    expect(daysBetween(new Date(2025, 2, 10, 23, 30), new Date(2026, 2, 10, 0, 30))).toBe(365);
  });

  it('counts a DATE column value against today\'s calendar day', () => {
    // pg parses a DATE to local midnight
    expect(daysBetween(new Date(2025, 2, 11), new Date(2026, 2, 10, 12))).toBe(364);
  });
});

describe('selectByTenure', () => {
  const veteran = customer('veteran', {signupDate: new Date(2025, 2, 10)});
  const newcomer = customer('newcomer', {signupDate: new Date(2025, 2, 11)});

  it('selects customers signed up exactly a year ago', () => {
    expect(selectByTenure([veteran, newcomer], NOW)).toEqual([veteran]);
  });

  it('skips customers one day short of a year', () => {
    expect(selectByTenure([newcomer], NOW)).toEqual([]);
  });
});

describe('Black Friday', () => {
  const everyone = [customer('john_doe'), customer('jane_roe')];

  it('recognises November 24th in any year', () => {
    expect(isBlackFriday(new Date(2026, 10, 24, 9))).toBe(true);
    expect(isBlackFriday(new Date(2025, 10, 24, 23, 59, 59))).toBe(true);
  });

  it('covers the whole local calendar day', () => {
    expect(isBlackFriday(new Date(2026, 10, 24, 0, 30))).toBe(true);
    expect(isBlackFriday(new Date(2026, 10, 23, 23, 59, 59))).toBe(false);
    expect(isBlackFriday(new Date(2026, 10, 25, 0, 0, 1))).toBe(false);
  });

  it('selects everyone on Black Friday', () => {
    expect(selectForBlackFriday(everyone, new Date(2026, 10, 24, 9))).toEqual(everyone);
  });

  it('selects nobody on any other day', () => {
    expect(selectForBlackFriday(everyone, new Date(2026, 10, 23, 9))).toEqual([]);
  });
});

describe('selectByLocation', () => {
  it('matches the location regardless of case', () => {
    const lower = customer('a', {location: 'berlin'});
    const upper = customer('b', {location: 'BERLIN'});
    const elsewhere = customer('c', {location: 'paris'});

    expect(selectByLocation([lower, upper, elsewhere], 'Berlin')).toEqual([lower, upper]);
  });
});

describe('assignDiscount', () => {
  it('gives every selected customer their own copy', () => {
    const discount = generalDiscount(1, 0.1);
    const assignments = assignDiscount(selectEveryone([customer('john_doe'), customer('jane_roe')]), discount);

    expect(assignments.map(a => a.username)).toEqual(['john_doe', 'jane_roe']);
    expect(assignments[0].discount).toEqual(discount);
    expect(assignments[0].discount).not.toBe(discount);
    expect(assignments[0].discount).not.toBe(assignments[1].discount);
  });

  it('assigns nothing to an empty selection', () => {
    expect(assignDiscount([], generalDiscount(1, 0.1))).toEqual([]);
  });
});
