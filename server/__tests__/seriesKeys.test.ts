import {
  chronologicalRank,
  compareKeys,
  extractDayKey,
  findTimeKey,
  referenceKey
} from '../utils/seriesKeys';

describe('findTimeKey', () => {
  it('finds and normalizes the first valid time', () => {
    expect(findTimeKey('at 9:05 today')).toEqual({ key: '09:05', index: 3, length: 4 });
    expect(findTimeKey('25:00 and 23:59')).toEqual({ key: '23:59', index: 10, length: 5 });
  });

  it('returns null without a time', () => {
    expect(findTimeKey('no time here')).toBeNull();
  });
});

describe('extractDayKey', () => {
  it('reads the first integer within the month', () => {
    expect(extractDayKey('15 - June')).toBe('15');
    expect(extractDayKey('Day 3')).toBe('3');
  });

  it('rejects out of range days', () => {
    expect(extractDayKey('0 June')).toBeNull();
    expect(extractDayKey('32')).toBeNull();
    expect(extractDayKey('30', 29)).toBeNull();
    expect(extractDayKey(null)).toBeNull();
  });
});

describe('chronological ordering', () => {
  it('ranks times by minutes and days by number', () => {
    expect(chronologicalRank('10:30')).toBe(630);
    expect(chronologicalRank('15')).toBe(15);
    expect(chronologicalRank('June')).toBeNull();
  });

  it('sorts day and time keys chronologically', () => {
    expect(['10', '2', '1'].sort(compareKeys)).toEqual(['1', '2', '10']);
    expect(['23:45', '00:15', '09:00'].sort(compareKeys)).toEqual(['00:15', '09:00', '23:45']);
  });
});

describe('referenceKey', () => {
  const timestamp = new Date(2024, 5, 15, 10, 30);

  it('derives keys from Date values', () => {
    expect(referenceKey(timestamp, 'monthly')).toBe('15');
    expect(referenceKey(timestamp, 'intraday')).toBe('10:30');
  });

  it('derives keys from timestamp strings', () => {
    expect(referenceKey('2024-06-15 10:30:00', 'intraday')).toBe('10:30');
    expect(referenceKey('2024-06-15', 'monthly')).toBe('15');
  });

  it('handles day numbers and labels', () => {
    expect(referenceKey(7, 'monthly')).toBe('7');
    expect(referenceKey('15 June', 'monthly')).toBe('15');
    expect(referenceKey(null, 'monthly')).toBeNull();
  });
});
