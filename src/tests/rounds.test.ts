import { daysBetween, resolveRound } from '../core/rounds';

describe('daysBetween', () => {
  it('counts whole days across a month boundary', () => {
    expect(daysBetween('2021-06-19', '2021-09-27')).toBe(100);
  });

  it('is negative when the target precedes the start', () => {
    expect(daysBetween('2021-06-19', '2021-06-18')).toBe(-1);
  });
});

describe('resolveRound', () => {
  it('attributes the summary to the previous calendar day', () => {
    const round = resolveRound(new Date(2024, 2, 1, 8, 30), 'Wordle No. 985');
    expect(round).toEqual({ roundId: 985, roundDate: '2024-02-29' });
  });

  it('derives the round id from the epoch when the text has none', () => {
    // round date 2021-09-27 is epoch + 100 days
    expect(resolveRound(new Date(2021, 8, 28, 12), '3/6: <@1>')).toEqual({ roundId: 100, roundDate: '2021-09-27' });
  });

  it('gives round 0 on the epoch itself', () => {
    expect(resolveRound(new Date(2021, 5, 20, 12), '')).toEqual({ roundId: 0, roundDate: '2021-06-19' });
  });

  it('fails before the epoch', () => {
    expect(resolveRound(new Date(2021, 5, 19, 12), '3/6: <@1>')).toBeNull();
  });

  it('fails on a round number too large to store exactly', () => {
    expect(resolveRound(new Date(2024, 2, 15, 12), 'Wordle No. 9007199254740993\n3/6: <@1>')).toBeNull();
  });

  it('honours a custom epoch', () => {
    expect(resolveRound(new Date(2024, 0, 11, 12), '', '2024-01-01')).toEqual({ roundId: 9, roundDate: '2024-01-10' });
  });
});
