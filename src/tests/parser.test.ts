import { MemberDirectory } from '../core/members';
import { extractRoundNumber, isResultMessage, parseAttempt, parseResults } from '../core/parser';

describe('isResultMessage', () => {
  it('detects the straight-apostrophe header with a trailing colon', () => {
    expect(isResultMessage("Here are yesterday's results:\nWordle No. 1234", false, 'someone')).toBe(true);
  });

  it('detects the curly-apostrophe header without a colon', () => {
    expect(isResultMessage('Here are yesterday’s results\nWordle No. 1234', false, 'someone')).toBe(true);
  });

  it('ignores case in the header and the round marker', () => {
    expect(isResultMessage('HERE ARE YESTERDAY\'S RESULTS wordle no 77', false, 'someone')).toBe(true);
  });

  it('rejects the header without a round marker or bot fallback', () => {
    expect(isResultMessage("Here are yesterday's results:\n3/6: <@1>", false, 'someone')).toBe(false);
  });

  it('falls back to a bot author with a score token', () => {
    expect(isResultMessage('👑 3/6: <@1>', true, 'Wordle')).toBe(true);
  });

  it('requires the bot name token for the fallback', () => {
    expect(isResultMessage('👑 3/6: <@1>', true, 'Scorekeeper')).toBe(false);
  });

  it('requires an automated sender for the fallback', () => {
    expect(isResultMessage('👑 3/6: <@1>', false, 'Wordle')).toBe(false);
  });

  it('requires a score token for the fallback', () => {
    expect(isResultMessage('Your group is on a 4 day streak!', true, 'Wordle')).toBe(false);
  });

  it('accepts a custom bot name token', () => {
    expect(isResultMessage('X/6: <@1>', true, 'Daily Puzzle Bot', 'puzzle')).toBe(true);
  });

  it('returns false for an empty corpus', () => {
    expect(isResultMessage('', true, 'Wordle')).toBe(false);
  });
});

describe('extractRoundNumber', () => {
  it.each([
    ['Wordle No. 1234', 1234],
    ['Wordle No 1234', 1234],
    ['wordle no.1234', 1234],
    ['Wordle No.: 1234', 1234],
    ['Wordle #1,234', 1234],
  ])('reads %s', (text, expected) => {
    expect(extractRoundNumber(text)).toBe(expected);
  });

  it('returns null without a marker', () => {
    expect(extractRoundNumber('3/6: <@1>')).toBeNull();
  });

  it('rejects numbers beyond exact integer range', () => {
    expect(extractRoundNumber('Wordle No. 9007199254740991')).toBe(9007199254740991);
    expect(extractRoundNumber('Wordle No. 9007199254740993')).toBeNull();
  });
});

describe('parseAttempt', () => {
  it('maps the failure marker to six failed attempts', () => {
    expect(parseAttempt('<@7> X/6')).toEqual({ attemptCount: 6, succeeded: false });
    expect(parseAttempt('<@7> x/6')).toEqual({ attemptCount: 6, succeeded: false });
  });

  it('treats any digit from 0 to 6 as a completed round', () => {
    expect(parseAttempt('0/6')).toEqual({ attemptCount: 0, succeeded: true });
    expect(parseAttempt('6/6')).toEqual({ attemptCount: 6, succeeded: true });
  });

  it('takes the first token on the line', () => {
    expect(parseAttempt('2/6 then 5/6')).toEqual({ attemptCount: 2, succeeded: true });
  });

  it('ignores out-of-range and multi-digit counts', () => {
    expect(parseAttempt('<@1> 7/6')).toBeNull();
    expect(parseAttempt('<@1> 10/6')).toBeNull();
    expect(parseAttempt('<@1> 3/60')).toBeNull();
  });
});

describe('parseResults', () => {
  let directory: MemberDirectory;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    directory = new MemberDirectory();
    directory.setMembers('guild-1', [
      { id: '100', username: 'alice', displayName: 'Alice A' },
      { id: '200', username: 'zahir', displayName: 'Zahir Hassan' },
    ]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('emits one record per mention and keeps the raw line', () => {
    const records = parseResults('👑 2/6: <@1> <@!2>', directory, 'guild-1');
    expect(records).toEqual([
      { participant: { id: '1', username: null, displayName: null }, attemptCount: 2, succeeded: true, rawLine: '👑 2/6: <@1> <@!2>' },
      { participant: { id: '2', username: null, displayName: null }, attemptCount: 2, succeeded: true, rawLine: '👑 2/6: <@1> <@!2>' },
    ]);
  });

  it('fills display attributes for cached members mentioned by id', () => {
    const [only] = parseResults('<@100> 4/6', directory, 'guild-1');
    expect(only?.participant).toEqual({ id: '100', username: 'alice', displayName: 'Alice A' });
  });

  it('resolves bare names, including names with spaces', () => {
    const records = parseResults('4/6: @Alice A @Zahir Hassan', directory, 'guild-1');
    expect(records.map((r) => [r.participant.id, r.attemptCount])).toEqual([
      ['100', 4],
      ['200', 4],
    ]);
  });

  it('does not read the score into a bare name', () => {
    const records = parseResults('@alice 5/6 nice', directory, 'guild-1');
    expect(records.map((r) => r.participant.id)).toEqual(['100']);
  });

  it('prefers mention tokens over bare names on the same line', () => {
    const records = parseResults('3/6: <@9> @alice', directory, 'guild-1');
    expect(records.map((r) => r.participant.id)).toEqual(['9']);
  });

  it('skips unresolvable names and lines missing a score or a participant', () => {
    const corpus = ["Here are yesterday's results:", '3/6: @nobody', '<@5> did not play', '6/6:', 'X/6: <@6>'].join('\n');
    const records = parseResults(corpus, directory, 'guild-1');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ participant: { id: '6' }, attemptCount: 6, succeeded: false });
  });

  it('scopes bare-name lookups to the message group', () => {
    expect(parseResults('3/6: @alice', directory, 'guild-2')).toEqual([]);
  });

  it('returns nothing for an empty corpus', () => {
    expect(parseResults('', directory)).toEqual([]);
  });
});
