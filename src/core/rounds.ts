import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { extractRoundNumber, hasRoundMarker } from './parser';

dayjs.extend(utc);

/** Wordle #0 was played on this date. */
export const DEFAULT_ROUND_EPOCH = '2021-06-19';

export type RoundRef = {
  roundId: number;
  roundDate: string; // YYYY-MM-DD
};

/** Whole calendar days from `from` to `to`, both YYYY-MM-DD. */
export function daysBetween(from: string, to: string): number {
  // UTC midnights, so DST transitions never produce 23h or 25h days
  return dayjs.utc(to).diff(dayjs.utc(from), 'day');
}

/**
 * The summary posted on day D reports day D-1. Returns null when the text
 * carries a round number too large to store, or has none and the date falls
 * before the epoch.
 */
export function resolveRound(
  messageTimestamp: Date,
  corpus: string,
  epoch: string = DEFAULT_ROUND_EPOCH,
): RoundRef | null {
  const roundDate = dayjs(messageTimestamp).subtract(1, 'day').format('YYYY-MM-DD');

  if (hasRoundMarker(corpus)) {
    const fromText = extractRoundNumber(corpus);
    return fromText === null ? null : { roundId: fromText, roundDate };
  }

  const derived = daysBetween(epoch, roundDate);
  if (derived < 0) return null;
  return { roundId: derived, roundDate };
}
