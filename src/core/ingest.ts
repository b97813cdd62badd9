import { insertRoundResult, upsertParticipant, type Db } from './db';
import { wrapStorage } from './errors';
import { buildCorpus, type IncomingMessage } from './extract';
import { createLogger } from './logger';
import { isResultMessage, parseResults, type ParsedRecord, type ParticipantResolver } from './parser';
import { DEFAULT_ROUND_EPOCH, resolveRound } from './rounds';

const log = createLogger('ingest');

export type IngestResult = {
  acceptedCount: number;
  rejectedCount: number;
};

export type MessageIngestResult = {
  ingested: boolean;
  acceptedResults: number;
  rejectedResults: number;
};

export type IngestOptions = {
  botNameToken?: string;
  roundEpoch?: string;
};

function notIngested(): MessageIngestResult {
  return { ingested: false, acceptedResults: 0, rejectedResults: 0 };
}

// Score = 8 - guesses; X = 1; no attempt = 0 (absent row).
export function computeScore(attemptCount: number, succeeded: boolean): number {
  return succeeded ? 8 - attemptCount : 1;
}

export function ingestRecords(db: Db, records: ParsedRecord[], roundId: number, roundDate: string): IngestResult {
  const result: IngestResult = { acceptedCount: 0, rejectedCount: 0 };

  // One transaction per record: a participant never lands without its result
  // attempt, and one duplicate does not roll back its neighbours.
  const ingestOne = wrapStorage('prepare ingest', () => db.transaction((record: ParsedRecord) => {
    upsertParticipant(db, record.participant);
    return insertRoundResult(db, {
      participantId: record.participant.id,
      roundId,
      roundDate,
      attemptCount: record.attemptCount,
      succeeded: record.succeeded,
      score: computeScore(record.attemptCount, record.succeeded),
      rawLine: record.rawLine,
    });
  }));

  for (const record of records) {
    const outcome = wrapStorage('ingest round result', () => ingestOne(record));
    if (outcome === 'inserted') {
      result.acceptedCount++;
    } else {
      result.rejectedCount++;
      log.info('duplicate result skipped', { participantId: record.participant.id, roundId, roundDate });
    }
  }
  return result;
}

/**
 * Full pipeline for one chat message. Anything that is not a usable results
 * summary comes back as `ingested: false`; only storage failures throw.
 */
export function ingestMessage(
  db: Db,
  message: IncomingMessage,
  resolver: ParticipantResolver,
  options: IngestOptions = {},
): MessageIngestResult {
  const corpus = buildCorpus(message);
  if (!isResultMessage(corpus, message.authorIsBot, message.authorName, options.botNameToken)) {
    return notIngested();
  }

  const records = parseResults(corpus, resolver, message.groupId);
  if (records.length === 0) {
    log.warn('results message yielded no parsable records', { messageId: message.id });
    return notIngested();
  }

  const round = resolveRound(message.createdAt, corpus, options.roundEpoch ?? DEFAULT_ROUND_EPOCH);
  if (!round) {
    log.warn('no valid round id for results message', { messageId: message.id, createdAt: message.createdAt.toISOString() });
    return notIngested();
  }

  const { acceptedCount, rejectedCount } = ingestRecords(db, records, round.roundId, round.roundDate);
  log.info('results message ingested', {
    messageId: message.id,
    roundId: round.roundId,
    roundDate: round.roundDate,
    accepted: acceptedCount,
    rejected: rejectedCount,
  });
  return { ingested: true, acceptedResults: acceptedCount, rejectedResults: rejectedCount };
}
