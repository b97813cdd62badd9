export type ParticipantRef = {
  id: string;
  username: string | null;
  displayName: string | null;
};

/**
 * Identity lookup used while parsing. Mention tokens always name a concrete
 * account; bare @names may not match anyone in the group.
 */
export interface ParticipantResolver {
  resolveByMentionToken(token: string): ParticipantRef;
  resolveByDisplayName(name: string, groupId: string | null): ParticipantRef | null;
}

export type ParsedRecord = {
  participant: ParticipantRef;
  attemptCount: number;
  succeeded: boolean;
  rawLine: string;
};

// Curly or straight apostrophe, optional trailing colon.
const RESULTS_HEADER = /here are yesterday[’'‘`ʼ]s results:?/i;
// "Wordle No. 1234", "Wordle No 1234", "Wordle No.: 1,234", "Wordle #1234"
const ROUND_MARKER = /wordle\s*(?:no\s*[.:#]*|#)\s*(\d{1,3}(?:,\d{3})+|\d+)/i;
const ATTEMPT_TOKEN = /(?<!\d)([0-6X])\/6(?!\d)/i;
const ATTEMPT_TOKEN_GLOBAL = /(?<!\d)([0-6X])\/6(?!\d)/gi;
const MENTION_GLOBAL = /<@!?([0-9]+)>/g;
// Plain @name tokens run until the next @ or line break ("@Zahir Hassan")
const PLAIN_AT_GLOBAL = /@([^@\n]+)/g;
const CROWN_LINE_PREFIX = /^\s*👑\s*/u;

export const FAILED_ATTEMPT_COUNT = 6;

export function isResultMessage(
  corpus: string,
  authorIsBot: boolean,
  authorName: string,
  botNameToken = 'wordle',
): boolean {
  if (!corpus) return false;
  if (RESULTS_HEADER.test(corpus) && ROUND_MARKER.test(corpus)) return true;
  // Embed-only deliveries may lack the header; trust the bot plus a score token.
  return (
    authorIsBot &&
    authorName.toLowerCase().includes(botNameToken.toLowerCase()) &&
    ATTEMPT_TOKEN.test(corpus)
  );
}

export function hasRoundMarker(corpus: string): boolean {
  return ROUND_MARKER.test(corpus);
}

/** Null without a marker, or when the number cannot be held exactly. */
export function extractRoundNumber(corpus: string): number | null {
  const m = ROUND_MARKER.exec(corpus);
  if (!m?.[1]) return null;
  const n = Number(m[1].replace(/,/g, ''));
  return Number.isSafeInteger(n) ? n : null;
}

export function parseAttempt(line: string): { attemptCount: number; succeeded: boolean } | null {
  const m = ATTEMPT_TOKEN.exec(line);
  if (!m?.[1]) return null;
  if (m[1].toUpperCase() === 'X') {
    return { attemptCount: FAILED_ATTEMPT_COUNT, succeeded: false };
  }
  return { attemptCount: Number(m[1]), succeeded: true };
}

function cleanName(raw: string): string {
  return raw.trim().replace(/[\s,;:!.)]+$/, '');
}

/**
 * "@Zahir Hassan (new!)" should still find "Zahir Hassan": try the longest
 * run of leading words that resolves.
 */
function resolvePlainName(
  raw: string,
  resolver: ParticipantResolver,
  groupId: string | null,
): ParticipantRef | null {
  const words = cleanName(raw).split(/\s+/).filter(Boolean);
  for (let n = words.length; n > 0; n--) {
    const candidate = cleanName(words.slice(0, n).join(' '));
    if (!candidate) continue;
    const ref = resolver.resolveByDisplayName(candidate, groupId);
    if (ref) return ref;
  }
  return null;
}

function participantsOnLine(
  line: string,
  resolver: ParticipantResolver,
  groupId: string | null,
): ParticipantRef[] {
  const mentions = Array.from(line.matchAll(MENTION_GLOBAL), (m) => m[1] ?? '').filter(Boolean);
  if (mentions.length > 0) {
    return mentions.map((id) => resolver.resolveByMentionToken(id));
  }

  // Drop score tokens so "@bob 3/6" does not read as a name "bob 3/6".
  const withoutScores = line.replace(ATTEMPT_TOKEN_GLOBAL, ' ');
  const refs: ParticipantRef[] = [];
  for (const m of withoutScores.matchAll(PLAIN_AT_GLOBAL)) {
    const ref = resolvePlainName(m[1] ?? '', resolver, groupId);
    if (ref) refs.push(ref);
  }
  return refs;
}

export function parseResults(
  corpus: string,
  resolver: ParticipantResolver,
  groupId: string | null = null,
): ParsedRecord[] {
  if (!corpus) return [];
  const records: ParsedRecord[] = [];

  for (const line of corpus.split(/\r?\n/)) {
    const s = line.trim().replace(CROWN_LINE_PREFIX, '');
    const attempt = parseAttempt(s);
    if (!attempt) continue;

    for (const participant of participantsOnLine(s, resolver, groupId)) {
      records.push({ participant, ...attempt, rawLine: line.trim() });
    }
  }
  return records;
}
