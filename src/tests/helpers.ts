import { openDb, type Db } from '../core/db';
import type { IncomingMessage } from '../core/extract';
import type { ParsedRecord } from '../core/parser';

export function memoryDb(): Db {
  return openDb(':memory:');
}

export function silenceLogs(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

export function record(id: string, attemptCount: number, succeeded = true): ParsedRecord {
  return {
    participant: { id, username: `user${id}`, displayName: null },
    attemptCount,
    succeeded,
    rawLine: `<@${id}> ${succeeded ? attemptCount : 'X'}/6`,
  };
}

export function message(overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    id: 'msg-1',
    content: '',
    embeds: [],
    authorName: 'Wordle',
    authorIsBot: true,
    createdAt: new Date(2024, 2, 15, 12, 0, 0),
    groupId: 'guild-1',
    ...overrides,
  };
}
