import { getAlias, type Db } from './db';
import { createLogger } from './logger';
import type { ParticipantRef, ParticipantResolver } from './parser';

const log = createLogger('alias');

export type MemberLite = {
  id: string;
  username: string;
  displayName: string | null;
};

type CachedMember = MemberLite & { normDisplay: string; normUsername: string };

export function normalizeName(input: string): string {
  return input.trim().toLowerCase().replace(/^@/, '').replace(/\s+/g, ' ');
}

function toRef(m: MemberLite): ParticipantRef {
  return { id: m.id, username: m.username, displayName: m.displayName };
}

/**
 * Per-group member cache that answers identity lookups for the parser.
 * Bare @names match a username or display name, then the alias table.
 */
export class MemberDirectory implements ParticipantResolver {
  private readonly groups = new Map<string, Map<string, CachedMember>>();

  constructor(private readonly db: Db | null = null) {}

  setMembers(groupId: string, members: Iterable<MemberLite>): number {
    const cache = new Map<string, CachedMember>();
    for (const m of members) {
      cache.set(m.id, {
        ...m,
        normDisplay: normalizeName(m.displayName ?? ''),
        normUsername: normalizeName(m.username),
      });
    }
    this.groups.set(groupId, cache);
    return cache.size;
  }

  size(groupId: string): number {
    return this.groups.get(groupId)?.size ?? 0;
  }

  private scope(groupId: string | null): CachedMember[] {
    if (groupId !== null) return Array.from(this.groups.get(groupId)?.values() ?? []);
    return Array.from(this.groups.values()).flatMap((g) => Array.from(g.values()));
  }

  private findById(id: string, groupId: string | null): CachedMember | undefined {
    return this.scope(groupId).find((m) => m.id === id) ?? this.scope(null).find((m) => m.id === id);
  }

  resolveByMentionToken(token: string): ParticipantRef {
    const member = this.findById(token, null);
    return member ? toRef(member) : { id: token, username: null, displayName: null };
  }

  resolveByDisplayName(name: string, groupId: string | null): ParticipantRef | null {
    const key = normalizeName(name);
    if (!key) return null;

    const matches = this.scope(groupId).filter((m) => m.normUsername === key || m.normDisplay === key);
    const [only] = matches;
    if (only && matches.length === 1) return toRef(only);
    if (matches.length > 1) {
      log.warn('ambiguous member name', { name, groupId, candidates: matches.map((m) => m.id) });
      return null;
    }

    if (!this.db) return null;
    const aliased = getAlias(this.db, key);
    if (!aliased) return null;
    const member = this.findById(aliased, groupId);
    return member ? toRef(member) : { id: aliased, username: null, displayName: null };
  }
}
