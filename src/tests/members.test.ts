import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getAlias, seedAliases, setAlias } from '../core/db';
import { ConfigError } from '../core/errors';
import { MemberDirectory, normalizeName } from '../core/members';
import { memoryDb } from './helpers';

describe('normalizeName', () => {
  it('lowercases, strips a leading @ and collapses whitespace', () => {
    expect(normalizeName('  @Zahir   Hassan ')).toBe('zahir hassan');
  });
});

describe('MemberDirectory', () => {
  let directory: MemberDirectory;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const db = memoryDb();
    setAlias(db, '@Nickname', '300');
    setAlias(db, 'ghost', '999');
    directory = new MemberDirectory(db);
    directory.setMembers('g1', [
      { id: '100', username: 'alice', displayName: 'Al' },
      { id: '101', username: 'alfred', displayName: 'Al' },
      { id: '300', username: 'carol', displayName: null },
    ]);
    directory.setMembers('g2', [{ id: '400', username: 'dave', displayName: 'Dave' }]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports the cache size per group', () => {
    expect(directory.size('g1')).toBe(3);
    expect(directory.size('missing')).toBe(0);
  });

  it('matches usernames case-insensitively', () => {
    expect(directory.resolveByDisplayName('ALICE', 'g1')).toEqual({ id: '100', username: 'alice', displayName: 'Al' });
  });

  it('leaves ambiguous display names unresolved', () => {
    expect(directory.resolveByDisplayName('al', 'g1')).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to the alias table and fills cached attributes', () => {
    expect(directory.resolveByDisplayName('@nickname', 'g1')).toEqual({ id: '300', username: 'carol', displayName: null });
  });

  it('returns a bare reference for aliases of uncached members', () => {
    expect(directory.resolveByDisplayName('Ghost', 'g1')).toEqual({ id: '999', username: null, displayName: null });
  });

  it('searches every group when no group is given', () => {
    expect(directory.resolveByDisplayName('dave', null)?.id).toBe('400');
    expect(directory.resolveByDisplayName('dave', 'g1')).toBeNull();
  });

  it('resolves mention tokens from any group', () => {
    expect(directory.resolveByMentionToken('400')).toEqual({ id: '400', username: 'dave', displayName: 'Dave' });
    expect(directory.resolveByMentionToken('555')).toEqual({ id: '555', username: null, displayName: null });
  });

  it('resolves nothing by name without a database or cache hit', () => {
    expect(new MemberDirectory().resolveByDisplayName('anyone', null)).toBeNull();
  });
});

describe('seedAliases', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'aliases-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes string mappings and skips the rest', () => {
    const file = path.join(dir, 'aliases.json');
    fs.writeFileSync(file, JSON.stringify({ anika: '77', blank: '', broken: 5 }));
    const db = memoryDb();
    expect(seedAliases(db, file)).toBe(1);
    expect(getAlias(db, 'anika')).toBe('77');
  });

  it('returns 0 when the file is absent', () => {
    expect(seedAliases(memoryDb(), path.join(dir, 'missing.json'))).toBe(0);
  });

  it('rejects a file that is not an object of mappings', () => {
    const file = path.join(dir, 'aliases.json');
    fs.writeFileSync(file, JSON.stringify(['anika', '77']));
    expect(() => seedAliases(memoryDb(), file)).toThrow(ConfigError);
  });
});
