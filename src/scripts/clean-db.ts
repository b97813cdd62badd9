import path from 'node:path';
import { countRows, openDb, type Db } from '../core/db';
import { createLogger } from '../core/logger';

const log = createLogger('db:clean');

export type CleanFlags = {
	keepPlayers: boolean;
	dropAliases: boolean;
	vacuum: boolean;
};

export function parseFlags(argv: string[]): CleanFlags {
	const flags = new Set(argv);
	return {
		keepPlayers: flags.has('--keep-players'),
		dropAliases: flags.has('--drop-aliases'),
		vacuum: flags.has('--vacuum'),
	};
}

function snapshot(db: Db) {
	return {
		results: countRows(db, 'round_results'),
		participants: countRows(db, 'participants'),
		aliases: countRows(db, 'aliases'),
	};
}

export function cleanDb(db: Db, { keepPlayers, dropAliases, vacuum }: CleanFlags) {
	const before = snapshot(db);

	// results before participants, for the foreign key
	db.transaction(() => {
		db.exec('DELETE FROM round_results');
		if (!keepPlayers) db.exec('DELETE FROM participants');
		// aliases.json is re-seeded on the next bot start
		if (dropAliases) db.exec('DELETE FROM aliases');
	})();

	if (vacuum) db.exec('VACUUM');

	return { before, after: snapshot(db) };
}

function main() {
	const flags = parseFlags(process.argv.slice(2));
	const db = openDb(path.resolve(process.env.DB_FILE || 'data.sqlite'));
	const { before, after } = cleanDb(db, flags);
	log.info('Before', before);
	log.info('After', after);
	log.info('Done', { participantsCleared: !flags.keepPlayers, aliasesCleared: flags.dropAliases });
	db.close();
}

if (require.main === module) {
	try {
		main();
	} catch (err) {
		log.error('Clean failed', { err });
		process.exit(1);
	}
}
