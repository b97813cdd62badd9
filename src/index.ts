import {
	ChannelType,
	Client,
	Events,
	GatewayIntentBits,
	PermissionFlagsBits,
	REST,
	Routes,
	SlashCommandBuilder,
	type ChatInputCommandInteraction,
	type Message,
	type TextChannel,
} from 'discord.js';
import cron from 'node-cron';
import dayjs from 'dayjs';
import path from 'node:path';
import { openDb, seedAliases, setAlias, listAliases } from './core/db';
import { loadEnv } from './core/env';
import { ingestMessage, type IngestOptions } from './core/ingest';
import { createLogger } from './core/logger';
import { MemberDirectory } from './core/members';
import { StatsEngine, parseWindow, type StatsWindow } from './core/stats';
import { renderAutoPostStatus, renderHelp, renderLeaderboard, renderPersonalStats } from './core/format';
import type { IncomingMessage } from './core/extract';

const env = loadEnv();
// dayjs and node-cron both read local time
process.env.TZ = env.TZ;
const log = createLogger('bot');

const db = openDb(path.resolve(env.DB_FILE));
const stats = new StatsEngine(db);
const members = new MemberDirectory(db);
const ingestOptions: IngestOptions = { botNameToken: env.WORDLE_BOT_NAME, roundEpoch: env.ROUND_EPOCH };

try {
	const seeded = seedAliases(db, path.join(process.cwd(), 'aliases.json'));
	if (seeded > 0) log.info(`Seeded ${seeded} aliases from aliases.json`);
} catch (err) {
	log.warn('Failed to seed aliases from aliases.json', { err });
}

const intents = [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers];
if (env.ENABLE_INGEST) {
	intents.push(GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent);
}
const client = new Client({ intents });

const PERIOD_CHOICES = [
	{ name: 'weekly', value: 'weekly' },
	{ name: 'monthly', value: 'monthly' },
	{ name: 'alltime', value: 'alltime' },
];

const commands = [
	new SlashCommandBuilder().setName('leaderboard').setDescription('Show the Wordle leaderboard')
		.addStringOption(o => o.setName('period').setDescription('weekly, monthly or alltime (default weekly)').addChoices(...PERIOD_CHOICES))
		.addIntegerOption(o => o.setName('limit').setDescription('Rows to show (default 10)').setMinValue(1).setMaxValue(25)),
	new SlashCommandBuilder().setName('mystats').setDescription('View your Wordle statistics')
		.addStringOption(o => o.setName('period').setDescription('weekly, monthly or alltime (default alltime)').addChoices(...PERIOD_CHOICES)),
	new SlashCommandBuilder().setName('backfill').setDescription('Backfill recent Wordle results from the tracked channel')
		.setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
		.addIntegerOption(o => o.setName('days').setDescription('How many days back to scan (default 7)').setMinValue(1).setMaxValue(60)),
	new SlashCommandBuilder().setName('post').setDescription('Post the weekly leaderboard in this channel'),
	new SlashCommandBuilder().setName('alias').setDescription('Manage aliases')
		.setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
		.addSubcommand(s => s.setName('set').setDescription('Set alias mapping')
			.addStringOption(o => o.setName('name').setDescription('Plain @name, e.g. @anika').setRequired(true))
			.addUserOption(o => o.setName('user').setDescription('Discord user').setRequired(true)))
		.addSubcommand(s => s.setName('list').setDescription('List aliases')),
	new SlashCommandBuilder().setName('status').setDescription('Show the weekly auto-post schedule'),
	new SlashCommandBuilder().setName('help').setDescription('Show bot commands and scoring'),
].map(c => c.toJSON());

async function registerCommands() {
	const rest = new REST({ version: '10' }).setToken(env.DISCORD_TOKEN);
	const appId = client.user?.id;
	if (!appId) throw new Error('Client user is not ready');
	await rest.put(Routes.applicationGuildCommands(appId, env.GUILD_ID), { body: commands });
}

async function buildMemberCache(guildId: string) {
	const guild = await client.guilds.fetch(guildId);
	const fetched = await guild.members.fetch();
	const count = members.setMembers(guildId, fetched.map((m) => ({
		id: m.id,
		username: m.user.username,
		displayName: m.displayName,
	})));
	log.info(`Cached ${count} guild members`, { guildId });
}

function toIncoming(message: Message): IncomingMessage {
	return {
		id: message.id,
		content: message.content,
		embeds: message.embeds,
		authorName: message.author.username,
		authorIsBot: message.author.bot,
		createdAt: message.createdAt,
		groupId: message.guildId,
	};
}

async function fetchTrackedChannel(): Promise<TextChannel | null> {
	const channel = await client.channels.fetch(env.CHANNEL_ID);
	return channel && channel.type === ChannelType.GuildText ? channel : null;
}

async function postWeeklyLeaderboard(channelId: string): Promise<boolean> {
	const channel = await client.channels.fetch(channelId);
	if (!channel || channel.type !== ChannelType.GuildText) {
		log.warn('Leaderboard channel not found or not a text channel', { channelId });
		return false;
	}
	const entries = stats.getLeaderboard('weekly', env.LEADERBOARD_LIMIT);
	await channel.send(renderLeaderboard('weekly', entries));
	return true;
}

function periodOption(interaction: ChatInputCommandInteraction, fallback: StatsWindow): StatsWindow | null {
	return parseWindow(interaction.options.getString('period'), fallback);
}

async function handleBackfill(interaction: ChatInputCommandInteraction) {
	if (!env.ENABLE_INGEST) {
		await interaction.reply({ content: 'Ingest is disabled. Set ENABLE_INGEST=true in .env and restart.', ephemeral: true });
		return;
	}
	if (!interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild)) {
		await interaction.reply({ content: 'You need Manage Server permission to run backfill.', ephemeral: true });
		return;
	}
	const days = interaction.options.getInteger('days') ?? 7;
	await interaction.deferReply({ ephemeral: true });

	const channel = await fetchTrackedChannel();
	if (!channel) {
		await interaction.editReply('Configured channel not found or not a text channel.');
		return;
	}
	await buildMemberCache(channel.guildId);

	const cutoff = dayjs().subtract(days, 'day').valueOf();
	let scanned = 0;
	let ingestedMessages = 0;
	let accepted = 0;
	let rejected = 0;
	let before: string | undefined;

	scan: while (true) {
		const batch = await channel.messages.fetch({ limit: 100, before });
		if (batch.size === 0) break;
		for (const msg of batch.values()) {
			if (msg.createdTimestamp < cutoff) break scan;
			scanned++;
			const result = ingestMessage(db, toIncoming(msg), members, ingestOptions);
			if (!result.ingested) continue;
			ingestedMessages++;
			accepted += result.acceptedResults;
			rejected += result.rejectedResults;
		}
		before = batch.last()?.id;
	}

	const summary = `Backfill complete in #${channel.name}: scanned ${scanned} messages, ${ingestedMessages} results messages, added ${accepted} results (${rejected} already recorded).`;
	log.info(summary);
	await interaction.editReply(summary);
}

async function handleCommand(interaction: ChatInputCommandInteraction) {
	if (interaction.commandName === 'leaderboard') {
		const period = periodOption(interaction, 'weekly');
		if (!period) {
			await interaction.reply({ content: 'Invalid period! Use: `weekly`, `monthly`, or `alltime`', ephemeral: true });
			return;
		}
		const limit = interaction.options.getInteger('limit') ?? env.LEADERBOARD_LIMIT;
		await interaction.reply(renderLeaderboard(period, stats.getLeaderboard(period, limit)));
		return;
	}
	if (interaction.commandName === 'mystats') {
		const period = periodOption(interaction, 'alltime');
		if (!period) {
			await interaction.reply({ content: 'Invalid period! Use: `weekly`, `monthly`, or `alltime`', ephemeral: true });
			return;
		}
		const userId = interaction.user.id;
		const text = renderPersonalStats(
			period,
			stats.getStats(userId, period),
			stats.getStreak(userId),
			stats.getRank(userId, period),
		);
		await interaction.reply({ content: text, ephemeral: true });
		return;
	}
	if (interaction.commandName === 'backfill') {
		await handleBackfill(interaction);
		return;
	}
	if (interaction.commandName === 'post') {
		await interaction.deferReply({ ephemeral: true });
		const posted = await postWeeklyLeaderboard(interaction.channelId);
		await interaction.editReply(posted ? '✅ Leaderboard posted!' : 'This channel cannot receive the leaderboard.');
		return;
	}
	if (interaction.commandName === 'status') {
		const text = renderAutoPostStatus({ enabled: env.AUTO_POST_ENABLED, cron: env.AUTO_POST_CRON, timezone: env.TZ });
		await interaction.reply({ content: text, ephemeral: true });
		return;
	}
	if (interaction.commandName === 'help') {
		await interaction.reply({ content: renderHelp(), ephemeral: true });
		return;
	}
	if (interaction.commandName === 'alias') {
		const sub = interaction.options.getSubcommand();
		if (sub === 'set') {
			const name = interaction.options.getString('name', true);
			const user = interaction.options.getUser('user', true);
			setAlias(db, name, user.id);
			await interaction.reply(`Mapped ${name} → <@${user.id}>`);
			return;
		}
		if (sub === 'list') {
			const all = listAliases(db);
			if (all.length === 0) { await interaction.reply('No aliases set.'); return; }
			const list = all.map(a => `@${a.alias} → <@${a.participantId}>`).join('\n');
			await interaction.reply('```\n' + list + '\n```');
			return;
		}
	}
}

client.once(Events.ClientReady, async () => {
	log.info(`Logged in as ${client.user?.tag}`);
	try {
		await registerCommands();
		log.info('Slash commands registered');
	} catch (err) {
		log.error('Failed to register slash commands', { err });
	}

	if (env.AUTO_POST_ENABLED) {
		cron.schedule(env.AUTO_POST_CRON, () => {
			log.info(`${dayjs().format('YYYY-MM-DD HH:mm')} posting weekly leaderboard`);
			postWeeklyLeaderboard(env.LEADERBOARD_POST_CHANNEL_ID).catch((err: unknown) => {
				log.error('Weekly leaderboard post failed', { err });
			});
		}, { timezone: env.TZ });
		log.info('Weekly leaderboard auto-post scheduled', { cron: env.AUTO_POST_CRON, timezone: env.TZ });
	}

	try {
		await buildMemberCache(env.GUILD_ID);
	} catch (err) {
		log.warn('Failed to build member cache. @name resolution will rely on aliases.', { err });
	}
});

client.on(Events.InteractionCreate, async (interaction) => {
	if (!interaction.isChatInputCommand()) return;
	try {
		await handleCommand(interaction);
	} catch (err) {
		log.error(`Error executing command ${interaction.commandName}`, { err });
		const content = 'Something went wrong while handling that command.';
		try {
			if (interaction.deferred || interaction.replied) await interaction.editReply(content);
			else await interaction.reply({ content, ephemeral: true });
		} catch (replyErr) {
			log.error('Could not report command failure', { err: replyErr });
		}
	}
});

if (env.ENABLE_INGEST) {
	client.on(Events.MessageCreate, (message) => {
		if (!message.guild || message.channelId !== env.CHANNEL_ID) return;
		try {
			const result = ingestMessage(db, toIncoming(message), members, ingestOptions);
			if (result.ingested) {
				log.info(`ingested ${result.acceptedResults} result(s), ${result.rejectedResults} duplicate(s)`, { messageId: message.id });
			}
		} catch (err) {
			log.error('Failed to store results message', { messageId: message.id, err });
		}
	});
}

client.login(env.DISCORD_TOKEN).catch((err: unknown) => {
	log.error('Discord login failed', { err });
	process.exit(1);
});
