/** The parts of a rich embed that can carry result text. */
export type EmbedLike = {
  title?: string | null;
  description?: string | null;
  author?: { name?: string | null } | null;
  footer?: { text?: string | null } | null;
  fields?: ReadonlyArray<{ name?: string | null; value?: string | null }>;
};

/**
 * Platform-neutral view of a chat message. The Discord adapter in index.ts
 * builds one of these from a discord.js Message.
 */
export type IncomingMessage = {
  id: string;
  content: string;
  embeds: ReadonlyArray<EmbedLike>;
  authorName: string;
  authorIsBot: boolean;
  createdAt: Date;
  groupId: string | null;
};

// Body first, then every embed's surfaces in display order.
export function buildCorpus(message: Pick<IncomingMessage, 'content' | 'embeds'>): string {
  const parts: Array<string | null | undefined> = [message.content];
  for (const embed of message.embeds) {
    parts.push(embed.title, embed.description, embed.author?.name, embed.footer?.text);
    for (const field of embed.fields ?? []) {
      parts.push(field.name, field.value);
    }
  }
  return parts.filter((p): p is string => typeof p === 'string' && p.trim() !== '').join('\n');
}
