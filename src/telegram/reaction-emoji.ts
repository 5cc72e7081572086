import type { ReactionTypeEmoji } from 'grammy/types';
import reactionEmojiList from './reaction-emoji.json';

export type ReactionEmoji = ReactionTypeEmoji['emoji'];

// emoji the Bot API accepts in ReactionTypeEmoji
const reactionEmoji: ReadonlySet<string> = new Set(reactionEmojiList);

export const isReactionEmoji = (value: string): value is ReactionEmoji =>
    reactionEmoji.has(value);
