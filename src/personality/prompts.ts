import type { PersonalityMode } from '../config.js';
import type { Category } from '../state/records.js';

// ============================================================================
// Postloop: Personality & Prompt Templates
// ============================================================================

export const promptTemplates: Record<Category, readonly string[]> = {
    anime: [
        'share a hot take about a popular anime',
        'recommend an underrated anime that deserves more love',
        'complain about a common anime trope in a funny way',
        'describe what its like waiting for your favorite anime to get a new season',
        'make a joke about anime fans',
    ],
    gaming: [
        'share a gaming opinion thatll start arguments',
        'describe a frustrating gaming moment everyone can relate to',
        'recommend an indie game people are sleeping on',
        'make fun of a gaming trend',
        'share a nostalgic gaming memory',
    ],
    tech: [
        'complain about a tech problem everyone deals with',
        'share a hot take about a popular tech product',
        'joke about programmers or tech workers',
        'share a tech tip in a casual way',
        'make fun of tech hype',
    ],
};

export const personalityPrompts: Record<PersonalityMode, string> = {
    chill: 'Write in a relaxed, casual tone. Be friendly but not too excited. Use lowercase mostly.',
    hyped: 'Write with energy and enthusiasm! Use caps sometimes, emojis are okay. Be fun!',
    shitpost: 'Write in an ironic, slightly unhinged way. Be absurd but still coherent. very lowercase, questionable grammar is a vibe',
};

export const hashtags: Record<Category, readonly string[]> = {
    anime: ['#anime', '#weeb', '#otaku', '#animememes'],
    gaming: ['#gaming', '#gamer', '#videogames', '#indiegames'],
    tech: ['#tech', '#programming', '#coding', '#developer'],
};

/** NewsAPI `q` parameter per category. */
export const newsQueries: Record<Category, string> = {
    anime: 'anime',
    gaming: 'video games',
    tech: 'technology',
};

export const MAX_POST_LENGTH = 280;

export function buildSystemPrompt(category: Category, personality: PersonalityMode): string {
    return [
        `You are a twitter account that posts about ${category}.`,
        personalityPrompts[personality],
        'Keep it under 250 characters. Dont use quotes around the tweet. Just output the tweet text, nothing else.',
    ].join(' ');
}

export function buildHeadlinePrompt(headline: string): string {
    return `react to this headline in your own words, like you just saw it on your feed: "${headline}"`;
}
