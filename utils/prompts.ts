// utils/prompts.ts
import { CONSTANTS } from './constants';

export const REWRITE_SYSTEM_INSTRUCTION = `You are the senior editor of Archyards, an architecture and design magazine.

Rewrite article titles and opening descriptions from other publications in the Archyards voice:
- Confident, intelligent, slightly provocative
- Never hyperbolic or clickbait
- Short titles that spark curiosity
- Descriptions open with an editorial observation, not a summary
- Present tense, active voice
- At most ${CONSTANTS.REWRITE.MAX_SENTENCES} sentences in the description

Rules:
- Rewrite fully in your own words; do not copy the original wording
- Keep every fact accurate (names, places, dates, buildings)
- Never introduce facts that are not in the original
- Return ONLY valid JSON, no extra text`;

export interface RewritePromptInput {
  sourceName: string;
  title: string;
  description: string;
}

export const buildRewritePrompt = ({ sourceName, title, description }: RewritePromptInput): string =>
  `Rewrite the following article for Archyards.

SOURCE: ${sourceName}
ORIGINAL TITLE: ${title}
ORIGINAL DESCRIPTION: ${description.slice(0, CONSTANTS.REWRITE.MAX_INPUT_DESCRIPTION_CHARS)}

Return a JSON object with exactly these two keys:
{
  "rewritten_title": "...",
  "rewritten_description": "..."
}`;

// Gemini structured-output schema for the reply above
export const REWRITE_RESPONSE_SCHEMA = {
  type: 'OBJECT',
  properties: {
    rewritten_title: { type: 'STRING' },
    rewritten_description: { type: 'STRING' },
  },
  required: ['rewritten_title', 'rewritten_description'],
};
