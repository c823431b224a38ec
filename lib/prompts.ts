/**
 * Prompt construction for the completion service
 *
 * Each variant is a PromptTemplate value rather than a subclass: the role
 * line, audience paragraph, task list and output example are all looked up
 * from PROMPT_TEMPLATES and filled from a PromptContext.
 */

import type { PromptVariant } from './types';
import { ConfigError } from './errors';
import { sanitizeId } from './projector';

export interface PromptContext {
  interests: string[];
  feedId?: string;
  feedTitle?: string;
  primaryInterest?: string;
  userName?: string;
  userFocus?: string;
}

export interface BuildPromptInput extends PromptContext {
  variant: PromptVariant;
  textBlob: string;
}

interface InsightField {
  name: string;
  hint: string;
}

export interface PromptTemplate {
  variant: PromptVariant;
  shape: 'enriched' | 'player';
  role: (ctx: PromptContext) => string;
  audience: (ctx: PromptContext) => string;
  tasks: (ctx: PromptContext) => string[];
  feedId: (ctx: PromptContext) => string;
  feedTitle: (ctx: PromptContext) => string;
  insightFields: (ctx: PromptContext) => InsightField[];
}

const JSON_ONLY_INSTRUCTION =
  'IMPORTANT: Return ONLY valid JSON with no additional text or explanation. Do not wrap it in a code block or add any preamble.';

const ENRICHMENT_TASKS = [
  'A precise but engaging description that captures the key points',
  'Technical elements and concepts covered with their relevance score',
  'A short precision summary (1-3 sentences)',
];

function interestList(interests: string[]): string {
  if (interests.length === 0) {
    return '- (no specific interests given)';
  }
  return interests.map(interest => `- ${interest}`).join('\n');
}

function requireValue(value: string | undefined, what: string, variant: PromptVariant): string {
  if (!value) {
    throw new ConfigError(`The ${variant} prompt requires ${what}`);
  }
  return value;
}

export function userInsightField(userName: string): string {
  return `${sanitizeId(userName).replace(/-/g, '_')}_relevance`;
}

export const PROMPT_TEMPLATES: Record<PromptVariant, PromptTemplate> = {
  curated: {
    variant: 'curated',
    shape: 'enriched',
    role: () =>
      'You are a podcast curation agent that identifies relevant episodes from podcast feeds and returns JSON content for use in a simple media player.',
    audience: ctx => `This user is interested in the following topics:\n${interestList(ctx.interests)}`,
    tasks: () => [
      'Below is a mix of episodes from multiple podcast feeds. Extract relevant ones and enhance them.',
      'Craft the JSON output with attention to where topics intersect with these interests or themes, and note intersections where appropriate in the `curator_insight` field.',
    ],
    feedId: ctx => ctx.feedId || 'curated-feed',
    feedTitle: ctx => ctx.feedTitle || 'Curated Podcast Feed',
    insightFields: () => [
      { name: 'preference_match', hint: 'true/false' },
      { name: 'curator_insight', hint: '"Why this might interest the user"' },
    ],
  },

  focused: {
    variant: 'focused',
    shape: 'enriched',
    role: () =>
      'You are a podcast curation agent that identifies relevant episodes from podcast feeds and returns JSON content for a media player.',
    audience: ctx =>
      `This feed is focused primarily on ${ctx.primaryInterest || 'the topics below'}, with these additional interests:\n${interestList(ctx.interests)}`,
    tasks: () => [
      'Below is a mix of episodes from multiple podcast feeds. Extract the most relevant ones and enhance them.',
      `For each episode, provide:\n${[...ENRICHMENT_TASKS, 'Why this content matches the primary interest and any additional interests']
        .map((task, index) => `${index + 1}. ${task}`)
        .join('\n')}`,
    ],
    feedId: ctx => ctx.feedId || 'focused-feed',
    feedTitle: ctx => ctx.feedTitle || 'Focused Podcast Feed',
    insightFields: () => [
      { name: 'relevance_match', hint: '"How this content matches the primary and additional interests"' },
    ],
  },

  personalized: {
    variant: 'personalized',
    shape: 'enriched',
    role: ctx =>
      `You are a podcast curation agent that identifies relevant episodes from podcast feeds and returns JSON content for use in ${requireValue(ctx.userName, 'a user name', 'personalized')}'s personal media player.`,
    audience: ctx => {
      const userName = requireValue(ctx.userName, 'a user name', 'personalized');
      const focus = ctx.userFocus ? `\n\n${userName} is particularly interested in ${ctx.userFocus}.` : '';
      return `This feed is being created specifically for ${userName}, who is interested in:\n${interestList(ctx.interests)}${focus}`;
    },
    tasks: ctx => {
      const userName = requireValue(ctx.userName, 'a user name', 'personalized');
      return [
        `Below is a mix of episodes from multiple podcast feeds. Extract the most relevant ones for ${userName} and enhance them.`,
        `For each episode, provide:\n${[...ENRICHMENT_TASKS, `Why this might be interesting to ${userName} specifically`]
          .map((task, index) => `${index + 1}. ${task}`)
          .join('\n')}`,
      ];
    },
    feedId: ctx => ctx.feedId || `${sanitizeId(requireValue(ctx.userName, 'a user name', 'personalized'))}-feed`,
    feedTitle: ctx => ctx.feedTitle || `${requireValue(ctx.userName, 'a user name', 'personalized')}'s Podcast Feed`,
    insightFields: ctx => [
      {
        name: userInsightField(requireValue(ctx.userName, 'a user name', 'personalized')),
        hint: `"Why this is specifically relevant to ${ctx.userName}'s interests"`,
      },
    ],
  },

  player: {
    variant: 'player',
    shape: 'player',
    role: () =>
      'You are a podcast curation agent that processes podcast feeds into a specific JSON format for an audio player.',
    audience: ctx =>
      `The feed is focused on ${ctx.primaryInterest || 'the topics below'}, with these additional interests:\n${interestList(ctx.interests)}`,
    tasks: () => [
      'Below is a mix of episodes from podcast feeds. Extract the relevant ones and format them according to these exact requirements:',
      [
        '1. Each feed must have an "id", "title", and "tracks" array',
        '2. Each track must have an "id", "title", and "audioUrl"',
        '3. Tracks can optionally have "description" and "albumArt"',
        '4. The output structure must follow this exact format - do not add any additional fields',
      ].join('\n'),
    ],
    feedId: ctx => requireValue(ctx.feedId, 'a feed id', 'player'),
    feedTitle: ctx => requireValue(ctx.feedTitle, 'a feed title', 'player'),
    insightFields: () => [],
  },
};

function renderEnrichedExample(feedId: string, feedTitle: string, insightFields: InsightField[]): string {
  const enrichmentLines = [
    '"precision_summary": "2-3 sentence focused summary"',
    `"technical_elements": [\n              {"concept": "relevant technical concept", "relevance": 0.0-1.0}\n            ]`,
    '"content_density": "LOW/MEDIUM/HIGH"',
    '"confidence_score": 0.0-1.0',
    ...insightFields.map(field => `"${field.name}": ${field.hint}`),
  ];

  return `{
  "feeds": [
    {
      "id": ${JSON.stringify(feedId)},
      "title": ${JSON.stringify(feedTitle)},
      "tracks": [
        {
          "id": "episode_id",
          "title": "Episode Title",
          "description": "Enhanced description with key points",
          "audioUrl": "media_url",
          "date_iso": "ISO-formatted date",
          "runtime_minutes": minutes,
          "enrichment": {
            ${enrichmentLines.join(',\n            ')}
          }
        }
      ]
    }
  ]
}`;
}

function renderPlayerExample(feedId: string, feedTitle: string): string {
  return `{
  "feeds": [
    {
      "id": ${JSON.stringify(feedId)},
      "title": ${JSON.stringify(feedTitle)},
      "tracks": [
        {
          "id": "track-id",
          "title": "Episode Title",
          "audioUrl": "media_url",
          "description": "Episode description",
          "albumArt": "image_url"
        }
      ]
    }
  ]
}`;
}

export function renderOutputExample(variant: PromptVariant, ctx: PromptContext): string {
  const template = PROMPT_TEMPLATES[variant];
  const feedId = template.feedId(ctx);
  const feedTitle = template.feedTitle(ctx);

  return template.shape === 'player'
    ? renderPlayerExample(feedId, feedTitle)
    : renderEnrichedExample(feedId, feedTitle, template.insightFields(ctx));
}

export function buildPrompt(input: BuildPromptInput): string {
  const { variant, textBlob, ...ctx } = input;
  const template = PROMPT_TEMPLATES[variant];

  const sections = [
    template.role(ctx),
    template.audience(ctx),
    ...template.tasks(ctx),
    JSON_ONLY_INSTRUCTION,
    `Return structured JSON in this EXACT format, using the keys "feeds", "id", "title" and "tracks" exactly as shown:\n${renderOutputExample(variant, ctx)}`,
    `FEED CONTENT:\n${textBlob}`,
  ];

  return sections.join('\n\n');
}
