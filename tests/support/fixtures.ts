import type { KeywordTable } from '#patchbot/ai/patch/keyword-table.js';
import type { SchemaDocument, ValueDocument } from '#patchbot/ai/patch/types.js';

export const chatSchema: SchemaDocument = {
  type: 'object',
  additionalProperties: false,
  properties: {
    messageHistoryLimit: { type: 'integer', minimum: 0, maximum: 10000 },
    profanityFilter: { type: 'boolean' },
    resources: {
      type: 'object',
      properties: {
        memory: {
          type: 'object',
          properties: {
            limitMiB: { type: 'integer', minimum: 64, maximum: 8192 },
          },
        },
      },
    },
    envs: { type: 'object', additionalProperties: { type: 'string' } },
  },
};

export const tournamentSchema: SchemaDocument = {
  type: 'object',
  properties: {
    maxParticipants: { type: 'integer', minimum: 2, maximum: 1024 },
    seeding: { type: 'boolean' },
  },
};

export function chatValues(): ValueDocument {
  return {
    messageHistoryLimit: 200,
    profanityFilter: true,
    resources: { memory: { limitMiB: 256 } },
    envs: { REGION: 'eu' },
  };
}

export function tournamentValues(): ValueDocument {
  return { maxParticipants: 64, seeding: true };
}

export const keywordTable: KeywordTable = {
  services: {
    chat: { keywords: ['chat', 'message history'], exclude: [] },
    tournament: { keywords: ['tournament', 'bracket'], exclude: [] },
  },
};
