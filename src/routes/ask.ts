/**
 * Question endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { AnswerPipeline } from '../services/pipeline.js';
import { AskRequestSchema } from '../types/models.js';
import { ValidationError } from '../types/errors.js';

export interface AskRoutesOptions {
  pipeline: Pick<AnswerPipeline, 'answer'>;
}

function parseQuestion(input: unknown): string {
  const parsed = AskRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid question');
  }
  return parsed.data.question;
}

export async function askRoutes(fastify: FastifyInstance, options: AskRoutesOptions) {
  // POST /ask - Main question endpoint
  fastify.post<{ Body: { question: string } }>(
    '/ask',
    {
      schema: {
        description: 'Answer a natural language question about the inventory',
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength: 500 },
          },
          required: ['question'],
        },
      },
    },
    async (request) => {
      const question = parseQuestion(request.body);
      return options.pipeline.answer(question);
    }
  );

  // GET /ask - Convenience endpoint
  fastify.get<{ Querystring: { q: string } }>(
    '/ask',
    {
      schema: {
        description: 'Answer a natural language question (GET)',
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string' },
          },
          required: ['q'],
        },
      },
    },
    async (request) => {
      const question = parseQuestion({ question: request.query.q });
      return options.pipeline.answer(question);
    }
  );
}
