import { Hono } from 'hono';
import type { AnswerGenerator, Requester } from '../../agent/answer-generator.js';
import { AGENT_NAME } from '../../agent/prompts.js';
import { AskRequestSchema } from '../schemas.js';
import { parseJsonBody } from '../errors.js';
import * as log from '../../utils/logger.js';

export interface AnswerResult {
  question: string;
  answer: string;
  timestamp: string;
}

export function agentRoutes(generator: AnswerGenerator): Hono {
  const app = new Hono();

  app.post('/ask', async c => {
    const body = await parseJsonBody(c, AskRequestSchema);
    if (!body.ok) return body.response;

    const { question, user_name, user_id } = body.data;
    log.info(`Received question: ${question.slice(0, 50)}`);

    const requester: Requester | undefined =
      user_name || user_id ? { name: user_name || 'friend', id: user_id } : undefined;

    const result: AnswerResult = {
      question,
      answer: await generator.answer(question, requester),
      timestamp: new Date().toISOString(),
    };
    return c.json(result);
  });

  app.get('/greeting', c => c.json({ greeting: generator.greeting(), agent: AGENT_NAME }));

  app.get('/help', c => c.json({ help: generator.help(), agent: AGENT_NAME }));

  return app;
}
