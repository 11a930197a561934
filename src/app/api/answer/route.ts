/**
 * /api/answer: answer the current question
 * Body: { sessionId, attributeKey, answer }, answer is one of the graded strings
 */

import { NextRequest, NextResponse } from 'next/server';
import { getCatalog } from '@/server/catalog/loader';
import { getEngineConfig } from '@/server/config/loader';
import { answer, skipQuestion } from '@/server/game/engine';
import { getSessionManager } from '@/server/session/manager';
import { toPromptPayload } from '@/server/api/dto';
import { ApiError, withErrorHandler } from '@/server/api/errorHandler';
import { AnswerRequestSchema, readJsonBody, toParsedAnswer } from '@/server/api/requests';

export const POST = withErrorHandler('/api/answer', async (request: NextRequest) => {
  const body = AnswerRequestSchema.parse(await readJsonBody(request));
  const parsed = toParsedAnswer(body.answer);

  const catalog = getCatalog();
  const config = getEngineConfig();
  const sessions = getSessionManager();

  const state = await sessions.getGame(body.sessionId, catalog);
  if (!state) {
    throw new ApiError(
      404,
      'The game session was not found. Please start a new game.',
      'Session not found'
    );
  }

  const result = parsed.kind === 'SKIP'
    ? skipQuestion(state, catalog, body.attributeKey, config)
    : answer(state, catalog, body.attributeKey, parsed.weight, config);

  await sessions.saveGame(body.sessionId, result.state);

  if (process.env.ENGINE_DEBUG === '1') {
    console.log(
      `[answer] ${body.sessionId} turn ${result.state.turnCount}: ${body.attributeKey}=${body.answer} -> ${result.prompt.kind}`
    );
  }

  return NextResponse.json({
    sessionId: body.sessionId,
    ...toPromptPayload(result.prompt, result.state),
  });
});
