/**
 * /api/confirm: answer a guess
 * correct=true  -> WON, the session is deleted
 * correct=false -> the entity is excluded and the game resumes
 */

import { NextRequest, NextResponse } from 'next/server';
import { getCatalog } from '@/server/catalog/loader';
import { getEngineConfig } from '@/server/config/loader';
import { confirmGuess, rejectGuess } from '@/server/game/engine';
import { getSessionManager } from '@/server/session/manager';
import { toCandidateResponse, toPromptPayload } from '@/server/api/dto';
import type { WonPayload } from '@/server/api/types';
import { ApiError, withErrorHandler } from '@/server/api/errorHandler';
import { ConfirmRequestSchema, readJsonBody } from '@/server/api/requests';

export const POST = withErrorHandler('/api/confirm', async (request: NextRequest) => {
  const body = ConfirmRequestSchema.parse(await readJsonBody(request));

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

  if (body.correct) {
    const topCandidates = confirmGuess(state, catalog, body.entityId, config);
    await sessions.deleteSession(body.sessionId);

    const name = catalog.entityById.get(body.entityId)?.name ?? body.entityId;
    const payload: WonPayload = {
      sessionId: body.sessionId,
      state: 'WON',
      message: `Great! I knew it was ${name}!`,
      guess: name,
      certainty: 1,
      topCandidates: topCandidates.map(toCandidateResponse),
    };
    return NextResponse.json(payload);
  }

  const result = rejectGuess(state, catalog, body.entityId, config);
  if (result.prompt.kind === 'NO_CANDIDATES') {
    await sessions.deleteSession(body.sessionId);
  } else {
    await sessions.saveGame(body.sessionId, result.state);
  }

  return NextResponse.json({
    sessionId: body.sessionId,
    ...toPromptPayload(result.prompt, result.state),
  });
});
