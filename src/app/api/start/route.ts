/**
 * /api/start: start a game
 * Creates the initial state, stores it and returns the first prompt
 */

import { NextResponse } from 'next/server';
import { getCatalog } from '@/server/catalog/loader';
import { getEngineConfig, parseEnv } from '@/server/config/loader';
import { newGame } from '@/server/game/engine';
import { getSessionManager } from '@/server/session/manager';
import { toPromptPayload } from '@/server/api/dto';
import { withErrorHandler } from '@/server/api/errorHandler';

export const POST = withErrorHandler('/api/start', async () => {
  const catalog = getCatalog();
  const config = getEngineConfig();
  const sessions = getSessionManager();

  // idle sessions are dropped lazily when a new game starts
  await sessions.evictIdleSessions(parseEnv().SESSION_TTL_MINUTES * 60_000);

  const { state, prompt } = newGame(catalog, config);
  const sessionId = await sessions.createSession(state);
  console.log(`[start] session ${sessionId} created, first prompt: ${prompt.kind}`);

  return NextResponse.json({
    sessionId,
    ...toPromptPayload(prompt, state),
  });
});
