#!/usr/bin/env tsx
/**
 * Play simulated games against the catalog
 *
 * Usage:
 *   npm run simulate                 # every entity
 *   npm run simulate -- rust         # one entity
 *   npm run simulate -- --noise=0.1  # flip 10% of answers
 *
 * Environment:
 *   CATALOG_DIR: catalog directory (read from .env.local / .env)
 */

import dotenv from 'dotenv';
import path from 'path';
import { loadCatalogFromDir } from '../src/server/catalog/loader';
import { loadEngineConfig, parseEnv } from '../src/server/config/loader';
import { simulateGame, type SimulationResult } from '../src/server/game/simulate';

// .env.local first, .env as fallback
dotenv.config({ path: path.resolve(process.cwd(), '.env.local'), override: true });
dotenv.config();

function parseArgs(argv: string[]): { targets: string[]; noise: number } {
  let noise = 0;
  const targets: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith('--noise=')) {
      noise = Number(arg.slice('--noise='.length));
      if (!Number.isFinite(noise) || noise < 0 || noise > 1) {
        throw new Error(`--noise must be within [0, 1]: ${arg}`);
      }
    } else {
      targets.push(arg);
    }
  }
  return { targets, noise };
}

function main(): void {
  const env = parseEnv();
  const catalog = loadCatalogFromDir(path.resolve(process.cwd(), env.CATALOG_DIR));
  const config = loadEngineConfig();
  const { targets, noise } = parseArgs(process.argv.slice(2));

  const ids = targets.length > 0 ? targets : catalog.entities.map(e => e.id);
  const results: SimulationResult[] = ids.map(id => simulateGame(catalog, config, id, { noise }));

  for (const r of results) {
    const wrong = r.guesses.filter(g => !g.correct).length;
    console.log(
      `${r.outcome === 'SUCCESS' ? 'OK  ' : 'FAIL'} ${r.targetEntityId.padEnd(16)} questions: ${String(r.questionCount).padStart(2)}  wrong guesses: ${wrong}`
    );
  }

  const successes = results.filter(r => r.outcome === 'SUCCESS');
  const firstTry = successes.filter(r => r.guesses.length === 1).length;
  const avgQuestions = results.reduce((sum, r) => sum + r.questionCount, 0) / results.length;

  console.log('\n=== Summary ===');
  console.log(`games:            ${results.length}`);
  console.log(`found:            ${successes.length}`);
  console.log(`found first try:  ${firstTry}`);
  console.log(`avg questions:    ${avgQuestions.toFixed(1)}`);
  console.log(`noise:            ${noise}`);
}

main();
