#!/usr/bin/env tsx
/**
 * Validate the catalog files and report attribute coverage
 *
 * Usage:
 *   npm run check:catalog
 */

import dotenv from 'dotenv';
import path from 'path';
import { loadCatalogFromDir } from '../src/server/catalog/loader';
import { computeAttributeCoverage, findIndistinguishablePairs } from '../src/server/catalog/quality';
import { loadEngineConfig, parseEnv } from '../src/server/config/loader';
import { DatasetError } from '../src/server/errors';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local'), override: true });
dotenv.config();

function main(): void {
  const dir = path.resolve(process.cwd(), parseEnv().CATALOG_DIR);

  try {
    const catalog = loadCatalogFromDir(dir);
    const config = loadEngineConfig();

    console.log(`\n=== Catalog: ${dir} ===`);
    console.log(`entities:  ${catalog.entities.length}`);
    console.log(`questions: ${catalog.questions.length}`);

    console.log('\n=== Attribute coverage ===');
    for (const c of computeAttributeCoverage(catalog)) {
      const flag = c.questionCount === 0 ? '  (no question)' : '';
      console.log(`${c.attributeKey.padEnd(28)} entities: ${String(c.entityCount).padStart(3)}  questions: ${c.questionCount}${flag}`);
    }

    const pairs = findIndistinguishablePairs(catalog, config.scoring.missingAttributeWeight);
    console.log('\n=== Indistinguishable pairs ===');
    if (pairs.length === 0) {
      console.log('none');
    }
    for (const [a, b] of pairs) {
      console.log(`${a} <-> ${b}`);
    }
  } catch (error) {
    if (error instanceof DatasetError) {
      console.error(`❌ ${error.message}`);
      for (const detail of error.details) {
        console.error(`   - ${detail}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

main();
