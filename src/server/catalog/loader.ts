/**
 * Catalog loader
 * Loads entities and questions once, validates them, and freezes the result.
 * The catalog is shared read-only by every game in the process.
 */

import fs from 'fs';
import path from 'path';
import type { ZodError } from 'zod';
import type { AttributeKey, Catalog, Entity, Question } from '@/server/algo/types';
import { DatasetError } from '@/server/errors';
import { parseEnv } from '@/server/config/loader';
import { EntityFileSchema, QuestionFileSchema } from './schema';

export const ENTITIES_FILE = 'entities.json';
export const QUESTIONS_FILE = 'questions.json';

function formatIssues(prefix: string, error: ZodError): string[] {
  return error.errors.map(e => {
    const p = e.path.join('.');
    return p ? `${prefix}.${p}: ${e.message}` : `${prefix}: ${e.message}`;
  });
}

function findDuplicates(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Validate raw entity/question data and build the catalog
 */
export function loadCatalog(entityData: unknown, questionData: unknown): Catalog {
  const entityResult = EntityFileSchema.safeParse(entityData);
  const questionResult = QuestionFileSchema.safeParse(questionData);

  if (!entityResult.success || !questionResult.success) {
    const details = [
      ...(entityResult.success ? [] : formatIssues('entities', entityResult.error)),
      ...(questionResult.success ? [] : formatIssues('questions', questionResult.error)),
    ];
    throw new DatasetError('Catalog data is malformed', details);
  }

  const entityRecords = entityResult.data.entities;
  const questionRecords = questionResult.data.questions;
  const details: string[] = [];

  for (const id of findDuplicates(entityRecords.map(e => e.id))) {
    details.push(`duplicate entity id: ${id}`);
  }
  for (const id of findDuplicates(questionRecords.map(q => q.id))) {
    details.push(`duplicate question id: ${id}`);
  }

  const knownAttributes = new Set<AttributeKey>();
  for (const entity of entityRecords) {
    for (const key of Object.keys(entity.attributes)) {
      knownAttributes.add(key);
    }
  }
  for (const question of questionRecords) {
    if (!knownAttributes.has(question.attributeKey)) {
      details.push(`question ${question.id} probes unknown attribute: ${question.attributeKey}`);
    }
  }

  if (details.length > 0) {
    throw new DatasetError('Catalog data is inconsistent', details);
  }

  const entities: Entity[] = entityRecords.map(e =>
    Object.freeze({
      id: e.id,
      name: e.name,
      attributes: Object.freeze({ ...e.attributes }),
    })
  );
  const questions: Question[] = questionRecords.map(q =>
    Object.freeze({ id: q.id, attributeKey: q.attributeKey, text: q.text })
  );

  const questionsByAttribute = new Map<AttributeKey, Question[]>();
  for (const question of questions) {
    const list = questionsByAttribute.get(question.attributeKey) ?? [];
    list.push(question);
    questionsByAttribute.set(question.attributeKey, list);
  }

  return Object.freeze({
    entities: Object.freeze(entities),
    questions: Object.freeze(questions),
    entityById: new Map(entities.map(e => [e.id, e])),
    questionById: new Map(questions.map(q => [q.id, q])),
    questionsByAttribute,
  });
}

function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Catalog file not readable: ${filePath}`, [String(error)]);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new DatasetError(`Catalog file is not valid JSON: ${filePath}`, [String(error)]);
  }
}

/**
 * Load entities.json and questions.json from a directory
 */
export function loadCatalogFromDir(dir: string): Catalog {
  return loadCatalog(
    readJsonFile(path.join(dir, ENTITIES_FILE)),
    readJsonFile(path.join(dir, QUESTIONS_FILE))
  );
}

let cachedCatalog: Catalog | null = null;

/**
 * Process-wide catalog (CATALOG_DIR, default data/)
 */
export function getCatalog(): Catalog {
  if (cachedCatalog) return cachedCatalog;
  const dir = path.resolve(process.cwd(), parseEnv().CATALOG_DIR);
  cachedCatalog = loadCatalogFromDir(dir);
  console.log(
    `[catalog] loaded ${cachedCatalog.entities.length} entities, ${cachedCatalog.questions.length} questions from ${dir}`
  );
  return cachedCatalog;
}
