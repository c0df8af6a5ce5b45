import { readFile } from 'fs/promises';
import { z } from 'zod';
import { componentLogger } from './logger';
import type { RecordStore } from './store';

const log = componentLogger('loader');

const seedFileSchema = z.array(z.unknown());

export interface LoadSummary {
  file: string;
  loaded: number;
  rejected: number;
  /** Set when the file could not be read or parsed; the store was left untouched */
  failure?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fill `store` from a JSON array of records.
 *
 * A missing, unreadable or malformed file leaves the store empty; the
 * problem goes to the log, never to the caller. Entries that fail
 * validation are skipped one by one.
 */
export async function loadFromFile<TRecord extends { id: number }, TInput, TPatch extends object>(
  store: RecordStore<TRecord, TInput, TPatch>,
  file: string
): Promise<LoadSummary> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (error) {
    log.warn({ file, resource: store.resource, error: describe(error) }, 'Seed file not readable, starting empty');
    return { file, loaded: 0, rejected: 0, failure: describe(error) };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.error({ file, resource: store.resource, error: describe(error) }, 'Seed file is not valid JSON, starting empty');
    return { file, loaded: 0, rejected: 0, failure: describe(error) };
  }

  const entries = seedFileSchema.safeParse(json);
  if (!entries.success) {
    const failure = 'expected a JSON array of records';
    log.error({ file, resource: store.resource, error: failure }, 'Seed file is malformed, starting empty');
    return { file, loaded: 0, rejected: 0, failure };
  }

  const { loaded, rejected } = store.bulkLoad(entries.data);

  for (const { index, error } of rejected) {
    log.warn({ file, index, issues: error.issues }, `Skipped invalid ${store.resource.toLowerCase()} record`);
  }
  log.info(
    { file, resource: store.resource, loaded: loaded.length, rejected: rejected.length },
    'Seed data loaded'
  );

  return { file, loaded: loaded.length, rejected: rejected.length };
}
