/**
 * Builds the vector repository and checkpoint store for the configured backend.
 * Both share one connection (SQLite file or pg Pool); closing the repository releases it.
 */

import { Pool } from 'pg';
import { requireSetting, type AppConfig } from '../config';
import { openDatabase } from '../db';
import { SqliteCheckpointStore, type CheckpointStore } from '../sync/checkpointStore';
import { PostgresCheckpointStore } from '../sync/postgresCheckpointStore';
import { createSchemaGate } from './pgSchema';
import { PostgresVectorRepository } from './postgresVectorRepository';
import { SqliteVectorRepository } from './sqliteVectorRepository';
import type { VectorRepository } from './vectorRepository';

export interface Stores {
  repository: VectorRepository;
  checkpoints: CheckpointStore;
}

export function createStores(store: AppConfig['store'], dimension: number): Stores {
  if (store.backend === 'postgres') {
    const pool = new Pool({ connectionString: requireSetting(store.postgresUrl, 'INDEXING_POSTGRES_URL') });
    pool.on('error', (err) => console.error('[store] idle postgres client error', err));
    const ready = createSchemaGate(pool, dimension);
    return {
      repository: new PostgresVectorRepository(pool, ready),
      checkpoints: new PostgresCheckpointStore(pool, ready),
    };
  }
  const db = openDatabase(store.localPath);
  console.info('[store] local index at', store.localPath);
  return {
    repository: new SqliteVectorRepository(db),
    checkpoints: new SqliteCheckpointStore(db),
  };
}
