import dotenv from 'dotenv';
import { loadPipelineConfig } from '../config/pipelineConfig';
import { ensurePipelineSchema } from '../db/pipelineSchema';
import { closePostgresPool, createPostgresPool } from '../db/postgres';
import { createPipelineEngine } from '../index';
import { PostgresEntityStore } from '../repositories/pipeline/postgresEntityStore';
import { createLogger } from './logger';

dotenv.config();

const run = async () => {
  const config = loadPipelineConfig();
  const logger = createLogger('audit', config.logLevel);
  const pool = createPostgresPool(config);
  let exitCode = 0;

  try {
    await ensurePipelineSchema(pool);
    const engine = createPipelineEngine({ store: new PostgresEntityStore(pool, config), config });

    const reactivated = await engine.cadence.reactivateDueParked();
    reactivated.failed.forEach(({ item, error }) =>
      logger.warn('Parked prospect not reactivated', { prospectId: item.id, error: error.message })
    );

    const overdue = await engine.cadence.getOverdue();
    const orphans = await engine.cadence.getOrphanedEngaged();
    const resurrection = await engine.populations.findResurrectionCandidates();

    logger.info('Pipeline audit finished', {
      reactivated: reactivated.succeeded.length,
      reactivationFailures: reactivated.failed.length,
      overdue: overdue.length,
      orphanedEngaged: orphans.length,
      resurrectionCandidates: resurrection.length,
    });
    if (orphans.length > 0) exitCode = 1;
  } catch (error) {
    logger.error('Pipeline audit failed', { error: error instanceof Error ? error.message : String(error) });
    exitCode = 1;
  } finally {
    await closePostgresPool(pool);
    process.exit(exitCode);
  }
};

run().catch((error) => {
  console.error('❌ Pipeline audit could not start', error);
  process.exit(1);
});
