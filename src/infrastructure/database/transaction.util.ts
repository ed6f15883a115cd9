import { Logger } from '@nestjs/common';
import { DataSource, EntityManager, QueryRunner } from 'typeorm';
import { SERIALIZATION_RETRY_OPTIONS, withRetry } from '@common/utils/retry.util';
import { isSerializationFailure } from '@common/utils/error.util';

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
}

export async function executeInTransaction<T>(
  dataSource: DataSource,
  fn: (manager: EntityManager) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const { isolationLevel = 'READ COMMITTED' } = options;

  const queryRunner: QueryRunner = dataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction(isolationLevel);

  try {
    const result = await fn(queryRunner.manager);
    await queryRunner.commitTransaction();
    return result;
  } catch (error) {
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
  }
}

/**
 * Runs `fn` in a SERIALIZABLE transaction, replaying the whole transaction
 * when PostgreSQL aborts it with a serialization failure or deadlock.
 * The last failure is rethrown once the retries are spent.
 */
export async function executeInSerializableTransaction<T>(
  dataSource: DataSource,
  fn: (manager: EntityManager) => Promise<T>,
  logger?: Logger,
  operationName = 'serializable transaction',
): Promise<T> {
  return withRetry(
    () => executeInTransaction(dataSource, fn, { isolationLevel: 'SERIALIZABLE' }),
    { ...SERIALIZATION_RETRY_OPTIONS, isRetryable: isSerializationFailure },
    logger,
    operationName,
  );
}
