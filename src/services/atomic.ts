import type { EntityStore, EntityTransaction } from '../repositories/pipeline/entityStore';
import { StorageBusyError } from '../types/errors';
import { err, ok, type Result } from '../types/result';

class RollbackSignal extends Error {
  constructor() {
    super('transaction rolled back');
    this.name = 'RollbackSignal';
  }
}

/**
 * Runs a Result-returning unit of work in one store transaction. A failed
 * Result rolls the transaction back and is returned as-is; a busy store comes
 * back as a StorageBusyError result. Anything else is a defect and is thrown.
 */
export const runAtomically = async <T, E>(
  store: EntityStore,
  work: (tx: EntityTransaction) => Promise<Result<T, E>>
): Promise<Result<T, E | StorageBusyError>> => {
  const holder: { failure?: { error: E } } = {};

  try {
    const value = await store.transaction(async (tx) => {
      const result = await work(tx);
      if (!result.ok) {
        holder.failure = { error: result.error };
        throw new RollbackSignal();
      }
      return result.value;
    });
    return ok(value);
  } catch (error) {
    if (holder.failure) return err(holder.failure.error);
    if (error instanceof StorageBusyError) return err(error);
    throw error;
  }
};
