/**
 * Transaction helper
 * Runs a callback between BEGIN and COMMIT on one checked-out client
 */

export interface TransactionClient {
  query(sql: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Execute a callback within a transaction, then release the client.
 * Rolls back and rethrows when the callback fails. A client whose ROLLBACK
 * also failed is destroyed instead of being returned to the pool.
 *
 * @param client - client checked out of the pool (released here)
 * @param fn - Callback receiving the client within the transaction
 */
export async function withTransaction<C extends TransactionClient, T>(
  client: C,
  fn: (client: C) => Promise<T>,
): Promise<T> {
  let brokenConnection: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      brokenConnection =
        rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(brokenConnection);
  }
}
