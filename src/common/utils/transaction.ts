import { ClientSession, Connection } from 'mongoose';

/**
 * Run `work` atomically
 *
 * If the caller already holds a session the work joins that transaction,
 * otherwise a new session is started and the work runs inside
 * `withTransaction`. Any error thrown by `work` aborts the transaction and
 * is re-thrown unchanged.
 */
export async function runInTransaction<T>(
  connection: Connection,
  work: (session: ClientSession) => Promise<T>,
  session?: ClientSession,
): Promise<T> {
  if (session) {
    return work(session);
  }

  const ownSession = await connection.startSession();
  try {
    return await ownSession.withTransaction(() => work(ownSession));
  } finally {
    await ownSession.endSession();
  }
}
