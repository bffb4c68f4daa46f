import { HttpException, InternalServerErrorException, Logger } from '@nestjs/common';
import { ClientSession, Connection } from 'mongoose';

/**
 * Runs `work` inside the caller's session when one is passed, otherwise
 * opens a session and runs it as one transaction.
 */
export async function runInTransaction<T>(
  connection: Connection,
  session: ClientSession | undefined,
  work: (session: ClientSession) => Promise<T>,
): Promise<T> {
  if (session) {
    return work(session);
  }

  const ownSession = await connection.startSession();
  try {
    // withTransaction may run the callback more than once; keep the last result
    const results: T[] = [];
    await ownSession.withTransaction(async () => {
      results.length = 0;
      results.push(await work(ownSession));
    });
    if (results.length === 0) {
      throw new InternalServerErrorException('Transaction finished without a result');
    }
    return results[0];
  } finally {
    await ownSession.endSession();
  }
}

// известные http-ошибки пробрасываем как есть, остальное логируем и оборачиваем
export function rethrowAsHttp(
  logger: Logger,
  error: unknown,
  context: string,
): never {
  if (error instanceof HttpException) {
    throw error;
  }
  logger.error(`Error ${context}:`, error);
  const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
  throw new InternalServerErrorException(`Failed ${context}: ${errorMessage}`);
}

const TRANSIENT_MARKERS = [
  'Write conflict',
  'WriteConflict',
  'TransientTransactionError',
  'UnknownTransactionCommitResult',
];

export function isTransientTransactionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    TRANSIENT_MARKERS.some((marker) => error.message.includes(marker))
  );
}
