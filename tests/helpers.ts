import { ChansealError } from '../src/errors';

/**
 * Await a promise and report the ChansealError code it rejected with.
 * Resolves to undefined when the promise fulfils.
 */
export async function errorCodeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof ChansealError ? error.code : 'UNEXPECTED';
  }
}

/**
 * Synchronous counterpart of errorCodeOf.
 */
export function errorCodeOfSync(fn: () => unknown): string | undefined {
  try {
    fn();
    return undefined;
  } catch (error) {
    return error instanceof ChansealError ? error.code : 'UNEXPECTED';
  }
}
