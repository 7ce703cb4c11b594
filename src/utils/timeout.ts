import { TransientIOError } from './errors';

/**
 * Rejects with TransientIOError when `operation` does not settle within `ms`
 */
export async function withTimeout<T>(operation: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientIOError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
