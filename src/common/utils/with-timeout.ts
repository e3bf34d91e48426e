/*
 * Copyright (C) 2026 RavHub Team
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published
 * by the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 */

export class OperationTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export class OperationCancelledError extends Error {
  constructor() {
    super('operation was cancelled');
    this.name = 'OperationCancelledError';
  }
}

/**
 * Runs `work` with an AbortSignal that fires after `timeoutMs` or when
 * `parentSignal` aborts, whichever happens first. The returned promise
 * settles as soon as the signal fires even if `work` ignores it.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new OperationCancelledError();
  }

  const controller = new AbortController();
  let failure: Error = new OperationCancelledError();
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(failure), { once: true });
  });

  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  const timeout = setTimeout(() => {
    failure = new OperationTimeoutError(timeoutMs);
    controller.abort();
  }, timeoutMs);

  try {
    return await Promise.race([work(controller.signal), aborted]);
  } finally {
    clearTimeout(timeout);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
