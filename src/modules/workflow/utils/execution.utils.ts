import { DeadlineExceededError } from '../errors/workflow.errors';
import { NodeParameters } from '../interfaces/workflow.interfaces';
import { isPlainObject } from './record.utils';

/**
 * Declared parameters overlaid with caller overrides for the same node id.
 * Override keys win; non-colliding keys from both sides are kept.
 */
export function mergeParameters(
  declared: NodeParameters | undefined,
  override: NodeParameters | undefined,
): NodeParameters {
  return { ...(declared ?? {}), ...(override ?? {}) };
}

/**
 * Size of a value for the execution trace: list length, envelope record
 * count, 0 for nothing, 1 for any other single value.
 */
export function sizeOf(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (Array.isArray(value)) {
    return value.length;
  }
  if (isPlainObject(value) && Array.isArray(value.records)) {
    return value.records.length;
  }
  return 1;
}

/**
 * Overall run deadline. A timeout of 0 never expires.
 */
export class Deadline {
  private readonly expiresAt: number | null;

  constructor(
    readonly timeoutMs: number,
    startedAt: number = Date.now(),
  ) {
    this.expiresAt = timeoutMs > 0 ? startedAt + timeoutMs : null;
  }

  isExpired(): boolean {
    return this.expiresAt !== null && Date.now() >= this.expiresAt;
  }

  assertNotExpired(): void {
    if (this.isExpired()) {
      throw new DeadlineExceededError(this.timeoutMs);
    }
  }

  /**
   * Settles with `work`, or rejects with DeadlineExceededError when the
   * deadline passes first. The timer is cleared either way.
   */
  race<T>(work: Promise<T>): Promise<T> {
    if (this.expiresAt === null) {
      return work;
    }

    const remaining = Math.max(0, this.expiresAt - Date.now());

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new DeadlineExceededError(this.timeoutMs));
      }, remaining);

      work.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
