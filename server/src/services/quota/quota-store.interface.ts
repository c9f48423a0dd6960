/**
 * Quota Store Interface - storage abstraction
 * Both backends must satisfy the same concurrency contract:
 * a conditional decrement is linearizable per user.
 */

export type QuotaBackendName = 'memory' | 'redis';

export interface QuotaStore {
  readonly backend: QuotaBackendName;

  /**
   * Remaining credits, or null when the user has no record.
   * Backend failures also surface as null.
   */
  get(userId: string): Promise<number | null>;

  /**
   * Atomically decrement by amount when remaining >= amount.
   * Returns false when the record is missing, credits are short, or the backend fails.
   * Throws InvalidQuotaArgumentError for amount <= 0.
   */
  compareExchangeConsume(userId: string, amount: number): Promise<boolean>;

  /**
   * Overwrite remaining credits. Throws InvalidQuotaArgumentError for value < 0.
   */
  set(userId: string, value: number): Promise<void>;

  /**
   * Every user id that currently holds a record (used by the daily reset)
   */
  listUserIds(): Promise<string[]>;
}

export class InvalidQuotaArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQuotaArgumentError';
  }
}

export function assertConsumeAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new InvalidQuotaArgumentError(`Consume amount must be a positive integer, got ${amount}`);
  }
}

export function assertQuotaValue(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidQuotaArgumentError(`Quota value must be a non-negative integer, got ${value}`);
  }
}
