import type { Condition, SessionSource } from '../types';
import type { LogLevel } from '../logger';
import { BadRequestError } from '../errors';
import { withTransaction } from '../transactional';

export interface ServiceOptions {
  logLevel?: LogLevel;
  /** Receives `<Service>.<method>` after every committed write. */
  onAudit?: (label: string) => void;
}

/**
 * Run a service method as the root of its transaction: every repository call
 * inside joins it, and it commits once at the end.
 */
export function rootTransaction<R>(
  source: SessionSource,
  name: string,
  options: ServiceOptions,
  write: boolean,
  operation: () => Promise<R>,
): Promise<R> {
  return withTransaction(
    source,
    {
      root: true,
      readonly: !write,
      name,
      logLevel: options.logLevel,
      auditable: write && options.onAudit !== undefined,
      onAudit: options.onAudit,
    },
    operation,
  );
}

export function requireName(value: string | undefined, field: string, maxLength?: number): string {
  const name = value?.trim() ?? '';
  if (name.length === 0) {
    throw new BadRequestError(`${field} must not be blank.`);
  }
  if (maxLength !== undefined && name.length > maxLength) {
    throw new BadRequestError(`${field} must be at most ${maxLength} characters.`, {
      details: `Received ${name.length} characters.`,
    });
  }
  return name;
}

/**
 * `{ gte, lte }` for whichever bounds are given, or undefined for neither.
 */
export function dateRange(from?: Date, to?: Date): Condition | undefined {
  if (!from && !to) return undefined;
  const condition: Condition = {};
  if (from) condition.gte = from;
  if (to) condition.lte = to;
  return condition;
}
