import type { FieldPath } from './FieldPath.js';
import type { FieldStatus } from './FieldStatus.js';

/** Read-only view of one field for UI consumption. */
export interface FieldStatusEntry {
  readonly path: FieldPath;
  readonly raw: string;
  readonly status: FieldStatus<unknown>;
  readonly touched: boolean;
  readonly submitAttempted: boolean;
  /** Message the UI should show now, if any. See `FieldNode.validationError()`. */
  readonly message?: string;
}

/** Status of every active field, keyed by formatted path, in declaration order. */
export type StatusSnapshot = ReadonlyMap<string, FieldStatusEntry>;
