import type { FieldPath, ItemKey } from './FieldPath.js';
import { formatPath } from './FieldPath.js';

/** Error codes for structural (routing) failures. These indicate a stale or malformed identifier. */
export type FormErrorCode = 'UNKNOWN_PATH' | 'UNKNOWN_KEY' | 'INVALID_REORDER';

/** Base class for structural errors returned by tree operations. */
export abstract class FormError extends Error {
  abstract readonly code: FormErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The path does not name a node of the expected kind in this tree. */
export class UnknownPathError extends FormError {
  readonly code: FormErrorCode = 'UNKNOWN_PATH';

  constructor(
    readonly path: FieldPath,
    readonly reason: string,
  ) {
    super(`Unknown path '${formatPath(path)}': ${reason}`);
  }
}

/** The path names a list item whose key is not (or no longer) in the list. */
export class UnknownKeyError extends UnknownPathError {
  override readonly code: FormErrorCode = 'UNKNOWN_KEY';

  constructor(
    path: FieldPath,
    readonly key: ItemKey,
  ) {
    super(path, `no item with key '${key}'`);
  }
}

/** The requested order is not a permutation of the list's current keys. The list is left unchanged. */
export class InvalidReorderError extends FormError {
  readonly code: FormErrorCode = 'INVALID_REORDER';

  constructor(
    readonly expected: readonly ItemKey[],
    readonly received: readonly ItemKey[],
  ) {
    super(`Reorder must be a permutation of [${expected.join(', ')}], received [${received.join(', ')}]`);
  }
}
