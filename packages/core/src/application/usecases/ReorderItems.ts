import type { FieldPath, ItemKey } from '../../domain/model/FieldPath.js';
import type { Result } from '../../domain/model/Result.js';
import type { InvalidReorderError, UnknownPathError } from '../../domain/model/FormErrors.js';
import type { FormContext } from '../FormContext.js';
import { formatPath } from '../../domain/model/FieldPath.js';

/** Use case: reorder a list. All-or-nothing. */
export class ReorderItems<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(path: FieldPath, order: readonly ItemKey[]): Result<void, UnknownPathError | InvalidReorderError> {
    const result = this.ctx.root.reorderItems(path, order);
    if (!result.ok) {
      this.ctx.reject('reorderItems', path, result.error);
      return result;
    }

    this.ctx.logger.debug({ path: formatPath(path), order }, 'Items reordered');
    this.ctx.emit({
      type: 'items:reordered',
      formId: this.ctx.formId,
      path,
      order: [...order],
      timestamp: Date.now(),
    });
    return result;
  }
}
