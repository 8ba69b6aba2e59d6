import type { FieldPath, ItemKey } from '../../domain/model/FieldPath.js';
import type { Result } from '../../domain/model/Result.js';
import type { UnknownPathError } from '../../domain/model/FormErrors.js';
import type { FormContext } from '../FormContext.js';
import { formatPath } from '../../domain/model/FieldPath.js';

/** Use case: remove an item from a list by key. */
export class RemoveItem<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(path: FieldPath, key: ItemKey): Result<void, UnknownPathError> {
    const result = this.ctx.root.removeItem(path, key);
    if (!result.ok) {
      this.ctx.reject('removeItem', path, result.error);
      return result;
    }

    this.ctx.logger.debug({ path: formatPath(path), key }, 'Item removed');
    this.ctx.emit({
      type: 'item:removed',
      formId: this.ctx.formId,
      path,
      key,
      timestamp: Date.now(),
    });
    return result;
  }
}
