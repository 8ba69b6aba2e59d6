import type { FieldPath, ItemKey } from '../../domain/model/FieldPath.js';
import type { Result } from '../../domain/model/Result.js';
import type { UnknownPathError } from '../../domain/model/FormErrors.js';
import type { FormContext } from '../FormContext.js';
import { formatPath } from '../../domain/model/FieldPath.js';

/** Use case: append an item to a list. */
export class AddItem<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(path: FieldPath, initial?: unknown): Result<ItemKey, UnknownPathError> {
    const result = this.ctx.root.addItem(path, initial);
    if (!result.ok) {
      this.ctx.reject('addItem', path, result.error);
      return result;
    }

    this.ctx.logger.debug({ path: formatPath(path), key: result.value }, 'Item added');
    this.ctx.emit({
      type: 'item:added',
      formId: this.ctx.formId,
      path,
      key: result.value,
      timestamp: Date.now(),
    });
    return result;
  }
}
