import type { FieldPath } from '../../domain/model/FieldPath.js';
import type { Result } from '../../domain/model/Result.js';
import type { UnknownPathError } from '../../domain/model/FormErrors.js';
import type { FormContext } from '../FormContext.js';
import { formatPath } from '../../domain/model/FieldPath.js';

/** Use case: switch an optional branch on or off. */
export class SetPresent<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(path: FieldPath, present: boolean): Result<void, UnknownPathError> {
    const result = this.ctx.root.setPresent(path, present);
    if (!result.ok) {
      this.ctx.reject('setPresent', path, result.error);
      return result;
    }

    this.ctx.logger.debug({ path: formatPath(path), present }, 'Optional toggled');
    this.ctx.emit({
      type: 'optional:toggled',
      formId: this.ctx.formId,
      path,
      present,
      timestamp: Date.now(),
    });
    return result;
  }
}
