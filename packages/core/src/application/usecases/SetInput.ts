import type { FieldPath } from '../../domain/model/FieldPath.js';
import type { FieldStatus } from '../../domain/model/FieldStatus.js';
import type { Result } from '../../domain/model/Result.js';
import type { UnknownPathError } from '../../domain/model/FormErrors.js';
import type { FormContext } from '../FormContext.js';
import { formatPath } from '../../domain/model/FieldPath.js';

/** Use case: route one raw input to its field. */
export class SetInput<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(path: FieldPath, raw: string): Result<void, UnknownPathError> {
    const result = this.ctx.root.setInput(path, raw);
    if (!result.ok) {
      this.ctx.reject('setInput', path, result.error);
      return result;
    }

    const status = this.statusAt(path);
    this.ctx.logger.debug({ path: formatPath(path), status: status.type }, 'Input set');
    this.ctx.emit({
      type: 'field:changed',
      formId: this.ctx.formId,
      path,
      status,
      timestamp: Date.now(),
    });
    return result;
  }

  private statusAt(path: FieldPath): FieldStatus<unknown> {
    const target = this.ctx.root.node(path);
    if (!target.ok) return { type: 'empty' };
    const node = target.value.kind === 'optional' ? target.value.inner : target.value;
    return node.kind === 'field' ? node.status() : { type: 'empty' };
  }
}
