import type { SubmitResult } from '../../domain/model/SubmitResult.js';
import type { FormContext } from '../FormContext.js';

/** Use case: validate the whole tree and assemble the model or collect every field error. */
export class Submit<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(base?: M): SubmitResult<M> {
    const result = base === undefined ? this.ctx.root.submit() : this.ctx.root.submitUpdate(base);
    const errorCount = result.ok ? 0 : result.errors.size;

    if (result.ok) {
      this.ctx.logger.info('Form submitted');
    } else {
      this.ctx.logger.info({ errorCount, fields: [...result.errors.keys()] }, 'Form submission rejected');
    }

    this.ctx.emit({
      type: 'form:submitted',
      formId: this.ctx.formId,
      ok: result.ok,
      errorCount,
      timestamp: Date.now(),
    });
    return result;
  }
}
