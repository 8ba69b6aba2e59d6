import type { FormContext } from '../FormContext.js';

/** Use case: reseed the form from a model, or blank it. Neither counts as user interaction. */
export class ResetForm<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(model: M): void {
    this.ctx.root.reset(model);
    this.ctx.logger.debug('Form reset from model');
    this.emit(false);
  }

  clear(): void {
    this.ctx.root.clear();
    this.ctx.logger.debug('Form cleared');
    this.emit(true);
  }

  private emit(cleared: boolean): void {
    this.ctx.emit({ type: 'form:reset', formId: this.ctx.formId, cleared, timestamp: Date.now() });
  }
}
