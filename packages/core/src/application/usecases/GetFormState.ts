import type { StatusSnapshot } from '../../domain/model/StatusSnapshot.js';
import type { FieldErrors } from '../../domain/model/SubmitResult.js';
import type { FormContext } from '../FormContext.js';

/** Use case: read-only queries over the form. None of them changes any flag. */
export class GetFormState<M> {
  constructor(private readonly ctx: FormContext<M>) {}

  execute(): StatusSnapshot {
    return this.ctx.root.statusSnapshot();
  }

  validationErrors(): FieldErrors {
    return this.ctx.root.validationErrors();
  }

  hasUnsavedChanges(pristine: M): boolean {
    return this.ctx.root.hasUnsavedChanges(pristine);
  }

  isEmpty(): boolean {
    return this.ctx.root.isEmpty();
  }

  submitAttempted(): boolean {
    return this.ctx.root.submitAttempted;
  }
}
