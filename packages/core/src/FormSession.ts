import type { LevelWithSilent, Logger } from 'pino';
import type { AggregateNode } from './domain/nodes/AggregateNode.js';
import type { NodeMap } from './domain/nodes/FormNode.js';
import type { FieldPath, ItemKey } from './domain/model/FieldPath.js';
import type { Result } from './domain/model/Result.js';
import type { InvalidReorderError, UnknownPathError } from './domain/model/FormErrors.js';
import type { FieldErrors, SubmitResult } from './domain/model/SubmitResult.js';
import type { StatusSnapshot } from './domain/model/StatusSnapshot.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { FormContext } from './application/FormContext.js';
import { SetInput } from './application/usecases/SetInput.js';
import { Submit } from './application/usecases/Submit.js';
import { SetPresent } from './application/usecases/SetPresent.js';
import { AddItem } from './application/usecases/AddItem.js';
import { RemoveItem } from './application/usecases/RemoveItem.js';
import { ReorderItems } from './application/usecases/ReorderItems.js';
import { ResetForm } from './application/usecases/ResetForm.js';
import { GetFormState } from './application/usecases/GetFormState.js';
import { createLogger } from './infrastructure/logging/createLogger.js';
import { randomUUID } from 'node:crypto';

/** Configuration for a form session. */
export interface FormSessionConfig {
  /** Identifier carried by every event and log line. Default: a random UUID. */
  readonly formId?: string;
  /** Logger to write to. Default: a pino JSON logger built with `createLogger()`. */
  readonly logger?: Logger;
  /** Level for the default logger. Ignored when `logger` is given. Default: `$TYPEDFORM_LOG_LEVEL`, else `'silent'`. */
  readonly logLevel?: LevelWithSilent;
}

/**
 * Facade over one form's lifetime: routes UI operations to the root
 * aggregate, publishes domain events and logs structural failures.
 *
 * Every operation is synchronous and runs to completion. Callers serialize
 * events, as a UI event loop does.
 *
 * @example
 * ```typescript
 * const session = new FormSession(aggregate({ username: field(text()) }));
 * session.on('form:submitted', (e) => console.log(e.ok));
 * session.setInput(['username'], 'alice');
 * const result = session.submit();
 * ```
 */
export class FormSession<C extends NodeMap, M> {
  private readonly ctx: FormContext<M>;

  constructor(
    readonly form: AggregateNode<C, M>,
    config: FormSessionConfig = {},
  ) {
    const formId = config.formId ?? randomUUID();
    const logger = config.logger ?? createLogger({ level: config.logLevel });
    this.ctx = new FormContext(formId, form, logger.child({ formId }));
  }

  /** Create a session whose form is seeded from `model`, as when editing an existing record. */
  static fromModel<C extends NodeMap, M>(form: AggregateNode<C, M>, model: M, config?: FormSessionConfig): FormSession<C, M> {
    const session = new FormSession(form, config);
    form.reset(model);
    return session;
  }

  get formId(): string {
    return this.ctx.formId;
  }

  /** Subscribe to a domain event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  setInput(path: FieldPath, raw: string): Result<void, UnknownPathError> {
    return new SetInput(this.ctx).execute(path, raw);
  }

  /** Validate everything and assemble the model, or return every field error. */
  submit(): SubmitResult<M> {
    return new Submit(this.ctx).execute();
  }

  /** Submit onto an existing model so properties the form does not own are kept. */
  submitUpdate(base: M): SubmitResult<M> {
    return new Submit(this.ctx).execute(base);
  }

  setPresent(path: FieldPath, present: boolean): Result<void, UnknownPathError> {
    return new SetPresent(this.ctx).execute(path, present);
  }

  /** Append a list item, seeded from `initial` when given. `initial` must be a complete item model. */
  addItem(path: FieldPath, initial?: unknown): Result<ItemKey, UnknownPathError> {
    return new AddItem(this.ctx).execute(path, initial);
  }

  removeItem(path: FieldPath, key: ItemKey): Result<void, UnknownPathError> {
    return new RemoveItem(this.ctx).execute(path, key);
  }

  reorderItems(path: FieldPath, order: readonly ItemKey[]): Result<void, UnknownPathError | InvalidReorderError> {
    return new ReorderItems(this.ctx).execute(path, order);
  }

  /** Reseed every input from `model`. Clears touched and submit flags. */
  reset(model: M): void {
    new ResetForm(this.ctx).execute(model);
  }

  clear(): void {
    new ResetForm(this.ctx).clear();
  }

  statusSnapshot(): StatusSnapshot {
    return new GetFormState(this.ctx).execute();
  }

  /** Errors to show in a form-level summary. Empty until a submit has been attempted. */
  validationErrors(): FieldErrors {
    return new GetFormState(this.ctx).validationErrors();
  }

  hasUnsavedChanges(pristine: M): boolean {
    return new GetFormState(this.ctx).hasUnsavedChanges(pristine);
  }

  isEmpty(): boolean {
    return new GetFormState(this.ctx).isEmpty();
  }

  get submitAttempted(): boolean {
    return new GetFormState(this.ctx).submitAttempted();
  }
}
