import type { Logger } from 'pino';
import type { AggregateNode } from '../domain/nodes/AggregateNode.js';
import type { NodeMap } from '../domain/nodes/FormNode.js';
import type { DomainEvent, OperationRejectedEvent } from '../domain/events/DomainEvents.js';
import type { FieldPath } from '../domain/model/FieldPath.js';
import type { FormError } from '../domain/model/FormErrors.js';
import { formatPath } from '../domain/model/FieldPath.js';
import { EventBus } from './EventBus.js';

/**
 * State shared by every use case of one form session: the root aggregate,
 * the event bus and the session logger.
 *
 * Internal: not exported from the package entry point.
 */
export class FormContext<M> {
  readonly eventBus: EventBus;

  constructor(
    readonly formId: string,
    readonly root: AggregateNode<NodeMap, M>,
    readonly logger: Logger,
  ) {
    this.eventBus = new EventBus((error, event) => {
      this.logger.error({ err: error, event: event.type }, 'Event handler threw');
    });
  }

  emit(event: DomainEvent): void {
    this.eventBus.emit(event);
  }

  /** Log and publish a structural failure. The caller still returns `error` to its own caller. */
  reject(operation: OperationRejectedEvent['operation'], path: FieldPath, error: FormError): void {
    this.logger.warn({ operation, path: formatPath(path), code: error.code }, error.message);
    this.emit({
      type: 'operation:rejected',
      formId: this.formId,
      operation,
      path,
      code: error.code,
      message: error.message,
      timestamp: Date.now(),
    });
  }
}
