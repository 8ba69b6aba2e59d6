import type { FieldPath, ItemKey } from '../model/FieldPath.js';
import type { FieldStatus } from '../model/FieldStatus.js';
import type { FormErrorCode } from '../model/FormErrors.js';

/** Emitted after a raw input was routed to its field. */
export interface FieldChangedEvent {
  readonly type: 'field:changed';
  readonly formId: string;
  readonly path: FieldPath;
  readonly status: FieldStatus<unknown>;
  readonly timestamp: number;
}

/** Emitted when an operation was refused because its path, key or order was invalid. */
export interface OperationRejectedEvent {
  readonly type: 'operation:rejected';
  readonly formId: string;
  readonly operation: 'setInput' | 'setPresent' | 'addItem' | 'removeItem' | 'reorderItems';
  readonly path: FieldPath;
  readonly code: FormErrorCode;
  readonly message: string;
  readonly timestamp: number;
}

/** Emitted after every submit, successful or not. */
export interface FormSubmittedEvent {
  readonly type: 'form:submitted';
  readonly formId: string;
  readonly ok: boolean;
  /** Number of failing fields. `0` when `ok`. */
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when an optional branch is switched on or off. */
export interface OptionalToggledEvent {
  readonly type: 'optional:toggled';
  readonly formId: string;
  readonly path: FieldPath;
  readonly present: boolean;
  readonly timestamp: number;
}

/** Emitted when an item is appended to a list. */
export interface ItemAddedEvent {
  readonly type: 'item:added';
  readonly formId: string;
  readonly path: FieldPath;
  readonly key: ItemKey;
  readonly timestamp: number;
}

/** Emitted when an item is removed from a list. */
export interface ItemRemovedEvent {
  readonly type: 'item:removed';
  readonly formId: string;
  readonly path: FieldPath;
  readonly key: ItemKey;
  readonly timestamp: number;
}

/** Emitted when a list is reordered. */
export interface ItemsReorderedEvent {
  readonly type: 'items:reordered';
  readonly formId: string;
  readonly path: FieldPath;
  readonly order: readonly ItemKey[];
  readonly timestamp: number;
}

/** Emitted when the form is reseeded from a model or cleared. */
export interface FormResetEvent {
  readonly type: 'form:reset';
  readonly formId: string;
  /** `true` for `clear()`, `false` for `reset(model)`. */
  readonly cleared: boolean;
  readonly timestamp: number;
}

/** Union of all form domain events. */
export type DomainEvent =
  | FieldChangedEvent
  | OperationRejectedEvent
  | FormSubmittedEvent
  | OptionalToggledEvent
  | ItemAddedEvent
  | ItemRemovedEvent
  | ItemsReorderedEvent
  | FormResetEvent;

/** String literal union of all event type discriminators. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type discriminator. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
