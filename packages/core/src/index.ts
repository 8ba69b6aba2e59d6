// Main entry point
export { FormSession } from './FormSession.js';
export type { FormSessionConfig } from './FormSession.js';

// Binding layer
export { field, aggregate, optional, list } from './binding/builders.js';

// Nodes
export { FieldNode } from './domain/nodes/FieldNode.js';
export type { FieldOptions } from './domain/nodes/FieldNode.js';
export { AggregateNode } from './domain/nodes/AggregateNode.js';
export type { AggregateBinding } from './domain/nodes/AggregateNode.js';
export { OptionalNode } from './domain/nodes/OptionalNode.js';
export type { OptionalInner } from './domain/nodes/OptionalNode.js';
export { ListNode } from './domain/nodes/ListNode.js';
export type { ListItem } from './domain/nodes/ListNode.js';
export type {
  FormNode,
  NodeKind,
  NodeMap,
  ModelOf,
  ValuesOf,
  TreeNode,
  EvaluationContext,
  EvaluationMode,
  Evaluated,
} from './domain/nodes/FormNode.js';

// Domain model
export type { Result } from './domain/model/Result.js';
export { ok, err } from './domain/model/Result.js';
export type {
  ParseError,
  ParseErrorCode,
  RequiredError,
  InvalidFormatError,
  FromStringError,
  NumberOutOfRangeError,
  CustomParseError,
} from './domain/model/ParseError.js';
export {
  requiredError,
  invalidFormatError,
  fromStringError,
  numberOutOfRangeError,
  customParseError,
  describeParseError,
} from './domain/model/ParseError.js';
export type { FieldStatus, EmptyStatus, ValidStatus, InvalidStatus } from './domain/model/FieldStatus.js';
export type { FieldPath, PathSegment, ItemSegment, ItemKey } from './domain/model/FieldPath.js';
export { formatPath, isItemSegment } from './domain/model/FieldPath.js';
export type { SubmitResult, FieldError, FieldErrors } from './domain/model/SubmitResult.js';
export type { StatusSnapshot, FieldStatusEntry } from './domain/model/StatusSnapshot.js';
export type { FormErrorCode } from './domain/model/FormErrors.js';
export { FormError, UnknownPathError, UnknownKeyError, InvalidReorderError } from './domain/model/FormErrors.js';

// Ports (for custom converters)
export type { Converter } from './domain/ports/Converter.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  FieldChangedEvent,
  OperationRejectedEvent,
  FormSubmittedEvent,
  OptionalToggledEvent,
  ItemAddedEvent,
  ItemRemovedEvent,
  ItemsReorderedEvent,
  FormResetEvent,
} from './domain/events/DomainEvents.js';

// Logging
export { createLogger, levelFromEnv, LOG_LEVEL_ENV } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';
