import type { Converter } from '../domain/ports/Converter.js';
import type { NodeMap, ValuesOf } from '../domain/nodes/FormNode.js';
import type { AggregateBinding } from '../domain/nodes/AggregateNode.js';
import type { FieldOptions } from '../domain/nodes/FieldNode.js';
import type { OptionalInner } from '../domain/nodes/OptionalNode.js';
import { AggregateNode } from '../domain/nodes/AggregateNode.js';
import { FieldNode } from '../domain/nodes/FieldNode.js';
import { ListNode } from '../domain/nodes/ListNode.js';
import { OptionalNode } from '../domain/nodes/OptionalNode.js';

// Characters that would make `formatPath` output ambiguous.
const RESERVED_NAME_CHARS = /[.[\]]/;

/** Create a field backed by `converter`. */
export function field<T>(converter: Converter<T>, options?: FieldOptions): FieldNode<T> {
  return new FieldNode(converter, options);
}

/**
 * Create an aggregate over `children`.
 *
 * Without a binding the model is a plain object with one property per child,
 * in declaration order. Supply a binding when the model is a class instance or
 * has a different shape.
 *
 * @example
 * ```typescript
 * const login = aggregate({ username: field(text()), password: field(password()) });
 * login.setInput(['username'], 'alice');
 * ```
 */
export function aggregate<C extends NodeMap>(children: C): AggregateNode<C, ValuesOf<C>>;
export function aggregate<C extends NodeMap, M>(children: C, binding: AggregateBinding<C, M>): AggregateNode<C, M>;
export function aggregate<C extends NodeMap, M>(
  children: C,
  binding?: AggregateBinding<C, M>,
): AggregateNode<C, M> | AggregateNode<C, ValuesOf<C>> {
  for (const name of Object.keys(children)) {
    if (name === '' || RESERVED_NAME_CHARS.test(name)) {
      throw new TypeError(`Invalid field name '${name}': names must be non-empty and cannot contain '.', '[' or ']'`);
    }
  }
  return binding !== undefined ? new AggregateNode(children, binding) : new AggregateNode(children, plainObjectBinding<C>());
}

/** Wrap a field or sub-aggregate with a presence toggle. `create` is called again whenever the wrapper discards its inner node. */
export function optional<T>(create: () => FieldNode<T>): OptionalNode<T>;
export function optional<C extends NodeMap, M>(create: () => AggregateNode<C, M>): OptionalNode<M>;
export function optional<M>(create: () => OptionalInner<M>): OptionalNode<M> {
  return new OptionalNode(create);
}

/** Create a list whose items are built by `prototype`. The list starts empty. */
export function list<C extends NodeMap, M>(prototype: () => AggregateNode<C, M>): ListNode<M> {
  return new ListNode(prototype);
}

function plainObjectBinding<C extends NodeMap>(): AggregateBinding<C, ValuesOf<C>> {
  return {
    assemble(values, base) {
      return base === undefined ? { ...values } : { ...base, ...values };
    },
    disassemble(model) {
      return model;
    },
  };
}
