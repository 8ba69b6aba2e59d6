import type { FieldPath } from '../model/FieldPath.js';
import type { FieldError } from '../model/SubmitResult.js';
import type { FieldStatusEntry } from '../model/StatusSnapshot.js';
import type { FieldNode } from './FieldNode.js';
import type { AggregateNode } from './AggregateNode.js';
import type { OptionalNode } from './OptionalNode.js';
import type { ListNode } from './ListNode.js';

/** Discriminant of the closed set of node kinds. */
export type NodeKind = 'field' | 'aggregate' | 'optional' | 'list';

/**
 * Any node of a form tree.
 *
 * The set is closed on purpose: traversals switch on `kind` and must handle
 * every case.
 */
export type FormNode = FieldNode<unknown> | AggregateNode<NodeMap, unknown> | OptionalNode<unknown> | ListNode<unknown>;

/** Children of an aggregate, keyed by field name, in declaration order. */
export interface NodeMap {
  readonly [name: string]: FormNode;
}

/** Model type a node contributes on submit. */
export type ModelOf<N> =
  N extends FieldNode<infer T>
    ? T
    : N extends AggregateNode<NodeMap, infer M>
      ? M
      : N extends OptionalNode<infer M>
        ? M | undefined
        : N extends ListNode<infer M>
          ? M[]
          : never;

/** Values collected from an aggregate's children, keyed by child name. */
export type ValuesOf<C extends NodeMap> = { [K in keyof C]: ModelOf<C[K]> };

/** `submit` marks fields as submit-attempted; `dry` only reads. */
export type EvaluationMode = 'submit' | 'dry';

/** Shared state of one traversal. Errors are appended in visit order. */
export interface EvaluationContext {
  readonly mode: EvaluationMode;
  readonly errors: Map<string, FieldError>;
}

/** Per-node evaluation outcome. Failures are recorded in the context, not here. */
export type Evaluated<T> = { readonly ok: true; readonly value: T } | { readonly ok: false };

/** Operations every node kind supports during tree traversal. */
export interface TreeNode<M> {
  readonly kind: NodeKind;
  /** Evaluate this subtree, recording failures under `path`. */
  evaluate(ctx: EvaluationContext, path: FieldPath): Evaluated<M>;
  /** Add an entry per active field under `path`. */
  collectStatus(path: FieldPath, into: Map<string, FieldStatusEntry>): void;
  /** Seed the subtree from a model without counting as user interaction. */
  reset(model: M): void;
  /** Return every input in the subtree to the blank state. */
  clear(): void;
  /** `true` when no field in the active subtree holds input. */
  isEmpty(): boolean;
}

/** Exhaustiveness guard for switches over `NodeKind`. */
export function assertNever(value: never): never {
  throw new TypeError(`Unexpected node: ${JSON.stringify(value)}`);
}
