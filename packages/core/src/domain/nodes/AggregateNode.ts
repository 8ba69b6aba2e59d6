import type { FieldPath, ItemKey } from '../model/FieldPath.js';
import type { FieldErrors, SubmitResult } from '../model/SubmitResult.js';
import type { FieldStatusEntry, StatusSnapshot } from '../model/StatusSnapshot.js';
import type { Result } from '../model/Result.js';
import type { InvalidReorderError } from '../model/FormErrors.js';
import type { EvaluationContext, Evaluated, FormNode, NodeMap, TreeNode, ValuesOf } from './FormNode.js';
import type { ListNode } from './ListNode.js';
import type { OptionalNode } from './OptionalNode.js';
import { childPath, isItemSegment, segmentName } from '../model/FieldPath.js';
import { UnknownKeyError, UnknownPathError } from '../model/FormErrors.js';
import { err, ok } from '../model/Result.js';
import { assertNever } from './FormNode.js';
import { isDeepStrictEqual } from 'node:util';

/**
 * Model construction callbacks for one aggregate.
 *
 * `assemble` is invoked only when every child produced a value. `values` holds
 * one entry per child, in declaration order. `base` is the model passed to
 * `submitUpdate()`, if any.
 */
export interface AggregateBinding<C extends NodeMap, M> {
  assemble(values: ValuesOf<C>, base: M | undefined): M;
  /** Split a model into per-child values for `reset()`. */
  disassemble(model: M): ValuesOf<C>;
}

/**
 * A named, ordered collection of child nodes representing one (sub)model.
 *
 * Routes input by path, evaluates every child on submit and collects all
 * failures in declaration order. Exclusively owns its descendants.
 */
export class AggregateNode<C extends NodeMap, M> implements TreeNode<M> {
  readonly kind = 'aggregate' as const;

  private readonly entries: ReadonlyArray<readonly [string, FormNode]>;
  private readonly byName: ReadonlyMap<string, FormNode>;
  private submitAttemptedFlag = false;

  constructor(
    readonly children: C,
    private readonly binding: AggregateBinding<C, M>,
  ) {
    this.entries = Object.entries(children);
    this.byName = new Map(this.entries);
  }

  /** `true` once `submit()` or `submitUpdate()` has been called since the last reset. */
  get submitAttempted(): boolean {
    return this.submitAttemptedFlag;
  }

  /** The direct child called `name`. Only declared children match. */
  child(name: string): FormNode | undefined {
    return this.byName.get(name);
  }

  /** Route raw input to the field at `path`. */
  setInput(path: FieldPath, raw: string): Result<void, UnknownPathError> {
    const target = this.resolve(path);
    if (!target.ok) return target;

    const node = target.value.kind === 'optional' ? target.value.inner : target.value;
    if (node.kind !== 'field') {
      return err(new UnknownPathError(path, `expected a field, found ${node.kind}`));
    }
    node.setInput(raw);
    return ok(undefined);
  }

  /** Resolve the node at `path`. An empty path resolves to this aggregate. */
  node(path: FieldPath): Result<FormNode, UnknownPathError> {
    return this.resolve(path);
  }

  /** Toggle the optional node at `path`. */
  setPresent(path: FieldPath, present: boolean): Result<void, UnknownPathError> {
    const target = this.resolveOptional(path);
    if (!target.ok) return target;
    target.value.setPresent(present);
    return ok(undefined);
  }

  /**
   * Append an item to the list at `path`, seeded from `initial` when given.
   * `initial` must be a complete item model.
   */
  addItem(path: FieldPath, initial?: unknown): Result<ItemKey, UnknownPathError> {
    const target = this.resolveList(path);
    if (!target.ok) return target;
    return ok(target.value.add(initial));
  }

  /** Remove the item `key` from the list at `path`. */
  removeItem(path: FieldPath, key: ItemKey): Result<void, UnknownPathError> {
    const target = this.resolveList(path);
    if (!target.ok) return target;
    if (target.value.item(key) === undefined) {
      return err(new UnknownKeyError(path, key));
    }
    return target.value.remove(key);
  }

  /** Reorder the list at `path`. `order` must be a permutation of its current keys. */
  reorderItems(path: FieldPath, order: readonly ItemKey[]): Result<void, UnknownPathError | InvalidReorderError> {
    const target = this.resolveList(path);
    if (!target.ok) return target;
    return target.value.reorder(order);
  }

  /** Evaluate the whole tree, marking every evaluated field as submit-attempted. */
  submit(): SubmitResult<M> {
    return this.run(undefined);
  }

  /** Like `submit()`, but assembles onto `base` so model properties the form does not own survive. */
  submitUpdate(base: M): SubmitResult<M> {
    return this.run(base);
  }

  /** Field errors as of now, without touching any flag. Empty until a submit has been attempted. */
  validationErrors(): FieldErrors {
    if (!this.submitAttemptedFlag) return new Map();
    const ctx: EvaluationContext = { mode: 'dry', errors: new Map() };
    this.evaluate(ctx, []);
    return ctx.errors;
  }

  /**
   * `true` when the form would not submit to a model deep-equal to `pristine`.
   * A form that cannot be submitted counts as changed.
   */
  hasUnsavedChanges(pristine: M): boolean {
    const ctx: EvaluationContext = { mode: 'dry', errors: new Map() };
    const result = this.evaluateWith(ctx, [], pristine);
    return !result.ok || !isDeepStrictEqual(result.value, pristine);
  }

  /** Status of every active field. Read-only: never marks anything submit-attempted. */
  statusSnapshot(): StatusSnapshot {
    const into = new Map<string, FieldStatusEntry>();
    this.collectStatus([], into);
    return into;
  }

  evaluate(ctx: EvaluationContext, path: FieldPath): Evaluated<M> {
    return this.evaluateWith(ctx, path, undefined);
  }

  collectStatus(path: FieldPath, into: Map<string, FieldStatusEntry>): void {
    for (const [name, child] of this.entries) {
      child.collectStatus(childPath(path, name), into);
    }
  }

  reset(model: M): void {
    const values: Readonly<Record<string, unknown>> = this.binding.disassemble(model);
    for (const [name, child] of this.entries) {
      resetChild(child, values[name]);
    }
    this.submitAttemptedFlag = false;
  }

  clear(): void {
    for (const [, child] of this.entries) {
      child.clear();
    }
    this.submitAttemptedFlag = false;
  }

  isEmpty(): boolean {
    return this.entries.every(([, child]) => child.isEmpty());
  }

  private run(base: M | undefined): SubmitResult<M> {
    this.submitAttemptedFlag = true;
    const ctx: EvaluationContext = { mode: 'submit', errors: new Map() };
    const result = this.evaluateWith(ctx, [], base);
    return result.ok ? { ok: true, value: result.value } : { ok: false, errors: ctx.errors };
  }

  private evaluateWith(ctx: EvaluationContext, path: FieldPath, base: M | undefined): Evaluated<M> {
    const values: Record<string, unknown> = {};
    let failed = false;

    // Keep going after a failure so every error is collected.
    for (const [name, child] of this.entries) {
      const result = child.evaluate(ctx, childPath(path, name));
      if (result.ok) {
        values[name] = result.value;
      } else {
        failed = true;
      }
    }

    if (failed) return { ok: false };
    return { ok: true, value: this.binding.assemble(values as ValuesOf<C>, base) };
  }

  private resolve(path: FieldPath): Result<FormNode, UnknownPathError> {
    let current: FormNode = this;

    for (const [index, segment] of path.entries()) {
      const consumed = path.slice(0, index + 1);

      const container = enterContainer(current);
      if (container === null) {
        return err(new UnknownPathError(consumed, `'${current.kind}' has no children`));
      }

      const child = container.child(segmentName(segment));
      if (child === undefined) {
        return err(new UnknownPathError(consumed, `no child named '${segmentName(segment)}'`));
      }

      if (isItemSegment(segment)) {
        if (child.kind !== 'list') {
          return err(new UnknownPathError(consumed, `'${segment[0]}' is a ${child.kind}, not a list`));
        }
        const item = child.item(segment[1]);
        if (item === undefined) {
          return err(new UnknownKeyError(consumed, segment[1]));
        }
        current = item;
      } else {
        current = child;
      }
    }

    return ok(current);
  }

  private resolveOptional(path: FieldPath): Result<OptionalNode<unknown>, UnknownPathError> {
    const target = this.resolve(path);
    if (!target.ok) return target;
    if (target.value.kind !== 'optional') {
      return err(new UnknownPathError(path, `expected an optional, found ${target.value.kind}`));
    }
    return ok(target.value);
  }

  private resolveList(path: FieldPath): Result<ListNode<unknown>, UnknownPathError> {
    const target = this.resolve(path);
    if (!target.ok) return target;
    if (target.value.kind !== 'list') {
      return err(new UnknownPathError(path, `expected a list, found ${target.value.kind}`));
    }
    return ok(target.value);
  }
}

/** The aggregate whose children a path continues into, looking through optionals. */
function enterContainer(node: FormNode): AggregateNode<NodeMap, unknown> | null {
  switch (node.kind) {
    case 'aggregate':
      return node;
    case 'optional':
      return node.inner.kind === 'aggregate' ? node.inner : null;
    case 'field':
    case 'list':
      return null;
    default:
      return assertNever(node);
  }
}

function resetChild(child: FormNode, value: unknown): void {
  switch (child.kind) {
    case 'field':
    case 'aggregate':
    case 'optional':
      child.reset(value);
      return;
    case 'list':
      child.reset(Array.isArray(value) ? value : []);
      return;
    default:
      assertNever(child);
  }
}
