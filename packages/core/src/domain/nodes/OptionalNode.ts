import type { FieldPath } from '../model/FieldPath.js';
import type { FieldStatusEntry } from '../model/StatusSnapshot.js';
import type { EvaluationContext, Evaluated, NodeMap, TreeNode } from './FormNode.js';
import type { FieldNode } from './FieldNode.js';
import type { AggregateNode } from './AggregateNode.js';

/** Node kinds an optional wrapper can hold. */
export type OptionalInner<M> = FieldNode<M> | AggregateNode<NodeMap, M>;

/**
 * Presence toggle around a field or sub-aggregate.
 *
 * While absent, the inner node keeps its raw input but is skipped by submit
 * and by status snapshots, and contributes `undefined` to the model.
 */
export class OptionalNode<M> implements TreeNode<M | undefined> {
  readonly kind = 'optional' as const;

  private presentFlag = false;
  private innerNode: OptionalInner<M>;

  constructor(private readonly create: () => OptionalInner<M>) {
    this.innerNode = create();
  }

  get present(): boolean {
    return this.presentFlag;
  }

  /** The wrapped node. Retained while absent. */
  get inner(): OptionalInner<M> {
    return this.innerNode;
  }

  /** Turning presence off keeps the inner input, so toggling back restores the user's edits. */
  setPresent(present: boolean): void {
    this.presentFlag = present;
  }

  toggle(): boolean {
    this.presentFlag = !this.presentFlag;
    return this.presentFlag;
  }

  evaluate(ctx: EvaluationContext, path: FieldPath): Evaluated<M | undefined> {
    if (!this.presentFlag) {
      return { ok: true, value: undefined };
    }
    return this.innerNode.evaluate(ctx, path);
  }

  collectStatus(path: FieldPath, into: Map<string, FieldStatusEntry>): void {
    if (this.presentFlag) {
      this.innerNode.collectStatus(path, into);
    }
  }

  /** `undefined` makes the node absent with a fresh inner node; any other value makes it present and seeds it. */
  reset(model: M | undefined): void {
    if (model === undefined) {
      this.innerNode = this.create();
      this.presentFlag = false;
      return;
    }
    this.innerNode.reset(model);
    this.presentFlag = true;
  }

  clear(): void {
    this.innerNode = this.create();
    this.presentFlag = false;
  }

  isEmpty(): boolean {
    return !this.presentFlag || this.innerNode.isEmpty();
  }
}
