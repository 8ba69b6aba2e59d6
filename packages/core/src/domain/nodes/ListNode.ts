import type { FieldPath, ItemKey } from '../model/FieldPath.js';
import type { FieldStatusEntry } from '../model/StatusSnapshot.js';
import type { Result } from '../model/Result.js';
import type { EvaluationContext, Evaluated, NodeMap, TreeNode } from './FormNode.js';
import type { AggregateNode } from './AggregateNode.js';
import { itemPath, segmentName } from '../model/FieldPath.js';
import { InvalidReorderError, UnknownKeyError } from '../model/FormErrors.js';
import { err, ok } from '../model/Result.js';

/** One entry of a list: its stable key and the aggregate it owns. */
export interface ListItem<M> {
  readonly key: ItemKey;
  readonly node: AggregateNode<NodeMap, M>;
}

/**
 * Dynamically sized list of sub-aggregates built from a prototype factory.
 *
 * Items are addressed by key, never by position. Keys are issued from a
 * per-list counter (`k1`, `k2`, …) and are not reused after removal.
 */
export class ListNode<M> implements TreeNode<M[]> {
  readonly kind = 'list' as const;

  private items: ListItem<M>[] = [];
  private issued = 0;

  constructor(private readonly prototype: () => AggregateNode<NodeMap, M>) {}

  get size(): number {
    return this.items.length;
  }

  /** Keys in current order. */
  keys(): ItemKey[] {
    return this.items.map((item) => item.key);
  }

  item(key: ItemKey): AggregateNode<NodeMap, M> | undefined {
    return this.items.find((item) => item.key === key)?.node;
  }

  /** Append a new item, seeded from `initial` when given. Returns its key. */
  add(initial?: M): ItemKey {
    const node = this.prototype();
    if (initial !== undefined) {
      node.reset(initial);
    }
    this.issued += 1;
    const key = `k${String(this.issued)}`;
    this.items.push({ key, node });
    return key;
  }

  remove(key: ItemKey): Result<void, UnknownKeyError> {
    const index = this.items.findIndex((item) => item.key === key);
    if (index === -1) {
      return err(new UnknownKeyError([], key));
    }
    this.items.splice(index, 1);
    return ok(undefined);
  }

  /** Reorder items. Fails without changing anything unless `order` is a permutation of `keys()`. */
  reorder(order: readonly ItemKey[]): Result<void, InvalidReorderError> {
    const byKey = new Map(this.items.map((item) => [item.key, item]));
    const reordered: ListItem<M>[] = [];
    for (const key of order) {
      const item = byKey.get(key);
      if (item === undefined) {
        return err(new InvalidReorderError(this.keys(), order));
      }
      byKey.delete(key);
      reordered.push(item);
    }
    if (byKey.size > 0) {
      return err(new InvalidReorderError(this.keys(), order));
    }
    this.items = reordered;
    return ok(undefined);
  }

  evaluate(ctx: EvaluationContext, path: FieldPath): Evaluated<M[]> {
    const values: M[] = [];
    let failed = false;
    for (const { key, node } of this.items) {
      const result = node.evaluate(ctx, listItemPath(path, key));
      if (result.ok) {
        values.push(result.value);
      } else {
        failed = true;
      }
    }
    return failed ? { ok: false } : { ok: true, value: values };
  }

  collectStatus(path: FieldPath, into: Map<string, FieldStatusEntry>): void {
    for (const { key, node } of this.items) {
      node.collectStatus(listItemPath(path, key), into);
    }
  }

  /** Replace all items with one per model, under fresh keys. */
  reset(models: readonly M[]): void {
    this.items = [];
    for (const model of models) {
      this.add(model);
    }
  }

  clear(): void {
    this.items = [];
  }

  isEmpty(): boolean {
    return this.items.every((item) => item.node.isEmpty());
  }
}

// The list's own segment is the last one in `path`; items extend it with their key.
function listItemPath(path: FieldPath, key: ItemKey): FieldPath {
  const last = path[path.length - 1];
  return last === undefined ? [['', key]] : itemPath(path.slice(0, -1), segmentName(last), key);
}
