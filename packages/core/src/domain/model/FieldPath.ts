/** Identity of a list item. Issued by its list, independent of the item's position, never reused. */
export type ItemKey = string;

/** Addresses one entry of a list child: the list's field name plus the item's key. */
export type ItemSegment = readonly [name: string, key: ItemKey];

/** One step in a path: a child name, or a list name with an item key. */
export type PathSegment = string | ItemSegment;

/**
 * Address of a node inside an aggregate tree, outermost segment first.
 *
 * Paths are plain data built per UI event. Use `formatPath` to get a string
 * suitable as a map key.
 *
 * @example
 * ```typescript
 * const path: FieldPath = [['addresses', key], 'city'];
 * formatPath(path); // 'addresses[k1].city'
 * ```
 */
export type FieldPath = readonly PathSegment[];

/** Return `true` when the segment addresses a list item. */
export function isItemSegment(segment: PathSegment): segment is ItemSegment {
  return typeof segment !== 'string';
}

/** Name of the child a segment refers to. */
export function segmentName(segment: PathSegment): string {
  return isItemSegment(segment) ? segment[0] : segment;
}

/** Render a path as `name.list[key].leaf`. Stable for equal paths. */
export function formatPath(path: FieldPath): string {
  return path
    .map((segment, index) => {
      const rendered = isItemSegment(segment) ? `${segment[0]}[${segment[1]}]` : segment;
      return index === 0 ? rendered : `.${rendered}`;
    })
    .join('');
}

/** Return a new path with a child name appended. */
export function childPath(path: FieldPath, name: string): FieldPath {
  return [...path, name];
}

/** Return a new path with a list item segment appended. */
export function itemPath(path: FieldPath, name: string, key: ItemKey): FieldPath {
  return [...path, [name, key]];
}
