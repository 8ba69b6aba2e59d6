import type { Converter } from '../ports/Converter.js';
import type { FieldPath } from '../model/FieldPath.js';
import type { FieldStatus } from '../model/FieldStatus.js';
import type { ParseError } from '../model/ParseError.js';
import type { Result } from '../model/Result.js';
import type { FieldStatusEntry } from '../model/StatusSnapshot.js';
import type { EvaluationContext, Evaluated, TreeNode } from './FormNode.js';
import { emptyStatus, invalidStatus, validStatus } from '../model/FieldStatus.js';
import { describeParseError } from '../model/ParseError.js';
import { formatPath } from '../model/FieldPath.js';

/** Options for a single field. */
export interface FieldOptions {
  /** When `true`, whitespace-only input counts as empty. Default: `false`. */
  readonly blankIsEmpty?: boolean;
}

/**
 * One editable slot: raw user input, the converter for its value type, and
 * the interaction flags a UI needs to decide when to show errors.
 *
 * `status()` is derived from `raw` and the converter only. It is cached
 * between edits but never authoritative.
 */
export class FieldNode<T> implements TreeNode<T> {
  readonly kind = 'field' as const;

  private rawInput = '';
  private initialInput = '';
  private touchedFlag = false;
  private submitAttemptedFlag = false;
  private cachedStatus: FieldStatus<T> | null = null;

  constructor(
    readonly converter: Converter<T>,
    private readonly options: FieldOptions = {},
  ) {}

  /** Current raw input. */
  get raw(): string {
    return this.rawInput;
  }

  /** Raw input as last seeded by `reset()` or `clear()`. */
  get initialRaw(): string {
    return this.initialInput;
  }

  /** `true` once the user has edited this field since the last reset. */
  get touched(): boolean {
    return this.touchedFlag;
  }

  /** `true` once a submit has evaluated this field since the last reset. */
  get submitAttempted(): boolean {
    return this.submitAttemptedFlag;
  }

  /** Replace the raw input. Parse failures surface through `status()`, never as exceptions. */
  setInput(raw: string): void {
    this.rawInput = raw;
    this.touchedFlag = true;
    this.cachedStatus = null;
  }

  status(): FieldStatus<T> {
    if (this.cachedStatus === null) {
      this.cachedStatus = this.computeStatus();
    }
    return this.cachedStatus;
  }

  markSubmitAttempted(): void {
    this.submitAttemptedFlag = true;
  }

  /** Seed the field with `value`. Does not count as a touch and clears the submit flag. */
  reset(value: T): void {
    // A model missing this field's property hands `format` an undefined value it may not handle.
    const seeded: unknown = this.converter.format(value);
    const formatted = typeof seeded === 'string' ? seeded : '';
    this.rawInput = formatted;
    this.initialInput = formatted;
    this.touchedFlag = false;
    this.submitAttemptedFlag = false;
    this.cachedStatus = null;
  }

  clear(): void {
    this.rawInput = '';
    this.initialInput = '';
    this.touchedFlag = false;
    this.submitAttemptedFlag = false;
    this.cachedStatus = null;
  }

  /**
   * Value this field would submit. An empty field defers to `converter.parse('')`,
   * so required types fail with `REQUIRED` and optional types yield their empty value.
   */
  result(): Result<T, ParseError> {
    const status = this.status();
    switch (status.type) {
      case 'valid':
        return { ok: true, value: status.value };
      case 'invalid':
        return { ok: false, error: status.error };
      case 'empty':
        return this.converter.parse('');
    }
  }

  /** Mark the field as submit-attempted and return its value or error. */
  submit(): Result<T, ParseError> {
    this.markSubmitAttempted();
    return this.result();
  }

  isEmpty(): boolean {
    return this.options.blankIsEmpty ? this.rawInput.trim() === '' : this.rawInput === '';
  }

  /** `true` when the raw input differs from what `reset()` or `clear()` last seeded. */
  isDirty(): boolean {
    return this.rawInput !== this.initialInput;
  }

  /** Whether a UI should show this field's error now: after interaction or a submit attempt, and only if it would fail. */
  showValidationMessage(): boolean {
    return (this.touchedFlag || this.submitAttemptedFlag) && !this.result().ok;
  }

  /** The error to display now, or `undefined` while the user has not interacted or the input is acceptable. */
  validationError(): ParseError | undefined {
    if (!this.touchedFlag && !this.submitAttemptedFlag) return undefined;
    const result = this.result();
    return result.ok ? undefined : result.error;
  }

  evaluate(ctx: EvaluationContext, path: FieldPath): Evaluated<T> {
    if (ctx.mode === 'submit') {
      this.markSubmitAttempted();
    }
    const result = this.result();
    if (result.ok) {
      return { ok: true, value: result.value };
    }
    const key = formatPath(path);
    ctx.errors.set(key, { path, key, error: result.error, message: describeParseError(result.error) });
    return { ok: false };
  }

  collectStatus(path: FieldPath, into: Map<string, FieldStatusEntry>): void {
    const error = this.validationError();
    const entry: FieldStatusEntry = {
      path,
      raw: this.rawInput,
      status: this.status(),
      touched: this.touchedFlag,
      submitAttempted: this.submitAttemptedFlag,
    };
    into.set(formatPath(path), error !== undefined ? { ...entry, message: describeParseError(error) } : entry);
  }

  private computeStatus(): FieldStatus<T> {
    if (this.isEmpty()) {
      return emptyStatus();
    }
    const parsed = this.converter.parse(this.rawInput);
    return parsed.ok ? validStatus(parsed.value) : invalidStatus(parsed.error);
  }
}
