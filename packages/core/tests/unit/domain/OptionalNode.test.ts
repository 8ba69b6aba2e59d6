import { describe, it, expect } from 'vitest';
import { aggregate, field, optional } from '../../../src/binding/builders.js';
import type { EvaluationContext } from '../../../src/domain/nodes/FormNode.js';
import { requiredString } from '../../helpers/converters.js';
import { innerField } from '../../helpers/nodes.js';
import { unwrap } from '../../helpers/results.js';

function dry(): EvaluationContext {
  return { mode: 'dry', errors: new Map() };
}

describe('OptionalNode', () => {
  it('should start absent and contribute undefined', () => {
    const nickname = optional(() => field(requiredString()));

    expect(nickname.present).toBe(false);
    expect(nickname.evaluate(dry(), ['nickname'])).toEqual({ ok: true, value: undefined });
  });

  it('should evaluate the inner node once present', () => {
    const nickname = optional(() => field(requiredString()));
    nickname.setPresent(true);
    const ctx = dry();

    expect(nickname.evaluate(ctx, ['nickname'])).toEqual({ ok: false });
    expect([...ctx.errors.keys()]).toEqual(['nickname']);
  });

  it('should return the new presence from toggle', () => {
    const nickname = optional(() => field(requiredString()));

    expect(nickname.toggle()).toBe(true);
    expect(nickname.toggle()).toBe(false);
  });

  it('should keep inner input while absent', () => {
    const form = aggregate({ nickname: optional(() => field(requiredString())) });
    const nickname = form.children.nickname;

    unwrap(form.setInput(['nickname'], 'Al'));
    expect(form.submit()).toEqual({ ok: true, value: { nickname: undefined } });

    unwrap(form.setPresent(['nickname'], true));
    expect(form.submit()).toEqual({ ok: true, value: { nickname: 'Al' } });

    nickname.setPresent(false);
    expect(innerField(nickname).raw).toBe('Al');
  });

  it('should not mark absent fields as submit attempted', () => {
    const form = aggregate({ nickname: optional(() => field(requiredString())) });

    form.submit();

    expect(form.children.nickname.inner.submitAttempted).toBe(false);
  });

  it('should leave absent subtrees out of the status snapshot', () => {
    const form = aggregate({
      name: field(requiredString()),
      billing: optional(() => aggregate({ street: field(requiredString()) })),
    });

    expect([...form.statusSnapshot().keys()]).toEqual(['name']);

    form.setPresent(['billing'], true);
    expect([...form.statusSnapshot().keys()]).toEqual(['name', 'billing.street']);
  });

  describe('reset', () => {
    it('should become present and seed the inner node from a value', () => {
      const nickname = optional(() => field(requiredString()));

      nickname.reset('Al');

      expect(nickname.present).toBe(true);
      expect(innerField(nickname).raw).toBe('Al');
      expect(innerField(nickname).touched).toBe(false);
    });

    it('should discard the inner node on undefined', () => {
      const nickname = optional(() => field(requiredString()));
      nickname.setPresent(true);
      innerField(nickname).setInput('Al');
      const before = nickname.inner;

      nickname.reset(undefined);

      expect(nickname.present).toBe(false);
      expect(nickname.inner).not.toBe(before);
      expect(innerField(nickname).raw).toBe('');
    });
  });

  it('should discard input and presence on clear', () => {
    const nickname = optional(() => field(requiredString()));
    nickname.reset('Al');

    nickname.clear();

    expect(nickname.present).toBe(false);
    expect(innerField(nickname).raw).toBe('');
  });

  it('should count as empty while absent, whatever the inner input', () => {
    const nickname = optional(() => field(requiredString()));
    innerField(nickname).setInput('Al');

    expect(nickname.isEmpty()).toBe(true);

    nickname.setPresent(true);
    expect(nickname.isEmpty()).toBe(false);
  });
});
