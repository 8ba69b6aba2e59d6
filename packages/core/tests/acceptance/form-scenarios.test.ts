import { describe, it, expect } from 'vitest';
import { FormSession } from '../../src/FormSession.js';
import { aggregate, field, list, optional } from '../../src/binding/builders.js';
import { UnknownKeyError, UnknownPathError } from '../../src/domain/model/FormErrors.js';
import { int, requiredString } from '../helpers/converters.js';
import { unwrap, unwrapErr } from '../helpers/results.js';

// --- Helpers ---

function loginSession() {
  return new FormSession(
    aggregate({
      username: field(requiredString()),
      password: field(requiredString()),
    }),
    { logLevel: 'silent' },
  );
}

function itemsSession() {
  return new FormSession(aggregate({ items: list(() => aggregate({ name: field(requiredString()) })) }), {
    logLevel: 'silent',
  });
}

describe('Form scenarios', () => {
  it('should reject a login with an empty password, then accept it once filled in', () => {
    const session = loginSession();
    unwrap(session.setInput(['username'], 'alice'));
    unwrap(session.setInput(['password'], ''));

    const rejected = session.submit();

    expect(rejected.ok).toBe(false);
    if (rejected.ok) return;
    expect([...rejected.errors.keys()]).toEqual(['password']);
    expect(rejected.errors.get('password')?.error).toEqual({ code: 'REQUIRED' });

    unwrap(session.setInput(['password'], 'hunter2'));

    expect(session.submit()).toEqual({ ok: true, value: { username: 'alice', password: 'hunter2' } });
  });

  it('should address list items by key across removals', () => {
    const session = itemsSession();
    const first = unwrap(session.addItem(['items']));
    const second = unwrap(session.addItem(['items']));
    expect([first, second]).toEqual(['k1', 'k2']);

    unwrap(session.setInput([['items', first], 'name'], 'a'));
    unwrap(session.setInput([['items', second], 'name'], 'b'));
    expect(session.submit()).toEqual({ ok: true, value: { items: [{ name: 'a' }, { name: 'b' }] } });

    unwrap(session.removeItem(['items'], first));
    expect(session.submit()).toEqual({ ok: true, value: { items: [{ name: 'b' }] } });
  });

  it('should never reuse a removed key', () => {
    const session = itemsSession();
    const first = unwrap(session.addItem(['items']));
    unwrap(session.removeItem(['items'], first));
    const second = unwrap(session.addItem(['items']));

    expect(second).not.toBe(first);

    const error = unwrapErr(session.setInput([['items', first], 'name'], 'stale'));
    expect(error).toBeInstanceOf(UnknownKeyError);
    expect(error).toBeInstanceOf(UnknownPathError);
    expect(error.code).toBe('UNKNOWN_KEY');
  });

  it('should ignore invalid input inside an absent optional branch', () => {
    const session = new FormSession(
      aggregate({
        name: field(requiredString()),
        shipping: optional(() => aggregate({ street: field(requiredString()), number: field(int()) })),
      }),
      { logLevel: 'silent' },
    );
    unwrap(session.setInput(['name'], 'alice'));
    unwrap(session.setInput(['shipping', 'number'], 'not a number'));

    expect(session.submit()).toEqual({ ok: true, value: { name: 'alice', shipping: undefined } });

    unwrap(session.setPresent(['shipping'], true));
    const result = session.submit();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect([...result.errors.keys()]).toEqual(['shipping.street', 'shipping.number']);
  });

  it('should report every invalid field, not just the first', () => {
    const session = new FormSession(
      aggregate({ a: field(int()), b: field(int()), c: field(int()) }),
      { logLevel: 'silent' },
    );
    session.setInput(['a'], 'x');
    session.setInput(['b'], 'y');
    session.setInput(['c'], 'z');

    const result = session.submit();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect([...result.errors.keys()]).toEqual(['a', 'b', 'c']);
  });

  it('should return equal results when submitted twice without edits', () => {
    const failing = loginSession();
    expect(failing.submit()).toEqual(failing.submit());

    const passing = loginSession();
    passing.setInput(['username'], 'alice');
    passing.setInput(['password'], 'hunter2');
    expect(passing.submit()).toEqual(passing.submit());
  });

  it('should report untouched required fields as empty before any submit', () => {
    const session = loginSession();

    const snapshot = session.statusSnapshot();

    expect(snapshot.get('username')).toEqual({
      path: ['username'],
      raw: '',
      status: { type: 'empty' },
      touched: false,
      submitAttempted: false,
    });
    expect(snapshot.get('password')?.status).toEqual({ type: 'empty' });
  });

  it('should show required errors only after the first submit attempt', () => {
    const session = loginSession();
    session.submit();

    expect(session.statusSnapshot().get('username')).toMatchObject({
      status: { type: 'empty' },
      submitAttempted: true,
      message: 'This field is required.',
    });
  });

  it('should submit the model it was seeded from', () => {
    const model = {
      name: 'alice',
      shipping: { street: 'Main St', number: 12 },
      items: [{ name: 'a' }, { name: 'b' }],
    };
    const form = aggregate({
      name: field(requiredString()),
      shipping: optional(() => aggregate({ street: field(requiredString()), number: field(int()) })),
      items: list(() => aggregate({ name: field(requiredString()) })),
    });

    const session = FormSession.fromModel(form, model, { logLevel: 'silent' });

    expect(session.submit()).toEqual({ ok: true, value: model });
    expect(session.hasUnsavedChanges(model)).toBe(false);
  });
});
