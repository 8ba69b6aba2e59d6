import { describe, it, expect, vi } from 'vitest';
import { FormSession } from '../../../src/FormSession.js';
import { aggregate, field, list, optional } from '../../../src/binding/builders.js';
import type { DomainEvent } from '../../../src/domain/events/DomainEvents.js';
import { int, requiredString } from '../../helpers/converters.js';
import { captureLogger } from '../../helpers/logger.js';
import { unwrap, unwrapErr } from '../../helpers/results.js';

function profileForm() {
  return aggregate({
    name: field(requiredString()),
    age: field(int()),
    nickname: optional(() => field(requiredString())),
    tags: list(() => aggregate({ label: field(requiredString()) })),
  });
}

function setup() {
  const { logger, lines } = captureLogger();
  const session = new FormSession(profileForm(), { formId: 'profile', logger });
  const events: DomainEvent[] = [];
  session.onAny((event) => events.push(event));
  return { session, events, lines };
}

describe('FormSession', () => {
  describe('setInput', () => {
    it('should publish the new field status', () => {
      const { session, events } = setup();

      unwrap(session.setInput(['age'], '4'));

      expect(events).toEqual([
        {
          type: 'field:changed',
          formId: 'profile',
          path: ['age'],
          status: { type: 'valid', value: 4 },
          timestamp: expect.any(Number),
        },
      ]);
    });

    it('should publish and log a rejected path', () => {
      const { session, events, lines } = setup();

      const error = unwrapErr(session.setInput(['nope'], 'x'));

      expect(events).toEqual([
        {
          type: 'operation:rejected',
          formId: 'profile',
          operation: 'setInput',
          path: ['nope'],
          code: 'UNKNOWN_PATH',
          message: error.message,
          timestamp: expect.any(Number),
        },
      ]);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 40,
        formId: 'profile',
        operation: 'setInput',
        path: 'nope',
        code: 'UNKNOWN_PATH',
        msg: "Unknown path 'nope': no child named 'nope'",
      });
    });

    it('should reject a path through an inherited object member instead of throwing', () => {
      const { session, events } = setup();

      const error = unwrapErr(session.setInput(['constructor', 'name'], 'x'));

      expect(error.code).toBe('UNKNOWN_PATH');
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'operation:rejected', operation: 'setInput', code: 'UNKNOWN_PATH' });
    });
  });

  describe('submit', () => {
    it('should publish the outcome and log the failing fields', () => {
      const { session, events, lines } = setup();

      const result = session.submit();

      expect(result.ok).toBe(false);
      expect(events).toEqual([
        { type: 'form:submitted', formId: 'profile', ok: false, errorCount: 2, timestamp: expect.any(Number) },
      ]);
      expect(lines[0]).toMatchObject({
        level: 30,
        msg: 'Form submission rejected',
        errorCount: 2,
        fields: ['name', 'age'],
      });
      expect(session.submitAttempted).toBe(true);
    });

    it('should return the model when every field is valid', () => {
      const { session, events } = setup();
      session.setInput(['name'], 'alice');
      session.setInput(['age'], '30');
      events.length = 0;

      expect(session.submit()).toEqual({
        ok: true,
        value: { name: 'alice', age: 30, nickname: undefined, tags: [] },
      });
      expect(events[0]).toMatchObject({ type: 'form:submitted', ok: true, errorCount: 0 });
    });

    it('should log a throwing subscriber and still return the result', () => {
      const { session, lines } = setup();
      session.on('form:submitted', () => {
        throw new Error('subscriber failed');
      });

      expect(session.submit().ok).toBe(false);
      expect(lines.find((line) => line.msg === 'Event handler threw')).toMatchObject({
        level: 50,
        event: 'form:submitted',
        err: { message: 'subscriber failed' },
      });
    });
  });

  describe('structural operations', () => {
    it('should publish optional toggles', () => {
      const { session, events } = setup();

      unwrap(session.setPresent(['nickname'], true));

      expect(events[0]).toMatchObject({ type: 'optional:toggled', path: ['nickname'], present: true });
    });

    it('should publish list changes with item keys', () => {
      const { session, events } = setup();

      const first = unwrap(session.addItem(['tags']));
      const second = unwrap(session.addItem(['tags'], { label: 'b' }));
      unwrap(session.reorderItems(['tags'], [second, first]));
      unwrap(session.removeItem(['tags'], first));

      expect(events.map((event) => event.type)).toEqual(['item:added', 'item:added', 'items:reordered', 'item:removed']);
      expect(events[1]).toMatchObject({ key: 'k2' });
      expect(events[2]).toMatchObject({ order: ['k2', 'k1'] });
      expect(events[3]).toMatchObject({ key: 'k1' });
    });

    it('should reject a stale key with UNKNOWN_KEY', () => {
      const { session, events } = setup();
      const key = unwrap(session.addItem(['tags']));
      unwrap(session.removeItem(['tags'], key));

      unwrapErr(session.removeItem(['tags'], key));

      expect(events[2]).toMatchObject({
        type: 'operation:rejected',
        operation: 'removeItem',
        path: ['tags'],
        code: 'UNKNOWN_KEY',
      });
    });

    it('should reject an invalid reorder with INVALID_REORDER', () => {
      const { session, events } = setup();
      unwrap(session.addItem(['tags']));

      unwrapErr(session.reorderItems(['tags'], ['k1', 'k1']));

      expect(events[1]).toMatchObject({ type: 'operation:rejected', operation: 'reorderItems', code: 'INVALID_REORDER' });
    });
  });

  describe('reset and clear', () => {
    it('should publish form:reset for both', () => {
      const { session, events } = setup();

      session.reset({ name: 'bob', age: 5, nickname: undefined, tags: [] });
      session.clear();

      expect(events.map((event) => (event.type === 'form:reset' ? event.cleared : null))).toEqual([false, true]);
      expect(session.isEmpty()).toBe(true);
    });
  });

  describe('fromModel', () => {
    it('should seed the form without counting as interaction', () => {
      const model = { name: 'alice', age: 30, nickname: 'Al', tags: [{ label: 'x' }] };

      const session = FormSession.fromModel(profileForm(), model, { logLevel: 'silent' });

      expect(session.statusSnapshot().get('tags[k1].label')).toMatchObject({ raw: 'x', touched: false });
      expect(session.hasUnsavedChanges(model)).toBe(false);
      expect(session.submitAttempted).toBe(false);
      expect(session.validationErrors().size).toBe(0);
    });
  });

  describe('subscriptions', () => {
    it('should chain on and off', () => {
      const { session } = setup();
      const handler = vi.fn();

      session.on('form:reset', handler).off('form:reset', handler);
      session.clear();

      expect(handler).not.toHaveBeenCalled();
    });

    it('should generate a form id when none is given', () => {
      const session = new FormSession(profileForm(), { logLevel: 'silent' });

      expect(session.formId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });
  });
});
