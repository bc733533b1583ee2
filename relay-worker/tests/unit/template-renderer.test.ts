import { describe, expect, it } from 'vitest';

import { renderTemplate, resolvePlaceholder } from '../../src/processors/template-renderer.js';

describe('template renderer', () => {
  it('substitutes placeholders and leaves other values alone', () => {
    const rendered = renderTemplate(
      { id: '{$.event.user_id}', n: 5 },
      { data: { user_id: '42' } },
    );

    expect(rendered).toEqual({ id: '42', n: 5 });
  });

  it('keeps the type of the substituted value', () => {
    const data = {
      amount: 100,
      paid: true,
      note: null,
      items: ['a', 'b'],
      address: { city: 'Lisbon' },
    };

    expect(
      renderTemplate(
        {
          amount: '{$.event.amount}',
          paid: '{$.event.paid}',
          note: '{$.event.note}',
          items: '{$.event.items}',
          address: '{$.event.address}',
        },
        { data },
      ),
    ).toEqual(data);
  });

  it('returns the literal placeholder when the field is missing', () => {
    expect(renderTemplate('{$.event.missing}', { data: {} })).toBe('{$.event.missing}');
    expect(renderTemplate('{$.event.constructor}', { data: {} })).toBe('{$.event.constructor}');
  });

  it('replaces every occurrence inside nested arrays and objects', () => {
    const rendered = renderTemplate(
      { a: ['x', '{$.event.f}'], b: { c: '{$.event.f}' } },
      { data: { f: 7 } },
    );

    expect(rendered).toEqual({ a: ['x', 7], b: { c: 7 } });
  });

  it('passes strings outside the placeholder grammar through verbatim', () => {
    const data = { f: 'value', event: 'value', a: { b: 'deep' } };
    const verbatim = [
      '{$.event}',
      '{$.event.}',
      '{$.event.a.b}',
      '{$.event.a.b.c}',
      '{$.other.f}',
      '{$.event.f',
      '$.event.f}',
      '$.event.f',
      'id: {$.event.f}',
      '{$.event.f} suffix',
      '{{$.event.f}}',
      '',
    ];

    for (const value of verbatim) {
      expect(resolvePlaceholder(value, { data })).toBe(value);
    }
  });

  it('passes scalar templates through unchanged', () => {
    expect(renderTemplate(5, { data: {} })).toBe(5);
    expect(renderTemplate(false, { data: {} })).toBe(false);
    expect(renderTemplate(null, { data: {} })).toBeNull();
  });

  it('preserves array length and order', () => {
    const rendered = renderTemplate(['{$.event.a}', 1, '{$.event.b}', '{$.event.a}'], {
      data: { a: 'first', b: 'second' },
    });

    expect(rendered).toEqual(['first', 1, 'second', 'first']);
  });

  it('does not modify the template', () => {
    const template = { id: '{$.event.user_id}', nested: ['{$.event.user_id}'] };

    renderTemplate(template, { data: { user_id: '42' } });

    expect(template).toEqual({ id: '{$.event.user_id}', nested: ['{$.event.user_id}'] });
  });
});
