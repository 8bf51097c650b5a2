import { describe, it, expect } from 'vitest';
import { SensitiveDataFilter, placeholderFor } from '../../src/context/sensitive-data.js';

describe('SensitiveDataFilter', () => {
  it('masks every occurrence with a named placeholder', () => {
    const filter = new SensitiveDataFilter({ password: 'test-secret' });
    expect(filter.mask('type test-secret, then test-secret again')).toBe(
      'type <secret>password</secret>, then <secret>password</secret> again',
    );
  });

  it('masks longer secrets before the ones they contain', () => {
    const filter = new SensitiveDataFilter({ short: 'abc', long: 'abcdef' });
    expect(filter.mask('xabcdefy abc')).toBe('x<secret>long</secret>y <secret>short</secret>');
  });

  it('ignores empty secret values', () => {
    const filter = new SensitiveDataFilter({ blank: '' });
    expect(filter.isEmpty).toBe(true);
    expect(filter.mask('nothing to hide')).toBe('nothing to hide');
  });

  it('masks the text parts of a message and leaves images alone', () => {
    const filter = new SensitiveDataFilter({ token: 'test-token' });
    const masked = filter.maskMessage({
      role: 'user',
      kind: 'state',
      content: [
        { type: 'text', text: 'value="test-token"' },
        { type: 'image', mediaType: 'image/png', data: 'test-token' },
      ],
    });
    expect(masked.content).toEqual([
      { type: 'text', text: 'value="<secret>token</secret>"' },
      { type: 'image', mediaType: 'image/png', data: 'test-token' },
    ]);
  });

  it('reveals placeholders anywhere in a parameter record', () => {
    const filter = new SensitiveDataFilter({ pw: 'test-secret' });
    expect(
      filter.reveal({ text: `${placeholderFor('pw')}!`, list: ['<secret>other</secret>'], index: 3 }),
    ).toEqual({ text: 'test-secret!', list: ['<secret>other</secret>'], index: 3 });
  });

  it('lists the configured names', () => {
    expect(new SensitiveDataFilter({ a: 'x', b: 'yy' }).names).toEqual(['b', 'a']);
  });
});
