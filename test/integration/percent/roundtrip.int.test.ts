import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ErrorCode, decode, encode, isEncoded, validate } from '../../../src/index.js';

const UNRESERVED_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_.~'.split('');

describe('percent codec - property based', () => {
  it('decodes whatever it encodes', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (text) => {
        expect(decode(encode(text))).toEqual({ ok: true, value: text });
      }),
      { numRuns: 500 }
    );
  });

  it('only produces output the validator accepts', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (text) => {
        const encoded = encode(text);
        expect(validate(encoded)).toEqual({ ok: true });
        expect(/^(?:[A-Za-z0-9\-_.~]|%[0-9A-F]{2})*$/.test(encoded)).toBe(true);
      }),
      { numRuns: 500 }
    );
  });

  it('leaves unreserved strings unchanged in both directions', () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom(...UNRESERVED_CHARS)), (chars) => {
        const text = chars.join('');
        expect(encode(text)).toBe(text);
        expect(decode(text)).toEqual({ ok: true, value: text });
      })
    );
  });

  it('fails with a syntax error exactly when validation fails', () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        const result = decode(text);
        const syntaxError = !result.ok && result.error.code === ErrorCode.INVALID_CHARACTER;
        expect(isEncoded(text)).toBe(!syntaxError);
      })
    );
  });
});
