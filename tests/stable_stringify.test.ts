import test from 'node:test';
import assert from 'node:assert/strict';

import { stableStringify } from '../src/stable_stringify';

test('object keys are sorted at every depth', () => {
    assert.equal(stableStringify({ b: 1, a: { d: [2, 1], c: null } }), '{"a":{"c":null,"d":[2,1]},"b":1}');
});

test('undefined properties are skipped', () => {
    assert.equal(stableStringify({ a: undefined, b: 'x' }), '{"b":"x"}');
});

test('equal values give equal bytes regardless of insertion order', () => {
    const left = { inventory: { widget: 3, gadget: 1 }, records: {} };
    const right = { records: {}, inventory: { gadget: 1, widget: 3 } };
    assert.equal(stableStringify(left), stableStringify(right));
});

test('non-finite numbers and unsupported types are rejected', () => {
    assert.throws(() => stableStringify(Number.NaN), /NON_FINITE_NUMBER/);
    assert.throws(() => stableStringify(undefined), /UNSUPPORTED_JSON_TYPE/);
    assert.throws(() => stableStringify(10n), /UNSUPPORTED_JSON_TYPE/);
});
