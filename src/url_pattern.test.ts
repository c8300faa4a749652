import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { URLPattern, hasPlaceholders } from './url_pattern';

describe('URLPattern', () => {
    it('converts int and float placeholders to numbers', () => {
        const pattern = new URLPattern('/items/<int:id>/price/<float:amount>');
        assert.deepEqual(pattern.match('/items/42/price/9.5'), { id: 42, amount: 9.5 });
        assert.deepEqual(pattern.match('/items/7/price/3'), { id: 7, amount: 3 });
    });

    it('defaults untyped placeholders to a single string segment', () => {
        const pattern = new URLPattern('/greet/<name>');
        assert.deepEqual(pattern.match('/greet/Ada'), { name: 'Ada' });
        assert.equal(pattern.match('/greet/Ada/Lovelace'), null);
        assert.equal(pattern.match('/greet/'), null);
    });

    it('anchors on the full path', () => {
        const pattern = new URLPattern('/users/<int:id>');
        assert.equal(pattern.match('/users/42/extra'), null);
        assert.equal(pattern.match('/api/users/42'), null);
        assert.equal(pattern.match('/users/abc'), null);
    });

    it('lets path placeholders span slashes', () => {
        const pattern = new URLPattern('/files/<path:rest>');
        assert.deepEqual(pattern.match('/files/docs/2024/report.txt'), { rest: 'docs/2024/report.txt' });
    });

    it('only accepts canonical lowercase uuids', () => {
        const pattern = new URLPattern('/orders/<uuid:orderId>');
        assert.deepEqual(pattern.match('/orders/123e4567-e89b-12d3-a456-426614174000'), {
            orderId: '123e4567-e89b-12d3-a456-426614174000',
        });
        assert.equal(pattern.match('/orders/123e4567-e89b-12d3-a456'), null);
        assert.equal(pattern.match('/orders/123E4567-E89B-12D3-A456-426614174000'), null);
    });

    it('falls back to the string sub-pattern for unknown types', () => {
        const pattern = new URLPattern('/tags/<slug:tag>');
        assert.deepEqual(pattern.parameters, [{ name: 'tag', type: 'string' }]);
        assert.deepEqual(pattern.match('/tags/typescript'), { tag: 'typescript' });
    });

    it('treats literal text around placeholders as literal, not as a regex', () => {
        const pattern = new URLPattern('/report.<format>');
        assert.deepEqual(pattern.match('/report.csv'), { format: 'csv' });
        assert.equal(pattern.match('/reportXcsv'), null);
    });

    it('rejects integers that cannot be represented exactly', () => {
        const pattern = new URLPattern('/users/<int:id>');
        assert.equal(pattern.match('/users/99999999999999999999'), null);
    });

    it('degrades to an exact compare without placeholders', () => {
        const pattern = new URLPattern('/health');
        assert.equal(pattern.isDynamic, false);
        assert.deepEqual(pattern.match('/health'), {});
        assert.equal(pattern.match('/health/'), null);
    });

    it('rejects duplicate parameter names', () => {
        assert.throws(() => new URLPattern('/a/<id>/b/<int:id>'), /Duplicate parameter "id"/);
    });

    it('builds a path back from parameter values', () => {
        const pattern = new URLPattern('/users/<int:id>/files/<path:rest>');
        assert.equal(pattern.build({ id: 7, rest: 'a b/c.txt' }), '/users/7/files/a%20b/c.txt');
        assert.equal(new URLPattern('/greet/<name>').build({ name: 'a/b' }), '/greet/a%2Fb');
        assert.throws(() => pattern.build({ id: 7 }), /Missing value for parameter "rest"/);
    });
});

describe('hasPlaceholders', () => {
    it('detects placeholder syntax', () => {
        assert.equal(hasPlaceholders('/users/<id>'), true);
        assert.equal(hasPlaceholders('/users/<int:id>'), true);
        assert.equal(hasPlaceholders('/users'), false);
        assert.equal(hasPlaceholders('/a<b'), false);
    });
});
