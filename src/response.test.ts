import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ResponseContext, normalizeStatus } from './response';

describe('ResponseContext', () => {
    it('starts as an empty 200 text/plain response', () => {
        const response = new ResponseContext();
        assert.equal(response.status, '200 OK');
        assert.equal(response.statusCode, 200);
        assert.deepEqual(response.headers, [['Content-Type', 'text/plain']]);
        assert.equal(response.body, '');
    });

    it('replaces headers case-insensitively with setHeader and appends with addHeader', () => {
        const response = new ResponseContext();
        response.setHeader('content-type', 'text/html');
        response.addHeader('Set-Cookie', 'a=1');
        response.addHeader('Set-Cookie', 'b=2');

        assert.deepEqual(response.headers, [
            ['content-type', 'text/html'],
            ['Set-Cookie', 'a=1'],
            ['Set-Cookie', 'b=2'],
        ]);
        assert.equal(response.getHeader('Content-Type'), 'text/html');
        assert.equal(response.getHeader('set-cookie'), 'b=2');

        response.removeHeader('SET-COOKIE');
        assert.deepEqual(response.headers, [['content-type', 'text/html']]);
    });

    it('send stringifies text and normalizes integer statuses', () => {
        const response = new ResponseContext();
        response.send(42, 201);
        assert.equal(response.body, '42');
        assert.equal(response.status, '201 OK');

        response.send('gone', '410 Gone');
        assert.equal(response.status, '410 Gone');
        assert.equal(response.statusCode, 410);
    });

    it('keeps Buffer bodies as bytes', () => {
        const response = new ResponseContext();
        const bytes = Buffer.from([0, 1, 2]);
        response.send(bytes);
        assert.equal(response.body, bytes);
    });

    it('json sets the content type and serializes the value', () => {
        const response = new ResponseContext().json({ ok: true }, '201 Created');
        assert.equal(response.getHeader('Content-Type'), 'application/json');
        assert.deepEqual(response.headers, [['Content-Type', 'application/json']]);
        assert.equal(response.body, '{"ok":true}');
        assert.equal(response.status, '201 Created');
    });

    it('html sets a text/html content type', () => {
        const response = new ResponseContext().html('<p>hi</p>');
        assert.deepEqual(response.headers, [['Content-Type', 'text/html']]);
        assert.equal(response.body, '<p>hi</p>');
    });

    it('redirects temporarily or permanently', () => {
        const temporary = new ResponseContext().redirect('/login');
        assert.equal(temporary.status, '302 Found');
        assert.equal(temporary.getHeader('Location'), '/login');
        assert.equal(temporary.body, 'Redirecting to /login');

        const permanent = new ResponseContext().redirect('/new-home', true);
        assert.equal(permanent.status, '301 Moved Permanently');
    });

    it('resolves handler targets through the attached resolver', () => {
        const profile = function profile() {};
        const response = new ResponseContext();
        response.resolveUrl = (handler, params) => `/${handler.name}/${params?.id}`;

        response.redirect(profile, false, { id: 7 });
        assert.equal(response.getHeader('Location'), '/profile/7');
        assert.equal(response.body, 'Redirecting to /profile/7');
    });

    it('refuses handler targets when no resolver is attached', () => {
        assert.throws(
            () => new ResponseContext().redirect(function dashboard() {}),
            /Cannot redirect to handler dashboard outside an app/,
        );
    });
});

describe('normalizeStatus', () => {
    it('appends OK to integer codes and keeps strings as given', () => {
        assert.equal(normalizeStatus(200), '200 OK');
        assert.equal(normalizeStatus('404 Not Found'), '404 Not Found');
    });
});
