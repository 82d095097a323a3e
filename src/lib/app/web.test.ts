import { describe, test, expect, beforeEach } from 'vitest';
import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks';
import { ConfigurationError } from './errors';
import { Web } from './web';

describe('Web', () => {
  let logger: Logger;
  let arraySink: ArraySink;

  beforeEach(() => {
    ({ logger, arraySink } = Logger.createTestOptimizedLogger());
  });

  test('defaults its address', () => {
    const web = new Web({ logger });

    expect(web.name).toBe('web');
    expect(web.bind).toBe('0.0.0.0');
    expect(web.host).toBe('localhost');
    expect(web.port).toBe(6066);
    expect(web.url).toBe('http://localhost:6066/');
  });

  test('builds the url from host and port', () => {
    const web = new Web({ logger, bind: '127.0.0.1', host: 'orders.internal', port: 8080 });

    expect(web.bind).toBe('127.0.0.1');
    expect(web.url).toBe('http://orders.internal:8080/');
  });

  test('text() encodes utf-8 with a plain text content type', () => {
    const web = new Web({ logger });

    const response = web.text('héllo');

    expect(response.status).toBe(200);
    expect(response.contentType).toBe('text/plain; charset=utf-8');
    expect(response.body.toString('utf8')).toBe('héllo');
    expect(response.body.length).toBe(6);
  });

  test('bytes() keeps raw bytes and accepts overrides', () => {
    const web = new Web({ logger });

    const raw = web.bytes(new Uint8Array([1, 2, 3]));
    const json = web.bytes('{"ok":true}', {
      contentType: 'application/json',
      status: 201,
    });

    expect(raw.contentType).toBe('application/octet-stream');
    expect([...raw.body]).toEqual([1, 2, 3]);
    expect(json.status).toBe(201);
    expect(json.contentType).toBe('application/json');
    expect(json.body.toString()).toBe('{"ok":true}');
  });

  test('rejects a second handler for one route', () => {
    const web = new Web({ logger });

    web.route('/health', () => web.text('ok'));

    expect(() => web.route('/health', () => web.text('ok'))).toThrow(
      ConfigurationError,
    );
    expect(web.routePatterns).toEqual(['/health']);
  });

  test('is unavailable until started', async () => {
    const web = new Web({ logger });
    web.route('/health', () => web.text('ok'));

    const response = await web.dispatch({ path: '/health' });

    expect(response.status).toBe(503);
    expect(response.body.toString()).toBe('Service Unavailable');
  });

  test('dispatches to the registered route once started', async () => {
    const web = new Web({ logger });
    web.route('/health', () => web.text('ok'));
    web.route('/stats', async (request) =>
      web.text(`${request.method ?? 'GET'} ${request.path}`),
    );

    await web.start();

    const health = await web.dispatch({ path: '/health' });
    const stats = await web.dispatch({ path: '/stats', method: 'POST' });
    const missing = await web.dispatch({ path: '/missing' });

    expect(health.body.toString()).toBe('ok');
    expect(stats.body.toString()).toBe('POST /stats');
    expect(missing.status).toBe(404);
    expect(missing.body.toString()).toBe('Not Found');
    expect(arraySink.getMessages('web')).toContain(
      'info: Serving 2 route(s) at http://localhost:6066/',
    );
  });

  test('turns a failing handler into a 500 and logs it', async () => {
    const web = new Web({ logger });
    const failure = new Error('template missing');

    web.route('/boom', () => {
      throw failure;
    });

    await web.start();

    const response = await web.dispatch({ path: '/boom' });
    const logged = arraySink.logs.find(
      (log) => log.serviceName === 'web' && log.type === 'error',
    );

    expect(response.status).toBe(500);
    expect(response.body.toString()).toBe('Internal Server Error');
    expect(logged?.entityName).toBe('/boom');
    expect(logged?.error).toBe(failure);
    expect(logged?.message.startsWith('Route handler failed:\n\n')).toBe(true);
  });

  test('stops serving once stopped', async () => {
    const web = new Web({ logger });
    web.route('/health', () => web.text('ok'));

    await web.start();
    await web.stop();

    expect((await web.dispatch({ path: '/health' })).status).toBe(503);
  });
});
