import { describe, test, expect, vi, afterEach } from 'vitest';
import { TestApp } from './app/test-app';
import { Worker } from './worker';
import type { WorkerOptions } from './worker';

describe('Worker', () => {
  const workers: Worker[] = [];

  const createWorker = (app: TestApp, options: WorkerOptions = {}): Worker => {
    const worker = new Worker(app, options);
    workers.push(worker);
    return worker;
  };

  const createApp = (): TestApp => {
    const app = new TestApp();
    app.addAgent('agent-a');
    return app;
  };

  afterEach(() => {
    for (const worker of workers.splice(0)) {
      worker.signalManager?.detach();
    }
  });

  test('runs the orchestrator and then the web facade', async () => {
    const app = createApp();
    const worker = createWorker(app);

    await worker.start();

    expect(worker.dependencies).toEqual([app.orchestrator, app.web]);
    expect(app.state).toBe('started');
    expect(app.web.state).toBe('started');
    expect(app.orchestrator.beacon.parent).toBe(worker.beacon);
    expect(worker.context).toBe(app.schedulingContext);
  });

  test('leaves the web facade out when disabled', async () => {
    const app = createApp();
    const worker = createWorker(app, { web: false });

    await worker.start();

    expect(worker.dependencies).toEqual([app.orchestrator]);
    expect(app.web.state).toBe('init');
  });

  test('announces readiness once the application is fully started', async () => {
    const app = createApp();
    const worker = createWorker(app, { attachSignals: false });

    await worker.start();

    const messages = app.arraySink.getMessages('worker');

    expect(messages).toContain('success: Ready: TestApp: test-app');
    expect(messages.indexOf('success: Ready: TestApp: test-app')).toBe(
      messages.findIndex((message) => message.startsWith('info: worker ')) - 1,
    );
  });

  test('keeps an onStartupFinished callback set by the application', async () => {
    const app = createApp();
    const onStartupFinished = vi.fn();

    app.onStartupFinished = onStartupFinished;
    const worker = createWorker(app, { attachSignals: false });

    await worker.start();

    expect(onStartupFinished).toHaveBeenCalledTimes(1);
    expect(app.arraySink.getMessages('worker')).not.toContain(
      'success: Ready: TestApp: test-app',
    );
  });

  test('logs the supervision tree', async () => {
    const app = createApp();
    const worker = createWorker(app, { attachSignals: false });

    await worker.start();
    app.arraySink.clear();
    worker.logTree();

    expect(app.arraySink.getMessages('worker')).toEqual([
      'info: ' +
        [
          'worker               started',
          '  TestApp: test-app  started',
          '    monitor          started',
          '    producer         started',
          '    consumer         started',
          '    leader-assignor  started',
          '    reply-consumer   started',
          '    agent-a          started',
          '    topic-router     started',
          '    table-manager    started',
          '    fetcher          started',
          '  web                started',
        ].join('\n'),
    ]);
  });

  test('stops on a shutdown signal and releases the signals', async () => {
    const app = createApp();
    const worker = createWorker(app);

    await worker.start();

    const signals = worker.signalManager;
    expect(signals?.isAttached).toBe(true);

    signals?.triggerShutdown('SIGTERM');

    await vi.waitFor(() => {
      expect(worker.state).toBe('stopped');
    });

    expect(app.state).toBe('stopped');
    expect(signals?.isAttached).toBe(false);
    expect(app.arraySink.getMessages('worker')).toContain(
      'notice: Received SIGTERM, stopping',
    );
  });

  test('restarts on SIGHUP and keeps listening', async () => {
    const app = createApp();
    const worker = createWorker(app);

    await worker.start();
    worker.signalManager?.triggerRestart();

    await vi.waitFor(() => {
      expect(app.journal.of('start').filter((name) => name === 'app')).toHaveLength(2);
      expect(worker.state).toBe('started');
    });

    expect(app.journal.of('stop')[0]).toBe('app');
    expect(worker.signalManager?.isAttached).toBe(true);
    expect(app.arraySink.getMessages('worker')).toContain(
      'notice: Received SIGHUP, restarting',
    );
  });

  test('logs the tree on SIGUSR1', async () => {
    const app = createApp();
    const worker = createWorker(app);

    await worker.start();
    app.arraySink.clear();
    worker.signalManager?.triggerInfo();

    expect(app.arraySink.getMessages('worker')).toHaveLength(1);
    expect(app.arraySink.getMessages('worker')[0]?.startsWith('info: worker ')).toBe(
      true,
    );
  });

  test('does not listen for signals when told not to', () => {
    const worker = createWorker(createApp(), { attachSignals: false });

    expect(worker.signalManager).toBeNull();
  });

  test('run() reports a failed start with exit code 1', async () => {
    const app = new TestApp();
    const worker = createWorker(app, { attachSignals: false });

    await expect(worker.run()).resolves.toBe(false);

    const failure = app.arraySink.logs.find(
      (log) => log.serviceName === 'worker' && log.exitCode === 1,
    );

    expect(failure?.type).toBe('error');
    expect(failure?.message.startsWith('Worker failed to start:\n\n')).toBe(true);
    expect(app.logger.didExit).toBe(true);
    expect(worker.state).toBe('crashed');
  });

  test('run() resolves true once started', async () => {
    const worker = createWorker(createApp(), { attachSignals: false });

    await expect(worker.run()).resolves.toBe(true);
    expect(worker.state).toBe('started');
  });
});
