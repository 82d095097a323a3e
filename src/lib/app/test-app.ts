/**
 * Test application for orchestrator, application and worker tests
 *
 * Every collaborator is a RecordingNode sharing one journal with the
 * application hooks, so a test can read the whole start or stop sequence
 * from `app.journal.entries`.
 */

import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks';
import { CompletionSignal } from '../completion-signal';
import { CallJournal, RecordingNode } from '../supervision/test-nodes';
import type { RecordingNodeOptions } from '../supervision/test-nodes';
import { Application } from './application';
import type { ApplicationOptions } from './application';
import type { TableManagerNode } from './types';

/**
 * Table manager whose recovery barrier the test completes by hand
 * (or on start, with `recoverOnStart`)
 */
export class RecordingTableManager
  extends RecordingNode
  implements TableManagerNode
{
  private readonly recoverOnStart: boolean;
  private readonly recovery = new CompletionSignal();

  constructor(
    options: Omit<RecordingNodeOptions, 'name'> & { recoverOnStart?: boolean },
  ) {
    super({ ...options, name: 'table-manager' });
    this.recoverOnStart = options.recoverOnStart ?? false;
  }

  public get recoveryCompleted(): Promise<void> {
    return this.recovery.promise;
  }

  public markRecovered(): void {
    this.recovery.resolveOnce();
  }

  protected async onStarted(): Promise<void> {
    await super.onStarted();

    if (this.recoverOnStart) {
      this.markRecovered();
    }
  }
}

export interface TestAppOptions
  extends Omit<Partial<ApplicationOptions>, 'logger' | 'components'> {
  /** Complete table recovery as soon as the table manager started (default true) */
  recoverOnStart?: boolean;
}

export class TestApp extends Application {
  public readonly journal: CallJournal;
  public readonly arraySink: ArraySink;
  public readonly tables: RecordingTableManager;

  public createDirectoriesCount = 0;
  public finalizeCount = 0;

  constructor(options: TestAppOptions = {}) {
    const { logger, arraySink } = Logger.createTestOptimizedLogger();
    const journal = new CallJournal();
    const node = (name: string): RecordingNode =>
      new RecordingNode({ name, logger, journal });
    const tables = new RecordingTableManager({
      logger,
      journal,
      recoverOnStart: options.recoverOnStart ?? true,
    });

    super({
      ...options,
      id: options.id ?? 'test-app',
      logger,
      monitor: options.monitor ?? node('monitor'),
      components: {
        producer: node('producer'),
        consumer: node('consumer'),
        replyConsumer: node('reply-consumer'),
        leaderAssignor: node('leader-assignor'),
        topicRouter: node('topic-router'),
        tableManager: tables,
        fetcher: node('fetcher'),
      },
    });

    this.journal = journal;
    this.arraySink = arraySink;
    this.tables = tables;
  }

  /** Register a RecordingNode agent sharing the app journal */
  public addAgent(name: string): RecordingNode {
    return this.agent(
      new RecordingNode({ name, logger: this.logger, journal: this.journal }),
    );
  }

  public createDirectories(): Promise<void> {
    this.createDirectoriesCount++;
    this.journal.record('app:create-directories');
    return Promise.resolve();
  }

  public finalize(): void {
    this.finalizeCount++;
    this.journal.record('app:finalize');
    super.finalize();
  }

  public async onFirstStart(): Promise<void> {
    this.journal.record('app:first-start');
    await super.onFirstStart();
  }

  public async onStart(): Promise<void> {
    this.journal.record('app:start');
    await super.onStart();
  }

  public async onStarted(): Promise<void> {
    this.journal.record('app:started');
    await super.onStarted();
  }

  public async onStop(): Promise<void> {
    this.journal.record('app:stop');
    await super.onStop();
  }

  public async onShutdown(): Promise<void> {
    this.journal.record('app:shutdown');
    await super.onShutdown();
  }

  public async onRestart(): Promise<void> {
    this.journal.record('app:restart');
    await super.onRestart();
  }
}
