import { LifecycleNode } from '../supervision/lifecycle-node';
import type { LifecycleNodeOptions } from '../supervision/types';
import { ConfigurationError, appErrCodes } from './errors';

export interface WebOptions {
  /** Address to bind (default '0.0.0.0') */
  bind?: string;

  /** Host used in the public URL (default 'localhost') */
  host?: string;

  /** Port (default 6066) */
  port?: number;
}

export interface WebRequest {
  path: string;
  method?: string;
}

export interface WebResponse {
  status: number;
  contentType: string;
  body: Buffer;
}

export type WebHandler = (
  request: WebRequest,
) => WebResponse | Promise<WebResponse>;

export interface ResponseOptions {
  contentType?: string;
  status?: number;
}

/**
 * HTTP façade of an application.
 *
 * Holds the address, the routes and the response helpers; the server that
 * would listen on `bind:port` is not part of this package, so `dispatch()`
 * is how requests reach the routes. Joins the worker's graph like any
 * other node and only serves while started.
 */
export class Web extends LifecycleNode {
  public readonly bind: string;
  public readonly host: string;
  public readonly port: number;

  private readonly routes = new Map<string, WebHandler>();

  constructor(options: Omit<LifecycleNodeOptions, 'name'> & WebOptions) {
    super({ ...options, name: 'web' });

    this.bind = options.bind ?? '0.0.0.0';
    this.host = options.host ?? 'localhost';
    this.port = options.port ?? 6066;
  }

  public get url(): string {
    return `http://${this.host}:${this.port}/`;
  }

  public get routePatterns(): string[] {
    return [...this.routes.keys()];
  }

  /**
   * @throws {ConfigurationError} If the pattern already has a handler
   */
  public route(pattern: string, handler: WebHandler): void {
    if (this.routes.has(pattern)) {
      throw new ConfigurationError(
        `Route already registered: ${pattern}`,
        appErrCodes.DuplicateRegistration,
        { name: pattern },
      );
    }

    this.routes.set(pattern, handler);
  }

  public text(value: string, options: ResponseOptions = {}): WebResponse {
    return {
      status: options.status ?? 200,
      contentType: options.contentType ?? 'text/plain; charset=utf-8',
      body: Buffer.from(value, 'utf8'),
    };
  }

  public bytes(
    value: Uint8Array | string,
    options: ResponseOptions = {},
  ): WebResponse {
    return {
      status: options.status ?? 200,
      contentType: options.contentType ?? 'application/octet-stream',
      body: typeof value === 'string' ? Buffer.from(value) : Buffer.from(value),
    };
  }

  /**
   * Hand a request to the route registered for its path
   */
  public async dispatch(request: WebRequest): Promise<WebResponse> {
    if (this.state !== 'started') {
      return this.text('Service Unavailable', { status: 503 });
    }

    const handler = this.routes.get(request.path);

    if (!handler) {
      return this.text('Not Found', { status: 404 });
    }

    try {
      return await handler(request);
    } catch (error) {
      this.logger
        .entity(request.path)
        .errorObject('Route handler failed', error);

      return this.text('Internal Server Error', { status: 500 });
    }
  }

  protected onStarted(): void {
    this.logger.info('Serving {{count}} route(s) at {{url}}', {
      params: { count: this.routes.size, url: this.url },
    });
  }
}
