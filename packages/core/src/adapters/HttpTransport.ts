/**
 * HttpTransport - seam between the API adapter and the Docker Engine.
 *
 * The default transport speaks HTTP over the engine's Unix socket (or a TCP
 * host/port) with node:http.
 */

import * as http from 'node:http';
import { TimeoutError } from '../types/errors';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  /** Path including query string, e.g. `/containers/json?all=true` */
  path: string;
  /** Serialized as JSON when present */
  body?: unknown;
  headers?: Readonly<Record<string, string>>;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

export interface HttpResponse {
  statusCode: number;
  body: Buffer;
}

export interface HttpTransport {
  /**
   * Send a request. Resolves with any status code; rejects on connection
   * errors and with TimeoutError when `timeoutMs` elapses.
   */
  request(request: HttpRequest): Promise<HttpResponse>;
}

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

export interface NodeHttpTransportOptions {
  /** Unix socket path; ignored when `host` is set */
  socketPath?: string;
  host?: string;
  port?: number;
}

export class NodeHttpTransport implements HttpTransport {
  private readonly endpoint: Pick<http.RequestOptions, 'socketPath' | 'host' | 'port'>;

  constructor(options: NodeHttpTransportOptions = {}) {
    this.endpoint = options.host
      ? { host: options.host, port: options.port ?? 2375 }
      : { socketPath: options.socketPath ?? DEFAULT_DOCKER_SOCKET };
  }

  request(request: HttpRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const payload = request.body === undefined ? '' : JSON.stringify(request.body);
      let deadline: NodeJS.Timeout | undefined;

      const succeed = (response: HttpResponse): void => {
        clearTimeout(deadline);
        resolve(response);
      };
      const fail = (error: Error): void => {
        clearTimeout(deadline);
        reject(error);
      };

      const options: http.RequestOptions = {
        ...this.endpoint,
        path: request.path,
        method: request.method,
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(payload),
          ...request.headers,
        },
      };

      const req = http.request(options, (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', fail);
        res.on('end', () => {
          succeed({ statusCode: res.statusCode ?? 0, body: Buffer.concat(chunks) });
        });
      });

      // Wall-clock limit on the whole exchange; a response that keeps
      // streaming does not extend it
      const timeoutMs = request.timeoutMs;
      if (timeoutMs !== undefined && timeoutMs > 0) {
        deadline = setTimeout(() => {
          const error = new TimeoutError(`${request.method} ${request.path}`, timeoutMs / 1000);
          fail(error);
          req.destroy(error);
        }, timeoutMs);
      }

      req.on('error', fail);
      req.end(payload);
    });
  }
}
