/**
 * One-shot request/response exchange over the Ghostty Unix socket.
 * Every request opens a fresh connection and tears it down before returning.
 */

import { createConnection } from 'net';
import type { DriverConfig } from '../types/index.js';
import type { IEnvironment, IStorage } from '../types/interfaces.js';
import { ConnectionError, DriverError, ProtocolError, TimeoutError } from '../errors.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import {
  buildRequest,
  encodeRequest,
  parseResponse,
  type ActionName,
  type ActionPayloads,
  type SuccessResponse,
} from '../protocol/envelope.js';
import { encodeFrame, FrameDecoder } from './framing.js';
import { validateSocketPath } from './socket-path.js';

export interface RequestSender {
  sendRequest<A extends ActionName>(action: A, payload?: ActionPayloads[A]): Promise<SuccessResponse>;
}

export interface TransportDeps {
  storage?: IStorage;
  env?: IEnvironment;
}

export class SocketTransport implements RequestSender {
  private storage: IStorage;
  private env: IEnvironment;

  constructor(
    private config: DriverConfig,
    deps: TransportDeps = {},
  ) {
    this.storage = deps.storage || new FileStorage();
    this.env = deps.env || new SystemEnvironment();
  }

  async sendRequest<A extends ActionName>(action: A, payload?: ActionPayloads[A]): Promise<SuccessResponse> {
    const { socketPath } = this.config;

    // Encode first so an oversize request never reaches the socket.
    const body = encodeRequest(buildRequest(action, payload, this.config.target));
    const frame = encodeFrame(body);

    if (this.config.validateSocket) {
      validateSocketPath(socketPath, this.storage, this.env.uid());
    } else if (!this.storage.exists(socketPath)) {
      throw new ConnectionError(`Socket not found: ${socketPath}`, 'missing');
    }

    const started = Date.now();
    const responseBody = await this.exchange(action, frame);
    if (this.config.debug) {
      console.debug(
        `[ghostty-ipc] ${action} sent=${body.length}B received=${responseBody.length}B in ${Date.now() - started}ms`,
      );
    }

    return parseResponse(responseBody);
  }

  private exchange(action: ActionName, frame: Buffer): Promise<Buffer> {
    const { socketPath, requestTimeoutMs } = this.config;

    return new Promise<Buffer>((resolve, reject) => {
      let done = false;
      let connected = false;
      const decoder = new FrameDecoder();

      const socket = createConnection(socketPath);

      const finish = (error: Error | null, body?: Buffer) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        socket.destroy();
        if (error) {
          reject(error);
        } else if (body) {
          resolve(body);
        }
      };

      const timer = setTimeout(() => {
        finish(new TimeoutError(`IPC request timed out: ${action}`, requestTimeoutMs));
      }, requestTimeoutMs);

      socket.once('connect', () => {
        connected = true;
        socket.write(frame);
      });

      socket.on('data', (chunk: Buffer) => {
        try {
          const body = decoder.push(chunk);
          if (body) finish(null, body);
        } catch (error) {
          finish(error instanceof DriverError ? error : new ProtocolError('Malformed response frame', { cause: error }));
        }
      });

      socket.on('error', (error) => {
        finish(
          connected
            ? new ConnectionError(`Socket error: ${error.message}`, 'unreachable', error)
            : new ConnectionError(`Failed to connect to socket: ${socketPath}`, 'unreachable', error),
        );
      });

      socket.on('close', () => {
        finish(new ConnectionError('Connection closed', 'closed'));
      });
    });
  }
}
