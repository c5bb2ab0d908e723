import WebSocket, { type RawData } from 'ws';
import type { LogCollectOptions, LogTail } from './platform.js';

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export type WebSocketLogTailOptions = {
  urlFor: (containerId: string) => string;
  headers?: Record<string, string>;
};

/**
 * Tails container logs over the platform's WebSocket log endpoint.
 */
export class WebSocketLogTail implements LogTail {
  constructor(private readonly options: WebSocketLogTailOptions) {}

  collect(containerId: string, options: LogCollectOptions): Promise<string> {
    return new Promise((resolve, reject) => {
      let collected = '';
      let settled = false;
      const socket = new WebSocket(this.options.urlFor(containerId), { headers: this.options.headers });

      const finish = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        options.signal.removeEventListener('abort', onAbort);
        if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
        }
        if (error && collected.length === 0) {
          reject(error);
          return;
        }
        resolve(collected);
      };

      const onAbort = (): void => finish();

      socket.on('message', (data: RawData) => {
        collected += rawDataToString(data);
        if (options.isComplete(collected)) {
          finish();
        }
      });

      socket.on('error', (error: Error) => {
        finish(new Error(`log stream failed: ${error.message}`));
      });

      socket.on('close', () => {
        finish();
      });

      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }
}
