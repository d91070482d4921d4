/**
 * Hash Engine Client
 * Talks to the local hash service over a persistent TCP connection.
 *
 * Protocol: one UTF-8 request line in, one hex hash line out.
 * Any socket failure or empty response drops the connection; the next exchange reconnects.
 */

import * as net from 'net';
import Logger from '../utils/logger';

export interface HashOracle {
  exchange(payload: string): Promise<string | null>;
  close(): void;
}

export interface HashEngineOptions {
  host: string;
  port: number;
  timeoutMs?: number;
  label?: string;
}

export type HashOracleFactory = (workerId: number) => HashOracle;

export const DEFAULT_HASH_ENGINE_TIMEOUT_MS = 5000;

const NEWLINE = 0x0a;

export class HashEngineClient implements HashOracle {
  private socket: net.Socket | null = null;
  private connecting: Promise<boolean> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly timeoutMs: number;
  private readonly label: string;

  constructor(private readonly options: HashEngineOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HASH_ENGINE_TIMEOUT_MS;
    this.label = options.label ?? 'hash-engine';
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * Connect if needed. Resolves false on connect error or timeout, never rejects.
   */
  ensureConnected(): Promise<boolean> {
    if (this.socket) {
      return Promise.resolve(true);
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Send one payload and read one response line.
   * Resolves null on any transient failure; exchanges run one at a time.
   */
  exchange(payload: string): Promise<string | null> {
    const result = this.tail.then(() => this.exchangeNow(payload));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  close(): void {
    this.discard();
  }

  private connect(): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const socket = net.createConnection({ host: this.options.host, port: this.options.port });
      let settled = false;

      const fail = (reason: string) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        Logger.debug(this.label, `Cannot connect to ${this.options.host}:${this.options.port}: ${reason}`);
        resolve(false);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('timeout', () => fail('connect timeout'));
      socket.once('error', (error: Error) => fail(error.message));
      socket.once('connect', () => {
        if (settled) return;
        settled = true;
        socket.removeAllListeners('timeout');
        socket.removeAllListeners('error');
        this.adopt(socket);
        resolve(true);
      });
    });
  }

  private adopt(socket: net.Socket): void {
    socket.setNoDelay(true);
    // Errors outside an exchange only invalidate the connection
    socket.on('error', () => this.discard(socket));
    socket.on('close', () => this.discard(socket));
    this.socket = socket;
  }

  private discard(socket: net.Socket | null = this.socket): void {
    if (!socket) return;
    if (this.socket === socket) {
      this.socket = null;
    }
    socket.destroy();
  }

  private async exchangeNow(payload: string): Promise<string | null> {
    if (!(await this.ensureConnected())) {
      return null;
    }
    const socket = this.socket;
    if (!socket) {
      return null;
    }

    return new Promise<string | null>(resolve => {
      const chunks: Buffer[] = [];
      let done = false;

      const finish = (line: string | null, broken: boolean) => {
        if (done) return;
        done = true;
        socket.off('data', onData);
        socket.off('error', onBroken);
        socket.off('end', onBroken);
        socket.off('close', onBroken);
        socket.off('timeout', onBroken);
        if (broken) {
          this.discard(socket);
        }
        resolve(line);
      };

      const onData = (chunk: Buffer) => {
        chunks.push(chunk);
        const newlineAt = chunk.indexOf(NEWLINE);
        if (newlineAt === -1) return;
        // Anything after the first line is dropped
        const buffer = Buffer.concat(chunks);
        const line = buffer.subarray(0, buffer.indexOf(NEWLINE)).toString('utf8').trim();
        if (line.length === 0) {
          finish(null, true);
          return;
        }
        finish(line, false);
      };
      const onBroken = () => finish(null, true);

      socket.on('data', onData);
      socket.once('error', onBroken);
      socket.once('end', onBroken);
      socket.once('close', onBroken);
      socket.once('timeout', onBroken);

      socket.write(`${payload}\n`, 'utf8', (error?: Error | null) => {
        if (error) onBroken();
      });
    });
  }
}

export function createHashEngineFactory(options: HashEngineOptions): HashOracleFactory {
  return (workerId: number) => new HashEngineClient({ ...options, label: `hash-engine:${workerId}` });
}
