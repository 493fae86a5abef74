/**
 * Single-connection cache session
 *
 * One session owns one socket for the lifetime of one logical operation.
 * Commands are strictly request/response: a second command may only be sent
 * once the reply to the first has been read.
 */

import * as core from '@actions/core';
import * as net from 'net';
import * as tls from 'tls';
import {Reply, describeReply, encodeCommand, readReply} from '../resp';
import {ConnectError, ProtocolError, TimeoutError} from './errors';
import {AuthResult, SessionState, TransportConfig} from './types';

/**
 * Opens the raw socket. `onReady` fires once the connection (and the TLS
 * handshake, when enabled) has completed.
 */
export type SocketConnector = (
  config: TransportConfig,
  onReady: () => void
) => net.Socket;

export type SessionFactory = () => Promise<CacheSession>;

export function buildTlsOptions(config: TransportConfig): tls.ConnectionOptions {
  const options: tls.ConnectionOptions = {
    host: config.host,
    port: config.port,
  };

  // SNI is not allowed for IP literals
  if (net.isIP(config.host) === 0) {
    options.servername = config.host;
  }

  if (config.insecureTransport) {
    options.rejectUnauthorized = false;
    options.checkServerIdentity = () => undefined;
  }

  return options;
}

export const connectSocket: SocketConnector = (config, onReady) =>
  config.tls
    ? tls.connect(buildTlsOptions(config), onReady)
    : net.connect({host: config.host, port: config.port}, onReady);

export class CacheSession {
  private currentState: SessionState = 'connected';
  private inFlight = false;

  private constructor(
    private readonly socket: net.Socket,
    private readonly config: TransportConfig
  ) {
    socket.on('error', error => {
      core.debug(`[session] Socket error: ${error.message}`);
      this.currentState = 'closed';
    });
    socket.on('close', () => {
      this.currentState = 'closed';
    });
  }

  /**
   * Connect (and handshake) within `connectTimeoutMs`.
   * Rejects with ConnectError or TimeoutError; the socket is destroyed first.
   */
  static open(
    config: TransportConfig,
    connector: SocketConnector = connectSocket
  ): Promise<CacheSession> {
    const target = `${config.host}:${config.port}`;
    core.debug(
      `[session] Connecting to ${target} (tls: ${config.tls}, verify certificates: ${config.tls && !config.insecureTransport})`
    );

    return new Promise<CacheSession>((resolve, reject) => {
      let socket: net.Socket;
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.removeListener('close', onClose);

        if (error) {
          socket.destroy();
          reject(error);
          return;
        }

        core.debug(`[session] Connected to ${target}`);
        resolve(new CacheSession(socket, config));
      };

      const onError = (error: Error): void =>
        finish(
          new ConnectError(`Failed to connect to ${target}: ${error.message}`, {
            cause: error,
          })
        );
      const onClose = (): void =>
        finish(new ConnectError(`Connection to ${target} closed during handshake`));

      const timer = setTimeout(
        () =>
          finish(
            new TimeoutError(
              `Connection to ${target} timed out after ${config.connectTimeoutMs}ms`,
              'connect'
            )
          ),
        config.connectTimeoutMs
      );

      try {
        socket = connector(config, () => finish());
      } catch (error) {
        clearTimeout(timer);
        const errorMsg = error instanceof Error ? error.message : String(error);
        reject(
          new ConnectError(`Failed to connect to ${target}: ${errorMsg}`, {
            cause: error,
          })
        );
        return;
      }

      socket.once('error', onError);
      socket.once('close', onClose);
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isOpen(): boolean {
    return this.currentState !== 'closed';
  }

  /**
   * Send AUTH. A rejected or malformed reply leaves the connection open in
   * the `auth_failed` state; transport failures are thrown.
   */
  async authenticate(token: string): Promise<AuthResult> {
    if (!this.isOpen) {
      throw new ConnectError('Cache session is closed');
    }

    this.currentState = 'auth_pending';
    const reply = await this.execute(['AUTH', token]);

    if (reply.type === 'status' && reply.value === 'OK') {
      this.currentState = 'authenticated';
      core.debug('[session] AUTH accepted');
      return 'authenticated';
    }

    if (this.isOpen) {
      this.currentState = 'auth_failed';
    }
    core.warning(`Redis AUTH failed: ${describeReply(reply)}`);
    return 'auth_failed';
  }

  /**
   * Liveness probe. True only for a literal +PONG.
   */
  async ping(): Promise<boolean> {
    try {
      const reply = await this.execute(['PING']);
      if (reply.type === 'status' && reply.value === 'PONG') {
        return true;
      }
      core.warning(`Redis PING response: ${describeReply(reply)}`);
      return false;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      core.warning(`Redis PING failed: ${errorMsg}`);
      return false;
    }
  }

  /**
   * Send one command and read exactly one reply.
   * Throws ConnectError, ProtocolError or TimeoutError on transport failure.
   */
  async execute(args: readonly string[]): Promise<Reply> {
    if (this.inFlight) {
      throw new Error('Cache session already has a command in flight');
    }
    if (!this.isOpen) {
      throw new ConnectError('Cache session is closed');
    }

    this.inFlight = true;
    try {
      return await this.exchange(args);
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Idempotent; safe after any earlier failure.
   */
  close(): void {
    if (!this.socket.destroyed) {
      core.debug('[session] Closing cache session');
      this.socket.destroy();
    }
    this.currentState = 'closed';
  }

  private exchange(args: readonly string[]): Promise<Reply> {
    const command = args.length > 0 ? args[0] : '';
    const request = encodeCommand(args);
    core.debug(`[session] -> ${command} (${request.length} bytes)`);

    return new Promise<Reply>((resolve, reject) => {
      let received = Buffer.alloc(0);

      const settle = (outcome: {reply: Reply} | {error: Error}): void => {
        clearTimeout(timer);
        this.socket.removeListener('data', onData);
        this.socket.removeListener('error', onError);
        this.socket.removeListener('close', onClose);

        if ('error' in outcome) {
          reject(outcome.error);
        } else {
          resolve(outcome.reply);
        }
      };

      const onData = (chunk: Buffer): void => {
        received = Buffer.concat([received, chunk]);
        const result = readReply(received);
        if (!result.complete) {
          core.debug(
            `[session]    partial reply (${received.length} bytes), waiting for more`
          );
          return;
        }

        if (result.bytesRead < received.length) {
          core.debug(
            `[session]    discarding ${received.length - result.bytesRead} trailing bytes`
          );
        }
        core.debug(`[session] <- ${describeReply(result.reply)}`);
        settle({reply: result.reply});
      };

      const onError = (error: Error): void =>
        settle({
          error: new ConnectError(`${command} failed: ${error.message}`, {
            cause: error,
          }),
        });

      const onClose = (): void =>
        settle({
          error:
            received.length > 0
              ? new ProtocolError(
                  `Connection closed after ${received.length} bytes of a truncated ${command} reply`
                )
              : new ConnectError(`Connection closed before ${command} reply`),
        });

      // A late reply would be read as the answer to the next command
      const timer = setTimeout(() => {
        settle({
          error: new TimeoutError(
            `${command} timed out after ${this.config.commandTimeoutMs}ms`,
            'command'
          ),
        });
        this.close();
      }, this.config.commandTimeoutMs);

      this.socket.on('data', onData);
      this.socket.once('error', onError);
      this.socket.once('close', onClose);
      this.socket.write(request);
    });
  }
}

export function createSessionFactory(
  config: TransportConfig,
  connector: SocketConnector = connectSocket
): SessionFactory {
  return () => CacheSession.open(config, connector);
}
