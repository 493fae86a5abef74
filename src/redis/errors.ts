/**
 * Transport error taxonomy
 */

export type CacheErrorKind = 'connect' | 'timeout' | 'protocol';

export type TimeoutPhase = 'connect' | 'command';

export abstract class CacheError extends Error {
  abstract readonly kind: CacheErrorKind;

  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * TCP or TLS failure, including a connection lost mid-exchange
 */
export class ConnectError extends CacheError {
  readonly kind = 'connect';
}

export class TimeoutError extends CacheError {
  readonly kind = 'timeout';

  constructor(
    message: string,
    readonly phase: TimeoutPhase
  ) {
    super(message);
  }
}

/**
 * Reply framing could not be parsed; the connection is no longer in sync
 */
export class ProtocolError extends CacheError {
  readonly kind = 'protocol';
}
