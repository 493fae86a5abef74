/**
 * RESP wire codec
 *
 * Requests are always arrays of bulk strings. Replies cover the subset this
 * client consumes: simple strings, errors and bulk strings (including the
 * null bulk string returned for a missing key).
 */

const CRLF = '\r\n';

export type Reply =
  | {type: 'status'; value: string}
  | {type: 'error'; message: string}
  | {type: 'bulk'; value: Buffer | null}
  | {type: 'unparseable'; raw: Buffer};

export type ReadResult =
  | {complete: true; reply: Reply; bytesRead: number}
  | {complete: false};

const INCOMPLETE: ReadResult = {complete: false};

const REPLY_PREFIXES = ['+', '-', '$'];

/**
 * Encode a command as a RESP array of bulk strings.
 * Lengths are taken from the encoded bytes, never from the string length.
 */
export function encodeCommand(args: readonly string[]): Buffer {
  const parts: Buffer[] = [Buffer.from(`*${args.length}${CRLF}`)];

  for (const arg of args) {
    const bytes = Buffer.from(arg, 'utf8');
    parts.push(Buffer.from(`$${bytes.length}${CRLF}`), bytes, Buffer.from(CRLF));
  }

  return Buffer.concat(parts);
}

function unparseable(buffer: Buffer, bytesRead = buffer.length): ReadResult {
  return {
    complete: true,
    reply: {type: 'unparseable', raw: buffer.subarray(0, bytesRead)},
    bytesRead,
  };
}

/**
 * Try to read one reply from the start of `buffer`.
 *
 * Returns `{complete: false}` while more bytes could still turn the buffer
 * into a valid reply, so callers can keep accumulating socket reads.
 */
export function readReply(buffer: Buffer): ReadResult {
  if (buffer.length === 0) {
    return INCOMPLETE;
  }

  const prefix = String.fromCharCode(buffer[0]);
  const lineEnd = buffer.indexOf(CRLF);

  if (!REPLY_PREFIXES.includes(prefix)) {
    // No further bytes can make this a reply this client understands
    return unparseable(buffer, lineEnd === -1 ? buffer.length : lineEnd + CRLF.length);
  }
  if (lineEnd === -1) {
    return INCOMPLETE;
  }

  const line = buffer.toString('utf8', 1, lineEnd);
  const headerLength = lineEnd + CRLF.length;

  switch (prefix) {
    case '+':
      return {
        complete: true,
        reply: {type: 'status', value: line},
        bytesRead: headerLength,
      };
    case '-':
      return {
        complete: true,
        reply: {type: 'error', message: line},
        bytesRead: headerLength,
      };
    case '$': {
      if (!/^-?\d+$/.test(line)) {
        return unparseable(buffer, headerLength);
      }

      const length = parseInt(line, 10);
      if (length === -1) {
        return {
          complete: true,
          reply: {type: 'bulk', value: null},
          bytesRead: headerLength,
        };
      }
      if (length < 0) {
        return unparseable(buffer, headerLength);
      }

      const payloadEnd = headerLength + length;
      if (buffer.length < payloadEnd + CRLF.length) {
        return INCOMPLETE;
      }
      if (buffer.toString('latin1', payloadEnd, payloadEnd + 2) !== CRLF) {
        // Declared length does not match the payload framing
        return unparseable(buffer, payloadEnd + CRLF.length);
      }

      return {
        complete: true,
        reply: {
          type: 'bulk',
          value: Buffer.from(buffer.subarray(headerLength, payloadEnd)),
        },
        bytesRead: payloadEnd + CRLF.length,
      };
    }
    default:
      return unparseable(buffer, headerLength);
  }
}

/**
 * Decode a complete reply buffer.
 * Empty, truncated or unknown input yields an `unparseable` reply.
 */
export function decodeReply(buffer: Buffer): Reply {
  const result = readReply(buffer);
  if (!result.complete) {
    return {type: 'unparseable', raw: Buffer.from(buffer)};
  }
  return result.reply;
}

/**
 * Render a reply for log output without dumping payloads
 */
export function describeReply(reply: Reply): string {
  switch (reply.type) {
    case 'status':
      return `+${reply.value}`;
    case 'error':
      return `-${reply.message}`;
    case 'bulk':
      return reply.value === null ? '$-1' : `$${reply.value.length}`;
    case 'unparseable':
      return `unparseable (${reply.raw.length} bytes)`;
  }
}
