/**
 * Docker multiplexed stream decoding.
 *
 * Attached exec/log output without a TTY is framed: each frame carries an
 * 8-byte header (stream type in byte 0, big-endian payload size in bytes
 * 4-7) followed by the payload. Stream type 1 is stdout, 2 is stderr.
 */

const HEADER_SIZE = 8;
const STDERR_STREAM = 2;

export interface DemuxedOutput {
  stdout: string;
  stderr: string;
}

/**
 * Split a multiplexed buffer into stdout and stderr text. A truncated or
 * unframed tail is treated as stdout.
 */
export function demuxStream(buffer: Buffer): DemuxedOutput {
  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    if (offset + HEADER_SIZE > buffer.length) {
      stdout.push(buffer.subarray(offset));
      break;
    }

    const streamType = buffer[offset];
    const size = buffer.readUInt32BE(offset + 4);
    const end = offset + HEADER_SIZE + size;

    if (end > buffer.length) {
      stdout.push(buffer.subarray(offset));
      break;
    }

    const payload = buffer.subarray(offset + HEADER_SIZE, end);
    if (streamType === STDERR_STREAM) {
      stderr.push(payload);
    } else {
      stdout.push(payload);
    }
    offset = end;
  }

  return {
    stdout: Buffer.concat(stdout).toString('utf-8'),
    stderr: Buffer.concat(stderr).toString('utf-8'),
  };
}
