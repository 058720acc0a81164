import { Writable } from 'node:stream';

export interface CapturedStream {
  stream: Writable & { isTTY: boolean };
  output: () => string;
}

/** A writable that records everything written to it, optionally posing as a TTY. */
export function captureStream(isTTY = false): CapturedStream {
  let buf = '';
  const stream = Object.assign(
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        buf += chunk.toString();
        callback();
      },
    }),
    { isTTY }
  );
  return { stream, output: () => buf };
}

export function createStreams() {
  const out = captureStream();
  const err = captureStream();
  return {
    stdout: out.stream,
    stderr: err.stream,
    getStdout: out.output,
    getStderr: err.output,
  };
}

/** A fetch Response carrying a JSON body. */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
