/**
 * CLI Utilities — Flag parsing, formatting, color output, and HTTP helpers.
 */

// ─── ANSI Color Support ──────────────────────────────────────────────────────

const ANSI_RESET = '\x1b[0m';
const ANSI_BOLD = '\x1b[1m';
const ANSI_DIM = '\x1b[2m';
const ANSI_RED = '\x1b[31m';
const ANSI_GREEN = '\x1b[32m';
const ANSI_YELLOW = '\x1b[33m';
const ANSI_CYAN = '\x1b[36m';

/** Returns true when the stream supports ANSI colors and NO_COLOR is unset. */
function isTTYStream(stream: NodeJS.WritableStream): boolean {
  return !process.env.NO_COLOR && 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Color helpers bound to the given output stream. Plain text when the
 * stream is not a TTY or `NO_COLOR` is set.
 */
export function colorContext(stream: NodeJS.WritableStream) {
  const enabled = isTTYStream(stream);
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI_RESET}` : text);
  return {
    green: wrap(ANSI_GREEN),
    red: wrap(ANSI_RED),
    yellow: wrap(ANSI_YELLOW),
    dim: wrap(ANSI_DIM),
    bold: wrap(ANSI_BOLD),
    cyan: wrap(ANSI_CYAN),
  };
}

// ─── Progress Spinner ────────────────────────────────────────────────────────

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Minimal TTY spinner for long-running CLI operations. On other streams
 * `start()` is silent and `stop()` prints a single summary line.
 */
export class Spinner {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly stream: NodeJS.WritableStream;
  private readonly tty: boolean;
  private running = false;

  constructor(stream: NodeJS.WritableStream) {
    this.stream = stream;
    this.tty = isTTYStream(stream);
  }

  start(message: string): void {
    if (!this.tty) return;
    this.running = true;
    this.frame = 0;
    this.stream.write(`  ${SPINNER_FRAMES[0] ?? ''} ${message}`);
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.stream.write(`\r  ${SPINNER_FRAMES[this.frame] ?? ''} ${message}`);
    }, 80);
  }

  stop(finalMessage: string, success = true): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const mark = success ? '✓' : '✗';
    if (this.tty && this.running) {
      const color = success ? ANSI_GREEN : ANSI_RED;
      this.stream.write(`\r  ${color}${mark}${ANSI_RESET} ${finalMessage}\n`);
    } else {
      this.stream.write(`  ${mark} ${finalMessage}\n`);
    }
    this.running = false;
  }
}

// ─── Flags ───────────────────────────────────────────────────────────────────

/** Extract a --flag value pair from argv, returning value and remaining args. */
export function extractFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === `--${flag}` || (alias && arg === `-${alias}`)) && i + 1 < argv.length) {
      value = argv[++i];
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Extract a boolean --flag from argv. */
export function extractBoolFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: boolean; rest: string[] } {
  const rest: string[] = [];
  let value = false;
  for (const arg of argv) {
    if (arg === `--${flag}` || (alias && arg === `-${alias}`)) {
      value = true;
    } else {
      rest.push(arg);
    }
  }
  return { value, rest };
}

// ─── Formatting ──────────────────────────────────────────────────────────────

/** Format a byte count with a binary unit. */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${String(value)} B` : `${value.toFixed(1)} ${units[unit] ?? ''}`;
}

/** Format rows as aligned columns. */
export function formatTable(rows: Record<string, string>[], columns?: string[]): string {
  const first = rows[0];
  if (!first) return '(no results)';

  const cols = columns ?? Object.keys(first);
  const widths = cols.map((col) => Math.max(col.length, ...rows.map((r) => (r[col] ?? '').length)));
  const pad = (text: string, i: number) => text.padEnd(widths[i] ?? 0);

  const header = cols.map((col, i) => pad(col.toUpperCase(), i)).join('  ');
  const separator = cols.map((_, i) => '─'.repeat(widths[i] ?? 0)).join('  ');
  const body = rows.map((row) => cols.map((col, i) => pad(row[col] ?? '', i)).join('  '));

  return [header, separator, ...body].join('\n');
}

// ─── HTTP ────────────────────────────────────────────────────────────────────

/** Wrapper around fetch for CLI HTTP calls. */
export async function apiCall(
  baseUrl: string,
  path: string,
  options: {
    method?: string;
    body?: unknown;
  } = {}
): Promise<{ ok: boolean; status: number; data: unknown }> {
  const url = `${baseUrl}${path}`;
  const headers: Record<string, string> = {
    Accept: 'application/json',
  };
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
    });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    if (msg.includes('ECONNREFUSED') || msg.includes('fetch failed')) {
      throw new Error(`Connection refused: ${baseUrl} — is the server running?`);
    }
    throw new Error(`HTTP request failed: ${msg}`);
  }

  let data: unknown;
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    data = await response.json();
  } else {
    data = await response.text();
  }

  return { ok: response.ok, status: response.status, data };
}

/** Server error message from an API error body, or the bare status. */
export function errorDetail(result: { status: number; data: unknown }): string {
  const data = result.data;
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return `HTTP ${String(result.status)}: ${data.message}`;
  }
  return `HTTP ${String(result.status)}`;
}
