/**
 * Keypress Reader
 * Reads one keystroke at a time without Enter and without echo
 */

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

export const KEYS = {
  ENTER: '\r',
  ESCAPE: '\x1b',
  INTERRUPT: '\x03',
  END_OF_INPUT: '\x04',
} as const;

// ---------------------------------------------------------------------------
// Input Stream Shape
// ---------------------------------------------------------------------------

/** process.stdin, or any readable carrying the TTY extras when it has them. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  readableEnded?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface KeyReader {
  /** Resolves with exactly one key; END_OF_INPUT once the input is exhausted. */
  readKey(): Promise<string>;
  /** Restore the terminal and stop listening. Safe to call more than once. */
  close(): void;
}

// ---------------------------------------------------------------------------
// Key Splitting
// ---------------------------------------------------------------------------

const CSI_FINAL = /[@-~]/;

/**
 * Split raw terminal input into keys. CSI sequences (arrow keys and the like)
 * stay together, CRLF and LF collapse to ENTER.
 */
export function splitKeys(data: string): string[] {
  const keys: string[] = [];
  const chars = Array.from(data);

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? '';

    if (ch === '\x1b' && chars[i + 1] === '[') {
      let end = i + 2;
      while (end < chars.length && !CSI_FINAL.test(chars[end] ?? '')) end++;
      keys.push(chars.slice(i, end + 1).join(''));
      i = end;
      continue;
    }

    if (ch === '\r') {
      if (chars[i + 1] === '\n') i++;
      keys.push(KEYS.ENTER);
      continue;
    }

    keys.push(ch === '\n' ? KEYS.ENTER : ch);
  }

  return keys;
}

// ---------------------------------------------------------------------------
// Stream Key Reader (piped stdin)
// ---------------------------------------------------------------------------

export class StreamKeyReader implements KeyReader {
  protected readonly input: KeyInput;
  private readonly pending: string[] = [];
  private ended = false;
  private closed = false;

  constructor(input: KeyInput) {
    this.input = input;
    this.input.setEncoding('utf8');
  }

  async readKey(): Promise<string> {
    const queued = this.pending.shift();
    if (queued !== undefined) return queued;
    if (this.ended || this.closed) return KEYS.END_OF_INPUT;

    const release = this.acquire();
    try {
      while (this.pending.length === 0) {
        const chunk = await this.nextChunk();
        if (chunk === null) {
          this.ended = true;
          return KEYS.END_OF_INPUT;
        }
        this.pending.push(...splitKeys(chunk));
      }
      return this.pending.shift() ?? KEYS.END_OF_INPUT;
    } finally {
      release();
    }
  }

  close(): void {
    this.closed = true;
    this.input.pause();
  }

  /** Put the input into reading state; the returned function undoes it. */
  protected acquire(): () => void {
    this.input.resume();
    return () => {
      this.input.pause();
    };
  }

  private nextChunk(): Promise<string | null> {
    if (this.input.readableEnded) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.input.removeListener('data', onData);
        this.input.removeListener('end', onEnd);
        this.input.removeListener('close', onEnd);
        this.input.removeListener('error', onError);
      };
      const onData = (chunk: string | Buffer) => {
        // Stop the flow before the next buffered chunk is emitted to nobody
        this.input.pause();
        cleanup();
        resolve(chunk.toString());
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };

      this.input.on('data', onData);
      this.input.on('end', onEnd);
      this.input.on('close', onEnd);
      this.input.on('error', onError);
    });
  }
}

// ---------------------------------------------------------------------------
// TTY Key Reader (raw mode)
// ---------------------------------------------------------------------------

/**
 * Raw-mode reader for an interactive terminal. libuv switches termios on
 * Linux and macOS and the console input mode on Windows; the previous mode is
 * restored after every read, including failed ones.
 */
export class TtyKeyReader extends StreamKeyReader {
  private rawActive = false;
  private restoreTo = false;

  protected override acquire(): () => void {
    const releaseStream = super.acquire();
    this.restoreTo = this.input.isRaw ?? false;
    this.input.setRawMode?.(true);
    this.rawActive = true;

    return () => {
      this.restoreMode();
      releaseStream();
    };
  }

  override close(): void {
    this.restoreMode();
    super.close();
  }

  private restoreMode(): void {
    if (!this.rawActive) return;
    this.input.setRawMode?.(this.restoreTo);
    this.rawActive = false;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Picks the reader for this process once, at startup. */
export function createKeyReader(input: KeyInput = process.stdin): KeyReader {
  if (input.isTTY && typeof input.setRawMode === 'function') {
    return new TtyKeyReader(input);
  }
  return new StreamKeyReader(input);
}
