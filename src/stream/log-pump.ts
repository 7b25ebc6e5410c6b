/**
 * Log Pump
 *
 * Reads stdout and stderr of a running process, splits them into lines,
 * classifies each line and hands a sequenced LogRecord to the sink.
 *
 * - One sequence counter shared by both streams, starting at 1 per run
 * - Lines end at LF; trailing whitespace (CR included) trimmed, blank lines skipped
 * - Each line is decoded from its own bytes: UTF-8, else GBK, else lossy UTF-8
 * - The sink is synchronous and must not block (Broadcaster.publish)
 * - `drained` resolves once both streams ended or stop() tore the pump down
 */

import { Readable } from 'stream';
import { TextDecoder } from 'util';
import { createLogRecord, LogRecord, LogSource } from '../models/log-record';
import { LogClassifier } from './log-classifier';

const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

/** Tried in order when a line is not valid UTF-8 (gb2312 and cp936 are gbk labels) */
export const FALLBACK_ENCODINGS: readonly string[] = ['gbk'];

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });
const lossyUtf8 = new TextDecoder('utf-8');
const fallbackDecoders = new Map<string, TextDecoder | null>();

/**
 * Decode one line of process output
 */
export function decodeLine(bytes: Uint8Array, fallbacks: readonly string[] = FALLBACK_ENCODINGS): string {
  const text = tryDecode(strictUtf8, bytes);
  if (text !== null) {
    return text;
  }
  for (const encoding of fallbacks) {
    const decoder = strictDecoder(encoding);
    const decoded = decoder ? tryDecode(decoder, bytes) : null;
    if (decoded !== null) {
      return decoded;
    }
  }
  return lossyUtf8.decode(bytes);
}

function tryDecode(decoder: TextDecoder, bytes: Uint8Array): string | null {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    // TypeError: bytes are not valid in this encoding
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/**
 * @returns null when this Node build does not ship the encoding
 */
function strictDecoder(encoding: string): TextDecoder | null {
  const cached = fallbackDecoders.get(encoding);
  if (cached !== undefined) {
    return cached;
  }
  let decoder: TextDecoder | null = null;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
  }
  fallbackDecoders.set(encoding, decoder);
  return decoder;
}

export type LogSink = (record: LogRecord) => void;

export interface LogPumpOptions {
  runId: string;
  classifier: LogClassifier;
  sink: LogSink;
  /** Called when the sink throws; the pump keeps going */
  onSinkError?: (error: unknown, record: LogRecord) => void;
}

export interface PumpSource {
  source: LogSource;
  stream: Readable;
}

export class LogPump {
  private readonly runId: string;
  private readonly classifier: LogClassifier;
  private readonly sink: LogSink;
  private readonly onSinkError: (error: unknown, record: LogRecord) => void;
  private readonly streams: Readable[] = [];
  private sequence = 0;
  private openCount = 0;
  private started = false;
  private stopped = false;
  private resolveDrained: () => void = () => undefined;

  /** Resolves when every attached stream has closed */
  readonly drained: Promise<void>;

  constructor(options: LogPumpOptions) {
    this.runId = options.runId;
    this.classifier = options.classifier;
    this.sink = options.sink;
    this.onSinkError = options.onSinkError ?? ((error) => {
      console.error('[LogPump] Sink error:', error);
    });
    this.drained = new Promise<void>((resolve) => {
      this.resolveDrained = resolve;
    });
  }

  /**
   * Attach to the output streams and start reading
   */
  start(sources: PumpSource[]): void {
    if (this.started) {
      throw new Error('LogPump.start() may only be called once');
    }
    this.started = true;

    if (sources.length === 0) {
      this.resolveDrained();
      return;
    }

    this.openCount = sources.length;
    for (const { source, stream } of sources) {
      this.streams.push(stream);
      this.attach(source, stream);
    }
  }

  /**
   * Tear down: stop reading and release the streams
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    for (const stream of this.streams) {
      stream.destroy();
    }
    this.resolveDrained();
  }

  /**
   * Sequence number of the last record produced (0 before the first)
   */
  get lastSequence(): number {
    return this.sequence;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  private attach(source: LogSource, stream: Readable): void {
    let pending: Buffer = EMPTY;
    let ended = false;

    const onData = (chunk: Buffer | string): void => {
      let data: Buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      if (pending.length > 0) {
        data = Buffer.concat([pending, data]);
      }
      let newline = data.indexOf(NEWLINE);
      while (newline !== -1) {
        this.handleLine(source, data.subarray(0, newline));
        data = data.subarray(newline + 1);
        newline = data.indexOf(NEWLINE);
      }
      pending = data.length > 0 ? Buffer.from(data) : EMPTY;
    };

    // end, close and error (a broken pipe) all finish the stream once
    const finish = (): void => {
      if (ended) {
        return;
      }
      ended = true;
      stream.off('data', onData);
      if (pending.length > 0) {
        this.handleLine(source, pending);
        pending = EMPTY;
      }
      this.handleClose();
    };

    stream.on('data', onData);
    stream.once('end', finish);
    stream.once('close', finish);
    stream.on('error', finish);
  }

  private handleLine(source: LogSource, bytes: Uint8Array): void {
    if (this.stopped) {
      return;
    }
    const text = decodeLine(bytes).trimEnd();
    if (text.trim() === '') {
      return;
    }
    const record = createLogRecord(
      this.runId,
      ++this.sequence,
      this.classifier.classify(text),
      source,
      text
    );
    try {
      this.sink(record);
    } catch (error) {
      this.onSinkError(error, record);
    }
  }

  private handleClose(): void {
    this.openCount--;
    if (this.openCount <= 0) {
      this.resolveDrained();
    }
  }
}
