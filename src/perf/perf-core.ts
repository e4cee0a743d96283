import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export type PerfAttrValue = boolean | number | string;
export type PerfAttrs = Readonly<Record<string, PerfAttrValue>>;

export interface PerfCoreConfig {
  readonly enabled: boolean;
  readonly filePath?: string;
  readonly sampleRates?: Readonly<Record<string, number>>;
  readonly maxPendingRecords?: number;
}

interface PerfEventRecord {
  type: 'event';
  name: string;
  'ts-ns': string;
  'ts-ms': number;
  attrs?: PerfAttrs;
}

interface PerfSpanRecord {
  type: 'span';
  name: string;
  'start-ns': string;
  'duration-ns': string;
  'end-ms': number;
  'trace-id': string;
  'span-id': string;
  'parent-span-id'?: string;
  attrs?: PerfAttrs;
}

type PerfRecord = PerfEventRecord | PerfSpanRecord;

export interface PerfSpan {
  readonly spanId: string | null;
  end(extraAttrs?: PerfAttrs): void;
}

export const DEFAULT_PERF_FILE_PATH = '.threadline/perf.jsonl';
const DEFAULT_MAX_PENDING_RECORDS = 4096;
export const DEFAULT_PERF_SAMPLE_RATES: Readonly<Record<string, number>> = {
  'chat.turn.fragment': 0.05,
};

export function perfNowNs(): bigint {
  return process.hrtime.bigint();
}

function mergeAttrs(base?: PerfAttrs, extra?: PerfAttrs): PerfAttrs | undefined {
  if (base === undefined) {
    return extra;
  }
  if (extra === undefined) {
    return base;
  }
  return { ...base, ...extra };
}

const NOOP_PERF_SPAN: PerfSpan = {
  spanId: null,
  end(): void {
    return;
  },
};

/**
 * Buffered JSONL writer for structured events and timed spans. Records are queued in
 * memory and flushed on the next tick; the oldest records drop when the queue is full.
 */
class PerfRecorder {
  private enabled = false;
  private filePath = DEFAULT_PERF_FILE_PATH;
  private fd: number | null = null;
  private nextTraceOrdinal = 1;
  private nextSpanOrdinal = 1;
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly pendingRecords: string[] = [];
  private maxPendingRecords = DEFAULT_MAX_PENDING_RECORDS;
  private sampleRates: Readonly<Record<string, number>> = DEFAULT_PERF_SAMPLE_RATES;
  private readonly sampleCounters = new Map<string, number>();

  public configure(config: PerfCoreConfig): void {
    const nextFilePath = config.filePath ?? this.filePath;
    const pathChanged = resolve(nextFilePath) !== resolve(this.filePath);
    if (pathChanged || (!config.enabled && this.enabled)) {
      this.closeWriter();
    }
    this.enabled = config.enabled;
    this.filePath = nextFilePath;
    this.sampleRates = config.sampleRates ?? DEFAULT_PERF_SAMPLE_RATES;
    this.maxPendingRecords = Math.max(1, config.maxPendingRecords ?? DEFAULT_MAX_PENDING_RECORDS);
    this.sampleCounters.clear();
    if (this.enabled) {
      this.ensureWriter();
    }
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public event(name: string, attrs?: PerfAttrs): void {
    if (!this.enabled || !this.shouldSample(name)) {
      return;
    }
    const record: PerfEventRecord = {
      type: 'event',
      name,
      'ts-ns': perfNowNs().toString(),
      'ts-ms': Date.now(),
    };
    if (attrs !== undefined) {
      record.attrs = attrs;
    }
    this.write(record);
  }

  public span(name: string, attrs?: PerfAttrs, parentSpanId?: string): PerfSpan {
    if (!this.enabled) {
      return NOOP_PERF_SPAN;
    }
    const startedAtNs = perfNowNs();
    const traceId = `trace-${String(this.nextTraceOrdinal)}`;
    this.nextTraceOrdinal += 1;
    const spanId = `span-${String(this.nextSpanOrdinal)}`;
    this.nextSpanOrdinal += 1;
    let ended = false;
    return {
      spanId,
      end: (extraAttrs?: PerfAttrs): void => {
        if (ended) {
          return;
        }
        ended = true;
        this.duration(name, startedAtNs, mergeAttrs(attrs, extraAttrs), {
          traceId,
          spanId,
          ...(parentSpanId !== undefined ? { parentSpanId } : {}),
        });
      },
    };
  }

  public duration(
    name: string,
    startedAtNs: bigint,
    attrs?: PerfAttrs,
    ids: { traceId?: string; spanId?: string; parentSpanId?: string } = {},
  ): void {
    if (!this.enabled) {
      return;
    }
    const endedAtNs = perfNowNs();
    let traceId = ids.traceId;
    if (traceId === undefined) {
      traceId = `trace-${String(this.nextTraceOrdinal)}`;
      this.nextTraceOrdinal += 1;
    }
    let spanId = ids.spanId;
    if (spanId === undefined) {
      spanId = `span-${String(this.nextSpanOrdinal)}`;
      this.nextSpanOrdinal += 1;
    }
    const record: PerfSpanRecord = {
      type: 'span',
      name,
      'start-ns': startedAtNs.toString(),
      'duration-ns': (endedAtNs - startedAtNs).toString(),
      'end-ms': Date.now(),
      'trace-id': traceId,
      'span-id': spanId,
    };
    if (ids.parentSpanId !== undefined) {
      record['parent-span-id'] = ids.parentSpanId;
    }
    if (attrs !== undefined) {
      record.attrs = attrs;
    }
    this.write(record);
  }

  public flush(): void {
    if (this.fd === null || this.pendingRecords.length === 0) {
      return;
    }
    const chunk = this.pendingRecords.join('');
    this.pendingRecords.length = 0;
    writeSync(this.fd, chunk);
  }

  public shutdown(): void {
    this.closeWriter();
  }

  private shouldSample(name: string): boolean {
    const sampleRate = this.sampleRates[name];
    if (sampleRate === undefined) {
      return true;
    }
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      return false;
    }
    if (sampleRate >= 1) {
      return true;
    }
    const sampleEvery = Math.max(1, Math.floor(1 / sampleRate));
    const next = (this.sampleCounters.get(name) ?? 0) + 1;
    this.sampleCounters.set(name, next);
    return next % sampleEvery === 0;
  }

  private ensureWriter(): void {
    if (!this.enabled || this.fd !== null) {
      return;
    }
    const resolvedPath = resolve(this.filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });
    this.fd = openSync(resolvedPath, 'a');
  }

  private closeWriter(): void {
    this.flush();
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.fd === null) {
      return;
    }
    closeSync(this.fd);
    this.fd = null;
  }

  private write(record: PerfRecord): void {
    this.ensureWriter();
    if (this.fd === null) {
      return;
    }
    if (this.pendingRecords.length >= this.maxPendingRecords) {
      this.pendingRecords.shift();
    }
    this.pendingRecords.push(`${JSON.stringify(record)}\n`);
    if (this.flushTimer === null) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.flush();
      }, 0);
      this.flushTimer.unref();
    }
  }
}

const recorder = new PerfRecorder();

export function configurePerfCore(config: PerfCoreConfig): void {
  recorder.configure(config);
}

export function isPerfCoreEnabled(): boolean {
  return recorder.isEnabled();
}

export function recordPerfEvent(name: string, attrs?: PerfAttrs): void {
  recorder.event(name, attrs);
}

export function startPerfSpan(name: string, attrs?: PerfAttrs, parentSpanId?: string): PerfSpan {
  return recorder.span(name, attrs, parentSpanId);
}

export function recordPerfDuration(name: string, startedAtNs: bigint, attrs?: PerfAttrs): void {
  recorder.duration(name, startedAtNs, attrs);
}

export function shutdownPerfCore(): void {
  recorder.shutdown();
}
