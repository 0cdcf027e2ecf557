export type DiagnosticStage = 'guide' | 'animation' | 'tap' | 'timer' | 'warning';

export interface DiagnosticEntry {
  readonly sequence: number;
  readonly stage: DiagnosticStage;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface DiagnosticBuffer {
  readonly maxEntries: number;
  record(stage: DiagnosticStage, message: string, data?: Readonly<Record<string, unknown>>): void;
  getEntries(): readonly DiagnosticEntry[];
  exportAsJson(): string;
  clear(): void;
}

export function createDiagnosticBuffer(maxEntries = 200): DiagnosticBuffer {
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new RangeError('Diagnostic buffer maxEntries must be a positive integer');
  }

  const entries: DiagnosticEntry[] = [];
  let nextSequence = 1;

  return {
    maxEntries,

    record(stage, message, data): void {
      const entry: DiagnosticEntry = Object.freeze({
        sequence: nextSequence,
        stage,
        message,
        ...(data === undefined ? {} : { data: Object.freeze({ ...data }) }),
      });
      nextSequence += 1;
      entries.push(entry);
      if (entries.length > maxEntries) {
        entries.shift();
      }
    },

    getEntries(): readonly DiagnosticEntry[] {
      return entries.slice();
    },

    exportAsJson(): string {
      const snapshot = entries.slice();
      return JSON.stringify({
        meta: {
          entryCount: snapshot.length,
          oldestSequence: snapshot[0]?.sequence ?? 0,
          newestSequence: snapshot[snapshot.length - 1]?.sequence ?? 0,
        },
        entries: snapshot,
      }, null, 2);
    },

    clear(): void {
      entries.length = 0;
    },
  };
}
