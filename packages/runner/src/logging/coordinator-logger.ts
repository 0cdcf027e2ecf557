import { formatGridPoint, type GridPoint } from '@tilewalk/engine/runtime';

import type { DiagnosticBuffer, DiagnosticStage } from './diagnostic-buffer.js';

// ---------------------------------------------------------------------------
// Log entry shapes
// ---------------------------------------------------------------------------

export interface GuideRefreshLogEntry {
  readonly guidePhase: string;
  readonly singleVector: number;
  readonly multipleVector: number;
  readonly multiStep: number;
  readonly warp: number;
  readonly pushed: boolean;
}

export interface AnimationLogEntry {
  readonly event: 'started' | 'rejected' | 'committed' | 'commitFailed' | 'forceCleared' | 'staleCommit';
  readonly cardID?: string;
  readonly stackID?: string;
  readonly destination?: GridPoint | null;
  readonly reason?: string;
}

export interface TapLogEntry {
  readonly outcome: string;
  readonly destination: GridPoint;
  readonly candidateCount: number;
  readonly stackCount?: number;
}

export interface SuspensionLogEntry {
  readonly event: 'pause' | 'resume' | 'reasonAdded' | 'reasonRemoved' | 'reasonRejected' | 'reset';
  readonly reason?: string;
  readonly activeReasons: readonly string[];
  readonly phase: string;
}

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

// ---------------------------------------------------------------------------
// Logger interface
// ---------------------------------------------------------------------------

export interface CoordinatorLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  logGuideRefresh(entry: GuideRefreshLogEntry): void;
  logAnimation(entry: AnimationLogEntry): void;
  logTap(entry: TapLogEntry): void;
  logSuspension(entry: SuspensionLogEntry): void;
  logWarning(message: string): void;
}

const STAGE_LABELS: Readonly<Record<DiagnosticStage, string>> = {
  guide: '[Guide]',
  animation: '[Anim]',
  tap: '[Tap]',
  timer: '[Timer]',
  warning: '[Warn]',
};

export function formatGuideRefresh(entry: GuideRefreshLogEntry): string {
  const total = entry.singleVector + entry.multipleVector + entry.multiStep + entry.warp;
  return `${entry.guidePhase} single=${entry.singleVector} multiple=${entry.multipleVector}`
    + ` multiStep=${entry.multiStep} warp=${entry.warp} total=${total}${entry.pushed ? '' : ' (unchanged)'}`;
}

export function formatAnimation(entry: AnimationLogEntry): string {
  const parts: string[] = [entry.event];
  if (entry.cardID !== undefined) parts.push(`card=${entry.cardID}`);
  if (entry.stackID !== undefined) parts.push(`stack=${entry.stackID}`);
  if (entry.destination !== undefined) parts.push(`dest=${formatGridPoint(entry.destination)}`);
  if (entry.reason !== undefined) parts.push(`reason=${entry.reason}`);
  return parts.join(' ');
}

export function formatTap(entry: TapLogEntry): string {
  const stacks = entry.stackCount === undefined ? '' : ` stacks=${entry.stackCount}`;
  return `${entry.outcome} dest=${formatGridPoint(entry.destination)} candidates=${entry.candidateCount}${stacks}`;
}

export function formatSuspension(entry: SuspensionLogEntry): string {
  const reason = entry.reason === undefined ? '' : ` reason=${entry.reason}`;
  return `${entry.event}${reason} active=[${entry.activeReasons.join(',')}] phase=${entry.phase}`;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateCoordinatorLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
  readonly diagnosticBuffer?: DiagnosticBuffer;
}

export function createCoordinatorLogger(options?: CreateCoordinatorLoggerOptions): CoordinatorLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  const diagnosticBuffer = options?.diagnosticBuffer;
  let enabled = options?.enabled ?? false;

  const emit = (stage: DiagnosticStage, message: string, data?: Readonly<Record<string, unknown>>): void => {
    diagnosticBuffer?.record(stage, message, data);
    if (!enabled) return;
    if (stage === 'warning') {
      cons.warn(`${STAGE_LABELS[stage]} ${message}`);
      return;
    }
    cons.log(`${STAGE_LABELS[stage]} ${message}`);
  };

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    logGuideRefresh(entry: GuideRefreshLogEntry): void {
      emit('guide', formatGuideRefresh(entry), { ...entry });
    },

    logAnimation(entry: AnimationLogEntry): void {
      emit('animation', formatAnimation(entry), { ...entry });
    },

    logTap(entry: TapLogEntry): void {
      emit('tap', formatTap(entry), { ...entry });
    },

    logSuspension(entry: SuspensionLogEntry): void {
      emit('timer', formatSuspension(entry), { ...entry });
    },

    logWarning(message: string): void {
      emit('warning', message);
    },
  };
}
