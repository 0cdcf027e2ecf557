import {
  findWarpEffect,
  formatGridPoint,
  isPlayablePhase,
  type GameStatePort,
  type GridPoint,
  type MoveResolution,
  type StackId,
} from '@tilewalk/engine/runtime';

import { createAnimationCoordinator, type AnimationCoordinator } from '../animation/animation-coordinator.js';
import {
  resolveCoordinatorConfig,
  type CoordinatorConfig,
  type CoordinatorConfigInput,
} from '../config/coordinator-config.js';
import { CoordinatorError } from '../errors/coordinator-error.js';
import { createGuideHighlightEngine, type GuideHighlightEngine } from '../guide/guide-highlight-engine.js';
import { createBoardTapResolver, type BoardTapOutcome, type BoardTapResolver } from '../input/board-tap-resolver.js';
import {
  createCoordinatorLogger,
  type CoordinatorLogger,
  type LoggerConsole,
} from '../logging/coordinator-logger.js';
import { createDiagnosticBuffer, type DiagnosticBuffer } from '../logging/diagnostic-buffer.js';
import { createBoardViewStore, type BoardViewStoreApi } from '../store/board-view-store.js';
import {
  noopHaptics,
  type HapticFeedback,
  type MoveEffect,
  type RenderingSurface,
  type SessionClockControl,
} from '../surface/rendering-surface.js';
import {
  createTimerSuspensionCoordinator,
  type SuspensionReason,
  type TimerSuspensionCoordinator,
} from '../timer/timer-suspension-coordinator.js';
import { timeoutScheduler, type Scheduler } from '../utils/scheduler.js';
import { createConflictWarningChannel, type ConflictWarningChannel } from '../warning/conflict-warning-channel.js';

export type TeardownKind = 'sessionReset' | 'returnToStart';

export interface ReactiveStateBridgeOptions {
  readonly game: GameStatePort;
  readonly surface: RenderingSurface;
  readonly clock: SessionClockControl;
  readonly haptics?: HapticFeedback;
  readonly scheduler?: Scheduler;
  readonly config?: CoordinatorConfigInput;
  readonly console?: LoggerConsole;
}

export interface ReactiveStateBridge {
  readonly store: BoardViewStoreApi;
  readonly config: CoordinatorConfig;
  readonly logger: CoordinatorLogger;
  readonly diagnostics: DiagnosticBuffer;
  readonly isStarted: boolean;
  readonly isAnimating: boolean;
  readonly suspensionReasons: readonly SuspensionReason[];
  start(): void;
  handleBoardTap(destination: GridPoint): BoardTapOutcome;
  selectCard(stackID: StackId): boolean;
  clearSelection(): void;
  playStack(stackID: StackId): boolean;
  isCardUsable(stackID: StackId): boolean;
  setGuideEnabled(enabled: boolean): void;
  setHapticsEnabled(enabled: boolean): void;
  setSuspensionReason(reason: SuspensionReason, active: boolean, owner?: string): boolean;
  dismissConflictWarning(warningID: number): boolean;
  teardown(kind: TeardownKind): void;
  destroy(): void;
}

export function moveEffectForResolution(resolution: MoveResolution): MoveEffect {
  const warp = findWarpEffect(resolution);
  if (warp !== null) {
    return { kind: 'warp', from: warp.source, to: warp.destination };
  }
  return { kind: 'step', path: resolution.path, to: resolution.finalPosition };
}

/**
 * Wires the game's signals to the coordination components. Every signal
 * fans out in a fixed order; see the per-signal handlers below.
 */
export function createReactiveStateBridge(options: ReactiveStateBridgeOptions): ReactiveStateBridge {
  const { game, surface } = options;
  const config = resolveCoordinatorConfig(options.config);
  const haptics = options.haptics ?? noopHaptics;
  const scheduler = options.scheduler ?? timeoutScheduler;

  const diagnostics = createDiagnosticBuffer(config.logging.maxDiagnosticEntries);
  const logger = createCoordinatorLogger({
    enabled: config.logging.enabled,
    diagnosticBuffer: diagnostics,
    ...(options.console === undefined ? {} : { console: options.console }),
  });
  const store = createBoardViewStore({
    guideEnabled: config.guideEnabled,
    hapticsEnabled: config.hapticsEnabled,
  });

  const guide: GuideHighlightEngine = createGuideHighlightEngine({ game, store, surface, logger });
  const animation: AnimationCoordinator = createAnimationCoordinator({
    game,
    store,
    surface,
    guide,
    haptics,
    scheduler,
    logger,
    travelDurationMs: config.travelDurationMs,
  });
  const warnings: ConflictWarningChannel = createConflictWarningChannel({
    scheduler,
    durationMs: config.conflictWarningDurationMs,
    onShow: (warning) => {
      logger.logWarning(`${warning.message} dest=${formatGridPoint(warning.destination)}`);
      store.getState().setConflictWarning(warning);
      surface.conflictWarning(warning);
    },
    onDismiss: (warning) => {
      store.getState().setConflictWarning(null);
      surface.dismissConflictWarning(warning.id);
    },
  });
  const tap: BoardTapResolver = createBoardTapResolver({ game, store, guide, animation, warnings, haptics, logger });
  const timer: TimerSuspensionCoordinator = createTimerSuspensionCoordinator({
    clock: options.clock,
    store,
    logger,
    initialPhase: game.getSnapshot().phase,
  });

  let unsubscribers: (() => void)[] = [];
  let started = false;
  let destroyed = false;

  const assertAlive = (operation: string): void => {
    if (destroyed) {
      throw new CoordinatorError('BRIDGE_DESTROYED', `Cannot ${operation}: the bridge has been destroyed.`);
    }
  };

  const subscribeAll = (): void => {
    unsubscribers = [
      game.subscribe('handChanged', ({ hand, nextCards }) => {
        animation.handleHandChanged(hand, nextCards);
        tap.handleHandChanged(hand);
        guide.refresh({ hand });
      }),
      game.subscribe('boardChanged', () => {
        surface.syncBoard();
        guide.refresh();
        tap.refreshSelectionHighlight();
      }),
      game.subscribe('positionChanged', ({ current }) => {
        surface.moveKnight(current);
        guide.refresh({ current });
      }),
      game.subscribe('phaseChanged', ({ phase }) => {
        guide.handlePhaseChange(phase);
        timer.setPhase(phase);
        if (!isPlayablePhase(phase)) {
          tap.clearSelection();
        }
      }),
      game.subscribe('moveResolved', ({ resolution }) => {
        surface.playMoveEffect(moveEffectForResolution(resolution));
      }),
    ];
  };

  const unsubscribeAll = (): void => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
    unsubscribers = [];
  };

  const syncFromSnapshot = (): void => {
    const snapshot = game.getSnapshot();
    animation.handleHandChanged(snapshot.hand, snapshot.nextCards);
    surface.moveKnight(snapshot.current);
    timer.setPhase(snapshot.phase);
    guide.refresh();
  };

  const clearTransientState = (): void => {
    timer.reset();
    animation.reset();
    tap.clearSelection();
    warnings.clear();
    guide.reset();
    store.getState().resetBoardView();
  };

  return {
    store,
    config,
    logger,
    diagnostics,

    get isStarted(): boolean {
      return started;
    },

    get isAnimating(): boolean {
      return animation.isAnimating;
    },

    get suspensionReasons(): readonly SuspensionReason[] {
      return timer.activeReasons;
    },

    start(): void {
      assertAlive('start');
      if (started) {
        throw new CoordinatorError('BRIDGE_ALREADY_STARTED', 'The bridge is already started.');
      }
      started = true;
      subscribeAll();
      syncFromSnapshot();
    },

    handleBoardTap(destination): BoardTapOutcome {
      assertAlive('handle a board tap');
      return tap.resolve({ destination, candidateMoves: game.availableMoves() });
    },

    selectCard(stackID): boolean {
      assertAlive('select a card');
      return tap.selectCard(stackID);
    },

    clearSelection(): void {
      assertAlive('clear the selection');
      tap.clearSelection();
    },

    playStack(stackID): boolean {
      assertAlive('play a stack');
      return animation.playStack(stackID);
    },

    isCardUsable(stackID): boolean {
      assertAlive('check a card');
      return animation.isCardUsable(stackID);
    },

    setGuideEnabled(enabled): void {
      assertAlive('change the guide preference');
      guide.setGuideEnabled(enabled);
    },

    setHapticsEnabled(enabled): void {
      assertAlive('change the haptics preference');
      animation.setHapticsEnabled(enabled);
    },

    setSuspensionReason(reason, active, owner): boolean {
      assertAlive('change a suspension reason');
      return timer.setReason(reason, active, owner);
    },

    dismissConflictWarning(warningID): boolean {
      assertAlive('dismiss a warning');
      return warnings.dismiss(warningID);
    },

    teardown(kind): void {
      assertAlive('tear down');
      logger.logSuspension({ event: 'reset', reason: kind, activeReasons: timer.activeReasons, phase: timer.phase });
      clearTransientState();
      if (started) {
        syncFromSnapshot();
      }
    },

    destroy(): void {
      if (destroyed) {
        return;
      }
      unsubscribeAll();
      clearTransientState();
      started = false;
      destroyed = true;
    },
  };
}
