export type GamePhase = 'awaitingStart' | 'playing' | 'pausedForTransition' | 'deadlock' | 'cleared';

export function isPlayablePhase(phase: GamePhase): phase is 'playing' {
  return phase === 'playing';
}
