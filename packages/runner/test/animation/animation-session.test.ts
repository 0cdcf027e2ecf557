import { asCardId, asStackId } from '@tilewalk/engine/runtime';
import { describe, expect, it, vi } from 'vitest';

import { createAnimationSessionMachine } from '../../src/animation/animation-session.js';

const target = { cardID: asCardId('c1'), stackID: asStackId('s1'), destination: { x: 1, y: 0 } };

describe('createAnimationSessionMachine', () => {
  it('starts idle and refuses a second session while one is in flight', () => {
    const machine = createAnimationSessionMachine();
    expect(machine.state).toBe('idle');

    const first = machine.begin(target);
    expect(first).toEqual({ id: 1, cardID: 'c1', stackID: 's1', destination: { x: 1, y: 0 }, state: 'inFlight' });
    expect(machine.state).toBe('inFlight');
    expect(machine.begin(target)).toBeNull();
  });

  it('completes only the current session', () => {
    const machine = createAnimationSessionMachine();
    const session = machine.begin(target);

    expect(machine.complete(99)).toBeNull();
    expect(machine.complete(session?.id ?? -1)).toEqual(session);
    expect(machine.active).toBeNull();
    expect(machine.begin(target)?.id).toBe(2);
  });

  it('cancels the attached commit on force-clear', () => {
    const machine = createAnimationSessionMachine();
    const session = machine.begin(target);
    const cancel = vi.fn();
    machine.attachCancel(session?.id ?? -1, cancel);

    expect(machine.forceClear()).toEqual(session);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(machine.isCurrent(session?.id ?? -1)).toBe(false);
    expect(machine.forceClear()).toBeNull();
  });

  it('cancels immediately when attaching to a session that is no longer current', () => {
    const machine = createAnimationSessionMachine();
    const session = machine.begin(target);
    machine.forceClear();
    const cancel = vi.fn();

    machine.attachCancel(session?.id ?? -1, cancel);

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('does not cancel a commit that already completed', () => {
    const machine = createAnimationSessionMachine();
    const session = machine.begin(target);
    const cancel = vi.fn();
    machine.attachCancel(session?.id ?? -1, cancel);

    machine.complete(session?.id ?? -1);
    machine.forceClear();

    expect(cancel).not.toHaveBeenCalled();
  });
});
