import { describe, expect, it } from 'vitest';

import { SectionStateMachine, type SectionSnapshot } from '../src/section_state.js';

import { workItem } from './helpers/fake_adapter.js';

describe('SectionStateMachine', () => {
  it('starts loading at generation 0', () => {
    const machine = new SectionStateMachine('work');
    expect(machine.snapshot()).toEqual({ sectionId: 'work', generation: 0, state: { kind: 'loading' } });
  });

  it('settles only the current generation, once', () => {
    const machine = new SectionStateMachine('work');

    expect(machine.begin(1)).toBe(true);
    expect(machine.settle(1, { kind: 'empty' })).toBe(true);
    expect(machine.settle(1, { kind: 'error', message: 'late' })).toBe(false);
    expect(machine.state).toEqual({ kind: 'empty' });
  });

  it('drops results of superseded generations', () => {
    const machine = new SectionStateMachine('work');
    machine.begin(1);
    machine.begin(2);

    expect(machine.settle(1, { kind: 'data', items: [workItem('OLD-1')] })).toBe(false);
    expect(machine.state).toEqual({ kind: 'loading' });
    expect(machine.settle(2, { kind: 'empty' })).toBe(true);
    expect(machine.generation).toBe(2);
  });

  it('refuses to go back to an older generation', () => {
    const machine = new SectionStateMachine('work');
    machine.begin(3);
    expect(machine.begin(2)).toBe(false);
    expect(machine.begin(3)).toBe(false);
    expect(machine.generation).toBe(3);
  });

  it('returns to loading on every new generation', () => {
    const machine = new SectionStateMachine('work');
    const seen: SectionSnapshot[] = [];
    machine.subscribe((snap) => seen.push(snap));

    machine.begin(1);
    machine.settle(1, { kind: 'error', message: 'jira timed out' });
    machine.begin(2);

    expect(seen.map((s) => `${s.generation}:${s.state.kind}`)).toEqual(['1:loading', '1:error', '2:loading']);
  });

  it('stops notifying after unsubscribe', () => {
    const machine = new SectionStateMachine('work');
    let calls = 0;
    const off = machine.subscribe(() => {
      calls += 1;
    });

    machine.begin(1);
    off();
    machine.settle(1, { kind: 'empty' });
    expect(calls).toBe(1);
  });
});
