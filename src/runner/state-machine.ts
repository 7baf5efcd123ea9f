import type { PipelineState } from '../types.js';

const TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  INIT: ['BUILDING', 'TEARDOWN'],
  BUILDING: ['LAUNCHING', 'TEARDOWN'],
  LAUNCHING: ['TESTING', 'TEARDOWN'],
  TESTING: ['TEARDOWN'],
  TEARDOWN: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

/**
 * Tracks where a run is. Every path to a terminal state passes through
 * TEARDOWN, so a finished run has always been swept.
 */
export class PipelineStateMachine {
  private current: PipelineState = 'INIT';
  private readonly visited: PipelineState[] = ['INIT'];

  get state(): PipelineState {
    return this.current;
  }

  get history(): PipelineState[] {
    return [...this.visited];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(next: PipelineState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: PipelineState): void {
    if (!this.canTransition(next)) {
      throw new Error(`Invalid pipeline transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.visited.push(next);
  }
}
