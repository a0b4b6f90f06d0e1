export type PipelineState = "PENDING" | "LOADED" | "GENERATED" | "MERGED" | "FAILED";

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: string;
}

const ALLOWED_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  PENDING: ["LOADED", "FAILED"],
  LOADED: ["GENERATED", "FAILED"],
  GENERATED: ["MERGED", "FAILED"],
  MERGED: [],
  FAILED: []
};

export class PipelineStateMachine {
  private current: PipelineState = "PENDING";
  private readonly transitions: StateTransition[] = [];

  get state(): PipelineState {
    return this.current;
  }

  get history(): StateTransition[] {
    return [...this.transitions];
  }

  get terminal(): boolean {
    return ALLOWED_TRANSITIONS[this.current].length === 0;
  }

  transition(next: PipelineState): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${next}`);
    }

    this.transitions.push({ from: this.current, to: next, at: new Date().toISOString() });
    this.current = next;
  }
}
