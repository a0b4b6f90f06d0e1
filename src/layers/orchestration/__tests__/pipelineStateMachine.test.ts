import { describe, expect, it } from "vitest";

import { PipelineStateMachine } from "../pipelineStateMachine.js";

describe("PipelineStateMachine", () => {
  it("walks the happy path to MERGED", () => {
    const machine = new PipelineStateMachine();

    machine.transition("LOADED");
    machine.transition("GENERATED");
    machine.transition("MERGED");

    expect(machine.state).toBe("MERGED");
    expect(machine.terminal).toBe(true);
    expect(machine.history.map(({ from, to }) => `${from}->${to}`)).toEqual([
      "PENDING->LOADED",
      "LOADED->GENERATED",
      "GENERATED->MERGED"
    ]);
  });

  it("can fail from any non-terminal state", () => {
    const machine = new PipelineStateMachine();
    machine.transition("LOADED");

    machine.transition("FAILED");

    expect(machine.state).toBe("FAILED");
    expect(machine.terminal).toBe(true);
  });

  it("rejects skipped and backward transitions", () => {
    const machine = new PipelineStateMachine();

    expect(() => machine.transition("MERGED")).toThrow("Illegal pipeline transition PENDING -> MERGED");
    machine.transition("LOADED");
    expect(() => machine.transition("PENDING")).toThrow("Illegal pipeline transition LOADED -> PENDING");
    expect(machine.terminal).toBe(false);
  });

  it("does not leave a terminal state", () => {
    const machine = new PipelineStateMachine();
    machine.transition("FAILED");

    expect(() => machine.transition("LOADED")).toThrow("Illegal pipeline transition FAILED -> LOADED");
    expect(machine.history).toHaveLength(1);
  });
});
