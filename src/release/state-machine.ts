import { Result, err, ok, releaseError } from "../errors";

export type StepOutcome<S> = { kind: "advance"; state: S } | { kind: "finish" };

export type StepHandler<S> = (state: S) => Promise<Result<StepOutcome<S>>>;
export type SaveState<S> = (state: S) => Promise<Result<S>>;

export const FINISH: StepOutcome<never> = { kind: "finish" };

export function advance<S>(state: S): StepOutcome<S> {
  return { kind: "advance", state };
}

/**
 * Drives `state` through its handlers until one finishes or fails. Each
 * advanced state is persisted before the next step runs; a finish is not.
 */
export async function runStateMachine<S>(
  initialState: S,
  getStep: (state: S) => string,
  handlers: Readonly<Record<string, StepHandler<S>>>,
  saveState: SaveState<S>
): Promise<Result<void>> {
  let current = initialState;
  while (true) {
    const step = getStep(current);
    const handler = Object.prototype.hasOwnProperty.call(handlers, step) ? handlers[step] : undefined;
    if (!handler) {
      return err(releaseError("invalid_input", `unknown release wizard step: ${step}`));
    }
    const outcome = await handler(current);
    if (!outcome.ok) {
      return outcome;
    }
    if (outcome.value.kind === "finish") {
      return ok(undefined);
    }
    const saved = await saveState(outcome.value.state);
    if (!saved.ok) {
      return saved;
    }
    current = saved.value;
  }
}
