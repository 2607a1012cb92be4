import { Result } from "../errors";
import { runGuidedRelease } from "../release/wizard";
import { CommandEnv, loadNotes, runReleaseCommand } from "./release-common";

export type GuidedOptions = {
  notesFile?: string;
};

export async function guidedRelease(env: CommandEnv, options: GuidedOptions): Promise<Result<void>> {
  const notes = loadNotes(options);
  if (!notes.ok) {
    return notes;
  }
  return runGuidedRelease(env, notes.value, env.interactive);
}

export function runGuided(options: GuidedOptions): Promise<void> {
  return runReleaseCommand((env) => guidedRelease(env, options));
}
