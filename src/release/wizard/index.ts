import { Result, err, releaseError } from "../../errors";
import type { ReleaseProduct } from "../model";
import type { NotesAttachment } from "../notes";
import { runGuidedAppRelease } from "./app";
import { WizardContext, cancelled } from "./common";
import { runGuidedContentRelease } from "./content";

export type { WizardContext } from "./common";

export async function runGuidedRelease(
  ctx: WizardContext,
  notes: NotesAttachment | null,
  interactive: boolean
): Promise<Result<void>> {
  if (!interactive) {
    return err(
      releaseError("invalid_input", "guided release requires an interactive terminal", "Run from a terminal, or use the plan/prepare/publish commands.")
    );
  }
  const product = await ctx.selector.selectOne<ReleaseProduct>({
    title: "Release Product",
    subtitle: "Choose release type",
    options: [
      { value: "app", label: "app", detail: `${ctx.config.app.repo.slug} application` },
      { value: "content", label: "content", detail: "distribution content release" }
    ],
    initialIndex: 0,
    allowBack: false
  });
  if (product.action !== "select") {
    return err(cancelled());
  }
  return product.value === "content" ? runGuidedContentRelease(ctx, notes) : runGuidedAppRelease(ctx, notes);
}
