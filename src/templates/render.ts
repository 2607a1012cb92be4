import fs from "fs";
import { bundledPath } from "../paths";
import type { PinnedRepo } from "../release/model";

export function loadTemplate(name: string): string {
  const filePath = bundledPath("templates", `${name}.md`);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Template not found: ${name}.md`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

export function renderTemplate(template: string, data: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(data)) {
    const token = `{{${key}}}`;
    output = output.split(token).join(value);
  }
  return output;
}

/** PR description listing each pinned commit under a short `key=value` intro. */
export function renderPinnedBody(intro: string[], pinned: PinnedRepo[]): string {
  const pins = pinned.map((pin) => `- ${pin.repo.id}: ${pin.sha}`).join("\n");
  return renderTemplate(loadTemplate("pr-body"), { intro: intro.join("\n"), pins }).trimEnd();
}
