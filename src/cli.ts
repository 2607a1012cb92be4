#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { runAppPlan, runAppPrepare, runAppPublish } from "./commands/app";
import { runConfigSet, runConfigShow } from "./commands/config";
import { runContentPlan, runContentPrepare, runContentPublish, runContentRemove } from "./commands/content";
import { runGuided } from "./commands/guided";
import { collect } from "./commands/release-common";
import { loadSettings } from "./config";
import { setFlags } from "./context/flags";
import { errorMessage } from "./errors";
import { getRepoRoot } from "./paths";
import { closePrompt } from "./ui/prompt";
import { asRecord, getString, parseJson } from "./utils/structured";

const program = new Command();

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const parsed = parseJson(fs.readFileSync(pkgPath, "utf-8"));
    const pkg = parsed.ok ? asRecord(parsed.value) : null;
    return (pkg && getString(pkg, "version")) ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function pinOptions(command: Command): Command {
  return command
    .option("--channel <channel>", "Release channel: stable|beta")
    .option("--bump <bump>", "Semantic bump: major|minor|patch", "patch")
    .option("--tag <tag>", "Override the suggested tag")
    .option("--auto", "Pick pins automatically")
    .option("--repo <id=sha>", "Pin a repo to a commit (repeatable)", collect, [])
    .option("--ref <id=ref>", "Track another branch for a repo (repeatable)", collect, [])
    .option("--allow-non-green", "Allow pins without a successful CI run");
}

function publishOptions(command: Command): Command {
  return command
    .option("--plan <file>", "Use a plan written by `plan --out`")
    .option("--notes-file <path>", "Markdown release notes to attach")
    .option("--confirm-tag <tag>", "Confirm the tag without a prompt");
}

program
  .name("conductor")
  .description("Multi-repository release orchestration")
  .version(getVersion())
  .option("--workspace <dir>", "Directory holding the local clones")
  .option("--no-interactive", "Never prompt; every input must come from options")
  .option("--dry-run", "Echo mutations without running them");

program.hook("preAction", (thisCommand, actionCommand) => {
  const settings = loadSettings();
  const opts =
    typeof actionCommand.optsWithGlobals === "function" ? actionCommand.optsWithGlobals() : thisCommand.opts();
  setFlags({
    nonInteractive: opts.interactive === false || settings.mode.default === "non-interactive",
    dryRun: Boolean(opts.dryRun),
    watch: Boolean(opts.watch),
    workspace: typeof opts.workspace === "string" ? path.resolve(opts.workspace) : undefined
  });
});

program.hook("postAction", () => {
  closePrompt();
});

const content = program.command("content").description("Distribution content releases");
pinOptions(content.command("plan"))
  .description("Plan a content release (no side effects)")
  .option("--strict", "Require every repo ready at its branch head")
  .option("--take-suggested", "Apply the suggested bumps of smart --auto")
  .option("--out <file>", "Write the plan JSON to a file")
  .action((options) => runContentPlan(options));
publishOptions(pinOptions(content.command("prepare")))
  .description("Create and merge the distribution PR for a release spec")
  .option("--strict", "Require every repo ready at its branch head")
  .option("--take-suggested", "Apply the suggested bumps of smart --auto")
  .option("--notes <text>", "Short release notes")
  .action((options) => runContentPrepare(options));
publishOptions(pinOptions(content.command("publish")))
  .description("Prepare the spec PR and dispatch the publish workflow")
  .option("--strict", "Require every repo ready at its branch head")
  .option("--take-suggested", "Apply the suggested bumps of smart --auto")
  .option("--notes <text>", "Short release notes")
  .option("--watch", "Watch the workflow run until it completes")
  .action((options) => runContentPublish(options));
content
  .command("remove")
  .description("Remove releases: spec and notes through a PR, then the GitHub Releases")
  .option("--tag <tag>", "Release tag to remove (repeatable)", collect, [])
  .option("--force", "Allow removing stable tags")
  .option("--ignore-missing", "Skip tags that have no GitHub Release")
  .option("-y, --yes", "Skip the DELETE confirmation")
  .action((options) => runContentRemove(options));

const app = program.command("app").description("Application releases");
pinOptions(app.command("plan"))
  .description("Plan an app release (no side effects)")
  .option("--out <file>", "Write the plan JSON to a file")
  .action((options) => runAppPlan(options));
publishOptions(pinOptions(app.command("prepare")))
  .description("Create and merge the app version bump PR")
  .action((options) => runAppPrepare(options));
publishOptions(pinOptions(app.command("publish")))
  .description("Version bump PR, then the candidate and release workflows")
  .option("--watch", "Watch each workflow run until it completes")
  .action((options) => runAppPublish(options));

program
  .command("guided")
  .description("Resumable step-by-step release wizard")
  .option("--notes-file <path>", "Markdown release notes to attach")
  .option("--watch", "Watch workflow runs until they complete")
  .action((options) => runGuided(options));

const configCmd = program.command("config").description("Configuration commands");
configCmd
  .command("show")
  .description("Show effective settings and the release config")
  .action(() => runConfigShow());
configCmd
  .command("set")
  .description("Set a settings value by key")
  .argument("<key>", "Key: workspace.root | release.config_file | mode.default")
  .argument("<value>", "Value for key")
  .action((key: string, value: string) => runConfigSet(key, value));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
