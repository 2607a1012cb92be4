import fs from "fs";
import path from "path";
import {
  clearSession,
  loadAppSession,
  loadContentSession,
  newAppSession,
  newContentSession,
  saveSession,
  sessionNotes,
  sessionPath,
  withNotes
} from "../session";
import { json, makeTempDir, removeTempDir, writeFile } from "./fakes";

const NOW = new Date("2026-10-19T09:30:00.000Z");

describe("Wizard sessions", () => {
  let workspace: string;

  beforeEach(() => {
    workspace = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(workspace);
  });

  it("should start a content session at the product step", () => {
    const session = newContentSession("octo", NOW);

    expect(session).toMatchObject({ product: "content", step: "product", createdBy: "octo", createdAt: "2026-10-19T09:30:00.000Z" });
    expect(session.releaseId).toMatch(/^content-[0-9a-f]{12}$/);
  });

  it("should save, load and clear an app session", () => {
    // Arrange: An app session part way through
    const session = { ...newAppSession("octo", "main", NOW), step: "sha" as const, channel: "beta" as const, bump: "minor" as const };

    // Act: Save and reload
    const saved = saveSession(workspace, session);
    const loaded = loadAppSession(workspace);

    // Assert: Round trip, then gone after clearing
    expect(saved).toEqual({ ok: true, value: session });
    expect(loaded).toEqual({ ok: true, value: session });
    expect(clearSession(workspace, "app")).toEqual({ ok: true, value: undefined });
    expect(fs.existsSync(sessionPath(workspace, "app"))).toBe(false);
    expect(loadAppSession(workspace)).toEqual({ ok: true, value: null });
  });

  it("should store sessions per product under .conductor", () => {
    expect(sessionPath(workspace, "content")).toBe(path.join(workspace, ".conductor", "release", "sessions", "content-release.json"));
  });

  it("should refuse a session saved for the other product", () => {
    writeFile(workspace, ".conductor/release/sessions/content-release.json", json(newAppSession("octo", "main", NOW)));

    const result = loadContentSession(workspace);

    expect(!result.ok && result.error.message).toBe("release session is for app, not content");
  });

  it("should refuse an unsupported schema", () => {
    writeFile(workspace, ".conductor/release/sessions/app-release.json", json({ ...newAppSession("octo", "main", NOW), schema: 7 }));

    const result = loadAppSession(workspace);

    expect(!result.ok && result.error.message).toBe("unsupported release session schema: 7");
  });

  it("should refuse a session that fails validation", () => {
    writeFile(workspace, ".conductor/release/sessions/app-release.json", json({ ...newAppSession("octo", "main", NOW), idxSha: -1 }));

    const result = loadAppSession(workspace);

    expect(!result.ok && result.error.message).toBe("invalid release session");
  });

  it("should carry attached notes through the session", () => {
    const attached = withNotes(newContentSession("octo", NOW), { sourcePath: "/notes/v1.md", markdown: "# Hi\n", sha256: "abc" });

    expect(sessionNotes(attached)).toEqual({ sourcePath: "/notes/v1.md", markdown: "# Hi\n", sha256: "abc" });
    expect(sessionNotes(withNotes(attached, null))).toBeNull();
  });
});
