import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { gzipFile } from "../src/artifact-writer/compress.js";
import { RepoLayout } from "../src/core/layout.js";
import type { PackageIndex } from "../src/index/packages.js";
import {
  applyReleaseDefaults,
  checksumSections,
  coveredFiles,
  findUncovered,
  ReleaseDescriptorBuilder,
  type ReleaseOptions,
} from "../src/index/release.js";
import { writeTranslationStub } from "../src/index/translation.js";
import type { IndexFile } from "../src/index/bindings.js";
import { silentReporter } from "../src/log/reporter.js";
import { FakeRunner, fakeFtpArchive, ok } from "./fake_tools.js";

const TEMPLATES = path.resolve(import.meta.dirname, "../templates");
const PACKAGES = "Package: sample\nVersion: 1.0.0\n";

const BARE_RELEASE = [
  "Origin: {{ release.origin }}",
  "Label: {{ release.label }}",
  "Date: {{ release.date }}",
  "Architectures: {{ release.architectures }}",
  "Components: {{ release.components }}",
  "Description: {{ release.description }}",
  "",
].join("\n");

function sha256(file: string): string {
  return createHash("sha256").update(fs.readFileSync(file)).digest("hex");
}

describe("release descriptor builder", () => {
  let tmpDir: string;
  let layout: RepoLayout;
  let packages: PackageIndex[];
  let translation: IndexFile;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "aptctl-release-"));
    layout = new RepoLayout(tmpDir);
    const listing = layout.packagesPath("amd64");
    fs.mkdirSync(path.dirname(listing), { recursive: true });
    fs.writeFileSync(listing, PACKAGES);
    await gzipFile(listing);
    packages = [{ arch: "amd64", listing: { path: listing, relative_path: layout.packagesRelative("amd64") }, failures: [] }];
    translation = await writeTranslationStub(layout);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<ReleaseOptions> = {}): ReleaseOptions {
    return {
      layout,
      mode: "template",
      templatePath: path.join(TEMPLATES, "Release"),
      runner: new FakeRunner(),
      releaseCommand: ["apt-ftparchive", "release"],
      timeoutMs: 1000,
      reporter: silentReporter(),
      info: {
        suite: "stable",
        codename: "stable",
        origin: "Test",
        label: "Test",
        description: "Test repository",
        architectures: ["amd64"],
        components: ["main"],
        date: new Date(Date.UTC(2026, 9, 19, 12, 30, 0)),
      },
      ...overrides,
    };
  }

  it("covers each Packages file, its .gz and the compressed translation", () => {
    expect(coveredFiles(packages, translation)).toEqual([
      "main/binary-amd64/Packages",
      "main/binary-amd64/Packages.gz",
      "i18n/Translation-en.gz",
    ]);
  });

  it("renders the template and appends checksum sections", async () => {
    const release = await new ReleaseDescriptorBuilder(options()).build(coveredFiles(packages, translation));
    const text = fs.readFileSync(layout.releasePath, "utf8");

    expect(release.path).toBe(layout.releasePath);
    expect(release.added_defaults).toEqual([]);
    expect(
      text.startsWith(
        [
          "Origin: Test",
          "Label: Test",
          "Suite: stable",
          "Codename: stable",
          "Date: Mon, 19 Oct 2026 12:30:00 UTC",
          "Architectures: amd64",
          "Components: main",
          "Description: Test repository",
          "MD5Sum:",
        ].join("\n"),
      ),
    ).toBe(true);

    const listing = layout.packagesPath("amd64");
    const size = String(PACKAGES.length).padStart(16);
    expect(text).toContain(`\nSHA256:\n ${sha256(listing)} ${size} main/binary-amd64/Packages\n`);
    expect(text).toContain(` ${sha256(`${listing}.gz`)} `);
    const stubSize = String(fs.statSync(`${translation.path}.gz`).size).padStart(16);
    expect(text.endsWith(` ${sha256(`${translation.path}.gz`)} ${stubSize} i18n/Translation-en.gz\n`)).toBe(true);
  });

  it("records the digests of the covered files", async () => {
    const release = await new ReleaseDescriptorBuilder(options()).build(coveredFiles(packages, translation));
    const record = release.covered["main/binary-amd64/Packages"];
    expect(record.file_size).toBe(PACKAGES.length);
    expect(record.checksums.SHA256).toBe(sha256(layout.packagesPath("amd64")));
    expect(Object.keys(release.covered)).toHaveLength(3);
  });

  it("prepends Suite and Codename when the template lacks them", async () => {
    const template = path.join(tmpDir, "Release.bare");
    fs.writeFileSync(template, BARE_RELEASE);
    const reporter = silentReporter();

    const release = await new ReleaseDescriptorBuilder(options({ templatePath: template, reporter })).build(
      coveredFiles(packages, translation),
    );

    expect(release.added_defaults).toEqual(["Suite: stable", "Codename: stable"]);
    expect(fs.readFileSync(layout.releasePath, "utf8").startsWith("Suite: stable\nCodename: stable\nOrigin: Test\n")).toBe(
      true,
    );
    expect(reporter.diagnostics().filter((d) => d.code === "RELEASE_DEFAULT_ADDED")).toHaveLength(2);
  });

  it("binds suite and codename from the distribution", async () => {
    const bookworm = new RepoLayout(tmpDir, "bookworm");
    await new ReleaseDescriptorBuilder(
      options({ layout: bookworm, info: { ...options().info, suite: "testing", codename: "bookworm" } }),
    ).build([]);
    const text = fs.readFileSync(bookworm.releasePath, "utf8");
    expect(text.split("\n").slice(2, 4)).toEqual(["Suite: testing", "Codename: bookworm"]);
  });

  it("removes signatures of an earlier Release", async () => {
    fs.writeFileSync(layout.inReleasePath, "old");
    fs.writeFileSync(layout.releaseGpgPath, "old");
    await new ReleaseDescriptorBuilder(options()).build(coveredFiles(packages, translation));
    expect(fs.existsSync(layout.inReleasePath)).toBe(false);
    expect(fs.existsSync(layout.releaseGpgPath)).toBe(false);
  });

  it("fails when a covered file is missing", async () => {
    fs.rmSync(`${layout.packagesPath("amd64")}.gz`);
    await expect(
      new ReleaseDescriptorBuilder(options()).build(coveredFiles(packages, translation)),
    ).rejects.toMatchObject({ kind: "MissingInput", site: "CHECKSUM_FAILED" });
  });

  it("scan mode runs the release tool on the dist directory", async () => {
    const runner = new FakeRunner({ "apt-ftparchive": fakeFtpArchive });
    const release = await new ReleaseDescriptorBuilder(options({ mode: "scan", runner })).build(
      coveredFiles(packages, translation),
    );

    expect(runner.calls).toEqual([{ command: "apt-ftparchive", args: ["release", "dists/stable"], cwd: tmpDir }]);
    const text = fs.readFileSync(layout.releasePath, "utf8");
    expect(text.startsWith("Suite: stable\nCodename: stable\nDate: ")).toBe(true);
    expect(release.added_defaults).toHaveLength(2);
    expect(release.template).toBeUndefined();
  });

  it("scan mode rejects empty output", async () => {
    const runner = new FakeRunner({ "apt-ftparchive": () => ok("") });
    await expect(
      new ReleaseDescriptorBuilder(options({ mode: "scan", runner })).build(coveredFiles(packages, translation)),
    ).rejects.toMatchObject({ kind: "ToolFailure", site: "RELEASE_SCAN_EMPTY" });
  });

  it("rejects a descriptor that does not list every covered file", async () => {
    const runner = new FakeRunner({ "apt-ftparchive": () => ok("Origin: Test\n") });
    await expect(
      new ReleaseDescriptorBuilder(options({ mode: "scan", runner })).build(coveredFiles(packages, translation)),
    ).rejects.toMatchObject({ kind: "ToolFailure", site: "RELEASE_INCOMPLETE" });
    expect(fs.existsSync(layout.releasePath)).toBe(false);
  });
});

describe("release helpers", () => {
  it("applyReleaseDefaults adds only absent fields and is idempotent", () => {
    expect(applyReleaseDefaults("Suite: testing\nOrigin: x\n")).toEqual({
      text: "Codename: stable\nSuite: testing\nOrigin: x\n",
      added: ["Codename: stable"],
    });
    const once = applyReleaseDefaults("Origin: x\n").text;
    expect(once).toBe("Suite: stable\nCodename: stable\nOrigin: x\n");
    expect(applyReleaseDefaults(once)).toEqual({ text: once, added: [] });
  });

  it("matches field names regardless of case", () => {
    expect(applyReleaseDefaults("suite: testing\nCODENAME: trixie\n")).toEqual({
      text: "suite: testing\nCODENAME: trixie\n",
      added: [],
    });
  });

  it("does not take a field inside another line for the field itself", () => {
    expect(applyReleaseDefaults("Description: Suite: none\n").added).toEqual(["Suite: stable", "Codename: stable"]);
  });

  it("checksumSections right-aligns sizes in 16 columns", () => {
    const lines = checksumSections({
      x: { checksums: { MD5Sum: "aa", SHA1: "bb", SHA256: "cc", SHA512: "dd" }, file_size: 42 },
    });
    expect(lines).toEqual([
      "MD5Sum:",
      ` aa ${" ".repeat(14)}42 x`,
      "SHA1:",
      ` bb ${" ".repeat(14)}42 x`,
      "SHA256:",
      ` cc ${" ".repeat(14)}42 x`,
      "SHA512:",
      ` dd ${" ".repeat(14)}42 x`,
    ]);
  });

  it("findUncovered names files missing by SHA256 and size", () => {
    const covered = {
      a: { checksums: { SHA256: "aaa" }, file_size: 1 },
      b: { checksums: { SHA256: "bbb" }, file_size: 2 },
    };
    expect(findUncovered("SHA256:\n aaa 1 a\n bbb 3 b\n", covered)).toEqual(["b"]);
  });
});
