import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { computeFileDigest } from "../src/artifact-writer/checksum.js";
import { gunzipFile } from "../src/artifact-writer/compress.js";
import { RepoLayout } from "../src/core/layout.js";
import { artifactFromDigest, type Artifact } from "../src/index/bindings.js";
import { PackageIndexBuilder, rewriteFilenames, type PackageIndexOptions } from "../src/index/packages.js";
import { writeTranslationStub } from "../src/index/translation.js";
import { silentReporter } from "../src/log/reporter.js";
import { failed, FakeRunner, fakeScanPackages, ok } from "./fake_tools.js";

const TEMPLATES = path.resolve(import.meta.dirname, "../templates");
const DEB_BYTES = "fake package bytes";

function hex(algo: string, content: string): string {
  return createHash(algo).update(content).digest("hex");
}

describe("package index builder", () => {
  let tmpDir: string;
  let layout: RepoLayout;
  let artifact: Artifact;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "aptctl-packages-"));
    layout = new RepoLayout(tmpDir);
    fs.mkdirSync(layout.poolDir, { recursive: true });
    const deb = layout.artifactPath("sample-1.0.0.deb");
    fs.writeFileSync(deb, DEB_BYTES);
    artifact = artifactFromDigest(deb, await computeFileDigest(deb));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<PackageIndexOptions> = {}): PackageIndexOptions {
    return {
      layout,
      architectures: ["amd64"],
      artifact,
      metadata: {
        name: "sample",
        version: "1.0.0",
        maintainer: "Test Maintainer <test@example.org>",
        description: "Test package",
        section: "misc",
        priority: "optional",
      },
      mode: "template",
      templatePath: path.join(TEMPLATES, "Packages"),
      runner: new FakeRunner(),
      scanCommand: ["dpkg-scanpackages", "--multiversion"],
      timeoutMs: 1000,
      reporter: silentReporter(),
      ...overrides,
    };
  }

  it("renders the Packages stanza from the template", async () => {
    const [index] = await new PackageIndexBuilder(options()).build();

    expect(index.listing.path).toBe(path.join(tmpDir, "dists/stable/main/binary-amd64/Packages"));
    expect(index.listing.relative_path).toBe("main/binary-amd64/Packages");
    expect(index.failures).toEqual([]);
    expect(fs.readFileSync(index.listing.path, "utf8")).toBe(
      [
        "Package: sample",
        "Version: 1.0.0",
        "Architecture: amd64",
        "Maintainer: Test Maintainer <test@example.org>",
        "Section: misc",
        "Priority: optional",
        "Filename: pool/main/sample-1.0.0.deb",
        `Size: ${DEB_BYTES.length}`,
        `MD5Sum: ${hex("md5", DEB_BYTES)}`,
        `SHA1: ${hex("sha1", DEB_BYTES)}`,
        `SHA256: ${hex("sha256", DEB_BYTES)}`,
        `SHA512: ${hex("sha512", DEB_BYTES)}`,
        "Description: Test package",
        "",
      ].join("\n"),
    );
  });

  it("writes a .gz with the same content", async () => {
    const [index] = await new PackageIndexBuilder(options()).build();
    expect(index.listing.compressed).toBe(`${index.listing.path}.gz`);
    const gz = await gunzipFile(`${index.listing.path}.gz`);
    expect(gz.toString("utf8")).toBe(fs.readFileSync(index.listing.path, "utf8"));
  });

  it("builds one listing per architecture", async () => {
    const indexes = await new PackageIndexBuilder(options({ architectures: ["amd64", "arm64"] })).build();
    expect(indexes.map((i) => i.listing.relative_path)).toEqual([
      "main/binary-amd64/Packages",
      "main/binary-arm64/Packages",
    ]);
    expect(fs.readFileSync(layout.packagesPath("arm64"), "utf8")).toContain("Architecture: arm64\n");
  });

  it("skips lines with missing metadata and warns", async () => {
    const reporter = silentReporter();
    const [index] = await new PackageIndexBuilder(
      options({ reporter, metadata: { name: "sample", version: "1.0.0", section: "misc", priority: "optional" } }),
    ).build();

    const content = fs.readFileSync(index.listing.path, "utf8");
    expect(content).not.toContain("Maintainer:");
    expect(content).not.toContain("Description:");
    expect(content.startsWith("Package: sample\nVersion: 1.0.0\nArchitecture: amd64\nSection: misc\n")).toBe(true);
    expect(index.failures.map((f) => f.line_number)).toEqual([4, 13]);
    expect(reporter.count("warn")).toBe(3);
  });

  it("fails when the template is missing", async () => {
    await expect(
      new PackageIndexBuilder(options({ templatePath: path.join(tmpDir, "nope") })).build(),
    ).rejects.toMatchObject({ site: "TEMPLATE_NOT_FOUND", kind: "MissingInput" });
  });

  it("scan mode runs the scanner from the root and rewrites Filename", async () => {
    const runner = new FakeRunner({ "dpkg-scanpackages": fakeScanPackages });
    const [index] = await new PackageIndexBuilder(options({ mode: "scan", runner })).build();

    expect(runner.calls).toEqual([
      { command: "dpkg-scanpackages", args: ["--multiversion", "--arch", "amd64", "pool/main"], cwd: tmpDir },
    ]);
    const content = fs.readFileSync(index.listing.path, "utf8");
    expect(content).toContain("\nFilename: pool/main/sample-1.0.0.deb\n");
    expect(content).not.toContain("./pool");
    expect(index.listing.template).toBeUndefined();
  });

  it("scan mode treats empty output as an error", async () => {
    const runner = new FakeRunner({ "dpkg-scanpackages": () => ok("  \n") });
    await expect(new PackageIndexBuilder(options({ mode: "scan", runner })).build()).rejects.toMatchObject({
      kind: "ToolFailure",
      site: "SCAN_EMPTY",
    });
  });

  it("scan mode maps a missing or failing scanner to its own sites", async () => {
    await expect(new PackageIndexBuilder(options({ mode: "scan" })).build()).rejects.toMatchObject({
      kind: "MissingInput",
      site: "SCAN_TOOL_MISSING",
    });

    const runner = new FakeRunner({ "dpkg-scanpackages": () => failed(2, "dpkg-scanpackages: error: bad pool") });
    await expect(new PackageIndexBuilder(options({ mode: "scan", runner })).build()).rejects.toMatchObject({
      kind: "ToolFailure",
      site: "SCAN_FAILED",
    });
  });

  it("rewriteFilenames keeps only the basename", () => {
    const body = "Package: a\nFilename: ./pool/main/sub/a_1.0_amd64.deb\nSize: 1\n";
    expect(rewriteFilenames(body, layout)).toBe("Package: a\nFilename: pool/main/a_1.0_amd64.deb\nSize: 1\n");
  });
});

describe("translation stub", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "aptctl-i18n-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes an empty Translation-en and its .gz", async () => {
    const layout = new RepoLayout(tmpDir);
    const stub = await writeTranslationStub(layout);

    expect(stub.path).toBe(path.join(tmpDir, "dists/stable/i18n/Translation-en"));
    expect(stub.relative_path).toBe("i18n/Translation-en");
    expect(fs.readFileSync(stub.path, "utf8")).toBe("");
    expect((await gunzipFile(`${stub.path}.gz`)).length).toBe(0);
  });
});
