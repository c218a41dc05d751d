import path from "node:path";

/**
 * Paths of the repository tree under one output root:
 *
 *   pool/main/<package>.deb
 *   dists/<dist>/main/binary-<arch>/Packages[.gz]
 *   dists/<dist>/i18n/Translation-en[.gz]
 *   dists/<dist>/Release, Release.gpg, InRelease
 */
export class RepoLayout {
  constructor(
    readonly root: string,
    readonly dist = "stable",
    readonly component = "main",
  ) {}

  get poolDir(): string {
    return path.join(this.root, "pool", this.component);
  }

  /** Pool path relative to the root, as written in `Filename:` fields. */
  get poolRelative(): string {
    return `pool/${this.component}`;
  }

  get distDir(): string {
    return path.join(this.root, "dists", this.dist);
  }

  get distRelative(): string {
    return `dists/${this.dist}`;
  }

  artifactPath(filename: string): string {
    return path.join(this.poolDir, filename);
  }

  /** `pool/main/<file>` for any artifact path or basename. */
  artifactRelative(filename: string): string {
    return `${this.poolRelative}/${path.basename(filename)}`;
  }

  archDirName(arch: string): string {
    return `binary-${arch}`;
  }

  /** `main/binary-<arch>/Packages`, relative to the dist directory. */
  packagesRelative(arch: string): string {
    return `${this.component}/${this.archDirName(arch)}/Packages`;
  }

  packagesPath(arch: string): string {
    return path.join(this.distDir, this.packagesRelative(arch));
  }

  get translationRelative(): string {
    return "i18n/Translation-en";
  }

  get translationPath(): string {
    return path.join(this.distDir, this.translationRelative);
  }

  get releasePath(): string {
    return path.join(this.distDir, "Release");
  }

  get releaseGpgPath(): string {
    return path.join(this.distDir, "Release.gpg");
  }

  get inReleasePath(): string {
    return path.join(this.distDir, "InRelease");
  }

  /** Absolute path of a dist-relative index path. */
  distPath(relative: string): string {
    return path.join(this.distDir, relative);
  }
}
