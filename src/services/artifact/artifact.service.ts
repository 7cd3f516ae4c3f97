import fs from "fs";
import path from "path";
import AdmZip from "adm-zip";
import { ARTIFACT_EXTENSIONS, ARTIFACT_NAME } from "../../config";
import { EmptyArtifactError, InvalidDirectoryError } from "../../errors";
import { createLogger } from "../../logger";
import { IArtifactService } from "./artifact.interface";

function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

// A symlink counts when its target is a file; linked directories are not descended into.
function isRegularFile(full: string, entry: fs.Dirent): boolean {
  if (entry.isFile()) return true;
  return entry.isSymbolicLink() && fs.existsSync(full) && fs.statSync(full).isFile();
}

export class ZipArtifactService implements IArtifactService {
  readonly artifactPath: string;
  readonly extensions: readonly string[];

  constructor(opts?: { artifactPath?: string; extensions?: readonly string[] }) {
    this.artifactPath = path.resolve(opts?.artifactPath ?? ARTIFACT_NAME);
    this.extensions = (opts?.extensions ?? ARTIFACT_EXTENSIONS).map(e => e.toLowerCase());
  }

  private log(ctx: Record<string, unknown>) { return createLogger({ service: "ArtifactService", ...ctx }); }

  // Only the top level counts: the site entry point has to sit at the root.
  validate(directory: string): void {
    if (!isDirectory(directory)) throw new InvalidDirectoryError(directory);
    const accepted = fs
      .readdirSync(directory, { withFileTypes: true })
      .filter(d => this.extensions.includes(path.extname(d.name).toLowerCase()))
      .filter(d => isRegularFile(path.join(directory, d.name), d));
    if (!accepted.length) throw new EmptyArtifactError(directory, this.extensions);
    this.log({ directory, files: accepted.length }).debug("Build directory validated");
  }

  pack(directory: string): string {
    const root = path.resolve(directory);
    fs.rmSync(this.artifactPath, { force: true });
    const zip = new AdmZip();
    let count = 0;

    const walk = (dir: string) => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (full !== this.artifactPath && isRegularFile(full, entry)) {
          const name = path.relative(root, full).split(path.sep).join("/");
          zip.addFile(name, fs.readFileSync(full));
          count++;
        }
      }
    };
    walk(root);

    // Written beside the target and renamed: the artifact path never holds a partial zip.
    const tmp = `${this.artifactPath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, zip.toBuffer());
      fs.renameSync(tmp, this.artifactPath);
    } catch (e) {
      fs.rmSync(tmp, { force: true });
      throw e;
    }
    this.log({ directory: root, artifact: this.artifactPath, files: count }).info("Packed build directory");
    return this.artifactPath;
  }

  remove(artifactPath: string): void {
    fs.unlinkSync(artifactPath);
    this.log({ artifact: artifactPath }).debug("Removed artifact");
  }
}
