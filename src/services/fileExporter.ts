import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config";
import { ExportError } from "../errors";
import { isPresent } from "../evaluation/artifactFields";
import type { ExportResult } from "../types";

const isInside = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  if (relative.length === 0 || path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
};

export class FileExporter {
  constructor(private readonly root = config.exportRoot) {}

  private resolveTarget(subdirectory: string, filename: string | undefined, extension: string): string {
    if (!filename) {
      throw new ExportError("filename is required");
    }
    if (!filename.endsWith(extension)) {
      throw new ExportError(`filename must end with ${extension}`, { filename });
    }

    const directory = path.resolve(this.root, subdirectory);
    const absolute = path.resolve(directory, filename);
    if (!isInside(absolute, directory)) {
      throw new ExportError(`Unsafe export path rejected: ${filename}`, { filename });
    }
    return absolute;
  }

  private async write(absolute: string, text: string): Promise<ExportResult> {
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, text, "utf8");
    return {
      status: "success",
      path: absolute,
      bytes_written: Buffer.byteLength(text, "utf8")
    };
  }

  async saveMarkdown(filename: string | undefined, content: string | undefined): Promise<ExportResult> {
    const target = this.resolveTarget("markdown", filename, ".md");
    if (!content) {
      throw new ExportError("content is required", { filename });
    }
    return this.write(target, content);
  }

  async saveJson(filename: string | undefined, data: unknown): Promise<ExportResult> {
    const target = this.resolveTarget("json", filename, ".json");
    if (!isPresent(data)) {
      throw new ExportError("data is required", { filename });
    }
    return this.write(target, JSON.stringify(data, null, 2));
  }
}
