import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { TemplateNotFoundError } from "../domain/errors.js";
import { log } from "../logger.js";
import type { TemplateSource } from "../repositories/types.js";

export interface FileTemplateSourceConfig {
  /** Directory holding the HTML templates */
  directory: string;
  /** Used when the configured template is missing */
  fallbackTemplate: string;
}

/**
 * Templates as files under one directory. Read on every call so an edited
 * template takes effect on the next cycle.
 */
export class FileTemplateSource implements TemplateSource {
  private directory: string;

  constructor(private config: FileTemplateSourceConfig) {
    this.directory = resolve(config.directory);
  }

  async getTemplate(name: string): Promise<string> {
    const requested = await this.read(name);
    if (requested !== null) {
      return requested;
    }

    if (name !== this.config.fallbackTemplate) {
      const fallback = await this.read(this.config.fallbackTemplate);
      if (fallback !== null) {
        log.email.warn({ template: name, fallback: this.config.fallbackTemplate }, "template missing, using fallback");
        return fallback;
      }
    }

    throw new TemplateNotFoundError(name);
  }

  private async read(name: string): Promise<string | null> {
    const path = resolve(this.directory, name);
    const rel = relative(this.directory, path);

    // Names that escape the template directory are treated as absent
    if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
      log.email.warn({ template: name }, "template path outside template directory rejected");
      return null;
    }

    try {
      return await readFile(path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "EISDIR" || error.code === "ENOTDIR")
  );
}
