import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "./errors.js";

/**
 * Working-directory context threaded explicitly through the harness.
 *
 * The process-wide `process.cwd()` is never changed. Code that needs a
 * "current directory" asks the scope, and child processes receive the
 * resolved directory as their `cwd` option.
 */
export class DirectoryScope {
  private readonly root: string;
  private readonly stack: string[] = [];

  constructor(root = process.cwd()) {
    this.root = path.resolve(root);
  }

  current(): string {
    return this.stack[this.stack.length - 1] ?? this.root;
  }

  depth(): number {
    return this.stack.length;
  }

  resolve(target: string): string {
    return path.resolve(this.current(), target);
  }

  /**
   * Runs `body` with `dir` (resolved against the current context) as the
   * current directory, restoring the previous context on every exit path.
   */
  async withDirectory<T>(dir: string, body: (cwd: string) => Promise<T>): Promise<T> {
    const resolved = this.resolve(dir);
    const stat = await fs.stat(resolved).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new ConfigError(`Not a directory: ${resolved}`);
    }

    const depth = this.stack.length;
    this.stack.push(resolved);
    try {
      return await body(resolved);
    } finally {
      this.stack.length = depth;
    }
  }
}
