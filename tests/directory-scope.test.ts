import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/core/errors.js";
import { DirectoryScope } from "../src/core/paths.js";

async function tempTree(): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "bench-scope-"));
  await fs.mkdir(path.join(root, "outer", "inner"), { recursive: true });
  return root;
}

describe("directory scope", () => {
  it("enters the directory and restores the previous one afterwards", async () => {
    const root = await tempTree();
    const scope = new DirectoryScope(root);

    const seen = await scope.withDirectory("outer", async (cwd) => {
      expect(scope.current()).toBe(path.join(root, "outer"));
      return cwd;
    });

    expect(seen).toBe(path.join(root, "outer"));
    expect(scope.current()).toBe(root);
    expect(scope.depth()).toBe(0);
  });

  it("restores the previous directory when the body throws", async () => {
    const root = await tempTree();
    const scope = new DirectoryScope(root);

    await expect(
      scope.withDirectory("outer", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(scope.current()).toBe(root);
    expect(scope.depth()).toBe(0);
  });

  it("resolves nested scopes against the current one and unwinds LIFO", async () => {
    const root = await tempTree();
    const scope = new DirectoryScope(root);
    const order: string[] = [];

    await scope.withDirectory("outer", async () => {
      order.push(scope.current());
      await scope.withDirectory("inner", async () => {
        order.push(scope.current());
      });
      order.push(scope.current());
    });
    order.push(scope.current());

    expect(order).toEqual([
      path.join(root, "outer"),
      path.join(root, "outer", "inner"),
      path.join(root, "outer"),
      root
    ]);
  });

  it("rejects a missing directory without entering it", async () => {
    const root = await tempTree();
    const scope = new DirectoryScope(root);
    let ran = false;

    await expect(
      scope.withDirectory("absent", async () => {
        ran = true;
      })
    ).rejects.toBeInstanceOf(ConfigError);

    expect(ran).toBe(false);
    expect(scope.current()).toBe(root);
  });

  it("never changes the process working directory", async () => {
    const root = await tempTree();
    const before = process.cwd();
    const scope = new DirectoryScope(root);

    await scope.withDirectory("outer", async () => {
      expect(process.cwd()).toBe(before);
    });

    expect(process.cwd()).toBe(before);
  });
});
