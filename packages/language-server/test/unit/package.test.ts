import { describe, test, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const packageRoot = fileURLToPath(new URL("../../", import.meta.url));

function exportsField(): unknown {
  const manifest: unknown = JSON.parse(readFileSync(`${packageRoot}package.json`, "utf8"));
  return typeof manifest === "object" && manifest !== null ? Reflect.get(manifest, "exports") : undefined;
}

describe("package exports", () => {
  test("exposes the server entry point", () => {
    const exports = exportsField();
    const server: unknown = typeof exports === "object" && exports !== null ? Reflect.get(exports, "./server") : undefined;
    expect(server).toBe("./src/main.ts");
    expect(existsSync(`${packageRoot}src/main.ts`)).toBe(true);
  });
});
