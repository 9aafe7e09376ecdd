import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

const PRODUCTION_ROOTS = ["app", "packages", "scripts"] as const;
const ALLOWED_FILE = path.join("packages", "db", "src", "client.ts");
const CREATE_CLIENT_IMPORT_PATTERN = /import\s*\{[^}]*\bcreateClient\b[^}]*\}\s*from\s*"@supabase\/supabase-js"/;

function collectCreateClientHits(dirPath: string): string[] {
  const entries = fs.readdirSync(dirPath, { withFileTypes: true });
  const hits: string[] = [];

  for (const entry of entries) {
    if (entry.name === "node_modules") {
      continue;
    }

    const absolutePath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      hits.push(...collectCreateClientHits(absolutePath));
      continue;
    }

    if (!entry.isFile() || !entry.name.endsWith(".ts")) {
      continue;
    }

    const content = fs.readFileSync(absolutePath, "utf8");
    if (CREATE_CLIENT_IMPORT_PATTERN.test(content)) {
      hits.push(path.relative(process.cwd(), absolutePath));
    }
  }

  return hits;
}

describe("supabase client instantiation guardrail", () => {
  it("keeps Supabase client constructor usage scoped to the db client factory", () => {
    const hits = PRODUCTION_ROOTS.flatMap((root) => {
      const absoluteRoot = path.resolve(process.cwd(), root);
      return fs.existsSync(absoluteRoot) ? collectCreateClientHits(absoluteRoot) : [];
    });

    expect(hits).toEqual([ALLOWED_FILE]);
  });
});
