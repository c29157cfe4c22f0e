/**
 * Vitest alias configuration for workspace packages.
 *
 * Tests import workspace packages by name; these aliases point them at the
 * TypeScript sources so nothing has to be built first.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  {
    find: "@numbermark/core",
    replacement: path.resolve(rootDir, "packages/core/src/index.ts"),
  },
  {
    find: "@numbermark/pdf",
    replacement: path.resolve(rootDir, "packages/pdf/src/index.ts"),
  },
];
