import { registerAs } from "@nestjs/config";
import { dirname, join } from "path";
import { existsSync } from "fs";

/**
 * Walks up from this file until a directory holding package.json is found.
 * Falls back to process.cwd() when none is (e.g. a bundled deployment).
 */
export function resolveProjectRoot(): string {
  let root = __dirname;

  while (root !== dirname(root)) {
    if (existsSync(join(root, "package.json"))) {
      return root;
    }
    root = dirname(root);
  }

  return process.cwd();
}

/**
 * Path Configuration
 *
 * Resolves the project root directory once and makes it available
 * through ConfigService.
 */
export default registerAs("paths", () => ({
  projectRoot: resolveProjectRoot(),
}));
