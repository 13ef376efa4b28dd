import { existsSync } from "node:fs";
import { resolve, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Finds the package root (the directory holding `proto/` and `data/`) from a
 * module URL. Works from `cli/meshwatch/src` during development and from
 * `dist` after a build.
 */
export function findPackageRoot(fromUrl: string) {
  let dir = resolve(fileURLToPath(new URL(".", fromUrl)));
  for (let i = 0; i < 8; i += 1) {
    if (existsSync(join(dir, "proto", "mesh.proto")) && existsSync(join(dir, "package.json"))) return dir;
    const parent = resolve(dir, "..");
    if (parent === dir) break;
    dir = parent;
  }
  return resolve(fileURLToPath(new URL("../../..", fromUrl)));
}
