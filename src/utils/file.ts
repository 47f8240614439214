import fs from "fs-extra";
import path from "path";

// <package root>, from both src/utils and dist/utils
const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

/**
 * Locate an asset directory: explicit path -> ./<name> in cwd -> the copy shipped with the package.
 */
export async function resolveAssetDir(name: string, explicit?: string): Promise<string> {
  if (explicit) return path.resolve(explicit);
  const cwdDir = path.resolve(process.cwd(), name);
  if (await fs.pathExists(cwdDir)) return cwdDir;
  return path.join(PACKAGE_ROOT, name);
}
