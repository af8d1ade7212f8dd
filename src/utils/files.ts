import fs from "fs/promises";
import path from "path";

// No instanceof Error: fs errors can come from another realm.
export function errorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

export function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function siblingOutPath(srcPath: string, suffix: string, ext: string = path.extname(srcPath)): string {
  const dir = path.dirname(srcPath);
  const base = path.basename(srcPath, path.extname(srcPath));
  return path.join(dir, `${base}${suffix}${ext}`);
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}
