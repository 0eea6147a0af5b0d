import { access, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/** Writes `data`, creating missing parent directories first. */
export async function writeFileEnsured(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}

export async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}
