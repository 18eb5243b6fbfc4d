import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { fakeBundleContent } from "./fake-git";

/**
 * Write bundle files under `<root>/<key>/`
 */
export async function seedBundles(root: string, key: string, files: Record<string, string>): Promise<string> {
  const dir = path.join(root, ...key.split("/"));
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(dir, name), content);
  }
  return dir;
}

export function validBundle(sha: string): string {
  return fakeBundleContent({ "refs/heads/main": sha.repeat(40).slice(0, 40) });
}
