import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

/**
 * Writes a UTF-8 file, creating missing parent directories first.
 */
export async function writeFileEnsuringDir(path: string, content: string): Promise<void> {
  await node_fs.mkdir(node_path.dirname(path), { recursive: true });
  await node_fs.writeFile(path, content, "utf-8");
}
