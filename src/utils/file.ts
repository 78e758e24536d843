import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigurationError } from "../errors/RelayError.js";
import type { LoadFileResults } from "./types.js";

/**
 * Searches for and loads a config file. With an explicit path only that file is
 * read; otherwise `<defaults.name>.<format>` is tried in the working directory
 * for each default format, in order.
 *
 * @param path - Path provided by the caller. Can be null to search the defaults.
 * @param options.tag - Names the kind of file in error messages.
 */
export async function searchAndLoadFile(
  path: string | null,
  options: {
    defaults: {
      name: string;
      formats: string[];
    };
    tag: string;
    cwd?: string;
  },
): Promise<LoadFileResults> {
  const { defaults, tag } = options;
  const cwd = options.cwd ?? process.cwd();

  if (path) {
    const filePath = resolve(cwd, path);
    try {
      const content = await readFile(filePath, { encoding: "utf-8" });
      return { content, format: extensionOf(filePath), path: filePath };
    } catch (e) {
      throw new ConfigurationError(`${tag} not found at ${filePath}`, { cause: e });
    }
  }

  for (const format of defaults.formats) {
    const filePath = resolve(cwd, `${defaults.name}.${format}`);
    try {
      const content = await readFile(filePath, { encoding: "utf-8" });
      return { content, format, path: filePath };
    } catch {
      continue;
    }
  }

  throw new ConfigurationError(
    `${tag} not found, looked for ${defaults.formats.map((f) => `${defaults.name}.${f}`).join(", ")}`,
  );
}

function extensionOf(filePath: string): string {
  return filePath.split(".").pop() ?? "";
}
