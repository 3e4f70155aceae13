/**
 * YAML read/write helpers with automatic directory creation.
 *
 * dumpYaml is the single serializer for archive artifacts: fixed options,
 * insertion key order, no line folding.
 */

import fs from "node:fs/promises";
import path from "node:path";
import yaml, { type DumpOptions } from "js-yaml";

const DUMP_OPTIONS: DumpOptions = {
  indent: 2,
  lineWidth: -1,
  noRefs: true,
  sortKeys: false,
  quotingType: '"',
};

export function dumpYaml(data: unknown): string {
  return yaml.dump(data, DUMP_OPTIONS);
}

/** Parses YAML content; throws on syntax errors. */
export function parseYaml(content: string): unknown {
  return yaml.load(content);
}

export async function readYaml(filePath: string): Promise<unknown | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch {
    return null;
  }
  return parseYaml(content);
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}
