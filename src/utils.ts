import { existsSync, lstatSync, readdirSync } from 'fs';
import { glob } from 'glob';
import { sync as mkdirp } from 'mkdirp';
import { join } from 'path';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, undefined, 4);
}

export function mkdir(...parts: string[]) {
  const dir = join(...parts);
  if (!existsSync(dir))
    mkdirp(dir);
  return dir;
}

/** A directory expands to the files directly inside it; anything else is a glob. */
export function listInputFiles(input: string): string[] {
  if (existsSync(input) && lstatSync(input).isDirectory()) {
    return readdirSync(input)
      .map((file) => join(input, file))
      .filter((file) => lstatSync(file).isFile())
      .sort();
  }
  return glob.sync(input, { nodir: true }).sort();
}
