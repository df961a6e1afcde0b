import { Presets, SingleBar } from 'cli-progress';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { countBy } from 'lodash';
import minimist from 'minimist';
import { basename, join } from 'path';
import { ScCompressionError } from '../errors';
import { decompress, type DecompressOptions } from '../models/sc';
import { classify, Signature } from '../models/signature';
import { listInputFiles, mkdir } from '../utils';

export type FileStatus = 'written' | 'copied' | 'skipped' | 'failed';

export interface FileResult {
  file: string;
  output: string;
  status: FileStatus;
  error?: string;
}

export function decompressFile(inFile: string, out: string, newOnly: boolean, options: DecompressOptions = {}): FileResult {
  const output = join(out, basename(inFile));
  if (newOnly && existsSync(output)) {
    return { file: inFile, output, status: 'skipped' };
  }

  const buf = readFileSync(inFile);
  try {
    const data = decompress(buf, options);
    writeFileSync(output, data);
    return { file: inFile, output, status: classify(buf) === Signature.Sclz ? 'copied' : 'written' };
  } catch (err) {
    if (!(err instanceof ScCompressionError)) throw err;
    return { file: inFile, output, status: 'failed', error: err.message };
  }
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help', 'new-only', 'keep-unsupported', 'quiet'],
    string: ['max-output'],
  });

  const maxOutput = parsedArgs['max-output'] === undefined ? undefined : Number(parsedArgs['max-output']);
  if (parsedArgs._.length !== 2 || parsedArgs.help || (maxOutput !== undefined && !(maxOutput > 0))) {
    console.log('usage: sc-decompress decompress <file|directory|glob> <output directory> [--new-only] [--keep-unsupported] [--max-output <bytes>] [--quiet]');
    return Boolean(parsedArgs.help);
  }
  const options: DecompressOptions = {
    unsupported: parsedArgs['keep-unsupported'] ? 'passthrough' : 'throw',
    maxOutputSize: maxOutput,
  };

  const [input, outDir] = parsedArgs._.map(String);
  const files = listInputFiles(input);
  if (files.length === 0) {
    console.error(`no input files match ${input}`);
    return false;
  }
  const out = mkdir(outDir);

  const useProgressBar = !parsedArgs.quiet;
  const pbar = new SingleBar({}, Presets.shades_classic);
  if (useProgressBar) {pbar.start(files.length, 0);}
  const results: FileResult[] = [];
  for (const file of files) {
    results.push(decompressFile(file, out, parsedArgs['new-only'], options));
    if (useProgressBar) {pbar.increment();}
  }
  if (useProgressBar) {pbar.stop();}

  for (const result of results) {
    if (result.status === 'failed') {
      console.error(`${result.file}: ${result.error}`);
    }
  }
  const counts = countBy(results, (result) => result.status);
  console.log(`written: ${counts.written ?? 0}, copied: ${counts.copied ?? 0}, skipped: ${counts.skipped ?? 0}, failed: ${counts.failed ?? 0}`);

  return !counts.failed;
}
