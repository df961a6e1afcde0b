#!/usr/bin/env node
import { actionFactories } from './actions';

const usageText = [
  'sc-decompress decompress <file|directory|glob> <output directory> [--new-only] [--keep-unsupported] [--max-output <bytes>] [--quiet]',
  'sc-decompress inspect <file|directory|glob> [--json]',
];

function printUsage() {
  console.log(usageText.map((line, i) => `${i === 0 ? 'usage: ' : '       '}${line}`).join('\n'));
}

async function run(argv: string[]): Promise<boolean> {
  const [name, ...rest] = argv;
  if (name === undefined || !Object.prototype.hasOwnProperty.call(actionFactories, name)) {
    printUsage();
    return false;
  }
  const action = await actionFactories[name]();
  return action(rest);
}

run(process.argv.slice(2)).then(
  (ok) => {
    process.exitCode = ok ? 0 : 1;
  },
  (err: unknown) => {
    console.error('sc-decompress: unexpected error:', err);
    process.exitCode = 1;
  },
);
