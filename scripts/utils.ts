import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const ROOT_DIR = path.resolve(__dirname, '..');
export const DEFAULT_PROBLEM = path.join(ROOT_DIR, 'packages/stepstone/testdata/three-by-four.json');

export const isMain = (moduleUrl: string) => path.resolve(process.argv[1] ?? '') === fileURLToPath(moduleUrl);

/** Value following `--name`, if present. */
export const flagValue = (args: ReadonlyArray<string>, name: string): string | undefined => {
  const index = args.indexOf(`--${name}`);
  return index >= 0 ? args[index + 1] : undefined;
};

export const positional = (args: ReadonlyArray<string>, valueFlags: ReadonlyArray<string>): string[] =>
  args.filter((arg, index) => !arg.startsWith('--') && !valueFlags.includes(args[index - 1] ?? ''));
