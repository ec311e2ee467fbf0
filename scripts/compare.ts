import { compareStrategies } from 'stepstone/compare';
import { loadProblem } from 'stepstone/io';

import { DEFAULT_PROBLEM, isMain, positional } from './utils';

export async function compareProblemFile(args: ReadonlyArray<string>) {
  const [file = DEFAULT_PROBLEM] = positional(args, []);
  const { problem } = await loadProblem(file);
  const comparison = compareStrategies(problem, { refine: !args.includes('--no-refine') });
  return { file, ...comparison };
}

if (isMain(import.meta.url)) {
  compareProblemFile(process.argv.slice(2))
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
    })
    .catch((error) => {
      console.error(error);
      process.exit(1);
    });
}
