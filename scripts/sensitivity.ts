import path from 'node:path';

import { loadProblem, saveProblem } from 'stepstone/io';
import { analyzeSensitivity, perturbCost, DEFAULT_SENSITIVITY_LEVELS } from 'stepstone/sensitivity';

import { DEFAULT_PROBLEM, flagValue, isMain, positional } from './utils';

const parseLevels = (raw: string | undefined): number[] => {
  if (raw === undefined) return [...DEFAULT_SENSITIVITY_LEVELS];
  const levels = raw.split(',').map((part) => Number(part.trim()));
  if (levels.some((level) => !Number.isFinite(level))) {
    throw new Error(`--levels requires comma-separated numbers, got "${raw}".`);
  }
  return levels;
};

export async function analyzeProblemFile(args: ReadonlyArray<string>) {
  const [file = DEFAULT_PROBLEM] = positional(args, ['--levels', '--out']);
  const levels = parseLevels(flagValue(args, 'levels'));
  const outDir = flagValue(args, 'out');

  const { problem } = await loadProblem(file);
  const report = analyzeSensitivity(problem, { levels });

  const written: string[] = [];
  if (outDir) {
    for (const entry of report.methods) {
      for (const run of entry.runs) {
        const target = path.join(outDir, `${entry.method}-${run.level}.json`);
        const perturbed = perturbCost(problem, entry.cell, run.level);
        written.push(
          await saveProblem(target, perturbed, {
            method: entry.method,
            level: run.level,
            cell: { row: entry.cell.row, col: entry.cell.col },
            optimalCost: run.optimalCost,
          }),
        );
      }
    }
  }

  // Infinity does not survive JSON.stringify
  const verdict =
    report.verdict.kind === 'sensitive' && !Number.isFinite(report.verdict.ratio)
      ? { ...report.verdict, ratio: 'unbounded' }
      : report.verdict;
  return { file, ...report, verdict, written };
}

if (isMain(import.meta.url)) {
  analyzeProblemFile(process.argv.slice(2))
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
    })
    .catch((error) => {
      console.error(error);
      process.exit(1);
    });
}
