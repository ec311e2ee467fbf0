import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { PreconditionError } from '../errors';
import { validateProblem, type TransportProblem, type ValidateOptions } from '../problem';

export type ProblemMetadata = Record<string, unknown>;

export type ProblemJson = {
  costs: number[][];
  supply: number[];
  demand: number[];
  metadata?: ProblemMetadata;
};

export type ProblemFile = {
  problem: TransportProblem;
  metadata?: ProblemMetadata;
};

const problemSchema = z.object({
  costs: z.array(z.array(z.number())).min(1),
  supply: z.array(z.number()).min(1),
  demand: z.array(z.number()).min(1),
  metadata: z.record(z.unknown()).optional(),
});

const formatPath = (segments: ReadonlyArray<string | number>) =>
  segments.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');

export function parseProblemJson(raw: unknown, options: ValidateOptions = {}): ProblemFile {
  const parsed = problemSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const issuePath = issue?.path.length ? formatPath(issue.path) : 'problem';
    throw new PreconditionError(`Missing or invalid ${issuePath}: ${issue?.message ?? 'unknown error'}`, issuePath);
  }

  const { costs, supply, demand, metadata } = parsed.data;
  const problem = validateProblem({ costs, supply, demand }, options);
  return metadata ? { problem, metadata } : { problem };
}

export function problemToJson(problem: TransportProblem, metadata?: ProblemMetadata): ProblemJson {
  const json: ProblemJson = {
    costs: problem.costs.map((row) => [...row]),
    supply: [...problem.supply],
    demand: [...problem.demand],
  };
  if (metadata) json.metadata = metadata;
  return json;
}

export async function loadProblem(filePath: string, options: ValidateOptions = {}): Promise<ProblemFile> {
  const text = await fs.readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new PreconditionError(`Problem JSON parse failed for ${filePath}`, 'problem');
  }
  return parseProblemJson(raw, options);
}

export async function saveProblem(
  filePath: string,
  problem: TransportProblem,
  metadata?: ProblemMetadata,
): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(problemToJson(problem, metadata), null, 2) + '\n', 'utf8');
  return filePath;
}
