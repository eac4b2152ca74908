import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import { RedBlackTree, decimalOrder, isDecimalKey } from 'rb-tree';
import { formatIssues, getErrorMessage } from './utils/error-utils.js';

const DecimalKeySchema = z.union([
  z.number().finite().transform(value => String(value)),
  z.string().refine(isDecimalKey, { message: 'Expected a decimal number' })
]);

// { "<name>": { "description"?: string, "keys": (number | decimal string)[] }, ... }
const SamplesSchema = z.record(
  z.string(),
  z.object({
    description: z.string().default(''),
    keys: z.array(DecimalKeySchema)
  })
);

/**
 * Named key sequence from the samples file, keys held as decimal strings
 */
export interface Sample {
  name: string;
  description: string;
  keys: string[];
}

export class SampleFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SampleFileError';
  }
}

/**
 * Validates a parsed samples document against SamplesSchema
 */
export function parseSamples(raw: unknown, source: string): Map<string, Sample> {
  const parsed = SamplesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SampleFileError(`Invalid samples in ${source}: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }

  const samples = new Map<string, Sample>();
  for (const [name, { description, keys }] of Object.entries(parsed.data)) {
    samples.set(name, { name, description, keys });
  }
  return samples;
}

export async function loadSamples(path: string): Promise<Map<string, Sample>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SampleFileError(`Cannot read samples from ${path}: ${getErrorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SampleFileError(`Invalid JSON in ${path}: ${getErrorMessage(error)}`, { cause: error });
  }
  return parseSamples(raw, path);
}

export function buildSampleTree(sample: Sample, logger?: Logger): RedBlackTree<string> {
  return RedBlackTree.from(sample.keys, decimalOrder, logger ? { logger } : {});
}
