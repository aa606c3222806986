import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CliError } from './cli-error';

export const samplesSchema = z
  .object({
    x: z.array(z.number().finite()).min(1, 'x must contain at least one value'),
    y: z.array(z.number().finite()).min(1, 'y must contain at least one value'),
  })
  .refine(samples => samples.x.length === samples.y.length, {
    message: 'x and y must have the same length',
    path: ['y'],
  });

export type Samples = z.infer<typeof samplesSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new CliError(`${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, 2);
  }
}

/**
 * Reads two numeric columns (x, y). Blank lines and `#` comments are
 * skipped; a first line that is not numeric is taken as a header.
 */
export function parseCsv(text: string, file: string): { x: number[]; y: number[] } {
  const x: number[] = [];
  const y: number[] = [];
  let firstRow = true;

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const cells = line.split(/[,;\t]/).map(cell => cell.trim());
    const numeric = cells.length === 2 && cells.every(cell => cell !== '' && Number.isFinite(Number(cell)));
    const isHeader = firstRow && !numeric;
    firstRow = false;

    if (isHeader) return;
    if (!numeric) {
      throw new CliError(`${file}:${index + 1}: expected two numeric columns, got '${line}'`, 2);
    }

    x.push(Number(cells[0]));
    y.push(Number(cells[1]));
  });

  return { x, y };
}

/**
 * Loads samples from a `.json` file (`{ "x": [...], "y": [...] }`) or a
 * `.csv` file with two columns.
 */
export function loadSamples(file: string): Samples {
  if (!fs.existsSync(file)) {
    throw new CliError(`Data file not found: ${file}`, 2);
  }
  const text = fs.readFileSync(file, 'utf8');
  const extension = path.extname(file).toLowerCase();

  let raw: unknown;
  if (extension === '.json') {
    raw = parseJson(text, file);
  } else if (extension === '.csv' || extension === '.txt') {
    raw = parseCsv(text, file);
  } else {
    throw new CliError(`Unsupported data file type '${extension || '(none)'}': use .json or .csv`, 2);
  }

  const result = samplesSchema.safeParse(raw);
  if (!result.success) {
    throw new CliError(`Invalid samples in ${file}: ${formatIssues(result.error)}`, 2);
  }
  return result.data;
}
