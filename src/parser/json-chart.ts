import { z } from 'zod';
import { SizeChart } from '../types';

const CHART_KEYS = ['sizeChart', 'size_chart', 'sizing', 'measurements'];

const cellSchema = z.union([z.string(), z.number()]).transform(String);

const chartObjectSchema = z.object({
  headers: z.array(z.string()),
  rows: z.array(z.record(cellSchema)),
});

const chartListSchema = z.array(z.record(cellSchema)).nonempty();

/** Appends row keys missing from `headers`, in first-seen order. */
export function completeHeaders(headers: string[], rows: Record<string, string>[]): string[] {
  const all = new Set(headers);
  for (const row of rows) {
    for (const key of Object.keys(row)) all.add(key);
  }
  return [...all];
}

/**
 * Reads a size chart embedded in a JSON document, either as a
 * `{ headers, rows }` object or as a list of row objects.
 */
export function chartFromJson(data: unknown): SizeChart | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return null;

  for (const key of CHART_KEYS) {
    if (!(key in data)) continue;
    const value: unknown = Reflect.get(data, key);

    const asObject = chartObjectSchema.safeParse(value);
    if (asObject.success) {
      const { headers, rows } = asObject.data;
      if (headers.length === 0 || rows.length === 0) return null;
      return { headers: completeHeaders(headers, rows), rows };
    }

    const asList = chartListSchema.safeParse(value);
    if (asList.success) {
      const rows = asList.data;
      return { headers: completeHeaders([], rows), rows };
    }
  }

  return null;
}
