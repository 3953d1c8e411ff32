import { z } from 'zod';
import { MalformedDataError, ResourceError, errorMessage } from './errors';
import { logger } from './logger';
import { completeHeaders } from './parser/json-chart';
import { HttpFetcher, ImageExtraction, ImageTableExtractor, SizeChart } from './types';

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

const SYSTEM_PROMPT = `You are an expert at extracting size chart data from images. Analyze the provided image and extract size chart information in a structured format.

Instructions:
1. Identify whether the image contains a size chart.
2. Extract ALL column headers exactly as they appear (e.g. "Size", "Bust", "Waist", "Hip", "Length").
3. Extract ALL rows of data, preserving the exact values.
4. Handle tables, grids and text-based size charts.
5. Include units when shown (e.g. "in", "cm").
6. If several charts exist (e.g. US/UK/EU sizes), extract all of them.
7. If no size chart is found, set has_size_chart to false and size_chart to null.

Important:
- Preserve the exact text from the image, do not convert or standardize.
- Include ALL columns, even redundant ones.
- Keep the original size labels (S, M, L or 36, 38, 40).
- Keep numeric ranges as they appear (e.g. "32-34").`;

const USER_PROMPT = 'Analyze this image and extract the size chart data according to the JSON schema.';

const RESPONSE_SCHEMA = {
  type: 'OBJECT',
  properties: {
    size_chart: {
      type: 'OBJECT',
      nullable: true,
      properties: {
        headers: { type: 'ARRAY', items: { type: 'STRING' } },
        rows: {
          type: 'ARRAY',
          items: {
            type: 'OBJECT',
            properties: {
              columns: {
                type: 'ARRAY',
                items: {
                  type: 'OBJECT',
                  properties: { key: { type: 'STRING' }, value: { type: 'STRING' } },
                  required: ['key', 'value'],
                },
              },
            },
            required: ['columns'],
          },
        },
      },
      required: ['headers', 'rows'],
    },
    confidence: { type: 'NUMBER' },
    has_size_chart: { type: 'BOOLEAN' },
  },
  required: ['confidence', 'has_size_chart'],
};

const answerSchema = z
  .object({
    size_chart: z
      .object({
        headers: z.array(z.string()),
        rows: z.array(z.object({ columns: z.array(z.object({ key: z.string(), value: z.string() })) })),
      })
      .nullish(),
    confidence: z.number().min(0).max(1),
    has_size_chart: z.boolean(),
  })
  .transform(
    (answer): ImageExtraction => ({
      sizeChart: answer.size_chart ?? null,
      confidence: answer.confidence,
      hasSizeChart: answer.has_size_chart,
    }),
  );

const generateResponseSchema = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional() }))
    .optional(),
});

/** Flattens the model's key/value rows into a SizeChart, or null when nothing was found. */
export function normalizeImageExtraction(result: ImageExtraction | null): SizeChart | null {
  if (!result || !result.hasSizeChart || !result.sizeChart) return null;

  const rows = result.sizeChart.rows
    .map((row) => Object.fromEntries(row.columns.map(({ key, value }) => [key, value])))
    .filter((row) => Object.keys(row).length > 0);

  return { headers: completeHeaders(result.sizeChart.headers, rows), rows };
}

interface InlineImage {
  mimeType: string;
  data: string;
}

/** Normalizes the different ways a store references its chart image. */
export function resolveImageSource(image: string): string {
  const trimmed = image.trim();
  if (trimmed.startsWith('data:')) return trimmed;
  if (trimmed.startsWith('//')) return `https:${trimmed}`;
  if (!/^https?:\/\//i.test(trimmed)) return `https://${trimmed}`;
  return trimmed;
}

export function parseDataUri(uri: string): InlineImage | null {
  const match = /^data:([^;,]+)(?:;[^,]*)?;base64,(.*)$/s.exec(uri);
  if (!match) return null;
  return { mimeType: match[1], data: match[2] };
}

export interface GeminiOptions {
  apiKey: string;
  model: string;
  /** Used to download remote images, so they go through the store's rate limiter */
  http: HttpFetcher;
  timeoutMs: number;
}

/**
 * Image-to-table extraction with Gemini through its REST API.
 */
export function createGeminiTableExtractor(options: GeminiOptions): ImageTableExtractor {
  async function loadImage(image: string): Promise<InlineImage> {
    const source = resolveImageSource(image);
    if (source.startsWith('data:')) {
      const inline = parseDataUri(source);
      if (!inline) throw new MalformedDataError('Unsupported data URI for size chart image');
      return inline;
    }

    const { data, contentType } = await options.http.fetchBinary(source);
    const mimeType = contentType.split(';')[0].trim();
    return {
      mimeType: mimeType.startsWith('image/') ? mimeType : 'image/jpeg',
      data: data.toString('base64'),
    };
  }

  async function generate(image: InlineImage): Promise<string> {
    const url = `${GEMINI_API_BASE}/models/${options.model}:generateContent?key=${options.apiKey}`;
    const body = {
      system_instruction: { parts: [{ text: SYSTEM_PROMPT }] },
      contents: [
        {
          parts: [{ inline_data: { mime_type: image.mimeType, data: image.data } }, { text: USER_PROMPT }],
        },
      ],
      generationConfig: {
        temperature: 0.1,
        responseMimeType: 'application/json',
        responseSchema: RESPONSE_SCHEMA,
      },
    };

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      throw new ResourceError(`Gemini request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ResourceError(`Gemini API ${res.status}: ${text.slice(0, 200)}`);
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(await res.text());
    } catch {
      throw new MalformedDataError('Gemini response is not valid JSON');
    }

    const parsed = generateResponseSchema.safeParse(envelope);
    const text = parsed.success ? parsed.data.candidates?.[0]?.content?.parts[0]?.text : undefined;
    if (!text) throw new MalformedDataError('Gemini returned an empty response');
    return text;
  }

  return {
    async extractTable(image: string): Promise<ImageExtraction | null> {
      const inline = await loadImage(image);
      const text = await generate(inline);

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new MalformedDataError('Gemini answer is not valid JSON');
      }

      const answer = answerSchema.safeParse(json);
      if (!answer.success) {
        throw new MalformedDataError('Gemini answer does not match the size chart schema');
      }

      logger.debug(`Image extraction confidence ${answer.data.confidence}`, {
        hasSizeChart: answer.data.hasSizeChart,
      });
      return answer.data;
    },
  };
}
