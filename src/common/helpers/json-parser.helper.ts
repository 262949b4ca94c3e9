import { jsonrepair } from 'jsonrepair';

export interface JsonParseOptions {
  /**
   * Try jsonrepair once the plain strategies fail
   * @default true
   */
  attemptRepair?: boolean;

  /**
   * Upper bound on the text handed to the parser
   * @default 1MB
   */
  maxLength?: number;
}

export type JsonParseResult =
  | { success: true; data: unknown; strategy: string }
  | { success: false; error: string };

interface ParseStrategy {
  name: string;
  parse: () => unknown;
}

const DEFAULT_OPTIONS: Required<JsonParseOptions> = {
  attemptRepair: true,
  maxLength: 1024 * 1024,
};

/**
 * Parses JSON the way models tend to return it: fenced in markdown, wrapped
 * in prose, or slightly malformed (trailing commas, single quotes, unquoted
 * keys, smart quotes). Strategies run from strictest to loosest and the first
 * one that parses wins.
 *
 * @example
 * ```typescript
 * const result = safeJsonParse('```json\n["Fractions", "Decimals"]\n```');
 * if (result.success) {
 *   console.log(result.data); // ['Fractions', 'Decimals']
 * }
 * ```
 */
export function safeJsonParse(
  text: string,
  options: JsonParseOptions = {}
): JsonParseResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (!text || typeof text !== 'string') {
    return { success: false, error: 'Input must be a non-empty string' };
  }

  if (text.length > opts.maxLength) {
    return {
      success: false,
      error: `Input exceeds maximum length of ${opts.maxLength} characters`,
    };
  }

  for (const strategy of buildParseStrategies(text, opts)) {
    try {
      return { success: true, data: strategy.parse(), strategy: strategy.name };
    } catch {
      continue;
    }
  }

  return { success: false, error: 'All JSON parsing strategies failed' };
}

/**
 * Parse or throw, for callers that turn failures into fallbacks themselves
 */
export function parseJsonOrThrow(
  text: string,
  options: JsonParseOptions = {}
): unknown {
  const result = safeJsonParse(text, options);

  if (!result.success) {
    const preview = (text ?? '').substring(0, 200);
    throw new Error(
      `Failed to parse JSON: ${result.error}. Text preview: ${preview}`
    );
  }

  return result.data;
}

function buildParseStrategies(
  text: string,
  opts: Required<JsonParseOptions>
): ParseStrategy[] {
  const strategies: ParseStrategy[] = [
    { name: 'direct', parse: () => JSON.parse(text) },
    {
      name: 'codeBlock',
      parse: () => {
        const extracted = extractFromCodeBlock(text);
        if (!extracted) throw new Error('No code block found');
        return JSON.parse(extracted);
      },
    },
    {
      name: 'balanced',
      parse: () => {
        const extracted = extractBalancedJson(text);
        if (!extracted) throw new Error('No balanced JSON found');
        return JSON.parse(extracted);
      },
    },
  ];

  if (opts.attemptRepair) {
    strategies.push({
      name: 'repair',
      parse: () => JSON.parse(jsonrepair(cleanupForRepair(text))),
    });
  }

  return strategies;
}

/**
 * Body of the first ```json (or bare ```) block, when it looks like JSON
 */
export function extractFromCodeBlock(text: string): string | null {
  const patterns = [/```json\s*\n?([\s\S]*?)\n?```/i, /```\s*\n?([\s\S]*?)\n?```/];

  for (const pattern of patterns) {
    const match = pattern.exec(text);
    const content = match?.[1]?.trim();
    if (content && (content.startsWith('{') || content.startsWith('['))) {
      return content;
    }
  }

  return null;
}

export function stripMarkdownCodeBlocks(text: string): string {
  return text
    .replaceAll(/```json\s*\n?/gi, '')
    .replaceAll(/```\s*\n?/g, '')
    .trim();
}

/**
 * First complete object or array in the text, whichever opens first.
 * Brackets inside string literals are ignored.
 */
export function extractBalancedJson(text: string): string | null {
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');

  const candidates = [
    { start: objectStart, open: '{', close: '}' },
    { start: arrayStart, open: '[', close: ']' },
  ]
    .filter((c) => c.start !== -1)
    .sort((a, b) => a.start - b.start);

  for (const candidate of candidates) {
    const extracted = extractBalancedStructure(
      text,
      candidate.start,
      candidate.open,
      candidate.close
    );
    if (extracted) return extracted;
  }

  return null;
}

function extractBalancedStructure(
  text: string,
  startIndex: number,
  openChar: string,
  closeChar: string
): string | null {
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = startIndex; i < text.length; i++) {
    const char = text[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === '\\') {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === openChar) depth++;
    else if (char === closeChar) depth--;

    if (depth === 0) {
      return text.substring(startIndex, i + 1);
    }
  }

  return null;
}

function cleanupForRepair(text: string): string {
  let cleaned = stripMarkdownCodeBlocks(text).replaceAll(
    /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g,
    ''
  );

  cleaned = cleaned
    .replaceAll(/[“”]/g, '"')
    .replaceAll(/[‘’]/g, "'");

  return extractBalancedJson(cleaned) ?? cleaned;
}
