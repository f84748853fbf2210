export type ExtractJsonResult =
  | { ok: true; parsed: unknown; jsonText: string }
  | { ok: false; error: string };

function tryParse(candidate: string): ExtractJsonResult | undefined {
  try {
    return { ok: true, parsed: JSON.parse(candidate), jsonText: candidate };
  } catch {
    return undefined;
  }
}

/**
 * Extract a JSON object from tool output.
 * - Accepts the whole output as JSON, or a last line holding one object
 *   after progress chatter, or the span from the first "{" to the last "}".
 */
export function extractJsonObject(text: string): ExtractJsonResult {
  const trimmed = text.trim();
  if (!trimmed) return { ok: false, error: 'empty output' };

  const direct = tryParse(trimmed);
  if (direct) return direct;

  const lines = trimmed.split('\n').map((line) => line.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].startsWith('{') && lines[i].endsWith('}')) {
      const fromLine = tryParse(lines[i]);
      if (fromLine) return fromLine;
    }
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const candidate = trimmed.slice(start, end + 1);
    try {
      return { ok: true, parsed: JSON.parse(candidate), jsonText: candidate };
    } catch (e) {
      return { ok: false, error: `failed to parse JSON object substring: ${e instanceof Error ? e.message : String(e)}` };
    }
  }

  return { ok: false, error: 'could not locate a JSON object in output' };
}
