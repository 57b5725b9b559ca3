export function safeJsonObject(content: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      return null;
    }
    return parsed as Record<string, unknown>;
  } catch {
    return null;
  }
}

/** Returns the span from the first `{` to the last `}`, or null when there is none. */
export function outermostObjectSpan(text: string): string | null {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first < 0 || last <= first) {
    return null;
  }
  return text.slice(first, last + 1);
}

export function normalizeQuotes(text: string): string {
  return text.replace(/[“”‘’']/g, '"');
}

export function head(text: string, chars: number): string {
  return text.trim().slice(0, chars);
}

export function tail(text: string, chars: number): string {
  const trimmed = text.trim();
  return chars > 0 ? trimmed.slice(-chars) : "";
}
