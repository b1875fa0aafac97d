const DATA_PREFIX = "data:";
const DONE_SENTINEL = "[DONE]";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFrame(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

export function extractDeltaContent(frame: unknown): string {
  if (!isRecord(frame) || !Array.isArray(frame.choices)) {
    return "";
  }
  const choice: unknown = frame.choices[0];
  if (!isRecord(choice) || !isRecord(choice.delta)) {
    return "";
  }
  const content = choice.delta.content;
  return typeof content === "string" ? content : "";
}

/**
 * Turns `data:` frames of an OpenAI-style chat stream into text deltas.
 * Ends at `data: [DONE]`; frames that are not valid JSON are skipped.
 */
export async function* decodeChatStream(
  lines: AsyncIterable<string>
): AsyncGenerator<string, void, void> {
  for await (const line of lines) {
    if (!line.startsWith(DATA_PREFIX)) {
      continue;
    }
    const payload = line.slice(DATA_PREFIX.length).trimStart();
    if (payload.trim() === DONE_SENTINEL) {
      return;
    }
    const content = extractDeltaContent(parseFrame(payload));
    if (content) {
      yield content;
    }
  }
}

export async function* readLines(
  body: ReadableStream<Uint8Array> | null
): AsyncGenerator<string, void, void> {
  if (!body) {
    return;
  }

  const reader = body.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        yield buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield buffer.replace(/\r$/, "");
    }
  } finally {
    // The consumer may stop at [DONE] before the server closes the body.
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
