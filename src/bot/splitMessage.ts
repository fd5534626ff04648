import { PIPELINE_LIMITS } from "../config/limits";

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Cuts at maxLength code units, stepping back one unit rather than splitting a surrogate pair. */
function hardWrap(text: string, maxLength: number): string[] {
  const parts: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);
    if (end < text.length && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    parts.push(text.slice(start, end));
    start = end;
  }
  return parts;
}

/**
 * Packs pieces into chunks no longer than maxLength, joining them with `separator`.
 * Pieces that are too long on their own are passed to `oversize` for finer splitting.
 */
function pack(
  pieces: string[],
  separator: string,
  maxLength: number,
  oversize: (piece: string) => string[]
): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const piece of pieces) {
    const fragments = piece.length > maxLength ? oversize(piece) : [piece];

    for (const fragment of fragments) {
      const candidate = current ? `${current}${separator}${fragment}` : fragment;
      if (candidate.length <= maxLength) {
        current = candidate;
      } else {
        if (current) chunks.push(current);
        current = fragment;
      }
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

/**
 * Splits a reply into parts that fit in one chat message, breaking on paragraph
 * boundaries first, then on lines, and only cutting inside a line as a last resort.
 * @param message The full reply text
 * @param maxLength Upper bound per part
 * @returns At least one part; the input itself when it already fits
 * @example
 * splitMessage("a\n\nb", 3) // returns ["a", "b"]
 */
export function splitMessage(
  message: string,
  maxLength: number = PIPELINE_LIMITS.MAX_MESSAGE_LENGTH
): string[] {
  if (message.length <= maxLength) return [message];

  const paragraphs = message.split("\n\n");
  return pack(paragraphs, "\n\n", maxLength, (paragraph) =>
    pack(paragraph.split("\n"), "\n", maxLength, (line) => hardWrap(line, maxLength))
  );
}
