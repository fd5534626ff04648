import { LinkForm, VideoPlatform, type VideoReference } from "../jobs/types";

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

// Host tokens pasted without a scheme, e.g. "www.youtube.com/watch?v=..."
const BARE_HOST_PATTERN = /^(?:(?:www|m)\.)?(?:youtube\.com|youtu\.be)\//i;

const WATCH_HOSTS = new Set(["youtube.com", "www.youtube.com", "m.youtube.com"]);
const SHORT_HOSTS = new Set(["youtu.be", "www.youtu.be"]);

const PATH_FORMS = new Map<string, LinkForm>([
  ["embed", LinkForm.EMBED],
  ["shorts", LinkForm.SHORTS],
  ["v", LinkForm.LEGACY]
]);

function toReference(videoId: string | null, form: LinkForm): VideoReference | null {
  if (!videoId || !VIDEO_ID_PATTERN.test(videoId)) return null;

  return Object.freeze({
    videoId,
    platform: VideoPlatform.YOUTUBE,
    form,
    canonicalUrl: `https://www.youtube.com/watch?v=${videoId}`
  });
}

function parseUrl(candidate: string): URL | null {
  try {
    return new URL(candidate);
  } catch {
    return null;
  }
}

/**
 * Recognises a single link. Only the hostname, the first path segments and the
 * `v` query parameter are inspected; timestamps, playlists and share tokens are ignored.
 */
function matchLink(candidate: string): VideoReference | null {
  const url = parseUrl(candidate);
  if (!url || (url.protocol !== "https:" && url.protocol !== "http:")) {
    return null;
  }

  const segments = url.pathname.split("/").filter(Boolean);

  if (SHORT_HOSTS.has(url.hostname)) {
    return segments.length === 1 ? toReference(segments[0], LinkForm.SHORT) : null;
  }

  if (!WATCH_HOSTS.has(url.hostname)) return null;

  if (segments.length === 1 && segments[0] === "watch") {
    return toReference(url.searchParams.get("v"), LinkForm.STANDARD);
  }

  const form = segments.length === 2 ? PATH_FORMS.get(segments[0]) : undefined;
  return form ? toReference(segments[1], form) : null;
}

function toCandidate(token: string): string | null {
  const trimmed = token.replace(/[.,!?;:)\]]+$/, "");
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  if (BARE_HOST_PATTERN.test(trimmed)) return `https://${trimmed}`;
  return null;
}

/**
 * Finds the first recognisable YouTube link in free text and extracts its video id.
 * Accepts watch, youtu.be, embed, shorts and `/v/` links over http or https, with
 * or without `www`, and bare host tokens with no scheme. Never throws; anything
 * unrecognised yields null.
 * @param text Arbitrary chat message text
 * @returns The reference for the first supported link, or null when none matches
 * @example
 * extractVideoReference("check this out https://youtu.be/dQw4w9WgXcQ")?.videoId
 * // returns "dQw4w9WgXcQ"
 */
export function extractVideoReference(text: string): VideoReference | null {
  if (typeof text !== "string" || text.length === 0) return null;

  const candidates = text
    .split(/\s+/)
    .map(toCandidate)
    .filter((candidate): candidate is string => candidate !== null);

  for (const candidate of candidates) {
    const ref = matchLink(candidate);
    if (ref) return ref;
  }
  return null;
}

/**
 * Cheap check used by the transport to decide whether an unsolicited message
 * was meant as a summary request.
 */
export function looksLikeVideoLink(text: string): boolean {
  return /youtube\.com|youtu\.be/i.test(text);
}
