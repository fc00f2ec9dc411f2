const REDDIT_NAME = /^[A-Za-z0-9_-]{3,20}$/;

/**
 * Accepts a bare username, `u/name`, `/user/name` or a full profile URL and
 * returns the username, or `null` when the input holds no valid Reddit name.
 */
export function extractUsername(input: string): string | null {
  let candidate = input.trim();
  if (!candidate) return null;

  if (/^https?:\/\//i.test(candidate)) {
    let url: URL;
    try {
      url = new URL(candidate);
    } catch {
      return null;
    }
    if (!/(^|\.)reddit\.com$/i.test(url.hostname)) return null;
    candidate = url.pathname;
  }

  const segments = candidate.split("/").filter(Boolean);
  if (segments.length >= 2 && /^(u|user)$/i.test(segments[0])) {
    candidate = segments[1];
  } else if (segments.length === 1) {
    candidate = segments[0];
  } else {
    return null;
  }

  return REDDIT_NAME.test(candidate) ? candidate : null;
}
