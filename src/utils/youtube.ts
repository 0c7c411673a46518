const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'music.youtube.com', 'youtu.be', 'www.youtu.be']);
const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

function parseUrl(input: string): URL | null {
  const trimmed = input.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

export function isYouTubeUrl(input: string): boolean {
  const url = parseUrl(input);
  return url !== null && /^https?:$/.test(url.protocol) && YOUTUBE_HOSTS.has(url.hostname.toLowerCase());
}

/** Accepts watch, short-link, shorts, embed and live URLs. */
export function youtubeVideoId(input: string): string | null {
  if (!isYouTubeUrl(input)) return null;
  const url = parseUrl(input);
  if (!url) return null;

  let candidate: string | null;
  if (url.hostname.toLowerCase().endsWith('youtu.be')) {
    candidate = url.pathname.split('/')[1] ?? null;
  } else {
    const [, section, rest] = url.pathname.split('/');
    candidate = section && ['shorts', 'embed', 'live', 'v'].includes(section) ? (rest ?? null) : url.searchParams.get('v');
  }
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}

export function canonicalYoutubeUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
