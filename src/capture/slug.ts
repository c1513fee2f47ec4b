import type { AspectRatio } from "../config.js";

const UNSAFE_RUN = /[^\w-]+/g;
const UNSAFE_SEGMENT_RUN = /[^\w.-]+/g;

/**
 * Filesystem-safe token for a repository URL: `owner_repo` for
 * `https://github.com/owner/repo`, or the whole URL with unsafe runs
 * replaced by `_` when it has fewer than two path segments.
 */
export function screenshotSlug(url: string): string {
  const segments = url.split("/").filter((part) => part.length > 0);

  if (segments.length >= 2) {
    return segments
      .slice(-2)
      .map((segment) => segment.replace(UNSAFE_SEGMENT_RUN, "_"))
      .join("_");
  }

  return url.replace(UNSAFE_RUN, "_") || "capture";
}

export function screenshotFileName(
  url: string,
  aspectRatio: AspectRatio
): string {
  return `${screenshotSlug(url)}_readme_${aspectRatio.width}x${aspectRatio.height}.png`;
}
