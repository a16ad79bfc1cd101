const INVALID_CHARS = /[<>:"/\\|?*]/g;

/** Replace characters filesystems reject, then tidy the underscores left behind. */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(INVALID_CHARS, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '');
}
