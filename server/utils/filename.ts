const DEFAULT_FILENAME = 'upload';

// Keeps [A-Za-z0-9_.-] only; path separators and whitespace become "_"
export function sanitizeFilename(raw: string): string {
  const ascii = raw.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const joined = ascii
    .replace(/[/\\]/g, ' ')
    .trim()
    .split(/\s+/)
    .join('_');
  const cleaned = joined
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
  return cleaned.slice(0, 255) || DEFAULT_FILENAME;
}
