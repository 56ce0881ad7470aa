// src/utils/sanitize.ts

const MAX_FILE_NAME_LENGTH = 200;

/**
 * Make a remote display name safe as a local file name component.
 * Path separators, reserved characters and control characters become '_',
 * whitespace runs collapse to a single '_'.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name
    .replace(/[\/\\:*?"<>|\r\n\t]/g, '_')
    .replace(/[\u0000-\u001f\u007f]/g, '_')
    .replace(/\s+/g, '_')
    .slice(0, MAX_FILE_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : 'unnamed';
}
