import { randomInt } from 'node:crypto';

const BOUNDARY_ALPHABET =
  '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const BOUNDARY_RANDOM_LENGTH = 28;

/** Random suffix for a multipart boundary. */
export function makeRandomBoundaryCharacters(): string {
  let result = '';
  for (let i = 0; i < BOUNDARY_RANDOM_LENGTH; i += 1) {
    result += BOUNDARY_ALPHABET.charAt(randomInt(BOUNDARY_ALPHABET.length));
  }
  return result;
}

function escapeFieldName(value: string): string {
  return value
    .replace(/\n/g, '%0A')
    .replace(/\r/g, '%0D')
    .replace(/"/g, '%22');
}

function normalizeLineBreaks(value: string): string {
  return value.replace(/\r\n|\r|\n/g, '\r\n');
}

export interface SerializedFormData {
  blob: Blob;
  contentType: string;
}

/**
 * Encodes form data as `multipart/form-data`. File entries are embedded as
 * Blob parts, so nothing is read while encoding.
 */
export function serializeFormData(formData: FormData): SerializedFormData {
  const boundary = `----FormDataBoundary${makeRandomBoundaryCharacters()}`;
  const parts: (string | Blob)[] = [];

  formData.forEach((value, name) => {
    const escapedName = escapeFieldName(normalizeLineBreaks(name));
    if (typeof value === 'string') {
      parts.push(
        `--${boundary}\r\nContent-Disposition: form-data; name="${escapedName}"\r\n\r\n`,
        normalizeLineBreaks(value),
        '\r\n'
      );
      return;
    }

    const filename = escapeFieldName(value.name);
    const type = value.type || 'application/octet-stream';
    parts.push(
      `--${boundary}\r\nContent-Disposition: form-data; name="${escapedName}"; filename="${filename}"\r\nContent-Type: ${type}\r\n\r\n`,
      value,
      '\r\n'
    );
  });
  parts.push(`--${boundary}--\r\n`);

  return {
    blob: new Blob(parts),
    contentType: `multipart/form-data; boundary=${boundary}`,
  };
}
