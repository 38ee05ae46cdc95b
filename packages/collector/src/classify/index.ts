import isBinaryPath from 'is-binary-path';

/** Size of the leading window inspected to tell text from binary. */
export const BINARY_CHECK_BYTES = 8192;

/** Share of control bytes above which a window counts as binary. */
export const CONTROL_RATIO_THRESHOLD = 0.3;

export type Classification = 'text' | 'binary';

function isControlByte(byte: number): boolean {
  // Tab, LF, VT, FF, CR (0x09-0x0D) and ESC (0x1B) occur in ordinary text.
  return byte < 0x09 || (byte > 0x0d && byte < 0x20 && byte !== 0x1b) || byte === 0x7f;
}

function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    // stream: a multi-byte sequence cut off by the window edge is not an error
    new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Classifies a file's leading bytes. Pure and synchronous.
 */
export function classify(prefix: Uint8Array): Classification {
  if (prefix.length === 0) {
    return 'text';
  }
  if (prefix.includes(0)) {
    return 'binary';
  }
  if (!isValidUtf8(prefix)) {
    return 'binary';
  }

  let control = 0;
  for (const byte of prefix) {
    if (isControlByte(byte)) control++;
  }
  return control / prefix.length > CONTROL_RATIO_THRESHOLD ? 'binary' : 'text';
}

/**
 * Like {@link classify}, but well-known binary extensions (images, archives,
 * executables) are binary without looking at the bytes.
 */
export function classifyFile(filePath: string, prefix: Uint8Array): Classification {
  if (isBinaryPath(filePath)) {
    return 'binary';
  }
  return classify(prefix);
}
