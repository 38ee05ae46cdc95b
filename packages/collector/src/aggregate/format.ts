import type { EmittedDisposition } from '../types';

/** Body of the block written for a binary file when `all` is off. */
export const BINARY_MARKER = '<BINARY_FILE>';

function withTrailingNewline(content: string): string {
  return content === '' || content.endsWith('\n') ? content : `${content}\n`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled disposition: ${JSON.stringify(value)}`);
}

/**
 * Renders the output block for one emitted file.
 *
 * Every block ends in a blank line, so concatenated blocks stay separated.
 */
export function formatBlock(displayPath: string, disposition: EmittedDisposition): string {
  switch (disposition.kind) {
    case 'text':
      return `--- ${displayPath} ---\n${withTrailingNewline(disposition.content)}\n`;
    case 'binary-marker':
      return `--- ${displayPath} ---\n${BINARY_MARKER}\n\n`;
    case 'binary-embedded':
      return `--- ${displayPath} (binary, base64) ---\n${disposition.base64}\n\n`;
    default:
      return assertNever(disposition);
  }
}
