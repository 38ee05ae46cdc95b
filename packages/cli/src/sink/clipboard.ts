import { execa } from 'execa';
import { ClipboardError, toError } from '@treecat/shared';
import type { OutputSink } from './types';

export interface ClipboardCommand {
  file: string;
  args: string[];
  /** Shown when the utility is missing */
  hint: string;
}

export function clipboardCommand(platform: NodeJS.Platform): ClipboardCommand {
  switch (platform) {
    case 'darwin':
      return {
        file: 'pbcopy',
        args: [],
        hint: 'pbcopy not found. This should be installed by default on macOS.',
      };
    case 'win32':
      return {
        file: 'clip',
        args: [],
        hint: 'clip.exe not found. This should be installed by default on Windows.',
      };
    default:
      return {
        file: 'xclip',
        args: ['-selection', 'clipboard'],
        hint: [
          'xclip not found. Install it with:',
          '  Ubuntu/Debian: sudo apt install xclip',
          '  Fedora: sudo dnf install xclip',
          '  Arch: sudo pacman -S xclip',
        ].join('\n'),
      };
  }
}

/**
 * Pipes the output into the platform clipboard utility.
 */
export class ClipboardSink implements OutputSink {
  private readonly command: ClipboardCommand;

  constructor(private readonly platform: NodeJS.Platform = process.platform) {
    this.command = clipboardCommand(platform);
  }

  async ensureAvailable(): Promise<void> {
    const lookup = this.platform === 'win32' ? 'where' : 'which';
    try {
      await execa(lookup, [this.command.file]);
    } catch (e) {
      throw new ClipboardError(this.command.hint, { cause: e });
    }
  }

  async write(content: string): Promise<void> {
    try {
      await execa(this.command.file, this.command.args, { input: content });
    } catch (e) {
      throw new ClipboardError(`Failed to copy to clipboard - ${toError(e).message}`, {
        cause: e,
        details: { command: [this.command.file, ...this.command.args].join(' ') },
      });
    }
  }

  describeEmpty(): string {
    return 'No files found to copy';
  }

  describeSuccess(size: string): string {
    return `Successfully copied ${size} to clipboard`;
  }
}
