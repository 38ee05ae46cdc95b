import type { OutputSink } from './types';

export class StdoutSink implements OutputSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  async ensureAvailable(): Promise<void> {}

  write(content: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(content, (err) => (err ? reject(err) : resolve()));
    });
  }

  describeEmpty(): string {
    return 'No files found to output';
  }

  describeSuccess(size: string): string {
    return `Successfully output ${size} to stdout`;
  }
}
