/**
 * @module domains/agent/streaming/ContentAccumulator
 *
 * Token text of one streamed run, persisted as the assistant message once
 * the stream reaches `done`.
 */

export class ContentAccumulator {
  private readonly chunks: string[] = [];

  /** Empty chunks are ignored. */
  append(chunk: string): void {
    if (chunk) {
      this.chunks.push(chunk);
    }
  }

  getContent(): string {
    return this.chunks.join('');
  }
}
