/**
 * Receives text from a process stream as it arrives.
 *
 * Chunks are delivered in stream order and never overlap. Implementations
 * are called synchronously from the process I/O callbacks and must not
 * assume any particular call site.
 */
export interface OutputSink {
  append(chunk: string): void;
}

/**
 * Callback form accepted wherever a sink is.
 */
export type OutputCallback = (chunk: string) => void;

export const noopSink: OutputSink = {
  append() {},
};

/**
 * Sink that keeps everything it receives.
 */
export class TextBuffer implements OutputSink {
  private chunks: string[] = [];

  append(chunk: string): void {
    this.chunks.push(chunk);
  }

  clear(): void {
    this.chunks = [];
  }

  get text(): string {
    return this.chunks.join("");
  }
}

/**
 * Forwards each chunk to every sink, in the order given.
 */
export function teeSink(...sinks: OutputSink[]): OutputSink {
  return {
    append(chunk: string) {
      for (const sink of sinks) {
        sink.append(chunk);
      }
    },
  };
}

export function toSink(target: OutputSink | OutputCallback | undefined): OutputSink {
  if (!target) return noopSink;
  if (typeof target === "function") {
    return { append: target };
  }
  return target;
}
