import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";
import { identityLabel } from "./client.ts";
import type { Generator, Identity } from "./client.ts";

export type TraceEntry = {
  index: number;
  step: string;
  model: string;
  elapsedMs: number;
  replied: boolean;
};

/**
 * Wraps a generator and logs every call with its sequence number, step,
 * prompt and reply. The sequence is per instance, so each pipeline run gets
 * its own numbering.
 */
export class TracingGenerator implements Generator {
  private inner: Generator;
  private log: Logger;
  private step = "";
  private entries: TraceEntry[] = [];

  constructor(inner: Generator, logger: Logger = rootLogger) {
    this.inner = inner;
    this.log = logger;
  }

  /** Labels subsequent calls until the next call to `withStep`. */
  withStep(step: string): this {
    this.step = step;
    return this;
  }

  async submit(prompt: string, identity: Identity = null): Promise<string | null> {
    const index = this.entries.length + 1;
    const model = identityLabel(identity);
    this.log.info({ call: index, model, step: this.step }, "generator call started");
    this.log.debug({ call: index, prompt }, "prompt");

    const start = Date.now();
    const reply = await this.inner.submit(prompt, identity);
    const elapsedMs = Date.now() - start;

    if (reply) {
      this.log.debug({ call: index, reply }, "reply");
      this.log.info({ call: index, model, elapsedMs, chars: reply.length }, "generator call finished");
    } else {
      this.log.warn({ call: index, model, elapsedMs }, "generator returned an empty reply");
    }

    this.entries.push({ index, step: this.step, model, elapsedMs, replied: Boolean(reply) });
    return reply;
  }

  get calls(): readonly TraceEntry[] {
    return this.entries;
  }
}
