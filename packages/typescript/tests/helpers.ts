import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Generator, Identity } from "../src/llm/client.ts";
import type { Verdict } from "../src/verdicts/base.ts";

export type Responder = (prompt: string, identity: Identity, index: number) => string | null;

export class FakeGenerator implements Generator {
  public calls: Array<{ prompt: string; identity: Identity }> = [];
  private queue: Array<string | null>;
  private responder: Responder | null;

  constructor(replies: Array<string | null> | Responder = []) {
    if (typeof replies === "function") {
      this.queue = [];
      this.responder = replies;
    } else {
      this.queue = [...replies];
      this.responder = null;
    }
  }

  async submit(prompt: string, identity: Identity = null): Promise<string | null> {
    const index = this.calls.length;
    this.calls.push({ prompt, identity });
    if (this.responder) {
      return this.responder(prompt, identity, index);
    }
    const reply = this.queue.shift();
    return reply === undefined ? null : reply;
  }

  get identities(): Identity[] {
    return this.calls.map((call) => call.identity);
  }
}

export function review(verdict: Partial<Verdict>): string {
  return JSON.stringify({ satisfied: false, issues: [], suggestions: "", score: 0, ...verdict });
}

export const SATISFIED = review({ satisfied: true, score: 9 });

export function tempDir(prefix = "design-council-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}
