import { z } from "zod";

import { HttpStatusError } from "../errors.ts";
import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";

/** A model identity understood by the model server. `null` selects the server's default model. */
export type Identity = string | null;

export interface Generator {
  submit(prompt: string, identity?: Identity): Promise<string | null>;
}

export function identityLabel(identity: Identity | undefined): string {
  return identity ?? "default-model";
}

export type OpenCodeClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
};

const SessionSchema = z.object({ id: z.string().min(1) }).passthrough();

const MessageSchema = z
  .object({
    parts: z
      .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
      .optional()
      .default([]),
  })
  .passthrough();

async function withRetry<T>(
  fn: () => Promise<T>,
  maxAttempts = 3,
  baseDelayMs = 1000,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const isTransient =
        err instanceof HttpStatusError
          ? err.status >= 500 || err.status === 429
          : err instanceof TypeError || (err instanceof Error && err.name === "AbortError");
      if (!isTransient || attempt === maxAttempts) {
        throw err;
      }
      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}

/**
 * Generator backed by an OpenCode server. Every call opens a fresh session so
 * that no conversation state leaks between agents.
 */
export class OpenCodeClient implements Generator {
  private baseUrl: string;
  private timeoutMs: number;
  private maxAttempts: number;
  private retryDelayMs: number;
  private log: Logger;

  constructor(options: OpenCodeClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? process.env.OPENCODE_BASE_URL ?? "http://localhost:3000").replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 600000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.log = (options.logger ?? rootLogger).child({ component: "opencode-client" });
  }

  async submit(prompt: string, identity: Identity = null): Promise<string | null> {
    try {
      const sessionId = await this.createSession(identity);
      return await this.sendMessage(sessionId, prompt, identity);
    } catch (err) {
      this.log.error({ err, model: identityLabel(identity) }, "generator call failed");
      return null;
    }
  }

  async createSession(identity: Identity = null): Promise<string> {
    const payload = await this.post("/session", identity ? { model: identity } : {});
    const session = SessionSchema.safeParse(payload);
    if (!session.success) {
      throw new Error("Session response did not include an id");
    }
    return session.data.id;
  }

  async sendMessage(sessionId: string, prompt: string, identity: Identity = null): Promise<string> {
    const body: {
      parts: Array<{ type: "text"; text: string }>;
      options?: { model: string };
    } = {
      parts: [{ type: "text", text: prompt }],
    };
    if (identity) {
      body.options = { model: identity };
    }

    const payload = await this.post(`/session/${encodeURIComponent(sessionId)}/message`, body);
    const message = MessageSchema.safeParse(payload);
    if (!message.success) {
      throw new Error("Message response did not include a parts array");
    }
    return message.data.parts
      .filter((part) => part.type === "text")
      .map((part) => part.text ?? "")
      .join("");
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    return withRetry(
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
          const response = await fetch(`${this.baseUrl}${path}`, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(body),
            signal: controller.signal,
          });

          if (!response.ok) {
            const detail = await response.text();
            throw new HttpStatusError(response.status, `OpenCode request failed (${response.status}): ${detail}`);
          }

          const payload: unknown = await response.json();
          return payload;
        } finally {
          clearTimeout(timeout);
        }
      },
      this.maxAttempts,
      this.retryDelayMs,
    );
  }
}
