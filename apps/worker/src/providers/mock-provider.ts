import type { EmailProvider, ProviderResponse, SendEmailRequest } from "./types.js";

export type MockMode = "success" | "fail" | "random";

export interface MockProviderConfig {
  mode: MockMode;
  failureRate?: number;  // 0-1, only used in "random" mode
  latencyMs?: number;    // Simulate network delay
  /** HTTP status returned by a simulated failure (default 500) */
  failureStatus?: number;
}

export interface MockSendCall {
  request: SendEmailRequest;
  credential: string;
}

export class MockEmailProvider implements EmailProvider {
  name = "mock";
  private config: Required<MockProviderConfig>;
  private messageCounter = 0;
  private scripted: number[] = [];

  /** Every request received, in order */
  readonly calls: MockSendCall[] = [];

  constructor(config: MockProviderConfig) {
    this.config = {
      mode: config.mode,
      failureRate: config.failureRate ?? 0.1,
      latencyMs: config.latencyMs ?? 50,
      failureStatus: config.failureStatus ?? 500,
    };
  }

  /**
   * Queue HTTP statuses for the next calls. A scripted status overrides the
   * mode: 2xx succeeds, anything else fails with that status.
   */
  script(...statuses: number[]): this {
    this.scripted.push(...statuses);
    return this;
  }

  async send(
    request: SendEmailRequest,
    credential: string,
    signal?: AbortSignal
  ): Promise<ProviderResponse> {
    this.calls.push({ request, credential });

    if (this.config.latencyMs > 0) {
      const completed = await this.sleep(this.config.latencyMs, signal);
      if (!completed) {
        return { ok: false, message: "request aborted", timedOut: true };
      }
    }

    const status = this.scripted.shift() ?? (this.shouldFail() ? this.config.failureStatus : 200);

    if (status < 200 || status >= 300) {
      return {
        ok: false,
        status,
        code: "simulated_failure",
        message: `Simulated failure (HTTP ${status})`,
      };
    }

    return { ok: true, messageId: this.generateMessageId() };
  }

  reset(): void {
    this.calls.length = 0;
    this.scripted = [];
    this.messageCounter = 0;
  }

  private shouldFail(): boolean {
    switch (this.config.mode) {
      case "success":
        return false;
      case "fail":
        return true;
      case "random":
        return Math.random() < this.config.failureRate;
    }
  }

  private generateMessageId(): string {
    this.messageCounter++;
    return `mock-${Date.now()}-${this.messageCounter.toString().padStart(6, "0")}`;
  }

  /** Resolves false when aborted before the delay elapsed */
  private sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
