import { describe, it, expect } from "vitest";
import { MockEmailProvider } from "../../../providers/mock-provider.js";
import type { EmailProvider, ProviderResponse } from "../../../providers/types.js";
import { SendExecutor, type SendRecipient } from "../../../services/send-executor.js";
import type { SendingConfiguration } from "../../../repositories/types.js";
import { USER_ID } from "../../../../test/helpers.js";

const configuration: SendingConfiguration = {
  id: "cfg-1",
  userId: USER_ID,
  credential: "test-secret",
  senderEmail: "news@example.com",
  senderName: "Example News",
  subject: "News for {{ name }}",
  templateName: "mail.html",
  defaultDisplayName: "there",
  hourlyLimit: 20,
  dailyLimit: 300,
};

const recipient: SendRecipient = {
  id: "rcpt-1",
  email: "ada@example.com",
  name: "ada lovelace",
  variables: { city: "London" },
};

function executorWith(provider: EmailProvider, sendTimeoutMs = 1000) {
  return new SendExecutor(provider, { sendTimeoutMs, titleCaseNames: true });
}

class FixedProvider implements EmailProvider {
  name = "fixed";
  constructor(private response: ProviderResponse) {}
  async send(): Promise<ProviderResponse> {
    return this.response;
  }
}

describe("SendExecutor", () => {
  it("should render the subject and body and report the message id", async () => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 });
    const executor = executorWith(provider);

    const result = await executor.execute(
      { ...recipient, name: "ada <b>lovelace</b>" },
      "<p>Hi {{ name }} from {{city}} ({{ email }})</p>",
      configuration
    );

    expect(result.status).toBe("sent");
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0]).toEqual({
      credential: "test-secret",
      request: {
        to: "ada@example.com",
        toName: "Ada <b>lovelace</b>",
        from: "news@example.com",
        fromName: "Example News",
        subject: "News for Ada <b>lovelace</b>",
        html: "<p>Hi Ada &lt;b&gt;lovelace&lt;/b&gt; from London (ada@example.com)</p>",
      },
    });
  });

  it("should greet with the default name when the recipient has none", async () => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 });

    await executorWith(provider).execute({ ...recipient, name: null }, "Hey {{name}}!", configuration);

    expect(provider.calls[0]?.request.html).toBe("Hey there!");
    expect(provider.calls[0]?.request.toName).toBeUndefined();
  });

  it("should fail with kind render and never call the provider", async () => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 });

    const result = await executorWith(provider).execute(recipient, "Hi {{ company }}", configuration);

    expect(result).toEqual({
      status: "failed",
      kind: "render",
      reason: "Missing template variable(s): company",
      reachedProvider: false,
    });
    expect(provider.calls).toHaveLength(0);
  });

  it.each([
    [503, "transient"],
    [500, "transient"],
    [429, "transient"],
    [408, "transient"],
    [400, "permanent"],
    [401, "permanent"],
    [404, "permanent"],
  ] as const)("should classify HTTP %i as %s", async (status, kind) => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 }).script(status);

    const result = await executorWith(provider).execute(recipient, "<p>Hi</p>", configuration);

    expect(result).toEqual({
      status: "failed",
      kind,
      reason: `HTTP ${status} [simulated_failure]: Simulated failure (HTTP ${status})`,
      reachedProvider: true,
    });
  });

  it("should treat a network error as transient", async () => {
    const executor = executorWith(new FixedProvider({ ok: false, message: "ECONNRESET" }));

    const result = await executor.execute(recipient, "<p>Hi</p>", configuration);

    expect(result).toEqual({
      status: "failed",
      kind: "transient",
      reason: "network error: ECONNRESET",
      reachedProvider: true,
    });
  });

  it("should time out a provider that never answers", async () => {
    const hanging: EmailProvider = {
      name: "hanging",
      send: () => new Promise<ProviderResponse>(() => {}),
    };

    const result = await executorWith(hanging, 20).execute(recipient, "<p>Hi</p>", configuration);

    expect(result).toEqual({
      status: "failed",
      kind: "transient",
      reason: "timeout: no response within 20ms",
      reachedProvider: true,
    });
  });

  it("should treat a provider exception as transient", async () => {
    const throwing: EmailProvider = {
      name: "throwing",
      send: async () => {
        throw new Error("socket hang up");
      },
    };

    const result = await executorWith(throwing).execute(recipient, "<p>Hi</p>", configuration);

    expect(result).toMatchObject({ status: "failed", kind: "transient", reason: "network error: socket hang up" });
  });

  it("should redact the credential from failure reasons", async () => {
    const executor = executorWith(
      new FixedProvider({
        ok: false,
        status: 401,
        code: "unauthorized",
        message: "Key test-secret is not valid",
      })
    );

    const result = await executor.execute(recipient, "<p>Hi</p>", configuration);

    expect(result).toEqual({
      status: "failed",
      kind: "permanent",
      reason: "HTTP 401 [unauthorized]: Key [redacted] is not valid",
      reachedProvider: true,
    });
  });

  it("should truncate long failure reasons", async () => {
    const executor = executorWith(new FixedProvider({ ok: false, status: 400, message: "x".repeat(2000) }));

    const result = await executor.execute(recipient, "<p>Hi</p>", configuration);

    expect(result.status === "failed" && result.reason.length).toBe(500);
    expect(result.status === "failed" && result.reason.endsWith("...")).toBe(true);
  });

  it("should pass a null message id through", async () => {
    const executor = executorWith(new FixedProvider({ ok: true, messageId: null }));
    expect(await executor.execute(recipient, "<p>Hi</p>", configuration)).toEqual({
      status: "sent",
      providerMessageId: null,
    });
  });
});
