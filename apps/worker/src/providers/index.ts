import type { Config } from "../config.js";
import type { EmailProvider } from "./types.js";
import { BrevoProvider } from "./brevo-provider.js";
import { ResendProvider } from "./resend-provider.js";
import { MockEmailProvider } from "./mock-provider.js";
import { log } from "../logger.js";

export * from "./types.js";
export * from "./classification.js";
export { BrevoProvider } from "./brevo-provider.js";
export { ResendProvider } from "./resend-provider.js";
export { MockEmailProvider, type MockMode, type MockSendCall } from "./mock-provider.js";

type ProviderConfig = Pick<
  Config,
  "EMAIL_PROVIDER" | "BREVO_API_URL" | "MOCK_MODE" | "MOCK_FAILURE_RATE" | "MOCK_LATENCY_MS"
>;

/**
 * Build the provider selected by EMAIL_PROVIDER. One provider per process.
 */
export function createEmailProvider(config: ProviderConfig): EmailProvider {
  switch (config.EMAIL_PROVIDER) {
    case "mock": {
      log.provider.info({ provider: "mock", mode: config.MOCK_MODE }, "initialized");
      return new MockEmailProvider({
        mode: config.MOCK_MODE,
        failureRate: config.MOCK_FAILURE_RATE,
        latencyMs: config.MOCK_LATENCY_MS,
      });
    }

    case "resend":
      log.provider.info({ provider: "resend" }, "initialized");
      return new ResendProvider();

    case "brevo":
      log.provider.info({ provider: "brevo", apiUrl: config.BREVO_API_URL }, "initialized");
      return new BrevoProvider({ apiUrl: config.BREVO_API_URL });
  }
}
