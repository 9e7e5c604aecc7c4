import { log, createTimer } from "../logger.js";
import { emailSendDuration } from "../metrics.js";
import { RenderError } from "../domain/errors.js";
import { renderTemplate, resolveDisplayName } from "../domain/utils/template.js";
import {
  classifyProviderFailure,
  describeProviderFailure,
  redactSecret,
  truncateReason,
} from "../providers/classification.js";
import type { EmailProvider, ProviderResponse, SendEmailRequest } from "../providers/types.js";
import type { SendingConfiguration } from "../repositories/types.js";
import type { LeasedRecipient } from "./recipient-queue.js";

export type SendResult =
  | { status: "sent"; providerMessageId: string | null }
  | {
      status: "failed";
      kind: "render" | "permanent" | "transient";
      reason: string;
      /** False for render failures: nothing was sent and no attempt was used */
      reachedProvider: boolean;
    };

export type SendRecipient = Pick<LeasedRecipient, "id" | "email" | "name" | "variables">;

export interface SendExecutorConfig {
  /** Upper bound on one provider call; must stay below the lease timeout */
  sendTimeoutMs: number;
  titleCaseNames: boolean;
}

/**
 * Renders one recipient's email and makes exactly one provider call.
 * Never throws for per-recipient problems; those come back as a failed
 * SendResult. Retrying is the dispatch unit's decision.
 */
export class SendExecutor {
  constructor(
    private provider: EmailProvider,
    private config: SendExecutorConfig
  ) {}

  async execute(
    recipient: SendRecipient,
    template: string,
    configuration: SendingConfiguration
  ): Promise<SendResult> {
    let request: SendEmailRequest;
    try {
      request = this.buildRequest(recipient, template, configuration);
    } catch (error) {
      if (error instanceof RenderError) {
        log.email.warn({ recipientId: recipient.id, error: error.message }, "render failed");
        return {
          status: "failed",
          kind: "render",
          reason: truncateReason(redactSecret(error.message, configuration.credential)),
          reachedProvider: false,
        };
      }
      throw error;
    }

    const elapsed = createTimer();
    const response = await this.callProvider(request, configuration.credential);
    const durationMs = elapsed();

    if (response.ok) {
      emailSendDuration.observe({ provider: this.provider.name, status: "sent" }, durationMs / 1000);
      log.email.info({ recipientId: recipient.id, to: recipient.email, durationMs }, "sent");
      return { status: "sent", providerMessageId: response.messageId };
    }

    const kind = classifyProviderFailure(response);
    const reason = describeProviderFailure(response, configuration.credential);

    emailSendDuration.observe({ provider: this.provider.name, status: kind }, durationMs / 1000);
    log.email.warn({ recipientId: recipient.id, kind, reason, durationMs }, "failed");

    return { status: "failed", kind, reason, reachedProvider: true };
  }

  private buildRequest(
    recipient: SendRecipient,
    template: string,
    configuration: SendingConfiguration
  ): SendEmailRequest {
    const name = resolveDisplayName(recipient.name, configuration.defaultDisplayName, {
      titleCase: this.config.titleCaseNames,
    });
    const context = { ...recipient.variables, email: recipient.email, name };

    return {
      to: recipient.email,
      ...(recipient.name ? { toName: name } : {}),
      from: configuration.senderEmail,
      ...(configuration.senderName ? { fromName: configuration.senderName } : {}),
      subject: renderTemplate(configuration.subject, context),
      html: renderTemplate(template, context, { escapeHtml: true }),
    };
  }

  /**
   * One provider call, bounded by sendTimeoutMs even when the provider
   * ignores the abort signal.
   */
  private async callProvider(request: SendEmailRequest, credential: string): Promise<ProviderResponse> {
    const controller = new AbortController();
    const timeoutMs = this.config.sendTimeoutMs;
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    const timedOut = new Promise<ProviderResponse>((resolve) => {
      controller.signal.addEventListener(
        "abort",
        () => resolve({ ok: false, message: `no response within ${timeoutMs}ms`, timedOut: true }),
        { once: true }
      );
    });

    try {
      return await Promise.race([
        this.provider.send(request, credential, controller.signal),
        timedOut,
      ]);
    } catch (error) {
      // Providers report HTTP failures as values; a throw is a transport problem
      return {
        ok: false,
        message: error instanceof Error ? error.message : String(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
