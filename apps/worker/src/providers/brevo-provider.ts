import { z } from "zod";
import type { EmailProvider, ProviderResponse, SendEmailRequest } from "./types.js";

const successBodySchema = z.object({
  messageId: z.string().optional(),
});

const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

export interface BrevoProviderConfig {
  /** e.g. https://api.brevo.com/v3 */
  apiUrl: string;
}

/**
 * Brevo transactional email API (POST /smtp/email).
 * The credential is the sending configuration's Brevo API key.
 */
export class BrevoProvider implements EmailProvider {
  name = "brevo";
  private endpoint: string;

  constructor(config: BrevoProviderConfig) {
    this.endpoint = `${config.apiUrl.replace(/\/+$/, "")}/smtp/email`;
  }

  async send(
    request: SendEmailRequest,
    credential: string,
    signal?: AbortSignal
  ): Promise<ProviderResponse> {
    const requestBody = {
      sender: {
        email: request.from,
        ...(request.fromName ? { name: request.fromName } : {}),
      },
      to: [
        {
          email: request.to,
          ...(request.toName ? { name: request.toName } : {}),
        },
      ],
      subject: request.subject,
      htmlContent: request.html,
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "api-key": credential,
          "Content-Type": "application/json",
          "Accept": "application/json",
        },
        body: JSON.stringify(requestBody),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, message: "request timed out", timedOut: true };
      }
      return {
        ok: false,
        message: error instanceof Error ? error.message : "Unknown network error",
      };
    }

    const data: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(data);
      const body = parsed.success ? parsed.data : {};
      return {
        ok: false,
        status: response.status,
        code: body.code,
        message: body.message || response.statusText || "Brevo API error",
      };
    }

    const parsed = successBodySchema.safeParse(data);
    return {
      ok: true,
      messageId: (parsed.success ? parsed.data.messageId : undefined) ?? null,
    };
  }
}
