import { Resend } from "resend";
import type { EmailProvider, ProviderResponse, SendEmailRequest } from "./types.js";

/**
 * The SDK reports errors by name only. Map them back to the HTTP status the
 * API answered with, so classification works the same for every provider.
 */
const RESEND_ERROR_STATUS: Record<string, number> = {
  missing_required_field: 422,
  invalid_parameter: 422,
  invalid_from_address: 422,
  validation_error: 403,
  invalid_idempotency_key: 400,
  invalid_idempotent_request: 409,
  concurrent_idempotent_requests: 409,
  missing_api_key: 401,
  invalid_api_Key: 403,
  invalid_access: 403,
  invalid_region: 422,
  not_found: 404,
  method_not_allowed: 405,
  rate_limit_exceeded: 429,
  daily_quota_exceeded: 429,
  application_error: 500,
  internal_server_error: 500,
};

export class ResendProvider implements EmailProvider {
  name = "resend";
  private clients = new Map<string, Resend>();

  async send(request: SendEmailRequest, credential: string): Promise<ProviderResponse> {
    try {
      const from = request.fromName
        ? `${request.fromName} <${request.from}>`
        : request.from;

      const result = await this.client(credential).emails.send({
        from,
        to: request.to,
        subject: request.subject,
        html: request.html,
      });

      if (result.error) {
        return {
          ok: false,
          status: RESEND_ERROR_STATUS[result.error.name],
          code: result.error.name,
          message: result.error.message,
        };
      }

      return { ok: true, messageId: result.data?.id ?? null };
    } catch (error) {
      // Thrown only for transport failures; HTTP errors come back in result.error
      return {
        ok: false,
        message: error instanceof Error ? error.message : "Unknown error",
      };
    }
  }

  private client(credential: string): Resend {
    let client = this.clients.get(credential);
    if (!client) {
      client = new Resend(credential);
      this.clients.set(credential, client);
    }
    return client;
  }
}
