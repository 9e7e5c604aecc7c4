/**
 * Email provider abstraction layer
 * Allows swapping between Brevo, Resend, or mock providers
 */

export interface SendEmailRequest {
  to: string;
  toName?: string;
  from: string;
  fromName?: string;
  subject: string;
  html: string;
}

/**
 * Raw outcome of one provider call. Classification into permanent and
 * transient failures happens in the send executor, not here.
 */
export type ProviderResponse =
  | {
      ok: true;
      /** Some providers accept a message without returning an id */
      messageId: string | null;
    }
  | {
      ok: false;
      /** HTTP status, absent when the request never got a response */
      status?: number;
      /** Provider-specific error code */
      code?: string;
      message: string;
      timedOut?: boolean;
    };

export interface EmailProvider {
  /** Provider name for logging */
  name: string;

  /**
   * Send a single email with the sending configuration's credential.
   * Must not throw for HTTP or network failures; those come back as `ok: false`.
   */
  send(request: SendEmailRequest, credential: string, signal?: AbortSignal): Promise<ProviderResponse>;
}
