export interface WebhookDeliveryRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

export interface WebhookDeliveryResponse {
  status: number;
  responseBody: string;
}

/**
 * Raw HTTP POST to a subscriber. Resolves with any HTTP status, rejects only
 * when no response arrived (timeout, refused connection, TLS failure).
 */
export interface WebhookDeliveryPort {
  post(request: WebhookDeliveryRequest): Promise<WebhookDeliveryResponse>;
}
