import type { Notifier } from "@/types/output.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Posts the frame that follows a detection to a webhook. One attempt, bounded
 * by `timeoutMs`; the caller decides what to do with a rejection.
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number = 5000,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  getUrl(): string {
    return this.url;
  }

  async send(bytes: Uint8Array, timestampUs: number): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      console.log(`[Webhook] Calling ${this.url}`);
      const response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/octet-stream",
          "X-Frame-Timestamp": timestampUs.toString(),
        },
        body: bytes,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Webhook timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createNotifier(url: string, timeoutMs: number): WebhookNotifier | null {
  if (!url) {
    console.warn("[Webhook] WEBHOOK_URL is empty, detections will not be notified");
    return null;
  }
  return new WebhookNotifier(url, timeoutMs);
}
