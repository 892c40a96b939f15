import * as z from "zod";
import { createLogger, type Logger } from "../logger.js";
import type { FetchLike } from "./live-client.js";

/** Turns a base64 PDF into a link the user can open. */
export interface DocumentPublisher {
  publish(base64Pdf: string): Promise<string | null>;
}

export interface HttpDocumentPublisherConfig {
  uploadUrl: string;
  shortener?: { baseUrl: string; token: string } | null;
}

const UploadResponseSchema = z.object({ url: z.string().url() });
const ShortUrlResponseSchema = z.object({ short_path: z.string() });

const PUBLISH_TIMEOUT_MS = 30_000;

/**
 * Uploads the PDF to a storage endpoint and, when a shortener is configured,
 * shortens the returned link. Any failure yields null.
 */
export class HttpDocumentPublisher implements DocumentPublisher {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly config: HttpDocumentPublisherConfig, deps: { fetchImpl?: FetchLike; logger?: Logger } = {}) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? createLogger("document-publisher");
  }

  async publish(base64Pdf: string): Promise<string | null> {
    try {
      const uploaded = await this.upload(base64Pdf);
      if (!uploaded) return null;
      return (await this.shorten(uploaded)) ?? uploaded;
    } catch (error) {
      this.logger.error({ err: error }, "failed to publish slip document");
      return null;
    }
  }

  private async upload(base64Pdf: string): Promise<string | null> {
    const response = await this.fetchImpl(this.config.uploadUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ content: base64Pdf, content_type: "application/pdf" }),
      signal: AbortSignal.timeout(PUBLISH_TIMEOUT_MS),
    });
    if (!response.ok) {
      this.logger.error({ status: response.status }, "document upload rejected");
      return null;
    }
    const parsed = UploadResponseSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.url : null;
  }

  private async shorten(url: string): Promise<string | null> {
    const shortener = this.config.shortener;
    if (!shortener) return null;
    const response = await this.fetchImpl(`${shortener.baseUrl}/link/api/urls`, {
      method: "POST",
      headers: { Authorization: `Bearer ${shortener.token}`, "Content-Type": "application/json" },
      body: JSON.stringify({ description: "Link for IPTU generated pdf", destination: url, title: "IPTU Workflow" }),
      signal: AbortSignal.timeout(PUBLISH_TIMEOUT_MS),
    });
    if (response.status !== 200 && response.status !== 201) {
      this.logger.warn({ status: response.status }, "url shortener rejected request");
      return null;
    }
    const parsed = ShortUrlResponseSchema.safeParse(await response.json());
    return parsed.success ? `${shortener.baseUrl}/link/${parsed.data.short_path}` : null;
  }
}
