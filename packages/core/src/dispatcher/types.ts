import type {
  AICapability,
  Attachment,
  CapabilityParams,
  ProviderResponse,
  RequestEnvelope,
} from "@modelmux/ai-providers";

/**
 * One capability call as the dispatcher sees it.
 */
export interface InvokeRequest {
  capability: AICapability;
  envelope: RequestEnvelope;
  /** Provider to try first */
  provider?: string;
  /** Model to use; routed to its owning provider when no provider is given */
  model?: string;
  attachment?: Attachment;
  voice?: string;
  params?: CapabilityParams;
  /** Checked before the cache lookup and before every dispatch attempt */
  signal?: AbortSignal;
  /** Set to false to skip both cache lookup and cache write */
  useCache?: boolean;
}

/**
 * Normalized result of a capability call.
 */
export interface AIResponse extends ProviderResponse {
  capability: AICapability;
  /** Provider that produced the result */
  provider: string;
  model: string;
  /** Served from the memory or disk cache */
  fromCache: boolean;
  /** Persisted artifact, when the result was cached */
  filePath?: string;
  /** JSON payload extracted from the response text */
  structured?: Record<string, unknown>;
  /** Extraction was attempted and found no JSON */
  unstructured?: boolean;
}

export interface ProviderStats {
  successes: number;
  failures: number;
  /** Mean latency of successful calls, in milliseconds */
  averageLatencyMs: number;
  lastError?: string;
}

/** Where a provider sits in the candidate chain, and the model it will use. */
export interface Candidate {
  providerId: string;
  model: string;
}
