/**
 * Azure OpenAI adapter.
 *
 * Same wire format as Chat Completions, but the model is a deployment name
 * in the path, the API version is a query parameter and the key travels in
 * an `api-key` header.
 */

import { AdapterType } from "../../types/enums.js";
import { ConfigurationError } from "../../types/errors.js";
import { joinUrl, mergeHeaders } from "../../utils/index.js";
import {
  OpenAICompatibleAdapter,
  type OpenAICompatibleConfig,
} from "../openai-compatible/index.js";

export const DEFAULT_AZURE_API_VERSION = "2024-10-21";

export class AzureOpenAIAdapter extends OpenAICompatibleAdapter {
  private readonly apiVersion: string;

  constructor(config: OpenAICompatibleConfig) {
    if (!config.baseUrl) {
      throw new ConfigurationError(
        "Azure OpenAI requires the resource endpoint, e.g. https://my-resource.openai.azure.com",
        { provider: config.id },
      );
    }
    super({ ...config, type: AdapterType.AZURE_OPENAI });
    this.apiVersion = config.options?.["api_version"] ?? DEFAULT_AZURE_API_VERSION;
  }

  protected override buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers["api-key"] = this.apiKey;
    }
    return mergeHeaders(headers, this.defaultHeaders);
  }

  private deploymentUrl(deployment: string, operation: string): string {
    const path = `openai/deployments/${encodeURIComponent(deployment)}/${operation}`;
    return `${joinUrl(this.baseUrl, path)}?api-version=${encodeURIComponent(this.apiVersion)}`;
  }

  protected override chatUrl(model: string): string {
    return this.deploymentUrl(model, "chat/completions");
  }

  protected override embeddingsUrl(model: string): string {
    return this.deploymentUrl(model, "embeddings");
  }
}
