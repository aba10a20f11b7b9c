import { createOpenAI } from "@ai-sdk/openai";
import { createAzure } from "@ai-sdk/azure";
import { APICallError, type EmbeddingModel, type LanguageModel } from "ai";
import { config } from "../config";
import { AttemptTimeoutError } from "./retry-utils";

export type Provider = "openai" | "azure";

interface ProviderFactory {
  languageModel(name: string): LanguageModel;
  embeddingModel(name: string): EmbeddingModel<string>;
}

const providerFactories: Record<Provider, () => ProviderFactory> = {
  openai: () => {
    const openai = createOpenAI({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.OPENAI_BASE_URL,
    });
    return {
      languageModel: name => openai(name),
      embeddingModel: name => openai.embedding(name),
    };
  },
  azure: () => {
    // deployment names stand in for model names on Azure
    const azure = createAzure({
      resourceName: config.AZURE_OPENAI_RESOURCE_NAME,
      apiKey: config.AZURE_OPENAI_API_KEY,
      apiVersion: config.AZURE_OPENAI_API_VERSION,
    });
    return {
      languageModel: name => azure(name),
      embeddingModel: name => azure.textEmbeddingModel(name),
    };
  },
};

const providers = new Map<Provider, ProviderFactory>();

function getProvider(provider: Provider): ProviderFactory {
  let factory = providers.get(provider);
  if (!factory) {
    factory = providerFactories[provider]();
    providers.set(provider, factory);
  }
  return factory;
}

export function getModel(
  name: string,
  provider: Provider = config.AI_PROVIDER,
): LanguageModel {
  return getProvider(provider).languageModel(name);
}

export function getEmbeddingModel(
  name: string,
  provider: Provider = config.AI_PROVIDER,
): EmbeddingModel<string> {
  return getProvider(provider).embeddingModel(name);
}

/**
 * Transient: timeouts, network failures, 408/409/429 and 5xx.
 * Quota exhaustion comes back as a 429 but will not clear by waiting.
 */
export function isRetryableModelError(error: unknown): boolean {
  if (error instanceof AttemptTimeoutError) return true;

  if (APICallError.isInstance(error)) {
    if (error.responseBody?.includes("insufficient_quota")) {
      return false;
    }

    const status = error.statusCode;
    if (status === undefined) return error.isRetryable;

    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  // Anything else never reached the model: sockets, DNS, aborted fetches.
  return true;
}
