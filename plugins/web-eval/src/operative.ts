/**
 * operative.sh backend access.
 *
 * The backend does two things for us: it authorizes subscription keys, and
 * it fronts the model that drives the evaluation browser. Both the setup
 * CLI and the MCP server go through this module.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { loadConfig } from './config.js';

export interface ApiKeyValidation {
  valid: boolean;
  message: string;
}

export class ApiKeyValidationError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiKeyValidationError';
  }
}

const ValidateKeyResponse = z.object({
  valid: z.boolean(),
  message: z.string().optional(),
});

let _validatedKey: string | null = null;

/**
 * Join the backend base URL and a path with exactly one slash.
 */
export function getBackendUrl(path = '', baseUrl = loadConfig().backendUrl): string {
  const base = baseUrl.replace(/\/+$/, '');
  const suffix = path.replace(/^\/+/, '');
  return suffix ? `${base}/${suffix}` : base;
}

/**
 * Ask the backend whether a key is valid.
 *
 * Rejections (401/403 or `valid: false`) resolve to `{ valid: false }`;
 * anything else that isn't a clean answer throws.
 */
export async function validateApiKey(
  apiKey: string,
  baseUrl?: string,
): Promise<ApiKeyValidation> {
  const key = apiKey.trim();
  if (!key) {
    return { valid: false, message: 'API key is empty' };
  }

  let res: Response;
  try {
    res = await fetch(getBackendUrl('api/validate-key', baseUrl), {
      method: 'GET',
      headers: { 'x-operative-api-key': key },
    });
  } catch (err) {
    throw new Error(
      `Could not reach the operative backend: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (res.status === 401 || res.status === 403) {
    return { valid: false, message: 'API key was rejected by the operative backend' };
  }

  if (!res.ok) {
    const errText = await res.text();
    throw new ApiKeyValidationError(
      res.status,
      `API key validation failed (${res.status}): ${errText}`,
    );
  }

  const body = ValidateKeyResponse.safeParse(await res.json().catch(() => null));
  if (!body.success) {
    throw new ApiKeyValidationError(res.status, 'Unexpected response from the key validation endpoint');
  }

  if (!body.data.valid) {
    return { valid: false, message: body.data.message ?? 'API key is not valid' };
  }
  return { valid: true, message: body.data.message ?? 'API key is valid' };
}

/**
 * Returns the key once the backend has accepted it. A positive answer is
 * cached for the lifetime of the process so repeated tool calls don't
 * re-validate.
 */
export async function ensureApiKey(apiKey: string | undefined, baseUrl?: string): Promise<string> {
  if (!apiKey) {
    throw new Error(
      'OPERATIVE_API_KEY is not set. Run web-eval-setup, or add the key to the MCP server env.',
    );
  }
  if (_validatedKey === apiKey) {
    return apiKey;
  }

  const { valid, message } = await validateApiKey(apiKey, baseUrl);
  if (!valid) {
    throw new Error(`Invalid OPERATIVE_API_KEY: ${message}. Get a key at https://www.operative.sh`);
  }

  _validatedKey = apiKey;
  return apiKey;
}

export function clearApiKeyCache(): void {
  _validatedKey = null;
}

export interface BackendClientOptions {
  apiKey: string;
  toolCallId: string;
  model: string;
  baseUrl?: string;
}

/**
 * Model client pointed at the backend's proxy for `model`. Every request
 * carries the subscription key and the id of the MCP tool call it serves.
 */
export function createBackendClient({
  apiKey,
  toolCallId,
  model,
  baseUrl,
}: BackendClientOptions): Anthropic {
  return new Anthropic({
    apiKey,
    baseURL: getBackendUrl(`v1beta/models/${model}`, baseUrl),
    defaultHeaders: {
      'x-operative-api-key': apiKey,
      'x-operative-tool-call-id': toolCallId,
    },
  });
}
