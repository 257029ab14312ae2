/**
 * Signing collaborator client
 * Hands transaction intents to the external signer, which signs, submits and
 * reports the on-chain outcome. Keys never enter this process.
 */

import { z } from 'zod';
import { fetchWithTimeout } from '../utils/async.js';
import { stringify } from '../utils/json.js';
import type { Hex, TxIntent } from '../../../shared/schema.js';

const hexSchema = z.custom<Hex>((value) => typeof value === 'string' && /^0x[0-9a-fA-F]*$/.test(value));

const submissionSchema = z.object({
  status: z.enum(['settled', 'failed', 'rejected']),
  txHash: hexSchema.optional(),
  amountOut: z.string().optional(),
  gasUsed: z.string().optional(),
  error: z.string().optional(),
});

const statusSchema = z.object({
  status: z.enum(['pending', 'settled', 'failed', 'unknown']),
  txHash: hexSchema.optional(),
  amountOut: z.string().optional(),
  gasUsed: z.string().optional(),
  error: z.string().optional(),
});

export type SubmissionResult = z.infer<typeof submissionSchema>;
export type ExecutionStatusResult = z.infer<typeof statusSchema>;

export interface SigningCollaborator {
  /** idempotent per intentId */
  signAndSubmit(intent: TxIntent): Promise<SubmissionResult>;
  getExecutionStatus(intentId: string): Promise<ExecutionStatusResult>;
}

export interface HttpSigningClientOptions {
  baseUrl: string;
  apiKey?: string;
  requestTimeoutMs: number;
}

export class HttpSigningClient implements SigningCollaborator {
  constructor(private readonly options: HttpSigningClientOptions) {}

  async signAndSubmit(intent: TxIntent): Promise<SubmissionResult> {
    const response = await fetchWithTimeout(
      `${this.options.baseUrl}/intents`,
      { method: 'POST', headers: this.headers(), body: stringify(intent) },
      this.options.requestTimeoutMs
    );

    // 4xx is a definitive refusal; 5xx leaves the outcome unknown
    if (response.status >= 400 && response.status < 500) {
      return { status: 'rejected', error: `Signer refused intent (${response.status})` };
    }
    if (!response.ok) {
      throw new Error(`Signer responded ${response.status}`);
    }

    return submissionSchema.parse(await response.json());
  }

  async getExecutionStatus(intentId: string): Promise<ExecutionStatusResult> {
    const response = await fetchWithTimeout(
      `${this.options.baseUrl}/intents/${encodeURIComponent(intentId)}`,
      { method: 'GET', headers: this.headers() },
      this.options.requestTimeoutMs
    );

    if (response.status === 404) {
      return { status: 'unknown' };
    }
    if (!response.ok) {
      throw new Error(`Signer status lookup responded ${response.status}`);
    }

    return statusSchema.parse(await response.json());
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }
}
