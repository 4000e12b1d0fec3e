/**
 * Match Explanation Service
 *
 * Produces prose for a scored invoice/transaction pair. When a language
 * model is enabled and configured it is asked first; on any failure, an
 * empty answer or a disabled configuration, the scorer's own reason string
 * is returned unchanged. Explanations never affect matching outcomes.
 */

import OpenAI from 'openai';
import { env } from '../config';
import { getLogger } from '../utils';
import { errorMessage } from '../db/errors';
import type { BankTransactionRow, InvoiceRow } from '../db/schema';

const logger = getLogger('ExplanationService');

// ============================================
// Types
// ============================================

export interface ExplanationConfig {
  enabled: boolean;
  apiKey?: string;
  model: string;
}

/**
 * Minimal text-completion port. Returns null when the model had nothing to say.
 */
export interface CompletionClient {
  complete(prompt: string, model: string): Promise<string | null>;
}

export interface ExplanationInput {
  invoice: InvoiceRow;
  vendorName: string | null;
  transaction: BankTransactionRow;
  /** 2-decimal score, e.g. "70.00" */
  score: string;
  /** Deterministic reason from the scorer */
  reason: string;
}

const SYSTEM_PROMPT = 'You are a financial reconciliation assistant.';

// ============================================
// OpenAI adapter
// ============================================

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(prompt: string, model: string): Promise<string | null> {
    const response = await this.client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      max_tokens: 150,
      temperature: 0.3,
    });

    return response.choices[0]?.message?.content ?? null;
  }
}

// ============================================
// Prompt
// ============================================

const orNotProvided = (value: string | null): string => value ?? 'Not provided';

export function buildExplanationPrompt({
  invoice,
  vendorName,
  transaction,
  score,
  reason,
}: ExplanationInput): string {
  return [
    'You are analyzing a potential match between an invoice and a bank transaction for reconciliation purposes.',
    '',
    'Invoice:',
    `- Amount: ${invoice.amount} ${invoice.currency}`,
    `- Date: ${orNotProvided(invoice.invoice_date)}`,
    `- Invoice Number: ${orNotProvided(invoice.invoice_number)}`,
    `- Description: ${orNotProvided(invoice.description)}`,
    `- Vendor: ${orNotProvided(vendorName)}`,
    '',
    'Bank Transaction:',
    `- Amount: ${transaction.amount} ${transaction.currency}`,
    `- Posted Date: ${transaction.posted_at}`,
    `- Description: ${orNotProvided(transaction.description)}`,
    '',
    `Match Score: ${score}/100`,
    `Scoring notes: ${reason}`,
    '',
    'Provide a brief explanation (2-4 sentences) of why this match was proposed and whether it appears to be a valid match. Be concise and focus on the key matching factors.',
  ].join('\n');
}

// ============================================
// Service
// ============================================

export class ExplanationService {
  private readonly client: CompletionClient | null;

  /**
   * @param client - Overrides the OpenAI adapter; used when enabled even without an API key
   */
  constructor(
    private readonly config: ExplanationConfig,
    client?: CompletionClient
  ) {
    if (client) {
      this.client = client;
    } else if (config.apiKey) {
      this.client = new OpenAICompletionClient(config.apiKey);
    } else {
      this.client = null;
    }
  }

  get aiAvailable(): boolean {
    return this.config.enabled && this.client !== null;
  }

  async explain(input: ExplanationInput): Promise<string> {
    if (!this.config.enabled || !this.client) {
      return input.reason;
    }

    try {
      const text = await this.client.complete(buildExplanationPrompt(input), this.config.model);
      const trimmed = text?.trim();

      if (trimmed) {
        return trimmed;
      }

      logger.warn('Explanation model returned no text, using scorer reason', {
        invoiceId: input.invoice.id,
        transactionId: input.transaction.id,
      });
    } catch (error) {
      logger.warn('Explanation model failed, using scorer reason', {
        invoiceId: input.invoice.id,
        transactionId: input.transaction.id,
        error: errorMessage(error),
      });
    }

    return input.reason;
  }
}

export const explanationService = new ExplanationService({
  enabled: env.AI_ENABLED,
  apiKey: env.OPENAI_API_KEY,
  model: env.OPENAI_MODEL,
});

export default explanationService;
