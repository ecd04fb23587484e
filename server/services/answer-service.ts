import type OpenAI from 'openai';
import type { ResponseOutputItem } from 'openai/resources/responses/responses';
import type { ConversationTurn, Instructor } from '@shared/schema';
import type { AppConfig } from '../config/app-config';
import { FALLBACK_ANSWER, getAssistantPersona } from '../config/assistant-persona';
import { errorMessage } from '../errors';
import { toRemoteServiceError } from './index-client';

export interface PromptTurn {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerationRequest {
  model: string;
  turns: PromptTurn[];
  vectorStoreIds: string[];
}

export interface ContentItem {
  type: string;
  text?: string;
}

// Provider answers arrive either as a convenience text field or as structured output items
export type ProviderResponse =
  | { kind: 'direct_text'; text: string }
  | { kind: 'structured_output'; items: ContentItem[] };

export interface GenerationProvider {
  generate(request: GenerationRequest): Promise<ProviderResponse>;
}

export function extractAnswerText(response: ProviderResponse): string {
  switch (response.kind) {
    case 'direct_text':
      return response.text.trim();
    case 'structured_output':
      return response.items
        .map((item) => item.text?.trim() ?? '')
        .filter((text) => text.length > 0)
        .join('\n')
        .trim();
  }
}

export function buildPromptTurns(transcript: readonly ConversationTurn[]): PromptTurn[] {
  const turns: PromptTurn[] = [{ role: 'system', content: getAssistantPersona().systemPrompt }];
  for (const turn of transcript) {
    if (turn.role !== 'user' && turn.role !== 'assistant') continue;
    if (typeof turn.content !== 'string' || !turn.content.trim()) continue;
    turns.push({ role: turn.role, content: turn.content });
  }
  return turns;
}

export function retrievalScope(instructor: Pick<Instructor, 'vectorStoreId'>, commonVectorStoreId?: string): string[] {
  const ids: string[] = [];
  if (instructor.vectorStoreId) ids.push(instructor.vectorStoreId);
  if (commonVectorStoreId && !ids.includes(commonVectorStoreId)) ids.push(commonVectorStoreId);
  return ids;
}

export class AnswerComposer {
  constructor(
    private config: AppConfig,
    private provider: GenerationProvider,
  ) {}

  /** Always resolves to a displayable string; provider failures become an apology. */
  async composeAnswer(instructor: Instructor, transcript: readonly ConversationTurn[]): Promise<string> {
    const request: GenerationRequest = {
      model: this.config.assistantModel,
      turns: buildPromptTurns(transcript),
      vectorStoreIds: retrievalScope(instructor, this.config.commonVectorStoreId),
    };

    let response: ProviderResponse;
    try {
      response = await this.provider.generate(request);
    } catch (error) {
      const remoteError = toRemoteServiceError('generateAnswer', error);
      console.error(`[Chat] Generation failed for instructor ${instructor.id}: ${errorMessage(remoteError)}`);
      return `Sorry, I couldn't reach the assistant service right now (error ${remoteError.status}). Please try again in a moment.`;
    }

    const text = extractAnswerText(response);
    if (!text) {
      console.warn(`[Chat] Empty answer for instructor ${instructor.id}, using fallback`);
      return FALLBACK_ANSWER;
    }
    return text;
  }
}

function toContentItems(output: ResponseOutputItem[]): ContentItem[] {
  const items: ContentItem[] = [];
  for (const item of output) {
    if (item.type !== 'message') {
      items.push({ type: item.type });
      continue;
    }
    for (const part of item.content) {
      if (part.type === 'output_text') {
        items.push({ type: part.type, text: part.text });
      } else {
        items.push({ type: part.type, text: part.refusal });
      }
    }
  }
  return items;
}

export class OpenAIGenerationProvider implements GenerationProvider {
  constructor(private client: OpenAI) {}

  async generate(request: GenerationRequest): Promise<ProviderResponse> {
    const response = await this.client.responses.create({
      model: request.model,
      input: request.turns.map((turn) => ({ role: turn.role, content: turn.content })),
      tools: request.vectorStoreIds.length > 0
        ? [{ type: 'file_search', vector_store_ids: request.vectorStoreIds }]
        : undefined,
    });

    if (typeof response.output_text === 'string' && response.output_text.trim()) {
      return { kind: 'direct_text', text: response.output_text };
    }
    return { kind: 'structured_output', items: toContentItems(response.output ?? []) };
  }
}
