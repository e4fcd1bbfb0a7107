/**
 * Prompt Builder
 *
 * Builds the generation messages: system prompt, prior conversation turns,
 * then the user message carrying the query and the assembled context.
 */

import {
  type PromptTemplate,
  type PromptTemplateInput,
  PromptTemplateSchema,
  fillTemplate,
} from './prompts.js';
import type { ConversationTurn, LLMMessage } from '../llm/index.js';

export interface PromptInput {
  queryText: string;
  context: string;
  conversationHistory?: readonly ConversationTurn[];
}

export class PromptBuilder {
  private readonly template: PromptTemplate;

  constructor(template?: PromptTemplateInput) {
    this.template = PromptTemplateSchema.parse(template ?? {});
  }

  build(input: PromptInput): LLMMessage[] {
    const values = { query: input.queryText, context: input.context };
    const history = (input.conversationHistory ?? [])
      .filter((turn) => turn.content.trim() !== '')
      .map((turn): LLMMessage => ({ role: turn.role, content: turn.content }));

    return [
      { role: 'system', content: fillTemplate(this.template.systemPrompt, values) },
      ...history,
      { role: 'user', content: fillTemplate(this.template.userPrompt, values) },
    ];
  }

  buildParaphrasePrompt(queryText: string): string {
    return fillTemplate(this.template.paraphrasePrompt, { query: queryText });
  }

  getTemplate(): Readonly<PromptTemplate> {
    return { ...this.template };
  }
}
