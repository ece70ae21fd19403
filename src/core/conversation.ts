import { z } from 'zod';

import { PLANNER_SYSTEM_PROMPT, buildPlannerUserPrompt } from '../prompts/planner-system.js';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
}

export interface BuildConversationOptions {
  description: string;
  chainOfThought: boolean;
  constrained: boolean;
  /** Earlier turns; entries without a known role or string content are skipped. */
  history?: readonly unknown[];
}

const historyEntrySchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export function buildConversation(options: BuildConversationOptions): ConversationMessage[] {
  const messages: ConversationMessage[] = [{ role: 'system', content: PLANNER_SYSTEM_PROMPT }];

  for (const entry of options.history ?? []) {
    const parsed = historyEntrySchema.safeParse(entry);
    if (parsed.success) {
      messages.push({ role: parsed.data.role, content: parsed.data.content });
    }
  }

  messages.push({
    role: 'user',
    content: buildPlannerUserPrompt({
      description: options.description,
      chainOfThought: options.chainOfThought,
      constrained: options.constrained,
    }),
  });

  return messages;
}
